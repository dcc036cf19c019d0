/**
 * Runtime validation for everything that enters the engine from outside:
 * template files, start requests and agent service responses.
 */
import { z } from 'zod';
import { EXECUTION_MODES } from '@ensemble/sdk';
import { ValidationError } from '../errors';

export const TEMPLATE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const StepDefinitionSchema = z.object({
    id: z.string().min(1, 'step id is required'),
    agentId: z.string().min(1, 'agentId is required'),
    task: z.string().min(1, 'task is required'),
    dependsOn: z.array(z.string().min(1)).default([]),
    timeoutMs: z.number().int().positive().optional(),
});

export const WorkflowTemplateSchema = z.object({
    id: z.string().max(100).regex(TEMPLATE_ID_PATTERN, 'template id may only contain letters, digits, _ and -'),
    name: z.string().min(1, 'name is required'),
    description: z.string().default(''),
    steps: z.array(StepDefinitionSchema).min(1, 'template needs at least one step'),
});

export const TemplateFileSchema = z.object({
    templates: z.array(WorkflowTemplateSchema),
});

export const StartExecutionSchema = z
    .object({
        templateId: z.string().min(1).optional(),
        steps: z.array(StepDefinitionSchema).optional(),
        mode: z.enum(EXECUTION_MODES).optional(),
        context: z.record(z.unknown()).optional(),
    })
    .refine(req => (req.templateId === undefined) !== (req.steps === undefined), {
        message: 'exactly one of templateId or steps is required',
    });

export const AgentSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    role: z.string().default(''),
});

export const AgentFileSchema = z.object({
    agents: z.array(AgentSchema),
});

export const AgentResponseSchema = z.object({
    output: z.string(),
});

export type StartExecutionInput = z.infer<typeof StartExecutionSchema>;

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(value);
    if (result.success) return result.data;

    const messages = result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid ${what}: ${messages.join('; ')}`);
}
