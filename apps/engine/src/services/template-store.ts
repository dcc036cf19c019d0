import { readFile } from 'fs/promises';
import { TemplateSummary, WorkflowTemplate } from '@ensemble/sdk';
import { TemplateNotFoundError, ValidationError } from '../errors';
import { resolveStages } from './dependency-resolver';
import { TemplateFileSchema, WorkflowTemplateSchema, parseOrThrow } from './schemas';

const TAG = '[templates]';

export interface FrozenStep {
    readonly id: string;
    readonly agentId: string;
    readonly task: string;
    readonly dependsOn: readonly string[];
    readonly timeoutMs?: number;
}

export interface FrozenTemplate {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly steps: readonly FrozenStep[];
}

function freeze(template: WorkflowTemplate): FrozenTemplate {
    const steps = template.steps.map((step): FrozenStep =>
        Object.freeze({ ...step, dependsOn: Object.freeze([...(step.dependsOn ?? [])]) }));
    return Object.freeze({ ...template, steps: Object.freeze(steps) });
}

/**
 * Named, reusable step graphs. Templates are validated on registration
 * and frozen; executions copy their steps.
 */
export class TemplateStore {
    private readonly templates = new Map<string, FrozenTemplate>();

    register(input: unknown): FrozenTemplate {
        const template: WorkflowTemplate = parseOrThrow(WorkflowTemplateSchema, input, 'template');
        if (this.templates.has(template.id)) {
            throw new ValidationError(`Template "${template.id}" is already registered`);
        }
        resolveStages(template.steps.map(s => ({ id: s.id, dependsOn: s.dependsOn ?? [] })));

        const frozen = freeze(template);
        this.templates.set(frozen.id, frozen);
        return frozen;
    }

    get(id: string): FrozenTemplate | undefined {
        return this.templates.get(id);
    }

    require(id: string): FrozenTemplate {
        const template = this.templates.get(id);
        if (!template) throw new TemplateNotFoundError(id);
        return template;
    }

    list(): TemplateSummary[] {
        return [...this.templates.values()].map(t => ({
            id: t.id,
            name: t.name,
            description: t.description,
            stepCount: t.steps.length,
            agents: [...new Set(t.steps.map(s => s.agentId))],
        }));
    }

    async loadFile(path: string): Promise<number> {
        const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
        const file = parseOrThrow(TemplateFileSchema, raw, `template file ${path}`);
        for (const template of file.templates) this.register(template);
        console.log(`${TAG} loaded ${file.templates.length} templates from ${path}`);
        return file.templates.length;
    }
}
