export type ExecutionMode = 'sequential' | 'parallel' | 'staged';

export const EXECUTION_MODES = ['sequential', 'parallel', 'staged'] as const satisfies readonly ExecutionMode[];

export type ExecutionStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export const EXECUTION_STATUSES = [
    'pending',
    'running',
    'completed',
    'failed',
    'cancelled',
] as const satisfies readonly ExecutionStatus[];

export function isExecutionStatus(value: string): value is ExecutionStatus {
    return EXECUTION_STATUSES.some((status) => status === value);
}

export function isExecutionMode(value: string): value is ExecutionMode {
    return EXECUTION_MODES.some((mode) => mode === value);
}

export type StepStatus = 'pending' | 'blocked' | 'running' | 'completed' | 'failed' | 'skipped';

export interface StepDefinition {
    id: string;
    agentId: string;
    task: string;
    dependsOn?: string[];
    /** Overrides the engine's default per-attempt timeout. */
    timeoutMs?: number;
}

export interface WorkflowTemplate {
    id: string;
    name: string;
    description: string;
    steps: StepDefinition[];
}

export interface TemplateSummary {
    id: string;
    name: string;
    description: string;
    stepCount: number;
    agents: string[];
}

export interface StepErrorInfo {
    name: string;
    message: string;
}

export interface StepView {
    id: string;
    agentId: string;
    task: string;
    dependsOn: string[];
    stage: number;
    status: StepStatus;
    retryCount: number;
    startedAt: Date | null;
    completedAt: Date | null;
    output: string | null;
    error: StepErrorInfo | null;
}

export interface StepFailure {
    stepId: string;
    agentId: string;
    error: StepErrorInfo;
}

export type StepCounts = Record<StepStatus, number> & { total: number };

/**
 * Read-only snapshot of an execution.
 * `skipped` steps count towards `progress` but are reported separately in
 * `counts`, so observers can tell "done" from "given up".
 */
export interface ExecutionView {
    id: string;
    templateId: string | null;
    mode: ExecutionMode;
    status: ExecutionStatus;
    progress: number;
    counts: StepCounts;
    stages: string[][];
    steps: StepView[];
    failures: StepFailure[];
    createdAt: Date;
    startedAt: Date | null;
    completedAt: Date | null;
}

export type ExecutionEventType =
    | 'step_started'
    | 'step_progress'
    | 'step_completed'
    | 'step_failed'
    | 'step_skipped'
    | 'execution_completed'
    | 'execution_failed'
    | 'execution_cancelled';

export interface ExecutionEvent {
    executionId: string;
    type: ExecutionEventType;
    payload: Record<string, unknown>;
    timestamp: Date;
}

export interface StartExecutionRequest {
    templateId?: string;
    steps?: StepDefinition[];
    mode?: ExecutionMode;
    context?: Record<string, unknown>;
}

export interface AuditEntry {
    id: string;
    executionId: string;
    stepId: string | null;
    agentId: string | null;
    action: string;
    status: string;
    message: string;
    timestamp: Date;
    seq: number;
}

export type ExportFormat = 'csv' | 'pdf';

export type AuditExport =
    | { ok: true; format: 'csv'; contentType: string; filename: string; body: Buffer }
    | { ok: false; reason: 'unsupported_format'; format: string; supported: string[]; message: string };
