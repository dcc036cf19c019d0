import { StepErrorInfo, StepStatus } from '@ensemble/sdk';

/**
 * Lifecycle states for individual steps.
 * BLOCKED steps wait on dependencies; PENDING steps are ready to dispatch.
 */
export const stepStatus = {
    PENDING: 'pending',
    BLOCKED: 'blocked',
    RUNNING: 'running',
    COMPLETED: 'completed',
    FAILED: 'failed',
    SKIPPED: 'skipped',
} as const satisfies Record<string, StepStatus>;

/**
 * A single agent invocation within an execution, keyed by (execution_id, id).
 */
export interface StepEntity {
    id: string;  // Unique within execution
    execution_id: string;
    position: number;  // Definition order, tie-break for sequential dispatch
    agent_id: string;
    task_text: string;
    depends_on: string[];
    timeout_ms: number | null;
    status: StepStatus;
    started_at: Date | null;
    completed_at: Date | null;
    result: string | null;
    error: StepErrorInfo | null;
    retry_count: number;
}

export type StepPatch = Partial<Pick<StepEntity, 'result' | 'error' | 'retry_count'>>;
