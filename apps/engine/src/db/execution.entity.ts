import { ExecutionMode, ExecutionStatus } from '@ensemble/sdk';
import { StepEntity } from './step.entity';

/**
 * Lifecycle states for executions.
 * Executions progress: PENDING → RUNNING → COMPLETED/FAILED/CANCELLED
 */
export const executionStatus = {
    PENDING: 'pending',
    RUNNING: 'running',
    COMPLETED: 'completed',
    FAILED: 'failed',
    CANCELLED: 'cancelled',
} as const satisfies Record<string, ExecutionStatus>;

/**
 * One running instance of a workflow (template or ad-hoc step set).
 * Created at submission, mutated only by the scheduler (and the reaper for
 * executions whose owner died), never deleted.
 */
export interface ExecutionEntity {
    id: string;
    template_id: string | null;
    execution_mode: ExecutionMode;
    working_context: Record<string, unknown>;
    status: ExecutionStatus;
    worker_id: string | null;
    heartbeat_at: Date | null;  // For dead orchestrator detection
    created_at: Date;
    started_at: Date | null;
    completed_at: Date | null;
}

export interface ExecutionWithSteps extends ExecutionEntity {
    steps: StepEntity[];  // ordered by position
}
