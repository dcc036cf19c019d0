import { ExecutionMode, ExecutionStatus, StepStatus } from '@ensemble/sdk';
import { ExecutionWithSteps } from '../db/execution.entity';
import { StepPatch } from '../db/step.entity';
import { AuditRecordEntity, AuditStatistics, NewAuditRecord } from '../db/audit-record.entity';
import { CommunicationEntity, NewCommunication } from '../db/communication.entity';

export interface NewStep {
    id: string;
    position: number;
    agent_id: string;
    task_text: string;
    depends_on: string[];
    timeout_ms: number | null;
    status: StepStatus;
}

export interface NewExecution {
    id: string;
    template_id: string | null;
    execution_mode: ExecutionMode;
    working_context: Record<string, unknown>;
    steps: NewStep[];
}

export interface ExecutionFields {
    worker_id?: string;
    started_at?: Date;
    completed_at?: Date;
}

export interface StepTransitionFields extends StepPatch {
    started_at?: Date;
    completed_at?: Date;
}

export interface ReapedExecution {
    id: string;
    worker_id: string | null;
    failed_steps: string[];
    skipped_steps: string[];
    progress: number;
}

export interface StatisticsRange {
    from?: Date;
    to?: Date;
}

/**
 * Executions and their steps. Status changes only go through the
 * transition methods, which return false when the move is not legal
 * from the stored status.
 */
export interface ExecutionRepository {
    create(execution: NewExecution): Promise<ExecutionWithSteps>;
    findById(id: string): Promise<ExecutionWithSteps | null>;
    transitionExecution(id: string, to: ExecutionStatus, fields?: ExecutionFields): Promise<boolean>;
    transitionStep(executionId: string, stepId: string, to: StepStatus, fields?: StepTransitionFields): Promise<boolean>;
    updateStep(executionId: string, stepId: string, patch: StepPatch): Promise<void>;
    updateHeartbeat(ids: string[]): Promise<void>;
    failStale(thresholdSeconds: number): Promise<ReapedExecution[]>;
}

export interface AuditRepository {
    append(record: NewAuditRecord): Promise<AuditRecordEntity>;
    findByExecution(executionId: string): Promise<AuditRecordEntity[]>;
    statistics(range: StatisticsRange): Promise<AuditStatistics>;
}

export interface CommunicationRepository {
    /** Inserts unless the id exists; `created` tells which happened. */
    createIfAbsent(record: NewCommunication): Promise<{ record: CommunicationEntity; created: boolean }>;
    /** Returns the updated row, or null if unknown or already answered. */
    attachResponse(id: string, response: string): Promise<CommunicationEntity | null>;
    findById(id: string): Promise<CommunicationEntity | null>;
    findByExecution(executionId: string): Promise<CommunicationEntity[]>;
}

export const STEP_REAPED_MESSAGE = 'orchestrator heartbeat lost';
