import { ExecutionStatus, StepStatus } from '@ensemble/sdk';
import { v7 as uuid } from 'uuid';
import { ExecutionWithSteps, executionStatus } from '../db/execution.entity';
import { StepEntity, StepPatch, stepStatus } from '../db/step.entity';
import { AuditRecordEntity, AuditStatistics, NewAuditRecord } from '../db/audit-record.entity';
import { CommunicationEntity, NewCommunication } from '../db/communication.entity';
import { canTransitionExecution, canTransitionStep } from '../db/transitions';
import { progress } from '../services/progress';
import { FAILED_AUDIT_STATUSES, successRate } from './audit.repository';
import {
    AuditRepository,
    CommunicationRepository,
    ExecutionFields,
    ExecutionRepository,
    NewExecution,
    ReapedExecution,
    STEP_REAPED_MESSAGE,
    StatisticsRange,
    StepTransitionFields,
} from './types';

type Clock = () => Date;
const systemClock: Clock = () => new Date();

function applyPatch(step: StepEntity, patch: StepPatch): void {
    if (patch.result !== undefined) step.result = patch.result;
    if (patch.error !== undefined) step.error = patch.error;
    if (patch.retry_count !== undefined) step.retry_count = patch.retry_count;
}

/**
 * Process-local storage used when DATABASE_URL is unset, and by the tests.
 * Reads and writes copy, so callers never alias stored rows.
 */
export class InMemoryExecutionRepository implements ExecutionRepository {
    private readonly executions = new Map<string, ExecutionWithSteps>();

    constructor(private readonly clock: Clock = systemClock) { }

    async create(execution: NewExecution): Promise<ExecutionWithSteps> {
        if (this.executions.has(execution.id)) {
            throw new Error(`Execution ${execution.id} already exists`);
        }
        const stored: ExecutionWithSteps = {
            id: execution.id,
            template_id: execution.template_id,
            execution_mode: execution.execution_mode,
            working_context: structuredClone(execution.working_context),
            status: executionStatus.PENDING,
            worker_id: null,
            heartbeat_at: null,
            created_at: this.clock(),
            started_at: null,
            completed_at: null,
            steps: execution.steps.map(step => ({
                ...step,
                depends_on: [...step.depends_on],
                execution_id: execution.id,
                started_at: null,
                completed_at: null,
                result: null,
                error: null,
                retry_count: 0,
            })),
        };
        this.executions.set(stored.id, stored);
        return structuredClone(stored);
    }

    async findById(id: string): Promise<ExecutionWithSteps | null> {
        const stored = this.executions.get(id);
        return stored ? structuredClone(stored) : null;
    }

    async transitionExecution(id: string, to: ExecutionStatus, fields: ExecutionFields = {}): Promise<boolean> {
        const stored = this.executions.get(id);
        if (!stored || !canTransitionExecution(stored.status, to)) return false;

        stored.status = to;
        if (fields.worker_id !== undefined) {
            stored.worker_id = fields.worker_id;
            stored.heartbeat_at = this.clock();
        }
        if (fields.started_at) stored.started_at = fields.started_at;
        if (fields.completed_at) stored.completed_at = fields.completed_at;
        return true;
    }

    async transitionStep(
        executionId: string,
        stepId: string,
        to: StepStatus,
        fields: StepTransitionFields = {},
    ): Promise<boolean> {
        const step = this.findStep(executionId, stepId);
        if (!step || !canTransitionStep(step.status, to)) return false;

        step.status = to;
        if (fields.started_at) step.started_at = fields.started_at;
        if (fields.completed_at) step.completed_at = fields.completed_at;
        applyPatch(step, fields);
        return true;
    }

    async updateStep(executionId: string, stepId: string, patch: StepPatch): Promise<void> {
        const step = this.findStep(executionId, stepId);
        if (step) applyPatch(step, patch);
    }

    async updateHeartbeat(ids: string[]): Promise<void> {
        const now = this.clock();
        for (const id of ids) {
            const stored = this.executions.get(id);
            if (stored?.status === executionStatus.RUNNING) stored.heartbeat_at = now;
        }
    }

    async failStale(thresholdSeconds: number): Promise<ReapedExecution[]> {
        const now = this.clock();
        const cutoff = now.getTime() - thresholdSeconds * 1000;
        const reaped: ReapedExecution[] = [];

        for (const stored of this.executions.values()) {
            if (stored.status !== executionStatus.RUNNING) continue;
            if (!stored.heartbeat_at || stored.heartbeat_at.getTime() >= cutoff) continue;

            stored.status = executionStatus.FAILED;
            stored.completed_at = now;
            const entry: ReapedExecution = { id: stored.id, worker_id: stored.worker_id, failed_steps: [], skipped_steps: [], progress: 0 };

            for (const step of stored.steps) {
                if (step.status === stepStatus.RUNNING) {
                    step.status = stepStatus.FAILED;
                    step.completed_at = now;
                    step.error = { name: 'Error', message: STEP_REAPED_MESSAGE };
                    entry.failed_steps.push(step.id);
                } else if (step.status === stepStatus.PENDING || step.status === stepStatus.BLOCKED) {
                    step.status = stepStatus.SKIPPED;
                    step.completed_at = now;
                    entry.skipped_steps.push(step.id);
                }
            }
            entry.progress = progress(stored.steps).percent;
            reaped.push(entry);
        }
        return reaped;
    }

    private findStep(executionId: string, stepId: string): StepEntity | undefined {
        return this.executions.get(executionId)?.steps.find(s => s.id === stepId);
    }
}

export class InMemoryAuditRepository implements AuditRepository {
    private readonly records: AuditRecordEntity[] = [];
    private seq = 0;

    async append(record: NewAuditRecord): Promise<AuditRecordEntity> {
        const stored: AuditRecordEntity = { ...record, id: uuid(), seq: ++this.seq };
        this.records.push(stored);
        return { ...stored };
    }

    async findByExecution(executionId: string): Promise<AuditRecordEntity[]> {
        return this.records
            .filter(r => r.execution_id === executionId)
            .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.seq - b.seq)
            .map(r => ({ ...r }));
    }

    async statistics(range: StatisticsRange): Promise<AuditStatistics> {
        const inRange = this.records.filter(r =>
            (!range.from || r.timestamp >= range.from) && (!range.to || r.timestamp <= range.to));

        const failed = inRange.filter(r => FAILED_AUDIT_STATUSES.includes(r.status)).length;
        const perAgent = new Map<string, number>();
        for (const r of inRange) {
            if (r.agent_id) perAgent.set(r.agent_id, (perAgent.get(r.agent_id) ?? 0) + 1);
        }

        return {
            total_actions: inRange.length,
            failed_actions: failed,
            success_rate: successRate(inRange.length, failed),
            agents: [...perAgent.entries()]
                .map(([agent_id, action_count]) => ({ agent_id, action_count }))
                .sort((a, b) => b.action_count - a.action_count || a.agent_id.localeCompare(b.agent_id)),
            range: { from: range.from ?? null, to: range.to ?? null },
        };
    }
}

export class InMemoryCommunicationRepository implements CommunicationRepository {
    private readonly records = new Map<string, CommunicationEntity>();

    constructor(private readonly clock: Clock = systemClock) { }

    async createIfAbsent(record: NewCommunication): Promise<{ record: CommunicationEntity; created: boolean }> {
        const existing = this.records.get(record.id);
        if (existing) return { record: { ...existing }, created: false };

        const stored: CommunicationEntity = { ...record, response: null, created_at: this.clock(), responded_at: null };
        this.records.set(stored.id, stored);
        return { record: { ...stored }, created: true };
    }

    async attachResponse(id: string, response: string): Promise<CommunicationEntity | null> {
        const stored = this.records.get(id);
        if (!stored || stored.response !== null) return null;
        stored.response = response;
        stored.responded_at = this.clock();
        return { ...stored };
    }

    async findById(id: string): Promise<CommunicationEntity | null> {
        const stored = this.records.get(id);
        return stored ? { ...stored } : null;
    }

    async findByExecution(executionId: string): Promise<CommunicationEntity[]> {
        return [...this.records.values()]
            .filter(r => r.execution_id === executionId)
            .map(r => ({ ...r }));
    }
}
