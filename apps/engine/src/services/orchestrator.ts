import { v7 as uuid } from 'uuid';
import { AuditEntry, AuditExport, ExecutionMode, ExecutionStatus, ExecutionView, TemplateSummary } from '@ensemble/sdk';
import { AuditStatistics } from '../db/audit-record.entity';
import { CommunicationEntity } from '../db/communication.entity';
import { ExecutionNotFoundError } from '../errors';
import { ExecutionRepository, StatisticsRange } from '../repositories/types';
import { AuditRecorder } from './audit-recorder';
import { ExecutionScheduler, PlannedStep } from './execution-scheduler';
import { StartExecutionSchema, parseOrThrow } from './schemas';
import { TemplateStore } from './template-store';

export interface OrchestratorOptions {
    defaultMode: ExecutionMode;
    newId: () => string;
}

const DEFAULT_OPTIONS: OrchestratorOptions = {
    defaultMode: 'staged',
    newId: () => uuid(),
};

/**
 * Management surface consumed by the gRPC layer: start, inspect and
 * cancel executions, read their audit trail and communications.
 */
export class Orchestrator {
    private readonly options: OrchestratorOptions;

    constructor(
        private readonly templates: TemplateStore,
        private readonly scheduler: ExecutionScheduler,
        private readonly recorder: AuditRecorder,
        private readonly executions: Pick<ExecutionRepository, 'findById'>,
        options: Partial<OrchestratorOptions> = {},
    ) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    /** Accepts `{ templateId }` or `{ steps }`, plus optional mode and context. */
    async startExecution(request: unknown): Promise<string> {
        const req = parseOrThrow(StartExecutionSchema, request, 'start request');
        const steps: readonly PlannedStep[] = req.templateId !== undefined
            ? this.templates.require(req.templateId).steps
            : req.steps ?? [];

        const id = this.options.newId();
        await this.scheduler.start({
            id,
            templateId: req.templateId ?? null,
            mode: req.mode ?? this.options.defaultMode,
            context: req.context ?? {},
            steps,
        });
        return id;
    }

    getExecution(executionId: string): Promise<ExecutionView> {
        return this.scheduler.getStatus(executionId);
    }

    cancelExecution(executionId: string): Promise<ExecutionStatus> {
        return this.scheduler.cancel(executionId);
    }

    async listAudit(executionId: string): Promise<AuditEntry[]> {
        await this.requireExecution(executionId);
        return this.recorder.query(executionId);
    }

    async exportAudit(executionId: string, format: string): Promise<AuditExport> {
        await this.requireExecution(executionId);
        return this.recorder.export(executionId, format);
    }

    async listCommunications(executionId: string): Promise<CommunicationEntity[]> {
        await this.requireExecution(executionId);
        return this.recorder.communicationsFor(executionId);
    }

    listTemplates(): TemplateSummary[] {
        return this.templates.list();
    }

    auditStatistics(range: StatisticsRange = {}): Promise<AuditStatistics> {
        return this.recorder.statistics(range);
    }

    private async requireExecution(executionId: string): Promise<void> {
        if (this.scheduler.isActive(executionId)) return;
        const stored = await this.executions.findById(executionId);
        if (!stored) throw new ExecutionNotFoundError(executionId);
    }
}
