import { v5 as uuidv5 } from 'uuid';
import { AuditEntry, AuditExport } from '@ensemble/sdk';
import { AuditRecordEntity, AuditStatistics, NewAuditRecord } from '../db/audit-record.entity';
import { CommunicationEntity } from '../db/communication.entity';
import { PersistenceError } from '../errors';
import { AuditRepository, CommunicationRepository, StatisticsRange } from '../repositories/types';
import { toCsv } from '../utils/csv';

const TAG = '[recorder]';

const COMMUNICATION_NAMESPACE = uuidv5('ensemble.communications', uuidv5.URL);

export const CSV_HEADER = ['timestamp', 'agent', 'action', 'status', 'message'];
export const SUPPORTED_EXPORT_FORMATS = ['csv'];

export interface AuditEvent {
    executionId: string;
    stepId?: string | null;
    agentId?: string | null;
    action: string;
    status: string;
    message?: string;
}

export interface CommunicationRequest {
    executionId: string;
    stepId: string;
    fromAgent: string;
    toAgent: string;
    message: string;
}

export function communicationId(executionId: string, stepId: string, toAgent: string): string {
    return uuidv5(`${executionId}/${stepId}/${toAgent}`, COMMUNICATION_NAMESPACE);
}

export function toAuditEntry(record: AuditRecordEntity): AuditEntry {
    return {
        id: record.id,
        executionId: record.execution_id,
        stepId: record.step_id,
        agentId: record.agent_id,
        action: record.action,
        status: record.status,
        message: record.message,
        timestamp: record.timestamp,
        seq: record.seq,
    };
}

/**
 * Append-only audit trail plus agent-to-agent communications.
 *
 * `record` never throws and never makes the caller wait: appends are
 * chained on one queue, so sequence numbers follow call order, and a
 * failed write is logged and dropped.
 */
export class AuditRecorder {
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly audit: AuditRepository,
        private readonly communications: CommunicationRepository,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    record(event: AuditEvent): void {
        const entry: NewAuditRecord = {
            execution_id: event.executionId,
            step_id: event.stepId ?? null,
            agent_id: event.agentId ?? null,
            action: event.action,
            status: event.status,
            message: event.message ?? '',
            timestamp: this.clock(),
        };

        this.queue = this.queue
            .then(() => this.audit.append(entry))
            .then(
                () => undefined,
                (err: unknown) => {
                    const error = new PersistenceError(`Failed to append ${entry.action} for ${entry.execution_id}`, err);
                    console.error(`${TAG} ${error.message}:`, err);
                },
            );
    }

    async flush(): Promise<void> {
        let tail: Promise<void>;
        do {
            tail = this.queue;
            await tail;
        } while (tail !== this.queue);
    }

    async query(executionId: string): Promise<AuditEntry[]> {
        await this.flush();
        const records = await this.audit.findByExecution(executionId);
        return records.map(toAuditEntry);
    }

    /** Opens the record once per (execution, step, target); repeats return the stored one. */
    async openCommunication(request: CommunicationRequest): Promise<CommunicationEntity> {
        const { record, created } = await this.communications.createIfAbsent({
            id: communicationId(request.executionId, request.stepId, request.toAgent),
            execution_id: request.executionId,
            step_id: request.stepId,
            from_agent: request.fromAgent,
            to_agent: request.toAgent,
            message: request.message,
        });

        if (created) {
            this.record({
                executionId: request.executionId,
                stepId: request.stepId,
                agentId: request.fromAgent,
                action: 'communication_opened',
                status: 'open',
                message: `@${request.toAgent}: ${request.message}`,
            });
        }
        return record;
    }

    /** No-op when a response is already attached. Returns whether this call attached it. */
    async attachResponse(id: string, response: string): Promise<boolean> {
        const updated = await this.communications.attachResponse(id, response);
        if (!updated) return false;

        this.record({
            executionId: updated.execution_id,
            stepId: updated.step_id,
            agentId: updated.to_agent,
            action: 'communication_answered',
            status: 'answered',
            message: response,
        });
        return true;
    }

    communicationsFor(executionId: string): Promise<CommunicationEntity[]> {
        return this.communications.findByExecution(executionId);
    }

    async export(executionId: string, format: string): Promise<AuditExport> {
        if (format.toLowerCase() !== 'csv') {
            return {
                ok: false,
                reason: 'unsupported_format',
                format,
                supported: [...SUPPORTED_EXPORT_FORMATS],
                message: `Export format "${format}" is not yet supported`,
            };
        }

        const records = await this.query(executionId);
        const rows = records.map(r => [r.timestamp.toISOString(), r.agentId ?? '', r.action, r.status, r.message]);
        return {
            ok: true,
            format: 'csv',
            contentType: 'text/csv; charset=utf-8',
            filename: `audit-${executionId}.csv`,
            body: Buffer.from(toCsv(CSV_HEADER, rows), 'utf-8'),
        };
    }

    async statistics(range: StatisticsRange = {}): Promise<AuditStatistics> {
        await this.flush();
        return this.audit.statistics(range);
    }
}
