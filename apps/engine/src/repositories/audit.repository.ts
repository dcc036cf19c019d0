import { QueryResultRow } from 'pg';
import { v7 as uuid } from 'uuid';
import { AuditRecordEntity, AuditStatistics, NewAuditRecord } from '../db/audit-record.entity';
import { Queryable } from '../db/transaction.manager';
import { AuditRepository, StatisticsRange } from './types';

export const FAILED_AUDIT_STATUSES = ['failed', 'timeout'];

function toAuditRecord(row: QueryResultRow): AuditRecordEntity {
    return {
        id: row.id,
        execution_id: row.execution_id,
        step_id: row.step_id,
        agent_id: row.agent_id,
        action: row.action,
        status: row.status,
        message: row.message,
        timestamp: row.timestamp,
        seq: Number(row.seq),  // BIGSERIAL arrives as a string
    };
}

export function successRate(total: number, failed: number): number {
    return total > 0 ? Math.round(((total - failed) / total) * 10000) / 100 : 0;
}

export class PgAuditRepository implements AuditRepository {
    constructor(private pool: Queryable) { }

    async append(record: NewAuditRecord): Promise<AuditRecordEntity> {
        const res = await this.pool.query(
            `INSERT INTO audit_records (id, execution_id, step_id, agent_id, action, status, message, timestamp)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING *`,
            [uuid(), record.execution_id, record.step_id, record.agent_id, record.action, record.status, record.message, record.timestamp],
        );
        return toAuditRecord(res.rows[0]);
    }

    async findByExecution(executionId: string): Promise<AuditRecordEntity[]> {
        const res = await this.pool.query(
            'SELECT * FROM audit_records WHERE execution_id = $1 ORDER BY timestamp ASC, seq ASC',
            [executionId],
        );
        return res.rows.map(toAuditRecord);
    }

    async statistics(range: StatisticsRange): Promise<AuditStatistics> {
        const params = [range.from ?? null, range.to ?? null, FAILED_AUDIT_STATUSES];
        const totals = await this.pool.query(
            `SELECT COUNT(*)::int AS total,
                    COUNT(*) FILTER (WHERE status = ANY($3::text[]))::int AS failed
             FROM audit_records
             WHERE ($1::timestamptz IS NULL OR timestamp >= $1)
               AND ($2::timestamptz IS NULL OR timestamp <= $2)`,
            params,
        );
        const agents = await this.pool.query(
            `SELECT agent_id, COUNT(*)::int AS action_count
             FROM audit_records
             WHERE agent_id IS NOT NULL
               AND ($1::timestamptz IS NULL OR timestamp >= $1)
               AND ($2::timestamptz IS NULL OR timestamp <= $2)
             GROUP BY agent_id
             ORDER BY action_count DESC, agent_id ASC`,
            params.slice(0, 2),
        );

        const total: number = totals.rows[0]?.total ?? 0;
        const failed: number = totals.rows[0]?.failed ?? 0;
        return {
            total_actions: total,
            failed_actions: failed,
            success_rate: successRate(total, failed),
            agents: agents.rows.map(row => ({ agent_id: row.agent_id, action_count: row.action_count })),
            range: { from: range.from ?? null, to: range.to ?? null },
        };
    }
}
