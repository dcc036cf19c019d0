import { QueryResultRow } from 'pg';
import { CommunicationEntity, NewCommunication } from '../db/communication.entity';
import { Queryable } from '../db/transaction.manager';
import { CommunicationRepository } from './types';

function toCommunication(row: QueryResultRow): CommunicationEntity {
    return {
        id: row.id,
        execution_id: row.execution_id,
        step_id: row.step_id,
        from_agent: row.from_agent,
        to_agent: row.to_agent,
        message: row.message,
        response: row.response,
        created_at: row.created_at,
        responded_at: row.responded_at,
    };
}

export class PgCommunicationRepository implements CommunicationRepository {
    constructor(private pool: Queryable) { }

    async createIfAbsent(record: NewCommunication): Promise<{ record: CommunicationEntity; created: boolean }> {
        const res = await this.pool.query(
            `INSERT INTO communications (id, execution_id, step_id, from_agent, to_agent, message)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (id) DO NOTHING
             RETURNING *`,
            [record.id, record.execution_id, record.step_id, record.from_agent, record.to_agent, record.message],
        );
        if (res.rows.length > 0) {
            return { record: toCommunication(res.rows[0]), created: true };
        }

        const existing = await this.findById(record.id);
        if (!existing) throw new Error(`Communication ${record.id} vanished after conflict`);
        return { record: existing, created: false };
    }

    async attachResponse(id: string, response: string): Promise<CommunicationEntity | null> {
        const res = await this.pool.query(
            `UPDATE communications
             SET response = $2, responded_at = NOW()
             WHERE id = $1 AND response IS NULL
             RETURNING *`,
            [id, response],
        );
        const row = res?.rows[0];
        return row ? toCommunication(row) : null;
    }

    async findById(id: string): Promise<CommunicationEntity | null> {
        const res = await this.pool.query('SELECT * FROM communications WHERE id = $1', [id]);
        const row = res?.rows[0];
        return row ? toCommunication(row) : null;
    }

    async findByExecution(executionId: string): Promise<CommunicationEntity[]> {
        const res = await this.pool.query(
            'SELECT * FROM communications WHERE execution_id = $1 ORDER BY created_at ASC, id ASC',
            [executionId],
        );
        return res.rows.map(toCommunication);
    }
}
