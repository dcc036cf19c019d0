import { QueryResultRow } from 'pg';
import { ExecutionStatus, StepStatus } from '@ensemble/sdk';
import { ExecutionEntity, ExecutionWithSteps, executionStatus } from '../db/execution.entity';
import { StepEntity, StepPatch, stepStatus } from '../db/step.entity';
import { ConnectablePool, TransactionManager } from '../db/transaction.manager';
import { executionSourcesFor, stepSourcesFor } from '../db/transitions';
import { progress } from '../services/progress';
import {
    ExecutionFields,
    ExecutionRepository,
    NewExecution,
    ReapedExecution,
    STEP_REAPED_MESSAGE,
    StepTransitionFields,
} from './types';

function toExecution(row: QueryResultRow): ExecutionEntity {
    return {
        id: row.id,
        template_id: row.template_id,
        execution_mode: row.execution_mode,
        working_context: row.working_context ?? {},
        status: row.status,
        worker_id: row.worker_id,
        heartbeat_at: row.heartbeat_at,
        created_at: row.created_at,
        started_at: row.started_at,
        completed_at: row.completed_at,
    };
}

function toStep(row: QueryResultRow): StepEntity {
    return {
        id: row.id,
        execution_id: row.execution_id,
        position: row.position,
        agent_id: row.agent_id,
        task_text: row.task_text,
        depends_on: row.depends_on ?? [],
        timeout_ms: row.timeout_ms,
        status: row.status,
        started_at: row.started_at,
        completed_at: row.completed_at,
        result: row.result,
        error: row.error,
        retry_count: row.retry_count,
    };
}

export class PgExecutionRepository implements ExecutionRepository {
    private readonly tx: TransactionManager;

    constructor(private pool: ConnectablePool) {
        this.tx = new TransactionManager(pool);
    }

    async create(execution: NewExecution): Promise<ExecutionWithSteps> {
        return this.tx.run(async (client) => {
            const res = await client.query(
                `INSERT INTO executions (id, template_id, execution_mode, working_context, status)
                 VALUES ($1, $2, $3, $4, $5) RETURNING *`,
                [
                    execution.id,
                    execution.template_id,
                    execution.execution_mode,
                    JSON.stringify(execution.working_context),
                    executionStatus.PENDING,
                ],
            );

            const steps: StepEntity[] = [];
            for (const step of execution.steps) {
                const stepRes = await client.query(
                    `INSERT INTO steps (execution_id, id, position, agent_id, task_text, depends_on, timeout_ms, status)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING *`,
                    [execution.id, step.id, step.position, step.agent_id, step.task_text, step.depends_on, step.timeout_ms, step.status],
                );
                steps.push(toStep(stepRes.rows[0]));
            }

            return { ...toExecution(res.rows[0]), steps };
        });
    }

    async findById(id: string): Promise<ExecutionWithSteps | null> {
        const res = await this.pool.query('SELECT * FROM executions WHERE id = $1', [id]);
        const row = res?.rows[0];
        if (!row) return null;

        const steps = await this.pool.query(
            'SELECT * FROM steps WHERE execution_id = $1 ORDER BY position ASC',
            [id],
        );
        return { ...toExecution(row), steps: steps.rows.map(toStep) };
    }

    async transitionExecution(id: string, to: ExecutionStatus, fields: ExecutionFields = {}): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE executions
             SET status = $2,
                 worker_id = COALESCE($4, worker_id),
                 heartbeat_at = CASE WHEN $4::text IS NULL THEN heartbeat_at ELSE NOW() END,
                 started_at = COALESCE($5, started_at),
                 completed_at = COALESCE($6, completed_at)
             WHERE id = $1 AND status = ANY($3::text[])`,
            [id, to, executionSourcesFor(to), fields.worker_id ?? null, fields.started_at ?? null, fields.completed_at ?? null],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async transitionStep(
        executionId: string,
        stepId: string,
        to: StepStatus,
        fields: StepTransitionFields = {},
    ): Promise<boolean> {
        const res = await this.pool.query(
            `UPDATE steps
             SET status = $3,
                 started_at = COALESCE($5, started_at),
                 completed_at = COALESCE($6, completed_at),
                 result = COALESCE($7, result),
                 error = COALESCE($8, error),
                 retry_count = COALESCE($9, retry_count)
             WHERE execution_id = $1 AND id = $2 AND status = ANY($4::text[])`,
            [
                executionId,
                stepId,
                to,
                stepSourcesFor(to),
                fields.started_at ?? null,
                fields.completed_at ?? null,
                fields.result ?? null,
                fields.error ? JSON.stringify(fields.error) : null,
                fields.retry_count ?? null,
            ],
        );
        return (res.rowCount ?? 0) > 0;
    }

    async updateStep(executionId: string, stepId: string, patch: StepPatch): Promise<void> {
        await this.pool.query(
            `UPDATE steps
             SET result = COALESCE($3, result),
                 error = COALESCE($4, error),
                 retry_count = COALESCE($5, retry_count)
             WHERE execution_id = $1 AND id = $2`,
            [
                executionId,
                stepId,
                patch.result ?? null,
                patch.error ? JSON.stringify(patch.error) : null,
                patch.retry_count ?? null,
            ],
        );
    }

    async updateHeartbeat(ids: string[]): Promise<void> {
        if (ids.length === 0) return;
        await this.pool.query(
            'UPDATE executions SET heartbeat_at = NOW() WHERE id = ANY($1::uuid[]) AND status = $2',
            [ids, executionStatus.RUNNING],
        );
    }

    // Fails running executions whose owner stopped heartbeating, along with
    // their unfinished steps, in one transaction.
    async failStale(thresholdSeconds: number): Promise<ReapedExecution[]> {
        return this.tx.run(async (client) => {
            const res = await client.query(
                `UPDATE executions
                 SET status = $1, completed_at = NOW()
                 WHERE status = $2
                   AND heartbeat_at < NOW() - (INTERVAL '1 second' * $3)
                 RETURNING id, worker_id`,
                [executionStatus.FAILED, executionStatus.RUNNING, thresholdSeconds],
            );
            if (res.rows.length === 0) return [];

            const ids: string[] = res.rows.map(row => row.id);
            const failed = await client.query(
                `UPDATE steps
                 SET status = $2, completed_at = NOW(), error = $3
                 WHERE execution_id = ANY($1::uuid[]) AND status = $4
                 RETURNING execution_id, id`,
                [ids, stepStatus.FAILED, JSON.stringify({ name: 'Error', message: STEP_REAPED_MESSAGE }), stepStatus.RUNNING],
            );
            const skipped = await client.query(
                `UPDATE steps
                 SET status = $2, completed_at = NOW()
                 WHERE execution_id = ANY($1::uuid[]) AND status = ANY($3::text[])
                 RETURNING execution_id, id`,
                [ids, stepStatus.SKIPPED, [stepStatus.PENDING, stepStatus.BLOCKED]],
            );

            const statuses = await client.query(
                'SELECT execution_id, status FROM steps WHERE execution_id = ANY($1::uuid[])',
                [ids],
            );

            return res.rows.map(row => ({
                id: row.id,
                worker_id: row.worker_id,
                failed_steps: failed.rows.filter(s => s.execution_id === row.id).map(s => s.id),
                skipped_steps: skipped.rows.filter(s => s.execution_id === row.id).map(s => s.id),
                progress: progress(statuses.rows.filter(s => s.execution_id === row.id)).percent,
            }));
        });
    }
}
