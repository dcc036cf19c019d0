import { Pool, PoolClient } from 'pg';

export type Queryable = Pick<Pool, 'query'>;
export type ConnectablePool = Pick<Pool, 'query' | 'connect'>;

/**
 * Runs multi-row writes (execution plus its steps, reaping) atomically.
 */
export class TransactionManager {
    constructor(private pool: Pick<Pool, 'connect'>) { }

    /**
     * Commits on success, rolls back and re-throws on error.
     *
     * @example
     * await txManager.run(async (client) => {
     *   await client.query('INSERT INTO executions ...');
     *   await client.query('INSERT INTO steps ...');
     * });
     */
    async run<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            const result = await callback(client);
            await client.query('COMMIT');
            return result;
        } catch (e) {
            await client.query('ROLLBACK');
            throw e;
        } finally {
            client.release();
        }
    }
}
