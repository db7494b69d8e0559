import { Pool, PoolClient } from 'pg';

/**
 * Runs a callback inside a database transaction.
 * Commits on success, rolls back and re-throws on error.
 *
 * @example
 * await txManager.run(async (client) => {
 *   await client.query('UPDATE dialogs ...');
 *   await client.query('INSERT INTO dialog_step_results ...');
 * });
 */
export class TransactionManager {
    constructor(private readonly pool: Pick<Pool, 'connect'>) { }

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
