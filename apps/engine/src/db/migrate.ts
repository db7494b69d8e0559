import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { TransactionManager } from './transaction.manager';

const TAG = '[migrate]';

export const MIGRATIONS_DIR = path.join(__dirname, '../../migrations');

/**
 * Applies `*.sql` files from `dir` in filename order, each in its own
 * transaction, skipping the ones already recorded in `schema_migrations`.
 * Returns the names applied by this call.
 */
export async function migrate(pool: Pick<Pool, 'query' | 'connect'>, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    await pool.query(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            name TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`,
    );

    const res = await pool.query<{ name: string }>('SELECT name FROM schema_migrations');
    const applied = new Set(res.rows.map((row) => row.name));

    const files = (await readdir(dir)).filter((file) => file.endsWith('.sql')).sort();
    const tx = new TransactionManager(pool);
    const newlyApplied: string[] = [];

    for (const file of files) {
        if (applied.has(file)) continue;

        const sql = await readFile(path.join(dir, file), 'utf-8');
        await tx.run(async (client) => {
            await client.query(sql);
            await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        });
        newlyApplied.push(file);
        console.log(`${TAG} applied ${file}`);
    }

    return newlyApplied;
}
