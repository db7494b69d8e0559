import { Pool, PoolClient } from 'pg';
import {
    CompletionResponse,
    DialogState,
    dialogStatus,
    fromJsonColumn,
    StepResultRecord,
    toJsonColumn,
} from '@parley/sdk';
import { DialogRow, StepResultRow } from '../db/dialog.entity';
import { TransactionManager } from '../db/transaction.manager';
import { DialogNotFoundError } from '../workflow/errors';
import type { DialogStore } from '../workflow/ports';

function iso(value: Date | string): string {
    return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toStepResult(row: StepResultRow): StepResultRecord {
    const record: StepResultRecord = {
        status: row.status,
        attempts: row.attempts,
        started_at: iso(row.started_at),
    };
    const input = fromJsonColumn<unknown>(row.input);
    const output = fromJsonColumn<unknown>(row.output);
    const response = fromJsonColumn<CompletionResponse>(row.response);
    if (input !== undefined) record.input = input;
    if (output !== undefined) record.output = output;
    if (response !== undefined) record.response = response;
    if (row.error !== null) record.error = row.error;
    if (row.prompt !== null) record.prompt = row.prompt;
    if (row.completed_at !== null) record.completed_at = iso(row.completed_at);
    return record;
}

/**
 * Postgres-backed DialogStore. A dialog is one `dialogs` row plus its
 * `dialog_step_results` rows, rewritten together on every save.
 */
export class DialogRepository implements DialogStore {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: Pick<Pool, 'query' | 'connect'>) {
        this.tx = new TransactionManager(pool);
    }

    async create(dialog: DialogState): Promise<void> {
        await this.pool.query(
            `INSERT INTO dialogs (id, template_name, status, current_step, inputs, error, created_at, updated_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
                dialog.id,
                dialog.template_name,
                dialog.status,
                dialog.current_step,
                toJsonColumn(dialog.inputs),
                dialog.error,
                dialog.created_at,
                dialog.updated_at,
            ],
        );
    }

    async save(dialog: DialogState): Promise<void> {
        await this.tx.run(async (client) => {
            const res = await client.query(
                `UPDATE dialogs SET status = $2, current_step = $3, inputs = $4, error = $5, updated_at = $6
                 WHERE id = $1`,
                [dialog.id, dialog.status, dialog.current_step, toJsonColumn(dialog.inputs), dialog.error, dialog.updated_at],
            );
            if (res.rowCount === 0) {
                throw new DialogNotFoundError(dialog.id);
            }

            await client.query('DELETE FROM dialog_step_results WHERE dialog_id = $1', [dialog.id]);
            await this.insertStepResults(client, dialog);
        });
    }

    async load(id: string): Promise<DialogState | null> {
        const res = await this.pool.query<DialogRow>('SELECT * FROM dialogs WHERE id = $1', [id]);
        const row = res.rows[0];
        if (!row) return null;

        const results = await this.pool.query<StepResultRow>(
            'SELECT * FROM dialog_step_results WHERE dialog_id = $1 ORDER BY position ASC',
            [id],
        );

        const step_results: Record<string, StepResultRecord> = {};
        for (const result of results.rows) {
            step_results[result.step_name] = toStepResult(result);
        }

        return {
            id: row.id,
            template_name: row.template_name,
            status: row.status,
            current_step: row.current_step,
            step_results,
            inputs: fromJsonColumn<Record<string, unknown>>(row.inputs) ?? {},
            error: row.error,
            created_at: iso(row.created_at),
            updated_at: iso(row.updated_at),
        };
    }

    async findStalled(olderThanSeconds: number, limit: number): Promise<string[]> {
        const res = await this.pool.query<{ id: string }>(
            `SELECT id FROM dialogs
             WHERE status = $1 AND updated_at < NOW() - (INTERVAL '1 second' * $2)
             ORDER BY updated_at ASC
             LIMIT $3`,
            [dialogStatus.RUNNING, olderThanSeconds, limit],
        );
        return res.rows.map((row) => row.id);
    }

    private async insertStepResults(client: PoolClient, dialog: DialogState): Promise<void> {
        const entries = Object.entries(dialog.step_results);
        for (const [position, [stepName, result]] of entries.entries()) {
            await client.query(
                `INSERT INTO dialog_step_results
                    (dialog_id, step_name, position, status, input, output, response, error, prompt, attempts, started_at, completed_at)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
                [
                    dialog.id,
                    stepName,
                    position,
                    result.status,
                    toJsonColumn(result.input),
                    toJsonColumn(result.output),
                    toJsonColumn(result.response),
                    result.error ?? null,
                    result.prompt ?? null,
                    result.attempts,
                    result.started_at,
                    result.completed_at ?? null,
                ],
            );
        }
    }
}
