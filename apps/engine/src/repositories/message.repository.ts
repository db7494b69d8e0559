import { Pool } from 'pg';
import { v7 as uuidv7 } from 'uuid';
import type { TranscriptMessage } from '@parley/sdk';
import { MessageRow } from '../db/dialog.entity';
import type { StoredMessage, Transcript } from '../workflow/ports';

export class MessageRepository implements Transcript {
    constructor(private readonly pool: Pick<Pool, 'query'>) { }

    async append(dialogId: string, message: TranscriptMessage): Promise<void> {
        await this.pool.query(
            `INSERT INTO dialog_messages (id, dialog_id, role, content, model, step_name)
             VALUES ($1, $2, $3, $4, $5, $6)`,
            [uuidv7(), dialogId, message.role, message.content, message.model ?? null, message.step_name ?? null],
        );
    }

    async list(dialogId: string): Promise<StoredMessage[]> {
        const res = await this.pool.query<MessageRow>(
            'SELECT * FROM dialog_messages WHERE dialog_id = $1 ORDER BY seq ASC',
            [dialogId],
        );
        return res.rows.map((row) => {
            const message: StoredMessage = {
                id: row.id,
                dialog_id: row.dialog_id,
                role: row.role,
                content: row.content,
                created_at: row.created_at.toISOString(),
            };
            if (row.model !== null) message.model = row.model;
            if (row.step_name !== null) message.step_name = row.step_name;
            return message;
        });
    }
}
