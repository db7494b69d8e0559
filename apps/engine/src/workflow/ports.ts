import type { DialogState, TranscriptMessage } from '@parley/sdk';

/** Durable store for dialog state. `save` must never write step results partially. */
export interface DialogStore {
    create(dialog: DialogState): Promise<void>;
    save(dialog: DialogState): Promise<void>;
    load(id: string): Promise<DialogState | null>;
    /** Dialogs left in `running` with no update for `olderThanSeconds` */
    findStalled(olderThanSeconds: number, limit: number): Promise<string[]>;
}

/** Fire-and-forget event publication; event names are `dialog.<id>.<event>`. */
export interface Broadcaster {
    publish(event: string, payload: unknown): void;
}

export interface StoredMessage extends TranscriptMessage {
    id: string;
    dialog_id: string;
    created_at: string;
}

/** The conversation transcript that message/prompt/user_input steps append to. */
export interface Transcript {
    append(dialogId: string, message: TranscriptMessage): Promise<void>;
    list(dialogId: string): Promise<StoredMessage[]>;
}
