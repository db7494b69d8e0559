import type { dialogStatus, MessageRole, stepResultStatus } from '@parley/sdk';

// Row shapes are type aliases so they satisfy pg's QueryResultRow constraint.
// JSONB columns hold superjson documents and come back already parsed.

/** Row of the `dialogs` table. */
export type DialogRow = {
    id: string;
    template_name: string;
    status: dialogStatus;
    current_step: string;
    inputs: unknown;
    error: string | null;
    created_at: Date;
    updated_at: Date;
};

/** Row of `dialog_step_results`; `position` preserves execution order. */
export type StepResultRow = {
    dialog_id: string;
    step_name: string;
    position: number;
    status: stepResultStatus;
    input: unknown;
    output: unknown;
    response: unknown;
    error: string | null;
    prompt: string | null;
    attempts: number;
    started_at: Date;
    completed_at: Date | null;
};

export type MessageRow = {
    id: string;
    dialog_id: string;
    role: MessageRole;
    content: string;
    model: string | null;
    step_name: string | null;
    created_at: Date;
};
