import * as grpc from '@grpc/grpc-js';
import { ServerUnaryCall, sendUnaryData } from '@grpc/grpc-js';
import { DialogState, dialogStatus, TemplateError, TemplateSource } from '@parley/sdk';
import type { TransitionResult, WorkflowEngine } from '../workflow/engine';
import {
    ConcurrentExecutionError,
    DialogNotFoundError,
    InvalidDialogStateError,
} from '../workflow/errors';
import { COMPLETED_STATE, FAILED_STATE, toMermaid } from '../workflow/state-machine';

const TAG = '[DialogService]';

type UnaryCall<Req> = Pick<ServerUnaryCall<Req, unknown>, 'request'>;

interface ListTemplatesResponse {
    names: string[];
}

interface CreateDialogRequest {
    template_name: string;
    inputs: Buffer;
}

interface DialogRequest {
    dialog_id: string;
}

interface ResumeDialogRequest {
    dialog_id: string;
    input: Buffer;
}

interface CancelDialogRequest {
    dialog_id: string;
    reason: string;
}

interface DialogGraphRequest {
    dialog_id: string;
    template_name: string;
}

interface DialogGraphResponse {
    mermaid: string;
}

export interface DialogReply {
    dialog_id: string;
    status: string;
    current_step: string;
    error: string;
    waiting_for_input: boolean;
    noop: boolean;
    state: Buffer;
}

class InvalidPayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidPayloadError';
    }
}

function parseJson(bytes: Buffer | undefined, field: string): unknown {
    if (!bytes || bytes.length === 0) return undefined;
    try {
        const parsed: unknown = JSON.parse(bytes.toString('utf-8'));
        return parsed;
    } catch {
        throw new InvalidPayloadError(`${field} must be valid JSON`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toReply(dialog: DialogState, waitingForInput: boolean, noop: boolean): DialogReply {
    return {
        dialog_id: dialog.id,
        status: dialog.status,
        current_step: dialog.current_step,
        error: dialog.error ?? '',
        waiting_for_input: waitingForInput,
        noop,
        state: Buffer.from(JSON.stringify(dialog)),
    };
}

function fromResult(result: TransitionResult): DialogReply {
    return toReply(result.dialog, result.waitingForInput, result.terminal !== undefined);
}

export function toStatusCode(error: unknown): grpc.status {
    if (error instanceof DialogNotFoundError) return grpc.status.NOT_FOUND;
    if (error instanceof TemplateError || error instanceof InvalidDialogStateError) return grpc.status.FAILED_PRECONDITION;
    if (error instanceof ConcurrentExecutionError) return grpc.status.ABORTED;
    if (error instanceof InvalidPayloadError) return grpc.status.INVALID_ARGUMENT;
    return grpc.status.INTERNAL;
}

/** Highlighted state for a dialog in its template graph. */
function activeState(dialog: DialogState): string | undefined {
    switch (dialog.status) {
        case dialogStatus.PENDING:
            return undefined;
        case dialogStatus.COMPLETED:
            return COMPLETED_STATE;
        case dialogStatus.FAILED:
            return FAILED_STATE;
        default:
            return dialog.current_step;
    }
}

/**
 * gRPC service implementation for dialog management.
 * Calls run to the next suspension point before replying.
 */
export class DialogServiceImpl {
    constructor(
        private readonly engine: WorkflowEngine,
        private readonly templates: TemplateSource,
    ) { }

    async listTemplates(
        call: UnaryCall<Record<string, never>>,
        callback: sendUnaryData<ListTemplatesResponse>,
    ): Promise<void> {
        callback(null, { names: this.templates.list() });
    }

    async createDialog(
        call: UnaryCall<CreateDialogRequest>,
        callback: sendUnaryData<DialogReply>,
    ): Promise<void> {
        try {
            const { template_name, inputs } = call.request;
            const parsed = parseJson(inputs, 'inputs') ?? {};
            if (!isRecord(parsed)) {
                throw new InvalidPayloadError('inputs must be a JSON object');
            }

            const dialog = await this.engine.create(template_name, parsed);
            callback(null, toReply(dialog, false, false));
        } catch (error) {
            this.fail('createDialog', error, callback);
        }
    }

    async startDialog(
        call: UnaryCall<DialogRequest>,
        callback: sendUnaryData<DialogReply>,
    ): Promise<void> {
        try {
            callback(null, fromResult(await this.engine.start(call.request.dialog_id)));
        } catch (error) {
            this.fail('startDialog', error, callback);
        }
    }

    async resumeDialog(
        call: UnaryCall<ResumeDialogRequest>,
        callback: sendUnaryData<DialogReply>,
    ): Promise<void> {
        try {
            const { dialog_id, input } = call.request;
            const value = parseJson(input, 'input') ?? null;
            callback(null, fromResult(await this.engine.resume(dialog_id, value)));
        } catch (error) {
            this.fail('resumeDialog', error, callback);
        }
    }

    async cancelDialog(
        call: UnaryCall<CancelDialogRequest>,
        callback: sendUnaryData<DialogReply>,
    ): Promise<void> {
        try {
            const { dialog_id, reason } = call.request;
            callback(null, fromResult(await this.engine.cancel(dialog_id, reason || undefined)));
        } catch (error) {
            this.fail('cancelDialog', error, callback);
        }
    }

    async getDialog(
        call: UnaryCall<DialogRequest>,
        callback: sendUnaryData<DialogReply>,
    ): Promise<void> {
        try {
            const dialog = await this.engine.get(call.request.dialog_id);
            callback(null, toReply(dialog, dialog.status === dialogStatus.WAITING_INPUT, false));
        } catch (error) {
            this.fail('getDialog', error, callback);
        }
    }

    async getDialogGraph(
        call: UnaryCall<DialogGraphRequest>,
        callback: sendUnaryData<DialogGraphResponse>,
    ): Promise<void> {
        try {
            const { dialog_id, template_name } = call.request;
            if (dialog_id) {
                const dialog = await this.engine.get(dialog_id);
                const mermaid = toMermaid(this.engine.graph(dialog.template_name), activeState(dialog));
                return callback(null, { mermaid });
            }
            if (!template_name) {
                throw new InvalidPayloadError('dialog_id or template_name is required');
            }
            callback(null, { mermaid: toMermaid(this.engine.graph(template_name)) });
        } catch (error) {
            this.fail('getDialogGraph', error, callback);
        }
    }

    private fail<T>(method: string, error: unknown, callback: sendUnaryData<T>): void {
        const code = toStatusCode(error);
        if (code === grpc.status.INTERNAL) {
            console.error(`${TAG} ${method} error:`, error);
        }
        callback({
            code,
            message: error instanceof Error ? error.message : 'Unknown error',
        });
    }
}
