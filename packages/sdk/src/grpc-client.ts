import type { ServiceError } from '@grpc/grpc-js';
import type { DialogState } from './types';

type GrpcCallback<T> = (err: ServiceError | null, res?: T) => void;
type UnaryMethod<Req, Res> = (request: Req, callback: GrpcCallback<Res>) => unknown;

function rpc<T>(fn: (cb: GrpcCallback<T>) => void): Promise<T> {
    return new Promise((resolve, reject) => {
        fn((err, res) => {
            if (err) return reject(err);
            if (res === undefined) return reject(new Error('Empty gRPC response'));
            resolve(res);
        });
    });
}

export interface DialogReplyMessage {
    dialog_id: string;
    status: string;
    current_step: string;
    error: string;
    waiting_for_input: boolean;
    noop: boolean;
    state: Buffer;
}

/** Shape of the stub that `grpc.loadPackageDefinition` builds for parley.DialogService. */
export interface DialogServiceStub {
    listTemplates: UnaryMethod<Record<string, never>, { names: string[] }>;
    createDialog: UnaryMethod<{ template_name: string; inputs: Buffer }, DialogReplyMessage>;
    startDialog: UnaryMethod<{ dialog_id: string }, DialogReplyMessage>;
    resumeDialog: UnaryMethod<{ dialog_id: string; input: Buffer }, DialogReplyMessage>;
    cancelDialog: UnaryMethod<{ dialog_id: string; reason: string }, DialogReplyMessage>;
    getDialog: UnaryMethod<{ dialog_id: string }, DialogReplyMessage>;
    getDialogGraph: UnaryMethod<{ dialog_id: string }, { mermaid: string }>;
}

export interface DialogReply {
    dialog: DialogState;
    waitingForInput: boolean;
    noop: boolean;
}

export interface DialogClient {
    listTemplates(): Promise<string[]>;
    createDialog(templateName: string, inputs?: Record<string, unknown>): Promise<DialogReply>;
    startDialog(dialogId: string): Promise<DialogReply>;
    resumeDialog(dialogId: string, input: unknown): Promise<DialogReply>;
    cancelDialog(dialogId: string, reason: string): Promise<DialogReply>;
    getDialog(dialogId: string): Promise<DialogReply>;
    getDialogGraph(dialogId: string): Promise<string>;
}

function toJsonBuffer(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value ?? null));
}

function toReply(message: DialogReplyMessage): DialogReply {
    const dialog: DialogState = JSON.parse(message.state.toString('utf-8'));
    return { dialog, waitingForInput: message.waiting_for_input, noop: message.noop };
}

export function createDialogClient(client: DialogServiceStub): DialogClient {
    return {
        listTemplates: () =>
            rpc<{ names: string[] }>((cb) => client.listTemplates({}, cb)).then((r) => r.names),

        createDialog: (templateName, inputs = {}) =>
            rpc<DialogReplyMessage>((cb) => client.createDialog({ template_name: templateName, inputs: toJsonBuffer(inputs) }, cb))
                .then(toReply),

        startDialog: (dialogId) =>
            rpc<DialogReplyMessage>((cb) => client.startDialog({ dialog_id: dialogId }, cb)).then(toReply),

        resumeDialog: (dialogId, input) =>
            rpc<DialogReplyMessage>((cb) => client.resumeDialog({ dialog_id: dialogId, input: toJsonBuffer(input) }, cb))
                .then(toReply),

        cancelDialog: (dialogId, reason) =>
            rpc<DialogReplyMessage>((cb) => client.cancelDialog({ dialog_id: dialogId, reason }, cb)).then(toReply),

        getDialog: (dialogId) =>
            rpc<DialogReplyMessage>((cb) => client.getDialog({ dialog_id: dialogId }, cb)).then(toReply),

        getDialogGraph: (dialogId) =>
            rpc<{ mermaid: string }>((cb) => client.getDialogGraph({ dialog_id: dialogId }, cb)).then((r) => r.mermaid),
    };
}
