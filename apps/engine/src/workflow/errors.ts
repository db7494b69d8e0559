export { TemplateError } from '@parley/sdk';

/** A `{{ … }}` expression inside a step could not be rendered. Recoverable. */
export class StepRenderError extends Error {
    constructor(
        public readonly stepName: string,
        message: string,
        public readonly cause?: unknown,
    ) {
        super(`Step "${stepName}": ${message}`);
        this.name = 'StepRenderError';
    }
}

/** An executor failed: completion call, callable, or schema validation. Recoverable. */
export class StepExecutionError extends Error {
    constructor(
        public readonly stepName: string,
        message: string,
        public readonly transient: boolean = false,
        public readonly cause?: unknown,
    ) {
        super(`Step "${stepName}": ${message}`);
        this.name = 'StepExecutionError';
    }
}

export type StepError = StepRenderError | StepExecutionError;

export function isStepError(err: unknown): err is StepError {
    return err instanceof StepRenderError || err instanceof StepExecutionError;
}

export class ConcurrentExecutionError extends Error {
    constructor(public readonly dialogId: string) {
        super(`Dialog ${dialogId} is already being executed`);
        this.name = 'ConcurrentExecutionError';
    }
}

/**
 * Marks a call made against a completed/failed dialog. The engine returns it
 * on the transition result instead of throwing.
 */
export class DialogTerminalError extends Error {
    constructor(
        public readonly dialogId: string,
        public readonly status: string,
    ) {
        super(`Dialog ${dialogId} is already ${status}`);
        this.name = 'DialogTerminalError';
    }
}

export class DialogNotFoundError extends Error {
    constructor(public readonly dialogId: string) {
        super(`Dialog ${dialogId} not found`);
        this.name = 'DialogNotFoundError';
    }
}

export class InvalidDialogStateError extends Error {
    constructor(
        public readonly dialogId: string,
        public readonly status: string,
        action: string,
    ) {
        super(`Cannot ${action} dialog ${dialogId} while it is ${status}`);
        this.name = 'InvalidDialogStateError';
    }
}
