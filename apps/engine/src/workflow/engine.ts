import { v7 as uuidv7 } from 'uuid';
import {
    CallableRegistry,
    DialogState,
    DialogTemplate,
    dialogStatus,
    END_STEP,
    PromptLibrary,
    SchemaRegistry,
    START_STEP,
    StepDefinition,
    StepResultRecord,
    stepResultStatus,
    TemplateError,
    TemplateSource,
} from '@parley/sdk';
import type { CompletionClient } from '../llm/completion-client';
import { mergeStepConfig } from './config-merge';
import { DialogLock } from './dialog-lock';
import {
    DialogNotFoundError,
    DialogTerminalError,
    InvalidDialogStateError,
    isStepError,
    StepError,
    StepExecutionError,
} from './errors';
import { defaultExecutors, ExecutorTable, runExecutor } from './executors';
import type { StepOutcome } from './executors/types';
import type { Broadcaster, DialogStore, Transcript } from './ports';
import { ResolvedErrorHandling, resolveErrorHandling, retryDelay } from './retry-policy';
import {
    compileStateMachine,
    COMPLETED_STATE,
    fallbackState,
    INITIAL_STATE,
    nextState,
    StateGraph,
} from './state-machine';

const TAG = '[engine]';

export const DEFAULT_MAX_TRANSITIONS = 1000;
export const DEFAULT_MAX_TRANSIENT_RETRIES = 3;

export interface EngineOptions {
    /** 0 (default) retries immediately */
    retryBaseDelayMs?: number;
    retryMaxDelayMs?: number;
    /** Upper bound on steps executed by a single advance() */
    maxTransitions?: number;
    /** Transient completion failures retried under `retry` without counting against max_retries */
    maxTransientRetries?: number;
    /** Exposed to expressions as `runtime.context` */
    runtimeContext?: Record<string, unknown>;
    sleep?: (ms: number) => Promise<void>;
}

export interface EngineDeps {
    store: DialogStore;
    broadcaster: Broadcaster;
    templates: TemplateSource;
    completion: CompletionClient;
    callables: CallableRegistry;
    schemas: SchemaRegistry;
    prompts: PromptLibrary;
    transcript: Transcript;
    executors?: ExecutorTable;
    options?: EngineOptions;
}

export interface TransitionResult {
    dialog: DialogState;
    waitingForInput: boolean;
    /** Set when the call was a no-op on a completed/failed dialog */
    terminal?: DialogTerminalError;
}

export type DialogRef = string | Pick<DialogState, 'id'>;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function idOf(ref: DialogRef): string {
    return typeof ref === 'string' ? ref : ref.id;
}

function isTerminal(dialog: DialogState): boolean {
    return dialog.status === dialogStatus.COMPLETED || dialog.status === dialogStatus.FAILED;
}

/**
 * Drives dialogs through the state machine compiled from their template.
 *
 * Every public call reloads the dialog from the store under a per-id lock,
 * and each transition is persisted and broadcast before the next step runs.
 */
export class WorkflowEngine {
    private readonly lock = new DialogLock();
    private readonly graphs = new Map<string, StateGraph>();
    private readonly executors: ExecutorTable;
    private readonly options: Required<Omit<EngineOptions, 'retryMaxDelayMs'>> & { retryMaxDelayMs?: number };

    constructor(private readonly deps: EngineDeps) {
        this.executors = deps.executors ?? defaultExecutors;
        this.options = {
            retryBaseDelayMs: deps.options?.retryBaseDelayMs ?? 0,
            retryMaxDelayMs: deps.options?.retryMaxDelayMs,
            maxTransitions: deps.options?.maxTransitions ?? DEFAULT_MAX_TRANSITIONS,
            maxTransientRetries: deps.options?.maxTransientRetries ?? DEFAULT_MAX_TRANSIENT_RETRIES,
            runtimeContext: deps.options?.runtimeContext ?? {},
            sleep: deps.options?.sleep ?? sleep,
        };
    }

    async create(templateName: string, inputs: Record<string, unknown> = {}): Promise<DialogState> {
        const template = this.requireTemplate(templateName);
        this.graphFor(template);

        const now = new Date().toISOString();
        const dialog: DialogState = {
            id: uuidv7(),
            template_name: template.name,
            status: dialogStatus.PENDING,
            current_step: START_STEP,
            step_results: {},
            inputs,
            error: null,
            created_at: now,
            updated_at: now,
        };

        await this.deps.store.create(dialog);
        this.emit(dialog, 'created');
        console.log(`${TAG} Dialog ${dialog.id} created from "${template.name}"`);
        return dialog;
    }

    start(ref: DialogRef): Promise<TransitionResult> {
        const id = idOf(ref);
        return this.lock.run(id, async () => {
            const dialog = await this.rehydrate(id);
            if (isTerminal(dialog)) return this.noop(dialog);
            if (dialog.status !== dialogStatus.PENDING) {
                throw new InvalidDialogStateError(id, dialog.status, 'start');
            }
            return this.startLocked(dialog);
        });
    }

    advance(ref: DialogRef): Promise<TransitionResult> {
        const id = idOf(ref);
        return this.lock.run(id, async () => {
            const dialog = await this.rehydrate(id);
            switch (dialog.status) {
                case dialogStatus.COMPLETED:
                case dialogStatus.FAILED:
                    return this.noop(dialog);
                case dialogStatus.PENDING:
                    return this.startLocked(dialog);
                case dialogStatus.WAITING_INPUT:
                    return this.result(dialog);
                case dialogStatus.RUNNING:
                    return this.run(dialog);
            }
        });
    }

    resume(ref: DialogRef, input: unknown): Promise<TransitionResult> {
        const id = idOf(ref);
        return this.lock.run(id, async () => {
            const dialog = await this.rehydrate(id);
            if (isTerminal(dialog)) return this.noop(dialog);
            if (dialog.status !== dialogStatus.WAITING_INPUT) {
                throw new InvalidDialogStateError(id, dialog.status, 'resume');
            }

            const pending = dialog.step_results[dialog.current_step];
            if (!pending || pending.status !== stepResultStatus.RUNNING) {
                throw new InvalidDialogStateError(id, dialog.status, 'resume');
            }

            // Not persisted here: the store keeps the waiting dialog until the step settles.
            pending.input = input;
            dialog.status = dialogStatus.RUNNING;
            this.emit(dialog, 'resumed', { step: dialog.current_step });
            console.log(`${TAG} Dialog ${id} resumed at "${dialog.current_step}"`);

            return this.run(dialog);
        });
    }

    cancel(ref: DialogRef, reason = 'cancelled by user'): Promise<TransitionResult> {
        const id = idOf(ref);
        return this.lock.run(id, async () => {
            const dialog = await this.rehydrate(id);
            if (isTerminal(dialog)) return this.noop(dialog);
            if (dialog.status !== dialogStatus.WAITING_INPUT) {
                throw new InvalidDialogStateError(id, dialog.status, 'cancel');
            }

            delete dialog.step_results[dialog.current_step];
            await this.failDialog(dialog, `Cancelled: ${reason}`);
            return this.result(dialog);
        });
    }

    async get(id: string): Promise<DialogState> {
        return this.rehydrate(id);
    }

    /** Compiled (and cached) state machine of a registered template. */
    graph(templateName: string): StateGraph {
        return this.graphFor(this.requireTemplate(templateName));
    }

    isBusy(id: string): boolean {
        return this.lock.isHeld(id);
    }

    private async startLocked(dialog: DialogState): Promise<TransitionResult> {
        const template = this.requireTemplate(dialog.template_name);
        const graph = this.graphFor(template);
        const first = nextState(graph, INITIAL_STATE);

        dialog.status = dialogStatus.RUNNING;
        dialog.current_step = first === COMPLETED_STATE ? END_STEP : first;
        await this.persist(dialog);
        this.emit(dialog, 'started');
        console.log(`${TAG} Dialog ${dialog.id} started`);

        if (first === COMPLETED_STATE) {
            await this.completeDialog(dialog);
            return this.result(dialog);
        }
        return this.run(dialog);
    }

    private async run(dialog: DialogState): Promise<TransitionResult> {
        const template = this.requireTemplate(dialog.template_name);
        const graph = this.graphFor(template);
        let transitions = 0;

        while (dialog.status === dialogStatus.RUNNING) {
            if (dialog.current_step === END_STEP) {
                await this.completeDialog(dialog);
                break;
            }
            if (transitions >= this.options.maxTransitions) {
                console.warn(`${TAG} Dialog ${dialog.id} exceeded ${this.options.maxTransitions} transitions`);
                await this.failDialog(dialog, `Exceeded ${this.options.maxTransitions} transitions in a single advance`);
                break;
            }
            transitions++;

            const step = template.steps.find((s) => s.name === dialog.current_step);
            if (!step) {
                await this.failDialog(dialog, `Step "${dialog.current_step}" does not exist in template "${template.name}"`);
                break;
            }
            if (!step.enabled) {
                await this.moveTo(dialog, nextState(graph, step.name));
                continue;
            }

            await this.executeStep(dialog, template, graph, step);
        }

        return this.result(dialog);
    }

    private async executeStep(dialog: DialogState, template: DialogTemplate, graph: StateGraph, step: StepDefinition): Promise<void> {
        const policy = resolveErrorHandling(step, template);
        const config = mergeStepConfig(template, step);
        const previous = dialog.step_results[step.name];
        const suspended = previous?.status === stepResultStatus.RUNNING ? previous : undefined;
        const startedAt = suspended?.started_at ?? new Date().toISOString();
        let attempt = suspended?.attempts ?? 1;
        let transientRetries = 0;

        for (;;) {
            let outcome: StepOutcome;
            try {
                outcome = await runExecutor(this.executors, step, {
                    dialog,
                    template,
                    config,
                    attempt,
                    scope: {
                        step_results: dialog.step_results,
                        runtime: {
                            dialog_id: dialog.id,
                            template_name: template.name,
                            step: step.name,
                            attempt,
                            context: this.options.runtimeContext,
                        },
                        config,
                        inputs: dialog.inputs,
                    },
                    collaborators: this.deps,
                });
            } catch (err) {
                const error: StepError = isStepError(err)
                    ? err
                    : new StepExecutionError(step.name, err instanceof Error ? err.message : String(err), false, err);

                if (policy.strategy !== 'retry') {
                    await this.handleFailure(dialog, graph, step, policy, error, attempt, startedAt);
                    return;
                }
                // Transient completion failures do not use up max_retries.
                if (error instanceof StepExecutionError && error.transient && transientRetries < this.options.maxTransientRetries) {
                    transientRetries++;
                } else if (attempt - 1 - transientRetries >= policy.maxRetries) {
                    await this.handleFailure(dialog, graph, step, policy, error, attempt, startedAt);
                    return;
                }

                attempt++;
                console.warn(`${TAG} Dialog ${dialog.id} step "${step.name}" failed, attempt ${attempt}: ${error.message}`);
                this.emit(dialog, `step.${step.name}.retrying`, {
                    step: step.name,
                    attempt,
                    transient: error instanceof StepExecutionError && error.transient,
                    error: error.message,
                });
                const delay = retryDelay(attempt - 1, {
                    baseDelayMs: this.options.retryBaseDelayMs,
                    maxDelayMs: this.options.retryMaxDelayMs,
                });
                if (delay > 0) await this.options.sleep(delay);
                continue;
            }

            if (outcome.type === 'suspend') {
                this.record(dialog, step.name, {
                    status: stepResultStatus.RUNNING,
                    prompt: outcome.prompt,
                    attempts: attempt,
                    started_at: startedAt,
                });
                dialog.status = dialogStatus.WAITING_INPUT;
                await this.persist(dialog);
                this.emit(dialog, 'waiting_input', { step: step.name, prompt: outcome.prompt ?? null });
                console.log(`${TAG} Dialog ${dialog.id} waiting for input at "${step.name}"`);
                return;
            }

            this.record(dialog, step.name, {
                status: stepResultStatus.COMPLETE,
                input: outcome.input,
                output: outcome.output,
                response: outcome.response,
                attempts: attempt,
                started_at: startedAt,
                completed_at: new Date().toISOString(),
            });
            await this.moveTo(dialog, nextState(graph, step.name), `step.${step.name}.completed`, {
                step: step.name,
                output: outcome.output,
            });
            return;
        }
    }

    private async handleFailure(
        dialog: DialogState,
        graph: StateGraph,
        step: StepDefinition,
        policy: ResolvedErrorHandling,
        error: StepError,
        attempts: number,
        startedAt: string,
    ): Promise<void> {
        this.record(dialog, step.name, {
            status: stepResultStatus.ERROR,
            error: error.message,
            attempts,
            started_at: startedAt,
            completed_at: new Date().toISOString(),
        });

        if (policy.strategy === 'continue') {
            console.warn(`${TAG} Dialog ${dialog.id} step "${step.name}" failed, continuing: ${error.message}`);
            await this.moveTo(dialog, nextState(graph, step.name), `step.${step.name}.error`, {
                step: step.name,
                error: error.message,
            });
            return;
        }

        if (policy.strategy === 'fallback') {
            const target = fallbackState(graph, step.name);
            if (target) {
                console.warn(`${TAG} Dialog ${dialog.id} step "${step.name}" failed, falling back to "${target}": ${error.message}`);
                await this.moveTo(dialog, target, `step.${step.name}.error`, {
                    step: step.name,
                    error: error.message,
                    fallback_step: target,
                });
                return;
            }
        }

        console.error(`${TAG} Dialog ${dialog.id} step "${step.name}" failed:`, error);
        await this.failDialog(dialog, error.message);
    }

    /** Points the dialog at `target`, persists, then broadcasts `event` (and completion when `target` is terminal). */
    private async moveTo(dialog: DialogState, target: string, event?: string, payload?: Record<string, unknown>): Promise<void> {
        dialog.current_step = target === COMPLETED_STATE ? END_STEP : target;
        await this.persist(dialog);
        if (event) this.emit(dialog, event, payload);
        if (target === COMPLETED_STATE) {
            await this.completeDialog(dialog);
        }
    }

    private async completeDialog(dialog: DialogState): Promise<void> {
        dialog.status = dialogStatus.COMPLETED;
        dialog.current_step = END_STEP;
        await this.persist(dialog);
        this.emit(dialog, 'completed');
        console.log(`${TAG} Dialog ${dialog.id} completed`);
    }

    private async failDialog(dialog: DialogState, message: string): Promise<void> {
        dialog.status = dialogStatus.FAILED;
        dialog.error = message;
        await this.persist(dialog);
        this.emit(dialog, 'failed', { error: message });
        console.log(`${TAG} Dialog ${dialog.id} failed: ${message}`);
    }

    // Re-inserting keeps step_results in execution order when a step runs again.
    private record(dialog: DialogState, stepName: string, result: StepResultRecord): void {
        delete dialog.step_results[stepName];
        dialog.step_results[stepName] = result;
    }

    private async persist(dialog: DialogState): Promise<void> {
        dialog.updated_at = new Date().toISOString();
        await this.deps.store.save(dialog);
    }

    private emit(dialog: DialogState, event: string, extra: Record<string, unknown> = {}): void {
        this.deps.broadcaster.publish(`dialog.${dialog.id}.${event}`, {
            dialog_id: dialog.id,
            template_name: dialog.template_name,
            status: dialog.status,
            current_step: dialog.current_step,
            ...extra,
        });
    }

    private async rehydrate(id: string): Promise<DialogState> {
        const dialog = await this.deps.store.load(id);
        if (!dialog) {
            throw new DialogNotFoundError(id);
        }
        return dialog;
    }

    private noop(dialog: DialogState): TransitionResult {
        return { dialog, waitingForInput: false, terminal: new DialogTerminalError(dialog.id, dialog.status) };
    }

    private result(dialog: DialogState): TransitionResult {
        return { dialog, waitingForInput: dialog.status === dialogStatus.WAITING_INPUT };
    }

    private requireTemplate(name: string): DialogTemplate {
        const template = this.deps.templates.get(name);
        if (!template) {
            throw new TemplateError(`Unknown template "${name}"`);
        }
        return template;
    }

    private graphFor(template: DialogTemplate): StateGraph {
        let graph = this.graphs.get(template.name);
        if (!graph) {
            graph = compileStateMachine(template);
            this.graphs.set(template.name, graph);
        }
        return graph;
    }
}
