export type MergeStrategy = 'replace' | 'append' | 'prepend';

export type ErrorStrategy = 'fail' | 'retry' | 'continue' | 'fallback';

export interface ErrorHandling {
    strategy: ErrorStrategy;
    max_retries?: number;
    fallback_step?: string;
}

/** Per-step overrides of the template's model settings. */
export interface StepConfig {
    model?: string;
    temperature?: number;
    max_tokens?: number;
    tools?: string[];
    tool_merge_strategy?: MergeStrategy;
    resources?: string[];
    resource_merge_strategy?: MergeStrategy;
}

interface BaseStep {
    name: string;
    description?: string;
    enabled: boolean;
    config?: StepConfig;
    error_handling?: ErrorHandling;
    metadata?: Record<string, unknown>;
}

export type MessageRole = 'system' | 'user' | 'assistant';

export interface MessageStep extends BaseStep {
    kind: 'message';
    role: MessageRole;
    content?: string;
    template?: string;
    template_args?: Record<string, unknown>;
}

export interface PromptStep extends BaseStep {
    kind: 'prompt';
    content?: string;
    template?: string;
    template_args?: Record<string, unknown>;
    output_schema?: string;
}

export interface UserInputStep extends BaseStep {
    kind: 'user_input';
    prompt?: string;
    input_schema?: string;
}

export interface InvokeStep extends BaseStep {
    kind: 'invoke';
    callable: string;
    args?: Record<string, unknown>;
}

export type StepDefinition = MessageStep | PromptStep | UserInputStep | InvokeStep;

export type StepKind = StepDefinition['kind'];

export interface DialogTemplate {
    name: string;
    description?: string;
    goal?: string;
    model: string;
    temperature?: number;
    max_tokens?: number;
    tools: string[];
    resources: string[];
    error_handling?: ErrorHandling;
    metadata?: Record<string, unknown>;
    steps: StepDefinition[];
}

/**
 * Lifecycle of a dialog instance.
 * Dialogs progress: PENDING → RUNNING → (WAITING_INPUT ↔ RUNNING)* → COMPLETED/FAILED
 */
export enum dialogStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    WAITING_INPUT = 'waiting_input',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

export enum stepResultStatus {
    RUNNING = 'running',
    COMPLETE = 'complete',
    ERROR = 'error',
}

export const START_STEP = 'start';
export const END_STEP = 'end';

export interface CompletionUsage {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
}

export interface CompletionResponse {
    text: string;
    model: string;
    finish_reason?: string;
    usage?: CompletionUsage;
}

export interface StepResultRecord {
    status: stepResultStatus;
    input?: unknown;
    output?: unknown;
    /** Raw completion of a prompt step */
    response?: CompletionResponse;
    error?: string;
    /** Rendered question of a user_input step while it waits */
    prompt?: string;
    attempts: number;
    started_at: string;
    completed_at?: string;
}

/**
 * The persisted execution record of one dialog.
 * Field names follow the stored document so expressions such as
 * `step_results['X'].response.text` resolve against it directly.
 */
export interface DialogState {
    id: string;
    template_name: string;
    status: dialogStatus;
    current_step: string;
    step_results: Record<string, StepResultRecord>;
    inputs: Record<string, unknown>;
    error: string | null;
    created_at: string;
    updated_at: string;
}

export interface TranscriptMessage {
    role: MessageRole;
    content: string;
    model?: string;
    step_name?: string;
}
