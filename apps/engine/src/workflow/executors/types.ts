import type {
    CallableRegistry,
    CompletionResponse,
    DialogState,
    DialogTemplate,
    ExpressionScope,
    PromptLibrary,
    SchemaRegistry,
    StepDefinition,
    StepKind,
} from '@parley/sdk';
import type { CompletionClient } from '../../llm/completion-client';
import type { ResolvedStepConfig } from '../config-merge';
import type { Transcript } from '../ports';

export interface Collaborators {
    completion: CompletionClient;
    callables: CallableRegistry;
    schemas: SchemaRegistry;
    prompts: PromptLibrary;
    transcript: Transcript;
}

export interface ExecutionContext {
    dialog: Readonly<DialogState>;
    template: DialogTemplate;
    config: ResolvedStepConfig;
    /** 1 on the first try, incremented per retry */
    attempt: number;
    scope: ExpressionScope;
    collaborators: Collaborators;
}

export type StepOutcome =
    | { type: 'complete'; output: unknown; input?: unknown; response?: CompletionResponse }
    /** pause the dialog until input arrives through resume() */
    | { type: 'suspend'; prompt?: string };

export type StepExecutor<S extends StepDefinition> = (step: S, ctx: ExecutionContext) => Promise<StepOutcome>;

export type ExecutorTable = {
    [K in StepKind]: StepExecutor<Extract<StepDefinition, { kind: K }>>;
};
