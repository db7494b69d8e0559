import type { StepDefinition } from '@parley/sdk';
import { executeInvoke } from './invoke.executor';
import { executeMessage } from './message.executor';
import { executePrompt } from './prompt.executor';
import { executeUserInput } from './user-input.executor';
import type { ExecutionContext, ExecutorTable, StepOutcome } from './types';

export const defaultExecutors: ExecutorTable = {
    message: executeMessage,
    prompt: executePrompt,
    user_input: executeUserInput,
    invoke: executeInvoke,
};

export function runExecutor(table: ExecutorTable, step: StepDefinition, ctx: ExecutionContext): Promise<StepOutcome> {
    switch (step.kind) {
        case 'message':
            return table.message(step, ctx);
        case 'prompt':
            return table.prompt(step, ctx);
        case 'user_input':
            return table.user_input(step, ctx);
        case 'invoke':
            return table.invoke(step, ctx);
    }
}

export type { Collaborators, ExecutionContext, ExecutorTable, StepExecutor, StepOutcome } from './types';
