import { SchemaValidationError, stepResultStatus, UserInputStep } from '@parley/sdk';
import { StepExecutionError } from '../errors';
import { renderText } from './render';
import type { StepExecutor } from './types';

export const executeUserInput: StepExecutor<UserInputStep> = async (step, ctx) => {
    const pending = ctx.dialog.step_results[step.name];

    if (!pending || pending.status !== stepResultStatus.RUNNING || pending.input === undefined) {
        const prompt = step.prompt !== undefined ? renderText(step.name, step.prompt, ctx) : undefined;
        return { type: 'suspend', prompt };
    }

    let value: unknown = pending.input;
    if (step.input_schema) {
        try {
            value = ctx.collaborators.schemas.validate(step.input_schema, pending.input);
        } catch (err) {
            if (err instanceof SchemaValidationError) {
                throw new StepExecutionError(step.name, err.message, false, err);
            }
            throw err;
        }
    }

    const content = typeof pending.input === 'string' ? pending.input : JSON.stringify(pending.input);
    await ctx.collaborators.transcript.append(ctx.dialog.id, { role: 'user', content, step_name: step.name });

    return { type: 'complete', input: pending.input, output: value };
};
