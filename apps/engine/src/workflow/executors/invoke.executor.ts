import type { InvokeStep } from '@parley/sdk';
import { StepExecutionError } from '../errors';
import { renderArgs } from './render';
import type { StepExecutor } from './types';

export const executeInvoke: StepExecutor<InvokeStep> = async (step, ctx) => {
    const fn = ctx.collaborators.callables.resolve(step.callable);
    if (!fn) {
        throw new StepExecutionError(step.name, `callable "${step.callable}" is not registered`);
    }

    const args = renderArgs(step.name, step.args, ctx);

    try {
        const output = await fn(args);
        return { type: 'complete', input: args, output };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new StepExecutionError(step.name, `callable "${step.callable}" failed: ${message}`, false, err);
    }
};
