import type { MessageStep } from '@parley/sdk';
import { renderStepContent } from './render';
import type { StepExecutor } from './types';

// Adds a fixed or templated message to the transcript; never calls the model.
export const executeMessage: StepExecutor<MessageStep> = async (step, ctx) => {
    const content = renderStepContent(step, ctx);
    await ctx.collaborators.transcript.append(ctx.dialog.id, { role: step.role, content, step_name: step.name });
    return { type: 'complete', output: { role: step.role, content } };
};
