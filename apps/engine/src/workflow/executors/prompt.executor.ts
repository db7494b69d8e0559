import { CompletionResponse, PromptStep, SchemaValidationError } from '@parley/sdk';
import { TransientCompletionError } from '../../llm/completion-client';
import { StepExecutionError } from '../errors';
import { renderStepContent } from './render';
import type { StepExecutor } from './types';

export const executePrompt: StepExecutor<PromptStep> = async (step, ctx) => {
    const content = renderStepContent(step, ctx);
    const { completion, transcript, schemas } = ctx.collaborators;

    const history = await transcript.list(ctx.dialog.id);
    const messages = [
        ...history.map(({ role, content: text }) => ({ role, content: text })),
        { role: 'user' as const, content },
    ];

    let response: CompletionResponse;
    try {
        response = await completion.complete({
            messages,
            model: ctx.config.model,
            temperature: ctx.config.temperature,
            max_tokens: ctx.config.max_tokens,
            tools: ctx.config.tools,
            resources: ctx.config.resources,
        });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new StepExecutionError(step.name, `completion failed: ${message}`, err instanceof TransientCompletionError, err);
    }

    let output: unknown = response.text;
    if (step.output_schema) {
        try {
            output = schemas.validate(step.output_schema, response.text);
        } catch (err) {
            if (err instanceof SchemaValidationError) {
                throw new StepExecutionError(step.name, err.message, false, err);
            }
            throw err;
        }
    }

    // Only a usable answer makes it into the transcript, so retries don't duplicate turns.
    await transcript.append(ctx.dialog.id, { role: 'user', content, step_name: step.name });
    await transcript.append(ctx.dialog.id, { role: 'assistant', content: response.text, model: response.model, step_name: step.name });

    return { type: 'complete', input: content, output, response };
};
