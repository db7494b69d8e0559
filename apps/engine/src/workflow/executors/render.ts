import { ExpressionError, MessageStep, PromptStep, renderTemplate, renderValue } from '@parley/sdk';
import { StepRenderError } from '../errors';
import type { ExecutionContext } from './types';

function wrap<T>(stepName: string, fn: () => T): T {
    try {
        return fn();
    } catch (err) {
        if (err instanceof ExpressionError) {
            throw new StepRenderError(stepName, err.message, err);
        }
        throw err;
    }
}

export function renderText(stepName: string, text: string, ctx: ExecutionContext): string {
    return wrap(stepName, () => renderTemplate(text, ctx.scope));
}

export function renderArgs(stepName: string, args: Record<string, unknown> | undefined, ctx: ExecutionContext): Record<string, unknown> {
    return wrap(stepName, () => {
        const out: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(args ?? {})) {
            out[key] = renderValue(value, ctx.scope);
        }
        return out;
    });
}

/**
 * Inline `content`, or a named prompt body rendered with the step's
 * `template_args` available as `args`.
 */
export function renderStepContent(step: MessageStep | PromptStep, ctx: ExecutionContext): string {
    if (step.content !== undefined) {
        return renderText(step.name, step.content, ctx);
    }
    if (step.template === undefined) {
        throw new StepRenderError(step.name, 'has neither content nor template');
    }

    const body = ctx.collaborators.prompts.get(step.template);
    if (body === undefined) {
        throw new StepRenderError(step.name, `prompt template "${step.template}" is not registered`);
    }
    const args = renderArgs(step.name, step.template_args, ctx);
    return wrap(step.name, () => renderTemplate(body, { ...ctx.scope, args }));
}
