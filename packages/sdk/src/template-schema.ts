import { z } from 'zod';
import type { DialogTemplate, StepDefinition } from './types';

// Zod schemas for the YAML template document. Keys mirror the document
// (snake_case, step kind under `type:`); `toStepDefinition` maps each step
// onto the StepDefinition union.

const mergeStrategySchema = z.enum(['replace', 'append', 'prepend']);

export const errorHandlingSchema = z.object({
    strategy: z.enum(['fail', 'retry', 'continue', 'fallback']).default('fail'),
    max_retries: z.number().int().min(0).optional(),
    fallback_step: z.string().min(1).optional(),
});

export const stepConfigSchema = z.object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    tools: z.array(z.string().min(1)).optional(),
    tool_merge_strategy: mergeStrategySchema.optional(),
    resources: z.array(z.string().min(1)).optional(),
    resource_merge_strategy: mergeStrategySchema.optional(),
});

const baseStep = {
    name: z.string().min(1),
    description: z.string().optional(),
    enabled: z.boolean().default(true),
    config: stepConfigSchema.optional(),
    error_handling: errorHandlingSchema.optional(),
    metadata: z.record(z.unknown()).optional(),
};

const templated = {
    content: z.string().optional(),
    template: z.string().min(1).optional(),
    template_args: z.record(z.unknown()).optional(),
};

export const stepSchema = z
    .discriminatedUnion('type', [
        z.object({ ...baseStep, ...templated, type: z.literal('message'), role: z.enum(['system', 'user', 'assistant']) }),
        z.object({ ...baseStep, ...templated, type: z.literal('prompt'), output_schema: z.string().min(1).optional() }),
        z.object({
            ...baseStep,
            type: z.literal('user_input'),
            prompt: z.string().optional(),
            input_schema: z.string().min(1).optional(),
        }),
        z.object({
            ...baseStep,
            type: z.literal('invoke'),
            callable: z.string().min(1),
            args: z.record(z.unknown()).optional(),
        }),
    ])
    .superRefine((step, ctx) => {
        if (step.type !== 'message' && step.type !== 'prompt') return;
        const hasContent = step.content !== undefined;
        const hasTemplate = step.template !== undefined;
        if (hasContent === hasTemplate) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `${step.type} step "${step.name}" needs exactly one of "content" or "template"`,
                path: ['content'],
            });
        }
    });

export type RawStep = z.infer<typeof stepSchema>;

export const templateSchema = z.object({
    description: z.string().optional(),
    goal: z.string().optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().positive().optional(),
    tools: z.array(z.string().min(1)).default([]),
    resources: z.array(z.string().min(1)).default([]),
    error_handling: errorHandlingSchema.optional(),
    metadata: z.record(z.unknown()).optional(),
    steps: z.array(stepSchema).min(1),
});

export const dialogConfigSchema = z.object({
    dialog_templates: z.record(templateSchema).default({}),
    prompts: z.record(z.string()).default({}),
});

export function toStepDefinition(raw: RawStep): StepDefinition {
    switch (raw.type) {
        case 'message': {
            const { type: _type, ...rest } = raw;
            return { kind: 'message', ...rest };
        }
        case 'prompt': {
            const { type: _type, ...rest } = raw;
            return { kind: 'prompt', ...rest };
        }
        case 'user_input': {
            const { type: _type, ...rest } = raw;
            return { kind: 'user_input', ...rest };
        }
        case 'invoke': {
            const { type: _type, ...rest } = raw;
            return { kind: 'invoke', ...rest };
        }
    }
}

export function toDialogTemplate(name: string, raw: z.infer<typeof templateSchema>): DialogTemplate {
    return { name, ...raw, steps: raw.steps.map(toStepDefinition) };
}
