import type { DialogTemplate, MergeStrategy, StepDefinition } from '@parley/sdk';

export interface ResolvedStepConfig {
    model: string;
    temperature?: number;
    max_tokens?: number;
    tools: string[];
    resources: string[];
}

function unique(items: string[]): string[] {
    return Array.from(new Set(items));
}

export function mergeList(defaults: string[], overrides: string[] | undefined, strategy: MergeStrategy = 'replace'): string[] {
    if (overrides === undefined) return [...defaults];
    switch (strategy) {
        case 'replace':
            return unique(overrides);
        case 'append':
            return unique([...defaults, ...overrides]);
        case 'prepend':
            return unique([...overrides, ...defaults]);
    }
}

/** Template defaults overlaid with the step's `config`. */
export function mergeStepConfig(template: DialogTemplate, step: StepDefinition): ResolvedStepConfig {
    const config = step.config ?? {};
    return {
        model: config.model ?? template.model,
        temperature: config.temperature ?? template.temperature,
        max_tokens: config.max_tokens ?? template.max_tokens,
        tools: mergeList(template.tools, config.tools, config.tool_merge_strategy),
        resources: mergeList(template.resources, config.resources, config.resource_merge_strategy),
    };
}
