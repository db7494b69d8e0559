import {
    collectStepReferences,
    DialogTemplate,
    END_STEP,
    ExpressionError,
    START_STEP,
    StepDefinition,
    StepKind,
    TemplateError,
} from '@parley/sdk';
import { resolveErrorHandling } from './retry-policy';

export const INITIAL_STATE = 'initial';
export const COMPLETED_STATE = 'completed';
export const FAILED_STATE = 'failed';

const RESERVED_NAMES = new Set([INITIAL_STATE, COMPLETED_STATE, FAILED_STATE, START_STEP, END_STEP]);
const INTEGER_NAME = /^\d+$/;

export type StateKind = 'initial' | 'step' | 'completed' | 'failed';
export type Trigger = 'advance' | 'fail' | 'fallback';

export interface StateNode {
    name: string;
    kind: StateKind;
    stepKind?: StepKind;
    enabled?: boolean;
}

export interface Transition {
    trigger: Trigger;
    source: string;
    dest: string;
}

/** Plain data only, so two compilations of one template compare deep-equal. */
export interface StateGraph {
    template: string;
    states: StateNode[];
    transitions: Transition[];
}

function referencedFields(step: StepDefinition): unknown[] {
    switch (step.kind) {
        case 'message':
        case 'prompt':
            return [step.content, step.template_args];
        case 'user_input':
            return [step.prompt];
        case 'invoke':
            return [step.args];
    }
}

function validate(template: DialogTemplate): void {
    if (template.steps.length === 0) {
        throw new TemplateError('must declare at least one step', template.name);
    }

    const names = new Set<string>();
    for (const step of template.steps) {
        if (RESERVED_NAMES.has(step.name)) {
            throw new TemplateError(`step name "${step.name}" is reserved`, template.name);
        }
        // Integer-like keys would jump ahead of earlier steps in step_results.
        if (INTEGER_NAME.test(step.name)) {
            throw new TemplateError(`step name "${step.name}" must not be an integer`, template.name);
        }
        if (names.has(step.name)) {
            throw new TemplateError(`duplicate step name "${step.name}"`, template.name);
        }
        names.add(step.name);
    }

    const checkFallback = (owner: string, policy: DialogTemplate['error_handling']): void => {
        if (!policy) return;
        if (policy.strategy === 'fallback' && !policy.fallback_step) {
            throw new TemplateError(`${owner} uses the fallback strategy without a fallback_step`, template.name);
        }
        if (policy.fallback_step && !names.has(policy.fallback_step)) {
            throw new TemplateError(`${owner} falls back to unknown step "${policy.fallback_step}"`, template.name);
        }
    };

    checkFallback('the template default', template.error_handling);

    for (const step of template.steps) {
        checkFallback(`step "${step.name}"`, step.error_handling);
        if (step.error_handling?.fallback_step === step.name) {
            throw new TemplateError(`step "${step.name}" cannot fall back to itself`, template.name);
        }

        let refs: string[];
        try {
            refs = collectStepReferences(referencedFields(step));
        } catch (err) {
            if (err instanceof ExpressionError) {
                throw new TemplateError(`step "${step.name}" has a malformed expression: ${err.message}`, template.name);
            }
            throw err;
        }
        for (const ref of refs) {
            if (!names.has(ref)) {
                throw new TemplateError(`step "${step.name}" references unknown step "${ref}"`, template.name);
            }
        }
    }
}

/**
 * Derives the dialog state machine from a template's step list.
 *
 * Every step gets a state, disabled ones included; `advance` edges skip
 * disabled steps. Every non-terminal state can `fail`, and a step whose
 * effective error policy names a fallback gets a `fallback` edge to it.
 */
export function compileStateMachine(template: DialogTemplate): StateGraph {
    validate(template);

    const steps = template.steps;
    const nextEnabled = (from: number): string => {
        for (let i = from + 1; i < steps.length; i++) {
            if (steps[i].enabled) return steps[i].name;
        }
        return COMPLETED_STATE;
    };

    const states: StateNode[] = [
        { name: INITIAL_STATE, kind: 'initial' },
        ...steps.map((step): StateNode => ({ name: step.name, kind: 'step', stepKind: step.kind, enabled: step.enabled })),
        { name: COMPLETED_STATE, kind: 'completed' },
        { name: FAILED_STATE, kind: 'failed' },
    ];

    const transitions: Transition[] = [{ trigger: 'advance', source: INITIAL_STATE, dest: nextEnabled(-1) }];

    steps.forEach((step, index) => {
        transitions.push({ trigger: 'advance', source: step.name, dest: nextEnabled(index) });

        const policy = resolveErrorHandling(step, template);
        // A template-wide fallback does not apply to its own target step.
        if (policy.fallbackStep && policy.fallbackStep !== step.name) {
            transitions.push({ trigger: 'fallback', source: step.name, dest: policy.fallbackStep });
        }
    });

    for (const state of states) {
        if (state.kind === 'initial' || state.kind === 'step') {
            transitions.push({ trigger: 'fail', source: state.name, dest: FAILED_STATE });
        }
    }

    return { template: template.name, states, transitions };
}

function follow(graph: StateGraph, source: string, trigger: Trigger): string | undefined {
    return graph.transitions.find((t) => t.source === source && t.trigger === trigger)?.dest;
}

export function nextState(graph: StateGraph, source: string): string {
    const dest = follow(graph, source, 'advance');
    if (dest === undefined) {
        throw new Error(`State "${source}" has no advance transition in "${graph.template}"`);
    }
    return dest;
}

export function fallbackState(graph: StateGraph, source: string): string | undefined {
    return follow(graph, source, 'fallback');
}

export function isStepState(graph: StateGraph, name: string): boolean {
    return graph.states.some((s) => s.kind === 'step' && s.name === name);
}

/** Renders the graph as a Mermaid `stateDiagram-v2`, optionally marking the active state. */
export function toMermaid(graph: StateGraph, active?: string): string {
    const ids = new Map<string, string>();
    graph.states.forEach((state, index) => {
        if (state.kind === 'initial') ids.set(state.name, '[*]');
        else if (state.kind === 'step') ids.set(state.name, `s${index}`);
        else ids.set(state.name, state.name);
    });
    const id = (name: string): string => ids.get(name) ?? name;

    const lines = ['stateDiagram-v2'];
    for (const state of graph.states) {
        if (state.kind !== 'step') continue;
        const label = `${state.name} (${state.stepKind}${state.enabled ? '' : ', disabled'})`;
        lines.push(`    state "${label.replace(/"/g, "'")}" as ${id(state.name)}`);
    }
    for (const t of graph.transitions) {
        if (t.trigger === 'fail') continue;
        const suffix = t.trigger === 'fallback' ? ' : fallback' : '';
        lines.push(`    ${id(t.source)} --> ${id(t.dest)}${suffix}`);
    }
    lines.push(`    ${COMPLETED_STATE} --> [*]`);
    lines.push(`    ${FAILED_STATE} --> [*]`);

    if (active && ids.has(active) && active !== INITIAL_STATE) {
        lines.push('    classDef active fill:#f9d71c,stroke:#333');
        lines.push(`    class ${id(active)} active`);
    }
    return lines.join('\n');
}
