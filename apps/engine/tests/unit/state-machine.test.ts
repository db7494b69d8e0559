import { DialogTemplate, parseDialogConfig, TemplateError } from '@parley/sdk';
import {
    compileStateMachine,
    fallbackState,
    isStepState,
    nextState,
    toMermaid,
} from '../../src/workflow/state-machine';

function template(yaml: string): DialogTemplate {
    const [first] = parseDialogConfig(`dialog_templates:\n  t:\n    model: m\n${yaml}`).templates;
    return first;
}

const MIXED = template(`
    steps:
      - name: A
        type: message
        role: system
        content: a
      - name: B
        type: user_input
        enabled: false
      - name: C
        type: invoke
        callable: add_numbers
        error_handling: { strategy: fallback, fallback_step: A }
`);

describe('compileStateMachine', () => {
    it('is deterministic', () => {
        expect(compileStateMachine(MIXED)).toEqual(compileStateMachine(MIXED));
    });

    it('creates a state per step between initial and the terminal states', () => {
        const graph = compileStateMachine(MIXED);
        expect(graph.states.map((s) => [s.name, s.kind])).toEqual([
            ['initial', 'initial'],
            ['A', 'step'],
            ['B', 'step'],
            ['C', 'step'],
            ['completed', 'completed'],
            ['failed', 'failed'],
        ]);
    });

    it('skips disabled steps on advance', () => {
        const graph = compileStateMachine(MIXED);
        expect(nextState(graph, 'initial')).toBe('A');
        expect(nextState(graph, 'A')).toBe('C');
        expect(nextState(graph, 'B')).toBe('C');
        expect(nextState(graph, 'C')).toBe('completed');
    });

    it('adds fallback edges and a fail edge from every active state', () => {
        const graph = compileStateMachine(MIXED);
        expect(fallbackState(graph, 'C')).toBe('A');
        expect(fallbackState(graph, 'A')).toBeUndefined();
        expect(graph.transitions.filter((t) => t.trigger === 'fail').map((t) => t.source)).toEqual(['initial', 'A', 'B', 'C']);
        expect(isStepState(graph, 'B')).toBe(true);
        expect(isStepState(graph, 'completed')).toBe(false);
    });

    it('does not apply a template fallback to its own target', () => {
        const graph = compileStateMachine(template(`
    error_handling: { strategy: fallback, fallback_step: R }
    steps:
      - name: X
        type: message
        role: system
        content: x
      - name: R
        type: message
        role: system
        content: r
`));
        expect(fallbackState(graph, 'X')).toBe('R');
        expect(fallbackState(graph, 'R')).toBeUndefined();
    });

    it('completes immediately when every step is disabled', () => {
        const graph = compileStateMachine(template(`
    steps:
      - name: A
        type: message
        role: system
        content: a
        enabled: false
`));
        expect(nextState(graph, 'initial')).toBe('completed');
    });

    describe('validation', () => {
        const step = (name: string, extra = '') => `
      - name: ${name}
        type: message
        role: system
        content: "${name}"${extra}`;

        it('rejects duplicate step names', () => {
            expect(() => compileStateMachine(template(`    steps:${step('A')}${step('A')}`))).toThrow(
                'Template "t": duplicate step name "A"',
            );
        });

        it('rejects reserved step names', () => {
            expect(() => compileStateMachine(template(`    steps:${step('completed')}`))).toThrow(
                'Template "t": step name "completed" is reserved',
            );
        });

        it('rejects integer step names', () => {
            const yaml = `    steps:
      - name: Intro
        type: message
        role: system
        content: hi
      - name: "2"
        type: message
        role: system
        content: two`;
            expect(() => compileStateMachine(template(yaml))).toThrow('Template "t": step name "2" must not be an integer');
        });

        it('rejects references to unknown steps', () => {
            const yaml = `
    steps:
      - name: A
        type: message
        role: system
        content: "{{ step_results['Nope'].output }}"
`;
            expect(() => compileStateMachine(template(yaml))).toThrow(TemplateError);
            expect(() => compileStateMachine(template(yaml))).toThrow('Template "t": step "A" references unknown step "Nope"');
        });

        it('rejects malformed expressions', () => {
            const yaml = `
    steps:
      - name: A
        type: message
        role: system
        content: "{{ step_results[ }}"
`;
            expect(() => compileStateMachine(template(yaml))).toThrow(/step "A" has a malformed expression/);
        });

        it('rejects a step falling back to itself', () => {
            const yaml = `    steps:${step('A', '\n        error_handling: { strategy: fallback, fallback_step: A }')}`;
            expect(() => compileStateMachine(template(yaml))).toThrow('Template "t": step "A" cannot fall back to itself');
        });

        it('rejects a fallback without a target', () => {
            const yaml = `    error_handling: { strategy: fallback }\n    steps:${step('A')}`;
            expect(() => compileStateMachine(template(yaml))).toThrow(
                'Template "t": the template default uses the fallback strategy without a fallback_step',
            );
        });

        it('rejects a fallback to an unknown step', () => {
            const yaml = `    steps:${step('A', '\n        error_handling: { strategy: fallback, fallback_step: Z }')}`;
            expect(() => compileStateMachine(template(yaml))).toThrow('step "A" falls back to unknown step "Z"');
        });
    });
});

describe('toMermaid', () => {
    const graph = compileStateMachine(MIXED);

    it('renders steps, edges and terminal states', () => {
        expect(toMermaid(graph)).toBe(
            [
                'stateDiagram-v2',
                '    state "A (message)" as s1',
                '    state "B (user_input, disabled)" as s2',
                '    state "C (invoke)" as s3',
                '    [*] --> s1',
                '    s1 --> s3',
                '    s2 --> s3',
                '    s3 --> completed',
                '    s3 --> s1 : fallback',
                '    completed --> [*]',
                '    failed --> [*]',
            ].join('\n'),
        );
    });

    it('marks the active state', () => {
        const lines = toMermaid(graph, 'C').split('\n');
        expect(lines.slice(-2)).toEqual(['    classDef active fill:#f9d71c,stroke:#333', '    class s3 active']);
        expect(toMermaid(graph, 'failed').split('\n').slice(-1)).toEqual(['    class failed active']);
        expect(toMermaid(graph, 'initial')).toBe(toMermaid(graph));
    });
});
