import { CallableRegistry, dialogStatus, stepResultStatus, TemplateError } from '@parley/sdk';
import {
    ConcurrentExecutionError,
    DialogNotFoundError,
    DialogTerminalError,
    InvalidDialogStateError,
} from '../../src/workflow/errors';
import { TransientCompletionError } from '../../src/llm/completion-client';
import { createHarness, deferred, ScriptedCompletionClient } from '../helpers/fakes';

const GREETING = `
dialog_templates:
  greeting:
    model: test-model
    steps:
      - name: Ask
        type: user_input
        prompt: "Name?"
      - name: Greet
        type: message
        role: system
        content: "Hello {{ step_results['Ask'].output }}"
`;

function flakyCallables(failures: number, result: unknown = 42) {
    const fn = jest.fn();
    for (let i = 0; i < failures; i++) fn.mockRejectedValueOnce(new Error('boom'));
    fn.mockResolvedValue(result);
    return { fn, callables: new CallableRegistry().register('flaky', fn) };
}

describe('WorkflowEngine', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('create', () => {
        it('persists a pending dialog and announces it', async () => {
            const { engine, store, broadcaster } = createHarness(GREETING);

            const dialog = await engine.create('greeting', { user: 'test-user' });

            expect(dialog.status).toBe(dialogStatus.PENDING);
            expect(dialog.current_step).toBe('start');
            expect(dialog.step_results).toEqual({});
            expect(dialog.inputs).toEqual({ user: 'test-user' });
            expect(dialog.error).toBeNull();
            expect(await store.load(dialog.id)).toEqual(dialog);
            expect(broadcaster.names(dialog.id)).toEqual(['created']);
        });

        it('rejects an unknown template', async () => {
            const { engine } = createHarness(GREETING);
            await expect(engine.create('nope')).rejects.toThrow(TemplateError);
            await expect(engine.create('nope')).rejects.toThrow('Unknown template "nope"');
        });
    });

    describe('user input', () => {
        it('suspends at a user_input step and completes it on resume', async () => {
            const { engine, broadcaster } = createHarness(GREETING);
            const { id } = await engine.create('greeting');

            const started = await engine.start(id);
            expect(started.waitingForInput).toBe(true);
            expect(started.dialog.status).toBe(dialogStatus.WAITING_INPUT);
            expect(started.dialog.current_step).toBe('Ask');
            expect(started.dialog.step_results.Ask).toMatchObject({
                status: stepResultStatus.RUNNING,
                prompt: 'Name?',
                attempts: 1,
            });

            const resumed = await engine.resume(id, 'Ada');
            expect(resumed.waitingForInput).toBe(false);
            expect(resumed.dialog.status).toBe(dialogStatus.COMPLETED);
            expect(resumed.dialog.current_step).toBe('end');
            expect(Object.keys(resumed.dialog.step_results)).toEqual(['Ask', 'Greet']);
            expect(resumed.dialog.step_results.Ask).toMatchObject({ status: 'complete', input: 'Ada', output: 'Ada', attempts: 1 });
            expect(resumed.dialog.step_results.Greet.output).toEqual({ role: 'system', content: 'Hello Ada' });

            expect(broadcaster.names(id)).toEqual([
                'created',
                'started',
                'waiting_input',
                'resumed',
                'step.Ask.completed',
                'step.Greet.completed',
                'completed',
            ]);
        });

        it('only moves through the allowed status sequence', async () => {
            const { engine, store } = createHarness(GREETING);
            const { id } = await engine.create('greeting');

            await engine.start(id);
            await engine.resume(id, 'Ada');

            const statuses = store.saves.map((d) => d.status).filter((s, i, all) => i === 0 || all[i - 1] !== s);
            expect(statuses).toEqual(['running', 'waiting_input', 'running', 'completed']);
        });

        it('stores a suspended step only while the dialog waits for input', async () => {
            const { engine, store } = createHarness(GREETING);
            const { id } = await engine.create('greeting');

            await engine.start(id);
            await engine.resume(id, 'Ada');

            const withRunningStep = store.saves.filter((d) =>
                Object.values(d.step_results).some((r) => r.status === stepResultStatus.RUNNING),
            );
            expect(withRunningStep.map((d) => d.status)).toEqual([dialogStatus.WAITING_INPUT]);
        });

        it('keeps waiting when advanced without input', async () => {
            const { engine } = createHarness(GREETING);
            const { id } = await engine.create('greeting');
            await engine.start(id);

            const result = await engine.advance(id);

            expect(result.waitingForInput).toBe(true);
            expect(result.dialog.current_step).toBe('Ask');
            expect(result.terminal).toBeUndefined();
        });

        it('refuses to resume a dialog that is not waiting', async () => {
            const { engine } = createHarness(GREETING);
            const { id } = await engine.create('greeting');

            await expect(engine.resume(id, 'Ada')).rejects.toThrow(InvalidDialogStateError);
            await expect(engine.resume(id, 'Ada')).rejects.toThrow(`Cannot resume dialog ${id} while it is pending`);
        });
    });

    it('starts a pending dialog passed to advance', async () => {
        const { engine } = createHarness(GREETING);
        const { id } = await engine.create('greeting');

        const result = await engine.advance(id);

        expect(result.dialog.status).toBe(dialogStatus.WAITING_INPUT);
        expect(result.dialog.current_step).toBe('Ask');
    });

    it('throws DialogNotFoundError for an unknown id', async () => {
        const { engine } = createHarness(GREETING);
        await expect(engine.advance('missing-id')).rejects.toThrow(DialogNotFoundError);
    });

    describe('terminal dialogs', () => {
        it('leaves a completed dialog untouched and marks the result', async () => {
            const { engine, store, broadcaster } = createHarness(GREETING);
            const { id } = await engine.create('greeting');
            await engine.start(id);
            const done = await engine.resume(id, 'Ada');
            const savesBefore = store.saves.length;
            const eventsBefore = broadcaster.events.length;

            for (const result of [await engine.advance(id), await engine.resume(id, 'again'), await engine.start(id), await engine.cancel(id)]) {
                expect(result.terminal).toBeInstanceOf(DialogTerminalError);
                expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
                expect(result.dialog.current_step).toBe('end');
                expect(result.dialog.step_results).toEqual(done.dialog.step_results);
            }
            expect(store.saves).toHaveLength(savesBefore);
            expect(broadcaster.events).toHaveLength(eventsBefore);
        });
    });

    describe('error handling', () => {
        it('retries a failing step until it succeeds', async () => {
            const { fn, callables } = flakyCallables(2);
            const { engine, broadcaster } = createHarness(`
dialog_templates:
  flaky:
    model: test-model
    steps:
      - name: Call
        type: invoke
        callable: flaky
        error_handling: { strategy: retry, max_retries: 2 }
`, { callables });
            const { id } = await engine.create('flaky');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
            expect(result.dialog.step_results.Call).toMatchObject({ status: 'complete', output: 42, attempts: 3 });
            expect(fn).toHaveBeenCalledTimes(3);
            expect(broadcaster.names(id)).toEqual([
                'created',
                'started',
                'step.Call.retrying',
                'step.Call.retrying',
                'step.Call.completed',
                'completed',
            ]);
        });

        it('fails the dialog once retries are exhausted', async () => {
            const { callables } = flakyCallables(5);
            const { engine } = createHarness(`
dialog_templates:
  flaky:
    model: test-model
    error_handling: { strategy: retry, max_retries: 1 }
    steps:
      - name: Call
        type: invoke
        callable: flaky
`, { callables });
            const { id } = await engine.create('flaky');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.FAILED);
            expect(result.dialog.error).toBe('Step "Call": callable "flaky" failed: boom');
            expect(result.dialog.step_results.Call).toMatchObject({ status: 'error', attempts: 2 });
        });

        it('waits between retries when a base delay is configured', async () => {
            const { callables } = flakyCallables(1);
            const sleep = jest.fn().mockResolvedValue(undefined);
            const { engine } = createHarness(`
dialog_templates:
  flaky:
    model: test-model
    steps:
      - name: Call
        type: invoke
        callable: flaky
        error_handling: { strategy: retry }
`, { callables, engineOptions: { retryBaseDelayMs: 100, sleep } });
            const { id } = await engine.create('flaky');

            await engine.start(id);

            expect(sleep).toHaveBeenCalledTimes(1);
            const delay = sleep.mock.calls[0][0];
            expect(delay).toBeGreaterThanOrEqual(90);
            expect(delay).toBeLessThanOrEqual(110);
        });

        it.each(['retry', 'continue'])('surfaces a failed save after a successful step under %s', async (strategy) => {
            const fn = jest.fn().mockResolvedValue('fine');
            const callables = new CallableRegistry().register('work', fn);
            const { engine, store } = createHarness(`
dialog_templates:
  once:
    model: test-model
    steps:
      - name: Work
        type: invoke
        callable: work
        error_handling: { strategy: ${strategy}, max_retries: 2 }
`, { callables });
            const { id } = await engine.create('once');
            const save = store.save.bind(store);
            jest.spyOn(store, 'save').mockImplementationOnce(save).mockRejectedValueOnce(new Error('db down'));

            await expect(engine.start(id)).rejects.toThrow('db down');

            expect(fn).toHaveBeenCalledTimes(1);
            const stored = await store.load(id);
            expect(stored?.status).toBe(dialogStatus.RUNNING);
            expect(stored?.current_step).toBe('Work');
            expect(stored?.step_results).toEqual({});
            expect(engine.isBusy(id)).toBe(false);
        });

        describe('transient completion failures', () => {
            const ASK = (strategy: string) => `
dialog_templates:
  ask:
    model: test-model
    steps:
      - name: Ask
        type: prompt
        content: Hi
        error_handling: { strategy: ${strategy}, max_retries: 1 }
`;
            const transient = () => new TransientCompletionError('rate limited');

            it('retries them without using up max_retries', async () => {
                const completion = new ScriptedCompletionClient([transient(), transient(), transient(), 'ok']);
                const { engine, broadcaster } = createHarness(ASK('retry'), { completion });
                const { id } = await engine.create('ask');

                const result = await engine.start(id);

                expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
                expect(result.dialog.step_results.Ask).toMatchObject({ status: 'complete', output: 'ok', attempts: 4 });
                expect(completion.requests).toHaveLength(4);
                const retrying = broadcaster.events.filter((e) => e.event === `dialog.${id}.step.Ask.retrying`);
                expect(retrying.map((e) => e.payload)).toEqual([
                    expect.objectContaining({ attempt: 2, transient: true }),
                    expect.objectContaining({ attempt: 3, transient: true }),
                    expect.objectContaining({ attempt: 4, transient: true }),
                ]);
            });

            it('falls back to max_retries once the transient budget is spent', async () => {
                const completion = new ScriptedCompletionClient([transient(), transient(), transient(), transient(), transient(), 'late']);
                const { engine } = createHarness(ASK('retry'), { completion });
                const { id } = await engine.create('ask');

                const result = await engine.start(id);

                expect(result.dialog.status).toBe(dialogStatus.FAILED);
                expect(result.dialog.error).toBe('Step "Ask": completion failed: rate limited');
                expect(result.dialog.step_results.Ask).toMatchObject({ status: 'error', attempts: 5 });
                expect(completion.requests).toHaveLength(5);
            });

            it('counts ordinary failures against max_retries', async () => {
                const completion = new ScriptedCompletionClient([new Error('bad gateway'), new Error('bad gateway'), 'late']);
                const { engine } = createHarness(ASK('retry'), { completion });
                const { id } = await engine.create('ask');

                const result = await engine.start(id);

                expect(result.dialog.status).toBe(dialogStatus.FAILED);
                expect(result.dialog.step_results.Ask).toMatchObject({ status: 'error', attempts: 2 });
                expect(completion.requests).toHaveLength(2);
            });

            it('are not retried outside the retry strategy', async () => {
                const completion = new ScriptedCompletionClient([transient(), 'late']);
                const { engine } = createHarness(ASK('fail'), { completion });
                const { id } = await engine.create('ask');

                const result = await engine.start(id);

                expect(result.dialog.status).toBe(dialogStatus.FAILED);
                expect(completion.requests).toHaveLength(1);
            });
        });

        it('records the error and moves on under continue', async () => {
            const { engine, broadcaster } = createHarness(`
dialog_templates:
  lenient:
    model: test-model
    steps:
      - name: Broken
        type: invoke
        callable: missing
        error_handling: { strategy: continue }
      - name: Done
        type: message
        role: system
        content: done
`);
            const { id } = await engine.create('lenient');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
            expect(result.dialog.error).toBeNull();
            expect(result.dialog.step_results.Broken).toMatchObject({
                status: 'error',
                error: 'Step "Broken": callable "missing" is not registered',
            });
            expect(result.dialog.step_results.Done.status).toBe('complete');
            expect(broadcaster.names(id)).toContain('step.Broken.error');
        });

        it('jumps to the fallback step', async () => {
            const { callables } = flakyCallables(5);
            const { engine } = createHarness(`
dialog_templates:
  rescue:
    model: test-model
    steps:
      - name: First
        type: message
        role: system
        content: hi
      - name: Flaky
        type: invoke
        callable: flaky
        error_handling: { strategy: fallback, fallback_step: Recover }
      - name: Skipped
        type: message
        role: system
        content: never
      - name: Recover
        type: message
        role: system
        content: recovered
`, { callables });
            const { id } = await engine.create('rescue');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
            expect(Object.keys(result.dialog.step_results)).toEqual(['First', 'Flaky', 'Recover']);
            expect(result.dialog.step_results.Flaky.status).toBe('error');
        });

        it('stops a fallback cycle at the transition limit', async () => {
            const { callables } = flakyCallables(100);
            const { engine } = createHarness(`
dialog_templates:
  loop:
    model: test-model
    steps:
      - name: A
        type: invoke
        callable: flaky
        error_handling: { strategy: fallback, fallback_step: B }
      - name: B
        type: invoke
        callable: flaky
        error_handling: { strategy: fallback, fallback_step: A }
`, { callables, engineOptions: { maxTransitions: 10 } });
            const { id } = await engine.create('loop');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.FAILED);
            expect(result.dialog.error).toBe('Exceeded 10 transitions in a single advance');
        });

        it('fails the dialog on an unresolved expression', async () => {
            const { engine } = createHarness(`
dialog_templates:
  broken:
    model: test-model
    steps:
      - name: Show
        type: message
        role: system
        content: "{{ inputs.missing }}"
`);
            const { id } = await engine.create('broken');

            const result = await engine.start(id);

            expect(result.dialog.status).toBe(dialogStatus.FAILED);
            expect(result.dialog.error).toBe('Step "Show": Unresolved reference "inputs.missing" in {{ inputs.missing }}');
        });
    });

    describe('cancel', () => {
        it('fails a waiting dialog and drops the pending step', async () => {
            const { engine, broadcaster } = createHarness(GREETING);
            const { id } = await engine.create('greeting');
            await engine.start(id);

            const result = await engine.cancel(id, 'user left');

            expect(result.dialog.status).toBe(dialogStatus.FAILED);
            expect(result.dialog.error).toBe('Cancelled: user left');
            expect(result.dialog.step_results).toEqual({});
            expect(broadcaster.names(id).slice(-1)).toEqual(['failed']);
        });

        it('refuses to cancel a dialog that has not started', async () => {
            const { engine, store } = createHarness(GREETING);
            const { id } = await engine.create('greeting');

            await expect(engine.cancel(id)).rejects.toThrow(InvalidDialogStateError);
            await expect(engine.cancel(id)).rejects.toThrow(`Cannot cancel dialog ${id} while it is pending`);
            expect((await store.load(id))?.status).toBe(dialogStatus.PENDING);
        });
    });

    it('skips disabled steps', async () => {
        const { engine } = createHarness(`
dialog_templates:
  partial:
    model: test-model
    steps:
      - name: A
        type: message
        role: system
        content: a
      - name: B
        type: message
        role: system
        content: b
        enabled: false
      - name: C
        type: message
        role: system
        content: c
`);
        const { id } = await engine.create('partial');

        const result = await engine.start(id);

        expect(Object.keys(result.dialog.step_results)).toEqual(['A', 'C']);
    });

    it('completes straight away when no step is enabled', async () => {
        const { engine, broadcaster } = createHarness(`
dialog_templates:
  empty:
    model: test-model
    steps:
      - name: Off
        type: message
        role: system
        content: off
        enabled: false
`);
        const { id } = await engine.create('empty');

        const result = await engine.start(id);

        expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
        expect(result.dialog.current_step).toBe('end');
        expect(broadcaster.names(id)).toEqual(['created', 'started', 'completed']);
    });

    it('rejects a concurrent call on the same dialog', async () => {
        const gate = deferred<string>();
        const callables = new CallableRegistry().register('slow', () => gate.promise);
        const { engine, broadcaster } = createHarness(`
dialog_templates:
  slow:
    model: test-model
    steps:
      - name: Work
        type: invoke
        callable: slow
`, { callables });
        const { id } = await engine.create('slow');

        const first = engine.start(id);
        await expect(engine.advance(id)).rejects.toThrow(ConcurrentExecutionError);
        expect(engine.isBusy(id)).toBe(true);

        gate.resolve('done');
        const result = await first;

        expect(result.dialog.status).toBe(dialogStatus.COMPLETED);
        expect(result.dialog.step_results.Work.output).toBe('done');
        expect(broadcaster.names(id)).toEqual(['created', 'started', 'step.Work.completed', 'completed']);
        expect(engine.isBusy(id)).toBe(false);
    });

    it('passes the merged step config and transcript to the completion client', async () => {
        const completion = new ScriptedCompletionClient(['Answer']);
        const { engine, transcript } = createHarness(`
dialog_templates:
  chat:
    model: base-model
    tools: [search]
    steps:
      - name: System
        type: message
        role: system
        content: Be brief.
      - name: Ask
        type: prompt
        content: "Tell me about {{ inputs.topic }}"
        config:
          model: step-model
          tools: [calc]
          tool_merge_strategy: append
`, { completion });
        const { id } = await engine.create('chat', { topic: 'tea' });

        const result = await engine.start(id);

        expect(completion.requests).toEqual([
            {
                messages: [
                    { role: 'system', content: 'Be brief.' },
                    { role: 'user', content: 'Tell me about tea' },
                ],
                model: 'step-model',
                temperature: undefined,
                max_tokens: undefined,
                tools: ['search', 'calc'],
                resources: [],
            },
        ]);
        expect(result.dialog.step_results.Ask).toMatchObject({
            status: 'complete',
            input: 'Tell me about tea',
            output: 'Answer',
            response: { text: 'Answer', model: 'step-model' },
        });
        expect((await transcript.list(id)).map((m) => [m.role, m.content])).toEqual([
            ['system', 'Be brief.'],
            ['user', 'Tell me about tea'],
            ['assistant', 'Answer'],
        ]);
    });

    it('exposes runtime values to expressions', async () => {
        const { engine } = createHarness(`
dialog_templates:
  meta:
    model: test-model
    steps:
      - name: Info
        type: message
        role: system
        content: "{{ runtime.template_name }}/{{ runtime.step }}/{{ runtime.attempt }}/{{ runtime.context.env }}/{{ config.model }}"
`, { engineOptions: { runtimeContext: { env: 'test' } } });
        const { id } = await engine.create('meta');

        const result = await engine.start(id);

        expect(result.dialog.step_results.Info.output).toEqual({ role: 'system', content: 'meta/Info/1/test/test-model' });
    });
});
