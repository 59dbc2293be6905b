import { describe, it, expect } from 'vitest';
import { TaskExecutor } from '../orchestrator/executor.js';
import type { TaskDefinition } from '../types/tasks.js';
import { call, delay, errorOf, outputOf, raise, recordingObserver, seq, set, testContext, wait } from './helpers.js';

describe('TaskExecutor: dispatch', () => {
  it('runs an atomic task through its handler', async () => {
    const out = await new TaskExecutor().execute(set('${ $.x + 1 }'), testContext(), { x: 1 });
    expect(outputOf(out)).toBe(2);
  });

  it('threads data through a sequence', async () => {
    const wf = seq(
      ['step1', set({ x: '${ $.x + 1 }' })],
      ['step2', set({ x: '${ $.x * 2 }' })]
    );
    const out = await new TaskExecutor().execute(wf, testContext(), { x: 1 });
    expect(outputOf(out)).toEqual({ x: 4 });
  });

  it('converts a handler throw into TaskFailed', async () => {
    const executor = new TaskExecutor({
      handlers: {
        call: {
          kind: 'call',
          async run() { throw new Error('boom'); }
        }
      }
    });
    const err = errorOf(await executor.execute({ kind: 'call', call: 'anything' }, testContext(), null));
    expect(err.kind).toBe('TaskFailed');
    expect(err.message).toBe('boom');
  });

  it('reports an unknown kind as a validation error', async () => {
    const bogus: TaskDefinition = JSON.parse('{"kind":"bogus"}');
    const err = errorOf(await new TaskExecutor().execute(bogus, testContext(), null));
    expect(err.kind).toBe('Validation');
    expect(err.message).toBe("unknown task kind 'bogus'");
  });
});

describe('TaskExecutor: depth', () => {
  function nest(depth: number, leaf: TaskDefinition): TaskDefinition {
    let task = leaf;
    for (let i = 0; i < depth; i++) task = seq([`n${i}`, task]);
    return task;
  }

  it('runs a sequence nested 1,000 levels deep', async () => {
    const out = await new TaskExecutor().execute(nest(1000, set('${ $ + 1 }')), testContext(), 0);
    expect(outputOf(out)).toBe(1);
  });

  it('runs 5,000 levels and reports the full breadcrumb on failure', async () => {
    const err = errorOf(await new TaskExecutor().execute(nest(5000, raise('Deep')), testContext(), null));
    expect(err.path).toHaveLength(5000);
    expect(err.path[0]).toBe('n4999');
    expect(err.path[4999]).toBe('n0');
  });
});

describe('TaskExecutor: common task fields', () => {
  it('skips a task whose if is false', async () => {
    const rec = recordingObserver();
    const input = { go: false };
    const out = await new TaskExecutor({ observer: rec.observer }).execute(set('never', { if: '$.go' }), testContext(), input);
    expect(outputOf(out)).toBe(input);
    expect(rec.events).toEqual(['skipped:root']);
  });

  it('fails when if is not a boolean', async () => {
    const err = errorOf(await new TaskExecutor().execute(set(1, { if: '$.go' }), testContext(), { go: 'yes' }));
    expect(err.kind).toBe('Evaluation');
  });

  it('transforms input and output', async () => {
    const task = set('${ $ * 2 }', { input: { from: '$.n' }, output: { as: '{ doubled: $ }' } });
    const out = await new TaskExecutor().execute(task, testContext(), { n: 4 });
    expect(outputOf(out)).toEqual({ doubled: 8 });
  });

  it('exports from the transformed output into the context', async () => {
    const ctx = testContext();
    const task = set({ a: 1 }, { output: { as: '{ b: $.a + 1 }' }, export: { saved: '$.b' } });
    await new TaskExecutor().execute(task, ctx, null);
    expect(ctx.get('saved')).toBe(2);
  });

  it('times a task out', async () => {
    const started = Date.now();
    const err = errorOf(await new TaskExecutor().execute(wait(1000, { timeout: 20 }), testContext(), null));
    expect(err.kind).toBe('Timeout');
    expect(err.message).toBe('timed out after 20ms');
    expect(Date.now() - started).toBeLessThan(500);
  });
});

describe('TaskExecutor: cancellation', () => {
  it('refuses to start once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const err = errorOf(await new TaskExecutor().execute(set(1), testContext({ signal: controller.signal }), null));
    expect(err.kind).toBe('Cancelled');
  });

  it('discards the result of a handler that finishes after its ancestor timed out', async () => {
    const ctx = testContext({
      capabilities: { functions: { slow: () => delay(40).then(() => 'late') } }
    });
    const task: TaskDefinition = { ...seq(['slow', call('slow', undefined, { export: { leaked: '$' } })]), timeout: 10 };
    const err = errorOf(await new TaskExecutor().execute(task, ctx, null));
    expect(err.kind).toBe('Timeout');
    await delay(80);
    expect(ctx.get('leaked')).toBeUndefined();
  });

  it('interrupts a running wait', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const err = errorOf(await new TaskExecutor().execute(seq(['pause', wait(1000)]), testContext({ signal: controller.signal }), null));
    expect(err.kind).toBe('Cancelled');
    expect(err.path).toEqual(['pause']);
  });
});

describe('TaskExecutor: observer', () => {
  it('reports lifecycle events with positions', async () => {
    const rec = recordingObserver();
    const pointers: string[] = [];
    const executor = new TaskExecutor({
      observer: {
        ...rec.observer,
        onTaskStarted: e => {
          rec.events.push(`started:${e.name}`);
          pointers.push(e.position.toString());
        }
      }
    });
    await executor.execute(seq(['a', set(1)], ['b', raise('Nope')]), testContext(), null);
    expect(rec.events).toEqual(['started:root', 'started:a', 'completed:a', 'started:b', 'faulted:b', 'faulted:root']);
    expect(pointers).toEqual(['/', '/do/0/a', '/do/1/b']);
  });
});
