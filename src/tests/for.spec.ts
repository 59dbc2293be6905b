import { describe, it, expect } from 'vitest';
import { TaskExecutor } from '../orchestrator/executor.js';
import type { ForTask } from '../types/tasks.js';
import type { Value } from '../types/values.js';
import { errorOf, outputOf, raise, seq, set, testContext, type Entry } from './helpers.js';

const executor = new TaskExecutor();

function loop(source: string, body: Entry[], opts: { initial?: Value; while?: string; each?: string; at?: string } = {}): ForTask {
  return {
    kind: 'for',
    for: { in: source, each: opts.each, at: opts.at, initial: opts.initial },
    while: opts.while,
    do: body
  };
}

describe('for', () => {
  it('folds the body over the items', async () => {
    const task = loop('[1, 2, 3]', [['add', set('${ $ + $item }')]], { initial: 0 });
    expect(outputOf(await executor.execute(task, testContext(), null))).toBe(6);
  });

  it('binds custom item and index names', async () => {
    const task = loop("['a', 'b']", [['tag', set('${ $ + [$i + ":" + $x] }')]], { each: 'x', at: 'i', initial: [] });
    expect(outputOf(await executor.execute(task, testContext(), null))).toEqual(['0:a', '1:b']);
  });

  it('returns the original input for an empty collection', async () => {
    const input = { v: 1 };
    const task = loop('[]', [['add', set(0)]], { initial: 100 });
    expect(outputOf(await executor.execute(task, testContext(), input))).toBe(input);
  });

  it('returns the original input when the guard fails first', async () => {
    const input = { v: 1 };
    const task = loop('[1, 2]', [['add', set(0)]], { while: 'false' });
    expect(outputOf(await executor.execute(task, testContext(), input))).toBe(input);
  });

  it('stops once the guard turns false', async () => {
    const task = loop('[1, 2, 3, 4]', [['add', set('${ $ + $item }')]], { initial: 0, while: '$ < 3' });
    expect(outputOf(await executor.execute(task, testContext(), null))).toBe(3);
  });

  it('reads items from the input by default', async () => {
    const task = loop('$.items', [['concat', set('${ $ + $item }')]], { initial: '' });
    expect(outputOf(await executor.execute(task, testContext(), { items: ['x', 'y'] }))).toBe('xy');
  });

  it('requires an array', async () => {
    const err = errorOf(await executor.execute(loop('1', [['add', set(0)]]), testContext(), null));
    expect(err.kind).toBe('Evaluation');
    expect(err.message).toBe('for.in must evaluate to an array, got number in `1`');
  });

  it('names the failing body task', async () => {
    const task = loop('[1]', [['ok', set(1)], ['boom', raise('Boom')]]);
    expect(errorOf(await executor.execute(task, testContext(), null)).path).toEqual(['boom']);
  });

  it('keeps loop bindings out of later tasks', async () => {
    const wf = seq(['loop', loop('[1]', [['noop', set(1)]])], ['after', set('${ $item }')]);
    expect(outputOf(await executor.execute(wf, testContext(), null))).toBe(null);
  });
});
