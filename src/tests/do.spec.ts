import { describe, it, expect } from 'vitest';
import { TaskExecutor } from '../orchestrator/executor.js';
import type { Value } from '../types/values.js';
import { call, errorOf, outputOf, raise, seq, set, testContext } from './helpers.js';

const executor = new TaskExecutor();

describe('do', () => {
  it.each<Value>([null, 3, 'a', [1], { a: 1 }])('an empty list returns its input unchanged (%j)', async input => {
    const out = await executor.execute(seq(), testContext(), input);
    expect(outputOf(out)).toBe(input);
  });

  it('groups the same steps identically however they are nested', async () => {
    const a = set({ v: '${ $.v + 1 }' });
    const b = set({ v: '${ $.v * 3 }' });
    const c = set({ v: '${ $.v - 2 }' });
    const shapes = [
      seq(['ab', seq(['a', a], ['b', b])], ['c', c]),
      seq(['a', a], ['bc', seq(['b', b], ['c', c])]),
      seq(['a', a], ['b', b], ['c', c])
    ];
    for (const shape of shapes) {
      expect(outputOf(await executor.execute(shape, testContext(), { v: 1 }))).toEqual({ v: 4 });
    }
  });

  it('stops at the first failure and names the failing step', async () => {
    let calls = 0;
    const ctx = testContext({ capabilities: { functions: { count: () => ++calls } } });
    const wf = seq(['outer', seq(['ok', set(1)], ['broken', raise('Broken')], ['after', call('count')])]);
    const err = errorOf(await executor.execute(wf, ctx, null));
    expect(err.type).toBe('Broken');
    expect(err.path).toEqual(['outer', 'broken']);
    expect(err.breadcrumb()).toBe('outer › broken');
    expect(calls).toBe(0);
  });

  it('allows repeated names', async () => {
    const wf = seq(['step', set('${ $ + 1 }')], ['step', set('${ $ + 1 }')]);
    expect(outputOf(await executor.execute(wf, testContext(), 0))).toBe(2);
  });
});
