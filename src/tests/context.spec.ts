import { describe, it, expect } from 'vitest';
import { createBlackboard, merge, overlay, read, snapshot, write } from '../blackboard/index.js';
import { linkedController } from '../orchestrator/context.js';
import { testContext } from './helpers.js';

describe('blackboard', () => {
  it('keeps only the latest value of a key', () => {
    const bb = createBlackboard({ k: 1 });
    write(bb, 'k', 2);
    expect(read(bb, 'k')).toBe(2);
    expect(bb.entries.size).toBe(1);
  });

  it('hides overlay writes from the parent until merged', () => {
    const parent = createBlackboard({ shared: 'p' });
    const child = overlay(parent);
    write(child, 'k', 'c');
    expect(read(child, 'shared')).toBe('p');
    expect(read(parent, 'k')).toBeUndefined();

    merge(child);
    expect(read(parent, 'k')).toBe('c');
    expect(child.entries.size).toBe(0);
  });

  it('lets an overlay shadow its parent in snapshots', () => {
    const parent = createBlackboard({ k: 'a', other: 1 });
    const child = overlay(parent);
    write(child, 'k', 'b');
    expect(snapshot(child)).toEqual({ k: 'b', other: 1 });
    expect(read(child, 'nope')).toBeUndefined();
  });

  it('reads a stored null as a value, not as missing', () => {
    const child = overlay(createBlackboard({ k: 1 }));
    write(child, 'k', null);
    expect(read(child, 'k')).toBeNull();
  });
});

describe('WorkflowContext', () => {
  it('seeds variables and exposes bindings to expressions', () => {
    const ctx = testContext({ variables: { a: 1 } });
    const bound = ctx.bind({ item: 'x' });
    expect(bound.scope()).toEqual({ bindings: { item: 'x' }, variables: { a: 1 } });
    expect(ctx.binding('item')).toBeUndefined();

    bound.set('b', 2);
    expect(ctx.get('b')).toBe(2);
  });

  it('isolates branch writes until commit', () => {
    const ctx = testContext({ variables: { a: 1 } });
    const branch = ctx.branch(new AbortController().signal);
    branch.set('a', 10);
    expect(branch.get('a')).toBe(10);
    expect(ctx.get('a')).toBe(1);

    branch.commit();
    expect(ctx.get('a')).toBe(10);
  });

  it('shares variables with a view that carries another signal', () => {
    const ctx = testContext();
    const controller = new AbortController();
    const view = ctx.withSignal(controller.signal);
    view.set('k', true);
    expect(ctx.get('k')).toBe(true);
    controller.abort();
    expect(view.signal.aborted).toBe(true);
    expect(ctx.signal.aborted).toBe(false);
  });
});

describe('linkedController', () => {
  it('follows the parent until released', () => {
    const parent = new AbortController();
    const linked = linkedController(parent.signal);
    parent.abort('stop');
    expect(linked.controller.signal.aborted).toBe(true);
    expect(linked.controller.signal.reason).toBe('stop');

    const other = new AbortController();
    const released = linkedController(other.signal);
    released.release();
    other.abort();
    expect(released.controller.signal.aborted).toBe(false);
  });
});
