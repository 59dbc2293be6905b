import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ValidationError } from '../errors.js';
import { compileTask, loadWorkflow, readWorkflowFile } from '../orchestrator/compiler.js';
import { isValueObject } from '../types/values.js';

const header = `
document:
  dsl: "1.0.0"
  namespace: tests
  name: demo
  version: "1"
`;

describe('loadWorkflow', () => {
  it('compiles named task lists in declared order, repeats included', () => {
    const wf = loadWorkflow(`${header}
variables:
  limit: 3
do:
  - first:
      set:
        a: 1
  - first:
      wait: PT1S
      timeout:
        after: PT2S
  - check:
      if: \${ $.a == 1 }
      call: lookup
      with:
        id: \${ $.a }
`);
    expect(wf.document).toEqual({ dsl: '1.0.0', namespace: 'tests', name: 'demo', version: '1' });
    expect(wf.variables).toEqual({ limit: 3 });
    expect(wf.root.do.map(([name, task]) => `${name}:${task.kind}`)).toEqual(['first:set', 'first:wait', 'check:call']);
    expect(wf.root.do[1][1].timeout).toBe('PT2S');
    expect(wf.root.do[2][1]).toEqual({ if: '${ $.a == 1 }', kind: 'call', call: 'lookup', with: { id: '${ $.a }' } });
  });

  it('reads JSON documents', () => {
    const wf = loadWorkflow('{"document":{"dsl":"1.0.0","namespace":"t","name":"j","version":"1"},"do":[{"a":{"set":1}}]}');
    expect(wf.document.name).toBe('j');
    expect(wf.root.do).toEqual([['a', { kind: 'set', set: 1 }]]);
  });

  it('keeps a __proto__ key in a set template', () => {
    const wf = loadWorkflow('{"document":{"dsl":"1.0.0","namespace":"t","name":"j","version":"1"},"do":[{"a":{"set":{"__proto__":{"x":1},"y":2}}}]}');
    const task = wf.root.do[0][1];
    const template = task.kind === 'set' ? task.set : null;
    expect(isValueObject(template) ? Object.keys(template) : null).toEqual(['__proto__', 'y']);
  });

  it('reports where the document is malformed', () => {
    expect(() => loadWorkflow('document:\n  dsl: "1"\n  namespace: t\n  version: "1"\ndo: []'))
      .toThrow('/document/name: expected a non-empty string');
    expect(() => loadWorkflow(`${header}do:\n  - a:\n      set: 1\n    b:\n      set: 2\n`))
      .toThrow('/do/0: expected exactly one name, got 2');
    expect(() => loadWorkflow(`${header}do:\n  - a:\n      bogus: 1\n`))
      .toThrow('/do/0/a: no task kind found (expected one of call, set, emit, listen, raise, wait, run, for, fork, switch, try, do)');
  });

  it('wraps YAML syntax errors', () => {
    expect(() => loadWorkflow('do: [')).toThrow(ValidationError);
    expect(() => loadWorkflow('do: [')).toThrow(/^cannot parse workflow: /);
  });

  it('loads the bundled examples', async () => {
    const order = await readWorkflowFile(fileURLToPath(new URL('../examples/order/workflow.yaml', import.meta.url)));
    expect(order.document.name).toBe('order-pipeline');
    expect(order.variables).toEqual({ currency: 'EUR' });
    expect(order.root.do.map(([name]) => name)).toEqual(['validate', 'subtotal', 'checks', 'summary']);

    const race = await readWorkflowFile(fileURLToPath(new URL('../examples/race/workflow.yaml', import.meta.url)));
    const fetch = race.root.do[0][1];
    expect(fetch.kind === 'fork' ? fetch.fork.compete : null).toBe(true);
  });
});

describe('compileTask', () => {
  it('accepts both retry limit forms and object backoff', () => {
    const task = compileTask({
      try: [{ x: { set: 1 } }],
      catch: { retry: { limit: { attempt: { count: 3 } }, backoff: { exponential: {} }, delay: { milliseconds: 5 } } }
    });
    expect(task.kind === 'try' ? task.catch.retry : null).toEqual({ limit: 3, backoff: 'exponential', delay: { milliseconds: 5 } });
  });

  it('rejects a jitter outside 0..1', () => {
    expect(() => compileTask({ try: [], catch: { retry: { limit: 1, jitter: 2 } } }))
      .toThrow('/catch/retry/jitter: expected a fraction between 0 and 1');
  });

  it('reads event filters with or without a with wrapper', () => {
    const task = compileTask({ listen: { to: { any: [{ with: { type: 'a' } }, { type: 'b', when: '$.x' }] } } });
    expect(task.kind === 'listen' ? task.listen.to : null).toEqual({ any: [{ type: 'a' }, { type: 'b', when: '$.x' }] });
  });

  it('rejects flow directives in switch cases', () => {
    expect(() => compileTask({ switch: [{ a: { then: 'exit' } }] }))
      .toThrow('/switch/0/a/then: flow directives are not supported; give a task');
  });

  it('validates run returns', () => {
    expect(() => compileTask({ run: { shell: { command: 'ls' }, return: 'everything' } }))
      .toThrow('/run/return: expected one of stdout, stderr, code, all, none');
  });
});
