import type { HttpClient, HttpRequest, HttpResponse } from '../capabilities/http.js';
import type { ProcessRequest, ProcessResult, ProcessRunner } from '../capabilities/process.js';
import type { WorkflowError } from '../errors.js';
import { WorkflowContext, type ContextOptions } from '../orchestrator/context.js';
import type { ExecutionObserver } from '../orchestrator/observer.js';
import type { TaskOutcome } from '../types/handlers.js';
import type {
  CallTask, DoTask, ForkTask, RaiseTask, SetTask, TaskBase, TaskDefinition, WaitTask
} from '../types/tasks.js';
import type { Value } from '../types/values.js';

export type Entry = readonly [string, TaskDefinition];

export const set = (value: Value, extra: TaskBase = {}): SetTask => ({ ...extra, kind: 'set', set: value });
export const wait = (ms: number, extra: TaskBase = {}): WaitTask => ({ ...extra, kind: 'wait', wait: ms });
export const call = (name: string, args?: Record<string, Value>, extra: TaskBase = {}): CallTask => ({ ...extra, kind: 'call', call: name, with: args });
export const raise = (type: string, status?: number, detail?: string): RaiseTask => ({ kind: 'raise', raise: { error: { type, status, detail } } });
export const seq = (...entries: Entry[]): DoTask => ({ kind: 'do', do: entries });
export const fork = (branches: Entry[], compete = false): ForkTask => ({ kind: 'fork', fork: { branches, compete } });

/** Context with in-memory stand-ins for every outside capability. */
export function testContext(opts: ContextOptions = {}): WorkflowContext {
  return WorkflowContext.create({
    ...opts,
    capabilities: {
      http: fakeHttp(() => ({ status: 200, headers: {}, body: '' })).client,
      processes: fakeProcesses(() => ({ code: 0, stdout: '', stderr: '' })).runner,
      ...opts.capabilities
    }
  });
}

export function fakeHttp(respond: (req: HttpRequest) => HttpResponse): { client: HttpClient; requests: HttpRequest[] } {
  const requests: HttpRequest[] = [];
  return {
    requests,
    client: {
      async request(req) {
        requests.push(req);
        return respond(req);
      }
    }
  };
}

export function fakeProcesses(respond: (req: ProcessRequest) => ProcessResult): { runner: ProcessRunner; requests: ProcessRequest[] } {
  const requests: ProcessRequest[] = [];
  return {
    requests,
    runner: {
      async run(req) {
        requests.push(req);
        return respond(req);
      }
    }
  };
}

/** Records observer callbacks as `type:name` strings. */
export function recordingObserver(): { observer: ExecutionObserver; events: string[]; retries: Array<{ attempt: number; delayMs: number }> } {
  const events: string[] = [];
  const retries: Array<{ attempt: number; delayMs: number }> = [];
  return {
    events,
    retries,
    observer: {
      onTaskStarted: e => events.push(`started:${e.name}`),
      onTaskCompleted: e => events.push(`completed:${e.name}`),
      onTaskFaulted: e => events.push(`faulted:${e.name}`),
      onTaskSkipped: e => events.push(`skipped:${e.name}`),
      onTaskRetrying: (e, attempt, delayMs) => {
        events.push(`retrying:${e.name}`);
        retries.push({ attempt, delayMs });
      }
    }
  };
}

export function outputOf(outcome: TaskOutcome): Value {
  if (!outcome.ok) throw new Error(`expected success, got ${outcome.error.kind}: ${outcome.error.message} at ${outcome.error.breadcrumb()}`);
  return outcome.output;
}

export function errorOf(outcome: TaskOutcome): WorkflowError {
  if (outcome.ok) throw new Error(`expected failure, got ${JSON.stringify(outcome.output)}`);
  return outcome.error;
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
