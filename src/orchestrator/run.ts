import { ExecutionError, type WorkflowError } from "../errors.js";
import { fail, type TaskOutcome } from "../types/handlers.js";
import type { Workflow } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import { linkedController, WorkflowContext, type Capabilities } from "./context.js";
import { TaskExecutor, type ExecutorOptions } from "./executor.js";
import { combineObservers } from "./observer.js";
import { TaskPosition } from "./position.js";
import { TraceRecorder, type TaskRecord } from "./trace.js";

export interface RunOptions {
  workflow: Workflow;
  input?: Value;
  /** Seeded on top of the workflow's own variables. */
  variables?: Readonly<Record<string, Value>>;
  capabilities?: Partial<Capabilities>;
  executor?: ExecutorOptions;
  /** Deadline for the whole run; unset or 0 means none. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RunResult = ({ ok: true; output: Value } | { ok: false; error: WorkflowError }) & {
  /** Context variables as they stood when the run ended. */
  variables: Record<string, Value>;
  trace: readonly TaskRecord[];
  elapsedMs: number;
};

/**
 * Runs a compiled workflow's root sequence with a fresh context. A failure's
 * breadcrumb starts with the workflow name.
 */
export async function runWorkflow(opts: RunOptions): Promise<RunResult> {
  const { workflow } = opts;
  const started = Date.now();
  const { controller, release } = linkedController(opts.signal ?? new AbortController().signal);
  const context = WorkflowContext.create({
    variables: { ...workflow.variables, ...opts.variables },
    capabilities: opts.capabilities,
    signal: controller.signal
  });
  const trace = new TraceRecorder();
  const executor = new TaskExecutor({ ...opts.executor, observer: combineObservers(opts.executor?.observer, trace) });

  const running = executor.execute(workflow.root, context, opts.input ?? {}, TaskPosition.root());
  let timer: ReturnType<typeof setTimeout> | undefined;
  let outcome: TaskOutcome;
  try {
    if (opts.timeoutMs) {
      const ms = opts.timeoutMs;
      const deadline = new Promise<TaskOutcome>(resolve => {
        timer = setTimeout(() => {
          controller.abort(new Error(`run deadline of ${ms}ms passed`));
          resolve(fail(ExecutionError.timeout(ms)));
        }, ms);
      });
      outcome = await Promise.race([running, deadline]);
    } else {
      outcome = await running;
    }
  } finally {
    clearTimeout(timer);
    release();
  }

  const common = { variables: context.variables(), trace: trace.records, elapsedMs: Date.now() - started };
  if (!outcome.ok) return { ok: false, error: outcome.error.at(workflow.document.name), ...common };
  return { ok: true, output: outcome.output, ...common };
}
