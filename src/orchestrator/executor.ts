import { asWorkflowError, ExecutionError, ValidationError, type WorkflowError } from "../errors.js";
import { ExpressionEngine, type ConditionEngine } from "../expressions/engine.js";
import { builtinHandlers } from "../tasks/registry.js";
import { fail, succeed, type Dispatcher, type HandlerEnv, type HandlerRegistry, type TaskHandler, type TaskOutcome } from "../types/handlers.js";
import type { AtomicTask, TaskDefinition } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import { linkedController, type WorkflowContext } from "./context.js";
import { executeDo } from "./do.js";
import { toMilliseconds } from "./duration.js";
import { executeFor } from "./for.js";
import { executeFork } from "./fork.js";
import type { ExecutionObserver, TaskEvent } from "./observer.js";
import { TaskPosition } from "./position.js";
import { executeSwitch } from "./switch.js";
import { executeTry } from "./try.js";

export interface ExecutorOptions {
  /** Overrides for individual atomic kinds; the rest use the built-in handlers. */
  handlers?: Partial<HandlerRegistry>;
  conditions?: ConditionEngine;
  observer?: ExecutionObserver;
  maxRetryDelayMs?: number;
}

function describeKind(task: unknown): string {
  if (typeof task === "object" && task !== null && "kind" in task) return `unknown task kind '${String(task.kind)}'`;
  return "task definition has no kind";
}

/**
 * Single recursive entry point. Atomic kinds go to their handler, composite
 * kinds to a combinator that calls back into `execute` for each child.
 * Never rejects: every failure comes back as `{ ok: false }`.
 */
export class TaskExecutor implements Dispatcher {
  readonly conditions: ConditionEngine;
  readonly observer: ExecutionObserver;
  readonly maxRetryDelayMs: number;
  private readonly handlers: HandlerRegistry;

  constructor(opts: ExecutorOptions = {}) {
    this.conditions = opts.conditions ?? new ExpressionEngine();
    this.observer = opts.observer ?? {};
    this.maxRetryDelayMs = opts.maxRetryDelayMs ?? 60_000;
    this.handlers = { ...builtinHandlers(), ...opts.handlers };
  }

  async execute(task: TaskDefinition, context: WorkflowContext, input: Value, position: TaskPosition = TaskPosition.root()): Promise<TaskOutcome> {
    // Yield first so every level of nesting starts on a fresh stack.
    await Promise.resolve();
    if (context.signal.aborted) return fail(ExecutionError.cancelled());

    const event: TaskEvent = { name: position.name || "root", kind: task.kind, position };
    const started = Date.now();
    const faulted = (error: WorkflowError): TaskOutcome => {
      this.observer.onTaskFaulted?.(event, error, Date.now() - started);
      return fail(error);
    };

    try {
      if (task.if !== undefined && !this.conditions.test(task.if, input, context.scope())) {
        this.observer.onTaskSkipped?.(event);
        return succeed(input);
      }
      this.observer.onTaskStarted?.(event, input);

      const data = task.input?.from === undefined ? input : this.conditions.evaluate(task.input.from, input, context.scope());
      const outcome = task.timeout === undefined
        ? await this.dispatch(task, context, data, position)
        : await this.withTimeout(toMilliseconds(task.timeout), task, context, data, position);
      if (!outcome.ok) return faulted(outcome.error);
      // a handler that ignored the signal may finish after an ancestor gave up
      if (context.signal.aborted) return faulted(ExecutionError.cancelled());

      const output = task.output?.as === undefined ? outcome.output : this.conditions.evaluate(task.output.as, outcome.output, context.scope());
      for (const [name, expr] of Object.entries(task.export ?? {})) {
        context.set(name, this.conditions.evaluate(expr, output, context.scope()));
      }
      this.observer.onTaskCompleted?.(event, output, Date.now() - started);
      return succeed(output);
    } catch (e) {
      return faulted(asWorkflowError(e));
    }
  }

  private async withTimeout(ms: number, task: TaskDefinition, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
    const { controller, release } = linkedController(context.signal);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<TaskOutcome>(resolve => {
      timer = setTimeout(() => {
        controller.abort(new Error(`timeout after ${ms}ms`));
        resolve(fail(ExecutionError.timeout(ms)));
      }, ms);
    });
    try {
      return await Promise.race([this.dispatch(task, context.withSignal(controller.signal), input, position), expired]);
    } finally {
      clearTimeout(timer);
      release();
    }
  }

  private dispatch(task: TaskDefinition, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
    const env: HandlerEnv = { conditions: this.conditions, position };
    switch (task.kind) {
      case "call": return this.atomic(this.handlers.call, task, context, input, env);
      case "set": return this.atomic(this.handlers.set, task, context, input, env);
      case "emit": return this.atomic(this.handlers.emit, task, context, input, env);
      case "listen": return this.atomic(this.handlers.listen, task, context, input, env);
      case "raise": return this.atomic(this.handlers.raise, task, context, input, env);
      case "wait": return this.atomic(this.handlers.wait, task, context, input, env);
      case "run": return this.atomic(this.handlers.run, task, context, input, env);
      case "do": return executeDo(this, task, context, input, position);
      case "fork": return executeFork(this, task, context, input, position);
      case "for": return executeFor(this, task, context, input, position);
      case "switch": return executeSwitch(this, task, context, input, position);
      case "try": return executeTry(this, task, context, input, position);
      default: {
        const unreachable: never = task;
        return Promise.resolve(fail(new ValidationError(describeKind(unreachable))));
      }
    }
  }

  private async atomic<T extends AtomicTask>(handler: TaskHandler<T>, task: T, context: WorkflowContext, input: Value, env: HandlerEnv): Promise<TaskOutcome> {
    try {
      return await handler.run(task, context, input, env);
    } catch (e) {
      // the abort reason may be shared with other tasks, so report a fresh error
      if (context.signal.aborted) return fail(ExecutionError.cancelled());
      return fail(asWorkflowError(e));
    }
  }
}
