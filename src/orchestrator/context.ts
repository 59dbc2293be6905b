import { createBlackboard, merge, overlay, read, snapshot, write, type Blackboard } from "../blackboard/index.js";
import { EventBus } from "../capabilities/events.js";
import { createFetchClient, type HttpClient } from "../capabilities/http.js";
import { createShellRunner, type ProcessRunner } from "../capabilities/process.js";
import type { FunctionRegistry } from "../capabilities/functions.js";
import type { Value } from "../types/values.js";

export interface Capabilities {
  events: EventBus;
  http: HttpClient;
  processes: ProcessRunner;
  functions: FunctionRegistry;
}

export interface ContextOptions {
  variables?: Readonly<Record<string, Value>>;
  capabilities?: Partial<Capabilities>;
  signal?: AbortSignal;
}

/** What an expression can see besides the current data. */
export interface ExpressionScope {
  /** Loop items, caught errors and other names bound by composites. */
  bindings: Readonly<Record<string, Value>>;
  /** Latest value of every context variable. */
  variables: Readonly<Record<string, Value>>;
}

/**
 * Per-run state shared by reference across the task tree. Views created by
 * `bind` and `withSignal` share the variable board; `branch` gives a fork
 * branch its own overlay that stays invisible to siblings until `commit`.
 */
export class WorkflowContext {
  private constructor(
    private readonly board: Blackboard,
    readonly capabilities: Capabilities,
    private readonly bindings: Readonly<Record<string, Value>>,
    readonly signal: AbortSignal
  ) {}

  static create(opts: ContextOptions = {}): WorkflowContext {
    const capabilities: Capabilities = {
      events: opts.capabilities?.events ?? new EventBus(),
      http: opts.capabilities?.http ?? createFetchClient(),
      processes: opts.capabilities?.processes ?? createShellRunner(),
      functions: opts.capabilities?.functions ?? {}
    };
    return new WorkflowContext(createBlackboard(opts.variables), capabilities, {}, opts.signal ?? new AbortController().signal);
  }

  get(name: string): Value | undefined {
    return read(this.board, name);
  }

  set(name: string, value: Value): void {
    write(this.board, name, value);
  }

  variables(): Record<string, Value> {
    return snapshot(this.board);
  }

  binding(name: string): Value | undefined {
    return this.bindings[name];
  }

  scope(): ExpressionScope {
    return { bindings: this.bindings, variables: this.variables() };
  }

  /** Same variables, extra bindings visible to expressions beneath this point. */
  bind(extra: Readonly<Record<string, Value>>): WorkflowContext {
    return new WorkflowContext(this.board, this.capabilities, { ...this.bindings, ...extra }, this.signal);
  }

  withSignal(signal: AbortSignal): WorkflowContext {
    return new WorkflowContext(this.board, this.capabilities, this.bindings, signal);
  }

  /** Isolated write overlay for one concurrent branch. */
  branch(signal: AbortSignal): WorkflowContext {
    return new WorkflowContext(overlay(this.board), this.capabilities, this.bindings, signal);
  }

  /** Publishes a branch's writes to the context it was branched from. */
  commit(): void {
    merge(this.board);
  }
}

/** A controller aborted together with `parent`; call `release` when the child work is over. */
export function linkedController(parent: AbortSignal): { controller: AbortController; release: () => void } {
  const controller = new AbortController();
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => {} };
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return { controller, release: () => parent.removeEventListener("abort", onAbort) };
}
