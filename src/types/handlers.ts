import type { WorkflowError } from "../errors.js";
import type { ConditionEngine } from "../expressions/engine.js";
import type { WorkflowContext } from "../orchestrator/context.js";
import type { ExecutionObserver } from "../orchestrator/observer.js";
import type { TaskPosition } from "../orchestrator/position.js";
import type { AtomicTask, TaskDefinition } from "./tasks.js";
import type { Value } from "./values.js";

export type TaskOutcome =
  | { ok: true; output: Value }
  | { ok: false; error: WorkflowError };

export function succeed(output: Value): TaskOutcome {
  return { ok: true, output };
}

export function fail(error: WorkflowError): TaskOutcome {
  return { ok: false, error };
}

/** Services a handler may use besides the context. */
export interface HandlerEnv {
  conditions: ConditionEngine;
  position: TaskPosition;
}

/**
 * One implementation per atomic kind. Failures should come back as
 * `{ ok: false }`; anything thrown is converted by the executor.
 */
export interface TaskHandler<T extends AtomicTask = AtomicTask> {
  readonly kind: T["kind"];
  run(task: T, context: WorkflowContext, input: Value, env: HandlerEnv): Promise<TaskOutcome>;
}

export type HandlerRegistry = {
  readonly [K in AtomicTask["kind"]]: TaskHandler<Extract<AtomicTask, { kind: K }>>;
};

/** The recursion point combinators call back into. */
export interface Dispatcher {
  readonly conditions: ConditionEngine;
  readonly observer: ExecutionObserver;
  /** Upper bound on any single retry delay. */
  readonly maxRetryDelayMs: number;
  execute(task: TaskDefinition, context: WorkflowContext, input: Value, position?: TaskPosition): Promise<TaskOutcome>;
}
