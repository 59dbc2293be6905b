import type { WorkflowError } from "../errors.js";
import type { TaskKind } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import type { TaskPosition } from "./position.js";

export interface TaskEvent {
  name: string;
  kind: TaskKind;
  position: TaskPosition;
}

/** Lifecycle callbacks; every method is optional and must not throw. */
export interface ExecutionObserver {
  onTaskStarted?(e: TaskEvent, input: Value): void;
  onTaskCompleted?(e: TaskEvent, output: Value, elapsedMs: number): void;
  onTaskFaulted?(e: TaskEvent, error: WorkflowError, elapsedMs: number): void;
  onTaskSkipped?(e: TaskEvent): void;
  onTaskRetrying?(e: TaskEvent, attempt: number, delayMs: number, error: WorkflowError): void;
}

/** Fans every callback out to several observers. */
export function combineObservers(...observers: ReadonlyArray<ExecutionObserver | undefined>): ExecutionObserver {
  const list = observers.filter((o): o is ExecutionObserver => o !== undefined);
  return {
    onTaskStarted: (e, input) => list.forEach(o => o.onTaskStarted?.(e, input)),
    onTaskCompleted: (e, output, ms) => list.forEach(o => o.onTaskCompleted?.(e, output, ms)),
    onTaskFaulted: (e, error, ms) => list.forEach(o => o.onTaskFaulted?.(e, error, ms)),
    onTaskSkipped: e => list.forEach(o => o.onTaskSkipped?.(e)),
    onTaskRetrying: (e, attempt, delay, error) => list.forEach(o => o.onTaskRetrying?.(e, attempt, delay, error))
  };
}
