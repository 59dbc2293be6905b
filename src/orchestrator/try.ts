import { ExecutionError, isRetryable, type WorkflowError } from "../errors.js";
import { fail, succeed, type Dispatcher, type TaskOutcome } from "../types/handlers.js";
import type { CatchDefinition, RetryPolicy, TryTask } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import type { WorkflowContext } from "./context.js";
import { runSequence } from "./do.js";
import { sleep, toMilliseconds } from "./duration.js";
import type { TaskPosition } from "./position.js";

/** Delay before retry number `attempt` (1-based). */
export function retryDelay(policy: RetryPolicy, attempt: number, capMs: number, random: () => number = Math.random): number {
  const base = policy.delay === undefined ? 0 : toMilliseconds(policy.delay);
  let ms: number;
  switch (policy.backoff ?? "constant") {
    case "linear": ms = base * attempt; break;
    case "exponential": ms = base * 2 ** (attempt - 1); break;
    default: ms = base;
  }
  const max = policy.maxDelay === undefined ? capMs : Math.min(toMilliseconds(policy.maxDelay), capMs);
  ms = Math.min(ms, max);
  if (policy.jitter) ms -= ms * Math.min(Math.max(policy.jitter, 0), 1) * random();
  return Math.round(ms);
}

function matches(dispatcher: Dispatcher, handler: CatchDefinition, error: WorkflowError, context: WorkflowContext, input: Value): boolean {
  const filter = handler.errors?.with;
  if (filter?.kind !== undefined && filter.kind !== error.kind) return false;
  if (filter?.type !== undefined && filter.type !== error.type) return false;
  if (filter?.status !== undefined && filter.status !== error.status) return false;
  if (handler.when === undefined && handler.exceptWhen === undefined) return true;

  const scope = context.bind({ [handler.as ?? "error"]: error.toJSON() }).scope();
  if (handler.when !== undefined && !dispatcher.conditions.test(handler.when, input, scope)) return false;
  if (handler.exceptWhen !== undefined && dispatcher.conditions.test(handler.exceptWhen, input, scope)) return false;
  return true;
}

/**
 * The only recovery boundary. Errors the filter rejects propagate untouched.
 * Matching errors are retried from the original input while the policy
 * allows, then handed to the catch list with the error bound as `$<as>`.
 */
export async function executeTry(dispatcher: Dispatcher, task: TryTask, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  const handler = task.catch;
  let retries = 0;
  for (;;) {
    const outcome = await runSequence(dispatcher, task.try, context, input, position.child("try"));
    if (outcome.ok) return outcome;
    const error = outcome.error;
    if (!matches(dispatcher, handler, error, context, input)) return outcome;

    const policy = handler.retry;
    if (policy && isRetryable(error) && retries < policy.limit) {
      retries++;
      const delay = retryDelay(policy, retries, dispatcher.maxRetryDelayMs);
      dispatcher.observer.onTaskRetrying?.({ name: position.name || "root", kind: "try", position }, retries, delay, error);
      try {
        await sleep(delay, context.signal);
      } catch {
        return fail(ExecutionError.cancelled());
      }
      continue;
    }

    if (!handler.do) return retries > 0 ? fail(ExecutionError.retryExhausted(retries + 1, error)) : succeed(input);

    const bound = context.bind({ [handler.as ?? "error"]: error.toJSON() });
    const recovered = await runSequence(dispatcher, handler.do, bound, input, position.child("catch", "do"));
    if (recovered.ok) return recovered;
    recovered.error.at("catch").caught ??= error;
    return recovered;
  }
}
