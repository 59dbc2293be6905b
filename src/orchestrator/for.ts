import { EvaluationError } from "../errors.js";
import { succeed, type Dispatcher, type TaskOutcome } from "../types/handlers.js";
import type { ForTask } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import type { WorkflowContext } from "./context.js";
import { runSequence } from "./do.js";
import type { TaskPosition } from "./position.js";

/**
 * Folds the body over the items of `for.in`. Each iteration sees the item
 * and its index as `$<each>` / `$<at>`; the body's output becomes the
 * accumulator for the next one. `while` is checked against the accumulator
 * before every iteration.
 */
export async function executeFor(dispatcher: Dispatcher, task: ForTask, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  const { conditions } = dispatcher;
  const each = task.for.each ?? "item";
  const at = task.for.at ?? "index";
  const items = conditions.evaluate(task.for.in, input, context.scope());
  if (!Array.isArray(items)) {
    throw new EvaluationError(`for.in must evaluate to an array, got ${items === null ? "null" : typeof items}`, task.for.in);
  }

  let acc = task.for.initial === undefined ? input : conditions.render(task.for.initial, input, context.scope());
  let ran = 0;
  const body = position.child("do");
  for (const [index, item] of items.entries()) {
    const scoped = context.bind({ [each]: item, [at]: index });
    if (task.while !== undefined && !conditions.test(task.while, acc, scoped.scope())) break;
    const outcome = await runSequence(dispatcher, task.do, scoped, acc, body);
    if (!outcome.ok) return outcome;
    acc = outcome.output;
    ran++;
  }
  return succeed(ran === 0 ? input : acc);
}
