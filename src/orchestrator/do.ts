import { fail, succeed, type Dispatcher, type TaskOutcome } from "../types/handlers.js";
import type { DoTask, NamedTaskList } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import type { WorkflowContext } from "./context.js";
import type { TaskPosition } from "./position.js";

/**
 * Runs a task list in order, feeding each output into the next task.
 * Stops at the first failure, naming the failing entry in its path.
 */
export async function runSequence(
  dispatcher: Dispatcher,
  list: NamedTaskList,
  context: WorkflowContext,
  input: Value,
  position: TaskPosition
): Promise<TaskOutcome> {
  let current = input;
  for (const [i, [name, task]] of list.entries()) {
    const outcome = await dispatcher.execute(task, context, current, position.child(i, name));
    if (!outcome.ok) return fail(outcome.error.at(name));
    current = outcome.output;
  }
  return succeed(current);
}

export function executeDo(dispatcher: Dispatcher, task: DoTask, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  return runSequence(dispatcher, task.do, context, input, position.child("do"));
}
