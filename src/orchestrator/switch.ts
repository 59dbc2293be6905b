import { fail, succeed, type Dispatcher, type TaskOutcome } from "../types/handlers.js";
import type { SwitchCase, SwitchTask } from "../types/tasks.js";
import type { Value } from "../types/values.js";
import type { WorkflowContext } from "./context.js";
import type { TaskPosition } from "./position.js";

/**
 * First case whose `when` holds wins; later predicates are never evaluated.
 * A case without `when` is the default. With no match and no default the
 * input passes through unchanged.
 */
export async function executeSwitch(dispatcher: Dispatcher, task: SwitchTask, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  let fallback: { index: number; name: string; kase: SwitchCase } | undefined;
  for (const [index, [name, kase]] of task.switch.entries()) {
    if (kase.when === undefined) {
      fallback ??= { index, name, kase };
      continue;
    }
    if (dispatcher.conditions.test(kase.when, input, context.scope())) {
      return runCase(dispatcher, name, kase, context, input, position.child("switch", index, name));
    }
  }
  if (!fallback) return succeed(input);
  return runCase(dispatcher, fallback.name, fallback.kase, context, input, position.child("switch", fallback.index, fallback.name));
}

async function runCase(dispatcher: Dispatcher, name: string, kase: SwitchCase, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  const outcome = await dispatcher.execute(kase.then, context, input, position);
  return outcome.ok ? outcome : fail(outcome.error.at(name));
}
