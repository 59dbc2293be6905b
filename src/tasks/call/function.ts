import { ValidationError } from "../../errors.js";
import type { WorkflowContext } from "../../orchestrator/context.js";
import { fail, succeed, type TaskOutcome } from "../../types/handlers.js";
import { toValue, type Value, type ValueObject } from "../../types/values.js";

/** `call: <name>` against the host's function registry. */
export async function callFunction(name: string, args: ValueObject, context: WorkflowContext, input: Value): Promise<TaskOutcome> {
  const { functions } = context.capabilities;
  if (!Object.hasOwn(functions, name)) return fail(new ValidationError(`unknown function '${name}'`));
  const result = await functions[name]({ args, input, signal: context.signal });
  return succeed(toValue(result));
}
