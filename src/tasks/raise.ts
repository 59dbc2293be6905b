import { ExecutionError } from "../errors.js";
import { fail, type TaskHandler } from "../types/handlers.js";
import type { RaiseTask } from "../types/tasks.js";

export const raiseHandler: TaskHandler<RaiseTask> = {
  kind: "raise",
  async run(task, context, input, env) {
    const { type, status, title, detail } = task.raise.error;
    let message = title ?? type;
    if (detail !== undefined) {
      const rendered = env.conditions.render(detail, input, context.scope());
      message = typeof rendered === "string" ? rendered : JSON.stringify(rendered);
    }
    return fail(ExecutionError.taskFailed(message, { type, status }));
  }
};
