import { succeed, type TaskHandler } from "../../types/handlers.js";
import type { EmitTask } from "../../types/tasks.js";

/** Publishes on the run's event bus; the task's output is its input. */
export const emitHandler: TaskHandler<EmitTask> = {
  kind: "emit",
  async run(task, context, input, env) {
    const { type, source, data } = task.emit.event;
    context.capabilities.events.publish({
      type,
      source: source ?? "workflow",
      data: data === undefined ? null : env.conditions.render(data, input, context.scope())
    });
    return succeed(input);
  }
};
