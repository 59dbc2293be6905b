import { succeed, type TaskHandler } from "../types/handlers.js";
import type { SetTask } from "../types/tasks.js";

export const setHandler: TaskHandler<SetTask> = {
  kind: "set",
  async run(task, context, input, env) {
    return succeed(env.conditions.render(task.set, input, context.scope()));
  }
};
