import type { TaskHandler } from "../../types/handlers.js";
import type { CallTask } from "../../types/tasks.js";
import { isValueObject } from "../../types/values.js";
import { callFunction } from "./function.js";
import { callHttp } from "./http.js";

export const callHandler: TaskHandler<CallTask> = {
  kind: "call",
  async run(task, context, input, env) {
    const rendered = env.conditions.render(task.with ?? {}, input, context.scope());
    const args = isValueObject(rendered) ? rendered : {};
    switch (task.call) {
      case "http":
      case "asyncapi":
        return callHttp(args, context);
      default:
        return callFunction(task.call, args, context, input);
    }
  }
};
