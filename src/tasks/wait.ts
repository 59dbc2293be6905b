import { sleep, toMilliseconds } from "../orchestrator/duration.js";
import { succeed, type TaskHandler } from "../types/handlers.js";
import type { WaitTask } from "../types/tasks.js";

export const waitHandler: TaskHandler<WaitTask> = {
  kind: "wait",
  async run(task, context, input) {
    await sleep(toMilliseconds(task.wait), context.signal);
    return succeed(input);
  }
};
