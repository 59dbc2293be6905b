import { eventToValue, type WorkflowEvent } from "../../capabilities/events.js";
import type { ConditionEngine } from "../../expressions/engine.js";
import { linkedController, type WorkflowContext } from "../../orchestrator/context.js";
import { succeed, type TaskHandler } from "../../types/handlers.js";
import type { EventFilter, ListenTask } from "../../types/tasks.js";

function accepts(filter: EventFilter, e: WorkflowEvent, conditions: ConditionEngine, context: WorkflowContext): boolean {
  if (e.type !== filter.type) return false;
  if (filter.source !== undefined && e.source !== filter.source) return false;
  return filter.when === undefined || conditions.test(filter.when, eventToValue(e), context.scope());
}

/**
 * Waits on the event bus. `one` and `any` resolve with the first accepted
 * event; `all` resolves with one event per filter, in filter order.
 */
export const listenHandler: TaskHandler<ListenTask> = {
  kind: "listen",
  async run(task, context, _input, env) {
    const { events } = context.capabilities;
    const to = task.listen.to;
    const match = (f: EventFilter) => (e: WorkflowEvent) => accepts(f, e, env.conditions, context);

    if ("one" in to) return succeed(eventToValue(await events.next(match(to.one), context.signal)));
    if ("any" in to) {
      const filters = to.any;
      const e = await events.next(ev => filters.some(f => match(f)(ev)), context.signal);
      return succeed(eventToValue(e));
    }

    const { controller, release } = linkedController(context.signal);
    try {
      const received = await Promise.all(to.all.map(f => events.next(match(f), controller.signal)));
      return succeed(received.map(eventToValue));
    } finally {
      // stop the remaining waits if one of them failed
      controller.abort();
      release();
    }
  }
};
