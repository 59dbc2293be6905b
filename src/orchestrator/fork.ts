import { asWorkflowError, ExecutionError, type WorkflowError } from "../errors.js";
import { fail, succeed, type Dispatcher, type TaskOutcome } from "../types/handlers.js";
import type { ForkTask } from "../types/tasks.js";
import { cloneValue, type Value, type ValueObject } from "../types/values.js";
import { linkedController, type WorkflowContext } from "./context.js";
import type { TaskPosition } from "./position.js";

interface Branch {
  name: string;
  context: WorkflowContext;
  controller: AbortController;
  release: () => void;
  outcome: Promise<TaskOutcome>;
}

function startBranches(dispatcher: Dispatcher, task: ForkTask, context: WorkflowContext, input: Value, position: TaskPosition): Branch[] {
  return task.fork.branches.map(([name, child], i) => {
    const { controller, release } = linkedController(context.signal);
    const branchContext = context.branch(controller.signal);
    const outcome = dispatcher.execute(child, branchContext, cloneValue(input), position.child("fork", "branches", i, name));
    return { name, context: branchContext, controller, release, outcome };
  });
}

/**
 * Runs every branch concurrently on its own copy of the input and its own
 * context overlay. Overlays are committed only on success: all of them in
 * declared order (later branches win), or just the winner under `compete`.
 */
export async function executeFork(dispatcher: Dispatcher, task: ForkTask, context: WorkflowContext, input: Value, position: TaskPosition): Promise<TaskOutcome> {
  if (task.fork.branches.length === 0) return succeed(task.fork.compete ? input : {});
  const branches = startBranches(dispatcher, task, context, input, position);
  try {
    return task.fork.compete ? await compete(branches) : await joinAll(branches);
  } finally {
    for (const b of branches) b.release();
  }
}

async function joinAll(branches: readonly Branch[]): Promise<TaskOutcome> {
  const outcomes = await Promise.all(branches.map(b => b.outcome));
  const errors: WorkflowError[] = [];
  const output: ValueObject = {};
  outcomes.forEach((o, i) => {
    const { name } = branches[i];
    if (o.ok) output[name] = o.output;
    else errors.push(o.error.at(name));
  });
  if (errors.length) return fail(ExecutionError.aggregate(errors));
  for (const b of branches) b.context.commit();
  return succeed(output);
}

async function compete(branches: readonly Branch[]): Promise<TaskOutcome> {
  try {
    const winner = await Promise.any(branches.map(async b => {
      const o = await b.outcome;
      if (!o.ok) throw o.error.at(b.name);
      return { branch: b, output: o.output };
    }));
    winner.branch.context.commit();
    for (const b of branches) {
      if (b !== winner.branch) b.controller.abort(new Error(`branch '${winner.branch.name}' won the race`));
    }
    return succeed(winner.output);
  } catch (e) {
    const errors = e instanceof AggregateError ? e.errors.map(asWorkflowError) : [asWorkflowError(e)];
    return fail(ExecutionError.aggregate(errors));
  }
}
