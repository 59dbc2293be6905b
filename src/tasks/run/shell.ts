import { ExecutionError } from "../../errors.js";
import { fail, succeed, type TaskHandler } from "../../types/handlers.js";
import type { RunTask } from "../../types/tasks.js";

const stripNewline = (s: string) => s.replace(/\r?\n$/, "");

/**
 * Runs a shell command. A non-zero exit fails the task unless `return` asks
 * for the exit code or the full result.
 */
export const runHandler: TaskHandler<RunTask> = {
  kind: "run",
  async run(task, context, input, env) {
    const { shell, return: want = "stdout" } = task.run;
    const scope = context.scope();
    const text = (s: string) => {
      const v = env.conditions.render(s, input, scope);
      return typeof v === "string" ? v : JSON.stringify(v);
    };
    const result = await context.capabilities.processes.run({
      command: text(shell.command),
      args: (shell.arguments ?? []).map(text),
      env: Object.fromEntries(Object.entries(shell.environment ?? {}).map(([k, v]) => [k, text(v)])),
      signal: context.signal
    });

    if (result.code !== 0 && want !== "code" && want !== "all") {
      const detail = stripNewline(result.stderr) || `exit code ${result.code}`;
      return fail(ExecutionError.taskFailed(`command failed: ${detail}`, { type: "ProcessError", status: result.code }));
    }
    switch (want) {
      case "stdout": return succeed(stripNewline(result.stdout));
      case "stderr": return succeed(stripNewline(result.stderr));
      case "code": return succeed(result.code);
      case "all": return succeed({ code: result.code, stdout: result.stdout, stderr: result.stderr });
      case "none": return succeed(input);
    }
  }
};
