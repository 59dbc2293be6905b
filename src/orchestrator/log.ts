import type { WorkflowError } from "../errors.js";
import type { Value } from "../types/values.js";
import type { ExecutionObserver, TaskEvent } from "./observer.js";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export interface ConsoleObserverOptions {
  /** Log starts, completions and skips; failures and retries are always logged. */
  logTasks?: boolean;
  write?: (line: string) => void;
}

/** Run log in the terminal: one line per task transition. */
export class ConsoleObserver implements ExecutionObserver {
  private readonly logTasks: boolean;
  private readonly write: (line: string) => void;

  constructor(opts: ConsoleObserverOptions = {}) {
    this.logTasks = opts.logTasks ?? true;
    this.write = opts.write ?? (line => console.log(line));
  }

  onTaskStarted(e: TaskEvent, _input: Value): void {
    if (this.logTasks) this.write(`${COLOR.cyan("▶ task")} ${e.name} ${COLOR.gray(`${e.kind} ${e.position}`)}`);
  }

  onTaskCompleted(e: TaskEvent, _output: Value, elapsedMs: number): void {
    if (this.logTasks) this.write(`${COLOR.green("✓ done")} ${e.name} ${COLOR.gray(`(${fmtMs(elapsedMs)})`)}`);
  }

  onTaskSkipped(e: TaskEvent): void {
    if (this.logTasks) this.write(COLOR.gray(`↷ skip ${e.name} (if was false)`));
  }

  onTaskFaulted(e: TaskEvent, error: WorkflowError, elapsedMs: number): void {
    this.write(`${COLOR.red("✗ failed")} ${e.name} ${COLOR.gray(`[${error.kind}] ${error.message} (${fmtMs(elapsedMs)})`)}`);
  }

  onTaskRetrying(e: TaskEvent, attempt: number, delayMs: number, error: WorkflowError): void {
    this.write(COLOR.yellow(`  ↻ retry ${attempt} of ${e.name} in ${fmtMs(delayMs)} after ${error.type}: ${error.message}`));
  }
}
