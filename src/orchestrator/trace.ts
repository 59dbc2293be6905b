import type { WorkflowError } from "../errors.js";
import type { TaskKind } from "../types/tasks.js";
import type { ValueObject } from "../types/values.js";
import type { ExecutionObserver, TaskEvent } from "./observer.js";

export type TaskStatus = "pending" | "running" | "retrying" | "succeeded" | "failed" | "skipped" | "cancelled";

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  // a task whose `if` fails never reaches running
  pending: ["running", "skipped", "failed", "cancelled"],
  running: ["retrying", "succeeded", "failed", "cancelled"],
  retrying: ["retrying", "running", "succeeded", "failed", "cancelled"],
  succeeded: [],
  failed: [],
  skipped: [],
  cancelled: []
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export interface TaskRecord {
  pointer: string;
  name: string;
  kind: TaskKind;
  status: TaskStatus;
  /** Retries performed by a try task; 0 for everything else. */
  retries: number;
  startedAt?: string;
  elapsedMs?: number;
  error?: ValueObject;
}

/**
 * Observer keeping one record per task execution, in start order. A task
 * that runs again (a loop body, a retried try list) gets a fresh record.
 */
export class TraceRecorder implements ExecutionObserver {
  readonly records: TaskRecord[] = [];
  private readonly latest = new Map<string, TaskRecord>();

  onTaskStarted(e: TaskEvent): void {
    const rec = this.open(e);
    this.move(rec, "running");
    rec.startedAt = new Date().toISOString();
  }

  onTaskSkipped(e: TaskEvent): void {
    this.move(this.open(e), "skipped");
  }

  onTaskRetrying(e: TaskEvent): void {
    const rec = this.current(e);
    this.move(rec, "retrying");
    rec.retries++;
  }

  onTaskCompleted(e: TaskEvent, _output: unknown, elapsedMs: number): void {
    const rec = this.current(e);
    this.move(rec, "succeeded");
    rec.elapsedMs = elapsedMs;
  }

  onTaskFaulted(e: TaskEvent, error: WorkflowError, elapsedMs: number): void {
    const rec = this.current(e);
    this.move(rec, error.kind === "Cancelled" ? "cancelled" : "failed");
    rec.elapsedMs = elapsedMs;
    rec.error = error.toJSON();
  }

  find(pointer: string): TaskRecord[] {
    return this.records.filter(r => r.pointer === pointer);
  }

  private open(e: TaskEvent): TaskRecord {
    const rec: TaskRecord = { pointer: e.position.pointer, name: e.name, kind: e.kind, status: "pending", retries: 0 };
    this.records.push(rec);
    this.latest.set(rec.pointer, rec);
    return rec;
  }

  /** The live record for this position, opening one when the task faulted before it started. */
  private current(e: TaskEvent): TaskRecord {
    const rec = this.latest.get(e.position.pointer);
    return rec && !isTerminal(rec.status) ? rec : this.open(e);
  }

  private move(rec: TaskRecord, to: TaskStatus): void {
    if (canTransition(rec.status, to)) rec.status = to;
  }
}
