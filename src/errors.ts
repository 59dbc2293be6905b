import type { Value, ValueObject } from "./types/values.js";

export type ExecutionErrorKind = "TaskFailed" | "Cancelled" | "Timeout" | "RetryExhausted" | "AggregateFailed";
export type ErrorKind = "Validation" | "Evaluation" | ExecutionErrorKind;

export interface ErrorDetails {
  /** Domain type, e.g. the `type` of a raised error. Defaults to the kind. */
  type?: string;
  status?: number;
  cause?: unknown;
}

/**
 * Base of every error the engine reports. Errors travel as values inside a
 * TaskOutcome; `path` is the breadcrumb of task names from the root to the
 * failing task and grows as the error bubbles up through composites.
 */
export abstract class WorkflowError extends Error {
  abstract readonly kind: ErrorKind;
  readonly path: string[] = [];
  readonly status?: number;
  /** The error a catch block was handling when this one occurred. */
  caught?: WorkflowError;
  private readonly domainType?: string;

  protected constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.domainType = details.type;
    this.status = details.status;
  }

  get type(): string {
    return this.domainType ?? this.kind;
  }

  /** Prepends a task name as the error crosses a composite boundary. */
  at(name: string): this {
    this.path.unshift(name);
    return this;
  }

  breadcrumb(): string {
    const here = this.path.join(" › ") || "<root>";
    return this.caught ? `${here} (while handling ${this.caught.breadcrumb()})` : here;
  }

  toJSON(): ValueObject {
    const out: ValueObject = {
      kind: this.kind,
      type: this.type,
      message: this.message,
      path: [...this.path]
    };
    if (this.status !== undefined) out.status = this.status;
    if (this.caught) out.caught = this.caught.toJSON();
    return out;
  }
}

/** Malformed or unknown task definition. Never retried. */
export class ValidationError extends WorkflowError {
  readonly kind = "Validation" as const;

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
  }
}

/** An expression failed to parse or evaluate. Never retried. */
export class EvaluationError extends WorkflowError {
  readonly kind = "Evaluation" as const;

  constructor(message: string, readonly expression?: string, details?: ErrorDetails) {
    super(expression === undefined ? message : `${message} in \`${expression}\``, details);
  }
}

export class ExecutionError extends WorkflowError {
  readonly errors: readonly WorkflowError[];

  constructor(readonly kind: ExecutionErrorKind, message: string, details: ErrorDetails & { errors?: readonly WorkflowError[] } = {}) {
    super(message, details);
    this.errors = details.errors ?? [];
  }

  static taskFailed(message: string, details?: ErrorDetails): ExecutionError {
    return new ExecutionError("TaskFailed", message, details);
  }

  static cancelled(message = "task cancelled"): ExecutionError {
    return new ExecutionError("Cancelled", message);
  }

  static timeout(afterMs: number): ExecutionError {
    return new ExecutionError("Timeout", `timed out after ${afterMs}ms`);
  }

  static retryExhausted(attempts: number, last: WorkflowError): ExecutionError {
    return new ExecutionError("RetryExhausted", `gave up after ${attempts} attempts: ${last.message}`, { cause: last });
  }

  static aggregate(errors: readonly WorkflowError[]): ExecutionError {
    const summary = errors.map(e => `${e.path.join(" › ")}: ${e.message}`).join("; ");
    return new ExecutionError("AggregateFailed", `${errors.length} branch(es) failed: ${summary}`, { errors });
  }

  override toJSON(): ValueObject {
    const out = super.toJSON();
    if (this.errors.length) out.errors = this.errors.map((e): Value => e.toJSON());
    return out;
  }
}

export function isWorkflowError(e: unknown): e is WorkflowError {
  return e instanceof WorkflowError;
}

/** Normalises anything a handler threw into a WorkflowError. */
export function asWorkflowError(e: unknown): WorkflowError {
  if (isWorkflowError(e)) return e;
  if (e instanceof Error) return ExecutionError.taskFailed(e.message, { cause: e });
  return ExecutionError.taskFailed(String(e));
}

/** Evaluation and validation failures are deterministic; retrying them is pointless. */
export function isRetryable(e: WorkflowError): boolean {
  return e.kind !== "Validation" && e.kind !== "Evaluation";
}
