import type { Value } from "./values.js";

/** A runtime expression, optionally wrapped in `${ ... }`. */
export type Expression = string;

export type DurationObject = {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
};

/** Milliseconds, a unit object, or an ISO-8601 duration such as `PT1M30S`. */
export type Duration = number | string | DurationObject;

/** Fields every task accepts regardless of kind. */
export interface TaskBase {
  if?: Expression;
  input?: { from?: Expression };
  output?: { as?: Expression };
  /** Context variables written from the task output once it succeeds. */
  export?: Readonly<Record<string, Expression>>;
  timeout?: Duration;
}

/** Ordered (name, task) pairs; names may repeat and order is significant. */
export type NamedTaskList = ReadonlyArray<readonly [name: string, task: TaskDefinition]>;

// ---------- atomic ----------

export interface CallTask extends TaskBase {
  kind: "call";
  /** `http`, `asyncapi`, or the name of a registered function. */
  call: string;
  with?: Readonly<Record<string, Value>>;
}

export interface SetTask extends TaskBase {
  kind: "set";
  /** Template whose `${...}` strings are evaluated; the result replaces the input. */
  set: Value;
}

export interface EventTemplate {
  type: string;
  source?: string;
  data?: Value;
}

export interface EmitTask extends TaskBase {
  kind: "emit";
  emit: { event: EventTemplate };
}

export interface EventFilter {
  type: string;
  source?: string;
  /** Predicate evaluated with the candidate event as `$`. */
  when?: Expression;
}

export type ListenTarget =
  | { one: EventFilter }
  | { any: readonly EventFilter[] }
  | { all: readonly EventFilter[] };

export interface ListenTask extends TaskBase {
  kind: "listen";
  listen: { to: ListenTarget };
}

export interface RaisedError {
  type: string;
  status?: number;
  title?: string;
  detail?: Expression;
}

export interface RaiseTask extends TaskBase {
  kind: "raise";
  raise: { error: RaisedError };
}

export interface WaitTask extends TaskBase {
  kind: "wait";
  wait: Duration;
}

export type RunReturn = "stdout" | "stderr" | "code" | "all" | "none";

export interface ShellCommand {
  command: string;
  arguments?: readonly string[];
  environment?: Readonly<Record<string, string>>;
}

export interface RunTask extends TaskBase {
  kind: "run";
  run: { shell: ShellCommand; return?: RunReturn };
}

// ---------- composite ----------

export interface DoTask extends TaskBase {
  kind: "do";
  do: NamedTaskList;
}

export interface ForkTask extends TaskBase {
  kind: "fork";
  fork: { branches: NamedTaskList; compete?: boolean };
}

export interface ForTask extends TaskBase {
  kind: "for";
  for: {
    each?: string;
    in: Expression;
    at?: string;
    /** Accumulator seed template; defaults to the For input. */
    initial?: Value;
  };
  while?: Expression;
  do: NamedTaskList;
}

export interface SwitchCase {
  /** Omitted on the default case. */
  when?: Expression;
  then: TaskDefinition;
}

export interface SwitchTask extends TaskBase {
  kind: "switch";
  switch: ReadonlyArray<readonly [name: string, kase: SwitchCase]>;
}

export type Backoff = "constant" | "linear" | "exponential";

export interface RetryPolicy {
  /** Extra attempts after the first failure. */
  limit: number;
  delay?: Duration;
  backoff?: Backoff;
  maxDelay?: Duration;
  /** Fraction (0..1) of each delay randomised away. */
  jitter?: number;
}

export interface ErrorFilter {
  with?: { kind?: string; type?: string; status?: number };
}

export interface CatchDefinition {
  errors?: ErrorFilter;
  /** Binding name of the caught error, `error` when omitted. */
  as?: string;
  when?: Expression;
  exceptWhen?: Expression;
  retry?: RetryPolicy;
  do?: NamedTaskList;
}

export interface TryTask extends TaskBase {
  kind: "try";
  try: NamedTaskList;
  catch: CatchDefinition;
}

export type AtomicTask = CallTask | SetTask | EmitTask | ListenTask | RaiseTask | WaitTask | RunTask;
export type CompositeTask = DoTask | ForkTask | ForTask | SwitchTask | TryTask;
export type TaskDefinition = AtomicTask | CompositeTask;

export type AtomicKind = AtomicTask["kind"];
export type CompositeKind = CompositeTask["kind"];
export type TaskKind = TaskDefinition["kind"];

export const ATOMIC_KINDS = ["call", "set", "emit", "listen", "raise", "wait", "run"] as const satisfies readonly AtomicKind[];
export const COMPOSITE_KINDS = ["do", "fork", "for", "switch", "try"] as const satisfies readonly CompositeKind[];

export interface WorkflowDocument {
  dsl: string;
  namespace: string;
  name: string;
  version: string;
  summary?: string;
}

/** A compiled workflow: document metadata plus the root sequence. */
export interface Workflow {
  document: WorkflowDocument;
  /** Context variables seeded before the run starts. */
  variables: Readonly<Record<string, Value>>;
  root: DoTask;
}
