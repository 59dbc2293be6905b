import type { Value } from "../types/values.js";

export interface FunctionCall {
  args: Readonly<Record<string, Value>>;
  input: Value;
  signal: AbortSignal;
}

/** A host-provided function invoked by `call: <name>` tasks. */
export type WorkflowFunction = (call: FunctionCall) => Promise<Value> | Value;

export type FunctionRegistry = Readonly<Record<string, WorkflowFunction>>;
