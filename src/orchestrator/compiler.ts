import { readFile } from "node:fs/promises";
import { load } from "js-yaml";
import { ValidationError } from "../errors.js";
import type {
  Backoff, CatchDefinition, Duration, DurationObject, DoTask, EventFilter, ListenTarget, NamedTaskList, RetryPolicy,
  RunReturn, SwitchCase, TaskBase, TaskDefinition, Workflow
} from "../types/tasks.js";
import { isValueObject, toValue, type Value, type ValueObject } from "../types/values.js";

const KIND_KEYS = ["call", "set", "emit", "listen", "raise", "wait", "run", "for", "fork", "switch", "try", "do"] as const;
const RUN_RETURNS: readonly RunReturn[] = ["stdout", "stderr", "code", "all", "none"];
const BACKOFFS: readonly Backoff[] = ["constant", "linear", "exponential"];

function invalid(where: string, msg: string): never {
  throw new ValidationError(`${where || "document"}: ${msg}`);
}

function object(v: Value | undefined, where: string): ValueObject {
  if (!isValueObject(v)) invalid(where, "expected an object");
  return v;
}

function string(v: Value | undefined, where: string): string {
  if (typeof v !== "string" || v === "") invalid(where, "expected a non-empty string");
  return v;
}

function optString(v: Value | undefined, where: string): string | undefined {
  return v === undefined ? undefined : string(v, where);
}

function optNumber(v: Value | undefined, where: string): number | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== "number") invalid(where, "expected a number");
  return v;
}

function duration(v: Value | undefined, where: string): Duration {
  if (typeof v === "number" || typeof v === "string") return v;
  const o = object(v, where);
  const out: DurationObject = {};
  for (const unit of ["days", "hours", "minutes", "seconds", "milliseconds"] as const) {
    const n = optNumber(o[unit], `${where}.${unit}`);
    if (n !== undefined) out[unit] = n;
  }
  return out;
}

function stringRecord(v: Value | undefined, where: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, x] of Object.entries(object(v, where))) out[k] = string(x, `${where}.${k}`);
  return out;
}

function taskEntries(v: Value | undefined, where: string): Array<[string, Value, string]> {
  if (!Array.isArray(v)) invalid(where, "expected a list of named entries");
  return v.map((entry, i): [string, Value, string] => {
    const o = object(entry, `${where}/${i}`);
    const names = Object.keys(o);
    if (names.length !== 1) invalid(`${where}/${i}`, `expected exactly one name, got ${names.length}`);
    return [names[0], o[names[0]], `${where}/${i}/${names[0]}`];
  });
}

/** A task list is a sequence of single-key maps: `- name: { ...task }`. */
function taskList(v: Value | undefined, where: string): NamedTaskList {
  return taskEntries(v, where).map(([name, body, at]) => [name, compileTask(body, at)] as const);
}

function common(o: ValueObject, where: string): TaskBase {
  const base: TaskBase = {};
  if (o.if !== undefined) base.if = string(o.if, `${where}/if`);
  if (o.input !== undefined) base.input = { from: optString(object(o.input, `${where}/input`).from, `${where}/input/from`) };
  if (o.output !== undefined) base.output = { as: optString(object(o.output, `${where}/output`).as, `${where}/output/as`) };
  if (o.export !== undefined) base.export = stringRecord(o.export, `${where}/export`);
  if (o.timeout !== undefined) {
    const t = o.timeout;
    base.timeout = isValueObject(t) && t.after !== undefined ? duration(t.after, `${where}/timeout/after`) : duration(t, `${where}/timeout`);
  }
  return base;
}

function eventFilter(v: Value | undefined, where: string): EventFilter {
  const o = object(v, where);
  // `with` wrapper is optional
  const props = o.with === undefined ? o : object(o.with, `${where}/with`);
  return {
    type: string(props.type, `${where}/type`),
    source: optString(props.source, `${where}/source`),
    when: optString(o.when, `${where}/when`)
  };
}

function listenTarget(v: Value | undefined, where: string): ListenTarget {
  const o = object(v, where);
  const list = (x: Value | undefined, at: string): EventFilter[] => {
    if (!Array.isArray(x) || x.length === 0) invalid(at, "expected a non-empty list of event filters");
    return x.map((f, i) => eventFilter(f, `${at}/${i}`));
  };
  if (o.one !== undefined) return { one: eventFilter(o.one, `${where}/one`) };
  if (o.any !== undefined) return { any: list(o.any, `${where}/any`) };
  if (o.all !== undefined) return { all: list(o.all, `${where}/all`) };
  return invalid(where, "expected one of `one`, `any`, `all`");
}

function retryPolicy(v: Value | undefined, where: string): RetryPolicy {
  const o = object(v, where);
  // `limit: { attempt: { count } }` is accepted besides a plain number
  const rawLimit = o.limit;
  const attempt = isValueObject(rawLimit) ? rawLimit.attempt : undefined;
  const limit = isValueObject(attempt) ? attempt.count : rawLimit;
  if (typeof limit !== "number" || !Number.isInteger(limit) || limit < 0) invalid(`${where}/limit`, "expected a non-negative integer");
  const policy: RetryPolicy = { limit };
  if (o.delay !== undefined) policy.delay = duration(o.delay, `${where}/delay`);
  if (o.maxDelay !== undefined) policy.maxDelay = duration(o.maxDelay, `${where}/maxDelay`);
  if (o.backoff !== undefined) {
    // `backoff: { exponential: {} }` as well as `backoff: exponential`
    const b = isValueObject(o.backoff) ? Object.keys(o.backoff)[0] : o.backoff;
    const found = BACKOFFS.find(x => x === b);
    if (!found) invalid(`${where}/backoff`, `expected one of ${BACKOFFS.join(", ")}`);
    policy.backoff = found;
  }
  const jitter = optNumber(o.jitter, `${where}/jitter`);
  if (jitter !== undefined) {
    if (jitter < 0 || jitter > 1) invalid(`${where}/jitter`, "expected a fraction between 0 and 1");
    policy.jitter = jitter;
  }
  return policy;
}

function catchDefinition(v: Value | undefined, where: string): CatchDefinition {
  const o: ValueObject = v === undefined ? {} : object(v, where);
  const out: CatchDefinition = {};
  if (o.errors !== undefined) {
    const errors = object(o.errors, `${where}/errors`);
    if (errors.with !== undefined) {
      const w = object(errors.with, `${where}/errors/with`);
      out.errors = {
        with: {
          kind: optString(w.kind, `${where}/errors/with/kind`),
          type: optString(w.type, `${where}/errors/with/type`),
          status: optNumber(w.status, `${where}/errors/with/status`)
        }
      };
    }
  }
  out.as = optString(o.as, `${where}/as`);
  out.when = optString(o.when, `${where}/when`);
  out.exceptWhen = optString(o.exceptWhen, `${where}/exceptWhen`);
  if (o.retry !== undefined) out.retry = retryPolicy(o.retry, `${where}/retry`);
  if (o.do !== undefined) out.do = taskList(o.do, `${where}/do`);
  return out;
}

function switchCases(v: Value | undefined, where: string): Array<readonly [string, SwitchCase]> {
  return taskEntries(v, where).map(([name, body, at]) => {
    const o = object(body, at);
    if (typeof o.then === "string") invalid(`${at}/then`, "flow directives are not supported; give a task");
    return [name, { when: optString(o.when, `${at}/when`), then: compileTask(o.then, `${at}/then`) }] as const;
  });
}

/** Compiles one task body; the kind is taken from whichever kind key it carries. */
export function compileTask(v: Value | undefined, where: string = ""): TaskDefinition {
  const o = object(v, where);
  const kind = KIND_KEYS.find(k => o[k] !== undefined);
  const base = common(o, where);
  switch (kind) {
    case "call": {
      const args = o.with === undefined ? undefined : object(o.with, `${where}/with`);
      return { ...base, kind, call: string(o.call, `${where}/call`), with: args };
    }
    case "set":
      return { ...base, kind, set: o.set };
    case "emit": {
      const event = object(object(o.emit, `${where}/emit`).event, `${where}/emit/event`);
      const props = event.with === undefined ? event : object(event.with, `${where}/emit/event/with`);
      return {
        ...base,
        kind,
        emit: { event: { type: string(props.type, `${where}/emit/event/type`), source: optString(props.source, `${where}/emit/event/source`), data: props.data } }
      };
    }
    case "listen":
      return { ...base, kind, listen: { to: listenTarget(object(o.listen, `${where}/listen`).to, `${where}/listen/to`) } };
    case "raise": {
      const e = object(object(o.raise, `${where}/raise`).error, `${where}/raise/error`);
      return {
        ...base,
        kind,
        raise: {
          error: {
            type: string(e.type, `${where}/raise/error/type`),
            status: optNumber(e.status, `${where}/raise/error/status`),
            title: optString(e.title, `${where}/raise/error/title`),
            detail: optString(e.detail, `${where}/raise/error/detail`)
          }
        }
      };
    }
    case "wait":
      return { ...base, kind, wait: duration(o.wait, `${where}/wait`) };
    case "run": {
      const run = object(o.run, `${where}/run`);
      const shell = object(run.shell, `${where}/run/shell`);
      const rawArgs = shell.arguments;
      let args: string[] | undefined;
      if (rawArgs !== undefined) {
        if (!Array.isArray(rawArgs)) invalid(`${where}/run/shell/arguments`, "expected a list of strings");
        args = rawArgs.map((a, i) => string(a, `${where}/run/shell/arguments/${i}`));
      }
      const ret = run.return === undefined ? undefined : RUN_RETURNS.find(r => r === run.return);
      if (run.return !== undefined && !ret) invalid(`${where}/run/return`, `expected one of ${RUN_RETURNS.join(", ")}`);
      return {
        ...base,
        kind,
        run: {
          shell: {
            command: string(shell.command, `${where}/run/shell/command`),
            arguments: args,
            environment: shell.environment === undefined ? undefined : stringRecord(shell.environment, `${where}/run/shell/environment`)
          },
          return: ret
        }
      };
    }
    case "for": {
      const f = object(o.for, `${where}/for`);
      return {
        ...base,
        kind,
        for: { each: optString(f.each, `${where}/for/each`), in: string(f.in, `${where}/for/in`), at: optString(f.at, `${where}/for/at`), initial: f.initial },
        while: optString(o.while, `${where}/while`),
        do: taskList(o.do, `${where}/do`)
      };
    }
    case "fork": {
      const f = object(o.fork, `${where}/fork`);
      if (f.compete !== undefined && typeof f.compete !== "boolean") invalid(`${where}/fork/compete`, "expected a boolean");
      return { ...base, kind, fork: { branches: taskList(f.branches, `${where}/fork/branches`), compete: f.compete === true } };
    }
    case "switch":
      return { ...base, kind, switch: switchCases(o.switch, `${where}/switch`) };
    case "try":
      return { ...base, kind, try: taskList(o.try, `${where}/try`), catch: catchDefinition(o.catch, `${where}/catch`) };
    case "do":
      return { ...base, kind, do: taskList(o.do, `${where}/do`) };
    default:
      return invalid(where, `no task kind found (expected one of ${KIND_KEYS.join(", ")})`);
  }
}

/** Turns a parsed workflow document into the task tree the executor runs. */
export function compileWorkflow(raw: unknown): Workflow {
  const doc = object(toValue(raw), "");
  const meta = object(doc.document, "/document");
  const root: DoTask = { kind: "do", do: taskList(doc.do, "/do") };
  const variables = doc.variables === undefined ? {} : object(doc.variables, "/variables");
  return {
    document: {
      dsl: string(meta.dsl, "/document/dsl"),
      namespace: string(meta.namespace, "/document/namespace"),
      name: string(meta.name, "/document/name"),
      version: string(meta.version, "/document/version"),
      summary: optString(meta.summary, "/document/summary")
    },
    variables,
    root
  };
}

/** Parses YAML (JSON is a subset) and compiles it. */
export function loadWorkflow(text: string): Workflow {
  let parsed: unknown;
  try {
    parsed = load(text);
  } catch (e) {
    throw new ValidationError(`cannot parse workflow: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return compileWorkflow(parsed);
}

export async function readWorkflowFile(path: string): Promise<Workflow> {
  return loadWorkflow(await readFile(path, "utf8"));
}
