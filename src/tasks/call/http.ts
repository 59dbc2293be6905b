import { ExecutionError, ValidationError } from "../../errors.js";
import type { HttpResponse } from "../../capabilities/http.js";
import type { WorkflowContext } from "../../orchestrator/context.js";
import { fail, succeed, type TaskOutcome } from "../../types/handlers.js";
import { isValueObject, toValue, type Value, type ValueObject } from "../../types/values.js";

function stringMap(v: Value | undefined): Record<string, string> {
  if (!isValueObject(v)) return {};
  const out: Record<string, string> = {};
  for (const [k, x] of Object.entries(v)) {
    if (x !== null) out[k] = typeof x === "string" ? x : JSON.stringify(x);
  }
  return out;
}

function content(res: HttpResponse): Value {
  const type = Object.entries(res.headers).find(([k]) => k.toLowerCase() === "content-type")?.[1] ?? "";
  if (!type.includes("json") || res.body === "") return res.body;
  try {
    return toValue(JSON.parse(res.body));
  } catch {
    return res.body;
  }
}

/**
 * `call: http` with `with: { method, endpoint, headers?, query?, body?, output? }`.
 * `endpoint` is a URL or `{ uri }`; `output: response` returns status and
 * headers alongside the body instead of the body alone.
 */
export async function callHttp(args: ValueObject, context: WorkflowContext): Promise<TaskOutcome> {
  const method = typeof args.method === "string" ? args.method.toUpperCase() : "GET";
  const endpoint = isValueObject(args.endpoint) ? args.endpoint.uri : args.endpoint;
  if (typeof endpoint !== "string" || endpoint === "") {
    return fail(new ValidationError("call http needs `with.endpoint` (a URL or { uri })"));
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return fail(new ValidationError(`invalid endpoint '${endpoint}'`));
  }
  for (const [k, v] of Object.entries(stringMap(args.query))) url.searchParams.set(k, v);

  const headers = stringMap(args.headers);
  let body: string | undefined;
  if (typeof args.body === "string") body = args.body;
  else if (args.body !== undefined && args.body !== null) {
    body = JSON.stringify(args.body);
    if (!Object.keys(headers).some(h => h.toLowerCase() === "content-type")) headers["content-type"] = "application/json";
  }

  const res = await context.capabilities.http.request({ method, url: url.toString(), headers, body, signal: context.signal });
  if (res.status < 200 || res.status >= 300) {
    return fail(ExecutionError.taskFailed(`${method} ${url.toString()} responded ${res.status}`, { type: "HttpError", status: res.status }));
  }
  const payload = content(res);
  if (args.output === "response") return succeed({ status: res.status, headers: res.headers, body: payload });
  return succeed(payload);
}
