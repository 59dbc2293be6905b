import { EvaluationError } from "../errors.js";
import { isValueObject, setEntry, valueEquals, type Value, type ValueObject } from "../types/values.js";
import type { ExpressionScope } from "../orchestrator/context.js";
import type { Node } from "./parser.js";

type Builtin = (args: Value[], expr: string) => Value;

function typeName(v: Value): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

function arity(name: string, args: Value[], min: number, max: number, expr: string): void {
  if (args.length < min || args.length > max) {
    throw new EvaluationError(`${name}() takes ${min === max ? min : `${min}-${max}`} argument(s), got ${args.length}`, expr);
  }
}

function requireNumber(v: Value, what: string, expr: string): number {
  if (typeof v !== "number") throw new EvaluationError(`${what} expects a number, got ${typeName(v)}`, expr);
  return v;
}

const BUILTINS: Record<string, Builtin> = {
  len(args, expr) {
    arity("len", args, 1, 1, expr);
    const [v] = args;
    if (typeof v === "string" || Array.isArray(v)) return v.length;
    if (isValueObject(v)) return Object.keys(v).length;
    if (v === null) return 0;
    throw new EvaluationError(`len() of ${typeName(v)}`, expr);
  },
  exists(args, expr) {
    arity("exists", args, 1, 1, expr);
    return args[0] !== null;
  },
  contains(args, expr) {
    arity("contains", args, 2, 2, expr);
    const [hay, needle] = args;
    if (typeof hay === "string") return typeof needle === "string" && hay.includes(needle);
    if (Array.isArray(hay)) return hay.some(x => valueEquals(x, needle));
    if (isValueObject(hay)) return typeof needle === "string" && Object.hasOwn(hay, needle);
    if (hay === null) return false;
    throw new EvaluationError(`contains() on ${typeName(hay)}`, expr);
  },
  keys(args, expr) {
    arity("keys", args, 1, 1, expr);
    const [v] = args;
    if (isValueObject(v)) return Object.keys(v);
    if (Array.isArray(v)) return v.map((_, i) => i);
    throw new EvaluationError(`keys() of ${typeName(v)}`, expr);
  },
  values(args, expr) {
    arity("values", args, 1, 1, expr);
    const [v] = args;
    if (isValueObject(v)) return Object.values(v);
    if (Array.isArray(v)) return v;
    throw new EvaluationError(`values() of ${typeName(v)}`, expr);
  },
  range(args, expr) {
    arity("range", args, 1, 2, expr);
    const from = args.length === 2 ? requireNumber(args[0], "range()", expr) : 0;
    const to = requireNumber(args[args.length - 1], "range()", expr);
    if (to - from > 100_000) throw new EvaluationError("range() larger than 100000 items", expr);
    const out: number[] = [];
    for (let n = from; n < to; n++) out.push(n);
    return out;
  },
  string(args, expr) {
    arity("string", args, 1, 1, expr);
    const [v] = args;
    return typeof v === "string" ? v : JSON.stringify(v);
  },
  number(args, expr) {
    arity("number", args, 1, 1, expr);
    const [v] = args;
    const n = typeof v === "string" ? Number(v) : typeof v === "boolean" ? Number(v) : v;
    if (typeof n !== "number" || Number.isNaN(n)) throw new EvaluationError(`cannot convert ${JSON.stringify(v)} to a number`, expr);
    return n;
  },
  lower(args, expr) {
    arity("lower", args, 1, 1, expr);
    const [v] = args;
    if (typeof v !== "string") throw new EvaluationError(`lower() of ${typeName(v)}`, expr);
    return v.toLowerCase();
  },
  upper(args, expr) {
    arity("upper", args, 1, 1, expr);
    const [v] = args;
    if (typeof v !== "string") throw new EvaluationError(`upper() of ${typeName(v)}`, expr);
    return v.toUpperCase();
  }
};

export function isBuiltin(name: string): boolean {
  return Object.hasOwn(BUILTINS, name);
}

function lookup(name: string, data: Value, scope: ExpressionScope): Value {
  if (name === "" || name === "input") return data;
  if (name === "context") return { ...scope.variables };
  if (Object.hasOwn(scope.bindings, name)) return scope.bindings[name];
  if (Object.hasOwn(scope.variables, name)) return scope.variables[name];
  return null;
}

function member(obj: Value, key: Value, expr: string): Value {
  if (obj === null) return null;
  if (Array.isArray(obj)) {
    if (typeof key === "number") {
      const i = key < 0 ? obj.length + key : key;
      return Number.isInteger(i) && i >= 0 && i < obj.length ? obj[i] : null;
    }
    if (key === "length") return obj.length;
    throw new EvaluationError(`cannot index array with ${typeName(key)}`, expr);
  }
  if (isValueObject(obj)) {
    const k = typeof key === "number" ? String(key) : key;
    if (typeof k !== "string") throw new EvaluationError(`cannot index object with ${typeName(key)}`, expr);
    return Object.hasOwn(obj, k) ? obj[k] : null;
  }
  if (typeof obj === "string" && key === "length") return obj.length;
  return null;
}

function ordered(op: string, sign: number): boolean {
  switch (op) {
    case "<": return sign < 0;
    case "<=": return sign <= 0;
    case ">": return sign > 0;
    default: return sign >= 0;
  }
}

function compare(op: string, a: Value, b: Value, expr: string): boolean {
  if (typeof a === "number" && typeof b === "number") return ordered(op, a - b);
  if (typeof a === "string" && typeof b === "string") return ordered(op, a < b ? -1 : a > b ? 1 : 0);
  throw new EvaluationError(`cannot compare ${typeName(a)} ${op} ${typeName(b)}`, expr);
}

function arithmetic(op: string, a: Value, b: Value, expr: string): Value {
  if (op === "+") {
    if (typeof a === "number" && typeof b === "number") return a + b;
    if (typeof a === "string" || typeof b === "string") {
      if (isValueObject(a) || isValueObject(b) || Array.isArray(a) || Array.isArray(b)) {
        throw new EvaluationError(`cannot add ${typeName(a)} and ${typeName(b)}`, expr);
      }
      return `${a ?? "null"}${b ?? "null"}`;
    }
    if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
    if (isValueObject(a) && isValueObject(b)) return { ...a, ...b };
    throw new EvaluationError(`cannot add ${typeName(a)} and ${typeName(b)}`, expr);
  }
  if (typeof a !== "number" || typeof b !== "number") {
    throw new EvaluationError(`operator ${op} needs numbers, got ${typeName(a)} and ${typeName(b)}`, expr);
  }
  switch (op) {
    case "-": return a - b;
    case "*": return a * b;
    case "/":
      if (b === 0) throw new EvaluationError("division by zero", expr);
      return a / b;
    default:
      if (b === 0) throw new EvaluationError("modulo by zero", expr);
      return a % b;
  }
}

function truthy(v: Value, expr: string): boolean {
  if (typeof v !== "boolean") throw new EvaluationError(`expected a boolean operand, got ${typeName(v)}`, expr);
  return v;
}

/** Evaluates a parsed expression. Pure: reads `data` and `scope`, touches nothing else. */
export function evaluateNode(node: Node, data: Value, scope: ExpressionScope, expr: string): Value {
  const ev = (n: Node): Value => evaluateNode(n, data, scope, expr);
  switch (node.type) {
    case "literal":
      return node.value;
    case "var":
      return lookup(node.name, data, scope);
    case "member":
      return member(ev(node.object), node.property, expr);
    case "index":
      return member(ev(node.object), ev(node.index), expr);
    case "unary": {
      const v = ev(node.arg);
      if (node.op === "!") return !truthy(v, expr);
      return -requireNumber(v, "unary -", expr);
    }
    case "logical": {
      const left = truthy(ev(node.left), expr);
      if (node.op === "&&") return left ? truthy(ev(node.right), expr) : false;
      return left ? true : truthy(ev(node.right), expr);
    }
    case "binary": {
      const a = ev(node.left);
      const b = ev(node.right);
      if (node.op === "==") return valueEquals(a, b);
      if (node.op === "!=") return !valueEquals(a, b);
      if (["<", "<=", ">", ">="].includes(node.op)) return compare(node.op, a, b, expr);
      return arithmetic(node.op, a, b, expr);
    }
    case "cond":
      return truthy(ev(node.test), expr) ? ev(node.then) : ev(node.otherwise);
    case "call": {
      const fn = BUILTINS[node.name];
      if (!isBuiltin(node.name)) throw new EvaluationError(`unknown function ${node.name}()`, expr);
      return fn(node.args.map(ev), expr);
    }
    case "array":
      return node.items.map(ev);
    case "object": {
      const out: ValueObject = {};
      for (const [k, v] of node.entries) setEntry(out, k, ev(v));
      return out;
    }
  }
}
