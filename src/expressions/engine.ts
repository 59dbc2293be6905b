import { EvaluationError, isWorkflowError } from "../errors.js";
import { isValueObject, setEntry, type Value, type ValueObject } from "../types/values.js";
import type { ExpressionScope } from "../orchestrator/context.js";
import { evaluateNode } from "./evaluate.js";
import { isTemplate, parse, type Node } from "./parser.js";

/**
 * Side-effect-free evaluator used for guards, predicates, collections and
 * templates. Implementations throw EvaluationError and nothing else.
 */
export interface ConditionEngine {
  evaluate(expression: string, data: Value, scope: ExpressionScope): Value;
  test(expression: string, data: Value, scope: ExpressionScope): boolean;
  /** Evaluates every `${...}` string inside a template, leaving other values as they are. */
  render(template: Value, data: Value, scope: ExpressionScope): Value;
}

export class ExpressionEngine implements ConditionEngine {
  private readonly cache = new Map<string, Node>();

  constructor(private readonly maxCacheSize: number = 1_000) {}

  compile(expression: string): Node {
    const hit = this.cache.get(expression);
    if (hit) return hit;
    const ast = parse(expression);
    if (this.cache.size >= this.maxCacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(expression, ast);
    return ast;
  }

  evaluate(expression: string, data: Value, scope: ExpressionScope): Value {
    try {
      return evaluateNode(this.compile(expression), data, scope, expression);
    } catch (e) {
      if (isWorkflowError(e)) throw e;
      // RangeError from pathological nesting and the like
      throw new EvaluationError(e instanceof Error ? e.message : String(e), expression, { cause: e });
    }
  }

  test(expression: string, data: Value, scope: ExpressionScope): boolean {
    const v = this.evaluate(expression, data, scope);
    if (typeof v !== "boolean") {
      throw new EvaluationError(`condition must be a boolean, got ${v === null ? "null" : Array.isArray(v) ? "array" : typeof v}`, expression);
    }
    return v;
  }

  render(template: Value, data: Value, scope: ExpressionScope): Value {
    if (typeof template === "string") return isTemplate(template) ? this.evaluate(template, data, scope) : template;
    if (Array.isArray(template)) return template.map(t => this.render(t, data, scope));
    if (isValueObject(template)) {
      const out: ValueObject = {};
      for (const [k, v] of Object.entries(template)) setEntry(out, k, this.render(v, data, scope));
      return out;
    }
    return template;
  }
}
