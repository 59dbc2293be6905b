import { EvaluationError } from "../errors.js";
import type { Value } from "../types/values.js";
import { tokenize, type Token } from "./lexer.js";

export type Node =
  | { type: "literal"; value: Value }
  | { type: "var"; name: string }
  | { type: "member"; object: Node; property: string }
  | { type: "index"; object: Node; index: Node }
  | { type: "unary"; op: "!" | "-"; arg: Node }
  | { type: "binary"; op: string; left: Node; right: Node }
  | { type: "logical"; op: "&&" | "||"; left: Node; right: Node }
  | { type: "cond"; test: Node; then: Node; otherwise: Node }
  | { type: "call"; name: string; args: Node[] }
  | { type: "array"; items: Node[] }
  | { type: "object"; entries: Array<[string, Node]> };

const KEYWORDS: Record<string, Value> = { true: true, false: false, null: null };

/** Strips an optional `${ ... }` wrapper. */
export function unwrap(expr: string): string {
  const t = expr.trim();
  return t.startsWith("${") && t.endsWith("}") ? t.slice(2, -1).trim() : t;
}

/** True only for a string that is one whole `${ ... }`; `${ $.a }-${ $.b }` stays literal. */
export function isTemplate(s: string): boolean {
  const t = s.trim();
  return t.startsWith("${") && t.endsWith("}") && !t.slice(2).includes("${");
}

/** Recursive-descent parser; precedence from loosest: ?:, ||, &&, ==, <, +, *, unary, postfix. */
export function parse(expression: string): Node {
  const src = unwrap(expression);
  if (!src) throw new EvaluationError("empty expression", expression);
  const tokens = tokenize(src);
  let i = 0;

  const peek = (): Token => tokens[i];
  const next = (): Token => tokens[i++];
  const is = (text: string): boolean => peek().type === "punct" && peek().text === text;
  const accept = (text: string): boolean => {
    if (!is(text)) return false;
    i++;
    return true;
  };
  const expect = (text: string): void => {
    if (!is(text)) fail(`expected '${text}'`);
    i++;
  };
  function fail(msg: string): never {
    const t = peek();
    throw new EvaluationError(`${msg} at ${t.pos}${t.type === "eof" ? " (end of input)" : ` near '${t.text}'`}`, expression);
  }

  function conditional(): Node {
    const test = or();
    if (!is("?")) return test;
    i++;
    const then = conditional();
    expect(":");
    return { type: "cond", test, then, otherwise: conditional() };
  }

  function or(): Node {
    let left = and();
    while (is("||")) { i++; left = { type: "logical", op: "||", left, right: and() }; }
    return left;
  }

  function and(): Node {
    let left = equality();
    while (is("&&")) { i++; left = { type: "logical", op: "&&", left, right: equality() }; }
    return left;
  }

  function binaryLevel(ops: readonly string[], operand: () => Node): () => Node {
    return () => {
      let left = operand();
      while (peek().type === "punct" && ops.includes(peek().text)) {
        const op = next().text;
        left = { type: "binary", op, left, right: operand() };
      }
      return left;
    };
  }

  const multiplicative = binaryLevel(["*", "/", "%"], unary);
  const additive = binaryLevel(["+", "-"], multiplicative);
  const comparison = binaryLevel(["<", "<=", ">", ">="], additive);
  const equality = binaryLevel(["==", "!="], comparison);

  function unary(): Node {
    if (is("!")) { i++; return { type: "unary", op: "!", arg: unary() }; }
    if (is("-")) { i++; return { type: "unary", op: "-", arg: unary() }; }
    return postfix(primary());
  }

  function postfix(node: Node): Node {
    for (;;) {
      if (is(".")) {
        i++;
        const t = next();
        if (t.type !== "ident") { i--; fail("expected property name"); }
        node = { type: "member", object: node, property: t.text };
      } else if (is("[")) {
        i++;
        const index = conditional();
        expect("]");
        node = { type: "index", object: node, index };
      } else {
        return node;
      }
    }
  }

  function primary(): Node {
    const t = peek();
    switch (t.type) {
      case "number":
        i++;
        return { type: "literal", value: Number(t.text) };
      case "string":
        i++;
        return { type: "literal", value: t.text };
      case "var":
        i++;
        return { type: "var", name: t.text };
      case "ident": {
        i++;
        if (Object.hasOwn(KEYWORDS, t.text)) return { type: "literal", value: KEYWORDS[t.text] };
        if (!is("(")) { i--; fail(`unknown identifier '${t.text}' (variables start with $)`); }
        i++;
        const args: Node[] = [];
        if (!is(")")) {
          do { args.push(conditional()); } while (accept(","));
        }
        expect(")");
        return { type: "call", name: t.text, args };
      }
      case "punct":
        if (t.text === "(") {
          i++;
          const inner = conditional();
          expect(")");
          return inner;
        }
        if (t.text === "[") {
          i++;
          const items: Node[] = [];
          if (!is("]")) {
            do { items.push(conditional()); } while (accept(","));
          }
          expect("]");
          return { type: "array", items };
        }
        if (t.text === "{") {
          i++;
          const entries: Array<[string, Node]> = [];
          if (!is("}")) {
            do {
              const k = next();
              if (k.type !== "ident" && k.type !== "string") { i--; fail("expected object key"); }
              expect(":");
              entries.push([k.text, conditional()]);
            } while (accept(","));
          }
          expect("}");
          return { type: "object", entries };
        }
        return fail("unexpected token");
      default:
        return fail("unexpected token");
    }
  }

  const ast = conditional();
  if (peek().type !== "eof") fail("unexpected trailing input");
  return ast;
}
