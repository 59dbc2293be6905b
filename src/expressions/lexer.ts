import { EvaluationError } from "../errors.js";

export type TokenType = "number" | "string" | "ident" | "var" | "punct" | "eof";

export interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

const PUNCT = ["&&", "||", "==", "!=", "<=", ">=", "<", ">", "+", "-", "*", "/", "%", "!", "(", ")", "[", "]", "{", "}", ",", ".", ":", "?"];

export function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i];
    if (/\s/.test(c)) { i++; continue; }

    if (/[0-9]/.test(c)) {
      const m = /^\d+(\.\d+)?([eE][+-]?\d+)?/.exec(src.slice(i));
      const text = m ? m[0] : c;
      out.push({ type: "number", text, pos: i });
      i += text.length;
      continue;
    }

    if (c === "'" || c === '"') {
      let j = i + 1;
      let text = "";
      while (j < src.length && src[j] !== c) {
        if (src[j] === "\\" && j + 1 < src.length) {
          const n = src[j + 1];
          text += n === "n" ? "\n" : n === "t" ? "\t" : n;
          j += 2;
          continue;
        }
        text += src[j++];
      }
      if (j >= src.length) throw new EvaluationError(`unterminated string at ${i}`, src);
      out.push({ type: "string", text, pos: i });
      i = j + 1;
      continue;
    }

    if (c === "$") {
      const m = /^[A-Za-z_]\w*/.exec(src.slice(i + 1));
      const name = m ? m[0] : "";
      out.push({ type: "var", text: name, pos: i });
      i += 1 + name.length;
      continue;
    }

    if (/[A-Za-z_]/.test(c)) {
      const m = /^[A-Za-z_]\w*/.exec(src.slice(i));
      const text = m ? m[0] : c;
      out.push({ type: "ident", text, pos: i });
      i += text.length;
      continue;
    }

    const p = PUNCT.find(op => src.startsWith(op, i));
    if (!p) throw new EvaluationError(`unexpected character '${c}' at ${i}`, src);
    out.push({ type: "punct", text: p, pos: i });
    i += p.length;
  }
  out.push({ type: "eof", text: "", pos: src.length });
  return out;
}
