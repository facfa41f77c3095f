import { ParseError } from "../errors";

export type TokenType = "ident" | "number" | "string" | "char" | "punct" | "eof";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
}

// Longest first so that `<<=` wins over `<<` and `<`.
const PUNCTUATORS = [
  "<<=", ">>=",
  "->", "++", "--", "&&", "||", "==", "!=", "<=", ">=", "+=", "-=", "*=", "/=", "%=",
  "&=", "|=", "^=", "<<", ">>", "::",
  "{", "}", "(", ")", "[", "]", ";", ",", ".", "=", "+", "-", "*", "/", "%",
  "<", ">", "!", "&", "|", "^", "~", "?", ":",
];

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "0": "\0" };

/**
 * Tokenize contract source. Comments and preprocessor lines are dropped,
 * braces must balance.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const braces: number[] = [];
  let i = 0;
  let line = 1;
  let lineStart = true;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "\n") {
      line++;
      i++;
      lineStart = true;
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r" || ch === "\f" || ch === "\v") {
      i++;
      continue;
    }

    if (ch === "#" && lineStart) {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }
    lineStart = false;

    if (ch === "/" && source[i + 1] === "/") {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }
    if (ch === "/" && source[i + 1] === "*") {
      const startLine = line;
      i += 2;
      while (i < source.length && !(source[i] === "*" && source[i + 1] === "/")) {
        if (source[i] === "\n") line++;
        i++;
      }
      if (i >= source.length) {
        throw new ParseError("UnterminatedBlock", "block comment is never closed", startLine);
      }
      i += 2;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const startLine = line;
      let value = "";
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\n") {
          throw new ParseError("UnterminatedBlock", "string literal is never closed", startLine);
        }
        if (source[i] === "\\" && i + 1 < source.length) {
          const next = source[i + 1];
          value += ESCAPES[next] ?? next;
          i += 2;
          continue;
        }
        value += source[i];
        i++;
      }
      if (i >= source.length) {
        throw new ParseError("UnterminatedBlock", "string literal is never closed", startLine);
      }
      i++;
      tokens.push({ type: ch === '"' ? "string" : "char", value, line: startLine });
      continue;
    }

    if (/[0-9]/.test(ch)) {
      const match = /^(0[xX][0-9a-fA-F]+|[0-9]+)[uUlL]*/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      tokens.push({ type: "number", value: (match ? match[1] : ch), line });
      i += text.length;
      continue;
    }

    if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      tokens.push({ type: "ident", value: text, line });
      i += text.length;
      continue;
    }

    const punct = PUNCTUATORS.find((p) => source.startsWith(p, i));
    if (!punct) {
      // Stray characters never affect the dispatch shape; skip them.
      i++;
      continue;
    }
    if (punct === "{") braces.push(line);
    if (punct === "}") {
      if (braces.length === 0) {
        throw new ParseError("UnterminatedBlock", "closing brace without a matching opening brace", line);
      }
      braces.pop();
    }
    tokens.push({ type: "punct", value: punct, line });
    i += punct.length;
  }

  if (braces.length > 0) {
    throw new ParseError("UnterminatedBlock", "block is never closed", braces[braces.length - 1]);
  }

  tokens.push({ type: "eof", value: "", line });
  return tokens;
}
