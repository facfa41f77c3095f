import { ParseError } from "../errors";
import type {
  ArithmeticOperator,
  CallExpression,
  ContractUnit,
  EntryFunction,
  Expression,
  FunctionBranch,
  ParseDiagnostic,
  Statement,
} from "../types";
import { tokenize, type Token } from "./lexer";
import { DEFAULT_CATALOG, classifyCallee, type PrimitiveCatalog } from "./primitives";

const TYPE_KEYWORDS = new Set([
  "bool", "char", "int", "long", "short", "unsigned", "signed", "float", "double",
  "void", "const", "auto", "struct", "size_t",
  "int8_t", "int16_t", "int32_t", "int64_t", "uint8_t", "uint16_t", "uint32_t", "uint64_t",
  "sint8", "sint16", "sint32", "sint64", "uint8", "uint16", "uint32", "uint64", "id",
]);

const STATEMENT_KEYWORDS = new Set([
  "if", "else", "while", "for", "do", "return", "break", "continue", "switch",
]);

const BINARY_PRECEDENCE: Record<string, number> = {
  "||": 1,
  "&&": 2,
  "|": 3,
  "^": 4,
  "&": 5,
  "==": 6, "!=": 6,
  "<": 7, ">": 7, "<=": 7, ">=": 7,
  "<<": 8, ">>": 8,
  "+": 9, "-": 9,
  "*": 10, "/": 10, "%": 10,
};

const COMPOUND_OPERATORS: Record<string, ArithmeticOperator> = {
  "+=": "add",
  "-=": "sub",
  "*=": "mul",
};

/**
 * Parse contract source into a `ContractUnit`.
 *
 * Throws `ParseError` when braces do not balance or no entry function can be
 * identified. Unknown callees are kept as `unknown` primitives.
 */
export function parseContract(
  source: string,
  catalog: PrimitiveCatalog = DEFAULT_CATALOG
): ContractUnit {
  const tokens = tokenize(source);
  const entrySpan = findEntryFunction(tokens);
  const parser = new BodyParser(tokens, entrySpan.bodyStart, entrySpan.bodyEnd, catalog);
  const body = parser.parseStatements();

  const diagnostics: ParseDiagnostic[] = [];
  const { branches, topLevel } = extractBranches(body, entrySpan.entry.paramName, diagnostics);

  for (const [callee, line] of parser.unknownCallees) {
    diagnostics.push({
      code: "UNKNOWN_PRIMITIVE",
      message: `'${callee}' is not a known primitive; calls to it are analyzed as opaque`,
      line,
    });
  }

  return deepFreeze({ source, entry: entrySpan.entry, branches, topLevel, diagnostics });
}

// ── Entry function discovery ──

interface EntrySpan {
  entry: EntryFunction;
  /** Index of the first token after `{`. */
  bodyStart: number;
  /** Index of the matching `}`. */
  bodyEnd: number;
}

function findEntryFunction(tokens: Token[]): EntrySpan {
  const candidates: EntrySpan[] = [];
  let depth = 0;
  let declStart = 0;

  for (let i = 0; i < tokens.length; i++) {
    const tok = tokens[i];
    if (tok.type === "punct" && tok.value === "{") {
      depth++;
      continue;
    }
    if (tok.type === "punct" && tok.value === "}") {
      depth--;
      if (depth === 0) declStart = i + 1;
      continue;
    }
    if (depth !== 0) continue;
    if (tok.type === "punct" && tok.value === ";") {
      declStart = i + 1;
      continue;
    }

    const next = tokens[i + 1];
    if (tok.type !== "ident" || next.type !== "punct" || next.value !== "(") continue;

    const close = matchParen(tokens, i + 1);
    const open = tokens[close + 1];
    if (close < 0 || open.type !== "punct" || open.value !== "{") continue;

    const returnType = joinType(tokens.slice(declStart, i));
    const params = splitParams(tokens.slice(i + 2, close));
    const bodyEnd = matchBrace(tokens, close + 1);

    if (returnType && returnType !== "void" && params.length === 1) {
      const param = params[0];
      const paramName = param[param.length - 1];
      const paramType = joinType(param.slice(0, -1));
      if (paramName?.type === "ident" && paramType && paramType !== "void") {
        candidates.push({
          entry: { name: tok.value, returnType, paramType, paramName: paramName.value, line: tok.line },
          bodyStart: close + 2,
          bodyEnd,
        });
      }
    }

    // Skip the function body; declarations resume after it.
    i = bodyEnd;
    declStart = bodyEnd + 1;
  }

  if (candidates.length === 1) return candidates[0];
  const main = candidates.filter((c) => c.entry.name === "main");
  if (main.length === 1) return main[0];

  if (candidates.length === 0) {
    throw new ParseError(
      "MalformedDispatch",
      "no entry function taking an input record and returning an output record",
      1
    );
  }
  throw new ParseError(
    "MalformedDispatch",
    `ambiguous entry function: ${candidates.map((c) => c.entry.name).join(", ")}`,
    candidates[1].entry.line
  );
}

function matchParen(tokens: Token[], openIdx: number): number {
  let depth = 0;
  for (let i = openIdx; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.type !== "punct") continue;
    if (t.value === "(") depth++;
    if (t.value === ")") {
      depth--;
      if (depth === 0) return i;
    }
    if (t.value === "{" || t.value === ";") return -1;
  }
  return -1;
}

function matchBrace(tokens: Token[], openIdx: number): number {
  let depth = 0;
  for (let i = openIdx; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.type !== "punct") continue;
    if (t.value === "{") depth++;
    if (t.value === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  // tokenize() guarantees balanced braces.
  return tokens.length - 1;
}

function splitParams(tokens: Token[]): Token[][] {
  if (tokens.length === 0) return [];
  const params: Token[][] = [[]];
  for (const t of tokens) {
    if (t.type === "punct" && t.value === ",") params.push([]);
    else params[params.length - 1].push(t);
  }
  return params;
}

function joinType(tokens: Token[]): string {
  return tokens
    .filter((t) => t.type === "ident" || (t.type === "punct" && (t.value === "*" || t.value === "&")))
    .map((t) => t.value)
    .join(" ")
    .replace(/ \*/g, "*")
    .replace(/ &/g, "&");
}

// ── Statement / expression parser ──

class BodyParser {
  private pos: number;
  readonly unknownCallees = new Map<string, number>();

  constructor(
    private readonly tokens: Token[],
    start: number,
    private readonly end: number,
    private readonly catalog: PrimitiveCatalog
  ) {
    this.pos = start;
  }

  parseStatements(): Statement[] {
    const out: Statement[] = [];
    while (this.pos < this.end) out.push(...this.parseStatement());
    return out;
  }

  private peek(offset = 0): Token {
    const idx = Math.min(this.pos + offset, this.end);
    return idx >= this.end ? { type: "eof", value: "", line: this.tokens[this.end].line } : this.tokens[idx];
  }

  private next(): Token {
    const tok = this.peek();
    if (this.pos < this.end) this.pos++;
    return tok;
  }

  private isPunct(value: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t.type === "punct" && t.value === value;
  }

  private isWord(value: string): boolean {
    const t = this.peek();
    return t.type === "ident" && t.value === value;
  }

  private expect(value: string): Token {
    const t = this.next();
    if (t.type !== "punct" || t.value !== value) {
      throw new ParseError(
        "MalformedDispatch",
        `expected '${value}' but found '${t.value || "end of body"}'`,
        t.line
      );
    }
    return t;
  }

  private parseStatement(): Statement[] {
    const tok = this.peek();

    if (tok.type === "punct" && tok.value === "{") return this.parseBlock();
    if (tok.type === "punct" && tok.value === ";") {
      this.next();
      return [];
    }

    if (tok.type === "ident") {
      switch (tok.value) {
        case "if":
          return [this.parseIf()];
        case "while":
          return [this.parseWhile()];
        case "for":
          return this.parseFor();
        case "do":
          return [this.parseDoWhile()];
        case "return": {
          this.next();
          const value = this.isPunct(";") ? undefined : this.parseExpression();
          this.expect(";");
          return [{ kind: "return", value, line: tok.line }];
        }
        case "break":
        case "continue":
          this.next();
          this.expect(";");
          return [];
        case "switch":
          throw new ParseError("MalformedDispatch", "switch statements are not supported", tok.line);
      }
    }

    const declaration = this.tryParseDeclaration();
    if (declaration) return declaration;

    const stmts = this.parseSimpleStatement();
    this.expect(";");
    return stmts;
  }

  private parseBlock(): Statement[] {
    this.expect("{");
    const out: Statement[] = [];
    while (!this.isPunct("}")) {
      if (this.peek().type === "eof") {
        throw new ParseError("UnterminatedBlock", "block is never closed", this.peek().line);
      }
      out.push(...this.parseStatement());
    }
    this.expect("}");
    return out;
  }

  private parseIf(): Statement {
    const line = this.next().line;
    this.expect("(");
    const condition = this.parseExpression();
    this.expect(")");
    const thenBody = this.parseStatement();
    let elseBody: Statement[] = [];
    if (this.isWord("else")) {
      this.next();
      elseBody = this.parseStatement();
    }
    return { kind: "conditional", condition, then: thenBody, else: elseBody, loop: false, line };
  }

  private parseWhile(): Statement {
    const line = this.next().line;
    this.expect("(");
    const condition = this.parseExpression();
    this.expect(")");
    const body = this.parseStatement();
    return { kind: "conditional", condition, then: body, else: [], loop: true, line };
  }

  private parseDoWhile(): Statement {
    const line = this.next().line;
    const body = this.parseStatement();
    if (!this.isWord("while")) {
      throw new ParseError("MalformedDispatch", "do block without a while condition", this.peek().line);
    }
    this.next();
    this.expect("(");
    const condition = this.parseExpression();
    this.expect(")");
    this.expect(";");
    return { kind: "conditional", condition, then: body, else: [], loop: true, line };
  }

  private parseFor(): Statement[] {
    const line = this.next().line;
    this.expect("(");
    let init: Statement[] = [];
    if (this.isPunct(";")) this.next();
    else init = this.tryParseDeclaration() ?? this.parseSimpleStatementThen(";");
    const condition: Expression = this.isPunct(";")
      ? { kind: "literal", type: "bool", value: "true", line }
      : this.parseExpression();
    this.expect(";");
    const update = this.isPunct(")") ? [] : this.parseSimpleStatement();
    this.expect(")");
    const body = this.parseStatement();
    return [...init, { kind: "conditional", condition, then: [...body, ...update], else: [], loop: true, line }];
  }

  private parseSimpleStatementThen(terminator: string): Statement[] {
    const stmts = this.parseSimpleStatement();
    this.expect(terminator);
    return stmts;
  }

  /** Declarations such as `long long x = 1, y;` or `char* text = ...;`. */
  private tryParseDeclaration(): Statement[] | null {
    const start = this.pos;
    const typeWords: string[] = [];

    while (this.peek().type === "ident" && !STATEMENT_KEYWORDS.has(this.peek().value)) {
      const word = this.peek().value;
      const after = this.peek(1);
      const followedByName = after.type === "ident" || (after.type === "punct" && (after.value === "*" || after.value === "&"));
      if (TYPE_KEYWORDS.has(word) || followedByName) {
        typeWords.push(word);
        this.next();
        while (this.isPunct("*") || this.isPunct("&")) typeWords.push(this.next().value);
      } else {
        break;
      }
    }

    const nameTok = this.peek();
    const after = this.peek(1);
    const declaratorFollows =
      nameTok.type === "ident" &&
      after.type === "punct" &&
      ["=", ";", ",", "["].includes(after.value);

    if (typeWords.length === 0 || !declaratorFollows) {
      this.pos = start;
      return null;
    }

    const declaredType = typeWords.join(" ").replace(/ \*/g, "*").replace(/ &/g, "&");
    const out: Statement[] = [];
    for (;;) {
      while (this.isPunct("*")) this.next();
      const name = this.next();
      if (name.type !== "ident") {
        throw new ParseError("MalformedDispatch", `expected a variable name after '${declaredType}'`, name.line);
      }
      while (this.isPunct("[")) {
        this.next();
        if (!this.isPunct("]")) this.parseExpression();
        this.expect("]");
      }
      const target: Expression = { kind: "identifier", name: name.value, line: name.line };
      let value: Expression | undefined;
      if (this.isPunct("=")) {
        this.next();
        value = this.parseExpression();
      }
      out.push({ kind: "assignment", target, declaredType, value, line: name.line });
      if (!this.isPunct(",")) break;
      this.next();
    }
    this.expect(";");
    return out;
  }

  /** Assignment, increment or bare call, without the terminating `;`. */
  private parseSimpleStatement(): Statement[] {
    const line = this.peek().line;

    if (this.isPunct("++") || this.isPunct("--")) {
      const operator: ArithmeticOperator = this.next().value === "++" ? "add" : "sub";
      const target = this.parseUnary();
      return [{ kind: "assignment", target, operator, value: intLiteral("1", line), line }];
    }

    const expr = this.parseExpression();
    const tok = this.peek();

    if (tok.type === "punct") {
      if (tok.value === "=") {
        this.next();
        return [{ kind: "assignment", target: expr, value: this.parseExpression(), line }];
      }
      const compound = COMPOUND_OPERATORS[tok.value];
      if (compound) {
        this.next();
        return [{ kind: "assignment", target: expr, operator: compound, value: this.parseExpression(), line }];
      }
      if (["/=", "%=", "&=", "|=", "^=", "<<=", ">>="].includes(tok.value)) {
        this.next();
        const right = this.parseExpression();
        const value: Expression = { kind: "binary", operator: tok.value.slice(0, -1), left: expr, right, line };
        return [{ kind: "assignment", target: expr, value, line }];
      }
      if (tok.value === "++" || tok.value === "--") {
        this.next();
        const operator: ArithmeticOperator = tok.value === "++" ? "add" : "sub";
        return [{ kind: "assignment", target: expr, operator, value: intLiteral("1", line), line }];
      }
    }

    return topLevelCalls(expr).map((call) => ({ kind: "call", call, line: call.line }));
  }

  parseExpression(): Expression {
    const test = this.parseBinary(1);
    if (!this.isPunct("?")) return test;
    this.next();
    const consequent = this.parseExpression();
    this.expect(":");
    const alternate = this.parseExpression();
    return { kind: "ternary", test, consequent, alternate, line: test.line };
  }

  private parseBinary(minPrecedence: number): Expression {
    let left = this.parseUnary();
    for (;;) {
      const tok = this.peek();
      const precedence = tok.type === "punct" ? BINARY_PRECEDENCE[tok.value] : undefined;
      if (precedence === undefined || precedence < minPrecedence) return left;
      this.next();
      const right = this.parseBinary(precedence + 1);
      left = { kind: "binary", operator: tok.value, left, right, line: tok.line };
    }
  }

  private parseUnary(): Expression {
    const tok = this.peek();
    if (tok.type === "punct" && ["!", "-", "+", "~", "*", "&"].includes(tok.value)) {
      this.next();
      return { kind: "unary", operator: tok.value, operand: this.parseUnary(), line: tok.line };
    }
    if (tok.type === "punct" && (tok.value === "++" || tok.value === "--")) {
      this.next();
      return { kind: "unary", operator: tok.value, operand: this.parseUnary(), line: tok.line };
    }
    if (tok.type === "ident" && tok.value === "sizeof") {
      this.next();
      const operand = this.parseUnary();
      return { kind: "call", callee: "sizeof", primitive: "unknown", args: [operand], line: tok.line };
    }
    const cast = this.tryParseCast();
    if (cast) return cast;
    return this.parsePostfix();
  }

  private tryParseCast(): Expression | null {
    if (!this.isPunct("(")) return null;
    const words: string[] = [];
    let offset = 1;
    for (;;) {
      const t = this.peek(offset);
      if (t.type === "ident" && (TYPE_KEYWORDS.has(t.value) || (this.peek(offset + 1).type === "punct" && this.peek(offset + 1).value === "*"))) {
        words.push(t.value);
        offset++;
      } else if (t.type === "punct" && t.value === "*" && words.length > 0) {
        words.push("*");
        offset++;
      } else {
        break;
      }
    }
    const close = this.peek(offset);
    if (words.length === 0 || close.type !== "punct" || close.value !== ")") return null;

    const line = this.peek().line;
    this.pos += offset + 1;
    const type = words.join(" ").replace(/ \*/g, "*");
    return { kind: "cast", type, operand: this.parseUnary(), line };
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.isPunct(".") || this.isPunct("->")) {
        this.next();
        const prop = this.next();
        if (prop.type !== "ident") {
          throw new ParseError("MalformedDispatch", "expected a member name", prop.line);
        }
        expr = { kind: "member", object: expr, property: prop.value, line: prop.line };
        continue;
      }
      if (this.isPunct("[")) {
        this.next();
        const index = this.parseExpression();
        this.expect("]");
        expr = { kind: "index", object: expr, index, line: expr.line };
        continue;
      }
      if (this.isPunct("(") && (expr.kind === "identifier" || expr.kind === "member")) {
        expr = this.parseCall(renderExpression(expr), expr.line);
        continue;
      }
      return expr;
    }
  }

  private parseCall(callee: string, line: number): CallExpression {
    this.expect("(");
    const args: Expression[] = [];
    while (!this.isPunct(")")) {
      args.push(this.parseExpression());
      if (!this.isPunct(",")) break;
      this.next();
    }
    this.expect(")");
    const name = callee.split(".").pop() ?? callee;
    const direct = classifyCallee(this.catalog, callee);
    const primitive = direct !== "unknown" ? direct : classifyCallee(this.catalog, name);
    if (primitive === "unknown" && !this.unknownCallees.has(callee)) {
      this.unknownCallees.set(callee, line);
    }
    return { kind: "call", callee, primitive, args, line };
  }

  private parsePrimary(): Expression {
    const tok = this.next();
    switch (tok.type) {
      case "number":
        return intLiteral(tok.value, tok.line);
      case "string":
        return { kind: "literal", type: "string", value: tok.value, line: tok.line };
      case "char":
        return { kind: "literal", type: "char", value: tok.value, line: tok.line };
      case "ident":
        if (tok.value === "true" || tok.value === "false") {
          return { kind: "literal", type: "bool", value: tok.value, line: tok.line };
        }
        return { kind: "identifier", name: tok.value, line: tok.line };
      case "punct":
        if (tok.value === "(") {
          const inner = this.parseExpression();
          this.expect(")");
          return inner;
        }
        break;
    }
    throw new ParseError("MalformedDispatch", `unexpected '${tok.value || "end of body"}'`, tok.line);
  }
}

function intLiteral(value: string, line: number): Expression {
  return { kind: "literal", type: "int", value, line };
}

/** Calls of an expression statement that are not arguments of another call. */
function topLevelCalls(expr: Expression): CallExpression[] {
  switch (expr.kind) {
    case "call":
      return [expr];
    case "unary":
    case "cast":
      return topLevelCalls(expr.operand);
    case "binary":
      return [...topLevelCalls(expr.left), ...topLevelCalls(expr.right)];
    case "ternary":
      return [...topLevelCalls(expr.test), ...topLevelCalls(expr.consequent), ...topLevelCalls(expr.alternate)];
    case "member":
      return topLevelCalls(expr.object);
    case "index":
      return [...topLevelCalls(expr.object), ...topLevelCalls(expr.index)];
    default:
      return [];
  }
}

// ── Dispatch extraction ──

interface DispatchMatch {
  name: string;
  guard?: Expression;
}

export function matchDispatch(condition: Expression, paramName: string): DispatchMatch | null {
  const conjuncts = flattenConjunction(condition);
  const dispatchIdx = conjuncts.findIndex((c) => dispatchLiteral(c, paramName) !== null);
  if (dispatchIdx < 0) return null;

  const name = dispatchLiteral(conjuncts[dispatchIdx], paramName);
  if (name === null) return null;
  const rest = conjuncts.filter((_, i) => i !== dispatchIdx);
  const guard = rest.reduce<Expression | undefined>(
    (acc, c) => (acc ? { kind: "binary", operator: "&&", left: acc, right: c, line: acc.line } : c),
    undefined
  );
  return { name, guard };
}

function flattenConjunction(expr: Expression): Expression[] {
  if (expr.kind === "binary" && expr.operator === "&&") {
    return [...flattenConjunction(expr.left), ...flattenConjunction(expr.right)];
  }
  return [expr];
}

function dispatchLiteral(expr: Expression, paramName: string): string | null {
  if (expr.kind !== "binary" || expr.operator !== "==") return null;
  const pairs: Array<[Expression, Expression]> = [
    [expr.left, expr.right],
    [expr.right, expr.left],
  ];
  for (const [field, literal] of pairs) {
    if (
      field.kind === "member" &&
      field.property === "functionName" &&
      field.object.kind === "identifier" &&
      field.object.name === paramName &&
      literal.kind === "literal" &&
      literal.type === "string"
    ) {
      return literal.value;
    }
  }
  return null;
}

function extractBranches(
  body: Statement[],
  paramName: string,
  diagnostics: ParseDiagnostic[]
): { branches: FunctionBranch[]; topLevel: Statement[] } {
  const branches: FunctionBranch[] = [];
  const prelude: Statement[] = [];
  const occurrences = new Map<string, number>();
  let chain = 0;

  const addBranch = (
    name: string,
    line: number,
    statements: Statement[],
    guard: Expression | undefined,
    exclusive: boolean
  ) => {
    const count = (occurrences.get(name) ?? 0) + 1;
    occurrences.set(name, count);
    const key = count === 1 ? name : `${name}#${count}`;
    if (count > 1) {
      diagnostics.push({
        code: "DUPLICATE_BRANCH",
        message: `function name "${name}" is dispatched more than once`,
        line,
        branch: key,
      });
    }
    branches.push({
      name,
      key,
      line,
      statements,
      prelude: [...prelude],
      guard,
      exclusive,
      chain,
      stateKeys: collectStateKeys(statements),
    });
  };

  for (const stmt of body) {
    const match = stmt.kind === "conditional" && !stmt.loop ? matchDispatch(stmt.condition, paramName) : null;
    if (stmt.kind !== "conditional" || !match) {
      prelude.push(stmt);
      continue;
    }

    const arms: Array<{ stmt: Extract<Statement, { kind: "conditional" }>; match: DispatchMatch }> = [];
    let node: Extract<Statement, { kind: "conditional" }> = stmt;
    let armMatch: DispatchMatch = match;
    let fallback: Statement[] = [];
    for (;;) {
      arms.push({ stmt: node, match: armMatch });
      const [only] = node.else;
      const nested = node.else.length === 1 && only.kind === "conditional" && !only.loop
        ? matchDispatch(only.condition, paramName)
        : null;
      if (only && only.kind === "conditional" && nested) {
        node = only;
        armMatch = nested;
        continue;
      }
      fallback = node.else;
      break;
    }

    const exclusive = arms.length > 1 || fallback.length > 0;
    for (const arm of arms) {
      addBranch(arm.match.name, arm.stmt.line, arm.stmt.then, arm.match.guard, exclusive);
    }
    if (fallback.length > 0) {
      addBranch("<default>", fallback[0].line, fallback, undefined, true);
    }
    chain++;
  }

  return { branches, topLevel: prelude };
}

function collectStateKeys(statements: Statement[]): string[] {
  const keys = new Set<string>();
  const visitExpr = (e: Expression | undefined): void => {
    if (!e) return;
    switch (e.kind) {
      case "call":
        if ((e.primitive === "state-read" || e.primitive === "state-write") && e.args[0]) {
          keys.add(renderExpression(e.args[0]));
        }
        e.args.forEach(visitExpr);
        break;
      case "member":
        visitExpr(e.object);
        break;
      case "index":
        visitExpr(e.object);
        visitExpr(e.index);
        break;
      case "unary":
      case "cast":
        visitExpr(e.operand);
        break;
      case "binary":
        visitExpr(e.left);
        visitExpr(e.right);
        break;
      case "ternary":
        visitExpr(e.test);
        visitExpr(e.consequent);
        visitExpr(e.alternate);
        break;
    }
  };
  const visit = (stmts: Statement[]): void => {
    for (const s of stmts) {
      switch (s.kind) {
        case "call":
          visitExpr(s.call);
          break;
        case "assignment":
          visitExpr(s.target);
          visitExpr(s.value);
          break;
        case "conditional":
          visitExpr(s.condition);
          visit(s.then);
          visit(s.else);
          break;
        case "return":
          visitExpr(s.value);
          break;
      }
    }
  };
  visit(statements);
  return [...keys].sort();
}

// ── Rendering ──

export function renderExpression(expr: Expression): string {
  switch (expr.kind) {
    case "literal":
      if (expr.type === "string") return JSON.stringify(expr.value);
      if (expr.type === "char") return `'${expr.value}'`;
      return expr.value;
    case "identifier":
      return expr.name;
    case "member":
      return `${renderExpression(expr.object)}.${expr.property}`;
    case "index":
      return `${renderExpression(expr.object)}[${renderExpression(expr.index)}]`;
    case "call":
      return `${expr.callee}(${expr.args.map(renderExpression).join(", ")})`;
    case "unary":
      return `${expr.operator}${wrap(expr.operand)}`;
    case "binary":
      return `${wrap(expr.left)} ${expr.operator} ${wrap(expr.right)}`;
    case "ternary":
      return `${wrap(expr.test)} ? ${wrap(expr.consequent)} : ${wrap(expr.alternate)}`;
    case "cast":
      return `(${expr.type})${wrap(expr.operand)}`;
  }
}

function wrap(expr: Expression): string {
  const text = renderExpression(expr);
  return expr.kind === "binary" || expr.kind === "ternary" ? `(${text})` : text;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
