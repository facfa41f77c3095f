export type ParseErrorCode = "MalformedDispatch" | "UnterminatedBlock";

/** Source cannot be modeled. No report or ledger entry is produced. */
export class ParseError extends Error {
  readonly code: ParseErrorCode;
  readonly line: number;

  constructor(code: ParseErrorCode, message: string, line: number) {
    super(`${code} (line ${line}): ${message}`);
    this.name = "ParseError";
    this.code = code;
    this.line = line;
  }
}

export class PolicyError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid audit policy: ${issues.join("; ")}`);
    this.name = "PolicyError";
    this.issues = issues;
  }
}

/** A generator or translator failed or returned something unusable. */
export class CollaboratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollaboratorError";
  }
}

export function isParseError(err: unknown): err is ParseError {
  return err instanceof ParseError;
}
