import {
  getErrorCatalogEntry,
  getUnknownErrorCatalogEntry,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorKind,
  type LexErrorCode,
  type NumericErrorCode,
  type ParseErrorCode,
  type RuntimeErrorCode
} from './error-catalog';

export type {
  ErrorCatalogEntry,
  ErrorCode,
  ErrorKind,
  LexErrorCode,
  NumericErrorCode,
  ParseErrorCode,
  RuntimeErrorCode
} from './error-catalog';

export interface ErrorLocation {
  // Program line the error belongs to; absent for immediate-mode lines.
  line?: number;
  // 0-based column within the source text, for lex and parse errors.
  column?: number;
  // Text of the offending token.
  token?: string;
}

export abstract class BasicError extends Error {
  abstract readonly kind: ErrorKind;

  readonly code: ErrorCode;

  line: number | undefined;

  readonly column: number | undefined;

  readonly token: string | undefined;

  constructor(code: ErrorCode, detail?: string, location: ErrorLocation = {}) {
    super(detail ?? getErrorCatalogEntry(code).message);
    this.code = code;
    this.line = location.line;
    this.column = location.column;
    this.token = location.token;
  }

  // Attach the program line once the executor knows it.
  atLine(line: number | null): this {
    if (this.line === undefined && line !== null) {
      this.line = line;
    }
    return this;
  }

  toDisplayMessage(): string {
    if (this.line === undefined) {
      return this.message;
    }
    return `${this.message} IN ${this.line}`;
  }

  getCatalogEntry(): ErrorCatalogEntry {
    return getErrorCatalogEntry(this.code);
  }

  getNumericCode(): NumericErrorCode {
    return this.getCatalogEntry().numericCode;
  }

  toDisplayString(): string {
    return `${this.toDisplayMessage()} (${this.getNumericCode()})`;
  }
}

export class BasicLexError extends BasicError {
  readonly kind = 'lex';

  constructor(code: LexErrorCode, detail?: string, location?: ErrorLocation) {
    super(code, detail, location);
    this.name = 'BasicLexError';
  }
}

export class BasicParseError extends BasicError {
  readonly kind = 'parse';

  constructor(code: ParseErrorCode, detail?: string, location?: ErrorLocation) {
    super(code, detail, location);
    this.name = 'BasicParseError';
  }
}

export class BasicRuntimeError extends BasicError {
  readonly kind = 'runtime';

  constructor(code: RuntimeErrorCode, detail?: string, location?: ErrorLocation) {
    super(code, detail, location);
    this.name = 'BasicRuntimeError';
  }
}

// Common entry for turning any thrown value into display text.
export function asDisplayError(error: unknown): string {
  if (error instanceof BasicError) {
    return error.toDisplayString();
  }
  const unknownEntry = getUnknownErrorCatalogEntry();
  if (error instanceof Error) {
    const message = error.message.length > 0 ? error.message : unknownEntry.message;
    return `${message} (${unknownEntry.numericCode})`;
  }
  return `${unknownEntry.message} (${unknownEntry.numericCode})`;
}
