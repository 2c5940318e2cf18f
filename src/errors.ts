// src/errors.ts
export class CredentialError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class IoError extends CredentialError {
  readonly code: string | undefined;

  constructor(public readonly path: string, cause: unknown) {
    super(`Cannot read config file ${path}: ${describe(cause)}`, { cause });
    this.code = errnoCode(cause);
  }
}

export interface SourcePosition {
  line: number;
  column: number;
}

export class ParseError extends CredentialError {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(public readonly path: string, detail: string, position?: SourcePosition) {
    super(`Invalid TOML in config file ${path}: ${detail}`);
    this.line = position?.line;
    this.column = position?.column;
  }
}

export class MissingFieldError extends CredentialError {
  constructor(public readonly field: string) {
    super(`Missing or invalid field: ${field}`);
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
