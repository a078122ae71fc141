/**
 * TOML parse, access and lifecycle errors with line/column positions.
 */

export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

export type TomlParseErrorCode =
  | 'UnterminatedStringLiteral'
  | 'UnexpectedToken'
  | 'MaxDepthExceeded'
  | 'InputTooLarge'
  | 'DuplicateKey';

export type TomlAccessErrorCode = 'MissingKey' | 'MissingTable' | 'TypeMismatch' | 'IndexOutOfRange';

export type TomlStateErrorCode = 'UseAfterRelease' | 'AlreadyOwned';

export type TomlEncodeErrorCode = 'Unrepresentable';

export type TomlErrorCode =
  | TomlParseErrorCode
  | TomlAccessErrorCode
  | TomlStateErrorCode
  | TomlEncodeErrorCode;

type ConstructorOptions = { position?: SourcePosition; cause?: unknown };

export class TomlError extends Error {
  override readonly name: string = 'TomlError';
  readonly code: TomlErrorCode;
  readonly position?: SourcePosition;

  constructor(code: TomlErrorCode, message: string, options?: ConstructorOptions) {
    super(message);
    this.code = code;
    this.position = options?.position;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, TomlError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.position) {
      return `line ${this.position.line}, column ${this.position.column}`;
    }
    return '';
  }

  toString(): string {
    const loc = this.location;
    return loc ? `${this.message} (${loc})` : this.message;
  }
}

export class TomlParseError extends TomlError {
  override readonly name = 'TomlParseError';
  declare readonly code: TomlParseErrorCode;
  constructor(code: TomlParseErrorCode, message: string, options?: ConstructorOptions) {
    super(code, message, options);
    Object.setPrototypeOf(this, TomlParseError.prototype);
  }
}

export class TomlAccessError extends TomlError {
  override readonly name = 'TomlAccessError';
  declare readonly code: TomlAccessErrorCode;
  constructor(code: TomlAccessErrorCode, message: string) {
    super(code, message);
    Object.setPrototypeOf(this, TomlAccessError.prototype);
  }
}

export class TomlStateError extends TomlError {
  override readonly name = 'TomlStateError';
  declare readonly code: TomlStateErrorCode;
  constructor(code: TomlStateErrorCode, message: string) {
    super(code, message);
    Object.setPrototypeOf(this, TomlStateError.prototype);
  }
}

export class TomlEncodeError extends TomlError {
  override readonly name = 'TomlEncodeError';
  declare readonly code: TomlEncodeErrorCode;
  constructor(code: TomlEncodeErrorCode, message: string) {
    super(code, message);
    Object.setPrototypeOf(this, TomlEncodeError.prototype);
  }
}
