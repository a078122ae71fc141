/**
 * TOML lexer. Reads tokens on demand from a cursor over the source text;
 * nothing is buffered beyond the token last peeked.
 */

import type { SourcePosition } from './errors.js';
import { TomlParseError } from './errors.js';

export enum TokenKind {
  Text = 'Text',
  CommentPrefix = 'CommentPrefix',
  Equals = 'Equals',
  Comma = 'Comma',
  StartArray = 'StartArray',
  EndArray = 'EndArray',
  StartInlineTable = 'StartInlineTable',
  EndInlineTable = 'EndInlineTable',
}

export interface Token {
  kind: TokenKind;
  /** Offset of the first character of the token text, in UTF-16 code units */
  offset: number;
  length: number;
  text: string;
  /** True when the text came from a quoted literal; quotes are not part of `text` */
  quoted: boolean;
}

export interface LexerOptions {
  /** Max input length in characters (default 1_000_000) */
  maxInputLength?: number;
}

export const DEFAULT_MAX_INPUT_LENGTH = 1_000_000;

const BOM = '\uFEFF';

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  ['#', TokenKind.CommentPrefix],
  ['=', TokenKind.Equals],
  [',', TokenKind.Comma],
  ['[', TokenKind.StartArray],
  [']', TokenKind.EndArray],
  ['{', TokenKind.StartInlineTable],
  ['}', TokenKind.EndInlineTable],
]);

export function isEndOfLine(c: string): boolean {
  return c === '\n' || c === '\r';
}

export function isWhitespace(c: string): boolean {
  return isEndOfLine(c) || c === ' ' || c === '\t' || c === BOM;
}

export function isPunctuation(c: string): boolean {
  return PUNCTUATION.has(c);
}

export class Lexer {
  private cursor = 0;
  private peeked: { token: Token; end: number } | undefined = undefined;

  constructor(
    private readonly input: string,
    options: LexerOptions = {}
  ) {
    const maxLen = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
    if (input.length > maxLen) {
      throw new TomlParseError('InputTooLarge', `Input exceeds maximum length (${input.length} > ${maxLen})`, {
        position: { line: 1, column: 1, offset: 0 },
      });
    }
  }

  /** Returns the next token without moving the cursor. */
  peek(): Token | undefined {
    if (this.peeked === undefined) {
      this.peeked = this.scan();
    }
    return this.peeked?.token;
  }

  /** Returns the next token and moves the cursor past it. */
  read(): Token | undefined {
    const next = this.peeked ?? this.scan();
    this.peeked = undefined;
    if (next === undefined) {
      this.cursor = this.input.length;
      return undefined;
    }
    this.cursor = next.end;
    return next.token;
  }

  /** Moves the cursor to the next line break (or end of input). */
  skipLine(): void {
    this.peeked = undefined;
    while (this.cursor < this.input.length && !isEndOfLine(this.input.charAt(this.cursor))) {
      this.cursor++;
    }
  }

  get done(): boolean {
    return this.peek() === undefined;
  }

  /** Line and column (both 1-based) of a character offset. */
  position(offset: number = this.cursor): SourcePosition {
    let line = 1;
    let column = 1;
    const end = Math.min(offset, this.input.length);
    for (let i = 0; i < end; i++) {
      if (this.input[i] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { line, column, offset };
  }

  private scan(): { token: Token; end: number } | undefined {
    const input = this.input;
    let offset = this.cursor;
    while (offset < input.length && isWhitespace(input.charAt(offset))) offset++;
    if (offset >= input.length) return undefined;

    const c = input.charAt(offset);
    const punctuation = PUNCTUATION.get(c);
    if (punctuation !== undefined) {
      return { token: { kind: punctuation, offset, length: 1, text: c, quoted: false }, end: offset + 1 };
    }

    if (c === '"' || c === "'") {
      const start = offset + 1;
      const close = input.indexOf(c, start);
      if (close === -1) {
        throw new TomlParseError('UnterminatedStringLiteral', 'Unterminated string literal', {
          position: this.position(offset),
        });
      }
      return {
        token: { kind: TokenKind.Text, offset: start, length: close - start, text: input.slice(start, close), quoted: true },
        end: close + 1,
      };
    }

    const start = offset;
    offset++;
    while (offset < input.length) {
      const x = input.charAt(offset);
      if (isEndOfLine(x) || isPunctuation(x)) break;
      offset++;
    }
    let length = offset - start;
    if (input.charAt(offset) === '=') {
      // keys read as `key   =` end at the last non-blank character
      while (length > 0 && isWhitespace(input.charAt(start + length - 1))) length--;
    }
    return {
      token: { kind: TokenKind.Text, offset: start, length, text: input.slice(start, start + length), quoted: false },
      end: offset,
    };
  }
}
