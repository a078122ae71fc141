/**
 * TOML recursive-descent parser. Pulls tokens from the lexer one at a time and
 * builds the owned tree: document, tables, key-values, arrays and inline tables.
 */

import { TomlArray } from './array.js';
import type { TomlDocument } from './document.js';
import type { KeyValueContainer } from './entries.js';
import type { TomlParseErrorCode } from './errors.js';
import { TomlParseError } from './errors.js';
import { inferScalar } from './infer.js';
import { TomlKeyValue } from './key-value.js';
import { Lexer, TokenKind, type Token } from './lexer.js';
import type { ParseOptions } from './options.js';
import { resolveParseOptions } from './options.js';
import { TomlTable } from './table.js';
import type { TomlValue } from './value.js';
import { arrayValue, tableValue, textValue } from './value.js';

/**
 * Parses `text` and appends its entries and tables to `document`. On failure
 * the document is disposed before the error propagates.
 */
export function parseInto(document: TomlDocument, text: string, options: ParseOptions = {}): TomlDocument {
  const resolved = resolveParseOptions(options);
  try {
    const lexer = new Lexer(text, { maxInputLength: resolved.maxInputLength });
    new Parser(lexer, resolved).readDocument(document);
  } catch (error) {
    document.dispose();
    throw error;
  }
  return document;
}

function describe(token: Token | undefined): string {
  if (token === undefined) return 'end of input';
  return token.kind === TokenKind.Text ? `text ${JSON.stringify(token.text)}` : `\`${token.text}\``;
}

class Parser {
  constructor(
    private readonly lexer: Lexer,
    private readonly options: Required<ParseOptions>
  ) {}

  private fail(code: TomlParseErrorCode, message: string, token?: Token): never {
    throw new TomlParseError(code, message, {
      position: this.lexer.position(token?.offset),
    });
  }

  private expect(kind: TokenKind, what: string): Token {
    const token = this.lexer.read();
    if (token === undefined || token.kind !== kind) {
      this.fail('UnexpectedToken', `Expected ${what}, got ${describe(token)}`, token);
    }
    return token;
  }

  private skipComment(): void {
    this.lexer.read();
    this.lexer.skipLine();
  }

  private checkDepth(depth: number, token: Token | undefined): void {
    if (depth > this.options.maxDepth) {
      this.fail('MaxDepthExceeded', `Maximum nesting depth exceeded (${this.options.maxDepth})`, token);
    }
  }

  /** Root: key-values and `[name]` tables; their relative order is not checked. */
  readDocument(document: TomlDocument): void {
    for (let token = this.lexer.peek(); token !== undefined; token = this.lexer.peek()) {
      switch (token.kind) {
        case TokenKind.CommentPrefix:
          this.skipComment();
          break;
        case TokenKind.Text:
          this.readEntry(document, 'document', 0);
          break;
        case TokenKind.StartArray:
          document.add(this.readTable());
          break;
        default:
          this.lexer.read();
      }
    }
  }

  /** `[name]` followed by entries up to the next header or end of input. */
  private readTable(): TomlTable {
    this.expect(TokenKind.StartArray, '`[`');
    const nameToken = this.expect(TokenKind.Text, 'table name');
    this.expect(TokenKind.EndArray, '`]` after table name');
    const name = nameToken.quoted ? nameToken.text : nameToken.text.trim();
    const table = new TomlTable(name);
    const scope = `table \`${name}\``;
    for (let token = this.lexer.peek(); token !== undefined; token = this.lexer.peek()) {
      if (token.kind === TokenKind.StartArray) break;
      if (token.kind === TokenKind.CommentPrefix) this.skipComment();
      else if (token.kind === TokenKind.Text) this.readEntry(table, scope, 0);
      else this.lexer.read();
    }
    return table;
  }

  /** Reads one `key = value` and appends it to `container`. */
  private readEntry(container: KeyValueContainer, scope: string, depth: number): void {
    const keyToken = this.expect(TokenKind.Text, 'key');
    const key = keyToken.quoted ? keyToken.text : keyToken.text.trim();
    if (key.length === 0) {
      this.fail('UnexpectedToken', 'Key must not be empty', keyToken);
    }
    this.expect(TokenKind.Equals, `\`=\` after key \`${key}\``);
    const value = this.readValue(key, depth);

    if (container.containsKey(key)) {
      if (this.options.duplicateKeys === 'reject') {
        this.fail('DuplicateKey', `Duplicate key \`${key}\` in ${scope}`, keyToken);
      }
      this.options.log(`Duplicate key \`${key}\` in ${scope}; lookups return the first entry`);
    }
    container.addKeyValue(new TomlKeyValue(key, value));
  }

  private readValue(key: string, depth: number): TomlValue {
    const token = this.lexer.peek();
    if (token === undefined) {
      this.fail('UnexpectedToken', `Expected value for key \`${key}\`, got end of input`);
    }
    switch (token.kind) {
      case TokenKind.Text:
        this.lexer.read();
        return this.scalar(token);
      case TokenKind.StartArray:
        return arrayValue(this.readArray(depth + 1));
      case TokenKind.StartInlineTable:
        return tableValue(this.readInlineTable(key, depth + 1));
      default:
        this.fail('UnexpectedToken', `Expected value for key \`${key}\`, got ${describe(token)}`, token);
    }
  }

  /** Quoted text is always text; bare text goes through type inference. */
  private scalar(token: Token): TomlValue {
    return token.quoted ? textValue(token.text) : inferScalar(token.text.trim());
  }

  private readArray(depth: number): TomlArray {
    const open = this.lexer.peek();
    this.checkDepth(depth, open);
    this.expect(TokenKind.StartArray, '`[`');
    const array = new TomlArray();
    for (;;) {
      const token = this.lexer.peek();
      if (token === undefined) {
        this.fail('UnexpectedToken', 'Expected `]` to end the array, got end of input', open);
      }
      switch (token.kind) {
        case TokenKind.EndArray:
          this.lexer.read();
          return array;
        case TokenKind.Text:
          this.lexer.read();
          array.push(this.scalar(token));
          break;
        case TokenKind.StartArray:
          array.push(arrayValue(this.readArray(depth + 1)));
          break;
        case TokenKind.StartInlineTable:
          array.push(tableValue(this.readInlineTable('', depth + 1)));
          break;
        case TokenKind.CommentPrefix:
          this.skipComment();
          break;
        case TokenKind.Comma:
          // leading, repeated and trailing commas are all accepted
          this.lexer.read();
          break;
        default:
          this.fail('UnexpectedToken', `Expected \`,\` or \`]\` in array, got ${describe(token)}`, token);
      }
    }
  }

  /** `{ key = value, ... }`; the table takes the name of the key it is assigned to. */
  private readInlineTable(name: string, depth: number): TomlTable {
    const open = this.lexer.peek();
    this.checkDepth(depth, open);
    this.expect(TokenKind.StartInlineTable, '`{`');
    const table = new TomlTable(name);
    const scope = name ? `inline table \`${name}\`` : 'inline table';
    for (;;) {
      const token = this.lexer.peek();
      if (token === undefined) {
        this.fail('UnexpectedToken', 'Expected `}` to end the inline table, got end of input', open);
      }
      switch (token.kind) {
        case TokenKind.EndInlineTable:
          this.lexer.read();
          return table;
        case TokenKind.Comma:
          this.lexer.read();
          break;
        case TokenKind.CommentPrefix:
          this.skipComment();
          break;
        case TokenKind.Text:
          this.readEntry(table, scope, depth);
          break;
        default:
          this.fail('UnexpectedToken', `Expected key or \`}\` in inline table, got ${describe(token)}`, token);
      }
    }
  }
}
