/**
 * Command Parser - Recursive-descent parser for GROMACS command lines
 *
 * Grammar:
 *   command    := Keyword CommandName option*
 *   option     := Flag value?
 *   value      := Filename | String | Float | Integer | vector
 *   vector     := '(' number+ ')'
 *   number     := Float | Integer
 */

import {
  Token,
  TokenKind,
  LexDiagnostic,
  OptionValue,
  ParsedCommand,
  ParseFailure,
  ParseOutcome
} from './types';
import { isKnownCommand } from './gromacs-tables';

/**
 * Raised inside a parse when the token stream does not fit the grammar.
 * Never escapes CommandParser.parse.
 */
class GrammarMismatch extends Error {
  constructor(readonly token: Token | undefined, readonly expected: string) {
    super(
      token
        ? `Syntax error at token ${token.kind} ('${token.lexeme}') at line ${token.line}: expected ${expected}`
        : `Syntax error at end of input: expected ${expected}`
    );
    this.name = 'GrammarMismatch';
  }
}

/** Cursor over one parse call's tokens */
class TokenStream {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  peek(): Token | undefined {
    return this.tokens[this.index];
  }

  next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) {
      this.index++;
    }
    return token;
  }

  expect(kind: TokenKind, expected: string): Token {
    const token = this.next();
    if (!token || token.kind !== kind) {
      throw new GrammarMismatch(token, expected);
    }
    return token;
  }
}

const VALUE_START_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.FILENAME,
  TokenKind.STRING,
  TokenKind.FLOAT,
  TokenKind.INTEGER,
  TokenKind.LPAREN
]);

export class CommandParser {
  /**
   * Parse a full token sequence. Either the whole sequence forms one
   * command or a ParseFailure is returned; there is no partial result.
   */
  parse(tokens: readonly Token[], diagnostics: readonly LexDiagnostic[] = []): ParseOutcome {
    try {
      const stream = new TokenStream(tokens);
      return this.parseCommand(stream, diagnostics);
    } catch (error) {
      if (error instanceof GrammarMismatch) {
        return this.failure(error, diagnostics);
      }
      throw error;
    }
  }

  private parseCommand(stream: TokenStream, diagnostics: readonly LexDiagnostic[]): ParsedCommand {
    stream.expect(TokenKind.KEYWORD, "'gmx' keyword");
    const nameToken = stream.expect(TokenKind.COMMAND_NAME, 'a known GROMACS command');
    const name = String(nameToken.value);
    if (!isKnownCommand(name)) {
      throw new GrammarMismatch(nameToken, 'a known GROMACS command');
    }

    const options: Record<string, OptionValue> = {};
    while (stream.peek()) {
      const flag = stream.expect(TokenKind.FLAG, 'a flag');
      // Later occurrences of a flag overwrite earlier ones
      options[flag.lexeme] = this.parseOptionValue(stream);
    }

    return Object.freeze({
      kind: 'gromacs_command' as const,
      name,
      options: Object.freeze(options),
      diagnostics: Object.freeze([...diagnostics])
    });
  }

  private parseOptionValue(stream: TokenStream): OptionValue {
    const token = stream.peek();
    if (!token || !VALUE_START_KINDS.has(token.kind)) {
      return { type: 'boolean', value: true };
    }

    stream.next();
    switch (token.kind) {
      case TokenKind.FILENAME:
        return { type: 'filename', value: token.value };
      case TokenKind.STRING:
        return { type: 'text', value: token.value };
      case TokenKind.FLOAT:
        return { type: 'float', value: token.value };
      case TokenKind.INTEGER:
        return { type: 'int', value: token.value };
      case TokenKind.LPAREN:
        return { type: 'vector', value: Object.freeze(this.parseNumberList(stream)) };
      default:
        throw new GrammarMismatch(token, 'an option value');
    }
  }

  private parseNumberList(stream: TokenStream): (number | bigint)[] {
    const values: (number | bigint)[] = [];

    for (;;) {
      const token = stream.next();
      if (!token) {
        throw new GrammarMismatch(undefined, values.length === 0 ? 'a number' : "a number or ')'");
      }
      if (token.kind === TokenKind.FLOAT || token.kind === TokenKind.INTEGER) {
        values.push(token.value);
        continue;
      }
      if (token.kind === TokenKind.RPAREN && values.length > 0) {
        return values;
      }
      throw new GrammarMismatch(token, values.length === 0 ? 'a number' : "a number or ')'");
    }
  }

  private failure(error: GrammarMismatch, diagnostics: readonly LexDiagnostic[]): ParseFailure {
    return Object.freeze({
      kind: 'parse_failure' as const,
      token: error.token,
      atEndOfInput: error.token === undefined,
      expected: error.expected,
      message: error.message,
      diagnostics: Object.freeze([...diagnostics])
    });
  }
}

export function isParseFailure(outcome: ParseOutcome): outcome is ParseFailure {
  return outcome.kind === 'parse_failure';
}
