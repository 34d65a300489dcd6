/**
 * Command Tokenizer - Splits GROMACS command strings into classified tokens
 */

import { Token, TokenKind, TokenizeResult, LexDiagnostic } from './types';
import { GMX_KEYWORD, FILE_EXTENSIONS, isKnownCommand } from './gromacs-tables';

type IdentifierKind = TokenKind.KEYWORD | TokenKind.COMMAND_NAME | TokenKind.STRING;

/**
 * Classify a bare identifier. Called once per identifier match so a token's
 * kind is fixed at creation.
 */
export function classifyIdentifier(word: string): IdentifierKind {
  if (word === GMX_KEYWORD) {
    return TokenKind.KEYWORD;
  }
  if (isKnownCommand(word)) {
    return TokenKind.COMMAND_NAME;
  }
  return TokenKind.STRING;
}

export class CommandTokenizer {
  // Sticky patterns, tried in this order at each position. The first match
  // wins, so the specific shapes must precede the generic ones.
  private readonly FLAG_PATTERN = /-[a-zA-Z][a-zA-Z0-9]*/y;
  private readonly FILENAME_PATTERN = new RegExp(
    `[a-zA-Z0-9_/\\-]+\\.(?:${FILE_EXTENSIONS.join('|')})`,
    'y'
  );
  private readonly FLOAT_PATTERN = /[-+]?\d+\.\d+(?:[eE][-+]?\d+)?/y;
  private readonly INTEGER_PATTERN = /[-+]?\d+/y;
  private readonly QUOTED_PATTERN = /"[^"]*"|'[^']*'/y;
  private readonly IDENTIFIER_PATTERN = /[a-zA-Z_][a-zA-Z0-9_]*/y;

  tokenize(command: string): TokenizeResult {
    const tokens: Token[] = [];
    const diagnostics: LexDiagnostic[] = [];
    let line = 1;
    let i = 0;

    while (i < command.length) {
      const char = command[i];

      if (char === ' ' || char === '\t') {
        i++;
        continue;
      }

      if (char === '\n') {
        line++;
        i++;
        continue;
      }

      const token = this.matchToken(command, i, line);
      if (token) {
        tokens.push(token);
        i += token.lexeme.length;
        // Only quoted text can span lines
        line += token.lexeme.split('\n').length - 1;
        continue;
      }

      diagnostics.push({
        character: char,
        line,
        position: i,
        message: `Illegal character '${char}' at line ${line}`
      });
      i++;
    }

    return { tokens, diagnostics };
  }

  private matchToken(input: string, position: number, line: number): Token | null {
    let lexeme = this.matchAt(this.FLAG_PATTERN, input, position);
    if (lexeme !== null) {
      return { kind: TokenKind.FLAG, lexeme, value: lexeme, line, position };
    }

    const char = input[position];
    if (char === '(') {
      return { kind: TokenKind.LPAREN, lexeme: char, value: char, line, position };
    }
    if (char === ')') {
      return { kind: TokenKind.RPAREN, lexeme: char, value: char, line, position };
    }

    lexeme = this.matchAt(this.FILENAME_PATTERN, input, position);
    if (lexeme !== null) {
      return { kind: TokenKind.FILENAME, lexeme, value: lexeme, line, position };
    }

    lexeme = this.matchAt(this.FLOAT_PATTERN, input, position);
    if (lexeme !== null) {
      return { kind: TokenKind.FLOAT, lexeme, value: parseFloat(lexeme), line, position };
    }

    lexeme = this.matchAt(this.INTEGER_PATTERN, input, position);
    if (lexeme !== null) {
      return { kind: TokenKind.INTEGER, lexeme, value: BigInt(lexeme), line, position };
    }

    lexeme = this.matchAt(this.QUOTED_PATTERN, input, position);
    if (lexeme !== null) {
      // Quoted text is never reclassified, even when it reads "gmx"
      return { kind: TokenKind.STRING, lexeme, value: lexeme.slice(1, -1), line, position };
    }

    lexeme = this.matchAt(this.IDENTIFIER_PATTERN, input, position);
    if (lexeme !== null) {
      return { kind: classifyIdentifier(lexeme), lexeme, value: lexeme, line, position };
    }

    return null;
  }

  private matchAt(pattern: RegExp, input: string, position: number): string | null {
    pattern.lastIndex = position;
    const match = pattern.exec(input);
    return match ? match[0] : null;
  }
}
