/**
 * Unit tests for CommandTokenizer
 */

import { describe, test, expect } from 'vitest';
import { CommandTokenizer, classifyIdentifier } from '../../src/command-tokenizer';
import { TokenKind } from '../../src/types';

describe('CommandTokenizer', () => {
  const tokenizer = new CommandTokenizer();

  const kinds = (command: string) => tokenizer.tokenize(command).tokens.map(t => t.kind);
  const values = (command: string) => tokenizer.tokenize(command).tokens.map(t => t.value);

  describe('Basic tokenization', () => {
    test('classifies a typical topology command', () => {
      const result = tokenizer.tokenize('gmx pdb2gmx -f protein.pdb -o protein.gro');

      expect(result.tokens.map(t => t.kind)).toEqual([
        TokenKind.KEYWORD,
        TokenKind.COMMAND_NAME,
        TokenKind.FLAG,
        TokenKind.FILENAME,
        TokenKind.FLAG,
        TokenKind.FILENAME
      ]);
      expect(result.tokens.map(t => t.value)).toEqual(['gmx', 'pdb2gmx', '-f', 'protein.pdb', '-o', 'protein.gro']);
      expect(result.diagnostics).toEqual([]);
    });

    test('records line and character offset of each token', () => {
      const result = tokenizer.tokenize('gmx pdb2gmx -f protein.pdb');

      expect(result.tokens[3]).toEqual({
        kind: TokenKind.FILENAME,
        lexeme: 'protein.pdb',
        value: 'protein.pdb',
        line: 1,
        position: 15
      });
    });

    test('returns nothing for empty input', () => {
      expect(tokenizer.tokenize('')).toEqual({ tokens: [], diagnostics: [] });
    });

    test('discards spaces and tabs', () => {
      expect(values('gmx\t\tmdrun    -v')).toEqual(['gmx', 'mdrun', '-v']);
    });
  });

  describe('Numbers', () => {
    test('parses float and integer literals', () => {
      const result = tokenizer.tokenize('gmx editconf -d 1.5 -n 3');

      expect(result.tokens[3]).toMatchObject({ kind: TokenKind.FLOAT, value: 1.5 });
      expect(result.tokens[5]).toMatchObject({ kind: TokenKind.INTEGER, value: 3n });
    });

    test('parses signed floats with exponents', () => {
      const result = tokenizer.tokenize('-2.5e-3');

      expect(result.tokens).toHaveLength(1);
      expect(result.tokens[0]).toMatchObject({ kind: TokenKind.FLOAT, lexeme: '-2.5e-3', value: -0.0025 });
    });

    test('parses signed integers', () => {
      expect(tokenizer.tokenize('-12').tokens[0]).toMatchObject({ kind: TokenKind.INTEGER, value: -12n });
      expect(tokenizer.tokenize('+7').tokens[0]).toMatchObject({ kind: TokenKind.INTEGER, value: 7n });
    });

    test('keeps integers beyond double precision exact', () => {
      const result = tokenizer.tokenize('-seed 9007199254740993');

      expect(result.tokens[1]).toMatchObject({ kind: TokenKind.INTEGER, value: 9007199254740993n });
      expect(tokenizer.tokenize('-9223372036854775808').tokens[0].value).toBe(-9223372036854775808n);
    });

    test('tokenizes vector literals', () => {
      expect(kinds('(1 2.0)')).toEqual([
        TokenKind.LPAREN,
        TokenKind.INTEGER,
        TokenKind.FLOAT,
        TokenKind.RPAREN
      ]);
    });
  });

  describe('Precedence', () => {
    test('dash followed by a letter is always a flag', () => {
      expect(kinds('-deffnm -ntmpi')).toEqual([TokenKind.FLAG, TokenKind.FLAG]);
    });

    test('filenames win over identifiers and numbers', () => {
      expect(kinds('md_0_1.tpr out/em.gro 1abc.pdb 2.top')).toEqual([
        TokenKind.FILENAME,
        TokenKind.FILENAME,
        TokenKind.FILENAME,
        TokenKind.FILENAME
      ]);
    });

    test('a dotted name without a known extension is not a filename', () => {
      const result = tokenizer.tokenize('notes.txt');

      expect(result.tokens.map(t => [t.kind, t.value])).toEqual([
        [TokenKind.STRING, 'notes'],
        [TokenKind.STRING, 'txt']
      ]);
      expect(result.diagnostics.map(d => d.character)).toEqual(['.']);
    });

    test('a dash inside a bare word starts a new flag', () => {
      expect(tokenizer.tokenize('amber99sb-ildn').tokens.map(t => [t.kind, t.value])).toEqual([
        [TokenKind.STRING, 'amber99sb'],
        [TokenKind.FLAG, '-ildn']
      ]);
    });
  });

  describe('Strings and identifiers', () => {
    test('strips double and single quotes', () => {
      const result = tokenizer.tokenize(`"amber99sb-ildn" 'hello world'`);

      expect(result.tokens.map(t => [t.kind, t.value])).toEqual([
        [TokenKind.STRING, 'amber99sb-ildn'],
        [TokenKind.STRING, 'hello world']
      ]);
      expect(result.tokens[0].lexeme).toBe('"amber99sb-ildn"');
    });

    test('quoted keywords stay strings', () => {
      expect(kinds(`'gmx' "mdrun"`)).toEqual([TokenKind.STRING, TokenKind.STRING]);
    });

    test('reclassifies bare identifiers', () => {
      expect(kinds('gmx mdrun tip3p')).toEqual([
        TokenKind.KEYWORD,
        TokenKind.COMMAND_NAME,
        TokenKind.STRING
      ]);
    });
  });

  describe('Illegal characters', () => {
    test('skips one character and keeps scanning', () => {
      const result = tokenizer.tokenize('gmx mdrun -v @ -nt 4');

      expect(result.tokens.map(t => t.value)).toEqual(['gmx', 'mdrun', '-v', '-nt', 4n]);
      expect(result.diagnostics).toEqual([{
        character: '@',
        line: 1,
        position: 13,
        message: "Illegal character '@' at line 1"
      }]);
    });

    test('counts newlines for diagnostics', () => {
      const result = tokenizer.tokenize('gmx mdrun\n-v\n\n%');

      expect(result.tokens[2]).toMatchObject({ value: '-v', line: 2 });
      expect(result.diagnostics).toHaveLength(1);
      expect(result.diagnostics[0].message).toBe("Illegal character '%' at line 4");
    });

    test('counts newlines inside quoted text', () => {
      const result = tokenizer.tokenize('-title "first\nsecond" -v ;');

      expect(result.tokens[1]).toMatchObject({ kind: TokenKind.STRING, value: 'first\nsecond', line: 1 });
      expect(result.tokens[2]).toMatchObject({ kind: TokenKind.FLAG, line: 2 });
      expect(result.diagnostics[0].message).toBe("Illegal character ';' at line 2");
    });

    test('reports every bad character', () => {
      const result = tokenizer.tokenize('$$');

      expect(result.tokens).toEqual([]);
      expect(result.diagnostics.map(d => d.position)).toEqual([0, 1]);
    });
  });
});

describe('classifyIdentifier', () => {
  test('recognises the invocation keyword', () => {
    expect(classifyIdentifier('gmx')).toBe(TokenKind.KEYWORD);
  });

  test('recognises known commands', () => {
    expect(classifyIdentifier('make_ndx')).toBe(TokenKind.COMMAND_NAME);
    expect(classifyIdentifier('grompp')).toBe(TokenKind.COMMAND_NAME);
  });

  test('leaves everything else as a string', () => {
    expect(classifyIdentifier('GMX')).toBe(TokenKind.STRING);
    expect(classifyIdentifier('spc216')).toBe(TokenKind.STRING);
  });
});
