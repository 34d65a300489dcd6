/**
 * Unit tests for the command renderer
 */

import { describe, it, expect } from 'vitest';
import { Validator } from '../../src/validator';
import { isParseFailure } from '../../src/command-parser';
import { renderCommand, renderValue } from '../../src/command-renderer';
import { ParsedCommand } from '../../src/types';

describe('renderCommand', () => {
  const validator = new Validator();

  const parsed = (command: string): ParsedCommand => {
    const outcome = validator.parseCommand(command, false);
    if (isParseFailure(outcome)) {
      throw new Error(outcome.message);
    }
    return outcome;
  };

  it('should write filenames bare', () => {
    expect(renderCommand(parsed('gmx pdb2gmx -f protein.pdb -o protein.gro')))
      .toBe('gmx pdb2gmx -f protein.pdb -o protein.gro');
  });

  it('should write boolean flags without a value', () => {
    expect(renderCommand(parsed('gmx mdrun -v -deffnm md'))).toBe('gmx mdrun -v -deffnm md');
  });

  it('should normalize spacing and vectors', () => {
    expect(renderCommand(parsed('gmx   editconf -box (2.0  2.0 2.0)'))).toBe('gmx editconf -box (2.0 2.0 2.0)');
  });

  it('should keep a decimal point on floats', () => {
    expect(renderCommand(parsed('gmx editconf -d 1.0'))).toBe('gmx editconf -d 1.0');
  });

  it('should quote text that would not re-lex as a plain string', () => {
    expect(renderCommand(parsed('gmx pdb2gmx -f a.pdb -ff "amber99sb-ildn" -water tip3p')))
      .toBe('gmx pdb2gmx -f a.pdb -ff "amber99sb-ildn" -water tip3p');
    expect(renderCommand(parsed(`gmx mdrun -deffnm 'mdrun'`))).toBe('gmx mdrun -deffnm "mdrun"');
    expect(renderCommand(parsed(`gmx mdrun -deffnm 'say "hi"'`))).toBe(`gmx mdrun -deffnm 'say "hi"'`);
  });

  it('should write large integers exactly', () => {
    expect(renderCommand(parsed('gmx mdrun -deffnm md -seed 9007199254740993')))
      .toBe('gmx mdrun -deffnm md -seed 9007199254740993');
  });

  it('should keep the last value of a repeated flag in first position', () => {
    expect(renderCommand(parsed('gmx grompp -f a.mdp -c a.gro -f b.mdp'))).toBe('gmx grompp -f b.mdp -c a.gro');
  });
});

describe('renderValue', () => {
  it('should render special floats so they re-lex as floats', () => {
    expect(renderValue({ type: 'float', value: 1e25 })).toBe('1.0e+25');
    expect(renderValue({ type: 'float', value: 1e-7 })).toBe('1.0e-7');
    expect(renderValue({ type: 'float', value: -0 })).toBe('-0.0');
    expect(renderValue({ type: 'float', value: 0.25 })).toBe('0.25');
  });

  it('should render integers plainly', () => {
    expect(renderValue({ type: 'int', value: 7n })).toBe('7');
    expect(renderValue({ type: 'int', value: -12n })).toBe('-12');
    expect(renderValue({ type: 'int', value: 10n ** 21n })).toBe('1000000000000000000000');
  });

  it('should render mixed vectors', () => {
    expect(renderValue({ type: 'vector', value: [90n, 60.5, -3n, 2] })).toBe('(90 60.5 -3 2.0)');
  });

  it('should return null for boolean flags', () => {
    expect(renderValue({ type: 'boolean', value: true })).toBeNull();
  });
});
