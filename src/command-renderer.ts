/**
 * Command Renderer - Writes a parsed command back out as a canonical
 * command string that re-parses to the same options
 */

import { OptionValue, ParsedCommand, TokenKind } from './types';
import { GMX_KEYWORD } from './gromacs-tables';
import { classifyIdentifier } from './command-tokenizer';

const BARE_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function renderCommand(command: ParsedCommand): string {
  const parts: string[] = [GMX_KEYWORD, command.name];

  for (const [flag, value] of Object.entries(command.options)) {
    parts.push(flag);
    const rendered = renderValue(value);
    if (rendered !== null) {
      parts.push(rendered);
    }
  }

  return parts.join(' ');
}

/** Returns null for a bare boolean flag */
export function renderValue(value: OptionValue): string | null {
  switch (value.type) {
    case 'boolean':
      return null;
    case 'filename':
      return value.value;
    case 'text':
      return renderText(value.value);
    case 'float':
      return renderFloat(value.value);
    case 'int':
      return value.value.toString();
    case 'vector':
      return `(${value.value.map(n => typeof n === 'bigint' ? n.toString() : renderFloat(n)).join(' ')})`;
  }
}

function renderText(text: string): string {
  if (BARE_IDENTIFIER.test(text) && classifyIdentifier(text) === TokenKind.STRING) {
    return text;
  }
  return text.includes('"') ? `'${text}'` : `"${text}"`;
}

/** Floats always carry a decimal point so they re-lex as floats */
function renderFloat(value: number): string {
  if (Object.is(value, -0)) {
    return '-0.0';
  }
  const text = String(value);
  if (text.includes('.')) {
    return text;
  }
  const exponent = text.indexOf('e');
  return exponent === -1
    ? `${text}.0`
    : `${text.slice(0, exponent)}.0${text.slice(exponent)}`;
}
