/**
 * Command Validator - Checks a parsed command against the per-command
 * flag tables
 */

import { ParsedCommand, ValidationVerdict } from './types';
import { COMMAND_FLAGS, REQUIRED_FLAGS, RequiredFlagRule, isKnownCommand } from './gromacs-tables';

export const NOT_A_COMMAND_WARNING = 'Not a valid GROMACS command';

/**
 * Accepts anything so that envelopes coming from JSON or from other
 * callers can be checked; only ParsedCommand values get past the guard.
 */
export function isParsedCommand(input: unknown): input is ParsedCommand {
  if (typeof input !== 'object' || input === null) {
    return false;
  }
  if (!('kind' in input) || !('name' in input) || !('options' in input)) {
    return false;
  }
  return input.kind === 'gromacs_command' &&
    typeof input.name === 'string' &&
    isKnownCommand(input.name) &&
    typeof input.options === 'object' &&
    input.options !== null;
}

export class CommandValidator {
  constructor(
    private readonly commandFlags = COMMAND_FLAGS,
    private readonly requiredFlags = REQUIRED_FLAGS
  ) {}

  validate(input: unknown): ValidationVerdict {
    if (!isParsedCommand(input)) {
      return { isValid: false, warnings: [NOT_A_COMMAND_WARNING] };
    }

    const warnings = [
      ...this.checkFlagSet(input),
      ...this.checkRequiredFlags(input)
    ];

    // Every warning produced here is advisory, so a well-formed command
    // stays valid; callers gate on the warnings list instead.
    const isValid = warnings.length === 0 || warnings.every(w => w.includes('Warning'));

    return { isValid, warnings };
  }

  private checkFlagSet(command: ParsedCommand): string[] {
    const accepted = this.commandFlags[command.name];
    if (!accepted) {
      return [];
    }

    return Object.keys(command.options)
      .filter(flag => !accepted.has(flag))
      .map(flag => `Warning: '${flag}' may not be a valid flag for 'gmx ${command.name}'`);
  }

  private checkRequiredFlags(command: ParsedCommand): string[] {
    const rules: readonly RequiredFlagRule[] = this.requiredFlags[command.name] ?? [];

    return rules
      .filter(rule => !rule.anyOf.some(flag => flag in command.options))
      .map(rule => `Warning: ${rule.message}`);
  }
}
