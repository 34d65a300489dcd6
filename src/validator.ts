/**
 * Validator - Main validation orchestrator
 */

import { ParseOutcome, PlanCheckOptions, PlanCommandReport, PlanReport, SequenceVerdict } from './types';
import { CommandTokenizer } from './command-tokenizer';
import { CommandParser, isParseFailure } from './command-parser';
import { CommandValidator } from './command-validator';
import { SequenceValidator } from './sequence-validator';

export class Validator {
  private tokenizer: CommandTokenizer;
  private parser: CommandParser;
  private commandValidator: CommandValidator;
  private sequenceValidator: SequenceValidator;

  constructor() {
    this.tokenizer = new CommandTokenizer();
    this.parser = new CommandParser();
    this.commandValidator = new CommandValidator();
    this.sequenceValidator = new SequenceValidator();
  }

  parseCommand(commandString: string, shouldValidate: boolean = true): ParseOutcome {
    const { tokens, diagnostics } = this.tokenizer.tokenize(commandString);
    const outcome = this.parser.parse(tokens, diagnostics);

    if (isParseFailure(outcome) || !shouldValidate) {
      return outcome;
    }

    return Object.freeze({
      ...outcome,
      validation: this.commandValidator.validate(outcome)
    });
  }

  validateSequence(commandStrings: readonly string[]): SequenceVerdict {
    return this.sequenceValidator.validate(commandStrings);
  }

  /**
   * Check every command of a plan plus the plan's stage order. A command
   * that fails to parse does not stop the others from being checked.
   */
  checkPlan(commandStrings: readonly string[], options: PlanCheckOptions = {}): PlanReport {
    const validate = options.validate ?? true;
    const commands: PlanCommandReport[] = commandStrings.map(command => ({
      command,
      result: this.parseCommand(command, validate)
    }));
    const sequence = this.validateSequence(commandStrings);

    const rejections: string[] = [];
    commands.forEach((report, i) => {
      const label = `Command ${i + 1} (${report.command})`;
      if (isParseFailure(report.result)) {
        rejections.push(`${label}: ${report.result.message}`);
        return;
      }

      const validation = report.result.validation;
      if (!validation) {
        return;
      }
      if (!validation.isValid) {
        rejections.push(`${label}: ${validation.warnings.join('; ')}`);
      } else if (options.strict && validation.warnings.length > 0) {
        rejections.push(`${label}: ${validation.warnings.length} warning(s) in strict mode`);
      }
    });

    if (!sequence.passed) {
      rejections.push(sequence.diagnostic);
    }

    return {
      commands,
      sequence,
      accepted: rejections.length === 0,
      rejections
    };
  }
}
