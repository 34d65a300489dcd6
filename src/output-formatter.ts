/**
 * OutputFormatter - Console presentation of check results
 *
 * Results go to stdout; errors and warnings go to stderr. Colour uses
 * plain ANSI escapes and can be turned off from config.
 */

import { LogEntry, OptionValue, ParseOutcome, PlanReport, SequenceVerdict } from './types';
import { isParseFailure } from './command-parser';
import { renderCommand, renderValue } from './command-renderer';

const ANSI = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
  reset: '\x1b[0m'
} as const;

type Colour = Exclude<keyof typeof ANSI, 'reset'>;

export class OutputFormatter {
  private colorEnabled: boolean;
  private verbose: boolean;

  constructor(colorEnabled: boolean = true, verbose: boolean = false) {
    this.colorEnabled = colorEnabled;
    this.verbose = verbose;
  }

  /**
   * Display a single command's parse (and validation) result
   */
  displayCommand(command: string, outcome: ParseOutcome): void {
    console.log(this.formatCommand(command, outcome).join('\n'));
  }

  formatCommand(command: string, outcome: ParseOutcome): string[] {
    if (isParseFailure(outcome)) {
      const lines = [
        this.paint('red', `🚫 PARSE FAILED: ${command}`),
        `Reason: ${outcome.message}`
      ];
      lines.push(...outcome.diagnostics.map(d => `  ${d.message}`));
      return lines;
    }

    const validation = outcome.validation;
    const header = validation && !validation.isValid
      ? this.paint('red', `🚫 INVALID: ${command}`)
      : validation && validation.warnings.length > 0
        ? this.paint('yellow', `⚠️  VALID WITH WARNINGS: ${command}`)
        : this.paint('green', `✅ VALID: ${command}`);

    const lines = [header, `Command: ${outcome.name}`];

    const flags = Object.entries(outcome.options);
    if (flags.length === 0) {
      lines.push('Options: (none)');
    } else {
      lines.push('Options:');
      for (const [flag, value] of flags) {
        lines.push(`  ${flag} = ${this.describeValue(value)}`);
      }
    }

    if (validation) {
      lines.push(...validation.warnings.map(w => this.paint('yellow', `  ${w}`)));
    }

    lines.push(...outcome.diagnostics.map(d => this.paint('yellow', `  ${d.message}`)));

    if (this.verbose) {
      lines.push(this.paint('dim', `Normalized: ${renderCommand(outcome)}`));
    }

    return lines;
  }

  displaySequence(verdict: SequenceVerdict): void {
    console.log(this.formatSequence(verdict).join('\n'));
  }

  formatSequence(verdict: SequenceVerdict): string[] {
    const lines = verdict.passed
      ? [this.paint('green', '✅ SEQUENCE PASSED')]
      : [this.paint('red', '🚫 SEQUENCE FAILED')];

    lines.push(verdict.diagnostic);

    if (this.verbose) {
      verdict.stagesMatchedInOrder.forEach((stage, i) => {
        lines.push(this.paint('dim', `  ${stage}: command ${verdict.matchedCommandIndices[i] + 1}`));
      });
    }

    return lines;
  }

  displayPlan(report: PlanReport): void {
    const lines: string[] = [];

    report.commands.forEach((entry, i) => {
      lines.push(`[${i + 1}] ${this.formatCommand(entry.command, entry.result).join('\n    ')}`);
    });

    lines.push('');
    lines.push(...this.formatSequence(report.sequence));
    lines.push('');

    if (report.accepted) {
      lines.push(this.paint('green', `✅ PLAN ACCEPTED (${report.commands.length} commands)`));
    } else {
      lines.push(this.paint('red', `🚫 PLAN REJECTED (${report.rejections.length} problem(s))`));
      lines.push(...report.rejections.map(r => `  - ${r}`));
    }

    console.log(lines.join('\n'));
  }

  displayLogEntries(entries: LogEntry[]): void {
    if (entries.length === 0) {
      this.displayInfo('No audit entries found.');
      return;
    }

    for (const entry of entries) {
      const status = entry.accepted ? this.paint('green', 'ACCEPTED') : this.paint('red', 'REJECTED');
      console.log(`${entry.timestamp}  ${entry.mode.padEnd(8)}  ${status}  ${entry.reason}`);
      if (this.verbose) {
        for (const command of entry.commands) {
          console.log(this.paint('dim', `    ${command}`));
        }
      }
    }
  }

  /**
   * Machine-readable output for orchestration layers. Integers print as
   * JSON numbers while they fit a double exactly, and as strings beyond.
   */
  displayJson(data: unknown): void {
    console.log(JSON.stringify(data, jsonValue, 2));
  }

  displayError(message: string): void {
    console.error(this.paint('red', `❌ Error: ${message}`));
  }

  displayWarning(message: string): void {
    console.error(this.paint('yellow', `⚠️  Warning: ${message}`));
  }

  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }

  private describeValue(value: OptionValue): string {
    const rendered = renderValue(value);
    return rendered === null ? 'true' : `${rendered} (${value.type})`;
  }

  private paint(colour: Colour, text: string): string {
    if (!this.colorEnabled) {
      return text;
    }
    return `${ANSI[colour]}${text}${ANSI.reset}`;
  }
}

function jsonValue(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') {
    return value;
  }
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}
