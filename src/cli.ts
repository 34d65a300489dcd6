/**
 * CLI Interface - Main command-line interface
 */

import { CLIOptions, GmxCheckConfig, LogEntry } from './types';
import { Validator } from './validator';
import { isParseFailure } from './command-parser';
import { PlanReader } from './plan-reader';
import { ConfigLoader } from './config-loader';
import { AuditLogger } from './audit-logger';
import { OutputFormatter } from './output-formatter';

export const VERSION = '0.1.0';

export class CLI {
  private validator = new Validator();

  /**
   * Main entry point for CLI
   *
   * Routes to:
   * - check: parse and validate one command
   * - sequence: check stage order of the given commands
   * - plan: check every command of a plan file and its stage order
   * - log: view audit log
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`gmxcheck v${VERSION}`);
        return 0;
      }

      const subcommand = args[0];
      const options = this.parseArgs(args.slice(1));

      const { config, errors } = new ConfigLoader().load(options.configPath);
      const resolved = this.applyOverrides(config, options);
      const formatter = new OutputFormatter(resolved.output.color && !resolved.output.json, resolved.output.verbose);
      for (const error of errors) {
        formatter.displayWarning(`${error.message} (${error.source}: ${error.path})`);
      }

      switch (subcommand) {
        case 'check':
          return this.handleCheck(options, resolved, formatter);
        case 'sequence':
          return this.handleSequence(options, resolved, formatter);
        case 'plan':
          return this.handlePlan(options, resolved, formatter);
        case 'log':
          return this.handleLog(options, resolved, formatter);
        default:
          throw new Error(`Unknown command: ${subcommand}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      return 1;
    }
  }

  /**
   * Parse flags following the subcommand. Anything that is not a known
   * flag is positional, so GROMACS flags inside a quoted command string
   * pass through untouched.
   */
  private parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = { positional: [] };
    let foundSeparator = false;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      // After --, everything is positional
      if (foundSeparator) {
        options.positional.push(arg);
        continue;
      }

      if (arg === '--') {
        foundSeparator = true;
      } else if (arg === '--json') {
        options.json = true;
      } else if (arg === '--verbose') {
        options.verbose = true;
      } else if (arg === '--strict') {
        options.strict = true;
      } else if (arg === '--no-validate') {
        options.validate = false;
      } else if (arg === '--config') {
        if (i + 1 >= args.length) {
          throw new Error('--config requires a path argument');
        }
        options.configPath = args[++i];
      } else if (arg === '--limit') {
        const value = Number(args[i + 1]);
        if (i + 1 >= args.length || !Number.isInteger(value) || value < 1) {
          throw new Error('--limit requires a positive integer');
        }
        options.limit = value;
        i++;
      } else if (arg.startsWith('--')) {
        throw new Error(`Unknown flag: ${arg}`);
      } else {
        options.positional.push(arg);
      }
    }

    return options;
  }

  private applyOverrides(config: GmxCheckConfig, options: CLIOptions): GmxCheckConfig {
    return {
      audit: { ...config.audit },
      validation: {
        strict: options.strict ?? config.validation.strict,
        validateCommands: options.validate ?? config.validation.validateCommands
      },
      output: {
        ...config.output,
        verbose: options.verbose ?? config.output.verbose,
        json: options.json ?? config.output.json
      }
    };
  }

  private displayUsage(): void {
    console.log(`
gmxcheck - Checks generated GROMACS commands before they are run

Usage:
  gmxcheck check "<command>"           Parse and validate one command
  gmxcheck sequence "<cmd>" "<cmd>"... Check pipeline stage order
  gmxcheck plan <file>                 Check every command of a plan file
  gmxcheck log                         View audit log

Flags:
  --json                               Print results as JSON
  --strict                             Treat command warnings as blocking
  --no-validate                        Parse only, skip command validation
  --verbose                            Show normalized commands and stage matches
  --config <path>                      Use this config file instead of ./.gmxcheck.json
  --limit <n>                          Number of log entries to show (default: 50)

Plan files hold one command per line ('#' comments allowed) or a JSON
array of command strings.

Examples:
  gmxcheck check "gmx pdb2gmx -f protein.pdb -o protein.gro"
  gmxcheck check "gmx editconf -f a.gro -box (2.0 2.0 2.0)" --json
  gmxcheck plan plan.txt --strict
    `.trim());
  }

  private handleCheck(options: CLIOptions, config: GmxCheckConfig, formatter: OutputFormatter): number {
    if (options.positional.length !== 1) {
      console.error('Error: check command requires exactly one command argument');
      console.error('Usage: gmxcheck check "<command>"');
      return 1;
    }

    const command = options.positional[0];
    const outcome = this.validator.parseCommand(command, config.validation.validateCommands);

    if (config.output.json) {
      formatter.displayJson(outcome);
    } else {
      formatter.displayCommand(command, outcome);
    }

    let accepted: boolean;
    let warnings: string[] = [];
    let reason: string;
    if (isParseFailure(outcome)) {
      accepted = false;
      reason = outcome.message;
    } else {
      warnings = outcome.validation?.warnings ?? [];
      const isValid = outcome.validation?.isValid ?? true;
      accepted = isValid && !(config.validation.strict && warnings.length > 0);
      reason = accepted ? 'Command accepted' : 'Command has blocking warnings';
    }

    this.audit(config, { mode: 'command', commands: [command], accepted, warnings, reason });
    return accepted ? 0 : 1;
  }

  private handleSequence(options: CLIOptions, config: GmxCheckConfig, formatter: OutputFormatter): number {
    if (options.positional.length === 0) {
      console.error('Error: sequence command requires at least one command argument');
      console.error('Usage: gmxcheck sequence "<cmd>" "<cmd>" ...');
      return 1;
    }

    const verdict = this.validator.validateSequence(options.positional);

    if (config.output.json) {
      formatter.displayJson(verdict);
    } else {
      formatter.displaySequence(verdict);
    }

    this.audit(config, {
      mode: 'sequence',
      commands: options.positional,
      accepted: verdict.passed,
      warnings: [],
      reason: verdict.diagnostic
    });
    return verdict.passed ? 0 : 1;
  }

  private handlePlan(options: CLIOptions, config: GmxCheckConfig, formatter: OutputFormatter): number {
    if (options.positional.length !== 1) {
      console.error('Error: plan command requires a plan file argument');
      console.error('Usage: gmxcheck plan <file>');
      return 1;
    }

    const { entries, errors } = new PlanReader().read(options.positional[0]);
    for (const error of errors) {
      const where = error.line > 0 ? ` at line ${error.line}` : '';
      formatter.displayWarning(`${error.message}${where}`);
    }
    if (entries.length === 0) {
      formatter.displayError('Plan contains no commands');
      return 1;
    }

    const commands = entries.map(entry => entry.command);
    const report = this.validator.checkPlan(commands, {
      strict: config.validation.strict,
      validate: config.validation.validateCommands
    });

    if (config.output.json) {
      formatter.displayJson(report);
    } else {
      formatter.displayPlan(report);
    }

    const warnings = report.commands.flatMap(entry =>
      isParseFailure(entry.result) ? [] : entry.result.validation?.warnings ?? []
    );
    this.audit(config, {
      mode: 'plan',
      commands,
      accepted: report.accepted,
      warnings,
      reason: report.accepted ? 'Plan accepted' : report.rejections.join(' | ')
    });
    return report.accepted ? 0 : 1;
  }

  private handleLog(options: CLIOptions, config: GmxCheckConfig, formatter: OutputFormatter): number {
    const logger = new AuditLogger(config.audit.path, config.audit.maxSize, config.audit.maxBackups);
    const entries = logger.read({ limit: options.limit });

    if (config.output.json) {
      formatter.displayJson(entries);
    } else {
      formatter.displayLogEntries(entries);
    }
    return 0;
  }

  private audit(config: GmxCheckConfig, entry: Omit<LogEntry, 'timestamp'>): void {
    if (!config.audit.enabled) {
      return;
    }
    const logger = new AuditLogger(config.audit.path, config.audit.maxSize, config.audit.maxBackups);
    logger.log({ timestamp: new Date().toISOString(), ...entry });
  }
}
