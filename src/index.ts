#!/usr/bin/env node
/**
 * gmxcheck - Main entry point
 */

import { CLI } from './cli';
import { Validator } from './validator';
import { ParseOutcome, PlanCheckOptions, PlanReport, SequenceVerdict } from './types';

export async function main(args: string[]): Promise<number> {
  const cli = new CLI();
  return await cli.run(args);
}

const defaultValidator = new Validator();

export function parseCommand(commandString: string, shouldValidate: boolean = true): ParseOutcome {
  return defaultValidator.parseCommand(commandString, shouldValidate);
}

export function validateSequence(commandStrings: readonly string[]): SequenceVerdict {
  return defaultValidator.validateSequence(commandStrings);
}

export function checkPlan(commandStrings: readonly string[], options?: PlanCheckOptions): PlanReport {
  return defaultValidator.checkPlan(commandStrings, options);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

export * from './types';
export * from './gromacs-tables';
export { Validator } from './validator';
export { CLI } from './cli';
export { CommandTokenizer, classifyIdentifier } from './command-tokenizer';
export { CommandParser, isParseFailure } from './command-parser';
export { CommandValidator, isParsedCommand, NOT_A_COMMAND_WARNING } from './command-validator';
export { SequenceValidator } from './sequence-validator';
export { renderCommand, renderValue } from './command-renderer';
export { PlanReader } from './plan-reader';
export { ConfigLoader, defaultConfig } from './config-loader';
export { AuditLogger } from './audit-logger';
export { OutputFormatter } from './output-formatter';
