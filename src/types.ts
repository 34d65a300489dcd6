/**
 * Core type definitions for gmxcheck
 */

import { GromacsCommandName } from './gromacs-tables';

// ============================================================================
// Token Types
// ============================================================================

export enum TokenKind {
  KEYWORD = 'keyword',
  COMMAND_NAME = 'command_name',
  FLAG = 'flag',
  FILENAME = 'filename',
  STRING = 'string',
  FLOAT = 'float',
  INTEGER = 'integer',
  LPAREN = 'lparen',
  RPAREN = 'rparen'
}

interface TokenBase {
  /** Exact source text, quotes included */
  readonly lexeme: string;
  readonly line: number;      // 1-indexed
  readonly position: number;  // Character offset in the input
}

export interface FloatToken extends TokenBase {
  readonly kind: TokenKind.FLOAT;
  readonly value: number;
}

/** Integer literals are exact at any width */
export interface IntegerToken extends TokenBase {
  readonly kind: TokenKind.INTEGER;
  readonly value: bigint;
}

export interface TextToken extends TokenBase {
  readonly kind: Exclude<TokenKind, TokenKind.FLOAT | TokenKind.INTEGER>;
  /** Lexeme with surrounding quotes removed */
  readonly value: string;
}

export type Token = FloatToken | IntegerToken | TextToken;

export interface LexDiagnostic {
  character: string;
  line: number;
  position: number;
  message: string;
}

export interface TokenizeResult {
  tokens: Token[];
  diagnostics: LexDiagnostic[];
}

// ============================================================================
// Parsed Command Types
// ============================================================================

export type OptionValue =
  | { readonly type: 'filename'; readonly value: string }
  | { readonly type: 'text'; readonly value: string }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'int'; readonly value: bigint }
  // Integer members stay bigint, float members stay number
  | { readonly type: 'vector'; readonly value: readonly (number | bigint)[] }
  | { readonly type: 'boolean'; readonly value: true };

export type OptionMap = Readonly<Record<string, OptionValue>>;

export interface ValidationVerdict {
  isValid: boolean;
  warnings: string[];
}

export interface ParsedCommand {
  readonly kind: 'gromacs_command';
  readonly name: GromacsCommandName;
  /** Keyed by flag, e.g. '-f'; a repeated flag keeps its last value */
  readonly options: OptionMap;
  readonly diagnostics: readonly LexDiagnostic[];
  readonly validation?: ValidationVerdict;
}

export interface ParseFailure {
  readonly kind: 'parse_failure';
  /** Offending token, absent when input ended early */
  readonly token?: Token;
  readonly atEndOfInput: boolean;
  /** What the grammar expected at the failure point */
  readonly expected: string;
  readonly message: string;
  readonly diagnostics: readonly LexDiagnostic[];
}

export type ParseOutcome = ParsedCommand | ParseFailure;

// ============================================================================
// Sequence Types
// ============================================================================

export interface PipelineStage {
  readonly displayName: string;
  /** The first keyword is the one quoted in diagnostics */
  readonly keywords: readonly string[];
}

export interface SequenceVerdict {
  passed: boolean;
  diagnostic: string;
  stagesMatchedInOrder: string[];
  /** Index into the input list for each matched stage */
  matchedCommandIndices: number[];
  missingStage?: string;
}

// ============================================================================
// Plan Types
// ============================================================================

export interface PlanCommandReport {
  command: string;
  result: ParseOutcome;
}

export interface PlanReport {
  commands: PlanCommandReport[];
  sequence: SequenceVerdict;
  accepted: boolean;
  /** Human-readable reasons the plan was not accepted */
  rejections: string[];
}

export interface PlanCheckOptions {
  /** Treat every command warning as blocking */
  strict?: boolean;
  /** Run the per-command validator (default: true) */
  validate?: boolean;
}

export interface PlanEntry {
  command: string;
  lineNumber: number;  // 0 for entries read from a JSON array
}

export interface PlanReadError {
  line: number;
  message: string;
}

export interface PlanReadResult {
  entries: PlanEntry[];
  errors: PlanReadError[];
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  positional: string[];
  json?: boolean;
  verbose?: boolean;
  strict?: boolean;
  validate?: boolean;
  configPath?: string;
  limit?: number;
}

// ============================================================================
// Audit Logging Types
// ============================================================================

export type CheckMode = 'command' | 'sequence' | 'plan';

export interface LogEntry {
  timestamp: string;      // ISO 8601
  mode: CheckMode;
  commands: string[];
  accepted: boolean;
  warnings: string[];
  reason: string;
}

export interface LogReadOptions {
  limit?: number;         // Default: 50
  mode?: CheckMode;
  since?: Date;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface GmxCheckConfig {
  audit: {
    enabled: boolean;
    path: string;
    maxSize: number;
    /** Rotated logs kept beside the current one */
    maxBackups: number;
  };
  validation: {
    strict: boolean;
    validateCommands: boolean;
  };
  output: {
    verbose: boolean;
    color: boolean;
    json: boolean;
  };
}

export enum ConfigSource {
  USER = 'user',        // ~/.config/gmxcheck/config.json
  PROJECT = 'project'   // ./.gmxcheck.json
}

export interface ConfigError {
  source: ConfigSource;
  path: string;
  message: string;
}

export interface ConfigLoadResult {
  config: GmxCheckConfig;
  errors: ConfigError[];
}
