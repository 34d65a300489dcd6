/**
 * GROMACS grammar tables - process-wide, frozen configuration shared by
 * the tokenizer, parser and both validators
 */

import { PipelineStage } from './types';

/** Program invocation keyword */
export const GMX_KEYWORD = 'gmx';

// Workflow commands first, then the common analysis tools
export const KNOWN_COMMANDS = Object.freeze([
  'pdb2gmx', 'editconf', 'solvate', 'grompp', 'mdrun', 'energy',
  'trjconv', 'rms', 'rmsf', 'gyrate', 'distance', 'angle',
  'mindist', 'hbond', 'sasa', 'cluster', 'density', 'potential',
  'genion', 'genrestr', 'make_ndx', 'do_dssp', 'rama'
] as const);

export type GromacsCommandName = typeof KNOWN_COMMANDS[number];

const KNOWN_COMMAND_SET: ReadonlySet<string> = new Set<string>(KNOWN_COMMANDS);

export function isKnownCommand(word: string): word is GromacsCommandName {
  return KNOWN_COMMAND_SET.has(word);
}

export const FILE_EXTENSIONS = Object.freeze([
  'pdb',  // structure
  'gro',  // coordinates
  'top',  // topology
  'mdp',  // run parameters
  'tpr',  // run input
  'xtc',  // compressed trajectory
  'trr',  // full-precision trajectory
  'edr',  // energy
  'cpt',  // checkpoint
  'xvg',  // plot data
  'ndx',  // index groups
  'itp',  // include topology
  'dat',
  'log',
  'out',
  'tng',
  'pqr'
] as const);

/** Flags accepted per command; commands absent here skip flag checking */
export const COMMAND_FLAGS: Readonly<Partial<Record<GromacsCommandName, ReadonlySet<string>>>> = Object.freeze({
  pdb2gmx: new Set(['-f', '-o', '-p', '-i', '-n', '-q', '-ff', '-water']),
  editconf: new Set(['-f', '-o', '-n', '-bf', '-box', '-angles', '-d', '-c', '-center']),
  solvate: new Set(['-cp', '-cs', '-o', '-p', '-box', '-radius']),
  grompp: new Set(['-f', '-c', '-r', '-p', '-n', '-o', '-t', '-maxwarn']),
  mdrun: new Set(['-s', '-o', '-x', '-c', '-e', '-g', '-cpi', '-cpo', '-deffnm', '-v', '-nt', '-ntmpi']),
  energy: new Set(['-f', '-o', '-xvg'])
});

export interface RequiredFlagRule {
  /** Satisfied when any one of these flags is present */
  readonly anyOf: readonly string[];
  readonly message: string;
}

export const REQUIRED_FLAGS: Readonly<Partial<Record<GromacsCommandName, readonly RequiredFlagRule[]>>> = Object.freeze({
  pdb2gmx: [
    { anyOf: ['-f'], message: "'pdb2gmx' typically requires -f (input PDB file)" }
  ],
  grompp: [
    { anyOf: ['-f'], message: "'grompp' requires -f (MDP file)" },
    { anyOf: ['-c'], message: "'grompp' requires -c (coordinate file)" },
    { anyOf: ['-p'], message: "'grompp' requires -p (topology file)" }
  ],
  mdrun: [
    { anyOf: ['-s', '-deffnm'], message: "'mdrun' requires -s (TPR file) or -deffnm" }
  ]
});

export const PIPELINE_STAGES: readonly PipelineStage[] = Object.freeze([
  { displayName: 'topology generation', keywords: ['pdb2gmx', 'topology', 'forcefield'] },
  { displayName: 'box configuration', keywords: ['editconf', 'box', 'periodic'] },
  { displayName: 'solvation', keywords: ['solvate', 'water'] },
  { displayName: 'preprocessing', keywords: ['grompp', 'mdp'] },
  { displayName: 'execution', keywords: ['mdrun', 'simulation'] }
].map(stage => Object.freeze({ ...stage, keywords: Object.freeze(stage.keywords) })));
