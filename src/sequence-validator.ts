/**
 * Sequence Validator - Checks that a plan walks the five pipeline stages
 * in order
 */

import { PipelineStage, SequenceVerdict } from './types';
import { PIPELINE_STAGES } from './gromacs-tables';

export class SequenceValidator {
  constructor(private readonly stages: readonly PipelineStage[] = PIPELINE_STAGES) {}

  /**
   * Lexical ordering guard. For each stage, scan forward from the last
   * matched command for one that mentions a stage keyword. The scan for a
   * stage ends at the first command that matches it, or fails at the first
   * command that matches only a later stage.
   */
  validate(commands: readonly string[]): SequenceVerdict {
    const lowered = commands.map(command => command.toLowerCase());
    const stagesMatchedInOrder: string[] = [];
    const matchedCommandIndices: number[] = [];
    let cursor = -1;

    for (let s = 0; s < this.stages.length; s++) {
      const stage = this.stages[s];
      const found = this.findStage(lowered, cursor + 1, s);

      if (found.index === -1) {
        return {
          passed: false,
          diagnostic: this.describeMissing(stage, stagesMatchedInOrder, found.preemptedBy),
          stagesMatchedInOrder,
          matchedCommandIndices,
          missingStage: stage.displayName
        };
      }

      cursor = found.index;
      stagesMatchedInOrder.push(stage.displayName);
      matchedCommandIndices.push(found.index);
    }

    return {
      passed: true,
      diagnostic: `All ${this.stages.length} pipeline stages found in order: ${stagesMatchedInOrder.join(' -> ')}`,
      stagesMatchedInOrder,
      matchedCommandIndices
    };
  }

  private findStage(
    lowered: readonly string[],
    start: number,
    stageIndex: number
  ): { index: number; preemptedBy?: { stage: PipelineStage; index: number } } {
    for (let i = start; i < lowered.length; i++) {
      if (this.mentions(lowered[i], this.stages[stageIndex])) {
        return { index: i };
      }

      const later = this.stages.slice(stageIndex + 1).find(stage => this.mentions(lowered[i], stage));
      if (later) {
        return { index: -1, preemptedBy: { stage: later, index: i } };
      }
    }
    return { index: -1 };
  }

  private mentions(command: string, stage: PipelineStage): boolean {
    return stage.keywords.some(keyword => command.includes(keyword.toLowerCase()));
  }

  private describeMissing(
    stage: PipelineStage,
    matched: readonly string[],
    preemptedBy?: { stage: PipelineStage; index: number }
  ): string {
    const last = matched.length > 0 ? matched[matched.length - 1] : 'start of plan';
    const lines = [
      `Missing pipeline stage '${stage.displayName}' after '${last}'.`,
      `Expected a command containing a keyword such as '${stage.keywords[0]}'.`
    ];

    if (preemptedBy) {
      lines.push(
        `Found '${preemptedBy.stage.displayName}' at command ${preemptedBy.index + 1} before '${stage.displayName}'.`
      );
    }

    lines.push(`Stages matched so far: ${matched.length > 0 ? matched.join(' -> ') : '(none)'}`);
    return lines.join(' ');
  }
}
