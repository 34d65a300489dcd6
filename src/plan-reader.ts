/**
 * Plan Reader - Loads a list of generated commands from a plan file
 *
 * Two formats are accepted:
 * - a JSON array of command strings (what an agent run returns)
 * - plain text, one command per line; blank lines, '#' comments and
 *   Markdown code fences are skipped
 */

import * as fs from 'fs';
import { PlanEntry, PlanReadError, PlanReadResult } from './types';

export class PlanReader {
  read(filePath: string): PlanReadResult {
    if (!fs.existsSync(filePath)) {
      return { entries: [], errors: [{ line: 0, message: `Plan file not found: ${filePath}` }] };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      return {
        entries: [],
        errors: [{
          line: 0,
          message: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`
        }]
      };
    }

    return this.parse(content);
  }

  parse(content: string): PlanReadResult {
    if (content.trim().startsWith('[')) {
      return this.parseJson(content);
    }
    return this.parseLines(content);
  }

  private parseJson(content: string): PlanReadResult {
    const entries: PlanEntry[] = [];
    const errors: PlanReadError[] = [];

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      errors.push({
        line: 0,
        message: `Invalid JSON plan: ${error instanceof Error ? error.message : String(error)}`
      });
      return { entries, errors };
    }

    if (!Array.isArray(data)) {
      errors.push({ line: 0, message: 'JSON plan must be an array of command strings' });
      return { entries, errors };
    }

    data.forEach((item: unknown, index) => {
      if (typeof item === 'string' && item.trim() !== '') {
        entries.push({ command: item.trim(), lineNumber: 0 });
      } else {
        errors.push({ line: 0, message: `Plan entry ${index + 1} is not a command string` });
      }
    });

    return { entries, errors };
  }

  private parseLines(content: string): PlanReadResult {
    const entries: PlanEntry[] = [];
    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();

      // Skip blank lines, comments and fences
      if (line === '' || line.startsWith('#') || line.startsWith('```')) {
        continue;
      }

      entries.push({ command: line, lineNumber: i + 1 });
    }

    return { entries, errors: [] };
  }
}
