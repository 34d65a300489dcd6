/**
 * Audit Logger - Records check results as JSON lines
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LogEntry, LogReadOptions } from './types';

export class AuditLogger {
  private logPath: string;
  private maxSize: number;
  private maxBackups: number;

  constructor(logPath?: string, maxSize: number = 10 * 1024 * 1024, maxBackups: number = 5) {
    this.logPath = logPath || path.join(os.homedir(), '.gmxcheck', 'audit.log');
    this.maxSize = maxSize;
    this.maxBackups = maxBackups;
  }

  /**
   * Append one check result. A write failure prints a warning and the
   * check's outcome stands.
   */
  log(entry: LogEntry): void {
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });

      const size = fs.statSync(this.logPath, { throwIfNoEntry: false })?.size ?? 0;
      if (size >= this.maxSize) {
        this.rotate();
      }

      fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to write audit log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Rename the current log to `<log>.<timestamp>` and drop the oldest
   * backups past maxBackups
   */
  rotate(): void {
    try {
      if (!fs.existsSync(this.logPath)) {
        return;
      }

      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.logPath, `${this.logPath}.${stamp}`);

      const backups = this.backups();
      for (const backup of backups.slice(0, Math.max(0, backups.length - this.maxBackups))) {
        fs.rmSync(backup, { force: true });
      }
    } catch (error) {
      console.error(`Warning: Failed to rotate audit log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** Rotated logs, oldest first */
  backups(): string[] {
    const dir = path.dirname(this.logPath);
    const prefix = `${path.basename(this.logPath)}.`;
    return fs.readdirSync(dir)
      .filter(name => name.startsWith(prefix))
      .sort()
      .map(name => path.join(dir, name));
  }

  read(options?: LogReadOptions): LogEntry[] {
    try {
      if (!fs.existsSync(this.logPath)) {
        return [];
      }

      const content = fs.readFileSync(this.logPath, 'utf-8');
      const lines = content.trim().split('\n').filter(line => line.length > 0);

      const entries: LogEntry[] = [];
      for (const line of lines) {
        const entry = this.parseEntry(line);
        if (entry) {
          entries.push(entry);
        } else {
          console.error(`Warning: Invalid entry in audit log: ${line}`);
        }
      }

      let filtered = entries;

      if (options?.mode) {
        filtered = filtered.filter(e => e.mode === options.mode);
      }

      const since = options?.since;
      if (since) {
        filtered = filtered.filter(e => new Date(e.timestamp) >= since);
      }

      // Most recent entries
      const limit = options?.limit ?? 50;
      if (filtered.length > limit) {
        filtered = filtered.slice(-limit);
      }

      return filtered;
    } catch (error) {
      console.error(`Warning: Failed to read audit log: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  private parseEntry(line: string): LogEntry | null {
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch {
      return null;
    }

    if (typeof data !== 'object' || data === null) {
      return null;
    }
    if (!('timestamp' in data) || !('mode' in data) || !('commands' in data) ||
        !('accepted' in data) || !('warnings' in data) || !('reason' in data)) {
      return null;
    }

    const { timestamp, mode, commands, accepted, warnings, reason } = data;
    if (typeof timestamp !== 'string' || typeof accepted !== 'boolean' || typeof reason !== 'string') {
      return null;
    }
    if (mode !== 'command' && mode !== 'sequence' && mode !== 'plan') {
      return null;
    }
    if (!isStringArray(commands) || !isStringArray(warnings)) {
      return null;
    }

    return { timestamp, mode, commands, accepted, warnings, reason };
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
