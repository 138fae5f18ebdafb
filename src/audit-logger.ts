/**
 * Audit Logger - Records the outcome of every lookup
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LookupLogEntry, LogReadOptions } from './types';

export class AuditLogger {
  private logPath: string;
  private maxSize: number;

  constructor(logPath?: string, maxSize: number = 10 * 1024 * 1024) {
    // Default to ~/.iline-relay/lookups.log
    this.logPath = logPath || path.join(os.homedir(), '.iline-relay', 'lookups.log');
    this.maxSize = maxSize;
  }

  get path(): string {
    return this.logPath;
  }

  /**
   * Append an entry as one line of JSON. Failures are reported on stderr
   * and never interrupt the lookup.
   */
  log(entry: LookupLogEntry): void {
    try {
      this.ensureLogDirectory();

      if (this.shouldRotate()) {
        this.rotate();
      }

      fs.appendFileSync(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`Warning: Failed to write lookup log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Move the current log aside under a timestamped name
   */
  rotate(): void {
    try {
      if (!fs.existsSync(this.logPath)) {
        return;
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.logPath, `${this.logPath}.${timestamp}`);
    } catch (error) {
      console.error(`Warning: Failed to rotate lookup log: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Read the most recent entries, optionally filtered
   */
  read(options?: LogReadOptions): LookupLogEntry[] {
    try {
      if (!fs.existsSync(this.logPath)) {
        return [];
      }

      const content = fs.readFileSync(this.logPath, 'utf-8');
      const lines = content.trim().split('\n').filter(line => line.length > 0);

      const entries: LookupLogEntry[] = [];
      for (const line of lines) {
        const entry = this.parseEntry(line);
        if (entry) {
          entries.push(entry);
        } else {
          console.error(`Warning: Invalid entry in lookup log: ${line}`);
        }
      }

      let filtered = entries;

      const outcome = options?.outcome;
      if (outcome) {
        filtered = filtered.filter(e => e.outcome === outcome);
      }

      const since = options?.since;
      if (since) {
        filtered = filtered.filter(e => new Date(e.timestamp) >= since);
      }

      const limit = options?.limit ?? 50;
      if (filtered.length > limit) {
        filtered = filtered.slice(filtered.length - limit);
      }

      return filtered;
    } catch (error) {
      console.error(`Warning: Failed to read lookup log: ${error instanceof Error ? error.message : String(error)}`);
      return [];
    }
  }

  private parseEntry(line: string): LookupLogEntry | null {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return null;
    }

    if (typeof value !== 'object' || value === null) {
      return null;
    }

    const record: Record<string, unknown> = { ...value };
    const { timestamp, server, channel, nick, outcome } = record;
    if (
      typeof timestamp !== 'string' ||
      typeof server !== 'string' ||
      typeof channel !== 'string' ||
      typeof nick !== 'string' ||
      !isOutcome(outcome)
    ) {
      return null;
    }

    const entry: LookupLogEntry = { timestamp, server, channel, nick, outcome };
    if (typeof record.requestedBy === 'string') {
      entry.requestedBy = record.requestedBy;
    }
    if (typeof record.address === 'string') {
      entry.address = record.address;
    }
    if (typeof record.provenance === 'string') {
      entry.provenance = record.provenance;
    }
    if (typeof record.reply === 'string') {
      entry.reply = record.reply;
    }
    return entry;
  }

  private ensureLogDirectory(): void {
    const logDir = path.dirname(this.logPath);

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  }

  private shouldRotate(): boolean {
    try {
      if (!fs.existsSync(this.logPath)) {
        return false;
      }

      return fs.statSync(this.logPath).size >= this.maxSize;
    } catch {
      return false;
    }
  }
}

export const OUTCOMES: ReadonlySet<string> = new Set([
  'reply',
  'no-reply',
  'invalid-address',
  'unknown-nick',
  'rejected',
  'timeout',
  'worker-failed'
]);

export function isOutcome(value: unknown): value is LookupLogEntry['outcome'] {
  return typeof value === 'string' && OUTCOMES.has(value);
}
