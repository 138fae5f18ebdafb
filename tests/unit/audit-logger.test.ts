/**
 * Unit tests for AuditLogger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AuditLogger } from '../../src/audit-logger';
import { LookupLogEntry } from '../../src/types';

function entry(overrides: Partial<LookupLogEntry> = {}): LookupLogEntry {
  return {
    timestamp: '2026-03-01T12:00:00.000Z',
    server: 'IRCnet',
    channel: '#i-line',
    nick: 'alice',
    outcome: 'reply',
    address: '192.0.2.10',
    provenance: 'Public',
    reply: 'covered by I-line',
    ...overrides
  };
}

describe('AuditLogger', () => {
  let dir: string;
  let logPath: string;
  let logger: AuditLogger;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'iline-log-'));
    logPath = path.join(dir, 'nested', 'lookups.log');
    logger = new AuditLogger(logPath);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should default to a file in the home directory', () => {
    expect(new AuditLogger().path).toBe(path.join(os.homedir(), '.iline-relay', 'lookups.log'));
  });

  it('should write one JSON line per entry', () => {
    logger.log(entry());
    logger.log(entry({ nick: 'bob', outcome: 'timeout', address: undefined, provenance: undefined, reply: undefined }));

    const lines = fs.readFileSync(logPath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(entry());
    expect(JSON.parse(lines[1])).toEqual({
      timestamp: '2026-03-01T12:00:00.000Z',
      server: 'IRCnet',
      channel: '#i-line',
      nick: 'bob',
      outcome: 'timeout'
    });
  });

  it('should read back what was written', () => {
    logger.log(entry());

    expect(logger.read()).toEqual([entry()]);
  });

  it('should return nothing when the log does not exist', () => {
    expect(logger.read()).toEqual([]);
  });

  it('should keep the most recent entries up to the limit', () => {
    for (const nick of ['a', 'b', 'c', 'd']) {
      logger.log(entry({ nick }));
    }

    expect(logger.read({ limit: 2 }).map((e) => e.nick)).toEqual(['c', 'd']);
  });

  it('should return nothing for a limit of zero', () => {
    for (const nick of ['a', 'b', 'c']) {
      logger.log(entry({ nick }));
    }

    expect(logger.read({ limit: 0 })).toEqual([]);
  });

  it('should filter by outcome and time', () => {
    logger.log(entry({ nick: 'a', outcome: 'reply', timestamp: '2026-03-01T10:00:00.000Z' }));
    logger.log(entry({ nick: 'b', outcome: 'rejected', timestamp: '2026-03-01T11:00:00.000Z' }));
    logger.log(entry({ nick: 'c', outcome: 'reply', timestamp: '2026-03-01T12:00:00.000Z' }));

    expect(logger.read({ outcome: 'reply' }).map((e) => e.nick)).toEqual(['a', 'c']);
    expect(logger.read({ since: new Date('2026-03-01T10:30:00.000Z') }).map((e) => e.nick)).toEqual(['b', 'c']);
  });

  it('should skip lines that are not valid entries', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    logger.log(entry({ nick: 'a' }));
    fs.appendFileSync(logPath, 'not json\n{"nick":"x","outcome":"reply"}\n');
    logger.log(entry({ nick: 'b' }));

    expect(logger.read().map((e) => e.nick)).toEqual(['a', 'b']);
    expect(warn).toHaveBeenCalledWith('Warning: Invalid entry in lookup log: not json');
    expect(warn).toHaveBeenCalledWith('Warning: Invalid entry in lookup log: {"nick":"x","outcome":"reply"}');
  });

  it('should rotate the log once it reaches the size limit', () => {
    const small = new AuditLogger(logPath, 10);

    small.log(entry({ nick: 'a' }));
    small.log(entry({ nick: 'b' }));

    const files = fs.readdirSync(path.dirname(logPath)).sort();
    expect(files).toHaveLength(2);
    expect(files[0]).toBe('lookups.log');
    expect(files[1].startsWith('lookups.log.')).toBe(true);
    expect(small.read().map((e) => e.nick)).toEqual(['b']);
  });

  it('should warn instead of throwing when the log cannot be written', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = path.join(dir, 'file');
    fs.writeFileSync(blocker, '');
    const broken = new AuditLogger(path.join(blocker, 'lookups.log'));

    expect(() => broken.log(entry())).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0]).startsWith('Warning: Failed to write lookup log: ')).toBe(true);
  });
});
