/**
 * LookupExecutor - Fetches a lookup result in a separate worker process
 *
 * The HTTP request runs in a child Node.js process so that a hung or
 * crashing fetch cannot take the bot down with it. The child writes the
 * response body to its stdout; we read at most MAX_REPLY_LINES lines from
 * that pipe as they arrive and then stop the child.
 */

import { spawn, ChildProcess } from 'child_process';
import * as readline from 'readline';
import { IlineConfig, LookupReply, PrefixBits, PrefixFlag } from './types';

export const MAX_REPLY_LINES = 3;
export const MAX_REPLY_LENGTH = 300;

const DEFAULT_WORKER_TIMEOUT_SECONDS = 30;

const HTML_TAG_PATTERN = /<\/?[a-z]+?>/gi;
const SAFE_REPLY_PATTERN = /^[a-z0-9.:_\-<>,()/ ]{1,300}$/i;
const UNSAFE_CHARS_PATTERN = /[^a-z0-9.:_\-<>,()/ ]/gi;

// Runs in the worker: GET argv[1], print the body, exit. A failed or
// non-2xx request prints nothing.
const FETCH_WORKER_SOURCE = [
  'const [url, timeout] = process.argv.slice(1);',
  'fetch(url, { signal: AbortSignal.timeout(Number(timeout)) })',
  "  .then((response) => (response.ok ? response.text() : ''))",
  '  .then((body) => process.stdout.write(body))',
  '  .catch(() => process.exit(1));'
].join('\n');

export type ExecutorSettings = Pick<IlineConfig, 'url' | 'showExtended' | 'workerTimeoutSeconds'>;

/**
 * Starts a worker that fetches url and writes the body to its stdout
 */
export type WorkerFactory = (url: string, timeoutMs: number) => ChildProcess;

export const spawnFetchWorker: WorkerFactory = (url, timeoutMs) =>
  spawn(process.execPath, ['-e', FETCH_WORKER_SOURCE, url, String(timeoutMs)], {
    stdio: ['ignore', 'pipe', 'ignore'],
    shell: false
  });

export class LookupExecutor {
  private spawnWorker: WorkerFactory;

  constructor(spawnWorker?: WorkerFactory) {
    this.spawnWorker = spawnWorker || spawnFetchWorker;
  }

  /**
   * Look up address with the configured service.
   *
   * @returns the cleaned reply, or null when no worker could be started
   */
  async execute(address: string, settings: ExecutorSettings): Promise<LookupReply | null> {
    const seconds = settings.workerTimeoutSeconds > 0 ? settings.workerTimeoutSeconds : DEFAULT_WORKER_TIMEOUT_SECONDS;
    const lines = await this.drain(`${settings.url}${address}`, seconds * 1000);

    if (lines === null) {
      return null;
    }

    return sanitizeReply(lines.join(' '), settings);
  }

  /**
   * Collect up to MAX_REPLY_LINES trimmed lines from a worker's stdout
   */
  private drain(url: string, timeoutMs: number): Promise<string[] | null> {
    return new Promise((resolve) => {
      let worker: ChildProcess;
      try {
        worker = this.spawnWorker(url, timeoutMs);
      } catch {
        resolve(null);
        return;
      }

      const stdout = worker.stdout;
      if (!stdout) {
        worker.kill();
        resolve(null);
        return;
      }

      const lines: string[] = [];
      const reader = readline.createInterface({ input: stdout, crlfDelay: Infinity });
      let settled = false;

      const finish = (result: string[] | null): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        reader.close();
        // Already exited in the common case; otherwise we have what we need
        worker.kill();
        resolve(result);
      };

      // A worker that never finishes keeps whatever it wrote so far
      const timer = setTimeout(() => finish(lines), timeoutMs);

      worker.once('error', () => finish(null));

      reader.on('line', (line) => {
        if (settled) {
          return;
        }
        lines.push(line.trim());
        if (lines.length >= MAX_REPLY_LINES) {
          finish(lines);
        }
      });

      reader.once('close', () => finish(lines));
    });
  }
}

/**
 * Turn the raw worker output into a reply line.
 *
 * HTML tags are removed, overlong text is cut to MAX_REPLY_LENGTH and
 * anything outside the safe character set is dropped; each of the last
 * two is flagged on the reply.
 */
export function sanitizeReply(raw: string, settings: Pick<IlineConfig, 'url' | 'showExtended'>): LookupReply {
  let text = raw.trim();

  if (text === '') {
    let message = 'No reply';
    if (settings.showExtended) {
      message += ` (${settings.url})`;
    }
    return { text: message, bits: PrefixFlag.REPLY | PrefixFlag.ERROR };
  }

  text = text.replace(HTML_TAG_PATTERN, '').trim();
  let bits: PrefixBits = PrefixFlag.REPLY;

  if (text.length > MAX_REPLY_LENGTH) {
    text = text.substring(0, MAX_REPLY_LENGTH).trim();
    bits |= PrefixFlag.TRUNCATED;
  }

  if (!SAFE_REPLY_PATTERN.test(text)) {
    text = text.replace(UNSAFE_CHARS_PATTERN, '').trim();
    bits |= PrefixFlag.GARBAGE;
  }

  return { text, bits };
}
