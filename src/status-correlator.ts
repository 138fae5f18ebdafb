/**
 * StatusCorrelator - Matches a STATS L query to its numeric reply
 *
 * A single query may be outstanding. The server answers with either
 * 211 RPL_STATSLINKINFO, whose payload carries "nick[user@host]", or
 * 481 ERR_NOPRIVILEGES when we may not query links. If neither arrives
 * within statusTimeoutSeconds the query is abandoned.
 */

import { ChatServer, IlineConfig, LookupRequest } from './types';
import { looksLikeAddress } from './address-classifier';

export const RPL_STATSLINKINFO = '211';
export const ERR_NOPRIVILEGES = '481';

const DEFAULT_TIMEOUT_SECONDS = 30;

// "nick[user@host]" anywhere in the reply; the host follows the last '@'
const LINK_INFO_PATTERN = /(\S+?)\[([^\]]*)@([^\]]*)\]/;

export type CorrelatorState = 'idle' | 'awaiting-status-reply';

export type StatusReplyOutcome =
  | { kind: 'ignored' }
  | { kind: 'resolved'; request: LookupRequest; address: string }
  | { kind: 'invalid'; request: LookupRequest; host: string }
  | { kind: 'rejected'; request: LookupRequest };

export type StatusTimeoutHandler = (request: LookupRequest) => void;

interface PendingQuery {
  request: LookupRequest;
  timer: NodeJS.Timeout;
}

export class StatusCorrelator {
  private pending: PendingQuery | null = null;

  get state(): CorrelatorState {
    return this.pending ? 'awaiting-status-reply' : 'idle';
  }

  get request(): LookupRequest | null {
    return this.pending ? this.pending.request : null;
  }

  /**
   * Send STATS L for request.nick and wait for the reply
   */
  begin(
    server: ChatServer,
    request: LookupRequest,
    settings: Pick<IlineConfig, 'statusTimeoutSeconds'>,
    onTimeout: StatusTimeoutHandler
  ): void {
    this.cancel();

    const seconds = settings.statusTimeoutSeconds > 0 ? settings.statusTimeoutSeconds : DEFAULT_TIMEOUT_SECONDS;
    const timer = setTimeout(() => {
      if (this.pending && this.pending.request === request) {
        this.pending = null;
        onTimeout(request);
      }
    }, seconds * 1000);

    this.pending = { request, timer };
    server.sendRaw(`STATS L ${request.nick}`);
  }

  /**
   * Handle a 211 reply. Replies for another server or nick leave the
   * pending query untouched.
   */
  handleStatsLinkInfo(serverTag: string, data: string): StatusReplyOutcome {
    if (!this.pending) {
      return { kind: 'ignored' };
    }

    const { request } = this.pending;
    if (serverTag.toLowerCase() !== request.serverTag.toLowerCase()) {
      return { kind: 'ignored' };
    }

    const match = LINK_INFO_PATTERN.exec(data);
    if (!match || match[1].toLowerCase() !== request.nick.toLowerCase()) {
      return { kind: 'ignored' };
    }

    this.cancel();

    const host = match[3].trim().toLowerCase();
    if (!looksLikeAddress(host)) {
      return { kind: 'invalid', request, host };
    }

    return { kind: 'resolved', request, address: host };
  }

  /**
   * Handle a 481 reply. Only one query is ever outstanding, so there is
   * nothing to match against.
   */
  handleNoPrivileges(): StatusReplyOutcome {
    if (!this.pending) {
      return { kind: 'ignored' };
    }

    const { request } = this.pending;
    this.cancel();
    return { kind: 'rejected', request };
  }

  cancel(): void {
    if (this.pending) {
      clearTimeout(this.pending.timer);
      this.pending = null;
    }
  }
}
