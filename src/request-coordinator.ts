/**
 * Request Coordinator - Owns the single in-flight lookup
 *
 * Only one LookupRequest may be live at a time. Completions carry the
 * request they belong to, so a late completion for a request that was
 * already closed (timed out, superseded) cannot close a newer one.
 */

import { LookupRequest, LookupState, LookupTarget } from './types';

export class RequestCoordinator {
  private active: LookupRequest | null = null;
  private nextId: number = 1;

  get current(): LookupRequest | null {
    return this.active;
  }

  isBusy(): boolean {
    return this.active !== null;
  }

  /**
   * Open a new request. Throws if one is already live; callers check
   * isBusy() first.
   */
  open(target: LookupTarget): LookupRequest {
    if (this.active) {
      throw new Error(`Lookup ${this.active.id} for ${this.active.nick} is still in flight`);
    }

    const request: LookupRequest = {
      id: this.nextId++,
      serverTag: target.serverTag,
      channelName: target.channelName,
      nick: target.nick,
      state: 'pending'
    };
    if (target.requestedBy !== undefined) {
      request.requestedBy = target.requestedBy;
    }

    this.active = request;
    return request;
  }

  advance(request: LookupRequest, state: LookupState): void {
    if (this.active === request) {
      request.state = state;
    }
  }

  /**
   * Close request if it is still the live one.
   * @returns whether anything was closed
   */
  close(request: LookupRequest): boolean {
    if (this.active !== request) {
      return false;
    }

    this.active = null;
    return true;
  }
}
