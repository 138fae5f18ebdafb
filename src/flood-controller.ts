/**
 * Flood Controller - Rolling-window admission gate for lookup commands
 */

import { IlineConfig } from './types';

const DEFAULT_WINDOW_SECONDS = 60;
const DEFAULT_CEILING = 5;

export type FloodSettings = Pick<IlineConfig, 'floodTimeoutSeconds' | 'floodCount'>;

export class FloodController {
  private requests: number = 0;
  private timer: NodeJS.Timeout | null = null;

  get count(): number {
    return this.requests;
  }

  get windowActive(): boolean {
    return this.timer !== null;
  }

  /**
   * Count a request and decide whether it may proceed.
   *
   * The first request opens a window of floodTimeoutSeconds; within it at
   * most floodCount requests are admitted. Zero values fall back to the
   * defaults.
   */
  admit(settings: FloodSettings): boolean {
    if (this.timer === null) {
      const seconds = Math.trunc(settings.floodTimeoutSeconds) || DEFAULT_WINDOW_SECONDS;
      this.timer = setTimeout(() => this.expire(), seconds * 1000);
      this.requests = 1;
      return true;
    }

    const ceiling = Math.trunc(settings.floodCount) || DEFAULT_CEILING;
    if (this.requests >= ceiling) {
      return false;
    }

    this.requests++;
    return true;
  }

  /**
   * Give back a request that turned out to be a continuation of an
   * earlier one.
   */
  refund(): void {
    if (this.requests > 0) {
      this.requests--;
    }
  }

  /**
   * Clear the window immediately
   */
  reset(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
    }
    this.expire();
  }

  private expire(): void {
    this.requests = 0;
    this.timer = null;
  }
}
