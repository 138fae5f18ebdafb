/**
 * ReplyFormatter - Renders chat reply lines and console output
 *
 * Chat lines look like:
 *   nick: [Reply Truncated] [Iline] 192.0.2.1 is covered by ...
 *
 * The bracketed prefix lists every flag set in the line's PrefixBits, in
 * flag declaration order. Short labels are single characters and are run
 * together ("[<T]"); long labels are separated by spaces.
 */

import { IlineConfig, PrefixBits, PrefixFlag } from './types';

export interface PrefixLabel {
  short: string;
  long: string;
}

export const PREFIX_LABELS: ReadonlyMap<PrefixFlag, PrefixLabel> = new Map([
  [PrefixFlag.ARGUMENT, { short: 'A', long: 'Argument' }],
  [PrefixFlag.WEBCHAT, { short: 'W', long: 'Webchat' }],
  [PrefixFlag.PUBLIC, { short: 'P', long: 'Public' }],
  [PrefixFlag.STATS_L, { short: 'L', long: 'Stats L' }],
  [PrefixFlag.NICK, { short: 'N', long: 'Nick' }],
  [PrefixFlag.REPLY, { short: '<', long: 'Reply' }],
  [PrefixFlag.ERROR, { short: '!', long: 'Error' }],
  [PrefixFlag.TRUNCATED, { short: 'T', long: 'Truncated' }],
  [PrefixFlag.GARBAGE, { short: 'G', long: 'Garbage' }]
]);

export type FormatSettings = Pick<IlineConfig, 'showPrefix' | 'showPrefixLong' | 'showBanner' | 'command'>;

export class ReplyFormatter {
  /**
   * Build a complete channel line addressed to nick
   */
  format(nick: string, body: string, bits: PrefixBits, settings: FormatSettings): string {
    let line = `${nick}: ${this.formatPrefix(bits, settings)}`;

    if (settings.showBanner) {
      line += `[${settings.command.trim()}] `;
    }

    return line + body.trim();
  }

  /**
   * Bracketed label list with trailing space, or '' when nothing is shown
   */
  formatPrefix(bits: PrefixBits, settings: Pick<FormatSettings, 'showPrefix' | 'showPrefixLong'>): string {
    if (!settings.showPrefix || !bits) {
      return '';
    }

    const labels: string[] = [];
    for (const [flag, label] of PREFIX_LABELS) {
      if (bits & flag) {
        labels.push(settings.showPrefixLong ? label.long : label.short);
      }
    }

    if (labels.length === 0) {
      return '';
    }

    const joined = labels.join(settings.showPrefixLong ? ' ' : '');
    return `[${joined.trim()}] `;
  }

  /**
   * Human-readable names of the flags set in bits
   */
  describe(bits: PrefixBits): string[] {
    const names: string[] = [];
    for (const [flag, label] of PREFIX_LABELS) {
      if (bits & flag) {
        names.push(label.long);
      }
    }
    return names;
  }

  /**
   * Display error message
   */
  displayError(message: string): void {
    console.error(`❌ Error: ${message}`);
  }

  /**
   * Display warning message
   */
  displayWarning(message: string): void {
    console.warn(`⚠️  Warning: ${message}`);
  }

  /**
   * Display info message
   */
  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }
}
