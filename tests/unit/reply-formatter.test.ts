/**
 * Unit tests for ReplyFormatter
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ReplyFormatter, FormatSettings } from '../../src/reply-formatter';
import { PrefixFlag } from '../../src/types';

describe('ReplyFormatter', () => {
  const formatter = new ReplyFormatter();

  const shortLabels: FormatSettings = { showPrefix: true, showPrefixLong: false, showBanner: false, command: 'Iline' };
  const longLabels: FormatSettings = { ...shortLabels, showPrefixLong: true };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('format', () => {
    it('should run short labels together in flag order', () => {
      const line = formatter.format('alice', 'text', PrefixFlag.TRUNCATED | PrefixFlag.REPLY, shortLabels);

      expect(line).toBe('alice: [<T] text');
    });

    it('should separate long labels with spaces', () => {
      const line = formatter.format('alice', 'text', PrefixFlag.REPLY | PrefixFlag.TRUNCATED, longLabels);

      expect(line).toBe('alice: [Reply Truncated] text');
    });

    it('should place the banner after the prefix', () => {
      const line = formatter.format('alice', 'text', PrefixFlag.STATS_L, { ...longLabels, showBanner: true, command: ' Iline ' });

      expect(line).toBe('alice: [Stats L] [Iline] text');
    });

    it('should leave out the bracket for a zero bitmask', () => {
      expect(formatter.format('alice', 'Processing...', 0, longLabels)).toBe('alice: Processing...');
    });

    it('should leave out the bracket when prefixes are disabled', () => {
      const line = formatter.format('alice', 'text', PrefixFlag.ERROR, { ...longLabels, showPrefix: false });

      expect(line).toBe('alice: text');
    });

    it('should trim the body', () => {
      expect(formatter.format('alice', '  spaced out  ', 0, shortLabels)).toBe('alice: spaced out');
    });

    it('should render every flag', () => {
      const all =
        PrefixFlag.ARGUMENT | PrefixFlag.WEBCHAT | PrefixFlag.PUBLIC | PrefixFlag.STATS_L | PrefixFlag.NICK |
        PrefixFlag.REPLY | PrefixFlag.ERROR | PrefixFlag.TRUNCATED | PrefixFlag.GARBAGE;

      expect(formatter.formatPrefix(all, shortLabels)).toBe('[AWPLN<!TG] ');
      expect(formatter.formatPrefix(all, longLabels)).toBe(
        '[Argument Webchat Public Stats L Nick Reply Error Truncated Garbage] '
      );
    });

    it('should ignore bits outside the known flags', () => {
      expect(formatter.formatPrefix(512, longLabels)).toBe('');
      expect(formatter.formatPrefix(512 | PrefixFlag.NICK, longLabels)).toBe('[Nick] ');
    });
  });

  describe('describe', () => {
    it('should list long labels of the set flags', () => {
      expect(formatter.describe(PrefixFlag.ERROR | PrefixFlag.REPLY)).toEqual(['Reply', 'Error']);
      expect(formatter.describe(0)).toEqual([]);
    });
  });

  describe('console output', () => {
    it('should write errors to stderr', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      formatter.displayError('worker failed');

      expect(spy).toHaveBeenCalledWith('❌ Error: worker failed');
    });

    it('should write warnings with console.warn', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      formatter.displayWarning('unknown setting');

      expect(spy).toHaveBeenCalledWith('⚠️  Warning: unknown setting');
    });
  });
});
