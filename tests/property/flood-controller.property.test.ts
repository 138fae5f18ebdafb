/**
 * Property-based tests for FloodController
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { FloodController } from '../../src/flood-controller';

describe('Flood window', () => {
  test('admits exactly floodCount of any burst inside one window', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), fc.integer({ min: 0, max: 50 }), (ceiling, burst) => {
        const flood = new FloodController();
        const settings = { floodTimeoutSeconds: 60, floodCount: ceiling };

        let admitted = 0;
        for (let i = 0; i < burst; i++) {
          if (flood.admit(settings)) {
            admitted++;
          }
        }
        flood.reset();

        expect(admitted).toBe(Math.min(burst, ceiling));
      })
    );
  });

  test('a refund followed by an admit leaves the count unchanged', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 20 }), (admits) => {
        const flood = new FloodController();
        const settings = { floodTimeoutSeconds: 60, floodCount: 50 };
        for (let i = 0; i < admits; i++) {
          flood.admit(settings);
        }

        flood.refund();
        const admitted = flood.admit(settings);
        const count = flood.count;
        flood.reset();

        expect(admitted).toBe(true);
        expect(count).toBe(admits);
      })
    );
  });
});
