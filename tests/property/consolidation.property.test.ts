/**
 * Property-Based Tests for consolidation grouping, thresholds and caching
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { BoundedCache } from '../../src/cache.js';
import { adjustThreshold, CONSOLIDATION, groupByContext } from '../../src/consolidation.js';
import { memoryArb, unitArb } from './arbitraries.js';

describe('Consolidation Property-Based Tests', () => {
  it('should partition memories into groups of bounded size', () => {
    fc.assert(
      fc.property(fc.uniqueArray(memoryArb, { selector: (m) => m.id, maxLength: 20 }), (memories) => {
        const groups = groupByContext(memories);
        const ids = groups.flat().map((m) => m.id);

        expect(ids.sort()).toEqual(memories.map((m) => m.id).sort());
        for (const group of groups) {
          expect(group.length).toBeGreaterThan(0);
          expect(group.length).toBeLessThanOrEqual(CONSOLIDATION.MAX_GROUP_SIZE);
        }
      }),
      { numRuns: 200 }
    );
  });

  it('should keep adjusted thresholds within bounds', () => {
    fc.assert(
      fc.property(
        fc.double({ min: CONSOLIDATION.THRESHOLD_MIN, max: CONSOLIDATION.THRESHOLD_MAX, noNaN: true }),
        unitArb,
        unitArb,
        (previous, rate, score) => {
          const next = adjustThreshold(previous, rate, score);
          expect(next).toBeGreaterThanOrEqual(CONSOLIDATION.THRESHOLD_MIN);
          expect(next).toBeLessThanOrEqual(CONSOLIDATION.THRESHOLD_MAX);
        }
      ),
      { numRuns: 300 }
    );
  });

  it('should never hold more entries than its capacity', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.array(fc.integer({ min: 0, max: 30 })), (maxSize, keys) => {
        const cache = new BoundedCache<number, number>({ maxSize });
        for (const key of keys) {
          cache.put(key, key);
          expect(cache.size).toBeLessThanOrEqual(maxSize);
        }
      }),
      { numRuns: 200 }
    );
  });
});
