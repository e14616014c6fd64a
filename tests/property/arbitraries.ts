/**
 * Shared fast-check arbitraries for property tests
 */

import * as fc from 'fast-check';
import { createMemory, DAY_MS, type Memory } from '../../src/types.js';
import { FIXED_NOW } from '../utils.js';

const WORDS = ['tea', 'garden', 'mom', 'dog', 'rain', 'bread', 'market', 'letter', 'today'];

export const unitArb = fc.double({ min: 0, max: 1, noNaN: true });

export const memoryArb: fc.Arbitrary<Memory> = fc
  .record({
    id: fc.uuid(),
    content: fc.array(fc.constantFrom(...WORDS), { maxLength: 8 }).map((words) => words.join(' ')),
    tags: fc.subarray(['family', 'work', 'food', 'travel']),
    relatedEntities: fc.subarray(['mom', 'grandma', 'bob']),
    importance: unitArb,
    emotionalValence: fc.double({ min: -1, max: 1, noNaN: true }),
    emotionIntensity: unitArb,
    reinforcementCount: fc.nat({ max: 20 }),
    recallDifficulty: unitArb,
    contextRelevance: unitArb,
    confidence: unitArb,
    accessCount: fc.nat({ max: 10 }),
    createdAt: fc.integer({ min: FIXED_NOW - 60 * DAY_MS, max: FIXED_NOW }),
  })
  .map((input) => createMemory({ ...input, characterId: 'alice' }, FIXED_NOW));
