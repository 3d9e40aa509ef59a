import { describe, it, expect, vi } from 'vitest';
import { MissPatternAggregator } from '../../core/patterns/MissPatternAggregator.js';
import { decayFactor, decayedConfidence, MS_PER_DAY } from '../../core/patterns/patternDecay.js';
import { parseClub } from '../../core/models/clubs.js';
import type { Club } from '../../core/models/clubs.js';
import type { MissDirection, PressureContext, Shot } from '../../core/models/session.js';

function club(name: string): Club {
  const found = parseClub(name);
  if (!found) throw new Error(`test club ${name} missing`);
  return found;
}

const NOW = 100 * MS_PER_DAY;
let shotCount = 0;

function shot(missDirection: MissDirection | undefined, daysAgo: number, pressure?: PressureContext): Shot {
  shotCount += 1;
  return {
    id: `shot-${shotCount}`,
    timestamp: NOW - daysAgo * MS_PER_DAY,
    club: club('7-iron'),
    lie: 'FAIRWAY',
    ...(missDirection ? { missDirection } : {}),
    ...(pressure ? { pressure } : {}),
  };
}

describe('patternDecay', () => {
  it('should halve every fourteen days', () => {
    expect(decayFactor(NOW, NOW)).toBe(1);
    expect(decayFactor(NOW - 14 * MS_PER_DAY, NOW)).toBeCloseTo(0.5);
    expect(decayFactor(NOW - 28 * MS_PER_DAY, NOW)).toBeCloseTo(0.25);
  });

  it('should drop evidence older than the max age', () => {
    expect(decayFactor(NOW - 84 * MS_PER_DAY, NOW)).toBe(0);
    expect(decayedConfidence(0.8, NOW - 90 * MS_PER_DAY, NOW)).toBe(0);
  });

  it('should treat future timestamps as now', () => {
    expect(decayFactor(NOW + MS_PER_DAY, NOW)).toBe(1);
  });
});

describe('MissPatternAggregator', () => {
  function createAggregator(shots: Shot[] = []) {
    const listRecentForClub = vi.fn((_club: string, _since: number, _limit: number) => shots);
    const replaceForClub = vi.fn();
    const aggregator = new MissPatternAggregator({
      shots: { record: vi.fn(), listForRound: vi.fn(), listRecentForClub },
      patterns: { findRelevant: vi.fn(), save: vi.fn(), replaceForClub },
      clock: () => NOW,
    });
    return { aggregator, listRecentForClub, replaceForClub };
  }

  it('should need at least three shots', () => {
    const { aggregator } = createAggregator();
    expect(aggregator.aggregate([shot('SLICE', 0), shot('SLICE', 0)], NOW)).toEqual([]);
  });

  it('should ignore straight shots and rare misses', () => {
    const { aggregator } = createAggregator();
    const shots = [shot('SLICE', 0), shot('SLICE', 0), shot('SLICE', 0), shot('PUSH', 0), shot('STRAIGHT', 0)];

    expect(aggregator.aggregate(shots, NOW)).toEqual([
      { direction: 'SLICE', frequency: 3, confidence: 0.6, lastOccurrence: NOW },
    ]);
  });

  it('should decay confidence by the age of the latest miss', () => {
    const { aggregator } = createAggregator();
    const shots = [shot('HOOK', 28), shot('HOOK', 20), shot('HOOK', 14), shot(undefined, 1), shot(undefined, 1)];

    const [pattern] = aggregator.aggregate(shots, NOW);

    expect(pattern?.frequency).toBe(3);
    expect(pattern?.lastOccurrence).toBe(NOW - 14 * MS_PER_DAY);
    expect(pattern?.confidence).toBeCloseTo(0.3);
  });

  it('should mark a pattern as pressure-related when most of its misses were', () => {
    const { aggregator } = createAggregator();
    const shots = [
      shot('PULL', 2, { isUserTagged: true, isInferred: false, scoringContext: 'one down' }),
      shot('PULL', 1, { isUserTagged: false, isInferred: true, scoringContext: 'tied' }),
      shot('PULL', 0),
      shot('FAT', 0),
      shot('FAT', 0, { isUserTagged: true, isInferred: false }),
      shot('FAT', 0),
    ];

    const patterns = aggregator.aggregate(shots, NOW);

    expect(patterns.find((p) => p.direction === 'PULL')?.pressureContext).toEqual({
      isUserTagged: true,
      isInferred: true,
      scoringContext: 'tied',
    });
    expect(patterns.find((p) => p.direction === 'FAT')?.pressureContext).toBeUndefined();
  });

  it('should store the refreshed patterns for the club', () => {
    const shots = [shot('SLICE', 0), shot('SLICE', 0), shot('SLICE', 0)];
    const { aggregator, listRecentForClub, replaceForClub } = createAggregator(shots);

    const patterns = aggregator.refreshForClub(club('7-iron'));

    expect(listRecentForClub).toHaveBeenCalledWith('7-Iron', NOW - 30 * MS_PER_DAY, 50);
    expect(patterns).toEqual([
      { direction: 'SLICE', frequency: 3, confidence: 1, lastOccurrence: NOW, club: club('7-iron') },
    ]);
    expect(replaceForClub).toHaveBeenCalledWith('7-Iron', patterns);
  });

  it('should clear stored patterns once the window holds too few shots', () => {
    const { aggregator, replaceForClub } = createAggregator([shot('SLICE', 0)]);

    expect(aggregator.refreshForClub(club('7-iron'))).toEqual([]);
    expect(replaceForClub).toHaveBeenCalledWith('7-Iron', []);
  });
});
