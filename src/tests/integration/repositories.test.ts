import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../persistence/database.js';
import { RoundRepository } from '../../persistence/repositories/RoundRepository.js';
import { ShotRepository } from '../../persistence/repositories/ShotRepository.js';
import { MissPatternRepository } from '../../persistence/repositories/MissPatternRepository.js';
import { parseClub } from '../../core/models/clubs.js';
import type { Club } from '../../core/models/clubs.js';

function club(name: string): Club {
  const found = parseClub(name);
  if (!found) throw new Error(`test club ${name} missing`);
  return found;
}

describe('persistence', () => {
  let db: Database.Database;
  let now: number;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = 5_000;
  });

  afterEach(() => {
    db.close();
  });

  describe('RoundRepository', () => {
    it('should start, read and end a round once', () => {
      const rounds = new RoundRepository(db, () => now);
      const round = rounds.start('Harbour Links', 10);

      expect(rounds.get(round.id)).toEqual({
        id: round.id,
        courseName: 'Harbour Links',
        startingHole: 10,
        startedAt: 5_000,
      });

      now = 9_000;
      expect(rounds.end(round.id)).toBe(true);
      expect(rounds.end(round.id)).toBe(false);
      expect(rounds.get(round.id)?.endedAt).toBe(9_000);
      expect(rounds.get('missing')).toBeUndefined();
    });
  });

  describe('ShotRepository', () => {
    it('should list a round shots in order with their pressure context', () => {
      const round = new RoundRepository(db, () => now).start('Harbour Links');
      const shots = new ShotRepository(db);

      shots.record(
        {
          id: 'shot-2',
          timestamp: 2,
          club: club('driver'),
          lie: 'TEE',
          pressure: { isUserTagged: false, isInferred: true, scoringContext: 'tied' },
        },
        { roundId: round.id, holeNumber: 1 }
      );
      shots.record({ id: 'shot-1', timestamp: 1, club: club('pw'), lie: 'ROUGH', missDirection: 'THIN' }, { roundId: round.id });
      shots.record({ id: 'loose', timestamp: 3, club: club('putter'), lie: 'GREEN' }, {});

      expect(shots.listForRound(round.id)).toEqual([
        { id: 'shot-1', timestamp: 1, club: club('pw'), lie: 'ROUGH', missDirection: 'THIN' },
        {
          id: 'shot-2',
          timestamp: 2,
          club: club('driver'),
          lie: 'TEE',
          pressure: { isUserTagged: false, isInferred: true, scoringContext: 'tied' },
        },
      ]);
    });

    it('should list a club recent shots newest first within the limit', () => {
      const shots = new ShotRepository(db);
      shots.record({ id: 'old', timestamp: 10, club: club('7-iron'), lie: 'FAIRWAY', missDirection: 'SLICE' }, {});
      shots.record({ id: 'mid', timestamp: 20, club: club('7-iron'), lie: 'ROUGH' }, {});
      shots.record({ id: 'new', timestamp: 30, club: club('7-iron'), lie: 'FAIRWAY', missDirection: 'PUSH' }, {});
      shots.record({ id: 'other', timestamp: 25, club: club('driver'), lie: 'TEE' }, {});

      expect(shots.listRecentForClub('7-Iron', 15, 10).map((shot) => shot.id)).toEqual(['new', 'mid']);
      expect(shots.listRecentForClub('7-Iron', 0, 1).map((shot) => shot.id)).toEqual(['new']);
    });
  });

  describe('MissPatternRepository', () => {
    it('should return club-specific and general patterns, most confident first', () => {
      const patterns = new MissPatternRepository(db);
      patterns.save({ direction: 'PUSH', frequency: 4, confidence: 0.6, lastOccurrence: 1 });
      patterns.save({ direction: 'HOOK', club: club('driver'), frequency: 9, confidence: 0.9, lastOccurrence: 2 });
      patterns.save({ direction: 'SLICE', club: club('7-iron'), frequency: 11, confidence: 0.75, lastOccurrence: 3 });

      expect(patterns.findRelevant({ clubName: '7-Iron' }).map((p) => p.direction)).toEqual(['SLICE', 'PUSH']);
      expect(patterns.findRelevant({}).map((p) => p.direction)).toEqual(['HOOK', 'SLICE', 'PUSH']);
      expect(patterns.findRelevant({ limit: 1 })).toEqual([
        { direction: 'HOOK', club: club('driver'), frequency: 9, confidence: 0.9, lastOccurrence: 2 },
      ]);
    });

    it('should update the stored pattern for the same direction and club', () => {
      const patterns = new MissPatternRepository(db);
      patterns.save({ direction: 'PUSH', frequency: 4, confidence: 0.6, lastOccurrence: 1 });
      patterns.save({ direction: 'PUSH', club: club('driver'), frequency: 3, confidence: 0.5, lastOccurrence: 1 });
      patterns.save({ direction: 'PUSH', frequency: 5, confidence: 0.7, lastOccurrence: 8 });

      expect(patterns.findRelevant({})).toEqual([
        { direction: 'PUSH', frequency: 5, confidence: 0.7, lastOccurrence: 8 },
        { direction: 'PUSH', club: club('driver'), frequency: 3, confidence: 0.5, lastOccurrence: 1 },
      ]);
    });

    it('should replace only the given club patterns', () => {
      const patterns = new MissPatternRepository(db);
      patterns.save({ direction: 'PUSH', frequency: 4, confidence: 0.6, lastOccurrence: 1 });
      patterns.save({ direction: 'HOOK', club: club('7-iron'), frequency: 4, confidence: 0.8, lastOccurrence: 1 });

      patterns.replaceForClub('7-Iron', [
        { direction: 'SLICE', club: club('7-iron'), frequency: 6, confidence: 0.9, lastOccurrence: 2 },
      ]);

      expect(patterns.findRelevant({ clubName: '7-Iron' }).map((p) => p.direction)).toEqual(['SLICE', 'PUSH']);

      patterns.replaceForClub('7-Iron', []);
      expect(patterns.findRelevant({}).map((p) => p.direction)).toEqual(['PUSH']);
    });

    it('should refuse confidence above one', () => {
      const patterns = new MissPatternRepository(db);
      expect(() => patterns.save({ direction: 'FAT', frequency: 1, confidence: 1.2, lastOccurrence: 1 })).toThrow();
    });
  });
});
