import type { Database } from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { getDatabase } from '../database.js';
import type { RoundStore, StoredRound } from '../../ports/PersistencePort.js';

interface RoundRow {
  id: string;
  course_name: string;
  starting_hole: number;
  started_at: number;
  ended_at: number | null;
}

export class RoundRepository implements RoundStore {
  private readonly db: Database;

  constructor(db?: Database, private readonly clock: () => number = Date.now) {
    this.db = db || getDatabase();
  }

  start(courseName: string, startingHole = 1): StoredRound {
    const round: StoredRound = {
      id: randomUUID(),
      courseName,
      startingHole,
      startedAt: this.clock(),
    };

    this.db
      .prepare('INSERT INTO rounds (id, course_name, starting_hole, started_at) VALUES (?, ?, ?, ?)')
      .run(round.id, round.courseName, round.startingHole, round.startedAt);

    return round;
  }

  end(roundId: string): boolean {
    const result = this.db
      .prepare('UPDATE rounds SET ended_at = ? WHERE id = ? AND ended_at IS NULL')
      .run(this.clock(), roundId);
    return result.changes > 0;
  }

  get(roundId: string): StoredRound | undefined {
    const row = this.db.prepare('SELECT * FROM rounds WHERE id = ?').get(roundId) as RoundRow | undefined;
    if (!row) {
      return undefined;
    }
    return {
      id: row.id,
      courseName: row.course_name,
      startingHole: row.starting_hole,
      startedAt: row.started_at,
      ...(row.ended_at !== null ? { endedAt: row.ended_at } : {}),
    };
  }
}
