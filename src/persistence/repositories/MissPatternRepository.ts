import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { MissPatternStore } from '../../ports/PersistencePort.js';
import { parseClub } from '../../core/models/clubs.js';
import type { MissPattern } from '../../core/models/session.js';
import { parseMissDirection } from './missDirection.js';

interface MissPatternRow {
  direction: string;
  club: string | null;
  frequency: number;
  confidence: number;
  pressure_tagged: number;
  pressure_inferred: number;
  scoring_context: string | null;
  last_occurrence: number;
}

export class MissPatternRepository implements MissPatternStore {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  save(pattern: MissPattern): void {
    this.db.transaction((next: MissPattern) => this.upsert(next))(pattern);
  }

  replaceForClub(clubName: string, patterns: readonly MissPattern[]): void {
    this.db.transaction((next: readonly MissPattern[]) => {
      this.db.prepare('DELETE FROM miss_patterns WHERE club = ?').run(clubName);
      for (const pattern of next) {
        this.upsert(pattern);
      }
    })(patterns);
  }

  private upsert(pattern: MissPattern): void {
    const club = pattern.club?.name ?? null;
    const values = [
      pattern.frequency,
      pattern.confidence,
      pattern.pressureContext?.isUserTagged ? 1 : 0,
      pattern.pressureContext?.isInferred ? 1 : 0,
      pattern.pressureContext?.scoringContext ?? null,
      pattern.lastOccurrence,
    ];

    const updated = this.db
      .prepare(
        `UPDATE miss_patterns SET frequency = ?, confidence = ?, pressure_tagged = ?,
           pressure_inferred = ?, scoring_context = ?, last_occurrence = ?
         WHERE direction = ? AND club IS ?`
      )
      .run(...values, pattern.direction, club);
    if (updated.changes > 0) {
      return;
    }

    this.db
      .prepare(
        `INSERT INTO miss_patterns (frequency, confidence, pressure_tagged, pressure_inferred,
           scoring_context, last_occurrence, direction, club)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(...values, pattern.direction, club);
  }

  /** Club-specific patterns for the given club plus patterns that apply to every club. */
  findRelevant({ clubName, limit = 5 }: { clubName?: string; limit?: number }): MissPattern[] {
    const rows = (
      clubName
        ? this.db
            .prepare(
              `SELECT * FROM miss_patterns WHERE club IS NULL OR club = ?
               ORDER BY confidence DESC, last_occurrence DESC LIMIT ?`
            )
            .all(clubName, limit)
        : this.db
            .prepare('SELECT * FROM miss_patterns ORDER BY confidence DESC, last_occurrence DESC LIMIT ?')
            .all(limit)
    ) as MissPatternRow[];

    const patterns: MissPattern[] = [];
    for (const row of rows) {
      const direction = parseMissDirection(row.direction);
      if (!direction) {
        continue;
      }
      const club = row.club ? parseClub(row.club) : undefined;
      const tagged = row.pressure_tagged === 1;
      const inferred = row.pressure_inferred === 1;
      patterns.push({
        direction,
        frequency: row.frequency,
        confidence: row.confidence,
        lastOccurrence: row.last_occurrence,
        ...(club ? { club } : {}),
        ...(tagged || inferred
          ? {
              pressureContext: {
                isUserTagged: tagged,
                isInferred: inferred,
                ...(row.scoring_context ? { scoringContext: row.scoring_context } : {}),
              },
            }
          : {}),
      });
    }
    return patterns;
  }
}
