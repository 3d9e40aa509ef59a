import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { ShotStore } from '../../ports/PersistencePort.js';
import { LIES, parseClub } from '../../core/models/clubs.js';
import type { Lie } from '../../core/models/clubs.js';
import type { MissDirection, Shot } from '../../core/models/session.js';
import { parseMissDirection } from './missDirection.js';

interface ShotRow {
  id: string;
  club: string;
  lie: string;
  miss_direction: string | null;
  pressure_tagged: number;
  pressure_inferred: number;
  scoring_context: string | null;
  notes: string | null;
  created_at: number;
}

function toLie(value: string): Lie | undefined {
  return LIES.find((lie) => lie === value);
}

export class ShotRepository implements ShotStore {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db || getDatabase();
  }

  record(shot: Shot, location: { roundId?: string; holeNumber?: number }): void {
    this.db
      .prepare(
        `INSERT INTO shots (id, round_id, hole_number, club, lie, miss_direction,
           pressure_tagged, pressure_inferred, scoring_context, notes, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        shot.id,
        location.roundId ?? null,
        location.holeNumber ?? null,
        shot.club.name,
        shot.lie,
        shot.missDirection ?? null,
        shot.pressure?.isUserTagged ? 1 : 0,
        shot.pressure?.isInferred ? 1 : 0,
        shot.pressure?.scoringContext ?? null,
        shot.notes ?? null,
        shot.timestamp
      );
  }

  listForRound(roundId: string): Shot[] {
    const rows = this.db
      .prepare('SELECT * FROM shots WHERE round_id = ? ORDER BY created_at ASC')
      .all(roundId) as ShotRow[];
    return toShots(rows);
  }

  listRecentForClub(clubName: string, since: number, limit: number): Shot[] {
    const rows = this.db
      .prepare('SELECT * FROM shots WHERE club = ? AND created_at >= ? ORDER BY created_at DESC LIMIT ?')
      .all(clubName, since, limit) as ShotRow[];
    return toShots(rows);
  }
}

function toShots(rows: ShotRow[]): Shot[] {
  const shots: Shot[] = [];
  for (const row of rows) {
    const club = parseClub(row.club);
    const lie = toLie(row.lie);
    if (!club || !lie) {
      continue;
    }
    const missDirection: MissDirection | undefined = row.miss_direction
      ? parseMissDirection(row.miss_direction)
      : undefined;
    const tagged = row.pressure_tagged === 1;
    const inferred = row.pressure_inferred === 1;
    shots.push({
      id: row.id,
      timestamp: row.created_at,
      club,
      lie,
      ...(missDirection ? { missDirection } : {}),
      ...(tagged || inferred
        ? {
            pressure: {
              isUserTagged: tagged,
              isInferred: inferred,
              ...(row.scoring_context ? { scoringContext: row.scoring_context } : {}),
            },
          }
        : {}),
      ...(row.notes ? { notes: row.notes } : {}),
    });
  }
  return shots;
}
