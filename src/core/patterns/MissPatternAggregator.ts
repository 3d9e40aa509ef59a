import type { MissPatternStore, ShotStore } from '../../ports/PersistencePort.js';
import { createLogger } from '../../utils/logger.js';
import type { Club } from '../models/clubs.js';
import { isUnderPressure } from '../models/session.js';
import type { MissDirection, MissPattern, PressureContext, Shot } from '../models/session.js';
import { decayedConfidence, MS_PER_DAY } from './patternDecay.js';

export const PATTERN_WINDOW_DAYS = 30;
export const PATTERN_SHOT_LIMIT = 50;
export const MIN_SHOTS_FOR_PATTERN = 3;
/** Share of the analysed shots a direction needs before it counts as a pattern. */
export const MIN_FREQUENCY_RATIO = 0.3;

export interface MissPatternAggregatorDeps {
  shots: ShotStore;
  patterns: MissPatternStore;
  clock?: () => number;
}

/** Pressure context when at least half of the direction's shots were hit under pressure. */
function pressureContextOf(shots: readonly Shot[]): PressureContext | undefined {
  const pressured = shots.filter((shot) => isUnderPressure(shot.pressure));
  if (pressured.length * 2 < shots.length) {
    return undefined;
  }
  const latestContext = [...pressured]
    .sort((a, b) => b.timestamp - a.timestamp)
    .find((shot) => shot.pressure?.scoringContext)?.pressure?.scoringContext;
  return {
    isUserTagged: pressured.some((shot) => shot.pressure?.isUserTagged === true),
    isInferred: pressured.some((shot) => shot.pressure?.isInferred === true),
    ...(latestContext ? { scoringContext: latestContext } : {}),
  };
}

/**
 * Turns recent shot history into miss patterns. Confidence is the share of
 * shots that missed in a direction, decayed by how long ago the latest one was.
 */
export class MissPatternAggregator {
  private readonly logger = createLogger({ service: 'MissPatternAggregator' });
  private readonly clock: () => number;

  constructor(private readonly deps: MissPatternAggregatorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  aggregate(shots: readonly Shot[], now: number): MissPattern[] {
    if (shots.length < MIN_SHOTS_FOR_PATTERN) {
      return [];
    }

    const byDirection = new Map<MissDirection, Shot[]>();
    for (const shot of shots) {
      if (!shot.missDirection || shot.missDirection === 'STRAIGHT') {
        continue;
      }
      const group = byDirection.get(shot.missDirection) ?? [];
      group.push(shot);
      byDirection.set(shot.missDirection, group);
    }

    const patterns: MissPattern[] = [];
    for (const [direction, group] of byDirection) {
      const ratio = group.length / shots.length;
      if (ratio < MIN_FREQUENCY_RATIO) {
        continue;
      }
      const lastOccurrence = Math.max(...group.map((shot) => shot.timestamp));
      const pressureContext = pressureContextOf(group);
      patterns.push({
        direction,
        frequency: group.length,
        confidence: decayedConfidence(ratio, lastOccurrence, now),
        lastOccurrence,
        ...(pressureContext ? { pressureContext } : {}),
      });
    }
    return patterns.sort((a, b) => b.confidence - a.confidence);
  }

  /** Rebuilds and stores the club's patterns from its recent shots. */
  refreshForClub(club: Club): MissPattern[] {
    const now = this.clock();
    const shots = this.deps.shots.listRecentForClub(
      club.name,
      now - PATTERN_WINDOW_DAYS * MS_PER_DAY,
      PATTERN_SHOT_LIMIT
    );
    const patterns = this.aggregate(shots, now).map((pattern) => ({ ...pattern, club }));
    this.deps.patterns.replaceForClub(club.name, patterns);

    this.logger.debug(
      { club: club.name, shotCount: shots.length, patternCount: patterns.length },
      'Miss patterns refreshed'
    );
    return patterns;
  }
}
