import type { Club, Lie } from './clubs.js';

export interface ExtractedEntities {
  readonly club?: Club;
  /** Positive whole yards. */
  readonly yardage?: number;
  readonly lie?: Lie;
  readonly wind?: string;
  /** 1 (fresh) to 10 (exhausted). */
  readonly fatigue?: number;
  readonly pain?: string;
  readonly scoreContext?: string;
  /** 1 to 18. */
  readonly holeNumber?: number;
}

export type EntityInput = { -readonly [K in keyof ExtractedEntities]?: ExtractedEntities[K] };

/**
 * Builds an entity set, dropping values that cannot be valid instead of failing:
 * non-positive yardage and out-of-range holes become absent, fatigue is clamped.
 */
export function createExtractedEntities(input: EntityInput = {}): ExtractedEntities {
  const entities: EntityInput = {};

  if (input.club) {
    entities.club = input.club;
  }
  if (input.yardage !== undefined && Number.isFinite(input.yardage)) {
    const yardage = Math.round(input.yardage);
    if (yardage > 0) {
      entities.yardage = yardage;
    }
  }
  if (input.lie) {
    entities.lie = input.lie;
  }
  if (input.fatigue !== undefined && Number.isFinite(input.fatigue)) {
    entities.fatigue = Math.min(10, Math.max(1, Math.round(input.fatigue)));
  }
  if (input.holeNumber !== undefined && Number.isInteger(input.holeNumber)) {
    if (input.holeNumber >= 1 && input.holeNumber <= 18) {
      entities.holeNumber = input.holeNumber;
    }
  }

  const wind = cleanText(input.wind);
  if (wind) entities.wind = wind;
  const pain = cleanText(input.pain);
  if (pain) entities.pain = pain;
  const scoreContext = cleanText(input.scoreContext);
  if (scoreContext) entities.scoreContext = scoreContext;

  return Object.freeze(entities);
}

function cleanText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function hasEntities(entities: ExtractedEntities): boolean {
  return Object.keys(entities).length > 0;
}

/** Routing parameters derived from entities; values are strings for the navigation layer. */
export function entityParameters(entities: ExtractedEntities): Record<string, string> {
  const parameters: Record<string, string> = {};
  if (entities.club) parameters.club = entities.club.name;
  if (entities.yardage !== undefined) parameters.yardage = String(entities.yardage);
  if (entities.holeNumber !== undefined) parameters.hole = String(entities.holeNumber);
  if (entities.lie) parameters.lie = entities.lie;
  return parameters;
}

/** Short human-readable list, most salient first. */
export function describeEntities(entities: ExtractedEntities): string[] {
  const details: string[] = [];
  if (entities.club) details.push(`with ${entities.club.name}`);
  if (entities.yardage !== undefined) details.push(`at ${entities.yardage} yards`);
  if (entities.holeNumber !== undefined) details.push(`on hole ${entities.holeNumber}`);
  if (entities.lie) details.push(`from the ${entities.lie.toLowerCase()}`);
  if (entities.wind) details.push(`wind ${entities.wind}`);
  if (entities.fatigue !== undefined) details.push(`fatigue ${entities.fatigue}/10`);
  if (entities.pain) details.push(`pain: ${entities.pain}`);
  if (entities.scoreContext) details.push(`score: ${entities.scoreContext}`);
  return details;
}
