import { z } from 'zod';
import { loadJsonResource } from '../../utils/resources.js';

export const CLUB_TYPES = ['DRIVER', 'WOOD', 'HYBRID', 'IRON', 'WEDGE', 'PUTTER'] as const;

export type ClubType = (typeof CLUB_TYPES)[number];

export interface Club {
  name: string;
  type: ClubType;
  loft: number;
  estimatedCarry: number;
}

export const LIES = ['TEE', 'FAIRWAY', 'ROUGH', 'BUNKER', 'GREEN', 'FRINGE', 'HAZARD'] as const;

export type Lie = (typeof LIES)[number];

const clubCatalogSchema = z.array(
  z.object({
    name: z.string().min(1),
    type: z.enum(CLUB_TYPES),
    loft: z.number().nonnegative(),
    estimatedCarry: z.number().int().nonnegative(),
    aliases: z.array(z.string().min(1)).min(1),
  })
);

const catalog = loadJsonResource('clubs.json', clubCatalogSchema);

const clubsByAlias = new Map<string, Club>();
for (const { aliases, ...club } of catalog) {
  const frozen = Object.freeze(club);
  clubsByAlias.set(compactClubKey(club.name), frozen);
  for (const alias of aliases) {
    clubsByAlias.set(compactClubKey(alias), frozen);
  }
}

function compactClubKey(value: string): string {
  return value.toLowerCase().replace(/[\s-]+/g, '');
}

/** Resolves "7-iron", "7i", "7 Iron" and similar spellings to a catalog club. */
export function parseClub(value: string): Club | undefined {
  return clubsByAlias.get(compactClubKey(value));
}

const lieKeywords: Array<[RegExp, Lie]> = [
  [/\b(bunker|sand|trap)\b/, 'BUNKER'],
  [/\b(hazard|water|penalty)\b/, 'HAZARD'],
  [/\b(fringe|apron|collar)\b/, 'FRINGE'],
  [/\bgreen\b/, 'GREEN'],
  [/\brough\b/, 'ROUGH'],
  [/\bfairway\b/, 'FAIRWAY'],
  [/\btee\b/, 'TEE'],
];

export function parseLie(value: string): Lie | undefined {
  const lower = value.toLowerCase();
  for (const [pattern, lie] of lieKeywords) {
    if (pattern.test(lower)) {
      return lie;
    }
  }
  return undefined;
}
