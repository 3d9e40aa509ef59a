import type { Club, Lie } from './clubs.js';

export type ConversationRole = 'USER' | 'ASSISTANT';

export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly content: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

export interface RoundInfo {
  readonly id: string;
  readonly courseName: string;
  readonly startingHole: number;
  readonly startedAt: number;
}

export interface HolePosition {
  readonly number: number;
  readonly par: number;
  readonly strokes?: number;
}

export const MISS_DIRECTIONS = ['PUSH', 'PULL', 'SLICE', 'HOOK', 'FAT', 'THIN', 'STRAIGHT'] as const;

export type MissDirection = (typeof MISS_DIRECTIONS)[number];

export interface PressureContext {
  readonly isUserTagged: boolean;
  readonly isInferred: boolean;
  readonly scoringContext?: string;
}

export interface Shot {
  readonly id: string;
  readonly timestamp: number;
  readonly club: Club;
  readonly lie: Lie;
  readonly missDirection?: MissDirection;
  readonly pressure?: PressureContext;
  readonly notes?: string;
}

export interface SessionContext {
  readonly currentRound?: RoundInfo;
  readonly currentHole?: HolePosition;
  readonly conditions?: string;
  readonly lastShot?: Shot;
  readonly lastRecommendation?: string;
  readonly conversationHistory: readonly ConversationTurn[];
}

export const EMPTY_SESSION_CONTEXT: SessionContext = Object.freeze({
  conversationHistory: Object.freeze([]),
});

export interface MissPattern {
  readonly direction: MissDirection;
  readonly club?: Club;
  readonly frequency: number;
  /** 0 to 1. */
  readonly confidence: number;
  readonly pressureContext?: PressureContext;
  readonly lastOccurrence: number;
}

export function isUnderPressure(pressure: PressureContext | undefined): boolean {
  return pressure !== undefined && (pressure.isUserTagged || pressure.isInferred);
}
