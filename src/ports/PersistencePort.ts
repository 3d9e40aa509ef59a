import type { MissPattern, Shot } from '../core/models/session.js';

export interface StoredRound {
  id: string;
  courseName: string;
  startingHole: number;
  startedAt: number;
  endedAt?: number;
}

export interface RoundStore {
  start(courseName: string, startingHole?: number): StoredRound;
  end(roundId: string): boolean;
  get(roundId: string): StoredRound | undefined;
}

export interface ShotStore {
  record(shot: Shot, location: { roundId?: string; holeNumber?: number }): void;
  listForRound(roundId: string): Shot[];
  /** Shots hit with the club since `since`, newest first. */
  listRecentForClub(clubName: string, since: number, limit: number): Shot[];
}

export interface MissPatternSource {
  findRelevant(query: { clubName?: string; limit?: number }): MissPattern[];
}

export interface MissPatternStore extends MissPatternSource {
  /** Inserts the pattern or updates the stored one with the same direction and club. */
  save(pattern: MissPattern): void;
  /** Drops every stored pattern for the club and stores `patterns` in their place. */
  replaceForClub(clubName: string, patterns: readonly MissPattern[]): void;
}
