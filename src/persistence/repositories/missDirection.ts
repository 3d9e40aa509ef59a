import { MISS_DIRECTIONS } from '../../core/models/session.js';
import type { MissDirection } from '../../core/models/session.js';

export function parseMissDirection(value: string): MissDirection | undefined {
  const upper = value.trim().toUpperCase();
  return MISS_DIRECTIONS.find((direction) => direction === upper);
}
