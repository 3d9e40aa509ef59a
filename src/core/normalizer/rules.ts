import { z } from 'zod';
import { escapeRegExp, loadJsonResource } from '../../utils/resources.js';

const normalizerTable = z.object({
  profanity: z.array(z.string().min(1)),
  mask: z.string().min(1).regex(/^[^\w\s]+$/, 'mask must not contain word characters'),
  numberWords: z.object({
    units: z.record(z.number().int().min(1).max(9)),
    teens: z.record(z.number().int().min(10).max(19)),
    tens: z.record(z.number().int().min(20).max(90)),
    hundred: z.string().min(1),
    connector: z.string().min(1),
  }),
  clubPhrases: z.array(z.object({ pattern: z.string().min(1), replacement: z.string() })),
  slang: z.record(z.string().min(1)),
});

export type NumberVocabulary = z.output<typeof normalizerTable>['numberWords'];

export type NormalizationStep = 'PROFANITY' | 'CLUB_PHRASE' | 'SLANG';

export interface NormalizationRule {
  readonly step: NormalizationStep;
  readonly pattern: RegExp;
  readonly replacement: string;
}

export interface NormalizerTables {
  readonly profanity: readonly NormalizationRule[];
  readonly rewrites: readonly NormalizationRule[];
  readonly numbers: NumberVocabulary;
}

// Word boundaries that also treat apostrophes and hyphens as part of a word, so "I'd" keeps its "d".
const BEFORE = "(?<![\\w'’-])";
const AFTER = "(?![\\w'’-])";

function wordPattern(term: string): RegExp {
  const body = term.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`${BEFORE}${body}${AFTER}`, 'gi');
}

function byLengthDescending(a: string, b: string): number {
  return b.length - a.length || a.localeCompare(b);
}

export function loadNormalizerTables(): NormalizerTables {
  const table = loadJsonResource('normalizer.json', normalizerTable);

  const profanity: NormalizationRule[] = [...table.profanity].sort(byLengthDescending).map((word) => ({
    step: 'PROFANITY',
    pattern: wordPattern(word),
    replacement: table.mask,
  }));

  const clubPhrases: NormalizationRule[] = table.clubPhrases.map(({ pattern, replacement }) => ({
    step: 'CLUB_PHRASE',
    pattern: new RegExp(pattern, 'gi'),
    replacement,
  }));

  // Longest terms first so "big stick" is rewritten before "stick".
  const slang: NormalizationRule[] = Object.entries(table.slang)
    .sort(([a], [b]) => byLengthDescending(a, b))
    .map(([term, replacement]) => ({
      step: 'SLANG',
      pattern: wordPattern(term),
      replacement,
    }));

  return {
    profanity,
    rewrites: [...clubPhrases, ...slang],
    numbers: table.numberWords,
  };
}
