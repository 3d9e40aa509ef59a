import { z } from 'zod';
import { escapeRegExp, loadJsonResource } from '../../utils/resources.js';

export const DISCLAIMER_TYPES = ['MEDICAL', 'SWING_TECHNIQUE', 'BETTING', 'SAFETY'] as const;

export type DisclaimerType = (typeof DISCLAIMER_TYPES)[number];

const guardrailTable = z.object({
  rules: z
    .array(
      z.object({
        disclaimer: z.enum(DISCLAIMER_TYPES),
        description: z.string().min(1),
        patterns: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
  disclaimers: z.object({
    MEDICAL: z.string().min(1),
    SWING_TECHNIQUE: z.string().min(1),
    BETTING: z.string().min(1),
    SAFETY: z.string().min(1),
  }),
  softening: z.array(z.object({ pattern: z.string().min(1), replacement: z.string() })),
  fillerPhrases: z.array(z.string().min(1)),
  replacements: z.array(z.object({ formal: z.string().min(1), natural: z.string() })),
});

export interface DetectionRule {
  readonly disclaimer: DisclaimerType;
  readonly description: string;
  /** Non-global, so `test` carries no lastIndex state between calls. */
  readonly patterns: readonly RegExp[];
}

export interface Rewrite {
  /** Global and case-insensitive. */
  readonly pattern: RegExp;
  readonly replacement: string;
}

export interface GuardrailTables {
  readonly rules: readonly DetectionRule[];
  readonly disclaimers: Readonly<Record<DisclaimerType, string>>;
  readonly softening: readonly Rewrite[];
  readonly filler: readonly Rewrite[];
  readonly voice: readonly Rewrite[];
}

export function loadGuardrailTables(): GuardrailTables {
  const table = loadJsonResource('guardrails.json', guardrailTable);

  return {
    rules: table.rules.map((rule) => ({
      disclaimer: rule.disclaimer,
      description: rule.description,
      patterns: rule.patterns.map((pattern) => new RegExp(pattern, 'i')),
    })),
    disclaimers: table.disclaimers,
    softening: table.softening.map(({ pattern, replacement }) => ({
      pattern: new RegExp(pattern, 'gi'),
      replacement,
    })),
    filler: table.fillerPhrases.map((phrase) => ({
      pattern: new RegExp(escapeRegExp(phrase), 'gi'),
      replacement: '',
    })),
    voice: table.replacements.map(({ formal, natural }) => ({
      pattern: new RegExp(`\\b${escapeRegExp(formal)}\\b`, 'gi'),
      replacement: natural,
    })),
  };
}

let defaultTables: GuardrailTables | undefined;

export function getGuardrailTables(): GuardrailTables {
  if (!defaultTables) {
    defaultTables = loadGuardrailTables();
  }
  return defaultTables;
}
