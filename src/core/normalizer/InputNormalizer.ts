import { loadNormalizerTables } from './rules.js';
import type { NormalizationRule, NormalizationStep, NormalizerTables } from './rules.js';
import { convertSpokenNumbers } from './spokenNumbers.js';

export interface NormalizationResult {
  readonly normalized: string;
  /** Steps that changed the text, in pipeline order. */
  readonly applied: readonly (NormalizationStep | 'NUMBER')[];
}

let defaultTables: NormalizerTables | undefined;

function getDefaultTables(): NormalizerTables {
  if (!defaultTables) {
    defaultTables = loadNormalizerTables();
  }
  return defaultTables;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonicalises raw utterances before classification:
 * profanity masking, spoken numbers to digits, then club phrases and golf slang.
 * Pure and idempotent.
 */
export class InputNormalizer {
  private readonly tables: NormalizerTables;

  constructor(tables?: NormalizerTables) {
    this.tables = tables ?? getDefaultTables();
  }

  normalize(raw: string): string {
    return this.normalizeWithDetails(raw).normalized;
  }

  normalizeWithDetails(raw: string): NormalizationResult {
    const applied = new Set<NormalizationStep | 'NUMBER'>();

    let text = collapseWhitespace(raw);
    text = applyRules(text, this.tables.profanity, applied);

    const withNumbers = convertSpokenNumbers(text, this.tables.numbers);
    if (withNumbers !== text) {
      applied.add('NUMBER');
    }

    text = applyRules(withNumbers, this.tables.rewrites, applied);

    return { normalized: collapseWhitespace(text), applied: [...applied] };
  }
}

function applyRules(
  text: string,
  rules: readonly NormalizationRule[],
  applied: Set<NormalizationStep | 'NUMBER'>
): string {
  let current = text;
  for (const rule of rules) {
    const next = current.replace(rule.pattern, rule.replacement);
    if (next !== current) {
      applied.add(rule.step);
      current = next;
    }
  }
  return current;
}
