import { DISCLAIMER_TYPES } from './guardrailRules.js';
import type { DisclaimerType, GuardrailTables, Rewrite } from './guardrailRules.js';
import { getGuardrailTables } from './guardrailRules.js';

export interface GuardrailResult {
  readonly needsDisclaimer: boolean;
  readonly disclaimerType?: DisclaimerType;
  readonly violatedRule?: string;
}

const CLEAN: GuardrailResult = Object.freeze({ needsDisclaimer: false });

/**
 * Ordered safety checks over generated text. The first matching rule decides the
 * disclaimer; rule order is medical, swing technique, betting, then guarantees.
 */
export class PersonaGuardrails {
  private readonly tables: GuardrailTables;

  constructor(tables?: GuardrailTables) {
    this.tables = tables ?? getGuardrailTables();
  }

  check(text: string): GuardrailResult {
    for (const rule of this.tables.rules) {
      if (rule.patterns.some((pattern) => pattern.test(text))) {
        return Object.freeze({
          needsDisclaimer: true,
          disclaimerType: rule.disclaimer,
          violatedRule: rule.description,
        });
      }
    }
    return CLEAN;
  }

  /** Medical language in the player's own words, used to force a disclaimer on the reply. */
  detectSensitiveInput(input: string): DisclaimerType | undefined {
    const medical = this.tables.rules.find((rule) => rule.disclaimer === 'MEDICAL');
    return medical?.patterns.some((pattern) => pattern.test(input)) ? 'MEDICAL' : undefined;
  }

  disclaimerText(type: DisclaimerType): string {
    return this.tables.disclaimers[type];
  }

  /** The higher-priority of two disclaimer types, by detection order. */
  strongest(a: DisclaimerType | undefined, b: DisclaimerType | undefined): DisclaimerType | undefined {
    if (!a || !b) return a ?? b;
    return this.rank(a) <= this.rank(b) ? a : b;
  }

  softenGuarantees(text: string): string {
    return applyRewrites(text, this.tables.softening);
  }

  stripFiller(text: string): string {
    return applyRewrites(text, this.tables.filler);
  }

  naturalizeVoice(text: string): string {
    return applyRewrites(text, this.tables.voice);
  }

  private rank(type: DisclaimerType): number {
    const index = this.tables.rules.findIndex((rule) => rule.disclaimer === type);
    return index >= 0 ? index : this.tables.rules.length + DISCLAIMER_TYPES.indexOf(type);
  }
}

function applyRewrites(text: string, rewrites: readonly Rewrite[]): string {
  return rewrites.reduce(
    (current, { pattern, replacement }) =>
      current.replace(pattern, (match: string, ...groups: unknown[]) =>
        matchCase(match, expandGroups(replacement, groups))
      ),
    text
  );
}

function expandGroups(replacement: string, groups: unknown[]): string {
  return replacement.replace(/\$(\d)/g, (token, digit: string) => {
    const group = groups[Number(digit) - 1];
    return typeof group === 'string' ? group : '';
  });
}

/** Keeps a leading capital when the replaced text started with one. */
function matchCase(original: string, replacement: string): string {
  const first = original.trimStart().charAt(0);
  if (replacement && first && first === first.toUpperCase() && first !== first.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}
