import { isUnderPressure } from '../models/session.js';
import type { MissPattern } from '../models/session.js';
import type { DisclaimerType } from './guardrailRules.js';
import { PersonaGuardrails } from './PersonaGuardrails.js';

export const PATTERN_CONFIDENCE_FLOOR = 0.6;
export const MAX_REFERENCED_PATTERNS = 2;

export interface FormatOptions {
  /** Append a summary of the player's relevant miss patterns. */
  includePatterns?: boolean;
  /** Set when the player's own input touched a sensitive topic; the disclaimer is added even to clean text. */
  forceDisclaimer?: DisclaimerType;
}

export interface FormattedResponse {
  readonly text: string;
  /** The softened reply without the disclaimer or pattern blocks. */
  readonly body: string;
  readonly disclaimerAdded: boolean;
  readonly disclaimerType?: DisclaimerType;
  readonly violatedRule?: string;
  readonly patternsReferenced: number;
}

function frequencyWord(frequency: number): string {
  if (frequency >= 10) return 'frequently';
  if (frequency >= 5) return 'occasionally';
  return 'sometimes';
}

function describePattern(pattern: MissPattern): string {
  const details = [frequencyWord(pattern.frequency)];
  if (pattern.club) details.push(`with ${pattern.club.name}`);
  if (isUnderPressure(pattern.pressureContext)) details.push('under pressure');
  const percent = Math.round(pattern.confidence * 100);
  return `- ${pattern.direction.toLowerCase()} (${details.join(' ')}, ${percent}% confidence)`;
}

function tidy(text: string): string {
  return text
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/ +([,.!?;:])/g, '$1')
    .replace(/[ \t]+\n/g, '\n')
    .trim();
}

/**
 * Final pass over generated text before it reaches the player. Deterministic:
 * the same text and options always produce the same output.
 */
export class ResponseFormatter {
  constructor(private readonly guardrails: PersonaGuardrails = new PersonaGuardrails()) {}

  format(
    rawResponse: string,
    relevantPatterns: readonly MissPattern[] = [],
    options: FormatOptions = {}
  ): FormattedResponse {
    const detected = this.guardrails.check(rawResponse);
    const disclaimerType = this.guardrails.strongest(detected.disclaimerType, options.forceDisclaimer);

    let text = this.guardrails.softenGuarantees(rawResponse);
    text = this.guardrails.stripFiller(text);
    text = this.guardrails.naturalizeVoice(text);
    text = tidy(text);
    const body = text;

    if (disclaimerType) {
      text = `${text}\n\n${this.guardrails.disclaimerText(disclaimerType)}`;
    }

    const patterns = options.includePatterns ? selectPatterns(relevantPatterns) : [];
    if (patterns.length > 0) {
      text = `${text}\n\n**Based on your recent patterns:**\n${patterns.map(describePattern).join('\n')}`;
    }

    return Object.freeze({
      text,
      body,
      disclaimerAdded: disclaimerType !== undefined,
      ...(disclaimerType ? { disclaimerType } : {}),
      ...(detected.violatedRule && disclaimerType === detected.disclaimerType
        ? { violatedRule: detected.violatedRule }
        : {}),
      patternsReferenced: patterns.length,
    });
  }
}

export function selectPatterns(patterns: readonly MissPattern[]): MissPattern[] {
  return patterns
    .filter((pattern) => pattern.confidence >= PATTERN_CONFIDENCE_FLOOR)
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, MAX_REFERENCED_PATTERNS);
}
