import { z } from 'zod';
import { loadJsonResource } from '../../utils/resources.js';
import { createClarificationResponse, MAX_SUGGESTIONS } from '../models/classification.js';
import type { ClarificationResponse, ParsedIntent } from '../models/classification.js';
import { INTENT_TYPES } from '../models/intent.js';
import type { IntentType } from '../models/intent.js';
import type { IntentRegistry } from '../registry/IntentRegistry.js';
import { ConfidenceThresholds } from '../classifier/ConfidenceThresholds.js';

const cueTableSchema = z.object({
  cues: z.array(
    z.object({
      category: z.string().min(1),
      keywords: z.array(z.string().min(1)).min(1),
      intents: z.array(z.enum(INTENT_TYPES)).min(1),
    })
  ),
  defaults: z.array(z.enum(INTENT_TYPES)).min(1),
});

export type ClarificationCues = z.output<typeof cueTableSchema>;

let defaultCues: ClarificationCues | undefined;

function getDefaultCues(): ClarificationCues {
  if (!defaultCues) {
    defaultCues = loadJsonResource('clarification.json', cueTableSchema);
  }
  return defaultCues;
}

const INFLECTIONS = ['', 's', 'es', 'ed', 'd', 'ing', 'y'];

function tokenize(input: string): string[] {
  return input.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

/** "feel" matches "feel", "feels" and "feeling", not "feelgood". */
function matchesCue(token: string, cue: string): boolean {
  return token.startsWith(cue) && INFLECTIONS.includes(token.slice(cue.length));
}

interface MessageRule {
  applies: (tokens: string[]) => boolean;
  message: string;
}

const hasAny = (tokens: string[], words: string[]) =>
  tokens.some((token) => words.some((word) => matchesCue(token, word)));

const MESSAGE_RULES: MessageRule[] = [
  {
    applies: (tokens) => tokens.length <= 3,
    message: "I'm not sure what you need. Did you mean one of these?",
  },
  {
    applies: (tokens) => hasAny(tokens, ['feel']),
    message: "I'm not sure what you're referring to. Which of these were you after?",
  },
  {
    applies: (tokens) => hasAny(tokens, ['off', 'wrong', 'problem']),
    message: "I'm not sure what's off yet. Which of these fits best?",
  },
  {
    applies: (tokens) => hasAny(tokens, ['help', 'what', 'how']),
    message: "Happy to help, but I'm not sure which way to take that. Did you mean one of these?",
  },
];

const DEFAULT_MESSAGE = "I'm not sure what you're asking. Did you mean one of these?";

/**
 * Builds up to three ranked suggestions for a low-confidence input: the model's
 * own guess when it was close, then intents keyed by lexical cues, then
 * intents whose example phrases share words with the input, then defaults.
 */
export class ClarificationGenerator {
  private readonly cues: ClarificationCues;

  constructor(
    private readonly registry: IntentRegistry,
    cues?: ClarificationCues
  ) {
    this.cues = cues ?? getDefaultCues();
  }

  generate(originalInput: string, parsedIntent?: ParsedIntent, normalizedInput?: string): ClarificationResponse {
    const tokens = tokenize(normalizedInput ?? originalInput);
    const ranked: IntentType[] = [];
    const add = (intentType: IntentType) => {
      if (ranked.length < MAX_SUGGESTIONS && !ranked.includes(intentType)) {
        ranked.push(intentType);
      }
    };

    if (
      parsedIntent &&
      parsedIntent.confidence >= ConfidenceThresholds.SUGGEST &&
      parsedIntent.confidence < ConfidenceThresholds.CONFIRM
    ) {
      add(parsedIntent.intentType);
    }

    for (const row of this.cues.cues) {
      if (hasAny(tokens, row.keywords)) {
        row.intents.forEach(add);
      }
    }

    this.rankByExamples(tokens).forEach(add);
    this.cues.defaults.forEach(add);

    return createClarificationResponse(
      this.messageFor(tokens),
      ranked.map((intentType) => this.registry.toSuggestion(intentType)),
      originalInput
    );
  }

  private messageFor(tokens: string[]): string {
    return MESSAGE_RULES.find((rule) => rule.applies(tokens))?.message ?? DEFAULT_MESSAGE;
  }

  /** Intents ordered by how many distinctive example-phrase words the input shares. */
  private rankByExamples(tokens: string[]): IntentType[] {
    const inputWords = new Set(tokens.filter((token) => token.length > 3));
    if (inputWords.size === 0) {
      return [];
    }
    return this.registry
      .getAllSchemas()
      .map((schema) => {
        const exampleWords = new Set(schema.examplePhrases.flatMap(tokenize));
        let score = 0;
        for (const word of inputWords) {
          if (exampleWords.has(word)) score++;
        }
        return { intentType: schema.intentType, score };
      })
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .map((entry) => entry.intentType);
  }
}
