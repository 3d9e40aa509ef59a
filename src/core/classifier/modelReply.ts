import { z } from 'zod';
import { InvalidModelResponseError, ValidationError } from '../../utils/errors.js';
import { parseClub, parseLie } from '../models/clubs.js';
import { createExtractedEntities } from '../models/entities.js';
import type { ExtractedEntities } from '../models/entities.js';
import { createParsedIntent } from '../models/classification.js';
import type { ParsedIntent } from '../models/classification.js';
import { isIntentType } from '../models/intent.js';

const modelReplySchema = z.object({
  intent_type: z.string().min(1),
  confidence: z.number(),
  entities: z.unknown().optional(),
  user_goal: z.unknown().optional(),
});

const numeric = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/)
    .transform(Number),
]);

const text = z.string().trim().min(1);

function readNumber(value: unknown): number | undefined {
  const result = numeric.safeParse(value);
  return result.success ? result.data : undefined;
}

function readText(value: unknown): string | undefined {
  const result = text.safeParse(value);
  return result.success ? result.data : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Entity extraction is tolerant: anything unreadable is dropped, never fatal. */
export function parseEntities(raw: unknown): ExtractedEntities {
  if (!isRecord(raw)) {
    return createExtractedEntities();
  }

  const clubName = readText(raw.club);
  const lieName = readText(raw.lie);
  const pain = raw.pain === true ? 'reported' : readText(raw.pain);

  return createExtractedEntities({
    club: clubName ? parseClub(clubName) : undefined,
    yardage: readNumber(raw.yardage),
    lie: lieName ? parseLie(lieName) : undefined,
    wind: readText(raw.wind),
    fatigue: readNumber(raw.fatigue),
    pain,
    scoreContext: readText(raw.score_context),
    holeNumber: readNumber(raw.hole_number),
  });
}

function extractJson(raw: string): unknown {
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new InvalidModelResponseError('Model reply contained no JSON object');
  }
  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new InvalidModelResponseError('Model reply was not valid JSON', { cause: error });
  }
}

/**
 * Parses the model's JSON reply. Intent types must match a known name exactly;
 * unknown ones and missing or out-of-range confidence are rejected, entity problems are not.
 */
export function parseModelReply(raw: string): ParsedIntent {
  const result = modelReplySchema.safeParse(extractJson(raw));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidModelResponseError(`Model reply failed validation: ${issues.join('; ')}`, {
      cause: result.error,
    });
  }

  const reply = result.data;
  const intentType = reply.intent_type;
  if (!isIntentType(intentType)) {
    throw new InvalidModelResponseError(`Unknown intent type: ${reply.intent_type}`);
  }

  try {
    return createParsedIntent({
      intentType,
      confidence: reply.confidence,
      entities: parseEntities(reply.entities),
      userGoal: readText(reply.user_goal),
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new InvalidModelResponseError(error.message, { cause: error });
    }
    throw error;
  }
}
