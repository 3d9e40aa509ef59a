import { ValidationError } from '../../utils/errors.js';
import type { ExtractedEntities } from './entities.js';
import type { IntentType, RoutingTarget } from './intent.js';

export interface ParsedIntent {
  readonly intentType: IntentType;
  readonly confidence: number;
  readonly entities: ExtractedEntities;
  readonly userGoal?: string;
  readonly routingTarget?: RoutingTarget;
}

export function createParsedIntent(fields: {
  intentType: IntentType;
  confidence: number;
  entities: ExtractedEntities;
  userGoal?: string;
  routingTarget?: RoutingTarget;
}): ParsedIntent {
  if (!Number.isFinite(fields.confidence) || fields.confidence < 0 || fields.confidence > 1) {
    throw new ValidationError(`Confidence must be within [0, 1], got ${fields.confidence}`);
  }
  const userGoal = fields.userGoal?.trim();
  return Object.freeze({
    intentType: fields.intentType,
    confidence: fields.confidence,
    entities: fields.entities,
    ...(userGoal ? { userGoal } : {}),
    ...(fields.routingTarget ? { routingTarget: fields.routingTarget } : {}),
  });
}

export interface IntentSuggestion {
  readonly intentType: IntentType;
  readonly label: string;
  readonly description: string;
}

export const MAX_SUGGESTIONS = 3;

export interface ClarificationResponse {
  readonly message: string;
  readonly suggestions: readonly IntentSuggestion[];
  readonly originalInput: string;
}

export function createClarificationResponse(
  message: string,
  suggestions: readonly IntentSuggestion[],
  originalInput: string
): ClarificationResponse {
  if (!message.trim()) {
    throw new ValidationError('Clarification message must not be blank');
  }
  if (suggestions.length < 1 || suggestions.length > MAX_SUGGESTIONS) {
    throw new ValidationError(
      `Clarification needs 1 to ${MAX_SUGGESTIONS} suggestions, got ${suggestions.length}`
    );
  }
  for (const suggestion of suggestions) {
    if (!suggestion.label.trim() || !suggestion.description.trim()) {
      throw new ValidationError(`Suggestion for ${suggestion.intentType} needs a label and description`);
    }
  }
  return Object.freeze({
    message,
    suggestions: Object.freeze([...suggestions]),
    originalInput,
  });
}

export type ClassificationErrorReason = 'input_empty' | 'classification_failed';

export type ClassificationResult =
  | { readonly kind: 'route'; readonly intent: ParsedIntent; readonly target: RoutingTarget }
  | { readonly kind: 'confirm'; readonly intent: ParsedIntent; readonly message: string }
  | {
      readonly kind: 'clarify';
      readonly originalInput: string;
      readonly message: string;
      readonly suggestions: readonly IntentSuggestion[];
      readonly intent?: ParsedIntent;
    }
  | {
      readonly kind: 'error';
      readonly reason: ClassificationErrorReason;
      readonly message: string;
      readonly recoverable: boolean;
      readonly cause?: Error;
    };

export type ClassificationKind = ClassificationResult['kind'];

export type Variant<K extends ClassificationKind> = Extract<ClassificationResult, { kind: K }>;

export const classification = {
  route(intent: ParsedIntent, target: RoutingTarget): Variant<'route'> {
    return Object.freeze({ kind: 'route', intent, target });
  },
  confirm(intent: ParsedIntent, message: string): Variant<'confirm'> {
    return Object.freeze({ kind: 'confirm', intent, message });
  },
  clarify(response: ClarificationResponse, intent?: ParsedIntent): Variant<'clarify'> {
    return Object.freeze({
      kind: 'clarify',
      originalInput: response.originalInput,
      message: response.message,
      suggestions: response.suggestions,
      ...(intent ? { intent } : {}),
    });
  },
  error(
    reason: ClassificationErrorReason,
    message: string,
    options: { recoverable: boolean; cause?: Error }
  ): Variant<'error'> {
    return Object.freeze({
      kind: 'error',
      reason,
      message,
      recoverable: options.recoverable,
      ...(options.cause ? { cause: options.cause } : {}),
    });
  },
};

export type ClassificationHandlers<R> = {
  [K in ClassificationKind]: (result: Variant<K>) => R;
};

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/** Exhaustive dispatch: a missing handler is a compile error. */
export function matchClassification<R>(result: ClassificationResult, handlers: ClassificationHandlers<R>): R {
  switch (result.kind) {
    case 'route':
      return handlers.route(result);
    case 'confirm':
      return handlers.confirm(result);
    case 'clarify':
      return handlers.clarify(result);
    case 'error':
      return handlers.error(result);
    default:
      return assertNever(result);
  }
}
