import type { IntentType } from '../models/intent.js';

export type RecoveryAction = 'RETRY' | 'REPHRASE' | 'START_ROUND' | 'SHOW_OPTIONS';

export interface RecoveryStrategy {
  readonly message: string;
  readonly recoverable: boolean;
  readonly actions: readonly RecoveryAction[];
  readonly suggestedIntents: readonly IntentType[];
}

export type RecoveryKey =
  | 'INPUT_EMPTY'
  | 'CLASSIFICATION_FAILED'
  | 'NO_ACTIVE_SESSION';

const STRATEGIES: Record<RecoveryKey, RecoveryStrategy> = {
  INPUT_EMPTY: {
    message: "I didn't catch anything. Say or type something and I'll take it from there.",
    recoverable: true,
    actions: ['REPHRASE'],
    suggestedIntents: ['SHOT_RECOMMENDATION', 'HELP_REQUEST'],
  },
  // Timeouts, network failures and unreadable replies look the same to the player.
  CLASSIFICATION_FAILED: {
    message: "I couldn't work that one out just now. Let's try again, or I can show you some quick options.",
    recoverable: true,
    actions: ['RETRY', 'SHOW_OPTIONS'],
    suggestedIntents: ['SHOT_RECOMMENDATION', 'SCORE_ENTRY', 'HELP_REQUEST'],
  },
  NO_ACTIVE_SESSION: {
    message: 'I need an active round to help with that. Want to start one?',
    recoverable: true,
    actions: ['START_ROUND'],
    suggestedIntents: ['ROUND_START'],
  },
};

export function recoveryFor(key: RecoveryKey): RecoveryStrategy {
  return STRATEGIES[key];
}
