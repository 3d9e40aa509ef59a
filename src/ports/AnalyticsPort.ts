import type { IntentType, Module } from '../core/models/intent.js';

export type InputType = 'TEXT' | 'VOICE';

interface EventBase {
  sessionId: string;
  timestamp: number;
}

/** Payloads carry lengths, categories and codes only, never the player's words. */
export type AnalyticsEvent = EventBase &
  (
    | { type: 'input_received'; inputType: InputType; inputLength: number }
    | {
        type: 'intent_classified';
        intentType?: IntentType;
        confidence?: number;
        latencyMs: number;
        success: boolean;
      }
    | { type: 'route_executed'; module: Module; screen: string; latencyMs: number }
    | { type: 'clarification_requested'; suggestionCount: number; inputLength: number }
    | { type: 'suggestion_selected'; intentType: IntentType; suggestionIndex: number }
    | { type: 'error_occurred'; errorCode: string; recoverable: boolean; detail?: string }
  );

export type AnalyticsEventType = AnalyticsEvent['type'];

export interface AnalyticsPort {
  track(event: AnalyticsEvent): void;
}
