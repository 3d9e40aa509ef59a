import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { AnalyticsPort, InputType } from '../../ports/AnalyticsPort.js';
import type { MissPatternSource, RoundStore, ShotStore, StoredRound } from '../../ports/PersistencePort.js';
import { createLogger } from '../../utils/logger.js';
import {
  CaddieError,
  ClassificationCancelledError,
  NoActiveSessionError,
  ValidationError,
} from '../../utils/errors.js';
import { classification, createParsedIntent, matchClassification } from '../models/classification.js';
import type {
  ClassificationKind,
  ClassificationResult,
  IntentSuggestion,
  ParsedIntent,
  Variant,
} from '../models/classification.js';
import { createExtractedEntities } from '../models/entities.js';
import type { IntentType, RoutingTarget } from '../models/intent.js';
import { parseClub, parseLie } from '../models/clubs.js';
import type { MissDirection, PressureContext, SessionContext, Shot } from '../models/session.js';
import type { IntentClassifier } from '../classifier/IntentClassifier.js';
import type { ClarificationGenerator } from '../clarification/ClarificationGenerator.js';
import type { InputNormalizer } from '../normalizer/InputNormalizer.js';
import type { MissPatternAggregator } from '../patterns/MissPatternAggregator.js';
import type { SessionContextStore } from '../context/SessionContextStore.js';
import type { ContextInjector } from '../context/ContextInjector.js';
import type { IntentRegistry } from '../registry/IntentRegistry.js';
import type { PersonaGuardrails } from '../persona/PersonaGuardrails.js';
import type { ResponseFormatter } from '../persona/ResponseFormatter.js';
import type { DisclaimerType } from '../persona/guardrailRules.js';
import { recoveryFor } from '../recovery/ErrorRecovery.js';
import type { RecoveryAction, RecoveryKey } from '../recovery/ErrorRecovery.js';
import type { ResponseGenerator } from './ResponseGenerator.js';

/** Intents whose reply is remembered as the last recommendation. */
const RECOMMENDATION_INTENTS: ReadonlySet<IntentType> = new Set(['SHOT_RECOMMENDATION', 'CLUB_ADJUSTMENT']);

/** Intents whose reply may reference the player's miss patterns. */
const PATTERN_INTENTS: ReadonlySet<IntentType> = new Set([
  'SHOT_RECOMMENDATION',
  'CLUB_ADJUSTMENT',
  'PATTERN_QUERY',
  'DRILL_REQUEST',
]);

export interface TurnReply {
  readonly status: 'completed';
  readonly kind: ClassificationKind;
  readonly reply: string;
  readonly intentType?: IntentType;
  readonly confidence?: number;
  /** Present only when the app should navigate. */
  readonly navigation?: RoutingTarget;
  readonly suggestions?: readonly IntentSuggestion[];
  readonly recoverable?: boolean;
  readonly actions?: readonly RecoveryAction[];
  readonly disclaimerType?: DisclaimerType;
  readonly patternsReferenced?: number;
}

export type TurnOutcome = TurnReply | { readonly status: 'superseded' };

export interface ShotInput {
  club: string;
  lie: string;
  missDirection?: MissDirection;
  pressure?: PressureContext;
  notes?: string;
}

export interface CaddieAssistantDeps {
  sessionId: string;
  store: SessionContextStore;
  classifier: IntentClassifier;
  normalizer: InputNormalizer;
  clarifier: ClarificationGenerator;
  registry: IntentRegistry;
  responder: ResponseGenerator;
  formatter: ResponseFormatter;
  guardrails: PersonaGuardrails;
  contextInjector: ContextInjector;
  analytics: AnalyticsPort;
  rounds: RoundStore;
  shots: ShotStore;
  patterns: MissPatternSource;
  patternAggregator: MissPatternAggregator;
  clock?: () => number;
}

type PendingPrompt =
  | { kind: 'confirm'; intent: ParsedIntent; input: string; normalized: string }
  | { kind: 'clarify'; suggestions: readonly IntentSuggestion[]; input: string; intent?: ParsedIntent };

const SUPERSEDED: TurnOutcome = Object.freeze({ status: 'superseded' });

/**
 * Drives one player's conversation. A new turn aborts the one still in flight,
 * and a turn only touches the session store after checking it was not aborted,
 * so turns land in submission order and a stale turn never writes.
 */
export class CaddieAssistant {
  private readonly logger: Logger;
  private readonly clock: () => number;
  private inFlight: AbortController | undefined;
  private pending: PendingPrompt | undefined;
  private lastActivityAt: number;

  constructor(private readonly deps: CaddieAssistantDeps) {
    this.clock = deps.clock ?? Date.now;
    this.lastActivityAt = this.clock();
    this.logger = createLogger({ service: 'CaddieAssistant', sessionId: deps.sessionId });
  }

  get sessionId(): string {
    return this.deps.sessionId;
  }

  get lastActivity(): number {
    return this.lastActivityAt;
  }

  snapshot(): SessionContext {
    return this.deps.store.snapshot();
  }

  describeContext(): { summary: string; prompt: string; followUp: string } {
    const context = this.deps.store.snapshot();
    return {
      summary: this.deps.contextInjector.buildSummary(context),
      prompt: this.deps.contextInjector.buildPrompt(context),
      followUp: this.deps.contextInjector.buildFollowUpContext(context),
    };
  }

  async handleInput(text: string, inputType: InputType = 'TEXT'): Promise<TurnOutcome> {
    const turn = this.beginTurn();
    const started = this.clock();
    this.track({ type: 'input_received', inputType, inputLength: text.length });

    let result: ClassificationResult;
    try {
      result = await this.deps.classifier.classify(text, this.deps.store.snapshot(), { signal: turn.signal });
    } catch (error) {
      if (error instanceof ClassificationCancelledError) {
        return SUPERSEDED;
      }
      throw error;
    }
    if (turn.signal.aborted) {
      return SUPERSEDED;
    }

    const intent = result.kind === 'error' ? undefined : result.intent;
    this.track({
      type: 'intent_classified',
      ...(intent ? { intentType: intent.intentType, confidence: intent.confidence } : {}),
      latencyMs: this.clock() - started,
      success: result.kind !== 'error',
    });

    return matchClassification<Promise<TurnOutcome>>(result, {
      route: (routed) => this.executeRoute(turn, text, routed.intent, routed.target),
      confirm: async (confirm) => {
        this.pending = {
          kind: 'confirm',
          intent: confirm.intent,
          input: text,
          normalized: this.deps.normalizer.normalize(text),
        };
        return this.finish(turn, text, {
          status: 'completed',
          kind: 'confirm',
          reply: confirm.message,
          intentType: confirm.intent.intentType,
          confidence: confirm.intent.confidence,
        });
      },
      clarify: async (clarify) => this.presentClarification(turn, text, clarify),
      error: async (failure) => {
        const key: RecoveryKey = failure.reason === 'input_empty' ? 'INPUT_EMPTY' : 'CLASSIFICATION_FAILED';
        this.track({
          type: 'error_occurred',
          errorCode: failure.cause instanceof CaddieError ? failure.cause.code : key,
          recoverable: failure.recoverable,
          ...(failure.cause ? { detail: failure.cause.message } : {}),
        });
        return this.finishWithoutHistory(turn, this.recoveryReply('error', key));
      },
    });
  }

  /** Answers a pending yes/no confirmation. */
  async confirm(accepted: boolean): Promise<TurnOutcome> {
    const pending = this.pending;
    if (pending?.kind !== 'confirm') {
      throw new ValidationError('There is nothing waiting for confirmation');
    }
    const turn = this.beginTurn();
    const answer = accepted ? 'Yes' : 'No';

    if (accepted) {
      const intent = pending.intent;
      const target = this.deps.registry.buildRoutingTarget(intent.intentType, intent.entities);
      return this.executeRoute(turn, answer, intent, target);
    }

    const response = this.deps.clarifier.generate(pending.input, pending.intent, pending.normalized);
    return this.presentClarification(turn, answer, classification.clarify(response, pending.intent));
  }

  /** Routes the clarification suggestion at `index` as if the player had said it outright. */
  async selectSuggestion(index: number): Promise<TurnOutcome> {
    const pending = this.pending;
    if (pending?.kind !== 'clarify') {
      throw new ValidationError('There are no suggestions to choose from');
    }
    const suggestion = pending.suggestions[index];
    if (!suggestion) {
      throw new ValidationError(`Suggestion ${index} does not exist`);
    }

    const turn = this.beginTurn();
    this.track({ type: 'suggestion_selected', intentType: suggestion.intentType, suggestionIndex: index });

    const intent = createParsedIntent({
      intentType: suggestion.intentType,
      confidence: 1,
      entities: pending.intent?.entities ?? createExtractedEntities(),
      userGoal: pending.intent?.userGoal,
    });
    const target = this.deps.registry.buildRoutingTarget(intent.intentType, intent.entities);
    return this.executeRoute(turn, suggestion.label, intent, target);
  }

  startRound(courseName: string, startingHole = 1, startingPar = 4): StoredRound {
    const round = this.deps.rounds.start(courseName, startingHole);
    this.deps.store.updateRound({ roundId: round.id, courseName, startingHole, startingPar });
    this.touch();
    this.logger.info({ roundId: round.id }, 'Round started');
    return round;
  }

  updateHole(holeNumber: number, par: number): void {
    this.deps.store.updateHole(holeNumber, par);
    this.touch();
  }

  recordShot(input: ShotInput): Shot {
    const club = parseClub(input.club);
    if (!club) {
      throw new ValidationError(`Unknown club: ${input.club}`);
    }
    const lie = parseLie(input.lie);
    if (!lie) {
      throw new ValidationError(`Unknown lie: ${input.lie}`);
    }

    const notes = input.notes?.trim();
    const shot: Shot = {
      id: randomUUID(),
      timestamp: this.clock(),
      club,
      lie,
      ...(input.missDirection ? { missDirection: input.missDirection } : {}),
      ...(input.pressure ? { pressure: input.pressure } : {}),
      ...(notes ? { notes } : {}),
    };
    const context = this.deps.store.snapshot();
    this.deps.shots.record(shot, {
      roundId: context.currentRound?.id,
      holeNumber: context.currentHole?.number,
    });
    this.deps.store.recordShot(shot);
    this.deps.patternAggregator.refreshForClub(club);
    this.touch();
    return shot;
  }

  /** Shots recorded during the current round, oldest first. */
  roundShots(): Shot[] {
    const round = this.deps.store.snapshot().currentRound;
    if (!round) {
      throw new NoActiveSessionError('There is no round in progress');
    }
    return this.deps.shots.listForRound(round.id);
  }

  endRound(): void {
    const round = this.deps.store.snapshot().currentRound;
    if (!round) {
      throw new NoActiveSessionError('There is no round to end');
    }
    this.cancel();
    this.deps.rounds.end(round.id);
    this.deps.store.clear();
    this.pending = undefined;
    this.touch();
    this.logger.info({ roundId: round.id }, 'Round ended');
  }

  /** Aborts the turn in flight, if any. */
  cancel(): void {
    this.inFlight?.abort();
    this.inFlight = undefined;
  }

  reset(): void {
    this.cancel();
    this.deps.store.clear();
    this.pending = undefined;
  }

  /** Aborts the previous turn; a pending confirmation or suggestion list only answers the turn that raised it. */
  private beginTurn(): AbortController {
    this.inFlight?.abort();
    this.pending = undefined;
    const controller = new AbortController();
    this.inFlight = controller;
    this.touch();
    return controller;
  }

  private async executeRoute(
    turn: AbortController,
    input: string,
    intent: ParsedIntent,
    target: RoutingTarget
  ): Promise<TurnOutcome> {
    const started = this.clock();
    const schema = this.deps.registry.getSchema(intent.intentType);

    if (this.deps.registry.requires(intent.intentType, 'ROUND_ACTIVE') && !this.deps.store.hasActiveRound()) {
      this.track({ type: 'error_occurred', errorCode: 'NO_ACTIVE_SESSION', recoverable: true });
      return this.finish(turn, input, {
        ...this.recoveryReply('route', 'NO_ACTIVE_SESSION'),
        intentType: intent.intentType,
        confidence: intent.confidence,
      });
    }

    const context = this.deps.store.snapshot();
    let raw: string;
    try {
      raw = await this.deps.responder.respond({ input, intent, context, signal: turn.signal });
    } catch (error) {
      if (error instanceof ClassificationCancelledError) {
        return SUPERSEDED;
      }
      throw error;
    }
    if (turn.signal.aborted) {
      return SUPERSEDED;
    }

    const includePatterns = PATTERN_INTENTS.has(intent.intentType);
    const patterns = includePatterns
      ? this.deps.patterns.findRelevant({ clubName: intent.entities.club?.name ?? context.lastShot?.club.name })
      : [];
    const forceDisclaimer: DisclaimerType | undefined = intent.entities.pain
      ? 'MEDICAL'
      : this.deps.guardrails.detectSensitiveInput(input);
    const formatted = this.deps.formatter.format(raw, patterns, { includePatterns, forceDisclaimer });

    this.track({
      type: 'route_executed',
      module: target.module,
      screen: target.screen,
      latencyMs: this.clock() - started,
    });

    const reply: TurnReply = {
      status: 'completed',
      kind: 'route',
      reply: formatted.text,
      intentType: intent.intentType,
      confidence: intent.confidence,
      ...(schema.navigates ? { navigation: target } : {}),
      ...(formatted.disclaimerType ? { disclaimerType: formatted.disclaimerType } : {}),
      patternsReferenced: formatted.patternsReferenced,
    };

    if (intent.intentType === 'ROUND_END') {
      return this.closeRoundAfterReply(turn, reply);
    }
    if (RECOMMENDATION_INTENTS.has(intent.intentType)) {
      this.deps.store.recordRecommendation(formatted.body);
    }
    return this.finish(turn, input, reply);
  }

  private closeRoundAfterReply(turn: AbortController, reply: TurnReply): TurnOutcome {
    const round = this.deps.store.snapshot().currentRound;
    if (round) {
      this.deps.rounds.end(round.id);
      this.logger.info({ roundId: round.id }, 'Round ended by request');
    }
    this.deps.store.clear();
    return this.finishWithoutHistory(turn, reply);
  }

  private presentClarification(
    turn: AbortController,
    input: string,
    result: Variant<'clarify'>
  ): TurnOutcome {
    this.pending = {
      kind: 'clarify',
      suggestions: result.suggestions,
      input: result.originalInput,
      ...(result.intent ? { intent: result.intent } : {}),
    };
    this.track({
      type: 'clarification_requested',
      suggestionCount: result.suggestions.length,
      inputLength: result.originalInput.length,
    });
    return this.finish(turn, input, {
      status: 'completed',
      kind: 'clarify',
      reply: result.message,
      suggestions: result.suggestions,
      ...(result.intent ? { intentType: result.intent.intentType, confidence: result.intent.confidence } : {}),
    });
  }

  private recoveryReply(kind: ClassificationKind, key: RecoveryKey): TurnReply {
    const recovery = recoveryFor(key);
    return {
      status: 'completed',
      kind,
      reply: recovery.message,
      recoverable: recovery.recoverable,
      actions: recovery.actions,
      suggestions: recovery.suggestedIntents.map((intentType) => this.deps.registry.toSuggestion(intentType)),
    };
  }

  private finish(turn: AbortController, input: string, reply: TurnReply): TurnOutcome {
    if (turn.signal.aborted) {
      return SUPERSEDED;
    }
    this.deps.store.appendTurn(input, reply.reply);
    return this.settle(turn, reply);
  }

  private finishWithoutHistory(turn: AbortController, reply: TurnReply): TurnOutcome {
    if (turn.signal.aborted) {
      return SUPERSEDED;
    }
    return this.settle(turn, reply);
  }

  private settle(turn: AbortController, reply: TurnReply): TurnReply {
    if (this.inFlight === turn) {
      this.inFlight = undefined;
    }
    this.touch();
    return reply;
  }

  private touch(): void {
    this.lastActivityAt = this.clock();
  }

  private track(event: DistributiveOmit<Parameters<AnalyticsPort['track']>[0], 'sessionId' | 'timestamp'>): void {
    this.deps.analytics.track({ ...event, sessionId: this.deps.sessionId, timestamp: this.clock() });
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
