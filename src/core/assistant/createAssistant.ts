import type { AnalyticsPort } from '../../ports/AnalyticsPort.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import type { MissPatternStore, RoundStore, ShotStore } from '../../ports/PersistencePort.js';
import { ClarificationGenerator } from '../clarification/ClarificationGenerator.js';
import { buildClassifierSystemPrompt } from '../classifier/classifierPrompt.js';
import { ConfidenceRouter } from '../classifier/ConfidenceRouter.js';
import { IntentClassifier } from '../classifier/IntentClassifier.js';
import { ContextInjector } from '../context/ContextInjector.js';
import { SessionContextStore } from '../context/SessionContextStore.js';
import { InputNormalizer } from '../normalizer/InputNormalizer.js';
import { MissPatternAggregator } from '../patterns/MissPatternAggregator.js';
import { PersonaGuardrails } from '../persona/PersonaGuardrails.js';
import { ResponseFormatter } from '../persona/ResponseFormatter.js';
import type { IntentRegistry } from '../registry/IntentRegistry.js';
import { CaddieAssistant } from './CaddieAssistant.js';
import type { AssistantFactory } from './SessionRegistry.js';
import { ResponseGenerator } from './ResponseGenerator.js';

export interface PipelineOptions {
  llmPort: LLMPort;
  analytics: AnalyticsPort;
  registry: IntentRegistry;
  rounds: RoundStore;
  shots: ShotStore;
  patterns: MissPatternStore;
  personaPrompt: string;
  responseTemplate: string;
  classifierTimeoutMs?: number;
  responseTimeoutMs?: number;
  clock?: () => number;
}

/**
 * Wires the stateless pipeline once and returns a factory that gives each
 * session its own context store and assistant.
 */
export function createAssistantFactory(options: PipelineOptions): AssistantFactory {
  const { llmPort, registry } = options;
  const contextInjector = new ContextInjector();
  const guardrails = new PersonaGuardrails();
  const formatter = new ResponseFormatter(guardrails);
  const clarifier = new ClarificationGenerator(registry);
  const normalizer = new InputNormalizer();
  const patternAggregator = new MissPatternAggregator({
    shots: options.shots,
    patterns: options.patterns,
    clock: options.clock,
  });
  const classifier = new IntentClassifier({
    llmPort,
    normalizer,
    contextInjector,
    router: new ConfidenceRouter(registry, clarifier),
    systemPrompt: buildClassifierSystemPrompt(options.personaPrompt, registry),
    timeoutMs: options.classifierTimeoutMs,
  });
  const responder = new ResponseGenerator({
    llmPort,
    registry,
    contextInjector,
    systemPrompt: options.personaPrompt,
    template: options.responseTemplate,
    timeoutMs: options.responseTimeoutMs,
  });

  return (sessionId) =>
    new CaddieAssistant({
      sessionId,
      store: new SessionContextStore(options.clock),
      classifier,
      normalizer,
      clarifier,
      registry,
      responder,
      formatter,
      guardrails,
      contextInjector,
      analytics: options.analytics,
      rounds: options.rounds,
      shots: options.shots,
      patterns: options.patterns,
      patternAggregator,
      clock: options.clock,
    });
}
