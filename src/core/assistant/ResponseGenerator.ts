import type { LLMPort } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { ClassificationCancelledError } from '../../utils/errors.js';
import { fillTemplate } from '../../utils/resources.js';
import { linkedController, raceAbort } from '../../utils/abort.js';
import { describeEntities } from '../models/entities.js';
import type { ParsedIntent } from '../models/classification.js';
import type { SessionContext } from '../models/session.js';
import type { IntentRegistry } from '../registry/IntentRegistry.js';
import type { ContextInjector } from '../context/ContextInjector.js';

export const DEFAULT_RESPONSE_TIMEOUT_MS = 15000;

export interface ResponseRequest {
  input: string;
  intent: ParsedIntent;
  context: SessionContext;
  signal?: AbortSignal;
}

export interface ResponseGeneratorDeps {
  llmPort: LLMPort;
  registry: IntentRegistry;
  contextInjector: ContextInjector;
  systemPrompt: string;
  template: string;
  timeoutMs?: number;
}

/**
 * Writes the caddie's reply for a routed intent. Model failures fall back to a
 * short reply built from the registry; only cancellation propagates.
 */
export class ResponseGenerator {
  private readonly logger = createLogger({ service: 'ResponseGenerator' });
  private readonly timeoutMs: number;

  constructor(private readonly deps: ResponseGeneratorDeps) {
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;
  }

  async respond(request: ResponseRequest): Promise<string> {
    const { intent, signal } = request;
    const logger = this.logger.child({ method: 'respond', intentType: intent.intentType });
    const schema = this.deps.registry.getSchema(intent.intentType);
    const details = describeEntities(intent.entities);

    const prompt = fillTemplate(this.deps.template, {
      USER_INPUT: request.input,
      INTENT_NAME: schema.displayName,
      INTENT_DESCRIPTION: schema.description,
      USER_GOAL: intent.userGoal ?? '(not stated)',
      ENTITIES: details.length > 0 ? details.join(', ') : '(none)',
      CONTEXT: this.deps.contextInjector.buildPrompt(request.context),
      NAVIGATION_NOTE: schema.navigates
        ? `The app is opening the ${schema.label} screen for them; tell them what to look at there.`
        : 'Answer directly; no screen is being opened.',
    });

    const { controller, dispose } = linkedController(signal, this.timeoutMs);

    try {
      const response = await raceAbort(
        this.deps.llmPort.generateText({
          systemPrompt: this.deps.systemPrompt,
          prompt,
          purpose: 'response',
          maxTokens: 400,
          temperature: 0.4,
          signal: controller.signal,
        }),
        controller.signal
      );
      if (signal?.aborted) {
        throw new ClassificationCancelledError();
      }
      const text = response.text.trim();
      if (text) {
        return text;
      }
      logger.warn('Empty model response, using fallback reply');
    } catch (error) {
      if (signal?.aborted) {
        throw error instanceof ClassificationCancelledError
          ? error
          : new ClassificationCancelledError({ cause: error });
      }
      logger.warn({ error }, 'Response generation failed, using fallback reply');
    } finally {
      dispose();
    }

    const suffix = details.length > 0 ? ` (${details.slice(0, 2).join(', ')})` : '';
    return `Let's ${schema.confirmPhrase}${suffix}.`;
  }
}
