import type { Logger } from 'pino';
import type { LLMPort } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import {
  ClassificationCancelledError,
  ClassificationNetworkError,
  ClassificationTimeoutError,
  InputEmptyError,
  InvalidModelResponseError,
} from '../../utils/errors.js';
import { classification } from '../models/classification.js';
import type { ClassificationResult } from '../models/classification.js';
import type { SessionContext } from '../models/session.js';
import type { InputNormalizer } from '../normalizer/InputNormalizer.js';
import type { ContextInjector } from '../context/ContextInjector.js';
import { recoveryFor } from '../recovery/ErrorRecovery.js';
import { linkedController, raceAbort } from '../../utils/abort.js';
import { parseModelReply } from './modelReply.js';
import type { ConfidenceRouter } from './ConfidenceRouter.js';

export const DEFAULT_CLASSIFIER_TIMEOUT_MS = 8000;

export interface IntentClassifierDeps {
  llmPort: LLMPort;
  normalizer: InputNormalizer;
  contextInjector: ContextInjector;
  router: ConfidenceRouter;
  systemPrompt: string;
  timeoutMs?: number;
}

export interface ClassifyOptions {
  /** Aborting rejects the call with ClassificationCancelledError; no result is produced. */
  signal?: AbortSignal;
}

export class IntentClassifier {
  private readonly logger = createLogger({ service: 'IntentClassifier' });
  private readonly timeoutMs: number;

  constructor(private readonly deps: IntentClassifierDeps) {
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_CLASSIFIER_TIMEOUT_MS;
  }

  async classify(
    rawInput: string,
    context?: SessionContext,
    options: ClassifyOptions = {}
  ): Promise<ClassificationResult> {
    const logger = this.logger.child({ method: 'classify', inputLength: rawInput.length });

    if (!rawInput.trim()) {
      const recovery = recoveryFor('INPUT_EMPTY');
      return classification.error('input_empty', recovery.message, {
        recoverable: recovery.recoverable,
        cause: new InputEmptyError(),
      });
    }
    throwIfCancelled(options.signal);

    const { normalized, applied } = this.deps.normalizer.normalizeWithDetails(rawInput);
    const contextBlock = context ? this.deps.contextInjector.buildPrompt(context) : '';

    try {
      const raw = await this.requestClassification(normalized, contextBlock, options.signal);
      const intent = parseModelReply(raw);
      logger.info(
        { intentType: intent.intentType, confidence: intent.confidence, normalization: applied },
        'Input classified'
      );
      return this.deps.router.decide(intent, rawInput, normalized);
    } catch (error) {
      if (error instanceof ClassificationCancelledError) {
        logger.debug('Classification cancelled');
        throw error;
      }
      return this.failed(error, logger);
    }
  }

  private failed(error: unknown, logger: Logger): ClassificationResult {
    const cause = error instanceof Error ? error : new Error(String(error));
    if (error instanceof ClassificationTimeoutError) {
      logger.warn({ timeoutMs: error.timeoutMs }, 'Classification timed out');
    } else if (error instanceof InvalidModelResponseError) {
      logger.warn({ error }, 'Model reply rejected');
    } else {
      logger.error({ error }, 'Classification request failed');
    }
    const recovery = recoveryFor('CLASSIFICATION_FAILED');
    return classification.error('classification_failed', recovery.message, {
      recoverable: recovery.recoverable,
      cause,
    });
  }

  /**
   * One model call bounded by the timeout and tied to the caller's signal.
   * The race settles as soon as either fires, even if the port ignores its signal.
   */
  private async requestClassification(
    normalized: string,
    contextBlock: string,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const { controller, timedOut, dispose } = linkedController(signal, this.timeoutMs);

    try {
      const response = await raceAbort(
        this.deps.llmPort.generateText({
          systemPrompt: this.deps.systemPrompt,
          contextBlock,
          prompt: normalized,
          purpose: 'classification',
          maxTokens: 300,
          temperature: 0.1,
          signal: controller.signal,
        }),
        controller.signal
      );
      throwIfCancelled(signal);
      return response.text;
    } catch (error) {
      if (signal?.aborted) {
        throw new ClassificationCancelledError({ cause: error });
      }
      if (timedOut()) {
        throw new ClassificationTimeoutError(this.timeoutMs, { cause: error });
      }
      throw new ClassificationNetworkError('Classification request failed', { cause: error });
    } finally {
      dispose();
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ClassificationCancelledError();
  }
}
