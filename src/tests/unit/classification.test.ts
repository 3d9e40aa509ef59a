import { describe, it, expect } from 'vitest';
import {
  classification,
  createClarificationResponse,
  createParsedIntent,
  matchClassification,
} from '../../core/models/classification.js';
import type { IntentSuggestion } from '../../core/models/classification.js';
import { createExtractedEntities } from '../../core/models/entities.js';
import { ValidationError } from '../../utils/errors.js';

const suggestion = (label: string): IntentSuggestion => ({
  intentType: 'HELP_REQUEST',
  label,
  description: 'Find out what the caddie can do',
});

describe('classification model', () => {
  describe('createParsedIntent', () => {
    it('should reject confidence outside [0, 1]', () => {
      const entities = createExtractedEntities();
      expect(() => createParsedIntent({ intentType: 'HELP_REQUEST', confidence: 1.01, entities })).toThrow(
        ValidationError
      );
      expect(() => createParsedIntent({ intentType: 'HELP_REQUEST', confidence: -0.1, entities })).toThrow(
        ValidationError
      );
      expect(createParsedIntent({ intentType: 'HELP_REQUEST', confidence: 0, entities }).confidence).toBe(0);
    });

    it('should drop a blank user goal', () => {
      const intent = createParsedIntent({
        intentType: 'STATS_LOOKUP',
        confidence: 0.9,
        entities: createExtractedEntities(),
        userGoal: '  ',
      });
      expect('userGoal' in intent).toBe(false);
    });
  });

  describe('createClarificationResponse', () => {
    it('should require between one and three suggestions', () => {
      expect(() => createClarificationResponse('Which one?', [], 'hmm')).toThrow(ValidationError);
      expect(() =>
        createClarificationResponse('Which one?', [suggestion('a'), suggestion('b'), suggestion('c'), suggestion('d')], 'hmm')
      ).toThrow(ValidationError);
      expect(createClarificationResponse('Which one?', [suggestion('a')], 'hmm').suggestions).toHaveLength(1);
    });

    it('should reject a blank message', () => {
      expect(() => createClarificationResponse('   ', [suggestion('a')], 'hmm')).toThrow(
        'Clarification message must not be blank'
      );
    });

    it('should reject a suggestion without a label', () => {
      expect(() => createClarificationResponse('Which one?', [suggestion(' ')], 'hmm')).toThrow(ValidationError);
    });
  });

  describe('matchClassification', () => {
    it('should dispatch on the result kind', () => {
      const handlers = {
        route: () => 'route',
        confirm: () => 'confirm',
        clarify: () => 'clarify',
        error: (result: { message: string }) => `error:${result.message}`,
      };
      const result = classification.error('input_empty', 'nothing heard', { recoverable: true });
      expect(matchClassification(result, handlers)).toBe('error:nothing heard');
      expect(result.recoverable).toBe(true);
      expect('cause' in result).toBe(false);
    });
  });
});
