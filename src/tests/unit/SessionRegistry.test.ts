import { describe, it, expect, vi } from 'vitest';
import { SessionRegistry } from '../../core/assistant/SessionRegistry.js';
import { createAssistantFactory } from '../../core/assistant/createAssistant.js';
import { IntentRegistry } from '../../core/registry/IntentRegistry.js';
import { DisabledLLMAdapter } from '../../adapters/llm/DisabledLLMAdapter.js';
import { LLMError } from '../../utils/errors.js';

describe('SessionRegistry', () => {
  function createRegistry(clock: () => number) {
    const factory = createAssistantFactory({
      llmPort: new DisabledLLMAdapter(),
      analytics: { track: vi.fn() },
      registry: IntentRegistry.load(),
      rounds: { start: vi.fn(), end: vi.fn(), get: vi.fn() },
      shots: { record: vi.fn(), listForRound: vi.fn(), listRecentForClub: vi.fn().mockReturnValue([]) },
      patterns: { findRelevant: vi.fn().mockReturnValue([]), save: vi.fn(), replaceForClub: vi.fn() },
      personaPrompt: 'You are a caddie.',
      responseTemplate: '{{USER_INPUT}}',
      clock,
    });
    return new SessionRegistry(factory, clock);
  }

  it('should create and close sessions by id', () => {
    const sessions = createRegistry(() => 0);
    const assistant = sessions.create();

    expect(sessions.get(assistant.sessionId)).toBe(assistant);
    expect(sessions.size).toBe(1);
    expect(sessions.delete(assistant.sessionId)).toBe(true);
    expect(sessions.delete(assistant.sessionId)).toBe(false);
    expect(sessions.get(assistant.sessionId)).toBeUndefined();
  });

  it('should sweep only sessions idle past the limit', () => {
    let now = 0;
    const sessions = createRegistry(() => now);
    const stale = sessions.create();
    now = 100_000;
    const fresh = sessions.create();

    expect(sessions.sweepIdle(50_000)).toBe(1);
    expect(sessions.get(stale.sessionId)).toBeUndefined();
    expect(sessions.get(fresh.sessionId)).toBe(fresh);
  });

  it('should fail classification when no model is configured', async () => {
    const sessions = createRegistry(() => 0);
    const outcome = await sessions.create().handleInput('what club from here');

    expect(outcome).toMatchObject({ status: 'completed', kind: 'error', recoverable: true });
  });
});

describe('DisabledLLMAdapter', () => {
  it('should refuse classification and return empty replies', async () => {
    const adapter = new DisabledLLMAdapter();
    await expect(adapter.generateText({ prompt: 'hi', purpose: 'classification' })).rejects.toBeInstanceOf(LLMError);
    await expect(adapter.generateText({ prompt: 'hi', purpose: 'response' })).resolves.toEqual({ text: '' });
  });
});
