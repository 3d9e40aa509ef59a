import { describe, it, expect, beforeEach } from 'vitest';
import { MAX_HISTORY_TURNS, SessionContextStore } from '../../core/context/SessionContextStore.js';
import { ContextInjector } from '../../core/context/ContextInjector.js';
import { parseClub } from '../../core/models/clubs.js';
import { EMPTY_SESSION_CONTEXT } from '../../core/models/session.js';
import type { Club } from '../../core/models/clubs.js';
import { NoActiveSessionError, ValidationError } from '../../utils/errors.js';

function club(name: string): Club {
  const found = parseClub(name);
  if (!found) throw new Error(`test club ${name} missing`);
  return found;
}

describe('SessionContextStore', () => {
  let now: number;
  let store: SessionContextStore;

  beforeEach(() => {
    now = 1_000;
    store = new SessionContextStore(() => now);
  });

  it('should keep only the most recent turns', () => {
    for (let i = 1; i <= 6; i++) {
      store.appendTurn(`question-${i}`, `answer-${i}`);
    }
    const history = store.snapshot().conversationHistory;
    expect(history).toHaveLength(MAX_HISTORY_TURNS);
    expect(history[0]).toEqual({ role: 'USER', content: 'question-2', timestamp: 1_000 });
    expect(history[9]).toEqual({ role: 'ASSISTANT', content: 'answer-6', timestamp: 1_001 });
  });

  it('should return snapshots that later mutations do not change', () => {
    store.appendTurn('first', 'reply');
    const before = store.snapshot();
    store.appendTurn('second', 'reply');
    expect(before.conversationHistory).toHaveLength(2);
    expect(Object.isFrozen(before)).toBe(true);
  });

  it('should start a round on the given hole', () => {
    store.updateRound({ roundId: 'round-1', courseName: ' Pine Valley ', startingHole: 10, startingPar: 5 });
    const context = store.snapshot();
    expect(context.currentRound).toEqual({ id: 'round-1', courseName: 'Pine Valley', startingHole: 10, startedAt: 1_000 });
    expect(context.currentHole).toEqual({ number: 10, par: 5 });
    expect(store.hasActiveRound()).toBe(true);
  });

  it('should refuse hole updates without a round', () => {
    expect(() => store.updateHole(3, 4)).toThrow(NoActiveSessionError);
  });

  it('should validate hole and par ranges', () => {
    store.updateRound({ roundId: 'round-1', courseName: 'Links' });
    expect(() => store.updateHole(19, 4)).toThrow(ValidationError);
    expect(() => store.updateHole(4, 6)).toThrow(ValidationError);
    store.updateHole(4, 3);
    store.updateScore(2);
    expect(store.snapshot().currentHole).toEqual({ number: 4, par: 3, strokes: 2 });
  });

  it('should reject a blank recommendation', () => {
    expect(() => store.recordRecommendation('  ')).toThrow(ValidationError);
  });

  it('should forget everything on clear', () => {
    store.updateRound({ roundId: 'round-1', courseName: 'Links' });
    store.updateConditions('breezy');
    store.appendTurn('hi', 'hello');
    store.clear();
    expect(store.snapshot()).toEqual(EMPTY_SESSION_CONTEXT);
  });

  it('should keep the round when only history is cleared', () => {
    store.updateRound({ roundId: 'round-1', courseName: 'Links' });
    store.addTurn('USER', 'hi');
    store.clearHistory();
    const context = store.snapshot();
    expect(context.conversationHistory).toEqual([]);
    expect(context.currentRound?.id).toBe('round-1');
  });
});

describe('ContextInjector', () => {
  const injector = new ContextInjector();

  it('should render an empty context as an empty string', () => {
    expect(injector.buildPrompt(EMPTY_SESSION_CONTEXT)).toBe('');
    expect(injector.buildSummary(EMPTY_SESSION_CONTEXT)).toBe('no active session');
    expect(injector.buildFollowUpContext(EMPTY_SESSION_CONTEXT)).toBe('');
  });

  it('should render every populated section', () => {
    const store = new SessionContextStore(() => 5_000);
    store.updateRound({ roundId: 'round-7', courseName: 'Harbour Links', startingHole: 1, startingPar: 4 });
    store.updateHole(7, 3);
    store.updateConditions('wind 10mph left-to-right');
    store.recordShot({
      id: 'shot-1',
      timestamp: 5_000,
      club: club('7-iron'),
      lie: 'FAIRWAY',
      missDirection: 'PUSH',
      pressure: { isUserTagged: true, isInferred: false, scoringContext: '1 under' },
      notes: 'thin contact',
    });
    store.recordRecommendation('Take the 6-iron and aim left centre.');
    store.appendTurn('What club here?', 'Take the 6-iron.');

    expect(injector.buildPrompt(store.snapshot())).toBe(
      [
        '## Current Context',
        '',
        '**Round Information:**',
        '- Course: Harbour Links',
        '- Round ID: round-7',
        '',
        '**Current Position:**',
        '- Hole: 7 (Par 3)',
        '- Conditions: wind 10mph left-to-right',
        '',
        '**Last Shot:**',
        '- Club: 7-Iron',
        '- Lie: fairway',
        '- Miss: push',
        '- Pressure: yes (1 under)',
        '- Notes: thin contact',
        '',
        '**Last Recommendation:**',
        'Take the 6-iron and aim left centre.',
        '',
        '**Recent Conversation:**',
        'User: What club here?',
        'Assistant: Take the 6-iron.',
      ].join('\n')
    );
    expect(injector.buildSummary(store.snapshot())).toBe('Harbour Links • Hole 7 (Par 3) • Last: 7-Iron');
  });

  it('should leave evicted turns out of the prompt', () => {
    const store = new SessionContextStore(() => 0);
    for (let i = 1; i <= 6; i++) {
      store.appendTurn(`marker-q${i}`, `marker-a${i}`);
    }
    const prompt = injector.buildPrompt(store.snapshot());
    expect(prompt).not.toContain('marker-q1');
    expect(prompt).not.toContain('marker-a1');
    expect(prompt).toContain('User: marker-q2');
    expect(prompt).toContain('Assistant: marker-a6');
  });

  it('should describe the last exchange for follow-ups', () => {
    const store = new SessionContextStore(() => 0);
    store.appendTurn('How far is the carry?', 'About 140 to clear the bunker.');
    store.addTurn('USER', 'And into the wind?');
    expect(injector.buildFollowUpContext(store.snapshot())).toBe(
      'Last exchange:\nUser: How far is the carry?\nAssistant: About 140 to clear the bunker.'
    );
  });
});
