import { describe, it, expect } from 'vitest';
import { PersonaGuardrails } from '../../core/persona/PersonaGuardrails.js';
import { ResponseFormatter, selectPatterns } from '../../core/persona/ResponseFormatter.js';
import { parseClub } from '../../core/models/clubs.js';
import type { MissPattern } from '../../core/models/session.js';

const SAFETY_NOTE = '*Note: Results may vary. These are suggestions based on patterns, not guaranteed outcomes.*';
const MEDICAL_NOTE =
  '*Note: This is general information only. For pain, injury concerns, or persistent physical issues, please consult a qualified medical professional or physical therapist.*';

describe('PersonaGuardrails', () => {
  const guardrails = new PersonaGuardrails();

  it('should flag guarantee language', () => {
    expect(guardrails.check('this will fix your slice guaranteed')).toEqual({
      needsDisclaimer: true,
      disclaimerType: 'SAFETY',
      violatedRule: 'absolute guarantee language',
    });
  });

  it('should check medical language before anything else', () => {
    expect(guardrails.check('That pain is guaranteed to ease with a shorter backswing').disclaimerType).toBe('MEDICAL');
  });

  it('should flag betting and swing mechanics', () => {
    expect(guardrails.check('Put some money on the back nine').disclaimerType).toBe('BETTING');
    expect(guardrails.check('Shorten your backswing a touch').disclaimerType).toBe('SWING_TECHNIQUE');
  });

  it('should pass clean text', () => {
    expect(guardrails.check('Take one more club into the breeze.')).toEqual({ needsDisclaimer: false });
  });

  it('should give the same verdict every time', () => {
    const text = 'Odds are the wind drops later.';
    const first = guardrails.check(text);
    for (let i = 0; i < 5; i++) {
      expect(guardrails.check(text)).toEqual(first);
    }
  });

  it('should spot medical language in the player input', () => {
    expect(guardrails.detectSensitiveInput('my elbow hurts on impact')).toBe('MEDICAL');
    expect(guardrails.detectSensitiveInput('what club from here')).toBeUndefined();
  });

  it('should rank disclaimers by rule order', () => {
    expect(guardrails.strongest('SAFETY', 'MEDICAL')).toBe('MEDICAL');
    expect(guardrails.strongest('BETTING', undefined)).toBe('BETTING');
    expect(guardrails.strongest(undefined, undefined)).toBeUndefined();
  });
});

describe('ResponseFormatter', () => {
  const formatter = new ResponseFormatter();

  it('should soften guarantees and add the safety note', () => {
    const result = formatter.format('this will fix your slice guaranteed');
    expect(result.text).toBe(`this may help fix your slice\n\n${SAFETY_NOTE}`);
    expect(result.body).toBe('this may help fix your slice');
    expect(result.disclaimerAdded).toBe(true);
    expect(result.disclaimerType).toBe('SAFETY');
    expect(result.violatedRule).toBe('absolute guarantee language');
  });

  it('should keep a leading capital when softening', () => {
    expect(formatter.format("You'll never miss that green.").text).toBe(
      `You're less likely to miss that green.\n\n${SAFETY_NOTE}`
    );
  });

  it('should strip filler and formal phrasing', () => {
    expect(formatter.format('As an AI assistant, take the 7-iron. Let me know if you need anything else.').text).toBe(
      'take the 7-iron.'
    );
    expect(formatter.format('Additionally, it is recommended that you utilize the 8-iron.').text).toBe(
      "Also, I'd recommend you use the 8-iron."
    );
  });

  it('should add a forced disclaimer to clean text', () => {
    const result = formatter.format('Take one more club.', [], { forceDisclaimer: 'MEDICAL' });
    expect(result.text).toBe(`Take one more club.\n\n${MEDICAL_NOTE}`);
    expect(result.disclaimerType).toBe('MEDICAL');
    expect(result.violatedRule).toBeUndefined();
  });

  it('should be deterministic', () => {
    const raw = 'It would be beneficial to aim left. This will stop the miss.';
    expect(formatter.format(raw)).toEqual(formatter.format(raw));
  });

  describe('pattern references', () => {
    const sevenIron = parseClub('7-iron');
    const patterns: MissPattern[] = [
      { direction: 'PUSH', frequency: 3, confidence: 0.65, lastOccurrence: 1 },
      {
        direction: 'SLICE',
        frequency: 12,
        confidence: 0.82,
        lastOccurrence: 2,
        ...(sevenIron ? { club: sevenIron } : {}),
        pressureContext: { isUserTagged: true, isInferred: false },
      },
      { direction: 'HOOK', frequency: 6, confidence: 0.59, lastOccurrence: 3 },
      { direction: 'FAT', frequency: 7, confidence: 0.7, lastOccurrence: 4 },
    ];

    it('should keep the two most confident patterns above the floor', () => {
      expect(selectPatterns(patterns).map((pattern) => pattern.direction)).toEqual(['SLICE', 'FAT']);
    });

    it('should list patterns only when asked', () => {
      expect(formatter.format('Aim at the middle.', patterns).text).toBe('Aim at the middle.');

      const result = formatter.format('Aim at the middle.', patterns, { includePatterns: true });
      expect(result.text).toBe(
        [
          'Aim at the middle.',
          '',
          '**Based on your recent patterns:**',
          '- slice (frequently with 7-Iron under pressure, 82% confidence)',
          '- fat (occasionally, 70% confidence)',
        ].join('\n')
      );
      expect(result.patternsReferenced).toBe(2);
      expect(result.disclaimerAdded).toBe(false);
    });
  });
});
