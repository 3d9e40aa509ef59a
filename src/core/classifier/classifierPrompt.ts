import type { IntentRegistry } from '../registry/IntentRegistry.js';

const ENTITY_GUIDE = [
  '- club: golf club (e.g. "7-iron", "driver", "PW")',
  '- yardage: distance in yards (positive integer)',
  '- lie: ball position (tee, fairway, rough, bunker, fringe, green, hazard)',
  '- wind: wind description (e.g. "10mph left-to-right")',
  '- fatigue: fatigue level on a 1-10 scale',
  '- pain: pain description or body location',
  '- score_context: scoring situation (e.g. "1 under", "leading by 2")',
  '- hole_number: hole being played (1-18)',
];

const OUTPUT_CONTRACT = `Reply with a single JSON object and nothing else:
{
  "intent_type": "<one of the intent names above>",
  "confidence": <number between 0 and 1>,
  "entities": { "<entity name>": <value or null> },
  "user_goal": "<short description of what the player wants>"
}
Lower the confidence when the input could fit several intents.`;

/** Persona prompt followed by the intent catalogue and the reply contract. */
export function buildClassifierSystemPrompt(personaPrompt: string, registry: IntentRegistry): string {
  const catalogue = registry.getAllSchemas().map((schema) => {
    const lines = [`## ${schema.intentType}`, `Description: ${schema.description}`];
    if (schema.requiredEntities.length > 0) {
      lines.push(`Required entities: ${schema.requiredEntities.join(', ')}`);
    }
    if (schema.optionalEntities.length > 0) {
      lines.push(`Optional entities: ${schema.optionalEntities.join(', ')}`);
    }
    lines.push('Examples:', ...schema.examplePhrases.map((phrase) => `  - "${phrase}"`));
    return lines.join('\n');
  });

  return [
    personaPrompt.trim(),
    '# Task\nClassify the player\'s input into exactly one intent and extract any entities.',
    `# Intents\n\n${catalogue.join('\n\n')}`,
    `# Entities\n${ENTITY_GUIDE.join('\n')}`,
    `# Output\n${OUTPUT_CONTRACT}`,
  ].join('\n\n');
}
