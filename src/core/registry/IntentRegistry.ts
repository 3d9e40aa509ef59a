import { z } from 'zod';
import { loadJsonResource } from '../../utils/resources.js';
import { INTENT_TYPES, MODULES, PREREQUISITES } from '../models/intent.js';
import type { IntentType, Prerequisite, RoutingTarget } from '../models/intent.js';
import { entityParameters } from '../models/entities.js';
import type { ExtractedEntities } from '../models/entities.js';
import type { IntentSuggestion } from '../models/classification.js';

const ENTITY_NAMES = [
  'club',
  'yardage',
  'lie',
  'wind',
  'fatigue',
  'pain',
  'score_context',
  'hole_number',
] as const;

const intentSchemaTable = z
  .array(
    z.object({
      intentType: z.enum(INTENT_TYPES),
      displayName: z.string().min(1),
      label: z.string().min(1),
      description: z.string().min(1),
      confirmPhrase: z.string().min(1),
      requiredEntities: z.array(z.enum(ENTITY_NAMES)),
      optionalEntities: z.array(z.enum(ENTITY_NAMES)),
      target: z.object({
        module: z.enum(MODULES),
        screen: z.string().min(1),
        parameters: z.record(z.string()),
      }),
      navigates: z.boolean(),
      prerequisites: z.array(z.enum(PREREQUISITES)),
      examplePhrases: z.array(z.string().min(1)).min(1),
    })
  )
  .superRefine((schemas, ctx) => {
    const seen = new Set(schemas.map((schema) => schema.intentType));
    for (const intentType of INTENT_TYPES) {
      if (!seen.has(intentType)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing intent ${intentType}` });
      }
    }
  });

export type IntentSchema = z.output<typeof intentSchemaTable>[number];

export class IntentRegistry {
  private readonly schemas: ReadonlyMap<IntentType, IntentSchema>;

  constructor(schemas: readonly IntentSchema[]) {
    this.schemas = new Map(schemas.map((schema) => [schema.intentType, schema]));
  }

  static load(): IntentRegistry {
    return new IntentRegistry(loadJsonResource('intents.json', intentSchemaTable));
  }

  getSchema(intentType: IntentType): IntentSchema {
    const schema = this.schemas.get(intentType);
    if (!schema) {
      throw new Error(`No schema registered for ${intentType}`);
    }
    return schema;
  }

  getAllSchemas(): IntentSchema[] {
    return [...this.schemas.values()];
  }

  requires(intentType: IntentType, prerequisite: Prerequisite): boolean {
    return this.getSchema(intentType).prerequisites.includes(prerequisite);
  }

  /** Default target for the intent with entity-derived parameters layered on top. */
  buildRoutingTarget(intentType: IntentType, entities: ExtractedEntities): RoutingTarget {
    const { target } = this.getSchema(intentType);
    return Object.freeze({
      module: target.module,
      screen: target.screen,
      parameters: Object.freeze({ ...target.parameters, ...entityParameters(entities) }),
    });
  }

  toSuggestion(intentType: IntentType): IntentSuggestion {
    const schema = this.getSchema(intentType);
    return { intentType, label: schema.label, description: schema.description };
  }
}
