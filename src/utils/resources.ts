import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ResourceError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const resourcesDir = join(__dirname, '../../resources');

/**
 * Reads a JSON table from `resources/` and validates it. Tables are read
 * synchronously because they are loaded once, at module initialisation.
 */
export function loadJsonResource<T extends z.ZodTypeAny>(name: string, schema: T): z.output<T> {
  const filePath = join(resourcesDir, name);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ResourceError(name, 'could not be read as JSON', { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ResourceError(name, `invalid table\n${issues.join('\n')}`);
  }
  return result.data;
}

export async function loadPrompt(name: string): Promise<string> {
  const filePath = join(resourcesDir, 'prompts', name);
  return readFile(filePath, 'utf8');
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match);
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
