/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { SchemaObject } from 'ajv';

const SCHEMAS_DIR = fileURLToPath(new URL('../../schemas', import.meta.url));

export type SchemaName = 'analysis.v1' | 'insight_response.v1' | 'headline_sentiment.v1';

const schemaCache = new Map<SchemaName, SchemaObject>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadSchema(schemaName: SchemaName): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(SCHEMAS_DIR, `${schemaName}.schema.json`);
  const schema: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema ${schemaPath} is not a JSON object`);
  }

  schemaCache.set(schemaName, schema);
  return schema;
}
