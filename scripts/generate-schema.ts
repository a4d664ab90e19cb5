#!/usr/bin/env tsx

/**
 * Generate JSON Schemas from the Zod entity schemas
 *
 * Writes one JSON Schema per diff entity kind plus the diff request and
 * response envelopes, for consumers outside TypeScript.
 *
 * Usage:
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  ENTITY_SCHEMAS,
  DeletionSchema,
  DiffPayloadSchema,
  DiffResponseSchema,
  SuggestResponseSchema,
} from '../src/core/models/schemas';

const OUTPUT_DIR = path.join(__dirname, '../schema');

function writeSchema(name: string, schema: ZodTypeAny): string {
  const jsonSchema = zodToJsonSchema(schema, {
    name,
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });

  const file = path.join(OUTPUT_DIR, `${name}.schema.json`);
  fs.writeFileSync(
    file,
    JSON.stringify({ $schema: 'http://json-schema.org/draft-07/schema#', title: name, ...jsonSchema }, null, 2),
    'utf-8'
  );
  return file;
}

function generateSchemas(): void {
  fs.mkdirSync(OUTPUT_DIR, { recursive: true });

  const written: string[] = [];
  for (const [kind, schema] of Object.entries(ENTITY_SCHEMAS)) {
    written.push(writeSchema(kind, schema));
  }
  written.push(writeSchema('deletion', DeletionSchema));
  written.push(writeSchema('diffPayload', DiffPayloadSchema));
  written.push(writeSchema('diffResponse', DiffResponseSchema));
  written.push(writeSchema('suggestResponse', SuggestResponseSchema));

  console.log(`JSON Schemas generated in ${OUTPUT_DIR}:`);
  for (const file of written) {
    console.log(`  ${path.basename(file)}`);
  }
}

try {
  generateSchemas();
} catch (error: unknown) {
  console.error('Failed to generate JSON Schema:', error instanceof Error ? error.stack : error);
  process.exit(1);
}
