/**
 * @fileoverview Default metadata schema
 *
 * Every recognized problem.yaml key with its default value. Mandatory keys
 * have no default and are stored as `null`. The bundled schema lives in
 * config/problem_defaults.json; another file can be supplied instead.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { MetadataMappingSchema, type MetadataMapping } from './metadata_node.js';

export const DefaultSchemaFileSchema = z.object({
  mandatory: z.array(z.string().min(1)),
  optional: MetadataMappingSchema,
}).strict();

export type DefaultSchemaFile = z.infer<typeof DefaultSchemaFileSchema>;

export type DefaultSchemaAvailability =
  | { available: true; schema: MetadataMapping; source: string }
  | { available: false; reason: string };

export const BUNDLED_DEFAULTS_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'problem_defaults.json',
);

export function buildDefaultSchema(file: DefaultSchemaFile): MetadataMapping {
  const schema: MetadataMapping = { ...file.optional };
  for (const key of file.mandatory) {
    schema[key] = null;
  }
  return schema;
}

export async function loadDefaultSchema(
  filePath: string = BUNDLED_DEFAULTS_PATH,
): Promise<DefaultSchemaAvailability> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    return {
      available: false,
      reason: `cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  try {
    const parsed = DefaultSchemaFileSchema.safeParse(parseYaml(content));
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first && first.path.length > 0 ? ` at ${first.path.join('/')}` : '';
      return {
        available: false,
        reason: `invalid default schema in ${filePath}${where}: ${first?.message ?? 'unknown error'}`,
      };
    }
    return { available: true, schema: buildDefaultSchema(parsed.data), source: filePath };
  } catch (error) {
    return {
      available: false,
      reason: `cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
