import { z } from 'zod';

export type MetadataScalar = string | number | boolean | null;

export type MetadataNode = MetadataScalar | MetadataNode[] | MetadataMapping;

export interface MetadataMapping {
  [key: string]: MetadataNode;
}

export const MetadataNodeSchema: z.ZodType<MetadataNode> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataNodeSchema),
    z.record(MetadataNodeSchema),
  ]),
);

export const MetadataMappingSchema: z.ZodType<MetadataMapping> = z.record(MetadataNodeSchema);

export function isMapping(node: MetadataNode | undefined): node is MetadataMapping {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * `declared` laid over `defaults`, recursively for nested mappings.
 */
export function mergeWithDefaults(defaults: MetadataMapping, declared: MetadataMapping): MetadataMapping {
  const merged: MetadataMapping = { ...defaults };
  for (const [key, value] of Object.entries(declared)) {
    const base = merged[key];
    merged[key] = isMapping(base) && isMapping(value) ? mergeWithDefaults(base, value) : value;
  }
  return merged;
}
