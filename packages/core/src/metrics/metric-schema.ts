/**
 * Metric Schema
 *
 * The ordered list of creative-analysis metrics the chat is asked to fill in.
 * Order drives prose parsing and the CSV column order, so the schema is loaded
 * once from `data/metric-schema.json` and frozen.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

/**
 * Separator between a category prefix and the metric name in a label
 */
export const CATEGORY_SEPARATOR = ' // ';

export const METRIC_CATEGORIES = [
  'Identification',
  'Brand Presence',
  'Visuals',
  'Audio',
  'Talent',
  'Messaging',
  'Meaningful & Different',
] as const;

export type MetricCategory = (typeof METRIC_CATEGORIES)[number];

/**
 * One metric of the schema
 */
export interface MetricDefinition {
  /** Column label, e.g. "Visuals // Color Palette" */
  label: string;
  /** Label without its category prefix, e.g. "Color Palette" */
  name: string;
  category: MetricCategory;
  /** Answer guidance rendered into the prompt */
  hint: string;
}

/**
 * Mapping from every schema label to its extracted value ('' when unresolved)
 */
export type ExtractionResult = Record<string, string>;

const MetricSchemaFileSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.enum(METRIC_CATEGORIES),
        prefixed: z.boolean(),
        metrics: z
          .array(z.object({ name: z.string().min(1), hint: z.string() }))
          .min(1),
      })
    )
    .min(1),
});

/**
 * Parse a metric schema document into ordered definitions
 */
export function parseMetricSchema(document: unknown): MetricDefinition[] {
  const parsed = MetricSchemaFileSchema.parse(document);
  const definitions: MetricDefinition[] = [];

  for (const category of parsed.categories) {
    for (const metric of category.metrics) {
      definitions.push({
        label: category.prefixed
          ? `${category.name}${CATEGORY_SEPARATOR}${metric.name}`
          : metric.name,
        name: metric.name,
        category: category.name,
        hint: metric.hint,
      });
    }
  }

  const seen = new Set<string>();
  for (const definition of definitions) {
    const key = definition.label.toLowerCase();
    if (seen.has(key)) {
      throw new Error(`Duplicate metric label: ${definition.label}`);
    }
    seen.add(key);
  }

  return definitions;
}

function loadDefaultDefinitions(): readonly MetricDefinition[] {
  const file = new URL('../../data/metric-schema.json', import.meta.url);
  const definitions = parseMetricSchema(JSON.parse(readFileSync(file, 'utf-8')));
  return Object.freeze(definitions.map(definition => Object.freeze(definition)));
}

export const METRIC_DEFINITIONS: readonly MetricDefinition[] = loadDefaultDefinitions();

/**
 * Ordered metric labels (the CSV columns after the key column)
 */
export const METRIC_SCHEMA: readonly string[] = Object.freeze(
  METRIC_DEFINITIONS.map(definition => definition.label)
);

/**
 * Strip the category prefix from a label
 */
export function bareMetricName(label: string): string {
  const index = label.lastIndexOf('//');
  return index === -1 ? label.trim() : label.slice(index + 2).trim();
}

/**
 * Create a fully keyed result with every value empty
 */
export function createEmptyResult(schema: readonly string[] = METRIC_SCHEMA): ExtractionResult {
  const result: ExtractionResult = {};
  for (const label of schema) {
    result[label] = '';
  }
  return result;
}

/**
 * Share of schema fields holding a non-empty value (0..1)
 */
export function fillRatio(result: ExtractionResult, schema: readonly string[] = METRIC_SCHEMA): number {
  if (schema.length === 0) return 0;
  const filled = schema.filter(label => (result[label] ?? '').trim() !== '').length;
  return filled / schema.length;
}
