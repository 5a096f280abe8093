import { z } from 'zod';
import type { JsonValue, KnowledgeInput, SearchFilters } from '../collaborators/types.js';
import { ValidationError } from '../core/errors.js';

const TextKnowledgeSchema = z.object({
  kind: z.literal('text'),
  text: z.string().min(1),
});

const RecordKnowledgeSchema = z.object({
  kind: z.literal('record'),
  record: z.record(z.unknown()),
});

const BatchKnowledgeSchema = z.object({
  kind: z.literal('batch'),
  items: z.array(z.discriminatedUnion('kind', [TextKnowledgeSchema, RecordKnowledgeSchema])).min(1),
});

export const KnowledgeInputSchema = z.discriminatedUnion('kind', [
  TextKnowledgeSchema,
  RecordKnowledgeSchema,
  BatchKnowledgeSchema,
]);

// Plain objects and arrays only: Set, Map, Date, bigint, NaN and Infinity
// have no faithful canonical form and would collide in cache keys.
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const SearchFiltersSchema = z.record(JsonValueSchema);

/**
 * Check the shape of `addKnowledge` input before it reaches the processor.
 *
 * @throws ValidationError naming the first offending field
 */
export function validateKnowledgeInput(input: unknown): KnowledgeInput {
  const result = KnowledgeInputSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  throw toValidationError('input', input, result.error, (issue) => issue.message);
}

/**
 * Check that query filters are JSON data, so the cache key built from them
 * identifies them exactly.
 *
 * @throws ValidationError naming the first offending filter
 */
export function validateSearchFilters(filters: unknown): SearchFilters {
  const result = SearchFiltersSchema.safeParse(filters);
  if (result.success) {
    return result.data;
  }
  throw toValidationError('filters', filters, result.error, () => 'a JSON value');
}

function toValidationError(
  root: string,
  value: unknown,
  error: z.ZodError,
  expected: (issue: z.ZodIssue) => string
): ValidationError {
  const issue = error.issues[0];
  const path = issue?.path ?? [];
  const field = path.length > 0 ? `${root}.${path.join('.')}` : root;
  return new ValidationError(field, issue ? expected(issue) : root, describe(valueAt(value, path)));
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let cursor = root;
  for (const segment of path) {
    if (typeof cursor !== 'object' || cursor === null) return undefined;
    cursor = Reflect.get(cursor, segment);
  }
  return cursor;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'string') return value.length === 0 ? 'empty string' : 'string';
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (typeof value === 'object') {
    // "[object Set]" → "set"; plain objects stay "object"
    return Object.prototype.toString.call(value).slice(8, -1).toLowerCase();
  }
  return typeof value;
}
