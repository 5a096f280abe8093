import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { validateKnowledgeInput, validateSearchFilters } from '../knowledge_input.js';

function captureValidationError(
  input: unknown,
  validate: (value: unknown) => unknown = validateKnowledgeInput
): ValidationError {
  try {
    validate(input);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected validation to fail');
}

describe('validateKnowledgeInput', () => {
  it('accepts each variant', () => {
    expect(validateKnowledgeInput({ kind: 'text', text: 'Graphs have edges.' })).toEqual({
      kind: 'text',
      text: 'Graphs have edges.',
    });
    expect(validateKnowledgeInput({ kind: 'record', record: { title: 'Edges' } }).kind).toBe('record');
    expect(
      validateKnowledgeInput({
        kind: 'batch',
        items: [{ kind: 'text', text: 'one' }, { kind: 'record', record: { n: 2 } }],
      }).kind
    ).toBe('batch');
  });

  it('rejects empty text', () => {
    const error = captureValidationError({ kind: 'text', text: '' });

    expect(error.field).toBe('input.text');
    expect(error.received).toBe('empty string');
  });

  it('rejects an empty batch', () => {
    const error = captureValidationError({ kind: 'batch', items: [] });

    expect(error.field).toBe('input.items');
    expect(error.received).toBe('array(0)');
  });

  it('points into nested batch items', () => {
    const error = captureValidationError({ kind: 'batch', items: [{ kind: 'text', text: 5 }] });

    expect(error.field).toBe('input.items.0.text');
    expect(error.received).toBe('number');
  });

  it('rejects null', () => {
    const error = captureValidationError(null);

    expect(error.field).toBe('input');
    expect(error.received).toBe('null');
  });
});

describe('validateSearchFilters', () => {
  it('accepts nested JSON data', () => {
    const filters = { source: 'docs', tags: ['a', 'b'], range: { min: 1, max: null }, draft: false };

    expect(validateSearchFilters(filters)).toEqual(filters);
  });

  it('rejects a Set', () => {
    const error = captureValidationError({ tags: new Set(['a']) }, validateSearchFilters);

    expect(error.field).toBe('filters.tags');
    expect(error.expected).toBe('a JSON value');
    expect(error.received).toBe('set');
  });

  it('rejects a Map', () => {
    const error = captureValidationError({ lookup: new Map([['a', 1]]) }, validateSearchFilters);

    expect(error.field).toBe('filters.lookup');
    expect(error.received).toBe('map');
  });

  it('rejects non-finite numbers', () => {
    expect(captureValidationError({ score: Number.POSITIVE_INFINITY }, validateSearchFilters).received).toBe(
      'Infinity'
    );
    expect(captureValidationError({ score: Number.NaN }, validateSearchFilters).received).toBe('NaN');
  });

  it('rejects a bigint', () => {
    const error = captureValidationError({ id: 10n }, validateSearchFilters);

    expect(error.field).toBe('filters.id');
    expect(error.received).toBe('bigint');
  });

  it('requires a mapping at the top', () => {
    const error = captureValidationError([], validateSearchFilters);

    expect(error.field).toBe('filters');
    expect(error.received).toBe('array(0)');
  });
});
