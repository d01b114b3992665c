import { describe, it, expect } from 'vitest';
import { normalizeInputSchema, validateSchema } from './schema';
import type { JsonSchema } from './types';

// =============================================================================
// normalizeInputSchema
// =============================================================================

describe('normalizeInputSchema', () => {
  it('strips unsupported keys and turns const into a single-value enum', () => {
    const schema = normalizeInputSchema({
      $schema: 'http://json-schema.org/draft-07/schema#',
      type: 'object',
      properties: { mode: { const: 'fast' } },
    });
    expect(schema).toEqual({ type: 'object', properties: { mode: { enum: ['fast'] } } });
  });

  it('infers object type from a properties map', () => {
    const schema = normalizeInputSchema({ properties: { q: { type: 'string' } } });
    expect(schema.type).toBe('object');
    expect(schema.properties).toEqual({ q: { type: 'string' } });
  });

  it('replaces non-object schemas with an empty object schema', () => {
    expect(normalizeInputSchema(undefined)).toEqual({ type: 'object', properties: {} });
    expect(normalizeInputSchema({ type: 'string' })).toEqual({ type: 'object', properties: {} });
  });

  it('drops a malformed required field', () => {
    const schema = normalizeInputSchema({ type: 'object', properties: {}, required: 'path' });
    expect(schema.required).toBeUndefined();
  });
});

// =============================================================================
// validateSchema
// =============================================================================

describe('validateSchema', () => {
  const schema: JsonSchema = {
    type: 'object',
    properties: {
      path: { type: 'string', minLength: 1 },
      limit: { type: 'integer', minimum: 1, maximum: 100 },
      mode: { type: 'string', enum: ['a', 'b'] },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['path'],
    additionalProperties: false,
  };

  it('accepts valid arguments', () => {
    expect(validateSchema({ path: 'src', limit: 10, mode: 'a', tags: ['x'] }, schema)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it('reports missing required fields and wrong types', () => {
    const result = validateSchema({ limit: 'ten' }, schema);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['$.path: required field missing', '$.limit: expected integer, got string']);
  });

  it('checks bounds, enums and array items', () => {
    const result = validateSchema({ path: '', limit: 0, mode: 'c', tags: ['ok', 3] }, schema);
    expect(result.errors).toEqual([
      '$.path: shorter than 1 characters',
      '$.limit: must be >= 1',
      '$.mode: value must be one of: "a", "b"',
      '$.tags[1]: expected string, got number',
    ]);
  });

  it('checks string patterns', () => {
    const idSchema: JsonSchema = { type: 'object', properties: { id: { type: 'string', pattern: '^[0-9]+$' } } };
    expect(validateSchema({ id: '42' }, idSchema).valid).toBe(true);
    expect(validateSchema({ id: 'not-a-number' }, idSchema).errors).toEqual([
      '$.id: does not match pattern ^[0-9]+$',
    ]);
  });

  it('ignores a pattern that does not compile', () => {
    const broken: JsonSchema = { type: 'string', pattern: '(' };
    expect(validateSchema('anything', broken)).toEqual({ valid: true, errors: [] });
  });

  it('rejects additional properties when they are disallowed', () => {
    const result = validateSchema({ path: 'x', extra: true }, schema);
    expect(result.errors).toEqual(['$.extra: additional property not allowed']);
  });

  it('rejects a non-object at the top level', () => {
    const result = validateSchema('just a string', schema);
    expect(result.errors).toEqual(['$: expected object, got string']);
  });

  it('distinguishes anyOf from oneOf', () => {
    const anyOf: JsonSchema = { anyOf: [{ type: 'number' }, { type: 'integer' }] };
    const oneOf: JsonSchema = { oneOf: [{ type: 'number' }, { type: 'integer' }] };
    expect(validateSchema(3, anyOf).valid).toBe(true);
    expect(validateSchema(3, oneOf).errors).toEqual(['$: matches more than one schema']);
    expect(validateSchema('x', anyOf).errors).toEqual(['$: does not match any allowed schema']);
  });
});
