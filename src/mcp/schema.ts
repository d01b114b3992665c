/**
 * Tool schema normalization and validation.
 *
 * Discovered input schemas are normalized into the subset of JSON Schema
 * the model provider accepts, and invocation arguments are validated against
 * them before anything is sent over a transport.
 */

import { createLogger } from '../utils/logger';
import type { JsonSchema } from './types';

const logger = createLogger('mcp-schema');

const EMPTY_OBJECT_SCHEMA: JsonSchema = { type: 'object', properties: {} };

// =============================================================================
// NORMALIZATION
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Copy the keywords the validator and the model provider understand.
 * Everything else ($schema, $ref, definitions, format, ...) is dropped.
 */
function normalizeNode(raw: Record<string, unknown>): JsonSchema {
  const node: JsonSchema = {};

  if (typeof raw.type === 'string' || isStringArray(raw.type)) node.type = raw.type;
  if (typeof raw.description === 'string') node.description = raw.description;
  if ('default' in raw) node.default = raw.default;
  if (typeof raw.pattern === 'string') node.pattern = raw.pattern;

  // const -> single-value enum
  if ('const' in raw) {
    node.enum = [raw.const];
  } else if (Array.isArray(raw.enum)) {
    node.enum = [...raw.enum];
  }

  const minimum = numberOrUndefined(raw.minimum);
  if (minimum !== undefined) node.minimum = minimum;
  const maximum = numberOrUndefined(raw.maximum);
  if (maximum !== undefined) node.maximum = maximum;
  const minLength = numberOrUndefined(raw.minLength);
  if (minLength !== undefined) node.minLength = minLength;
  const maxLength = numberOrUndefined(raw.maxLength);
  if (maxLength !== undefined) node.maxLength = maxLength;

  const properties = isPlainObject(raw.properties) ? raw.properties : undefined;
  if (node.type === 'object' || (node.type === undefined && properties)) {
    node.type = 'object';
    const normalized: Record<string, JsonSchema> = {};
    for (const [name, prop] of Object.entries(properties ?? {})) {
      normalized[name] = isPlainObject(prop) ? normalizeNode(prop) : {};
    }
    node.properties = normalized;
    if (isStringArray(raw.required)) node.required = [...raw.required];
    if (typeof raw.additionalProperties === 'boolean') {
      node.additionalProperties = raw.additionalProperties;
    } else if (isPlainObject(raw.additionalProperties)) {
      node.additionalProperties = normalizeNode(raw.additionalProperties);
    }
  }

  if (isPlainObject(raw.items)) node.items = normalizeNode(raw.items);

  for (const key of ['oneOf', 'anyOf', 'allOf'] as const) {
    const list = raw[key];
    if (Array.isArray(list)) {
      node[key] = list.filter(isPlainObject).map((item) => normalizeNode(item));
    }
  }

  return node;
}

/** Normalize any schema node (output schemas, nested definitions) */
export function normalizeSchema(schema: Record<string, unknown>): JsonSchema {
  return normalizeNode(schema);
}

/**
 * Normalize a discovered input schema. Anything that is not an object schema
 * at the top level is replaced with an empty object schema.
 */
export function normalizeInputSchema(schema: unknown, toolName = 'unknown'): JsonSchema {
  if (!isPlainObject(schema)) {
    logger.warn({ tool: toolName }, 'Tool has no usable input schema, using empty object');
    return { ...EMPTY_OBJECT_SCHEMA, properties: {} };
  }
  const normalized = normalizeNode(schema);
  if (normalized.type !== 'object') {
    logger.warn({ tool: toolName, type: normalized.type }, 'Tool input schema is not an object, using empty object');
    return { ...EMPTY_OBJECT_SCHEMA, properties: {} };
  }
  return normalized;
}

// =============================================================================
// VALIDATION
// =============================================================================

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function matchesType(value: unknown, type: string): boolean {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    default:
      return typeOf(value) === type;
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const patternCache = new Map<string, RegExp | null>();

/** Compile a schema pattern; null when the server sent one this runtime cannot parse */
function compilePattern(pattern: string): RegExp | null {
  const cached = patternCache.get(pattern);
  if (cached !== undefined) return cached;
  let compiled: RegExp | null = null;
  for (const flags of ['u', '']) {
    try {
      compiled = new RegExp(pattern, flags);
      break;
    } catch (err) {
      logger.debug({ pattern, flags, error: String(err) }, 'Schema pattern did not compile');
    }
  }
  if (!compiled) {
    logger.warn({ pattern }, 'Ignoring invalid schema pattern');
  }
  patternCache.set(pattern, compiled);
  return compiled;
}

export function validateSchema(data: unknown, schema: JsonSchema): ValidationResult {
  const errors: string[] = [];

  function validate(value: unknown, sch: JsonSchema, path: string): void {
    if (sch.type) {
      const types = Array.isArray(sch.type) ? sch.type : [sch.type];
      if (!types.some((t) => matchesType(value, t))) {
        errors.push(`${path}: expected ${types.join(' | ')}, got ${typeOf(value)}`);
        return;
      }
    }

    if (sch.enum && !sch.enum.some((candidate) => candidate === value)) {
      errors.push(`${path}: value must be one of: ${sch.enum.map((v) => JSON.stringify(v)).join(', ')}`);
    }

    if (typeof value === 'string') {
      if (sch.minLength !== undefined && value.length < sch.minLength) {
        errors.push(`${path}: shorter than ${sch.minLength} characters`);
      }
      if (sch.maxLength !== undefined && value.length > sch.maxLength) {
        errors.push(`${path}: longer than ${sch.maxLength} characters`);
      }
      const regex = sch.pattern !== undefined ? compilePattern(sch.pattern) : null;
      if (regex && !regex.test(value)) {
        errors.push(`${path}: does not match pattern ${sch.pattern}`);
      }
    }

    if (typeof value === 'number') {
      if (sch.minimum !== undefined && value < sch.minimum) {
        errors.push(`${path}: must be >= ${sch.minimum}`);
      }
      if (sch.maximum !== undefined && value > sch.maximum) {
        errors.push(`${path}: must be <= ${sch.maximum}`);
      }
    }

    if (isPlainObject(value)) {
      if (sch.required) {
        for (const reqField of sch.required) {
          if (!(reqField in value)) {
            errors.push(`${path}.${reqField}: required field missing`);
          }
        }
      }

      if (sch.properties) {
        for (const [key, propSchema] of Object.entries(sch.properties)) {
          if (key in value) {
            validate(value[key], propSchema, `${path}.${key}`);
          }
        }
      }

      if (sch.additionalProperties === false) {
        const allowed = new Set(Object.keys(sch.properties ?? {}));
        for (const key of Object.keys(value)) {
          if (!allowed.has(key)) {
            errors.push(`${path}.${key}: additional property not allowed`);
          }
        }
      } else if (typeof sch.additionalProperties === 'object') {
        const extraSchema = sch.additionalProperties;
        const known = new Set(Object.keys(sch.properties ?? {}));
        for (const [key, extra] of Object.entries(value)) {
          if (!known.has(key)) {
            validate(extra, extraSchema, `${path}.${key}`);
          }
        }
      }
    }

    if (sch.items && Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        validate(value[i], sch.items, `${path}[${i}]`);
      }
    }

    if (sch.anyOf || sch.oneOf) {
      const branches = sch.anyOf ?? sch.oneOf ?? [];
      const passing = branches.filter((branch) => validateSchema(value, branch).valid).length;
      if (passing === 0) {
        errors.push(`${path}: does not match any allowed schema`);
      } else if (sch.oneOf && passing > 1) {
        errors.push(`${path}: matches more than one schema`);
      }
    }

    if (sch.allOf) {
      for (const branch of sch.allOf) {
        validate(value, branch, path);
      }
    }
  }

  validate(data, schema, '$');

  return { valid: errors.length === 0, errors };
}
