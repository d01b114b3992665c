/**
 * Option parsers for the CLI. Commander reports an InvalidArgumentError
 * with the option name and exits before any command runs.
 */

import { InvalidArgumentError } from 'commander';
import type { PermissionMode } from '../mcp/security';

export function parseMode(value: string): PermissionMode {
  if (value !== 'restricted' && value !== 'full') {
    throw new InvalidArgumentError(`expected restricted or full, got ${value}`);
  }
  return value;
}

function parseInteger(value: string, min: number, label: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`expected ${label}, got ${value}`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  return parseInteger(value, 1, 'a positive integer');
}

export function parseNonNegativeInt(value: string): number {
  return parseInteger(value, 0, 'a non-negative integer');
}
