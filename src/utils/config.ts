/**
 * Configuration loading for toolrelay
 *
 * Sources, lowest to highest precedence: built-in defaults,
 * ~/.toolrelay/toolrelay.json, TOOLRELAY_* environment variables.
 * Secrets (ANTHROPIC_API_KEY) are only ever read from the environment.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';
import { createLogger } from './logger';

const logger = createLogger('config');

// =============================================================================
// PATHS
// =============================================================================

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TOOLRELAY_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.toolrelay');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.TOOLRELAY_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'toolrelay.json');
}

/** Load ~/.toolrelay/.env, then ./.env; neither overrides variables already set */
export function loadEnvFiles(env: NodeJS.ProcessEnv = process.env): void {
  dotenvConfig({ path: join(resolveStateDir(env), '.env') });
  dotenvConfig();
}

// =============================================================================
// SCHEMA
// =============================================================================

const permissionModeSchema = z.enum(['restricted', 'full']);

export const appConfigSchema = z.object({
  agent: z
    .object({
      model: z.string().min(1).default('claude-sonnet-4-5'),
      maxTokens: z.coerce.number().int().positive().default(8192),
      maxTurns: z.coerce.number().int().positive().default(20),
      maxWallClockMs: z.coerce.number().int().positive().default(10 * 60 * 1000),
      maxThinkingTokens: z.coerce.number().int().nonnegative().default(0),
      maxConcurrency: z.coerce.number().int().positive().default(5),
      toolDeadlineMs: z.coerce.number().int().positive().default(60_000),
      permissionMode: permissionModeSchema.default('restricted'),
      systemPrompt: z.string().optional(),
    })
    .default({}),
  workspace: z
    .object({
      root: z.string().default(process.cwd()),
      bashTimeoutMs: z.coerce.number().int().positive().default(120_000),
    })
    .default({}),
  mcp: z
    .object({
      handshakeTimeoutMs: z.coerce.number().int().positive().default(10_000),
      requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
      /** Extra server records, merged over .mcprc and MCP_SERVERS by name */
      servers: z.array(z.record(z.unknown())).default([]),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// =============================================================================
// MERGE HELPERS
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
export function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/** Deep merge plain objects; arrays and scalars from `source` replace. */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const pick = (entries: Array<[string, string | undefined]>): Record<string, unknown> =>
    Object.fromEntries(entries.filter(([, value]) => value !== undefined && value !== ''));

  return {
    agent: pick([
      ['model', env.TOOLRELAY_MODEL],
      ['maxTokens', env.TOOLRELAY_MAX_TOKENS],
      ['maxTurns', env.TOOLRELAY_MAX_TURNS],
      ['maxWallClockMs', env.TOOLRELAY_MAX_WALL_CLOCK_MS],
      ['maxThinkingTokens', env.TOOLRELAY_MAX_THINKING_TOKENS],
      ['maxConcurrency', env.TOOLRELAY_MAX_CONCURRENCY],
      ['toolDeadlineMs', env.TOOLRELAY_TOOL_DEADLINE_MS],
      ['permissionMode', env.TOOLRELAY_PERMISSION_MODE],
    ]),
    workspace: pick([
      ['root', env.TOOLRELAY_WORKSPACE],
      ['bashTimeoutMs', env.TOOLRELAY_BASH_TIMEOUT_MS],
    ]),
    mcp: pick([
      ['handshakeTimeoutMs', env.TOOLRELAY_MCP_HANDSHAKE_TIMEOUT_MS],
      ['requestTimeoutMs', env.TOOLRELAY_MCP_REQUEST_TIMEOUT_MS],
    ]),
  };
}

// =============================================================================
// LOADING
// =============================================================================

export interface LoadConfigOptions {
  /** Explicit config file; defaults to ~/.toolrelay/toolrelay.json */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to parse config file ${configPath}: ${errorMessage(err)}`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.path ?? resolveConfigPath(env);

  const fileConfig = readConfigFile(configPath);
  const substituted = substituteEnvVars(fileConfig, env);
  const merged = deepMerge(isPlainObject(substituted) ? substituted : {}, envOverrides(env));

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { details: { issues } });
  }

  logger.debug({ configPath, model: result.data.agent.model }, 'Configuration loaded');
  return result.data;
}
