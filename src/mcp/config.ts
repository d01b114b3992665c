/**
 * MCP server config loading
 *
 * Sources, merged by server name with later sources overriding earlier ones:
 *   1. `.mcprc` in the workspace, else `~/.mcprc` (first file found wins)
 *   2. the MCP_SERVERS environment variable (JSON)
 *   3. explicit records passed by the caller
 *
 * Both file and env forms map server name to record; a top-level
 * `mcpServers` wrapper is also accepted.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../errors';

const logger = createLogger('mcp-config');

export interface LoadServerConfigsOptions {
  workspaceRoot?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence records, e.g. from toolrelay.json */
  extra?: readonly Record<string, unknown>[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn `{name: {...}}` (or `{mcpServers: {name: {...}}}`) into named
 * records. Values that are not objects are skipped with a warning.
 */
export function parseServerMap(raw: unknown, source: string): Record<string, unknown>[] {
  if (!isRecord(raw)) {
    logger.warn({ source }, 'MCP server config is not a JSON object');
    return [];
  }
  const servers = isRecord(raw.mcpServers) ? raw.mcpServers : raw;

  const records: Record<string, unknown>[] = [];
  for (const [name, value] of Object.entries(servers)) {
    if (!isRecord(value)) {
      logger.warn({ source, server: name }, 'Skipping MCP server entry that is not an object');
      continue;
    }
    records.push({ ...value, name });
  }
  return records;
}

/** First `.mcprc` found in workspace then home */
export function loadMcprc(workspaceRoot: string, homeDir = homedir()): Record<string, unknown>[] {
  const candidates = [join(workspaceRoot, '.mcprc'), join(homeDir, '.mcprc')];

  for (const path of candidates) {
    if (!existsSync(path)) continue;
    try {
      const records = parseServerMap(JSON.parse(readFileSync(path, 'utf-8')), path);
      logger.info({ path, servers: records.length }, 'Loaded MCP servers from .mcprc');
      return records;
    } catch (err) {
      logger.error({ path, error: errorMessage(err) }, 'Failed to parse .mcprc');
    }
  }
  return [];
}

export function loadServersFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown>[] {
  const raw = env.MCP_SERVERS?.trim();
  if (!raw) return [];
  try {
    const records = parseServerMap(JSON.parse(raw), 'MCP_SERVERS');
    logger.info({ servers: records.length }, 'Loaded MCP servers from MCP_SERVERS');
    return records;
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Failed to parse MCP_SERVERS');
    return [];
  }
}

/**
 * Collect server records from every source. Records are returned
 * unvalidated; ServerRegistry.initialize validates them and treats a
 * malformed record as fatal.
 */
export function loadServerConfigs(options: LoadServerConfigsOptions = {}): Record<string, unknown>[] {
  const sources = [
    loadMcprc(options.workspaceRoot ?? process.cwd(), options.homeDir),
    loadServersFromEnv(options.env),
    options.extra ? [...options.extra] : [],
  ];

  const byName = new Map<string, Record<string, unknown>>();
  for (const records of sources) {
    for (const record of records) {
      const name = typeof record.name === 'string' ? record.name : '';
      const existing = byName.get(name);
      if (existing) {
        logger.debug({ server: name }, 'MCP server config overridden by later source');
      }
      byName.set(name, record);
    }
  }
  return Array.from(byName.values());
}
