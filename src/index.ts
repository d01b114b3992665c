/**
 * toolrelay - MCP tool-server client and bounded agent execution loop
 */

export * from './errors';
export * from './mcp';
export * from './agents';
export { loadConfig, loadEnvFiles, resolveConfigPath, resolveStateDir } from './utils/config';
export type { AppConfig } from './utils/config';
export { createLogger, logger } from './utils/logger';
export { withRetry, isTransientError, RETRY_POLICIES } from './infra/retry';
export type { RetryOptions } from './infra/retry';
