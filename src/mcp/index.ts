/**
 * MCP (Model Context Protocol) client side: transports, protocol client,
 * server registry and config loading.
 */

import { loadServerConfigs } from './config';
import { ServerRegistry, parseServerConfigs, type ServerRegistryOptions } from './registry';
import { normalizeInputSchema, validateSchema } from './schema';

export * from './types';
export { ProtocolClient } from './client';
export type { ClientInfo, Invocation, NotificationListener, ProtocolClientOptions, RequestOptions } from './client';
export { ServerRegistry, parseServerConfigs } from './registry';
export type { CatalogListener, DuplicateTool, ServerRegistryOptions, StartOutcome } from './registry';
export { SseTransport, StdioTransport, createTransportFactory } from './transport';
export type { ChildHandle, SpawnFn, Transport, TransportFactory } from './transport';
export { loadMcprc, loadServerConfigs, loadServersFromEnv, parseServerMap } from './config';
export type { LoadServerConfigsOptions } from './config';
export { normalizeInputSchema, normalizeSchema, validateSchema } from './schema';
export type { ValidationResult } from './schema';
export { inferSideEffects, isToolAllowed, isVisibleInMode, loadExposureConfig, splitToolName } from './security';
export type { PermissionMode, ToolExposureConfig } from './security';

/** Build a registry from every config source in one call */
function createRegistryFromEnvironment(
  workspaceRoot: string,
  options: ServerRegistryOptions = {},
): ServerRegistry {
  const registry = new ServerRegistry(options);
  registry.initialize(loadServerConfigs({ workspaceRoot }));
  return registry;
}

export const mcp = {
  createRegistry: (options?: ServerRegistryOptions) => new ServerRegistry(options),
  createRegistryFromEnvironment,
  loadServerConfigs,
  parseServerConfigs,
  normalizeInputSchema,
  validateSchema,
};
