/**
 * Tool Registry - one flat namespace over native and discovered tools.
 *
 * Native tools are fixed at startup and shadow discovered tools of the
 * same name. Discovered tools arrive as whole catalog snapshots from the
 * ServerRegistry; each sync replaces the previous snapshot.
 */

import { createLogger } from '../utils/logger';
import { ConfigurationError, SchemaValidationError, UnknownToolError } from '../errors';
import { validateSchema } from '../mcp/schema';
import { OPEN_EXPOSURE, isToolAllowed, isVisibleInMode, type PermissionMode, type ToolExposureConfig } from '../mcp/security';
import type { DuplicateTool, ServerRegistry } from '../mcp/registry';
import type { JsonSchema, ToolCatalogEntry, ToolDescriptor } from '../mcp/types';

const logger = createLogger('tool-registry');

// =============================================================================
// TYPES
// =============================================================================

/** Per-call context handed to native tools */
export interface ToolContext {
  signal: AbortSignal;
  permissionMode: PermissionMode;
  deadlineMs: number;
}

export interface NativeTool {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  sideEffects: boolean;
  tags?: string[];
  execute(args: Record<string, unknown>, context: ToolContext): Promise<unknown>;
}

export type ResolvedTool =
  | { kind: 'native'; tool: NativeTool }
  | { kind: 'remote'; server: string; tool: ToolDescriptor };

export interface ShadowedTool {
  name: string;
  /** Server whose entry is hidden */
  server: string;
  /** 'native' or the server whose entry won */
  shadowedBy: string;
}

export interface ToolRegistryOptions {
  exposure?: ToolExposureConfig;
}

// =============================================================================
// REGISTRY
// =============================================================================

export class ToolRegistry {
  private readonly native = new Map<string, NativeTool>();
  private discovered: ReadonlyMap<string, ToolDescriptor> = new Map();
  private shadowedEntries: ShadowedTool[] = [];
  private readonly exposure: ToolExposureConfig;

  constructor(options: ToolRegistryOptions = {}) {
    this.exposure = options.exposure ?? OPEN_EXPOSURE;
  }

  registerNative(tool: NativeTool): void {
    if (this.native.has(tool.name)) {
      throw new ConfigurationError(`Native tool already registered: ${tool.name}`);
    }
    this.native.set(tool.name, tool);
  }

  registerAllNative(tools: readonly NativeTool[]): void {
    for (const tool of tools) {
      this.registerNative(tool);
    }
  }

  /**
   * Replace the discovered snapshot. Entries whose name a native tool
   * already holds are dropped and recorded; `serverDuplicates` carries
   * the server-vs-server collisions the ServerRegistry already resolved.
   */
  syncDiscovered(
    catalog: ReadonlyMap<string, ToolDescriptor>,
    serverDuplicates: readonly DuplicateTool[] = [],
  ): void {
    const next = new Map<string, ToolDescriptor>();
    const shadowed: ShadowedTool[] = serverDuplicates.map((d) => ({
      name: d.name,
      server: d.server,
      shadowedBy: d.keptFrom,
    }));

    for (const [name, descriptor] of catalog) {
      if (this.native.has(name)) {
        shadowed.push({ name, server: descriptor.server, shadowedBy: 'native' });
        logger.warn({ tool: name, server: descriptor.server }, 'Discovered tool shadowed by native tool');
        continue;
      }
      next.set(name, descriptor);
    }

    this.discovered = next;
    this.shadowedEntries = shadowed;
    logger.debug({ discovered: next.size, shadowed: shadowed.length }, 'Tool catalog synced');
  }

  /** Follow a ServerRegistry: sync now and after every catalog swap */
  attach(servers: ServerRegistry): () => void {
    this.syncDiscovered(servers.getTools(), servers.getDuplicates());
    return servers.onCatalogChange((catalog) => {
      this.syncDiscovered(catalog, servers.getDuplicates());
    });
  }

  /** Copy with some native tools left out; shares the current discovered snapshot */
  fork(options: { exclude?: readonly string[] } = {}): ToolRegistry {
    const excluded = new Set(options.exclude ?? []);
    const copy = new ToolRegistry({ exposure: this.exposure });
    for (const tool of this.native.values()) {
      if (!excluded.has(tool.name)) copy.registerNative(tool);
    }
    copy.discovered = this.discovered;
    copy.shadowedEntries = [...this.shadowedEntries];
    return copy;
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  has(name: string): boolean {
    return this.native.has(name) || this.discovered.has(name);
  }

  resolve(name: string): ResolvedTool {
    const nativeTool = this.native.get(name);
    if (nativeTool) return { kind: 'native', tool: nativeTool };

    const descriptor = this.discovered.get(name);
    if (descriptor) return { kind: 'remote', server: descriptor.server, tool: descriptor };

    throw new UnknownToolError(name);
  }

  schemaFor(name: string): JsonSchema {
    const resolved = this.resolve(name);
    return resolved.tool.inputSchema;
  }

  hasSideEffects(name: string): boolean {
    return this.resolve(name).tool.sideEffects;
  }

  /** Throws SchemaValidationError when args do not satisfy the input schema */
  validate(name: string, args: unknown): void {
    const result = validateSchema(args, this.schemaFor(name));
    if (!result.valid) {
      throw new SchemaValidationError(name, result.errors);
    }
  }

  /** Visible under the permission mode and the allow/block lists */
  isVisible(name: string, mode: PermissionMode): boolean {
    if (!this.has(name) || !isToolAllowed(name, this.exposure)) return false;
    return isVisibleInMode(this.hasSideEffects(name), mode);
  }

  shadowed(): readonly ShadowedTool[] {
    return this.shadowedEntries;
  }

  size(): number {
    return this.native.size + this.discovered.size;
  }

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  /**
   * Model-facing catalog: native tools in registration order, then
   * discovered tools sorted by name.
   */
  catalog(mode: PermissionMode): ToolCatalogEntry[] {
    const entries: ToolCatalogEntry[] = [];
    for (const tool of this.native.values()) {
      if (this.isVisible(tool.name, mode)) {
        entries.push({ name: tool.name, description: tool.description, inputSchema: tool.inputSchema });
      }
    }

    const remote = Array.from(this.discovered.values()).sort((a, b) => a.name.localeCompare(b.name));
    for (const tool of remote) {
      if (this.isVisible(tool.name, mode)) {
        entries.push({ name: tool.name, description: tool.description, inputSchema: tool.inputSchema });
      }
    }
    return entries;
  }

  /**
   * Rank visible tools against a free-text query: tag hits score 3, name
   * hits 2, owning-server hits 2, description hits 1.
   */
  search(query: string, mode: PermissionMode = 'full'): ToolCatalogEntry[] {
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    if (terms.length === 0) return [];

    const scored: Array<{ entry: ToolCatalogEntry; score: number }> = [];
    for (const entry of this.catalog(mode)) {
      const resolved = this.resolve(entry.name);
      const tags = resolved.kind === 'native' ? (resolved.tool.tags ?? []).map((t) => t.toLowerCase()) : [];
      const server = resolved.kind === 'remote' ? resolved.server.toLowerCase() : '';
      const nameLower = entry.name.toLowerCase();
      const descLower = entry.description.toLowerCase();

      let score = 0;
      for (const term of terms) {
        if (tags.includes(term)) score += 3;
        if (nameLower.includes(term)) score += 2;
        if (server && server.includes(term)) score += 2;
        if (descLower.includes(term)) score += 1;
      }
      if (score > 0) scored.push({ entry, score });
    }

    // Array.prototype.sort is stable, so ties keep catalog order
    return scored.sort((a, b) => b.score - a.score).map((s) => s.entry);
  }
}
