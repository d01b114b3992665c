import { describe, it, expect } from 'vitest';
import { ConfigurationError, SchemaValidationError, UnknownToolError } from '../errors';
import { ServerRegistry } from '../mcp/registry';
import { FakeServer, fakeTransportFactory } from '../mcp/testing/fake-server';
import type { ToolDescriptor } from '../mcp/types';
import { ToolRegistry, type NativeTool } from './tool-registry';

function nativeTool(name: string, overrides: Partial<NativeTool> = {}): NativeTool {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { type: 'object', properties: {} },
    sideEffects: false,
    execute: async () => 'ok',
    ...overrides,
  };
}

function remoteTool(name: string, server: string, overrides: Partial<ToolDescriptor> = {}): ToolDescriptor {
  return {
    name,
    server,
    description: `${name} from ${server}`,
    inputSchema: { type: 'object', properties: {} },
    sideEffects: false,
    ...overrides,
  };
}

function catalogOf(...tools: ToolDescriptor[]): ReadonlyMap<string, ToolDescriptor> {
  return new Map(tools.map((t) => [t.name, t]));
}

// =============================================================================
// Namespace
// =============================================================================

describe('ToolRegistry namespace', () => {
  it('native tools shadow discovered tools of the same name', () => {
    const registry = new ToolRegistry();
    registry.registerNative(nativeTool('read_file'));
    registry.syncDiscovered(catalogOf(remoteTool('read_file', 'fs'), remoteTool('grep', 'fs')));

    expect(registry.resolve('read_file').kind).toBe('native');
    expect(registry.resolve('grep')).toMatchObject({ kind: 'remote', server: 'fs' });
    expect(registry.shadowed()).toEqual([{ name: 'read_file', server: 'fs', shadowedBy: 'native' }]);
  });

  it('carries server-to-server duplicates into the shadow list', () => {
    const registry = new ToolRegistry();
    registry.syncDiscovered(catalogOf(remoteTool('search', 'first')), [
      { name: 'search', server: 'second', keptFrom: 'first' },
    ]);

    expect(registry.shadowed()).toEqual([{ name: 'search', server: 'second', shadowedBy: 'first' }]);
  });

  it('each sync replaces the previous snapshot', () => {
    const registry = new ToolRegistry();
    registry.syncDiscovered(catalogOf(remoteTool('old', 'fs')));
    registry.syncDiscovered(catalogOf(remoteTool('new', 'fs')));

    expect(registry.has('old')).toBe(false);
    expect(registry.has('new')).toBe(true);
  });

  it('rejects a second native tool with the same name', () => {
    const registry = new ToolRegistry();
    registry.registerNative(nativeTool('bash'));
    expect(() => registry.registerNative(nativeTool('bash'))).toThrow(ConfigurationError);
  });

  it('throws UnknownToolError for missing names', () => {
    expect(() => new ToolRegistry().resolve('nope')).toThrow(UnknownToolError);
  });
});

// =============================================================================
// Validation and visibility
// =============================================================================

describe('ToolRegistry validation and visibility', () => {
  it('validates arguments against the tool schema', () => {
    const registry = new ToolRegistry();
    registry.registerNative(nativeTool('read_file', {
      inputSchema: { type: 'object', properties: { path: { type: 'string' } }, required: ['path'] },
    }));

    expect(() => registry.validate('read_file', { path: 'a.txt' })).not.toThrow();
    expect(() => registry.validate('read_file', {})).toThrow(SchemaValidationError);
    expect(() => registry.validate('read_file', {})).toThrow('Invalid arguments for read_file: $.path: required field missing');
  });

  it('restricted catalog hides side-effecting tools', () => {
    const registry = new ToolRegistry();
    registry.registerNative(nativeTool('read_file'));
    registry.registerNative(nativeTool('write_file', { sideEffects: true }));
    registry.syncDiscovered(catalogOf(
      remoteTool('zeta', 'b'),
      remoteTool('deploy', 'b', { sideEffects: true }),
      remoteTool('alpha', 'a'),
    ));

    expect(registry.catalog('restricted').map((e) => e.name)).toEqual(['read_file', 'alpha', 'zeta']);
    expect(registry.catalog('full').map((e) => e.name)).toEqual(['read_file', 'write_file', 'alpha', 'deploy', 'zeta']);
    expect(registry.isVisible('deploy', 'restricted')).toBe(false);
  });

  it('applies the exposure blocklist in every mode', () => {
    const registry = new ToolRegistry({ exposure: { allowedTools: new Set(), blockedTools: new Set(['alpha']) } });
    registry.syncDiscovered(catalogOf(remoteTool('alpha', 'a'), remoteTool('beta', 'a')));

    expect(registry.catalog('full').map((e) => e.name)).toEqual(['beta']);
    expect(registry.isVisible('alpha', 'full')).toBe(false);
  });
});

// =============================================================================
// Search and forking
// =============================================================================

describe('ToolRegistry.search', () => {
  const registry = new ToolRegistry();
  registry.registerNative(nativeTool('read_file', { description: 'Read a file from the workspace', tags: ['fs', 'read'] }));
  registry.syncDiscovered(catalogOf(remoteTool('search_issues', 'github', { description: 'Search GitHub issues' })));

  it('matches owning server names', () => {
    expect(registry.search('github').map((e) => e.name)).toEqual(['search_issues']);
  });

  it('ranks tag and name hits', () => {
    expect(registry.search('read file').map((e) => e.name)).toEqual(['read_file']);
  });

  it('returns nothing for a blank query', () => {
    expect(registry.search('   ')).toEqual([]);
  });
});

describe('ToolRegistry.fork', () => {
  it('drops excluded native tools and keeps discovered ones', () => {
    const registry = new ToolRegistry();
    registry.registerAllNative([nativeTool('task'), nativeTool('read_file')]);
    registry.syncDiscovered(catalogOf(remoteTool('grep', 'fs')));

    const forked = registry.fork({ exclude: ['task'] });

    expect(forked.has('task')).toBe(false);
    expect(forked.has('read_file')).toBe(true);
    expect(forked.has('grep')).toBe(true);
    expect(registry.has('task')).toBe(true);
  });
});

describe('ToolRegistry.attach', () => {
  it('follows catalog swaps of a server registry', async () => {
    const server = new FakeServer('fs', { tools: [{ name: 'grep' }] });
    const servers = new ServerRegistry({ transportFactory: fakeTransportFactory([server]) });
    servers.initialize([{ name: 'fs', command: 'fs-server' }]);
    const registry = new ToolRegistry();

    const detach = registry.attach(servers);
    expect(registry.has('grep')).toBe(false);

    await servers.ensureStarted('fs');
    expect(registry.resolve('grep')).toMatchObject({ kind: 'remote', server: 'fs' });

    detach();
    await servers.shutdown();
    expect(registry.has('grep')).toBe(true);
  });
});
