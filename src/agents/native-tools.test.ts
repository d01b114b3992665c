import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RelayError } from '../errors';
import type { TaskOutcome } from './loop';
import { createNativeTools, pathGlobToRegExp, resolveInWorkspace, type SubAgentRequest } from './native-tools';
import type { NativeTool } from './tool-registry';

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'toolrelay-native-'));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function tool(name: string, tools: NativeTool[] = createNativeTools({ workspaceRoot: root })): NativeTool {
  const found = tools.find((t) => t.name === name);
  if (!found) throw new Error(`no native tool ${name}`);
  return found;
}

function run(name: string, args: Record<string, unknown>): Promise<unknown> {
  return tool(name).execute(args, { signal: new AbortController().signal, permissionMode: 'full', deadlineMs: 1000 });
}

// =============================================================================
// Workspace confinement
// =============================================================================

describe('resolveInWorkspace', () => {
  it('resolves relative paths under the root', () => {
    expect(resolveInWorkspace('/ws', 'a/b.txt')).toBe('/ws/a/b.txt');
    expect(resolveInWorkspace('/ws', '/ws/c.txt')).toBe('/ws/c.txt');
  });

  it('rejects paths that escape the root', () => {
    expect(() => resolveInWorkspace('/ws', '../etc/passwd')).toThrow(RelayError);
    expect(() => resolveInWorkspace('/ws', '/etc/passwd')).toThrow('Path /etc/passwd is outside the workspace root /ws');
  });

  it('applies to every file tool', async () => {
    await expect(run('write_file', { path: '../evil.txt', content: 'x' })).rejects.toMatchObject({ kind: 'PermissionDenied' });
    await expect(run('read_file', { path: '../../secret' })).rejects.toMatchObject({ kind: 'PermissionDenied' });
  });
});

// =============================================================================
// Read-only tools
// =============================================================================

describe('read-only tools', () => {
  it('read_file numbers lines and honours offset and limit', async () => {
    writeFileSync(join(root, 'notes.txt'), 'one\ntwo\nthree');

    expect(await run('read_file', { path: 'notes.txt' })).toBe('     1\tone\n     2\ttwo\n     3\tthree');
    expect(await run('read_file', { path: 'notes.txt', offset: 2, limit: 1 })).toBe('     2\ttwo');
    expect(await run('read_file', { path: 'notes.txt', offset: 10 })).toBe('(file has 3 lines; nothing at offset 10)');
  });

  it('list_directory sorts entries and marks directories', async () => {
    writeFileSync(join(root, 'b.txt'), '');
    writeFileSync(join(root, 'a.txt'), '');
    mkdirSync(join(root, 'src'));

    expect(await run('list_directory', {})).toBe('a.txt\nb.txt\nsrc/');
    expect(await run('list_directory', { path: 'src' })).toBe('(empty directory)');
  });

  it('search_files filters by file name and skips dependency folders', async () => {
    mkdirSync(join(root, 'src'));
    mkdirSync(join(root, 'node_modules'));
    writeFileSync(join(root, 'src', 'a.ts'), 'const x = 1;\n  // TODO fix');
    writeFileSync(join(root, 'src', 'b.md'), 'TODO in docs');
    writeFileSync(join(root, 'node_modules', 'c.ts'), 'TODO vendored');

    expect(await run('search_files', { pattern: 'TODO', include: '*.ts' })).toBe('src/a.ts:2: // TODO fix');
    expect(await run('search_files', { pattern: 'nothing-here' })).toBe('No matches found');
    await expect(run('search_files', { pattern: '(' })).rejects.toMatchObject({ kind: 'SchemaValidation' });
  });

  it('glob matches relative paths and lists the newest first', async () => {
    mkdirSync(join(root, 'src', 'deep'), { recursive: true });
    mkdirSync(join(root, 'node_modules'));
    writeFileSync(join(root, 'top.ts'), '');
    writeFileSync(join(root, 'src', 'a.ts'), '');
    writeFileSync(join(root, 'src', 'deep', 'b.ts'), '');
    writeFileSync(join(root, 'readme.md'), '');
    writeFileSync(join(root, 'node_modules', 'x.ts'), '');
    utimesSync(join(root, 'top.ts'), 1000, 1000);
    utimesSync(join(root, 'src', 'a.ts'), 2000, 2000);
    utimesSync(join(root, 'src', 'deep', 'b.ts'), 3000, 3000);

    expect(await run('glob', { pattern: '**/*.ts' })).toBe("Found 3 file(s) matching '**/*.ts':\nsrc/deep/b.ts\nsrc/a.ts\ntop.ts");
    expect(await run('glob', { pattern: '*.ts' })).toBe("Found 1 file(s) matching '*.ts':\ntop.ts");
    expect(await run('glob', { pattern: '*.ts', path: 'src' })).toBe("Found 1 file(s) matching '*.ts':\na.ts");
    expect(await run('glob', { pattern: '*.json' })).toBe("No files found matching '*.json'");
    await expect(run('glob', { pattern: '*', path: '..' })).rejects.toMatchObject({ kind: 'PermissionDenied' });
  });
});

describe('pathGlobToRegExp', () => {
  it('keeps single stars within one segment', () => {
    expect(pathGlobToRegExp('src/*.ts').test('src/a.ts')).toBe(true);
    expect(pathGlobToRegExp('src/*.ts').test('src/x/a.ts')).toBe(false);
    expect(pathGlobToRegExp('file?.txt').test('file1.txt')).toBe(true);
    expect(pathGlobToRegExp('file?.txt').test('file10.txt')).toBe(false);
  });

  it('lets a double star match zero or more directories', () => {
    const re = pathGlobToRegExp('src/**/*.ts');
    expect(re.test('src/a.ts')).toBe(true);
    expect(re.test('src/x/y/a.ts')).toBe(true);
    expect(re.test('lib/a.ts')).toBe(false);
  });

  it('treats regex characters literally', () => {
    expect(pathGlobToRegExp('a+b.(1).txt').test('a+b.(1).txt')).toBe(true);
    expect(pathGlobToRegExp('a.txt').test('abtxt')).toBe(false);
  });
});

// =============================================================================
// Mutating tools
// =============================================================================

describe('mutating tools', () => {
  it('write_file creates parent directories', async () => {
    expect(await run('write_file', { path: 'out/new.txt', content: 'hi' })).toBe('Wrote 2 bytes to out/new.txt');
    expect(readFileSync(join(root, 'out', 'new.txt'), 'utf-8')).toBe('hi');
  });

  it('edit_file refuses ambiguous replacements unless replace_all is set', async () => {
    writeFileSync(join(root, 'f.txt'), 'a b a');

    await expect(run('edit_file', { path: 'f.txt', old_string: 'a', new_string: 'c' })).rejects.toThrow(
      'Found 2 occurrences in f.txt (lines 1); set replace_all or add context',
    );
    expect(await run('edit_file', { path: 'f.txt', old_string: 'a', new_string: 'c', replace_all: true })).toBe(
      'Replaced 2 occurrence(s) in f.txt',
    );
    expect(readFileSync(join(root, 'f.txt'), 'utf-8')).toBe('c b c');
  });

  it('edit_file reports a missing string', async () => {
    writeFileSync(join(root, 'f.txt'), 'hello');

    await expect(run('edit_file', { path: 'f.txt', old_string: 'bye', new_string: 'hi' })).rejects.toThrow(
      'The string to replace was not found in f.txt',
    );
  });

  it('multi_edit applies edits in order, each on the previous result', async () => {
    writeFileSync(join(root, 'f.txt'), 'let a = 1;\nlet b = a;\n');

    const result = await run('multi_edit', {
      path: 'f.txt',
      edits: [
        { old_string: 'let a', new_string: 'const a' },
        { old_string: 'a;', new_string: 'a + 1;' },
      ],
    });

    expect(result).toBe('Applied 2 edit(s) to f.txt (2 replacement(s))');
    expect(readFileSync(join(root, 'f.txt'), 'utf-8')).toBe('const a = 1;\nlet b = a + 1;\n');
  });

  it('multi_edit leaves the file untouched when any edit fails', async () => {
    writeFileSync(join(root, 'f.txt'), 'one two');

    await expect(run('multi_edit', {
      path: 'f.txt',
      edits: [
        { old_string: 'one', new_string: '1' },
        { old_string: 'three', new_string: '3' },
      ],
    })).rejects.toThrow('Edit 2: The string to replace was not found in f.txt; no edits were applied');
    expect(readFileSync(join(root, 'f.txt'), 'utf-8')).toBe('one two');
  });

  it('multi_edit creates a file from an empty first old_string', async () => {
    const result = await run('multi_edit', {
      path: 'new/x.txt',
      edits: [
        { old_string: '', new_string: 'hello world' },
        { old_string: 'world', new_string: 'there' },
      ],
    });

    expect(result).toBe('Applied 2 edit(s) to new/x.txt, creating the file (1 replacement(s))');
    expect(readFileSync(join(root, 'new', 'x.txt'), 'utf-8')).toBe('hello there');
  });

  it('multi_edit will not overwrite an existing file from an empty old_string', async () => {
    writeFileSync(join(root, 'f.txt'), 'keep');

    await expect(run('multi_edit', { path: 'f.txt', edits: [{ old_string: '', new_string: 'x' }] })).rejects.toThrow(
      'f.txt already exists; an empty old_string only creates new files',
    );
    await expect(run('multi_edit', { path: 'missing.txt', edits: [{ old_string: 'a', new_string: 'b' }] })).rejects.toThrow(
      'missing.txt does not exist',
    );
    expect(existsSync(join(root, 'missing.txt'))).toBe(false);
    expect(readFileSync(join(root, 'f.txt'), 'utf-8')).toBe('keep');
  });

  it('marks only mutating tools as side-effecting', () => {
    const flags = createNativeTools({ workspaceRoot: root }).map((t) => [t.name, t.sideEffects]);
    expect(flags).toEqual([
      ['read_file', false],
      ['list_directory', false],
      ['search_files', false],
      ['glob', false],
      ['write_file', true],
      ['edit_file', true],
      ['multi_edit', true],
      ['bash', true],
    ]);
  });
});

// =============================================================================
// Sub-agent tool
// =============================================================================

describe('task tool', () => {
  it('forwards the request and summarizes the sub-agent outcome', async () => {
    const requests: SubAgentRequest[] = [];
    const outcome: TaskOutcome = {
      reason: 'completed',
      finalText: 'found 3',
      turns: [],
      ledger: { inputTokens: 10, outputTokens: 5, cacheReadTokens: 0, cacheWriteTokens: 0, modelCalls: 1, usd: 0.5, wallClockMs: 7 },
      toolUseCount: 2,
      durationMs: 7,
    };
    const tools = createNativeTools({
      workspaceRoot: root,
      runSubAgent: async (request) => {
        requests.push(request);
        return outcome;
      },
    });
    const signal = new AbortController().signal;

    const payload = await tool('task', tools).execute(
      { description: 'find things', prompt: 'look around' },
      { signal, permissionMode: 'restricted', deadlineMs: 1000 },
    );

    expect(requests).toEqual([{ description: 'find things', prompt: 'look around', permissionMode: 'restricted', signal }]);
    expect(payload).toEqual({
      status: 'completed',
      result: 'found 3',
      tool_use_count: 2,
      duration_ms: 7,
      tokens_used: 15,
      cost_usd: 0.5,
    });
  });
});
