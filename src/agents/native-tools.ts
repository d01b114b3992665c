/**
 * Native tools - run in-process, always take precedence over discovered
 * tools of the same name. Every path is resolved inside the workspace
 * root; anything that escapes it is rejected.
 */

import { spawn } from 'child_process';
import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import { createLogger } from '../utils/logger';
import { CancelledError, RelayError, errorMessage } from '../errors';
import type { PermissionMode } from '../mcp/security';
import type { NativeTool } from './tool-registry';
import type { TaskOutcome } from './loop';

const logger = createLogger('native-tools');

const DEFAULT_READ_LIMIT = 2000;
const MAX_SEARCH_RESULTS = 100;
const MAX_OUTPUT_CHARS = 30_000;
const SKIP_DIRS = new Set(['node_modules', '.git', 'dist']);

export const TASK_TOOL_NAME = 'task';

// =============================================================================
// TYPES
// =============================================================================

export interface SubAgentRequest {
  description: string;
  prompt: string;
  permissionMode: PermissionMode;
  signal: AbortSignal;
}

export type SubAgentRunner = (request: SubAgentRequest) => Promise<TaskOutcome>;

export interface NativeToolOptions {
  workspaceRoot: string;
  bashTimeoutMs?: number;
  /** Enables the `task` tool */
  runSubAgent?: SubAgentRunner;
}

// =============================================================================
// HELPERS
// =============================================================================

export function resolveInWorkspace(root: string, target: string): string {
  const base = resolve(root);
  const resolved = resolve(base, target);
  const rel = relative(base, resolved);
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new RelayError('PermissionDenied', `Path ${target} is outside the workspace root ${base}`);
  }
  return resolved;
}

function str(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value : '';
}

function optionalNumber(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' ? value : undefined;
}

function truncateMiddle(content: string, max = MAX_OUTPUT_CHARS): string {
  if (content.length <= max) return content;
  const half = Math.floor(max / 2);
  const dropped = content.split('\n').length - content.slice(0, half).split('\n').length - content.slice(-half).split('\n').length;
  return `${content.slice(0, half)}\n\n... [${Math.max(dropped, 0)} lines truncated] ...\n\n${content.slice(-half)}`;
}

function numberLines(lines: readonly string[], firstLine: number): string {
  return lines.map((line, i) => `${String(firstLine + i).padStart(6)}\t${line}`).join('\n');
}

/** `*.ts` style glob on file names; only `*` and `?` are special */
function globToRegExp(glob: string): RegExp {
  const escaped = glob.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

/**
 * Path glob matched against `/`-separated relative paths. `*` and `?` stay
 * within one segment; `**` spans any number of them.
 */
export function pathGlobToRegExp(glob: string): RegExp {
  let out = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === '*' && glob[i + 1] === '*') {
      if (glob[i + 2] === '/') {
        out += '(?:.*/)?';
        i += 2;
      } else {
        out += '.*';
        i += 1;
      }
    } else if (ch === '*') {
      out += '[^/]*';
    } else if (ch === '?') {
      out += '[^/]';
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${out}$`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

interface EditSpec {
  oldString: string;
  newString: string;
  replaceAll: boolean;
}

/** Apply one exact-string replacement in memory */
function applyEdit(content: string, edit: EditSpec, displayPath: string): { content: string; replaced: number } {
  const { oldString, newString, replaceAll } = edit;
  if (oldString === '') {
    throw new RelayError('ToolExecution', 'old_string cannot be empty');
  }
  if (oldString === newString) {
    throw new RelayError('ToolExecution', 'old_string and new_string cannot be the same');
  }
  const occurrences = content.split(oldString).length - 1;
  if (occurrences === 0) {
    throw new RelayError('ToolExecution', `The string to replace was not found in ${displayPath}`);
  }
  if (occurrences > 1 && !replaceAll) {
    const lineNumbers = content
      .split('\n')
      .flatMap((line, i) => (line.includes(oldString) ? [i + 1] : []));
    throw new RelayError(
      'ToolExecution',
      `Found ${occurrences} occurrences in ${displayPath} (lines ${lineNumbers.join(', ')}); set replace_all or add context`,
    );
  }
  return replaceAll
    ? { content: content.split(oldString).join(newString), replaced: occurrences }
    : { content: content.replace(oldString, () => newString), replaced: 1 };
}

async function* walkFiles(dir: string, signal: AbortSignal): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (signal.aborted) return;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIP_DIRS.has(entry.name)) yield* walkFiles(full, signal);
    } else if (entry.isFile()) {
      yield full;
    }
  }
}

// =============================================================================
// TOOLS
// =============================================================================

function readFileTool(root: string): NativeTool {
  return {
    name: 'read_file',
    description: 'Read a text file from the workspace. Output lines are prefixed with their line number.',
    sideEffects: false,
    tags: ['file', 'read', 'view'],
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'File path, relative to the workspace root' },
        offset: { type: 'integer', minimum: 1, description: 'First line to read (1-based)' },
        limit: { type: 'integer', minimum: 1, description: 'Number of lines to read' },
      },
      required: ['path'],
      additionalProperties: false,
    },
    async execute(args) {
      const path = resolveInWorkspace(root, str(args, 'path'));
      const lines = (await readFile(path, 'utf-8')).split('\n');
      const offset = optionalNumber(args, 'offset') ?? 1;
      const limit = optionalNumber(args, 'limit') ?? DEFAULT_READ_LIMIT;
      const slice = lines.slice(offset - 1, offset - 1 + limit);
      if (slice.length === 0) {
        return `(file has ${lines.length} lines; nothing at offset ${offset})`;
      }
      return numberLines(slice, offset);
    },
  };
}

function listDirectoryTool(root: string): NativeTool {
  return {
    name: 'list_directory',
    description: 'List the entries of a workspace directory. Directories end with "/".',
    sideEffects: false,
    tags: ['file', 'directory', 'ls'],
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Directory path, relative to the workspace root (default ".")' },
      },
      additionalProperties: false,
    },
    async execute(args) {
      const dir = resolveInWorkspace(root, str(args, 'path') || '.');
      const entries = await readdir(dir, { withFileTypes: true });
      const names = entries
        .map((e) => (e.isDirectory() ? `${e.name}/` : e.name))
        .sort((a, b) => a.localeCompare(b));
      return names.length > 0 ? names.join('\n') : '(empty directory)';
    },
  };
}

function searchFilesTool(root: string): NativeTool {
  return {
    name: 'search_files',
    description: 'Search file contents under a workspace directory with a regular expression. Returns path:line: text matches.',
    sideEffects: false,
    tags: ['search', 'grep', 'find'],
    inputSchema: {
      type: 'object',
      properties: {
        pattern: { type: 'string', minLength: 1, description: 'Regular expression' },
        path: { type: 'string', description: 'Directory to search (default ".")' },
        include: { type: 'string', description: 'File name glob, e.g. "*.ts"' },
      },
      required: ['pattern'],
      additionalProperties: false,
    },
    async execute(args, context) {
      const base = resolve(root);
      const dir = resolveInWorkspace(root, str(args, 'path') || '.');
      let regex: RegExp;
      try {
        regex = new RegExp(str(args, 'pattern'));
      } catch (err) {
        throw new RelayError('SchemaValidation', `Invalid regular expression: ${str(args, 'pattern')}`, { cause: err });
      }
      const include = str(args, 'include') ? globToRegExp(str(args, 'include')) : null;

      const matches: string[] = [];
      for await (const file of walkFiles(dir, context.signal)) {
        if (include && !include.test(basename(file))) continue;
        let content: string;
        try {
          content = await readFile(file, 'utf-8');
        } catch (err) {
          logger.debug({ file, error: String(err) }, 'Skipping unreadable file');
          continue;
        }
        const lines = content.split('\n');
        for (let i = 0; i < lines.length; i++) {
          if (regex.test(lines[i])) {
            matches.push(`${relative(base, file)}:${i + 1}: ${lines[i].trim()}`);
            if (matches.length >= MAX_SEARCH_RESULTS) {
              return `${matches.join('\n')}\n(results truncated at ${MAX_SEARCH_RESULTS})`;
            }
          }
        }
      }
      return matches.length > 0 ? matches.join('\n') : 'No matches found';
    },
  };
}

function globTool(root: string): NativeTool {
  return {
    name: 'glob',
    description:
      'Find workspace files whose path matches a glob such as "**/*.ts" or "src/*.json". ' +
      'Paths are relative to the search directory; newest files first.',
    sideEffects: false,
    tags: ['file', 'find', 'glob', 'pattern'],
    inputSchema: {
      type: 'object',
      properties: {
        pattern: { type: 'string', minLength: 1, description: 'Glob pattern; "**" matches across directories' },
        path: { type: 'string', description: 'Directory to search (default ".")' },
      },
      required: ['pattern'],
      additionalProperties: false,
    },
    async execute(args, context) {
      const pattern = str(args, 'pattern');
      const dir = resolveInWorkspace(root, str(args, 'path') || '.');
      const matcher = pathGlobToRegExp(pattern);

      const found: { path: string; mtimeMs: number }[] = [];
      for await (const file of walkFiles(dir, context.signal)) {
        const rel = relative(dir, file).split(sep).join('/');
        if (matcher.test(rel)) {
          found.push({ path: rel, mtimeMs: (await stat(file)).mtimeMs });
        }
      }
      if (found.length === 0) {
        return `No files found matching '${pattern}'`;
      }

      found.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
      const lines = found.slice(0, MAX_SEARCH_RESULTS).map((f) => f.path);
      if (found.length > MAX_SEARCH_RESULTS) {
        lines.push(`(${found.length - MAX_SEARCH_RESULTS} more not shown)`);
      }
      return `Found ${found.length} file(s) matching '${pattern}':\n${lines.join('\n')}`;
    },
  };
}

function writeFileTool(root: string): NativeTool {
  return {
    name: 'write_file',
    description: 'Create or overwrite a workspace file with the given content.',
    sideEffects: true,
    tags: ['file', 'write', 'create'],
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'File path, relative to the workspace root' },
        content: { type: 'string' },
      },
      required: ['path', 'content'],
      additionalProperties: false,
    },
    async execute(args) {
      const path = resolveInWorkspace(root, str(args, 'path'));
      const content = str(args, 'content');
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
      return `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${relative(resolve(root), path)}`;
    },
  };
}

function editFileTool(root: string): NativeTool {
  return {
    name: 'edit_file',
    description: 'Replace an exact string in a workspace file. Fails when old_string is missing, or appears more than once without replace_all.',
    sideEffects: true,
    tags: ['file', 'edit', 'replace'],
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string' },
        old_string: { type: 'string', minLength: 1 },
        new_string: { type: 'string' },
        replace_all: { type: 'boolean' },
      },
      required: ['path', 'old_string', 'new_string'],
      additionalProperties: false,
    },
    async execute(args) {
      const path = resolveInWorkspace(root, str(args, 'path'));
      const oldString = str(args, 'old_string');
      const newString = str(args, 'new_string');
      const replaceAll = args.replace_all === true;

      if ((await stat(path)).isDirectory()) {
        throw new RelayError('ToolExecution', `${str(args, 'path')} is a directory, not a file`);
      }

      const content = await readFile(path, 'utf-8');
      const result = applyEdit(content, { oldString, newString, replaceAll }, str(args, 'path'));
      await writeFile(path, result.content, 'utf-8');
      return `Replaced ${result.replaced} occurrence(s) in ${str(args, 'path')}`;
    },
  };
}

function multiEditTool(root: string): NativeTool {
  return {
    name: 'multi_edit',
    description:
      'Apply several exact-string replacements to one workspace file. Edits run in order, each on the result of the previous one; ' +
      'if any edit fails the file is left untouched. An empty old_string in the first edit creates a new file.',
    sideEffects: true,
    tags: ['file', 'edit', 'replace', 'refactor'],
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string' },
        edits: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              old_string: { type: 'string' },
              new_string: { type: 'string' },
              replace_all: { type: 'boolean' },
            },
            required: ['old_string', 'new_string'],
            additionalProperties: false,
          },
        },
      },
      required: ['path', 'edits'],
      additionalProperties: false,
    },
    async execute(args) {
      const display = str(args, 'path');
      const path = resolveInWorkspace(root, display);
      const edits: EditSpec[] = (Array.isArray(args.edits) ? args.edits : []).map((item: unknown) => {
        const edit = isRecord(item) ? item : {};
        return { oldString: str(edit, 'old_string'), newString: str(edit, 'new_string'), replaceAll: edit.replace_all === true };
      });
      if (edits.length === 0) {
        throw new RelayError('ToolExecution', 'edits must contain at least one edit');
      }

      const existing = await statOrNull(path);
      if (existing?.isDirectory()) {
        throw new RelayError('ToolExecution', `${display} is a directory, not a file`);
      }

      let content: string;
      let first = 0;
      if (edits[0].oldString === '') {
        if (existing) {
          throw new RelayError('ToolExecution', `${display} already exists; an empty old_string only creates new files`);
        }
        content = edits[0].newString;
        first = 1;
      } else if (!existing) {
        throw new RelayError('ToolExecution', `${display} does not exist`);
      } else {
        content = await readFile(path, 'utf-8');
      }

      let replaced = 0;
      for (let i = first; i < edits.length; i++) {
        try {
          const result = applyEdit(content, edits[i], display);
          content = result.content;
          replaced += result.replaced;
        } catch (err) {
          throw new RelayError('ToolExecution', `Edit ${i + 1}: ${errorMessage(err)}; no edits were applied`, { cause: err });
        }
      }

      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
      const created = first === 1 ? ', creating the file' : '';
      return `Applied ${edits.length} edit(s) to ${display}${created} (${replaced} replacement(s))`;
    },
  };
}

function bashTool(root: string, defaultTimeoutMs: number): NativeTool {
  return {
    name: 'bash',
    description: 'Run a shell command with bash in the workspace root. Returns exit code, stdout and stderr.',
    sideEffects: true,
    tags: ['shell', 'command', 'exec'],
    inputSchema: {
      type: 'object',
      properties: {
        command: { type: 'string', minLength: 1 },
        timeout: { type: 'integer', minimum: 1, maximum: 600_000, description: 'Timeout in ms' },
      },
      required: ['command'],
      additionalProperties: false,
    },
    execute(args, context) {
      const command = str(args, 'command');
      const timeoutMs = optionalNumber(args, 'timeout') ?? defaultTimeoutMs;

      return new Promise((resolvePromise, reject) => {
        const child = spawn('bash', ['-c', command], {
          cwd: resolve(root),
          signal: context.signal,
          timeout: timeoutMs,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
        let stdout = '';
        let stderr = '';
        child.stdout.on('data', (chunk: Buffer) => {
          stdout += chunk.toString('utf-8');
        });
        child.stderr.on('data', (chunk: Buffer) => {
          stderr += chunk.toString('utf-8');
        });
        child.on('error', (err) => {
          if (err.name === 'AbortError') {
            reject(new CancelledError('bash command cancelled', { cause: err }));
          } else {
            reject(new RelayError('ToolExecution', `bash failed to start: ${err.message}`, { cause: err }));
          }
        });
        child.on('close', (code, signal) => {
          const status = code === null ? `killed by ${signal ?? 'signal'} (timeout ${timeoutMs}ms)` : `exit code ${code}`;
          const parts = [status];
          if (stdout) parts.push(`stdout:\n${truncateMiddle(stdout)}`);
          if (stderr) parts.push(`stderr:\n${truncateMiddle(stderr)}`);
          resolvePromise(parts.join('\n'));
        });
      });
    },
  };
}

function taskTool(runSubAgent: SubAgentRunner): NativeTool {
  return {
    name: TASK_TOOL_NAME,
    description:
      'Launch a sub-agent with its own bounded execution loop to handle a self-contained task. ' +
      'The sub-agent has the same tools except this one, and returns its final answer.',
    sideEffects: false,
    tags: ['agent', 'delegate', 'subtask'],
    inputSchema: {
      type: 'object',
      properties: {
        description: { type: 'string', minLength: 1, description: 'A short (3-5 word) description of the task' },
        prompt: { type: 'string', minLength: 1, description: 'The task for the sub-agent to perform' },
      },
      required: ['description', 'prompt'],
      additionalProperties: false,
    },
    async execute(args, context) {
      const description = str(args, 'description');
      logger.info({ description }, 'Launching sub-agent');
      const outcome = await runSubAgent({
        description,
        prompt: str(args, 'prompt'),
        permissionMode: context.permissionMode,
        signal: context.signal,
      });
      return {
        status: outcome.reason,
        result: outcome.finalText,
        tool_use_count: outcome.toolUseCount,
        duration_ms: outcome.durationMs,
        tokens_used: outcome.ledger.inputTokens + outcome.ledger.outputTokens,
        cost_usd: outcome.ledger.usd,
        ...(outcome.error ? { error: outcome.error.message } : {}),
      };
    },
  };
}

export function createNativeTools(options: NativeToolOptions): NativeTool[] {
  const root = options.workspaceRoot;
  const tools = [
    readFileTool(root),
    listDirectoryTool(root),
    searchFilesTool(root),
    globTool(root),
    writeFileTool(root),
    editFileTool(root),
    multiEditTool(root),
    bashTool(root, options.bashTimeoutMs ?? 120_000),
  ];
  if (options.runSubAgent) {
    tools.push(taskTool(options.runSubAgent));
  }
  return tools;
}
