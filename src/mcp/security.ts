/**
 * Tool exposure rules
 *
 * Side-effect tagging feeds the permission-mode gate; the allow/block lists
 * are opt-in via env vars and apply to every permission mode.
 */

import type { McpTool } from './types';

// =============================================================================
// CONFIG
// =============================================================================

export type PermissionMode = 'restricted' | 'full';

export interface ToolExposureConfig {
  /** Allowlist of tool names (empty = all allowed) */
  allowedTools: Set<string>;
  /** Blocklist of tool names */
  blockedTools: Set<string>;
}

function parseList(value: string | undefined): Set<string> {
  const trimmed = value?.trim();
  if (!trimmed) return new Set();
  return new Set(trimmed.split(',').map((s) => s.trim()).filter(Boolean));
}

export function loadExposureConfig(env: NodeJS.ProcessEnv = process.env): ToolExposureConfig {
  return {
    allowedTools: parseList(env.TOOLRELAY_ALLOWED_TOOLS),
    blockedTools: parseList(env.TOOLRELAY_BLOCKED_TOOLS),
  };
}

export const OPEN_EXPOSURE: ToolExposureConfig = {
  allowedTools: new Set(),
  blockedTools: new Set(),
};

// =============================================================================
// TOOL ALLOWLISTING
// =============================================================================

/** Check whether a single tool name is allowed by the config */
export function isToolAllowed(toolName: string, config: ToolExposureConfig): boolean {
  // Blocklist always wins
  if (config.blockedTools.has(toolName)) return false;

  if (config.allowedTools.size > 0) {
    return config.allowedTools.has(toolName);
  }

  return true;
}

// =============================================================================
// SIDE-EFFECT TAGGING
// =============================================================================

const SIDE_EFFECT_VERBS = new Set([
  'write', 'edit', 'delete', 'remove', 'rm', 'create', 'exec', 'execute', 'run', 'bash', 'shell',
  'move', 'mv', 'copy', 'cp', 'rename', 'update', 'put', 'post', 'patch', 'kill', 'install', 'uninstall',
  'push', 'pull', 'commit', 'send', 'add', 'reset', 'checkout', 'merge', 'rebase', 'revert', 'apply',
  'set', 'insert', 'upsert', 'drop', 'truncate', 'clear', 'purge', 'modify', 'replace', 'append', 'save',
  'upload', 'deploy', 'publish', 'archive', 'start', 'stop', 'restart', 'spawn', 'launch', 'submit',
  'approve', 'cancel', 'close', 'assign', 'mkdir', 'chmod', 'schedule',
]);

/** `deleteFile`, `git_add`, `HTTPPost` and `run-tests` all split into lower-case words */
export function splitToolName(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

/**
 * Decide whether a discovered tool has side effects. Server-declared
 * annotations win; otherwise the tool name is matched against verbs that
 * write or execute.
 */
export function inferSideEffects(tool: Pick<McpTool, 'name' | 'annotations'>): boolean {
  const hints = tool.annotations;
  if (hints?.destructiveHint === true) return true;
  if (hints?.readOnlyHint === true) return false;
  if (hints?.readOnlyHint === false) return true;
  return splitToolName(tool.name).some((word) => SIDE_EFFECT_VERBS.has(word));
}

/** Restricted mode hides every side-effecting tool */
export function isVisibleInMode(sideEffects: boolean, mode: PermissionMode): boolean {
  return mode === 'full' || !sideEffects;
}
