#!/usr/bin/env node
/**
 * toolrelay CLI
 *
 * Commands:
 * - toolrelay servers  Start configured MCP servers and show their status
 * - toolrelay tools    Show the tool catalog for a permission mode
 * - toolrelay run <prompt>  Run one task and stream its turn events
 */

import { Command } from 'commander';
import { createAgentRuntime, type AgentRuntime } from '../agents';
import type { LoopEvent } from '../agents/loop';
import { loadServerConfigs } from '../mcp/config';
import type { PermissionMode } from '../mcp/security';
import { errorMessage } from '../errors';
import { loadConfig, loadEnvFiles, type AppConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { parseMode, parseNonNegativeInt, parsePositiveInt } from './options';

loadEnvFiles();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

const program = new Command();

program
  .name('toolrelay')
  .description('Discover MCP tool servers and run bounded agent tasks against them')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default ~/.toolrelay/toolrelay.json)')
  .option('-w, --workspace <dir>', 'Workspace root (default current directory)');

interface GlobalOptions {
  config?: string;
  workspace?: string;
}

async function buildRuntime(): Promise<{ runtime: AgentRuntime; config: AppConfig }> {
  const globals = program.opts<GlobalOptions>();
  const config = await loadConfig({ path: globals.config });
  if (globals.workspace) config.workspace.root = globals.workspace;

  const serverConfigs = loadServerConfigs({
    workspaceRoot: config.workspace.root,
    extra: config.mcp.servers,
  });
  return { runtime: createAgentRuntime({ config, serverConfigs }), config };
}

async function withRuntime(fn: (runtime: AgentRuntime, config: AppConfig) => Promise<void>): Promise<void> {
  let runtime: AgentRuntime | null = null;
  try {
    const built = await buildRuntime();
    runtime = built.runtime;
    await fn(runtime, built.config);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    if (runtime) await runtime.shutdown();
  }
}

function printEvent(event: LoopEvent): void {
  switch (event.type) {
    case 'turn_start':
      console.log(`\n-- turn ${event.turn + 1} --`);
      break;
    case 'model_response':
      if (event.text) console.log(event.text);
      break;
    case 'tool_call':
      console.log(`> ${event.call.name} ${JSON.stringify(event.call.arguments)}`);
      break;
    case 'tool_result': {
      const r = event.result;
      console.log(r.success ? `  ok (${r.timingMs}ms)` : `  ${r.errorKind}: ${r.message} (${r.timingMs}ms)`);
      break;
    }
    case 'turn_end':
      break;
    case 'done': {
      const { outcome } = event;
      console.log(
        `\n[${outcome.reason}] turns=${outcome.turns.length} tools=${outcome.toolUseCount} ` +
          `tokens=${outcome.ledger.inputTokens + outcome.ledger.outputTokens} cost=$${outcome.ledger.usd.toFixed(4)} ` +
          `time=${(outcome.durationMs / 1000).toFixed(1)}s`,
      );
      if (outcome.error) console.log(`error: ${outcome.error.message}`);
      break;
    }
  }
}

// ============================================================================
// servers
// ============================================================================
program
  .command('servers')
  .description('Start every configured MCP server and print its status')
  .option('--json', 'Print the raw status snapshot')
  .action(async (options: { json?: boolean }) => {
    await withRuntime(async (runtime) => {
      await runtime.start();
      const status = runtime.servers.getServerStatus();
      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }
      const names = Object.keys(status);
      if (names.length === 0) {
        console.log('No MCP servers configured (.mcprc, ~/.mcprc or MCP_SERVERS)');
        return;
      }
      for (const name of names) {
        const s = status[name];
        const error = s.lastError ? `  (${s.lastError})` : '';
        console.log(`${name.padEnd(24)} ${s.transport.padEnd(6)} ${s.state.padEnd(12)} ${s.toolCount} tools${error}`);
      }
    });
  });

// ============================================================================
// tools
// ============================================================================
program
  .command('tools')
  .description('List the tools a task would see')
  .option('-m, --mode <mode>', 'Permission mode: restricted | full', parseMode, 'restricted')
  .option('-s, --search <query>', 'Rank tools against a query')
  .action(async (options: { mode: PermissionMode; search?: string }) => {
    await withRuntime(async (runtime) => {
      const mode = options.mode;
      await runtime.start();
      const entries = options.search ? runtime.tools.search(options.search, mode) : runtime.tools.catalog(mode);
      for (const entry of entries) {
        const resolved = runtime.tools.resolve(entry.name);
        const origin = resolved.kind === 'native' ? 'native' : resolved.server;
        console.log(`${entry.name.padEnd(28)} [${origin}] ${entry.description.split('\n')[0]}`);
      }
      for (const s of runtime.tools.shadowed()) {
        console.log(`(shadowed) ${s.name} from ${s.server}, kept ${s.shadowedBy}`);
      }
    });
  });

// ============================================================================
// run
// ============================================================================
interface RunOptions {
  mode?: PermissionMode;
  model?: string;
  maxTurns?: number;
  maxConcurrency?: number;
  thinking?: number;
}

program
  .command('run <prompt>')
  .description('Run one task to completion')
  .option('-m, --mode <mode>', 'Permission mode: restricted | full', parseMode)
  .option('--model <model>', 'Model id')
  .option('--max-turns <n>', 'Maximum model turns', parsePositiveInt)
  .option('--max-concurrency <n>', 'Tool calls in flight per turn', parsePositiveInt)
  .option('--thinking <tokens>', 'Extended thinking budget', parseNonNegativeInt)
  .action(async (prompt: string, options: RunOptions) => {
    await withRuntime(async (runtime) => {
      await runtime.start();
      const controller = new AbortController();
      const onSigint = () => {
        console.error('\nCancelling...');
        controller.abort();
      };
      process.once('SIGINT', onSigint);
      try {
        const loop = runtime.createTask({
          prompt,
          signal: controller.signal,
          permissionMode: options.mode,
          model: options.model,
          maxTurns: options.maxTurns,
          maxConcurrency: options.maxConcurrency,
          maxThinkingTokens: options.thinking,
        });
        const outcome = await loop.runToCompletion(printEvent);
        if (outcome.reason !== 'completed') process.exitCode = 2;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
