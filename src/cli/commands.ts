/**
 * CLI command runners
 *
 * stdout carries exactly one JSON document per command (the run summary or
 * the replay/abandon report); every diagnostic goes to stderr.
 *
 * @module cli/commands
 */

import { loadPipelineConfig, type Env, type PipelineConfig } from '../server/config.js';
import { MCPError, getRecoveryHint } from '../server/errors.js';
import { runMonitor } from '../server/monitor.js';
import { createRuntime, type PipelineRuntime, type RuntimeOverrides } from '../server/runtime.js';
import { validateStartup } from '../server/startup.js';
import { RunContext } from '../services/pipeline/context.js';
import { logSummary } from '../services/pipeline/orchestrator.js';
import { parseArgs, USAGE, type CliCommand } from './args.js';

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAULT = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  /** Receives the JSON result */
  out: (text: string) => void;
  env: Env;
  signal: AbortSignal;
  overrides?: RuntimeOverrides;
}

function reportFault(stage: string, error: unknown): number {
  const mcpError = MCPError.fromUnknown(error);
  const recovery = getRecoveryHint(mcpError.category);
  console.error(`[CLI] ${stage} failed: ${mcpError.category}: ${mcpError.message}`);
  console.error(`[CLI] Next: ${recovery.tool} - ${recovery.hint}`);
  return EXIT_STARTUP_FAULT;
}

/**
 * Parse, configure, run. Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    console.error(`[CLI] ${parsed.error}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  const { command } = parsed;
  if (command.name === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  let config: PipelineConfig;
  try {
    config = loadPipelineConfig(io.env);
  } catch (error) {
    return reportFault('Configuration', error);
  }

  if (command.name === 'monitor') {
    try {
      await runMonitor(config, io.signal);
      return EXIT_OK;
    } catch (error) {
      return reportFault('Monitor', error);
    }
  }

  let runtime: PipelineRuntime;
  try {
    runtime = createRuntime(config, io.overrides);
  } catch (error) {
    return reportFault('Startup', error);
  }

  try {
    await validateStartup(runtime.claims, config);
    return await runCommand(command, runtime, io);
  } catch (error) {
    return reportFault(command.name, error);
  } finally {
    await runtime.close();
  }
}

/**
 * Log providers whose circuit did not end the run closed
 */
function logCircuits(runtime: PipelineRuntime): void {
  for (const [provider, status] of Object.entries(runtime.circuitStatus())) {
    if (status.state !== 'CLOSED') {
      console.error(
        `[CLI] Extraction circuit for ${provider} is ${status.state} after ${status.failureCount} failures`
      );
    }
  }
}

async function runCommand(
  command: Exclude<CliCommand, { name: 'help' } | { name: 'monitor' }>,
  runtime: PipelineRuntime,
  io: CliIo
): Promise<number> {
  const { config } = runtime;

  switch (command.name) {
    case 'poll-once': {
      const ctx = new RunContext(config.workerId, io.signal);
      const summary = await runtime.orchestrator.pollOnce(ctx);
      logCircuits(runtime);
      io.out(JSON.stringify(summary, null, 2));
      return EXIT_OK;
    }

    case 'replay': {
      const ctx = new RunContext(config.workerId, io.signal, 'replay');
      if ('id' in command.target) {
        const outcome = await runtime.replay.replay(command.target.id, ctx);
        const summary = ctx.summary();
        logSummary('Replay', summary);
        io.out(JSON.stringify({ outcomes: [outcome], summary }, null, 2));
      } else {
        const report = await runtime.replay.replayByStatus(command.target.status, ctx);
        io.out(JSON.stringify(report, null, 2));
      }
      logCircuits(runtime);
      return EXIT_OK;
    }

    case 'abandon': {
      const deadLetters = runtime.orchestrator.deadLetters;
      const abandoned = deadLetters.abandon(command.id, 'manual');
      const entry = deadLetters.get(command.id);
      if (!abandoned) {
        console.error(
          entry
            ? `[CLI] Entry ${command.id} is ${entry.replay_status}; only PENDING entries can be abandoned`
            : `[CLI] Dead-letter entry ${command.id} not found`
        );
      }
      io.out(
        JSON.stringify(
          { entry_id: command.id, abandoned, replay_status: entry ? entry.replay_status : null },
          null,
          2
        )
      );
      return EXIT_OK;
    }
  }
}
