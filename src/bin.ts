#!/usr/bin/env node
/**
 * doc-intake - CLI Entry Point
 *
 * Usage:
 *   doc-intake poll-once
 *   doc-intake replay --status PENDING
 *   doc-intake replay --id <entryId>
 *   doc-intake abandon --id <entryId>
 *   doc-intake monitor
 *
 * SIGINT/SIGTERM cancel the running command cooperatively: in-flight
 * documents release their claims as ABANDONED and the summary is still
 * printed. A second signal exits at once.
 *
 * @module bin
 */

import { loadEnvFile } from './server/env.js';
import { runCli } from './cli/commands.js';

loadEnvFile();

const controller = new AbortController();

function handleSignal(signal: NodeJS.Signals): void {
  if (controller.signal.aborted) {
    console.error(`[Shutdown] Received ${signal} again, exiting`);
    process.exit(130);
  }
  console.error(`[Shutdown] Received ${signal}, cancelling after in-flight stages settle...`);
  controller.abort();
}

process.on('SIGINT', handleSignal);
process.on('SIGTERM', handleSignal);

runCli(process.argv.slice(2), {
  out: (text) => process.stdout.write(`${text}\n`),
  env: process.env,
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[FATAL] Unhandled error:', error);
    process.exitCode = 1;
  });
