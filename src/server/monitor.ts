/**
 * Read-only monitoring server over stdio
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module server/monitor
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { PipelineConfig } from './config.js';
import { registerAllTools } from './register-tools.js';
import { clearState, initMonitorState } from './state.js';

export const SERVER_NAME = 'doc-intake-monitor';
export const SERVER_VERSION = '1.0.0';

export function createMonitorServer(config: PipelineConfig): { server: McpServer; toolCount: number } {
  initMonitorState(config);
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const toolCount = registerAllTools(server);
  return { server, toolCount };
}

/**
 * Serve until the client disconnects or `signal` fires
 */
export async function runMonitor(config: PipelineConfig, signal: AbortSignal): Promise<void> {
  const { server, toolCount } = createMonitorServer(config);
  const transport = new StdioServerTransport();

  const closed = new Promise<void>((resolve) => {
    transport.onclose = () => resolve();
  });

  await server.connect(transport);
  console.error(`[Monitor] ${SERVER_NAME} running on stdio (${toolCount} tools, db ${config.dbPath})`);

  const onAbort = (): void => {
    server.close().catch((error: unknown) => {
      console.error(`[Monitor] Error closing server: ${String(error)}`);
    });
  };
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    await closed;
  } finally {
    signal.removeEventListener('abort', onAbort);
    clearState();
    console.error('[Monitor] Server closed');
  }
}
