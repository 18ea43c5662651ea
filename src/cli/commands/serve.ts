/**
 * @fileoverview Serve command - run the MCP server on stdio until signalled
 */

import type { NetmetaBackend } from '../../bridge/netmeta_bridge.js';
import type { NetmetaConfig } from '../../config/index.js';
import { startStdioServer, type NetmetaMCPServer } from '../../mcp/server.js';
import { logError } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

export interface ServeCommandOptions {
  config: NetmetaConfig;
  createBridge: (config: NetmetaConfig) => Promise<NetmetaBackend>;
}

export async function serveCommand(options: ServeCommandOptions): Promise<NetmetaMCPServer> {
  const bridge = await options.createBridge(options.config);
  const server = await startStdioServer(options.config, { bridge });

  const shutdown = (signal: NodeJS.Signals): void => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError(`[cli] shutdown after ${signal} failed`, { error: getErrorMessage(error) });
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}
