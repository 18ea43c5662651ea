#!/usr/bin/env node
/**
 * @fileoverview netmeta-mcp CLI
 *
 *   netmeta-mcp                 - Serve the MCP tools on stdio
 *   netmeta-mcp --check         - Verify R and its packages, print engine info
 *   netmeta-mcp --help          - Usage
 *
 * @packageDocumentation
 */

import { realpathSync } from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { NetmetaBridge, type NetmetaBackend } from '../bridge/netmeta_bridge.js';
import {
  mergeConfig,
  parseTimeoutMs,
  resolveConfigFromEnv,
  type NetmetaConfig,
} from '../config/index.js';
import { isStartupFatal } from '../core/errors.js';
import { MCP_SERVER_VERSION } from '../mcp/types.js';
import { logError } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { checkCommand } from './commands/check.js';
import { serveCommand } from './commands/serve.js';
import { showHelp } from './help.js';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createBridge?: (config: NetmetaConfig) => Promise<NetmetaBackend>;
}

/**
 * Build the effective configuration: defaults, then env, then flags.
 */
export function resolveCliConfig(
  values: { 'r-path'?: string; 'state-dir'?: string; timeout?: string },
  env: NodeJS.ProcessEnv
): NetmetaConfig {
  const overrides: Partial<NetmetaConfig> = {};
  if (values['r-path']) overrides.rPath = path.resolve(values['r-path']);
  if (values['state-dir']) overrides.stateDir = path.resolve(values['state-dir']);
  if (values.timeout !== undefined) overrides.timeoutMs = parseTimeoutMs(values.timeout, '--timeout');
  return mergeConfig(resolveConfigFromEnv(env), overrides);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'r-path': { type: 'string' },
      'state-dir': { type: 'string' },
      timeout: { type: 'string' },
      check: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: false,
    strict: true,
  }).values;
}

type CliValues = ReturnType<typeof parseCliArgs>;

function reportFailure(error: unknown): void {
  const message = isStartupFatal(error) ? error.toString() : getErrorMessage(error);
  console.error(`netmeta-mcp: ${message}`);
}

/**
 * Run the CLI and resolve to the process exit code. When serving, resolves
 * once the server is listening; signals end the process.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const createBridge = deps.createBridge ?? ((config: NetmetaConfig) => NetmetaBridge.create(config));

  let values: CliValues;
  try {
    values = parseCliArgs(argv);
  } catch (error) {
    reportFailure(error);
    console.error("Run 'netmeta-mcp --help' for usage information");
    return 2;
  }

  if (values.help) {
    showHelp();
    return 0;
  }

  if (values.version) {
    console.log(`netmeta-mcp ${MCP_SERVER_VERSION}`);
    return 0;
  }

  try {
    const config = resolveCliConfig(values, env);
    if (values.check) {
      await checkCommand({ config, createBridge });
      return 0;
    }
    await serveCommand({ config, createBridge });
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  }
}

function isDirectInvocation(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectInvocation()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((error: unknown) => {
      logError('[cli] fatal error', { error: getErrorMessage(error) });
      process.exit(1);
    });
}
