/**
 * @fileoverview Check command - locate and verify the R engine
 */

import type { EngineInfo, NetmetaBackend } from '../../bridge/netmeta_bridge.js';
import type { NetmetaConfig } from '../../config/index.js';

export interface CheckCommandOptions {
  config: NetmetaConfig;
  createBridge: (config: NetmetaConfig) => Promise<NetmetaBackend>;
}

export interface CheckReport extends EngineInfo {
  ready: true;
  requiredPackages: string[];
  timeoutMs: number;
}

/**
 * Prints the report as JSON on stdout. Verification failures propagate.
 */
export async function checkCommand(options: CheckCommandOptions): Promise<CheckReport> {
  const bridge = await options.createBridge(options.config);
  const report: CheckReport = {
    ready: true,
    ...bridge.getEngineInfo(),
    requiredPackages: options.config.requiredPackages,
    timeoutMs: options.config.timeoutMs,
  };
  console.log(JSON.stringify(report, null, 2));
  return report;
}
