/**
 * @fileoverview MCP server configuration and audit types
 */

import type { EngineFailureKind } from '../engine/types.js';

export const MCP_SERVER_VERSION = '0.1.0';

export interface NetmetaMCPServerConfig {
  /** Server name reported during initialization */
  name: string;

  /** Server version */
  version: string;

  /** Audit settings */
  audit: {
    /** Record tool calls in memory */
    enabled: boolean;

    /** Oldest entries are dropped beyond this size */
    maxEntries: number;
  };
}

export const DEFAULT_MCP_SERVER_CONFIG: NetmetaMCPServerConfig = {
  name: 'netmeta-mcp',
  version: MCP_SERVER_VERSION,
  audit: {
    enabled: true,
    maxEntries: 1000,
  },
};

/** Audit log entry */
export interface AuditLogEntry {
  /** Entry ID */
  id: string;

  /** ISO timestamp */
  timestamp: string;

  /** Tool name */
  name: string;

  /** Session slot named by the call, if any */
  sessionId?: string;

  /** success: result without an `error` key */
  status: 'success' | 'failure';

  durationMs: number;

  error?: string;

  failureKind?: EngineFailureKind;
}

export interface ServerInfo {
  name: string;
  version: string;
  toolCount: number;
  auditLogSize: number;
  enginePath: string | null;
  stateDir: string;
}
