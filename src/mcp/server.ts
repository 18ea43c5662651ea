/**
 * @fileoverview MCP server exposing netmeta operations as tools
 *
 * Features:
 * - Seven tools covering the analysis workflow (csv_to_json, runnetmeta,
 *   get_network_graph, get_league_table, get_ranking, get_forest_data,
 *   pairwise_to_netmeta)
 * - Zod validation of every call before it reaches the bridge
 * - In-memory audit log of tool calls
 *
 * Every tool answers with one JSON text block. A result carrying an `error`
 * key is flagged `isError`; nothing a caller sends can crash the process.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { NetmetaBridge, type NetmetaBackend } from '../bridge/netmeta_bridge.js';
import type { NetmetaConfig } from '../config/index.js';
import { csvToJson } from '../data/csv.js';
import {
  INVALID_INPUT_PREFIX,
  classifyEngineError,
  isEngineError,
  type EngineErrorResult,
  type EngineFailureKind,
} from '../engine/types.js';
import { logError, logInfo } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  CsvToJsonToolInputSchema,
  GetForestDataToolInputSchema,
  GetLeagueTableToolInputSchema,
  GetNetworkGraphToolInputSchema,
  GetRankingToolInputSchema,
  JSON_SCHEMAS,
  PairwiseToNetmetaToolInputSchema,
  RunNetmetaToolInputSchema,
  isToolName,
  listToolSchemas,
  validateWith,
  type ToolName,
} from './schema.js';
import {
  DEFAULT_MCP_SERVER_CONFIG,
  type AuditLogEntry,
  type NetmetaMCPServerConfig,
  type ServerInfo,
} from './types.js';

export const SERVER_INSTRUCTIONS = `This server provides network meta-analysis using the R netmeta package.

Workflow:
1. csv_to_json converts CSV text into records (formats: pairwise, arm_binary, arm_continuous).
2. pairwise_to_netmeta turns arm-level records into pairwise contrasts.
3. runnetmeta fits the network and stores the result for the session.
4. get_network_graph, get_league_table, get_ranking and get_forest_data query the stored result.

Pairwise records need: study, treat1, treat2, TE (treatment effect, log scale for ratio measures) and seTE (its standard error).
Every analysis tool accepts an optional session_id; calls without one share a single default slot.`;

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  runnetmeta:
    'Run a network meta-analysis on pairwise contrasts. Returns treatments, study and comparison counts, ' +
    'heterogeneity (random effects) and pairwise estimates for each requested model. The fit is stored for the query tools.',
  get_network_graph:
    'Network structure of the stored analysis: one node per treatment and one edge per compared pair with its study count.',
  get_league_table:
    'League table of the stored analysis: square matrices of effects and confidence limits in treatment order.',
  get_ranking:
    'Treatment ranking by P-score (higher is better) for the stored analysis, ordered by rank.',
  get_forest_data:
    'Effect and confidence interval of every treatment against a reference, for forest plots.',
  pairwise_to_netmeta:
    'Convert arm-level data (binary: events/n; continuous: mean/sd/n) into pairwise contrasts for runnetmeta.',
  csv_to_json:
    'Convert CSV text into records for runnetmeta (pairwise) or pairwise_to_netmeta (arm_binary, arm_continuous).',
};

type ToolHandler = (args: unknown) => Promise<unknown>;

/**
 * Validate with `schema`, then run. Invalid input becomes an error result.
 */
function bindTool<S extends z.ZodTypeAny>(schema: S, run: (input: z.output<S>) => Promise<unknown>): ToolHandler {
  return async (args) => {
    const validation = validateWith(schema, args ?? {});
    if (!validation.valid) {
      return {
        error: `${INVALID_INPUT_PREFIX}${validation.errors.map((e) => `${e.path}: ${e.message}`).join(', ')}`,
        validation_errors: validation.errors,
      };
    }
    return run(validation.data);
  };
}

/**
 * csv_to_json and unknown tools never reach the engine, so their failures
 * are always about the caller's input.
 */
function failureKindOf(tool: string, failure: EngineErrorResult): EngineFailureKind {
  if (!isToolName(tool) || tool === 'csv_to_json') return 'validation';
  return classifyEngineError(failure);
}

/** An empty reference means no reference */
function referenceOrNull(reference: string | null | undefined): string | null {
  return reference ? reference : null;
}

function readSessionId(args: unknown): string | undefined {
  if (args && typeof args === 'object' && 'session_id' in args && typeof args.session_id === 'string') {
    return args.session_id;
  }
  return undefined;
}

// ============================================================================
// SERVER IMPLEMENTATION
// ============================================================================

export class NetmetaMCPServer {
  private server: Server;
  private config: NetmetaMCPServerConfig;
  private auditLog: AuditLogEntry[] = [];
  private transport: Transport | null = null;
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(
    private readonly bridge: NetmetaBackend,
    config: Partial<NetmetaMCPServerConfig> = {},
  ) {
    this.config = { ...DEFAULT_MCP_SERVER_CONFIG, ...config };

    this.server = new Server(
      {
        name: this.config.name,
        version: this.config.version,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions: SERVER_INSTRUCTIONS,
      }
    );

    this.handlers = {
      runnetmeta: bindTool(RunNetmetaToolInputSchema, (input) =>
        this.bridge.runNetmeta({
          data: input.data,
          sm: input.sm,
          reference: referenceOrNull(input.reference),
          combFixed: input.comb_fixed,
          combRandom: input.comb_random,
          sessionId: input.session_id,
        })
      ),
      get_network_graph: bindTool(GetNetworkGraphToolInputSchema, (input) =>
        this.bridge.getNetworkGraph({ sessionId: input.session_id })
      ),
      get_league_table: bindTool(GetLeagueTableToolInputSchema, (input) =>
        this.bridge.getLeagueTable({ random: input.random, sessionId: input.session_id })
      ),
      get_ranking: bindTool(GetRankingToolInputSchema, (input) =>
        this.bridge.getRanking({ random: input.random, sessionId: input.session_id })
      ),
      get_forest_data: bindTool(GetForestDataToolInputSchema, (input) =>
        this.bridge.getForestData({
          reference: referenceOrNull(input.reference),
          random: input.random,
          sessionId: input.session_id,
        })
      ),
      pairwise_to_netmeta: bindTool(PairwiseToNetmetaToolInputSchema, (input) =>
        this.bridge.pairwiseToNetmeta({
          data: input.data,
          outcomeType: input.outcome_type,
          sm: input.sm,
        })
      ),
      csv_to_json: bindTool(CsvToJsonToolInputSchema, async (input) =>
        csvToJson(input.csv_content, input.data_format)
      ),
    };

    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      return { tools: this.getAvailableTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  getAvailableTools(): Tool[] {
    return listToolSchemas().map((name) => ({
      name,
      description: TOOL_DESCRIPTIONS[name],
      inputSchema: JSON_SCHEMAS[name],
    }));
  }

  /**
   * Call a tool with arguments.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    const startTime = Date.now();

    let result: unknown;
    if (!isToolName(name)) {
      result = { error: `Unknown tool: ${name}` };
    } else {
      try {
        result = await this.handlers[name](args);
      } catch (error) {
        logError('[mcp] tool handler failed', { tool: name, error: getErrorMessage(error) });
        result = { error: getErrorMessage(error) };
      }
    }

    const failure = isEngineError(result) ? result : undefined;
    const failed = failure !== undefined;
    const durationMs = Date.now() - startTime;
    this.logAudit({
      id: this.generateId(),
      timestamp: new Date().toISOString(),
      name,
      sessionId: readSessionId(args),
      status: failed ? 'failure' : 'success',
      durationMs,
      error: failure?.error,
      failureKind: failure ? failureKindOf(name, failure) : undefined,
    });
    logInfo('[mcp] tool call', { tool: name, status: failed ? 'failure' : 'success', durationMs });

    const response: CallToolResult = {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
    if (failed) {
      response.isError = true;
    }
    return response;
  }

  // ============================================================================
  // UTILITIES
  // ============================================================================

  private generateId(): string {
    return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }

  private logAudit(entry: AuditLogEntry): void {
    if (!this.config.audit.enabled) return;
    this.auditLog.push(entry);
    if (this.auditLog.length > this.config.audit.maxEntries) {
      this.auditLog = this.auditLog.slice(-this.config.audit.maxEntries);
    }
  }

  /**
   * Get audit log entries.
   */
  getAuditLog(options?: { limit?: number; since?: string }): AuditLogEntry[] {
    let entries = this.auditLog;

    const since = options?.since;
    if (since) {
      entries = entries.filter((e) => e.timestamp >= since);
    }

    if (options?.limit) {
      entries = entries.slice(-options.limit);
    }

    return entries;
  }

  // ============================================================================
  // SERVER LIFECYCLE
  // ============================================================================

  /**
   * Attach to any transport (stdio in production, in-memory in tests).
   */
  async connect(transport: Transport): Promise<void> {
    this.transport = transport;
    await this.server.connect(transport);
  }

  /**
   * Start the server with stdio transport.
   */
  async start(): Promise<void> {
    await this.connect(new StdioServerTransport());
    logInfo(`[mcp] ${this.config.name} v${this.config.version} listening on stdio`);
  }

  async stop(): Promise<void> {
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
    logInfo('[mcp] server stopped');
  }

  getServerInfo(): ServerInfo {
    const engine = this.bridge.getEngineInfo();
    return {
      name: this.config.name,
      version: this.config.version,
      toolCount: listToolSchemas().length,
      auditLogSize: this.auditLog.length,
      enginePath: engine.enginePath,
      stateDir: engine.stateDir,
    };
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export interface CreateServerOptions {
  /** Skip engine discovery and serve through this backend */
  bridge?: NetmetaBackend;
  server?: Partial<NetmetaMCPServerConfig>;
}

/**
 * Build a server; without an injected bridge this locates and verifies R
 * and throws if it is unusable.
 */
export async function createNetmetaMCPServer(
  config: NetmetaConfig,
  options: CreateServerOptions = {}
): Promise<NetmetaMCPServer> {
  const bridge = options.bridge ?? (await NetmetaBridge.create(config));
  return new NetmetaMCPServer(bridge, options.server);
}

export async function startStdioServer(
  config: NetmetaConfig,
  options: CreateServerOptions = {}
): Promise<NetmetaMCPServer> {
  const server = await createNetmetaMCPServer(config, options);
  await server.start();
  return server;
}
