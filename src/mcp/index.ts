/**
 * @fileoverview MCP Module - Model Context Protocol server for netmeta
 *
 * - Tools: csv_to_json, runnetmeta, get_network_graph, get_league_table,
 *   get_ranking, get_forest_data, pairwise_to_netmeta
 * - Zod validation of tool inputs
 * - In-memory audit trail
 *
 * @packageDocumentation
 */

// Types
export {
  MCP_SERVER_VERSION,
  DEFAULT_MCP_SERVER_CONFIG,
  type NetmetaMCPServerConfig,
  type AuditLogEntry,
  type ServerInfo,
} from './types.js';

// Schemas
export {
  SCHEMA_VERSION,
  TOOL_INPUT_SCHEMAS,
  JSON_SCHEMAS,
  RunNetmetaToolInputSchema,
  GetNetworkGraphToolInputSchema,
  GetLeagueTableToolInputSchema,
  GetRankingToolInputSchema,
  GetForestDataToolInputSchema,
  PairwiseToNetmetaToolInputSchema,
  CsvToJsonToolInputSchema,
  validateToolInput,
  listToolSchemas,
  isToolName,
  type ToolName,
  type ToolValidationIssue,
  type ValidationResult,
  type RunNetmetaToolInput,
  type GetNetworkGraphToolInput,
  type GetLeagueTableToolInput,
  type GetRankingToolInput,
  type GetForestDataToolInput,
  type PairwiseToNetmetaToolInput,
  type CsvToJsonToolInput,
} from './schema.js';

// Server
export {
  NetmetaMCPServer,
  SERVER_INSTRUCTIONS,
  createNetmetaMCPServer,
  startStdioServer,
  type CreateServerOptions,
} from './server.js';
