/**
 * @fileoverview JSON Schema definitions and Zod validators for MCP tool inputs
 *
 * Zod validates at run time; the JSON Schemas are what `tools/list`
 * advertises. Defaults are applied by the Zod schemas so tool handlers
 * always see fully-populated inputs.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { SESSION_ID_PATTERN } from '../engine/session_store.js';
import {
  CONVERSION_MEASURES,
  SUMMARY_MEASURES,
  type BinaryArm,
  type ContinuousArm,
  type SummaryMeasure,
} from '../engine/types.js';
import { DATA_FORMATS } from '../data/csv.js';

// ============================================================================
// SCHEMA VERSION
// ============================================================================

export const SCHEMA_VERSION = '1.0.0';
export const JSON_SCHEMA_DRAFT = 'http://json-schema.org/draft-07/schema#';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

export const SummaryMeasureSchema = z.enum(['OR', 'RR', 'RD', 'MD', 'SMD']);

export const OutcomeTypeSchema = z.enum(['binary', 'continuous']);

export const SessionIdSchema = z
  .string()
  .regex(SESSION_ID_PATTERN, 'session_id must be 1-64 letters, digits, "_" or "-"');

const label = (what: string) => z.string().min(1, `${what} must not be empty`);

export const PairwiseContrastSchema = z.object({
  study: label('study'),
  treat1: label('treat1'),
  treat2: label('treat2'),
  TE: z.number().finite(),
  seTE: z.number().finite().positive(),
});

export const BinaryArmSchema = z
  .object({
    study: label('study'),
    treatment: label('treatment'),
    events: z.number().int().min(0),
    n: z.number().int().positive(),
  })
  .refine((arm) => arm.events <= arm.n, { message: 'events must not exceed n', path: ['events'] });

export const ContinuousArmSchema = z.object({
  study: label('study'),
  treatment: label('treatment'),
  mean: z.number().finite(),
  sd: z.number().finite().positive(),
  n: z.number().int().positive(),
});

/**
 * runnetmeta tool input schema
 */
export const RunNetmetaToolInputSchema = z.object({
  data: z.array(PairwiseContrastSchema).min(1).describe('Pairwise contrasts, one per study comparison'),
  sm: SummaryMeasureSchema.optional().default('OR').describe('Summary measure'),
  reference: z.string().nullable().optional().describe('Reference treatment; empty means none'),
  comb_fixed: z.boolean().optional().default(true).describe('Fit the common-effect model'),
  comb_random: z.boolean().optional().default(true).describe('Fit the random-effects model'),
  session_id: SessionIdSchema.optional().describe('Session slot to store the result in'),
}).strict();

/**
 * get_network_graph tool input schema
 */
export const GetNetworkGraphToolInputSchema = z.object({
  session_id: SessionIdSchema.optional(),
}).strict();

const ModelQueryShape = {
  random: z.boolean().optional().default(true).describe('Random-effects (true) or common-effect (false) estimates'),
  session_id: SessionIdSchema.optional(),
};

export const GetLeagueTableToolInputSchema = z.object(ModelQueryShape).strict();

export const GetRankingToolInputSchema = z.object(ModelQueryShape).strict();

export const GetForestDataToolInputSchema = z.object({
  reference: z.string().nullable().optional().describe('Comparator for every other treatment; empty means none'),
  ...ModelQueryShape,
}).strict();

export type ArmConversionInput =
  | { outcome_type: 'binary'; data: BinaryArm[]; sm?: SummaryMeasure }
  | { outcome_type: 'continuous'; data: ContinuousArm[]; sm?: SummaryMeasure };

function parseRows<T>(
  rows: Array<Record<string, unknown>>,
  schema: z.ZodType<T>,
  ctx: z.RefinementCtx
): T[] {
  const parsed: T[] = [];
  rows.forEach((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
      return;
    }
    for (const issue of result.error.issues) {
      ctx.addIssue({ ...issue, path: ['data', index, ...issue.path] });
    }
  });
  return parsed;
}

/**
 * pairwise_to_netmeta tool input schema. Rows are checked against the arm
 * shape of the chosen outcome type.
 */
export const PairwiseToNetmetaToolInputSchema = z.object({
  data: z.array(z.record(z.unknown())).min(1).describe('Arm-level records'),
  outcome_type: OutcomeTypeSchema.optional().default('binary'),
  sm: SummaryMeasureSchema.optional(),
}).strict().transform((input, ctx): ArmConversionInput => {
  const allowed = CONVERSION_MEASURES[input.outcome_type];
  if (input.sm !== undefined && !allowed.includes(input.sm)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['sm'],
      message: `sm must be one of ${allowed.join(', ')} for ${input.outcome_type} outcomes`,
    });
  }
  if (input.outcome_type === 'binary') {
    return { outcome_type: 'binary', data: parseRows(input.data, BinaryArmSchema, ctx), sm: input.sm };
  }
  return { outcome_type: 'continuous', data: parseRows(input.data, ContinuousArmSchema, ctx), sm: input.sm };
});

/**
 * csv_to_json tool input schema. `data_format` stays a free string so an
 * unknown format is answered with the list of valid ones.
 */
export const CsvToJsonToolInputSchema = z.object({
  csv_content: z.string().describe('CSV text with a header row'),
  data_format: z.string().optional().default('pairwise'),
}).strict();

/** All tool input schemas */
export const TOOL_INPUT_SCHEMAS = {
  runnetmeta: RunNetmetaToolInputSchema,
  get_network_graph: GetNetworkGraphToolInputSchema,
  get_league_table: GetLeagueTableToolInputSchema,
  get_ranking: GetRankingToolInputSchema,
  get_forest_data: GetForestDataToolInputSchema,
  pairwise_to_netmeta: PairwiseToNetmetaToolInputSchema,
  csv_to_json: CsvToJsonToolInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export type RunNetmetaToolInput = z.output<typeof RunNetmetaToolInputSchema>;
export type GetNetworkGraphToolInput = z.output<typeof GetNetworkGraphToolInputSchema>;
export type GetLeagueTableToolInput = z.output<typeof GetLeagueTableToolInputSchema>;
export type GetRankingToolInput = z.output<typeof GetRankingToolInputSchema>;
export type GetForestDataToolInput = z.output<typeof GetForestDataToolInputSchema>;
export type PairwiseToNetmetaToolInput = z.output<typeof PairwiseToNetmetaToolInputSchema>;
export type CsvToJsonToolInput = z.output<typeof CsvToJsonToolInputSchema>;

export function isToolName(value: string): value is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, value);
}

// ============================================================================
// JSON SCHEMA REPRESENTATIONS
// ============================================================================

export type JSONSchemaProperty = {
  type: string;
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
  minimum?: number;
  exclusiveMinimum?: number;
  minLength?: number;
  minItems?: number;
  pattern?: string;
  default?: unknown;
};

/** Object schema advertised as a tool's `inputSchema` */
export type JSONSchema = {
  $schema?: string;
  title?: string;
  description?: string;
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
  additionalProperties?: boolean;
};

const sessionIdProperty: JSONSchemaProperty = {
  type: 'string',
  pattern: SESSION_ID_PATTERN.source,
  description: 'Session slot (omit for the shared default slot)',
};

const randomProperty: JSONSchemaProperty = {
  type: 'boolean',
  description: 'Use random-effects (true) or common-effect (false) estimates',
  default: true,
};

const pairwiseItem: JSONSchemaProperty = {
  type: 'object',
  properties: {
    study: { type: 'string', description: 'Study identifier', minLength: 1 },
    treat1: { type: 'string', description: 'First treatment', minLength: 1 },
    treat2: { type: 'string', description: 'Second treatment', minLength: 1 },
    TE: { type: 'number', description: 'Treatment effect (log scale for ratio measures)' },
    seTE: { type: 'number', description: 'Standard error of TE', exclusiveMinimum: 0 },
  },
  required: ['study', 'treat1', 'treat2', 'TE', 'seTE'],
};

const armItem: JSONSchemaProperty = {
  type: 'object',
  description: 'Binary arms need events and n; continuous arms need mean, sd and n',
  properties: {
    study: { type: 'string', description: 'Study identifier', minLength: 1 },
    treatment: { type: 'string', description: 'Treatment in this arm', minLength: 1 },
    events: { type: 'integer', description: 'Number of events (binary)', minimum: 0 },
    n: { type: 'integer', description: 'Arm sample size', minimum: 1 },
    mean: { type: 'number', description: 'Mean outcome (continuous)' },
    sd: { type: 'number', description: 'Standard deviation (continuous)', exclusiveMinimum: 0 },
  },
  required: ['study', 'treatment', 'n'],
};

export const JSON_SCHEMAS: Record<ToolName, JSONSchema> = {
  runnetmeta: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'RunNetmetaToolInput',
    type: 'object',
    properties: {
      data: { type: 'array', items: pairwiseItem, minItems: 1, description: 'Pairwise contrasts' },
      sm: { type: 'string', enum: [...SUMMARY_MEASURES], description: 'Summary measure', default: 'OR' },
      reference: { type: 'string', description: 'Reference treatment (optional, empty means none)' },
      comb_fixed: { type: 'boolean', description: 'Fit the common-effect model', default: true },
      comb_random: { type: 'boolean', description: 'Fit the random-effects model', default: true },
      session_id: sessionIdProperty,
    },
    required: ['data'],
    additionalProperties: false,
  },
  get_network_graph: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'GetNetworkGraphToolInput',
    type: 'object',
    properties: { session_id: sessionIdProperty },
    additionalProperties: false,
  },
  get_league_table: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'GetLeagueTableToolInput',
    type: 'object',
    properties: { random: randomProperty, session_id: sessionIdProperty },
    additionalProperties: false,
  },
  get_ranking: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'GetRankingToolInput',
    type: 'object',
    properties: { random: randomProperty, session_id: sessionIdProperty },
    additionalProperties: false,
  },
  get_forest_data: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'GetForestDataToolInput',
    type: 'object',
    properties: {
      reference: { type: 'string', description: 'Comparator treatment (defaults to the analysis reference)' },
      random: randomProperty,
      session_id: sessionIdProperty,
    },
    additionalProperties: false,
  },
  pairwise_to_netmeta: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'PairwiseToNetmetaToolInput',
    type: 'object',
    properties: {
      data: { type: 'array', items: armItem, minItems: 1, description: 'Arm-level records' },
      outcome_type: { type: 'string', enum: ['binary', 'continuous'], default: 'binary' },
      sm: {
        type: 'string',
        enum: [...SUMMARY_MEASURES],
        description: 'binary: OR (default), RR, RD; continuous: MD (default), SMD',
      },
    },
    required: ['data'],
    additionalProperties: false,
  },
  csv_to_json: {
    $schema: JSON_SCHEMA_DRAFT,
    title: 'CsvToJsonToolInput',
    type: 'object',
    properties: {
      csv_content: { type: 'string', description: 'CSV text with a header row' },
      data_format: {
        type: 'string',
        description: `One of: ${DATA_FORMATS.join(', ')}`,
        default: 'pairwise',
      },
    },
    required: ['csv_content'],
    additionalProperties: false,
  },
};

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export interface ToolValidationIssue {
  path: string;
  message: string;
  code: string;
}

export type ValidationResult<T = unknown> =
  | { valid: true; errors: []; data: T }
  | { valid: false; errors: ToolValidationIssue[] };

/**
 * Validate against one schema, keeping its output type.
 */
export function validateWith<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, errors: [], data: result.data };
  }
  const errors: ToolValidationIssue[] = result.error.errors.map((err) => ({
    path: err.path.join('.') || '/',
    message: err.message,
    code: err.code,
  }));
  return { valid: false, errors };
}

/**
 * Validate tool input against schema
 */
export function validateToolInput(toolName: string, input: unknown): ValidationResult {
  if (!isToolName(toolName)) {
    return {
      valid: false,
      errors: [{
        path: '',
        message: `Unknown tool: ${toolName}`,
        code: 'unknown_tool',
      }],
    };
  }
  return validateWith(TOOL_INPUT_SCHEMAS[toolName], input);
}

export function listToolSchemas(): ToolName[] {
  return Object.keys(TOOL_INPUT_SCHEMAS).filter(isToolName);
}
