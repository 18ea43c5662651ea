/**
 * @fileoverview netmeta-mcp - network meta-analysis tools backed by R
 *
 * ```typescript
 * import { NetmetaBridge, resolveConfigFromEnv } from 'netmeta-mcp';
 *
 * const bridge = await NetmetaBridge.create(resolveConfigFromEnv());
 * await bridge.runNetmeta({ data, sm: 'MD' });
 * const ranking = await bridge.getRanking({ random: true });
 * ```
 *
 * @packageDocumentation
 */

export * from './core/errors.js';
export { type Result, Ok, Err, isOk, isErr, safeJsonParse } from './core/result.js';

export {
  DEFAULT_NETMETA_CONFIG,
  resolveConfigFromEnv,
  mergeConfig,
  parseTimeoutMs,
  type NetmetaConfig,
} from './config/index.js';

export * from './engine/types.js';
export { type AnalysisEngine, type ExecuteOptions, REngine, decodeEngineOutput } from './engine/engine.js';
export {
  type ProcessInvoker,
  type ProcessRunResult,
  ExecaProcessInvoker,
  R_VANILLA_ARGS,
  scriptArgs,
} from './engine/invoker.js';
export { locateEngine, verifyEngine, verifyPackage, engineExecutableName } from './engine/locator.js';
export { SCRIPT_BUILDERS, buildScript, toRString, type ScriptContext } from './engine/scripts.js';
export { SessionStateStore, DEFAULT_STATE_FILENAME, SESSION_ID_PATTERN } from './engine/session_store.js';

export {
  NetmetaBridge,
  type NetmetaBackend,
  type EngineInfo,
  type RunNetmetaInput,
  type ModelQuery,
  type ForestQuery,
  type PairwiseConversionInput,
} from './bridge/netmeta_bridge.js';

export { csvToJson, parseCsv, DATA_FORMATS, type DataFormat, type CsvConversionResult } from './data/csv.js';

export * from './mcp/index.js';

export { logInfo, logWarning, logError, logDebug, type LogLevel } from './telemetry/logger.js';
