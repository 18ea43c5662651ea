/**
 * @fileoverview Bridge facade
 *
 * One method per netmeta operation. Every method resolves to the engine's
 * JSON document or a structured `{ error }` object; only construction
 * (`NetmetaBridge.create`) throws, and only for fatals that must abort
 * startup (engine missing, package missing).
 */

import { SessionLockError } from '../core/errors.js';
import type { NetmetaConfig } from '../config/index.js';
import { REngine, type AnalysisEngine } from '../engine/engine.js';
import { ExecaProcessInvoker, type ProcessInvoker } from '../engine/invoker.js';
import { locateEngine, verifyEngine, verifyPackage } from '../engine/locator.js';
import { SessionStateStore } from '../engine/session_store.js';
import {
  CONVERSION_MEASURES,
  DEFAULT_CONVERSION_MEASURE,
  SESSION_LOCK_PREFIX,
  UNSUPPORTED_MEASURE_PREFIX,
  type AnalysisSummary,
  type ArmRecord,
  type EngineOperation,
  type EngineOutcome,
  type ForestData,
  type LeagueTable,
  type NetworkGraph,
  type OperationParams,
  type OperationResults,
  type OutcomeType,
  type PairwiseContrast,
  type Ranking,
  type SummaryMeasure,
} from '../engine/types.js';
import { logInfo } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// INPUT TYPES
// ============================================================================

interface SessionScoped {
  /** Omit for the default (shared) session slot */
  sessionId?: string;
}

export interface RunNetmetaInput extends SessionScoped {
  data: PairwiseContrast[];
  sm?: SummaryMeasure;
  reference?: string | null;
  combFixed?: boolean;
  combRandom?: boolean;
}

export interface ModelQuery extends SessionScoped {
  /** Random-effects estimates when true, common-effect when false */
  random?: boolean;
}

export interface ForestQuery extends ModelQuery {
  reference?: string | null;
}

export interface PairwiseConversionInput {
  data: ArmRecord[];
  outcomeType?: OutcomeType;
  sm?: SummaryMeasure;
}

export interface EngineInfo {
  enginePath: string | null;
  engineVersion: string | null;
  stateDir: string;
}

/** Surface the tool server depends on */
export interface NetmetaBackend {
  runNetmeta(input: RunNetmetaInput): Promise<EngineOutcome<AnalysisSummary>>;
  getNetworkGraph(query?: SessionScoped): Promise<EngineOutcome<NetworkGraph>>;
  getLeagueTable(query?: ModelQuery): Promise<EngineOutcome<LeagueTable>>;
  getRanking(query?: ModelQuery): Promise<EngineOutcome<Ranking>>;
  getForestData(query?: ForestQuery): Promise<EngineOutcome<ForestData>>;
  pairwiseToNetmeta(input: PairwiseConversionInput): Promise<EngineOutcome<PairwiseContrast[]>>;
  getEngineInfo(): EngineInfo;
}

export interface CreateBridgeOptions {
  invoker?: ProcessInvoker;
}

// ============================================================================
// BRIDGE
// ============================================================================

export class NetmetaBridge implements NetmetaBackend {
  private constructor(
    private readonly engine: AnalysisEngine,
    private readonly store: SessionStateStore,
    private readonly enginePath: string | null,
    private readonly engineVersion: string | null,
  ) {}

  /**
   * Locate R, verify it runs, and check every required package.
   * Throws EngineNotFoundError or PackageMissingError.
   */
  static async create(config: NetmetaConfig, options: CreateBridgeOptions = {}): Promise<NetmetaBridge> {
    const invoker = options.invoker ?? new ExecaProcessInvoker({ timeoutMs: config.timeoutMs });
    const enginePath = await locateEngine({ explicitPath: config.rPath });
    const version = await verifyEngine(enginePath, invoker);
    for (const packageName of config.requiredPackages) {
      await verifyPackage(enginePath, packageName, invoker);
    }
    logInfo('[bridge] engine ready', {
      path: enginePath,
      packages: config.requiredPackages,
      stateDir: config.stateDir,
    });
    const engine = new REngine({ executable: enginePath, invoker });
    return new NetmetaBridge(engine, new SessionStateStore(config.stateDir), enginePath, version);
  }

  static fromEngine(engine: AnalysisEngine, store: SessionStateStore): NetmetaBridge {
    return new NetmetaBridge(engine, store, null, null);
  }

  getEngineInfo(): EngineInfo {
    return {
      enginePath: this.enginePath,
      engineVersion: this.engineVersion,
      stateDir: this.store.stateDir,
    };
  }

  runNetmeta(input: RunNetmetaInput): Promise<EngineOutcome<AnalysisSummary>> {
    return this.inSession(input.sessionId, 'run_analysis', {
      data: input.data,
      sm: input.sm ?? 'OR',
      reference: input.reference ?? null,
      comb_fixed: input.combFixed ?? true,
      comb_random: input.combRandom ?? true,
    });
  }

  getNetworkGraph(query: SessionScoped = {}): Promise<EngineOutcome<NetworkGraph>> {
    return this.inSession(query.sessionId, 'network_graph', {});
  }

  getLeagueTable(query: ModelQuery = {}): Promise<EngineOutcome<LeagueTable>> {
    return this.inSession(query.sessionId, 'league_table', { random: query.random ?? true });
  }

  getRanking(query: ModelQuery = {}): Promise<EngineOutcome<Ranking>> {
    return this.inSession(query.sessionId, 'ranking', { random: query.random ?? true });
  }

  getForestData(query: ForestQuery = {}): Promise<EngineOutcome<ForestData>> {
    return this.inSession(query.sessionId, 'forest_data', {
      reference: query.reference ?? null,
      random: query.random ?? true,
    });
  }

  /**
   * Arm-level records to within-study contrasts. Independent of any session.
   */
  async pairwiseToNetmeta(input: PairwiseConversionInput): Promise<EngineOutcome<PairwiseContrast[]>> {
    const outcomeType = input.outcomeType ?? 'binary';
    const sm = input.sm ?? DEFAULT_CONVERSION_MEASURE[outcomeType];
    const allowed = CONVERSION_MEASURES[outcomeType];
    if (!allowed.includes(sm)) {
      return {
        error: `${UNSUPPORTED_MEASURE_PREFIX}'${sm}' is not supported for ${outcomeType} outcomes (use one of: ${allowed.join(', ')})`,
      };
    }
    return this.engine.execute(
      'arm_to_pairwise',
      { data: input.data, outcome_type: outcomeType, sm },
      { statePath: this.store.pathFor() },
    );
  }

  private async inSession<Op extends EngineOperation>(
    sessionId: string | undefined,
    operation: Op,
    params: OperationParams[Op],
  ): Promise<EngineOutcome<OperationResults[Op]>> {
    try {
      return await this.store.withLock(sessionId, (statePath) =>
        this.engine.execute(operation, params, { statePath }),
      );
    } catch (error) {
      if (error instanceof SessionLockError) {
        return { error: SESSION_LOCK_PREFIX + error.message };
      }
      // ValidationError for a malformed session id
      return { error: getErrorMessage(error) };
    }
  }
}
