import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import {
  SCRIPT_BUILDERS,
  buildArmToPairwiseScript,
  buildForestDataScript,
  buildLeagueTableScript,
  buildNetworkGraphScript,
  buildPackageCheckScript,
  buildRankingScript,
  buildRunAnalysisScript,
  buildScript,
  toRString,
  type ScriptContext,
} from '../scripts.js';
import { SESSION_READ_OPERATIONS, type EngineOperation } from '../types.js';

const context: ScriptContext = {
  paramsPath: '/tmp/netmeta-abc/params.json',
  statePath: '/tmp/state/netmeta_state.rds',
};

const OPERATIONS: EngineOperation[] = [
  'run_analysis',
  'network_graph',
  'league_table',
  'ranking',
  'forest_data',
  'arm_to_pairwise',
];

const PREAMBLE = `if (!file.exists(state_file)) {
  emit(list(error = "No netmeta result available. Run runnetmeta first."))
  quit(save = "no", status = 0)
}`;

describe('toRString', () => {
  it('quotes plain text', () => {
    expect(toRString('/tmp/state.rds')).toBe('"/tmp/state.rds"');
  });

  it('escapes backslashes, quotes and control characters', () => {
    expect(toRString('C:\\Temp\\"x"\n\r\t')).toBe('"C:\\\\Temp\\\\\\"x\\"\\n\\r\\t"');
  });

  it('rejects NUL', () => {
    expect(() => toRString('a\0b')).toThrow(ValidationError);
  });
});

describe('script structure', () => {
  it('has a builder for every operation', () => {
    expect(Object.keys(SCRIPT_BUILDERS).sort()).toEqual([...OPERATIONS].sort());
  });

  it.each(OPERATIONS)('%s loads packages quietly and emits exactly once', (operation) => {
    const script = buildScript(operation, context);

    expect(script.startsWith('suppressPackageStartupMessages({\n  library(netmeta)\n  library(jsonlite)\n')).toBe(true);
    expect(script).toContain(
      'cat(toJSON(x, auto_unbox = TRUE, digits = NA, null = "null", na = "null"))'
    );
    expect(script.match(/^emit\(result\)$/gm)).toHaveLength(1);
    expect(script.endsWith('emit(result)\n')).toBe(true);
  });

  it.each(OPERATIONS)('%s reads caller data from the parameters document', (operation) => {
    const script = buildScript(operation, context);

    expect(script).toContain('params_file <- "/tmp/netmeta-abc/params.json"');
    expect(script).toContain('state_file <- "/tmp/state/netmeta_state.rds"');
    expect(script).toContain('params <- fromJSON(params_file, simplifyVector = TRUE)');
    expect(script).toContain('}, error = function(e) {\n  list(error = conditionMessage(e))\n})');
  });

  it.each(OPERATIONS)('%s has the session guard only when it reads the session', (operation) => {
    const script = buildScript(operation, context);
    expect(script.includes(PREAMBLE)).toBe(SESSION_READ_OPERATIONS.has(operation));
  });

  it('places the session guard before the operation body', () => {
    const script = buildLeagueTableScript(context);
    expect(script.indexOf(PREAMBLE)).toBeLessThan(script.indexOf('result <- tryCatch({'));
  });
});

describe('run analysis script', () => {
  const script = buildRunAnalysisScript(context);

  it('maps a missing reference to an empty string', () => {
    expect(script).toContain('reference <- if (is.null(params$reference)) "" else params$reference');
    expect(script).toContain('reference.group = reference,');
  });

  it('writes the fit atomically', () => {
    expect(script).toContain('tmp_file <- paste0(state_file, ".tmp")\n  saveRDS(fit, tmp_file)');
    expect(script).toContain('if (!file.rename(tmp_file, state_file)) {');
  });

  it('enumerates pairs in upper-triangular row-major order', () => {
    expect(script).toContain('for (i in 1:(n - 1)) {\n    for (j in (i + 1):n) {');
    expect(script).toContain('if (n < 2) return(out)');
  });

  it('stores the caller rows with the fit before saving it', () => {
    expect(script).toContain(
      'fit$input_pairs <- data.frame(\n    study = as.character(data$study),\n    treat1 = as.character(data$treat1),\n    treat2 = as.character(data$treat2),'
    );
    expect(script.indexOf('fit$input_pairs <-')).toBeLessThan(script.indexOf('saveRDS(fit, tmp_file)'));
  });

  it('reports heterogeneity only for a random-effects fit', () => {
    expect(script).toContain('if (isTRUE(fit$random)) {\n    output$heterogeneity <- list(');
    expect(script).toContain('tau_squared = fit$tau^2,');
    expect(script).toContain('I_squared = fit$I2,');
  });
});

describe('query scripts', () => {
  it('keys graph edges by unordered pair and counts distinct studies', () => {
    const script = buildNetworkGraphScript(context);
    expect(script).toContain('keys <- paste(pmin(from, to), pmax(from, to), sep = "\\u001f")');
    expect(script).toContain('which(!duplicated(keys))');
    expect(script).toContain('n_studies = length(unique(studies[keys == keys[i]]))');
  });

  it('orients graph edges from the stored caller rows', () => {
    const script = buildNetworkGraphScript(context);
    expect(script).toContain(
      '  pairs <- fit$input_pairs\n  from <- as.character(pairs$treat1)\n  to <- as.character(pairs$treat2)\n  studies <- as.character(pairs$study)'
    );
    expect(script).not.toContain('fit$treat1');
    expect(script).not.toContain('fit$studlab');
  });

  it('selects league table matrices by model', () => {
    const script = buildLeagueTableScript(context);
    expect(script).toContain('suffix <- if (isTRUE(random)) "random" else "common"');
    expect(script).toContain('m <- model_matrices(fit, params$random)');
  });

  it('ranks by P-score with small values undesirable and first-come ties', () => {
    const script = buildRankingScript(context);
    expect(script).toContain('netrank(fit, small.values = "undesirable")');
    expect(script).toContain('ranks <- rank(-scores, ties.method = "first")');
  });

  it('resolves the forest reference in priority order', () => {
    const script = buildForestDataScript(context);
    expect(script).toContain(
      'ref <- params$reference\n  if (is_blank(ref)) ref <- fit$reference.group\n  if (is_blank(ref)) ref <- fit$trts[1]'
    );
    expect(script).toContain(`stop(sprintf("Reference treatment '%s' not found in network", ref))`);
  });

  it('loads meta for arm conversion and never touches the session', () => {
    const script = buildArmToPairwiseScript(context);
    expect(script).toContain('  library(meta)\n})');
    expect(script).not.toContain('readRDS');
    expect(script).not.toContain('saveRDS');
    expect(script).toContain('event = data$events,');
    expect(script).toContain('mean = data$mean,');
  });
});

describe('buildPackageCheckScript', () => {
  it('prints the requireNamespace result', () => {
    expect(buildPackageCheckScript('netmeta')).toBe('cat(requireNamespace("netmeta", quietly = TRUE))');
  });

  it('rejects invalid package names', () => {
    expect(() => buildPackageCheckScript('net meta')).toThrow(ValidationError);
  });
});
