/**
 * @fileoverview R script templates for each netmeta operation
 *
 * Every script follows the same shape:
 *
 *   package loads -> [session preamble] -> tryCatch(body) -> emit(result)
 *
 * Caller data never appears in the script text. The bridge writes it to a
 * parameters document and the script reads it back with jsonlite, so the
 * only interpolated literals are file paths this process generated.
 * `emit()` is the one statement that writes to stdout; the bridge treats
 * the whole captured stdout as a single JSON document.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';
import { NO_SESSION_MESSAGE, SESSION_READ_OPERATIONS, type EngineOperation } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

/** File locations a script is rendered against */
export interface ScriptContext {
  /** JSON parameters document written by the bridge */
  paramsPath: string;

  /** Session artifact (saveRDS/readRDS) */
  statePath: string;
}

export type ScriptBuilder = (context: ScriptContext) => string;

// ============================================================================
// LITERALS
// ============================================================================

/**
 * Encode a string as an R double-quoted literal.
 */
export function toRString(value: string): string {
  if (value.includes('\0')) {
    throw new ValidationError('R string literal', 'text without NUL characters', 'NUL');
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

const R_PACKAGE_NAME = /^[A-Za-z][A-Za-z0-9.]*$/;

export function assertRPackageName(name: string): void {
  if (!R_PACKAGE_NAME.test(name)) {
    throw new ValidationError('packageName', 'an R package name', JSON.stringify(name));
  }
}

// ============================================================================
// SHARED FRAGMENTS
// ============================================================================

function packageLoads(packages: string[]): string {
  for (const name of packages) assertRPackageName(name);
  const lines = packages.map((name) => `  library(${name})`).join('\n');
  return `suppressPackageStartupMessages({\n${lines}\n})`;
}

const EMIT_FUNCTION = `emit <- function(x) {
  cat(toJSON(x, auto_unbox = TRUE, digits = NA, null = "null", na = "null"))
}`;

function contextBindings(context: ScriptContext): string {
  return [
    `params_file <- ${toRString(context.paramsPath)}`,
    `state_file <- ${toRString(context.statePath)}`,
  ].join('\n');
}

/**
 * Stops the script before the body runs when no analysis has been stored.
 */
function sessionPreamble(): string {
  return `if (!file.exists(state_file)) {
  emit(list(error = ${toRString(NO_SESSION_MESSAGE)}))
  quit(save = "no", status = 0)
}`;
}

/** Picks TE/lower/upper matrices for the requested model */
const MODEL_MATRICES = `model_matrices <- function(fit, random) {
  suffix <- if (isTRUE(random)) "random" else "common"
  te <- fit[[paste0("TE.", suffix)]]
  if (is.null(te)) stop(sprintf("The stored result has no %s effects estimates", suffix))
  list(
    te = te,
    lower = fit[[paste0("lower.", suffix)]],
    upper = fit[[paste0("upper.", suffix)]]
  )
}`;

interface TemplateParts {
  packages: string[];
  operation: EngineOperation;
  helpers?: string[];
  body: string;
}

function renderScript(context: ScriptContext, parts: TemplateParts): string {
  const sections = [
    packageLoads(parts.packages),
    EMIT_FUNCTION,
    contextBindings(context),
  ];
  if (SESSION_READ_OPERATIONS.has(parts.operation)) {
    sections.push(sessionPreamble());
  }
  if (parts.helpers) {
    sections.push(...parts.helpers);
  }
  sections.push(`result <- tryCatch({
  params <- fromJSON(params_file, simplifyVector = TRUE)
${indent(parts.body, 2)}
}, error = function(e) {
  list(error = conditionMessage(e))
})`);
  sections.push('emit(result)');
  return `${sections.join('\n\n')}\n`;
}

function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? pad + line : line))
    .join('\n');
}

const NETMETA_PACKAGES = ['netmeta', 'jsonlite'];

// ============================================================================
// OPERATION BUILDERS
// ============================================================================

/**
 * Fit the network, persist it as the session artifact, and summarize it.
 */
export function buildRunAnalysisScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: NETMETA_PACKAGES,
    operation: 'run_analysis',
    helpers: [
      `pair_estimates <- function(trts, te, lower, upper) {
  n <- length(trts)
  out <- list()
  if (n < 2) return(out)
  for (i in 1:(n - 1)) {
    for (j in (i + 1):n) {
      out[[length(out) + 1]] <- list(
        treat1 = trts[i],
        treat2 = trts[j],
        effect = te[i, j],
        ci_lower = lower[i, j],
        ci_upper = upper[i, j]
      )
    }
  }
  out
}`,
    ],
    body: `data <- as.data.frame(params$data, stringsAsFactors = FALSE)
# netmeta rejects NULL here; "" means "no reference group"
reference <- if (is.null(params$reference)) "" else params$reference

fit <- netmeta(
  TE = data$TE,
  seTE = data$seTE,
  treat1 = as.character(data$treat1),
  treat2 = as.character(data$treat2),
  studlab = as.character(data$study),
  sm = params$sm,
  reference.group = reference,
  common = isTRUE(params$comb_fixed),
  random = isTRUE(params$comb_random)
)

# netmeta re-sorts treat1/treat2 within a comparison; keep the rows as given
fit$input_pairs <- data.frame(
  study = as.character(data$study),
  treat1 = as.character(data$treat1),
  treat2 = as.character(data$treat2),
  stringsAsFactors = FALSE
)

tmp_file <- paste0(state_file, ".tmp")
saveRDS(fit, tmp_file)
if (!file.rename(tmp_file, state_file)) {
  unlink(tmp_file)
  stop("Failed to persist netmeta result")
}

output <- list(
  treatments = as.list(fit$trts),
  n_studies = fit$k,
  n_comparisons = nrow(data),
  sm = fit$sm,
  reference = fit$reference.group
)

if (isTRUE(fit$random)) {
  output$heterogeneity <- list(
    tau_squared = fit$tau^2,
    tau = fit$tau,
    I_squared = fit$I2,
    Q = fit$Q,
    df_Q = fit$df.Q,
    pval_Q = fit$pval.Q
  )
}

if (isTRUE(fit$common)) {
  output$common_effects <- pair_estimates(fit$trts, fit$TE.common, fit$lower.common, fit$upper.common)
}

if (isTRUE(fit$random)) {
  output$random_effects <- pair_estimates(fit$trts, fit$TE.random, fit$lower.random, fit$upper.random)
}

output`,
  });
}

/**
 * Nodes are treatments; edges are distinct unordered pairs from the rows
 * stored at fit time, oriented as the caller first wrote them.
 */
export function buildNetworkGraphScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: NETMETA_PACKAGES,
    operation: 'network_graph',
    body: `fit <- readRDS(state_file)
trts <- fit$trts

nodes <- lapply(seq_along(trts), function(i) {
  list(id = i, label = trts[i])
})

pairs <- fit$input_pairs
from <- as.character(pairs$treat1)
to <- as.character(pairs$treat2)
studies <- as.character(pairs$study)
keys <- paste(pmin(from, to), pmax(from, to), sep = "\\u001f")

edges <- lapply(which(!duplicated(keys)), function(i) {
  list(
    from = from[i],
    to = to[i],
    n_studies = length(unique(studies[keys == keys[i]]))
  )
})

list(nodes = nodes, edges = edges)`,
  });
}

export function buildLeagueTableScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: NETMETA_PACKAGES,
    operation: 'league_table',
    helpers: [MODEL_MATRICES],
    body: `fit <- readRDS(state_file)
m <- model_matrices(fit, params$random)
n <- length(fit$trts)
rows <- function(x) lapply(seq_len(n), function(i) as.list(unname(x[i, ])))

list(
  treatments = as.list(fit$trts),
  effects = rows(m$te),
  ci_lower = rows(m$lower),
  ci_upper = rows(m$upper),
  sm = fit$sm
)`,
  });
}

/**
 * P-scores with small values undesirable, so a higher score is always better.
 * Ties keep the engine's treatment order.
 */
export function buildRankingScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: NETMETA_PACKAGES,
    operation: 'ranking',
    body: `fit <- readRDS(state_file)
ranking <- netrank(fit, small.values = "undesirable")
p_scores <- if (isTRUE(params$random)) ranking$Pscore.random else ranking$Pscore.common
if (is.null(p_scores)) stop("P-scores are not available for the requested model")

treatments <- names(p_scores)
scores <- as.numeric(p_scores)
ranks <- rank(-scores, ties.method = "first")
ord <- order(ranks)

list(
  treatments = as.list(treatments[ord]),
  p_scores = as.list(scores[ord]),
  ranks = as.list(as.integer(ranks[ord]))
)`,
  });
}

export function buildForestDataScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: NETMETA_PACKAGES,
    operation: 'forest_data',
    helpers: [
      MODEL_MATRICES,
      `is_blank <- function(x) {
  is.null(x) || length(x) == 0 || is.na(x[1]) || !nzchar(x[1])
}`,
    ],
    body: `fit <- readRDS(state_file)
ref <- params$reference
if (is_blank(ref)) ref <- fit$reference.group
if (is_blank(ref)) ref <- fit$trts[1]

ref_idx <- match(ref, fit$trts)
if (is.na(ref_idx)) stop(sprintf("Reference treatment '%s' not found in network", ref))

m <- model_matrices(fit, params$random)
others <- setdiff(seq_along(fit$trts), ref_idx)

comparisons <- lapply(others, function(k) {
  list(
    treatment = fit$trts[k],
    effect = m$te[k, ref_idx],
    ci_lower = m$lower[k, ref_idx],
    ci_upper = m$upper[k, ref_idx]
  )
})

list(reference = ref, sm = fit$sm, comparisons = comparisons)`,
  });
}

/**
 * All within-study arm pairs via meta::pairwise. Does not touch the session.
 */
export function buildArmToPairwiseScript(context: ScriptContext): string {
  return renderScript(context, {
    packages: ['netmeta', 'jsonlite', 'meta'],
    operation: 'arm_to_pairwise',
    body: `data <- as.data.frame(params$data, stringsAsFactors = FALSE)

pw <- if (identical(params$outcome_type, "binary")) {
  pairwise(
    treat = as.character(data$treatment),
    event = data$events,
    n = data$n,
    studlab = as.character(data$study),
    sm = params$sm
  )
} else {
  pairwise(
    treat = as.character(data$treatment),
    mean = data$mean,
    sd = data$sd,
    n = data$n,
    studlab = as.character(data$study),
    sm = params$sm
  )
}

lapply(seq_len(nrow(pw)), function(i) {
  list(
    study = as.character(pw$studlab[i]),
    treat1 = as.character(pw$treat1[i]),
    treat2 = as.character(pw$treat2[i]),
    TE = pw$TE[i],
    seTE = pw$seTE[i]
  )
})`,
  });
}

// ============================================================================
// REGISTRY
// ============================================================================

export const SCRIPT_BUILDERS: Record<EngineOperation, ScriptBuilder> = {
  run_analysis: buildRunAnalysisScript,
  network_graph: buildNetworkGraphScript,
  league_table: buildLeagueTableScript,
  ranking: buildRankingScript,
  forest_data: buildForestDataScript,
  arm_to_pairwise: buildArmToPairwiseScript,
};

export function buildScript(operation: EngineOperation, context: ScriptContext): string {
  return SCRIPT_BUILDERS[operation](context);
}

/**
 * Minimal script that prints TRUE/FALSE for whether a package is importable.
 */
export function buildPackageCheckScript(packageName: string): string {
  assertRPackageName(packageName);
  return `cat(requireNamespace(${toRString(packageName)}, quietly = TRUE))`;
}
