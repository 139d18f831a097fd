/**
 * Explorer configuration.
 *
 * Usage:
 *   const config = createExplorerConfig({ maxRuns: 10_000, pruneStrategy: 'path' });
 *
 *   const result = validateExplorerConfig(config);
 *   if (!result.valid) console.error(result.errors);
 *
 *   // Or from CHOICEWALK_* environment variables:
 *   const fromEnv = loadExplorerConfigFromEnv(process.env);
 */

/**
 * How the driver removes explored subtrees between runs.
 * - full: prune the whole tree before every run.
 * - path: collapse only the nodes the finished run walked, bottom-up.
 */
export type PruneStrategy = 'full' | 'path';

export interface ExplorerConfig {
  /** Maximum runs one explore() call may attempt. Unbounded when undefined. */
  maxRuns?: number;
  /** Throw ExhaustionLimitError when maxRuns stops an incomplete exploration. */
  failOnLimit: boolean;
  /** Keep a RunRecord (with the program's value) for every run. */
  recordRuns: boolean;
  pruneStrategy: PruneStrategy;
  /**
   * Events the default publisher's store keeps; older ones are evicted. 0
   * keeps none; subscribers still receive every event.
   */
  maxEvents: number;
}

export const DEFAULT_EXPLORER_CONFIG: ExplorerConfig = {
  maxRuns: undefined,
  failOnLimit: false,
  recordRuns: true,
  pruneStrategy: 'full',
  maxEvents: 1000,
};

/** Validation result for an explorer configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Create a config with defaults for anything not overridden. */
export function createExplorerConfig(overrides?: Partial<ExplorerConfig>): ExplorerConfig {
  return {
    maxRuns: overrides?.maxRuns ?? DEFAULT_EXPLORER_CONFIG.maxRuns,
    failOnLimit: overrides?.failOnLimit ?? DEFAULT_EXPLORER_CONFIG.failOnLimit,
    recordRuns: overrides?.recordRuns ?? DEFAULT_EXPLORER_CONFIG.recordRuns,
    pruneStrategy: overrides?.pruneStrategy ?? DEFAULT_EXPLORER_CONFIG.pruneStrategy,
    maxEvents: overrides?.maxEvents ?? DEFAULT_EXPLORER_CONFIG.maxEvents,
  };
}

export function validateExplorerConfig(config: ExplorerConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.maxRuns !== undefined && (!Number.isInteger(config.maxRuns) || config.maxRuns < 1)) {
    errors.push('maxRuns must be a positive integer');
  }
  if (config.pruneStrategy !== 'full' && config.pruneStrategy !== 'path') {
    errors.push(`pruneStrategy must be "full" or "path", got "${String(config.pruneStrategy)}"`);
  }
  if (!Number.isInteger(config.maxEvents) || config.maxEvents < 0) {
    errors.push('maxEvents must be a non-negative integer');
  }
  if (config.failOnLimit && config.maxRuns === undefined) {
    warnings.push('failOnLimit has no effect without maxRuns');
  }

  return { valid: errors.length === 0, errors, warnings };
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  return undefined;
}

function parsePruneStrategy(value: string | undefined): PruneStrategy | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'full' || normalized === 'path') return normalized;
  return undefined;
}

/**
 * Read CHOICEWALK_MAX_RUNS, CHOICEWALK_FAIL_ON_LIMIT, CHOICEWALK_RECORD_RUNS,
 * CHOICEWALK_PRUNE_STRATEGY and CHOICEWALK_MAX_EVENTS. Unset or unparseable
 * values fall back to the defaults; a non-numeric count becomes NaN and
 * fails validation.
 */
export function loadExplorerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExplorerConfig {
  const rawMaxRuns = env.CHOICEWALK_MAX_RUNS?.trim();
  const rawMaxEvents = env.CHOICEWALK_MAX_EVENTS?.trim();
  return createExplorerConfig({
    maxRuns: rawMaxRuns ? Number(rawMaxRuns) : undefined,
    maxEvents: rawMaxEvents ? Number(rawMaxEvents) : undefined,
    failOnLimit: parseBoolean(env.CHOICEWALK_FAIL_ON_LIMIT),
    recordRuns: parseBoolean(env.CHOICEWALK_RECORD_RUNS),
    pruneStrategy: parsePruneStrategy(env.CHOICEWALK_PRUNE_STRATEGY),
  });
}
