/**
 * CLI Context - Shared state and initialization for all CLI commands.
 *
 * Loads the catalog and reference tables once and shares them across
 * commands.
 */

import type { ReferenceData } from "../models/types";
import type { CookieRepository } from "../data/CookieRepository";
import { loadData } from "../data/loadData";
import type { ReferenceDataIssue } from "../data/referenceData";
import { mergeConfig, type OptimizerConfig, type OptimizerConfigOverrides } from "../config/optimizerConfig";
import type { OptimizerContext } from "../calculators/optimizer";

/**
 * Shared context for CLI operations.
 */
export interface CliContext extends OptimizerContext {
  readonly repo: CookieRepository;
  readonly reference: ReferenceData;
  readonly config: OptimizerConfig;
  /** Reference entries naming unknown cookies (non-strict loads only) */
  readonly issues: readonly ReferenceDataIssue[];
}

/**
 * Options for initializing the CLI context.
 */
export interface CliContextOptions {
  /** Directory holding the JSON tables (default: bundled data/) */
  dataDir?: string;
  /** Fail on reference entries naming unknown cookies */
  strict?: boolean;
  /** Override default configuration */
  config?: OptimizerConfigOverrides;
  /** Callback for progress updates */
  onProgress?: (message: string) => void;
}

/**
 * Initialize the CLI context by loading the data files.
 */
export async function initializeContext(options: CliContextOptions = {}): Promise<CliContext> {
  const { dataDir, strict, config: configOverrides, onProgress } = options;

  const { repo, reference, issues } = await loadData({ dataDir, strict, onProgress });

  return {
    repo,
    reference,
    issues,
    config: mergeConfig(configOverrides),
  };
}
