/**
 * Shared option parsing for the search commands.
 */

import { InvalidArgumentError, type Command } from "commander";
import { z } from "zod";
import { RARITIES, type InstanceOverride, type Rarity } from "../models/types";
import type { ProgressCallback } from "../models/teamTypes";
import { STRATEGIES } from "../models/teamTypes";
import { InvalidParameterError } from "../errors";
import type { OptimizeRequest } from "../calculators/validation";
import { instanceOverrideSchema } from "../calculators/validation";
import { parseCommaList } from "./prompts";

/**
 * Options registered by {@link addSearchOptions}, as commander
 * hands them to an action.
 */
export interface SearchCliOptions {
  strategy: string;
  count?: number;
  top?: number;
  required?: string;
  treasures?: string;
  seed?: number;
  population?: number;
  generations?: number;
  maxTime?: number;
  maxCombinations?: number;
  synergy: boolean;
  maxRarity?: string;
  ascended: boolean;
  exclude?: string;
  overrides?: string;
  details: number;
}

/**
 * Options declared on the root program and read with optsWithGlobals().
 */
export interface GlobalCliOptions {
  dataDir?: string;
  strict?: boolean;
  quiet?: boolean;
}

// ─────────────────────────────────────────────────────────────
// Value Parsers
// ─────────────────────────────────────────────────────────────

/**
 * Commander argument parser for whole numbers.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`);
  }
  return parsed;
}

export function isRarity(value: string): value is Rarity {
  return RARITIES.some((r) => r === value);
}

const overridesSchema = z.record(z.string(), instanceOverrideSchema);

/**
 * Parse the `--overrides` JSON object (cookie name → override).
 *
 * @example
 * ```ts
 * parseOverrides('{"Lemon":{"level":60,"toppingQuality":4}}');
 * ```
 */
export function parseOverrides(json: string): Record<string, InstanceOverride> {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidParameterError("overrides", `--overrides is not valid JSON: ${reason}`);
  }

  const parsed = overridesSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `overrides.${issue.path.join(".")}` : "overrides";
    throw new InvalidParameterError(where, `Invalid ${where}: ${issue?.message ?? parsed.error.message}`);
  }
  return parsed.data;
}

// ─────────────────────────────────────────────────────────────
// Request Building
// ─────────────────────────────────────────────────────────────

/**
 * Progress printer for the non-interactive commands. Per-generation
 * updates are printed every tenth generation.
 */
export function createProgressLogger(quiet: boolean | undefined): ProgressCallback | undefined {
  if (quiet) return undefined;
  return (update) => {
    if (update.generation !== undefined && update.generation % 10 !== 0) return;
    console.log(update.message);
  };
}

export function toOptimizeRequest(options: SearchCliOptions, onProgress?: ProgressCallback): OptimizeRequest {
  let maxRarity: Rarity | undefined;
  if (options.maxRarity !== undefined) {
    if (!isRarity(options.maxRarity)) {
      throw new InvalidParameterError(
        "maxRarity",
        `Unknown rarity "${options.maxRarity}". Expected one of: ${RARITIES.join(", ")}`
      );
    }
    maxRarity = options.maxRarity;
  }

  return {
    strategy: options.strategy,
    count: options.count,
    topN: options.top,
    populationSize: options.population,
    generations: options.generations,
    seed: options.seed,
    maxTimeMs: options.maxTime,
    maxCombinations: options.maxCombinations,
    required: options.required ? parseCommaList(options.required) : undefined,
    treasures: options.treasures ? parseCommaList(options.treasures) : undefined,
    overrides: options.overrides ? parseOverrides(options.overrides) : undefined,
    useSynergy: options.synergy,
    maxRarity,
    excludeAscended: !options.ascended,
    exclude: options.exclude ? parseCommaList(options.exclude) : undefined,
    onProgress,
  };
}

/**
 * Register the options shared by `optimize` and `counter`.
 */
export function addSearchOptions(command: Command): Command {
  return command
    .option("-s, --strategy <name>", `Generation strategy: ${STRATEGIES.join(", ")}`, "genetic")
    .option("-c, --count <number>", "Candidate teams to generate", parseInteger)
    .option("-n, --top <number>", "Teams to return", parseInteger)
    .option("-r, --required <names>", "Cookies every team must include (comma-separated)")
    .option("-t, --treasures <names>", "Selected treasures, up to 3 (comma-separated)")
    .option("--seed <number>", "Random seed for reproducible runs", parseInteger)
    .option("-p, --population <number>", "Genetic population size", parseInteger)
    .option("-g, --generations <number>", "Genetic generations", parseInteger)
    .option("--max-time <ms>", "Stop the search after this many milliseconds", parseInteger)
    .option("--max-combinations <number>", "Stop the search after this many teams", parseInteger)
    .option("--no-synergy", "Disable element, group and combo scoring")
    .option("--max-rarity <rarity>", "Exclude cookies above this rarity")
    .option("--no-ascended", "Exclude ascended cookies")
    .option("-x, --exclude <names>", "Cookies to leave out of the pool (comma-separated)")
    .option("--overrides <json>", `Per-cookie stats as JSON, e.g. '{"Lemon":{"level":60,"toppingQuality":4}}'`)
    .option("-d, --details <number>", "Number of detailed teams to show", parseInteger, 3);
}
