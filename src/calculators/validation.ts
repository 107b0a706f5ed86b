/**
 * Request validation
 *
 * Turns a caller's request into resolved cookies, treasures and
 * checked parameters, or fails with a specific error before any
 * generation starts.
 */

import { z } from "zod";
import type { Cookie, GuildBoss, InstanceOverride, InstanceOverrides, Rarity, Treasure } from "../models/types";
import { RARITIES } from "../models/types";
import {
  STRATEGIES,
  TEAM_SIZE,
  type ProgressCallback,
  type SearchBudget,
  type StrategyName,
} from "../models/teamTypes";
import type { OptimizerConfig } from "../config/optimizerConfig";
import type { CookieRepository } from "../data/CookieRepository";
import {
  InfeasibleConstraintError,
  InvalidParameterError,
  InvalidStrategyError,
  UnknownEntityError,
} from "../errors";
import { combineFilters, excludeAscended, excludeNames, maxRarity, remainingPool, type CookieFilter } from "./combinations";

// ─────────────────────────────────────────────────────────────
// Request Types
// ─────────────────────────────────────────────────────────────

/**
 * Team optimization request. Names are matched leniently
 * (case-insensitive, " Cookie" optional).
 */
export interface OptimizeRequest {
  strategy: string;
  count?: number;
  topN?: number;
  populationSize?: number;
  generations?: number;
  /** Omit for a fresh random seed; the seed used is echoed in the result */
  seed?: number;
  maxTimeMs?: number;
  maxCombinations?: number;
  required?: readonly string[];
  treasures?: readonly string[];
  overrides?: Readonly<Record<string, InstanceOverride>>;
  /** Include the element, group and combo sub-scores (default true) */
  useSynergy?: boolean;
  /** Restrict the pool to these names (default: whole catalog) */
  pool?: readonly string[];
  maxRarity?: Rarity;
  excludeAscended?: boolean;
  exclude?: readonly string[];
  onProgress?: ProgressCallback;
  /** Clock override for budget tracking */
  now?: () => number;
}

export interface CounterRequest extends OptimizeRequest {
  /** One to five enemy cookie names */
  enemy: readonly string[];
}

export interface GuildBattleRequest extends OptimizeRequest {
  /** Boss name, case-insensitive */
  boss: string;
}

export interface ValidatedRequest {
  strategy: StrategyName;
  count: number;
  topN: number;
  populationSize?: number;
  generations?: number;
  seed?: number;
  budget: SearchBudget;
  required: Cookie[];
  treasures: Treasure[];
  overrides: InstanceOverrides;
  useSynergy: boolean;
  pool: Cookie[];
}

// ─────────────────────────────────────────────────────────────
// Parameter Checks
// ─────────────────────────────────────────────────────────────

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGIES.some((s) => s === value);
}

export function validateStrategy(strategy: string): StrategyName {
  if (!isStrategyName(strategy)) {
    throw new InvalidStrategyError(strategy, STRATEGIES);
  }
  return strategy;
}

/**
 * Check an optional integer against inclusive bounds.
 */
export function checkInteger(
  parameter: string,
  value: number | undefined,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new InvalidParameterError(parameter, `${parameter} must be an integer ${range} (got ${value})`, {
      value,
      min,
      max,
    });
  }
  return value;
}

/**
 * Check the length of a name list against inclusive bounds.
 */
export function checkListSize(parameter: string, names: readonly string[], min: number, max: number): void {
  if (names.length < min || names.length > max) {
    const range = min === 0 ? `at most ${max}` : `between ${min} and ${max}`;
    throw new InvalidParameterError(parameter, `${parameter} must list ${range} names (got ${names.length})`, {
      value: names.length,
      min,
      max,
    });
  }
}

function assertNoDuplicates(parameter: string, names: readonly string[]): void {
  const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
  if (duplicates.length > 0) {
    throw new InvalidParameterError(parameter, `${parameter} lists a name more than once: ${duplicates.join(", ")}`, {
      names: duplicates,
    });
  }
}

/**
 * Resolve user-supplied names to catalog cookies, failing on any
 * unknown name and on repeats.
 */
export function resolveCookies(repo: CookieRepository, names: readonly string[], source: string): Cookie[] {
  const cookies = repo.resolve(names, source);
  assertNoDuplicates(source, cookies.map((c) => c.name));
  return cookies;
}

export function resolveTreasures(
  available: readonly Treasure[],
  names: readonly string[],
  config: OptimizerConfig
): Treasure[] {
  checkListSize("treasures", names, 0, config.limits.maxTreasures);
  const byName = new Map(available.map((t) => [t.name.toLowerCase(), t]));
  const missing = names.filter((name) => !byName.has(name.trim().toLowerCase()));
  if (missing.length > 0) {
    throw new UnknownEntityError("treasure", "treasures", missing);
  }
  const treasures = names
    .map((name) => byName.get(name.trim().toLowerCase()))
    .filter((t): t is Treasure => t !== undefined);
  assertNoDuplicates("treasures", treasures.map((t) => t.name));
  return treasures;
}

// ─────────────────────────────────────────────────────────────
// Instance Overrides
// ─────────────────────────────────────────────────────────────

const toppingSchema = z.object({
  type: z.string().min(1),
  level: z.number().int().min(0).max(12),
});

export const instanceOverrideSchema = z
  .object({
    level: z.number().int().min(1).max(70).optional(),
    skillLevel: z.number().int().min(1).max(60).optional(),
    stars: z.number().int().min(0).max(5).optional(),
    toppings: z.array(toppingSchema).max(5).optional(),
    toppingQuality: z.number().min(0).max(5).optional(),
  })
  .strict();

/**
 * Validate override values and re-key them by canonical cookie name.
 */
export function validateOverrides(
  repo: CookieRepository,
  overrides: Readonly<Record<string, InstanceOverride>>
): InstanceOverrides {
  const names = Object.keys(overrides);
  const cookies = resolveCookies(repo, names, "overrides");

  const result: Record<string, InstanceOverride> = {};
  names.forEach((name, i) => {
    const parsed = instanceOverrideSchema.safeParse(overrides[name]);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join(".") : "";
      throw new InvalidParameterError(
        `overrides.${cookies[i].name}${field ? `.${field}` : ""}`,
        `Invalid override for ${cookies[i].name}: ${issue?.message ?? parsed.error.message}`
      );
    }
    result[cookies[i].name] = parsed.data;
  });
  return result;
}

// ─────────────────────────────────────────────────────────────
// Pool
// ─────────────────────────────────────────────────────────────

/**
 * Candidate pool after the request's filters
 */
export function buildPool(repo: CookieRepository, request: OptimizeRequest): Cookie[] {
  const base = request.pool ? resolveCookies(repo, request.pool, "pool") : [...repo.getAll()];

  const filters: CookieFilter[] = [];
  if (request.maxRarity) {
    if (!RARITIES.includes(request.maxRarity)) {
      throw new InvalidParameterError("maxRarity", `Unknown rarity "${request.maxRarity}"`);
    }
    filters.push(maxRarity(request.maxRarity));
  }
  if (request.excludeAscended) filters.push(excludeAscended);
  if (request.exclude && request.exclude.length > 0) {
    filters.push(excludeNames(resolveCookies(repo, request.exclude, "exclude").map((c) => c.name)));
  }

  return filters.length > 0 ? base.filter(combineFilters(...filters)) : base;
}

/**
 * Fail when the pool cannot fill the free slots.
 */
export function assertFeasible(pool: readonly Cookie[], required: readonly Cookie[]): void {
  const free = remainingPool(pool, required).length;
  const needed = TEAM_SIZE - required.length;
  if (free < needed) {
    throw new InfeasibleConstraintError(
      `Pool has ${free} cookies available beyond the required members, but ${needed} are needed`,
      { available: free, needed }
    );
  }
}

// ─────────────────────────────────────────────────────────────
// Whole Request
// ─────────────────────────────────────────────────────────────

export function validateRequest(
  request: OptimizeRequest,
  repo: CookieRepository,
  treasures: readonly Treasure[],
  config: OptimizerConfig
): ValidatedRequest {
  const { limits } = config;
  const strategy = validateStrategy(request.strategy);

  const count = checkInteger("count", request.count, 1, limits.maxCount) ?? limits.defaultCount;
  const topN = checkInteger("topN", request.topN, 1, limits.maxTopN) ?? limits.defaultTopN;
  const populationSize = checkInteger("populationSize", request.populationSize, 2, limits.maxPopulation);
  const generations = checkInteger("generations", request.generations, 1, limits.maxGenerations);
  const seed = checkInteger("seed", request.seed, 0);
  const budget: SearchBudget = {
    maxTimeMs: checkInteger("maxTimeMs", request.maxTimeMs, 1),
    maxCombinations: checkInteger("maxCombinations", request.maxCombinations, 1),
  };

  const requiredNames = request.required ?? [];
  checkListSize("required", requiredNames, 0, TEAM_SIZE);
  const required = resolveCookies(repo, requiredNames, "required");

  const pool = buildPool(repo, request);
  assertFeasible(pool, required);

  return {
    strategy,
    count,
    topN,
    populationSize,
    generations,
    seed,
    budget,
    required,
    treasures: resolveTreasures(treasures, request.treasures ?? [], config),
    overrides: validateOverrides(repo, request.overrides ?? {}),
    useSynergy: request.useSynergy ?? true,
    pool,
  };
}

/**
 * Resolve and size-check an enemy composition (1-5 cookies).
 */
export function validateEnemy(repo: CookieRepository, names: readonly string[]): Cookie[] {
  checkListSize("enemy", names, 1, TEAM_SIZE);
  return resolveCookies(repo, names, "enemy");
}

/**
 * Look up a guild boss by name, ignoring case and surrounding space.
 */
export function validateBoss(bosses: readonly GuildBoss[], name: string): GuildBoss {
  const wanted = name.trim().toLowerCase();
  const boss = bosses.find((b) => b.name.toLowerCase() === wanted);
  if (!boss) {
    throw new UnknownEntityError("boss", "boss", [name]);
  }
  return boss;
}
