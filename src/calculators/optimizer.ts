/**
 * Optimizer entry points
 *
 * One synchronous call per request: validate, generate candidates,
 * score them, rank. Counter mode analyzes the enemy first and splits
 * generation between a recommendation-biased pool and the full pool.
 * Guild battle mode searches the cookies that score best against a
 * boss and ranks by boss score.
 */

import type { Cookie, GuildBoss, ReferenceData } from "../models/types";
import {
  TEAM_SIZE,
  type BudgetReport,
  type CounterRecommendation,
  type GenerationResult,
  type RankedTeam,
  type ScoredTeam,
  type SearchBudget,
  type StrategyName,
  type Team,
  type ThreatProfile,
  type TreasureRecommendation,
  type Weakness,
} from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import type { CookieRepository } from "../data/CookieRepository";
import { remainingPool } from "./combinations";
import {
  analyzeThreat,
  buildBiasedPool,
  combinedScore,
  counterScore,
  identifyWeaknesses,
  recommendCounterTreasures,
  recommendCounters,
} from "./counter";
import { generateTeams, type GeneratorContext } from "./generators";
import { bossStrategy, keyMembers, rankForBoss, scoreTeamForBoss, type BossCandidate } from "./guildBattle";
import { createPowerLookup } from "./power";
import { createRng, randomSeed } from "./random";
import { rankTeams } from "./ranking";
import { scoreCeiling, scoreTeam, synergyTotal } from "./scoring";
import { remainingBudget, ScoreCache, teamKey } from "./searchUtils";
import { recommendTreasures } from "./treasures";
import {
  validateBoss,
  validateEnemy,
  validateRequest,
  type CounterRequest,
  type GuildBattleRequest,
  type OptimizeRequest,
  type ValidatedRequest,
} from "./validation";

/**
 * Read-only data shared by every request
 */
export interface OptimizerContext {
  repo: CookieRepository;
  reference: ReferenceData;
  config?: OptimizerConfig;
}

export interface OptimizationResult {
  strategy: StrategyName;
  /** Seed actually used; pass it back to reproduce the run */
  seed: number;
  teams: RankedTeam[];
  /** False when a budget stopped the search early */
  complete: boolean;
  /** Teams scored: the search's own count, or distinct candidates scored */
  evaluated: number;
  /** Candidate teams the generator returned */
  candidates: number;
  budget?: BudgetReport;
  /** Highest total reachable with the enabled sub-scores */
  ceiling: number;
  poolSize: number;
  /** Treasure suggestions for the best team when none were selected */
  recommendedTreasures: TreasureRecommendation[];
}

export interface CounterOptimizationResult extends OptimizationResult {
  enemy: Cookie[];
  profile: ThreatProfile;
  weaknesses: Weakness[];
  recommendation: CounterRecommendation;
}

export interface GuildBattleResult extends OptimizationResult {
  boss: GuildBoss;
  /** Cookies the search ran over, best boss score first; pinned members excluded */
  bossPool: BossCandidate[];
}

// ─────────────────────────────────────────────────────────────
// Shared Setup
// ─────────────────────────────────────────────────────────────

interface RequestSession {
  validated: ValidatedRequest;
  config: OptimizerConfig;
  seed: number;
  scorer: ScoreCache;
  generator: GeneratorContext;
}

function startSession(
  request: OptimizeRequest,
  context: OptimizerContext
): RequestSession {
  const config = context.config ?? DEFAULT_CONFIG;
  const validated = validateRequest(request, context.repo, context.reference.treasures, config);
  const seed = validated.seed ?? randomSeed();
  const powerOf = createPowerLookup(validated.overrides, config);
  const synergy = validated.useSynergy ? context.reference : undefined;

  const scorer = new ScoreCache((team) =>
    scoreTeam(team, { treasures: validated.treasures, synergy, config, powerOf })
  );

  const generator: GeneratorContext = {
    pool: validated.pool,
    required: validated.required,
    count: validated.count,
    rng: createRng(seed),
    fitness: (team) => scorer.getOrScore(team).total,
    powerOf,
    config,
    synergy: context.reference,
    populationSize: validated.populationSize,
    generations: validated.generations,
    budget: validated.budget,
    onProgress: request.onProgress,
    now: request.now,
  };

  return { validated, config, seed, scorer, generator };
}

function toScored(team: Team, scorer: ScoreCache): ScoredTeam {
  return { members: team, key: teamKey(team), score: scorer.getOrScore(team) };
}

function baseResult(
  session: RequestSession,
  generation: GenerationResult,
  teams: RankedTeam[],
  recommendedTreasures: TreasureRecommendation[]
): OptimizationResult {
  const { validated, config } = session;
  return {
    strategy: validated.strategy,
    seed: session.seed,
    teams,
    complete: generation.complete,
    evaluated: generation.evaluated > 0 ? generation.evaluated : session.scorer.evaluated,
    candidates: generation.teams.length,
    budget: generation.budget,
    ceiling: scoreCeiling(
      { treasures: validated.treasures.length > 0, synergy: validated.useSynergy },
      config
    ),
    poolSize: validated.pool.length,
    recommendedTreasures,
  };
}

// ─────────────────────────────────────────────────────────────
// Team Optimization
// ─────────────────────────────────────────────────────────────

/**
 * Generate, score and rank teams for a request.
 *
 * @throws InvalidStrategyError, InvalidParameterError, UnknownEntityError,
 *   InfeasibleConstraintError or ExhaustiveGuardError for a bad request
 *
 * @example
 * ```ts
 * const result = optimizeTeams(
 *   { strategy: "genetic", required: ["Lemon"], seed: 7, topN: 3 },
 *   { repo, reference }
 * );
 * result.teams[0].score.total;
 * ```
 */
export function optimizeTeams(request: OptimizeRequest, context: OptimizerContext): OptimizationResult {
  const session = startSession(request, context);
  const { validated, config, scorer } = session;

  const generation = generateTeams(validated.strategy, session.generator);
  request.onProgress?.({
    phase: "ranking",
    evaluated: scorer.evaluated,
    message: `Ranking ${generation.teams.length} candidate teams`,
  });

  const scored = generation.teams.map((team) => toScored(team, scorer));
  const teams = rankTeams(scored, validated.topN, {
    required: validated.required.map((c) => c.name),
    elements: context.reference.elements,
    overrides: validated.overrides,
    config,
  });

  const best = teams[0];
  const suggestions =
    best && validated.treasures.length === 0
      ? recommendTreasures(best.members, context.reference.treasures, config.limits.maxTreasures, config)
      : [];

  return baseResult(session, generation, teams, suggestions);
}

// ─────────────────────────────────────────────────────────────
// Counter Optimization
// ─────────────────────────────────────────────────────────────

/**
 * Join the biased and full-pool runs into one result. A budget stop in
 * either run, or before the second one started, is reported against the
 * caller's limit with the elapsed time of the whole request.
 */
function mergeGenerations(
  results: readonly GenerationResult[],
  budget: SearchBudget,
  skipped: BudgetReport | undefined,
  elapsedMs: number
): GenerationResult {
  const stop = results.find((r) => r.budget)?.budget ?? skipped;
  const limit = stop?.reason === "time" ? budget.maxTimeMs : budget.maxCombinations;
  return {
    teams: results.flatMap((r) => r.teams),
    complete: skipped === undefined && results.every((r) => r.complete),
    evaluated: results.reduce((sum, r) => sum + r.evaluated, 0),
    budget: stop && { reason: stop.reason, limit: limit ?? stop.limit, elapsedMs },
  };
}

/**
 * Generate counter teams against an enemy composition.
 *
 * Part of the candidate budget (`biasedFraction`) is generated from
 * the recommended cookies, topped up with high-tier ones; the rest
 * from the full pool, with whatever budget the first run left.
 * Exhaustive search enumerates the biased pool only. Teams are ranked
 * by the combined counter and team score.
 */
export function optimizeCounterTeams(
  request: CounterRequest,
  context: OptimizerContext
): CounterOptimizationResult {
  const clock = request.now ?? Date.now;
  const startedAt = clock();
  const enemy = validateEnemy(context.repo, request.enemy);
  const session = startSession(request, context);
  const { validated, config, scorer, generator } = session;

  const profile = analyzeThreat(enemy, context.reference, config);
  const weaknesses = identifyWeaknesses(profile);
  const recommendation = recommendCounters(profile, validated.pool, context.reference, config);

  const biasedPool = buildBiasedPool(recommendation, validated.pool, config);
  const biasedUsable =
    remainingPool(biasedPool, validated.required).length >= TEAM_SIZE - validated.required.length;

  const exhaustive = validated.strategy === "exhaustive";
  const biasedCount = !biasedUsable
    ? 0
    : exhaustive
      ? validated.count
      : Math.ceil(validated.count * config.counter.biasedFraction);

  request.onProgress?.({
    phase: "counter",
    evaluated: 0,
    message: `Recommended ${recommendation.recommended.length} counters; biased pool of ${biasedPool.length}`,
  });

  const runs: GenerationResult[] = [];
  if (biasedCount > 0) {
    runs.push(
      generateTeams(validated.strategy, { ...generator, pool: biasedPool, count: biasedCount })
    );
  }

  let skipped: BudgetReport | undefined;
  if (biasedCount < validated.count && !(exhaustive && biasedCount > 0)) {
    const spent = runs.reduce((sum, r) => sum + r.evaluated, 0);
    const left = remainingBudget(validated.budget, spent, clock() - startedAt);
    if (left.exhausted) {
      skipped = left.report;
    } else {
      runs.push(
        generateTeams(validated.strategy, {
          ...generator,
          count: validated.count - biasedCount,
          budget: left.remaining,
        })
      );
    }
  }
  const generation = mergeGenerations(runs, validated.budget, skipped, clock() - startedAt);

  const scored: ScoredTeam[] = generation.teams.map((team) => {
    const base = toScored(team, scorer);
    const counter = counterScore(team, profile, recommendation, base.score, config);
    return {
      ...base,
      counter: {
        counterScore: counter,
        combinedScore: combinedScore(counter, base.score.total, config),
        recommendedTreasures: recommendCounterTreasures(
          profile,
          team,
          context.reference.treasures,
          config.limits.maxTreasures,
          config
        ),
      },
    };
  });

  const teams = rankTeams(scored, validated.topN, {
    required: validated.required.map((c) => c.name),
    elements: context.reference.elements,
    overrides: validated.overrides,
    config,
  });

  return {
    ...baseResult(session, generation, teams, teams[0]?.counter?.recommendedTreasures.slice() ?? []),
    enemy,
    profile,
    weaknesses,
    recommendation,
  };
}

// ─────────────────────────────────────────────────────────────
// Guild Battle
// ─────────────────────────────────────────────────────────────

/**
 * Generate teams against a guild boss.
 *
 * Free cookies are ranked by boss score and the top `poolSize` of
 * them, with the pinned members, become the generator's pool. The
 * generator optimizes the boss team score, which also ranks the result.
 *
 * @throws UnknownEntityError for an unknown boss, plus the errors of
 *   {@link optimizeTeams}
 *
 * @example
 * ```ts
 * const result = optimizeGuildBattle(
 *   { boss: "Living Abyss", strategy: "exhaustive", seed: 3 },
 *   { repo, reference }
 * );
 * result.teams[0].boss?.strategy;
 * ```
 */
export function optimizeGuildBattle(
  request: GuildBattleRequest,
  context: OptimizerContext
): GuildBattleResult {
  const boss = validateBoss(context.reference.bosses, request.boss);
  const session = startSession(request, context);
  const { validated, config, scorer, generator } = session;

  const scoring = { powerOf: generator.powerOf, config };
  const ranked = rankForBoss(remainingPool(validated.pool, validated.required), boss, context.reference, scoring);
  const free = TEAM_SIZE - validated.required.length;
  const bossPool = ranked.slice(0, Math.max(config.guildBattle.poolSize, free));
  const memberScores = new Map(
    [...ranked, ...rankForBoss(validated.required, boss, context.reference, scoring)].map((c) => [
      c.cookie.name,
      c.score,
    ])
  );
  const memberScore = (cookie: Cookie): number => memberScores.get(cookie.name) ?? 0;

  const bossScore = (team: Team): number =>
    scoreTeamForBoss(team, boss, memberScore, synergyTotal(scorer.getOrScore(team)), context.reference, config);

  request.onProgress?.({
    phase: "boss",
    evaluated: 0,
    message: `Searching the top ${bossPool.length} cookies against ${boss.name}`,
  });

  const generation = generateTeams(validated.strategy, {
    ...generator,
    pool: [...validated.required, ...bossPool.map((c) => c.cookie)],
    fitness: bossScore,
  });

  const scored: ScoredTeam[] = generation.teams.map((team) => ({
    ...toScored(team, scorer),
    boss: {
      bossScore: bossScore(team),
      keyMembers: keyMembers(team, boss),
      strategy: bossStrategy(team, boss),
    },
  }));

  const teams = rankTeams(scored, validated.topN, {
    required: validated.required.map((c) => c.name),
    elements: context.reference.elements,
    overrides: validated.overrides,
    config,
  });

  const best = teams[0];
  const suggestions =
    best && validated.treasures.length === 0
      ? recommendTreasures(best.members, context.reference.treasures, config.limits.maxTreasures, config)
      : [];

  return {
    ...baseResult(session, generation, teams, suggestions),
    poolSize: bossPool.length + validated.required.length,
    boss,
    bossPool,
  };
}
