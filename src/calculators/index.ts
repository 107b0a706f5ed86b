// Request orchestration
export { optimizeTeams, optimizeCounterTeams, optimizeGuildBattle } from "./optimizer";
export type {
  OptimizerContext,
  OptimizationResult,
  CounterOptimizationResult,
  GuildBattleResult,
} from "./optimizer";

// Request validation
export {
  isStrategyName,
  validateStrategy,
  checkInteger,
  checkListSize,
  resolveCookies,
  resolveTreasures,
  instanceOverrideSchema,
  validateOverrides,
  buildPool,
  assertFeasible,
  validateRequest,
  validateEnemy,
  validateBoss,
} from "./validation";
export type { OptimizeRequest, CounterRequest, GuildBattleRequest, ValidatedRequest } from "./validation";

// Team types (from models)
export type {
  Team,
  ScoreBreakdown,
  TeamScore,
  ScoredTeam,
  RankedTeam,
  RankedMember,
  StrategyName,
  SearchBudget,
  BudgetReport,
  GenerationResult,
  ProgressUpdate,
  ProgressCallback,
  ThreatProfile,
  Weakness,
  CounterRecommendation,
  TreasureRecommendation,
  BossEvaluation,
} from "../models/teamTypes";

// Power
export { hasAdvancedStats, toppingRating, cookiePower, createPowerLookup } from "./power";

// Scoring
export {
  roleDiversityScore,
  positionCoverageScore,
  powerScore,
  bonusModifierScore,
  scoreCeiling,
  scoreTeam,
  synergyTotal,
} from "./scoring";
export type { ScoringOptions, CeilingOptions } from "./scoring";

// Synergy sub-scores
export {
  bestElementCount,
  elementSynergyScore,
  groupCounts,
  groupSynergyScore,
  comboMembers,
  comboActivates,
  activeCombos,
  specialComboScore,
  calculateSynergy,
  synergyAffinity,
} from "./synergy";
export type { SynergyBreakdown } from "./synergy";

// Role classification
export {
  isTank,
  isHealer,
  isDps,
  isSummoner,
  isFrontTank,
  roleDistribution,
  positionDistribution,
  teamArchetypes,
} from "./roles";
export type { TeamArchetype } from "./roles";

// Treasures
export {
  treasureTierPower,
  treasureSpecialBonus,
  treasureBonus,
  recommendTreasures,
} from "./treasures";

// Team combinations (lazy generators) and pool filters
export {
  combinations,
  teamCombinations,
  countCombinations,
  countTeamCombinations,
  remainingPool,
  maxRarity,
  excludeAscended,
  excludeNames,
  combineFilters,
} from "./combinations";
export type { CookieFilter } from "./combinations";

// Search utilities
export { teamKey, ScoreCache, BoundedPriorityQueue, BudgetTracker, remainingBudget } from "./searchUtils";
export type { BudgetRemainder } from "./searchUtils";
export { createRng, randomSeed } from "./random";
export type { Rng } from "./random";

// Generators
export {
  GENERATORS,
  generateTeams,
  generateRandom,
  generateGreedy,
  generateGenetic,
  generateExhaustive,
  generateSynergy,
  assertExhaustiveFeasible,
} from "./generators";
export type { Generator, GeneratorContext } from "./generators";

// Counter analysis
export {
  findMetaMatch,
  analyzeThreat,
  identifyWeaknesses,
  counterConfidence,
  recommendCounters,
  buildBiasedPool,
  counterScore,
  combinedScore,
  recommendCounterTreasures,
} from "./counter";

// Guild battle
export {
  cookieTraits,
  scoreCookieForBoss,
  rankForBoss,
  scoreTeamForBoss,
  keyMembers,
  bossStrategy,
} from "./guildBattle";
export type { BossScoringOptions, BossCandidate } from "./guildBattle";

// Ranking
export { rankingValue, rankTeams } from "./ranking";
export type { RankOptions } from "./ranking";
