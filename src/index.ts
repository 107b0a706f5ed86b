/**
 * Cookie team optimizer
 *
 * Library entry point. Load the data once with {@link loadData}, then
 * call {@link optimizeTeams}, {@link optimizeCounterTeams} or
 * {@link optimizeGuildBattle} per request.
 *
 * @example
 * ```ts
 * const { repo, reference } = await loadData();
 * const result = optimizeTeams({ strategy: "greedy", seed: 1 }, { repo, reference });
 * ```
 */

export * from "./calculators";

export type {
  Cookie,
  Rarity,
  Role,
  Position,
  Element,
  Topping,
  InstanceOverride,
  InstanceOverrides,
  Treasure,
  TreasureTier,
  SpecialCombo,
  SynergyData,
  ThreatEntry,
  MetaTeam,
  CounterCategories,
  BossTrait,
  GuildBoss,
  ReferenceData,
} from "./models/types";
export { RARITIES, ROLES, POSITIONS, ELEMENTS, TREASURE_TIERS, BOSS_TRAITS } from "./models/types";
export { TEAM_SIZE, STRATEGIES } from "./models/teamTypes";

export { DEFAULT_CONFIG, mergeConfig, rarityWeight } from "./config/optimizerConfig";
export type { OptimizerConfig, OptimizerConfigOverrides, GuildBattleScoring } from "./config/optimizerConfig";

export {
  OptimizerError,
  InvalidStrategyError,
  InvalidParameterError,
  UnknownEntityError,
  InfeasibleConstraintError,
  ExhaustiveGuardError,
  isOptimizerError,
} from "./errors";
export type { OptimizerErrorCode, ErrorDetails, EntityKind } from "./errors";

export { CookieRepository } from "./data/CookieRepository";
export { loadData, loadCatalog, DEFAULT_DATA_DIR, DATA_FILES } from "./data/loadData";
export type { LoadDataOptions, LoadedData } from "./data/loadData";
export { buildReferenceData, validateReferenceData, emptyReferenceData } from "./data/referenceData";
export type { ReferenceDataIssue } from "./data/referenceData";
