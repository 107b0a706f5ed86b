import type { Rarity, Role, TreasureTier } from "../models/types";

/**
 * Structural role classes. Catalog roles map onto these for
 * the bonus, counter and treasure rules.
 */
export interface RoleClasses {
  tank: Role[];
  healer: Role[];
  dps: Role[];
}

/**
 * Point tables for the base (non-synergy) sub-scores.
 */
export interface ScoreTables {
  /** Points indexed by distinct role count (index 0 unused) */
  roleDiversity: number[];
  /** Points indexed by distinct position count (index 0 unused) */
  positionCoverage: number[];
  powerCap: number;
  frontTankBonus: number;
  healerBonus: number;
  dpsBonus: number;
  bonusCap: number;
}

/**
 * Blend weights for instance-adjusted power. Each component is
 * normalized to its own maximum before weighting.
 */
export interface PowerWeights {
  rarity: number;
  skill: number;
  level: number;
  topping: number;
  /** Upper end of the 0-7 power scale */
  scale: number;
  maxSkillLevel: number;
  maxLevel: number;
  maxToppingQuality: number;
  maxToppingLevel: number;
  maxToppings: number;
}

export interface TreasureScoring {
  tierPower: Record<TreasureTier, number>;
  universalBonus: number;
  tierPowerCap: number;
  atkDivisor: number;
  critDivisor: number;
  cooldownDivisor: number;
  revive: number;
  cleanse: number;
  enemyDebuff: number;
  sustain: number;
  summonWithSummoner: number;
  summonWithoutSummoner: number;
  specialCap: number;
  cap: number;
}

export interface SynergyScoring {
  elementTrio: number;
  elementPair: number;
  groupTrio: number;
  groupPair: number;
  groupCap: number;
  comboCap: number;
}

export interface GeneticDefaults {
  populationSize: number;
  generations: number;
  eliteFraction: number;
  minElites: number;
  mutationRate: number;
  /** Probability a parent is drawn from the elite slice */
  eliteParentBias: number;
}

export interface ExhaustiveGuard {
  /** Pools at or above this size trigger the guard */
  poolSizeThreshold: number;
  /** Minimum pinned members required once the guard triggers */
  minRequired: number;
}

export interface CounterSettings {
  highThreatCutoff: number;
  maxRecommendations: number;
  /** Share of candidates drawn from the recommendation-biased pool */
  biasedFraction: number;
  minBiasedPool: number;
  highTierRarities: Rarity[];
  counterWeight: number;
  teamWeight: number;
}

export interface GuildBattleScoring {
  baseScore: number;
  sTierBonus: number;
  aTierBonus: number;
  preferredTraitBonus: number;
  avoidedTraitPenalty: number;
  /** Points per unit of cookie power */
  powerMultiplier: number;
  /** Team synergy total is divided by this, then capped */
  synergyDivisor: number;
  synergyCap: number;
  sTierMemberBonus: number;
  /** Per preferred trait some member carries */
  traitCoverageBonus: number;
  /** Top boss-scored cookies handed to the generator */
  poolSize: number;
}

export interface RequestLimits {
  maxCount: number;
  maxTopN: number;
  maxPopulation: number;
  maxGenerations: number;
  maxTreasures: number;
  defaultCount: number;
  defaultTopN: number;
}

/**
 * Complete optimizer configuration
 */
export interface OptimizerConfig {
  rarityWeights: Record<Rarity, number>;
  /** Weight used for a rarity missing from the table */
  fallbackRarityWeight: number;
  roleClasses: RoleClasses;
  scores: ScoreTables;
  power: PowerWeights;
  treasures: TreasureScoring;
  synergy: SynergyScoring;
  genetic: GeneticDefaults;
  exhaustive: ExhaustiveGuard;
  counter: CounterSettings;
  guildBattle: GuildBattleScoring;
  limits: RequestLimits;
  /** Evaluations between budget checks during enumeration */
  budgetCheckInterval: number;
  /** Redraws allowed before random sampling accepts a duplicate team */
  duplicateRetries: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: OptimizerConfig = {
  rarityWeights: {
    Beast: 7.0,
    "Ancient (Ascended)": 6.5,
    Ancient: 6.0,
    Legendary: 5.0,
    Dragon: 5.0,
    "Super Epic": 4.0,
    Epic: 3.0,
    Special: 2.0,
    Rare: 1.0,
    Common: 0.5,
  },
  fallbackRarityWeight: 1.0,
  roleClasses: {
    tank: ["Defense", "Charge"],
    healer: ["Healing", "Support"],
    dps: ["Magic", "Ranged", "Bomber", "Ambush"],
  },
  scores: {
    roleDiversity: [0, 0, 8, 15, 24, 30],
    positionCoverage: [0, 5, 15, 25],
    powerCap: 35,
    frontTankBonus: 3,
    healerBonus: 3,
    dpsBonus: 2,
    bonusCap: 10,
  },
  power: {
    rarity: 0.4,
    skill: 0.35,
    level: 0.15,
    topping: 0.1,
    scale: 7,
    maxSkillLevel: 60,
    maxLevel: 70,
    maxToppingQuality: 5,
    maxToppingLevel: 12,
    maxToppings: 5,
  },
  treasures: {
    tierPower: { "S+": 10, S: 8.5, A: 7, B: 5.5, C: 4 },
    universalBonus: 1,
    tierPowerCap: 10,
    atkDivisor: 100,
    critDivisor: 30,
    cooldownDivisor: 40,
    revive: 0.5,
    cleanse: 0.3,
    enemyDebuff: 0.4,
    sustain: 0.5,
    summonWithSummoner: 0.8,
    summonWithoutSummoner: -0.3,
    specialCap: 2,
    cap: 15,
  },
  synergy: {
    elementTrio: 15,
    elementPair: 7,
    groupTrio: 12,
    groupPair: 5,
    groupCap: 20,
    comboCap: 25,
  },
  genetic: {
    populationSize: 50,
    generations: 100,
    eliteFraction: 0.2,
    minElites: 2,
    mutationRate: 0.1,
    eliteParentBias: 0.75,
  },
  exhaustive: {
    poolSizeThreshold: 100,
    minRequired: 3,
  },
  counter: {
    highThreatCutoff: 8,
    maxRecommendations: 10,
    biasedFraction: 0.5,
    minBiasedPool: 20,
    highTierRarities: ["Beast", "Ancient (Ascended)", "Ancient", "Legendary"],
    counterWeight: 0.6,
    teamWeight: 0.4,
  },
  guildBattle: {
    baseScore: 50,
    sTierBonus: 40,
    aTierBonus: 25,
    preferredTraitBonus: 10,
    avoidedTraitPenalty: 15,
    powerMultiplier: 2,
    synergyDivisor: 5,
    synergyCap: 10,
    sTierMemberBonus: 5,
    traitCoverageBonus: 3,
    poolSize: 15,
  },
  limits: {
    maxCount: 10000,
    maxTopN: 50,
    maxPopulation: 500,
    maxGenerations: 1000,
    maxTreasures: 3,
    defaultCount: 100,
    defaultTopN: 5,
  },
  budgetCheckInterval: 256,
  duplicateRetries: 5,
};

/**
 * Partial overrides accepted by {@link mergeConfig}. Nested
 * sections merge one level deep.
 */
export type OptimizerConfigOverrides = {
  [K in keyof OptimizerConfig]?: OptimizerConfig[K] extends unknown[]
    ? OptimizerConfig[K]
    : OptimizerConfig[K] extends object
      ? Partial<OptimizerConfig[K]>
      : OptimizerConfig[K];
};

/**
 * Merge partial config with defaults
 */
export function mergeConfig(partial: OptimizerConfigOverrides = {}): OptimizerConfig {
  return {
    rarityWeights: { ...DEFAULT_CONFIG.rarityWeights, ...partial.rarityWeights },
    fallbackRarityWeight: partial.fallbackRarityWeight ?? DEFAULT_CONFIG.fallbackRarityWeight,
    roleClasses: { ...DEFAULT_CONFIG.roleClasses, ...partial.roleClasses },
    scores: { ...DEFAULT_CONFIG.scores, ...partial.scores },
    power: { ...DEFAULT_CONFIG.power, ...partial.power },
    treasures: {
      ...DEFAULT_CONFIG.treasures,
      ...partial.treasures,
      tierPower: { ...DEFAULT_CONFIG.treasures.tierPower, ...partial.treasures?.tierPower },
    },
    synergy: { ...DEFAULT_CONFIG.synergy, ...partial.synergy },
    genetic: { ...DEFAULT_CONFIG.genetic, ...partial.genetic },
    exhaustive: { ...DEFAULT_CONFIG.exhaustive, ...partial.exhaustive },
    counter: { ...DEFAULT_CONFIG.counter, ...partial.counter },
    guildBattle: { ...DEFAULT_CONFIG.guildBattle, ...partial.guildBattle },
    limits: { ...DEFAULT_CONFIG.limits, ...partial.limits },
    budgetCheckInterval: partial.budgetCheckInterval ?? DEFAULT_CONFIG.budgetCheckInterval,
    duplicateRetries: partial.duplicateRetries ?? DEFAULT_CONFIG.duplicateRetries,
  };
}

/**
 * Helper to look up the power weight of a rarity tier
 */
export function rarityWeight(rarity: Rarity, config: OptimizerConfig = DEFAULT_CONFIG): number {
  return config.rarityWeights[rarity] ?? config.fallbackRarityWeight;
}
