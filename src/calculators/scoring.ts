import { sumBy } from "es-toolkit";
import type { Cookie, InstanceOverrides, SynergyData, Treasure } from "../models/types";
import type { ScoreBreakdown, Team, TeamScore } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import { createPowerLookup } from "./power";
import { isDps, isFrontTank, isHealer } from "./roles";
import { calculateSynergy } from "./synergy";
import { treasureBonus } from "./treasures";

/**
 * Inputs that change which sub-scores apply
 */
export interface ScoringOptions {
  overrides?: InstanceOverrides;
  /** Attached treasures; enables the treasure sub-score when non-empty */
  treasures?: readonly Treasure[];
  /** Synergy lookups; enables the element, group and combo sub-scores */
  synergy?: SynergyData;
  config?: OptimizerConfig;
  /** Shared power lookup. Built from `overrides` when omitted. */
  powerOf?: (cookie: Cookie) => number;
}

// ─────────────────────────────────────────────────────────────
// Base Sub-scores
// ─────────────────────────────────────────────────────────────

function tableLookup(table: readonly number[], count: number): number {
  if (table.length === 0) return 0;
  return table[Math.min(count, table.length - 1)] ?? 0;
}

/**
 * Points for distinct roles: 1 → 0 up to 5 → 30.
 */
export function roleDiversityScore(team: Team, config: OptimizerConfig = DEFAULT_CONFIG): number {
  const distinct = new Set(team.map((c) => c.role)).size;
  return tableLookup(config.scores.roleDiversity, distinct);
}

/**
 * Points for distinct positions: 1 → 5, 2 → 15, 3 → 25.
 */
export function positionCoverageScore(team: Team, config: OptimizerConfig = DEFAULT_CONFIG): number {
  const distinct = new Set(team.map((c) => c.position)).size;
  return tableLookup(config.scores.positionCoverage, distinct);
}

export function powerScore(memberPower: readonly number[], config: OptimizerConfig = DEFAULT_CONFIG): number {
  return Math.min(sumBy(memberPower, (p) => p), config.scores.powerCap);
}

/**
 * Structural bonuses: a front-row tank, a healer or support, and
 * any damage dealer.
 */
export function bonusModifierScore(team: Team, config: OptimizerConfig = DEFAULT_CONFIG): number {
  const s = config.scores;
  let bonus = 0;
  if (team.some((c) => isFrontTank(c, config))) bonus += s.frontTankBonus;
  if (team.some((c) => isHealer(c, config))) bonus += s.healerBonus;
  if (team.some((c) => isDps(c, config))) bonus += s.dpsBonus;
  return Math.min(bonus, s.bonusCap);
}

// ─────────────────────────────────────────────────────────────
// Ceiling
// ─────────────────────────────────────────────────────────────

export interface CeilingOptions {
  treasures?: boolean;
  synergy?: boolean;
}

/**
 * Highest total a call site can reach: 100 for the base set,
 * +15 with treasures, +60 with synergy.
 */
export function scoreCeiling(options: CeilingOptions = {}, config: OptimizerConfig = DEFAULT_CONFIG): number {
  const s = config.scores;
  let ceiling =
    Math.max(...s.roleDiversity) + Math.max(...s.positionCoverage) + s.powerCap + s.bonusCap;
  if (options.treasures) ceiling += config.treasures.cap;
  if (options.synergy) {
    const y = config.synergy;
    ceiling += Math.max(y.elementTrio, y.elementPair) + y.groupCap + y.comboCap;
  }
  return ceiling;
}

// ─────────────────────────────────────────────────────────────
// Team Score
// ─────────────────────────────────────────────────────────────

/**
 * Score a team. Deterministic for identical inputs; assumes the
 * team already satisfies the size and distinctness rules.
 *
 * @example
 * ```ts
 * const score = scoreTeam(team, { synergy: reference, treasures: [scroll] });
 * score.breakdown.elementSynergy; // 0, 7 or 15
 * score.ceiling;                  // 175
 * ```
 */
export function scoreTeam(team: Team, options: ScoringOptions = {}): TeamScore {
  const config = options.config ?? DEFAULT_CONFIG;
  const powerOf = options.powerOf ?? createPowerLookup(options.overrides, config);
  const treasures = options.treasures ?? [];
  const memberPower = team.map(powerOf);

  let breakdown: ScoreBreakdown = {
    roleDiversity: roleDiversityScore(team, config),
    positionCoverage: positionCoverageScore(team, config),
    power: powerScore(memberPower, config),
    bonusModifiers: bonusModifierScore(team, config),
  };

  if (treasures.length > 0) {
    breakdown = { ...breakdown, treasureBonus: treasureBonus(team, treasures, config) };
  }

  let activeCombo: string | undefined;
  if (options.synergy) {
    const synergy = calculateSynergy(team, options.synergy, config);
    activeCombo = synergy.activeCombo;
    breakdown = {
      ...breakdown,
      elementSynergy: synergy.elementSynergy,
      groupSynergy: synergy.groupSynergy,
      specialCombo: synergy.specialCombo,
    };
  }

  const total =
    breakdown.roleDiversity +
    breakdown.positionCoverage +
    breakdown.power +
    breakdown.bonusModifiers +
    (breakdown.treasureBonus ?? 0) +
    (breakdown.elementSynergy ?? 0) +
    (breakdown.groupSynergy ?? 0) +
    (breakdown.specialCombo ?? 0);

  const score: TeamScore = {
    total,
    breakdown,
    ceiling: scoreCeiling({ treasures: treasures.length > 0, synergy: options.synergy !== undefined }, config),
    memberPower,
  };
  return activeCombo ? { ...score, activeCombo } : score;
}

/**
 * Total synergy (element + group + combo) of a scored team
 */
export function synergyTotal(score: TeamScore): number {
  const b = score.breakdown;
  return (b.elementSynergy ?? 0) + (b.groupSynergy ?? 0) + (b.specialCombo ?? 0);
}
