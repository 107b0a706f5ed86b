/**
 * Treasure scoring and recommendation.
 */

import { clamp, meanBy, orderBy, sumBy } from "es-toolkit";
import type { Treasure, TreasureTier } from "../models/types";
import type { Team, TreasureRecommendation } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import { isSummoner, teamArchetypes } from "./roles";

// ─────────────────────────────────────────────────────────────
// Treasure Bonus (team score)
// ─────────────────────────────────────────────────────────────

/**
 * Tier power of one treasure, with the Universal bump, capped.
 */
export function treasureTierPower(
  treasure: Treasure,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const t = config.treasures;
  const universal = treasure.recommendedArchetypes.includes("Universal") ? t.universalBonus : 0;
  return Math.min(t.tierPower[treasure.tier] + universal, t.tierPowerCap);
}

/**
 * Special-effect bits, capped. The summon boost is a penalty on
 * teams without a summoner.
 */
export function treasureSpecialBonus(
  team: Team,
  treasures: readonly Treasure[],
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const t = config.treasures;
  let bonus = 0;
  if (treasures.some((x) => x.revive)) bonus += t.revive;
  if (treasures.some((x) => x.debuffCleanse)) bonus += t.cleanse;
  if (treasures.some((x) => x.enemyDebuff)) bonus += t.enemyDebuff;
  if (sumBy(treasures, (x) => x.hpShield + x.heal) > 0) bonus += t.sustain;
  if (treasures.some((x) => x.summonBoost)) {
    bonus += team.some(isSummoner) ? t.summonWithSummoner : t.summonWithoutSummoner;
  }
  return Math.min(bonus, t.specialCap);
}

/**
 * Treasure bonus sub-score (0-15). Zero with no treasures.
 *
 * @example
 * ```ts
 * // One S+ Universal treasure with 25% ATK: min(10 + 1, 10) + 0.25
 * treasureBonus(team, [scroll]); // 10.25
 * ```
 */
export function treasureBonus(
  team: Team,
  treasures: readonly Treasure[],
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  if (treasures.length === 0) return 0;
  const t = config.treasures;

  const tier = meanBy(treasures, (x) => treasureTierPower(x, config));
  const stats =
    Math.min(sumBy(treasures, (x) => x.atkBoost) / t.atkDivisor, 1) +
    Math.min(sumBy(treasures, (x) => x.critBoost) / t.critDivisor, 1) +
    Math.min(sumBy(treasures, (x) => x.cooldownReduction) / t.cooldownDivisor, 1);
  const special = treasureSpecialBonus(team, treasures, config);

  return clamp(tier + stats + special, 0, t.cap);
}

// ─────────────────────────────────────────────────────────────
// Recommendation
// ─────────────────────────────────────────────────────────────

export const RECOMMENDATION_TIER_BASE: Record<TreasureTier, number> = {
  "S+": 10,
  S: 8,
  A: 6,
  B: 4,
  C: 2,
};

/**
 * Accumulates a treasure's recommendation score and the reasons
 * behind it. The first reason recorded is the one reported.
 */
export class TreasureTally {
  score: number;
  private readonly reasons: string[] = [];

  constructor(readonly treasure: Treasure) {
    this.score = RECOMMENDATION_TIER_BASE[treasure.tier];
  }

  add(points: number, reason?: string): void {
    this.score += points;
    if (reason) this.reasons.push(reason);
  }

  get hasReasons(): boolean {
    return this.reasons.length > 0;
  }

  toRecommendation(): TreasureRecommendation {
    return {
      treasure: this.treasure,
      score: Math.round(this.score * 100) / 100,
      reason: this.reasons[0] ?? "Standard treasure",
    };
  }
}

/**
 * Highest-scoring tallies first, ties by name.
 */
export function topRecommendations(tallies: TreasureTally[], limit: number): TreasureRecommendation[] {
  return orderBy(tallies, [(t) => t.score, (t) => t.treasure.name], ["desc", "asc"])
    .slice(0, limit)
    .map((t) => t.toRecommendation());
}

/**
 * Rank treasures for a team's composition.
 */
export function recommendTreasures(
  team: Team,
  treasures: readonly Treasure[],
  limit: number = 3,
  config: OptimizerConfig = DEFAULT_CONFIG
): TreasureRecommendation[] {
  const archetypes = teamArchetypes(team, config);
  const archetypeLabels: ReadonlySet<string> = archetypes;
  const rearCount = team.filter((c) => c.position === "Rear").length;
  const hasHealer = team.some((c) => c.providesHealing === true);

  const tallies = treasures.map((treasure) => {
    const tally = new TreasureTally(treasure);

    if (treasure.recommendedArchetypes.includes("Universal")) {
      tally.add(5, "Universal treasure (works with any team)");
    }

    const matching = treasure.recommendedArchetypes.filter((a) => archetypeLabels.has(a));
    if (matching.length > 0) {
      tally.add(matching.length * 2, `Matches team archetypes: ${matching.join(", ")}`);
    }

    if (treasure.summonBoost) {
      if (archetypes.has("Summoner")) tally.add(8, "Essential for a summoner team");
      else tally.add(-5);
    }

    if (treasure.revive && rearCount >= 3) {
      tally.add(4, "Revival protects a vulnerable backline");
    }

    if ((treasure.hpShield > 0 || treasure.heal > 0) && hasHealer) {
      tally.add(3, "Stacks with the team's existing sustain");
    }

    if ((treasure.atkBoost > 0 || treasure.critBoost > 0) && archetypes.has("DPS")) {
      tally.add(3, "Amplifies team damage output");
    }

    if (treasure.cooldownReduction > 0) {
      tally.add(4, "Faster skill rotation for all cookies");
    }

    return tally;
  });

  return topRecommendations(tallies, limit);
}
