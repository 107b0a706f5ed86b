/**
 * Result ranking: dedupe, order, truncate and explain.
 */

import { uniqBy } from "es-toolkit";
import type { Element, InstanceOverrides } from "../models/types";
import { RARITIES } from "../models/types";
import type { RankedMember, RankedTeam, ScoredTeam } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import { isHealer, isTank, positionDistribution, roleDistribution } from "./roles";

export interface RankOptions {
  /** Names flagged as required in the member details */
  required?: readonly string[];
  /** Element lookup echoed in the member details */
  elements?: ReadonlyMap<string, Element>;
  overrides?: InstanceOverrides;
  config?: OptimizerConfig;
}

/**
 * Value a team is ranked by: the combined score in counter mode,
 * the boss score in guild battle mode, otherwise the team total.
 */
export function rankingValue(team: ScoredTeam): number {
  return team.counter?.combinedScore ?? team.boss?.bossScore ?? team.score.total;
}

function rarityRank(team: ScoredTeam): number {
  return team.members.reduce((sum, c) => sum + RARITIES.indexOf(c.rarity), 0);
}

/**
 * Rank scored teams.
 *
 * - Deduplicates by membership, keeping the first occurrence
 * - Orders by ranking value desc, then summed rarity rank desc,
 *   then input order
 * - Truncates to `topN` and attaches 1-based ranks
 *
 * Ranking an already-ranked list returns the same order.
 *
 * @example
 * ```ts
 * const ranked = rankTeams(scored, 5, { required: ["Lemon Cookie"] });
 * ranked[0].rank;                 // 1
 * ranked[0].details[0].required;  // true
 * ```
 */
export function rankTeams(
  teams: readonly ScoredTeam[],
  topN: number,
  options: RankOptions = {}
): RankedTeam[] {
  const config = options.config ?? DEFAULT_CONFIG;
  const required = new Set(options.required ?? []);

  // First occurrence of each membership wins
  const unique = uniqBy(teams, (team) => team.key);

  // Array.prototype.sort is stable, so equal teams keep input order
  const ordered = unique
    .map((team) => ({ team, value: rankingValue(team), rarity: rarityRank(team) }))
    .sort((a, b) => b.value - a.value || b.rarity - a.rarity)
    .slice(0, Math.max(0, topN));

  return ordered.map(({ team }, index) => {
    const details: RankedMember[] = team.members.map((cookie, i) => {
      const element = options.elements?.get(cookie.name);
      const override = options.overrides?.[cookie.name];
      return {
        name: cookie.name,
        rarity: cookie.rarity,
        role: cookie.role,
        position: cookie.position,
        ...(element ? { element } : {}),
        power: team.score.memberPower[i] ?? 0,
        required: required.has(cookie.name),
        ...(override ? { override } : {}),
      };
    });

    return {
      members: team.members,
      key: team.key,
      score: team.score,
      ...(team.counter ? { counter: team.counter } : {}),
      rank: index + 1,
      details,
      roleDistribution: roleDistribution(team.members),
      positionDistribution: positionDistribution(team.members),
      hasTank: team.members.some((c) => isTank(c, config)),
      hasHealer: team.members.some((c) => isHealer(c, config)),
    };
  });
}
