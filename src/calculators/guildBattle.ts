/**
 * Guild battle boss scoring
 *
 * Each boss rewards some traits and punishes others, and names the
 * cookies that perform best against it. Cookies are scored against a
 * boss on a 0-100 scale; the top of that ranking becomes the pool the
 * regular generators search, and teams are ranked by their boss score.
 */

import { orderBy } from "es-toolkit";
import type { BossTrait, Cookie, GuildBoss, ReferenceData } from "../models/types";
import type { Team } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import { cookiePower } from "./power";

export interface BossScoringOptions {
  /** Power per cookie (default: rarity weight) */
  powerOf?: (cookie: Cookie) => number;
  config?: OptimizerConfig;
}

export interface BossCandidate {
  cookie: Cookie;
  /** 0-100 */
  score: number;
}

const clampScore = (value: number): number => Math.min(100, Math.max(0, value));

// ─────────────────────────────────────────────────────────────
// Traits
// ─────────────────────────────────────────────────────────────

/**
 * Boss traits of a cookie: read from its ability fields and element,
 * plus any listed for it in the boss trait table.
 */
export function cookieTraits(cookie: Cookie, reference: ReferenceData): Set<BossTrait> {
  const traits = new Set<BossTrait>(reference.bossTraits.get(cookie.name) ?? []);
  if (cookie.antiTank) traits.add("defShred");
  if (cookie.providesShield) traits.add("shieldProvider");
  if (cookie.skillType === "Debuff") traits.add("debuffHeavy");
  if (cookie.targetType === "AoE") traits.add("aoeDamage");
  if (cookie.targetType === "Single_Target") traits.add("singleTargetFocus");

  const element = reference.elements.get(cookie.name);
  if (element === "Water") traits.add("waterElement");
  if (element === "Electricity") traits.add("electricElement");
  return traits;
}

// ─────────────────────────────────────────────────────────────
// Scores
// ─────────────────────────────────────────────────────────────

/**
 * Score one cookie against a boss (0-100).
 *
 * Starts from the base score, adds the S- or A-tier bonus, a bonus per
 * preferred trait and a penalty per avoided one, plus a share of the
 * cookie's power.
 *
 * @example
 * ```ts
 * const dragon = reference.bosses[0];
 * scoreCookieForBoss(candyApple, dragon, reference); // 100 (S tier, DEF shred, indirect damage)
 * ```
 */
export function scoreCookieForBoss(
  cookie: Cookie,
  boss: GuildBoss,
  reference: ReferenceData,
  options: BossScoringOptions = {}
): number {
  const config = options.config ?? DEFAULT_CONFIG;
  const w = config.guildBattle;
  const power = options.powerOf ? options.powerOf(cookie) : cookiePower(cookie, undefined, config);
  const traits = cookieTraits(cookie, reference);

  let score = w.baseScore;
  if (boss.sTier.includes(cookie.name)) {
    score += w.sTierBonus;
  } else if (boss.aTier.includes(cookie.name)) {
    score += w.aTierBonus;
  }
  score += boss.preferredTraits.filter((t) => traits.has(t)).length * w.preferredTraitBonus;
  score -= boss.avoidTraits.filter((t) => traits.has(t)).length * w.avoidedTraitPenalty;
  score += power * w.powerMultiplier;

  return clampScore(score);
}

/**
 * Cookies ordered by boss score, best first. Ties keep name order.
 */
export function rankForBoss(
  pool: readonly Cookie[],
  boss: GuildBoss,
  reference: ReferenceData,
  options: BossScoringOptions = {}
): BossCandidate[] {
  const scored = pool.map((cookie) => ({
    cookie,
    score: scoreCookieForBoss(cookie, boss, reference, options),
  }));
  return orderBy(scored, [(c) => c.score, (c) => c.cookie.name], ["desc", "asc"]);
}

/**
 * Score a team against a boss (0-100): the mean member score, a
 * capped share of team synergy, a bonus per S-tier member and one per
 * preferred trait the team covers.
 */
export function scoreTeamForBoss(
  team: Team,
  boss: GuildBoss,
  memberScore: (cookie: Cookie) => number,
  synergy: number,
  reference: ReferenceData,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const w = config.guildBattle;
  const mean = team.reduce((sum, c) => sum + memberScore(c), 0) / team.length;
  const synergyBonus = Math.min(w.synergyCap, synergy / w.synergyDivisor);
  const sTierBonus = keyMembers(team, boss).length * w.sTierMemberBonus;

  const covered = new Set<BossTrait>();
  for (const cookie of team) {
    for (const trait of cookieTraits(cookie, reference)) covered.add(trait);
  }
  const coverage = boss.preferredTraits.filter((t) => covered.has(t)).length * w.traitCoverageBonus;

  return Math.min(100, mean + synergyBonus + sTierBonus + coverage);
}

/**
 * Team members on the boss's S tier, in team order
 */
export function keyMembers(team: Team, boss: GuildBoss): string[] {
  return team.filter((c) => boss.sTier.includes(c.name)).map((c) => c.name);
}

// ─────────────────────────────────────────────────────────────
// Strategy Text
// ─────────────────────────────────────────────────────────────

/**
 * One-line plan for a team: its S-tier members, then the boss's lead
 * strategy line. Falls back to the boss description.
 */
export function bossStrategy(team: Team, boss: GuildBoss): string {
  const key = keyMembers(team, boss);
  const parts: string[] = [];
  if (key.length === 1) {
    parts.push(`★ ${key[0]} is your key damage dealer.`);
  } else if (key.length > 1) {
    parts.push(`★ Focus on: ${key.slice(0, 2).join(", ")}`);
  }
  if (boss.strategy.length > 0) {
    parts.push(boss.strategy[0]);
  }
  return parts.length > 0 ? parts.join(" ") : boss.description;
}
