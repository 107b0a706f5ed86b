/**
 * Guild Battle Display Module
 *
 * Boss profile, boss-ranked cookie pool and the boss-scored teams.
 */

import type { GuildBoss } from "../models/types";
import type { RankedTeam } from "../models/teamTypes";
import type { BossCandidate } from "../calculators/guildBattle";
import type { GuildBattleResult } from "../calculators/optimizer";
import { buildTable, formatScore, sectionHeader, shortCookieName } from "./tables";
import { formatRunSummary, formatTeamDetails, formatTeamsTable } from "./teams";

/**
 * Description, mechanics and strategy lines of a boss.
 */
export function formatBossProfile(boss: GuildBoss): string {
  const lines = [`  ${boss.description}`, "", "  Mechanics:"];
  lines.push(...boss.mechanics.map((m) => `    - ${m}`));
  lines.push("  Strategy:");
  lines.push(...boss.strategy.map((s) => `    - ${s}`));

  const tiers = [
    `  S tier: ${boss.sTier.map(shortCookieName).join(", ") || "-"}`,
    `  A tier: ${boss.aTier.map(shortCookieName).join(", ") || "-"}`,
  ];
  return [...lines, ...tiers].join("\n");
}

/**
 * Top of the boss ranking, one row per cookie.
 */
export function formatBossPool(pool: readonly BossCandidate[], limit: number = 10): string {
  return buildTable({
    headers: ["#", "Cookie", "Role", "Boss"],
    widths: [5, 30, 10, 8],
    rows: pool.slice(0, limit).map((c, i) => [String(i + 1), c.cookie.name, c.cookie.role, formatScore(c.score)]),
  });
}

export function formatBossTeam(team: RankedTeam, ceiling: number): string {
  const lines = [formatTeamDetails(team, ceiling)];
  if (team.boss) {
    lines.push(`  Boss score: ${formatScore(team.boss.bossScore)} / 100`);
    lines.push(`  Plan: ${team.boss.strategy}`);
  }
  return lines.join("\n");
}

/**
 * Full guild battle report: boss profile, pool, then the ranked teams.
 */
export function formatGuildBattleReport(result: GuildBattleResult, detailLimit: number = 3): string {
  const sections = [
    sectionHeader(`GUILD BATTLE: ${result.boss.name}`),
    formatBossProfile(result.boss),
    "",
    "Best cookies for this boss:",
    formatBossPool(result.bossPool),
    "",
    formatRunSummary(result),
    "",
    formatTeamsTable(result.teams, result.ceiling),
  ];

  for (const team of result.teams.slice(0, detailLimit)) {
    sections.push("", formatBossTeam(team, result.ceiling));
  }

  return sections.join("\n");
}
