/**
 * Team Display Module
 *
 * Formatting for ranked teams, score breakdowns, run summaries
 * and treasure suggestions.
 */

import type { RankedTeam, ScoreBreakdown, TreasureRecommendation } from "../models/teamTypes";
import type { OptimizationResult } from "../calculators/optimizer";
import { buildTable, formatScore, padTruncate, sectionHeader, truncateCookieName } from "./tables";

// ─────────────────────────────────────────────────────────────
// Ranked Teams
// ─────────────────────────────────────────────────────────────

/**
 * Summary table: one row per ranked team.
 */
export function formatTeamsTable(teams: readonly RankedTeam[], ceiling: number): string {
  const counterMode = teams.some((t) => t.counter !== undefined);
  const bossMode = !counterMode && teams.some((t) => t.boss !== undefined);
  const headers = counterMode
    ? ["#", "Combined", "Counter", "Score", "Members"]
    : bossMode
      ? ["#", "Boss", "Score", "Members"]
      : ["#", "Score", "Members"];
  const widths = counterMode ? [5, 10, 9, 15, 72] : bossMode ? [5, 8, 15, 72] : [5, 15, 72];

  const rows = teams.map((team) => {
    const members = team.members.map((c) => truncateCookieName(c.name, 16)).join(", ");
    const score = `${formatScore(team.score.total)}/${ceiling}`;
    if (counterMode) {
      return [
        String(team.rank),
        formatScore(team.counter?.combinedScore ?? 0),
        formatScore(team.counter?.counterScore ?? 0),
        score,
        members,
      ];
    }
    return bossMode
      ? [String(team.rank), formatScore(team.boss?.bossScore ?? 0), score, members]
      : [String(team.rank), score, members];
  });

  return buildTable({ headers, widths, rows });
}

const BREAKDOWN_LABELS: [keyof ScoreBreakdown, string, number][] = [
  ["roleDiversity", "Role diversity", 30],
  ["positionCoverage", "Position coverage", 25],
  ["power", "Power", 35],
  ["bonusModifiers", "Bonus modifiers", 10],
  ["treasureBonus", "Treasure bonus", 15],
  ["elementSynergy", "Element synergy", 15],
  ["groupSynergy", "Group synergy", 20],
  ["specialCombo", "Special combo", 25],
];

/**
 * One line per enabled sub-score, e.g. `  Role diversity        30.0 / 30`.
 */
export function formatBreakdown(breakdown: ScoreBreakdown): string {
  return BREAKDOWN_LABELS.filter(([key]) => breakdown[key] !== undefined)
    .map(([key, label, cap]) => `  ${label.padEnd(20)}${formatScore(breakdown[key] ?? 0).padStart(6)} / ${cap}`)
    .join("\n");
}

/**
 * Member table plus score breakdown for a single team.
 */
export function formatTeamDetails(team: RankedTeam, ceiling: number): string {
  const lines: string[] = [];
  const combo = team.score.activeCombo ? `  [${team.score.activeCombo}]` : "";
  lines.push(`#${team.rank}  ${formatScore(team.score.total)} / ${ceiling}${combo}`);

  lines.push(
    buildTable({
      headers: ["Cookie", "Rarity", "Role", "Position", "Element", "Power"],
      widths: [28, 20, 10, 10, 13, 8],
      rows: team.details.map((m) => [
        (m.required ? "* " : "") + truncateCookieName(m.name, 24),
        m.rarity,
        m.role,
        m.position,
        m.element ?? "-",
        formatScore(m.power, 2),
      ]),
    })
  );

  lines.push(formatBreakdown(team.score.breakdown));

  const flags: string[] = [];
  if (!team.hasTank) flags.push("no tank");
  if (!team.hasHealer) flags.push("no healer");
  if (flags.length > 0) lines.push(`  Warning: ${flags.join(", ")}`);

  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────
// Treasures
// ─────────────────────────────────────────────────────────────

export function formatTreasureRecommendations(recommendations: readonly TreasureRecommendation[]): string {
  if (recommendations.length === 0) return "  (none)";
  return recommendations
    .map(
      (r, i) =>
        `  ${i + 1}. ${padTruncate(r.treasure.name, 32)} ${r.treasure.tier.padEnd(3)} ` +
        `${formatScore(r.score, 2).padStart(6)}  ${r.reason}`
    )
    .join("\n");
}

// ─────────────────────────────────────────────────────────────
// Run Summary
// ─────────────────────────────────────────────────────────────

/**
 * Strategy, seed, search completeness and counts.
 */
export function formatRunSummary(result: OptimizationResult): string {
  const lines = [
    `Strategy: ${result.strategy}  Seed: ${result.seed}`,
    `Pool: ${result.poolSize} cookies  Candidates: ${result.candidates}  Evaluated: ${result.evaluated}`,
  ];
  if (!result.complete && result.budget) {
    const unit = result.budget.reason === "time" ? "ms" : " combinations";
    lines.push(
      `Search incomplete: ${result.budget.reason} budget of ${result.budget.limit}${unit} reached ` +
        `after ${result.budget.elapsedMs}ms`
    );
  }
  return lines.join("\n");
}

/**
 * Full report: summary, ranking table, and details for the first
 * `detailLimit` teams.
 */
export function formatOptimizationReport(result: OptimizationResult, detailLimit: number = 3): string {
  const sections = [
    sectionHeader("TEAM OPTIMIZATION"),
    formatRunSummary(result),
    "",
    formatTeamsTable(result.teams, result.ceiling),
  ];

  for (const team of result.teams.slice(0, detailLimit)) {
    sections.push("", formatTeamDetails(team, result.ceiling));
  }

  if (result.recommendedTreasures.length > 0) {
    sections.push("", "Suggested treasures:", formatTreasureRecommendations(result.recommendedTreasures));
  }

  return sections.join("\n");
}
