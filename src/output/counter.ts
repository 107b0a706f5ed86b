/**
 * Counter Analysis Display Module
 *
 * Formats the enemy threat profile, its weaknesses and the counter
 * recommendation for terminal output.
 */

import type { CounterRecommendation, ThreatProfile, Weakness } from "../models/teamTypes";
import type { CounterOptimizationResult } from "../calculators/optimizer";
import { buildTable, formatPercent, formatScore, sectionHeader, shortCookieName } from "./tables";
import {
  formatRunSummary,
  formatTeamDetails,
  formatTeamsTable,
  formatTreasureRecommendations,
} from "./teams";

function nameList(names: readonly string[]): string {
  return names.length > 0 ? names.map(shortCookieName).join(", ") : "-";
}

// ─────────────────────────────────────────────────────────────
// Threat Profile
// ─────────────────────────────────────────────────────────────

/**
 * Key/value summary of an enemy composition.
 */
export function formatThreatProfile(profile: ThreatProfile): string {
  const lines: string[] = [];
  const { positions } = profile;

  lines.push(`  Size:          ${profile.size}`);
  lines.push(`  Healers:       ${nameList(profile.healers)}`);
  lines.push(`  Tanks:         ${nameList(profile.tanks)}`);
  lines.push(`  DPS:           ${nameList(profile.dps)}`);
  lines.push(`  Positions:     Front ${positions.Front} / Middle ${positions.Middle} / Rear ${positions.Rear}`);
  lines.push(`  Crowd control: ${profile.ccTypes.length > 0 ? profile.ccTypes.join(", ") : "-"}`);
  lines.push(`  Immunity:      ${profile.immunity ? profile.immunityTypes.join(", ") : "none"}`);
  lines.push(`  Taunt:         ${profile.taunt ? "yes" : "no"}`);
  lines.push(`  Burst damage:  ${profile.burstDamage ? "yes" : "no"}`);
  lines.push(
    `  Threat:        total ${formatScore(profile.totalThreat)}, average ${formatScore(profile.averageThreat)}`
  );

  for (const member of profile.highThreat) {
    const threats = member.threats.length > 0 ? ` (${member.threats.join(", ")})` : "";
    lines.push(`    ! ${shortCookieName(member.name)} [${member.threatLevel}]${threats}`);
  }

  if (profile.metaMatch) {
    const kind = profile.metaMatch.exact ? "exact" : "partial";
    const meta = profile.metaMatch.team;
    lines.push(`  Meta team:     ${meta.name} (${kind}, tier ${meta.tier}, ${meta.archetype})`);
  }

  return lines.join("\n");
}

// ─────────────────────────────────────────────────────────────
// Weaknesses
// ─────────────────────────────────────────────────────────────

export function formatWeaknesses(weaknesses: readonly Weakness[]): string {
  if (weaknesses.length === 0) return "  No exploitable weaknesses found.";

  return buildTable({
    headers: ["Priority", "Conf", "Weakness", "Exploit"],
    widths: [10, 7, 36, 52],
    rows: weaknesses.map((w) => [w.priority, formatPercent(w.confidence), w.weakness, w.exploit]),
  });
}

// ─────────────────────────────────────────────────────────────
// Recommendation
// ─────────────────────────────────────────────────────────────

export function formatCounterRecommendation(recommendation: CounterRecommendation): string {
  return [
    `  Strategy:   ${recommendation.strategy}`,
    `  Archetype:  ${recommendation.archetype}`,
    `  Confidence: ${formatPercent(recommendation.confidence)}`,
    `  Recommend:  ${nameList(recommendation.recommended)}`,
    `  Avoid:      ${nameList(recommendation.avoid)}`,
    `  Targets:    ${nameList(recommendation.priorityTargets)}`,
  ].join("\n");
}

/**
 * Full counter report: enemy analysis followed by the ranked teams.
 */
export function formatCounterReport(result: CounterOptimizationResult, detailLimit: number = 3): string {
  const sections = [
    sectionHeader(`COUNTER: ${nameList(result.enemy.map((c) => c.name))}`),
    formatThreatProfile(result.profile),
    "",
    "Weaknesses:",
    formatWeaknesses(result.weaknesses),
    "",
    "Recommendation:",
    formatCounterRecommendation(result.recommendation),
    "",
    formatRunSummary(result),
    "",
    formatTeamsTable(result.teams, result.ceiling),
  ];

  for (const team of result.teams.slice(0, detailLimit)) {
    sections.push("", formatTeamDetails(team, result.ceiling));
    const treasures = team.counter?.recommendedTreasures ?? [];
    if (treasures.length > 0) {
      sections.push("  Counter treasures:", formatTreasureRecommendations(treasures));
    }
  }

  return sections.join("\n");
}
