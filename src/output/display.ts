/**
 * Display Module - Central export hub
 *
 * Re-exports all display/formatting functions from specialized modules.
 *
 * Module Structure:
 * - tables.ts: Generic table utilities, text formatting, box characters
 * - teams.ts: Ranked teams, score breakdowns, run summaries, treasures
 * - counter.ts: Threat profile, weaknesses, counter recommendations
 * - guildBattle.ts: Boss profile, boss pool, boss-scored teams
 * - cookies.ts: Catalog listing
 */

// ─────────────────────────────────────────────────────────────
// Table Utilities
// ─────────────────────────────────────────────────────────────

export {
  BOX,
  shortCookieName,
  truncateCookieName,
  padTruncate,
  formatScore,
  formatPercent,
  horizontalLine,
  tableRow,
  buildTable,
  sectionHeader,
} from "./tables";

export type { SimpleTableOptions } from "./tables";

// ─────────────────────────────────────────────────────────────
// Team Display
// ─────────────────────────────────────────────────────────────

export {
  formatTeamsTable,
  formatBreakdown,
  formatTeamDetails,
  formatTreasureRecommendations,
  formatRunSummary,
  formatOptimizationReport,
} from "./teams";

// ─────────────────────────────────────────────────────────────
// Counter Display
// ─────────────────────────────────────────────────────────────

export {
  formatThreatProfile,
  formatWeaknesses,
  formatCounterRecommendation,
  formatCounterReport,
} from "./counter";

// ─────────────────────────────────────────────────────────────
// Guild Battle Display
// ─────────────────────────────────────────────────────────────

export { formatBossProfile, formatBossPool, formatBossTeam, formatGuildBattleReport } from "./guildBattle";

// ─────────────────────────────────────────────────────────────
// Catalog Display
// ─────────────────────────────────────────────────────────────

export { formatCookieList } from "./cookies";
