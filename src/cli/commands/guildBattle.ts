/**
 * Guild Battle Command
 *
 * Ranks teams against a guild boss, or lists the known bosses.
 */

import type { CliContext } from "../context";
import { optimizeGuildBattle, type GuildBattleResult } from "../../calculators/optimizer";
import type { GuildBattleRequest } from "../../calculators/validation";
import {
  formatBossPool,
  formatBossProfile,
  formatBossTeam,
  formatRunSummary,
  formatTeamsTable,
} from "../../output/display";

export interface GuildBattleCommandResult {
  result: GuildBattleResult;
  profile: string;
  pool: string;
  summary: string;
  teamsTable: string;
  details: string[];
}

/**
 * Run guild battle optimization and return formatted output.
 */
export function runGuildBattle(
  ctx: CliContext,
  request: GuildBattleRequest,
  detailLimit: number = 3
): GuildBattleCommandResult {
  const result = optimizeGuildBattle(request, ctx);

  return {
    result,
    profile: formatBossProfile(result.boss),
    pool: formatBossPool(result.bossPool),
    summary: formatRunSummary(result),
    teamsTable: formatTeamsTable(result.teams, result.ceiling),
    details: result.teams.slice(0, detailLimit).map((team) => formatBossTeam(team, result.ceiling)),
  };
}

/**
 * Print the boss profile and teams to console.
 */
export function printGuildBattle(ctx: CliContext, request: GuildBattleRequest, detailLimit: number = 3): void {
  const output = runGuildBattle(ctx, request, detailLimit);

  console.log(`${output.result.boss.name}:\n`);
  console.log(output.profile);
  console.log("\nBest cookies for this boss:\n");
  console.log(output.pool);
  console.log("");
  console.log(output.summary);
  console.log("");

  if (output.result.teams.length === 0) {
    console.log("No teams could be generated.");
    return;
  }

  console.log("Guild Battle Teams:\n");
  console.log(output.teamsTable);

  for (const details of output.details) {
    console.log("");
    console.log(details);
  }
}

/**
 * One line per boss: name and description
 */
export function listBosses(ctx: CliContext): string {
  return ctx.reference.bosses.map((b) => `  ${b.name.padEnd(34)}${b.description}`).join("\n");
}
