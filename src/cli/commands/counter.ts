/**
 * Counter Command
 *
 * Analyzes an enemy composition and ranks counter teams against it.
 */

import type { CliContext } from "../context";
import { optimizeCounterTeams, type CounterOptimizationResult } from "../../calculators/optimizer";
import type { CounterRequest } from "../../calculators/validation";
import {
  formatCounterRecommendation,
  formatRunSummary,
  formatTeamDetails,
  formatTeamsTable,
  formatThreatProfile,
  formatTreasureRecommendations,
  formatWeaknesses,
} from "../../output/display";

export interface CounterCommandResult {
  result: CounterOptimizationResult;
  profile: string;
  weaknesses: string;
  recommendation: string;
  summary: string;
  teamsTable: string;
  details: string[];
}

/**
 * Run counter optimization and return formatted output.
 */
export function runCounter(
  ctx: CliContext,
  request: CounterRequest,
  detailLimit: number = 3
): CounterCommandResult {
  const result = optimizeCounterTeams(request, ctx);

  const details = result.teams.slice(0, detailLimit).map((team) => {
    const treasures = team.counter?.recommendedTreasures ?? [];
    const block = formatTeamDetails(team, result.ceiling);
    return treasures.length > 0
      ? `${block}\n  Counter treasures:\n${formatTreasureRecommendations(treasures)}`
      : block;
  });

  return {
    result,
    profile: formatThreatProfile(result.profile),
    weaknesses: formatWeaknesses(result.weaknesses),
    recommendation: formatCounterRecommendation(result.recommendation),
    summary: formatRunSummary(result),
    teamsTable: formatTeamsTable(result.teams, result.ceiling),
    details,
  };
}

/**
 * Print counter analysis and teams to console.
 */
export function printCounter(ctx: CliContext, request: CounterRequest, detailLimit: number = 3): void {
  const output = runCounter(ctx, request, detailLimit);

  console.log("Enemy Threat Profile:\n");
  console.log(output.profile);
  console.log("\nWeaknesses:\n");
  console.log(output.weaknesses);
  console.log("\nCounter Recommendation:\n");
  console.log(output.recommendation);
  console.log("");
  console.log(output.summary);
  console.log("");

  if (output.result.teams.length === 0) {
    console.log("No counter teams could be generated.");
    return;
  }

  console.log("Counter Teams:\n");
  console.log(output.teamsTable);

  for (const details of output.details) {
    console.log("");
    console.log(details);
  }
}
