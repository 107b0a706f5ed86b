/**
 * Optimize Command
 *
 * Generates, scores and ranks teams for a request.
 */

import type { CliContext } from "../context";
import { optimizeTeams, type OptimizationResult } from "../../calculators/optimizer";
import type { OptimizeRequest } from "../../calculators/validation";
import {
  formatRunSummary,
  formatTeamDetails,
  formatTeamsTable,
  formatTreasureRecommendations,
} from "../../output/display";

/**
 * Result of an optimize run: the raw result plus formatted sections.
 */
export interface OptimizeCommandResult {
  result: OptimizationResult;
  summary: string;
  teamsTable: string;
  details: string[];
  treasures?: string;
}

/**
 * Run the optimizer and return formatted output.
 */
export function runOptimize(
  ctx: CliContext,
  request: OptimizeRequest,
  detailLimit: number = 3
): OptimizeCommandResult {
  const result = optimizeTeams(request, ctx);

  return {
    result,
    summary: formatRunSummary(result),
    teamsTable: formatTeamsTable(result.teams, result.ceiling),
    details: result.teams.slice(0, detailLimit).map((team) => formatTeamDetails(team, result.ceiling)),
    treasures:
      result.recommendedTreasures.length > 0
        ? formatTreasureRecommendations(result.recommendedTreasures)
        : undefined,
  };
}

/**
 * Print optimizer results to console.
 */
export function printOptimize(ctx: CliContext, request: OptimizeRequest, detailLimit: number = 3): void {
  const output = runOptimize(ctx, request, detailLimit);

  console.log(output.summary);
  console.log("");

  if (output.result.teams.length === 0) {
    console.log("No teams could be generated.");
    return;
  }

  console.log("Top Teams:\n");
  console.log(output.teamsTable);

  for (const details of output.details) {
    console.log("");
    console.log(details);
  }

  if (output.treasures) {
    console.log("\nSuggested Treasures (best team):\n");
    console.log(output.treasures);
  }
}
