/**
 * Exhaustive enumeration with a bounded top-N queue.
 */

import { TEAM_SIZE, type GenerationResult, type Team } from "../../models/teamTypes";
import { ExhaustiveGuardError, InfeasibleConstraintError } from "../../errors";
import { countTeamCombinations, teamCombinations } from "../combinations";
import { BoundedPriorityQueue, BudgetTracker } from "../searchUtils";
import type { GeneratorContext } from "./types";

const PROGRESS_INTERVAL = 50_000;

interface Candidate {
  team: Team;
  fitness: number;
}

/**
 * Fails fast when the enumeration would be impractical: a large pool
 * with too few pinned members and no budget to stop it.
 */
export function assertExhaustiveFeasible(context: GeneratorContext): void {
  const { pool, required, config, budget } = context;

  if (required.length >= TEAM_SIZE) {
    throw new InfeasibleConstraintError(
      "Exhaustive search needs at least one free slot; all five members are required",
      { requiredCount: required.length }
    );
  }

  const hasBudget = budget?.maxTimeMs !== undefined || budget?.maxCombinations !== undefined;
  const guard = config.exhaustive;
  if (!hasBudget && pool.length >= guard.poolSizeThreshold && required.length < guard.minRequired) {
    throw new ExhaustiveGuardError(pool.length, required.length, guard.minRequired);
  }
}

/**
 * Score every team containing the required members and keep the best
 * `count`. Teams are visited in lexicographic pool order, so equal
 * scores keep that order.
 *
 * Stops early with `complete: false` when the budget runs out.
 */
export function generateExhaustive(context: GeneratorContext): GenerationResult {
  assertExhaustiveFeasible(context);

  const { pool, required, count, fitness, config } = context;
  const budget = new BudgetTracker(context.budget, context.now, config.budgetCheckInterval);
  const queue = new BoundedPriorityQueue<Candidate>(count, (a, b) => b.fitness - a.fitness);
  const total = countTeamCombinations(pool, required);

  let evaluated = 0;
  let complete = true;

  for (const team of teamCombinations(pool, required)) {
    if (budget.check(evaluated)) {
      complete = false;
      break;
    }

    queue.add({ team, fitness: fitness(team) });
    evaluated++;

    if (evaluated % PROGRESS_INTERVAL === 0) {
      context.onProgress?.({
        phase: "exhaustive",
        evaluated,
        bestScore: queue.peek()?.fitness,
        message: `Evaluated ${evaluated.toLocaleString()} / ${total.toLocaleString()} teams`,
      });
    }
  }

  return {
    teams: queue.toArray().map((c) => c.team),
    complete,
    evaluated,
    budget: budget.result,
  };
}
