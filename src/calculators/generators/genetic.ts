/**
 * Genetic search over the free slots.
 *
 * Individuals are the non-required members only; required members are
 * prepended when a team is scored, so crossover and mutation can never
 * drop them.
 */

import { TEAM_SIZE, type GenerationResult, type Team } from "../../models/teamTypes";
import type { Cookie } from "../../models/types";
import { remainingPool } from "../combinations";
import { pickOne, randomInt, sampleDistinct, type Rng } from "../random";
import { BoundedPriorityQueue, BudgetTracker, teamKey } from "../searchUtils";
import type { GeneratorContext } from "./types";

type Genome = Cookie[];

interface Evaluated {
  genome: Genome;
  team: Team;
  fitness: number;
}

const byFitnessDesc = (a: Evaluated, b: Evaluated): number => b.fitness - a.fitness;

/**
 * Pool member not already in the genome, or undefined when the pool
 * has none left.
 */
function freshMember(rng: Rng, free: readonly Cookie[], genome: readonly Cookie[]): Cookie | undefined {
  return pickOne(
    rng,
    free.filter((c) => !genome.includes(c))
  );
}

/**
 * Slot-wise crossover. A conflicting gene is taken from the other
 * parent's slot, then from the pool.
 */
export function crossover(
  rng: Rng,
  a: readonly Cookie[],
  b: readonly Cookie[],
  free: readonly Cookie[]
): Genome {
  const child: Genome = [];
  for (let slot = 0; slot < a.length; slot++) {
    const [first, second] = rng() < 0.5 ? [a[slot], b[slot]] : [b[slot], a[slot]];
    const gene = !child.includes(first)
      ? first
      : !child.includes(second)
        ? second
        : freshMember(rng, free, child);
    if (gene) child.push(gene);
  }
  return child;
}

/**
 * Replace one gene with a random pool member not already present.
 */
export function mutate(rng: Rng, genome: Genome, free: readonly Cookie[]): Genome {
  if (genome.length === 0) return genome;
  const replacement = freshMember(rng, free, genome);
  if (!replacement) return genome;
  const mutated = [...genome];
  mutated[randomInt(rng, mutated.length)] = replacement;
  return mutated;
}

/**
 * Evolve a population and return the best distinct teams seen in any
 * generation, best first. The time budget is checked between
 * generations.
 */
export function generateGenetic(context: GeneratorContext): GenerationResult {
  const { required, count, rng, fitness, config } = context;
  const settings = config.genetic;
  const populationSize = context.populationSize ?? settings.populationSize;
  const generations = context.generations ?? settings.generations;
  const free = remainingPool(context.pool, required);
  const slots = TEAM_SIZE - required.length;

  if (free.length < slots) {
    return { teams: [], complete: true, evaluated: 0 };
  }

  const budget = new BudgetTracker(context.budget, context.now);
  const best = new BoundedPriorityQueue<Evaluated>(count, byFitnessDesc);
  const fitnessByKey = new Map<string, number>();

  const evaluate = (genome: Genome): Evaluated => {
    const team: Team = [...required, ...genome];
    const key = teamKey(team);
    let value = fitnessByKey.get(key);
    if (value === undefined) {
      value = fitness(team);
      fitnessByKey.set(key, value);
      best.add({ genome, team, fitness: value });
    }
    return { genome, team, fitness: value };
  };

  const eliteCount = Math.min(
    populationSize,
    Math.max(settings.minElites, Math.floor(populationSize * settings.eliteFraction))
  );

  let population: Genome[] = Array.from({ length: populationSize }, () =>
    sampleDistinct(rng, free, slots)
  );
  let complete = true;

  for (let generation = 0; generation < generations; generation++) {
    if (generation > 0 && budget.check(fitnessByKey.size)) {
      complete = false;
      break;
    }

    const ranked = population.map(evaluate).sort(byFitnessDesc);

    context.onProgress?.({
      phase: "genetic",
      evaluated: fitnessByKey.size,
      bestScore: best.peek()?.fitness,
      generation: generation + 1,
      message: `Generation ${generation + 1}/${generations}`,
    });

    if (generation === generations - 1) break;

    const elites = ranked.slice(0, eliteCount);
    const pickParent = (): Evaluated =>
      (rng() < settings.eliteParentBias ? pickOne(rng, elites) : pickOne(rng, ranked)) ?? ranked[0];

    const next: Genome[] = elites.map((e) => e.genome);
    while (next.length < populationSize) {
      let child = crossover(rng, pickParent().genome, pickParent().genome, free);
      if (rng() < settings.mutationRate) {
        child = mutate(rng, child, free);
      }
      next.push(child);
    }
    population = next;
  }

  return {
    teams: best.toArray().map((e) => e.team),
    complete,
    evaluated: fitnessByKey.size,
    budget: budget.result,
  };
}
