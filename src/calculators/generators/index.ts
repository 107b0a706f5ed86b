import type { GenerationResult, StrategyName } from "../../models/teamTypes";
import { generateExhaustive } from "./exhaustive";
import { generateGenetic } from "./genetic";
import { generateGreedy } from "./greedy";
import { generateRandom } from "./random";
import { generateSynergy } from "./synergy";
import type { Generator, GeneratorContext } from "./types";

export const GENERATORS: Record<StrategyName, Generator> = {
  random: generateRandom,
  greedy: generateGreedy,
  genetic: generateGenetic,
  exhaustive: generateExhaustive,
  synergy: generateSynergy,
};

export function generateTeams(strategy: StrategyName, context: GeneratorContext): GenerationResult {
  return GENERATORS[strategy](context);
}

export { generateExhaustive, assertExhaustiveFeasible } from "./exhaustive";
export { generateGenetic, crossover, mutate } from "./genetic";
export { generateGreedy } from "./greedy";
export { generateRandom } from "./random";
export {
  generateSynergy,
  comboSeedGroups,
  elementSeedGroups,
  groupSeedGroups,
} from "./synergy";
export type { Generator, GeneratorContext } from "./types";
