import type { Cookie, SynergyData } from "../../models/types";
import type {
  GenerationResult,
  ProgressCallback,
  SearchBudget,
  Team,
} from "../../models/teamTypes";
import type { OptimizerConfig } from "../../config/optimizerConfig";
import type { Rng } from "../random";

/**
 * Everything a candidate generator needs for one request.
 */
export interface GeneratorContext {
  /** Filtered candidate pool. Required members may or may not be in it. */
  pool: readonly Cookie[];
  /** Members pinned into every team */
  required: readonly Cookie[];
  /** Requested number of candidate teams */
  count: number;
  rng: Rng;
  /** Team total used by the searching strategies */
  fitness: (team: Team) => number;
  powerOf: (cookie: Cookie) => number;
  config: OptimizerConfig;
  /** Synergy lookups for the synergy-seeded strategy */
  synergy?: SynergyData;
  populationSize?: number;
  generations?: number;
  budget?: SearchBudget;
  onProgress?: ProgressCallback;
  /** Clock override for budget tracking */
  now?: () => number;
}

export type Generator = (context: GeneratorContext) => GenerationResult;
