/**
 * Random sampling: uniform draws of the free slots.
 */

import { TEAM_SIZE, type GenerationResult, type Team } from "../../models/teamTypes";
import { remainingPool } from "../combinations";
import { sampleDistinct } from "../random";
import { teamKey } from "../searchUtils";
import type { GeneratorContext } from "./types";

/**
 * Draw `count` teams. A duplicate is redrawn up to
 * `config.duplicateRetries` times, then kept.
 */
export function generateRandom(context: GeneratorContext): GenerationResult {
  const { required, count, rng, config } = context;
  const free = remainingPool(context.pool, required);
  const slots = TEAM_SIZE - required.length;

  if (free.length < slots) {
    return { teams: [], complete: true, evaluated: 0 };
  }

  const draw = (): Team => [...required, ...sampleDistinct(rng, free, slots)];
  const seen = new Set<string>();
  const teams: Team[] = [];

  for (let i = 0; i < count; i++) {
    let team = draw();
    for (let retry = 0; retry < config.duplicateRetries && seen.has(teamKey(team)); retry++) {
      team = draw();
    }
    seen.add(teamKey(team));
    teams.push(team);
  }

  context.onProgress?.({
    phase: "random",
    evaluated: 0,
    message: `Sampled ${teams.length} teams (${seen.size} distinct)`,
  });

  return { teams, complete: true, evaluated: 0 };
}
