/**
 * Greedy construction with seeded restarts.
 *
 * Candidates are ordered by power (ties by name). Restart i pins
 * candidate i into the first free slot; once every candidate has
 * seeded a restart, later cycles add random jitter to the power
 * comparison so they explore different fills.
 */

import { orderBy } from "es-toolkit";
import type { Cookie, Position, Role } from "../../models/types";
import { TEAM_SIZE, type GenerationResult, type Team } from "../../models/teamTypes";
import { remainingPool } from "../combinations";
import type { Rng } from "../random";
import { teamKey } from "../searchUtils";
import type { GeneratorContext } from "./types";

interface FillState {
  members: Cookie[];
  roles: Set<Role>;
  positions: Set<Position>;
}

function addMember(state: FillState, cookie: Cookie): void {
  state.members.push(cookie);
  state.roles.add(cookie.role);
  state.positions.add(cookie.position);
}

/**
 * Roles and positions the cookie would add to the team
 */
function coverageGain(state: FillState, cookie: Cookie): number {
  return (state.roles.has(cookie.role) ? 0 : 1) + (state.positions.has(cookie.position) ? 0 : 1);
}

/**
 * Build one team: required members, the seed, then the best
 * remaining candidate per slot.
 */
function buildTeam(
  required: readonly Cookie[],
  seed: Cookie | undefined,
  candidates: readonly Cookie[],
  powerOf: (cookie: Cookie) => number,
  jitter: () => number
): Team {
  const state: FillState = { members: [], roles: new Set(), positions: new Set() };
  for (const cookie of required) addMember(state, cookie);
  if (seed && state.members.length < TEAM_SIZE) addMember(state, seed);

  while (state.members.length < TEAM_SIZE) {
    let best: Cookie | undefined;
    let bestGain = -1;
    let bestPower = -Infinity;

    for (const cookie of candidates) {
      if (state.members.includes(cookie)) continue;
      const gain = coverageGain(state, cookie);
      const power = powerOf(cookie) + jitter();
      if (gain > bestGain || (gain === bestGain && power > bestPower)) {
        best = cookie;
        bestGain = gain;
        bestPower = power;
      }
    }

    if (!best) break;
    addMember(state, best);
  }

  return state.members;
}

function jitterFor(rng: Rng, cycle: number): () => number {
  return cycle === 0 ? () => 0 : () => rng() * cycle;
}

/**
 * Produce exactly `count` teams. A restart that lands on a team
 * already built retries with jitter a few times before accepting
 * the repeat.
 */
export function generateGreedy(context: GeneratorContext): GenerationResult {
  const { required, count, rng, powerOf, config } = context;
  const free = remainingPool(context.pool, required);
  const slots = TEAM_SIZE - required.length;

  if (free.length < slots) {
    return { teams: [], complete: true, evaluated: 0 };
  }

  const candidates = orderBy(free, [(c) => powerOf(c), (c) => c.name], ["desc", "asc"]);
  const seen = new Set<string>();
  const teams: Team[] = [];

  for (let i = 0; i < count; i++) {
    const seed = slots > 0 ? candidates[i % candidates.length] : undefined;
    const cycle = Math.floor(i / candidates.length);

    let team = buildTeam(required, seed, candidates, powerOf, jitterFor(rng, cycle));
    for (let retry = 1; retry <= config.duplicateRetries && seen.has(teamKey(team)); retry++) {
      team = buildTeam(required, seed, candidates, powerOf, jitterFor(rng, cycle + retry));
    }

    seen.add(teamKey(team));
    teams.push(team);
  }

  context.onProgress?.({
    phase: "greedy",
    evaluated: 0,
    message: `Built ${teams.length} teams from ${candidates.length} candidates`,
  });

  return { teams, complete: true, evaluated: 0 };
}
