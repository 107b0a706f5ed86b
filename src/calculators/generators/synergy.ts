/**
 * Synergy-seeded generation.
 *
 * A third of the requested teams each are built around special-combo
 * members, synergy-group members and same-element members. The rest
 * come from draws weighted by {@link synergyAffinity}.
 */

import type { Cookie, SynergyData } from "../../models/types";
import { TEAM_SIZE, type GenerationResult, type Team } from "../../models/teamTypes";
import { remainingPool } from "../combinations";
import { sampleDistinct, weightedSampleDistinct } from "../random";
import { teamKey } from "../searchUtils";
import { comboMembers, synergyAffinity } from "../synergy";
import type { GeneratorContext } from "./types";

const SEED_CORE_SIZE = 3;

// ─────────────────────────────────────────────────────────────
// Seed Groups
// ─────────────────────────────────────────────────────────────

/**
 * Free members of each special combo
 */
export function comboSeedGroups(free: readonly Cookie[], synergy: SynergyData): Cookie[][] {
  return synergy.combos
    .map((combo) => {
      const names = new Set(comboMembers(combo));
      return free.filter((c) => names.has(c.name));
    })
    .filter((group) => group.length > 0);
}

/**
 * Free members of each synergy group with at least two of them
 */
export function groupSeedGroups(free: readonly Cookie[], synergy: SynergyData): Cookie[][] {
  const byGroup = new Map<string, Cookie[]>();
  for (const cookie of free) {
    for (const group of synergy.groups.get(cookie.name) ?? []) {
      const members = byGroup.get(group) ?? [];
      members.push(cookie);
      byGroup.set(group, members);
    }
  }
  return [...byGroup.keys()]
    .sort()
    .map((group) => byGroup.get(group) ?? [])
    .filter((members) => members.length >= 2);
}

/**
 * Free members sharing an element, for elements with at least three
 */
export function elementSeedGroups(free: readonly Cookie[], synergy: SynergyData): Cookie[][] {
  const byElement = new Map<string, Cookie[]>();
  for (const cookie of free) {
    const element = synergy.elements.get(cookie.name);
    if (!element) continue;
    const members = byElement.get(element) ?? [];
    members.push(cookie);
    byElement.set(element, members);
  }
  return [...byElement.keys()]
    .sort()
    .map((element) => byElement.get(element) ?? [])
    .filter((members) => members.length >= SEED_CORE_SIZE);
}

// ─────────────────────────────────────────────────────────────
// Generator
// ─────────────────────────────────────────────────────────────

export function generateSynergy(context: GeneratorContext): GenerationResult {
  const { required, count, rng } = context;
  const synergy: SynergyData = context.synergy ?? {
    elements: new Map(),
    groups: new Map(),
    combos: [],
  };
  const free = remainingPool(context.pool, required);
  const slots = TEAM_SIZE - required.length;

  if (free.length < slots) {
    return { teams: [], complete: true, evaluated: 0 };
  }

  const teams: Team[] = [];
  const seen = new Set<string>();
  const accept = (fill: readonly Cookie[]): boolean => {
    const team: Team = [...required, ...fill];
    const key = teamKey(team);
    if (team.length !== TEAM_SIZE || seen.has(key)) return false;
    seen.add(key);
    teams.push(team);
    return true;
  };

  /**
   * Round-robin over the seed groups: up to three members from the
   * group, the remaining slots uniformly from the pool.
   */
  const seedFrom = (groups: Cookie[][], target: number): void => {
    if (groups.length === 0) return;
    let added = 0;
    for (let attempt = 0; added < target && attempt < target * 3; attempt++) {
      const group = groups[attempt % groups.length];
      const core = sampleDistinct(rng, group, Math.min(SEED_CORE_SIZE, slots));
      const rest = sampleDistinct(
        rng,
        free.filter((c) => !core.includes(c)),
        slots - core.length
      );
      if (accept([...core, ...rest])) added++;
    }
  };

  const third = Math.floor(count / 3);
  seedFrom(comboSeedGroups(free, synergy), third);
  seedFrom(groupSeedGroups(free, synergy), third);
  seedFrom(elementSeedGroups(free, synergy), third);

  const affinity = (cookie: Cookie): number => synergyAffinity(cookie, synergy);
  const maxAttempts = count * 10;
  for (let attempt = 0; teams.length < count && attempt < maxAttempts; attempt++) {
    accept(weightedSampleDistinct(rng, free, affinity, slots));
  }

  context.onProgress?.({
    phase: "synergy",
    evaluated: 0,
    message: `Seeded ${teams.length} synergy teams`,
  });

  return { teams, complete: true, evaluated: 0 };
}
