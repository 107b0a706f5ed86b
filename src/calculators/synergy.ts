/**
 * Synergy sub-scores: shared elements, synergy groups and
 * named special combos.
 *
 * Cookies missing from a lookup contribute nothing to that
 * sub-score.
 */

import { countBy, maxBy } from "es-toolkit";
import type { Cookie, Element, SpecialCombo, SynergyData } from "../models/types";
import type { Team } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";

// ─────────────────────────────────────────────────────────────
// Element Synergy
// ─────────────────────────────────────────────────────────────

/**
 * Size of the best-represented element among mapped members.
 */
export function bestElementCount(team: Team, synergy: SynergyData): number {
  const mapped = team
    .map((c) => synergy.elements.get(c.name))
    .filter((e): e is Element => e !== undefined);
  if (mapped.length === 0) return 0;
  const counts = Object.values(countBy(mapped, (e) => e));
  return Math.max(...counts);
}

/**
 * 3+ members sharing one element score the trio value, exactly 2
 * the pair value. Only the best element counts.
 */
export function elementSynergyScore(
  team: Team,
  synergy: SynergyData,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const best = bestElementCount(team, synergy);
  if (best >= 3) return config.synergy.elementTrio;
  if (best === 2) return config.synergy.elementPair;
  return 0;
}

// ─────────────────────────────────────────────────────────────
// Group Synergy
// ─────────────────────────────────────────────────────────────

/**
 * Members per synergy group present in the team
 */
export function groupCounts(team: Team, synergy: SynergyData): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const cookie of team) {
    for (const group of synergy.groups.get(cookie.name) ?? []) {
      counts[group] = (counts[group] ?? 0) + 1;
    }
  }
  return counts;
}

/**
 * Sum over groups (3+ members or exactly 2), capped.
 */
export function groupSynergyScore(
  team: Team,
  synergy: SynergyData,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const { groupTrio, groupPair, groupCap } = config.synergy;
  let total = 0;
  for (const count of Object.values(groupCounts(team, synergy))) {
    if (count >= 3) total += groupTrio;
    else if (count === 2) total += groupPair;
  }
  return Math.min(total, groupCap);
}

// ─────────────────────────────────────────────────────────────
// Special Combos
// ─────────────────────────────────────────────────────────────

/**
 * Every cookie name a combo can use
 */
export function comboMembers(combo: SpecialCombo): string[] {
  return combo.kind === "all" ? combo.members : [...combo.anchors, ...combo.optional];
}

export function comboActivates(combo: SpecialCombo, names: ReadonlySet<string>): boolean {
  switch (combo.kind) {
    case "all":
      return combo.members.every((m) => names.has(m));
    case "anchor": {
      if (!combo.anchors.every((m) => names.has(m))) return false;
      const present = comboMembers(combo).filter((m) => names.has(m)).length;
      return present >= combo.minMembers;
    }
  }
}

/**
 * Combos activated by the team
 */
export function activeCombos(team: Team, synergy: SynergyData): SpecialCombo[] {
  const names = new Set(team.map((c) => c.name));
  return synergy.combos.filter((combo) => comboActivates(combo, names));
}

/**
 * Highest-value activated combo. Combos never stack.
 */
export function specialComboScore(
  team: Team,
  synergy: SynergyData,
  config: OptimizerConfig = DEFAULT_CONFIG
): { score: number; combo?: SpecialCombo } {
  const best = maxBy(activeCombos(team, synergy), (combo) => combo.bonus);
  if (!best) return { score: 0 };
  return { score: Math.min(best.bonus, config.synergy.comboCap), combo: best };
}

// ─────────────────────────────────────────────────────────────
// Aggregate
// ─────────────────────────────────────────────────────────────

export interface SynergyBreakdown {
  elementSynergy: number;
  groupSynergy: number;
  specialCombo: number;
  activeCombo?: string;
}

export function calculateSynergy(
  team: Team,
  synergy: SynergyData,
  config: OptimizerConfig = DEFAULT_CONFIG
): SynergyBreakdown {
  const combo = specialComboScore(team, synergy, config);
  return {
    elementSynergy: elementSynergyScore(team, synergy, config),
    groupSynergy: groupSynergyScore(team, synergy, config),
    specialCombo: combo.score,
    activeCombo: combo.combo?.name,
  };
}

/**
 * Selection weight favouring cookies with more synergy ties.
 */
export function synergyAffinity(cookie: Cookie, synergy: SynergyData): number {
  const groups = synergy.groups.get(cookie.name)?.length ?? 0;
  const combos = synergy.combos.filter((combo) => comboMembers(combo).includes(cookie.name)).length;
  return 1 + groups * 2 + combos * 3;
}
