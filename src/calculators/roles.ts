import { countBy } from "es-toolkit";
import type { Cookie, Position, Role } from "../models/types";
import type { Team } from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";

export function isTank(cookie: Cookie, config: OptimizerConfig = DEFAULT_CONFIG): boolean {
  return config.roleClasses.tank.includes(cookie.role);
}

export function isHealer(cookie: Cookie, config: OptimizerConfig = DEFAULT_CONFIG): boolean {
  return config.roleClasses.healer.includes(cookie.role);
}

export function isDps(cookie: Cookie, config: OptimizerConfig = DEFAULT_CONFIG): boolean {
  return config.roleClasses.dps.includes(cookie.role);
}

export function isSummoner(cookie: Cookie): boolean {
  return cookie.skillType === "Summon";
}

/**
 * Tank-class cookie placed in the front row
 */
export function isFrontTank(cookie: Cookie, config: OptimizerConfig = DEFAULT_CONFIG): boolean {
  return cookie.position === "Front" && isTank(cookie, config);
}

export function roleDistribution(team: Team): Partial<Record<Role, number>> {
  return countBy(team, (c) => c.role);
}

export function positionDistribution(team: Team): Partial<Record<Position, number>> {
  return countBy(team, (c) => c.position);
}

export type TeamArchetype = "DPS" | "Tank" | "Sustain" | "Summoner";

/**
 * Archetype labels a treasure's recommendations are matched against
 */
export function teamArchetypes(
  team: Team,
  config: OptimizerConfig = DEFAULT_CONFIG
): Set<TeamArchetype> {
  const archetypes = new Set<TeamArchetype>();
  if (team.some((c) => isDps(c, config))) archetypes.add("DPS");
  if (team.some((c) => isTank(c, config))) archetypes.add("Tank");
  if (team.some((c) => isHealer(c, config))) archetypes.add("Sustain");
  if (team.some(isSummoner)) archetypes.add("Summoner");
  return archetypes;
}
