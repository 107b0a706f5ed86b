/**
 * Counter-strategy analysis
 *
 * Reads an enemy composition into a threat profile, lists the
 * weaknesses it exposes, and turns both into a rule-based
 * recommendation that biases candidate generation. Counter teams are
 * then scored against the profile on a 0-100 rubric.
 *
 * Enemy members missing from the threat table contribute zero threat.
 */

import { orderBy, sumBy, take, uniq } from "es-toolkit";
import type { Cookie, MetaTeam, Position, ReferenceData, Treasure } from "../models/types";
import { RARITIES } from "../models/types";
import type {
  CounterRecommendation,
  HighThreatMember,
  MetaTeamMatch,
  Team,
  TeamScore,
  ThreatProfile,
  TreasureRecommendation,
  Weakness,
} from "../models/teamTypes";
import { DEFAULT_CONFIG, type OptimizerConfig } from "../config/optimizerConfig";
import { isDps, isHealer, isTank, teamArchetypes } from "./roles";
import { synergyTotal } from "./scoring";
import { TreasureTally, topRecommendations } from "./treasures";

// ─────────────────────────────────────────────────────────────
// Ability Predicates
// ─────────────────────────────────────────────────────────────

const hasCrowdControl = (c: Cookie): boolean => !!c.crowdControl && c.crowdControl !== "None";
const hasImmunity = (c: Cookie): boolean => !!c.grantsImmunity && c.grantsImmunity !== "None";
const reachesBackline = (c: Cookie): boolean => c.role === "Ambush" || c.targetType === "Backline";

// ─────────────────────────────────────────────────────────────
// Threat Profile
// ─────────────────────────────────────────────────────────────

/**
 * Meta team the enemy corresponds to. An exact match has the same
 * members as the team's typical composition; a partial match holds
 * every core member. Exact matches win, then the most core members.
 */
export function findMetaMatch(
  enemy: Team,
  metaTeams: readonly MetaTeam[]
): MetaTeamMatch | undefined {
  if (enemy.length === 0) return undefined;
  const names = new Set(enemy.map((c) => c.name));

  const exact = metaTeams.find(
    (team) =>
      team.typicalComposition.length === names.size &&
      team.typicalComposition.every((name) => names.has(name))
  );
  if (exact) return { team: exact, exact: true };

  const partial = orderBy(
    metaTeams.filter(
      (team) => team.coreCookies.length > 0 && team.coreCookies.every((name) => names.has(name))
    ),
    [(team) => team.coreCookies.length],
    ["desc"]
  );
  return partial.length > 0 ? { team: partial[0], exact: false } : undefined;
}

/**
 * Aggregate an enemy composition. An empty composition yields a
 * neutral profile (all tallies zero, no flags).
 *
 * @example
 * ```ts
 * const profile = analyzeThreat(enemy, reference);
 * profile.healers;       // ["Eternal Sugar Cookie"]
 * profile.hasHighThreat; // true when any member's threat >= 8
 * ```
 */
export function analyzeThreat(
  enemy: Team,
  reference: ReferenceData,
  config: OptimizerConfig = DEFAULT_CONFIG
): ThreatProfile {
  const { tauntTanks, burstDamage } = reference.categories;
  const names = (predicate: (c: Cookie) => boolean): string[] =>
    enemy.filter(predicate).map((c) => c.name);

  const positions: Record<Position, number> = { Front: 0, Middle: 0, Rear: 0 };
  for (const cookie of enemy) positions[cookie.position]++;

  const memberThreat: Record<string, number> = {};
  const highThreat: HighThreatMember[] = [];
  for (const cookie of enemy) {
    const entry = reference.threats.get(cookie.name);
    const level = entry?.threatLevel ?? 0;
    memberThreat[cookie.name] = level;
    if (entry && level >= config.counter.highThreatCutoff) {
      highThreat.push({ name: cookie.name, threatLevel: level, threats: entry.primaryThreats });
    }
  }
  const totalThreat = sumBy(enemy, (c) => memberThreat[c.name] ?? 0);

  const immunityTypes = uniq(
    enemy.filter(hasImmunity).map((c) => c.grantsImmunity ?? "")
  );

  return {
    size: enemy.length,
    healers: names((c) => isHealer(c, config) || c.providesHealing === true),
    tanks: names((c) => isTank(c, config)),
    dps: names((c) => isDps(c, config)),
    positions,
    crowdControl: names(hasCrowdControl),
    ccTypes: uniq(enemy.filter(hasCrowdControl).map((c) => c.crowdControl ?? "")),
    antiHeal: names((c) => c.antiHeal === true),
    antiTank: names((c) => c.antiTank === true),
    immunity: immunityTypes.length > 0,
    immunityTypes,
    cleanse: names((c) => c.dispel === true),
    shieldProviders: names((c) => c.providesShield === true),
    beasts: names((c) => c.rarity === "Beast"),
    taunt: enemy.some((c) => tauntTanks.includes(c.name)),
    burstDamage: enemy.some((c) => c.skillType === "Damage" || burstDamage.includes(c.name)),
    memberThreat,
    totalThreat,
    averageThreat: enemy.length > 0 ? totalThreat / enemy.length : 0,
    highThreat: orderBy(highThreat, [(m) => m.threatLevel], ["desc"]),
    hasHighThreat: highThreat.length > 0,
    metaMatch: findMetaMatch(enemy, reference.metaTeams),
  };
}

// ─────────────────────────────────────────────────────────────
// Weaknesses
// ─────────────────────────────────────────────────────────────

/**
 * Exploitable gaps in the enemy composition. Empty for an empty
 * enemy.
 */
export function identifyWeaknesses(profile: ThreatProfile): Weakness[] {
  if (profile.size === 0) return [];

  const healers = profile.healers.length;
  const { Front: front, Rear: rear } = profile.positions;
  const weaknesses: Weakness[] = [];

  if (healers === 0) {
    weaknesses.push({
      weakness: "No Healing/Sustain",
      description: "Team cannot recover from damage over time",
      exploit: "Use sustained DPS or high burst damage to overwhelm",
      priority: "HIGH",
      confidence: 95,
    });
  }

  if (front >= 3) {
    weaknesses.push({
      weakness: "Tank-Heavy Frontline",
      description: `${front} cookies in front position`,
      exploit: "Use defense shred, ambush cookies, or percentage-based damage",
      priority: "HIGH",
      confidence: 90,
    });
  }

  if (rear >= 3 && front <= 1) {
    weaknesses.push({
      weakness: "Exposed Backline",
      description: `${rear} rear cookies with weak frontline`,
      exploit: "Use ambush assassins to eliminate squishy backline targets",
      priority: "HIGH",
      confidence: 92,
    });
  }

  if (!profile.immunity && profile.crowdControl.length === 0) {
    weaknesses.push({
      weakness: "No CC Immunity",
      description: "Team vulnerable to stun/freeze/silence lockdown",
      exploit: "Use crowd control heavy team to prevent skill usage",
      priority: "MEDIUM",
      confidence: 75,
    });
  }

  if (profile.cleanse.length === 0) {
    weaknesses.push({
      weakness: "No Debuff Cleanse",
      description: "Cannot remove negative status effects",
      exploit: "Stack debuffs and damage-over-time effects",
      priority: "MEDIUM",
      confidence: 70,
    });
  }

  if (healers >= 2) {
    weaknesses.push({
      weakness: "Healing-Heavy Team",
      description: `${healers} support/healing cookies`,
      exploit: "Use anti-heal cookies or burst damage to eliminate healers first",
      priority: "HIGH",
      confidence: 88,
    });
  }

  if (profile.hasHighThreat && !profile.taunt) {
    const threats = profile.highThreat.map((m) => m.name).join(", ");
    weaknesses.push({
      weakness: "High Threat Without Taunt Defense",
      description: `${threats} can act freely with no taunt tank to protect them`,
      exploit: "Counter with taunt tanks, documented counters, or a mirror match",
      priority: "CRITICAL",
      confidence: 95,
    });
  }

  if (profile.burstDamage && healers <= 1) {
    weaknesses.push({
      weakness: "Burst-Heavy Low-Sustain Team",
      description: "High damage but cannot sustain through long fights",
      exploit: "Use high HP tanks and shields to survive burst, then attrition",
      priority: "HIGH",
      confidence: 85,
    });
  }

  if (healers >= 1 && profile.antiHeal.length === 0) {
    weaknesses.push({
      weakness: "No Anti-Heal",
      description: "Cannot counter enemy healing",
      exploit: "If using healing team, stack sustain to outlast",
      priority: "LOW",
      confidence: 60,
    });
  }

  return weaknesses;
}

// ─────────────────────────────────────────────────────────────
// Counter Recommendation
// ─────────────────────────────────────────────────────────────

interface CounterRule {
  id: string;
  strategy: string;
  archetype: string;
  recommended: string[];
  avoid?: string[];
  priorityTargets?: string[];
}

/**
 * Ability-based name lists drawn from the candidate pool,
 * highest rarity first.
 */
function poolLists(pool: readonly Cookie[], config: OptimizerConfig) {
  const ordered = orderBy(
    [...pool],
    [(c) => RARITIES.indexOf(c.rarity), (c) => c.name],
    ["desc", "asc"]
  );
  const names = (predicate: (c: Cookie) => boolean): string[] =>
    ordered.filter(predicate).map((c) => c.name);
  const highTier = new Set(config.counter.highTierRarities);

  return {
    ordered,
    highTier: names((c) => highTier.has(c.rarity)),
    burst: names((c) => c.skillType === "Damage" && highTier.has(c.rarity)),
    antiHeal: names((c) => c.antiHeal === true),
    antiTank: names((c) => c.antiTank === true),
    backline: names(reachesBackline),
    immunity: names(hasImmunity),
    crowdControl: names(hasCrowdControl),
    shields: names((c) => c.providesShield === true),
    healing: names((c) => c.providesHealing === true),
    debuff: names((c) => c.skillType === "Debuff"),
  };
}

/**
 * Confidence from the rules fired and the meta-team match.
 */
export function counterConfidence(profile: ThreatProfile, rulesFired: number): number {
  if (profile.size === 0) return 30;
  if (profile.metaMatch?.exact) return 95;
  const base = profile.metaMatch ? 70 : 60;
  return Math.min(base + 5 * rulesFired, 85);
}

/**
 * Apply the ordered counter rules and merge their picks.
 *
 * Rules run highest priority first: documented counters of
 * high-threat members, meta-team counters, then the composition
 * rules. The first rule to fire sets the strategy and archetype.
 * Picks are deduplicated in rule order and capped.
 */
export function recommendCounters(
  profile: ThreatProfile,
  pool: readonly Cookie[],
  reference: ReferenceData,
  config: OptimizerConfig = DEFAULT_CONFIG
): CounterRecommendation {
  const lists = poolLists(pool, config);
  const cap = config.counter.maxRecommendations;

  if (profile.size === 0) {
    return {
      recommended: take(lists.highTier, cap),
      avoid: [],
      priorityTargets: [],
      strategy: "No enemy composition given; favour strong, balanced picks",
      archetype: "Balanced",
      confidence: counterConfidence(profile, 0),
      rulesFired: [],
    };
  }

  const healers = profile.healers.length;
  const { Front: front, Rear: rear } = profile.positions;
  const rules: CounterRule[] = [];

  if (profile.hasHighThreat) {
    const names = profile.highThreat.map((m) => m.name);
    rules.push({
      id: "high-threat",
      strategy:
        profile.highThreat
          .map((m) => reference.threats.get(m.name)?.counterStrategy)
          .find((s): s is string => !!s) ?? `Neutralize ${names.join(", ")} first`,
      archetype: "Threat Counter",
      recommended: profile.highThreat.flatMap((m) => reference.threats.get(m.name)?.counters ?? []),
      priorityTargets: names,
    });
  }

  if (profile.metaMatch) {
    const meta = profile.metaMatch.team;
    rules.push({
      id: "meta-team",
      strategy: `Counter the ${meta.name} composition`,
      archetype: `Anti-${meta.archetype}`,
      recommended: meta.counterCookies,
      priorityTargets: meta.coreCookies,
    });
  }

  if (healers >= 2) {
    rules.push({
      id: "healing-heavy",
      strategy: "Eliminate healers with ambush cookies and use anti-heal",
      archetype: "Anti-Heal Assassin",
      recommended: [...lists.antiHeal, ...take(lists.backline, 3)],
      priorityTargets: [...profile.healers],
    });
  }

  if (healers === 0) {
    rules.push({
      id: "no-sustain",
      strategy: "High burst damage to exploit lack of sustain",
      archetype: "Burst Damage",
      recommended: take(lists.burst, 5),
      avoid: lists.antiHeal,
    });
  }

  if (front >= 3) {
    rules.push({
      id: "tank-heavy",
      strategy: "Defense shred and sustained damage against tanks",
      archetype: "Defense Shred",
      recommended: lists.antiTank,
    });
  }

  if (rear >= 3 && front <= 1) {
    rules.push({
      id: "exposed-backline",
      strategy: "Ambush assassins to eliminate exposed backline",
      archetype: "Dive/Assassin",
      recommended: lists.backline,
      priorityTargets: [...profile.healers, ...profile.dps],
    });
  }

  if (profile.crowdControl.length >= 2) {
    rules.push({
      id: "cc-heavy",
      strategy: `Immunity to counter ${profile.ccTypes.join(", ")} crowd control`,
      archetype: "Immunity/Cleanse",
      recommended: lists.immunity,
    });
  }

  if (profile.burstDamage && healers <= 1) {
    rules.push({
      id: "burst",
      strategy: "High HP tanks, shields, and healing to survive burst, then attrition",
      archetype: "Tank/Sustain",
      recommended: [
        ...take(lists.shields, 3),
        ...take(lists.healing, 2),
        ...take(reference.categories.highHpTanks, 2),
      ],
    });
  }

  if (!profile.immunity) {
    rules.push({
      id: "no-immunity",
      strategy: "Heavy crowd control to lock down enemy team",
      archetype: "CC Lockdown",
      recommended: take(lists.crowdControl, 3),
    });
  }

  if (profile.cleanse.length === 0 && lists.debuff.length > 0) {
    rules.push({
      id: "no-cleanse",
      strategy: "Stack debuffs and damage-over-time effects",
      archetype: "Debuff Stacking",
      recommended: take(lists.debuff, 3),
    });
  }

  const lead = rules[0];
  return {
    recommended: take(uniq(rules.flatMap((r) => r.recommended)), cap),
    avoid: uniq(rules.flatMap((r) => r.avoid ?? [])),
    priorityTargets: uniq(rules.flatMap((r) => r.priorityTargets ?? [])),
    strategy: lead?.strategy ?? "Balanced team with strong fundamentals",
    archetype: lead?.archetype ?? "Balanced",
    confidence: counterConfidence(profile, rules.length),
    rulesFired: rules.map((r) => r.id),
  };
}

/**
 * Candidate pool for the biased share of counter generation:
 * recommended pool members in recommendation order, topped up with
 * high-tier members until it reaches the configured minimum.
 */
export function buildBiasedPool(
  recommendation: CounterRecommendation,
  pool: readonly Cookie[],
  config: OptimizerConfig = DEFAULT_CONFIG
): Cookie[] {
  const byName = new Map(pool.map((c) => [c.name, c]));
  const biased = recommendation.recommended
    .map((name) => byName.get(name))
    .filter((c): c is Cookie => c !== undefined);

  const highTier = new Set(config.counter.highTierRarities);
  for (const cookie of pool) {
    if (biased.length >= config.counter.minBiasedPool) break;
    if (highTier.has(cookie.rarity) && !biased.includes(cookie)) {
      biased.push(cookie);
    }
  }

  return biased;
}

// ─────────────────────────────────────────────────────────────
// Counter Score
// ─────────────────────────────────────────────────────────────

/**
 * How well a team answers the enemy (0-100).
 *
 * Recommended members earn up to 40; answers to specific enemy
 * traits up to 35; role balance 15; synergy share 15.
 */
export function counterScore(
  team: Team,
  profile: ThreatProfile,
  recommendation: CounterRecommendation,
  teamScore: TeamScore,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const recommended = new Set(recommendation.recommended);
  let score = (team.filter((c) => recommended.has(c.name)).length / 5) * 40;

  if (profile.healers.length >= 2 && team.some((c) => c.antiHeal === true)) score += 10;
  if (profile.positions.Rear >= 3 && team.some(reachesBackline)) score += 10;
  if (profile.tanks.length >= 2 && team.some((c) => c.antiTank === true)) score += 10;
  if (!profile.immunity && team.some(hasCrowdControl)) score += 5;
  if (profile.crowdControl.length >= 2 && team.some(hasImmunity)) score += 5;

  if (team.some((c) => isTank(c, config))) score += 5;
  if (team.some((c) => isHealer(c, config))) score += 5;
  if (team.some((c) => isDps(c, config))) score += 5;

  const y = config.synergy;
  const synergyCeiling = Math.max(y.elementTrio, y.elementPair) + y.groupCap + y.comboCap;
  score += (synergyTotal(teamScore) / synergyCeiling) * 15;

  return Math.min(score, 100);
}

export function combinedScore(
  counter: number,
  teamTotal: number,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  return counter * config.counter.counterWeight + teamTotal * config.counter.teamWeight;
}

// ─────────────────────────────────────────────────────────────
// Counter Treasures
// ─────────────────────────────────────────────────────────────

const COUNTER_ARCHETYPES = new Set(["DPS", "Tank", "Sustain"]);

/**
 * Treasures that answer the enemy's profile, for a given counter team.
 */
export function recommendCounterTreasures(
  profile: ThreatProfile,
  team: Team,
  treasures: readonly Treasure[],
  limit: number = 3,
  config: OptimizerConfig = DEFAULT_CONFIG
): TreasureRecommendation[] {
  const healers = profile.healers.length;
  const { Front: front, Rear: rear } = profile.positions;
  const archetypes = [...teamArchetypes(team, config)].filter((a) => COUNTER_ARCHETYPES.has(a));
  const archetypeLabels: ReadonlySet<string> = new Set(archetypes);

  const tallies = treasures.map((t) => {
    const tally = new TreasureTally(t);
    const offensive = t.atkBoost > 0 || t.critBoost > 0;

    if (healers >= 2) {
      if (offensive) tally.add(4, "Burst damage to overwhelm healing");
      if (t.enemyDebuff) tally.add(3, "Debuffs to reduce enemy effectiveness");
    }

    if (profile.tanks.length >= 2) {
      if (t.cooldownReduction > 0) tally.add(4, "CDR for sustained pressure vs tanks");
      if (t.atkBoost > 0) tally.add(2, "ATK boost for tank-busting");
    }

    if (rear >= 3 && front <= 1) {
      if (offensive) tally.add(5, "Offensive stats to punish weak frontline");
      if (t.cooldownReduction > 0) tally.add(3, "Faster skills to burst backline");
    }

    if (profile.hasHighThreat) {
      const threat = profile.highThreat[0]?.name ?? "high-threat cookies";
      if (t.hpShield > 0) tally.add(4, `Shield to survive ${threat}`);
      if (t.dmgResist > 0) tally.add(3, `DMG resist vs ${threat}`);
      if (t.debuffCleanse) tally.add(3, `Cleanse ${threat} debuffs`);
    }

    if (profile.crowdControl.length >= 2) {
      if (t.hpShield > 0 || t.heal > 0) {
        tally.add(4, `Sustain to survive ${profile.ccTypes.join(", ")} CC`);
      }
      if (t.debuffCleanse) tally.add(5, "Cleanse crowd control effects");
    }

    if (profile.burstDamage) {
      if (t.hpShield > 0) tally.add(5, "Shield critical vs burst damage");
      if (t.dmgResist > 0) tally.add(4, "DMG resist to survive initial burst");
      if (t.heal > 0) tally.add(3, "Healing to recover from burst");
      if (t.revive) tally.add(4, "Revival as backup vs burst");
    }

    if (!profile.immunity) {
      if (t.enemyDebuff) tally.add(4, "Debuffs (enemy has no immunity)");
      if (t.cooldownReduction > 0) tally.add(2, "CDR to spam CC");
    }

    if (profile.cleanse.length === 0 && t.enemyDebuff) {
      tally.add(3, "Enemy can't cleanse debuffs");
    }

    if (t.recommendedArchetypes.includes("Universal")) {
      tally.add(3, tally.hasReasons ? undefined : "Universal treasure (works with any strategy)");
    }

    const matching = t.recommendedArchetypes.filter((a) => archetypeLabels.has(a)).length;
    if (matching > 0) tally.add(matching * 1.5);

    return tally;
  });

  return topRecommendations(tallies, limit);
}
