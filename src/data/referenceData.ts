/**
 * Reference data schemas, construction and catalog validation.
 *
 * Raw tables are plain JSON records. {@link buildReferenceData}
 * turns them into the keyed maps the optimizer reads, and
 * {@link validateReferenceData} checks every key against the catalog.
 */

import { z } from "zod";
import {
  BOSS_TRAITS,
  ELEMENTS,
  POSITIONS,
  RARITIES,
  ROLES,
  TREASURE_TIERS,
  type ReferenceData,
  type SynergyData,
} from "../models/types";
import type { CookieRepository } from "./CookieRepository";

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

export const cookieSchema = z.object({
  name: z.string().min(1),
  rarity: z.enum(RARITIES),
  role: z.enum(ROLES),
  position: z.enum(POSITIONS),
  skillType: z.string().optional(),
  crowdControl: z.string().optional(),
  grantsImmunity: z.string().optional(),
  providesHealing: z.boolean().optional(),
  providesShield: z.boolean().optional(),
  antiHeal: z.boolean().optional(),
  antiTank: z.boolean().optional(),
  dispel: z.boolean().optional(),
  targetType: z.string().optional(),
});

export const catalogFileSchema = z.object({
  cookies: z.array(cookieSchema),
});

const comboSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("all"),
    name: z.string().min(1),
    members: z.array(z.string()).min(1),
    bonus: z.number().nonnegative(),
  }),
  z.object({
    kind: z.literal("anchor"),
    name: z.string().min(1),
    anchors: z.array(z.string()).min(1),
    optional: z.array(z.string()),
    minMembers: z.number().int().positive(),
    bonus: z.number().nonnegative(),
  }),
]);

export const synergyFileSchema = z.object({
  /** cookie name -> element */
  elements: z.record(z.enum(ELEMENTS)),
  /** group name -> member cookie names */
  groups: z.record(z.array(z.string())),
  combos: z.array(comboSchema),
});

const treasureSchema = z.object({
  name: z.string().min(1),
  tier: z.enum(TREASURE_TIERS),
  atkBoost: z.number().nonnegative().default(0),
  critBoost: z.number().nonnegative().default(0),
  cooldownReduction: z.number().nonnegative().default(0),
  dmgResist: z.number().nonnegative().default(0),
  hpShield: z.number().nonnegative().default(0),
  heal: z.number().nonnegative().default(0),
  revive: z.boolean().default(false),
  debuffCleanse: z.boolean().default(false),
  enemyDebuff: z.boolean().default(false),
  summonBoost: z.boolean().default(false),
  recommendedArchetypes: z.array(z.string()).default([]),
});

export const treasureFileSchema = z.object({
  treasures: z.array(treasureSchema),
});

const threatSchema = z.object({
  counters: z.array(z.string()),
  threatLevel: z.number().min(0).max(10),
  primaryThreats: z.array(z.string()),
  counterStrategy: z.string(),
});

export const threatFileSchema = z.object({
  threats: z.record(threatSchema),
  categories: z.object({
    tauntTanks: z.array(z.string()),
    highHpTanks: z.array(z.string()),
    burstDamage: z.array(z.string()),
  }),
});

const metaTeamSchema = z.object({
  name: z.string().min(1),
  tier: z.string(),
  archetype: z.string(),
  coreCookies: z.array(z.string()).min(1),
  typicalComposition: z.array(z.string()),
  counterCookies: z.array(z.string()),
  recommendedTreasures: z.array(z.string()),
  treasureRationale: z.string(),
});

export const metaTeamFileSchema = z.object({
  metaTeams: z.array(metaTeamSchema),
});

const bossSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  mechanics: z.array(z.string()),
  strategy: z.array(z.string()),
  preferredTraits: z.array(z.enum(BOSS_TRAITS)),
  avoidTraits: z.array(z.enum(BOSS_TRAITS)).default([]),
  sTier: z.array(z.string()),
  aTier: z.array(z.string()).default([]),
});

export const bossFileSchema = z.object({
  bosses: z.array(bossSchema).min(1),
  /** cookie name -> traits its fields do not show */
  traits: z.record(z.array(z.enum(BOSS_TRAITS))),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;
export type SynergyFile = z.infer<typeof synergyFileSchema>;
export type TreasureFile = z.infer<typeof treasureFileSchema>;
export type ThreatFile = z.infer<typeof threatFileSchema>;
export type MetaTeamFile = z.infer<typeof metaTeamFileSchema>;
export type BossFile = z.infer<typeof bossFileSchema>;

/**
 * All raw tables, as parsed from the data directory
 */
export interface RawReferenceData {
  synergy: SynergyFile;
  treasures: TreasureFile;
  threats: ThreatFile;
  metaTeams: MetaTeamFile;
  bosses: BossFile;
}

// ─────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────

/**
 * Build the synergy lookups. Group membership is inverted so it
 * can be read per cookie.
 */
export function buildSynergyData(raw: SynergyFile): SynergyData {
  const groups = new Map<string, string[]>();
  for (const [group, members] of Object.entries(raw.groups)) {
    for (const member of members) {
      const current = groups.get(member);
      if (current) {
        if (!current.includes(group)) current.push(group);
      } else {
        groups.set(member, [group]);
      }
    }
  }

  return {
    elements: new Map(Object.entries(raw.elements)),
    groups,
    combos: raw.combos,
  };
}

export function buildReferenceData(raw: RawReferenceData): ReferenceData {
  return {
    ...buildSynergyData(raw.synergy),
    threats: new Map(Object.entries(raw.threats.threats)),
    categories: raw.threats.categories,
    metaTeams: raw.metaTeams.metaTeams,
    treasures: raw.treasures.treasures,
    bosses: raw.bosses.bosses,
    bossTraits: new Map(Object.entries(raw.bosses.traits)),
  };
}

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

export interface ReferenceDataIssue {
  /** Table the key came from (elements, groups, combos, ...) */
  table: string;
  /** Entry the key belongs to */
  entry: string;
  /** The unknown cookie or treasure name */
  name: string;
  kind: "cookie" | "treasure";
}

/**
 * Check every cookie and treasure name in the reference tables
 * against the catalog. Returns one issue per unknown reference.
 */
export function validateReferenceData(
  reference: ReferenceData,
  repo: CookieRepository
): ReferenceDataIssue[] {
  const issues: ReferenceDataIssue[] = [];
  const check = (table: string, entry: string, names: readonly string[]) => {
    for (const name of repo.findMissing(names)) {
      issues.push({ table, entry, name, kind: "cookie" });
    }
  };

  for (const name of reference.elements.keys()) {
    check("elements", name, [name]);
  }
  for (const [name, groups] of reference.groups) {
    check("groups", groups.join(", "), [name]);
  }
  for (const combo of reference.combos) {
    const members = combo.kind === "all" ? combo.members : [...combo.anchors, ...combo.optional];
    check("combos", combo.name, members);
  }
  for (const [name, entry] of reference.threats) {
    check("threats", name, [name, ...entry.counters]);
  }
  for (const team of reference.metaTeams) {
    check("metaTeams", team.name, [...team.coreCookies, ...team.typicalComposition, ...team.counterCookies]);
  }
  const { tauntTanks, highHpTanks, burstDamage } = reference.categories;
  check("categories", "tauntTanks", tauntTanks);
  check("categories", "highHpTanks", highHpTanks);
  check("categories", "burstDamage", burstDamage);
  for (const boss of reference.bosses) {
    check("bosses", boss.name, [...boss.sTier, ...boss.aTier]);
  }
  for (const name of reference.bossTraits.keys()) {
    check("bossTraits", name, [name]);
  }

  const treasureNames = new Set(reference.treasures.map((t) => t.name));
  for (const team of reference.metaTeams) {
    for (const treasure of team.recommendedTreasures) {
      if (!treasureNames.has(treasure)) {
        issues.push({ table: "metaTeams.treasures", entry: team.name, name: treasure, kind: "treasure" });
      }
    }
  }

  return issues;
}

/**
 * Empty tables: synergy, counter and boss lookups all miss.
 */
export function emptyReferenceData(): ReferenceData {
  return {
    elements: new Map(),
    groups: new Map(),
    combos: [],
    threats: new Map(),
    metaTeams: [],
    categories: { tauntTanks: [], highHpTanks: [], burstDamage: [] },
    treasures: [],
    bosses: [],
    bossTraits: new Map(),
  };
}
