import {
  POSITIONS,
  RARITIES,
  ROLES,
  type Cookie,
  type GuildBoss,
  type ReferenceData,
  type Treasure,
} from "../models/types";
import type { Team } from "../models/teamTypes";
import { CookieRepository } from "../data/CookieRepository";
import { buildReferenceData, type SynergyFile } from "../data/referenceData";
import { DEFAULT_CONFIG } from "../config/optimizerConfig";
import type { GeneratorContext } from "../calculators/generators";
import { createPowerLookup } from "../calculators/power";
import { createRng } from "../calculators/random";
import { scoreTeam } from "../calculators/scoring";

/**
 * Small made-up catalog with predictable values for precise test assertions.
 *
 * Design principles:
 * - One cookie per role, with a spread of rarities so power is easy to sum
 * - Ability flags placed so each counter rule can be triggered in isolation
 * - Synergy tables small enough to enumerate by hand
 *
 * Power (no overrides) equals the rarity weight:
 *   Jolt 7, Iris 6.5, Anchor 6, Bolt 5, Fable 4, Comet 3, Dew 3,
 *   Hush 2, Ember 1, Glint 0.5
 */

// ============================================================================
// Cookies
// ============================================================================

/** Ancient Defense, front row, shield. Taunt tank in the counter categories. */
export const anchor: Cookie = {
  name: "Anchor Cookie",
  rarity: "Ancient",
  role: "Defense",
  position: "Front",
  skillType: "Buff",
  providesShield: true,
};

/** Legendary Magic with a stun */
export const bolt: Cookie = {
  name: "Bolt Cookie",
  rarity: "Legendary",
  role: "Magic",
  position: "Middle",
  skillType: "Damage",
  crowdControl: "Stun",
};

export const comet: Cookie = {
  name: "Comet Cookie",
  rarity: "Epic",
  role: "Ranged",
  position: "Rear",
  skillType: "Damage",
};

/** Healer with dispel */
export const dew: Cookie = {
  name: "Dew Cookie",
  rarity: "Epic",
  role: "Healing",
  position: "Rear",
  skillType: "Healing",
  providesHealing: true,
  dispel: true,
};

/** Rare Charge, front row, anti-tank */
export const ember: Cookie = {
  name: "Ember Cookie",
  rarity: "Rare",
  role: "Charge",
  position: "Front",
  skillType: "Damage",
  antiTank: true,
};

/** Support granting stun immunity */
export const fable: Cookie = {
  name: "Fable Cookie",
  rarity: "Super Epic",
  role: "Support",
  position: "Rear",
  skillType: "Buff",
  grantsImmunity: "Stun",
};

/** Common Ambush with anti-heal, reaches the backline */
export const glint: Cookie = {
  name: "Glint Cookie",
  rarity: "Common",
  role: "Ambush",
  position: "Middle",
  skillType: "Damage",
  antiHeal: true,
  targetType: "Backline",
};

/** Summoner */
export const hush: Cookie = {
  name: "Hush Cookie",
  rarity: "Special",
  role: "Bomber",
  position: "Rear",
  skillType: "Summon",
};

export const iris: Cookie = {
  name: "Iris Cookie (Ascended)",
  rarity: "Ancient (Ascended)",
  role: "Magic",
  position: "Middle",
  skillType: "Debuff",
};

/** Beast Ranged with a freeze. High threat in the threat table. */
export const jolt: Cookie = {
  name: "Jolt Cookie",
  rarity: "Beast",
  role: "Ranged",
  position: "Rear",
  skillType: "Damage",
  crowdControl: "Freeze",
};

export const COOKIES: Cookie[] = [anchor, bolt, comet, dew, ember, fable, glint, hush, iris, jolt];

// ============================================================================
// Treasures
// ============================================================================

/** S+ Universal, 25% ATK */
export const scroll: Treasure = {
  name: "Test Scroll",
  tier: "S+",
  atkBoost: 25,
  critBoost: 0,
  cooldownReduction: 0,
  dmgResist: 0,
  hpShield: 0,
  heal: 0,
  revive: false,
  debuffCleanse: false,
  enemyDebuff: false,
  summonBoost: false,
  recommendedArchetypes: ["Universal"],
};

/** A tier, 20% shield and revive */
export const chalice: Treasure = {
  name: "Test Chalice",
  tier: "A",
  atkBoost: 0,
  critBoost: 0,
  cooldownReduction: 0,
  dmgResist: 0,
  hpShield: 20,
  heal: 0,
  revive: true,
  debuffCleanse: false,
  enemyDebuff: false,
  summonBoost: false,
  recommendedArchetypes: ["Tank", "Sustain"],
};

/** B tier summon boost, 10% cooldown reduction */
export const bell: Treasure = {
  name: "Test Bell",
  tier: "B",
  atkBoost: 0,
  critBoost: 0,
  cooldownReduction: 10,
  dmgResist: 0,
  hpShield: 0,
  heal: 0,
  revive: false,
  debuffCleanse: false,
  enemyDebuff: false,
  summonBoost: true,
  recommendedArchetypes: ["Summoner"],
};

/** C tier enemy debuff, 15% crit */
export const thorn: Treasure = {
  name: "Test Thorn",
  tier: "C",
  atkBoost: 0,
  critBoost: 15,
  cooldownReduction: 0,
  dmgResist: 0,
  hpShield: 0,
  heal: 0,
  revive: false,
  debuffCleanse: false,
  enemyDebuff: true,
  summonBoost: false,
  recommendedArchetypes: ["DPS"],
};

export const TREASURES: Treasure[] = [scroll, chalice, bell, thorn];

// ============================================================================
// Reference Tables
// ============================================================================

/**
 * Elements: Fire (Anchor, Bolt, Ember), Water (Comet, Dew),
 * Light (Fable, Jolt), Darkness (Glint). Hush and Iris are unmapped.
 */
export const SYNERGY_FILE: SynergyFile = {
  elements: {
    "Anchor Cookie": "Fire",
    "Bolt Cookie": "Fire",
    "Ember Cookie": "Fire",
    "Comet Cookie": "Water",
    "Dew Cookie": "Water",
    "Fable Cookie": "Light",
    "Jolt Cookie": "Light",
    "Glint Cookie": "Darkness",
  },
  groups: {
    "Storm Pact": ["Bolt Cookie", "Comet Cookie", "Jolt Cookie"],
    "Tide Guild": ["Comet Cookie", "Dew Cookie"],
  },
  combos: [
    { kind: "all", name: "Ember Oath", members: ["Anchor Cookie", "Ember Cookie"], bonus: 10 },
    { kind: "all", name: "Tide Call", members: ["Comet Cookie", "Dew Cookie", "Hush Cookie"], bonus: 15 },
    {
      kind: "anchor",
      name: "Starfall",
      anchors: ["Jolt Cookie"],
      optional: ["Bolt Cookie", "Comet Cookie", "Fable Cookie"],
      minMembers: 3,
      bonus: 20,
    },
  ],
};

/**
 * Boss scores (no overrides, default weights):
 *   Comet 100 (capped), Fable 83, Anchor 72, Dew 66, Hush 64, Jolt 64,
 *   Bolt 60, Ember 52, Glint 51, Iris 48
 */
export const tideWyrm: GuildBoss = {
  name: "Tide Wyrm",
  description: "Soaks up everything but Water",
  mechanics: ["Floods the front row"],
  strategy: ["Shield the front row before the flood"],
  preferredTraits: ["waterElement", "shieldProvider"],
  avoidTraits: ["debuffHeavy"],
  sTier: ["Comet Cookie"],
  aTier: ["Fable Cookie"],
};

export function makeReference(): ReferenceData {
  return buildReferenceData({
    synergy: SYNERGY_FILE,
    treasures: { treasures: TREASURES },
    threats: {
      threats: {
        "Jolt Cookie": {
          counters: ["Glint Cookie", "Anchor Cookie"],
          threatLevel: 9,
          primaryThreats: ["Freeze lock"],
          counterStrategy: "Dive Jolt before the freeze lands",
        },
        "Bolt Cookie": {
          counters: ["Fable Cookie"],
          threatLevel: 6,
          primaryThreats: ["Stun"],
          counterStrategy: "Bring stun immunity",
        },
      },
      categories: {
        tauntTanks: ["Anchor Cookie"],
        highHpTanks: ["Anchor Cookie"],
        burstDamage: ["Jolt Cookie"],
      },
    },
    metaTeams: {
      metaTeams: [
        {
          name: "Storm Front",
          tier: "S",
          archetype: "Burst",
          coreCookies: ["Bolt Cookie", "Jolt Cookie"],
          typicalComposition: ["Bolt Cookie", "Jolt Cookie", "Comet Cookie", "Dew Cookie", "Ember Cookie"],
          counterCookies: ["Glint Cookie", "Fable Cookie"],
          recommendedTreasures: ["Test Scroll"],
          treasureRationale: "Front-loaded damage",
        },
      ],
    },
    bosses: {
      bosses: [tideWyrm],
      traits: { "Hush Cookie": ["waterElement"] },
    },
  });
}

export function makeRepo(cookies: readonly Cookie[] = COOKIES): CookieRepository {
  return new CookieRepository(cookies);
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Sorted member names, for order-insensitive comparisons
 */
export function names(team: Team): string[] {
  return team.map((c) => c.name).sort();
}

/**
 * `count` generated cookies cycling through rarities, roles and
 * positions. Names are "Filler 0 Cookie", "Filler 1 Cookie", ...
 */
export function syntheticCookies(count: number): Cookie[] {
  return Array.from({ length: count }, (_, i) => ({
    name: `Filler ${i} Cookie`,
    rarity: RARITIES[i % 8],
    role: ROLES[i % ROLES.length],
    position: POSITIONS[i % POSITIONS.length],
  }));
}

/**
 * Generator context over the fixture pool: base scoring as fitness,
 * seed 1, ten candidates, a small genetic population.
 */
export function makeContext(overrides: Partial<GeneratorContext> = {}): GeneratorContext {
  return {
    pool: COOKIES,
    required: [],
    count: 10,
    rng: createRng(1),
    fitness: (team) => scoreTeam(team).total,
    powerOf: createPowerLookup(),
    config: DEFAULT_CONFIG,
    synergy: makeReference(),
    populationSize: 20,
    generations: 10,
    ...overrides,
  };
}
