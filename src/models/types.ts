/**
 * Rarity tiers, lowest to highest
 */
export const RARITIES = [
  "Common",
  "Rare",
  "Special",
  "Epic",
  "Super Epic",
  "Dragon",
  "Legendary",
  "Ancient",
  "Ancient (Ascended)",
  "Beast",
] as const;

export type Rarity = (typeof RARITIES)[number];

/**
 * Cookie classes as they appear in the catalog
 */
export const ROLES = [
  "Charge",
  "Defense",
  "Magic",
  "Ranged",
  "Bomber",
  "Ambush",
  "Healing",
  "Support",
] as const;

export type Role = (typeof ROLES)[number];

export const POSITIONS = ["Front", "Middle", "Rear"] as const;

export type Position = (typeof POSITIONS)[number];

export const ELEMENTS = [
  "Fire",
  "Water",
  "Ice",
  "Earth",
  "Grass",
  "Light",
  "Darkness",
  "Electricity",
  "Wind",
  "Poison",
  "Steel",
] as const;

export type Element = (typeof ELEMENTS)[number];

export const TREASURE_TIERS = ["S+", "S", "A", "B", "C"] as const;

export type TreasureTier = (typeof TREASURE_TIERS)[number];

/**
 * Represents a selectable cookie in the catalog.
 *
 * Ability fields are optional; an absent flag reads as false and
 * an absent string as "none".
 */
export interface Cookie {
  name: string;
  rarity: Rarity;
  role: Role;
  position: Position;
  /** Primary skill category (Damage, Healing, Summon, Buff, Debuff, CC) */
  skillType?: string;
  /** Crowd-control effect applied by the skill (Stun, Freeze, ...) */
  crowdControl?: string;
  /** Immunity the skill grants allies */
  grantsImmunity?: string;
  providesHealing?: boolean;
  providesShield?: boolean;
  antiHeal?: boolean;
  antiTank?: boolean;
  dispel?: boolean;
  /** AoE, Single_Target, Backline, ... */
  targetType?: string;
}

export interface Topping {
  type: string;
  /** 0-12 */
  level: number;
}

/**
 * Request-scoped stat overrides for a single cookie.
 * Never stored on the catalog.
 */
export interface InstanceOverride {
  /** 1-70 */
  level?: number;
  /** 1-60 */
  skillLevel?: number;
  /** 0-5, echoed only */
  stars?: number;
  /** Up to 5 toppings */
  toppings?: Topping[];
  /** 0-5 shorthand used instead of individual toppings */
  toppingQuality?: number;
}

export type InstanceOverrides = Readonly<Record<string, InstanceOverride>>;

/**
 * Treasure reference entry. Stat fields are percentage ceilings.
 */
export interface Treasure {
  name: string;
  tier: TreasureTier;
  atkBoost: number;
  critBoost: number;
  cooldownReduction: number;
  dmgResist: number;
  hpShield: number;
  heal: number;
  revive: boolean;
  debuffCleanse: boolean;
  enemyDebuff: boolean;
  summonBoost: boolean;
  recommendedArchetypes: string[];
}

// ─────────────────────────────────────────────────────────────
// Reference Data
// ─────────────────────────────────────────────────────────────

/**
 * Special combo activation rules.
 *
 * - `all`: every listed member present
 * - `anchor`: every anchor present and at least `minMembers`
 *   of anchors ∪ optional present
 */
export type SpecialCombo =
  | {
      kind: "all";
      name: string;
      members: string[];
      bonus: number;
    }
  | {
      kind: "anchor";
      name: string;
      anchors: string[];
      optional: string[];
      minMembers: number;
      bonus: number;
    };

/**
 * Lookups used by the synergy sub-scores, keyed by cookie name.
 */
export interface SynergyData {
  readonly elements: ReadonlyMap<string, Element>;
  readonly groups: ReadonlyMap<string, readonly string[]>;
  readonly combos: readonly SpecialCombo[];
}

export interface ThreatEntry {
  counters: string[];
  threatLevel: number;
  primaryThreats: string[];
  counterStrategy: string;
}

export interface MetaTeam {
  name: string;
  tier: string;
  archetype: string;
  coreCookies: string[];
  typicalComposition: string[];
  counterCookies: string[];
  recommendedTreasures: string[];
  treasureRationale: string;
}

/**
 * Name lists for mechanics the ability fields do not capture.
 */
export interface CounterCategories {
  tauntTanks: string[];
  highHpTanks: string[];
  burstDamage: string[];
}

export const BOSS_TRAITS = [
  "defShred",
  "indirectDamage",
  "attackSpeedBuff",
  "shieldProvider",
  "debuffHeavy",
  "aoeDamage",
  "singleTargetFocus",
  "waterElement",
  "electricElement",
] as const;

/** Team-building trait a guild boss rewards or punishes */
export type BossTrait = (typeof BOSS_TRAITS)[number];

export interface GuildBoss {
  name: string;
  description: string;
  mechanics: string[];
  strategy: string[];
  preferredTraits: BossTrait[];
  avoidTraits: BossTrait[];
  sTier: string[];
  aTier: string[];
}

/**
 * All read-only reference tables consumed by the optimizer.
 */
export interface ReferenceData extends SynergyData {
  readonly threats: ReadonlyMap<string, ThreatEntry>;
  readonly metaTeams: readonly MetaTeam[];
  readonly categories: CounterCategories;
  readonly treasures: readonly Treasure[];
  readonly bosses: readonly GuildBoss[];
  /** Boss traits listed per cookie, on top of those read from its fields */
  readonly bossTraits: ReadonlyMap<string, readonly BossTrait[]>;
}
