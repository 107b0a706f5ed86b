/**
 * Team-level types for candidate generation, scoring and ranking.
 */

import type {
  Cookie,
  Element,
  InstanceOverride,
  MetaTeam,
  Position,
  Role,
  Treasure,
} from "./types";

// ─────────────────────────────────────────────────────────────
// Teams and Scores
// ─────────────────────────────────────────────────────────────

/**
 * Five distinct cookies. Order carries no meaning.
 */
export type Team = readonly Cookie[];

export const TEAM_SIZE = 5;

/**
 * Labeled sub-scores. Optional entries are present only when the
 * corresponding input (treasures, synergy data) was supplied.
 */
export interface ScoreBreakdown {
  /** 0-30 */
  readonly roleDiversity: number;
  /** 0-25 */
  readonly positionCoverage: number;
  /** 0-35 */
  readonly power: number;
  /** 0-10 */
  readonly bonusModifiers: number;
  /** 0-15 */
  readonly treasureBonus?: number;
  /** 0, 7 or 15 */
  readonly elementSynergy?: number;
  /** 0-20 */
  readonly groupSynergy?: number;
  /** 0-25 */
  readonly specialCombo?: number;
}

export interface TeamScore {
  readonly total: number;
  readonly breakdown: ScoreBreakdown;
  /** Maximum total attainable with the enabled sub-scores */
  readonly ceiling: number;
  /** Per-member power, aligned with the team's member order */
  readonly memberPower: readonly number[];
  /** Name of the special combo that set the combo sub-score */
  readonly activeCombo?: string;
}

export interface CounterEvaluation {
  /** 0-100 */
  readonly counterScore: number;
  readonly combinedScore: number;
  readonly recommendedTreasures: readonly TreasureRecommendation[];
}

export interface BossEvaluation {
  /** 0-100 */
  readonly bossScore: number;
  /** Members on the boss's S tier */
  readonly keyMembers: readonly string[];
  readonly strategy: string;
}

export interface ScoredTeam {
  readonly members: Team;
  readonly key: string;
  readonly score: TeamScore;
  readonly counter?: CounterEvaluation;
  readonly boss?: BossEvaluation;
}

export interface RankedMember {
  readonly name: string;
  readonly rarity: Cookie["rarity"];
  readonly role: Role;
  readonly position: Position;
  readonly element?: Element;
  readonly power: number;
  readonly required: boolean;
  readonly override?: InstanceOverride;
}

export interface RankedTeam extends ScoredTeam {
  /** 1-based */
  readonly rank: number;
  readonly details: readonly RankedMember[];
  readonly roleDistribution: Readonly<Partial<Record<Role, number>>>;
  readonly positionDistribution: Readonly<Partial<Record<Position, number>>>;
  readonly hasTank: boolean;
  readonly hasHealer: boolean;
}

// ─────────────────────────────────────────────────────────────
// Generation
// ─────────────────────────────────────────────────────────────

export const STRATEGIES = ["random", "greedy", "genetic", "exhaustive", "synergy"] as const;

export type StrategyName = (typeof STRATEGIES)[number];

export type BudgetReason = "time" | "combinations";

/**
 * Caller-supplied limits for long-running strategies.
 */
export interface SearchBudget {
  maxTimeMs?: number;
  maxCombinations?: number;
}

export interface BudgetReport {
  readonly reason: BudgetReason;
  readonly limit: number;
  readonly elapsedMs: number;
}

export interface ProgressUpdate {
  readonly phase: string;
  readonly evaluated: number;
  readonly bestScore?: number;
  readonly generation?: number;
  readonly message: string;
}

export type ProgressCallback = (update: ProgressUpdate) => void;

export interface GenerationResult {
  readonly teams: Team[];
  /** False when a budget stopped the search early */
  readonly complete: boolean;
  /** Teams scored by the generator's fitness function */
  readonly evaluated: number;
  readonly budget?: BudgetReport;
}

// ─────────────────────────────────────────────────────────────
// Counter Analysis
// ─────────────────────────────────────────────────────────────

export interface HighThreatMember {
  readonly name: string;
  readonly threatLevel: number;
  readonly threats: readonly string[];
}

export interface MetaTeamMatch {
  readonly team: MetaTeam;
  readonly exact: boolean;
}

/**
 * Aggregated view of an enemy composition.
 */
export interface ThreatProfile {
  readonly size: number;
  readonly healers: readonly string[];
  readonly tanks: readonly string[];
  readonly dps: readonly string[];
  readonly positions: Readonly<Record<Position, number>>;
  readonly crowdControl: readonly string[];
  readonly ccTypes: readonly string[];
  readonly antiHeal: readonly string[];
  readonly antiTank: readonly string[];
  readonly immunity: boolean;
  readonly immunityTypes: readonly string[];
  readonly cleanse: readonly string[];
  readonly shieldProviders: readonly string[];
  readonly beasts: readonly string[];
  readonly taunt: boolean;
  readonly burstDamage: boolean;
  readonly memberThreat: Readonly<Record<string, number>>;
  readonly totalThreat: number;
  readonly averageThreat: number;
  readonly highThreat: readonly HighThreatMember[];
  readonly hasHighThreat: boolean;
  readonly metaMatch?: MetaTeamMatch;
}

export type WeaknessPriority = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export interface Weakness {
  readonly weakness: string;
  readonly description: string;
  readonly exploit: string;
  readonly priority: WeaknessPriority;
  readonly confidence: number;
}

export interface CounterRecommendation {
  /** Ordered, deduplicated, capped */
  readonly recommended: readonly string[];
  readonly avoid: readonly string[];
  readonly priorityTargets: readonly string[];
  readonly strategy: string;
  readonly archetype: string;
  /** 0-100 */
  readonly confidence: number;
  readonly rulesFired: readonly string[];
}

export interface TreasureRecommendation {
  readonly treasure: Treasure;
  readonly score: number;
  readonly reason: string;
}
