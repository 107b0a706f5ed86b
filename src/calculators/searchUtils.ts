/**
 * Search Utilities
 *
 * Shared utilities for the team search strategies.
 * Includes team keys, score caching, priority queues and budgets.
 */

import type { BudgetReason, BudgetReport, SearchBudget, Team, TeamScore } from "../models/teamTypes";

// ─────────────────────────────────────────────────────────────
// Cache Key Generation
// ─────────────────────────────────────────────────────────────

/**
 * Create a key from member names (sorted for consistency).
 * Two teams with the same members share a key.
 */
export function teamKey(team: Team): string {
  return team
    .map((c) => c.name)
    .sort()
    .join(",");
}

// ─────────────────────────────────────────────────────────────
// Score Cache
// ─────────────────────────────────────────────────────────────

/**
 * Memoized team scorer with LRU-style eviction.
 *
 * Genetic search revisits the same teams across generations;
 * this cache reuses scores for identical memberships.
 */
export class ScoreCache {
  private cache = new Map<string, TeamScore>();
  private maxSize: number;
  private misses = 0;

  constructor(
    private scorer: (team: Team) => TeamScore,
    maxSize: number = 10000
  ) {
    this.maxSize = maxSize;
  }

  /**
   * Get a score from cache or compute and cache it.
   */
  getOrScore(team: Team): TeamScore {
    const key = teamKey(team);
    let score = this.cache.get(key);
    if (!score) {
      score = this.scorer(team);
      this.misses++;
      this.cache.set(key, score);

      // Evict oldest entries if cache is full
      if (this.cache.size > this.maxSize) {
        const evictCount = Math.max(1, Math.floor(this.maxSize * 0.1));
        const keysToDelete = Array.from(this.cache.keys()).slice(0, evictCount);
        for (const k of keysToDelete) {
          this.cache.delete(k);
        }
      }
    }
    return score;
  }

  /** Teams actually scored (cache misses) */
  get evaluated(): number {
    return this.misses;
  }

  get size(): number {
    return this.cache.size;
  }
}

// ─────────────────────────────────────────────────────────────
// Bounded Priority Queue
// ─────────────────────────────────────────────────────────────

/**
 * Bounded priority queue for keeping top N items.
 *
 * Uses binary search insertion to maintain sorted order.
 * Items are compared using a custom compare function; an item that
 * compares equal to an existing one is placed after it.
 */
export class BoundedPriorityQueue<T> {
  private items: T[] = [];

  constructor(
    private maxSize: number,
    private compare: (a: T, b: T) => number
  ) {}

  /**
   * Add an item to the queue.
   * Returns true if the item was added, false if rejected.
   */
  add(item: T): boolean {
    if (this.maxSize <= 0) return false;

    if (this.items.length < this.maxSize) {
      this.insertSorted(item);
      return true;
    }

    // Check if item is better than worst item
    const worst = this.items[this.items.length - 1];
    if (this.compare(item, worst) < 0) {
      this.items.pop();
      this.insertSorted(item);
      return true;
    }

    return false;
  }

  private insertSorted(item: T): void {
    let low = 0;
    let high = this.items.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(item, this.items[mid]) < 0) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }

    this.items.splice(low, 0, item);
  }

  /** Best item, if any */
  peek(): T | undefined {
    return this.items[0];
  }

  toArray(): T[] {
    return [...this.items];
  }

  get length(): number {
    return this.items.length;
  }
}

// ─────────────────────────────────────────────────────────────
// Budget Tracking
// ─────────────────────────────────────────────────────────────

/**
 * Tracks elapsed time and evaluations against an optional budget.
 * With no limits set it never reports exhaustion.
 *
 * The evaluation limit is checked on every call; the clock only
 * every `clockInterval` evaluations.
 */
export class BudgetTracker {
  private readonly startedAt: number;
  private exceeded: BudgetReport | undefined;

  constructor(
    private readonly budget: SearchBudget = {},
    private readonly now: () => number = Date.now,
    private readonly clockInterval: number = 1
  ) {
    this.startedAt = now();
  }

  get hasLimits(): boolean {
    return this.budget.maxTimeMs !== undefined || this.budget.maxCombinations !== undefined;
  }

  get elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  /**
   * Check the budget after `evaluated` evaluations. Once exhausted,
   * the first report is kept.
   */
  check(evaluated: number): boolean {
    if (this.exceeded) return true;

    const { maxTimeMs, maxCombinations } = this.budget;
    if (maxCombinations !== undefined && evaluated >= maxCombinations) {
      this.exceeded = this.report("combinations", maxCombinations);
    } else if (
      maxTimeMs !== undefined &&
      evaluated % this.clockInterval === 0 &&
      this.elapsedMs >= maxTimeMs
    ) {
      this.exceeded = this.report("time", maxTimeMs);
    }
    return this.exceeded !== undefined;
  }

  get result(): BudgetReport | undefined {
    return this.exceeded;
  }

  private report(reason: BudgetReason, limit: number): BudgetReport {
    return { reason, limit, elapsedMs: this.elapsedMs };
  }
}

/**
 * What is left of a budget after `evaluated` evaluations and
 * `elapsedMs`, or the report for the limit already reached.
 */
export type BudgetRemainder =
  | { readonly exhausted: false; readonly remaining: SearchBudget }
  | { readonly exhausted: true; readonly report: BudgetReport };

export function remainingBudget(budget: SearchBudget, evaluated: number, elapsedMs: number): BudgetRemainder {
  const { maxTimeMs, maxCombinations } = budget;
  if (maxCombinations !== undefined && evaluated >= maxCombinations) {
    return { exhausted: true, report: { reason: "combinations", limit: maxCombinations, elapsedMs } };
  }
  if (maxTimeMs !== undefined && elapsedMs >= maxTimeMs) {
    return { exhausted: true, report: { reason: "time", limit: maxTimeMs, elapsedMs } };
  }
  return {
    exhausted: false,
    remaining: {
      maxTimeMs: maxTimeMs === undefined ? undefined : maxTimeMs - elapsedMs,
      maxCombinations: maxCombinations === undefined ? undefined : maxCombinations - evaluated,
    },
  };
}
