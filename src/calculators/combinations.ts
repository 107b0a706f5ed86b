/**
 * Combination generators for team enumeration.
 *
 * Provides lazy generators for creating cookie combinations,
 * avoiding memory issues with large pools.
 */

import type { Cookie, Rarity } from "../models/types";
import { RARITIES } from "../models/types";
import { TEAM_SIZE, type Team } from "../models/teamTypes";

// ─────────────────────────────────────────────────────────────
// Core Generator Functions
// ─────────────────────────────────────────────────────────────

/**
 * Generate all N-item combinations from an array, in
 * lexicographic index order.
 *
 * Uses a generator to lazily produce combinations,
 * avoiding memory issues with large input sets.
 *
 * @param items - Items to combine
 * @param n - Number of items per combination
 * @yields Arrays of n items
 *
 * @example
 * ```ts
 * const items = [a, b, c, d];
 * for (const combo of combinations(items, 2)) {
 *   console.log(combo); // [a,b], [a,c], [a,d], [b,c], [b,d], [c,d]
 * }
 * ```
 */
export function* combinations<T>(items: readonly T[], n: number): Generator<T[]> {
  if (n < 0 || n > items.length) {
    return;
  }
  if (n === 0) {
    yield [];
    return;
  }

  const indices = Array.from({ length: n }, (_, i) => i);
  const last = items.length - n;

  while (true) {
    yield indices.map((i) => items[i]);

    // Find the rightmost index that can still advance
    let pos = n - 1;
    while (pos >= 0 && indices[pos] === last + pos) {
      pos--;
    }
    if (pos < 0) return;

    indices[pos]++;
    for (let j = pos + 1; j < n; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/**
 * Generate every team containing all required cookies, filling the
 * remaining slots from the rest of the pool.
 *
 * @param pool - Candidate cookies (required members are skipped if present)
 * @param required - Cookies pinned into every team
 * @param teamSize - Members per team
 * @yields Teams with required members first
 *
 * @example
 * ```ts
 * // Every team containing Lemon Cookie
 * for (const team of teamCombinations(pool, [lemon])) {
 *   score(team);
 * }
 * ```
 */
export function* teamCombinations(
  pool: readonly Cookie[],
  required: readonly Cookie[],
  teamSize: number = TEAM_SIZE
): Generator<Team> {
  const free = remainingPool(pool, required);
  for (const fill of combinations(free, teamSize - required.length)) {
    yield [...required, ...fill];
  }
}

/**
 * Count total number of combinations.
 *
 * Uses the binomial coefficient formula: n! / (k! * (n-k)!)
 *
 * @param n - Total items
 * @param k - Items per combination
 * @returns Number of possible combinations
 */
export function countCombinations(n: number, k: number): number {
  if (k > n || k < 0) return 0;
  if (k === 0 || k === n) return 1;

  // Optimize by using smaller k
  const smallerK = Math.min(k, n - k);

  let result = 1;
  for (let i = 0; i < smallerK; i++) {
    result = (result * (n - i)) / (i + 1);
  }

  return Math.round(result);
}

/**
 * Number of teams {@link teamCombinations} would yield
 */
export function countTeamCombinations(
  pool: readonly Cookie[],
  required: readonly Cookie[],
  teamSize: number = TEAM_SIZE
): number {
  return countCombinations(remainingPool(pool, required).length, teamSize - required.length);
}

/**
 * Pool members that are not pinned
 */
export function remainingPool(pool: readonly Cookie[], required: readonly Cookie[]): Cookie[] {
  const pinned = new Set(required.map((c) => c.name));
  return pool.filter((c) => !pinned.has(c.name));
}

// ─────────────────────────────────────────────────────────────
// Pool Filters
// ─────────────────────────────────────────────────────────────

export type CookieFilter = (cookie: Cookie) => boolean;

/**
 * Filter: rarity at or below the given tier.
 *
 * @example
 * ```ts
 * const pool = repo.getAll().filter(maxRarity("Legendary"));
 * ```
 */
export const maxRarity =
  (ceiling: Rarity): CookieFilter =>
  (cookie) =>
    RARITIES.indexOf(cookie.rarity) <= RARITIES.indexOf(ceiling);

/**
 * Filter: drop ascended variants.
 */
export const excludeAscended: CookieFilter = (cookie) =>
  cookie.rarity !== "Ancient (Ascended)" && !cookie.name.includes("(Ascended)");

/**
 * Filter: drop the named cookies.
 */
export const excludeNames =
  (names: readonly string[]): CookieFilter => {
    const excluded = new Set(names);
    return (cookie) => !excluded.has(cookie.name);
  };

/**
 * Combine multiple filters with AND logic.
 *
 * @example
 * ```ts
 * const filter = combineFilters(maxRarity("Epic"), excludeAscended);
 * ```
 */
export const combineFilters =
  (...filters: CookieFilter[]): CookieFilter =>
  (cookie) =>
    filters.every((f) => f(cookie));
