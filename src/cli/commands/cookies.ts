/**
 * Cookies Command
 *
 * Lists the catalog, optionally filtered.
 */

import { ROLES, type Cookie, type Role } from "../../models/types";
import { InvalidParameterError } from "../../errors";
import type { CliContext } from "../context";
import { isRarity } from "../options";
import { formatCookieList } from "../../output/display";

export interface CookieListOptions {
  role?: string;
  rarity?: string;
  position?: string;
  element?: string;
  /** Case-insensitive substring match on the name */
  search?: string;
  /** Highest rarity first instead of catalog order */
  byRarity?: boolean;
}

function isRole(value: string): value is Role {
  return ROLES.some((r) => r === value);
}

/**
 * Apply the list filters and return the matching cookies.
 */
export function selectCookies(ctx: CliContext, options: CookieListOptions = {}): Cookie[] {
  const { role, rarity, position, element, search, byRarity = false } = options;

  let cookies: readonly Cookie[] = byRarity ? ctx.repo.getByRarityDescending() : ctx.repo.getAll();

  if (role !== undefined) {
    if (!isRole(role)) {
      throw new InvalidParameterError("role", `Unknown role "${role}". Expected one of: ${ROLES.join(", ")}`);
    }
    const ofRole = new Set(ctx.repo.getByRole(role));
    cookies = cookies.filter((c) => ofRole.has(c));
  }
  if (rarity !== undefined) {
    if (!isRarity(rarity)) {
      throw new InvalidParameterError("rarity", `Unknown rarity "${rarity}"`);
    }
    const ofRarity = new Set(ctx.repo.getByRarity([rarity]));
    cookies = cookies.filter((c) => ofRarity.has(c));
  }
  if (position !== undefined) {
    const wanted = position.toLowerCase();
    cookies = cookies.filter((c) => c.position.toLowerCase() === wanted);
  }
  if (element !== undefined) {
    const wanted = element.toLowerCase();
    cookies = cookies.filter((c) => ctx.reference.elements.get(c.name)?.toLowerCase() === wanted);
  }
  if (search !== undefined) {
    const needle = search.toLowerCase();
    cookies = cookies.filter((c) => c.name.toLowerCase().includes(needle));
  }

  return [...cookies];
}

/**
 * Run the catalog listing and return formatted output.
 */
export function runCookieList(ctx: CliContext, options: CookieListOptions = {}): string {
  return formatCookieList(selectCookies(ctx, options), ctx.reference.elements);
}

/**
 * Print the catalog listing to console.
 */
export function printCookieList(ctx: CliContext, options: CookieListOptions = {}): void {
  console.log(runCookieList(ctx, options));
}
