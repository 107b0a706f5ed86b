import { orderBy } from "es-toolkit";
import type { Cookie, Rarity, Role } from "../models/types";
import { RARITIES } from "../models/types";
import { UnknownEntityError } from "../errors";

/**
 * Centralized repository for catalog access with memoized lookups.
 * The catalog never changes after construction.
 */
export class CookieRepository {
  private readonly cookies: readonly Cookie[];
  private readonly byName: Map<string, Cookie>;
  private readonly byLowerName: Map<string, Cookie>;
  private readonly roleIndex = new Map<Role, Cookie[]>();
  private byPowerCache: Cookie[] | null = null;

  constructor(cookies: readonly Cookie[]) {
    this.cookies = cookies;
    this.byName = new Map(cookies.map((c) => [c.name, c]));
    this.byLowerName = new Map(cookies.map((c) => [c.name.toLowerCase(), c]));
  }

  /**
   * Get all cookies in catalog order
   */
  getAll(): readonly Cookie[] {
    return this.cookies;
  }

  get size(): number {
    return this.cookies.length;
  }

  /**
   * Lenient lookup for user input: case-insensitive, and the
   * trailing " Cookie" may be omitted ("lemon" finds "Lemon Cookie").
   */
  find(query: string): Cookie | undefined {
    const normalized = query.trim().toLowerCase();
    return this.byLowerName.get(normalized) ?? this.byLowerName.get(`${normalized} cookie`);
  }

  /**
   * Names from the list that are not in the catalog, in input order
   */
  findMissing(names: readonly string[]): string[] {
    return names.filter((name) => !this.byName.has(name));
  }

  /**
   * Resolve user input with {@link find}, in input order, failing on
   * any unknown name.
   *
   * @param source - Label used in the error (e.g. "required", "enemy")
   */
  resolve(queries: readonly string[], source: string): Cookie[] {
    const found = queries.map((query) => ({ query, cookie: this.find(query) }));
    const missing = found.filter((f) => f.cookie === undefined).map((f) => f.query);
    if (missing.length > 0) {
      throw new UnknownEntityError("cookie", source, missing);
    }
    return found.flatMap((f) => (f.cookie ? [f.cookie] : []));
  }

  /**
   * Cookies of the given role (memoized)
   */
  getByRole(role: Role): Cookie[] {
    let cached = this.roleIndex.get(role);
    if (!cached) {
      cached = this.cookies.filter((c) => c.role === role);
      this.roleIndex.set(role, cached);
    }
    return cached;
  }

  /**
   * Cookies at one of the listed rarities, catalog order
   */
  getByRarity(rarities: readonly Rarity[]): Cookie[] {
    const wanted = new Set(rarities);
    return this.cookies.filter((c) => wanted.has(c.rarity));
  }

  /**
   * All cookies, highest rarity first (ties keep catalog order)
   */
  getByRarityDescending(): readonly Cookie[] {
    if (!this.byPowerCache) {
      this.byPowerCache = orderBy([...this.cookies], [(c) => RARITIES.indexOf(c.rarity)], ["desc"]);
    }
    return this.byPowerCache;
  }
}
