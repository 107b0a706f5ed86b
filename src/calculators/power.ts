/**
 * Per-cookie power on the 0-7 scale.
 *
 * Without overrides a cookie's power is its rarity weight. When a
 * level, skill level or topping rating is supplied, power blends the
 * rarity weight with the normalized instance stats.
 */

import { clamp, sumBy } from "es-toolkit";
import type { Cookie, InstanceOverride, InstanceOverrides } from "../models/types";
import { DEFAULT_CONFIG, rarityWeight, type OptimizerConfig } from "../config/optimizerConfig";

/**
 * True when the override carries any stat that changes power.
 * Star level alone does not.
 */
export function hasAdvancedStats(override: InstanceOverride | undefined): boolean {
  if (!override) return false;
  return (
    override.level !== undefined ||
    override.skillLevel !== undefined ||
    override.toppingQuality !== undefined ||
    (override.toppings !== undefined && override.toppings.length > 0)
  );
}

/**
 * Normalized topping component (0-1).
 *
 * `toppingQuality` wins when both forms are given. Individual
 * toppings are summed against the full set at max level.
 */
export function toppingRating(
  override: InstanceOverride,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const { maxToppingQuality, maxToppingLevel, maxToppings } = config.power;
  if (override.toppingQuality !== undefined) {
    return clamp(override.toppingQuality / maxToppingQuality, 0, 1);
  }
  if (override.toppings && override.toppings.length > 0) {
    const total = sumBy(override.toppings, (t) => t.level);
    return clamp(total / (maxToppings * maxToppingLevel), 0, 1);
  }
  return 0;
}

/**
 * Power of a single cookie, with optional instance override.
 *
 * @example
 * ```ts
 * cookiePower(epicCookie); // 3.0
 * cookiePower(epicCookie, { level: 70, skillLevel: 60, toppingQuality: 5 }); // 5.4
 * ```
 */
export function cookiePower(
  cookie: Cookie,
  override?: InstanceOverride,
  config: OptimizerConfig = DEFAULT_CONFIG
): number {
  const base = rarityWeight(cookie.rarity, config);
  if (!override || !hasAdvancedStats(override)) {
    return base;
  }

  const w = config.power;
  const skill = override.skillLevel !== undefined ? override.skillLevel / w.maxSkillLevel : 0;
  const level = override.level !== undefined ? override.level / w.maxLevel : 0;
  const topping = toppingRating(override, config);

  return base * w.rarity + (skill * w.skill + level * w.level + topping * w.topping) * w.scale;
}

/**
 * Build a memoized power lookup bound to one request's overrides.
 */
export function createPowerLookup(
  overrides: InstanceOverrides = {},
  config: OptimizerConfig = DEFAULT_CONFIG
): (cookie: Cookie) => number {
  const cache = new Map<string, number>();
  return (cookie) => {
    let power = cache.get(cookie.name);
    if (power === undefined) {
      power = cookiePower(cookie, overrides[cookie.name], config);
      cache.set(cookie.name, power);
    }
    return power;
  };
}
