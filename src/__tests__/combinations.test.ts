import { describe, it, expect } from "vitest";
import {
  combinations,
  combineFilters,
  countCombinations,
  countTeamCombinations,
  excludeAscended,
  excludeNames,
  maxRarity,
  remainingPool,
  teamCombinations,
} from "../calculators/combinations";
import { teamKey } from "../calculators/searchUtils";
import { anchor, bolt, COOKIES, hush, iris, jolt } from "./fixtures";

describe("combinations", () => {
  describe("combinations", () => {
    it("yields every n-subset in index order", () => {
      const result = Array.from(combinations(["a", "b", "c", "d"], 2));
      expect(result).toEqual([
        ["a", "b"],
        ["a", "c"],
        ["a", "d"],
        ["b", "c"],
        ["b", "d"],
        ["c", "d"],
      ]);
    });

    it("yields one empty combination for n = 0", () => {
      expect(Array.from(combinations([1, 2], 0))).toEqual([[]]);
    });

    it("yields nothing when n exceeds the input", () => {
      expect(Array.from(combinations([1, 2], 3))).toEqual([]);
    });
  });

  describe("countCombinations", () => {
    it("computes binomial coefficients", () => {
      expect(countCombinations(10, 5)).toBe(252);
      expect(countCombinations(67, 5)).toBe(9657648);
      expect(countCombinations(5, 5)).toBe(1);
      expect(countCombinations(4, 5)).toBe(0);
    });
  });

  describe("teamCombinations", () => {
    it("pins required members into every team", () => {
      const teams = Array.from(teamCombinations(COOKIES, [anchor, bolt]));
      expect(teams).toHaveLength(56);
      for (const team of teams) {
        expect(team.slice(0, 2)).toEqual([anchor, bolt]);
        expect(new Set(teamKey(team).split(",")).size).toBe(5);
      }
    });

    it("agrees with countTeamCombinations", () => {
      expect(countTeamCombinations(COOKIES, [anchor, bolt])).toBe(56);
      expect(countTeamCombinations(COOKIES, [])).toBe(252);
    });

    it("skips pinned cookies in the remaining pool", () => {
      expect(remainingPool([anchor, bolt, jolt], [bolt]).map((c) => c.name)).toEqual([
        "Anchor Cookie",
        "Jolt Cookie",
      ]);
    });
  });

  describe("filters", () => {
    it("keeps rarities at or below the ceiling", () => {
      const pool = COOKIES.filter(maxRarity("Epic")).map((c) => c.name);
      expect(pool).toEqual(["Comet Cookie", "Dew Cookie", "Ember Cookie", "Glint Cookie", "Hush Cookie"]);
    });

    it("drops ascended variants", () => {
      expect(excludeAscended(iris)).toBe(false);
      expect(excludeAscended(jolt)).toBe(true);
    });

    it("combines filters with AND", () => {
      const filter = combineFilters(maxRarity("Ancient (Ascended)"), excludeAscended, excludeNames(["Hush Cookie"]));
      expect(filter(hush)).toBe(false);
      expect(filter(iris)).toBe(false);
      expect(filter(jolt)).toBe(false);
      expect(filter(anchor)).toBe(true);
    });
  });
});
