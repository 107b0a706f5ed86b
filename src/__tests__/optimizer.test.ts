import { describe, it, expect } from "vitest";
import { optimizeCounterTeams, optimizeTeams, type OptimizerContext } from "../calculators/optimizer";
import { buildPool, checkInteger, validateStrategy } from "../calculators/validation";
import {
  InfeasibleConstraintError,
  InvalidParameterError,
  InvalidStrategyError,
  OptimizerError,
  UnknownEntityError,
} from "../errors";
import type { ProgressUpdate } from "../models/teamTypes";
import { makeReference, makeRepo } from "./fixtures";

const context: OptimizerContext = { repo: makeRepo(), reference: makeReference() };

/**
 * Run a request and return the thrown error
 */
function failure(run: () => unknown): OptimizerError {
  try {
    run();
  } catch (error) {
    if (error instanceof OptimizerError) return error;
    throw error;
  }
  throw new Error("Expected the request to fail");
}

describe("optimizer", () => {
  describe("optimizeTeams", () => {
    it("ranks greedy candidates and suggests treasures", () => {
      const result = optimizeTeams({ strategy: "greedy", seed: 1, count: 10, topN: 3, useSynergy: false }, context);
      expect(result.strategy).toBe("greedy");
      expect(result.seed).toBe(1);
      expect(result.candidates).toBe(10);
      expect(result.ceiling).toBe(100);
      expect(result.poolSize).toBe(10);
      expect(result.complete).toBe(true);
      expect(result.teams).toHaveLength(3);
      expect(result.teams[0].key).toBe(
        "Anchor Cookie,Dew Cookie,Fable Cookie,Iris Cookie (Ascended),Jolt Cookie"
      );
      expect(result.teams[0].score.total).toBe(89.5);
      expect(result.recommendedTreasures.map((r) => [r.treasure.name, r.score])).toEqual([
        ["Test Scroll", 18],
        ["Test Chalice", 17],
        ["Test Thorn", 7],
      ]);
    });

    it("enumerates the whole catalog with synergy scoring", () => {
      const result = optimizeTeams({ strategy: "exhaustive", topN: 1 }, context);
      expect(result.evaluated).toBe(252);
      expect(result.ceiling).toBe(160);
      expect(result.teams[0].key).toBe("Anchor Cookie,Bolt Cookie,Ember Cookie,Fable Cookie,Jolt Cookie");
      expect(result.teams[0].score.total).toBe(126);
      expect(result.teams[0].score.activeCombo).toBe("Starfall");
    });

    it("attaches selected treasures to every score", () => {
      const result = optimizeTeams(
        { strategy: "random", seed: 3, count: 5, treasures: ["test scroll"], useSynergy: false },
        context
      );
      expect(result.ceiling).toBe(115);
      expect(result.recommendedTreasures).toEqual([]);
      for (const team of result.teams) {
        expect(team.score.breakdown.treasureBonus).toBeDefined();
      }
    });

    it("keeps required cookies and drops excluded ones", () => {
      const result = optimizeTeams(
        { strategy: "genetic", seed: 5, required: ["hush"], exclude: ["Jolt Cookie"], populationSize: 10, generations: 5 },
        context
      );
      expect(result.teams.length).toBeGreaterThan(0);
      for (const team of result.teams) {
        expect(team.members.map((c) => c.name)).toContain("Hush Cookie");
        expect(team.members.map((c) => c.name)).not.toContain("Jolt Cookie");
        expect(team.details.find((d) => d.name === "Hush Cookie")?.required).toBe(true);
      }
    });

    it("reproduces a run from its seed", () => {
      const request = { strategy: "genetic", seed: 11, populationSize: 12, generations: 6 };
      const first = optimizeTeams(request, context);
      const second = optimizeTeams(request, context);
      expect(second.teams.map((t) => t.key)).toEqual(first.teams.map((t) => t.key));
    });

    it("picks a seed when none is given", () => {
      const result = optimizeTeams({ strategy: "random", count: 2 }, context);
      expect(Number.isInteger(result.seed)).toBe(true);
    });

    it("applies instance overrides to member power", () => {
      const result = optimizeTeams(
        {
          strategy: "exhaustive",
          required: ["Comet", "Dew", "Ember", "Glint"],
          overrides: { comet: { level: 70, skillLevel: 60, toppingQuality: 5 } },
          useSynergy: false,
        },
        context
      );
      const comet = result.teams[0].details.find((d) => d.name === "Comet Cookie");
      expect(comet?.power).toBeCloseTo(5.4);
      expect(comet?.override).toEqual({ level: 70, skillLevel: 60, toppingQuality: 5 });
    });

    it("reports progress through the request callback", () => {
      const phases: string[] = [];
      optimizeTeams(
        { strategy: "greedy", seed: 1, count: 3, onProgress: (u: ProgressUpdate) => phases.push(u.phase) },
        context
      );
      expect(phases).toEqual(["greedy", "ranking"]);
    });
  });

  describe("request validation", () => {
    it("rejects an unknown strategy", () => {
      expect(() => validateStrategy("annealing")).toThrow(InvalidStrategyError);
      expect(failure(() => optimizeTeams({ strategy: "annealing" }, context)).code).toBe("INVALID_STRATEGY");
    });

    it("names the parameter that is out of range", () => {
      const cases: Array<[string, () => unknown]> = [
        ["count", () => optimizeTeams({ strategy: "random", count: 0 }, context)],
        ["topN", () => optimizeTeams({ strategy: "random", topN: 51 }, context)],
        ["populationSize", () => optimizeTeams({ strategy: "genetic", populationSize: 1 }, context)],
        [
          "required",
          () =>
            optimizeTeams({ strategy: "random", required: ["Anchor", "Bolt", "Comet", "Dew", "Ember", "Fable"] }, context),
        ],
        [
          "treasures",
          () =>
            optimizeTeams(
              { strategy: "random", treasures: ["Test Scroll", "Test Chalice", "Test Bell", "Test Thorn"] },
              context
            ),
        ],
        [
          "overrides.Comet Cookie.level",
          () => optimizeTeams({ strategy: "random", overrides: { Comet: { level: 80 } } }, context),
        ],
        ["required", () => optimizeTeams({ strategy: "random", required: ["Anchor", "anchor cookie"] }, context)],
        ["enemy", () => optimizeCounterTeams({ strategy: "random", enemy: [] }, context)],
        [
          "enemy",
          () =>
            optimizeCounterTeams(
              { strategy: "random", enemy: ["Anchor", "Bolt", "Comet", "Dew", "Ember", "Fable"] },
              context
            ),
        ],
      ];

      for (const [parameter, run] of cases) {
        const error = failure(run);
        expect(error).toBeInstanceOf(InvalidParameterError);
        expect(error.details.parameter).toBe(parameter);
      }
    });

    it("rejects unknown cookie and treasure names", () => {
      const error = failure(() => optimizeTeams({ strategy: "random", required: ["Nobody"] }, context));
      expect(error).toBeInstanceOf(UnknownEntityError);
      expect(error.details.names).toEqual(["Nobody"]);
      expect(error.message).toBe("Unknown cookie name(s) in required: Nobody");

      const treasure = failure(() => optimizeTeams({ strategy: "random", treasures: ["Lost Relic"] }, context));
      expect(treasure.code).toBe("UNKNOWN_ENTITY");
      expect(treasure.details.kind).toBe("treasure");
      expect(treasure.message).toBe("Unknown treasure name(s) in treasures: Lost Relic");
    });

    it("rejects a pool too small for the free slots", () => {
      const error = failure(() =>
        optimizeTeams({ strategy: "random", pool: ["Anchor", "Bolt", "Comet"], required: ["Dew"] }, context)
      );
      expect(error).toBeInstanceOf(InfeasibleConstraintError);
      expect(error.details).toEqual({ available: 3, needed: 4 });
    });

    it("checks integers against inclusive bounds", () => {
      expect(checkInteger("count", undefined, 1)).toBeUndefined();
      expect(checkInteger("count", 5, 1, 5)).toBe(5);
      expect(() => checkInteger("count", 2.5, 1)).toThrow("count must be an integer >= 1 (got 2.5)");
    });

    it("filters the pool by rarity, ascension and exclusion", () => {
      const repo = makeRepo();
      const pool = buildPool(repo, {
        strategy: "random",
        maxRarity: "Ancient (Ascended)",
        excludeAscended: true,
        exclude: ["Hush"],
      });
      expect(pool.map((c) => c.name)).toEqual([
        "Anchor Cookie",
        "Bolt Cookie",
        "Comet Cookie",
        "Dew Cookie",
        "Ember Cookie",
        "Fable Cookie",
        "Glint Cookie",
      ]);
    });
  });
});
