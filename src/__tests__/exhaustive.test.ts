import { describe, it, expect } from "vitest";
import { assertExhaustiveFeasible, generateExhaustive } from "../calculators/generators";
import { optimizeTeams } from "../calculators/optimizer";
import { scoreTeam } from "../calculators/scoring";
import { teamKey } from "../calculators/searchUtils";
import { ExhaustiveGuardError, InfeasibleConstraintError } from "../errors";
import { emptyReferenceData } from "../data/referenceData";
import type { Team } from "../models/teamTypes";
import { anchor, bolt, comet, dew, makeContext, makeReference, makeRepo, syntheticCookies } from "./fixtures";

describe("generateExhaustive", () => {
  describe("full enumeration", () => {
    it("scores every team and keeps the best first", () => {
      const result = generateExhaustive(makeContext({ count: 3 }));
      expect(result.evaluated).toBe(252);
      expect(result.complete).toBe(true);
      expect(result.budget).toBeUndefined();
      expect(result.teams.map((t) => scoreTeam(t).total)).toEqual([89.5, 88.5, 88]);
      expect(teamKey(result.teams[0])).toBe(
        "Anchor Cookie,Dew Cookie,Fable Cookie,Iris Cookie (Ascended),Jolt Cookie"
      );
    });

    it("finds the synergy optimum when synergy scores count", () => {
      const synergy = makeReference();
      const result = generateExhaustive(
        makeContext({ count: 1, fitness: (team: Team) => scoreTeam(team, { synergy }).total })
      );
      expect(teamKey(result.teams[0])).toBe(
        "Anchor Cookie,Bolt Cookie,Ember Cookie,Fable Cookie,Jolt Cookie"
      );
      expect(scoreTeam(result.teams[0], { synergy }).total).toBe(126);
    });

    it("enumerates only completions of the required members", () => {
      const result = generateExhaustive(makeContext({ required: [anchor, bolt, comet], count: 100 }));
      // 7 remaining cookies, 2 free slots
      expect(result.evaluated).toBe(21);
      expect(result.teams).toHaveLength(21);
    });
  });

  describe("guards", () => {
    it("rejects a large pool with few required members and no budget", () => {
      const pool = syntheticCookies(120);
      expect(() => generateExhaustive(makeContext({ pool }))).toThrow(ExhaustiveGuardError);
    });

    it("allows a large pool with three required members", () => {
      const pool = syntheticCookies(120);
      expect(() => assertExhaustiveFeasible(makeContext({ pool, required: pool.slice(0, 3) }))).not.toThrow();
    });

    it("rejects a request with every member required", () => {
      const required = [anchor, bolt, comet, dew, ...syntheticCookies(1)];
      expect(() => generateExhaustive(makeContext({ required }))).toThrow(InfeasibleConstraintError);
    });
  });

  describe("budgets", () => {
    it("stops at the combination limit", () => {
      const result = generateExhaustive(
        makeContext({ pool: syntheticCookies(120), budget: { maxCombinations: 500 } })
      );
      expect(result.evaluated).toBe(500);
      expect(result.complete).toBe(false);
      expect(result.budget?.reason).toBe("combinations");
      expect(result.budget?.limit).toBe(500);
    });

    it("checks the clock every check interval", () => {
      let t = 0;
      const result = generateExhaustive(
        makeContext({
          pool: syntheticCookies(12),
          budget: { maxTimeMs: 100 },
          now: () => t,
          fitness: (team: Team) => {
            t++;
            return scoreTeam(team).total;
          },
        })
      );
      expect(result.evaluated).toBe(256);
      expect(result.complete).toBe(false);
      expect(result.budget).toEqual({ reason: "time", limit: 100, elapsedMs: 256 });
    });

    it("stops a request on a large catalog at the time budget", () => {
      let t = 0;
      const now = (): number => {
        const current = t;
        t += 10;
        return current;
      };
      const result = optimizeTeams(
        { strategy: "exhaustive", maxTimeMs: 50, seed: 1, now },
        { repo: makeRepo(syntheticCookies(170)), reference: emptyReferenceData() }
      );
      expect(result.complete).toBe(false);
      expect(result.evaluated).toBe(1024);
      expect(result.budget).toEqual({ reason: "time", limit: 50, elapsedMs: 60 });
      expect(result.teams.length).toBeGreaterThan(0);
    });

    it("stops on the real clock", () => {
      const result = generateExhaustive(
        makeContext({ pool: syntheticCookies(170), budget: { maxTimeMs: 50 }, count: 5 })
      );
      expect(result.complete).toBe(false);
      expect(result.budget?.reason).toBe("time");
      expect(result.teams).toHaveLength(5);
    });
  });
});
