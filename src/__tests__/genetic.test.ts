import { describe, it, expect } from "vitest";
import { crossover, generateGenetic, mutate } from "../calculators/generators";
import { createRng } from "../calculators/random";
import { scoreTeam } from "../calculators/scoring";
import { teamKey } from "../calculators/searchUtils";
import type { ProgressUpdate, Team } from "../models/teamTypes";
import { anchor, bolt, comet, COOKIES, dew, ember, fable, glint, hush, iris, jolt, makeContext } from "./fixtures";

describe("generateGenetic", () => {
  it("returns distinct teams, best first", () => {
    const result = generateGenetic(makeContext({ count: 8 }));
    const keys = result.teams.map(teamKey);
    expect(result.teams).toHaveLength(8);
    expect(new Set(keys).size).toBe(8);

    const totals = result.teams.map((t) => scoreTeam(t).total);
    expect([...totals].sort((a, b) => b - a)).toEqual(totals);
    expect(totals[0]).toBeLessThanOrEqual(89.5);
  });

  it("counts each distinct team once", () => {
    let calls = 0;
    const result = generateGenetic(
      makeContext({
        fitness: (team: Team) => {
          calls++;
          return scoreTeam(team).total;
        },
      })
    );
    expect(result.evaluated).toBe(calls);
    expect(result.evaluated).toBeLessThanOrEqual(252);
    expect(result.complete).toBe(true);
  });

  it("reports progress once per generation", () => {
    const generations: number[] = [];
    generateGenetic(
      makeContext({
        generations: 4,
        onProgress: (update: ProgressUpdate) => {
          if (update.generation !== undefined) generations.push(update.generation);
        },
      })
    );
    expect(generations).toEqual([1, 2, 3, 4]);
  });

  it("stops between generations when the budget runs out", () => {
    const result = generateGenetic(makeContext({ budget: { maxCombinations: 10 } }));
    expect(result.complete).toBe(false);
    expect(result.budget?.reason).toBe("combinations");
    expect(result.evaluated).toBeGreaterThanOrEqual(10);
  });

  it("keeps required members in every team", () => {
    const result = generateGenetic(makeContext({ required: [glint, hush] }));
    for (const team of result.teams) {
      expect(team.slice(0, 2)).toEqual([glint, hush]);
    }
  });

  describe("operators", () => {
    const free = COOKIES;

    it("crosses two parents into distinct genes", () => {
      const rng = createRng(4);
      for (let i = 0; i < 50; i++) {
        const child = crossover(rng, [anchor, bolt, comet, dew, ember], [comet, anchor, fable, iris, jolt], free);
        expect(child).toHaveLength(5);
        expect(new Set(child).size).toBe(5);
      }
    });

    it("mutates one gene to a cookie not already present", () => {
      const genome = [anchor, bolt, comet, dew, ember];
      const mutated = mutate(createRng(2), genome, free);
      const added = mutated.filter((c) => !genome.includes(c));
      expect(added).toHaveLength(1);
      expect(new Set(mutated).size).toBe(5);
      expect(genome).toEqual([anchor, bolt, comet, dew, ember]);
    });

    it("leaves a genome alone when the pool has nothing new", () => {
      const genome = [anchor, bolt];
      expect(mutate(createRng(2), genome, [anchor, bolt])).toBe(genome);
    });
  });
});
