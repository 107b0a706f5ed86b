import { describe, it, expect } from "vitest";
import {
  analyzeThreat,
  buildBiasedPool,
  combinedScore,
  counterConfidence,
  counterScore,
  findMetaMatch,
  identifyWeaknesses,
  recommendCounters,
  recommendCounterTreasures,
} from "../calculators/counter";
import { optimizeCounterTeams } from "../calculators/optimizer";
import { scoreTeam } from "../calculators/scoring";
import { mergeConfig } from "../config/optimizerConfig";
import {
  anchor,
  bolt,
  comet,
  COOKIES,
  dew,
  ember,
  fable,
  glint,
  hush,
  jolt,
  makeReference,
  makeRepo,
  TREASURES,
} from "./fixtures";

const reference = makeReference();

/** Exactly the "Storm Front" meta team */
const stormFront = [bolt, jolt, comet, dew, ember];

/** Two healers, no front row, stun immunity */
const healerWall = [dew, fable, hush, comet, glint];

describe("counter", () => {
  describe("findMetaMatch", () => {
    it("matches the typical composition exactly", () => {
      const match = findMetaMatch(stormFront, reference.metaTeams);
      expect(match?.team.name).toBe("Storm Front");
      expect(match?.exact).toBe(true);
    });

    it("matches partially on the core members", () => {
      const match = findMetaMatch([bolt, jolt, anchor], reference.metaTeams);
      expect(match?.exact).toBe(false);
    });

    it("finds nothing without the core", () => {
      expect(findMetaMatch([bolt, anchor], reference.metaTeams)).toBeUndefined();
      expect(findMetaMatch([], reference.metaTeams)).toBeUndefined();
    });
  });

  describe("analyzeThreat", () => {
    it("profiles an enemy composition", () => {
      const profile = analyzeThreat(stormFront, reference);
      expect(profile.size).toBe(5);
      expect(profile.healers).toEqual(["Dew Cookie"]);
      expect(profile.tanks).toEqual(["Ember Cookie"]);
      expect(profile.dps).toEqual(["Bolt Cookie", "Jolt Cookie", "Comet Cookie"]);
      expect(profile.positions).toEqual({ Front: 1, Middle: 1, Rear: 3 });
      expect(profile.crowdControl).toEqual(["Bolt Cookie", "Jolt Cookie"]);
      expect(profile.ccTypes).toEqual(["Stun", "Freeze"]);
      expect(profile.immunity).toBe(false);
      expect(profile.cleanse).toEqual(["Dew Cookie"]);
      expect(profile.antiTank).toEqual(["Ember Cookie"]);
      expect(profile.beasts).toEqual(["Jolt Cookie"]);
      expect(profile.taunt).toBe(false);
      expect(profile.burstDamage).toBe(true);
    });

    it("sums threat levels and flags high threats", () => {
      const profile = analyzeThreat(stormFront, reference);
      expect(profile.totalThreat).toBe(15);
      expect(profile.averageThreat).toBe(3);
      expect(profile.memberThreat["Comet Cookie"]).toBe(0);
      expect(profile.highThreat).toEqual([{ name: "Jolt Cookie", threatLevel: 9, threats: ["Freeze lock"] }]);
      expect(profile.hasHighThreat).toBe(true);
    });

    it("counts the support role as healing and reads immunity", () => {
      const profile = analyzeThreat(healerWall, reference);
      expect(profile.healers).toEqual(["Dew Cookie", "Fable Cookie"]);
      expect(profile.immunity).toBe(true);
      expect(profile.immunityTypes).toEqual(["Stun"]);
      expect(profile.positions).toEqual({ Front: 0, Middle: 1, Rear: 4 });
    });

    it("detects a taunt tank", () => {
      expect(analyzeThreat([anchor, jolt], reference).taunt).toBe(true);
    });

    it("returns a neutral profile for an empty enemy", () => {
      const profile = analyzeThreat([], reference);
      expect(profile.size).toBe(0);
      expect(profile.totalThreat).toBe(0);
      expect(profile.averageThreat).toBe(0);
      expect(profile.hasHighThreat).toBe(false);
      expect(profile.metaMatch).toBeUndefined();
    });
  });

  describe("identifyWeaknesses", () => {
    it("lists the weaknesses in rule order", () => {
      const weaknesses = identifyWeaknesses(analyzeThreat(stormFront, reference));
      expect(weaknesses.map((w) => w.weakness)).toEqual([
        "Exposed Backline",
        "High Threat Without Taunt Defense",
        "Burst-Heavy Low-Sustain Team",
        "No Anti-Heal",
      ]);
      expect(weaknesses[1].description).toBe("Jolt Cookie can act freely with no taunt tank to protect them");
      expect(weaknesses[1].priority).toBe("CRITICAL");
    });

    it("is empty for an empty enemy", () => {
      expect(identifyWeaknesses(analyzeThreat([], reference))).toEqual([]);
    });
  });

  describe("recommendCounters", () => {
    it("merges documented, meta and composition counters", () => {
      const recommendation = recommendCounters(analyzeThreat(stormFront, reference), COOKIES, reference);
      expect(recommendation.rulesFired).toEqual([
        "high-threat",
        "meta-team",
        "exposed-backline",
        "cc-heavy",
        "burst",
        "no-immunity",
      ]);
      expect(recommendation.recommended).toEqual([
        "Glint Cookie",
        "Anchor Cookie",
        "Fable Cookie",
        "Dew Cookie",
        "Jolt Cookie",
        "Bolt Cookie",
      ]);
      expect(recommendation.priorityTargets).toEqual(["Jolt Cookie", "Bolt Cookie", "Dew Cookie", "Comet Cookie"]);
      expect(recommendation.strategy).toBe("Dive Jolt before the freeze lands");
      expect(recommendation.archetype).toBe("Threat Counter");
      expect(recommendation.confidence).toBe(95);
    });

    it("recommends against a healing-heavy team", () => {
      const recommendation = recommendCounters(analyzeThreat(healerWall, reference), COOKIES, reference);
      expect(recommendation.rulesFired).toEqual(["healing-heavy", "exposed-backline"]);
      expect(recommendation.recommended).toEqual(["Glint Cookie"]);
      expect(recommendation.archetype).toBe("Anti-Heal Assassin");
      expect(recommendation.confidence).toBe(70);
    });

    it("falls back to high-tier picks for an empty enemy", () => {
      const recommendation = recommendCounters(analyzeThreat([], reference), COOKIES, reference);
      expect(recommendation.recommended).toEqual([
        "Jolt Cookie",
        "Iris Cookie (Ascended)",
        "Anchor Cookie",
        "Bolt Cookie",
      ]);
      expect(recommendation.archetype).toBe("Balanced");
      expect(recommendation.confidence).toBe(30);
      expect(recommendation.rulesFired).toEqual([]);
    });

    it("caps the recommendation list", () => {
      const config = mergeConfig({ counter: { maxRecommendations: 3 } });
      const recommendation = recommendCounters(analyzeThreat(stormFront, reference), COOKIES, reference, config);
      expect(recommendation.recommended).toEqual(["Glint Cookie", "Anchor Cookie", "Fable Cookie"]);
    });
  });

  describe("counterConfidence", () => {
    it("raises the baseline for a partial meta match", () => {
      const partial = analyzeThreat([bolt, jolt, anchor], reference);
      expect(counterConfidence(partial, 2)).toBe(80);
      expect(counterConfidence(partial, 10)).toBe(85);
    });

    it("uses the lower baseline without a match", () => {
      expect(counterConfidence(analyzeThreat([glint], reference), 1)).toBe(65);
    });
  });

  describe("buildBiasedPool", () => {
    it("tops recommended cookies up with high-tier ones", () => {
      const recommendation = recommendCounters(analyzeThreat(stormFront, reference), COOKIES, reference);
      expect(buildBiasedPool(recommendation, COOKIES).map((c) => c.name)).toEqual([
        "Glint Cookie",
        "Anchor Cookie",
        "Fable Cookie",
        "Dew Cookie",
        "Jolt Cookie",
        "Bolt Cookie",
        "Iris Cookie (Ascended)",
      ]);
    });
  });

  describe("counterScore", () => {
    const team = [glint, anchor, bolt, jolt, dew];

    it("scores recommended picks, trait answers, balance and synergy", () => {
      const profile = analyzeThreat(healerWall, reference);
      const recommendation = recommendCounters(profile, COOKIES, reference);
      const score = scoreTeam(team, { synergy: reference });
      // 8 recommended + 10 anti-heal + 10 backline + 15 balance + 12/60 * 15 synergy
      expect(counterScore(team, profile, recommendation, score)).toBeCloseTo(46);
    });

    it("weights counter and team scores", () => {
      expect(combinedScore(46, 100)).toBeCloseTo(67.6);
    });
  });

  describe("recommendCounterTreasures", () => {
    it("favours treasures that answer the enemy", () => {
      const recs = recommendCounterTreasures(
        analyzeThreat(stormFront, reference),
        [glint, anchor, bolt, jolt, dew],
        TREASURES
      );
      expect(recs.map((r) => [r.treasure.name, r.score])).toEqual([
        ["Test Chalice", 26],
        ["Test Scroll", 18],
        ["Test Thorn", 12.5],
      ]);
      expect(recs[0].reason).toBe("Shield to survive Jolt Cookie");
      expect(recs[1].reason).toBe("Offensive stats to punish weak frontline");
    });
  });

  describe("optimizeCounterTeams", () => {
    it("ranks counter teams by the combined score", () => {
      const result = optimizeCounterTeams(
        {
          strategy: "greedy",
          enemy: ["Bolt", "Jolt", "Comet", "Dew", "Ember"],
          count: 10,
          topN: 5,
          seed: 1,
        },
        { repo: makeRepo(), reference }
      );

      expect(result.enemy.map((c) => c.name)).toEqual(stormFront.map((c) => c.name));
      expect(result.profile.metaMatch?.team.name).toBe("Storm Front");
      expect(result.recommendation.confidence).toBe(95);
      expect(result.weaknesses).toHaveLength(4);
      expect(result.teams.length).toBeGreaterThan(0);

      const combined = result.teams.map((t) => t.counter?.combinedScore ?? Number.NaN);
      expect([...combined].sort((a, b) => b - a)).toEqual(combined);
      for (const team of result.teams) {
        const counter = team.counter;
        expect(counter).toBeDefined();
        if (counter) {
          expect(counter.combinedScore).toBeCloseTo(0.6 * counter.counterScore + 0.4 * team.score.total);
          expect(counter.counterScore).toBeLessThanOrEqual(100);
        }
      }
    });

    it("spends one time budget across the biased and full-pool runs", () => {
      let clock = 0;
      let reads = 0;
      const now = (): number => {
        reads++;
        const value = clock;
        clock += 10;
        return value;
      };

      const result = optimizeCounterTeams(
        {
          strategy: "genetic",
          enemy: ["Bolt", "Jolt", "Comet", "Dew", "Ember"],
          seed: 1,
          populationSize: 10,
          generations: 1000,
          maxTimeMs: 50,
          now,
        },
        { repo: makeRepo(), reference }
      );

      // request start, five generations on the biased pool, the
      // remaining-budget check, and the final elapsed reading
      expect(reads).toBe(10);
      expect(result.complete).toBe(false);
      expect(result.budget).toEqual({ reason: "time", limit: 50, elapsedMs: 90 });
    });

    it("skips the full-pool run once the combination budget is spent", () => {
      const result = optimizeCounterTeams(
        {
          strategy: "genetic",
          enemy: ["Bolt", "Jolt", "Comet", "Dew", "Ember"],
          seed: 1,
          populationSize: 10,
          generations: 1000,
          maxCombinations: 1,
        },
        { repo: makeRepo(), reference }
      );

      expect(result.complete).toBe(false);
      expect(result.budget?.reason).toBe("combinations");
      expect(result.budget?.limit).toBe(1);
      // one generation of ten on the biased pool, nothing more
      expect(result.evaluated).toBeGreaterThan(0);
      expect(result.evaluated).toBeLessThanOrEqual(10);
      expect(result.teams.every((t) => t.members.every((c) => c.name !== "Hush Cookie"))).toBe(true);
    });
  });
});
