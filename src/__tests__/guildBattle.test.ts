import { describe, it, expect } from "vitest";
import {
  bossStrategy,
  cookieTraits,
  keyMembers,
  rankForBoss,
  scoreCookieForBoss,
  scoreTeamForBoss,
} from "../calculators/guildBattle";
import { optimizeGuildBattle } from "../calculators/optimizer";
import { validateBoss } from "../calculators/validation";
import { mergeConfig } from "../config/optimizerConfig";
import { UnknownEntityError } from "../errors";
import type { ProgressUpdate } from "../models/teamTypes";
import {
  anchor,
  bolt,
  comet,
  COOKIES,
  dew,
  ember,
  fable,
  hush,
  iris,
  jolt,
  makeReference,
  makeRepo,
  names,
  tideWyrm,
} from "./fixtures";

const reference = makeReference();
const context = { repo: makeRepo(), reference };

/** Search only the six best boss-scored cookies */
const smallPool = mergeConfig({ guildBattle: { poolSize: 6 } });

const scoreOf = (cookie: { name: string }): number =>
  new Map([
    ["Comet Cookie", 100],
    ["Fable Cookie", 83],
    ["Anchor Cookie", 72],
    ["Dew Cookie", 66],
    ["Hush Cookie", 64],
  ]).get(cookie.name) ?? 0;

describe("guild battle", () => {
  describe("cookieTraits", () => {
    it("reads traits from ability fields", () => {
      expect([...cookieTraits(anchor, reference)]).toEqual(["shieldProvider"]);
      expect([...cookieTraits(ember, reference)]).toEqual(["defShred"]);
      expect([...cookieTraits(iris, reference)]).toEqual(["debuffHeavy"]);
    });

    it("reads element traits from the synergy table", () => {
      expect([...cookieTraits(comet, reference)]).toEqual(["waterElement"]);
      const charged = { ...reference, elements: new Map([["Bolt Cookie", "Electricity" as const]]) };
      expect([...cookieTraits({ ...bolt, targetType: "AoE" }, charged)]).toEqual(["aoeDamage", "electricElement"]);
    });

    it("adds traits listed in the boss trait table", () => {
      expect([...cookieTraits(hush, reference)]).toEqual(["waterElement"]);
      expect(cookieTraits(jolt, reference).size).toBe(0);
    });
  });

  describe("scoreCookieForBoss", () => {
    it("adds tier, trait and power points to the base", () => {
      // 50 + 25 (A tier) + 4 * 2
      expect(scoreCookieForBoss(fable, tideWyrm, reference)).toBe(83);
      // 50 + 10 (shield) + 6 * 2
      expect(scoreCookieForBoss(anchor, tideWyrm, reference)).toBe(72);
      // 50 + 7 * 2
      expect(scoreCookieForBoss(jolt, tideWyrm, reference)).toBe(64);
    });

    it("penalizes avoided traits", () => {
      // 50 - 15 + 6.5 * 2
      expect(scoreCookieForBoss(iris, tideWyrm, reference)).toBe(48);
    });

    it("caps at 100", () => {
      // 50 + 40 + 10 + 3 * 2 = 106
      expect(scoreCookieForBoss(comet, tideWyrm, reference)).toBe(100);
    });

    it("uses the supplied power lookup", () => {
      expect(scoreCookieForBoss(jolt, tideWyrm, reference, { powerOf: () => 1 })).toBe(52);
    });
  });

  describe("rankForBoss", () => {
    it("orders by boss score, then name", () => {
      const ranked = rankForBoss(COOKIES, tideWyrm, reference);
      expect(ranked.map((c) => [c.cookie.name, c.score])).toEqual([
        ["Comet Cookie", 100],
        ["Fable Cookie", 83],
        ["Anchor Cookie", 72],
        ["Dew Cookie", 66],
        ["Hush Cookie", 64],
        ["Jolt Cookie", 64],
        ["Bolt Cookie", 60],
        ["Ember Cookie", 52],
        ["Glint Cookie", 51],
        ["Iris Cookie (Ascended)", 48],
      ]);
    });
  });

  describe("scoreTeamForBoss", () => {
    const team = [comet, fable, anchor, dew, hush];

    it("adds synergy, S-tier and coverage bonuses to the mean", () => {
      // 385 / 5 + 27 / 5 + 5 + 2 * 3
      expect(scoreTeamForBoss(team, tideWyrm, scoreOf, 27, reference)).toBeCloseTo(93.4);
    });

    it("caps the synergy share", () => {
      // 77 + 10 + 5 + 6
      expect(scoreTeamForBoss(team, tideWyrm, scoreOf, 80, reference)).toBeCloseTo(98);
    });

    it("counts only the preferred traits the team covers", () => {
      // (100 + 83 + 66 + 64 + 0) / 5 + 5 + 3; no shield
      expect(scoreTeamForBoss([comet, fable, dew, hush, jolt], tideWyrm, scoreOf, 0, reference)).toBeCloseTo(
        70.6
      );
    });

    it("caps at 100", () => {
      expect(scoreTeamForBoss(team, tideWyrm, () => 100, 0, reference)).toBe(100);
    });
  });

  describe("bossStrategy", () => {
    it("names a single S-tier member", () => {
      expect(bossStrategy([comet, fable, anchor, dew, hush], tideWyrm)).toBe(
        "★ Comet Cookie is your key damage dealer. Shield the front row before the flood"
      );
    });

    it("names the first two S-tier members", () => {
      const boss = { ...tideWyrm, sTier: ["Comet Cookie", "Dew Cookie", "Anchor Cookie"] };
      expect(keyMembers([anchor, comet, dew, fable, hush], boss)).toEqual([
        "Anchor Cookie",
        "Comet Cookie",
        "Dew Cookie",
      ]);
      expect(bossStrategy([anchor, comet, dew, fable, hush], boss)).toBe(
        "★ Focus on: Anchor Cookie, Comet Cookie Shield the front row before the flood"
      );
    });

    it("falls back to the description", () => {
      expect(bossStrategy([fable, anchor, dew, hush, jolt], { ...tideWyrm, strategy: [] })).toBe(
        "Soaks up everything but Water"
      );
    });
  });

  describe("validateBoss", () => {
    it("ignores case and surrounding space", () => {
      expect(validateBoss(reference.bosses, "  tide wyrm ")).toBe(tideWyrm);
    });

    it("rejects an unknown boss", () => {
      expect(() => validateBoss(reference.bosses, "Sand Golem")).toThrow(UnknownEntityError);
      expect(() => validateBoss(reference.bosses, "Sand Golem")).toThrow("Unknown boss name(s) in boss: Sand Golem");
    });
  });

  describe("optimizeGuildBattle", () => {
    it("searches the top of the boss ranking and ranks by boss score", () => {
      const result = optimizeGuildBattle(
        { boss: "Tide Wyrm", strategy: "exhaustive", topN: 6, useSynergy: false },
        { ...context, config: smallPool }
      );

      expect(result.boss).toBe(tideWyrm);
      expect(result.bossPool.map((c) => c.cookie.name)).toEqual([
        "Comet Cookie",
        "Fable Cookie",
        "Anchor Cookie",
        "Dew Cookie",
        "Hush Cookie",
        "Jolt Cookie",
      ]);
      expect(result.poolSize).toBe(6);
      expect(result.teams).toHaveLength(6);

      // Two teams tie at 88; the one with Jolt has the higher rarity sum
      expect(names(result.teams[0].members)).toEqual([
        "Anchor Cookie",
        "Comet Cookie",
        "Dew Cookie",
        "Fable Cookie",
        "Jolt Cookie",
      ]);
      expect(result.teams.map((t) => t.boss?.bossScore)).toEqual([
        88,
        88,
        expect.closeTo(87.6),
        expect.closeTo(84.2),
        expect.closeTo(83.4),
        expect.closeTo(75.8),
      ]);
      expect(result.teams[0].boss?.keyMembers).toEqual(["Comet Cookie"]);
      expect(result.teams[5].boss?.strategy).toBe("Shield the front row before the flood");
    });

    it("pins required members outside the boss pool", () => {
      const result = optimizeGuildBattle(
        { boss: "tide wyrm", strategy: "exhaustive", required: ["Iris"], useSynergy: false },
        { ...context, config: smallPool }
      );

      expect(result.bossPool.map((c) => c.cookie.name)).not.toContain("Iris Cookie (Ascended)");
      expect(result.poolSize).toBe(7);
      for (const team of result.teams) {
        expect(team.members.map((c) => c.name)).toContain("Iris Cookie (Ascended)");
      }
      // (48 + 100 + 83 + 72 + 66) / 5 + 5 + 6
      expect(names(result.teams[0].members)).toEqual([
        "Anchor Cookie",
        "Comet Cookie",
        "Dew Cookie",
        "Fable Cookie",
        "Iris Cookie (Ascended)",
      ]);
      expect(result.teams[0].boss?.bossScore).toBeCloseTo(84.8);
    });

    it("runs the sampling generators over the boss pool", () => {
      const result = optimizeGuildBattle(
        { boss: "Tide Wyrm", strategy: "genetic", seed: 4, populationSize: 10, generations: 5 },
        { ...context, config: smallPool }
      );
      const allowed = new Set(result.bossPool.map((c) => c.cookie.name));
      expect(result.teams.length).toBeGreaterThan(0);
      for (const team of result.teams) {
        for (const member of team.members) expect(allowed.has(member.name)).toBe(true);
      }
    });

    it("reports the boss phase first", () => {
      const updates: ProgressUpdate[] = [];
      optimizeGuildBattle(
        { boss: "Tide Wyrm", strategy: "greedy", seed: 1, count: 3, onProgress: (u) => updates.push(u) },
        { ...context, config: smallPool }
      );
      expect(updates[0]).toEqual({
        phase: "boss",
        evaluated: 0,
        message: "Searching the top 6 cookies against Tide Wyrm",
      });
    });

    it("rejects an unknown boss before validating the rest", () => {
      expect(() => optimizeGuildBattle({ boss: "Sand Golem", strategy: "annealing" }, context)).toThrow(
        UnknownEntityError
      );
    });
  });
});
