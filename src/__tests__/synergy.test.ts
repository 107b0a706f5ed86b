import { describe, it, expect } from "vitest";
import {
  activeCombos,
  bestElementCount,
  calculateSynergy,
  elementSynergyScore,
  groupCounts,
  groupSynergyScore,
  specialComboScore,
  synergyAffinity,
} from "../calculators/synergy";
import { buildSynergyData, emptyReferenceData } from "../data/referenceData";
import { anchor, bolt, comet, dew, ember, fable, glint, hush, iris, jolt, makeReference } from "./fixtures";

const reference = makeReference();

describe("synergy", () => {
  describe("elements", () => {
    it("scores three of one element as a trio", () => {
      const team = [anchor, bolt, ember, comet, dew];
      expect(bestElementCount(team, reference)).toBe(3);
      expect(elementSynergyScore(team, reference)).toBe(15);
    });

    it("scores exactly two as a pair", () => {
      expect(elementSynergyScore([comet, dew, anchor, fable, glint], reference)).toBe(7);
    });

    it("scores nothing when every element differs", () => {
      expect(elementSynergyScore([anchor, comet, fable, glint, hush], reference)).toBe(0);
    });

    it("skips unmapped cookies", () => {
      expect(bestElementCount([hush, iris], reference)).toBe(0);
      expect(bestElementCount([hush, iris, jolt], reference)).toBe(1);
    });
  });

  describe("groups", () => {
    it("counts members per group", () => {
      expect(groupCounts([bolt, jolt, comet, dew, anchor], reference)).toEqual({
        "Storm Pact": 3,
        "Tide Guild": 2,
      });
    });

    it("sums trio and pair values", () => {
      expect(groupSynergyScore([bolt, jolt, comet, anchor, ember], reference)).toBe(12);
      expect(groupSynergyScore([bolt, jolt, comet, dew, anchor], reference)).toBe(17);
    });

    it("caps the group total", () => {
      const synergy = buildSynergyData({
        elements: {},
        groups: {
          "First Trio": ["Anchor Cookie", "Bolt Cookie", "Comet Cookie"],
          "Second Trio": ["Comet Cookie", "Dew Cookie", "Ember Cookie"],
        },
        combos: [],
      });
      expect(groupSynergyScore([anchor, bolt, comet, dew, ember], synergy)).toBe(20);
    });
  });

  describe("special combos", () => {
    it("activates an anchor combo with enough members", () => {
      const result = specialComboScore([jolt, fable, bolt, anchor, glint], reference);
      expect(result.score).toBe(20);
      expect(result.combo?.name).toBe("Starfall");
    });

    it("needs the minimum member count", () => {
      expect(specialComboScore([jolt, bolt, anchor, dew, glint], reference).score).toBe(0);
    });

    it("keeps only the best combo when several activate", () => {
      const team = [jolt, fable, bolt, anchor, ember];
      expect(activeCombos(team, reference).map((c) => c.name)).toEqual(["Ember Oath", "Starfall"]);
      const result = specialComboScore(team, reference);
      expect(result.score).toBe(20);
      expect(result.combo?.name).toBe("Starfall");
    });

    it("needs every member of an all-members combo", () => {
      expect(specialComboScore([comet, dew, hush, anchor, glint], reference).score).toBe(15);
      expect(specialComboScore([comet, dew, iris, anchor, glint], reference).score).toBe(0);
    });
  });

  describe("calculateSynergy", () => {
    it("aggregates the three sub-scores", () => {
      expect(calculateSynergy([anchor, bolt, comet, dew, ember], reference)).toEqual({
        elementSynergy: 15,
        groupSynergy: 10,
        specialCombo: 10,
        activeCombo: "Ember Oath",
      });
    });

    it("scores zero with empty tables", () => {
      expect(calculateSynergy([anchor, bolt, comet, dew, ember], emptyReferenceData())).toEqual({
        elementSynergy: 0,
        groupSynergy: 0,
        specialCombo: 0,
        activeCombo: undefined,
      });
    });
  });

  describe("synergyAffinity", () => {
    it("weights groups and combos", () => {
      expect(synergyAffinity(comet, reference)).toBe(11);
      expect(synergyAffinity(hush, reference)).toBe(4);
      expect(synergyAffinity(jolt, reference)).toBe(6);
      expect(synergyAffinity(dew, reference)).toBe(6);
      expect(synergyAffinity(iris, reference)).toBe(1);
    });
  });
});
