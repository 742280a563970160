import { indicatorsFor } from "../../__tests__/fixtures";
import type { DisclosureLevel } from "../../domain/types";
import { loadRubric } from "../../rubric/registry";
import {
  DISCLOSURE_LEVELS,
  RISK_MATRIX,
  assessDisclosureQuality,
  levelFor,
} from "../disclosure_quality";
import { scoreTrack } from "../score";

function sustainabilityScore(
  values: Record<string, boolean | null>,
  version = "automotive-2024"
) {
  const rubric = loadRubric(version);
  return scoreTrack({
    track: "sustainability",
    rubricVersion: version,
    rubric: rubric.tracks.sustainability,
    indicators: indicatorsFor("sustainability", values, version),
  });
}

describe("levelFor", () => {
  test("uses 0.75 and 0.4 as the level boundaries", () => {
    expect(levelFor(0.75)).toBe("High");
    expect(levelFor(0.74)).toBe("Medium");
    expect(levelFor(0.4)).toBe("Medium");
    expect(levelFor(0.39)).toBe("Low");
    expect(levelFor(0)).toBe("Low");
  });
});

describe("RISK_MATRIX", () => {
  test("covers every reliability/completeness pair", () => {
    const cells = DISCLOSURE_LEVELS.flatMap((r: DisclosureLevel) =>
      DISCLOSURE_LEVELS.map((c: DisclosureLevel) => RISK_MATRIX[r][c])
    );
    expect(cells).toEqual([
      "High",
      "High",
      "Med-High",
      "High",
      "Medium",
      "Medium",
      "Med-High",
      "Medium",
      "Low",
    ]);
  });
});

describe("assessDisclosureQuality", () => {
  test("counts completeness over 12 metrics and reliability over 3 checks", () => {
    const quality = assessDisclosureQuality(
      sustainabilityScore({
        scope1_emissions: true,
        scope2_emissions: true,
        scope3_emissions: true,
        emissions_yoy: true,
        ev_targets: true,
        battery_recycling: true,
        ice_phaseout: false,
        supply_chain_traceability: true,
        water_usage: true,
        hazardous_waste: true,
        regulatory_fines: true,
        supplier_audits: null,
        claims_specificity: true,
        claims_supporting_evidence: true,
        avoids_self_praise: false,
      })
    );
    expect(quality.completenessRatio).toBe(10 / 12);
    expect(quality.reliabilityRatio).toBe(2 / 3);
    expect(quality.completenessLevel).toBe("High");
    expect(quality.reliabilityLevel).toBe("Medium");
    expect(quality.risk).toBe("Medium");
  });

  test("nothing disclosed is high risk", () => {
    const quality = assessDisclosureQuality(sustainabilityScore({}));
    expect(quality).toEqual({
      completenessRatio: 0,
      reliabilityRatio: 0,
      completenessLevel: "Low",
      reliabilityLevel: "Low",
      risk: "High",
    });
  });

  test("net-zero rubric adds its check to reliability", () => {
    const quality = assessDisclosureQuality(
      sustainabilityScore(
        {
          claims_specificity: true,
          claims_supporting_evidence: true,
          avoids_self_praise: true,
        },
        "automotive-2024-net-zero"
      )
    );
    expect(quality.reliabilityRatio).toBe(0.75);
    expect(quality.reliabilityLevel).toBe("High");
    expect(quality.risk).toBe("Med-High");
  });
});
