import assert from "node:assert/strict";
import { describe, it } from "node:test";

import type { SoilProfileConfigV1 } from "@irrigate/contracts";
import { ConfigError } from "../errors";
import { buildSoilProfile } from "../soil/soil_profile";
import { TEXTURE_PROPERTIES, textureAvailableWater } from "../soil/texture_table";
import { expectCode } from "./fixtures";

// 6in holds 0.25 of available water, 12in holds 0.125; equal weights.
const twoLayer: SoilProfileConfigV1 = {
  texture: "loam",
  root_depth_mm: 800,
  depths: {
    "6in": { field_capacity: 0.5, wilting_point: 0.25, weight: 0.5 },
    "12in": { field_capacity: 0.5, wilting_point: 0.375, weight: 0.5 },
  },
};

describe("buildSoilProfile", () => {
  it("renormalizes WHC over the depths present", () => {
    const p = buildSoilProfile("A", twoLayer);
    assert.equal(p.effectiveWhcMm(["6in", "12in"]), 150);
    assert.equal(p.effectiveWhcMm(["6in"]), 200);
    assert.equal(p.effectiveWhcMm(["12in"]), 100);
  });

  it("falls back to the whole profile when no usable depth is present", () => {
    const p = buildSoilProfile("A", twoLayer);
    assert.equal(p.effectiveWhcMm([]), 150);
    assert.equal(p.effectiveWhcMm(["18in"]), 150); // not configured
  });

  it("takes FC/PWP from the texture table when a depth omits them", () => {
    const p = buildSoilProfile("A", { texture: "silt_loam", root_depth_mm: 1000, depths: { "6in": { weight: 1 } } });
    const layer = p.layers[0];
    assert.ok(layer);
    assert.equal(layer.field_capacity, TEXTURE_PROPERTIES.silt_loam.field_capacity);
    assert.equal(layer.wilting_point, TEXTURE_PROPERTIES.silt_loam.wilting_point);
    assert.ok(Math.abs(p.effectiveWhcMm(["6in"]) - 1000 * textureAvailableWater("silt_loam")) < 1e-9);
  });

  it("ignores zero-weight depths when aggregating readings", () => {
    const p = buildSoilProfile("A", {
      ...twoLayer,
      depths: { ...twoLayer.depths, "18in": { field_capacity: 0.5, wilting_point: 0.25, weight: 0 } },
    });
    assert.deepEqual(p.weightedDepths(), ["6in", "12in"]);
    assert.deepEqual(p.usableDepths(["6in", "18in"]), ["6in"]);
    assert.equal(p.weightedVwc({ "6in": 0.25, "18in": 0.9 }), 0.25);
  });

  it("measures the deficit below field capacity in mm", () => {
    const p = buildSoilProfile("A", twoLayer);
    assert.equal(p.measuredDeficitMm({ "6in": 0.375, "12in": 0.375 }), 100);
    assert.equal(p.measuredDeficitMm({ "6in": 0.25 }), 200);
    assert.equal(p.measuredDeficitMm({}), null);
    assert.equal(p.weightedVwc({}), null);
  });

  it("accepts weights summing to 1 within tolerance", () => {
    const p = buildSoilProfile("A", {
      texture: "loam",
      root_depth_mm: 500,
      depths: { "6in": { weight: 0.3333333 }, "12in": { weight: 0.3333333 }, "18in": { weight: 0.3333334 } },
    });
    assert.equal(p.layers.length, 3);
  });

  it("rejects invalid profiles with a ConfigError", () => {
    const cases: Array<[SoilProfileConfigV1, string]> = [
      [{ ...twoLayer, root_depth_mm: 0 }, "INVALID_ROOT_DEPTH"],
      [{ ...twoLayer, depths: { "6in": { field_capacity: 0.2, wilting_point: 0.2, weight: 1 } } }, "FC_NOT_ABOVE_PWP"],
      [{ ...twoLayer, depths: { "6in": { field_capacity: 1.2, wilting_point: 0.2, weight: 1 } } }, "WHC_OUT_OF_RANGE"],
      [{ ...twoLayer, depths: { "6in": { weight: 1.5 }, "12in": { weight: -0.5 } } }, "NEGATIVE_DEPTH_WEIGHT"],
      [{ ...twoLayer, depths: { "6in": { weight: 0.5 }, "12in": { weight: 0.4 } } }, "DEPTH_WEIGHTS_NOT_NORMALIZED"],
      [{ ...twoLayer, depths: { "6in": { weight: 0 } } }, "NO_WEIGHTED_DEPTH"],
    ];
    for (const [cfg, code] of cases) {
      assert.throws(() => buildSoilProfile("A", cfg), (err) => expectCode(err, ConfigError, code));
    }
  });
});
