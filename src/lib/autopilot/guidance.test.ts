import { describe, it, expect } from "vitest";
import { DEFAULT_GUIDANCE_CONFIG } from "../config";
import { DEFAULT_GAINS } from "./gains";
import { createPIDFactory } from "./pid";
import { computeGuidance, createGuidanceState, isOriented } from "./guidance";
import type { GuidanceContext } from "./types";

const context: GuidanceContext = {
  config: DEFAULT_GUIDANCE_CONFIG,
  hoverAltitude: 900,
  dt: 0.1,
  controllerFactory: createPIDFactory(DEFAULT_GAINS),
};
const terrain = Array.from({ length: 100 }, () => 0);
const tilted = { x: 0, y: 500, vx: 0, vy: 0, heading: 0.8 };

describe("createGuidanceState", () => {
  it("starts unoriented with no site and no controllers", () => {
    expect(createGuidanceState()).toEqual({
      phase: "initial_orient",
      targetSite: null,
      controllers: {},
      tick: 0,
    });
    expect(isOriented(createGuidanceState())).toBe(false);
  });
});

describe("computeGuidance", () => {
  it("dispatches to the threshold variant", () => {
    const { decision, newState } = computeGuidance("threshold", tilted, terrain, createGuidanceState(), context);
    // 0.8 degrees is outside the 0.5 dead-band
    expect(decision).toMatchObject({ main: false, rotation: "right" });
    expect(isOriented(newState)).toBe(false);
  });

  it("dispatches to the feedback variant", () => {
    const { decision, newState } = computeGuidance("feedback", tilted, terrain, createGuidanceState(), context);
    // 0.8 degrees is inside the 1 degree tolerance
    expect(decision).toMatchObject({ main: false, rotation: null });
    expect(isOriented(newState)).toBe(true);
  });

  it("counts ticks", () => {
    const first = computeGuidance("threshold", tilted, terrain, createGuidanceState(), context).newState;
    const second = computeGuidance("threshold", tilted, terrain, first, context).newState;
    expect(second.tick).toBe(2);
  });
});
