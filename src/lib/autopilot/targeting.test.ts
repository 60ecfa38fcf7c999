import { describe, it, expect } from "vitest";
import { classifyFlightPhase, isCloserSite, refreshTargetSite } from "./targeting";
import { DEFAULT_GUIDANCE_CONFIG, GUIDANCE_PRESETS } from "../config";

/** Jagged terrain (no flat runs) with one flat stretch at altitude 50 */
function terrainWithSite(width: number, start: number, length: number): number[] {
  return Array.from({ length: width }, (_, i) =>
    i >= start && i < start + length ? 50 : i % 2,
  );
}

const JAGGED = Array.from({ length: 300 }, (_, i) => i % 2);

describe("isCloserSite", () => {
  it("swaps to a nearer site when the cached one is ahead", () => {
    expect(isCloserSite(150, 400, 100)).toBe(true);
  });

  it("keeps the cached site when the candidate is farther", () => {
    expect(isCloserSite(400, 150, 100)).toBe(false);
  });

  it("never swaps while the cached site is behind the vehicle", () => {
    // |490 - 500| = 10 is closer than |300 - 500| = 200, but 300 - 500 < 0
    expect(isCloserSite(490, 300, 500)).toBe(false);
  });
});

describe("refreshTargetSite", () => {
  const lock = DEFAULT_GUIDANCE_CONFIG;
  const preferCloser = GUIDANCE_PRESETS["high-hover"];

  it("searches until a site is found when locking", () => {
    expect(refreshTargetSite(null, JAGGED, 0, lock)).toBeNull();
    expect(refreshTargetSite(null, terrainWithSite(300, 100, 60), 0, lock)).toBe(130);
  });

  it("keeps a locked site even when the terrain offers another", () => {
    expect(refreshTargetSite(20, terrainWithSite(300, 100, 60), 0, lock)).toBe(20);
  });

  it("keeps the cached site when a re-search finds nothing", () => {
    expect(refreshTargetSite(42, JAGGED, 0, preferCloser)).toBe(42);
  });

  it("adopts the first site found", () => {
    expect(refreshTargetSite(null, terrainWithSite(300, 100, 60), 0, preferCloser)).toBe(130);
  });

  it("swaps to a nearer site ahead of the vehicle", () => {
    expect(refreshTargetSite(250, terrainWithSite(300, 100, 60), 0, preferCloser)).toBe(130);
  });

  it("keeps a cached site behind the vehicle", () => {
    expect(refreshTargetSite(10, terrainWithSite(300, 100, 60), 140, preferCloser)).toBe(10);
  });
});

describe("classifyFlightPhase", () => {
  it("is searching without a site", () => {
    expect(classifyFlightPhase(null, 100, DEFAULT_GUIDANCE_CONFIG)).toBe("searching");
  });

  it("is approaching inside the approach radius", () => {
    expect(classifyFlightPhase(120, 80, DEFAULT_GUIDANCE_CONFIG)).toBe("approach");
    expect(classifyFlightPhase(80, 120, DEFAULT_GUIDANCE_CONFIG)).toBe("approach");
  });

  it("is cruising at or beyond the approach radius", () => {
    expect(classifyFlightPhase(150, 100, DEFAULT_GUIDANCE_CONFIG)).toBe("cruise");
    expect(classifyFlightPhase(120, 10, DEFAULT_GUIDANCE_CONFIG)).toBe("cruise");
  });

  it("uses the preset's approach radius", () => {
    expect(classifyFlightPhase(220, 100, GUIDANCE_PRESETS.feedback)).toBe("approach");
  });
});
