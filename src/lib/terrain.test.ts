import { describe, it, expect } from "vitest";
import {
  findLandingSite,
  findTerrainRuns,
  getSiteElevation,
  MIN_SITE_WIDTH,
} from "./terrain";
import { GuidanceContractError } from "./errors";

function flat(length: number, altitude: number): number[] {
  return Array.from({ length }, () => altitude);
}

describe("findTerrainRuns", () => {
  it("splits the profile into maximal equal runs", () => {
    expect(findTerrainRuns([1, 1, 2, 2, 2, 1])).toEqual([
      { start: 0, length: 2, altitude: 1 },
      { start: 2, length: 3, altitude: 2 },
      { start: 5, length: 1, altitude: 1 },
    ]);
  });

  it("treats a single cell as one run", () => {
    expect(findTerrainRuns([7])).toEqual([{ start: 0, length: 1, altitude: 7 }]);
  });
});

describe("findLandingSite", () => {
  it("returns the midpoint of an all-flat terrain", () => {
    expect(findLandingSite(flat(100, 3))).toBe(50);
    expect(findLandingSite(flat(101, 3))).toBe(50);
  });

  it("picks the wider of two flat halves", () => {
    const terrain = [...flat(60, 10), ...flat(90, 20)];
    expect(findLandingSite(terrain)).toBe(105);
  });

  it("picks the earlier run on a width tie", () => {
    const terrain = [...flat(50, 1), ...flat(50, 2)];
    expect(findLandingSite(terrain)).toBe(25);
  });

  it("requires the run to be strictly wider than the minimum", () => {
    expect(findLandingSite([...flat(40, 1), ...flat(40, 2)])).toBeNull();
    expect(findLandingSite([...flat(41, 5), ...flat(10, 6)])).toBe(20);
  });

  it("returns null when every run is narrow", () => {
    const jagged = Array.from({ length: 300 }, (_, i) => i % 7);
    expect(findLandingSite(jagged)).toBeNull();
  });

  it("honours a custom minimum width", () => {
    expect(findLandingSite([...flat(20, 1), 5, 6], 10)).toBe(10);
    expect(findLandingSite([...flat(20, 1), 5, 6], 20)).toBeNull();
  });

  it("returns an index inside the winning run", () => {
    const terrain = [3, 4, ...flat(45, 9), 1, 2];
    const site = findLandingSite(terrain);
    expect(site).toBe(2 + 22);
    expect(terrain[site ?? -1]).toBe(9);
  });

  it("gives the same answer on repeated calls", () => {
    const terrain = [...flat(30, 1), ...flat(70, 2), ...flat(30, 1)];
    expect(findLandingSite(terrain)).toBe(65);
    expect(findLandingSite(terrain)).toBe(65);
  });

  it("does not find a site on a single cell", () => {
    expect(findLandingSite([4])).toBeNull();
  });

  it("rejects an empty profile", () => {
    expect(() => findLandingSite([])).toThrow(GuidanceContractError);
  });

  it("uses a 40 cell minimum by default", () => {
    expect(MIN_SITE_WIDTH).toBe(40);
  });
});

describe("getSiteElevation", () => {
  it("reads the altitude at the site", () => {
    expect(getSiteElevation([5, 6, 7], 1)).toBe(6);
  });

  it("rejects a site outside the profile", () => {
    expect(() => getSiteElevation([5, 6, 7], 3)).toThrow(GuidanceContractError);
    expect(() => getSiteElevation([5, 6, 7], -1)).toThrow(GuidanceContractError);
  });
});
