import type { TerrainProfile } from "./types";
import { GuidanceContractError } from "./errors";

/**
 * Minimum flat-run width (cells) for a landing site.
 * A run must be strictly wider than this.
 */
export const MIN_SITE_WIDTH = 40;

/**
 * Maximal run of equal consecutive altitudes
 */
export interface TerrainRun {
  start: number;
  length: number;
  altitude: number;
}

/**
 * Run-length encode a terrain profile, left to right.
 *
 * Index 0 always starts a run; any later index starts one when its altitude
 * differs from its left neighbour.
 */
export function findTerrainRuns(terrain: TerrainProfile): TerrainRun[] {
  const runs: TerrainRun[] = [];

  for (let i = 0; i < terrain.length; i++) {
    if (i === 0 || terrain[i] !== terrain[i - 1]) {
      runs.push({ start: i, length: 1, altitude: terrain[i] });
    } else {
      runs[runs.length - 1].length++;
    }
  }

  return runs;
}

/**
 * Find the best landing site
 *
 * Picks the widest flat run (first one wins a tie) and returns its
 * midpoint if the run is wider than `minWidth`.
 *
 * @param terrain - Altitude per horizontal cell
 * @param minWidth - Width the run must exceed
 * @returns Midpoint index of the site, or null if nothing is flat enough
 */
export function findLandingSite(
  terrain: TerrainProfile,
  minWidth: number = MIN_SITE_WIDTH,
): number | null {
  if (terrain.length === 0) {
    throw new GuidanceContractError("Terrain profile is empty", "terrain");
  }

  let best: TerrainRun | null = null;
  for (const run of findTerrainRuns(terrain)) {
    if (best === null || run.length > best.length) {
      best = run;
    }
  }

  if (best === null || best.length <= minWidth) {
    return null;
  }

  return best.start + Math.floor(best.length * 0.5);
}

/**
 * Ground altitude at a landing site.
 */
export function getSiteElevation(terrain: TerrainProfile, site: number): number {
  if (!Number.isInteger(site) || site < 0 || site >= terrain.length) {
    throw new GuidanceContractError(
      `Landing site ${site} is outside the terrain profile (0-${terrain.length - 1})`,
      "terrain",
    );
  }
  return terrain[site];
}
