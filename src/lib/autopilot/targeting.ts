/**
 * Landing Site Targeting
 *
 * Decides which landing site the guidance flies to, given what the terrain
 * analyzer finds this tick and what is already cached.
 */

import type { TerrainProfile } from "../types";
import type { GuidanceConfig } from "../config";
import { findLandingSite } from "../terrain";
import { horizontalError } from "../utils";
import type { FlightPhase } from "./types";

/**
 * Check whether a newly found site should replace the cached one.
 *
 * The right-hand side is the signed offset of the cached site, not its
 * distance: when the cached site is behind the vehicle (cached < x) the
 * comparison is never true and the cached site is kept.
 * TODO: confirm with the guidance owners whether both sides should be
 * absolute before changing it; tests pin the current behaviour.
 */
export function isCloserSite(
  candidate: number,
  cached: number,
  x: number,
): boolean {
  return Math.abs(candidate - x) < cached - x;
}

/**
 * Refresh the cached target according to the configured policy
 *
 * @param cached - Site cached from earlier ticks
 * @param terrain - Current terrain profile
 * @param x - Vehicle horizontal position
 * @param config - Guidance config (policy and minimum site width)
 * @returns Site to fly to, or null while none is known
 */
export function refreshTargetSite(
  cached: number | null,
  terrain: TerrainProfile,
  x: number,
  config: GuidanceConfig,
): number | null {
  switch (config.targetPolicy) {
    case "lock":
      return cached ?? findLandingSite(terrain, config.minSiteWidth);

    case "prefer-closer": {
      const found = findLandingSite(terrain, config.minSiteWidth);
      if (found === null) return cached;
      if (cached === null) return found;
      return isCloserSite(found, cached, x) ? found : cached;
    }
  }
}

/**
 * Classify the post-orientation phase from the target and position.
 */
export function classifyFlightPhase(
  targetSite: number | null,
  x: number,
  config: GuidanceConfig,
): FlightPhase {
  if (targetSite === null) return "searching";
  return Math.abs(horizontalError(x, targetSite)) < config.approachRadius
    ? "approach"
    : "cruise";
}
