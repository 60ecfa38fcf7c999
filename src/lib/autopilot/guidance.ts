/**
 * Guidance State Machine
 *
 * Owns the transition from one tick's guidance state to the next and
 * dispatches to the decision logic of the configured variant.
 *
 * 1. INITIAL_ORIENT: Bleed drift, rotate upright
 * 2. SEARCHING: No flat site yet, hold the fallback hover
 * 3. CRUISE: Site found, hold altitude while momentum carries the vehicle
 * 4. APPROACH: Near the site, cancel drift and descend
 */

import type { TerrainProfile, VehicleState } from "../types";
import { computeThresholdGuidance } from "./basic";
import { computeFeedbackGuidance } from "./feedback";
import type {
  GuidanceContext,
  GuidanceState,
  GuidanceStep,
  GuidanceVariant,
} from "./types";

/**
 * Create initial guidance state
 *
 * Returns a fresh state for the start of a match.
 */
export function createGuidanceState(): GuidanceState {
  return {
    phase: "initial_orient",
    targetSite: null,
    controllers: {},
    tick: 0,
  };
}

/**
 * Whether the vehicle has finished its initial orientation.
 */
export function isOriented(state: GuidanceState): boolean {
  return state.phase !== "initial_orient";
}

/**
 * Run one tick of guidance
 *
 * @param variant - Decision logic to use
 * @param vehicle - Current vehicle kinematics
 * @param terrain - Current terrain profile
 * @param state - State from the previous tick (not mutated)
 * @param context - Config, hover altitude, dt and controller factory
 * @returns Decision and updated state
 */
export function computeGuidance(
  variant: GuidanceVariant,
  vehicle: VehicleState,
  terrain: TerrainProfile,
  state: GuidanceState,
  context: GuidanceContext,
): GuidanceStep {
  switch (variant) {
    case "threshold":
      return computeThresholdGuidance(vehicle, terrain, state, context);
    case "feedback":
      return computeFeedbackGuidance(vehicle, terrain, state, context);
  }
}
