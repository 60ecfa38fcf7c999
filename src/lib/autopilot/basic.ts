/**
 * Threshold Guidance
 *
 * The reactive decision logic: every actuator command comes from fixed
 * thresholds on the vehicle state. The per-phase rules are exported so the
 * feedback variant can fall back to them.
 */

import type { TerrainProfile, VehicleState } from "../types";
import type { GuidanceConfig } from "../config";
import { decideRotation } from "./rotation";
import { classifyFlightPhase, refreshTargetSite } from "./targeting";
import type {
  FlightPhase,
  GuidanceContext,
  GuidanceState,
  GuidanceStep,
  PhaseCommand,
} from "./types";

/**
 * Initial orientation
 *
 * Bleed a runaway drift first, then rotate upright. Orientation is complete
 * once the heading is inside the dead-band.
 */
export function computeOrientCommand(
  vehicle: VehicleState,
  config: GuidanceConfig,
): PhaseCommand & { complete: boolean } {
  if (vehicle.vx > config.driftLimit) {
    return { main: true, rotation: null, complete: false };
  }

  const rotation = decideRotation(vehicle.heading, 0, config.orientDeadband);
  return { main: false, rotation, complete: rotation === null };
}

/**
 * Searching: no site yet, hold the fallback hover altitude.
 */
export function computeSearchingCommand(
  vehicle: VehicleState,
  hoverAltitude: number,
): PhaseCommand {
  return {
    main: vehicle.y < hoverAltitude && vehicle.vy < 0,
    rotation: null,
  };
}

/**
 * Cruise: hold altitude while the site is still far away.
 * Horizontal travel is left to the vehicle's momentum.
 */
export function computeCruiseCommand(vehicle: VehicleState): PhaseCommand {
  return { main: vehicle.vy < 0, rotation: null };
}

/**
 * Approach: cancel horizontal drift, then let the vehicle settle.
 *
 * Drifting right, bank toward +bankAngle and burn so the thrust's horizontal
 * component opposes the drift. Drifting left, bank toward -bankAngle with
 * the engine off. A slow, fast-falling vehicle always burns.
 */
export function computeApproachCommand(
  vehicle: VehicleState,
  config: GuidanceConfig,
): PhaseCommand {
  const { vx, vy, heading } = vehicle;
  let main = false;
  let target = 0;

  if (Math.abs(vx) <= config.stillVelocity) {
    target = 0;
  } else if (vx > config.stillVelocity) {
    target = config.bankAngle;
    main = true;
  } else {
    target = -config.bankAngle;
    main = false;
  }

  const rotation = decideRotation(heading, target, config.orientDeadband);

  // Terminal descent safety override
  if (
    Math.abs(vx) < config.terminalDriftLimit &&
    vy < config.terminalDescentLimit
  ) {
    main = true;
  }

  return { main, rotation };
}

/**
 * Rules for a post-orientation phase
 */
export function computeFlightPhaseCommand(
  phase: FlightPhase,
  vehicle: VehicleState,
  config: GuidanceConfig,
  hoverAltitude: number,
): PhaseCommand {
  switch (phase) {
    case "searching":
      return computeSearchingCommand(vehicle, hoverAltitude);
    case "cruise":
      return computeCruiseCommand(vehicle);
    case "approach":
      return computeApproachCommand(vehicle, config);
  }
}

/**
 * Threshold Guidance - one tick
 *
 * @param vehicle - Current vehicle kinematics
 * @param terrain - Current terrain profile
 * @param state - Guidance state from the previous tick (not mutated)
 * @param context - Config and resolved hover altitude
 * @returns Decision and the state to keep for the next tick
 */
export function computeThresholdGuidance(
  vehicle: VehicleState,
  terrain: TerrainProfile,
  state: GuidanceState,
  context: GuidanceContext,
): GuidanceStep {
  const { config, hoverAltitude } = context;
  const newState: GuidanceState = { ...state, tick: state.tick + 1 };

  if (newState.phase === "initial_orient") {
    const orient = computeOrientCommand(vehicle, config);
    if (orient.complete) {
      newState.phase = "searching";
    }
    return {
      decision: {
        main: orient.main,
        rotation: orient.rotation,
        phase: newState.phase,
        targetSite: newState.targetSite,
        corrections: {},
      },
      newState,
    };
  }

  newState.targetSite = refreshTargetSite(
    newState.targetSite,
    terrain,
    vehicle.x,
    config,
  );
  const phase = classifyFlightPhase(newState.targetSite, vehicle.x, config);
  newState.phase = phase;

  const command = computeFlightPhaseCommand(phase, vehicle, config, hoverAltitude);

  return {
    decision: {
      ...command,
      phase,
      targetSite: newState.targetSite,
      corrections: {},
    },
    newState,
  };
}
