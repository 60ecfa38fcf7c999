/**
 * Feedback Guidance
 *
 * Threshold guidance augmented with feedback controllers:
 * - Heading hold while orienting (correction sign picks the rotation)
 * - Altitude hold after orienting (positive correction fires the engine
 *   and takes priority over any rotation)
 *
 * A controller is rebuilt whenever its setpoint changes (integrator reset).
 */

import type { TerrainProfile, VehicleState } from "../types";
import { CONTROL_AXES, type ControlAxis } from "../config";
import { getSiteElevation } from "../terrain";
import { computeFlightPhaseCommand } from "./basic";
import type { FeedbackControllerFactory } from "./pid";
import { classifyFlightPhase, refreshTargetSite } from "./targeting";
import type {
  ControllerSlot,
  ControllerState,
  GuidanceContext,
  GuidanceState,
  GuidanceStep,
  PhaseCommand,
} from "./types";

/**
 * Get the controller for an axis, rebuilding it when the setpoint moved.
 * Mutates `controllers`.
 */
export function syncController(
  controllers: ControllerState,
  axis: ControlAxis,
  setpoint: number,
  factory: FeedbackControllerFactory,
): ControllerSlot {
  const existing = controllers[axis];
  if (existing && existing.setpoint === setpoint) {
    return existing;
  }

  const slot: ControllerSlot = {
    setpoint,
    controller: factory(axis, setpoint),
  };
  controllers[axis] = slot;
  return slot;
}

/**
 * Feedback Guidance - one tick
 *
 * @param vehicle - Current vehicle kinematics
 * @param terrain - Current terrain profile
 * @param state - Guidance state from the previous tick. The state object and
 *   its controller map are copied, but carried-over controllers advance in place.
 * @param context - Config, hover altitude, tick duration and controller factory
 * @returns Decision and the state to keep for the next tick
 */
export function computeFeedbackGuidance(
  vehicle: VehicleState,
  terrain: TerrainProfile,
  state: GuidanceState,
  context: GuidanceContext,
): GuidanceStep {
  const { config, hoverAltitude, dt, controllerFactory } = context;
  const newState: GuidanceState = {
    ...state,
    controllers: { ...state.controllers },
    tick: state.tick + 1,
  };
  const controllers = newState.controllers;
  const corrections: Partial<Record<ControlAxis, number>> = {};

  // ============================================
  // INITIAL ORIENTATION (heading hold)
  // ============================================
  if (newState.phase === "initial_orient") {
    let command: PhaseCommand;

    if (vehicle.vx > config.driftLimit) {
      command = { main: true, rotation: null };
    } else if (Math.abs(vehicle.heading) < config.orientTolerance) {
      newState.phase = "searching";
      // Heading hold starts over once the vehicle is upright
      delete controllers.heading;
      command = { main: false, rotation: null };
    } else {
      const heading = syncController(controllers, "heading", 0, controllerFactory);
      const correction = heading.controller.update(vehicle.heading, dt);
      corrections.heading = correction;
      // Main engine stays on while rotating
      command = { main: true, rotation: correction > 0 ? "left" : "right" };
    }

    return {
      decision: {
        ...command,
        phase: newState.phase,
        targetSite: newState.targetSite,
        corrections,
      },
      newState,
    };
  }

  // ============================================
  // TARGETING AND PHASE
  // ============================================
  const targetSite = refreshTargetSite(
    newState.targetSite,
    terrain,
    vehicle.x,
    config,
  );
  const phase = classifyFlightPhase(targetSite, vehicle.x, config);
  newState.targetSite = targetSite;
  newState.phase = phase;

  // ============================================
  // CONTROLLER UPDATES
  // ============================================
  const altitudeSetpoint =
    phase === "approach" && targetSite !== null
      ? getSiteElevation(terrain, targetSite)
      : hoverAltitude;

  const setpoints: Partial<Record<ControlAxis, number>> = {
    y: altitudeSetpoint,
    heading: 0,
    vx: 0,
    vy: 0,
  };
  if (targetSite !== null) {
    setpoints.x = targetSite;
  }

  const measurements: Record<ControlAxis, number> = {
    x: vehicle.x,
    y: vehicle.y,
    heading: vehicle.heading,
    vx: vehicle.vx,
    vy: vehicle.vy,
  };

  for (const axis of CONTROL_AXES) {
    const setpoint = setpoints[axis];
    if (setpoint === undefined) continue;
    const slot = syncController(controllers, axis, setpoint, controllerFactory);
    corrections[axis] = slot.controller.update(measurements[axis], dt);
  }

  // ============================================
  // COMMANDS
  // ============================================
  // Altitude correction wins over lateral correction
  const altitudeCorrection = corrections.y ?? 0;
  const command: PhaseCommand =
    altitudeCorrection > 0
      ? { main: true, rotation: null }
      : computeFlightPhaseCommand(phase, vehicle, config, hoverAltitude);

  return {
    decision: {
      ...command,
      phase,
      targetSite,
      corrections,
    },
    newState,
  };
}
