/**
 * Autopilot Type Definitions
 *
 * Core interfaces and types used across the guidance state machine.
 */

import type { ControlAxis, GuidanceConfig } from "../config";
import type { FeedbackController, FeedbackControllerFactory } from "./pid";

export type RotationCommand = "left" | "right" | null;

/**
 * Guidance Phase
 * Represents the current state in the landing state machine
 *
 *   initial_orient → searching ⇄ cruise ⇄ approach
 *
 * initial_orient is left exactly once. Afterwards the phase is re-derived
 * every tick from the cached site and the vehicle position:
 *   searching - no site found yet, hold the fallback hover
 *   cruise    - site found, still outside the approach radius
 *   approach  - site within the approach radius, cancel drift and descend
 */
export type GuidancePhase =
  | "initial_orient"
  | "searching"
  | "cruise"
  | "approach";

/** Post-orientation phases */
export type FlightPhase = Exclude<GuidancePhase, "initial_orient">;

/**
 * Decision logic variant
 * - "threshold": fixed thresholds only
 * - "feedback": PID heading hold while orienting, PID altitude hold after
 */
export type GuidanceVariant = "threshold" | "feedback";

/**
 * A controller together with the setpoint it was built for.
 * A new setpoint means a new controller (integrator reset).
 */
export interface ControllerSlot {
  setpoint: number;
  controller: FeedbackController;
}

export type ControllerState = Partial<Record<ControlAxis, ControllerSlot>>;

/**
 * Guidance state - persists across ticks
 *
 * Owned by one bot for the whole match and replaced every tick by the
 * state returned from computeGuidance.
 */
export interface GuidanceState {
  /** Current phase in the landing state machine */
  phase: GuidancePhase;

  /** Cached landing site (terrain index), null until one is found */
  targetSite: number | null;

  /** Feedback controllers by axis (feedback variant only) */
  controllers: ControllerState;

  /** Ticks processed so far */
  tick: number;
}

/**
 * Actuator decision for one tick
 */
export interface GuidanceDecision {
  main: boolean;
  rotation: RotationCommand;
  phase: GuidancePhase;
  targetSite: number | null;
  /** Controller outputs this tick, by axis (empty for the threshold variant) */
  corrections: Partial<Record<ControlAxis, number>>;
}

/**
 * Thrust/rotation pair produced by a single phase rule
 */
export interface PhaseCommand {
  main: boolean;
  rotation: RotationCommand;
}

/**
 * Per-tick inputs shared by both variants
 */
export interface GuidanceContext {
  config: GuidanceConfig;
  /** Fallback hover altitude, already resolved against the screen size */
  hoverAltitude: number;
  dt: number;
  controllerFactory: FeedbackControllerFactory;
}

export interface GuidanceStep {
  decision: GuidanceDecision;
  newState: GuidanceState;
}
