/**
 * Autopilot Module
 *
 * Re-exports all guidance functionality.
 *
 * Module Structure:
 * - types.ts: GuidanceState, GuidancePhase, GuidanceDecision and related types
 * - gains.ts: Default PID gains per axis
 * - pid.ts: FeedbackController contract and the PID implementation
 * - rotation.ts: Dead-band rotation primitive
 * - targeting.ts: Target-refresh policies and phase classification
 * - basic.ts: Threshold decision logic
 * - feedback.ts: Feedback-controller decision logic
 * - guidance.ts: State machine entry point
 */

// Types
export type {
  GuidanceState,
  GuidancePhase,
  FlightPhase,
  GuidanceVariant,
  GuidanceDecision,
  GuidanceContext,
  GuidanceStep,
  ControllerSlot,
  ControllerState,
  PhaseCommand,
  RotationCommand,
} from "./types";

// Gains
export { DEFAULT_GAINS } from "./gains";

// Feedback controller
export { PIDController, createPIDFactory } from "./pid";
export type { FeedbackController, FeedbackControllerFactory } from "./pid";

// Rotation primitive
export { decideRotation, ROTATION_DEADBAND } from "./rotation";

// Targeting
export { refreshTargetSite, isCloserSite, classifyFlightPhase } from "./targeting";

// Threshold guidance
export {
  computeThresholdGuidance,
  computeOrientCommand,
  computeSearchingCommand,
  computeCruiseCommand,
  computeApproachCommand,
  computeFlightPhaseCommand,
} from "./basic";

// Feedback guidance
export { computeFeedbackGuidance, syncController } from "./feedback";

// State machine (primary entry point)
export { createGuidanceState, computeGuidance, isOriented } from "./guidance";
