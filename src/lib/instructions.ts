import type { GuidanceDecision, RotationCommand } from "./autopilot/types";

/**
 * Actuator flags handed back to the simulation every tick.
 * `left` and `right` are never both set.
 */
export interface Instructions {
  main: boolean;
  left: boolean;
  right: boolean;
}

/**
 * All engines off (coast).
 */
export function createInstructions(): Instructions {
  return { main: false, left: false, right: false };
}

/**
 * Set the rotation flags for a command, clearing the opposite one.
 */
export function applyRotation(
  instructions: Instructions,
  command: RotationCommand,
): Instructions {
  instructions.left = command === "left";
  instructions.right = command === "right";
  return instructions;
}

/**
 * Package a guidance decision as instructions.
 */
export function emitInstructions(decision: GuidanceDecision): Instructions {
  const instructions = createInstructions();
  instructions.main = decision.main;
  return applyRotation(instructions, decision.rotation);
}
