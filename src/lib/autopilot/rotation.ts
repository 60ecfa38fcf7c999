import type { RotationCommand } from "./types";

/** Degrees within which no rotation is commanded */
export const ROTATION_DEADBAND = 0.5;

/**
 * Decide which way to rotate toward a target heading.
 *
 * Inside the dead-band (strictly less than `deadband` away) no rotation is
 * needed; otherwise rotate left to increase heading, right to decrease it.
 */
export function decideRotation(
  current: number,
  target: number,
  deadband: number = ROTATION_DEADBAND,
): RotationCommand {
  if (Math.abs(current - target) < deadband) {
    return null;
  }
  return current < target ? "left" : "right";
}
