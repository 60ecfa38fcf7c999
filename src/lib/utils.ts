/**
 * Common utility functions for the guidance core
 */

import type { PlayerState, VehicleState } from "./types";

/**
 * Clamp a value between min and max.
 *
 * @param value - Value to clamp
 * @param min - Minimum value
 * @param max - Maximum value
 * @returns Clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Signed horizontal distance from the vehicle to a target column.
 * Positive = target is to the right, Negative = target is to the left.
 */
export function horizontalError(fromX: number, toX: number): number {
  return toX - fromX;
}

/**
 * Flatten a player entry into the kinematics the guidance core reads.
 */
export function toVehicleState(player: PlayerState): VehicleState {
  return {
    x: player.position.x,
    y: player.position.y,
    vx: player.velocity.x,
    vy: player.velocity.y,
    heading: player.heading,
  };
}
