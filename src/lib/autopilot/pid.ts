/**
 * Feedback Controller
 *
 * The guidance core only depends on the `FeedbackController` contract:
 * construct with a setpoint, then feed it one measurement per tick.
 * `PIDController` is the default implementation; anything else honouring
 * the contract can be injected through a `FeedbackControllerFactory`.
 */

import type { ControlAxis, FeedbackGains, PIDGains } from "../config";
import { clamp } from "../utils";

export interface FeedbackController {
  /** Value the controller drives its measurement toward */
  readonly setpoint: number;
  /**
   * Feed one measurement and get the correction for this tick.
   * Positive output means the measurement should increase.
   */
  update(measurement: number, dt: number): number;
}

export type FeedbackControllerFactory = (
  axis: ControlAxis,
  setpoint: number,
) => FeedbackController;

/**
 * PID controller for one axis
 *
 * - Proportional on error (setpoint - measurement)
 * - Integral accumulated as ki * error * dt, clamped to the output limit
 * - Derivative on measurement, so a setpoint step does not kick the output
 */
export class PIDController implements FeedbackController {
  readonly setpoint: number;
  private gains: PIDGains;
  private integral: number = 0;
  private lastMeasurement: number | null = null;

  constructor(gains: PIDGains, setpoint: number) {
    this.gains = gains;
    this.setpoint = setpoint;
  }

  update(measurement: number, dt: number): number {
    const { kp, ki, kd, outputLimit } = this.gains;
    const limit = outputLimit ?? Infinity;

    const error = this.setpoint - measurement;

    // Proportional term
    const p = kp * error;

    // Integral term (clamped against windup)
    this.integral = clamp(this.integral + ki * error * dt, -limit, limit);

    // Derivative term (on measurement)
    const dMeasurement =
      this.lastMeasurement === null ? 0 : measurement - this.lastMeasurement;
    const d = dt > 0 ? (-kd * dMeasurement) / dt : 0;

    this.lastMeasurement = measurement;

    return clamp(p + this.integral + d, -limit, limit);
  }

  /** Accumulated integral term (for telemetry) */
  get integralTerm(): number {
    return this.integral;
  }
}

/**
 * Factory building one PID controller per axis from a gain table.
 */
export function createPIDFactory(gains: FeedbackGains): FeedbackControllerFactory {
  return (axis, setpoint) => new PIDController(gains[axis], setpoint);
}
