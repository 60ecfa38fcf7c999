/**
 * Feedback Controller Gains
 *
 * PID gains per controlled axis for the feedback-augmented guidance.
 * Only the sign of the heading and altitude corrections reaches the
 * actuators, so these are tuned for prompt sign changes rather than
 * smooth magnitude.
 */

import type { FeedbackGains } from "../config";

/**
 * Default PID gains
 *
 * - kp (proportional): correction per unit of error
 * - ki (integral): correction per accumulated error-second
 * - kd (derivative): damping against the measurement's rate of change
 */
export const DEFAULT_GAINS: FeedbackGains = {
  x: { kp: 0.05, ki: 0.0, kd: 0.5 },
  y: {
    kp: 0.5, // Altitude error correction
    ki: 0.02,
    kd: 2.0, // Strong damping so a fast descent fires early
    outputLimit: 100,
  },
  heading: {
    kp: 0.5,
    ki: 0.01,
    kd: 0.1,
    outputLimit: 10,
  },
  vx: { kp: 0.3, ki: 0.0, kd: 0.05 },
  vy: { kp: 0.3, ki: 0.0, kd: 0.05 },
};
