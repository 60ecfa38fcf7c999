/**
 * Guidance Configuration
 *
 * World settings supplied by the simulation and the tuning presets for the
 * guidance core. Every threshold the state machine consults lives here so
 * variants differ only by data.
 */

import type { SimulationConfig } from "./types";
import { DEFAULT_GAINS } from "./autopilot/gains";
import {
  GuidanceConfigOverridesSchema,
  SimulationConfigOverridesSchema,
} from "./schemas/tick.schema";
import { fromZodError } from "./errors";

export type ControlAxis = "x" | "y" | "heading" | "vx" | "vy";

export const CONTROL_AXES: readonly ControlAxis[] = ["x", "y", "heading", "vx", "vy"];

export interface PIDGains {
  kp: number;
  ki: number;
  kd: number;
  outputLimit?: number; // symmetric clamp on output and integral term
}

export type FeedbackGains = Record<ControlAxis, PIDGains>;

// How the site cache is refreshed once orientation is done
// - "lock": search until a site is found, then keep it for the match
// - "prefer-closer": search every tick, swap to a nearer site
export type TargetPolicy = "lock" | "prefer-closer";

// Fallback hover altitude when no site is being approached
export type HoverAltitude =
  | { kind: "fixed"; altitude: number }
  | { kind: "screen-fraction"; fraction: number };

export interface GuidanceConfig {
  minSiteWidth: number; // cells a flat run must exceed
  orientDeadband: number; // degrees, rotation dead-band
  orientTolerance: number; // degrees, feedback variant leaves initial_orient inside this
  driftLimit: number; // |vx| above which initial_orient just burns
  hover: HoverAltitude;
  approachRadius: number; // horizontal distance that switches cruise -> approach
  stillVelocity: number; // |vx| treated as no drift
  bankAngle: number; // degrees, banking used to cancel drift
  terminalDriftLimit: number;
  terminalDescentLimit: number; // vy below this forces main near the site
  targetPolicy: TargetPolicy;
  gains: FeedbackGains;
}

export type GuidancePresetId =
  | "standard"
  | "high-hover"
  | "screen-relative"
  | "feedback";

// Simulation defaults (1920x1080 screen, lunar gravity)
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  gravity: 1.62,
  thrust: 4.0,
  width: 1920,
  height: 1080,
  mainEngineBurnRate: 0.1,
  rotationEngineBurnRate: 0.01,
};

const STANDARD: GuidanceConfig = {
  minSiteWidth: 40,
  orientDeadband: 0.5,
  orientTolerance: 1,
  driftLimit: 10,
  hover: { kind: "fixed", altitude: 900 },
  approachRadius: 50,
  stillVelocity: 0.1,
  bankAngle: 90,
  terminalDriftLimit: 0.5,
  terminalDescentLimit: -3,
  targetPolicy: "lock",
  gains: DEFAULT_GAINS,
};

export const GUIDANCE_PRESETS: Record<GuidancePresetId, GuidanceConfig> = {
  standard: STANDARD,
  "high-hover": {
    ...STANDARD,
    hover: { kind: "fixed", altitude: 980 },
    targetPolicy: "prefer-closer",
  },
  "screen-relative": {
    ...STANDARD,
    hover: { kind: "screen-fraction", fraction: 0.9 },
  },
  feedback: {
    ...STANDARD,
    hover: { kind: "screen-fraction", fraction: 0.9 },
    bankAngle: 70,
    approachRadius: 150,
    targetPolicy: "prefer-closer",
  },
};

export const DEFAULT_GUIDANCE_CONFIG: GuidanceConfig = GUIDANCE_PRESETS.standard;

/**
 * Get a preset by id
 */
export function getGuidancePreset(id: GuidancePresetId): GuidanceConfig {
  return GUIDANCE_PRESETS[id];
}

/**
 * Resolve the fallback hover altitude against the screen size.
 */
export function resolveHoverAltitude(
  hover: HoverAltitude,
  simulation: SimulationConfig,
): number {
  switch (hover.kind) {
    case "fixed":
      return hover.altitude;
    case "screen-fraction":
      return hover.fraction * simulation.height;
  }
}

/**
 * Build a guidance config from untrusted overrides
 *
 * Overrides are validated, then merged over the base preset. Gains merge
 * per axis so a single gain can be tuned without restating the rest.
 * A key set to undefined is rejected rather than clearing the preset value.
 *
 * @param overrides - Partial config (validated)
 * @param base - Preset to merge over
 * @returns Complete guidance config
 */
export function createGuidanceConfig(
  overrides: unknown = {},
  base: GuidanceConfig = DEFAULT_GUIDANCE_CONFIG,
): GuidanceConfig {
  const parsed = GuidanceConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw fromZodError("Invalid guidance config", parsed.error);
  }

  const { gains, ...rest } = parsed.data;
  return {
    ...base,
    ...rest,
    gains: {
      x: { ...base.gains.x, ...gains?.x },
      y: { ...base.gains.y, ...gains?.y },
      heading: { ...base.gains.heading, ...gains?.heading },
      vx: { ...base.gains.vx, ...gains?.vx },
      vy: { ...base.gains.vy, ...gains?.vy },
    },
  };
}

/**
 * Build a simulation config from untrusted overrides.
 */
export function createSimulationConfig(
  overrides: unknown = {},
): SimulationConfig {
  const parsed = SimulationConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw fromZodError("Invalid simulation config", parsed.error);
  }
  return { ...DEFAULT_SIMULATION_CONFIG, ...parsed.data };
}
