/**
 * Boundary Schemas
 *
 * zod schemas for everything the simulation hands the bot: the per-tick
 * input, the world configuration, and guidance tuning overrides.
 * Parsing happens once at the boundary so the guidance core can trust
 * its inputs.
 */

import { z } from "zod";

// A partial override may leave a key out, but must not set it to undefined
function rejectUndefinedEntries(value: object, ctx: z.RefinementCtx): void {
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: "Value must not be undefined",
      });
    }
  }
}

const Vec2Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const PlayerStateSchema = z.object({
  position: Vec2Schema,
  velocity: Vec2Schema,
  /** Degrees, 0 = pointing up */
  heading: z.number().finite(),
});

export const TerrainProfileSchema = z
  .array(z.number().finite())
  .min(2, "Terrain profile needs at least 2 cells");

export const TickInputSchema = z.object({
  t: z.number().finite(),
  dt: z.number().finite().positive(),
  terrain: TerrainProfileSchema,
  // Entries are checked per team by LanderBot.run
  players: z.record(z.string(), z.unknown()),
  // Accepted and ignored
  asteroids: z.array(z.unknown()),
});
export type ParsedTickInput = z.infer<typeof TickInputSchema>;

export const SimulationConfigSchema = z.object({
  gravity: z.number().finite(),
  thrust: z.number().finite().positive(),
  width: z.number().int().min(2),
  height: z.number().finite().positive(),
  mainEngineBurnRate: z.number().finite().nonnegative(),
  rotationEngineBurnRate: z.number().finite().nonnegative(),
});

export const SimulationConfigOverridesSchema = SimulationConfigSchema.partial().superRefine(
  rejectUndefinedEntries,
);

export const PIDGainsSchema = z.object({
  kp: z.number().finite(),
  ki: z.number().finite(),
  kd: z.number().finite(),
  outputLimit: z.number().finite().positive().optional(),
});

const PIDGainsOverridesSchema = PIDGainsSchema.partial().superRefine(rejectUndefinedEntries);

export const HoverAltitudeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("fixed"), altitude: z.number().finite() }),
  z.object({
    kind: z.literal("screen-fraction"),
    fraction: z.number().gt(0).lte(1),
  }),
]);

export const TargetPolicySchema = z.enum(["lock", "prefer-closer"]);

export const GuidanceConfigOverridesSchema = z
  .object({
    minSiteWidth: z.number().int().nonnegative(),
    orientDeadband: z.number().finite().positive(),
    orientTolerance: z.number().finite().positive(),
    driftLimit: z.number().finite().nonnegative(),
    hover: HoverAltitudeSchema,
    approachRadius: z.number().finite().positive(),
    stillVelocity: z.number().finite().nonnegative(),
    bankAngle: z.number().finite().positive().max(180),
    terminalDriftLimit: z.number().finite().nonnegative(),
    terminalDescentLimit: z.number().finite(),
    targetPolicy: TargetPolicySchema,
    gains: z
      .object({
        x: PIDGainsOverridesSchema,
        y: PIDGainsOverridesSchema,
        heading: PIDGainsOverridesSchema,
        vx: PIDGainsOverridesSchema,
        vy: PIDGainsOverridesSchema,
      })
      .partial()
      .superRefine(rejectUndefinedEntries),
  })
  .partial()
  .strict()
  .superRefine(rejectUndefinedEntries);
export type GuidanceConfigOverrides = z.infer<typeof GuidanceConfigOverridesSchema>;
