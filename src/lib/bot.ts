/**
 * Lander Bot
 *
 * The object the simulation instantiates once per match and calls once per
 * tick. It validates the tick input, owns the guidance state between ticks
 * and hands back the actuator instructions.
 */

import type {
  AsteroidState,
  BotIdentity,
  PlayerState,
  SimulationConfig,
  TerrainProfile,
} from "./types";
import {
  createGuidanceConfig,
  createSimulationConfig,
  getGuidancePreset,
  resolveHoverAltitude,
  type GuidanceConfig,
  type GuidancePresetId,
} from "./config";
import { GuidanceContractError, fromZodError } from "./errors";
import { GuidanceLogger } from "./guidanceLogger";
import { emitInstructions, type Instructions } from "./instructions";
import { PlayerStateSchema, TickInputSchema } from "./schemas/tick.schema";
import { toVehicleState } from "./utils";
import { createGuidanceState, computeGuidance } from "./autopilot/guidance";
import { createPIDFactory, type FeedbackControllerFactory } from "./autopilot/pid";
import type {
  GuidanceDecision,
  GuidanceState,
  GuidanceVariant,
} from "./autopilot/types";

export interface LanderBotOptions extends BotIdentity {
  /** Decision logic (default "threshold") */
  variant?: GuidanceVariant;
  /** Preset to start from (default "standard", or "feedback" for that variant) */
  preset?: GuidancePresetId;
  /** Overrides merged over the preset (validated) */
  guidance?: unknown;
  /** World settings (validated, merged over the defaults) */
  simulation?: unknown;
  /** Controller construction for the feedback variant (default PID from the config gains) */
  controllerFactory?: FeedbackControllerFactory;
  logger?: GuidanceLogger;
}

export class LanderBot {
  readonly team: string;
  readonly avatar?: string | number;
  readonly flag?: string;
  readonly variant: GuidanceVariant;
  readonly config: GuidanceConfig;
  readonly simulation: SimulationConfig;
  readonly logger: GuidanceLogger;

  private readonly hoverAltitude: number;
  private readonly controllerFactory: FeedbackControllerFactory;
  private guidance: GuidanceState = createGuidanceState();
  private decision: GuidanceDecision | null = null;

  constructor(options: LanderBotOptions) {
    if (options.team.trim() === "") {
      throw new GuidanceContractError("Team name must not be empty", "team");
    }

    this.team = options.team;
    this.avatar = options.avatar;
    this.flag = options.flag;
    this.variant = options.variant ?? "threshold";

    const preset =
      options.preset ?? (this.variant === "feedback" ? "feedback" : "standard");
    this.config = createGuidanceConfig(options.guidance, getGuidancePreset(preset));
    this.simulation = createSimulationConfig(options.simulation);
    this.hoverAltitude = resolveHoverAltitude(this.config.hover, this.simulation);
    this.controllerFactory =
      options.controllerFactory ?? createPIDFactory(this.config.gains);
    this.logger = options.logger ?? new GuidanceLogger();
  }

  /** Guidance state after the last tick */
  get state(): Readonly<GuidanceState> {
    return this.guidance;
  }

  /** Decision made on the last tick (null before the first tick) */
  get lastDecision(): GuidanceDecision | null {
    return this.decision;
  }

  /**
   * Compute this tick's instructions
   *
   * @param t - Match time (seconds)
   * @param dt - Tick duration (seconds)
   * @param terrain - Altitude per horizontal cell
   * @param players - Kinematics by team name; must contain this bot's team
   * @param asteroids - Accepted and ignored
   * @returns Main/left/right flags for this tick
   */
  run(
    t: number,
    dt: number,
    terrain: TerrainProfile,
    players: Record<string, PlayerState>,
    asteroids: AsteroidState[] = [],
  ): Instructions {
    const parsed = TickInputSchema.safeParse({ t, dt, terrain, players, asteroids });
    if (!parsed.success) {
      throw fromZodError("Invalid tick input", parsed.error);
    }

    // Only this team's entry is validated
    const entry = parsed.data.players[this.team];
    if (entry === undefined) {
      throw new GuidanceContractError(
        `No player entry for team "${this.team}"`,
        `players.${this.team}`,
      );
    }
    const player = PlayerStateSchema.safeParse(entry);
    if (!player.success) {
      throw fromZodError(`Invalid player entry for team "${this.team}"`, player.error);
    }

    const previous = this.guidance;
    const { decision, newState } = computeGuidance(
      this.variant,
      toVehicleState(player.data),
      parsed.data.terrain,
      previous,
      {
        config: this.config,
        hoverAltitude: this.hoverAltitude,
        dt: parsed.data.dt,
        controllerFactory: this.controllerFactory,
      },
    );

    this.logger.recordTick(newState.tick, t, previous, newState);
    this.guidance = newState;
    this.decision = decision;

    return emitInstructions(decision);
  }
}
