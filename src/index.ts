export * from "./lib/autopilot";
export { LanderBot, type LanderBotOptions } from "./lib/bot";
export {
  CONTROL_AXES,
  DEFAULT_GUIDANCE_CONFIG,
  DEFAULT_SIMULATION_CONFIG,
  GUIDANCE_PRESETS,
  createGuidanceConfig,
  createSimulationConfig,
  getGuidancePreset,
  resolveHoverAltitude,
} from "./lib/config";
export type {
  ControlAxis,
  FeedbackGains,
  GuidanceConfig,
  GuidancePresetId,
  HoverAltitude,
  PIDGains,
  TargetPolicy,
} from "./lib/config";
export { GuidanceContractError } from "./lib/errors";
export { GuidanceLogger } from "./lib/guidanceLogger";
export type {
  GuidanceEvent,
  GuidanceEventKind,
  GuidanceLoggerOptions,
  GuidanceSummary,
} from "./lib/guidanceLogger";
export {
  applyRotation,
  createInstructions,
  emitInstructions,
  type Instructions,
} from "./lib/instructions";
export {
  MIN_SITE_WIDTH,
  findLandingSite,
  findTerrainRuns,
  getSiteElevation,
  type TerrainRun,
} from "./lib/terrain";
export type * from "./lib/types";
