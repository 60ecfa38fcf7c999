// Vector 2D
export interface Vec2 {
  x: number;
  y: number;
}

// Terrain altitude per horizontal cell (index = x position)
export type TerrainProfile = readonly number[];

// Player entry as reported by the simulation
export interface PlayerState {
  position: Vec2;
  velocity: Vec2;
  heading: number; // degrees, 0 = pointing up
}

// Flattened kinematics consumed by the guidance core
export interface VehicleState {
  x: number;
  y: number;
  vx: number;
  vy: number;
  heading: number; // degrees, 0 = pointing up
}

// Asteroids are passed through by the simulation but not used for guidance
export interface AsteroidState {
  position: Vec2;
  velocity: Vec2;
}

// Everything the simulation hands the bot on one tick
export interface TickInput {
  t: number;
  dt: number;
  terrain: TerrainProfile;
  players: Record<string, PlayerState>;
  asteroids: AsteroidState[];
}

// World configuration (fixed for the match)
export interface SimulationConfig {
  gravity: number;
  thrust: number;
  width: number; // screen width, equals terrain length
  height: number; // screen height
  // Informational only - guidance does not budget fuel
  mainEngineBurnRate: number;
  rotationEngineBurnRate: number;
}

// Bot metadata (cosmetic)
export interface BotIdentity {
  team: string;
  avatar?: string | number;
  flag?: string;
}
