/**
 * Guidance Logger
 *
 * Records phase transitions and target changes for post-match analysis,
 * and echoes them to the console when verbose.
 */

import type { GuidancePhase } from "./autopilot/types";

export type GuidanceEventKind = "phase" | "target";

/**
 * One logged event
 */
export interface GuidanceEvent {
  tick: number; // Guidance tick the event happened on
  t: number; // Match time (seconds)
  kind: GuidanceEventKind;
  message: string;
}

/**
 * Summary of a match so far
 */
export interface GuidanceSummary {
  ticks: number;
  ticksByPhase: Record<GuidancePhase, number>;
  phaseChanges: number;
  targetChanges: number;
  lastTarget: number | null;
}

export interface GuidanceLoggerOptions {
  verbose?: boolean; // Print events with console.log
  maxEvents?: number; // Oldest events are dropped past this
}

/**
 * Guidance logger - tracks one bot for one match
 */
export class GuidanceLogger {
  private events: GuidanceEvent[] = [];
  private verbose: boolean;
  private maxEvents: number;
  private summary: GuidanceSummary = {
    ticks: 0,
    ticksByPhase: {
      initial_orient: 0,
      searching: 0,
      cruise: 0,
      approach: 0,
    },
    phaseChanges: 0,
    targetChanges: 0,
    lastTarget: null,
  };

  constructor(options: GuidanceLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.maxEvents = options.maxEvents ?? 500;
  }

  /**
   * Record the outcome of one tick.
   */
  recordTick(
    tick: number,
    t: number,
    previous: { phase: GuidancePhase; targetSite: number | null },
    current: { phase: GuidancePhase; targetSite: number | null },
  ): void {
    this.summary.ticks++;
    this.summary.ticksByPhase[current.phase]++;

    if (previous.phase !== current.phase) {
      this.summary.phaseChanges++;
      this.push(tick, t, "phase", `Phase: ${previous.phase} -> ${current.phase}`);
    }

    if (previous.targetSite !== current.targetSite) {
      this.summary.targetChanges++;
      this.summary.lastTarget = current.targetSite;
      const from = previous.targetSite === null ? "none" : previous.targetSite;
      this.push(tick, t, "target", `Landing site: ${from} -> ${current.targetSite ?? "none"}`);
    }
  }

  getEvents(): readonly GuidanceEvent[] {
    return this.events;
  }

  getSummary(): GuidanceSummary {
    return {
      ...this.summary,
      ticksByPhase: { ...this.summary.ticksByPhase },
    };
  }

  private push(
    tick: number,
    t: number,
    kind: GuidanceEventKind,
    message: string,
  ): void {
    this.events.push({ tick, t, kind, message });
    if (this.events.length > this.maxEvents) {
      this.events.shift();
    }
    if (this.verbose) {
      console.log(`[Guidance] ${message} (tick ${tick}, t=${t.toFixed(2)}s)`);
    }
  }
}
