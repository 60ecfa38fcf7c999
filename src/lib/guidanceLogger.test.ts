import { describe, it, expect } from "vitest";
import { GuidanceLogger } from "./guidanceLogger";

describe("GuidanceLogger", () => {
  it("ignores ticks that change nothing", () => {
    const logger = new GuidanceLogger();
    const same = { phase: "cruise" as const, targetSite: 120 };
    logger.recordTick(1, 0, same, same);
    expect(logger.getEvents()).toEqual([]);
    expect(logger.getSummary().ticksByPhase.cruise).toBe(1);
  });

  it("drops the oldest events past the limit", () => {
    const logger = new GuidanceLogger({ maxEvents: 2 });
    logger.recordTick(1, 0, { phase: "searching", targetSite: null }, { phase: "cruise", targetSite: 10 });
    logger.recordTick(2, 0.1, { phase: "cruise", targetSite: 10 }, { phase: "approach", targetSite: 10 });

    expect(logger.getEvents().map((e) => e.message)).toEqual([
      "Landing site: none -> 10",
      "Phase: cruise -> approach",
    ]);
  });

  it("returns summary copies", () => {
    const logger = new GuidanceLogger();
    logger.getSummary().ticksByPhase.approach = 99;
    expect(logger.getSummary().ticksByPhase.approach).toBe(0);
  });
});
