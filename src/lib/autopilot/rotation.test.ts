import { describe, it, expect } from "vitest";
import { decideRotation, ROTATION_DEADBAND } from "./rotation";

describe("decideRotation", () => {
  it("does nothing when already on target", () => {
    for (const heading of [-90, -12.5, 0, 45, 180]) {
      expect(decideRotation(heading, heading)).toBeNull();
    }
  });

  it("rotates left to increase heading", () => {
    expect(decideRotation(0, 1)).toBe("left");
    expect(decideRotation(-30, 0)).toBe("left");
  });

  it("rotates right to decrease heading", () => {
    expect(decideRotation(2, 1)).toBe("right");
    expect(decideRotation(30, -90)).toBe("right");
  });

  it("holds inside the dead-band", () => {
    expect(decideRotation(0.6, 1)).toBeNull();
    expect(decideRotation(1.4, 1)).toBeNull();
  });

  it("treats the dead-band edge as outside", () => {
    expect(ROTATION_DEADBAND).toBe(0.5);
    expect(decideRotation(0.5, 1)).toBe("left");
    expect(decideRotation(1.5, 1)).toBe("right");
  });

  it("accepts a custom dead-band", () => {
    expect(decideRotation(3, 0, 5)).toBeNull();
    expect(decideRotation(5, 0, 5)).toBe("right");
  });
});
