import { SimulationClock } from "./simulation-clock";
import { ConfigError } from "../errors";

describe("SimulationClock", () => {
  it("starts running", () => {
    const clock = new SimulationClock(1000);
    expect(clock.state).toBe("running");
    expect(clock.paused).toBe(false);
  });

  it("becomes due once the full interval has elapsed", () => {
    const clock = new SimulationClock(1000, 0);
    expect(clock.isTickDue(999)).toBe(false);
    expect(clock.isTickDue(1000)).toBe(true);
  });

  it("firing a tick restarts the interval from that moment", () => {
    const clock = new SimulationClock(1000, 0);
    expect(clock.consumeTick(1200)).toBe(true);
    expect(clock.lastTickTimestamp).toBe(1200);
    expect(clock.consumeTick(2100)).toBe(false);
    expect(clock.consumeTick(2200)).toBe(true);
  });

  it("fires at most once per check, however late the frame is", () => {
    const clock = new SimulationClock(100, 0);
    expect(clock.consumeTick(1000)).toBe(true);
    expect(clock.consumeTick(1000)).toBe(false);
  });

  it("never becomes due while paused", () => {
    const clock = new SimulationClock(1000, 0);
    clock.togglePause();
    expect(clock.isTickDue(10_000)).toBe(false);
    expect(clock.consumeTick(10_000)).toBe(false);
  });

  it("fires immediately on resume if the interval passed while paused", () => {
    const clock = new SimulationClock(1000, 0);
    clock.togglePause();
    clock.togglePause();
    expect(clock.isTickDue(5000)).toBe(true);
  });

  it("togglePause twice restores the original state", () => {
    const clock = new SimulationClock(1000);
    expect(clock.togglePause()).toBe("paused");
    expect(clock.togglePause()).toBe("running");

    clock.togglePause();
    clock.togglePause();
    clock.togglePause();
    expect(clock.state).toBe("paused");
  });

  it("reset restarts the interval without resuming", () => {
    const clock = new SimulationClock(1000, 0);
    clock.togglePause();
    clock.reset(4000);
    expect(clock.paused).toBe(true);
    clock.togglePause();
    expect(clock.isTickDue(4999)).toBe(false);
    expect(clock.isTickDue(5000)).toBe(true);
  });

  it("rejects a non-positive interval", () => {
    expect(() => new SimulationClock(0)).toThrow(ConfigError);
    expect(() => new SimulationClock(-5)).toThrow(ConfigError);
    expect(() => new SimulationClock(NaN)).toThrow(ConfigError);
  });
});
