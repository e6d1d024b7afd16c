// Tests for @/runtime/timers.machine.ts - robot3 timer machine over fake timers
import { TimerMachineService } from "@/runtime/timers.machine";

describe("@/runtime/timers.machine - TimerMachineService", () => {
  let onGravityTick: jest.Mock;
  let onLockDelayExpired: jest.Mock;
  let timers: TimerMachineService;

  beforeEach(() => {
    jest.useFakeTimers();
    onGravityTick = jest.fn();
    onLockDelayExpired = jest.fn();
    timers = new TimerMachineService({ onGravityTick, onLockDelayExpired });
  });

  afterEach(() => {
    timers.dispose();
    jest.useRealTimers();
  });

  test("starts idle with no armed durations", () => {
    expect(timers.getState()).toEqual({
      context: { gravityMs: undefined, lockDelayMs: undefined },
      state: "idle",
    });
  });

  test("ARM_GRAVITY runs a periodic timer", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });

    expect(timers.getState().state).toBe("gravity");
    expect(timers.getState().context.gravityMs).toBe(800);

    jest.advanceTimersByTime(799);
    expect(onGravityTick).not.toHaveBeenCalled();
    jest.advanceTimersByTime(1601);
    expect(onGravityTick).toHaveBeenCalledTimes(3);
  });

  test("re-arming gravity replaces the old interval", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });
    timers.send({ intervalMs: 100, type: "ARM_GRAVITY" });

    jest.advanceTimersByTime(800);

    expect(onGravityTick).toHaveBeenCalledTimes(8);
    expect(jest.getTimerCount()).toBe(1);
  });

  test("arming the lock delay clears gravity; expiry fires once and goes idle", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });
    timers.send({ delayMs: 500, type: "ARM_LOCK_DELAY" });
    expect(timers.getState().state).toBe("lockDelay");

    jest.advanceTimersByTime(2000);

    expect(onGravityTick).not.toHaveBeenCalled();
    expect(onLockDelayExpired).toHaveBeenCalledTimes(1);
    expect(timers.getState().state).toBe("idle");
    expect(jest.getTimerCount()).toBe(0);
  });

  test("the machine is idle by the time the expiry callback runs", () => {
    const seen: Array<string> = [];
    const service = new TimerMachineService({
      onGravityTick: () => undefined,
      onLockDelayExpired: () => {
        seen.push(service.getState().state);
      },
    });
    service.send({ delayMs: 100, type: "ARM_LOCK_DELAY" });

    jest.advanceTimersByTime(100);

    expect(seen).toEqual(["idle"]);
    service.dispose();
  });

  test("STOP events clear the matching timer", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });
    timers.send({ type: "STOP_GRAVITY" });
    expect(timers.getState().state).toBe("idle");

    timers.send({ delayMs: 500, type: "ARM_LOCK_DELAY" });
    timers.send({ type: "STOP_LOCK_DELAY" });
    expect(timers.getState().state).toBe("idle");

    jest.advanceTimersByTime(5000);
    expect(onGravityTick).not.toHaveBeenCalled();
    expect(onLockDelayExpired).not.toHaveBeenCalled();
  });

  test("either timer can be armed from every state", () => {
    timers.send({ delayMs: 500, type: "ARM_LOCK_DELAY" });
    jest.advanceTimersByTime(200);

    timers.send({ intervalMs: 300, type: "ARM_GRAVITY" });
    expect(timers.getState().state).toBe("gravity");
    jest.advanceTimersByTime(600);
    expect(onGravityTick).toHaveBeenCalledTimes(2);
    expect(onLockDelayExpired).not.toHaveBeenCalled();

    timers.send({ delayMs: 100, type: "ARM_LOCK_DELAY" });
    expect(timers.getState()).toEqual({
      context: { gravityMs: 300, lockDelayMs: 100 },
      state: "lockDelay",
    });
    jest.advanceTimersByTime(100);
    expect(onLockDelayExpired).toHaveBeenCalledTimes(1);
    expect(onGravityTick).toHaveBeenCalledTimes(2);
  });

  test("a stop for the other timer is ignored", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });
    timers.send({ type: "STOP_LOCK_DELAY" });

    expect(timers.getState().state).toBe("gravity");
    jest.advanceTimersByTime(800);
    expect(onGravityTick).toHaveBeenCalledTimes(1);
  });

  test("a non-positive gravity interval is rejected", () => {
    timers.send({ intervalMs: 0, type: "ARM_GRAVITY" });

    expect(timers.getState().state).toBe("idle");
    expect(jest.getTimerCount()).toBe(0);
  });

  test("dispose leaves nothing scheduled", () => {
    timers.send({ intervalMs: 800, type: "ARM_GRAVITY" });

    timers.dispose();

    expect(timers.getState().state).toBe("idle");
    expect(jest.getTimerCount()).toBe(0);
  });
});
