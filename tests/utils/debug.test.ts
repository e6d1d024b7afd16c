// Tests for @/utils/debug.ts - topic-gated debug logging
import {
  configureDebug,
  debugLog,
  DEBUG_ENV_KEY,
  isDebugEnabled,
} from "@/utils/debug";

describe("@/utils/debug", () => {
  const saved = process.env[DEBUG_ENV_KEY];
  let warn: jest.SpyInstance;

  beforeEach(() => {
    delete process.env[DEBUG_ENV_KEY];
    configureDebug(null);
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    configureDebug(null);
    if (saved === undefined) delete process.env[DEBUG_ENV_KEY];
    else process.env[DEBUG_ENV_KEY] = saved;
  });

  test("off by default", () => {
    expect(isDebugEnabled("lock")).toBe(false);
    debugLog("lock", "hidden");
    expect(warn).not.toHaveBeenCalled();
  });

  test("runtime config enables single topics", () => {
    configureDebug({ lock: true });

    expect(isDebugEnabled("lock")).toBe(true);
    expect(isDebugEnabled("timers")).toBe(false);
  });

  test("runtime config can enable everything", () => {
    configureDebug({ on: true });

    expect(isDebugEnabled("settings")).toBe(true);
  });

  test("environment variable takes a comma list of topics", () => {
    process.env[DEBUG_ENV_KEY] = "timers, settings";

    expect(isDebugEnabled("timers")).toBe(true);
    expect(isDebugEnabled("settings")).toBe(true);
    expect(isDebugEnabled("engine")).toBe(false);
  });

  test("environment variable '1' enables every topic", () => {
    process.env[DEBUG_ENV_KEY] = "1";

    expect(isDebugEnabled("engine")).toBe(true);
  });

  test("writes through console.warn with a topic prefix", () => {
    configureDebug({ lock: true });

    debugLog("lock", "plain");
    debugLog("lock", "with data", { lines: 2 });

    expect(warn).toHaveBeenNthCalledWith(1, "[DBG:lock] plain");
    expect(warn).toHaveBeenNthCalledWith(2, "[DBG:lock] with data", { lines: 2 });
  });
});
