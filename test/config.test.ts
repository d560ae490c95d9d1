import { afterEach, describe, expect, it } from "vitest";
import { configure, defaults, getConfig, resetConfig } from "../src/config.js";

afterEach(() => resetConfig());

describe("config", () => {
  it("starts from the defaults", () => {
    const cfg = getConfig();
    expect(cfg.timeouts.engine).toBe(100_000);
    expect(cfg.limits.maxConcurrency).toBe(4);
    expect(cfg.scheduler).toEqual({ payloadStrategy: "lineage", cancelInFlight: true });
    expect(cfg.workflow.validation).toBe("lazy");
    expect(cfg.engine.env).toEqual({ RUST_LOG: "error" });
  });

  it("overrides single fields and keeps the rest", () => {
    configure({ limits: { maxConcurrency: 8 }, engine: { kind: "ws" } });
    const cfg = getConfig();
    expect(cfg.limits).toEqual({ maxConcurrency: 8, outputPreview: 100 });
    expect(cfg.engine.kind).toBe("ws");
    expect(cfg.engine.url).toBe("ws://127.0.0.1:8080");
  });

  it("ignores fields passed as undefined", () => {
    configure({ timeouts: { engine: undefined }, scheduler: { cancelInFlight: false } });
    const cfg = getConfig();
    expect(cfg.timeouts.engine).toBe(100_000);
    expect(cfg.scheduler.cancelInFlight).toBe(false);
  });

  it("merges engine env over the default env", () => {
    configure({ engine: { env: { EXTRA: "1" } } });
    expect(getConfig().engine.env).toEqual({ RUST_LOG: "error", EXTRA: "1" });
  });

  it("resets to defaults", () => {
    configure({ limits: { maxConcurrency: 1 } });
    resetConfig();
    expect(getConfig().limits.maxConcurrency).toBe(defaults.limits.maxConcurrency);
  });

  it("does not let callers mutate the defaults", () => {
    expect(Object.isFrozen(defaults)).toBe(true);
  });
});
