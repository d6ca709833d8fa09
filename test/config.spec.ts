// ./test/config.spec.ts
import { afterEach, describe, expect, test, vi } from "vitest";
import { configure, getConfig, loadConfig, resetConfig } from "../src/config.js";
import { createDispatchFunction, type DispatchHandler } from "../src/dispatch.js";
import {
  ConfigurationError,
  ConstructionError,
  ErrorCodes,
  PatternLookupError,
  PatternValidationError,
  TypeShapeError,
} from "../src/errors.js";
import { logger } from "../src/logger.js";
import type { Pattern } from "../src/types.js";
import { assert, thrown } from "./helpers.js";

afterEach(() => {
  resetConfig();
  vi.restoreAllMocks();
});

describe("configuration", () => {
  test("defaults", () => {
    const config = loadConfig({});
    expect(config.logLevel).toBe("warn");
    expect(config.privatePrefixes).toEqual(["_", "#"]);
  });

  test("the log level comes from the environment", () => {
    expect(loadConfig({ TYPESHAPE_LOG_LEVEL: "error" }).logLevel).toBe("error");
  });

  test("an unknown level in the environment is ignored", () => {
    configure({ logLevel: "warn" });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(loadConfig({ TYPESHAPE_LOG_LEVEL: "loud" }).logLevel).toBe("warn");
    expect(warn.mock.calls[0]?.[0]).toContain(
      "[WARN] config: ignoring TYPESHAPE_LOG_LEVEL=loud",
    );
  });

  test("configure merges, freezes and sets the log level", () => {
    const config = configure({ logLevel: "error" });
    expect(config.privatePrefixes).toEqual(["_", "#"]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(getConfig()).toBe(config);
    expect(logger.level).toBe("error");
  });

  test("invalid settings are rejected as a whole", () => {
    const before = getConfig();
    const error = thrown(() => Reflect.apply(configure, undefined, [{ logLevel: "loud" }]));
    assert(error instanceof ConfigurationError, "should be a configuration error");
    expect(error.code).toBe("K001");
    expect(error.message.startsWith("logLevel: ")).toBe(true);
    expect(getConfig()).toBe(before);
  });

  test("empty private prefixes are rejected", () => {
    expect(() => configure({ privatePrefixes: [""] })).toThrow(ConfigurationError);
  });

  test("debug level traces dispatch", () => {
    configure({ logLevel: "debug" });
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const fn = createDispatchFunction(
      new Map<Pattern, DispatchHandler<number>>([[Number, (x) => Number(x)]]),
    );
    fn(1);
    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes("[DEBUG] dispatch: table built with 1 entries"))).toBe(
      true,
    );
    expect(lines.some((line) => line.includes("[DEBUG] dispatch: routing 1 to handler"))).toBe(
      true,
    );
  });
});

describe("errors", () => {
  test("share a base class and a code", () => {
    const errors = [
      new ConstructionError(ErrorCodes.NOT_A_MAPPING, "bad"),
      new PatternValidationError("List", 0, "bad"),
      new PatternLookupError(1),
      new ConfigurationError("bad"),
    ];
    expect(errors.every((error) => error instanceof TypeShapeError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual(["C002", "V001", "L001", "K001"]);
    expect(errors.map((error) => error.name)).toEqual([
      "ConstructionError",
      "PatternValidationError",
      "PatternLookupError",
      "ConfigurationError",
    ]);
  });

  test("serialize to JSON", () => {
    expect(new PatternLookupError("x").toJSON()).toEqual({
      name: "PatternLookupError",
      code: "L001",
      message: "No match for 'x'",
      details: { item: "'x'" },
    });
    expect(JSON.parse(JSON.stringify(new PatternValidationError("Tuple", 1, "bad")))).toEqual({
      name: "PatternValidationError",
      code: "V001",
      message: "Tuple: bad",
      details: { origin: "Tuple", argument: 1 },
    });
  });
});
