import { describe, test, expect } from "vitest";
import { createChildLogger, resolveLevel } from "../../src/utils/logger.js";

describe("resolveLevel", () => {
  test("defaults to info", () => {
    expect(resolveLevel(undefined)).toBe("info");
  });

  test("accepts known levels in any case", () => {
    expect(resolveLevel("DEBUG")).toBe("debug");
    expect(resolveLevel("silent")).toBe("silent");
  });

  test("falls back to info for unknown levels", () => {
    expect(resolveLevel("loud")).toBe("info");
  });
});

describe("createChildLogger", () => {
  test("carries the extra bindings", () => {
    expect(createChildLogger({ component: "test" }).bindings()).toMatchObject({
      component: "test",
    });
  });
});
