import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { ConfigError } from "../core/errors.js";
import { buildTargets, createLogger, LOG_FILE_NAME, normalizeLevel, parseRotation } from "../core/logger.js";

describe("normalizeLevel", () => {
  it("maps upper-case and legacy names to pino levels", () => {
    assert.equal(normalizeLevel("DEBUG"), "debug");
    assert.equal(normalizeLevel("WARNING"), "warn");
    assert.equal(normalizeLevel("CRITICAL"), "fatal");
    assert.equal(normalizeLevel("silent"), "silent");
  });

  it("rejects unknown levels", () => {
    assert.throws(() => normalizeLevel("loud"), ConfigError);
  });
});

describe("parseRotation", () => {
  it("accepts a frequency or a size", () => {
    assert.deepEqual(parseRotation("daily"), { frequency: "daily" });
    assert.deepEqual(parseRotation("Hourly"), { frequency: "hourly" });
    assert.deepEqual(parseRotation("10 MB"), { size: "10m" });
    assert.deepEqual(parseRotation("500kb"), { size: "500k" });
  });

  it("rejects anything else", () => {
    assert.throws(() => parseRotation("weekly"), ConfigError);
  });
});

describe("buildTargets", () => {
  it("needs no transport for plain JSON on stderr", () => {
    assert.deepEqual(buildTargets({ level: "info", rotation: "daily", format: "json" }), []);
  });

  it("adds a rolling file next to pretty output", () => {
    const dir = join("var", "log", "factkeeper");
    assert.deepEqual(buildTargets({ level: "WARNING", rotation: "10 MB", format: "pretty", directory: dir }), [
      { target: "pino-pretty", level: "warn", options: { destination: 2, colorize: false } },
      { target: "pino-roll", level: "warn", options: { file: join(dir, LOG_FILE_NAME), mkdir: true, size: "10m" } },
    ]);
  });

  it("keeps JSON on stderr when logging to a directory", () => {
    const targets = buildTargets({ level: "info", rotation: "daily", format: "json", directory: "logs" });
    assert.deepEqual(
      targets.map((t) => t.target),
      ["pino/file", "pino-roll"]
    );
  });
});

describe("createLogger", () => {
  it("applies the configured level", () => {
    const logger = createLogger({ level: "ERROR", rotation: "daily", format: "json" }, "test");
    assert.equal(logger.level, "error");
  });
});
