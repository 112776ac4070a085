import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { parseConfig } from "../../src/config.js";
import { createLogger, createLoggerFromConfig, createSilentLogger } from "../../src/log.js";

describe("createLogger()", () => {
  it("uses the requested console level", () => {
    expect(createLogger("warn").level).toBe("warn");
  });

  it("is silent with the console disabled and no file", () => {
    expect(createLogger("debug", undefined, undefined, { console: false }).level).toBe("silent");
    expect(createSilentLogger().level).toBe("silent");
  });

  it("creates the log directory and logs at the file level", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "memory-lake-log-"));
    const filePath = path.join(tempDir, "nested", "memory.log");

    const logger = createLogger("info", filePath, "debug", { console: false });

    expect(logger.level).toBe("debug");
    await expect(fs.stat(path.dirname(filePath))).resolves.toBeDefined();
  });

  it("reads levels from config", () => {
    const config = parseConfig({ logging: { level: "error" } });

    expect(createLoggerFromConfig(config).level).toBe("error");
  });
});
