import fs from "fs";
import os from "os";
import path from "path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, describeError } from "@infrastructure/logging/Logger";

function firstLine(spy: { mock: { calls: unknown[][] } }): unknown {
  const [line] = spy.mock.calls[0] ?? [];
  return typeof line === "string" ? JSON.parse(line) : undefined;
}

function silenceConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => undefined),
    warn: vi.spyOn(console, "warn").mockImplementation(() => undefined),
    error: vi.spyOn(console, "error").mockImplementation(() => undefined),
  };
}

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should drop entries below the configured level", () => {
    const { log } = silenceConsole();
    const logger = createLogger({ level: "warn" });

    logger.log("debug", "noise");
    logger.log("info", "still noise");
    logger.event?.("MESSAGE_CREATED", { id: "m1" });

    expect(log).not.toHaveBeenCalled();
  });

  it("should write JSON lines to the console stream for the level", () => {
    const { warn, error } = silenceConsole();
    const logger = createLogger({ level: "debug" });

    logger.log("warn", "careful", { attempt: 2 });
    logger.log("error", "broken");

    expect(firstLine(warn)).toMatchObject({
      level: "warn",
      message: "careful",
      attempt: 2,
    });
    expect(firstLine(error)).toMatchObject({ level: "error", message: "broken" });
  });

  it("should write events at info level with their type", () => {
    const { log } = silenceConsole();
    const logger = createLogger({ level: "info" });

    logger.event?.("MESSAGE_CREATED", { messageId: "m1" });

    expect(firstLine(log)).toMatchObject({
      type: "MESSAGE_CREATED",
      messageId: "m1",
    });
  });

  it("should emit nothing when silent", () => {
    const { error } = silenceConsole();
    const logger = createLogger({ level: "silent" });

    logger.log("error", "broken");

    expect(error).not.toHaveBeenCalled();
  });

  it("should append entries to the log file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "slack-memory-log-"));
    const file = path.join(dir, "nested", "app.log");

    silenceConsole();

    try {
      const logger = createLogger({ level: "info", file });
      logger.log("info", "written");

      const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: "info",
        message: "written",
      });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("describeError", () => {
  it("should describe errors and other thrown values", () => {
    expect(describeError(new TypeError("bad"))).toEqual({
      message: "bad",
      name: "TypeError",
    });
    expect(describeError("plain")).toEqual({ message: "plain", name: undefined });
  });
});
