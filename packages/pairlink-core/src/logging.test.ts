// Tests for connector logging

import { describe, it, expect } from "vitest";
import { MemoryLogger, debugLogger, isNamespaceEnabled, levelEnabled } from "./logging.ts";

describe("isNamespaceEnabled", () => {
  it("is disabled without a pattern", () => {
    expect(isNamespaceEnabled("pairlink:connector", undefined)).toBe(false);
    expect(isNamespaceEnabled("pairlink:connector", "")).toBe(false);
  });

  it("supports exact names and wildcards", () => {
    expect(isNamespaceEnabled("pairlink:connector", "pairlink:connector")).toBe(true);
    expect(isNamespaceEnabled("pairlink:connector", "pairlink:*")).toBe(true);
    expect(isNamespaceEnabled("pairlink:connector", "*")).toBe(true);
    expect(isNamespaceEnabled("pairlink:connector", "other:*")).toBe(false);
  });

  it("supports exclusion patterns", () => {
    expect(isNamespaceEnabled("pairlink:connector", "*,-pairlink:connector")).toBe(false);
    expect(isNamespaceEnabled("pairlink:peer-a", "*,-pairlink:connector")).toBe(true);
  });

  it("treats dots literally", () => {
    expect(isNamespaceEnabled("pairlinkXtcp", "pairlink.tcp")).toBe(false);
  });
});

describe("levelEnabled", () => {
  it("orders levels from debug to error", () => {
    expect(levelEnabled("warn", "info")).toBe(true);
    expect(levelEnabled("debug", "info")).toBe(false);
    expect(levelEnabled("error", "error")).toBe(true);
  });
});

describe("debugLogger", () => {
  it("writes prefixed lines when the namespace is enabled", () => {
    const lines: Array<{ line: string; fields?: Record<string, unknown> }> = [];
    const logger = debugLogger("pairlink:test", {
      debug: "pairlink:*",
      write: (line, fields) => lines.push({ line, fields }),
    });

    logger.log("info", "listening on port 20000");
    logger.log("debug", "sent ping", { bytes: 3 });

    expect(lines).toEqual([
      { line: "pairlink:test [info] listening on port 20000", fields: undefined },
      { line: "pairlink:test [debug] sent ping", fields: { bytes: 3 } },
    ]);
  });

  it("writes only errors when the namespace is disabled", () => {
    const lines: string[] = [];
    const logger = debugLogger("pairlink:test", {
      debug: "other:*",
      write: (line) => lines.push(line),
    });

    logger.log("info", "hidden");
    logger.log("warn", "hidden too");
    logger.log("error", "connection lost");

    expect(lines).toEqual(["pairlink:test [error] connection lost"]);
  });
});

describe("MemoryLogger", () => {
  it("keeps entries at or above its minimum level", () => {
    const logger = new MemoryLogger("info");
    logger.log("debug", "dropped");
    logger.log("info", "kept");
    logger.log("error", "failed", { port: 1 });

    expect(logger.count).toBe(2);
    expect(logger.drain()).toEqual([
      { level: "info", message: "kept" },
      { level: "error", message: "failed", fields: { port: 1 } },
    ]);
    expect(logger.count).toBe(0);
  });
});
