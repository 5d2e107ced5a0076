/**
 * Unit tests for log formatting and sinks.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  formatLogLine,
  createConsoleLogger,
  createFileLogger,
  combineLoggers,
  describeOutcome,
  emitRecord,
} from "../../src/log/logger.js";
import type { LogRecord, SyncPair } from "../../src/types.js";
import { makeTempDir, removeTempDir } from "../helpers.js";

function record(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    timestamp: "2026-01-01T00:00:00.000Z",
    level: "info",
    scope: "sync",
    message: "Already in sync: /repo",
    ...overrides,
  };
}

const pair: SyncPair = {
  directory: "/repo/backend",
  primaryPath: "/repo/backend/CLAUDE.md",
  secondaryPath: "/repo/backend/AGENTS.md",
};

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("formatLogLine", () => {
    it("formats timestamp, scope, level and message on one line", () => {
      expect(formatLogLine(record())).toBe("2026-01-01T00:00:00.000Z [sync] INFO Already in sync: /repo");
    });

    it("escapes newlines in the message", () => {
      expect(formatLogLine(record({ level: "error", message: "bad\nthing\r\nhere" }))).toBe(
        "2026-01-01T00:00:00.000Z [sync] ERROR bad\\nthing\\nhere"
      );
    });
  });

  describe("createConsoleLogger", () => {
    it("routes records by level", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createConsoleLogger();

      void logger(record());
      void logger(record({ level: "warn", scope: "discovery", message: "skipped" }));
      void logger(record({ level: "error", message: "failed" }));

      expect(log).toHaveBeenCalledWith("[sync] Already in sync: /repo");
      expect(warn).toHaveBeenCalledWith("[discovery] skipped");
      expect(error).toHaveBeenCalledWith("[sync] failed");
    });

    it("suppresses info records when quiet", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const logger = createConsoleLogger({ quiet: true });

      void logger(record());
      void logger(record({ level: "warn", message: "still shown" }));

      expect(log).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith("[sync] still shown");
    });
  });

  describe("createFileLogger", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir("logger-test");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it("appends one line per record, creating the directory", async () => {
      const logFile = path.join(tempDir, "logs", "sync.log");
      const logger = createFileLogger(logFile);

      await logger(record());
      await logger(record({ level: "warn", scope: "discovery", message: "skipped /x" }));

      expect(await fs.readFile(logFile, "utf-8")).toBe(
        "2026-01-01T00:00:00.000Z [sync] INFO Already in sync: /repo\n" +
          "2026-01-01T00:00:00.000Z [discovery] WARN skipped /x\n"
      );
    });

    it("reports append failures on stderr without throwing", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      // The log file's parent is a regular file, so mkdir fails
      await fs.writeFile(path.join(tempDir, "blocker"), "");
      const logger = createFileLogger(path.join(tempDir, "blocker", "sync.log"));

      await expect(logger(record())).resolves.toBeUndefined();
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe("combineLoggers", () => {
    it("passes each record to every logger in order", async () => {
      const calls: string[] = [];
      const combined = combineLoggers(
        (r) => {
          calls.push(`first:${r.message}`);
        },
        async (r) => {
          calls.push(`second:${r.message}`);
        }
      );

      await combined(record({ message: "m" }));

      expect(calls).toEqual(["first:m", "second:m"]);
    });
  });

  describe("emitRecord", () => {
    it("passes the record to the logger", async () => {
      const received: LogRecord[] = [];
      await emitRecord((entry) => {
        received.push(entry);
      }, record());
      expect(received).toEqual([record()]);
    });

    it("reports a rejecting logger on stderr instead of rejecting", async () => {
      const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

      await expect(
        emitRecord(async () => {
          throw new Error("disk full");
        }, record({ scope: "discovery" }))
      ).resolves.toBeUndefined();

      expect(consoleError).toHaveBeenCalledWith("[log] Logger failed for [discovery] record:", "disk full");
    });
  });

  describe("describeOutcome", () => {
    it("describes a sync in each direction", () => {
      expect(
        describeOutcome({
          triggerPath: pair.primaryPath,
          pair,
          outcome: { kind: "synced", direction: "primary-to-secondary", bytesWritten: 12 },
        })
      ).toBe("Synced CLAUDE.md -> AGENTS.md in /repo/backend (12 bytes)");
      expect(
        describeOutcome({
          triggerPath: pair.secondaryPath,
          pair,
          outcome: { kind: "synced", direction: "secondary-to-primary", bytesWritten: 3 },
        })
      ).toBe("Synced AGENTS.md -> CLAUDE.md in /repo/backend (3 bytes)");
    });

    it("describes no-op outcomes", () => {
      expect(
        describeOutcome({ triggerPath: pair.primaryPath, pair, outcome: { kind: "already-in-sync" } })
      ).toBe("Already in sync: /repo/backend");
      expect(
        describeOutcome({
          triggerPath: "/repo/CLAUDE.md",
          pair: null,
          outcome: { kind: "no-matching-pair", reason: "missing-counterpart" },
        })
      ).toBe("No CLAUDE.md/AGENTS.md pair in /repo, nothing to do");
      expect(
        describeOutcome({
          triggerPath: "/repo/README.md",
          pair: null,
          outcome: { kind: "no-matching-pair", reason: "not-instruction-file" },
        })
      ).toBe("Not an instruction file, nothing to do: /repo/README.md");
      expect(
        describeOutcome({
          triggerPath: "/repo/dist/CLAUDE.md",
          pair: null,
          outcome: { kind: "no-matching-pair", reason: "ignored-directory" },
        })
      ).toBe("Inside an ignored directory, nothing to do: /repo/dist/CLAUDE.md");
    });

    it("describes an ambiguous trigger and an error", () => {
      expect(
        describeOutcome({ triggerPath: "/elsewhere/CLAUDE.md", pair, outcome: { kind: "ambiguous-trigger" } })
      ).toBe("Trigger /elsewhere/CLAUDE.md does not match the pair in /repo/backend, nothing to do");
      expect(
        describeOutcome({
          triggerPath: pair.primaryPath,
          pair,
          outcome: {
            kind: "error",
            failure: { kind: "write-failure", path: pair.secondaryPath, message: "Failed to write it" },
          },
        })
      ).toBe("Sync failed in /repo/backend: Failed to write it");
    });
  });
});
