import { readFileSync } from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import { formatFields, getLogSessionInfo, logError, logWarn } from "../../src/core/logger";

describe("formatFields", () => {
  it("renders pairs in order, skipping undefined and dashing null", () => {
    expect(formatFields({ slot: 3, bind: null, name: undefined, queued: false, key: "r" })).toBe(
      "slot=3 bind=- queued=false key=r"
    );
  });
});

describe("log files", () => {
  it("writes into the configured log directory", () => {
    const session = getLogSessionInfo();
    expect(session.logDir).toBe(path.join(os.tmpdir(), "slotwatch-test-logs"));
    expect(session.appLogPath).toBe(path.join(session.logDir, "slotwatch.log"));

    logWarn(`Logger check ${formatFields({ session: session.sessionId })}`);
    logError("Logger failure check", new Error("test-failure"));
    const written = readFileSync(session.sessionLogPath, "utf8");
    expect(written).toContain(`[WARN] Logger check session=${session.sessionId}\n`);
    expect(written).toContain("[ERROR] Logger failure check | test-failure\n");
  });
});
