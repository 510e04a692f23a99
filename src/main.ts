#!/usr/bin/env node
import { ConfigStore } from "./core/configStore";
import { formatFields, getLogSessionInfo, logError, logInfo } from "./core/logger";
import { createRuntime, Runtime } from "./core/runtime";
import { loadKeySender } from "./core/automation/keySender";
import { captureNextBind } from "./core/input/hotkeyListener";
import { loadUiohookKeyHook } from "./core/input/uiohookKeyHook";
import { PowerShellWindowProbe } from "./core/perception/foregroundWindow";
import { PowerShellFrameSource } from "./core/perception/frameSource";
import { DispatchResult } from "./shared/types";

const USAGE = [
  "usage: slotwatch [command]",
  "  run                  watch the action bar and dispatch keys (default)",
  "  calibrate            store every slot's ready baseline",
  "  calibrate-slot <n>   store one slot's ready baseline",
  "  capture-buff <id>    store a buff ROI's present template",
  "  capture-bind         print the next key combo pressed"
].join("\n");

function describeDispatch(result: DispatchResult): string {
  switch (result.action) {
    case "none":
      return "none";
    case "blocked":
      return result.reason === "casting"
        ? `blocked casting ${formatFields({ slot: result.slotIndex })}`
        : `blocked window ${formatFields({ bind: result.bind })}`;
    case "sent":
      return `sent ${formatFields({ bind: result.bind, name: result.displayName, queued: result.queued })}`;
  }
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function runUntilSignal(runtime: Runtime): Promise<void> {
  runtime.start();
  print("slotwatch running; Ctrl+C to stop");
  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      logInfo(`Shutdown requested ${formatFields({ signal })}`);
      runtime
        .stop()
        .catch((error: unknown) => {
          logError("Shutdown failed", error);
        })
        .finally(resolve);
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });
}

async function main(argv: readonly string[]): Promise<number> {
  const [command = "run", argument] = argv;
  const logSession = getLogSessionInfo();
  logInfo(`Runtime ready session_id=${logSession.sessionId} session_log=${logSession.sessionLogPath}`);

  const keyHook = await loadUiohookKeyHook();
  if (command === "capture-bind") {
    if (!keyHook) {
      print("No keyboard hook available");
      return 1;
    }
    print("Press a key combo...");
    print(await captureNextBind(keyHook));
    return 0;
  }

  const store = ConfigStore.load();
  const runtime = createRuntime({
    store,
    frameSource: new PowerShellFrameSource(),
    keyHook,
    sender: await loadKeySender(),
    windowProbe: new PowerShellWindowProbe(),
    callbacks: {
      onDispatch: (result) => print(describeDispatch(result)),
      onAutomationChange: (enabled, profileId) =>
        print(`automation ${enabled ? "on" : "off"} ${formatFields({ profile: profileId })}`)
    }
  });

  switch (command) {
    case "run":
      await runUntilSignal(runtime);
      return 0;
    case "calibrate": {
      const stored = await runtime.calibrateAll();
      print(`calibrated ${stored}/${store.get().slot_count} slots`);
      return stored > 0 ? 0 : 1;
    }
    case "calibrate-slot": {
      const slot = Number(argument);
      if (!Number.isInteger(slot) || slot < 0) {
        print(USAGE);
        return 2;
      }
      return (await runtime.calibrateSlot(slot)) ? 0 : 1;
    }
    case "capture-buff":
      if (!argument) {
        print(USAGE);
        return 2;
      }
      return (await runtime.captureBuffTemplate(argument.trim().toLowerCase())) ? 0 : 1;
    default:
      print(USAGE);
      return 2;
  }
}

process.on("uncaughtException", (error) => {
  logError("Uncaught exception", error);
});

process.on("unhandledRejection", (reason) => {
  logError("Unhandled rejection", reason);
});

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    logError("Fatal error", error);
    process.exit(1);
  });
