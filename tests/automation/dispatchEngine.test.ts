import { describe, expect, it } from "vitest";
import {
  DispatchInput,
  DispatchSettings,
  findBlockingCast,
  KeyDispatchEngine,
  QueuedIntentSource
} from "../../src/core/automation/dispatchEngine";
import { GcdEstimator } from "../../src/core/automation/gcdEstimator";
import { ActionBarState, QueueEntry } from "../../src/shared/types";
import { FixedWindowProbe, RecordingSender } from "../helpers/fakes";
import { barState, slot } from "../helpers/state";

const SETTINGS: DispatchSettings = {
  minPressIntervalMs: 150,
  queueWindowMs: 0,
  allowCastWhileCasting: false,
  targetWindowTitle: "",
  queueFireDelayMs: 0
};

class StubQueue implements QueuedIntentSource {
  constructor(public entry: QueueEntry | null = null) {}

  read(): QueueEntry | null {
    return this.entry;
  }

  clear(): void {
    this.entry = null;
  }
}

function harness(settings: Partial<DispatchSettings> = {}, queue: StubQueue | null = null) {
  const clock = { now: 1000 };
  const sender = new RecordingSender();
  const probe = new FixedWindowProbe();
  const sleeps: number[] = [];
  const engine = new KeyDispatchEngine(
    { ...SETTINGS, ...settings },
    {
      sender,
      windowProbe: probe,
      queue,
      gcd: new GcdEstimator(),
      now: () => clock.now,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    }
  );
  return { clock, sender, probe, sleeps, engine };
}

function dispatchInput(overrides: Partial<DispatchInput> = {}): DispatchInput {
  return {
    state: barState(["ready", "ready"]),
    buffs: {},
    items: [{ type: "slot", slotIndex: 0, activationRule: "always", readySource: "slot" }],
    manualActions: [],
    slotKeybinds: ["1", "2"],
    slotDisplayNames: [],
    automationEnabled: true,
    ...overrides
  };
}

function castingState(castEndsAt: number | null): ActionBarState {
  return {
    slots: [slot(0, "ready"), slot(1, "casting", { castEndsAt })],
    timestamp: 0,
    castActive: true,
    castEndsAt
  };
}

describe("findBlockingCast", () => {
  it("blocks until the cast end plus the queue window", () => {
    expect(findBlockingCast(castingState(2000), 1900, 0)?.index).toBe(1);
    expect(findBlockingCast(castingState(2000), 2000, 0)).toBeNull();
    expect(findBlockingCast(castingState(2000), 2000, 100)?.index).toBe(1);
    expect(findBlockingCast(castingState(null), 99999, 0)?.index).toBe(1);
    expect(findBlockingCast(barState(["ready"]), 0, 0)).toBeNull();
  });
});

describe("KeyDispatchEngine", () => {
  it("sends the top eligible action", async () => {
    const { engine, sender } = harness();
    const result = await engine.dispatch(dispatchInput());
    expect(result).toEqual({
      action: "sent",
      bind: "1",
      displayName: "Slot 1",
      itemType: "slot",
      slotIndex: 0,
      timestamp: 1000,
      queued: false
    });
    expect(sender.sent).toEqual(["1"]);
    expect(engine.getLastSendAt()).toBe(1000);
  });

  it("does nothing while automation is off", async () => {
    const { engine, sender } = harness();
    expect(await engine.dispatch(dispatchInput({ automationEnabled: false }))).toEqual({ action: "none" });
    expect(sender.sent).toEqual([]);
  });

  it("spaces sends by the minimum press interval", async () => {
    const { engine, sender, clock } = harness();
    expect((await engine.dispatch(dispatchInput())).action).toBe("sent");
    clock.now = 1080;
    expect((await engine.dispatch(dispatchInput())).action).toBe("none");
    clock.now = 1200;
    expect((await engine.dispatch(dispatchInput())).action).toBe("sent");
    expect(sender.sent).toEqual(["1", "1"]);
  });

  it("reports a cast in progress instead of sending", async () => {
    const { engine, sender } = harness();
    const result = await engine.dispatch(dispatchInput({ state: castingState(5000) }));
    expect(result).toEqual({ action: "blocked", reason: "casting", slotIndex: 1, castEndsAt: 5000 });
    expect(sender.sent).toEqual([]);
  });

  it("ignores casts when casting through is allowed", async () => {
    const { engine } = harness({ allowCastWhileCasting: true });
    expect((await engine.dispatch(dispatchInput({ state: castingState(5000) }))).action).toBe("sent");
  });

  it("blocks when the target window is not focused", async () => {
    const { engine, sender, probe } = harness({ targetWindowTitle: "test game" });
    probe.title = "Notepad";
    const result = await engine.dispatch(dispatchInput());
    expect(result).toEqual({
      action: "blocked",
      reason: "window",
      bind: "1",
      displayName: "Slot 1",
      itemType: "slot",
      slotIndex: 0
    });
    expect(sender.sent).toEqual([]);

    probe.title = "My Test Game (DX11)";
    expect((await engine.dispatch(dispatchInput())).action).toBe("sent");
  });

  it("does not query the window without a target title", async () => {
    const { engine, probe } = harness();
    await engine.dispatch(dispatchInput());
    expect(probe.queries).toBe(0);
  });

  it("returns none and records nothing when the send fails", async () => {
    const { engine, sender } = harness();
    sender.failWith = new Error("send failed");
    expect(await engine.dispatch(dispatchInput())).toEqual({ action: "none" });
    expect(engine.getLastSendAt()).toBeNull();
  });

  it("fires exactly once on a single-fire request with automation off", async () => {
    const { engine, sender, clock } = harness();
    engine.requestSingleFire();
    expect(engine.isSingleFirePending()).toBe(true);
    expect((await engine.dispatch(dispatchInput({ automationEnabled: false }))).action).toBe("sent");
    expect(engine.isSingleFirePending()).toBe(false);
    clock.now = 5000;
    expect((await engine.dispatch(dispatchInput({ automationEnabled: false }))).action).toBe("none");
    expect(sender.sent).toEqual(["1"]);
  });

  it("keeps single fire armed while nothing is eligible", async () => {
    const { engine } = harness();
    engine.requestSingleFire();
    const idle = dispatchInput({ automationEnabled: false, state: barState(["on_cooldown", "ready"]) });
    expect((await engine.dispatch(idle)).action).toBe("none");
    expect(engine.isSingleFirePending()).toBe(true);
  });

  it("returns none for a call that overlaps one in flight", async () => {
    const { engine, sender } = harness();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    sender.send = async (bind) => {
      await gate;
      sender.sent.push(bind);
    };
    const first = engine.dispatch(dispatchInput());
    expect(await engine.dispatch(dispatchInput())).toEqual({ action: "none" });
    release();
    expect((await first).action).toBe("sent");
    expect(sender.sent).toEqual(["1"]);
  });

  describe("queued keys", () => {
    const whitelistEntry: QueueEntry = { key: "r", slotIndex: null, source: "whitelist", createdAt: 900 };

    it("sends a queued key ahead of the priority list, then holds the list for a GCD", async () => {
      const queue = new StubQueue(whitelistEntry);
      const { engine, sender, clock } = harness({}, queue);
      const result = await engine.dispatch(dispatchInput());
      expect(result).toEqual({
        action: "sent",
        bind: "r",
        displayName: "R",
        itemType: "queued",
        slotIndex: null,
        timestamp: 1000,
        queued: true
      });
      expect(queue.entry).toBeNull();

      clock.now = 1200;
      expect((await engine.dispatch(dispatchInput())).action).toBe("none");
      clock.now = 2500;
      expect((await engine.dispatch(dispatchInput())).action).toBe("sent");
      expect(sender.sent).toEqual(["r", "1"]);
    });

    it("waits for a ranked slot to be ready", async () => {
      const queue = new StubQueue(whitelistEntry);
      const { engine, sender } = harness({}, queue);
      const result = await engine.dispatch(dispatchInput({ state: barState(["on_cooldown", "ready"]) }));
      expect(result).toEqual({ action: "none" });
      expect(sender.sent).toEqual([]);
      expect(queue.entry).toBe(whitelistEntry);
    });

    it("waits for a tracked entry's own slot", async () => {
      const tracked: QueueEntry = { key: "2", slotIndex: 1, source: "tracked", createdAt: 900 };
      const queue = new StubQueue(tracked);
      const { engine } = harness({}, queue);
      expect((await engine.dispatch(dispatchInput({ state: barState(["ready", "on_cooldown"]) }))).action).toBe("none");
      const result = await engine.dispatch(dispatchInput());
      expect(result).toMatchObject({ action: "sent", bind: "2", displayName: "Slot 2", slotIndex: 1, queued: true });
    });

    it("holds the queued key while the target window is not focused", async () => {
      const queue = new StubQueue(whitelistEntry);
      const { engine, probe } = harness({ targetWindowTitle: "Test Game" }, queue);
      probe.title = null;
      expect(await engine.dispatch(dispatchInput())).toEqual({ action: "none" });
      expect(queue.entry).toBe(whitelistEntry);
    });

    it("waits the fire delay before sending", async () => {
      const queue = new StubQueue(whitelistEntry);
      const { engine, sleeps } = harness({ queueFireDelayMs: 40 }, queue);
      await engine.dispatch(dispatchInput());
      expect(sleeps).toEqual([40]);
    });
  });
});
