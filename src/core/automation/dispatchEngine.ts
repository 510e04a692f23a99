import { formatFields, logDebug, logError, logInfo } from "../logger";
import {
  ActionBarState,
  BuffStateTable,
  DispatchResult,
  ManualAction,
  PriorityItem,
  QueueEntry,
  SlotSnapshot
} from "../../shared/types";
import { formatBindForDisplay } from "../input/binds";
import { WindowProbe, windowTitleMatches } from "../perception/foregroundWindow";
import { GcdEstimator } from "./gcdEstimator";
import { KeySender } from "./keySender";
import { rankedSlotIndices, selectNextAction, slotDisplayName } from "./priorityRules";

export interface DispatchSettings {
  minPressIntervalMs: number;
  queueWindowMs: number;
  allowCastWhileCasting: boolean;
  targetWindowTitle: string;
  queueFireDelayMs: number;
}

export interface DispatchInput {
  state: ActionBarState;
  buffs: BuffStateTable;
  items: readonly PriorityItem[];
  manualActions: readonly ManualAction[];
  slotKeybinds: readonly string[];
  slotDisplayNames: readonly string[];
  automationEnabled: boolean;
}

/** Where queued manual intents come from; reading applies the timeout. */
export interface QueuedIntentSource {
  read(): QueueEntry | null;
  clear(): void;
}

export interface DispatchDependencies {
  sender: KeySender;
  windowProbe: WindowProbe;
  queue?: QueuedIntentSource | null;
  gcd?: GcdEstimator;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const NONE: DispatchResult = Object.freeze({ action: "none" });

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function slotAt(state: ActionBarState, index: number | null): SlotSnapshot | null {
  if (index === null) {
    return null;
  }
  return state.slots.find((slot) => slot.index === index) ?? null;
}

/** First CASTING/CHANNELING slot whose cast (plus the queue window) has not run out. */
export function findBlockingCast(state: ActionBarState, now: number, queueWindowMs: number): SlotSnapshot | null {
  for (const slot of state.slots) {
    if (slot.state !== "casting" && slot.state !== "channeling") {
      continue;
    }
    if (slot.castEndsAt === null || now < slot.castEndsAt + queueWindowMs) {
      return slot;
    }
  }
  return null;
}

export class KeyDispatchEngine {
  private settings: DispatchSettings;
  private readonly sender: KeySender;
  private readonly windowProbe: WindowProbe;
  private readonly queue: QueuedIntentSource | null;
  private readonly gcd: GcdEstimator;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastSendAt: number | null = null;
  private suppressPriorityUntil = 0;
  private singleFirePending = false;
  private dispatching = false;

  constructor(settings: DispatchSettings, deps: DispatchDependencies) {
    this.settings = settings;
    this.sender = deps.sender;
    this.windowProbe = deps.windowProbe;
    this.queue = deps.queue ?? null;
    this.gcd = deps.gcd ?? new GcdEstimator();
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  updateSettings(settings: DispatchSettings): void {
    this.settings = settings;
  }

  /** Arms exactly one send for the next eligible action, even with automation off. */
  requestSingleFire(): void {
    this.singleFirePending = true;
    logInfo("Single fire armed");
  }

  isSingleFirePending(): boolean {
    return this.singleFirePending;
  }

  getLastSendAt(): number | null {
    return this.lastSendAt;
  }

  /** Runs the gates in order and sends at most one key. Overlapping calls return `none`. */
  async dispatch(input: DispatchInput): Promise<DispatchResult> {
    if (this.dispatching) {
      return NONE;
    }
    this.dispatching = true;
    try {
      return await this.runGates(input);
    } finally {
      this.dispatching = false;
    }
  }

  private async runGates(input: DispatchInput): Promise<DispatchResult> {
    const now = this.now();
    const singleFire = this.singleFirePending;
    if (!input.automationEnabled && !singleFire) {
      return NONE;
    }
    if (this.lastSendAt !== null && now - this.lastSendAt < this.settings.minPressIntervalMs) {
      return NONE;
    }

    if (!this.settings.allowCastWhileCasting) {
      const blocking = findBlockingCast(input.state, now, this.settings.queueWindowMs);
      if (blocking) {
        return { action: "blocked", reason: "casting", slotIndex: blocking.index, castEndsAt: blocking.castEndsAt };
      }
    }

    const queued = this.queue?.read() ?? null;
    if (queued) {
      return this.dispatchQueued(queued, input, now);
    }
    if (now < this.suppressPriorityUntil) {
      return NONE;
    }

    const selection = selectNextAction(input);
    if (!selection) {
      return NONE;
    }

    if (!(await this.targetWindowFocused(now))) {
      return {
        action: "blocked",
        reason: "window",
        bind: selection.bind,
        displayName: selection.displayName,
        itemType: selection.item.type,
        slotIndex: selection.slotIndex
      };
    }

    if (!(await this.trySend(selection.bind))) {
      return NONE;
    }
    this.recordSend(now);
    this.singleFirePending = false;
    logInfo(
      `Sent key ${formatFields({
        bind: selection.bind,
        name: selection.displayName,
        rank: selection.rank,
        slot: selection.slotIndex,
        single_fire: singleFire
      })}`
    );
    return {
      action: "sent",
      bind: selection.bind,
      displayName: selection.displayName,
      itemType: selection.item.type,
      slotIndex: selection.slotIndex,
      timestamp: now,
      queued: false
    };
  }

  /**
   * A pending queue entry owns the cycle: it fires once a ranked slot is
   * READY (and, for a tracked entry, its own slot too), otherwise nothing is
   * sent so the rotation does not jump ahead of the player's press.
   */
  private async dispatchQueued(entry: QueueEntry, input: DispatchInput, now: number): Promise<DispatchResult> {
    const anyRankedReady = rankedSlotIndices(input.items).some((index) => slotAt(input.state, index)?.state === "ready");
    if (!anyRankedReady) {
      return NONE;
    }
    if (entry.source === "tracked" && slotAt(input.state, entry.slotIndex)?.state !== "ready") {
      return NONE;
    }
    if (!(await this.targetWindowFocused(now))) {
      logDebug(`Queued key held: target window not focused ${formatFields({ key: entry.key })}`);
      return NONE;
    }
    if (this.settings.queueFireDelayMs > 0) {
      await this.sleep(this.settings.queueFireDelayMs);
    }
    if (!(await this.trySend(entry.key))) {
      return NONE;
    }

    this.recordSend(now);
    this.suppressPriorityUntil = now + this.gcd.estimateOrDefaultMs();
    this.queue?.clear();
    logInfo(`Sent queued key ${formatFields({ key: entry.key, source: entry.source, slot: entry.slotIndex })}`);
    return {
      action: "sent",
      bind: entry.key,
      displayName:
        entry.slotIndex === null ? formatBindForDisplay(entry.key) : slotDisplayName(entry.slotIndex, input.slotDisplayNames),
      itemType: "queued",
      slotIndex: entry.slotIndex,
      timestamp: now,
      queued: true
    };
  }

  private async targetWindowFocused(now: number): Promise<boolean> {
    const target = this.settings.targetWindowTitle.trim();
    if (!target) {
      return true;
    }
    return windowTitleMatches(target, await this.windowProbe.getForegroundTitle(now));
  }

  private async trySend(bind: string): Promise<boolean> {
    try {
      await this.sender.send(bind);
      return true;
    } catch (error) {
      logError(`Key send failed ${formatFields({ bind })}`, error);
      return false;
    }
  }

  private recordSend(now: number): void {
    this.lastSendAt = now;
    this.gcd.recordSend(now);
  }
}
