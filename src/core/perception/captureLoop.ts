import { AppConfig } from "../config";
import { formatFields, logDebug, logError, logInfo } from "../logger";
import { getActiveProfile } from "../profiles";
import { buildCaptureArea } from "../settings";
import { ActionBarState, DispatchResult, SlotView } from "../../shared/types";
import { KeyDispatchEngine } from "../automation/dispatchEngine";
import { slotDisplayName } from "../automation/priorityRules";
import { BuffTracker } from "../detection/buffTracker";
import { ReadinessDetector } from "../detection/readinessDetector";
import { FrameSource } from "./frameSource";

export interface CaptureLoopCallbacks {
  onState?: (state: ActionBarState, slots: readonly SlotView[]) => void;
  onDispatch?: (result: DispatchResult) => void;
}

export interface CaptureLoopDependencies {
  frameSource: FrameSource;
  detector: ReadinessDetector;
  buffTracker: BuffTracker;
  dispatch: KeyDispatchEngine;
  getConfig: () => AppConfig;
  isAutomationEnabled: () => boolean;
  now?: () => number;
}

const STATS_EVERY_TICKS = 200;

export function buildSlotViews(state: ActionBarState, config: AppConfig): SlotView[] {
  return state.slots.map((slot) => ({
    index: slot.index,
    state: slot.state,
    keybind: config.slot_keybinds[slot.index] || null,
    displayName: slotDisplayName(slot.index, config.slot_display_names),
    cooldownRemaining: slot.cooldownRemaining,
    brightness: slot.darkenedFraction
  }));
}

export function tickIntervalMs(config: AppConfig): number {
  return Math.max(1, Math.round(1000 / config.polling_fps));
}

/**
 * The capture, analyze and dispatch cycle. Ticks are chained with
 * `setTimeout`, so a slow cycle delays the next one instead of overlapping it.
 */
export class CaptureLoop {
  private started = false;
  private timer: NodeJS.Timeout | null = null;
  private runningTick = false;
  private inFlight: Promise<void> | null = null;
  private activeMonitor: number | null = null;
  private readonly now: () => number;
  private tickCount = 0;
  private failureCount = 0;
  private overrunCount = 0;

  constructor(
    private readonly deps: CaptureLoopDependencies,
    private readonly callbacks: CaptureLoopCallbacks = {}
  ) {
    this.now = deps.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    const config = this.deps.getConfig();
    this.ensureMonitor(config.monitor_index);
    const tickMs = tickIntervalMs(config);
    this.scheduleNextTick(tickMs);
    logInfo(`Capture loop started tick=${tickMs}ms`);
  }

  /** Resolves once the in-flight cycle, if any, has finished. */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.deps.frameSource.stop();
    this.activeMonitor = null;
    logInfo(
      `Capture loop stopped ${formatFields({ ticks: this.tickCount, failures: this.failureCount, overruns: this.overrunCount })}`
    );
  }

  private scheduleNextTick(delayMs: number): void {
    if (!this.started) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runTick().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    if (this.runningTick) {
      this.overrunCount += 1;
      return;
    }
    this.runningTick = true;
    const tickStartedAtMs = this.now();
    try {
      await this.runCycle();
    } catch (error) {
      this.failureCount += 1;
      logError("Capture cycle failed", error);
    } finally {
      this.runningTick = false;
      this.tickCount += 1;
      if (this.tickCount % STATS_EVERY_TICKS === 0) {
        logDebug(`Capture loop ${formatFields({ ticks: this.tickCount, failures: this.failureCount })}`);
      }
      const elapsed = this.now() - tickStartedAtMs;
      this.scheduleNextTick(Math.max(0, tickIntervalMs(this.deps.getConfig()) - elapsed));
    }
  }

  private async runCycle(): Promise<void> {
    const config = this.deps.getConfig();
    this.ensureMonitor(config.monitor_index);
    const area = buildCaptureArea(config);
    const frame = await this.deps.frameSource.grab(area.region);
    const now = this.now();
    const state = this.deps.detector.analyzeFrame(frame, now, area.origin);
    const buffs = this.deps.buffTracker.analyze(frame, area.origin.x, area.origin.y);
    this.callbacks.onState?.(state, buildSlotViews(state, config));

    const profile = getActiveProfile(config);
    const result = await this.deps.dispatch.dispatch({
      state,
      buffs,
      items: profile.priorityItems,
      manualActions: profile.manualActions,
      slotKeybinds: config.slot_keybinds,
      slotDisplayNames: config.slot_display_names,
      automationEnabled: this.deps.isAutomationEnabled()
    });
    if (result.action !== "none") {
      this.callbacks.onDispatch?.(result);
    }
  }

  private ensureMonitor(monitorIndex: number): void {
    if (this.activeMonitor === monitorIndex) {
      return;
    }
    if (this.activeMonitor !== null) {
      this.deps.frameSource.stop();
    }
    this.deps.frameSource.start(monitorIndex);
    this.activeMonitor = monitorIndex;
  }
}
