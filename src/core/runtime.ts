import { AppConfig } from "./config";
import { ConfigStore } from "./configStore";
import { formatFields, logInfo, logWarn } from "./logger";
import { collectProfileBinds, getActiveProfile, resolveHotkeyAction } from "./profiles";
import {
  buildBuffRoiConfigs,
  buildCaptureArea,
  buildDetectorConfig,
  buildDispatchSettings,
  buildGlowConfig,
  buildSlotBaselines,
  buildSpellQueueSettings
} from "./settings";
import { GcdEstimator } from "./automation/gcdEstimator";
import { KeyDispatchEngine } from "./automation/dispatchEngine";
import { KeySender } from "./automation/keySender";
import { encodeBaselines, encodeGrayImage } from "./detection/baselineCodec";
import { BuffTracker } from "./detection/buffTracker";
import { CastLockExtension, CastSignal } from "./detection/castLock";
import { FrameOrigin, ReadinessDetector } from "./detection/readinessDetector";
import { layoutParamsChanged } from "./detection/slotLayout";
import { HotkeyListener } from "./input/hotkeyListener";
import { KeyHook } from "./input/keyHook";
import { SpellQueueListener } from "./input/spellQueue";
import { CaptureLoop, CaptureLoopCallbacks } from "./perception/captureLoop";
import { WindowProbe } from "./perception/foregroundWindow";
import { FrameSource } from "./perception/frameSource";
import { Frame, SlotLayoutParams } from "../shared/types";

export interface RuntimeCallbacks extends CaptureLoopCallbacks {
  onAutomationChange?: (enabled: boolean, profileId: string) => void;
}

export interface RuntimeOptions {
  store: ConfigStore;
  frameSource: FrameSource;
  keyHook: KeyHook | null;
  sender: KeySender;
  windowProbe: WindowProbe;
  /** External cast flag used when `lock_ready_while_casting` is on. */
  readCast?: (now: number) => CastSignal;
  callbacks?: RuntimeCallbacks;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const NO_CAST: CastSignal = Object.freeze({ active: false, endsAt: null });

function layoutParamsOf(config: AppConfig): SlotLayoutParams {
  return { slotCount: config.slot_count, gapPixels: config.slot_gap_pixels, padding: config.slot_padding };
}

/**
 * Owns every long-lived component and keeps them in step with the config
 * store. Automation always starts off.
 */
export class Runtime {
  readonly detector: ReadinessDetector;
  readonly buffTracker: BuffTracker;
  readonly spellQueue: SpellQueueListener;
  readonly dispatch: KeyDispatchEngine;
  readonly hotkeys: HotkeyListener;
  readonly loop: CaptureLoop;
  private readonly castLock: CastLockExtension;
  private readonly store: ConfigStore;
  private readonly frameSource: FrameSource;
  private readonly keyHook: KeyHook | null;
  private readonly callbacks: RuntimeCallbacks;
  private automationEnabled = false;
  private persistingBaselines = false;
  private started = false;

  constructor(options: RuntimeOptions) {
    this.store = options.store;
    this.frameSource = options.frameSource;
    this.keyHook = options.keyHook;
    this.callbacks = options.callbacks ?? {};
    const config = this.store.get();
    const now = options.now ?? Date.now;

    this.castLock = new CastLockExtension(options.readCast ?? (() => NO_CAST), config.lock_ready_while_casting);
    this.detector = new ReadinessDetector(buildDetectorConfig(config), [this.castLock]);
    this.detector.setBaselines(buildSlotBaselines(config));
    this.buffTracker = new BuffTracker(buildBuffRoiConfigs(config), buildGlowConfig(config));
    this.spellQueue = new SpellQueueListener(
      () => {
        const current = this.store.get();
        return buildSpellQueueSettings(current, getActiveProfile(current));
      },
      () => this.automationEnabled,
      now
    );
    this.dispatch = new KeyDispatchEngine(buildDispatchSettings(config), {
      sender: options.sender,
      windowProbe: options.windowProbe,
      queue: this.spellQueue,
      gcd: new GcdEstimator(),
      now,
      sleep: options.sleep
    });
    this.hotkeys = new HotkeyListener(
      () => collectProfileBinds(this.store.get()),
      (bind) => this.handleHotkey(bind)
    );
    this.loop = new CaptureLoop(
      {
        frameSource: this.frameSource,
        detector: this.detector,
        buffTracker: this.buffTracker,
        dispatch: this.dispatch,
        getConfig: () => this.store.get(),
        isAutomationEnabled: () => this.automationEnabled,
        now
      },
      this.callbacks
    );
    this.store.subscribe((next, previous) => this.applyConfig(next, previous));
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.spellQueue.start(this.keyHook);
    this.hotkeys.start(this.keyHook);
    this.loop.start();
    logInfo(`Runtime started ${formatFields({ profile: this.store.get().active_profile_id })}`);
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.hotkeys.stop();
    this.spellQueue.stop();
    await this.loop.stop();
    logInfo("Runtime stopped");
  }

  getConfig(): AppConfig {
    return this.store.get();
  }

  isAutomationEnabled(): boolean {
    return this.automationEnabled;
  }

  setAutomationEnabled(enabled: boolean): void {
    if (this.automationEnabled === enabled) {
      return;
    }
    this.automationEnabled = enabled;
    if (!enabled) {
      this.spellQueue.clear();
    }
    const profileId = this.store.get().active_profile_id;
    logInfo(`Automation ${enabled ? "enabled" : "disabled"} ${formatFields({ profile: profileId })}`);
    this.callbacks.onAutomationChange?.(enabled, profileId);
  }

  handleHotkey(bind: string): void {
    const action = resolveHotkeyAction(this.store.get(), bind);
    if (!action) {
      return;
    }
    switch (action.kind) {
      case "toggle-automation":
        this.setAutomationEnabled(!this.automationEnabled);
        return;
      case "activate-profile":
        if (this.store.setActiveProfile(action.profileId)) {
          this.setAutomationEnabled(true);
        }
        return;
      case "single-fire":
        if (this.store.setActiveProfile(action.profileId)) {
          this.dispatch.requestSingleFire();
        }
        return;
    }
  }

  /** Grabs one frame and stores every slot as its ready baseline, persisted to config. */
  async calibrateAll(): Promise<number> {
    const { frame, origin } = await this.grabCalibrationFrame();
    const stored = this.detector.calibrateAll(frame, origin);
    this.persistBaselines();
    return stored;
  }

  async calibrateSlot(slotIndex: number): Promise<boolean> {
    const { frame, origin } = await this.grabCalibrationFrame();
    if (!this.detector.calibrateSlot(frame, slotIndex, origin)) {
      return false;
    }
    this.persistBaselines();
    return true;
  }

  /** Captures the buff ROI's current pixels as its "present" template. */
  async captureBuffTemplate(roiId: string): Promise<boolean> {
    const { frame, origin } = await this.grabCalibrationFrame();
    const template = this.buffTracker.captureTemplate(frame, roiId, origin.x, origin.y);
    if (!template) {
      logWarn(`Buff template not captured ${formatFields({ buff: roiId })}`);
      return false;
    }
    const encoded = encodeGrayImage(template);
    this.store.update({
      buff_rois: this.store.get().buff_rois.map((roi) =>
        roi.id === roiId ? { ...roi, calibration: { present_template: encoded } } : roi
      )
    });
    return true;
  }

  private async grabCalibrationFrame(): Promise<{ frame: Frame; origin: FrameOrigin }> {
    const config = this.store.get();
    const area = buildCaptureArea(config);
    if (!this.loop.isRunning()) {
      this.frameSource.start(config.monitor_index);
    }
    try {
      return { frame: await this.frameSource.grab(area.region), origin: area.origin };
    } finally {
      if (!this.loop.isRunning()) {
        this.frameSource.stop();
      }
    }
  }

  private persistBaselines(): void {
    this.persistingBaselines = true;
    try {
      this.store.update({ slot_baselines: encodeBaselines(this.detector.getBaselines()) });
    } finally {
      this.persistingBaselines = false;
    }
  }

  private applyConfig(config: AppConfig, previous: AppConfig): void {
    const layoutChanged = layoutParamsChanged(layoutParamsOf(previous), layoutParamsOf(config));
    this.detector.updateConfig(buildDetectorConfig(config));
    if (layoutChanged) {
      // Saved baselines were cropped from the old layout.
      if (!this.persistingBaselines && Object.keys(config.slot_baselines).length > 0) {
        this.persistBaselines();
      }
    } else if (
      !this.persistingBaselines &&
      JSON.stringify(config.slot_baselines) !== JSON.stringify(previous.slot_baselines)
    ) {
      this.detector.setBaselines(buildSlotBaselines(config));
    }
    this.castLock.setEnabled(config.lock_ready_while_casting);
    this.buffTracker.updateConfig(buildBuffRoiConfigs(config), buildGlowConfig(config));
    this.dispatch.updateSettings(buildDispatchSettings(config));
    if (config.active_profile_id !== previous.active_profile_id) {
      this.spellQueue.clear();
    }
  }
}

export function createRuntime(options: RuntimeOptions): Runtime {
  return new Runtime(options);
}
