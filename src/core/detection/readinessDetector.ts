import { formatFields, logDebug, logInfo, logWarn } from "../logger";
import {
  ActionBarState,
  Frame,
  GlowSignal,
  GrayImage,
  SlotRegion,
  SlotSnapshot,
  SlotState
} from "../../shared/types";
import { DetectionRegion, DetectorConfig, NO_GLOW, SlotStateExtension } from "./detectionTypes";
import { GlowDetector } from "./glowDetector";
import { cropFrame, sameShape, toGray, topLeftQuadrant } from "./pixels";
import { applySlotPadding, computeSlotLayout, layoutParamsChanged } from "./slotLayout";

const RELEASE_FACTOR = 0.7;
const DEBUG_SUMMARY_EVERY = 30;

interface SlotRuntime {
  wasCooldown: boolean;
  cooldownStartedAt: number | null;
  releaseStartedAt: number | null;
}

export interface FrameOrigin {
  x: number;
  y: number;
}

function freshRuntime(): SlotRuntime {
  return { wasCooldown: false, cooldownStartedAt: null, releaseStartedAt: null };
}

/** Fraction of pixels whose brightness fell by strictly more than `threshold`. */
export function darkenedFraction(baseline: GrayImage, current: GrayImage, threshold: number): number {
  const total = current.data.length;
  if (total === 0) {
    return 0;
  }
  let darkened = 0;
  for (let index = 0; index < total; index += 1) {
    if (baseline.data[index] - current.data[index] > threshold) {
      darkened += 1;
    }
  }
  return darkened / total;
}

export class ReadinessDetector {
  private config: DetectorConfig;
  private regions: SlotRegion[] = [];
  private baselines: ReadonlyMap<number, GrayImage> = new Map();
  private runtime = new Map<number, SlotRuntime>();
  private readonly glow: GlowDetector;
  private readonly extensions: SlotStateExtension[];
  private frameCount = 0;

  constructor(config: DetectorConfig, extensions: readonly SlotStateExtension[] = []) {
    this.config = config;
    this.glow = new GlowDetector(config.glow);
    this.extensions = [this.glow, ...extensions];
    this.recomputeLayout();
  }

  getConfig(): DetectorConfig {
    return this.config;
  }

  getSlotRegions(): readonly SlotRegion[] {
    return this.regions;
  }

  updateConfig(config: DetectorConfig): void {
    const layoutChanged = layoutParamsChanged(
      { slotCount: this.config.slotCount, gapPixels: this.config.slotGapPixels, padding: this.config.slotPadding },
      { slotCount: config.slotCount, gapPixels: config.slotGapPixels, padding: config.slotPadding }
    );
    this.config = config;
    this.glow.updateConfig(config.glow);
    this.recomputeLayout();
    if (layoutChanged) {
      this.baselines = new Map();
      this.resetRuntime();
      logInfo("Slot layout changed; baselines cleared (recalibrate required)");
    }
  }

  /** Captures every slot of `frame` as its ready baseline. Returns the number of slots stored. */
  calibrateAll(frame: Frame, origin: FrameOrigin = { x: 0, y: 0 }): number {
    const next = new Map<number, GrayImage>();
    for (const region of this.regions) {
      const gray = toGray(this.cropSlot(frame, region, origin));
      if (gray.data.length === 0) {
        logWarn(`Skipping baseline ${formatFields({ slot: region.index, reason: "empty-crop" })}`);
        continue;
      }
      next.set(region.index, gray);
    }
    this.baselines = next;
    this.resetRuntime();
    logInfo(`Calibrated baselines ${formatFields({ slots: next.size, of: this.regions.length })}`);
    return next.size;
  }

  calibrateSlot(frame: Frame, slotIndex: number, origin: FrameOrigin = { x: 0, y: 0 }): boolean {
    const region = this.regions[slotIndex];
    if (!region) {
      logWarn(`calibrateSlot: invalid slot ${formatFields({ slot: slotIndex })}`);
      return false;
    }
    const gray = toGray(this.cropSlot(frame, region, origin));
    if (gray.data.length === 0) {
      logWarn(`calibrateSlot: empty crop ${formatFields({ slot: slotIndex })}`);
      return false;
    }
    const next = new Map(this.baselines);
    next.set(slotIndex, gray);
    this.baselines = next;
    this.runtime.set(slotIndex, freshRuntime());
    for (const extension of this.extensions) {
      extension.reset?.(slotIndex);
    }
    logInfo(`Calibrated baseline ${formatFields({ slot: slotIndex })}`);
    return true;
  }

  getBaselines(): ReadonlyMap<number, GrayImage> {
    return this.baselines;
  }

  /** Loads baselines from a previous session; slots outside the layout are dropped. */
  setBaselines(baselines: ReadonlyMap<number, GrayImage>): void {
    const next = new Map<number, GrayImage>();
    for (const [index, image] of baselines) {
      if (index >= 0 && index < this.regions.length) {
        next.set(index, image);
      }
    }
    this.baselines = next;
    this.resetRuntime();
    logInfo(`Loaded slot baselines ${formatFields({ slots: next.size })}`);
  }

  analyzeFrame(frame: Frame, now: number, origin: FrameOrigin = { x: 0, y: 0 }): ActionBarState {
    const baselines = this.baselines;
    const snapshots: SlotSnapshot[] = this.regions.map((region) =>
      this.analyzeSlot(frame, region, baselines.get(region.index), now, origin)
    );

    this.frameCount += 1;
    if (this.frameCount % DEBUG_SUMMARY_EVERY === 0) {
      const summary = snapshots.map((slot) => `s${slot.index}=${slot.darkenedFraction.toFixed(2)}(${slot.state})`).join(", ");
      logDebug(`Slots ${formatFields({ region: this.config.detectionRegion })} | ${summary}`);
    }

    let castEndsAt: number | null = null;
    let castActive = false;
    for (const slot of snapshots) {
      if (slot.state === "casting" || slot.state === "channeling") {
        castActive = true;
        if (slot.castEndsAt !== null && (castEndsAt === null || slot.castEndsAt > castEndsAt)) {
          castEndsAt = slot.castEndsAt;
        }
      }
    }
    return Object.freeze({
      slots: Object.freeze(snapshots),
      timestamp: now,
      castActive,
      castEndsAt
    });
  }

  private analyzeSlot(
    frame: Frame,
    region: SlotRegion,
    baseline: GrayImage | undefined,
    now: number,
    origin: FrameOrigin
  ): SlotSnapshot {
    const crop = this.cropSlot(frame, region, origin);
    const current = toGray(crop);
    if (!baseline || current.data.length === 0 || !sameShape(baseline, current)) {
      return buildSnapshot(region.index, "unknown", 0, NO_GLOW, null, null, now);
    }

    const mode: DetectionRegion = this.config.detectionRegionBySlot[region.index] ?? this.config.detectionRegion;
    const measuredBaseline = mode === "top_left" ? topLeftQuadrant(baseline) : baseline;
    const measuredCurrent = mode === "top_left" ? topLeftQuadrant(current) : current;
    const dropThreshold = this.config.brightnessDropThresholdBySlot[region.index] ?? this.config.brightnessDropThreshold;
    const fractionThreshold = this.config.cooldownPixelFractionBySlot[region.index] ?? this.config.cooldownPixelFraction;
    const fraction = darkenedFraction(measuredBaseline, measuredCurrent, dropThreshold);

    let state = this.debounce(region.index, fraction, fractionThreshold, now);
    let glow: GlowSignal = NO_GLOW;
    let castProgress: number | null = null;
    let castEndsAt: number | null = null;
    for (const extension of this.extensions) {
      const refinement = extension.refine({ index: region.index, state, darkenedFraction: fraction, crop, baseline, now });
      if (!refinement) {
        continue;
      }
      state = refinement.state ?? state;
      glow = refinement.glow ?? glow;
      castProgress = refinement.castProgress !== undefined ? refinement.castProgress : castProgress;
      castEndsAt = refinement.castEndsAt !== undefined ? refinement.castEndsAt : castEndsAt;
    }

    return buildSnapshot(region.index, state, fraction, glow, castProgress, castEndsAt, now);
  }

  /**
   * Raw cooldown must persist `cooldownMinDurationMs` before it is reported
   * (the slot shows `gcd` meanwhile). Once on cooldown the slot is held there
   * until the fraction drops below the release threshold for
   * `cooldownReleaseConfirmMs`, unless it is clearly back at baseline.
   */
  private debounce(index: number, fraction: number, threshold: number, now: number): SlotState {
    const runtime = this.runtimeFor(index);
    const releaseThreshold = threshold * RELEASE_FACTOR;
    let rawCooldown = fraction >= threshold;

    if (runtime.wasCooldown) {
      rawCooldown = rawCooldown || fraction >= releaseThreshold;
      if (rawCooldown) {
        runtime.releaseStartedAt = null;
      } else if (fraction < releaseThreshold * 0.5) {
        runtime.releaseStartedAt = null;
      } else {
        if (runtime.releaseStartedAt === null) {
          runtime.releaseStartedAt = now;
        }
        if (now - runtime.releaseStartedAt < this.config.cooldownReleaseConfirmMs) {
          rawCooldown = true;
        } else {
          runtime.releaseStartedAt = null;
        }
      }
    } else {
      runtime.releaseStartedAt = null;
    }

    let pending = false;
    if (rawCooldown) {
      if (runtime.cooldownStartedAt === null) {
        runtime.cooldownStartedAt = now;
      }
      pending =
        !runtime.wasCooldown &&
        this.config.cooldownMinDurationMs > 0 &&
        now - runtime.cooldownStartedAt < this.config.cooldownMinDurationMs;
    } else {
      runtime.cooldownStartedAt = null;
    }

    const state: SlotState = rawCooldown && !pending ? "on_cooldown" : pending ? "gcd" : "ready";
    runtime.wasCooldown = rawCooldown ? runtime.wasCooldown || state === "on_cooldown" : false;
    return state;
  }

  private cropSlot(frame: Frame, region: SlotRegion, origin: FrameOrigin): Frame {
    return cropFrame(frame, applySlotPadding(region, this.config.slotPadding), origin.x, origin.y);
  }

  private runtimeFor(index: number): SlotRuntime {
    let runtime = this.runtime.get(index);
    if (!runtime) {
      runtime = freshRuntime();
      this.runtime.set(index, runtime);
    }
    return runtime;
  }

  private resetRuntime(): void {
    this.runtime = new Map();
    for (const extension of this.extensions) {
      extension.reset?.();
    }
  }

  private recomputeLayout(): void {
    this.regions = computeSlotLayout(this.config.boundingBox, {
      slotCount: this.config.slotCount,
      gapPixels: this.config.slotGapPixels,
      padding: this.config.slotPadding
    });
  }
}

function buildSnapshot(
  index: number,
  state: SlotState,
  fraction: number,
  glow: GlowSignal,
  castProgress: number | null,
  castEndsAt: number | null,
  timestamp: number
): SlotSnapshot {
  return Object.freeze({
    index,
    state,
    darkenedFraction: fraction,
    cooldownRemaining: null,
    castProgress,
    castEndsAt,
    timestamp,
    ...glow
  });
}
