import { AppConfig, BuffRoiFileConfig } from "./config";
import { GLOW_HUE_BANDS } from "../shared/defaults";
import { BoundingBox, GrayImage, Profile } from "../shared/types";
import { DispatchSettings } from "./automation/dispatchEngine";
import { rankedSlotIndices } from "./automation/priorityRules";
import { decodeBaselines, decodeGrayImage } from "./detection/baselineCodec";
import { BuffRoiConfig } from "./detection/buffTracker";
import { DetectorConfig, GlowConfig } from "./detection/detectionTypes";
import { FrameOrigin } from "./detection/readinessDetector";
import { SpellQueueSettings } from "./input/spellQueue";

function bySlot<T>(raw: Readonly<Record<string, T>>): Record<number, T> {
  const result: Record<number, T> = {};
  for (const [slot, value] of Object.entries(raw)) {
    result[Number(slot)] = value;
  }
  return result;
}

export function buildGlowConfig(config: AppConfig): GlowConfig {
  return {
    enabled: config.glow_enabled,
    ringThicknessPx: config.glow_ring_thickness_px,
    valueDelta: config.glow_value_delta,
    valueDeltaBySlot: bySlot(config.glow_value_delta_by_slot),
    saturationMin: config.glow_saturation_min,
    ringFraction: config.glow_ring_fraction,
    ringFractionBySlot: bySlot(config.glow_ring_fraction_by_slot),
    redRingFraction: config.glow_red_ring_fraction,
    confirmFrames: config.glow_confirm_frames,
    ...GLOW_HUE_BANDS
  };
}

export function buildDetectorConfig(config: AppConfig): DetectorConfig {
  return {
    boundingBox: { width: config.bounding_box.width, height: config.bounding_box.height },
    slotCount: config.slot_count,
    slotGapPixels: config.slot_gap_pixels,
    slotPadding: config.slot_padding,
    brightnessDropThreshold: config.brightness_drop_threshold,
    cooldownPixelFraction: config.cooldown_pixel_fraction,
    brightnessDropThresholdBySlot: bySlot(config.brightness_drop_threshold_by_slot),
    cooldownPixelFractionBySlot: bySlot(config.cooldown_pixel_fraction_by_slot),
    cooldownMinDurationMs: config.cooldown_min_duration_ms,
    cooldownReleaseConfirmMs: config.cooldown_release_confirm_ms,
    detectionRegion: config.detection_region,
    detectionRegionBySlot: bySlot(config.detection_region_by_slot),
    glow: buildGlowConfig(config)
  };
}

function toBuffRoiConfig(roi: BuffRoiFileConfig): BuffRoiConfig {
  const template = roi.calibration.present_template;
  return {
    id: roi.id,
    name: roi.name,
    enabled: roi.enabled,
    left: roi.left,
    top: roi.top,
    width: roi.width,
    height: roi.height,
    matchThreshold: roi.match_threshold,
    confirmFrames: roi.confirm_frames,
    template: template ? decodeGrayImage(template) : null
  };
}

export function buildBuffRoiConfigs(config: AppConfig): BuffRoiConfig[] {
  return config.buff_rois.map(toBuffRoiConfig);
}

export function buildDispatchSettings(config: AppConfig): DispatchSettings {
  return {
    minPressIntervalMs: config.min_press_interval_ms,
    queueWindowMs: config.queue_window_ms,
    allowCastWhileCasting: config.allow_cast_while_casting,
    targetWindowTitle: config.target_window_title,
    queueFireDelayMs: config.queue_fire_delay_ms
  };
}

export function buildSpellQueueSettings(config: AppConfig, profile: Profile): SpellQueueSettings {
  return {
    whitelist: config.queue_whitelist,
    timeoutMs: config.queue_timeout_ms,
    slotKeybinds: config.slot_keybinds,
    rankedSlots: rankedSlotIndices(profile.priorityItems)
  };
}

export function buildSlotBaselines(config: AppConfig): Map<number, GrayImage> {
  return decodeBaselines(config.slot_baselines);
}

export interface CaptureArea {
  /** Screen rectangle to grab. */
  region: BoundingBox;
  /** Where the action-bar box sits inside the grabbed frame. */
  origin: FrameOrigin;
}

/**
 * The screen area covering the action bar plus every enabled buff ROI. Buff
 * offsets are relative to the bar, so the grab may extend past it on any side.
 */
export function buildCaptureArea(config: AppConfig): CaptureArea {
  const box = config.bounding_box;
  let minX = 0;
  let minY = 0;
  let maxX = box.width;
  let maxY = box.height;
  for (const roi of config.buff_rois) {
    if (!roi.enabled || roi.width <= 1 || roi.height <= 1) {
      continue;
    }
    minX = Math.min(minX, roi.left);
    minY = Math.min(minY, roi.top);
    maxX = Math.max(maxX, roi.left + roi.width);
    maxY = Math.max(maxY, roi.top + roi.height);
  }
  return {
    region: { left: box.left + minX, top: box.top + minY, width: maxX - minX, height: maxY - minY },
    origin: { x: Math.abs(minX), y: Math.abs(minY) }
  };
}
