import { Frame, GlowSignal, GrayImage, SlotState } from "../../shared/types";

export type DetectionRegion = "full" | "top_left";

export interface GlowConfig {
  enabled: boolean;
  ringThicknessPx: number;
  valueDelta: number;
  valueDeltaBySlot: Readonly<Record<number, number>>;
  saturationMin: number;
  ringFraction: number;
  ringFractionBySlot: Readonly<Record<number, number>>;
  redRingFraction: number;
  confirmFrames: number;
  yellowHueMin: number;
  yellowHueMax: number;
  redHueMaxLow: number;
  redHueMinHigh: number;
}

export interface DetectorConfig {
  boundingBox: { width: number; height: number };
  slotCount: number;
  slotGapPixels: number;
  slotPadding: number;
  brightnessDropThreshold: number;
  cooldownPixelFraction: number;
  brightnessDropThresholdBySlot: Readonly<Record<number, number>>;
  cooldownPixelFractionBySlot: Readonly<Record<number, number>>;
  cooldownMinDurationMs: number;
  cooldownReleaseConfirmMs: number;
  detectionRegion: DetectionRegion;
  detectionRegionBySlot: Readonly<Record<number, DetectionRegion>>;
  glow: GlowConfig;
}

export interface SlotRefineInput {
  index: number;
  state: SlotState;
  darkenedFraction: number;
  /** Padded slot crop, BGR. */
  crop: Frame;
  baseline: GrayImage;
  now: number;
}

/** Fields an extension wants to override; anything left out keeps its value. */
export interface SlotRefinement {
  state?: SlotState;
  castProgress?: number | null;
  castEndsAt?: number | null;
  glow?: GlowSignal;
}

/**
 * Per-slot post-classification hook. Extensions run in registration order,
 * each seeing the state produced by the ones before it.
 */
export interface SlotStateExtension {
  readonly name: string;
  refine(input: SlotRefineInput): SlotRefinement | null;
  /** Drops per-slot memory, all slots when `index` is omitted. */
  reset?(index?: number): void;
}

export const NO_GLOW: GlowSignal = Object.freeze({
  glowCandidate: false,
  glowFraction: 0,
  glowReady: false,
  yellowGlowCandidate: false,
  yellowGlowFraction: 0,
  yellowGlowReady: false,
  redGlowCandidate: false,
  redGlowFraction: 0,
  redGlowReady: false
});
