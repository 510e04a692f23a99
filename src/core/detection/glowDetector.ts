import { GlowSignal } from "../../shared/types";
import {
  GlowConfig,
  NO_GLOW,
  SlotRefineInput,
  SlotRefinement,
  SlotStateExtension
} from "./detectionTypes";
import { ringMask, sameShape, toHsv } from "./pixels";

interface GlowCounters {
  any: number;
  yellow: number;
  red: number;
}

export interface GlowFractions {
  yellow: number;
  red: number;
}

export function isRedHue(hue: number, config: Pick<GlowConfig, "redHueMaxLow" | "redHueMinHigh">): boolean {
  return hue <= config.redHueMaxLow || hue >= config.redHueMinHigh;
}

export function isYellowHue(hue: number, config: Pick<GlowConfig, "yellowHueMin" | "yellowHueMax">): boolean {
  return hue >= config.yellowHueMin && hue <= config.yellowHueMax;
}

/**
 * Fraction of border-ring pixels that are saturated, noticeably brighter than
 * the ready baseline and in the yellow or red hue band.
 */
export function measureGlowFractions(
  input: Pick<SlotRefineInput, "crop" | "baseline">,
  config: GlowConfig,
  valueDelta: number
): GlowFractions {
  const { crop, baseline } = input;
  if (!sameShape(crop, baseline) || crop.width === 0 || crop.height === 0) {
    return { yellow: 0, red: 0 };
  }
  const ring = ringMask(crop.width, crop.height, config.ringThicknessPx);
  const hsv = toHsv(crop);
  let ringCount = 0;
  let yellow = 0;
  let red = 0;
  for (let index = 0; index < ring.length; index += 1) {
    if (ring[index] === 0) {
      continue;
    }
    ringCount += 1;
    const brightColored =
      hsv.value[index] >= baseline.data[index] + valueDelta && hsv.saturation[index] >= config.saturationMin;
    if (!brightColored) {
      continue;
    }
    const hue = hsv.hue[index];
    if (isYellowHue(hue, config)) {
      yellow += 1;
    }
    if (isRedHue(hue, config)) {
      red += 1;
    }
  }
  if (ringCount === 0) {
    return { yellow: 0, red: 0 };
  }
  return { yellow: yellow / ringCount, red: red / ringCount };
}

export class GlowDetector implements SlotStateExtension {
  readonly name = "glow";
  private counters = new Map<number, GlowCounters>();

  constructor(private config: GlowConfig) {}

  updateConfig(config: GlowConfig): void {
    this.config = config;
    this.counters = new Map();
  }

  reset(index?: number): void {
    if (index === undefined) {
      this.counters = new Map();
      return;
    }
    this.counters.delete(index);
  }

  refine(input: SlotRefineInput): SlotRefinement | null {
    if (!this.config.enabled) {
      return { glow: NO_GLOW };
    }
    const valueDelta = this.config.valueDeltaBySlot[input.index] ?? this.config.valueDelta;
    const ringThreshold = this.config.ringFractionBySlot[input.index] ?? this.config.ringFraction;
    const fractions = measureGlowFractions(input, this.config, valueDelta);

    const yellowCandidate = fractions.yellow >= ringThreshold;
    const redCandidate = fractions.red >= this.config.redRingFraction;
    const anyCandidate = yellowCandidate || redCandidate;

    const counters = this.counters.get(input.index) ?? { any: 0, yellow: 0, red: 0 };
    const next: GlowCounters = {
      any: anyCandidate ? counters.any + 1 : 0,
      yellow: yellowCandidate ? counters.yellow + 1 : 0,
      red: redCandidate ? counters.red + 1 : 0
    };
    this.counters.set(input.index, next);

    const confirm = Math.max(1, this.config.confirmFrames);
    const glow: GlowSignal = {
      glowCandidate: anyCandidate,
      glowFraction: Math.max(fractions.yellow, fractions.red),
      glowReady: next.any >= confirm,
      yellowGlowCandidate: yellowCandidate,
      yellowGlowFraction: fractions.yellow,
      yellowGlowReady: next.yellow >= confirm,
      redGlowCandidate: redCandidate,
      redGlowFraction: fractions.red,
      redGlowReady: next.red >= confirm
    };

    // red glow is the game's "refresh now" cue and outranks the darkening
    if (glow.redGlowReady && input.state === "on_cooldown") {
      return { glow, state: "ready" };
    }
    return { glow };
  }
}
