import { formatFields, logInfo } from "../logger";
import { BuffRoiState, BuffRoiStatus, BuffStateTable, Frame, GrayImage } from "../../shared/types";
import { GlowConfig } from "./detectionTypes";
import { isRedHue } from "./glowDetector";
import { cropFrame, meanOf, ringMask, sameShape, toGray, toHsv } from "./pixels";

export interface BuffRoiConfig {
  id: string;
  name: string;
  enabled: boolean;
  /** Offsets relative to the bounding box. */
  left: number;
  top: number;
  width: number;
  height: number;
  matchThreshold: number;
  confirmFrames: number;
  template: GrayImage | null;
}

interface BuffCounters {
  candidate: number;
  redGlow: number;
}

const RED_VALUE_PERCENTILE = 60;
const RED_VALUE_FLOOR = 64;

/** Linear-interpolated percentile, the way numpy computes it by default. */
export function percentile(values: readonly number[], rank: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((left, right) => left - right);
  const position = ((sorted.length - 1) * Math.max(0, Math.min(100, rank))) / 100;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/** Nearest-neighbour resample, used when a stored template no longer matches the ROI size. */
export function resizeGray(image: GrayImage, width: number, height: number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let row = 0; row < height; row += 1) {
    const sourceRow = Math.min(image.height - 1, Math.floor((row * image.height) / height));
    for (let col = 0; col < width; col += 1) {
      const sourceCol = Math.min(image.width - 1, Math.floor((col * image.width) / width));
      data[row * width + col] = image.data[sourceRow * image.width + sourceCol];
    }
  }
  return { width, height, data };
}

/**
 * `min(diffScore, correlationScore)` where diffScore is `1 - meanAbsDiff/255`
 * and correlationScore maps Pearson's r from [-1, 1] onto [0, 1]. Flat images
 * have no defined correlation, so only diffScore applies.
 */
export function templateSimilarity(roi: GrayImage, template: GrayImage | null): number {
  if (!template || template.data.length === 0 || roi.data.length === 0) {
    return 0;
  }
  const reference = sameShape(roi, template) ? template : resizeGray(template, roi.width, roi.height);
  const count = roi.data.length;
  let diffSum = 0;
  for (let index = 0; index < count; index += 1) {
    diffSum += Math.abs(roi.data[index] - reference.data[index]);
  }
  const diffScore = Math.max(0, 1 - diffSum / count / 255);

  const roiMean = meanOf(roi.data);
  const refMean = meanOf(reference.data);
  let covariance = 0;
  let roiVariance = 0;
  let refVariance = 0;
  for (let index = 0; index < count; index += 1) {
    const a = roi.data[index] - roiMean;
    const b = reference.data[index] - refMean;
    covariance += a * b;
    roiVariance += a * a;
    refVariance += b * b;
  }
  if (Math.sqrt(roiVariance / count) < 1e-6 || Math.sqrt(refVariance / count) < 1e-6) {
    return diffScore;
  }
  const correlation = covariance / Math.sqrt(roiVariance * refVariance);
  const correlationScore = Math.max(0, Math.min(1, (correlation + 1) * 0.5));
  return Math.min(diffScore, correlationScore);
}

export class BuffTracker {
  private counters = new Map<string, BuffCounters>();
  private states: BuffStateTable = {};

  constructor(
    private rois: readonly BuffRoiConfig[],
    private glow: GlowConfig
  ) {}

  updateConfig(rois: readonly BuffRoiConfig[], glow: GlowConfig): void {
    this.rois = rois;
    this.glow = glow;
    this.counters = new Map();
    this.states = {};
  }

  getStates(): BuffStateTable {
    return this.states;
  }

  /** Grabs the ROI's current pixels as its "present" template. */
  captureTemplate(frame: Frame, roiId: string, originX = 0, originY = 0): GrayImage | null {
    const roi = this.rois.find((item) => item.id === roiId);
    if (!roi || roi.width <= 1 || roi.height <= 1) {
      return null;
    }
    const gray = toGray(cropFrame(frame, { x: roi.left, y: roi.top, width: roi.width, height: roi.height }, originX, originY));
    if (gray.width !== roi.width || gray.height !== roi.height) {
      return null;
    }
    logInfo(`Buff template captured ${formatFields({ buff: roiId, width: gray.width, height: gray.height })}`);
    return gray;
  }

  analyze(frame: Frame, originX = 0, originY = 0): BuffStateTable {
    const next: Record<string, BuffRoiState> = {};
    for (const roi of this.rois) {
      next[roi.id] = Object.freeze(this.analyzeRoi(frame, roi, originX, originY));
    }
    this.states = Object.freeze(next);
    return this.states;
  }

  private analyzeRoi(frame: Frame, roi: BuffRoiConfig, originX: number, originY: number): BuffRoiState {
    const counters = this.counters.get(roi.id) ?? { candidate: 0, redGlow: 0 };
    const calibrated = roi.template !== null;
    const base = {
      id: roi.id,
      name: roi.name || roi.id,
      calibrated,
      present: false,
      similarity: 0,
      candidateFrames: 0,
      redGlowFraction: 0,
      redGlowReady: false
    };

    const status = roiStatus(roi, frame, originX, originY);
    if (status !== "ok") {
      this.counters.set(roi.id, { candidate: 0, redGlow: 0 });
      return { ...base, status };
    }

    const crop = cropFrame(frame, { x: roi.left, y: roi.top, width: roi.width, height: roi.height }, originX, originY);
    const similarity = templateSimilarity(toGray(crop), roi.template);
    const candidate = similarity >= roi.matchThreshold ? counters.candidate + 1 : 0;

    const redFraction = this.redGlowFraction(crop);
    const redGlow = redFraction >= this.glow.redRingFraction ? counters.redGlow + 1 : 0;
    this.counters.set(roi.id, { candidate, redGlow });

    return {
      ...base,
      status,
      present: candidate >= Math.max(1, roi.confirmFrames),
      similarity,
      candidateFrames: candidate,
      redGlowFraction: redFraction,
      redGlowReady: redGlow >= Math.max(1, this.glow.confirmFrames)
    };
  }

  /** Red-glow pixels on the ROI ring; the value floor adapts to the ring's own brightness. */
  private redGlowFraction(crop: Frame): number {
    const ring = ringMask(crop.width, crop.height, this.glow.ringThicknessPx);
    const hsv = toHsv(crop);
    const ringValues: number[] = [];
    for (let index = 0; index < ring.length; index += 1) {
      if (ring[index] === 1) {
        ringValues.push(hsv.value[index]);
      }
    }
    if (ringValues.length === 0) {
      return 0;
    }
    const valueFloor = Math.max(RED_VALUE_FLOOR, Math.trunc(percentile(ringValues, RED_VALUE_PERCENTILE)));
    let red = 0;
    for (let index = 0; index < ring.length; index += 1) {
      if (
        ring[index] === 1 &&
        isRedHue(hsv.hue[index], this.glow) &&
        hsv.saturation[index] >= this.glow.saturationMin &&
        hsv.value[index] >= valueFloor
      ) {
        red += 1;
      }
    }
    return red / ringValues.length;
  }
}

function roiStatus(roi: BuffRoiConfig, frame: Frame, originX: number, originY: number): BuffRoiStatus {
  if (!roi.enabled) {
    return "off";
  }
  if (roi.width <= 1 || roi.height <= 1) {
    return "invalid-roi";
  }
  if (!roi.template) {
    return "uncalibrated";
  }
  const x1 = originX + roi.left;
  const y1 = originY + roi.top;
  if (x1 < 0 || y1 < 0 || x1 + roi.width > frame.width || y1 + roi.height > frame.height) {
    return "out-of-frame";
  }
  return "ok";
}
