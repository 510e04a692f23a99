import { describe, expect, it } from "vitest";
import { BuffRoiConfig, BuffTracker, percentile, resizeGray, templateSimilarity } from "../../src/core/detection/buffTracker";
import { GrayImage } from "../../src/shared/types";
import { glowConfig, gray, paintRect, paintRing, solidFrame } from "../helpers/frames";

function grayImage(width: number, height: number, fill: (row: number, column: number) => number): GrayImage {
  const data = new Uint8Array(width * height);
  for (let row = 0; row < height; row += 1) {
    for (let column = 0; column < width; column += 1) {
      data[row * width + column] = fill(row, column);
    }
  }
  return { width, height, data };
}

function roiConfig(overrides: Partial<BuffRoiConfig> = {}): BuffRoiConfig {
  return {
    id: "dot",
    name: "Dot",
    enabled: true,
    left: 2,
    top: 2,
    width: 6,
    height: 6,
    matchThreshold: 0.9,
    confirmFrames: 2,
    template: null,
    ...overrides
  };
}

/** ROI rows 2-4 dark, rows 5-7 bright. */
function patternedFrame() {
  return paintRect(solidFrame(10, 10, gray(50)), 2, 5, 6, 3, gray(200));
}

function invertedFrame() {
  return paintRect(solidFrame(10, 10, gray(200)), 2, 5, 6, 3, gray(50));
}

function calibratedTracker(frame = patternedFrame(), overrides: Partial<BuffRoiConfig> = {}): BuffTracker {
  const tracker = new BuffTracker([roiConfig(overrides)], glowConfig());
  const template = tracker.captureTemplate(frame, "dot");
  tracker.updateConfig([roiConfig({ ...overrides, template })], glowConfig());
  return tracker;
}

describe("templateSimilarity", () => {
  it("scores an exact flat match at one", () => {
    const flat = grayImage(20, 20, () => 128);
    expect(templateSimilarity(flat, grayImage(20, 20, () => 128))).toBeGreaterThanOrEqual(0.99);
  });

  it("scores unrelated patterns low", () => {
    const vertical = grayImage(20, 20, (_row, column) => (column >= 10 ? 255 : 0));
    const horizontal = grayImage(20, 20, (row) => (row >= 10 ? 255 : 0));
    expect(templateSimilarity(vertical, horizontal)).toBeCloseTo(0.5, 6);
  });

  it("is zero without a template", () => {
    expect(templateSimilarity(grayImage(2, 2, () => 1), null)).toBe(0);
  });

  it("resizes a template that no longer matches the ROI", () => {
    const small = grayImage(2, 2, (row) => (row === 0 ? 0 : 200));
    const large = grayImage(4, 4, (row) => (row < 2 ? 0 : 200));
    expect(templateSimilarity(large, small)).toBeCloseTo(1, 6);
  });
});

describe("percentile and resizeGray", () => {
  it("interpolates between neighbours", () => {
    expect(percentile([4, 1, 3, 2], 60)).toBeCloseTo(2.8, 9);
    expect(percentile([], 60)).toBe(0);
  });

  it("resamples by nearest neighbour", () => {
    const image = { width: 2, height: 2, data: Uint8Array.from([1, 2, 3, 4]) };
    expect([...resizeGray(image, 4, 4).data]).toEqual([1, 1, 2, 2, 1, 1, 2, 2, 3, 3, 4, 4, 3, 3, 4, 4]);
  });
});

describe("BuffTracker", () => {
  it("reports each non-ok status", () => {
    const template = grayImage(6, 6, () => 50);
    const tracker = new BuffTracker(
      [
        roiConfig({ id: "off", enabled: false, template }),
        roiConfig({ id: "thin", width: 1, template }),
        roiConfig({ id: "blank" }),
        roiConfig({ id: "edge", left: 6, template })
      ],
      glowConfig()
    );
    const states = tracker.analyze(patternedFrame());
    expect(states.off.status).toBe("off");
    expect(states.thin.status).toBe("invalid-roi");
    expect(states.blank.status).toBe("uncalibrated");
    expect(states.blank.calibrated).toBe(false);
    expect(states.edge.status).toBe("out-of-frame");
    expect(states.edge.present).toBe(false);
  });

  it("marks the buff present after the confirm frames", () => {
    const tracker = calibratedTracker();
    const first = tracker.analyze(patternedFrame()).dot;
    expect(first.status).toBe("ok");
    expect(first.calibrated).toBe(true);
    expect(first.candidateFrames).toBe(1);
    expect(first.present).toBe(false);

    const second = tracker.analyze(patternedFrame()).dot;
    expect(second.present).toBe(true);
    expect(second.similarity).toBeGreaterThanOrEqual(0.99);
    expect(tracker.getStates().dot.present).toBe(true);
  });

  it("drops presence as soon as the ROI stops matching", () => {
    const tracker = calibratedTracker();
    tracker.analyze(patternedFrame());
    tracker.analyze(patternedFrame());
    const missing = tracker.analyze(invertedFrame()).dot;
    expect(missing.present).toBe(false);
    expect(missing.candidateFrames).toBe(0);
  });

  it("treats the ROI as out of frame when the origin pushes it past the edge", () => {
    const tracker = calibratedTracker();
    expect(tracker.analyze(patternedFrame(), 5, 0).dot.status).toBe("out-of-frame");
  });

  it("confirms a red glow on the ROI ring", () => {
    const frame = paintRing(solidFrame(10, 10, gray(40)), 2, 6, 2, [0, 0, 255]);
    const tracker = calibratedTracker(frame, { top: 0 });
    const first = tracker.analyze(frame).dot;
    expect(first.redGlowFraction).toBe(1);
    expect(first.redGlowReady).toBe(false);
    expect(tracker.analyze(frame).dot.redGlowReady).toBe(true);
  });

  it("does not capture a template for an unknown or degenerate ROI", () => {
    const tracker = new BuffTracker([roiConfig({ id: "thin", width: 1 })], glowConfig());
    expect(tracker.captureTemplate(patternedFrame(), "thin")).toBeNull();
    expect(tracker.captureTemplate(patternedFrame(), "missing")).toBeNull();
  });
});
