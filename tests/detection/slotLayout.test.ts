import { describe, expect, it } from "vitest";
import { applySlotPadding, computeSlotLayout, layoutParamsChanged } from "../../src/core/detection/slotLayout";

function overlaps(a: { x: number; width: number }, b: { x: number; width: number }): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width;
}

describe("computeSlotLayout", () => {
  it("splits the box into equal columns separated by the gap", () => {
    const regions = computeSlotLayout({ width: 400, height: 50 }, { slotCount: 10, gapPixels: 2, padding: 3 });
    expect(regions).toHaveLength(10);
    expect(regions[0]).toEqual({ index: 0, x: 0, y: 0, width: 38, height: 50 });
    expect(regions[9]).toEqual({ index: 9, x: 360, y: 0, width: 38, height: 50 });
  });

  it("returns no regions for a zero slot count", () => {
    expect(computeSlotLayout({ width: 400, height: 50 }, { slotCount: 0, gapPixels: 2, padding: 0 })).toEqual([]);
  });

  it("keeps regions disjoint and inside the box", () => {
    const cases = [
      { width: 400, height: 50, slotCount: 10, gapPixels: 2 },
      { width: 97, height: 20, slotCount: 7, gapPixels: 3 },
      { width: 12, height: 12, slotCount: 12, gapPixels: 0 },
      { width: 640, height: 64, slotCount: 12, gapPixels: 17 }
    ];
    for (const { width, height, slotCount, gapPixels } of cases) {
      const regions = computeSlotLayout({ width, height }, { slotCount, gapPixels, padding: 0 });
      expect(regions).toHaveLength(slotCount);
      for (const region of regions) {
        expect(region.x).toBeGreaterThanOrEqual(0);
        expect(region.x + region.width).toBeLessThanOrEqual(width);
        expect(region.height).toBeLessThanOrEqual(height);
      }
      for (let i = 0; i < regions.length; i += 1) {
        for (let j = i + 1; j < regions.length; j += 1) {
          expect(overlaps(regions[i], regions[j])).toBe(false);
        }
      }
    }
  });
});

describe("applySlotPadding", () => {
  it("insets the region on every side", () => {
    expect(applySlotPadding({ index: 2, x: 80, y: 0, width: 38, height: 50 }, 3)).toEqual({
      index: 2,
      x: 83,
      y: 3,
      width: 32,
      height: 44
    });
  });

  it("never shrinks a region below one pixel", () => {
    const padded = applySlotPadding({ index: 0, x: 0, y: 0, width: 4, height: 4 }, 5);
    expect(padded.width).toBe(1);
    expect(padded.height).toBe(1);
  });
});

describe("layoutParamsChanged", () => {
  it("compares count, gap and padding", () => {
    const base = { slotCount: 10, gapPixels: 2, padding: 3 };
    expect(layoutParamsChanged(base, { ...base })).toBe(false);
    expect(layoutParamsChanged(base, { ...base, padding: 4 })).toBe(true);
  });
});
