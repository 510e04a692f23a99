import { Frame, GrayImage, SlotRegion } from "../../shared/types";

export interface HsvImage {
  width: number;
  height: number;
  /** 0..179, half-degree steps. */
  hue: Uint8Array;
  saturation: Uint8Array;
  value: Uint8Array;
}

const EMPTY_GRAY: GrayImage = { width: 0, height: 0, data: new Uint8Array(0) };

export function toGrayValue(blue: number, green: number, red: number): number {
  return Math.round(red * 0.299 + green * 0.587 + blue * 0.114);
}

/**
 * Copies the part of `region` (offset by `origin`) that lies inside the frame.
 * A region hanging off the frame edge yields a smaller crop; one entirely
 * outside yields an empty frame.
 */
export function cropFrame(frame: Frame, region: Omit<SlotRegion, "index">, originX = 0, originY = 0): Frame {
  const x1 = Math.max(0, originX + region.x);
  const y1 = Math.max(0, originY + region.y);
  const x2 = Math.min(frame.width, originX + region.x + region.width);
  const y2 = Math.min(frame.height, originY + region.y + region.height);
  if (x2 <= x1 || y2 <= y1) {
    return { width: 0, height: 0, data: new Uint8Array(0) };
  }
  const width = x2 - x1;
  const height = y2 - y1;
  const data = new Uint8Array(width * height * 3);
  for (let row = 0; row < height; row += 1) {
    const sourceStart = ((y1 + row) * frame.width + x1) * 3;
    data.set(frame.data.subarray(sourceStart, sourceStart + width * 3), row * width * 3);
  }
  return { width, height, data };
}

export function toGray(frame: Frame): GrayImage {
  if (frame.width === 0 || frame.height === 0) {
    return EMPTY_GRAY;
  }
  const pixelCount = frame.width * frame.height;
  const data = new Uint8Array(pixelCount);
  for (let index = 0; index < pixelCount; index += 1) {
    const offset = index * 3;
    data[index] = toGrayValue(frame.data[offset], frame.data[offset + 1], frame.data[offset + 2]);
  }
  return { width: frame.width, height: frame.height, data };
}

/** Top-left quadrant of a gray raster (floor of each half). */
export function topLeftQuadrant(image: GrayImage): GrayImage {
  const width = Math.floor(image.width / 2);
  const height = Math.floor(image.height / 2);
  if (width === 0 || height === 0) {
    return EMPTY_GRAY;
  }
  const data = new Uint8Array(width * height);
  for (let row = 0; row < height; row += 1) {
    data.set(image.data.subarray(row * image.width, row * image.width + width), row * width);
  }
  return { width, height, data };
}

export function sameShape(left: { width: number; height: number }, right: { width: number; height: number }): boolean {
  return left.width === right.width && left.height === right.height;
}

export function toHsv(frame: Frame): HsvImage {
  const pixelCount = frame.width * frame.height;
  const hue = new Uint8Array(pixelCount);
  const saturation = new Uint8Array(pixelCount);
  const value = new Uint8Array(pixelCount);
  for (let index = 0; index < pixelCount; index += 1) {
    const offset = index * 3;
    const blue = frame.data[offset];
    const green = frame.data[offset + 1];
    const red = frame.data[offset + 2];
    const max = Math.max(red, green, blue);
    const min = Math.min(red, green, blue);
    const diff = max - min;
    value[index] = max;
    saturation[index] = max === 0 ? 0 : Math.round((255 * diff) / max);
    if (diff === 0) {
      hue[index] = 0;
      continue;
    }
    let degrees: number;
    if (max === red) {
      degrees = (60 * (green - blue)) / diff;
    } else if (max === green) {
      degrees = 120 + (60 * (blue - red)) / diff;
    } else {
      degrees = 240 + (60 * (red - green)) / diff;
    }
    if (degrees < 0) {
      degrees += 360;
    }
    hue[index] = Math.round(degrees / 2) % 180;
  }
  return { width: frame.width, height: frame.height, hue, saturation, value };
}

const ringMaskCache = new Map<string, Uint8Array>();

/**
 * Border ring of the given thickness, 1 inside the ring. Thickness is capped
 * at a third of the short side; when the ring would swallow the whole image,
 * every pixel counts as ring.
 */
export function ringMask(width: number, height: number, thickness: number): Uint8Array {
  const key = `${width}x${height}:${thickness}`;
  const cached = ringMaskCache.get(key);
  if (cached) {
    return cached;
  }
  const ring = Math.max(1, Math.min(Math.floor(thickness), Math.max(1, Math.floor(Math.min(width, height) / 3))));
  const mask = new Uint8Array(width * height).fill(1);
  if (height > 2 * ring && width > 2 * ring) {
    for (let row = ring; row < height - ring; row += 1) {
      mask.fill(0, row * width + ring, row * width + width - ring);
    }
  }
  ringMaskCache.set(key, mask);
  return mask;
}

export function meanOf(values: ArrayLike<number>): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (let index = 0; index < values.length; index += 1) {
    sum += values[index];
  }
  return sum / values.length;
}

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
