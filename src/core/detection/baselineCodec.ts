import { GrayImage } from "../../shared/types";

/** Serialized gray raster: `shape` is `[height, width]`, `data` base64 of the row-major bytes. */
export interface EncodedGrayImage {
  shape: [number, number];
  data: string;
}

export function encodeGrayImage(image: GrayImage): EncodedGrayImage {
  return {
    shape: [image.height, image.width],
    data: Buffer.from(image.data).toString("base64")
  };
}

export function decodeGrayImage(value: unknown): GrayImage | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  const shape: unknown = Reflect.get(value, "shape");
  const data: unknown = Reflect.get(value, "data");
  if (!Array.isArray(shape) || shape.length !== 2 || typeof data !== "string" || data.trim() === "") {
    return null;
  }
  const [height, width]: unknown[] = shape;
  if (!isPositiveInteger(height) || !isPositiveInteger(width)) {
    return null;
  }
  const bytes = Buffer.from(data, "base64");
  if (bytes.length !== height * width) {
    return null;
  }
  return { width, height, data: new Uint8Array(bytes) };
}

export function encodeBaselines(baselines: ReadonlyMap<number, GrayImage>): Record<string, EncodedGrayImage> {
  const encoded: Record<string, EncodedGrayImage> = {};
  for (const [index, image] of [...baselines.entries()].sort((left, right) => left[0] - right[0])) {
    encoded[String(index)] = encodeGrayImage(image);
  }
  return encoded;
}

/** Entries with a non-numeric key or an undecodable raster are skipped. */
export function decodeBaselines(raw: Readonly<Record<string, unknown>>): Map<number, GrayImage> {
  const decoded = new Map<number, GrayImage>();
  for (const [key, value] of Object.entries(raw)) {
    const index = Number(key);
    if (!Number.isInteger(index) || index < 0) {
      continue;
    }
    const image = decodeGrayImage(value);
    if (image) {
      decoded.set(index, image);
    }
  }
  return decoded;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}
