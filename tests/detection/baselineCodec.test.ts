import { describe, expect, it } from "vitest";
import { decodeBaselines, decodeGrayImage, encodeBaselines, encodeGrayImage } from "../../src/core/detection/baselineCodec";

const image = { width: 2, height: 3, data: Uint8Array.from([0, 1, 2, 3, 4, 5]) };

describe("baseline codec", () => {
  it("encodes shape as height, width and the bytes as base64", () => {
    expect(encodeGrayImage(image)).toEqual({ shape: [3, 2], data: "AAECAwQF" });
  });

  it("decodes what it encoded", () => {
    const decoded = decodeGrayImage(encodeGrayImage(image));
    expect(decoded?.width).toBe(2);
    expect(decoded?.height).toBe(3);
    expect([...(decoded?.data ?? [])]).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("rejects malformed values", () => {
    expect(decodeGrayImage(null)).toBeNull();
    expect(decodeGrayImage({ shape: [3], data: "AAECAwQF" })).toBeNull();
    expect(decodeGrayImage({ shape: [2, 2], data: "AAECAwQF" })).toBeNull();
    expect(decodeGrayImage({ shape: [3, 2], data: "" })).toBeNull();
    expect(decodeGrayImage({ shape: [0, 2], data: "AAECAwQF" })).toBeNull();
  });

  it("maps slot indices to string keys and back, skipping bad entries", () => {
    const encoded = encodeBaselines(new Map([[4, image], [1, image]]));
    expect(Object.keys(encoded)).toEqual(["1", "4"]);
    const decoded = decodeBaselines({ ...encoded, x: encoded["1"], "-2": encoded["1"], "7": { shape: [1, 1] } });
    expect([...decoded.keys()].sort()).toEqual([1, 4]);
  });
});
