import { describe, expect, it } from "vitest";
import { validateAppConfig } from "../../src/core/config";
import { getActiveProfile } from "../../src/core/profiles";
import {
  buildBuffRoiConfigs,
  buildCaptureArea,
  buildDetectorConfig,
  buildSlotBaselines,
  buildSpellQueueSettings
} from "../../src/core/settings";

const BOX = { left: 500, top: 900, width: 400, height: 50 };

describe("buildCaptureArea", () => {
  it("grabs just the bar without buff ROIs", () => {
    const area = buildCaptureArea(validateAppConfig({ bounding_box: BOX }));
    expect(area).toEqual({ region: BOX, origin: { x: 0, y: 0 } });
  });

  it("grows to cover enabled buff ROIs and offsets the bar inside the frame", () => {
    const area = buildCaptureArea(
      validateAppConfig({
        bounding_box: BOX,
        buff_rois: [
          { id: "dot1", left: -30, top: -40, width: 20, height: 20 },
          { id: "off", enabled: false, left: 1000, top: 0, width: 20, height: 20 },
          { id: "thin", left: 450, top: 0, width: 1, height: 20 }
        ]
      })
    );
    expect(area).toEqual({
      region: { left: 470, top: 860, width: 430, height: 90 },
      origin: { x: 30, y: 40 }
    });
  });

  it("extends right and down for ROIs past the bar", () => {
    const area = buildCaptureArea(
      validateAppConfig({ bounding_box: BOX, buff_rois: [{ id: "dot1", left: 390, top: 45, width: 30, height: 15 }] })
    );
    expect(area).toEqual({
      region: { left: 500, top: 900, width: 420, height: 60 },
      origin: { x: 0, y: 0 }
    });
  });
});

describe("component settings", () => {
  const config = validateAppConfig({
    slot_keybinds: ["1", "2", "3"],
    queue_whitelist: ["r"],
    cooldown_pixel_fraction_by_slot: { "2": 0.5 },
    detection_region_by_slot: { "0": "top_left" },
    buff_rois: [{ id: "dot1", width: 2, height: 1, calibration: { present_template: { shape: [1, 2], data: "AAE=" } } }],
    slot_baselines: { "1": { shape: [1, 2], data: "AAE=" } },
    profiles: [
      {
        id: "main",
        priority_items: [
          { type: "slot", slot_index: 2 },
          { type: "manual", action_id: "pot" },
          { type: "slot", slot_index: 0 }
        ]
      }
    ]
  });

  it("keys per-slot detector overrides by number", () => {
    const detector = buildDetectorConfig(config);
    expect(detector.cooldownPixelFractionBySlot[2]).toBe(0.5);
    expect(detector.detectionRegionBySlot[0]).toBe("top_left");
    expect(detector.boundingBox).toEqual({ width: 400, height: 50 });
  });

  it("decodes buff templates and slot baselines", () => {
    expect(buildBuffRoiConfigs(config)[0].template).toEqual({ width: 2, height: 1, data: Uint8Array.from([0, 1]) });
    const baselines = buildSlotBaselines(config);
    expect([...baselines.keys()]).toEqual([1]);
  });

  it("marks the active list's slots as ranked for the spell queue", () => {
    const settings = buildSpellQueueSettings(config, getActiveProfile(config));
    expect(settings).toEqual({
      whitelist: ["r"],
      timeoutMs: 5000,
      slotKeybinds: ["1", "2", "3"],
      rankedSlots: [2, 0]
    });
  });
});
