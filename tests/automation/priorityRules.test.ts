import { describe, expect, it } from "vitest";
import {
  buffGatePasses,
  dotRefreshEligible,
  EvaluationInput,
  manualItemIsEligible,
  rankedSlotIndices,
  selectNextAction,
  slotDisplayName,
  slotItemIsEligible
} from "../../src/core/automation/priorityRules";
import { ManualPriorityItem, SlotPriorityItem } from "../../src/shared/types";
import { barState, buffState, slot } from "../helpers/state";

function slotItem(slotIndex: number, overrides: Partial<SlotPriorityItem> = {}): SlotPriorityItem {
  return { type: "slot", slotIndex, activationRule: "always", readySource: "slot", ...overrides };
}

function manualItem(actionId: string, overrides: Partial<ManualPriorityItem> = {}): ManualPriorityItem {
  return { type: "manual", actionId, readySource: "always", ...overrides };
}

function input(overrides: Partial<EvaluationInput>): EvaluationInput {
  return {
    state: barState(["ready", "ready", "ready", "ready"]),
    buffs: {},
    items: [],
    slotKeybinds: ["1", "2", "3", "4"],
    slotDisplayNames: [],
    manualActions: [],
    ...overrides
  };
}

const dotItem = slotItem(0, { activationRule: "dot_refresh", readySource: "buff_missing", buffRoiId: "dot1" });

describe("dotRefreshEligible", () => {
  it("holds back only a yellow-only glow", () => {
    expect(dotRefreshEligible(false, false)).toBe(true);
    expect(dotRefreshEligible(true, false)).toBe(false);
    expect(dotRefreshEligible(false, true)).toBe(true);
    expect(dotRefreshEligible(true, true)).toBe(true);
  });
});

describe("buffGatePasses", () => {
  it("passes slot and always sources without any buff state", () => {
    expect(buffGatePasses(slotItem(0), {})).toBe(true);
    expect(buffGatePasses(manualItem("pot"), {})).toBe(true);
  });

  it("needs a calibrated ok ROI whose presence matches", () => {
    const present = manualItem("pot", { readySource: "buff_present", buffRoiId: "dot1" });
    expect(buffGatePasses(present, { dot1: buffState("dot1", { present: true }) })).toBe(true);
    expect(buffGatePasses(present, { dot1: buffState("dot1", { present: false }) })).toBe(false);
    expect(buffGatePasses(present, { dot1: buffState("dot1", { present: true, calibrated: false }) })).toBe(false);
    expect(buffGatePasses(present, { dot1: buffState("dot1", { present: true, status: "out-of-frame" }) })).toBe(false);
    expect(buffGatePasses(present, {})).toBe(false);
  });

  it("matches the ROI id case-insensitively", () => {
    const missing = manualItem("pot", { readySource: "buff_missing", buffRoiId: " DOT1 " });
    expect(buffGatePasses(missing, { dot1: buffState("dot1") })).toBe(true);
  });
});

describe("manualItemIsEligible", () => {
  it("follows the buff gate alone", () => {
    expect(manualItemIsEligible(manualItem("pot"), {})).toBe(true);
    const missing = manualItem("pot", { readySource: "buff_missing", buffRoiId: "dot1" });
    expect(manualItemIsEligible(missing, { dot1: buffState("dot1") })).toBe(true);
    expect(manualItemIsEligible(missing, { dot1: buffState("dot1", { status: "uncalibrated", calibrated: false }) })).toBe(
      false
    );
  });
});

describe("slotItemIsEligible", () => {
  it("rejects a red buff glow on a slot still on cooldown when the buff gate fails", () => {
    const buffs = { dot1: buffState("dot1", { present: true, redGlowReady: true }) };
    expect(slotItemIsEligible(dotItem, slot(0, "on_cooldown", { redGlowReady: true }), buffs)).toBe(false);
  });

  it("accepts a red buff glow on a ready slot even though the buff is present", () => {
    const buffs = { dot1: buffState("dot1", { present: true, redGlowReady: true }) };
    expect(slotItemIsEligible(dotItem, slot(0, "ready"), buffs)).toBe(true);
  });

  it("stays blocked without a red glow while the buff is present", () => {
    const buffs = { dot1: buffState("dot1", { present: true }) };
    expect(slotItemIsEligible(dotItem, slot(0, "ready"), buffs)).toBe(false);
  });

  it("lets a red buff glow override the slot state once the gate passes", () => {
    const buffs = { dot1: buffState("dot1", { present: false, redGlowReady: true }) };
    expect(slotItemIsEligible(dotItem, slot(0, "on_cooldown"), buffs)).toBe(true);
  });

  it("requires the slot to be ready when the gate passes without a red glow", () => {
    const buffs = { dot1: buffState("dot1") };
    expect(slotItemIsEligible(dotItem, slot(0, "on_cooldown"), buffs)).toBe(false);
    expect(slotItemIsEligible(dotItem, slot(0, "ready"), buffs)).toBe(true);
  });

  it("never applies the red override to the always rule", () => {
    const item = slotItem(0, { readySource: "buff_missing", buffRoiId: "dot1" });
    const buffs = { dot1: buffState("dot1", { present: true, redGlowReady: true }) };
    expect(slotItemIsEligible(item, slot(0, "ready"), buffs)).toBe(false);
  });

  it("rejects buff-gated slots whose ROI is not ok", () => {
    const item = slotItem(0, { readySource: "buff_missing", buffRoiId: "dot1" });
    const buffs = { dot1: buffState("dot1", { status: "out-of-frame" }) };
    expect(slotItemIsEligible(item, slot(0, "ready"), buffs)).toBe(false);
  });

  it("holds a slot-sourced dot refresh back on a yellow-only glow", () => {
    const item = slotItem(0, { activationRule: "dot_refresh" });
    expect(slotItemIsEligible(item, slot(0, "ready", { yellowGlowReady: true }), {})).toBe(false);
    expect(slotItemIsEligible(item, slot(0, "ready", { yellowGlowReady: true, redGlowReady: true }), {})).toBe(true);
  });

  it("needs both ready and a confirmed glow for require_glow", () => {
    const item = slotItem(0, { activationRule: "require_glow" });
    expect(slotItemIsEligible(item, slot(0, "ready", { glowReady: true }), {})).toBe(true);
    expect(slotItemIsEligible(item, slot(0, "ready"), {})).toBe(false);
    expect(slotItemIsEligible(item, slot(0, "on_cooldown", { glowReady: true }), {})).toBe(false);
  });

  it("rejects a missing snapshot", () => {
    expect(slotItemIsEligible(slotItem(0), null, {})).toBe(false);
  });
});

describe("selectNextAction", () => {
  it("skips a slot on cooldown and picks the next ready one", () => {
    const selection = selectNextAction(
      input({
        state: barState(["on_cooldown", "ready", "ready", "ready"]),
        items: [slotItem(0), slotItem(1)]
      })
    );
    expect(selection).toMatchObject({ rank: 2, bind: "2", displayName: "Slot 2", slotIndex: 1 });
  });

  it("returns null when nothing is eligible", () => {
    expect(
      selectNextAction(input({ state: barState(["on_cooldown", "unknown", "ready", "ready"]), items: [slotItem(0), slotItem(1)] }))
    ).toBeNull();
    expect(selectNextAction(input({ items: [] }))).toBeNull();
  });

  it("skips slots without a key bind", () => {
    const selection = selectNextAction(input({ slotKeybinds: ["", "Shift + 2"], items: [slotItem(0), slotItem(1)] }));
    expect(selection?.bind).toBe("shift+2");
    expect(selection?.slotIndex).toBe(1);
  });

  it("uses configured slot names", () => {
    const selection = selectNextAction(input({ slotDisplayNames: ["Fireball"], items: [slotItem(0)] }));
    expect(selection?.displayName).toBe("Fireball");
  });

  it("resolves manual actions by id and falls back to the bind for the name", () => {
    const selection = selectNextAction(
      input({
        state: barState(["on_cooldown"]),
        items: [slotItem(0), manualItem("Pot")],
        manualActions: [{ id: "pot", name: "", keybind: "Shift+Q" }]
      })
    );
    expect(selection).toMatchObject({ rank: 2, bind: "shift+q", displayName: "Shift+Q", slotIndex: null });
    expect(selection?.item.type).toBe("manual");
  });

  it("skips manual items whose action is unknown", () => {
    expect(selectNextAction(input({ items: [manualItem("missing")] }))).toBeNull();
  });

  it("returns the same pick for the same input", () => {
    const evaluation = input({ items: [slotItem(2), slotItem(0)] });
    expect(selectNextAction(evaluation)).toEqual(selectNextAction(evaluation));
  });
});

describe("rankedSlotIndices", () => {
  it("lists referenced slots once, in rank order", () => {
    expect(rankedSlotIndices([slotItem(2), manualItem("pot"), slotItem(0), slotItem(2)])).toEqual([2, 0]);
  });
});

describe("slotDisplayName", () => {
  it("falls back to a 1-based label for blank names", () => {
    expect(slotDisplayName(0, ["  "])).toBe("Slot 1");
    expect(slotDisplayName(1, ["a", " Frost "])).toBe("Frost");
  });
});
