import {
  ActionBarState,
  BuffRoiState,
  BuffStateTable,
  ManualAction,
  ManualPriorityItem,
  PriorityItem,
  SlotPriorityItem,
  SlotSnapshot
} from "../../shared/types";
import { formatBindForDisplay, normalizeBind } from "../input/binds";

export interface EvaluationInput {
  state: ActionBarState;
  buffs: BuffStateTable;
  items: readonly PriorityItem[];
  slotKeybinds: readonly string[];
  slotDisplayNames: readonly string[];
  manualActions: readonly ManualAction[];
}

export interface PrioritySelection {
  item: PriorityItem;
  /** 1-based position in the priority list. */
  rank: number;
  bind: string;
  displayName: string;
  slotIndex: number | null;
}

/** DoT refresh: fire with no glow at all, or on red glow; a yellow-only glow holds it back. */
export function dotRefreshEligible(yellowGlowReady: boolean, redGlowReady: boolean): boolean {
  return (!yellowGlowReady && !redGlowReady) || redGlowReady;
}

function isBuffSourced(item: PriorityItem): boolean {
  return item.readySource === "buff_present" || item.readySource === "buff_missing";
}

function buffFor(item: PriorityItem, buffs: BuffStateTable): BuffRoiState | null {
  const id = (item.buffRoiId ?? "").trim().toLowerCase();
  if (!id) {
    return null;
  }
  return buffs[id] ?? null;
}

/** Buff gate: `slot`/`always` pass; buff sources need a calibrated, ok ROI whose presence matches. */
export function buffGatePasses(item: PriorityItem, buffs: BuffStateTable): boolean {
  if (!isBuffSourced(item)) {
    return true;
  }
  const buff = buffFor(item, buffs);
  if (!buff || !buff.calibrated || buff.status !== "ok") {
    return false;
  }
  return item.readySource === "buff_present" ? buff.present : !buff.present;
}

function activationRulePasses(item: SlotPriorityItem, slot: SlotSnapshot): boolean {
  switch (item.activationRule) {
    case "always":
      return true;
    case "dot_refresh":
      return dotRefreshEligible(slot.yellowGlowReady, slot.redGlowReady);
    case "require_glow":
      return slot.glowReady;
  }
}

export function slotItemIsEligible(
  item: SlotPriorityItem,
  slot: SlotSnapshot | null | undefined,
  buffs: BuffStateTable
): boolean {
  if (!slot) {
    return false;
  }
  const slotReady = slot.state === "ready";
  if (!isBuffSourced(item)) {
    return slotReady && activationRulePasses(item, slot);
  }

  const redOverride = item.activationRule === "dot_refresh" && (buffFor(item, buffs)?.redGlowReady ?? false);
  if (!buffGatePasses(item, buffs)) {
    return redOverride && slotReady;
  }
  if (redOverride) {
    return true;
  }
  return slotReady && activationRulePasses(item, slot);
}

export function manualItemIsEligible(item: ManualPriorityItem, buffs: BuffStateTable): boolean {
  return buffGatePasses(item, buffs);
}

export function findManualAction(actions: readonly ManualAction[], actionId: string): ManualAction | null {
  const id = actionId.trim().toLowerCase();
  return actions.find((action) => action.id === id) ?? null;
}

function slotAt(state: ActionBarState, index: number): SlotSnapshot | null {
  if (!Number.isInteger(index) || index < 0 || index >= state.slots.length) {
    return null;
  }
  const slot = state.slots[index];
  return slot.index === index ? slot : state.slots.find((candidate) => candidate.index === index) ?? null;
}

export function slotDisplayName(index: number, names: readonly string[]): string {
  const name = (names[index] ?? "").trim();
  return name || `Slot ${index + 1}`;
}

function resolveItem(item: PriorityItem, rank: number, input: EvaluationInput): PrioritySelection | null {
  if (item.type === "slot") {
    const bind = normalizeBind(input.slotKeybinds[item.slotIndex]);
    if (!bind || !slotItemIsEligible(item, slotAt(input.state, item.slotIndex), input.buffs)) {
      return null;
    }
    return {
      item,
      rank,
      bind,
      displayName: slotDisplayName(item.slotIndex, input.slotDisplayNames),
      slotIndex: item.slotIndex
    };
  }
  const action = findManualAction(input.manualActions, item.actionId);
  const bind = normalizeBind(action?.keybind);
  if (!action || !bind || !manualItemIsEligible(item, input.buffs)) {
    return null;
  }
  return {
    item,
    rank,
    bind,
    displayName: action.name.trim() || formatBindForDisplay(bind),
    slotIndex: null
  };
}

/** First eligible item in rank order, or null. Pure; the same input always yields the same pick. */
export function selectNextAction(input: EvaluationInput): PrioritySelection | null {
  for (let position = 0; position < input.items.length; position += 1) {
    const selection = resolveItem(input.items[position], position + 1, input);
    if (selection) {
      return selection;
    }
  }
  return null;
}

/** Slot indices referenced by the list, in rank order. */
export function rankedSlotIndices(items: readonly PriorityItem[]): number[] {
  const seen = new Set<number>();
  for (const item of items) {
    if (item.type === "slot") {
      seen.add(item.slotIndex);
    }
  }
  return [...seen];
}
