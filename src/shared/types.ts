export type SlotState =
  | "ready"
  | "on_cooldown"
  | "casting"
  | "channeling"
  | "locked"
  | "gcd"
  | "unknown";

export interface BoundingBox {
  top: number;
  left: number;
  width: number;
  height: number;
}

/** Slot rectangle relative to the captured bounding box, before padding. */
export interface SlotRegion {
  index: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SlotLayoutParams {
  slotCount: number;
  gapPixels: number;
  padding: number;
}

/** Packed BGR pixels, 3 bytes per pixel, row-major. */
export interface Frame {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Single-channel raster, one byte per pixel, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface GlowSignal {
  glowCandidate: boolean;
  glowFraction: number;
  glowReady: boolean;
  yellowGlowCandidate: boolean;
  yellowGlowFraction: number;
  yellowGlowReady: boolean;
  redGlowCandidate: boolean;
  redGlowFraction: number;
  redGlowReady: boolean;
}

export interface SlotSnapshot extends GlowSignal {
  index: number;
  state: SlotState;
  darkenedFraction: number;
  cooldownRemaining: number | null;
  castProgress: number | null;
  castEndsAt: number | null;
  timestamp: number;
}

export interface ActionBarState {
  slots: readonly SlotSnapshot[];
  timestamp: number;
  castActive: boolean;
  castEndsAt: number | null;
}

export type ActivationRule = "always" | "dot_refresh" | "require_glow";

export type ReadySource = "slot" | "always" | "buff_present" | "buff_missing";

export interface SlotPriorityItem {
  type: "slot";
  slotIndex: number;
  activationRule: ActivationRule;
  readySource: ReadySource;
  buffRoiId?: string;
}

export interface ManualPriorityItem {
  type: "manual";
  actionId: string;
  readySource: ReadySource;
  buffRoiId?: string;
}

export type PriorityItem = SlotPriorityItem | ManualPriorityItem;

export interface ManualAction {
  id: string;
  name: string;
  keybind: string;
}

export type BuffRoiStatus = "ok" | "off" | "invalid-roi" | "uncalibrated" | "out-of-frame";

export interface BuffRoiState {
  id: string;
  name: string;
  calibrated: boolean;
  present: boolean;
  status: BuffRoiStatus;
  similarity: number;
  candidateFrames: number;
  redGlowFraction: number;
  redGlowReady: boolean;
}

export type BuffStateTable = Readonly<Record<string, BuffRoiState>>;

export interface Profile {
  id: string;
  name: string;
  priorityItems: readonly PriorityItem[];
  manualActions: readonly ManualAction[];
  toggleBind: string;
  singleFireBind: string;
}

export type QueueSource = "whitelist" | "tracked";

export interface QueueEntry {
  key: string;
  slotIndex: number | null;
  source: QueueSource;
  createdAt: number;
}

export type DispatchResult =
  | { action: "none" }
  | {
      action: "blocked";
      reason: "casting";
      slotIndex: number;
      castEndsAt: number | null;
    }
  | {
      action: "blocked";
      reason: "window";
      bind: string;
      displayName: string;
      itemType: PriorityItem["type"];
      slotIndex: number | null;
    }
  | {
      action: "sent";
      bind: string;
      displayName: string;
      itemType: PriorityItem["type"] | "queued";
      slotIndex: number | null;
      timestamp: number;
      queued: boolean;
    };

/** Row shape handed to presentation consumers each cycle. */
export interface SlotView {
  index: number;
  state: SlotState;
  keybind: string | null;
  displayName: string;
  cooldownRemaining: number | null;
  brightness: number;
}
