import { existsSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { formatFields, logError, logInfo, logWarn } from "./logger";
import { DEFAULT_CONFIG, DEFAULT_PROFILE_ID } from "../shared/defaults";
import { ActivationRule, BoundingBox, ReadySource } from "../shared/types";
import { DetectionRegion } from "./detection/detectionTypes";
import { EncodedGrayImage, decodeGrayImage, encodeGrayImage } from "./detection/baselineCodec";
import { normalizeBind } from "./input/binds";

export interface BuffRoiFileConfig {
  id: string;
  name: string;
  enabled: boolean;
  left: number;
  top: number;
  width: number;
  height: number;
  match_threshold: number;
  confirm_frames: number;
  calibration: {
    present_template: EncodedGrayImage | null;
  };
}

export type PriorityItemFileConfig =
  | {
      type: "slot";
      slot_index: number;
      activation_rule: ActivationRule;
      ready_source: ReadySource;
      buff_roi_id: string;
    }
  | {
      type: "manual";
      action_id: string;
      ready_source: ReadySource;
      buff_roi_id: string;
    };

export interface ManualActionFileConfig {
  id: string;
  name: string;
  keybind: string;
}

export interface ProfileFileConfig {
  id: string;
  name: string;
  priority_items: PriorityItemFileConfig[];
  manual_actions: ManualActionFileConfig[];
  toggle_bind: string;
  single_fire_bind: string;
}

export interface AppConfig {
  monitor_index: number;
  bounding_box: BoundingBox;
  slot_count: number;
  slot_gap_pixels: number;
  slot_padding: number;
  slot_keybinds: string[];
  slot_display_names: string[];
  polling_fps: number;
  brightness_drop_threshold: number;
  cooldown_pixel_fraction: number;
  brightness_drop_threshold_by_slot: Record<string, number>;
  cooldown_pixel_fraction_by_slot: Record<string, number>;
  cooldown_min_duration_ms: number;
  cooldown_release_confirm_ms: number;
  detection_region: DetectionRegion;
  detection_region_by_slot: Record<string, DetectionRegion>;
  glow_enabled: boolean;
  glow_ring_thickness_px: number;
  glow_value_delta: number;
  glow_value_delta_by_slot: Record<string, number>;
  glow_saturation_min: number;
  glow_ring_fraction: number;
  glow_ring_fraction_by_slot: Record<string, number>;
  glow_red_ring_fraction: number;
  glow_confirm_frames: number;
  lock_ready_while_casting: boolean;
  buff_rois: BuffRoiFileConfig[];
  min_press_interval_ms: number;
  queue_window_ms: number;
  allow_cast_while_casting: boolean;
  target_window_title: string;
  profiles: ProfileFileConfig[];
  active_profile_id: string;
  queue_whitelist: string[];
  queue_timeout_ms: number;
  queue_fire_delay_ms: number;
  slot_baselines: Record<string, EncodedGrayImage>;
}

export type AppConfigPatch = Partial<AppConfig>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly key: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

type JsonObject = Record<string, unknown>;

const ACTIVATION_RULES: readonly ActivationRule[] = ["always", "dot_refresh", "require_glow"];
const READY_SOURCES: readonly ReadySource[] = ["slot", "always", "buff_present", "buff_missing"];
const DETECTION_REGIONS: readonly DetectionRegion[] = ["full", "top_left"];

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), "app.config.json");

/** Reads and validates the config file; a missing file yields the defaults. */
export function loadAppConfig(configPath = DEFAULT_CONFIG_PATH): AppConfig {
  if (!existsSync(configPath)) {
    logInfo(`app.config.json not found, using defaults ${formatFields({ path: configPath })}`);
    return validateAppConfig(DEFAULT_CONFIG);
  }
  const parsed = validateAppConfig(parseJson(readFileSync(configPath, "utf8")));
  logInfo(`Config loaded: ${configPath}`);
  return parsed;
}

export function updateAppConfig(patch: AppConfigPatch, configPath = DEFAULT_CONFIG_PATH): AppConfig {
  const next = validateAppConfig(mergePatch(loadAppConfig(configPath), patch));
  saveAppConfig(next, configPath);
  logInfo(`Config updated: ${configPath} ${formatFields({ keys: Object.keys(patch).join(",") })}`);
  return next;
}

/** Shallow merge; keys the patch leaves undefined keep their current value. */
export function mergePatch(current: AppConfig, patch: AppConfigPatch): JsonObject {
  const merged: JsonObject = Object.fromEntries(Object.entries(current));
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

export function saveAppConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): void {
  writeFileSync(configPath, JSON.stringify(config, null, 2), "utf8");
}

function parseJson(raw: string): unknown {
  const normalized = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  try {
    return JSON.parse(normalized);
  } catch (error) {
    const configError = new ConfigError(
      `Invalid app.config.json: ${error instanceof Error ? error.message : String(error)}`,
      "app.config.json"
    );
    logError("Config validation failed", configError);
    throw configError;
  }
}

/**
 * Builds a complete config from untrusted JSON. Missing keys take their
 * defaults; out-of-range values throw `ConfigError`. Malformed priority items
 * and manual actions are dropped with a warning instead.
 */
export function validateAppConfig(raw: unknown): AppConfig {
  if (!isJsonObject(raw)) {
    fail("app.config.json");
  }
  const defaults = DEFAULT_CONFIG;
  const profiles = readProfiles(raw);
  const activeProfileId = readString(raw, "active_profile_id", defaults.active_profile_id).trim().toLowerCase();

  return {
    monitor_index: readNumber(raw, "monitor_index", defaults.monitor_index, 0, 16, true),
    bounding_box: readBoundingBox(raw),
    slot_count: readNumber(raw, "slot_count", defaults.slot_count, 1, 48, true),
    slot_gap_pixels: readNumber(raw, "slot_gap_pixels", defaults.slot_gap_pixels, 0, 200, true),
    slot_padding: readNumber(raw, "slot_padding", defaults.slot_padding, 0, 100, true),
    slot_keybinds: readStringList(raw, "slot_keybinds", defaults.slot_keybinds).map((bind) => normalizeBind(bind)),
    slot_display_names: readStringList(raw, "slot_display_names", defaults.slot_display_names).map((name) => name.trim()),
    polling_fps: readNumber(raw, "polling_fps", defaults.polling_fps, 1, 120, true),
    brightness_drop_threshold: readNumber(raw, "brightness_drop_threshold", defaults.brightness_drop_threshold, 0, 255, true),
    cooldown_pixel_fraction: readNumber(raw, "cooldown_pixel_fraction", defaults.cooldown_pixel_fraction, 0, 1, false),
    brightness_drop_threshold_by_slot: readSlotNumberMap(raw, "brightness_drop_threshold_by_slot", 0, 255, true),
    cooldown_pixel_fraction_by_slot: readSlotNumberMap(raw, "cooldown_pixel_fraction_by_slot", 0, 1, false),
    cooldown_min_duration_ms: readNumber(raw, "cooldown_min_duration_ms", defaults.cooldown_min_duration_ms, 0, 60000, true),
    cooldown_release_confirm_ms: readNumber(
      raw,
      "cooldown_release_confirm_ms",
      defaults.cooldown_release_confirm_ms,
      0,
      10000,
      true
    ),
    detection_region: readDetectionRegion(raw.detection_region, "detection_region", defaults.detection_region),
    detection_region_by_slot: readDetectionRegionMap(raw),
    glow_enabled: readBoolean(raw, "glow_enabled", defaults.glow_enabled),
    glow_ring_thickness_px: readNumber(raw, "glow_ring_thickness_px", defaults.glow_ring_thickness_px, 1, 32, true),
    glow_value_delta: readNumber(raw, "glow_value_delta", defaults.glow_value_delta, 0, 255, true),
    glow_value_delta_by_slot: readSlotNumberMap(raw, "glow_value_delta_by_slot", 0, 255, true),
    glow_saturation_min: readNumber(raw, "glow_saturation_min", defaults.glow_saturation_min, 0, 255, true),
    glow_ring_fraction: readNumber(raw, "glow_ring_fraction", defaults.glow_ring_fraction, 0, 1, false),
    glow_ring_fraction_by_slot: readSlotNumberMap(raw, "glow_ring_fraction_by_slot", 0, 1, false),
    glow_red_ring_fraction: readNumber(raw, "glow_red_ring_fraction", defaults.glow_red_ring_fraction, 0, 1, false),
    glow_confirm_frames: readNumber(raw, "glow_confirm_frames", defaults.glow_confirm_frames, 1, 60, true),
    lock_ready_while_casting: readBoolean(raw, "lock_ready_while_casting", defaults.lock_ready_while_casting),
    buff_rois: readBuffRois(raw),
    min_press_interval_ms: readNumber(raw, "min_press_interval_ms", defaults.min_press_interval_ms, 0, 10000, true),
    queue_window_ms: readNumber(raw, "queue_window_ms", defaults.queue_window_ms, 0, 5000, true),
    allow_cast_while_casting: readBoolean(raw, "allow_cast_while_casting", defaults.allow_cast_while_casting),
    target_window_title: readString(raw, "target_window_title", defaults.target_window_title).trim(),
    profiles,
    active_profile_id: resolveActiveProfileId(profiles, activeProfileId),
    queue_whitelist: readStringList(raw, "queue_whitelist", defaults.queue_whitelist)
      .map((bind) => normalizeBind(bind))
      .filter((bind) => bind !== ""),
    queue_timeout_ms: readNumber(raw, "queue_timeout_ms", defaults.queue_timeout_ms, 100, 60000, true),
    queue_fire_delay_ms: readNumber(raw, "queue_fire_delay_ms", defaults.queue_fire_delay_ms, 0, 2000, true),
    slot_baselines: readSlotBaselines(raw)
  };
}

function fail(key: string): never {
  const error = new ConfigError(`Invalid ${key}`, key);
  logError("Config validation failed", error);
  throw error;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(
  source: JsonObject,
  key: string,
  fallback: number,
  min: number,
  max: number,
  integerOnly: boolean
): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    fail(key);
  }
  if (integerOnly && !Number.isInteger(value)) {
    fail(key);
  }
  if (value < min || value > max) {
    fail(key);
  }
  return value;
}

function readBoolean(source: JsonObject, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    fail(key);
  }
  return value;
}

function readString(source: JsonObject, key: string, fallback: string): string {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    fail(key);
  }
  return value;
}

function readStringList(source: JsonObject, key: string, fallback: readonly string[]): string[] {
  const value = source[key];
  if (value === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(value)) {
    fail(key);
  }
  return value.map((item: unknown) => {
    if (typeof item !== "string") {
      fail(key);
    }
    return item;
  });
}

function readObject(source: JsonObject, key: string): JsonObject {
  const value = source[key];
  if (value === undefined) {
    return {};
  }
  if (!isJsonObject(value)) {
    fail(key);
  }
  return value;
}

function isSlotKey(key: string): boolean {
  return /^\d+$/.test(key);
}

function readSlotNumberMap(
  source: JsonObject,
  key: string,
  min: number,
  max: number,
  integerOnly: boolean
): Record<string, number> {
  const raw = readObject(source, key);
  const result: Record<string, number> = {};
  for (const slot of Object.keys(raw)) {
    if (!isSlotKey(slot)) {
      fail(`${key}.${slot}`);
    }
    result[String(Number(slot))] = readNumber(raw, slot, 0, min, max, integerOnly);
  }
  return result;
}

function readDetectionRegion(value: unknown, key: string, fallback: DetectionRegion): DetectionRegion {
  if (value === undefined) {
    return fallback;
  }
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  const region = DETECTION_REGIONS.find((candidate) => candidate === normalized);
  if (!region) {
    fail(key);
  }
  return region;
}

function readDetectionRegionMap(source: JsonObject): Record<string, DetectionRegion> {
  const key = "detection_region_by_slot";
  const raw = readObject(source, key);
  const result: Record<string, DetectionRegion> = {};
  for (const slot of Object.keys(raw)) {
    if (!isSlotKey(slot)) {
      fail(`${key}.${slot}`);
    }
    result[String(Number(slot))] = readDetectionRegion(raw[slot], `${key}.${slot}`, "full");
  }
  return result;
}

function readBoundingBox(source: JsonObject): BoundingBox {
  const raw = source.bounding_box;
  if (raw === undefined) {
    return { ...DEFAULT_CONFIG.bounding_box };
  }
  if (!isJsonObject(raw)) {
    fail("bounding_box");
  }
  const defaults = DEFAULT_CONFIG.bounding_box;
  return {
    top: readNumber(raw, "top", defaults.top, -100000, 100000, true),
    left: readNumber(raw, "left", defaults.left, -100000, 100000, true),
    width: readNumber(raw, "width", defaults.width, 1, 100000, true),
    height: readNumber(raw, "height", defaults.height, 1, 100000, true)
  };
}

function readBuffRois(source: JsonObject): BuffRoiFileConfig[] {
  const raw = source.buff_rois;
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    fail("buff_rois");
  }
  const seen = new Set<string>();
  return raw.map((item: unknown, position: number) => {
    const key = `buff_rois[${position}]`;
    if (!isJsonObject(item)) {
      fail(key);
    }
    const id = readString(item, "id", "").trim().toLowerCase();
    if (!id || seen.has(id)) {
      fail(`${key}.id`);
    }
    seen.add(id);
    const calibration = readObject(item, "calibration");
    const template = calibration.present_template;
    const decoded = template === undefined || template === null ? null : decodeGrayImage(template);
    if (template !== undefined && template !== null && !decoded) {
      logWarn(`Dropping unreadable buff template ${formatFields({ buff: id })}`);
    }
    return {
      id,
      name: readString(item, "name", "").trim() || id,
      enabled: readBoolean(item, "enabled", true),
      left: readNumber(item, "left", 0, -100000, 100000, true),
      top: readNumber(item, "top", 0, -100000, 100000, true),
      width: readNumber(item, "width", 0, 0, 100000, true),
      height: readNumber(item, "height", 0, 0, 100000, true),
      match_threshold: readNumber(item, "match_threshold", 0.88, 0, 1, false),
      confirm_frames: readNumber(item, "confirm_frames", 2, 1, 60, true),
      calibration: { present_template: decoded ? encodeGrayImage(decoded) : null }
    };
  });
}

function normalizeActivationRule(value: unknown): ActivationRule {
  const rule = typeof value === "string" ? value.trim().toLowerCase() : "";
  return ACTIVATION_RULES.find((candidate) => candidate === rule) ?? "always";
}

function normalizeReadySource(value: unknown, fallback: ReadySource): ReadySource {
  const source = typeof value === "string" ? value.trim().toLowerCase() : "";
  return READY_SOURCES.find((candidate) => candidate === source) ?? fallback;
}

function normalizeId(value: unknown): string {
  return typeof value === "string" ? value.trim().toLowerCase() : "";
}

function readPriorityItem(item: unknown, where: string): PriorityItemFileConfig | null {
  if (!isJsonObject(item)) {
    logWarn(`Dropping priority item ${formatFields({ at: where, reason: "not-an-object" })}`);
    return null;
  }
  const type = normalizeId(item.type);
  const buffRoiId = normalizeId(item.buff_roi_id);
  if (type === "slot") {
    const slotIndex = item.slot_index;
    if (typeof slotIndex !== "number" || !Number.isInteger(slotIndex) || slotIndex < 0) {
      logWarn(`Dropping priority item ${formatFields({ at: where, reason: "bad-slot-index" })}`);
      return null;
    }
    return {
      type: "slot",
      slot_index: slotIndex,
      activation_rule: normalizeActivationRule(item.activation_rule),
      ready_source: normalizeReadySource(item.ready_source, "slot"),
      buff_roi_id: buffRoiId
    };
  }
  if (type === "manual") {
    const actionId = normalizeId(item.action_id);
    if (!actionId) {
      logWarn(`Dropping priority item ${formatFields({ at: where, reason: "missing-action-id" })}`);
      return null;
    }
    return {
      type: "manual",
      action_id: actionId,
      ready_source: normalizeReadySource(item.ready_source, "always"),
      buff_roi_id: buffRoiId
    };
  }
  logWarn(`Dropping priority item ${formatFields({ at: where, reason: "unknown-type" })}`);
  return null;
}

function readManualActions(source: JsonObject, where: string): ManualActionFileConfig[] {
  const raw = source.manual_actions;
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    fail(`${where}.manual_actions`);
  }
  const seen = new Set<string>();
  const actions: ManualActionFileConfig[] = [];
  for (const item of raw) {
    if (!isJsonObject(item)) {
      continue;
    }
    const id = normalizeId(item.id);
    if (!id || seen.has(id)) {
      logWarn(`Dropping manual action ${formatFields({ at: where, id: id || null })}`);
      continue;
    }
    seen.add(id);
    actions.push({
      id,
      name: typeof item.name === "string" ? item.name.trim() : "",
      keybind: normalizeBind(typeof item.keybind === "string" ? item.keybind : "")
    });
  }
  return actions;
}

function readProfiles(source: JsonObject): ProfileFileConfig[] {
  const raw = source.profiles;
  if (raw === undefined) {
    return DEFAULT_CONFIG.profiles.map((profile) => ({ ...profile, priority_items: [], manual_actions: [] }));
  }
  if (!Array.isArray(raw)) {
    fail("profiles");
  }
  const ids = new Set<string>();
  const binds = new Set<string>();
  const profiles = raw.map((item: unknown, position: number): ProfileFileConfig => {
    const where = `profiles[${position}]`;
    if (!isJsonObject(item)) {
      fail(where);
    }
    const id = normalizeId(item.id);
    if (!id || ids.has(id)) {
      fail(`${where}.id`);
    }
    ids.add(id);
    const itemsRaw = item.priority_items ?? [];
    if (!Array.isArray(itemsRaw)) {
      fail(`${where}.priority_items`);
    }
    const priorityItems: PriorityItemFileConfig[] = [];
    itemsRaw.forEach((entry: unknown, index: number) => {
      const parsed = readPriorityItem(entry, `${where}.priority_items[${index}]`);
      if (parsed) {
        priorityItems.push(parsed);
      }
    });
    const toggleBind = normalizeBind(readString(item, "toggle_bind", ""));
    const singleFireBind = normalizeBind(readString(item, "single_fire_bind", ""));
    for (const bind of [toggleBind, singleFireBind]) {
      if (!bind) {
        continue;
      }
      if (binds.has(bind)) {
        fail(`${where}.binds`);
      }
      binds.add(bind);
    }
    return {
      id,
      name: readString(item, "name", "").trim() || id,
      priority_items: priorityItems,
      manual_actions: readManualActions(item, where),
      toggle_bind: toggleBind,
      single_fire_bind: singleFireBind
    };
  });
  if (profiles.length === 0) {
    fail("profiles");
  }
  return profiles;
}

function resolveActiveProfileId(profiles: readonly ProfileFileConfig[], requested: string): string {
  if (profiles.some((profile) => profile.id === requested)) {
    return requested;
  }
  const fallback = profiles[0]?.id ?? DEFAULT_PROFILE_ID;
  logWarn(`Unknown active_profile_id ${formatFields({ requested: requested || null, using: fallback })}`);
  return fallback;
}

function readSlotBaselines(source: JsonObject): Record<string, EncodedGrayImage> {
  const raw = readObject(source, "slot_baselines");
  const result: Record<string, EncodedGrayImage> = {};
  for (const [slot, value] of Object.entries(raw)) {
    const decoded = isSlotKey(slot) ? decodeGrayImage(value) : null;
    if (!decoded) {
      logWarn(`Dropping unreadable slot baseline ${formatFields({ slot })}`);
      continue;
    }
    result[String(Number(slot))] = encodeGrayImage(decoded);
  }
  return result;
}
