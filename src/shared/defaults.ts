import type { AppConfig } from "../core/config";

export const DEFAULT_PROFILE_ID = "default";

/** Hue bands on the 0..179 scale. */
export const GLOW_HUE_BANDS = {
  yellowHueMin: 18,
  yellowHueMax: 42,
  redHueMaxLow: 12,
  redHueMinHigh: 168
} as const;

export const DEFAULT_CONFIG: AppConfig = {
  monitor_index: 1,
  bounding_box: { top: 900, left: 500, width: 400, height: 50 },
  slot_count: 10,
  slot_gap_pixels: 2,
  slot_padding: 3,
  slot_keybinds: [],
  slot_display_names: [],
  polling_fps: 20,
  brightness_drop_threshold: 40,
  cooldown_pixel_fraction: 0.3,
  brightness_drop_threshold_by_slot: {},
  cooldown_pixel_fraction_by_slot: {},
  cooldown_min_duration_ms: 2000,
  cooldown_release_confirm_ms: 260,
  detection_region: "full",
  detection_region_by_slot: {},
  glow_enabled: true,
  glow_ring_thickness_px: 4,
  glow_value_delta: 35,
  glow_value_delta_by_slot: {},
  glow_saturation_min: 80,
  glow_ring_fraction: 0.18,
  glow_ring_fraction_by_slot: {},
  glow_red_ring_fraction: 0.18,
  glow_confirm_frames: 2,
  lock_ready_while_casting: false,
  buff_rois: [],
  min_press_interval_ms: 150,
  queue_window_ms: 120,
  allow_cast_while_casting: false,
  target_window_title: "",
  profiles: [
    {
      id: DEFAULT_PROFILE_ID,
      name: "Default",
      priority_items: [],
      manual_actions: [],
      toggle_bind: "",
      single_fire_bind: ""
    }
  ],
  active_profile_id: DEFAULT_PROFILE_ID,
  queue_whitelist: [],
  queue_timeout_ms: 5000,
  queue_fire_delay_ms: 100,
  slot_baselines: {}
};
