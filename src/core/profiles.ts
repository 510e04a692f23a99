import { AppConfig, PriorityItemFileConfig, ProfileFileConfig } from "./config";
import { PriorityItem, Profile } from "../shared/types";
import { normalizeBind } from "./input/binds";

export type HotkeyAction =
  | { kind: "activate-profile"; profileId: string }
  | { kind: "toggle-automation"; profileId: string }
  | { kind: "single-fire"; profileId: string };

function toPriorityItem(item: PriorityItemFileConfig): PriorityItem {
  if (item.type === "slot") {
    return {
      type: "slot",
      slotIndex: item.slot_index,
      activationRule: item.activation_rule,
      readySource: item.ready_source,
      buffRoiId: item.buff_roi_id || undefined
    };
  }
  return {
    type: "manual",
    actionId: item.action_id,
    readySource: item.ready_source,
    buffRoiId: item.buff_roi_id || undefined
  };
}

export function toProfile(profile: ProfileFileConfig): Profile {
  return Object.freeze({
    id: profile.id,
    name: profile.name,
    priorityItems: Object.freeze(profile.priority_items.map(toPriorityItem)),
    manualActions: Object.freeze(profile.manual_actions.map((action) => ({ ...action }))),
    toggleBind: profile.toggle_bind,
    singleFireBind: profile.single_fire_bind
  });
}

/** The active profile; validation guarantees `active_profile_id` names one. */
export function getActiveProfile(config: AppConfig): Profile {
  const match = config.profiles.find((profile) => profile.id === config.active_profile_id) ?? config.profiles[0];
  return toProfile(match);
}

export function collectProfileBinds(config: AppConfig): string[] {
  const binds: string[] = [];
  for (const profile of config.profiles) {
    binds.push(profile.toggle_bind, profile.single_fire_bind);
  }
  return binds.filter((bind) => bind !== "");
}

/**
 * What a pressed profile hotkey means. A toggle bind switches to its profile,
 * or flips automation when that profile is already active; a single-fire
 * bind switches to its profile and arms one send.
 */
export function resolveHotkeyAction(config: AppConfig, bind: string): HotkeyAction | null {
  const normalized = normalizeBind(bind);
  if (!normalized) {
    return null;
  }
  for (const profile of config.profiles) {
    if (profile.single_fire_bind === normalized) {
      return { kind: "single-fire", profileId: profile.id };
    }
    if (profile.toggle_bind === normalized) {
      return profile.id === config.active_profile_id
        ? { kind: "toggle-automation", profileId: profile.id }
        : { kind: "activate-profile", profileId: profile.id };
    }
  }
  return null;
}
