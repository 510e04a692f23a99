import { formatFields, logError } from "../logger";

export type UiohookModule = typeof import("uiohook-napi");

let loading: Promise<UiohookModule | null> | null = null;

/** Loads libuiohook once per process; null when the native module cannot load here. */
export function loadUiohook(): Promise<UiohookModule | null> {
  if (!loading) {
    loading = import("uiohook-napi").catch((error: unknown) => {
      logError(`uiohook unavailable ${formatFields({ platform: process.platform })}`, error);
      return null;
    });
  }
  return loading;
}
