export * from "./shared/types";
export { DEFAULT_CONFIG, GLOW_HUE_BANDS } from "./shared/defaults";
export { ConfigError, loadAppConfig, saveAppConfig, updateAppConfig, validateAppConfig } from "./core/config";
export type { AppConfig, AppConfigPatch } from "./core/config";
export { ConfigStore } from "./core/configStore";
export { createRuntime, Runtime } from "./core/runtime";
export type { RuntimeCallbacks, RuntimeOptions } from "./core/runtime";
export { getActiveProfile, resolveHotkeyAction } from "./core/profiles";
export type { HotkeyAction } from "./core/profiles";
export {
  formatBindForDisplay,
  isMouseBind,
  normalizeBind,
  normalizeBindFromParts,
  normalizeKeyToken,
  parseBind
} from "./core/input/binds";
export { applySlotPadding, computeSlotLayout } from "./core/detection/slotLayout";
export { ReadinessDetector } from "./core/detection/readinessDetector";
export { BuffTracker } from "./core/detection/buffTracker";
export { CastLockExtension } from "./core/detection/castLock";
export type { CastSignal } from "./core/detection/castLock";
export type { SlotRefinement, SlotRefineInput, SlotStateExtension } from "./core/detection/detectionTypes";
export { selectNextAction } from "./core/automation/priorityRules";
export type { EvaluationInput, PrioritySelection } from "./core/automation/priorityRules";
export { KeyDispatchEngine } from "./core/automation/dispatchEngine";
export type { DispatchInput, DispatchSettings } from "./core/automation/dispatchEngine";
export { loadKeySender, UiohookKeySender } from "./core/automation/keySender";
export type { KeySender, KeyTapper } from "./core/automation/keySender";
export { SpellQueueListener } from "./core/input/spellQueue";
export type { SpellQueueSettings } from "./core/input/spellQueue";
export type { KeyEvent, KeyHook } from "./core/input/keyHook";
export { PowerShellWindowProbe } from "./core/perception/foregroundWindow";
export type { WindowProbe } from "./core/perception/foregroundWindow";
export { PowerShellFrameSource } from "./core/perception/frameSource";
export type { FrameSource } from "./core/perception/frameSource";
export { CaptureLoop } from "./core/perception/captureLoop";
export type { CaptureLoopCallbacks } from "./core/perception/captureLoop";
