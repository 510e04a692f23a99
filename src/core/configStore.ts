import {
  AppConfig,
  AppConfigPatch,
  DEFAULT_CONFIG_PATH,
  loadAppConfig,
  mergePatch,
  updateAppConfig,
  validateAppConfig
} from "./config";
import { formatFields, logInfo, logWarn } from "./logger";

export type ConfigListener = (config: AppConfig, previous: AppConfig) => void;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Holds the current config as a frozen snapshot. Updates are validated,
 * persisted when the store has a file, then swapped in as a whole.
 */
export class ConfigStore {
  private current: AppConfig;
  private readonly listeners = new Set<ConfigListener>();

  constructor(
    initial: AppConfig,
    private readonly configPath: string | null = null
  ) {
    this.current = deepFreeze(validateAppConfig(initial));
  }

  static load(configPath = DEFAULT_CONFIG_PATH): ConfigStore {
    return new ConfigStore(loadAppConfig(configPath), configPath);
  }

  get(): AppConfig {
    return this.current;
  }

  subscribe(listener: ConfigListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(patch: AppConfigPatch): AppConfig {
    const next = this.configPath
      ? updateAppConfig(patch, this.configPath)
      : validateAppConfig(mergePatch(this.current, patch));
    this.swap(next);
    return this.current;
  }

  /** Returns false, leaving the config untouched, when no profile has that id. */
  setActiveProfile(profileId: string): boolean {
    const id = profileId.trim().toLowerCase();
    if (!this.current.profiles.some((profile) => profile.id === id)) {
      logWarn(`Unknown profile ${formatFields({ profile: id || null })}`);
      return false;
    }
    if (this.current.active_profile_id === id) {
      return true;
    }
    this.update({ active_profile_id: id });
    logInfo(`Active profile ${formatFields({ profile: id })}`);
    return true;
  }

  private swap(next: AppConfig): void {
    const previous = this.current;
    this.current = deepFreeze(next);
    for (const listener of this.listeners) {
      listener(this.current, previous);
    }
  }
}
