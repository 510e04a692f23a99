import { formatFields, logDebug, logInfo, logWarn } from "../logger";
import { QueueEntry } from "../../shared/types";
import { normalizeBind, normalizeKeyToken } from "./binds";
import { HeldKeys, KeyEvent, KeyHook } from "./keyHook";

export interface SpellQueueSettings {
  whitelist: readonly string[];
  timeoutMs: number;
  slotKeybinds: readonly string[];
  /** Slots referenced by the active priority list; their keys never queue. */
  rankedSlots: readonly number[];
}

export type QueueChangeListener = (entry: QueueEntry | null) => void;

const RESERVED_KEYS: ReadonlySet<string> = new Set(["left", "left click", "mouse left"]);

/**
 * Remembers the last manually pressed off-rotation key so the dispatch engine
 * can replay it at the next opening. At most one entry is live; a newer press
 * replaces it.
 */
export class SpellQueueListener {
  private entry: QueueEntry | null = null;
  private readonly held = new HeldKeys();
  private readonly listeners = new Set<QueueChangeListener>();
  private unhook: (() => void) | null = null;

  constructor(
    private readonly getSettings: () => SpellQueueSettings,
    private readonly isAutomationEnabled: () => boolean,
    private readonly now: () => number = Date.now
  ) {}

  start(hook: KeyHook | null): void {
    if (this.unhook) {
      return;
    }
    if (!hook) {
      logWarn("Spell queue disabled: no keyboard hook available");
      return;
    }
    this.unhook = hook.hook((event) => this.handleKeyEvent(event));
    logInfo("Spell queue listener started");
  }

  stop(): void {
    if (this.unhook) {
      this.unhook();
      this.unhook = null;
      logInfo("Spell queue listener stopped");
    }
    this.held.clear();
    this.clear();
  }

  onChange(listener: QueueChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  handleKeyEvent(event: KeyEvent): void {
    const key = normalizeKeyToken(event.name);
    if (!key || !this.held.accept(key, event.type)) {
      return;
    }
    if (RESERVED_KEYS.has(key) || !this.isAutomationEnabled()) {
      return;
    }

    const settings = this.getSettings();
    const ranked = new Set(settings.rankedSlots);
    const slotKeys = settings.slotKeybinds.map((bind) => normalizeBind(bind));
    if (slotKeys.some((bind, index) => bind === key && ranked.has(index))) {
      return;
    }

    const whitelist = settings.whitelist.map((bind) => normalizeBind(bind));
    if (whitelist.includes(key)) {
      if (this.entry?.key === key && this.entry.source === "whitelist") {
        return;
      }
      this.set({ key, slotIndex: null, source: "whitelist", createdAt: this.now() });
      return;
    }

    const slotIndex = slotKeys.findIndex((bind, index) => bind !== "" && bind === key && !ranked.has(index));
    if (slotIndex < 0) {
      return;
    }
    if (this.entry?.source === "tracked" && this.entry.slotIndex === slotIndex) {
      return;
    }
    this.set({ key, slotIndex, source: "tracked", createdAt: this.now() });
  }

  /** Live entry, or null. An entry past its timeout is dropped for good. */
  read(): QueueEntry | null {
    const entry = this.entry;
    if (!entry) {
      return null;
    }
    const ageMs = this.now() - entry.createdAt;
    if (ageMs > this.getSettings().timeoutMs) {
      logDebug(`Queue entry expired ${formatFields({ key: entry.key, age_ms: ageMs })}`);
      this.entry = null;
      this.emit(null);
      return null;
    }
    return entry;
  }

  clear(): void {
    if (!this.entry) {
      return;
    }
    this.entry = null;
    this.emit(null);
  }

  private set(entry: QueueEntry): void {
    this.entry = Object.freeze(entry);
    logInfo(`Queued ${formatFields({ key: entry.key, source: entry.source, slot: entry.slotIndex })}`);
    this.emit(this.entry);
  }

  private emit(entry: QueueEntry | null): void {
    for (const listener of this.listeners) {
      listener(entry);
    }
  }
}
