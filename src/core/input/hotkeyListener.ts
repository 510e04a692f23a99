import { formatFields, logDebug, logInfo, logWarn } from "../logger";
import { isModifierToken, isMouseBind, normalizeBind, normalizeBindFromParts, normalizeKeyToken, parseBind } from "./binds";
import { KeyEvent, KeyHook } from "./keyHook";

const BIND_POLL_MS = 200;

export type HotkeyHandler = (bind: string) => void;

/** Keyboard binds worth hooking: normalized, deduplicated, mouse buttons dropped. */
export function watchableBinds(binds: readonly string[]): Set<string> {
  const result = new Set<string>();
  for (const bind of binds) {
    const normalized = normalizeBind(bind);
    if (normalized && !isMouseBind(normalized)) {
      result.add(normalized);
    }
  }
  return result;
}

function sameBinds(left: ReadonlySet<string>, right: ReadonlySet<string>): boolean {
  if (left.size !== right.size) {
    return false;
  }
  for (const bind of left) {
    if (!right.has(bind)) {
      return false;
    }
  }
  return true;
}

/**
 * Matches raw key transitions against a fixed bind set. A bind fires once per
 * press of its primary key, with whatever modifiers are held at that moment.
 */
export class BindMatcher {
  private readonly heldKeys = new Set<string>();
  private readonly heldModifiers = new Set<string>();
  private readonly activeTriggers = new Set<string>();
  private readonly bindsByKey = new Map<string, string[]>();

  constructor(private readonly binds: ReadonlySet<string>) {
    for (const bind of binds) {
      const parsed = parseBind(bind);
      if (!parsed) {
        continue;
      }
      const list = this.bindsByKey.get(parsed.primary) ?? [];
      list.push(bind);
      this.bindsByKey.set(parsed.primary, list);
    }
  }

  /** The bind this event completes, if any. */
  handle(event: KeyEvent): string | null {
    const key = normalizeKeyToken(event.name);
    if (!key) {
      return null;
    }
    const modifier = isModifierToken(key);
    if (event.type === "down") {
      if (modifier) {
        this.heldModifiers.add(key);
        return null;
      }
      if (this.heldKeys.has(key)) {
        return null;
      }
      this.heldKeys.add(key);
      const candidate = normalizeBindFromParts(this.heldModifiers, key);
      if (this.binds.has(candidate) && !this.activeTriggers.has(candidate)) {
        this.activeTriggers.add(candidate);
        return candidate;
      }
      return null;
    }
    if (modifier) {
      this.heldModifiers.delete(key);
      return null;
    }
    this.heldKeys.delete(key);
    for (const bind of this.bindsByKey.get(key) ?? []) {
      this.activeTriggers.delete(bind);
    }
    return null;
  }
}

/** Global profile hotkeys; re-registers the hook whenever the configured binds change. */
export class HotkeyListener {
  private hook: KeyHook | null = null;
  private unhook: (() => void) | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private binds: ReadonlySet<string> = new Set();

  constructor(
    private readonly getBinds: () => readonly string[],
    private readonly onTrigger: HotkeyHandler,
    private readonly pollMs = BIND_POLL_MS
  ) {}

  start(hook: KeyHook | null): void {
    if (this.hook) {
      return;
    }
    if (!hook) {
      logWarn("Global hotkeys disabled: no keyboard hook available");
      return;
    }
    this.hook = hook;
    this.register(watchableBinds(this.getBinds()));
    this.pollTimer = setInterval(() => {
      this.pollBinds();
    }, this.pollMs);
    logInfo("Hotkey listener started");
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.release();
    if (this.hook) {
      this.hook = null;
      logInfo("Hotkey listener stopped");
    }
  }

  getWatchedBinds(): ReadonlySet<string> {
    return this.binds;
  }

  private pollBinds(): void {
    const next = watchableBinds(this.getBinds());
    if (!sameBinds(next, this.binds)) {
      this.register(next);
    }
  }

  private register(binds: ReadonlySet<string>): void {
    this.release();
    this.binds = binds;
    if (!this.hook || binds.size === 0) {
      return;
    }
    const matcher = new BindMatcher(binds);
    this.unhook = this.hook.hook((event) => {
      const bind = matcher.handle(event);
      if (bind) {
        logDebug(`Hotkey ${formatFields({ bind })}`);
        this.onTrigger(bind);
      }
    });
    logInfo(`Hotkeys registered ${formatFields({ binds: [...binds].sort().join(",") })}`);
  }

  private release(): void {
    if (this.unhook) {
      this.unhook();
      this.unhook = null;
    }
  }
}

/**
 * Resolves with the next keyboard combo pressed (modifiers held plus one
 * primary key), for bind capture in settings.
 */
export function captureNextBind(hook: KeyHook): Promise<string> {
  return new Promise((resolve) => {
    const heldModifiers = new Set<string>();
    let done = false;
    let unhook: (() => void) | null = null;
    unhook = hook.hook((event) => {
      if (done) {
        return;
      }
      const token = normalizeKeyToken(event.name);
      if (!token) {
        return;
      }
      if (isModifierToken(token)) {
        if (event.type === "down") {
          heldModifiers.add(token);
        } else {
          heldModifiers.delete(token);
        }
        return;
      }
      if (event.type !== "down") {
        return;
      }
      done = true;
      unhook?.();
      resolve(normalizeBindFromParts(heldModifiers, token));
    });
  });
}
