import type { UiohookKeyboardEvent, UiohookMouseEvent } from "uiohook-napi";
import { logInfo } from "../logger";
import { KeyEventType, KeyHook, KeyListener } from "./keyHook";
import { loadUiohook, UiohookModule } from "./uiohook";

const NAME_OVERRIDES: Readonly<Record<string, string>> = {
  ctrlright: "ctrl",
  shiftright: "shift",
  altright: "alt",
  metaright: "meta",
  semicolon: ";",
  equal: "=",
  comma: ",",
  minus: "-",
  period: ".",
  slash: "/",
  backquote: "`",
  bracketleft: "[",
  backslash: "\\",
  bracketright: "]",
  quote: "'"
};

const MOUSE_BUTTONS: Readonly<Record<number, string>> = {
  1: "left",
  2: "right",
  3: "middle",
  4: "x1",
  5: "x2"
};

/** Key name for a `UiohookKey` member, in the lower-case vocabulary binds use. */
export function uiohookKeyName(name: string): string {
  const lower = name.toLowerCase();
  return NAME_OVERRIDES[lower] ?? lower;
}

export function mouseButtonName(button: unknown): string | null {
  return typeof button === "number" ? MOUSE_BUTTONS[button] ?? null : null;
}

/**
 * Global keyboard and mouse hook on top of libuiohook. The native hook runs
 * only while at least one listener is registered.
 */
export class UiohookKeyHook implements KeyHook {
  private readonly listeners = new Set<KeyListener>();
  private readonly keyNames = new Map<number, string>();
  private running = false;

  constructor(private readonly uiohook: UiohookModule) {
    for (const [name, code] of Object.entries(uiohook.UiohookKey)) {
      if (!this.keyNames.has(code)) {
        this.keyNames.set(code, uiohookKeyName(name));
      }
    }
  }

  hook(listener: KeyListener): () => void {
    this.listeners.add(listener);
    if (!this.running) {
      this.attach();
    }
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0 && this.running) {
        this.detach();
      }
    };
  }

  private readonly onKeyDown = (event: UiohookKeyboardEvent): void => {
    this.emitKey(event.keycode, "down");
  };

  private readonly onKeyUp = (event: UiohookKeyboardEvent): void => {
    this.emitKey(event.keycode, "up");
  };

  private readonly onMouseDown = (event: UiohookMouseEvent): void => {
    this.emitName(mouseButtonName(event.button), "down");
  };

  private readonly onMouseUp = (event: UiohookMouseEvent): void => {
    this.emitName(mouseButtonName(event.button), "up");
  };

  private emitKey(keycode: number, type: KeyEventType): void {
    this.emitName(this.keyNames.get(keycode) ?? null, type);
  }

  private emitName(name: string | null, type: KeyEventType): void {
    if (!name) {
      return;
    }
    for (const listener of [...this.listeners]) {
      listener({ name, type });
    }
  }

  private attach(): void {
    const hook = this.uiohook.uIOhook;
    hook.on("keydown", this.onKeyDown);
    hook.on("keyup", this.onKeyUp);
    hook.on("mousedown", this.onMouseDown);
    hook.on("mouseup", this.onMouseUp);
    hook.start();
    this.running = true;
    logInfo("Keyboard hook started");
  }

  private detach(): void {
    const hook = this.uiohook.uIOhook;
    hook.removeListener("keydown", this.onKeyDown);
    hook.removeListener("keyup", this.onKeyUp);
    hook.removeListener("mousedown", this.onMouseDown);
    hook.removeListener("mouseup", this.onMouseUp);
    hook.stop();
    this.running = false;
    logInfo("Keyboard hook stopped");
  }
}

/** Loads the native hook; null (features disabled) when it cannot load here. */
export async function loadUiohookKeyHook(): Promise<KeyHook | null> {
  const uiohook = await loadUiohook();
  return uiohook ? new UiohookKeyHook(uiohook) : null;
}
