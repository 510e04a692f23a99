import { ModifierToken, MOUSE_BUTTON_KEYS, normalizeKeyToken, parseBind } from "../input/binds";
import { loadUiohook } from "../input/uiohook";
import { uiohookKeyName } from "../input/uiohookKeyHook";

export interface KeySender {
  /** Rejects when the synthetic key event could not be delivered. */
  send(bind: string): Promise<void>;
}

/** The part of libuiohook that synthesises key presses. */
export interface KeyTapper {
  keyTap(key: number, modifiers?: number[]): void;
}

export interface KeyTap {
  key: number;
  modifiers: number[];
}

const TAP_MODIFIERS: readonly ModifierToken[] = ["ctrl", "shift", "alt"];

/**
 * Bind token to `UiohookKey` code. Left-hand modifiers win over their
 * right-hand twins, which normalize to the same token.
 */
export function buildKeyCodeTable(keys: Readonly<Record<string, number>>): Map<string, number> {
  const entries = Object.entries(keys);
  const ordered = [
    ...entries.filter(([name]) => !name.endsWith("Right")),
    ...entries.filter(([name]) => name.endsWith("Right"))
  ];
  const table = new Map<string, number>();
  for (const [name, code] of ordered) {
    const token = normalizeKeyToken(uiohookKeyName(name));
    if (token && !table.has(token)) {
      table.set(token, code);
    }
  }
  return table;
}

/** Null for mouse buttons and keys the table has no code for. */
export function resolveKeyTap(bind: string, keyCodes: ReadonlyMap<string, number>): KeyTap | null {
  const parsed = parseBind(bind);
  if (!parsed || MOUSE_BUTTON_KEYS.has(parsed.primary)) {
    return null;
  }
  const key = keyCodes.get(parsed.primary);
  if (key === undefined) {
    return null;
  }
  const modifiers: number[] = [];
  for (const modifier of TAP_MODIFIERS) {
    if (!parsed.modifiers.has(modifier)) {
      continue;
    }
    const code = keyCodes.get(modifier);
    if (code === undefined) {
      return null;
    }
    modifiers.push(code);
  }
  return { key, modifiers };
}

/** Sends keys as native input events through libuiohook. */
export class UiohookKeySender implements KeySender {
  private readonly keyCodes: Map<string, number>;

  constructor(
    private readonly tapper: KeyTapper,
    keys: Readonly<Record<string, number>>
  ) {
    this.keyCodes = buildKeyCodeTable(keys);
  }

  async send(bind: string): Promise<void> {
    const tap = resolveKeyTap(bind, this.keyCodes);
    if (!tap) {
      throw new Error(`Key send: unsupported bind "${bind}"`);
    }
    this.tapper.keyTap(tap.key, tap.modifiers);
  }
}

class UnavailableKeySender implements KeySender {
  async send(bind: string): Promise<void> {
    throw new Error(`Key send unavailable on ${process.platform}: "${bind}"`);
  }
}

/** A uiohook-backed sender, or one that rejects every send when the native module is missing. */
export async function loadKeySender(): Promise<KeySender> {
  const uiohook = await loadUiohook();
  return uiohook ? new UiohookKeySender(uiohook.uIOhook, uiohook.UiohookKey) : new UnavailableKeySender();
}
