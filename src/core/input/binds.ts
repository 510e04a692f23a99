export type ModifierToken = "ctrl" | "shift" | "alt";

export interface ParsedBind {
  modifiers: ReadonlySet<ModifierToken>;
  primary: string;
}

const MODIFIER_ORDER: readonly ModifierToken[] = ["ctrl", "shift", "alt"];

const MODIFIER_ALIASES: Readonly<Record<string, ModifierToken>> = {
  ctrl: "ctrl",
  control: "ctrl",
  "left ctrl": "ctrl",
  "right ctrl": "ctrl",
  "ctrl l": "ctrl",
  "ctrl r": "ctrl",
  "left control": "ctrl",
  "right control": "ctrl",
  shift: "shift",
  "left shift": "shift",
  "right shift": "shift",
  "shift l": "shift",
  "shift r": "shift",
  alt: "alt",
  "left alt": "alt",
  "right alt": "alt",
  "alt l": "alt",
  "alt r": "alt",
  "alt gr": "alt",
  altgr: "alt"
};

const KEY_ALIASES: Readonly<Record<string, string>> = {
  esc: "escape",
  return: "enter",
  pgup: "page up",
  pageup: "page up",
  pgdn: "page down",
  pagedown: "page down",
  ins: "insert",
  del: "delete",
  spacebar: "space",
  arrowup: "up",
  arrowdown: "down",
  arrowleft: "left arrow",
  arrowright: "right arrow",
  capslock: "caps lock",
  numlock: "num lock",
  scrolllock: "scroll lock",
  printscreen: "print screen",
  "mouse 4": "x1",
  "mouse 5": "x2",
  lmb: "left",
  rmb: "right",
  mmb: "middle"
};

const MOUSE_DISPLAY: Readonly<Record<string, string>> = {
  x1: "Mouse 4",
  x2: "Mouse 5",
  left: "LMB",
  right: "RMB",
  middle: "MMB"
};

export const MOUSE_BUTTON_KEYS: ReadonlySet<string> = new Set(Object.keys(MOUSE_DISPLAY));

/** Canonical lower-case form of one token, modifier or primary key. */
export function normalizeKeyToken(token: string | null | undefined): string {
  const collapsed = String(token ?? "")
    .trim()
    .toLowerCase()
    .replace(/_/g, " ")
    .split(/\s+/)
    .filter((part) => part !== "")
    .join(" ");
  if (!collapsed) {
    return "";
  }
  return MODIFIER_ALIASES[collapsed] ?? KEY_ALIASES[collapsed] ?? collapsed;
}

export function isModifierToken(token: string): token is ModifierToken {
  return MODIFIER_ORDER.some((modifier) => modifier === token);
}

export function normalizeBindFromParts(modifiers: Iterable<string>, primaryKey: string): string {
  const key = normalizeKeyToken(primaryKey);
  if (!key || isModifierToken(key)) {
    return "";
  }
  const held = new Set<string>();
  for (const modifier of modifiers) {
    held.add(normalizeKeyToken(modifier));
  }
  const ordered = MODIFIER_ORDER.filter((modifier) => held.has(modifier));
  return [...ordered, key].join("+");
}

/**
 * Normalizes a free-form combo such as `Control + 1` to `ctrl+1`.
 * Returns "" when there is no primary key or more than one.
 */
export function normalizeBind(bind: string | null | undefined): string {
  if (!bind) {
    return "";
  }
  const parts = String(bind)
    .split("+")
    .map((part) => normalizeKeyToken(part))
    .filter((part) => part !== "");
  if (parts.length === 0) {
    return "";
  }
  const modifiers = new Set<ModifierToken>();
  let primary = "";
  for (const part of parts) {
    if (isModifierToken(part)) {
      modifiers.add(part);
      continue;
    }
    if (primary) {
      return "";
    }
    primary = part;
  }
  return normalizeBindFromParts(modifiers, primary);
}

export function parseBind(bind: string | null | undefined): ParsedBind | null {
  const normalized = normalizeBind(bind);
  if (!normalized) {
    return null;
  }
  const parts = normalized.split("+");
  const primary = parts[parts.length - 1];
  const modifiers = new Set(parts.slice(0, -1).filter(isModifierToken));
  return { modifiers, primary };
}

export function isMouseBind(bind: string | null | undefined): boolean {
  const parsed = parseBind(bind);
  return parsed !== null && MOUSE_BUTTON_KEYS.has(parsed.primary);
}

/** Display text for a stored bind; "Set" when unbound. */
export function formatBindForDisplay(bind: string | null | undefined): string {
  const normalized = normalizeBind(bind);
  if (!normalized) {
    return "Set";
  }
  return normalized
    .split("+")
    .map((part) => {
      if (part === "ctrl") {
        return "Ctrl";
      }
      if (part === "shift") {
        return "Shift";
      }
      if (part === "alt") {
        return "Alt";
      }
      const mouse = MOUSE_DISPLAY[part];
      if (mouse) {
        return mouse;
      }
      if (/^f\d+$/.test(part) || part.length <= 2) {
        return part.toUpperCase();
      }
      return part.charAt(0).toUpperCase() + part.slice(1);
    })
    .join("+");
}
