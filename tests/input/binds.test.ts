import { describe, expect, it } from "vitest";
import {
  formatBindForDisplay,
  isMouseBind,
  normalizeBind,
  normalizeBindFromParts,
  normalizeKeyToken,
  parseBind
} from "../../src/core/input/binds";

describe("normalizeKeyToken", () => {
  it("lower-cases, collapses whitespace and resolves aliases", () => {
    expect(normalizeKeyToken("  Left_Control ")).toBe("ctrl");
    expect(normalizeKeyToken("Esc")).toBe("escape");
    expect(normalizeKeyToken("PgDn")).toBe("page down");
    expect(normalizeKeyToken("Mouse 4")).toBe("x1");
    expect(normalizeKeyToken("ArrowLeft")).toBe("left arrow");
    expect(normalizeKeyToken(null)).toBe("");
  });
});

describe("normalizeBind", () => {
  it("orders modifiers ctrl, shift, alt before the primary key", () => {
    expect(normalizeBind("Alt + Shift + 1")).toBe("shift+alt+1");
    expect(normalizeBind("Control+Right Alt+F2")).toBe("ctrl+alt+f2");
  });

  it("returns an empty string without exactly one primary key", () => {
    expect(normalizeBind("ctrl+shift")).toBe("");
    expect(normalizeBind("a+b")).toBe("");
    expect(normalizeBind("")).toBe("");
    expect(normalizeBind(undefined)).toBe("");
  });

  it("is idempotent", () => {
    for (const raw of ["Shift+Alt+Q", "ctrl + page up", "LMB", "f12", "Alt Gr+5"]) {
      const once = normalizeBind(raw);
      expect(normalizeBind(once)).toBe(once);
    }
  });

  it("survives a trip through the display form", () => {
    for (const raw of ["ctrl+shift+f2", "alt+page down", "x2", "middle", "shift+left arrow", "q"]) {
      const normalized = normalizeBind(raw);
      expect(normalizeBind(formatBindForDisplay(normalized))).toBe(normalized);
    }
  });
});

describe("normalizeBindFromParts", () => {
  it("builds a bind from held modifiers and a primary key", () => {
    expect(normalizeBindFromParts(["alt", "left ctrl"], "E")).toBe("ctrl+alt+e");
  });

  it("rejects a modifier as the primary key", () => {
    expect(normalizeBindFromParts([], "shift")).toBe("");
  });
});

describe("parseBind and isMouseBind", () => {
  it("splits modifiers from the primary key", () => {
    const parsed = parseBind("Shift+Ctrl+3");
    expect(parsed?.primary).toBe("3");
    expect([...(parsed?.modifiers ?? [])]).toEqual(["ctrl", "shift"]);
    expect(parseBind("shift")).toBeNull();
  });

  it("recognizes mouse buttons", () => {
    expect(isMouseBind("mouse 5")).toBe(true);
    expect(isMouseBind("shift+x1")).toBe(true);
    expect(isMouseBind("1")).toBe(false);
  });
});

describe("formatBindForDisplay", () => {
  it("renders modifiers, function keys and mouse buttons", () => {
    expect(formatBindForDisplay("ctrl+shift+f2")).toBe("Ctrl+Shift+F2");
    expect(formatBindForDisplay("x1")).toBe("Mouse 4");
    expect(formatBindForDisplay("alt+page up")).toBe("Alt+Page up");
    expect(formatBindForDisplay("")).toBe("Set");
  });
});
