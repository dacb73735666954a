import { describe, expect, it } from "vitest";

import { resolveBuiltin, toKeyCode } from "./keymap.js";

describe("toKeyCode", () => {
  it("uses the key name for special keys", () => {
    expect(toKeyCode(undefined, { name: "down", full: "down" })).toBe("down");
    expect(toKeyCode(undefined, { name: "f12", full: "f12" })).toBe("f12");
    expect(toKeyCode("\u0003", { name: "c", full: "C-c", ctrl: true })).toBe("C-c");
  });

  it("uses the typed character otherwise", () => {
    expect(toKeyCode("d", { name: "d", full: "d" })).toBe("d");
    expect(toKeyCode("D", { name: "d", full: "S-d" })).toBe("D");
    expect(toKeyCode("%", undefined)).toBe("%");
  });

  it("falls back to the full name when nothing was typed", () => {
    expect(toKeyCode(undefined, { name: "pageup", full: "pageup" })).toBe("pageup");
    expect(toKeyCode(undefined, undefined)).toBe("");
  });
});

describe("resolveBuiltin", () => {
  it("maps keys to built-in commands", () => {
    expect(resolveBuiltin("right")).toBe("next");
    expect(resolveBuiltin("left")).toBe("previous");
    expect(resolveBuiltin("f1")).toBe("print");
    expect(resolveBuiltin("f11")).toBe("rotate.ccw");
    expect(resolveBuiltin("escape")).toBe("close");
    expect(resolveBuiltin("d")).toBeNull();
  });
});
