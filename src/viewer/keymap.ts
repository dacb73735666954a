import type { KeyCode } from "./state.js";

export type BuiltinId = "next" | "previous" | "print" | "rotate.ccw" | "rotate.cw" | "close";

export type Builtin = {
  id: BuiltinId;
  title: string;
  keys: KeyCode[];
};

export const builtins: Builtin[] = [
  { id: "next", title: "Next file", keys: ["down", "right"] },
  { id: "previous", title: "Previous file", keys: ["up", "left"] },
  { id: "print", title: "Print file name", keys: ["f1"] },
  { id: "rotate.ccw", title: "Rotate counter-clockwise", keys: ["f11"] },
  { id: "rotate.cw", title: "Rotate clockwise", keys: ["f12"] },
  { id: "close", title: "Quit", keys: ["escape", "C-c"] },
];

const byKey = new Map<KeyCode, BuiltinId>(
  builtins.flatMap((b) => b.keys.map((k): [KeyCode, BuiltinId] => [k, b.id])),
);

export function resolveBuiltin(key: KeyCode): BuiltinId | null {
  return byKey.get(key) ?? null;
}

export type KeyEvent = { name?: string; full?: string; ctrl?: boolean };

/**
 * Turns a terminal keypress into a key code: the name for special keys we
 * handle ourselves, otherwise the typed character.
 */
export function toKeyCode(ch: string | undefined, key: KeyEvent | undefined): KeyCode {
  const full = key?.full ?? key?.name ?? "";
  if (byKey.has(full)) return full;
  if (ch && ch.length === 1) return ch;
  return full;
}

export function getHints(): Array<{ keys: string; title: string }> {
  return builtins.map((b) => ({ keys: b.keys.join("/"), title: b.title }));
}
