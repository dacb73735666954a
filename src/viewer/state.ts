export type SortPolicy = "none" | "name" | "mod" | "random";

export type SessionStatus = "RUNNING" | "TERMINATED";

// Key names as the terminal reports them ("down", "f12") or a single typed character.
export type KeyCode = string;

export type RotateDirection = 1 | -1; // 1 = clockwise

export type Transition =
  | { kind: "advance"; index: number }
  | { kind: "retreat"; index: number }
  | { kind: "boundary" }
  | { kind: "print"; path: string }
  | { kind: "rotate"; direction: RotateDirection }
  | { kind: "action"; key: string; ok: boolean; message: string }
  | { kind: "close" }
  | { kind: "ignored" };

// The three hooks the core needs from whatever draws the picture.
export type Presenter = {
  load(path: string): Promise<boolean>;
  render(): void;
  rotate(direction: RotateDirection): void;
};

export type ScaleMethod = "nearest" | "average";

export type Scale = {
  factor: number;
  method: ScaleMethod;
};
