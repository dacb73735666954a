import fs from "node:fs";
import path from "node:path";

import { ConfigurationError, getErrorMessage } from "./errors.js";
import { expandItems } from "./expand.js";
import type { SortPolicy } from "./state.js";

export type Random = () => number;

function compareNames(a: string, b: string): number {
  const x = path.basename(a);
  const y = path.basename(b);
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

function modTimes(files: readonly string[]): Map<string, number> {
  const times = new Map<string, number>();
  for (const f of files) {
    if (times.has(f)) continue;
    try {
      times.set(f, fs.statSync(f).mtimeMs);
    } catch (err) {
      throw new ConfigurationError(
        "MissingPath",
        `cannot stat ${f}: ${getErrorMessage(err)}`,
        f,
      );
    }
  }
  return times;
}

export function shuffle<T>(items: T[], random: Random = Math.random) {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
}

/**
 * The ordered file list and the cursor into it. The list is fixed once the
 * session starts; only the cursor moves.
 */
export class Sequencer {
  private readonly list: string[];
  private cursor = 0;

  constructor(files: readonly string[]) {
    if (files.length === 0) {
      throw new ConfigurationError("EmptyInput", "no files to show");
    }
    this.list = [...files];
  }

  static build(items: readonly string[]): Sequencer {
    return new Sequencer(expandItems(items));
  }

  get files(): readonly string[] {
    return this.list;
  }

  get length() {
    return this.list.length;
  }

  get position() {
    return this.cursor;
  }

  // Array.prototype.sort is stable, so equal keys keep their listing order.
  applySort(policy: SortPolicy, random: Random = Math.random) {
    switch (policy) {
      case "none":
        return;
      case "name":
        this.list.sort(compareNames);
        return;
      case "mod": {
        const times = modTimes(this.list);
        this.list.sort((a, b) => (times.get(a) ?? 0) - (times.get(b) ?? 0));
        return;
      }
      case "random":
        shuffle(this.list, random);
        return;
    }
  }

  /** `n` is 1-based and refers to the sorted order. */
  setStart(n: number) {
    const index = n - 1;
    if (!Number.isInteger(n) || index < 0 || index >= this.list.length) {
      throw new ConfigurationError(
        "OutOfRangeStart",
        `--start=${n} is outside 1..${this.list.length}`,
        String(n),
      );
    }
    this.cursor = index;
  }

  current(): string {
    return this.list[this.cursor];
  }

  advance(): boolean {
    if (this.cursor + 1 >= this.list.length) return false;
    this.cursor += 1;
    return true;
  }

  retreat(): boolean {
    if (this.cursor <= 0) return false;
    this.cursor -= 1;
    return true;
  }
}
