import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Presenter, RotateDirection } from "./state.js";

/** Creates a fresh directory under the system temp dir. */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sortview-test-"));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Writes each relative path as a small file, creating folders on the way. */
export function writeFiles(root: string, files: string[]): string[] {
  return files.map((rel) => {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, rel);
    return full;
  });
}

export function setMtime(file: string, seconds: number) {
  fs.utimesSync(file, seconds, seconds);
}

/** Presenter stand-in that records every call. */
export class RecordingPresenter implements Presenter {
  calls: string[] = [];
  failing = new Set<string>();

  async load(file: string): Promise<boolean> {
    this.calls.push(`load ${file}`);
    return !this.failing.has(file);
  }

  render() {
    this.calls.push("render");
  }

  rotate(direction: RotateDirection) {
    this.calls.push(`rotate ${direction}`);
  }
}
