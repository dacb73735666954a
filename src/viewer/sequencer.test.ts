import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError } from "./errors.js";
import { Sequencer, shuffle } from "./sequencer.js";
import { makeTempDir, removeDir, setMtime, writeFiles } from "./test-helpers.js";

function startError(seq: Sequencer, n: number): string | undefined {
  try {
    seq.setStart(n);
  } catch (err) {
    if (err instanceof ConfigurationError) return err.code;
    throw err;
  }
  return undefined;
}

describe("Sequencer", () => {
  it("refuses an empty list", () => {
    expect(() => new Sequencer([])).toThrow("no files to show");
  });

  describe("setStart", () => {
    const seq = () => new Sequencer(["x", "y", "z"]);

    it("converts the 1-based start to the cursor", () => {
      const s = seq();
      s.setStart(1);
      expect(s.position).toBe(0);
      s.setStart(3);
      expect(s.position).toBe(2);
      expect(s.current()).toBe("z");
    });

    it("rejects positions outside the list", () => {
      expect(startError(seq(), 0)).toBe("OutOfRangeStart");
      expect(startError(seq(), 4)).toBe("OutOfRangeStart");
      expect(startError(seq(), -1)).toBe("OutOfRangeStart");
    });

    it("leaves the cursor alone when it fails", () => {
      const s = seq();
      s.setStart(2);
      startError(s, 9);
      expect(s.position).toBe(1);
    });
  });

  describe("navigation", () => {
    it("advances until the last file, then reports false", () => {
      const s = new Sequencer(["x", "y"]);
      expect(s.advance()).toBe(true);
      expect(s.position).toBe(1);
      for (let i = 0; i < 3; i++) {
        expect(s.advance()).toBe(false);
        expect(s.position).toBe(1);
      }
    });

    it("retreats until the first file", () => {
      const s = new Sequencer(["x", "y"]);
      expect(s.retreat()).toBe(false);
      s.setStart(2);
      expect(s.retreat()).toBe(true);
      expect(s.current()).toBe("x");
      expect(s.retreat()).toBe(false);
    });
  });

  describe("applySort", () => {
    it("sorts by base name only", () => {
      const s = new Sequencer(["/z/a/c", "/y/b/a", "/x/c/b"]);
      s.applySort("name");
      expect(s.files).toEqual(["/y/b/a", "/x/c/b", "/z/a/c"]);
    });

    it("applies the start after sorting", () => {
      const s = new Sequencer(["c", "a", "b"]);
      s.applySort("name");
      s.setStart(2);
      expect(s.current()).toBe("b");
    });

    it("keeps the original order for none", () => {
      const s = new Sequencer(["c", "a", "b"]);
      s.applySort("none");
      expect(s.files).toEqual(["c", "a", "b"]);
    });

    it("shuffles with the given random source", () => {
      const s = new Sequencer(["a", "b", "c"]);
      // j = floor(0 * (i + 1)) = 0 on every step
      s.applySort("random", () => 0);
      expect(s.files).toEqual(["b", "c", "a"]);
    });

    describe("by modification time", () => {
      let root: string;

      beforeEach(() => {
        root = makeTempDir();
      });

      afterEach(() => removeDir(root));

      it("puts older files first and keeps ties in listing order", () => {
        const [newest, oldest, tieA, tieB] = writeFiles(root, [
          "newest",
          "oldest",
          "tie-a",
          "tie-b",
        ]);
        setMtime(newest, 3000);
        setMtime(oldest, 1000);
        setMtime(tieA, 2000);
        setMtime(tieB, 2000);

        const s = new Sequencer([newest, tieB, oldest, tieA]);
        s.applySort("mod");
        expect(s.files).toEqual([oldest, tieB, tieA, newest]);
      });

      it("fails when a file has gone missing", () => {
        const s = new Sequencer([path.join(root, "gone")]);
        expect(() => s.applySort("mod")).toThrow(ConfigurationError);
      });
    });
  });

  it("builds from directory items", () => {
    const root = makeTempDir();
    try {
      const [a] = writeFiles(root, ["a"]);
      expect(Sequencer.build([root]).files).toEqual([a]);
      expect(() => Sequencer.build([path.join(root, "a"), root + "/nothing..."])).toThrow(
        ConfigurationError,
      );
    } finally {
      removeDir(root);
    }
  });
});

describe("shuffle", () => {
  it("draws one random number per swap", () => {
    const values = [0.99, 0];
    const items = [1, 2, 3];
    shuffle(items, () => values.shift() ?? 0);
    // i=2: j=floor(0.99*3)=2 -> no change; i=1: j=0 -> swap 1 and 2
    expect(items).toEqual([2, 1, 3]);
  });
});
