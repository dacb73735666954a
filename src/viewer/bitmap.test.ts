import { describe, expect, it } from "vitest";

import {
  fitViewport,
  pixel,
  resample,
  rotateBitmap,
  toCellLines,
  type Bitmap,
} from "./bitmap.js";

// 2x3 greyscale picture, values row by row:
//   10 20
//   30 40
//   50 60
const grey: Bitmap = {
  width: 2,
  height: 3,
  channels: 1,
  data: Uint8Array.from([10, 20, 30, 40, 50, 60]),
};

function rows(b: Bitmap): number[][] {
  const out: number[][] = [];
  for (let y = 0; y < b.height; y++) {
    const row: number[] = [];
    for (let x = 0; x < b.width; x++) row.push(pixel(b, x, y)[0]);
    out.push(row);
  }
  return out;
}

describe("rotateBitmap", () => {
  it("turns clockwise", () => {
    const r = rotateBitmap(grey, 1);
    expect([r.width, r.height]).toEqual([3, 2]);
    expect(rows(r)).toEqual([
      [50, 30, 10],
      [60, 40, 20],
    ]);
  });

  it("turns counter-clockwise", () => {
    const r = rotateBitmap(grey, -1);
    expect(rows(r)).toEqual([
      [20, 40, 60],
      [10, 30, 50],
    ]);
  });

  it("comes back after four turns", () => {
    let r = grey;
    for (let i = 0; i < 4; i++) r = rotateBitmap(r, 1);
    expect(rows(r)).toEqual(rows(grey));
  });

  it("does not touch the source", () => {
    rotateBitmap(grey, 1);
    expect(Array.from(grey.data)).toEqual([10, 20, 30, 40, 50, 60]);
  });
});

describe("fitViewport", () => {
  it("fits a wide picture to the box width", () => {
    expect(fitViewport({ width: 200, height: 100 }, 40, 40, 1)).toEqual({
      width: 40,
      height: 20,
      offsetX: 0,
      offsetY: 0,
      cols: 40,
      rows: 20,
    });
  });

  it("crops the middle of a zoomed picture", () => {
    expect(fitViewport({ width: 100, height: 100 }, 10, 10, 2)).toEqual({
      width: 20,
      height: 20,
      offsetX: 5,
      offsetY: 5,
      cols: 10,
      rows: 10,
    });
  });

  it("never goes below one pixel", () => {
    const v = fitViewport({ width: 1000, height: 1 }, 10, 10, 1);
    expect([v.width, v.height]).toEqual([10, 1]);
  });
});

describe("resample", () => {
  // 4x2 RGB: left half red, right half blue
  const halves: Bitmap = {
    width: 4,
    height: 2,
    channels: 3,
    data: Uint8Array.from([
      255, 0, 0, 255, 0, 0, 0, 0, 255, 0, 0, 255,
      255, 0, 0, 255, 0, 0, 0, 0, 255, 0, 0, 255,
    ]),
  };

  it("halves with nearest sampling", () => {
    const view = fitViewport(halves, 2, 1, 1);
    const out = resample(halves, view, { factor: 1, method: "nearest" });
    expect(Array.from(out.data)).toEqual([255, 0, 0, 0, 0, 255]);
  });

  it("averages a block into one pixel", () => {
    const view = fitViewport(halves, 1, 1, 1);
    expect(view).toMatchObject({ width: 1, height: 1 });
    const out = resample(halves, view, { factor: 1, method: "average" });
    // 4 red and 4 blue pixels
    expect(Array.from(out.data)).toEqual([128, 0, 128]);
  });

  it("expands greyscale to RGB", () => {
    const view = fitViewport(grey, 2, 3, 1);
    const out = resample(grey, view, { factor: 1, method: "nearest" });
    expect(out.channels).toBe(3);
    expect(pixel(out, 1, 2)).toEqual([60, 60, 60]);
  });
});

describe("toCellLines", () => {
  it("packs two pixel rows into each line", () => {
    const b: Bitmap = {
      width: 1,
      height: 3,
      channels: 3,
      data: Uint8Array.from([255, 0, 0, 0, 255, 0, 0, 0, 255]),
    };
    expect(toCellLines(b)).toEqual([
      "{#ff0000-fg}{#00ff00-bg}▀{/}",
      "{#0000ff-fg}▀{/}",
    ]);
  });
});
