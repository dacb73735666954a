import type { RotateDirection, Scale } from "./state.js";

export type Bitmap = {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
};

export type Rgb = [number, number, number];

export function pixel(b: Bitmap, x: number, y: number): Rgb {
  const i = (y * b.width + x) * b.channels;
  if (b.channels < 3) {
    const v = b.data[i];
    return [v, v, v];
  }
  return [b.data[i], b.data[i + 1], b.data[i + 2]];
}

/** Quarter turn of the pixels; the source is left alone. */
export function rotateBitmap(b: Bitmap, direction: RotateDirection): Bitmap {
  const width = b.height;
  const height = b.width;
  const data = new Uint8Array(b.data.length);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const sx = direction === 1 ? y : b.width - 1 - y;
      const sy = direction === 1 ? b.height - 1 - x : x;
      const from = (sy * b.width + sx) * b.channels;
      const to = (y * width + x) * b.channels;
      for (let c = 0; c < b.channels; c++) data[to + c] = b.data[from + c];
    }
  }
  return { width, height, channels: b.channels, data };
}

export type Viewport = {
  // size of the whole scaled picture
  width: number;
  height: number;
  // top-left of the visible part, when the picture is larger than the box
  offsetX: number;
  offsetY: number;
  // visible part
  cols: number;
  rows: number;
};

/**
 * Fits the picture into `cols` x `rows` pixels keeping its aspect ratio,
 * then applies the zoom factor. Anything beyond the box is cropped evenly.
 */
export function fitViewport(
  b: Pick<Bitmap, "width" | "height">,
  cols: number,
  rows: number,
  factor: number,
): Viewport {
  const fit = Math.min(cols / b.width, rows / b.height) * factor;
  const width = Math.max(1, Math.round(b.width * fit));
  const height = Math.max(1, Math.round(b.height * fit));
  const visibleCols = Math.min(width, cols);
  const visibleRows = Math.min(height, rows);
  return {
    width,
    height,
    offsetX: Math.floor((width - visibleCols) / 2),
    offsetY: Math.floor((height - visibleRows) / 2),
    cols: visibleCols,
    rows: visibleRows,
  };
}

function span(i: number, scaled: number, source: number): [number, number] {
  const start = Math.floor((i * source) / scaled);
  const end = Math.max(start + 1, Math.floor(((i + 1) * source) / scaled));
  return [Math.min(start, source - 1), Math.min(end, source)];
}

/** Samples the visible part of the viewport into a new RGB bitmap. */
export function resample(b: Bitmap, view: Viewport, scale: Scale): Bitmap {
  const data = new Uint8Array(view.cols * view.rows * 3);
  for (let y = 0; y < view.rows; y++) {
    const [y0, y1] = span(y + view.offsetY, view.height, b.height);
    for (let x = 0; x < view.cols; x++) {
      const [x0, x1] = span(x + view.offsetX, view.width, b.width);
      const rgb =
        scale.method === "nearest"
          ? pixel(b, (x0 + x1 - 1) >> 1, (y0 + y1 - 1) >> 1)
          : average(b, x0, x1, y0, y1);
      data.set(rgb, (y * view.cols + x) * 3);
    }
  }
  return { width: view.cols, height: view.rows, channels: 3, data };
}

function average(b: Bitmap, x0: number, x1: number, y0: number, y1: number): Rgb {
  let r = 0;
  let g = 0;
  let bl = 0;
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const [pr, pg, pb] = pixel(b, x, y);
      r += pr;
      g += pg;
      bl += pb;
    }
  }
  const n = (x1 - x0) * (y1 - y0);
  return [Math.round(r / n), Math.round(g / n), Math.round(bl / n)];
}

function hex([r, g, b]: Rgb): string {
  return "#" + [r, g, b].map((v) => v.toString(16).padStart(2, "0")).join("");
}

/**
 * One line per two pixel rows: the upper half block takes the top pixel as
 * foreground and the bottom one as background. Output uses blessed tags.
 */
export function toCellLines(b: Bitmap): string[] {
  const lines: string[] = [];
  for (let y = 0; y < b.height; y += 2) {
    let line = "";
    for (let x = 0; x < b.width; x++) {
      const top = hex(pixel(b, x, y));
      line +=
        y + 1 < b.height
          ? `{${top}-fg}{${hex(pixel(b, x, y + 1))}-bg}▀{/}`
          : `{${top}-fg}▀{/}`;
    }
    lines.push(line);
  }
  return lines;
}
