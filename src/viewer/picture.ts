import path from "node:path";
import sharp from "sharp";

import {
  fitViewport,
  resample,
  rotateBitmap,
  toCellLines,
  type Bitmap,
} from "./bitmap.js";
import { getErrorMessage } from "./errors.js";
import type { Presenter, RotateDirection, Scale } from "./state.js";

export type Decoder = (file: string) => Promise<Bitmap>;

export type CellSize = { cols: number; rows: number };

// EXIF orientation is applied; alpha is flattened onto black.
export const sharpDecoder: Decoder = async (file) => {
  const { data, info } = await sharp(file)
    .rotate()
    .flatten({ background: "#000000" })
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    channels: info.channels,
    data,
  };
};

/**
 * Keeps the decoded picture for the current file and draws it as text.
 * Rotation only touches the copy in memory.
 */
export class PictureView implements Presenter {
  private image: Bitmap | null = null;
  private placeholder = "";

  constructor(
    private readonly size: () => CellSize,
    private readonly draw: (lines: string[]) => void,
    private readonly scale: Scale,
    private readonly decode: Decoder = sharpDecoder,
  ) {}

  get loaded(): Bitmap | null {
    return this.image;
  }

  async load(file: string): Promise<boolean> {
    try {
      this.image = await this.decode(file);
      this.placeholder = "";
      return true;
    } catch (err) {
      this.image = null;
      this.placeholder = `[missing image: ${path.basename(file)}] ${getErrorMessage(err)}`;
      return false;
    }
  }

  rotate(direction: RotateDirection) {
    if (this.image) this.image = rotateBitmap(this.image, direction);
  }

  render() {
    const { cols, rows } = this.size();
    if (!this.image || cols <= 0 || rows <= 0) {
      this.draw([this.placeholder]);
      return;
    }
    // two pixel rows per text row
    const view = fitViewport(this.image, cols, rows * 2, this.scale.factor);
    const lines = toCellLines(resample(this.image, view, this.scale));
    const left = " ".repeat(Math.floor((cols - view.cols) / 2));
    const top = Math.floor((rows - lines.length) / 2);
    this.draw([...Array<string>(top).fill(""), ...lines.map((l) => left + l)]);
  }
}
