/*
  facetier — Upload decoding

  sharp handles every container format the routes accept. The output frame is:
  - EXIF-oriented (rotate() with no angle)
  - at most `maxWidthUsed` wide, never upscaled
  - RGBA plus an 8-bit luma plane, both row-major
*/

import sharp from "sharp";
import type { Frame } from "../types";

/** Smallest decode width that still leaves room for a face crop */
export const MIN_DECODE_WIDTH = 64;

export interface DecodedImage extends Frame {
  /** 4 bytes per pixel */
  readonly rgba: Uint8Array;
}

export interface DecodeOptions {
  readonly maxWidthUsed: number;
}

export class DecodeError extends Error {
  readonly name = "DecodeError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

// BT.601 luma weights scaled by 2^14; they sum to 16384 so grays map onto themselves
const LUMA_R = 4899;
const LUMA_G = 9617;
const LUMA_B = 1868;
const LUMA_ROUND = 1 << 13;

export function rgbaToGrayscale(rgba: Uint8Array, width: number, height: number): Uint8Array {
  const pixels = Math.trunc(width) * Math.trunc(height);
  if (rgba.length < pixels * 4) {
    throw new DecodeError(`RGBA buffer holds ${rgba.length} bytes, need ${pixels * 4}`);
  }

  const luma = new Uint8Array(pixels);
  let src = 0;
  for (let i = 0; i < pixels; i++) {
    luma[i] = (LUMA_R * rgba[src] + LUMA_G * rgba[src + 1] + LUMA_B * rgba[src + 2] + LUMA_ROUND) >> 14;
    src += 4;
  }
  return luma;
}

/** Width of the image as displayed, i.e. after EXIF orientation is applied. */
function orientedWidth(meta: sharp.Metadata): number {
  // orientations 5..8 are transposed
  const transposed = (meta.orientation ?? 1) >= 5;
  return (transposed ? meta.height : meta.width) ?? 0;
}

export async function decodeImage(bytes: Uint8Array, opts: DecodeOptions): Promise<DecodedImage> {
  const bound = Math.trunc(opts.maxWidthUsed);
  if (!Number.isFinite(opts.maxWidthUsed) || bound < MIN_DECODE_WIDTH) {
    throw new DecodeError(`maxWidthUsed must be >= ${MIN_DECODE_WIDTH} (got ${opts.maxWidthUsed})`);
  }

  if (bytes.length === 0) throw new DecodeError("image bytes are empty");

  let sourceWidth: number;
  let raw: { data: Buffer; info: sharp.OutputInfo };
  try {
    // sharp() itself throws synchronously on some inputs
    const pipeline = sharp(Buffer.from(bytes)).rotate();
    sourceWidth = orientedWidth(await pipeline.metadata());
    raw = await pipeline
      .resize({ width: bound, fit: "inside", withoutEnlargement: true })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (e) {
    throw new DecodeError("image bytes could not be decoded", e);
  }

  const { data, info } = raw;
  if (info.width <= 0 || info.height <= 0 || sourceWidth <= 0) {
    throw new DecodeError(`decoder reported an empty image (${info.width}x${info.height})`);
  }
  if (info.channels !== 4) {
    throw new DecodeError(`expected 4 channels after ensureAlpha(), got ${info.channels}`);
  }

  const rgba = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  return {
    width: info.width,
    height: info.height,
    scale: info.width / sourceWidth,
    rgba,
    gray: rgbaToGrayscale(rgba, info.width, info.height)
  };
}
