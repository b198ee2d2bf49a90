/*
  facetier — Face region crop

  Responsibilities
  - Cut the face box out of a grayscale frame.
  - Out-of-frame parts of the box are dropped; an entirely outside box
    yields an empty (0-area) image, never an error.
*/

import type { FaceBox, GrayImage } from "../types";

export class CropError extends Error {
  readonly name = "CropError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export interface ClampedBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

function clampInt(v: number, min: number, max: number): number {
  const n = Math.trunc(v);
  if (n < min) return min;
  if (n > max) return max;
  return n;
}

function assertFrame(image: GrayImage): void {
  const w = image.width;
  const h = image.height;
  if (!Number.isInteger(w) || !Number.isInteger(h) || w < 0 || h < 0) {
    throw new CropError(`Invalid frame dims (w=${w}, h=${h})`);
  }
  if (image.gray.length < w * h) {
    throw new CropError(`grayscale length ${image.gray.length} < expected ${w * h}`);
  }
}

/**
 * Intersect a face box with the frame. Returned bounds are half-open.
 */
export function clampBoxToFrame(box: FaceBox, frameW: number, frameH: number): ClampedBox {
  for (const [k, v] of Object.entries(box)) {
    if (!Number.isFinite(v)) throw new CropError(`FaceBox.${k} is not finite`);
  }

  const x0 = clampInt(box.x, 0, frameW);
  const y0 = clampInt(box.y, 0, frameH);
  const x1 = Math.max(x0, clampInt(box.x + box.w, 0, frameW));
  const y1 = Math.max(y0, clampInt(box.y + box.h, 0, frameH));

  return { x0, y0, x1, y1 };
}

/**
 * Crop the grayscale face region.
 */
export function cropGray(image: GrayImage, box: FaceBox): GrayImage {
  assertFrame(image);
  const c = clampBoxToFrame(box, image.width, image.height);

  const outW = c.x1 - c.x0;
  const outH = c.y1 - c.y0;
  const out = new Uint8Array(outW * outH);

  // Copy row-by-row for cache locality
  for (let yy = 0; yy < outH; yy++) {
    const src = (c.y0 + yy) * image.width + c.x0;
    out.set(image.gray.subarray(src, src + outW), yy * outW);
  }

  return { width: outW, height: outH, gray: out };
}
