/*
  facetier — Background blur (bokeh) proxy

  Approach
  - Sharpness (Laplacian variance) of the face box vs everything outside it.
  - A blurrier background than face gives a higher score.

  Notes
  - Background pixels are gathered in row-major order and treated as one
    column, so their Laplacian degenerates to the 1-D second difference.
  - 50 is returned whenever the ratio is undefined (no background pixels,
    or a face region with zero sharpness).
*/

import type { FaceBox, GrayImage } from "../types";
import { clampBoxToFrame, cropGray } from "../image/crop";
import { laplacianVariance } from "./sharpness";

export const BOKEH_UNDEFINED = 50;

export function backgroundBokeh(frame: GrayImage, box: FaceBox): number {
  const c = clampBoxToFrame(box, frame.width, frame.height);
  const face = cropGray(frame, box);
  const faceSharpness = laplacianVariance(face);

  const total = frame.width * frame.height;
  const bgCount = total - face.width * face.height;
  if (bgCount <= 0 || faceSharpness <= 0) return BOKEH_UNDEFINED;

  const bg = new Uint8Array(bgCount);
  let k = 0;
  for (let y = 0; y < frame.height; y++) {
    const insideRow = y >= c.y0 && y < c.y1;
    for (let x = 0; x < frame.width; x++) {
      if (insideRow && x >= c.x0 && x < c.x1) continue;
      bg[k++] = frame.gray[y * frame.width + x];
    }
  }

  const bgSharpness = laplacianVariance({ width: 1, height: bgCount, gray: bg });
  const ratio = bgSharpness / faceSharpness;
  return Math.min(100, Math.max(0, (1 - ratio) * 100));
}
