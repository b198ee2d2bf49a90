/*
  facetier — Frequency-domain sharpness

  Metric
  - Share of 2-D spectrum magnitude lying outside a centred disc of
    radius floor(min(h, w) / 4), measured on the zero-centred (shifted) spectrum.

  Notes
  - Power-of-two lengths go straight through fft.js; any other length uses
    Bluestein's chirp-z transform on top of a power-of-two fft.js plan.
*/

import FFT from "fft.js";
import type { GrayImage } from "../types";

type Transform1d = (re: Float64Array, im: Float64Array) => void;

function isPow2(n: number): boolean {
  return n > 1 && (n & (n - 1)) === 0;
}

function nextPow2(n: number): number {
  let p = 2;
  while (p < n) p <<= 1;
  return p;
}

function pow2Transform(n: number): Transform1d {
  const f = new FFT(n);
  const input = f.createComplexArray();
  const out = f.createComplexArray();
  return (re, im) => {
    for (let i = 0; i < n; i++) {
      input[2 * i] = re[i];
      input[2 * i + 1] = im[i];
    }
    f.transform(out, input);
    for (let i = 0; i < n; i++) {
      re[i] = out[2 * i];
      im[i] = out[2 * i + 1];
    }
  };
}

/**
 * Bluestein: X_k = w_k · Σ_j (x_j w_j) conj(w_{k-j}),  w_k = exp(-iπk²/n)
 */
function bluesteinTransform(n: number): Transform1d {
  const m = nextPow2(2 * n - 1);
  const fwd = pow2Transform(m);

  const wRe = new Float64Array(n);
  const wIm = new Float64Array(n);
  for (let k = 0; k < n; k++) {
    // k² mod 2n keeps the angle small for large k
    const a = (Math.PI * ((k * k) % (2 * n))) / n;
    wRe[k] = Math.cos(a);
    wIm[k] = -Math.sin(a);
  }

  // Spectrum of the conjugate chirp, wrapped for circular convolution
  const bRe = new Float64Array(m);
  const bIm = new Float64Array(m);
  bRe[0] = wRe[0];
  bIm[0] = -wIm[0];
  for (let k = 1; k < n; k++) {
    bRe[k] = bRe[m - k] = wRe[k];
    bIm[k] = bIm[m - k] = -wIm[k];
  }
  fwd(bRe, bIm);

  const aRe = new Float64Array(m);
  const aIm = new Float64Array(m);

  return (re, im) => {
    aRe.fill(0);
    aIm.fill(0);
    for (let k = 0; k < n; k++) {
      aRe[k] = re[k] * wRe[k] - im[k] * wIm[k];
      aIm[k] = re[k] * wIm[k] + im[k] * wRe[k];
    }
    fwd(aRe, aIm);

    // pointwise product, then inverse via conj(fft(conj(x))) / m
    for (let k = 0; k < m; k++) {
      const r = aRe[k] * bRe[k] - aIm[k] * bIm[k];
      const i = aRe[k] * bIm[k] + aIm[k] * bRe[k];
      aRe[k] = r;
      aIm[k] = -i;
    }
    fwd(aRe, aIm);

    for (let k = 0; k < n; k++) {
      const cr = aRe[k] / m;
      const ci = -aIm[k] / m;
      re[k] = cr * wRe[k] - ci * wIm[k];
      im[k] = cr * wIm[k] + ci * wRe[k];
    }
  };
}

function planFor(n: number): Transform1d {
  if (n === 1) return () => undefined;
  return isPow2(n) ? pow2Transform(n) : bluesteinTransform(n);
}

/**
 * Full complex 2-D DFT of a grayscale image (row pass, then column pass).
 */
export function dft2d(img: GrayImage): { re: Float64Array; im: Float64Array } {
  const { width: w, height: h, gray } = img;
  const re = new Float64Array(w * h);
  const im = new Float64Array(w * h);
  for (let i = 0; i < w * h; i++) re[i] = gray[i];

  const rowPlan = planFor(w);
  const rowRe = new Float64Array(w);
  const rowIm = new Float64Array(w);
  for (let y = 0; y < h; y++) {
    const off = y * w;
    rowRe.set(re.subarray(off, off + w));
    rowIm.set(im.subarray(off, off + w));
    rowPlan(rowRe, rowIm);
    re.set(rowRe, off);
    im.set(rowIm, off);
  }

  const colPlan = planFor(h);
  const colRe = new Float64Array(h);
  const colIm = new Float64Array(h);
  for (let x = 0; x < w; x++) {
    for (let y = 0; y < h; y++) {
      colRe[y] = re[y * w + x];
      colIm[y] = im[y * w + x];
    }
    colPlan(colRe, colIm);
    for (let y = 0; y < h; y++) {
      re[y * w + x] = colRe[y];
      im[y * w + x] = colIm[y];
    }
  }

  return { re, im };
}

/**
 * Returns 0..1; 0 for empty input or a zero spectrum.
 */
export function highFrequencyRatio(img: GrayImage): number {
  const { width: w, height: h } = img;
  if (w <= 0 || h <= 0) return 0;

  const { re, im } = dft2d(img);

  const halfW = Math.floor(w / 2);
  const halfH = Math.floor(h / 2);
  const radius = Math.floor(Math.min(h, w) / 4);
  const r2 = radius * radius;

  let total = 0;
  let high = 0;

  for (let v = 0; v < h; v++) {
    // row v of the raw spectrum lands on row (v + h/2) mod h after the shift
    const dy = ((v + halfH) % h) - halfH;
    for (let u = 0; u < w; u++) {
      const dx = ((u + halfW) % w) - halfW;
      const i = v * w + u;
      const mag = Math.hypot(re[i], im[i]);
      total += mag;
      if (dx * dx + dy * dy > r2) high += mag;
    }
  }

  return total > 0 ? high / total : 0;
}
