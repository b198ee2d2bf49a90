/*
  facetier — Neighbourhood operators shared by the quality metrics

  Every operator evaluates all pixels, borders included, with reflect-101
  extension (…2 1 | 0 1 2 … n-1 | n-2 n-3…). A length-1 axis reflects onto itself.
*/

export function reflect101(i: number, n: number): number {
  if (n <= 1) return 0;
  let j = i;
  while (j < 0 || j >= n) {
    j = j < 0 ? -j : 2 * n - 2 - j;
  }
  return j;
}

/** Precomputed reflected indices for offsets -radius..radius at every position. */
function reflectTable(n: number, radius: number): Int32Array {
  const span = 2 * radius + 1;
  const t = new Int32Array(n * span);
  for (let i = 0; i < n; i++) {
    for (let k = -radius; k <= radius; k++) {
      t[i * span + k + radius] = reflect101(i + k, n);
    }
  }
  return t;
}

/**
 * Correlate every row with an odd-length kernel.
 */
export function filterRows(
  src: ArrayLike<number>,
  width: number,
  height: number,
  kernel: ReadonlyArray<number>
): Float64Array {
  const r = (kernel.length - 1) >> 1;
  const span = 2 * r + 1;
  const idx = reflectTable(width, r);
  const out = new Float64Array(width * height);

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let s = 0;
      for (let k = 0; k < span; k++) {
        s += kernel[k] * src[row + idx[x * span + k]];
      }
      out[row + x] = s;
    }
  }
  return out;
}

/**
 * Correlate every column with an odd-length kernel.
 */
export function filterCols(
  src: ArrayLike<number>,
  width: number,
  height: number,
  kernel: ReadonlyArray<number>
): Float64Array {
  const r = (kernel.length - 1) >> 1;
  const span = 2 * r + 1;
  const idx = reflectTable(height, r);
  const out = new Float64Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let s = 0;
      for (let k = 0; k < span; k++) {
        s += kernel[k] * src[idx[y * span + k] * width + x];
      }
      out[y * width + x] = s;
    }
  }
  return out;
}

/** Coefficients of (1 + z)^n */
export function binomialKernel(n: number): number[] {
  let k = [1];
  for (let i = 0; i < n; i++) {
    const next = new Array<number>(k.length + 1).fill(0);
    for (let j = 0; j < k.length; j++) {
      next[j] += k[j];
      next[j + 1] += k[j];
    }
    k = next;
  }
  return k;
}

export function convolve1d(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number[] {
  const out = new Array<number>(a.length + b.length - 1).fill(0);
  for (let i = 0; i < a.length; i++) {
    for (let j = 0; j < b.length; j++) out[i + j] += a[i] * b[j];
  }
  return out;
}

export function populationStats(values: ArrayLike<number>): { mean: number; variance: number; n: number } {
  const n = values.length;
  if (n === 0) return { mean: 0, variance: 0, n: 0 };

  let sum = 0;
  for (let i = 0; i < n; i++) sum += values[i];
  const mean = sum / n;

  let sq = 0;
  for (let i = 0; i < n; i++) {
    const d = values[i] - mean;
    sq += d * d;
  }
  return { mean, variance: sq / n, n };
}
