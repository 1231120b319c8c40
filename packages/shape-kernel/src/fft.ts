/**
 * Radix-2 complex FFT, in place on split real/imaginary buffers.
 * Sizes must be powers of two; the noise synthesizer pads its working
 * grid to satisfy that.
 */

export function isPowerOfTwo(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p <<= 1;
  return p;
}

/** 1D transform of `size` elements starting at `offset`, spaced `stride` apart. */
function fft1d(
  re: Float64Array,
  im: Float64Array,
  size: number,
  offset: number,
  stride: number,
  inverse: boolean,
): void {
  // Bit-reversal permutation
  for (let i = 1, j = 0; i < size; i++) {
    let bit = size >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      const a = offset + i * stride;
      const b = offset + j * stride;
      let t = re[a]; re[a] = re[b]; re[b] = t;
      t = im[a]; im[a] = im[b]; im[b] = t;
    }
  }

  const sign = inverse ? 1 : -1;
  for (let len = 2; len <= size; len <<= 1) {
    const ang = (sign * 2 * Math.PI) / len;
    const wr = Math.cos(ang);
    const wi = Math.sin(ang);
    const half = len >> 1;
    for (let start = 0; start < size; start += len) {
      let cr = 1, ci = 0;
      for (let k = 0; k < half; k++) {
        const a = offset + (start + k) * stride;
        const b = offset + (start + k + half) * stride;
        const tr = re[b] * cr - im[b] * ci;
        const ti = re[b] * ci + im[b] * cr;
        re[b] = re[a] - tr;
        im[b] = im[a] - ti;
        re[a] += tr;
        im[a] += ti;
        const ncr = cr * wr - ci * wi;
        ci = cr * wi + ci * wr;
        cr = ncr;
      }
    }
  }

  if (inverse) {
    for (let i = 0; i < size; i++) {
      const a = offset + i * stride;
      re[a] /= size;
      im[a] /= size;
    }
  }
}

/** 2D transform of a row-major rows × cols buffer. Inverse is scaled by 1/(rows·cols). */
export function fft2d(
  re: Float64Array,
  im: Float64Array,
  rows: number,
  cols: number,
  inverse = false,
): void {
  if (!isPowerOfTwo(rows) || !isPowerOfTwo(cols)) {
    throw new Error(`fft2d: dimensions must be powers of two, got ${rows} x ${cols}`);
  }
  if (re.length !== rows * cols || im.length !== rows * cols) {
    throw new Error(`fft2d: buffers must hold ${rows * cols} values`);
  }
  for (let r = 0; r < rows; r++) fft1d(re, im, cols, r * cols, 1, inverse);
  for (let c = 0; c < cols; c++) fft1d(re, im, rows, c, cols, inverse);
}
