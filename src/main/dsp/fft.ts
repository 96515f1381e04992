/**
 * Voice Reshaper - FFT
 * Iterative radix-2 Cooley-Tukey transform on interleaved complex data
 */

// ============================================================================
// Helpers
// ============================================================================

export function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}

/**
 * Smallest power of two >= n (1 for n <= 1)
 */
export function nextPowerOfTwo(n: number): number {
  let size = 1;
  while (size < n) {
    size *= 2;
  }
  return size;
}

/**
 * Largest transform size whose tables are kept between calls. Whole-signal
 * transforms are larger and recompute theirs.
 */
export const MAX_CACHED_FFT_SIZE = 8192;

// Twiddle factors per transform size: cos/sin of -2*pi*k/n for k < n/2
const twiddleCache = new Map<number, { cos: Float64Array; sin: Float64Array }>();

/**
 * Transform sizes that currently have cached twiddle tables, ascending
 */
export function cachedTwiddleSizes(): number[] {
  return [...twiddleCache.keys()].sort((a, b) => a - b);
}

function getTwiddles(n: number): { cos: Float64Array; sin: Float64Array } {
  let twiddles = twiddleCache.get(n);
  if (!twiddles) {
    const half = n / 2;
    const cos = new Float64Array(half);
    const sin = new Float64Array(half);
    for (let k = 0; k < half; k++) {
      const angle = (-2 * Math.PI * k) / n;
      cos[k] = Math.cos(angle);
      sin[k] = Math.sin(angle);
    }
    twiddles = { cos, sin };
    if (n <= MAX_CACHED_FFT_SIZE) {
      twiddleCache.set(n, twiddles);
    }
  }
  return twiddles;
}

/**
 * Reorder interleaved complex elements into bit-reversed index order
 */
function bitReversalPermutation(data: Float64Array, n: number): void {
  let j = 0;
  for (let i = 0; i < n - 1; i++) {
    if (i < j) {
      const ri = i * 2;
      const rj = j * 2;
      const tmpReal = data[ri];
      const tmpImag = data[ri + 1];
      data[ri] = data[rj];
      data[ri + 1] = data[rj + 1];
      data[rj] = tmpReal;
      data[rj + 1] = tmpImag;
    }
    let m = n >> 1;
    while (m >= 1 && j >= m) {
      j -= m;
      m >>= 1;
    }
    j += m;
  }
}

// ============================================================================
// Transform
// ============================================================================

/**
 * In-place FFT over `[re0, im0, re1, im1, ...]`.
 * The complex length (data.length / 2) must be a power of two.
 * The inverse transform is scaled by 1/N.
 */
export function fft(data: Float64Array, inverse: boolean = false): void {
  const n = data.length / 2;
  if (!isPowerOfTwo(n)) {
    throw new RangeError(`FFT size must be a power of two, got ${n}`);
  }
  if (n === 1) return;

  bitReversalPermutation(data, n);

  const { cos, sin } = getTwiddles(n);
  const sign = inverse ? -1 : 1;

  for (let size = 2; size <= n; size *= 2) {
    const halfSize = size / 2;
    const stride = n / size;

    for (let i = 0; i < n; i += size) {
      for (let j = 0; j < halfSize; j++) {
        const twiddleReal = cos[j * stride];
        const twiddleImag = sign * sin[j * stride];

        const evenIdx = (i + j) * 2;
        const oddIdx = (i + j + halfSize) * 2;

        const oddReal = data[oddIdx] * twiddleReal - data[oddIdx + 1] * twiddleImag;
        const oddImag = data[oddIdx] * twiddleImag + data[oddIdx + 1] * twiddleReal;

        data[oddIdx] = data[evenIdx] - oddReal;
        data[oddIdx + 1] = data[evenIdx + 1] - oddImag;
        data[evenIdx] += oddReal;
        data[evenIdx + 1] += oddImag;
      }
    }
  }

  if (inverse) {
    for (let i = 0; i < data.length; i++) {
      data[i] /= n;
    }
  }
}

/**
 * Pack a real signal into a zero-padded interleaved complex array of `size` elements
 */
export function toComplex(signal: ArrayLike<number>, size: number): Float64Array {
  const data = new Float64Array(size * 2);
  const count = Math.min(signal.length, size);
  for (let i = 0; i < count; i++) {
    data[i * 2] = signal[i];
  }
  return data;
}

/**
 * Real parts of an interleaved complex array, truncated to `length`
 */
export function realPart(data: Float64Array, length: number = data.length / 2): Float64Array {
  const out = new Float64Array(length);
  const count = Math.min(length, data.length / 2);
  for (let i = 0; i < count; i++) {
    out[i] = data[i * 2];
  }
  return out;
}
