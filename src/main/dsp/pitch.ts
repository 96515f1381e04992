/**
 * Voice Reshaper - YIN Pitch Tracker
 * Frame-wise fundamental frequency estimation (de Cheveigné & Kawahara)
 */

export interface PitchTrackOptions {
  /** Analysis frame in samples; the difference window is half of it */
  frameLength: number;
  hopLength: number;
  /** Lowest accepted F0 (Hz) */
  fMin: number;
  /** Highest accepted F0 (Hz) */
  fMax: number;
  /** Trough threshold on the cumulative mean normalised difference */
  threshold: number;
  /** Frames whose RMS falls below this are unvoiced */
  silenceRms: number;
}

export const DEFAULT_PITCH_TRACK_OPTIONS: PitchTrackOptions = {
  frameLength: 2048,
  hopLength: 512,
  fMin: 80,
  fMax: 400,
  threshold: 0.1,
  silenceRms: 1e-4,
};

/**
 * F0 per frame. Unvoiced frames hold 0.
 */
export interface PitchTrack {
  f0: Float64Array;
  voiced: boolean[];
}

/**
 * Cumulative mean normalised difference d'(tau) for tau in [0, maxLag]
 */
function cumulativeMeanNormalizedDifference(
  samples: ArrayLike<number>,
  start: number,
  windowLength: number,
  maxLag: number
): Float64Array {
  const cmnd = new Float64Array(maxLag + 1);
  cmnd[0] = 1;
  let running = 0;

  for (let tau = 1; tau <= maxLag; tau++) {
    let diff = 0;
    for (let j = 0; j < windowLength; j++) {
      const delta = samples[start + j] - samples[start + j + tau];
      diff += delta * delta;
    }
    running += diff;
    cmnd[tau] = running > 0 ? (diff * tau) / running : 1;
  }

  return cmnd;
}

/**
 * Refine an integer lag with a parabola through its neighbours
 */
function parabolicInterpolation(cmnd: Float64Array, tau: number): number {
  if (tau <= 0 || tau >= cmnd.length - 1) return tau;
  const left = cmnd[tau - 1];
  const centre = cmnd[tau];
  const right = cmnd[tau + 1];
  const denominator = left - 2 * centre + right;
  if (denominator === 0) return tau;
  const shift = (left - right) / (2 * denominator);
  return Math.abs(shift) < 1 ? tau + shift : tau;
}

function frameRms(samples: ArrayLike<number>, start: number, length: number): number {
  let total = 0;
  for (let i = 0; i < length; i++) {
    total += samples[start + i] * samples[start + i];
  }
  return Math.sqrt(total / length);
}

/**
 * Estimate F0 for one frame, or 0 when unvoiced
 */
export function estimateFramePitch(
  samples: ArrayLike<number>,
  start: number,
  sampleRate: number,
  options: PitchTrackOptions
): number {
  const windowLength = Math.floor(options.frameLength / 2);
  const minLag = Math.max(1, Math.floor(sampleRate / options.fMax));
  const maxLag = Math.min(Math.ceil(sampleRate / options.fMin), windowLength - 1);
  if (minLag >= maxLag) return 0;

  if (frameRms(samples, start, options.frameLength) < options.silenceRms) {
    return 0;
  }

  const cmnd = cumulativeMeanNormalizedDifference(samples, start, windowLength, maxLag);

  let tau = -1;
  for (let lag = minLag; lag <= maxLag; lag++) {
    if (cmnd[lag] < options.threshold) {
      tau = lag;
      // Walk down to the bottom of the trough
      while (tau + 1 <= maxLag && cmnd[tau + 1] < cmnd[tau]) {
        tau++;
      }
      break;
    }
  }
  if (tau < 0) return 0;

  const f0 = sampleRate / parabolicInterpolation(cmnd, tau);
  if (!Number.isFinite(f0) || f0 < options.fMin || f0 > options.fMax) {
    return 0;
  }
  return f0;
}

/**
 * Run YIN over consecutive frames starting at sample 0.
 * A signal shorter than one frame produces an empty track.
 */
export function pitchTrack(
  samples: ArrayLike<number>,
  sampleRate: number,
  options: PitchTrackOptions = DEFAULT_PITCH_TRACK_OPTIONS
): PitchTrack {
  const { frameLength, hopLength } = options;
  const frames =
    samples.length < frameLength ? 0 : 1 + Math.floor((samples.length - frameLength) / hopLength);

  const f0 = new Float64Array(frames);
  const voiced: boolean[] = [];
  for (let t = 0; t < frames; t++) {
    f0[t] = estimateFramePitch(samples, t * hopLength, sampleRate, options);
    voiced.push(f0[t] > 0);
  }

  return { f0, voiced };
}
