/**
 * Voice Reshaper - Voice Analysis & Transfer Types
 */

/**
 * Fixed-size acoustic descriptor of an utterance
 */
export interface VoiceProfile {
  /** Mean fundamental frequency over voiced frames (Hz) */
  readonly f0Mean: number;
  /** Population standard deviation of F0 (Hz) */
  readonly f0Std: number;
  /** Median F0 (Hz) */
  readonly f0Median: number;
  /** max - min F0 (Hz) */
  readonly f0Range: number;
  /** Time-averaged spectral centroid (Hz) */
  readonly spectralCentroid: number;
  /** Time-averaged spectral roll-off (Hz) */
  readonly spectralRolloff: number;
  /** Time-averaged spectral bandwidth (Hz) */
  readonly spectralBandwidth: number;
  /** RMS amplitude of the whole buffer */
  readonly rmsEnergy: number;
  /** Mean zero-crossing rate, fraction in [0, 1] */
  readonly zeroCrossingRate: number;
  /** 13 time-averaged mel-frequency cepstral coefficients */
  readonly mfcc: readonly number[];
  /** Buffer length in seconds */
  readonly durationSeconds: number;
  /** Fraction of pitch frames that were voiced */
  readonly voicedFrameRatio: number;
}

/**
 * F0 statistics used when no voiced frame is found
 */
export const F0_FALLBACK = {
  mean: 150.0,
  std: 20.0,
  median: 150.0,
  range: 50.0,
} as const;

/**
 * Static description of a target speaker for conversion
 */
export interface SpeakerPreset {
  /** Preset identifier, e.g. speaker_001 */
  id: string;
  /** Display name */
  name: string;
  /** Short description */
  description: string;
  /** Multiplicative pitch ratio (1.0 = unchanged) */
  pitchShiftRatio: number;
  /** Gain applied to the formant band (1.0 = unchanged) */
  formantShiftRatio: number;
  /** Gain applied to the brightness band (1.0 = unchanged) */
  brightnessFactor: number;
}

/**
 * Tunable constants of the feature-transfer pipeline
 */
export interface VoiceDspConfig {
  /** Pitch shifts smaller than this (in semitones) are skipped */
  pitchSkipSemitones: number;
  /** Lower edge of the formant band (Hz) */
  formantBandLowHz: number;
  /** Upper edge of the formant band (Hz) */
  formantBandHighHz: number;
  /** Lower edge of the brightness band; upper edge is Nyquist (Hz) */
  brightnessCutoffHz: number;
  /** Minimum F0 mean difference that triggers pitch transfer (Hz) */
  minF0DifferenceHz: number;
  /** Minimum centroid difference that triggers brightness transfer (Hz) */
  centroidThresholdHz: number;
  /** Minimum roll-off difference that triggers roll-off transfer (Hz) */
  rolloffThresholdHz: number;
  /** Bounds applied to spectral transfer ratios */
  spectralRatioLimits: readonly [number, number];
  /** Peak amplitude enforced by normalize() */
  normalizePeak: number;
}

/**
 * Canonical DSP constants
 */
export const DEFAULT_VOICE_DSP_CONFIG: VoiceDspConfig = {
  pitchSkipSemitones: 0.1,
  formantBandLowHz: 300,
  formantBandHighHz: 3000,
  brightnessCutoffHz: 2000,
  minF0DifferenceHz: 10,
  centroidThresholdHz: 100,
  rolloffThresholdHz: 200,
  spectralRatioLimits: [0.25, 4],
  normalizePeak: 0.95,
};

/**
 * Analysis framing used by the feature extractor
 */
export interface FeatureExtractionConfig {
  /** STFT frame size in samples */
  frameSize: number;
  /** STFT hop in samples */
  hopSize: number;
  /** Lowest accepted F0 (Hz) */
  fMin: number;
  /** Highest accepted F0 (Hz) */
  fMax: number;
  /** YIN trough threshold */
  yinThreshold: number;
  /** Energy fraction for spectral roll-off */
  rolloffPercent: number;
  /** Number of mel bands */
  melBands: number;
  /** Number of cepstral coefficients */
  mfccCount: number;
}

/**
 * Default analysis framing
 */
export const DEFAULT_FEATURE_EXTRACTION_CONFIG: FeatureExtractionConfig = {
  frameSize: 2048,
  hopSize: 512,
  fMin: 80,
  fMax: 400,
  yinThreshold: 0.1,
  rolloffPercent: 0.85,
  melBands: 128,
  mfccCount: 13,
};
