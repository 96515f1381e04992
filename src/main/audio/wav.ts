/**
 * Voice Reshaper - WAV Codec
 * RIFF/WAVE parsing for PCM and IEEE float input, PCM/float output
 */

import type { AudioBuffer, WavEncodeOptions, WavFormat } from '../../shared/types/audio';
import { InputError } from '../utils/errors';
import { clamp } from '../../shared/utils';

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface DecodedWav {
  buffer: AudioBuffer;
  format: WavFormat;
}

// ============================================================================
// Decoding
// ============================================================================

function parseFormatChunk(data: Buffer, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new InputError('WAV fmt chunk is truncated', { size });
  }

  let formatTag = data.readUInt16LE(offset);
  const channels = data.readUInt16LE(offset + 2);
  const sampleRate = data.readUInt32LE(offset + 4);
  const bitDepth = data.readUInt16LE(offset + 14);

  if (formatTag === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 26) {
      throw new InputError('WAV extensible fmt chunk is truncated', { size });
    }
    // The sub-format GUID starts with the real format tag
    formatTag = data.readUInt16LE(offset + 24);
  }

  if (channels === 0 || sampleRate === 0) {
    throw new InputError('WAV header declares no channels or a zero sample rate', {
      channels,
      sampleRate,
    });
  }

  if (formatTag === WAVE_FORMAT_PCM && [8, 16, 24, 32].includes(bitDepth)) {
    return { sampleFormat: 'pcm', channels, sampleRate, bitDepth };
  }
  if (formatTag === WAVE_FORMAT_IEEE_FLOAT && (bitDepth === 32 || bitDepth === 64)) {
    return { sampleFormat: 'float', channels, sampleRate, bitDepth };
  }

  throw new InputError(`Unsupported WAV encoding (format ${formatTag}, ${bitDepth}-bit)`, {
    formatTag,
    bitDepth,
  });
}

function readSample(data: Buffer, offset: number, format: WavFormat): number {
  if (format.sampleFormat === 'float') {
    return format.bitDepth === 64 ? data.readDoubleLE(offset) : data.readFloatLE(offset);
  }
  switch (format.bitDepth) {
    case 8:
      return (data.readUInt8(offset) - 128) / 128;
    case 16:
      return data.readInt16LE(offset) / 32768;
    case 24:
      return data.readIntLE(offset, 3) / 8388608;
    default:
      return data.readInt32LE(offset) / 2147483648;
  }
}

/**
 * Decode a WAV file. Interleaved channels are kept as they are.
 */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  const data = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (data.length < 12 || data.toString('ascii', 0, 4) !== 'RIFF' || data.toString('ascii', 8, 12) !== 'WAVE') {
    throw new InputError('Not a RIFF/WAVE file', { length: data.length });
  }

  let format: WavFormat | null = null;
  let dataOffset = -1;
  let dataSize = 0;
  let offset = 12;

  while (offset + 8 <= data.length) {
    const chunkId = data.toString('ascii', offset, offset + 4);
    const chunkSize = data.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      format = parseFormatChunk(data, body, Math.min(chunkSize, data.length - body));
    } else if (chunkId === 'data') {
      dataOffset = body;
      // Streaming writers may leave the size unset; clamp to what is present
      dataSize = Math.min(chunkSize, data.length - body);
      break;
    }

    // Chunks are word aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  if (!format) {
    throw new InputError('WAV file has no fmt chunk');
  }
  if (dataOffset < 0) {
    throw new InputError('WAV file has no data chunk');
  }

  const bytesPerSample = format.bitDepth / 8;
  const frameBytes = bytesPerSample * format.channels;
  const frames = Math.floor(dataSize / frameBytes);
  const samples = new Float32Array(frames * format.channels);

  for (let i = 0; i < samples.length; i++) {
    const value = readSample(data, dataOffset + i * bytesPerSample, format);
    samples[i] = Number.isFinite(value) ? value : 0;
  }

  return {
    buffer: { samples, sampleRate: format.sampleRate, channels: format.channels },
    format,
  };
}

// ============================================================================
// Encoding
// ============================================================================

function writeSample(out: Buffer, offset: number, value: number, format: WavFormat): void {
  if (format.sampleFormat === 'float') {
    out.writeFloatLE(value, offset);
    return;
  }
  const s = clamp(value, -1, 1);
  switch (format.bitDepth) {
    case 16:
      out.writeInt16LE(Math.round(s < 0 ? s * 32768 : s * 32767), offset);
      break;
    case 24:
      out.writeIntLE(Math.round(s < 0 ? s * 8388608 : s * 8388607), offset, 3);
      break;
    default:
      out.writeInt32LE(Math.round(s < 0 ? s * 2147483648 : s * 2147483647), offset);
  }
}

/**
 * Encode a buffer as a canonical 44-byte-header WAV file (16-bit PCM by default)
 */
export function encodeWav(buffer: AudioBuffer, options: WavEncodeOptions = {}): Buffer {
  const sampleFormat = options.sampleFormat ?? 'pcm';
  const bitDepth = sampleFormat === 'float' ? 32 : (options.bitDepth ?? 16);
  const format: WavFormat = {
    sampleFormat,
    channels: buffer.channels,
    sampleRate: buffer.sampleRate,
    bitDepth,
  };

  const bytesPerSample = bitDepth / 8;
  const blockAlign = buffer.channels * bytesPerSample;
  const byteRate = buffer.sampleRate * blockAlign;
  const dataLength = buffer.samples.length * bytesPerSample;
  const out = Buffer.alloc(44 + dataLength);

  // RIFF chunk descriptor
  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(36 + dataLength, 4);
  out.write('WAVE', 8, 'ascii');

  // fmt sub-chunk
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(sampleFormat === 'float' ? WAVE_FORMAT_IEEE_FLOAT : WAVE_FORMAT_PCM, 20);
  out.writeUInt16LE(buffer.channels, 22);
  out.writeUInt32LE(buffer.sampleRate, 24);
  out.writeUInt32LE(byteRate, 28);
  out.writeUInt16LE(blockAlign, 32);
  out.writeUInt16LE(bitDepth, 34);

  // data sub-chunk
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataLength, 40);

  for (let i = 0; i < buffer.samples.length; i++) {
    writeSample(out, 44 + i * bytesPerSample, buffer.samples[i], format);
  }

  return out;
}
