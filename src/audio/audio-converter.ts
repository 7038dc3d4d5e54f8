/**
 * Audio Converter Utilities
 * PCM helpers shared by the normalizer and the synthesis service
 */

const WAV_HEADER_BYTES = 44;
const PCM_FORMAT = 1;
const EXTENSIBLE_FORMAT = 0xfffe;

export interface WavData {
  /** Interleaved signed 16-bit little-endian samples */
  pcm: Buffer;
  sampleRate: number;
  channels: number;
}

/**
 * Simple low-pass filter to prevent aliasing when downsampling
 * Uses a moving average filter which acts as a basic anti-aliasing filter
 * @param input - Input buffer (16-bit PCM samples)
 * @param windowSize - Number of samples to average (higher = more smoothing)
 */
function lowPassFilter(input: Buffer, windowSize: number): Buffer {
  if (windowSize <= 1) return input;

  const samples = input.length / 2;
  const output = Buffer.alloc(input.length);
  const halfWindow = Math.floor(windowSize / 2);

  for (let i = 0; i < samples; i++) {
    let sum = 0;
    let count = 0;

    for (let j = -halfWindow; j <= halfWindow; j++) {
      const idx = i + j;
      if (idx >= 0 && idx < samples) {
        sum += input.readInt16LE(idx * 2);
        count++;
      }
    }

    const averaged = Math.round(sum / count);
    output.writeInt16LE(clampInt16(averaged), i * 2);
  }

  return output;
}

/**
 * Resample mono 16-bit PCM from one sample rate to another
 * Uses linear interpolation with anti-aliasing filter for downsampling
 */
export function resample(input: Buffer, inputRate: number, outputRate: number): Buffer {
  if (inputRate === outputRate) {
    return input;
  }

  let processedInput = input;

  if (outputRate < inputRate) {
    const ratio = inputRate / outputRate;
    const windowSize = Math.min(Math.ceil(ratio * 2), 11); // Cap at 11 for performance
    processedInput = lowPassFilter(input, windowSize);
  }

  const ratio = outputRate / inputRate;
  const inputSamples = Math.floor(processedInput.length / 2);
  const outputSamples = Math.floor(inputSamples * ratio);
  const output = Buffer.alloc(outputSamples * 2);

  for (let i = 0; i < outputSamples; i++) {
    const srcIndex = i / ratio;
    const srcIndexFloor = Math.min(Math.floor(srcIndex), inputSamples - 1);
    const srcIndexCeil = Math.min(srcIndexFloor + 1, inputSamples - 1);
    const fraction = srcIndex - srcIndexFloor;

    const sample1 = processedInput.readInt16LE(srcIndexFloor * 2);
    const sample2 = processedInput.readInt16LE(srcIndexCeil * 2);

    const interpolated = Math.round(sample1 + (sample2 - sample1) * fraction);
    output.writeInt16LE(clampInt16(interpolated), i * 2);
  }

  return output;
}

/**
 * Average interleaved channels into a single channel
 */
export function downmixToMono(input: Buffer, channels: number): Buffer {
  if (channels <= 1) {
    return input;
  }

  const frames = Math.floor(input.length / (2 * channels));
  const output = Buffer.alloc(frames * 2);

  for (let frame = 0; frame < frames; frame++) {
    let sum = 0;
    for (let channel = 0; channel < channels; channel++) {
      sum += input.readInt16LE((frame * channels + channel) * 2);
    }
    output.writeInt16LE(clampInt16(Math.round(sum / channels)), frame * 2);
  }

  return output;
}

/**
 * Parse a RIFF/WAVE container holding 16-bit PCM.
 * Returns null for anything else (compressed WAV, float samples, other
 * containers) so the caller can hand the bytes to a full decoder.
 */
export function parseWav(buffer: Buffer): WavData | null {
  if (buffer.length < 12) return null;
  if (buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    return null;
  }

  let offset = 12;
  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;

    if (chunkId === 'fmt ') {
      if (bodyStart + 16 > buffer.length) return null;
      format = {
        audioFormat: buffer.readUInt16LE(bodyStart),
        channels: buffer.readUInt16LE(bodyStart + 2),
        sampleRate: buffer.readUInt32LE(bodyStart + 4),
        bitsPerSample: buffer.readUInt16LE(bodyStart + 14)
      };
    } else if (chunkId === 'data') {
      if (!format) return null;
      const isPcm = format.audioFormat === PCM_FORMAT || format.audioFormat === EXTENSIBLE_FORMAT;
      if (!isPcm || format.bitsPerSample !== 16 || format.channels < 1 || format.sampleRate <= 0) {
        return null;
      }

      // Streamed recorders leave the size field at its maximum
      const bodyEnd = Math.min(bodyStart + chunkSize, buffer.length);
      const frameBytes = 2 * format.channels;
      const usable = bodyEnd - bodyStart - ((bodyEnd - bodyStart) % frameBytes);

      return {
        pcm: buffer.subarray(bodyStart, bodyStart + usable),
        sampleRate: format.sampleRate,
        channels: format.channels
      };
    }

    offset = bodyStart + chunkSize + (chunkSize % 2);
  }

  return null;
}

/**
 * Wrap mono 16-bit PCM in a canonical 44-byte WAV header
 */
export function encodeWav(pcm: Buffer, sampleRate: number, channels: number = 1): Buffer {
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  const byteRate = sampleRate * channels * 2;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(PCM_FORMAT, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(channels * 2, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Calculate audio duration in seconds
 */
export function getAudioDurationSeconds(buffer: Buffer, sampleRate: number, bytesPerSample: number = 2): number {
  if (sampleRate <= 0) return 0;
  const samples = Math.floor(buffer.length / bytesPerSample);
  return samples / sampleRate;
}

function clampInt16(value: number): number {
  return Math.max(-32768, Math.min(32767, value));
}
