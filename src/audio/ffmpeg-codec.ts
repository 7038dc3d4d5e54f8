/**
 * FFmpeg-backed decoder and transcoder
 * Drives the ffmpeg binary through in-memory pipes, or a temp file for
 * containers that need a seekable input
 */

import ffmpeg from 'fluent-ffmpeg';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PassThrough, Readable } from 'stream';
import { AudioFormatTag } from '../types';

export interface AudioDecoder {
  /**
   * Decode any supported container into mono s16le PCM at the target rate.
   * A null format lets the decoder probe the container itself.
   */
  decode(bytes: Buffer, format: AudioFormatTag | null, targetSampleRate: number): Promise<Buffer>;
}

export interface AudioTranscoder {
  wavToMp3(wav: Buffer, sampleRate: number): Promise<Buffer>;
}

// ffmpeg demuxer names; m4a/mp4 share the mov demuxer
const FFMPEG_INPUT_FORMATS: Record<AudioFormatTag, string> = {
  wav: 'wav',
  mp3: 'mp3',
  ogg: 'ogg',
  webm: 'webm',
  m4a: 'mov'
};

// MP4-family files may carry their index after the media data, which a pipe cannot seek back to
const SEEKABLE_INPUT_FORMATS: ReadonlySet<AudioFormatTag> = new Set(['m4a']);

/**
 * Write the bytes to a private temp directory for the duration of run()
 */
async function withTempFile<T>(bytes: Buffer, run: (filePath: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'speakup-audio-'));
  try {
    const filePath = join(dir, 'input');
    await writeFile(filePath, bytes);
    return await run(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function runFfmpeg(
  input: Readable | string,
  configure: (command: ffmpeg.FfmpegCommand) => ffmpeg.FfmpegCommand
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const output = new PassThrough();
    let outputEnded = false;
    let processEnded = false;
    let settled = false;

    const finish = () => {
      if (settled || !outputEnded || !processEnded) return;
      settled = true;
      resolve(Buffer.concat(chunks));
    };

    output.on('data', (chunk: Buffer) => chunks.push(chunk));
    output.on('end', () => {
      outputEnded = true;
      finish();
    });

    const command = configure(ffmpeg(input))
      .on('error', (error: Error) => {
        if (settled) return;
        settled = true;
        output.destroy();
        reject(error);
      })
      .on('end', () => {
        processEnded = true;
        finish();
      });

    command.pipe(output, { end: true });
  });
}

export class FfmpegAudioDecoder implements AudioDecoder {
  decode(bytes: Buffer, format: AudioFormatTag | null, targetSampleRate: number): Promise<Buffer> {
    const configure = (command: ffmpeg.FfmpegCommand) => {
      const configured = format ? command.inputFormat(FFMPEG_INPUT_FORMATS[format]) : command;
      return configured
        .noVideo()
        .audioChannels(1)
        .audioFrequency(targetSampleRate)
        .audioCodec('pcm_s16le')
        .format('s16le');
    };

    // Unknown containers are probed, and probing may need to seek too
    if (format === null || SEEKABLE_INPUT_FORMATS.has(format)) {
      return withTempFile(bytes, (filePath) => runFfmpeg(filePath, configure));
    }
    return runFfmpeg(Readable.from(bytes), configure);
  }
}

export class FfmpegAudioTranscoder implements AudioTranscoder {
  wavToMp3(wav: Buffer, sampleRate: number): Promise<Buffer> {
    return runFfmpeg(Readable.from(wav), (command) =>
      command
        .inputFormat('wav')
        .audioCodec('libmp3lame')
        .outputOptions(['-q:a 3', `-ar ${sampleRate}`])
        .format('mp3')
    );
  }
}
