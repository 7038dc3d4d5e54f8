import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import express from 'express';
import { XTTSProvider } from '../providers/tts/xtts-tts';
import { SynthesisService, resolveVoice } from '../services/synthesis-service';
import { parseWav } from '../audio/audio-converter';
import { UpstreamError, UpstreamUnavailableError, ValidationError } from '../types';
import { makeWav, silentLogger, startStubServer, StubServer } from './helpers';

describe('resolveVoice', () => {
  it('keeps a voice the engine reports', () => {
    expect(resolveVoice('bear', ['fox', 'bear'])).toEqual({ voice: 'bear', substituted: false });
  });

  it('substitutes the first reported voice for an unknown one', () => {
    expect(resolveVoice('owl', ['fox', 'bear'])).toEqual({ voice: 'fox', substituted: true });
  });

  it('takes no speaker when the engine reports none', () => {
    expect(resolveVoice('owl', [])).toEqual({ voice: null, substituted: false });
  });
});

describe('SynthesisService with the XTTS provider', () => {
  let server: StubServer;
  let speakers: unknown = ['fox', 'bear'];
  let renderRequests: Array<Record<string, string>> = [];
  let engineAudio: Buffer = makeWav(0.5, 12000);
  let renderFailure: string | null = null;

  beforeAll(async () => {
    server = await startStubServer((app) => {
      app.use(express.json());
      app.get('/speakers_list', (_req, res) => {
        res.json(speakers);
      });
      app.post('/tts_to_audio/', (req, res) => {
        renderRequests.push(req.body);
        if (renderFailure) {
          res.status(500).type('text/plain').send(renderFailure);
          return;
        }
        res.type('audio/wav').send(engineAudio);
      });
    });
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    speakers = ['fox', 'bear'];
    renderRequests = [];
    engineAudio = makeWav(0.5, 12000);
    renderFailure = null;
  });

  const createService = (outputFormat: 'wav' | 'mp3' = 'wav', baseUrl: string = server.baseUrl) => {
    const tts = new XTTSProvider(
      { type: 'xtts-http', baseUrl, defaultVoice: 'bear', language: 'ru' },
      silentLogger()
    );
    const decoder = { decode: vi.fn(async () => Buffer.alloc(24000 * 2)) };
    const transcoder = { wavToMp3: vi.fn(async () => Buffer.from('mp3-bytes')) };
    const service = new SynthesisService(tts, decoder, transcoder, { sampleRate: 24000, outputFormat }, silentLogger());
    return { service, decoder, transcoder };
  };

  it('lists the engine voices with the configured default', async () => {
    const { service } = createService();
    expect(await service.listVoices()).toEqual({ speakers: ['fox', 'bear'], default: 'bear' });
  });

  it('renders with the default voice and language, resampled to 24 kHz', async () => {
    const { service, decoder } = createService();

    const result = await service.synthesize({ text: '  Привет!  ' });

    expect(renderRequests).toEqual([{ text: 'Привет!', language: 'ru', speaker_wav: 'bear' }]);
    expect(result.format).toBe('wav');
    expect(result.contentType).toBe('audio/wav');
    expect(result.voice).toBe('bear');

    const wav = parseWav(result.audio);
    expect(wav?.sampleRate).toBe(24000);
    expect(wav?.channels).toBe(1);
    expect(wav?.pcm.length).toBe(12000 * 2);
    expect(decoder.decode).not.toHaveBeenCalled();
  });

  it('substitutes an unknown voice and passes the requested language', async () => {
    const { service } = createService();

    const result = await service.synthesize({ text: 'hello', voice: 'owl', language: 'en' });

    expect(result.voice).toBe('fox');
    expect(renderRequests[0]).toEqual({ text: 'hello', language: 'en', speaker_wav: 'fox' });
  });

  it('omits the speaker when the engine has a single built-in voice', async () => {
    speakers = [];
    const { service } = createService();

    const result = await service.synthesize({ text: 'hello' });

    expect(result.voice).toBeNull();
    expect(renderRequests[0]).toEqual({ text: 'hello', language: 'ru' });
  });

  it('down-mixes stereo engine output', async () => {
    engineAudio = makeWav(0.25, 24000, 2);
    const { service } = createService();

    const wav = parseWav((await service.synthesize({ text: 'hello' })).audio);
    expect(wav?.channels).toBe(1);
    expect(wav?.pcm.length).toBe(6000 * 2);
  });

  it('sends the internal WAV through the transcoder for mp3 output', async () => {
    const { service, transcoder } = createService('mp3');

    const result = await service.synthesize({ text: 'hello' });

    expect(result).toEqual({
      audio: Buffer.from('mp3-bytes'),
      format: 'mp3',
      contentType: 'audio/mpeg',
      voice: 'bear'
    });
    expect(transcoder.wavToMp3).toHaveBeenCalledTimes(1);
    expect(transcoder.wavToMp3).toHaveBeenCalledWith(expect.any(Buffer), 24000);
  });

  it('lets a request override the configured output format', async () => {
    const { service, transcoder } = createService('mp3');
    const result = await service.synthesize({ text: 'hello', format: 'wav' });

    expect(result.format).toBe('wav');
    expect(transcoder.wavToMp3).not.toHaveBeenCalled();
  });

  it('falls back to the decoder for non-WAV engine output', async () => {
    engineAudio = Buffer.from('ID3-not-a-wave');
    const { service, decoder } = createService();

    const wav = parseWav((await service.synthesize({ text: 'hello' })).audio);

    expect(decoder.decode).toHaveBeenCalledWith(engineAudio, null, 24000);
    expect(wav?.pcm.length).toBe(24000 * 2);
  });

  it('rejects blank text before contacting the engine', async () => {
    const { service } = createService();

    await expect(service.synthesize({ text: '   ' })).rejects.toBeInstanceOf(ValidationError);
    expect(renderRequests).toHaveLength(0);
  });

  it('reports an engine failure with its status and body', async () => {
    renderFailure = 'speaker file missing';
    const { service } = createService();

    await expect(service.synthesize({ text: 'hello' })).rejects.toMatchObject({
      upstreamStatus: 500,
      upstreamBody: 'speaker file missing'
    });
  });

  it('rejects a malformed speakers list', async () => {
    speakers = { voices: 'fox' };
    const { service } = createService();

    await expect(service.listVoices()).rejects.toBeInstanceOf(UpstreamError);
  });

  it('reports an unreachable engine as unavailable', async () => {
    const closed = await startStubServer(() => undefined);
    await closed.close();
    const { service } = createService('wav', closed.baseUrl);

    await expect(service.listVoices()).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });
});
