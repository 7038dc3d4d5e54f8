/**
 * Shared test fixtures
 */

import express, { Express } from 'express';
import { Server } from 'http';
import { createLogger } from '../utils/logger';
import { encodeWav } from '../audio/audio-converter';
import { Logger } from '../types';
import { ObjectStorage, StoredObject, UploadOptions } from '../services/sprite-storage';

export function silentLogger(): Logger {
  return createLogger('test', { level: 'silent', pretty: false });
}

/**
 * PCM16 WAV of a constant tone level, interleaved over the given channel count
 */
export function makeWav(seconds: number, sampleRate: number, channels: number = 1, level: number = 1000): Buffer {
  const frames = Math.round(seconds * sampleRate);
  const pcm = Buffer.alloc(frames * channels * 2);
  for (let i = 0; i < frames * channels; i++) {
    pcm.writeInt16LE(level, i * 2);
  }
  return encodeWav(pcm, sampleRate, channels);
}

export interface StubServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Bind an Express app to an ephemeral loopback port
 */
export function startStubServer(configure: (app: Express) => void): Promise<StubServer> {
  const app = express();
  configure(app);

  return new Promise((resolve) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          })
      });
    });
  });
}

/**
 * Bucket store held in a Map, keyed by `<bucket>:<path>`
 */
export class MemoryObjectStorage implements ObjectStorage {
  readonly objects = new Map<string, { data: Buffer; contentType: string }>();
  signedUrls = false;

  async upload(bucket: string, path: string, data: Buffer, options: UploadOptions): Promise<void> {
    const key = `${bucket}:${path}`;
    if (!options.upsert && this.objects.has(key)) {
      throw new Error(`The resource already exists: ${path}`);
    }
    this.objects.set(key, { data, contentType: options.contentType });
  }

  async list(bucket: string, prefix?: string): Promise<StoredObject[]> {
    const paths = Array.from(this.objects.keys())
      .filter((key) => key.startsWith(`${bucket}:`))
      .map((key) => key.slice(bucket.length + 1));

    if (!prefix) {
      const folders = new Set(paths.map((path) => path.split('/')[0]));
      return Array.from(folders).map((name) => ({ name, isFolder: true }));
    }
    return paths
      .filter((path) => path.startsWith(`${prefix}/`))
      .map((path) => ({ name: path.slice(prefix.length + 1), isFolder: false }));
  }

  async createSignedUrl(bucket: string, path: string, expiresInSeconds: number): Promise<string | null> {
    if (!this.signedUrls || !this.objects.has(`${bucket}:${path}`)) return null;
    return `https://storage.test/${bucket}/${path}?expires=${expiresInSeconds}`;
  }

  async download(bucket: string, path: string): Promise<Buffer | null> {
    return this.objects.get(`${bucket}:${path}`)?.data ?? null;
  }

  async remove(bucket: string, paths: string[]): Promise<number> {
    let removed = 0;
    for (const path of paths) {
      if (this.objects.delete(`${bucket}:${path}`)) removed++;
    }
    return removed;
  }
}
