/**
 * Translation of HTTP client failures into the upstream error taxonomy
 */

import axios from 'axios';
import { Readable } from 'stream';
import {
  CompanionError,
  errorMessage,
  UpstreamError,
  UpstreamService,
  UpstreamUnavailableError
} from '../types';

/**
 * Collapse whatever axios handed back as a body (text, bytes, stream or
 * parsed JSON) into a string for diagnostics.
 */
export async function readResponseBody(data: unknown): Promise<string> {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');

  if (data instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
  }

  return JSON.stringify(data);
}

/**
 * Non-2xx responses become UpstreamError; anything that never produced a
 * response (refused, reset, timed out, cancelled) becomes UpstreamUnavailableError.
 */
export async function toUpstreamError(service: UpstreamService, error: unknown): Promise<CompanionError> {
  if (error instanceof CompanionError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const body = await readResponseBody(error.response.data);
      return new UpstreamError(service, error.response.status, body);
    }
    return new UpstreamUnavailableError(service, error.message);
  }

  return new UpstreamUnavailableError(service, errorMessage(error));
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
