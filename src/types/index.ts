/**
 * Core type definitions for the companion backend
 * All shared types, interfaces, and error classes are defined here
 */

// ============================================================================
// LANGUAGE & AUDIO TYPES
// ============================================================================

/** ISO 639-1 code understood by the recognition and synthesis engines */
export type LanguageCode = string;

/** Canonical codec tags the decoder understands */
export type AudioFormatTag = 'wav' | 'mp3' | 'ogg' | 'webm' | 'm4a';

export type OutputAudioFormat = 'wav' | 'mp3';

/**
 * Audio normalized to a single channel of signed 16-bit little-endian PCM
 * at the rate required by the recognition engine.
 */
export interface CanonicalAudio {
  pcm: Buffer;
  sampleRate: number;
  durationSeconds: number;
}

// ============================================================================
// PROVIDER TYPES
// ============================================================================

export type STTProviderType = 'whisper-http';
export type LLMProviderType = 'ollama';
export type TTSProviderType = 'xtts-http';

export interface ProviderCredentials {
  apiKey?: string;
}

export interface ProviderConfig {
  type: string;
  baseUrl: string;
  credentials?: ProviderCredentials;
  timeout?: number;
}

// ============================================================================
// STT (Speech-to-Text) TYPES
// ============================================================================

export interface STTConfig extends ProviderConfig {
  type: STTProviderType;
  model: string;
  language: LanguageCode;
}

/** One recognized unit of speech, in utterance order */
export interface RecognitionEvent {
  readonly text: string;
  readonly confidence?: number;
}

export interface RecognitionOutput {
  text: string;
  events: RecognitionEvent[];
}

// ============================================================================
// SPEECH METRICS TYPES
// ============================================================================

export type ClarityLevel = 'high' | 'medium' | 'low';

export interface SpeechMetrics {
  readonly avgConfidence: number;
  readonly wordsPerMinute: number;
  readonly wordCount: number;
  readonly clarityLevel: ClarityLevel;
}

export interface TranscriptionResult {
  text: string;
  durationSeconds: number;
  language: LanguageCode;
  metrics: SpeechMetrics;
}

/** Wire form of SpeechMetrics, as sent to and received from clients */
export interface SpeechMetricsPayload {
  avg_confidence: number;
  wpm: number;
  word_count: number;
  clarity_level: ClarityLevel;
}

export interface TranscriptionPayload {
  text: string;
  duration: number;
  language: LanguageCode;
  metrics: SpeechMetricsPayload;
}

// ============================================================================
// LLM (Conversation) TYPES
// ============================================================================

export interface LLMConfig extends ProviderConfig {
  type: LLMProviderType;
  model: string;
}

export type ConversationRole = 'system' | 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: ConversationRole;
  readonly content: string;
}

export interface ConversationRequest {
  model?: string;
  messages: readonly ConversationTurn[];
}

// ============================================================================
// TTS (Text-to-Speech) TYPES
// ============================================================================

export interface TTSConfig extends ProviderConfig {
  type: TTSProviderType;
  defaultVoice: string;
  language: LanguageCode;
}

export interface VoiceResolution {
  voice: string | null;
  substituted: boolean;
}

// ============================================================================
// LOGGING TYPES
// ============================================================================

export interface Logger {
  debug: (msg: string, data?: Record<string, unknown>) => void;
  info: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
  error: (msg: string, data?: Record<string, unknown>) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DECODE_ERROR'
  | 'PAYLOAD_TOO_LARGE'
  | 'AUDIO_TOO_LONG'
  | 'UPSTREAM_UNAVAILABLE'
  | 'UPSTREAM_ERROR'
  | 'CONFIGURATION_MISSING'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED';

/** Backend services an adapter talks to */
export type UpstreamService = 'completion' | 'transcription' | 'synthesis' | 'storage';

export class CompanionError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CompanionError';
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details
      }
    };
  }
}

export class ValidationError extends CompanionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class DecodeError extends CompanionError {
  constructor(
    public contentType: string | undefined,
    decoderMessage: string
  ) {
    super(
      `Could not decode audio (${contentType ?? 'unknown content type'}). ${decoderMessage}`,
      'DECODE_ERROR',
      400,
      { contentType: contentType ?? null }
    );
    this.name = 'DecodeError';
  }
}

export class PayloadTooLargeError extends CompanionError {
  constructor(maxBytes: number, actualBytes?: number) {
    super('Audio too large', 'PAYLOAD_TOO_LARGE', 413, { maxBytes, actualBytes });
    this.name = 'PayloadTooLargeError';
  }
}

export class AudioTooLongError extends CompanionError {
  constructor(
    public durationSeconds: number,
    maxSeconds: number
  ) {
    super(
      `Audio too long (${durationSeconds.toFixed(1)}s)`,
      'AUDIO_TOO_LONG',
      400,
      { durationSeconds, maxSeconds }
    );
    this.name = 'AudioTooLongError';
  }
}

export class UpstreamUnavailableError extends CompanionError {
  constructor(
    public service: UpstreamService,
    message: string
  ) {
    super(`${service} backend unavailable: ${message}`, 'UPSTREAM_UNAVAILABLE', 503, { service });
    this.name = 'UpstreamUnavailableError';
  }
}

export class UpstreamError extends CompanionError {
  constructor(
    public service: UpstreamService,
    public upstreamStatus: number,
    public upstreamBody: string
  ) {
    super(
      `${service} backend returned ${upstreamStatus}: ${upstreamBody}`,
      'UPSTREAM_ERROR',
      502,
      { service, status: upstreamStatus, body: upstreamBody }
    );
    this.name = 'UpstreamError';
  }
}

export class ConfigurationMissingError extends CompanionError {
  constructor(feature: string) {
    super(`Service unavailable: ${feature} not configured`, 'CONFIGURATION_MISSING', 503, { feature });
    this.name = 'ConfigurationMissingError';
  }
}

export class NotFoundError extends CompanionError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class UnauthorizedError extends CompanionError {
  constructor(message = 'API key required') {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
