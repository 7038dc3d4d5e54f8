/**
 * Speech Metrics Engine
 * Derives clarity and speaking-rate figures from recognition events.
 * Pure and synchronous: no I/O, no failure modes.
 */

import {
  ClarityLevel,
  RecognitionEvent,
  SpeechMetrics,
  SpeechMetricsPayload,
  TranscriptionPayload,
  TranscriptionResult
} from '../types';

export const HIGH_CLARITY_THRESHOLD = 0.75;
export const MEDIUM_CLARITY_THRESHOLD = 0.5;

/** Reported when the engine scored none of the events */
export const NEUTRAL_CONFIDENCE = 0.5;

/**
 * Step function over the average confidence; both lower bounds are inclusive.
 */
export function classifyClarity(avgConfidence: number): ClarityLevel {
  if (avgConfidence >= HIGH_CLARITY_THRESHOLD) {
    return 'high';
  }
  if (avgConfidence >= MEDIUM_CLARITY_THRESHOLD) {
    return 'medium';
  }
  return 'low';
}

export function computeSpeechMetrics(
  events: readonly RecognitionEvent[],
  durationSeconds: number
): SpeechMetrics {
  const wordCount = events.length;

  const scores: number[] = [];
  for (const event of events) {
    if (event.confidence !== undefined) {
      scores.push(event.confidence);
    }
  }

  const avgConfidence =
    scores.length > 0
      ? scores.reduce((sum, score) => sum + score, 0) / scores.length
      : NEUTRAL_CONFIDENCE;

  const wordsPerMinute = durationSeconds > 0 ? (wordCount * 60) / durationSeconds : 0;

  return {
    avgConfidence,
    wordsPerMinute,
    wordCount,
    clarityLevel: classifyClarity(avgConfidence)
  };
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Wire form. Rounding happens here only; classification already used the raw average.
 */
export function toMetricsPayload(metrics: SpeechMetrics): SpeechMetricsPayload {
  return {
    avg_confidence: roundTo(metrics.avgConfidence, 2),
    wpm: roundTo(metrics.wordsPerMinute, 1),
    word_count: metrics.wordCount,
    clarity_level: metrics.clarityLevel
  };
}

export function toTranscriptionPayload(result: TranscriptionResult): TranscriptionPayload {
  return {
    text: result.text,
    duration: result.durationSeconds,
    language: result.language,
    metrics: toMetricsPayload(result.metrics)
  };
}
