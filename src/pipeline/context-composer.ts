/**
 * Context Composer
 * Turns speech metrics and the child's transcript into the system instruction
 * that sets the companion's tone. Pure and synchronous.
 */

import { z } from 'zod';
import { ConversationTurn, LanguageCode, SpeechMetrics } from '../types';
import { getPromptSet } from '../prompts/companion-prompts';
import { HIGH_CLARITY_THRESHOLD, MEDIUM_CLARITY_THRESHOLD } from './speech-metrics';

export const SLOW_SPEECH_WPM = 60;
export const FAST_SPEECH_WPM = 150;

export interface ContextOptions {
  /** Language the companion answers in; selects the prompt set */
  language?: LanguageCode;
  /** Optional persona the companion plays */
  character?: string;
}

/**
 * Client-supplied metrics in wire form. Missing fields assume a clear,
 * normal-paced utterance.
 */
export const metricsPayloadSchema = z.object({
  avg_confidence: z.number().min(0).max(1).default(1.0),
  wpm: z.number().min(0).default(100),
  word_count: z.number().int().min(0).default(0),
  clarity_level: z.enum(['high', 'medium', 'low']).default('high')
});

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

/**
 * Metrics field of a request body. An empty object counts as no metrics.
 */
export const optionalMetricsSchema = z.preprocess(
  (value) => (isEmptyObject(value) ? undefined : value),
  metricsPayloadSchema.nullish()
);

export function fromMetricsPayload(payload: z.output<typeof metricsPayloadSchema>): SpeechMetrics {
  return {
    avgConfidence: payload.avg_confidence,
    wordsPerMinute: payload.wpm,
    wordCount: payload.word_count,
    clarityLevel: payload.clarity_level
  };
}

export function buildSystemContext(
  metrics: SpeechMetrics,
  transcript: string,
  options: ContextOptions = {}
): string {
  const prompts = getPromptSet(options.language);
  const confidencePercent = Math.round(metrics.avgConfidence * 100);
  const wpm = metrics.wordsPerMinute.toFixed(1);

  let context = `${prompts.preamble}\n\n${prompts.measurement(confidencePercent, wpm)}\n`;

  // The raw average overrides a stale or optimistic level
  if (metrics.clarityLevel === 'low' || metrics.avgConfidence < MEDIUM_CLARITY_THRESHOLD) {
    context += prompts.lowClarity(transcript);
  } else if (metrics.clarityLevel === 'medium' || metrics.avgConfidence < HIGH_CLARITY_THRESHOLD) {
    context += prompts.mediumClarity(transcript);
  } else {
    context += prompts.highClarity(transcript);
  }

  if (metrics.wordsPerMinute < SLOW_SPEECH_WPM) {
    context += prompts.slowSpeechCue;
  } else if (metrics.wordsPerMinute > FAST_SPEECH_WPM) {
    context += prompts.fastSpeechCue;
  }

  const character = options.character?.trim();
  if (character) {
    context += `\n${prompts.character(character)}`;
  }

  return context;
}

/**
 * Prepend one system turn built from the latest turn. Without metrics, or
 * with no turns, the input is returned as is.
 */
export function prepareConversation(
  turns: readonly ConversationTurn[],
  metrics?: SpeechMetrics,
  options: ContextOptions = {}
): readonly ConversationTurn[] {
  if (!metrics || turns.length === 0) {
    return turns;
  }

  const latest = turns[turns.length - 1];
  const system: ConversationTurn = {
    role: 'system',
    content: buildSystemContext(metrics, latest.content, options)
  };
  return [system, ...turns];
}
