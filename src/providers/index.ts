/**
 * Provider Registry and Exports
 * Importing this module registers every implementation with its factory
 */

// Base classes
export { STTProvider, STTProviderFactory } from './base/stt-provider';
export { LLMProvider, LLMProviderFactory } from './base/llm-provider';
export { TTSProvider, TTSProviderFactory } from './base/tts-provider';

// STT Providers
export { WhisperSTTProvider } from './stt/whisper-stt';

// LLM Providers
export { OllamaLLMProvider } from './llm/ollama-llm';

// TTS Providers
export { XTTSProvider } from './tts/xtts-tts';
