/**
 * Speech Companion API - Main Entry Point
 * Transcription, clarity-adaptive chat and synthesis for young speakers
 */

import dotenv from 'dotenv';
dotenv.config();

import { createLogger } from './utils/logger';
import { loadConfig } from './config/app-config';
import { createContainer, warmup } from './server/container';
import { APIServer } from './server/api-server';
import { errorMessage } from './types';

const config = loadConfig();

const logger = createLogger('speakup-api', {
  level: config.logLevel
});

async function main(): Promise<void> {
  logger.info('Starting speech companion API...');

  const container = createContainer(config, logger);

  const apiServer = new APIServer(
    {
      ...config.server,
      maxAudioBytes: config.limits.maxAudioBytes,
      maxSpriteBytes: config.storage.maxSpriteBytes,
      defaultLanguage: config.transcription.defaultLanguage
    },
    container,
    logger
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      await apiServer.stop();
      await Promise.all([container.stt.shutdown(), container.tts.shutdown()]);
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  await apiServer.start();

  // Engines warm up in the background; requests are served meanwhile
  warmup(container, config, logger).catch((error: unknown) => {
    logger.error('Warmup failed', { error: errorMessage(error) });
  });

  logger.info('Speech companion API is running', {
    port: config.server.port,
    host: config.server.host,
    completion: config.completion.baseUrl,
    transcription: config.transcription.baseUrl,
    synthesis: config.synthesis.baseUrl
  });
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
