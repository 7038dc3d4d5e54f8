/**
 * API Server
 * Express server exposing transcription, adaptive chat, synthesis and sprite moderation
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { Server as HTTPServer, createServer } from 'http';
import cors from 'cors';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import {
  CompanionError,
  ConfigurationMissingError,
  LanguageCode,
  Logger,
  OutputAudioFormat,
  PayloadTooLargeError,
  SpeechMetrics,
  ValidationError,
  errorMessage
} from '../types';
import { ServerConfig } from '../config/app-config';
import { SpeechPipeline } from '../pipeline/speech-pipeline';
import { ConversationRelay } from '../pipeline/conversation-relay';
import { fromMetricsPayload, metricsPayloadSchema, optionalMetricsSchema } from '../pipeline/context-composer';
import { toTranscriptionPayload } from '../pipeline/speech-metrics';
import { SynthesisService } from '../services/synthesis-service';
import { SpriteStorage } from '../services/sprite-storage';
import { AccountService } from '../services/account-service';
import { asyncHandler, parseWith, requireApiKey } from './middleware';
import { createSpriteRouter } from './sprite-routes';

export interface APIServerConfig extends ServerConfig {
  maxAudioBytes: number;
  maxSpriteBytes: number;
  defaultLanguage: LanguageCode;
}

export interface APIServerDependencies {
  speechPipeline: SpeechPipeline;
  relay: ConversationRelay;
  synthesis: SynthesisService;
  /** Null when object storage is not configured */
  sprites: SpriteStorage | null;
  /** Null when user administration is not configured */
  accounts: AccountService | null;
}

// ===========================================
// Request schemas
// ===========================================

const turnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string()
});

const chatStreamSchema = z.object({
  model: z.string().nullish(),
  messages: z.array(turnSchema).default([]),
  metrics: optionalMetricsSchema
});

const chatSyncSchema = z.object({
  message: z.string(),
  model: z.string().nullish(),
  metrics: optionalMetricsSchema,
  character: z.string().optional()
});

const ttsSchema = z.object({
  text: z.string().default(''),
  voice: z.string().min(1).optional(),
  lang: z.string().min(1).optional(),
  format: z.string().optional()
});

const deleteUserSchema = z.object({ user_id: z.string().min(1) });

const AUDIO_BODY_TYPES = ['audio/*', 'application/octet-stream'];

function toMetrics(payload: z.output<typeof metricsPayloadSchema> | null | undefined): SpeechMetrics | undefined {
  return payload ? fromMetricsPayload(payload) : undefined;
}

function toOutputFormat(format: string | undefined): OutputAudioFormat | undefined {
  if (format === undefined) return undefined;
  return format.toLowerCase() === 'wav' ? 'wav' : 'mp3';
}

function readLanguage(req: Request, fallback: LanguageCode): LanguageCode {
  const fromQuery = req.query.language;
  if (typeof fromQuery === 'string' && fromQuery.trim()) {
    return fromQuery.trim();
  }

  // Multipart text fields land on req.body; raw uploads leave a Buffer there
  const body: unknown = req.body;
  if (body && typeof body === 'object' && !Buffer.isBuffer(body) && 'language' in body) {
    const fromField = body.language;
    if (typeof fromField === 'string' && fromField.trim()) {
      return fromField.trim();
    }
  }
  return fallback;
}

function bodyParserType(err: Error): string | undefined {
  return 'type' in err && typeof err.type === 'string' ? err.type : undefined;
}

export class APIServer {
  private app: Express;
  private httpServer: HTTPServer;
  private logger: Logger;
  private config: APIServerConfig;
  private deps: APIServerDependencies;
  private audioUpload: multer.Multer;

  constructor(config: APIServerConfig, deps: APIServerDependencies, logger: Logger) {
    this.config = config;
    this.deps = deps;
    this.logger = logger.child({ component: 'api-server' });

    this.app = express();
    this.httpServer = createServer(this.app);
    this.audioUpload = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: config.maxAudioBytes, files: 1 }
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.corsOrigins.includes('*') ? '*' : this.config.corsOrigins,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', this.config.apiKeyHeader],
      exposedHeaders: ['X-Request-Id']
    }));

    this.app.use(express.json({ limit: '1mb' }));

    // Request id + logging
    this.app.use((req, res, next) => {
      const startTime = Date.now();
      const requestId = req.header('X-Request-Id') || uuidv4();
      res.setHeader('X-Request-Id', requestId);

      res.on('finish', () => {
        this.logger.debug('HTTP request', {
          requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - startTime
        });
      });
      next();
    });
  }

  private setupRoutes(): void {
    const { speechPipeline, relay, synthesis, sprites, accounts } = this.deps;

    // Health check
    this.app.get('/health', (_req, res) => {
      res.json({ ok: true });
    });

    // ===========================================
    // SPEECH
    // ===========================================

    this.app.post(
      '/stt',
      this.audioUpload.single('file'),
      express.raw({ type: AUDIO_BODY_TYPES, limit: this.config.maxAudioBytes }),
      asyncHandler(async (req, res) => {
        const body: unknown = req.body;
        const bytes = req.file?.buffer ?? (Buffer.isBuffer(body) ? body : Buffer.alloc(0));
        const contentType = req.file?.mimetype ?? req.header('Content-Type');
        const language = readLanguage(req, this.config.defaultLanguage);

        const result = await speechPipeline.transcribe(bytes, contentType, language);
        res.json(toTranscriptionPayload(result));
      })
    );

    // ===========================================
    // CHAT
    // ===========================================

    this.app.post('/chat', asyncHandler(async (req, res) => {
      const body = parseWith(chatStreamSchema, req.body);
      const controller = new AbortController();

      // Client went away before the reply finished: drop the backend connection
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      let stream: AsyncIterable<Buffer>;
      try {
        stream = await relay.stream(
          { model: body.model || undefined, messages: body.messages },
          toMetrics(body.metrics),
          controller.signal
        );
      } catch (error) {
        if (controller.signal.aborted) {
          this.logger.debug('Chat request cancelled by client');
          return;
        }
        throw error;
      }

      res.status(200);
      res.setHeader('Content-Type', 'application/x-ndjson');
      res.flushHeaders();

      try {
        for await (const chunk of stream) {
          res.write(chunk);
        }
        res.end();
      } catch (error) {
        if (controller.signal.aborted) {
          this.logger.debug('Chat stream cancelled by client');
          return;
        }
        throw error;
      }
    }));

    this.app.post('/chat/sync', asyncHandler(async (req, res) => {
      const body = parseWith(chatSyncSchema, req.body);
      const response = await relay.complete(
        { model: body.model || undefined, messages: [{ role: 'user', content: body.message }] },
        toMetrics(body.metrics),
        { character: body.character }
      );
      res.json({ response });
    }));

    // ===========================================
    // SYNTHESIS
    // ===========================================

    this.app.post('/tts', asyncHandler(async (req, res) => {
      const body = parseWith(ttsSchema, req.body);
      if (!body.text.trim()) {
        res.status(400).end();
        return;
      }

      const result = await synthesis.synthesize({
        text: body.text,
        voice: body.voice,
        language: body.lang,
        format: toOutputFormat(body.format)
      });
      res.type(result.contentType).send(result.audio);
    }));

    this.app.get('/speakers', asyncHandler(async (_req, res) => {
      try {
        res.json(await synthesis.listVoices());
      } catch (error) {
        this.logger.warn('Speaker listing failed', { error: errorMessage(error) });
        res.json({ error: errorMessage(error), speakers: [], default: null });
      }
    }));

    // ===========================================
    // SPRITES & ACCOUNTS
    // ===========================================

    this.app.use('/sprites', createSpriteRouter(sprites, {
      maxSpriteBytes: this.config.maxSpriteBytes,
      apiKeyHeader: this.config.apiKeyHeader,
      adminApiKey: this.config.adminApiKey
    }));

    this.app.post(
      '/delete-user',
      requireApiKey(this.config.apiKeyHeader, this.config.adminApiKey),
      asyncHandler(async (req, res) => {
        if (!accounts) {
          throw new ConfigurationMissingError('user administration');
        }
        const { user_id: userId } = parseWith(deleteUserSchema, req.body);
        await accounts.deleteUser(userId);
        res.json({ ok: true });
      })
    );

    // Error handler
    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      this.handleError(err, req, res);
    });
  }

  private handleError(err: Error, req: Request, res: Response): void {
    const error = this.translateError(err, req);

    if (res.headersSent) {
      // Mid-stream failure: the status line is gone, so cut the connection
      this.logger.error('Error after response started', { path: req.path, error: err.message });
      res.destroy();
      return;
    }

    if (error) {
      const details = { path: req.path, code: error.code, error: error.message };
      if (error.statusCode >= 500) {
        this.logger.error('Request failed', details);
      } else {
        this.logger.debug('Request rejected', details);
      }
      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    this.logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method
    });
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred'
      }
    });
  }

  private translateError(err: Error, req: Request): CompanionError | null {
    if (err instanceof CompanionError) {
      return err;
    }
    if (err instanceof multer.MulterError) {
      if (err.code !== 'LIMIT_FILE_SIZE') {
        return new ValidationError(err.message, { field: err.field });
      }
      return req.path.startsWith('/sprites')
        ? new ValidationError(`File too large. Max: ${this.config.maxSpriteBytes / 1024 / 1024}MB`)
        : new PayloadTooLargeError(this.config.maxAudioBytes);
    }

    switch (bodyParserType(err)) {
      case 'entity.too.large':
        return new PayloadTooLargeError(this.config.maxAudioBytes);
      case 'entity.parse.failed':
        return new ValidationError('Malformed JSON body');
      default:
        return null;
    }
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer.listen(this.config.port, this.config.host, () => {
        this.logger.info('API server started', {
          host: this.config.host,
          port: this.config.port,
          sprites: this.deps.sprites !== null
        });
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

export default APIServer;
