/**
 * Sprite Routes
 * Child uploads, approved sprite listing and the admin review workflow
 */

import { Router, Request, Response, RequestHandler } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { ConfigurationMissingError, ValidationError } from '../types';
import { SpriteLocation, SpriteStorage } from '../services/sprite-storage';
import { asyncHandler, parseWith, requireApiKey } from './middleware';

export interface SpriteRouterOptions {
  maxSpriteBytes: number;
  apiKeyHeader: string;
  adminApiKey?: string;
}

const userQuerySchema = z.object({ user_id: z.string().min(1) });
const pendingQuerySchema = z.object({ user_id: z.string().min(1).optional() });
const approveQuerySchema = z.object({
  user_id: z.string().min(1),
  sprite_name: z.string().min(1)
});

function sendSprite(res: Response, location: SpriteLocation): void {
  if (location.kind === 'url') {
    res.redirect(307, location.url);
    return;
  }
  res.type(location.contentType).send(location.data);
}

function requireFile(req: Request): Express.Multer.File {
  if (!req.file) {
    throw new ValidationError('file is required');
  }
  return req.file;
}

// ===========================================
// Create Router
// ===========================================

export function createSpriteRouter(sprites: SpriteStorage | null, options: SpriteRouterOptions): Router {
  const router = Router();

  // Moderately oversized images reach the service and get its 400 with the actual size
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxSpriteBytes * 2, files: 1 }
  });

  const requireStorage: RequestHandler = (_req, _res, next) => {
    next(sprites ? undefined : new ConfigurationMissingError('storage'));
  };
  const adminOnly = requireApiKey(options.apiKeyHeader, options.adminApiKey);

  const storage = (): SpriteStorage => {
    if (!sprites) {
      throw new ConfigurationMissingError('storage');
    }
    return sprites;
  };

  router.use(requireStorage);

  // ===========================================
  // USER ROUTES
  // ===========================================

  router.post('/upload-pending', upload.single('file'), asyncHandler(async (req, res) => {
    const { user_id: userId } = parseWith(userQuerySchema, req.query, 'query');
    const file = requireFile(req);

    const filename = await storage().savePending(userId, file.buffer, file.mimetype, file.originalname || undefined);
    res.json({ ok: true, message: 'Sprite uploaded for review', filename });
  }));

  router.get('/list', asyncHandler(async (req, res) => {
    const { user_id: userId } = parseWith(userQuerySchema, req.query, 'query');
    const spriteNames = await storage().listApproved(userId);
    res.json({ user_id: userId, sprites: spriteNames });
  }));

  router.get('/image/:userId/:filename', asyncHandler(async (req, res) => {
    const location = await storage().locateSprite(req.params.userId, req.params.filename, false);
    sendSprite(res, location);
  }));

  // ===========================================
  // ADMIN ROUTES
  // ===========================================

  router.get('/admin/pending', adminOnly, asyncHandler(async (req, res) => {
    const { user_id: userId } = parseWith(pendingQuerySchema, req.query, 'query');
    const pending = await storage().listPending(userId);
    res.json({ pending });
  }));

  router.get('/admin/pending/:userId/:filename', adminOnly, asyncHandler(async (req, res) => {
    const location = await storage().locateSprite(req.params.userId, req.params.filename, true);
    sendSprite(res, location);
  }));

  router.delete('/admin/pending/:userId/:filename', adminOnly, asyncHandler(async (req, res) => {
    await storage().deletePending(req.params.userId, req.params.filename);
    res.json({ ok: true, message: 'Pending sprite deleted' });
  }));

  router.post('/admin/approve', adminOnly, upload.single('file'), asyncHandler(async (req, res) => {
    const { user_id: userId, sprite_name: spriteName } = parseWith(approveQuerySchema, req.query, 'query');
    const file = requireFile(req);

    const filename = await storage().approveSprite(userId, file.buffer, file.mimetype, spriteName);
    res.json({ ok: true, message: `Sprite approved for user ${userId}`, filename });
  }));

  return router;
}
