/**
 * Sprite Storage
 *
 * Moderation workflow for children's drawings:
 * 1. A child uploads a drawing into the pending bucket
 * 2. An administrator reviews it, then uploads the final sprite into the approved bucket
 * 3. The app lists and shows approved sprites per user
 *
 * Objects live at `<userId>/<filename>` in both buckets.
 */

import { Logger, NotFoundError, ValidationError } from '../types';

export interface StoredObject {
  name: string;
  isFolder: boolean;
}

export interface UploadOptions {
  contentType: string;
  upsert: boolean;
}

/**
 * Minimal bucket API the sprite workflow needs
 */
export interface ObjectStorage {
  upload(bucket: string, path: string, data: Buffer, options: UploadOptions): Promise<void>;
  list(bucket: string, prefix?: string): Promise<StoredObject[]>;
  /** Resolves null when the object does not exist */
  createSignedUrl(bucket: string, path: string, expiresInSeconds: number): Promise<string | null>;
  /** Resolves null when the object does not exist */
  download(bucket: string, path: string): Promise<Buffer | null>;
  /** Resolves the number of objects actually removed */
  remove(bucket: string, paths: string[]): Promise<number>;
}

export interface SpriteStorageConfig {
  pendingBucket: string;
  approvedBucket: string;
  maxSpriteBytes: number;
  signedUrlTtlSeconds: number;
}

export const SPRITE_EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/jpg': '.jpg',
  'image/webp': '.webp'
};

export const ALLOWED_SPRITE_FORMATS = Object.keys(SPRITE_EXTENSIONS);

const MAX_NAME_LENGTH = 50;
const PENDING_NAME_CHARS = /[\p{L}\p{N}._\- ]/u;
const APPROVED_NAME_CHARS = /[\p{L}\p{N}_-]/u;

function keepChars(value: string, allowed: RegExp): string {
  return Array.from(value)
    .filter((char) => allowed.test(char))
    .join('')
    .slice(0, MAX_NAME_LENGTH);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function contentTypeForFilename(filename: string): string {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.jpg') || lower.endsWith('.jpeg')) return 'image/jpeg';
  if (lower.endsWith('.webp')) return 'image/webp';
  return 'image/png';
}

export type SpriteLocation =
  | { kind: 'url'; url: string }
  | { kind: 'bytes'; data: Buffer; contentType: string };

export class SpriteStorage {
  private logger: Logger;

  constructor(
    private storage: ObjectStorage,
    private config: SpriteStorageConfig,
    logger: Logger,
    private now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'sprite-storage' });
  }

  async savePending(
    userId: string,
    image: Buffer,
    contentType: string,
    originalFilename?: string
  ): Promise<string> {
    this.validateImage(contentType, image.length);
    const timestamp = formatTimestamp(this.now());
    const ext = SPRITE_EXTENSIONS[contentType];

    let filename: string;
    if (originalFilename) {
      filename = `${timestamp}_${keepChars(originalFilename, PENDING_NAME_CHARS)}`;
      if (!filename.endsWith(ext)) {
        filename += ext;
      }
    } else {
      filename = `${timestamp}_sprite${ext}`;
    }

    await this.storage.upload(this.config.pendingBucket, this.objectPath(userId, filename), image, {
      contentType,
      upsert: false
    });

    this.logger.info('Pending sprite saved', { userId, filename, bytes: image.length });
    return filename;
  }

  async approveSprite(userId: string, image: Buffer, contentType: string, spriteName: string): Promise<string> {
    this.validateImage(contentType, image.length);
    const cleanName = keepChars(spriteName, APPROVED_NAME_CHARS);
    if (!cleanName) {
      throw new ValidationError('Sprite name must contain letters or digits');
    }

    const filename = `${cleanName}${SPRITE_EXTENSIONS[contentType]}`;
    await this.storage.upload(this.config.approvedBucket, this.objectPath(userId, filename), image, {
      contentType,
      upsert: true
    });

    this.logger.info('Sprite approved', { userId, filename });
    return filename;
  }

  /**
   * Pending filenames grouped by user; one user when userId is given
   */
  async listPending(userId?: string): Promise<Record<string, string[]>> {
    if (userId) {
      return { [userId]: await this.listFiles(this.config.pendingBucket, this.checkSegment(userId)) };
    }

    const result: Record<string, string[]> = {};
    const folders = (await this.storage.list(this.config.pendingBucket)).filter((entry) => entry.isFolder);
    for (const folder of folders) {
      result[folder.name] = await this.listFiles(this.config.pendingBucket, folder.name);
    }
    return result;
  }

  async listApproved(userId: string): Promise<string[]> {
    return this.listFiles(this.config.approvedBucket, this.checkSegment(userId));
  }

  async getSpriteUrl(userId: string, filename: string, pending: boolean = false): Promise<string | null> {
    return this.storage.createSignedUrl(
      this.bucket(pending),
      this.objectPath(userId, filename),
      this.config.signedUrlTtlSeconds
    );
  }

  async getSpriteBytes(userId: string, filename: string, pending: boolean = false): Promise<Buffer | null> {
    return this.storage.download(this.bucket(pending), this.objectPath(userId, filename));
  }

  /**
   * Signed URL when storage can issue one, otherwise the raw bytes
   */
  async locateSprite(userId: string, filename: string, pending: boolean = false): Promise<SpriteLocation> {
    const url = await this.getSpriteUrl(userId, filename, pending);
    if (url) {
      return { kind: 'url', url };
    }

    const data = await this.getSpriteBytes(userId, filename, pending);
    if (!data) {
      throw new NotFoundError(pending ? 'Pending sprite' : 'Sprite');
    }
    return { kind: 'bytes', data, contentType: contentTypeForFilename(filename) };
  }

  async deletePending(userId: string, filename: string): Promise<void> {
    const removed = await this.storage.remove(this.config.pendingBucket, [this.objectPath(userId, filename)]);
    if (removed === 0) {
      throw new NotFoundError('Pending sprite');
    }
    this.logger.info('Pending sprite deleted', { userId, filename });
  }

  private async listFiles(bucket: string, folder: string): Promise<string[]> {
    const entries = await this.storage.list(bucket, folder);
    return entries.filter((entry) => !entry.isFolder).map((entry) => entry.name);
  }

  private validateImage(contentType: string, size: number): void {
    if (!ALLOWED_SPRITE_FORMATS.includes(contentType)) {
      throw new ValidationError(`Invalid format. Allowed: ${ALLOWED_SPRITE_FORMATS.join(', ')}`, {
        contentType
      });
    }

    if (size > this.config.maxSpriteBytes) {
      const actualMb = (size / 1024 / 1024).toFixed(1);
      const maxMb = this.config.maxSpriteBytes / 1024 / 1024;
      throw new ValidationError(`File too large (${actualMb}MB). Max: ${maxMb}MB`, { size });
    }
  }

  private bucket(pending: boolean): string {
    return pending ? this.config.pendingBucket : this.config.approvedBucket;
  }

  private objectPath(userId: string, filename: string): string {
    return `${this.checkSegment(userId)}/${this.checkSegment(filename)}`;
  }

  // Path segments come from URLs and query strings
  private checkSegment(segment: string): string {
    if (!segment || segment.includes('/') || segment.includes('\\') || segment === '.' || segment === '..') {
      throw new ValidationError('Invalid path segment', { segment });
    }
    return segment;
  }
}
