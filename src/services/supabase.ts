/**
 * Supabase Client
 *
 * Service-role client for bucket storage and user administration. Built once
 * at start-up; absent credentials disable the dependent routes.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StorageConfig } from '../config/app-config';
import {
  CompanionError,
  NotFoundError,
  UpstreamError,
  UpstreamUnavailableError
} from '../types';
import { ObjectStorage, StoredObject, UploadOptions } from './sprite-storage';
import { UserDirectory } from './account-service';

// Supabase keeps this marker object in otherwise empty folders
const FOLDER_PLACEHOLDER = '.emptyFolderPlaceholder';

export function createSupabaseAdmin(config: StorageConfig): SupabaseClient | null {
  if (!config.supabaseUrl || !config.secretKey) {
    return null;
  }

  return createClient(config.supabaseUrl, config.secretKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    }
  });
}

function statusOf(error: object): number | undefined {
  return 'status' in error && typeof error.status === 'number' ? error.status : undefined;
}

function toStorageError(error: Error): CompanionError {
  const status = statusOf(error);
  if (status === undefined) {
    return new UpstreamUnavailableError('storage', error.message);
  }
  return new UpstreamError('storage', status, error.message);
}

function isMissing(error: Error): boolean {
  const status = statusOf(error);
  return status === 400 || status === 404 || /not.?found/i.test(error.message);
}

export class SupabaseObjectStorage implements ObjectStorage {
  constructor(private client: SupabaseClient) {}

  async upload(bucket: string, path: string, data: Buffer, options: UploadOptions): Promise<void> {
    const { error } = await this.client.storage.from(bucket).upload(path, data, {
      contentType: options.contentType,
      upsert: options.upsert
    });
    if (error) throw toStorageError(error);
  }

  async list(bucket: string, prefix?: string): Promise<StoredObject[]> {
    const { data, error } = await this.client.storage.from(bucket).list(prefix);
    if (error) throw toStorageError(error);

    return (data ?? [])
      .filter((entry) => entry.name && entry.name !== FOLDER_PLACEHOLDER)
      .map((entry) => ({ name: entry.name, isFolder: !entry.id }));
  }

  async createSignedUrl(bucket: string, path: string, expiresInSeconds: number): Promise<string | null> {
    const { data, error } = await this.client.storage.from(bucket).createSignedUrl(path, expiresInSeconds);
    if (error) {
      if (isMissing(error)) return null;
      throw toStorageError(error);
    }
    return data?.signedUrl ?? null;
  }

  async download(bucket: string, path: string): Promise<Buffer | null> {
    const { data, error } = await this.client.storage.from(bucket).download(path);
    if (error) {
      if (isMissing(error)) return null;
      throw toStorageError(error);
    }
    return data ? Buffer.from(await data.arrayBuffer()) : null;
  }

  async remove(bucket: string, paths: string[]): Promise<number> {
    const { data, error } = await this.client.storage.from(bucket).remove(paths);
    if (error) throw toStorageError(error);
    return data?.length ?? 0;
  }
}

export class SupabaseUserDirectory implements UserDirectory {
  constructor(private client: SupabaseClient) {}

  async deleteUser(userId: string): Promise<void> {
    const { error } = await this.client.auth.admin.deleteUser(userId);
    if (!error) return;

    if (statusOf(error) === 404) {
      throw new NotFoundError('User');
    }
    throw toStorageError(error);
  }
}
