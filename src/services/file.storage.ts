/**
 * Supabase Storage Adapter
 * Implementation of the BlobStorage port over one Supabase Storage bucket
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { guard } from '../db/index.js';
import { RepositoryError } from '../types/index.js';

export type BlobBody = Blob | ArrayBuffer | Uint8Array;

/**
 * Blob storage port used by the profile service
 */
export interface BlobStorage {
  /** Store the object, replacing any previous one, and return its path */
  upload(path: string, body: BlobBody, contentType: string): Promise<string>;
  getPublicUrl(path: string): string;
}

/**
 * Create Supabase Storage adapter
 */
export function createSupabaseStorageAdapter(
  supabase: SupabaseClient,
  bucket: string
): BlobStorage {
  return {
    async upload(path, body, contentType) {
      return guard('upload file', async () => {
        const result = await supabase.storage
          .from(bucket)
          .upload(path, body, { contentType, upsert: true });

        if (result.error !== null) {
          throw new RepositoryError(
            'BACKEND_ERROR',
            `Failed to upload file: ${result.error.message}`,
            { cause: result.error, details: { path } }
          );
        }
        return result.data.path;
      });
    },

    getPublicUrl(path) {
      const { data } = supabase.storage.from(bucket).getPublicUrl(path);
      return data.publicUrl;
    },
  };
}
