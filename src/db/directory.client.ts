/**
 * Directory Client
 * Port over the identity directory, implemented with the Supabase Auth admin API
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { DirectoryFailure } from './errors.js';

/**
 * Account record as the directory returns it
 */
export interface DirectoryEntry {
  id: string;
  email?: string | undefined;
  phone?: string | undefined;
  role?: string | undefined;
  last_sign_in_at?: string | undefined;
  created_at: string;
  updated_at?: string | undefined;
}

export interface DirectoryAttributes {
  email?: string;
  password?: string;
  phone?: string;
  role?: string;
  email_confirm?: boolean;
}

export type DirectoryResponse<T> =
  | { data: T; error: null }
  | { data: null; error: DirectoryFailure };

export interface DirectoryPage {
  page: number;
  perPage: number;
}

export interface DirectoryClient {
  createUser(attributes: DirectoryAttributes): Promise<DirectoryResponse<DirectoryEntry>>;
  getUserById(id: string): Promise<DirectoryResponse<DirectoryEntry>>;
  updateUserById(
    id: string,
    attributes: DirectoryAttributes
  ): Promise<DirectoryResponse<DirectoryEntry>>;
  deleteUser(id: string): Promise<DirectoryResponse<null>>;
  listUsers(page: DirectoryPage): Promise<DirectoryResponse<DirectoryEntry[]>>;
}

function failed(error: { message: string; status?: number | undefined }): {
  data: null;
  error: DirectoryFailure;
} {
  return { data: null, error: { message: error.message, status: error.status } };
}

/**
 * Wrap `supabase.auth.admin`; the client must be created with the service key
 */
export function createSupabaseDirectoryClient(supabase: SupabaseClient): DirectoryClient {
  const admin = supabase.auth.admin;

  return {
    async createUser(attributes) {
      const response = await admin.createUser(attributes);
      if (response.error !== null) {
        return failed(response.error);
      }
      return { data: response.data.user, error: null };
    },

    async getUserById(id) {
      const response = await admin.getUserById(id);
      if (response.error !== null) {
        return failed(response.error);
      }
      return { data: response.data.user, error: null };
    },

    async updateUserById(id, attributes) {
      const response = await admin.updateUserById(id, attributes);
      if (response.error !== null) {
        return failed(response.error);
      }
      return { data: response.data.user, error: null };
    },

    async deleteUser(id) {
      const response = await admin.deleteUser(id);
      if (response.error !== null) {
        return failed(response.error);
      }
      return { data: null, error: null };
    },

    async listUsers({ page, perPage }) {
      const response = await admin.listUsers({ page, perPage });
      if (response.error !== null) {
        return failed(response.error);
      }
      return { data: response.data.users, error: null };
    },
  };
}
