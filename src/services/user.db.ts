/**
 * User Repository
 * Accounts are stored in the identity directory (Supabase Auth)
 */

import {
  createDirectoryRepository,
  type DirectoryClient,
  type DirectoryEntry,
  type FieldMap,
  type Repository,
} from '../db/index.js';
import type { User, UserCreate, UserUpdate } from '../types/index.js';

export type UserRepository = Repository<UserCreate, UserUpdate, User>;

/**
 * Row of the `users_view` view embedded into profile reads
 */
export interface UserViewRow {
  id: string;
  email: string | null;
  phone: string | null;
  role: string | null;
  last_sign_in_at: string | null;
  created_at: string;
  updated_at: string | null;
}

export const USER_FIELDS: FieldMap = {
  id: { column: 'id', type: 'string' },
  email: { column: 'email', type: 'string' },
  phone: { column: 'phone', type: 'string' },
  role: { column: 'role', type: 'string' },
  createdAt: { column: 'created_at', type: 'timestamp' },
  lastSignInAt: { column: 'last_sign_in_at', type: 'timestamp' },
};

function optionalDate(value: string | null | undefined): Date | null {
  return value !== null && value !== undefined && value !== '' ? new Date(value) : null;
}

export function mapEntryToUser(entry: DirectoryEntry): User {
  return Object.freeze({
    id: entry.id,
    email: entry.email ?? '',
    phone: entry.phone ?? '',
    role: entry.role ?? '',
    lastSignInAt: optionalDate(entry.last_sign_in_at),
    createdAt: new Date(entry.created_at),
    updatedAt: optionalDate(entry.updated_at),
  });
}

export function mapViewRowToUser(row: UserViewRow): User {
  return Object.freeze({
    id: row.id,
    email: row.email ?? '',
    phone: row.phone ?? '',
    role: row.role ?? '',
    lastSignInAt: optionalDate(row.last_sign_in_at),
    createdAt: new Date(row.created_at),
    updatedAt: optionalDate(row.updated_at),
  });
}

/**
 * Create the user repository over a directory client
 */
export function createUserRepository(client: DirectoryClient): UserRepository {
  return createDirectoryRepository<UserCreate, UserUpdate, User>(client, {
    resource: 'user',
    fields: USER_FIELDS,
    searchColumns: ['email', 'phone'],
    toAttributes: (value) => ({
      email: value.email,
      password: value.password,
      phone: value.phone,
      role: value.role,
      email_confirm: true,
    }),
    toUpdateAttributes: (value) => ({
      email: value.email,
      password: value.password,
      phone: value.phone,
      role: value.role,
    }),
    fromEntry: mapEntryToUser,
  });
}
