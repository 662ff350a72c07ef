/**
 * User Types
 * Accounts live in the identity directory, not in a table
 */

export type UserRole = 'authenticated' | 'admin' | 'moderator';

/**
 * User read model
 */
export interface User {
  id: string;
  email: string;
  phone: string;
  role: string;
  lastSignInAt: Date | null;
  createdAt: Date;
  updatedAt: Date | null;
}

/**
 * Payload for registering a new account
 */
export interface UserCreate {
  email: string;
  password: string;
  phone?: string;
  role?: UserRole;
}

/**
 * Partial account update; omitted or empty fields keep their stored value
 */
export interface UserUpdate {
  id: string;
  email?: string;
  phone?: string;
  password?: string;
  role?: UserRole;
}
