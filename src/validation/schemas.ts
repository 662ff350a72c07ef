/**
 * Payload Schemas
 * Rule sets for every write model accepted by the services
 */

import type {
  BadgeCreate,
  BadgeUpdate,
  UserBadgeCreate,
  UserCreate,
  UserProfileCreate,
  UserProfileUpdate,
  UserUpdate,
} from '../types/index.js';

import { rules } from './rules.js';
import { defineSchema } from './validator.js';

const MAX_NAME_LENGTH = 255;
const MAX_TEXT_LENGTH = 2000;
const MAX_URL_LENGTH = 2048;
const MAX_PHONE_LENGTH = 20;

export const identifierSchema = defineSchema<{ id: string }>('identifier', {
  id: [rules.required(), rules.identifier()],
});

export const userCreateSchema = defineSchema<UserCreate>('user', {
  email: [rules.required(), rules.email()],
  password: [rules.required(), rules.password()],
  phone: [rules.max(MAX_PHONE_LENGTH)],
});

export const userUpdateSchema = defineSchema<UserUpdate>('user update', {
  id: [rules.required(), rules.identifier()],
  email: [rules.email()],
  password: [rules.password()],
  phone: [rules.max(MAX_PHONE_LENGTH)],
});

export const profileCreateSchema = defineSchema<UserProfileCreate>('profile', {
  userId: [rules.required(), rules.identifier()],
  fullname: [rules.required(), rules.min(2), rules.max(MAX_NAME_LENGTH)],
  bio: [rules.max(MAX_TEXT_LENGTH)],
  avatarUrl: [rules.max(MAX_URL_LENGTH)],
});

export const profileUpdateSchema = defineSchema<UserProfileUpdate>(
  'profile update',
  {
    id: [rules.required(), rules.identifier()],
    fullname: [rules.min(2), rules.max(MAX_NAME_LENGTH)],
    bio: [rules.max(MAX_TEXT_LENGTH)],
  }
);

export const badgeCreateSchema = defineSchema<BadgeCreate>('badge', {
  name: [rules.required(), rules.max(MAX_NAME_LENGTH)],
  description: [rules.max(MAX_TEXT_LENGTH)],
  iconUrl: [rules.max(MAX_URL_LENGTH)],
});

export const badgeUpdateSchema = defineSchema<BadgeUpdate>('badge update', {
  id: [rules.required(), rules.identifier()],
  name: [rules.max(MAX_NAME_LENGTH)],
  description: [rules.max(MAX_TEXT_LENGTH)],
  iconUrl: [rules.max(MAX_URL_LENGTH)],
});

export const userBadgeCreateSchema = defineSchema<UserBadgeCreate>(
  'user badge',
  {
    userId: [rules.required(), rules.identifier()],
    badgeId: [rules.required(), rules.identifier()],
  }
);

export const emailLookupSchema = defineSchema<{ email: string }>('email lookup', {
  email: [rules.required(), rules.email()],
});

export const nameLookupSchema = defineSchema<{ name: string }>('name lookup', {
  name: [rules.required(), rules.max(MAX_NAME_LENGTH)],
});
