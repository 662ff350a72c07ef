/**
 * Application Entry Point
 *
 * Loads configuration, wires repositories and services, and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { loadConfig } from './config/env.js';
import { createSupabaseDirectoryClient } from './db/index.js';
import { createSupabaseAdmin, createSupabaseClient, logger } from './lib/index.js';
import {
  createAchievementService,
  createBadgeRepository,
  createBadgeService,
  createProfileRepository,
  createSupabaseStorageAdapter,
  createUserBadgeRepository,
  createUserBadgeService,
  createUserProfileService,
  createUserRepository,
  createUserService,
} from './services/index.js';

const config = loadConfig();
logger.level = config.logLevel;

// Supabase clients: admin for data, anon for verifying caller tokens
const admin = createSupabaseAdmin(config.supabase);
const anon = createSupabaseClient(config.supabase);

// Wire all repositories
const users = createUserRepository(createSupabaseDirectoryClient(admin));
const profiles = createProfileRepository(admin);
const badges = createBadgeRepository(admin);
const userBadges = createUserBadgeRepository(admin);
const storage = createSupabaseStorageAdapter(admin, config.storageBucket);

// Wire all services
const queryConfig = config.query;

const achievementService = createAchievementService({
  badges,
  userBadges,
  rules: config.achievements,
});

const app = createApp({
  supabaseClient: anon,
  services: {
    userService: createUserService({ users, queryConfig }),
    badgeService: createBadgeService({ badges, queryConfig }),
    userProfileService: createUserProfileService({
      profiles,
      users,
      storage,
      achievements: achievementService,
      queryConfig,
    }),
    userBadgeService: createUserBadgeService({ userBadges, users, badges, queryConfig }),
  },
  allowedOrigins: config.allowedOrigins,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, supabaseUrl: config.supabase.url }, 'Server started');
});

export { app };
