/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseClient, createSupabaseAdmin } from './supabase.js';
export { createLogger, logger, SERVICE_NAME } from './logger.js';
export type { Logger } from './logger.js';
