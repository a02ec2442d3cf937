/**
 * CRM: Core Type Definitions
 *
 * Configuration schema and the functional Result type shared by every layer.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const NaturalKeySchema = z.enum(['email', 'phone']);
export type NaturalKey = z.infer<typeof NaturalKeySchema>;

export const ConfigSchema = z.object({
  api: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(8000),
    body_limit_bytes: z.number().int().positive().default(10485760),
  }),
  database: z.object({
    file: z.string().default('crm.db'),
  }),
  paths: z.object({
    base_dir: z.string().default('~/.crm'),
    config_file: z.string().default('config.json'),
  }),
  pagination: z.object({
    default_page_size: z.number().int().positive().default(20),
    max_page_size: z.number().int().positive().default(100),
  }),
  import: z.object({
    natural_key: NaturalKeySchema.default('email'),
    sample_size: z.number().int().nonnegative().default(3),
    report_ttl_hours: z.number().positive().default(24),
    skip_unchanged: z.boolean().default(false),
  }),
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
