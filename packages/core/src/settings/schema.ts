/**
 * @fileoverview Settings file schema
 *
 * Zod schema for ~/.titlecast/settings.json. Every key is optional; unknown
 * keys are rejected.
 *
 * The text schemas below parse the same values when they arrive as strings
 * from the environment or the command line.
 */

import { z } from 'zod';
import { MAX_MESSAGES, MIN_MESSAGES } from '../packaging/direct.js';
import { isLogLevel, type LogLevel } from '../logging/types.js';

export const MIN_TIMEOUT_MS = 1000;
export const MAX_TIMEOUT_MS = 600_000;

export const userSettingsSchema = z.object({
  api: z.object({
    baseUrl: z.string().url().optional(),
    clientPlatform: z.string().min(1).optional(),
    acceptLanguage: z.string().min(1).optional(),
    userAgent: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS).optional(),
  }).strict().optional(),
  session: z.object({
    sessionKey: z.string().optional(),
  }).strict().optional(),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
    pretty: z.boolean().optional(),
  }).strict().optional(),
  cli: z.object({
    mode: z.enum(['direct', 'guided']).optional(),
    defaultMessageCount: z.number().int().min(MIN_MESSAGES).max(MAX_MESSAGES).optional(),
  }).strict().optional(),
}).strict();

export type UserSettingsInput = z.infer<typeof userSettingsSchema>;

// =============================================================================
// Environment values
// =============================================================================

const TRUE_WORDS = ['true', '1', 'yes', 'on'] as const;
const FALSE_WORDS = ['false', '0', 'no', 'off'] as const;

/** Timeout given as text (environment or --timeout) */
export const timeoutTextSchema = z.coerce.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS);

/** Message count given as text (--messages) */
export const messageCountTextSchema = z.coerce.number().int().min(MIN_MESSAGES).max(MAX_MESSAGES);

/** On/off switch given as text */
export const switchTextSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum([...TRUE_WORDS, ...FALSE_WORDS]))
  .transform((word) => TRUE_WORDS.some((t) => t === word));

export const logLevelTextSchema = z
  .string()
  .trim()
  .refine((value): value is LogLevel => isLogLevel(value), { message: 'Unknown log level' });
