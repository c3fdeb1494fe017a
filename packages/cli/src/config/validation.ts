/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { ChesslensConfig } from './schema.js';

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

/**
 * Millisecond duration schema
 */
const durationSchema = z.number().int().min(1).max(600000);

/**
 * Analysis profile schema
 */
export const analysisProfileSchema = z.enum(['quick', 'standard', 'deep']);

/**
 * Board orientation schema
 */
export const orientationSchema = z.enum(['white', 'black']);

/**
 * Engine configuration schema
 */
export const engineConfigSchema = z.object({
  path: z.string().min(1),
  args: z.array(z.string()),
  threads: z.number().int().min(1).max(1024),
  hashMb: z.number().int().min(1).max(65536),
  multiPv: z.number().int().min(1).max(10),
  handshakeTimeoutMs: durationSchema,
  responseTimeoutMs: durationSchema,
  enabled: z.boolean(),
});

/**
 * Analysis configuration schema
 */
export const analysisConfigSchema = z.object({
  profile: analysisProfileSchema,
  depth: depthSchema.optional(),
  movetimeMs: durationSchema,
  mateHunt: z.boolean(),
  throttleMs: z.number().int().min(0).max(10000),
});

/**
 * Display configuration schema
 */
export const displayConfigSchema = z.object({
  orientation: orientationSchema,
  unicode: z.boolean(),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  analysis: analysisConfigSchema,
  display: displayConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z
  .object({
    engine: engineConfigSchema.partial().strict().optional(),
    analysis: analysisConfigSchema.partial().strict().optional(),
    display: displayConfigSchema.partial().strict().optional(),
  })
  .strict();

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): ChesslensConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export type { z };
