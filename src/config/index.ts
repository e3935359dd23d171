/**
 * Dispatcher configuration.
 *
 * Environment Variables:
 *   JUNCTION_PRELOAD                 - Comma separated preload dispatch types (default: "Index,Path,Regex")
 *   JUNCTION_POSTLOAD                - Comma separated postload dispatch types (default: "Default")
 *   JUNCTION_DEBUG                   - "true" to enable per-request diagnostics and action tables
 *   JUNCTION_CASE_SENSITIVE          - "true" to keep class name case in derived namespaces
 *   JUNCTION_SHOW_INTERNAL_ACTIONS   - "true" to list `_`-prefixed actions in the action table
 *   JUNCTION_LOG_LEVEL               - trace, debug, info, warn, error (default: "info")
 */

import { z } from 'zod';

/** Dispatch types loaded before any action is registered. */
export const DEFAULT_PRELOAD_DISPATCH_TYPES: readonly string[] = ['Index', 'Path', 'Regex'];

/** Dispatch types appended once every action is registered. */
export const DEFAULT_POSTLOAD_DISPATCH_TYPES: readonly string[] = ['Default'];

const dispatchTypeName = z
  .string()
  .min(1)
  .regex(/^\+?[A-Za-z_][\w.:-]*$/, 'must be a dispatch type name, optionally prefixed with "+"');

const configSchema = z.object({
  preloadDispatchTypes: z.array(dispatchTypeName).default([...DEFAULT_PRELOAD_DISPATCH_TYPES]),
  postloadDispatchTypes: z.array(dispatchTypeName).default([...DEFAULT_POSTLOAD_DISPATCH_TYPES]),
  debug: z.boolean().default(false),
  caseSensitive: z.boolean().default(false),
  showInternalActions: z.boolean().default(false),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Fully resolved dispatcher configuration.
 */
export type DispatcherConfig = z.infer<typeof configSchema>;

/**
 * Partial configuration accepted from callers; missing keys take defaults.
 */
export type DispatcherConfigInput = z.input<typeof configSchema>;

/**
 * Raised when configuration does not pass validation.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid dispatcher configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Validate a partial configuration and apply defaults.
 *
 * @throws ConfigError if any value is invalid
 */
export function resolveConfig(input: DispatcherConfigInput = {}): DispatcherConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

/**
 * Build a configuration from environment variables.
 *
 * Values that are not set fall back to the defaults.
 *
 * @example
 * ```typescript
 * const config = configFromEnv({ JUNCTION_PRELOAD: 'Index,Path', JUNCTION_DEBUG: 'true' });
 * // config.preloadDispatchTypes => ['Index', 'Path']
 * ```
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const input: DispatcherConfigInput = {
    preloadDispatchTypes: parseList(env.JUNCTION_PRELOAD),
    postloadDispatchTypes: parseList(env.JUNCTION_POSTLOAD),
    debug: parseFlag(env.JUNCTION_DEBUG),
    caseSensitive: parseFlag(env.JUNCTION_CASE_SENSITIVE),
    showInternalActions: parseFlag(env.JUNCTION_SHOW_INTERNAL_ACTIONS),
  };

  const level = env.JUNCTION_LOG_LEVEL;
  if (level === 'trace' || level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    input.logLevel = level;
  } else if (level !== undefined) {
    throw new ConfigError([`logLevel: unknown level "${level}"`]);
  }

  return resolveConfig(input);
}
