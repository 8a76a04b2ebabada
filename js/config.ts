/**
 * Configuration schemas for linkscan.
 *
 * All defaults live here, for scan options and for the environment.
 */

import * as os from 'os'
import * as path from 'path'
import { z } from 'zod'
import { InvalidOptionsError } from './errors'
import type { ResolvedScanOptions, ScanOptions } from './types'

// ============================================================================
// Environment
// ============================================================================

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production').catch('production'),

  // Logger verbosity; per-entry skips are logged at debug
  LINKSCAN_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn')
    .catch('warn'),
})

export type EnvConfig = z.infer<typeof envSchema>

/**
 * Parse the environment; each unknown value falls back to its own default
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return envSchema.parse(env)
}

// ============================================================================
// Scan Options
// ============================================================================

export const scanOptionsSchema = z.object({
  target: z.string().min(1, 'target path is required'),
  root: z.string().min(1).optional(),
  hidden: z.boolean().default(true),
  maxDepth: z.number().int().nonnegative().optional(),
  ignore: z.array(z.string()).default([]),
  ignoreFiles: z.array(z.string()).default([]),
  includeHeavy: z.boolean().default(false),
  oneFilesystem: z.boolean().default(false),
  gitignore: z.boolean().default(false),
  threads: z.number().int().nonnegative().default(0),
  stream: z.boolean().default(true),
})

/**
 * Worker count used when the caller passes 0 or nothing
 */
export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism())
}

/**
 * Validate scan options and fill in defaults
 *
 * @throws InvalidOptionsError when a field has the wrong type or range
 */
export function resolveScanOptions(options: ScanOptions): ResolvedScanOptions {
  const parsed = scanOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw new InvalidOptionsError(parsed.error.issues)
  }
  const { root, threads, ...rest } = parsed.data
  return {
    ...rest,
    root: path.resolve(root ?? process.cwd()),
    threads: threads === 0 ? defaultConcurrency() : threads,
  }
}
