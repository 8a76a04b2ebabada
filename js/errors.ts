/**
 * Error classes for linkscan
 *
 * Three failures end a run: options that do not validate, a target that
 * cannot be canonicalized, and a root that is not a readable directory.
 * Everything the walker or the resolver hits
 * on individual entries is absorbed where it happens.
 *
 * @example
 * ```ts
 * try {
 *   await scan({ target: '/missing' })
 * } catch (err) {
 *   if (err instanceof TargetResolutionError) {
 *     console.error(err.message) // Failed to resolve target '/missing': ENOENT ...
 *   }
 * }
 * ```
 */

import type { ZodIssue } from 'zod'

// ============================================================================
// Base Error Class
// ============================================================================

export class LinkscanError extends Error {
  /** Stable error code (e.g. 'ENOENT', 'EINVALIDOPTIONS') */
  code: string

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LinkscanError'
    this.code = code
  }
}

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * The target path does not exist, is not reachable, or loops
 */
export class TargetResolutionError extends LinkscanError {
  /** Path as supplied by the caller */
  target: string

  constructor(target: string, cause: unknown) {
    const code = isErrnoException(cause) && cause.code ? cause.code : 'EUNKNOWN'
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to resolve target '${target}': ${detail}`, code, { cause })
    this.name = 'TargetResolutionError'
    this.target = target
  }
}

/**
 * The walk root is missing, unreadable, or not a directory
 */
export class RootAccessError extends LinkscanError {
  root: string

  constructor(root: string, cause: unknown) {
    const code = isErrnoException(cause) && cause.code ? cause.code : 'EUNKNOWN'
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot read root '${root}': ${detail}`, code, { cause })
    this.name = 'RootAccessError'
    this.root = root
  }
}

/**
 * Scan options failed validation
 */
export class InvalidOptionsError extends LinkscanError {
  issues: ZodIssue[]

  constructor(issues: ZodIssue[]) {
    const summary = issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    super(`Invalid scan options: ${summary}`, 'EINVALIDOPTIONS')
    this.name = 'InvalidOptionsError'
    this.issues = issues
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}

/**
 * Short description of a thrown value for debug logs
 */
export function describeError(err: unknown): string {
  if (isErrnoException(err) && err.code) return err.code
  return err instanceof Error ? err.message : String(err)
}
