/**
 * Filesystem identity and target canonicalization
 */

import * as fs from 'fs'
import { TargetResolutionError } from './errors'
import type { FileIdentity, Target } from './types'

/**
 * Read the device + inode of whatever `p` resolves to (links are followed).
 *
 * @returns undefined when the platform reports no usable inode
 * @throws the underlying fs error when `p` cannot be stat'ed
 */
export async function readIdentity(p: string): Promise<FileIdentity | undefined> {
  const stats = await fs.promises.stat(p, { bigint: true })
  if (stats.ino === 0n) return undefined
  return { dev: stats.dev, ino: stats.ino }
}

export function sameIdentity(a: FileIdentity, b: FileIdentity): boolean {
  return a.dev === b.dev && a.ino === b.ino
}

/**
 * Canonicalize the scan target. This is the only filesystem failure that
 * aborts a run.
 *
 * @throws TargetResolutionError
 */
export async function resolveTarget(target: string): Promise<Target> {
  let canonical: string
  try {
    canonical = await fs.promises.realpath(target)
  } catch (err) {
    throw new TargetResolutionError(target, err)
  }

  let identity: FileIdentity | undefined
  try {
    identity = await readIdentity(canonical)
  } catch {
    // Identity is optional; matching falls back to canonical paths
    identity = undefined
  }

  return { path: canonical, identity }
}
