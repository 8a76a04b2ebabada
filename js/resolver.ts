/**
 * Resolution & match pipeline
 *
 * Every candidate is checked independently. The fast path compares the
 * device + inode the candidate resolves to against the target's; when that
 * is unavailable or says no, the candidate is fully canonicalized and its
 * path compared. Any failure (dangling link, EACCES, removed mid-scan) is a
 * non-match.
 */

import * as fs from 'fs'
import { MatchSet } from './collections'
import { describeError } from './errors'
import { readIdentity, sameIdentity } from './identity'
import { createModuleLogger, startTimer } from './logger'
import { parallelForEach } from './pool'
import type { FileIdentity, ScanSink, Target } from './types'

const log = createModuleLogger('resolver')

// ============================================================================
// Strategies
// ============================================================================

export interface MatchStrategy {
  readonly name: string
  matches(candidate: string): Promise<boolean>
}

/**
 * `realpath(candidate) === target.path`
 */
export class CanonicalPathStrategy implements MatchStrategy {
  readonly name = 'canonical-path'

  constructor(private readonly targetPath: string) {}

  async matches(candidate: string): Promise<boolean> {
    try {
      return (await fs.promises.realpath(candidate)) === this.targetPath
    } catch (err) {
      log.debug({ candidate, error: describeError(err) }, 'candidate did not resolve')
      return false
    }
  }
}

/**
 * Device + inode equality, following the candidate's links
 */
export class IdentityStrategy implements MatchStrategy {
  readonly name = 'identity'

  constructor(private readonly identity: FileIdentity) {}

  async matches(candidate: string): Promise<boolean> {
    try {
      const identity = await readIdentity(candidate)
      return identity !== undefined && sameIdentity(identity, this.identity)
    } catch (err) {
      log.debug({ candidate, error: describeError(err) }, 'candidate could not be stat-ed')
      return false
    }
  }
}

/**
 * Identity first, canonical path on a miss
 */
export class FastPathStrategy implements MatchStrategy {
  readonly name = 'fast-path'

  constructor(
    private readonly fast: MatchStrategy,
    private readonly slow: MatchStrategy
  ) {}

  async matches(candidate: string): Promise<boolean> {
    if (await this.fast.matches(candidate)) return true
    return this.slow.matches(candidate)
  }
}

/**
 * Pick the strategy for a target: fast path where the platform exposes an
 * identity, canonical paths only otherwise
 */
export function createMatchStrategy(target: Target): MatchStrategy {
  const canonical = new CanonicalPathStrategy(target.path)
  if (target.identity === undefined) return canonical
  return new FastPathStrategy(new IdentityStrategy(target.identity), canonical)
}

// ============================================================================
// Pipeline
// ============================================================================

export interface ResolveOptions {
  concurrency: number
  /** Announce matches through `sink` as they are found */
  stream: boolean
  sink?: ScanSink
  /** Override the strategy picked from the target */
  strategy?: MatchStrategy
}

/**
 * Check every candidate against the target
 *
 * With `stream` set, `sink.onBegin` fires once before the first
 * `sink.onMatch`, and each `onMatch` fires after its path is in the set.
 * `sink.onProgress` fires once per candidate either way.
 */
export async function resolveMatches(
  candidates: readonly string[],
  target: Target,
  options: ResolveOptions
): Promise<MatchSet> {
  const endTimer = startTimer(log, 'resolve')
  const strategy = options.strategy ?? createMatchStrategy(target)
  const sink = options.sink ?? {}
  const matchSet = new MatchSet()
  const total = candidates.length
  let completed = 0

  await parallelForEach(
    candidates,
    async candidate => {
      const isMatch = await strategy.matches(candidate)
      if (isMatch) {
        const count = matchSet.add(candidate)
        if (options.stream) {
          if (count === 1) sink.onBegin?.()
          sink.onMatch?.(candidate)
        }
      }
      completed++
      sink.onProgress?.({ completed, total })
    },
    options.concurrency
  )

  endTimer({ strategy: strategy.name, candidates: total, matches: matchSet.size })
  return matchSet
}
