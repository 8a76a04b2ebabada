/**
 * Scan orchestration: target → policy → walk → (barrier) → resolve → sort
 */

import { resolveScanOptions } from './config'
import { buildFilterPolicy } from './filters'
import { resolveTarget } from './identity'
import { createModuleLogger } from './logger'
import { resolveMatches } from './resolver'
import type { ScanOptions, ScanResult, ScanSink } from './types'
import { checkRoot, walk } from './walker'

const log = createModuleLogger('scan')

/**
 * Find every symlink under `options.root` whose resolved target is
 * `options.target`
 *
 * @throws InvalidOptionsError when options fail validation
 * @throws TargetResolutionError when the target cannot be canonicalized
 * @throws RootAccessError when the root is not a readable directory
 *
 * @example
 * ```ts
 * const result = await scan({ target: '/opt/app/current', root: '/srv' }, {
 *   onMatch: p => console.log(p),
 * })
 * console.log(result.matches.length, result.candidates)
 * ```
 */
export async function scan(options: ScanOptions, sink: ScanSink = {}): Promise<ScanResult> {
  const start = performance.now()
  const resolved = resolveScanOptions(options)
  const target = await resolveTarget(resolved.target)
  log.debug({ target: target.path, identity: target.identity !== undefined, root: resolved.root }, 'target resolved')

  const rootDev = await checkRoot(resolved.root)
  const dev = resolved.oneFilesystem ? rootDev : undefined
  const policy = await buildFilterPolicy(resolved, dev)

  // Phase 1: the candidate list must be complete before any resolution starts
  const walked = await walk(resolved.root, policy, { concurrency: resolved.threads })
  sink.onTraversalComplete?.({
    files: walked.files,
    directories: walked.directories,
    candidates: walked.candidates.length,
  })

  // Phase 2
  const matchSet = await resolveMatches(walked.candidates, target, {
    concurrency: resolved.threads,
    stream: resolved.stream,
    sink,
  })

  const elapsedMs = performance.now() - start
  const seconds = elapsedMs / 1000
  const total = walked.candidates.length
  return {
    target,
    matches: matchSet.sorted(),
    files: walked.files,
    directories: walked.directories,
    candidates: total,
    elapsedMs,
    rate: seconds > 0 ? Math.round(total / seconds) : total,
  }
}
