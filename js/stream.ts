/**
 * Stream utilities for linkscan
 *
 * Wraps `scan()` in a Minipass object-mode stream of match paths, written in
 * discovery order as the resolver finds them.
 */

/// <reference types="node" />

import { Minipass } from 'minipass'
import { scan } from './scan'
import type { ScanOptions, ScanResult, TraversalStats } from './types'

/**
 * Options for configuring the match stream
 */
export interface ScanStreamOptions extends Omit<ScanOptions, 'stream'> {
  /** Called once traversal is done, before the first match is written */
  onTraversalComplete?: (stats: TraversalStats) => void
  /** Called with the final (sorted) result right before the stream ends */
  onResult?: (result: ScanResult) => void
}

/**
 * Create a readable stream of matching symlink paths
 *
 * Streaming is always on here; `stream: false` in the options is ignored.
 * A fatal error (bad options, unresolvable target) is emitted as `'error'`.
 */
export function scanStream(options: ScanStreamOptions): Minipass<string, string> {
  const stream = new Minipass<string, string>({ objectMode: true })
  const { onTraversalComplete, onResult, ...scanOptions } = options

  scan(
    { ...scanOptions, stream: true },
    {
      onTraversalComplete,
      onMatch: p => {
        stream.write(p)
      },
    }
  )
    .then(result => {
      onResult?.(result)
      stream.end()
    })
    .catch((err: unknown) => {
      stream.emit('error', err)
    })

  return stream
}

/**
 * Collect stream results into an array
 *
 * Utility function for testing and cases where
 * array output is preferred over streaming.
 */
export async function streamToArray<T>(stream: Minipass<T, T>): Promise<T[]> {
  const results: T[] = []

  return new Promise((resolve, reject) => {
    stream.on('data', (chunk: T) => {
      results.push(chunk)
    })

    stream.on('end', () => {
      resolve(results)
    })

    stream.on('error', (err: unknown) => {
      reject(err)
    })
  })
}
