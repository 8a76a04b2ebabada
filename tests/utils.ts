/**
 * Test utility functions for linkscan.
 *
 * Re-exports from harness.ts for cleaner imports.
 */

export { measureTime, setsEqual, normalizePath, relativeTo, isWindows, isRoot } from './harness'

import type { ResolveProgress, ScanSink, TraversalStats } from '../js/types'

/**
 * Wait for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export type SinkEvent =
  | { type: 'traversal'; stats: TraversalStats }
  | { type: 'begin' }
  | { type: 'match'; path: string }
  | { type: 'progress'; progress: ResolveProgress }

/**
 * Sink that records every event in arrival order
 */
export function recordingSink(): ScanSink & { events: SinkEvent[] } {
  const events: SinkEvent[] = []
  return {
    events,
    onTraversalComplete: stats => events.push({ type: 'traversal', stats }),
    onBegin: () => events.push({ type: 'begin' }),
    onMatch: p => events.push({ type: 'match', path: p }),
    onProgress: progress => events.push({ type: 'progress', progress }),
  }
}
