/**
 * Shared append-only collections
 *
 * Workers only ever append. Appends happen synchronously between awaits, so
 * each one is a critical section of its own and nothing is held across I/O.
 */

import * as path from 'path'

/**
 * Compare two paths component by component, so `a/b` sorts before `a-c`
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(path.sep)
  const right = b.split(path.sep)
  const n = Math.min(left.length, right.length)
  for (let i = 0; i < n; i++) {
    if (left[i] === right[i]) continue
    return left[i] < right[i] ? -1 : 1
  }
  return left.length - right.length
}

/**
 * Symlink candidates collected by the walker. Frozen once traversal ends.
 */
export class EntryBuffer {
  private readonly entries: string[] = []
  private frozen = false

  append(entryPath: string): void {
    if (this.frozen) {
      throw new Error(`EntryBuffer is frozen; cannot append ${entryPath}`)
    }
    this.entries.push(entryPath)
  }

  get size(): number {
    return this.entries.length
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /**
   * Stop accepting appends and hand out the collected paths
   */
  freeze(): readonly string[] {
    this.frozen = true
    return Object.freeze(this.entries.slice())
  }
}

/**
 * Paths whose resolved target equals the scan target
 */
export class MatchSet {
  private readonly matches: string[] = []
  private frozen = false

  /**
   * @returns the number of matches after the append
   */
  add(matchPath: string): number {
    if (this.frozen) {
      throw new Error(`MatchSet is frozen; cannot add ${matchPath}`)
    }
    this.matches.push(matchPath)
    return this.matches.length
  }

  get size(): number {
    return this.matches.length
  }

  /**
   * Freeze the set and return its paths sorted with `comparePaths`
   */
  sorted(): string[] {
    this.frozen = true
    return this.matches.slice().sort(comparePaths)
  }
}
