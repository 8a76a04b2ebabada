/**
 * TypeScript type definitions for linkscan
 *
 * Shared shapes for the traversal engine, the resolution pipeline and the
 * reporting sink.
 */

/// <reference types="node" />

// ============================================================================
// Entry Types
// ============================================================================

/**
 * Classification of a filesystem object as seen by the walker.
 * Symlinks are never followed, so a link to a directory is a `symlink`.
 */
export type EntryKind = 'file' | 'directory' | 'symlink' | 'other'

/**
 * One filesystem object visited during traversal
 */
export interface Entry {
  /** Absolute path (walk root joined with the relative path) */
  path: string
  /** Path relative to the walk root, `/`-separated */
  relative: string
  /** Base name */
  name: string
  kind: EntryKind
  /** Directories between the walk root and the entry (0 = direct child of root) */
  depth: number
  /** Device id, populated only when the filter policy asks for it */
  dev?: number
  /** Git ignore frames inherited from the ancestors of this entry */
  gitFrames?: readonly GitIgnoreFrame[]
}

/**
 * Ignore matcher loaded from one directory's `.gitignore` and
 * `.git/info/exclude`
 */
export interface GitIgnoreFrame {
  /** Absolute path of the directory the patterns are relative to */
  base: string
  test(relative: string): { ignored: boolean; unignored: boolean }
}

// ============================================================================
// Filter Policy Types
// ============================================================================

/**
 * Answer of one filter rule for one entry
 */
export type FilterDecision = 'include' | 'exclude' | 'defer'

/**
 * Structural rules always run; an `include` from an ignore rule skips the
 * remaining ignore rules only
 */
export type FilterRuleKind = 'structural' | 'ignore'

export interface FilterRule {
  readonly name: string
  readonly kind: FilterRuleKind
  decide(entry: Entry): FilterDecision
}

// ============================================================================
// Identity Types
// ============================================================================

/**
 * Platform-level identity of a file (device + inode)
 */
export interface FileIdentity {
  dev: bigint
  ino: bigint
}

/**
 * Canonical path the scan is matching against
 */
export interface Target {
  /** Absolute path with every symlink resolved */
  path: string
  /** Present when the platform reports a usable inode */
  identity?: FileIdentity
}

// ============================================================================
// Options
// ============================================================================

/**
 * Options accepted by `scan()` and `buildFilterPolicy()`
 */
export interface ScanOptions {
  /** Path whose symlinks are searched for */
  target: string
  /** Walk root (default: process.cwd()) */
  root?: string
  /** Visit entries whose name starts with `.` (default: true) */
  hidden?: boolean
  /** Deepest entry depth visited; direct children of root are depth 0 */
  maxDepth?: number
  /** Gitignore-style globs relative to the root; a leading `!` force-includes */
  ignore?: string[]
  /** Files containing gitignore-style patterns relative to the root */
  ignoreFiles?: string[]
  /** Descend into node_modules, .cache, target and friends (default: false) */
  includeHeavy?: boolean
  /** Do not descend into directories on another device (default: false) */
  oneFilesystem?: boolean
  /** Honor `.gitignore` and `.git/info/exclude` files (default: false) */
  gitignore?: boolean
  /** Worker count; 0 or unset picks one from the available parallelism */
  threads?: number
  /** Announce matches through the sink as they are found (default: true) */
  stream?: boolean
}

/**
 * Options after validation and defaulting
 */
export interface ResolvedScanOptions {
  target: string
  root: string
  hidden: boolean
  maxDepth?: number
  ignore: string[]
  ignoreFiles: string[]
  includeHeavy: boolean
  oneFilesystem: boolean
  gitignore: boolean
  threads: number
  stream: boolean
}

// ============================================================================
// Results
// ============================================================================

export interface TraversalStats {
  files: number
  directories: number
  candidates: number
}

export interface WalkResult {
  /** Symlink paths, frozen */
  candidates: readonly string[]
  files: number
  directories: number
}

export interface ResolveProgress {
  completed: number
  total: number
}

export interface ScanResult {
  target: Target
  /** Matching symlink paths, sorted */
  matches: string[]
  files: number
  directories: number
  /** Number of symlinks checked */
  candidates: number
  elapsedMs: number
  /** Candidates checked per second */
  rate: number
}

// ============================================================================
// Sink
// ============================================================================

/**
 * Consumer of scan events
 *
 * `onBegin` fires once, before the first `onMatch`, and only when streaming
 * is enabled and at least one match exists.
 */
export interface ScanSink {
  onTraversalComplete?(stats: TraversalStats): void
  onBegin?(): void
  onMatch?(path: string): void
  onProgress?(progress: ResolveProgress): void
}
