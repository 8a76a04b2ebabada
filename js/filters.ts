/**
 * Filter policy for the traversal engine
 *
 * An ordered chain of rules, each answering include / exclude / defer for one
 * entry. The chain is built once per scan and never changes afterwards.
 *
 * Evaluation order:
 *   1. depth            (structural)
 *   2. heavy directory  (structural)
 *   3. hidden           (structural)
 *   4. user globs       (ignore)
 *   5. ignore files     (ignore)
 *   6. git ignore       (ignore)
 *   7. device boundary  (structural)
 *
 * Any `exclude` ends the chain. An `include` from an ignore rule (a `!glob`)
 * skips the remaining ignore rules but not the structural ones, so a
 * force-include can never re-admit a heavy directory.
 */

import * as fs from 'fs'
import * as path from 'path'
import ignore from 'ignore'
import { describeError } from './errors'
import { createModuleLogger } from './logger'
import type { Entry, FilterDecision, FilterRule, FilterRuleKind, ResolvedScanOptions } from './types'

const log = createModuleLogger('filters')

type Ignore = ReturnType<typeof ignore>

/**
 * Directories skipped unless `includeHeavy` is set
 */
export const HEAVY_DIRS: ReadonlySet<string> = new Set([
  'node_modules',
  '.cache',
  'target',
  'build',
  'dist',
  'out',
  '.git',
  '.venv',
  'venv',
])

// ============================================================================
// Pattern Compilation
// ============================================================================

/**
 * Compile gitignore-style patterns one at a time, dropping any that fail.
 * Blank lines and `#` comments are left to the matcher.
 */
export function compileIgnore(patterns: readonly string[], source: string): Ignore {
  const matcher = ignore()
  for (const pattern of patterns) {
    try {
      ignore().add(pattern)
      matcher.add(pattern)
    } catch (err) {
      log.warn({ pattern, source, error: describeError(err) }, 'dropping malformed ignore pattern')
    }
  }
  return matcher
}

/**
 * Format a relative path the way gitignore matching expects: `/` separators,
 * trailing `/` for directories so `build/`-style patterns apply.
 */
export function toIgnorePath(relative: string, kind: Entry['kind']): string {
  const posix = path.sep === '/' ? relative : relative.split(path.sep).join('/')
  return kind === 'directory' ? `${posix}/` : posix
}

/**
 * Paths the matcher refuses (names made only of dots, such as `...`, and
 * anything beneath them) are left to the other rules.
 */
function decideWith(matcher: { test(p: string): { ignored: boolean; unignored: boolean } }, p: string): FilterDecision {
  if (!ignore.isPathValid(p)) return 'defer'
  const result = matcher.test(p)
  if (result.unignored) return 'include'
  if (result.ignored) return 'exclude'
  return 'defer'
}

// ============================================================================
// Rules
// ============================================================================

/**
 * Prunes entries deeper than `maxDepth`
 */
export class DepthRule implements FilterRule {
  readonly name = 'depth'
  readonly kind: FilterRuleKind = 'structural'

  constructor(readonly maxDepth: number) {}

  decide(entry: Entry): FilterDecision {
    return entry.depth > this.maxDepth ? 'exclude' : 'defer'
  }
}

export class HeavyDirectoryRule implements FilterRule {
  readonly name = 'heavy-directory'
  readonly kind: FilterRuleKind = 'structural'

  constructor(private readonly names: ReadonlySet<string> = HEAVY_DIRS) {}

  decide(entry: Entry): FilterDecision {
    return entry.kind === 'directory' && this.names.has(entry.name) ? 'exclude' : 'defer'
  }
}

/**
 * Excludes dotfiles; only installed when hidden entries are not wanted
 */
export class HiddenRule implements FilterRule {
  readonly name = 'hidden'
  readonly kind: FilterRuleKind = 'structural'

  decide(entry: Entry): FilterDecision {
    return entry.name.startsWith('.') ? 'exclude' : 'defer'
  }
}

/**
 * Gitignore-style patterns matched against the path relative to the walk
 * root. Used both for `--ignore` globs and for `--ignore-file` contents.
 */
export class IgnorePatternRule implements FilterRule {
  readonly kind: FilterRuleKind = 'ignore'

  constructor(
    readonly name: string,
    private readonly matcher: Ignore
  ) {}

  decide(entry: Entry): FilterDecision {
    return decideWith(this.matcher, toIgnorePath(entry.relative, entry.kind))
  }
}

function isInside(relative: string): boolean {
  return (
    relative !== '' && relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative)
  )
}

/**
 * Consults the `.gitignore` / `.git/info/exclude` frames the walker attached
 * to the entry. Deeper frames override shallower ones.
 */
export class GitIgnoreRule implements FilterRule {
  readonly name = 'gitignore'
  readonly kind: FilterRuleKind = 'ignore'

  decide(entry: Entry): FilterDecision {
    let decision: FilterDecision = 'defer'
    for (const frame of entry.gitFrames ?? []) {
      const relative = path.relative(frame.base, entry.path)
      if (!isInside(relative)) continue
      const frameDecision = decideWith(frame, toIgnorePath(relative, entry.kind))
      if (frameDecision !== 'defer') decision = frameDecision
    }
    return decision
  }
}

/**
 * Keeps the walk on the root's device
 */
export class FilesystemBoundaryRule implements FilterRule {
  readonly name = 'filesystem-boundary'
  readonly kind: FilterRuleKind = 'structural'

  constructor(readonly rootDev: number) {}

  decide(entry: Entry): FilterDecision {
    if (entry.kind !== 'directory' || entry.dev === undefined) return 'defer'
    return entry.dev === this.rootDev ? 'defer' : 'exclude'
  }
}

// ============================================================================
// Policy
// ============================================================================

export interface FilterPolicySettings {
  maxDepth?: number
  /** The walker must lstat directories to fill `Entry.dev` */
  needsDevice: boolean
  /** The walker must load git ignore frames per directory */
  gitignore: boolean
}

export class FilterPolicy {
  readonly rules: readonly FilterRule[]

  constructor(
    rules: readonly FilterRule[],
    readonly settings: Readonly<FilterPolicySettings>
  ) {
    this.rules = Object.freeze(rules.slice())
    Object.freeze(this)
  }

  decide(entry: Entry): 'include' | 'exclude' {
    let ignoreSettled = false
    for (const rule of this.rules) {
      if (ignoreSettled && rule.kind === 'ignore') continue
      const decision = rule.decide(entry)
      if (decision === 'exclude') return 'exclude'
      if (decision === 'include' && rule.kind === 'ignore') ignoreSettled = true
    }
    return 'include'
  }

  /**
   * Whether a directory at `depth` may be read. Its children sit at
   * `depth + 1`; the root is depth -1.
   */
  canDescend(depth: number): boolean {
    return this.settings.maxDepth === undefined || depth < this.settings.maxDepth
  }
}

async function readIgnoreFile(file: string, root: string): Promise<string[] | undefined> {
  const fullPath = path.resolve(root, file)
  try {
    const content = await fs.promises.readFile(fullPath, 'utf8')
    return content.split(/\r?\n/)
  } catch (err) {
    log.warn({ file: fullPath, error: describeError(err) }, 'dropping unreadable ignore file')
    return undefined
  }
}

/**
 * Build the rule chain for a scan
 *
 * @param rootDev - device of the walk root; required for `oneFilesystem`
 */
export async function buildFilterPolicy(
  options: Pick<
    ResolvedScanOptions,
    'root' | 'hidden' | 'maxDepth' | 'ignore' | 'ignoreFiles' | 'includeHeavy' | 'oneFilesystem' | 'gitignore'
  >,
  rootDev?: number
): Promise<FilterPolicy> {
  const rules: FilterRule[] = []

  if (options.maxDepth !== undefined) {
    rules.push(new DepthRule(options.maxDepth))
  }
  if (!options.includeHeavy) {
    rules.push(new HeavyDirectoryRule())
  }
  if (!options.hidden) {
    rules.push(new HiddenRule())
  }
  if (options.ignore.length > 0) {
    rules.push(new IgnorePatternRule('ignore-globs', compileIgnore(options.ignore, '--ignore')))
  }
  if (options.ignoreFiles.length > 0) {
    const patterns: string[] = []
    for (const file of options.ignoreFiles) {
      const lines = await readIgnoreFile(file, options.root)
      if (lines) patterns.push(...lines)
    }
    rules.push(new IgnorePatternRule('ignore-files', compileIgnore(patterns, '--ignore-file')))
  }
  if (options.gitignore) {
    rules.push(new GitIgnoreRule())
  }
  const boundary = options.oneFilesystem && rootDev !== undefined
  if (boundary) {
    rules.push(new FilesystemBoundaryRule(rootDev))
  }

  return new FilterPolicy(rules, {
    maxDepth: options.maxDepth,
    needsDevice: boundary,
    gitignore: options.gitignore,
  })
}
