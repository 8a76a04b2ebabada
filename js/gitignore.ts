/**
 * Per-directory git ignore frames
 *
 * When git ignore files are honored, the walker loads one frame per visited
 * directory and passes the chain of ancestor frames down with each work
 * item. The filter policy itself holds no per-directory state.
 */

import * as fs from 'fs'
import * as path from 'path'
import { describeError, isErrnoException } from './errors'
import { compileIgnore } from './filters'
import { createModuleLogger } from './logger'
import type { GitIgnoreFrame } from './types'

const log = createModuleLogger('gitignore')

const MISSING = new Set(['ENOENT', 'ENOTDIR'])

async function readLines(file: string): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(file, 'utf8')
    return content.split(/\r?\n/)
  } catch (err) {
    if (!(isErrnoException(err) && err.code !== undefined && MISSING.has(err.code))) {
      log.debug({ file, error: describeError(err) }, 'skipped unreadable ignore file')
    }
    return []
  }
}

/**
 * Load `.git/info/exclude` then `.gitignore` from `dir`. Later patterns win,
 * so `.gitignore` overrides the exclude file.
 *
 * @returns undefined when the directory has neither file
 */
export async function loadGitIgnoreFrame(dir: string): Promise<GitIgnoreFrame | undefined> {
  const [exclude, gitignore] = await Promise.all([
    readLines(path.join(dir, '.git', 'info', 'exclude')),
    readLines(path.join(dir, '.gitignore')),
  ])
  const patterns = [...exclude, ...gitignore]
  if (patterns.every(line => line.trim() === '' || line.startsWith('#'))) {
    return undefined
  }
  const matcher = compileIgnore(patterns, path.join(dir, '.gitignore'))
  return {
    base: dir,
    test: relative => matcher.test(relative),
  }
}

/**
 * Frames for a child directory: the parent's frames plus the child's own
 */
export async function extendFrames(
  frames: readonly GitIgnoreFrame[],
  dir: string
): Promise<readonly GitIgnoreFrame[]> {
  const frame = await loadGitIgnoreFrame(dir)
  return frame ? [...frames, frame] : frames
}
