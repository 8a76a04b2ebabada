/**
 * Traversal engine
 *
 * Walks the tree under a root with a fixed number of concurrent workers.
 * Each worker pulls a directory from a shared queue, reads it through
 * path-scurry (dirent types, no stat per entry), runs every child through the
 * filter policy, counts files and directories, buffers symlinks, and pushes
 * subdirectories back onto the queue.
 *
 * Symlinks are classified from their own dirent and never followed, so a
 * cyclic link cannot loop the walk and a directory reachable only through a
 * link is never entered.
 */

import * as fs from 'fs'
import { PathScurry } from 'path-scurry'
import type { PathBase } from 'path-scurry'
import { EntryBuffer } from './collections'
import { describeError, RootAccessError } from './errors'
import type { FilterPolicy } from './filters'
import { extendFrames } from './gitignore'
import { createModuleLogger, startTimer } from './logger'
import { WorkQueue } from './pool'
import type { Entry, EntryKind, GitIgnoreFrame, WalkResult } from './types'

const log = createModuleLogger('walker')

export interface WalkOptions {
  /** Number of directories read concurrently */
  concurrency: number
  /** Called for every entry that passes the filter policy */
  onEntry?: (entry: Entry) => void
}

interface DirectoryWork {
  dir: PathBase
  /** Depth assigned to this directory's children */
  childDepth: number
  /** Git ignore frames of the ancestors, not yet including `dir` itself */
  frames: readonly GitIgnoreFrame[]
}

function classify(p: PathBase): EntryKind {
  if (p.isSymbolicLink()) return 'symlink'
  if (p.isDirectory()) return 'directory'
  if (p.isFile()) return 'file'
  return 'other'
}

/**
 * Check that `root` is a directory the walk can list, and return its device id
 *
 * @throws RootAccessError when it is missing, not a directory, or unreadable
 */
export async function checkRoot(root: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(root)
    if (!stats.isDirectory()) {
      throw Object.assign(new Error(`ENOTDIR: not a directory, scandir '${root}'`), { code: 'ENOTDIR' })
    }
    await fs.promises.access(root, fs.constants.R_OK | fs.constants.X_OK)
    return stats.dev
  } catch (err) {
    log.debug({ root, error: describeError(err) }, 'root is not walkable')
    throw new RootAccessError(root, err)
  }
}

/**
 * Walk `root` and collect every symlink the policy admits
 *
 * Resolves only after every queued directory has been read or pruned; the
 * returned candidate list is frozen.
 */
export async function walk(root: string, policy: FilterPolicy, options: WalkOptions): Promise<WalkResult> {
  const endTimer = startTimer(log, 'walk')
  const scurry = new PathScurry(root)
  const buffer = new EntryBuffer()
  // The root itself counts as a visited directory
  let directories = 1
  let files = 0

  const visit = async (work: DirectoryWork, queue: WorkQueue<DirectoryWork>): Promise<void> => {
    const { dir, childDepth } = work
    const frames = policy.settings.gitignore ? await extendFrames(work.frames, dir.fullpath()) : work.frames

    const children = await dir.readdir()
    if (children.length === 0 && !dir.canReaddir()) {
      log.debug({ path: dir.fullpath() }, 'skipped unreadable directory')
      return
    }

    for (const child of children) {
      const kind = classify(child)
      const entry: Entry = {
        path: child.fullpath(),
        relative: child.relative(),
        name: child.name,
        kind,
        depth: childDepth,
        gitFrames: frames,
      }
      if (kind === 'directory' && policy.settings.needsDevice) {
        entry.dev = (await child.lstat())?.dev
      }

      if (policy.decide(entry) === 'exclude') continue
      options.onEntry?.(entry)

      switch (kind) {
        case 'directory':
          directories++
          if (policy.canDescend(childDepth)) {
            queue.push({ dir: child, childDepth: childDepth + 1, frames })
          }
          break
        case 'file':
          files++
          break
        case 'symlink':
          buffer.append(entry.path)
          break
        case 'other':
          break
      }
    }
  }

  const queue = new WorkQueue<DirectoryWork>(options.concurrency, visit)
  queue.push({ dir: scurry.cwd, childDepth: 0, frames: [] })
  await queue.drain()

  const candidates = buffer.freeze()
  endTimer({ files, directories, candidates: candidates.length })
  return { candidates, files, directories }
}
