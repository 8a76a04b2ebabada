/**
 * Test fixture management for linkscan.
 *
 * All fixtures are REAL files on disk - no mocks or simulations.
 * Re-exports from harness.ts for cleaner imports.
 */

export {
  createTestFixture,
  cleanupFixture,
  cleanupAllFixtures,
  FIXTURES_ROOT,
  type FixtureConfig,
} from './harness'

import * as path from 'path'
import * as fs from 'fs'
import { comparePaths } from '../js/collections'
import { FIXTURES_ROOT } from './harness'

const fsp = fs.promises

const WRITE_BATCH = 256

/**
 * What a scan of a symlink farm must report
 */
export interface FarmExpectation {
  /** Root of the farm (canonical) */
  dir: string
  /** The file the matching links point at */
  target: string
  files: number
  /** Includes the root */
  directories: number
  candidates: number
  /** Sorted with comparePaths */
  matches: string[]
}

async function inBatches<T>(items: readonly T[], fn: (item: T) => Promise<void>): Promise<void> {
  for (let i = 0; i < items.length; i += WRITE_BATCH) {
    await Promise.all(items.slice(i, i + WRITE_BATCH).map(fn))
  }
}

/**
 * Create a farm of exactly 10,000 entries below the root:
 *
 *   target.txt
 *   alias -> .                              (link to a directory)
 *   d00 .. d99/                             100 directories
 *     sub/                                  100 more
 *     f<i>.txt                              9,599 files, half in sub/
 *     sub/match-<k> -> target               50 matching links (k < 50)
 *     other-<m> -> some f<i>.txt            49 links to other files (d50..d98)
 *     dangling-<n> -> missing-<n>           50 dangling links
 *     sub/dirlink-<q> -> ..                 50 cyclic directory links
 *
 * Matching links alternate between absolute, relative and `alias/...` forms.
 */
export async function createSymlinkFarm(): Promise<FarmExpectation> {
  const created = path.join(FIXTURES_ROOT, 'farm', `run-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  await fsp.mkdir(created, { recursive: true })
  const dir = await fsp.realpath(created)
  const dirName = (i: number) => `d${String(i).padStart(2, '0')}`

  const target = path.join(dir, 'target.txt')
  await fsp.writeFile(target, 'target')
  await fsp.symlink('.', path.join(dir, 'alias'))

  for (let i = 0; i < 100; i++) {
    await fsp.mkdir(path.join(dir, dirName(i), 'sub'), { recursive: true })
  }

  const filePath = (i: number) => {
    const parent = path.join(dir, dirName((i >> 1) % 100))
    return path.join(i % 2 === 0 ? parent : path.join(parent, 'sub'), `f${i}.txt`)
  }
  const fileIndexes = Array.from({ length: 9599 }, (_, i) => i)
  await inBatches(fileIndexes, i => fsp.writeFile(filePath(i), `file ${i}`))

  const links: Array<[string, string]> = []
  const matches: string[] = []
  for (let k = 0; k < 50; k++) {
    const link = path.join(dir, dirName(k), 'sub', `match-${k}`)
    const forms = [target, path.join('..', '..', 'target.txt'), path.join(dir, 'alias', 'target.txt')]
    links.push([link, forms[k % 3]])
    matches.push(link)
  }
  for (let m = 0; m < 49; m++) {
    links.push([path.join(dir, dirName(50 + m), `other-${m}`), filePath(m)])
  }
  for (let n = 0; n < 50; n++) {
    links.push([path.join(dir, dirName(n), `dangling-${n}`), `missing-${n}`])
  }
  for (let q = 0; q < 50; q++) {
    links.push([path.join(dir, dirName(q), 'sub', `dirlink-${q}`), '..'])
  }
  await inBatches(links, ([link, to]) => fsp.symlink(to, link))

  return {
    dir,
    target,
    files: 9600,
    directories: 201,
    candidates: 200,
    matches: matches.sort(comparePaths),
  }
}

/**
 * A tree with random directories, files and links, described by the caller.
 * Link targets are indexes into `files`; -1 makes the link dangle.
 */
export interface RandomTreeLayout {
  dirs: string[]
  files: string[]
  links: Array<{ dir: number; to: number; absolute: boolean }>
}

export interface RandomTree {
  dir: string
  /** Absolute link paths, in creation order */
  links: string[]
  /** Absolute path each link's target resolves to, or undefined if dangling */
  resolvesTo: Array<string | undefined>
}

/**
 * Materialize a RandomTreeLayout on disk. Directory indexes refer to
 * `['', ...layout.dirs]`, so 0 is the root.
 */
export async function createRandomTree(layout: RandomTreeLayout): Promise<RandomTree> {
  const created = path.join(FIXTURES_ROOT, 'random', `run-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  await fsp.mkdir(created, { recursive: true })
  const dir = await fsp.realpath(created)

  const dirs = ['', ...layout.dirs]
  for (const d of layout.dirs) {
    await fsp.mkdir(path.join(dir, d), { recursive: true })
  }
  for (const f of layout.files) {
    await fsp.mkdir(path.dirname(path.join(dir, f)), { recursive: true })
    await fsp.writeFile(path.join(dir, f), f)
  }

  const links: string[] = []
  const resolvesTo: Array<string | undefined> = []
  for (const [i, link] of layout.links.entries()) {
    const parent = path.join(dir, dirs[link.dir % dirs.length])
    const linkPath = path.join(parent, `link-${i}`)
    const file = link.to >= 0 && layout.files.length > 0 ? layout.files[link.to % layout.files.length] : undefined
    const absoluteTarget = file === undefined ? path.join(dir, `missing-${i}`) : path.join(dir, file)
    const to = link.absolute ? absoluteTarget : path.relative(parent, absoluteTarget)
    await fsp.symlink(to, linkPath)
    links.push(linkPath)
    resolvesTo.push(file === undefined ? undefined : absoluteTarget)
  }

  return { dir, links, resolvesTo }
}
