import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest'
import type { Mock } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { TargetResolutionError } from '../js/errors'
import { readIdentity, resolveTarget, sameIdentity } from '../js/identity'
import {
  CanonicalPathStrategy,
  createMatchStrategy,
  FastPathStrategy,
  IdentityStrategy,
  resolveMatches,
} from '../js/resolver'
import type { MatchStrategy } from '../js/resolver'
import type { Target } from '../js/types'
import { cleanupAllFixtures, createTestFixture } from './fixtures'
import { isWindows, recordingSink } from './utils'

const LINKS = ['l1', 'l2', 'l3', 'l4', 'l5', 'l6'] as const
const MATCHING = ['l1', 'l3', 'l6']

interface StubStrategy extends MatchStrategy {
  matches: Mock<(candidate: string) => Promise<boolean>>
}

function stubStrategy(result: boolean): StubStrategy {
  return { name: `stub-${result}`, matches: vi.fn(async (_candidate: string) => result) }
}

describe.skipIf(isWindows)('resolution', () => {
  let dir: string
  let target: Target
  let candidates: string[]

  beforeAll(async () => {
    // l1 -> x1 (absolute)   l2 -> x2        l3 -> l1 (chain)
    // l4 -> missing         l5 -> dir       l6 -> dir/../x1.txt
    dir = await createTestFixture('resolver', {
      files: ['x1.txt', 'x2.txt', 'dir/inner.txt'],
      contents: { 'x1.txt': 'same', 'x2.txt': 'same' },
      symlinks: [
        ['l1', '@/x1.txt'],
        ['l2', '@/x2.txt'],
        ['l3', 'l1'],
        ['l4', 'missing'],
        ['l5', '@/dir'],
        ['l6', 'dir/../x1.txt'],
      ],
    })
    await fs.promises.link(path.join(dir, 'x1.txt'), path.join(dir, 'x1-hard.txt'))
    target = await resolveTarget(path.join(dir, 'x1.txt'))
    candidates = LINKS.map(l => path.join(dir, l))
  })

  afterAll(async () => {
    await cleanupAllFixtures('resolver')
  })

  describe('resolveTarget', () => {
    it('canonicalizes through symlinks', async () => {
      const viaLink = await resolveTarget(path.join(dir, 'l3'))
      expect(viaLink.path).toBe(path.join(dir, 'x1.txt'))
    })

    it('records the target identity', async () => {
      const identity = await readIdentity(path.join(dir, 'x1.txt'))
      expect(identity).toBeDefined()
      expect(target.identity).toEqual(identity)
    })

    it('throws TargetResolutionError for a missing target', async () => {
      const missing = path.join(dir, 'nope')
      await expect(resolveTarget(missing)).rejects.toThrow(TargetResolutionError)
      await expect(resolveTarget(missing)).rejects.toMatchObject({ code: 'ENOENT', target: missing })
    })

    it('throws for a dangling link as target', async () => {
      await expect(resolveTarget(path.join(dir, 'l4'))).rejects.toThrow(
        `Failed to resolve target '${path.join(dir, 'l4')}'`
      )
    })
  })

  describe('strategies', () => {
    it('canonical path matches exactly the links that reach the target', async () => {
      const strategy = new CanonicalPathStrategy(target.path)
      const matched: string[] = []
      for (const link of LINKS) {
        if (await strategy.matches(path.join(dir, link))) matched.push(link)
      }
      expect(matched).toEqual(MATCHING)
    })

    it('identity agrees with canonical path on every candidate', async () => {
      const identity = target.identity
      if (identity === undefined) return
      const fast = new IdentityStrategy(identity)
      const slow = new CanonicalPathStrategy(target.path)

      for (const candidate of candidates) {
        expect(await fast.matches(candidate)).toBe(await slow.matches(candidate))
      }
    })

    it('treats a hard link to the target as the same file by identity only', async () => {
      const identity = target.identity
      if (identity === undefined) return
      const hard = path.join(dir, 'x1-hard.txt')

      expect(await new IdentityStrategy(identity).matches(hard)).toBe(true)
      expect(await new CanonicalPathStrategy(target.path).matches(hard)).toBe(false)
      expect(await createMatchStrategy(target).matches(hard)).toBe(true)
    })

    it('compares identities field by field', () => {
      expect(sameIdentity({ dev: 1n, ino: 2n }, { dev: 1n, ino: 2n })).toBe(true)
      expect(sameIdentity({ dev: 1n, ino: 2n }, { dev: 1n, ino: 3n })).toBe(false)
      expect(sameIdentity({ dev: 1n, ino: 2n }, { dev: 4n, ino: 2n })).toBe(false)
    })

    it('falls back to canonical paths without an identity', () => {
      expect(createMatchStrategy({ path: target.path }).name).toBe('canonical-path')
      expect(createMatchStrategy(target).name).toBe(target.identity ? 'fast-path' : 'canonical-path')
    })

    it('fast path skips the slow check on a hit', async () => {
      const fast = stubStrategy(true)
      const slow = stubStrategy(false)

      expect(await new FastPathStrategy(fast, slow).matches('/x')).toBe(true)
      expect(slow.matches).not.toHaveBeenCalled()
    })

    it('fast path asks the slow check on a miss', async () => {
      const fast = stubStrategy(false)
      const slow = stubStrategy(true)

      expect(await new FastPathStrategy(fast, slow).matches('/x')).toBe(true)
      expect(slow.matches).toHaveBeenCalledWith('/x')
    })
  })

  describe('resolveMatches', () => {
    it('returns every matching candidate', async () => {
      const set = await resolveMatches(candidates, target, { concurrency: 4, stream: false })
      expect(set.sorted()).toEqual(MATCHING.map(l => path.join(dir, l)))
    })

    it('announces begin once, before the first match', async () => {
      const sink = recordingSink()
      await resolveMatches(candidates, target, { concurrency: 4, stream: true, sink })

      const announcements = sink.events.filter(e => e.type === 'begin' || e.type === 'match')
      expect(announcements[0]).toEqual({ type: 'begin' })
      expect(announcements.filter(e => e.type === 'begin')).toHaveLength(1)
      expect(
        announcements
          .flatMap(e => (e.type === 'match' ? [e.path] : []))
          .sort()
      ).toEqual(MATCHING.map(l => path.join(dir, l)).sort())
    })

    it('reports progress once per candidate', async () => {
      const sink = recordingSink()
      await resolveMatches(candidates, target, { concurrency: 2, stream: false, sink })

      const progress = sink.events.flatMap(e => (e.type === 'progress' ? [e.progress] : []))
      expect(progress).toHaveLength(6)
      expect(progress.map(p => p.completed)).toEqual([1, 2, 3, 4, 5, 6])
      expect(progress.every(p => p.total === 6)).toBe(true)
    })

    it('announces nothing when streaming is off', async () => {
      const sink = recordingSink()
      await resolveMatches(candidates, target, { concurrency: 4, stream: false, sink })
      expect(sink.events.some(e => e.type === 'begin' || e.type === 'match')).toBe(false)
    })

    it('does not announce begin without a match', async () => {
      const sink = recordingSink()
      const set = await resolveMatches([path.join(dir, 'l2'), path.join(dir, 'l4')], target, {
        concurrency: 2,
        stream: true,
        sink,
      })
      expect(set.size).toBe(0)
      expect(sink.events.some(e => e.type === 'begin')).toBe(false)
    })

    it('uses an injected strategy', async () => {
      const strategy = stubStrategy(true)
      const set = await resolveMatches(candidates, target, { concurrency: 3, stream: false, strategy })

      expect(set.size).toBe(6)
      expect(strategy.matches).toHaveBeenCalledTimes(6)
    })

    it.each([1, 2, 16])('finds the same matches with %i workers', async concurrency => {
      const set = await resolveMatches(candidates, target, { concurrency, stream: false })
      expect(set.sorted()).toEqual(MATCHING.map(l => path.join(dir, l)))
    })

    it('handles an empty candidate list', async () => {
      const set = await resolveMatches([], target, { concurrency: 4, stream: true })
      expect(set.sorted()).toEqual([])
    })
  })
})
