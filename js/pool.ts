/**
 * Bounded async worker pools
 *
 * Node runs JavaScript on one thread, but every readdir/lstat/realpath a
 * worker awaits is serviced by libuv's thread pool, so N workers keep up to
 * N filesystem calls in flight at once.
 */

/**
 * Run `processor` over every item with at most `concurrency` in flight.
 * A rejection from `processor` stops new work and rejects the whole run.
 */
export async function parallelForEach<T>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<void>,
  concurrency: number
): Promise<void> {
  let nextIndex = 0
  let failed = false

  async function worker(): Promise<void> {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex++
      try {
        await processor(items[index], index)
      } catch (error) {
        failed = true
        throw error
      }
    }
  }

  // Start workers up to concurrency limit
  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () => worker())

  await Promise.all(workers)
}

/**
 * Queue whose items may enqueue more items, drained by a fixed number of
 * workers. Used for directory traversal, where each directory visit pushes
 * its subdirectories.
 *
 * Items are taken LIFO, which keeps the walk depth-first and the queue short.
 */
export class WorkQueue<T> {
  private readonly pending: T[] = []
  private active = 0
  private error: unknown = undefined
  private settled = false
  private readonly done: Promise<void>
  private resolveDone: () => void = () => {}
  private rejectDone: (reason: unknown) => void = () => {}

  constructor(
    private readonly concurrency: number,
    private readonly processor: (item: T, queue: WorkQueue<T>) => Promise<void>
  ) {
    this.done = new Promise<void>((resolve, reject) => {
      this.resolveDone = resolve
      this.rejectDone = reject
    })
  }

  push(item: T): void {
    if (this.settled) {
      throw new Error('WorkQueue has already drained')
    }
    this.pending.push(item)
    this.pump()
  }

  /** Items currently being processed */
  get running(): number {
    return this.active
  }

  /**
   * Resolves once the queue is empty and no worker is running. Rejects with
   * the first error thrown by the processor.
   */
  drain(): Promise<void> {
    this.pump()
    return this.done
  }

  private pump(): void {
    while (this.error === undefined && this.active < Math.max(1, this.concurrency) && this.pending.length > 0) {
      const item = this.pending.pop()
      if (item === undefined) break
      this.active++
      Promise.resolve(item)
        .then(next => this.processor(next, this))
        .then(
          () => this.finish(),
          (err: unknown) => {
            this.error ??= err
            this.finish()
          }
        )
    }
    if (this.active === 0 && (this.pending.length === 0 || this.error !== undefined)) {
      this.settle()
    }
  }

  private finish(): void {
    this.active--
    this.pump()
  }

  private settle(): void {
    if (this.settled) return
    this.settled = true
    if (this.error !== undefined) {
      this.rejectDone(this.error)
    } else {
      this.resolveDone()
    }
  }
}
