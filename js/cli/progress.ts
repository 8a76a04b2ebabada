/**
 * Terminal progress: a spinner while walking, a bar while checking symlinks
 */

import type { Palette } from './colors'
import type { ResolveProgress } from '../types'

const SPINNER = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']
const BAR_WIDTH = 40
const CLEAR_LINE = '\r\x1b[2K'

/**
 * `#####-----` style bar for `completed` out of `total`
 */
export function renderBar(completed: number, total: number, width = BAR_WIDTH): string {
  const ratio = total === 0 ? 1 : Math.min(1, completed / total)
  const filled = Math.round(ratio * width)
  return '#'.repeat(filled) + '-'.repeat(width - filled)
}

export class ProgressDisplay {
  private timer: NodeJS.Timeout | undefined
  private frame = 0
  private mode: 'idle' | 'walking' | 'resolving' = 'idle'
  private completed = 0
  private total = 0
  private lastDraw = 0

  constructor(
    private readonly stream: NodeJS.WritableStream,
    private readonly palette: Palette
  ) {}

  startWalking(): void {
    this.mode = 'walking'
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % SPINNER.length
      this.draw()
    }, 80)
    this.timer.unref()
    this.draw()
  }

  startResolving(total: number): void {
    this.stopTimer()
    this.mode = 'resolving'
    this.total = total
    this.completed = 0
    this.draw()
  }

  update(progress: ResolveProgress): void {
    this.completed = progress.completed
    this.total = progress.total
    const now = Date.now()
    if (progress.completed === progress.total || now - this.lastDraw >= 50) {
      this.draw()
    }
  }

  /**
   * Print a line above the progress display
   */
  println(write: () => void): void {
    if (this.mode === 'idle') {
      write()
      return
    }
    this.stream.write(CLEAR_LINE)
    write()
    this.draw()
  }

  stop(): void {
    this.stopTimer()
    if (this.mode !== 'idle') this.stream.write(CLEAR_LINE)
    this.mode = 'idle'
  }

  private stopTimer(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer)
      this.timer = undefined
    }
  }

  private draw(): void {
    this.lastDraw = Date.now()
    if (this.mode === 'walking') {
      this.stream.write(`${CLEAR_LINE}${this.palette.green(SPINNER[this.frame])} Walking filesystem…`)
    } else if (this.mode === 'resolving') {
      const bar = this.palette.cyan(renderBar(this.completed, this.total))
      this.stream.write(`${CLEAR_LINE}${bar} ${this.completed}/${this.total} Checking symlinks`)
    }
  }
}
