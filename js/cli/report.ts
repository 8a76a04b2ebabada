/**
 * Text and JSON reporting for the CLI
 */

import type { ResolveProgress, ScanResult, ScanSink, TraversalStats } from '../types'
import { visibleWidth } from './colors'
import type { Palette } from './colors'
import type { ProgressDisplay } from './progress'

const BOX_PADDING = 1

/**
 * Draw lines inside a box:
 *
 * ┌──────────┐
 * │ /a/link1 │
 * └──────────┘
 */
export function formatBox(lines: readonly string[], palette: Palette): string[] {
  const contentWidth = lines.reduce((max, line) => Math.max(max, visibleWidth(line)), 0)
  const width = contentWidth + BOX_PADDING * 2
  const out = [palette.cyan(`┌${'─'.repeat(width)}┐`)]
  for (const line of lines) {
    const right = Math.max(0, width - (visibleWidth(line) + BOX_PADDING))
    out.push(`${palette.cyan('│')}${' '.repeat(BOX_PADDING)}${line}${' '.repeat(right)}${palette.cyan('│')}`)
  }
  out.push(palette.cyan(`└${'─'.repeat(width)}┘`))
  return out
}

export function formatCount(n: number): string {
  return n.toLocaleString('en-US')
}

export function formatStats(result: ScanResult, palette: Palette): string[] {
  const seconds = result.elapsedMs / 1000
  return [
    `${palette.dim('Folders traversed:')} ${palette.bold(palette.cyan(formatCount(result.directories)))}`,
    `${palette.dim('Files traversed:')} ${palette.bold(palette.cyan(formatCount(result.files)))}`,
    `${palette.dim('Symlinks scanned:')} ${palette.bold(palette.cyan(formatCount(result.candidates)))}`,
    `${palette.dim('Matches:')} ${palette.bold(palette.green(formatCount(result.matches.length)))}`,
    `${palette.dim('Elapsed:')} ${seconds.toFixed(2)}s`,
    `${palette.dim('Rate:')} ${palette.bold(palette.magenta(formatCount(result.rate)))} ${palette.dim('symlinks/s')}`,
  ]
}

/**
 * Pretty-printed JSON array of the sorted matches
 */
export function formatJson(matches: readonly string[]): string {
  return JSON.stringify(matches, null, 2)
}

/**
 * Scan sink for the text output mode
 *
 * Streamed matches are written as they arrive, preceded by one blank line.
 * `summary()` then yields the boxed match list (only when nothing was
 * streamed), a blank line, and the stats.
 */
export class TextReporter implements ScanSink {
  private streamed = 0

  constructor(
    private readonly write: (line: string) => void,
    private readonly palette: Palette,
    private readonly progress?: ProgressDisplay
  ) {}

  get streamedCount(): number {
    return this.streamed
  }

  onTraversalComplete(stats: TraversalStats): void {
    this.progress?.startResolving(stats.candidates)
  }

  onBegin(): void {
    this.emit('')
  }

  onMatch(matchPath: string): void {
    this.streamed++
    this.emit(this.palette.match(matchPath))
  }

  onProgress(progress: ResolveProgress): void {
    this.progress?.update(progress)
  }

  summary(result: ScanResult): string[] {
    const lines: string[] = []
    if (this.streamed === 0) {
      const body =
        result.matches.length === 0
          ? [this.palette.yellow('No matches found.')]
          : result.matches.map(m => this.palette.match(m))
      lines.push(...formatBox(body, this.palette))
    }
    lines.push('')
    lines.push(...formatStats(result, this.palette))
    return lines
  }

  private emit(line: string): void {
    if (this.progress) {
      this.progress.println(() => this.write(line))
    } else {
      this.write(line)
    }
  }
}
