#!/usr/bin/env node
// Main CLI entry point for linkscan

import { scan } from '../scan'
import { createPalette, shouldUseColors } from './colors'
import { parseArgs } from './options'
import { ProgressDisplay } from './progress'
import { formatJson, TextReporter } from './report'

export interface CliIO {
  stdout: NodeJS.WritableStream & { isTTY?: boolean }
  stderr: NodeJS.WritableStream & { isTTY?: boolean }
}

/**
 * Run the CLI and return its exit code
 */
export async function run(
  argv: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const cli = parseArgs(argv)
  const palette = createPalette(shouldUseColors(cli.color, io.stdout.isTTY === true))
  const progress =
    cli.tui && !cli.json && io.stderr.isTTY === true
      ? new ProgressDisplay(io.stderr, createPalette(shouldUseColors(cli.color, true)))
      : undefined
  const reporter = new TextReporter(line => io.stdout.write(`${line}\n`), palette, progress)

  progress?.startWalking()
  try {
    const result = await scan(cli.scan, reporter)
    progress?.stop()
    const lines = cli.json ? [formatJson(result.matches)] : reporter.summary(result)
    io.stdout.write(`${lines.join('\n')}\n`)
    return 0
  } catch (err) {
    progress?.stop()
    const message = err instanceof Error ? err.message : String(err)
    io.stderr.write(`${palette.red('error')}: ${message}\n`)
    return 1
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code
    },
    (err: unknown) => {
      console.error(err)
      process.exitCode = 1
    }
  )
}
