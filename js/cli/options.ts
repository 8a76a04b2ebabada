/**
 * Command-line parsing
 */

import * as fs from 'fs'
import * as path from 'path'
import { Command, InvalidArgumentError, Option } from 'commander'
import { z } from 'zod'
import type { ScanOptions } from '../types'
import type { ColorChoice } from './colors'

export interface CliOptions {
  scan: ScanOptions
  json: boolean
  /** Draw progress on stderr */
  tui: boolean
  color: ColorChoice
}

type RawCliOptions = {
  root?: string
  hidden: boolean
  maxDepth?: number
  tui: boolean
  json?: boolean
  respectGitignore?: boolean
  oneFilesystem?: boolean
  threads?: number
  ignore: string[]
  ignoreFile: string[]
  includeHeavy?: boolean
  color: ColorChoice
  stream: boolean
}

const packageSchema = z.object({ version: z.string() })

/**
 * Version from package.json (two levels up from both js/cli and dist/cli)
 */
export function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8')
    return packageSchema.parse(JSON.parse(raw)).version
  } catch {
    return '0.0.0'
  }
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return n
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function createProgram(): Command {
  return new Command()
    .name('linkscan')
    .description('Find every symlink under a directory whose resolved target is <target>')
    .version(readVersion(), '-V, --version')
    .argument('<target>', 'path to match symlinks against')
    .option('--root <dir>', 'directory to scan (default: current directory)')
    .option('--no-hidden', 'skip hidden files and directories')
    .option('--max-depth <n>', 'maximum depth to recurse (0 = entries directly under the root)', parseNonNegativeInt)
    .option('--no-tui', 'disable progress output')
    .option('--json', 'print matches as a JSON array')
    .option('--respect-gitignore', 'honor .gitignore and .git/info/exclude files')
    .option('--one-filesystem', 'do not cross filesystem boundaries')
    .option('--threads <n>', 'worker count (default: auto)', parseNonNegativeInt)
    .option('--ignore <glob>', 'additional gitignore-style ignore glob; !glob force-includes (repeatable)', collect, [])
    .option('--ignore-file <path>', 'file of gitignore-style patterns (repeatable)', collect, [])
    .option('--include-heavy', 'descend into node_modules, .cache, target and similar directories')
    .addOption(new Option('--color <when>', 'color output').choices(['auto', 'always', 'never']).default('auto'))
    .option('--no-stream', 'print only the final summary')
}

/**
 * Parse user arguments (without the node/script prefix)
 */
export function parseArgs(argv: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...argv], { from: 'user' })
  const raw = program.opts<RawCliOptions>()
  const [target] = program.args
  const json = raw.json === true

  return {
    scan: {
      target,
      root: raw.root,
      hidden: raw.hidden,
      maxDepth: raw.maxDepth,
      ignore: raw.ignore,
      ignoreFiles: raw.ignoreFile,
      includeHeavy: raw.includeHeavy === true,
      oneFilesystem: raw.oneFilesystem === true,
      gitignore: raw.respectGitignore === true,
      threads: raw.threads ?? 0,
      stream: raw.stream && !json,
    },
    json,
    tui: raw.tui,
    color: raw.color,
  }
}
