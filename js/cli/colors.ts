/**
 * ANSI styling for CLI output
 *
 * `auto` enables colors when the stream is a TTY and NO_COLOR is unset;
 * FORCE_COLOR=0 disables them.
 */

export type ColorChoice = 'auto' | 'always' | 'never'

const CODES = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
} as const

type Code = keyof typeof CODES

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function shouldUseColors(
  choice: ColorChoice,
  isTTY: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (choice === 'always') return true
  if (choice === 'never') return false
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR === '0') return false
  if (env.FORCE_COLOR === '1') return true
  return isTTY
}

export interface Palette {
  readonly enabled: boolean
  bold(text: string): string
  dim(text: string): string
  red(text: string): string
  green(text: string): string
  yellow(text: string): string
  magenta(text: string): string
  cyan(text: string): string
  /** Bold white, used for match paths */
  match(text: string): string
}

export function createPalette(enabled: boolean): Palette {
  const wrap = (text: string, ...codes: Code[]) =>
    enabled ? `${codes.map(code => CODES[code]).join('')}${text}${CODES.reset}` : text

  return {
    enabled,
    bold: text => wrap(text, 'bold'),
    dim: text => wrap(text, 'dim'),
    red: text => wrap(text, 'red'),
    green: text => wrap(text, 'green'),
    yellow: text => wrap(text, 'yellow'),
    magenta: text => wrap(text, 'magenta'),
    cyan: text => wrap(text, 'cyan'),
    match: text => wrap(text, 'white', 'bold'),
  }
}

/**
 * Printed width of a string, ignoring ANSI escapes
 */
export function visibleWidth(text: string): number {
  return [...text.replace(ANSI_PATTERN, '')].length
}
