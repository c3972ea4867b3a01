/**
 * Declarr CLI - Colors Utility
 *
 * ANSI 256 palette for summaries and status lines.
 * Supports NO_COLOR and FORCE_COLOR.
 */

// Check if colors should be enabled
export const isColorEnabled = (env: NodeJS.ProcessEnv = process.env, isTTY = process.stderr.isTTY ?? false): boolean => {
  // Respect NO_COLOR standard
  if (env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (env.FORCE_COLOR !== undefined) return true
  return isTTY
}

const enabled = isColorEnabled()

const wrap = (open: string, close: string) => (s: string): string =>
  enabled ? `\x1b[${open}m${s}\x1b[${close}m` : s

/**
 * Palette (ANSI 256):
 * - 39:  primary, commands
 * - 45:  highlights
 * - 75:  muted accents
 * - 245: muted text
 */
const ansi = {
  bold: wrap('1', '22'),
  dim: wrap('2', '22'),

  primary: wrap('38;5;39', '39'),
  accent: wrap('38;5;45', '39'),
  steel: wrap('38;5;75', '39'),

  white: wrap('97', '39'),
  gray: wrap('38;5;245', '39'),

  red: wrap('91', '39'),
  green: wrap('92', '39'),
  yellow: wrap('93', '39')
}

export { ansi }

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.primary(text)),
  plugin: (text: string) => ansi.bold(ansi.primary(text)),
  instance: (text: string) => ansi.accent(text),
  path: (text: string) => ansi.steel(text),

  // Status
  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.primary(text),

  // Diff
  added: (text: string) => ansi.green(text),
  removed: (text: string) => ansi.red(text),
  modified: (text: string) => ansi.yellow(text),

  // Structure
  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text)
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  skipped: enabled ? ansi.gray('-') : '[SKIP]',
  bullet: enabled ? ansi.steel('•') : '*',
  arrow: enabled ? ansi.primary('→') : '->',
  tilde: enabled ? ansi.yellow('~') : '~',
  minus: enabled ? ansi.red('-') : '-'
}

// Everything goes to stderr; stdout is reserved for data
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`)
}
