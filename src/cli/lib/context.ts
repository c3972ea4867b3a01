import type { SignalSource } from '../../daemon/daemon.js'
import type { Logger } from '../../lib/logger.js'
import type { AnyPlugin } from '../../plugins/types.js'

/**
 * What every command handler receives from the entry point
 */
export interface CommandContext {
  /** Configuration file, defaults to declarr.yml in `cwd` */
  configPath?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
  plugins: readonly AnyPlugin[]
  /** Only process these plugins */
  pluginFilter?: string[]
  logger: Logger
  signals?: SignalSource
}
