/**
 * Daemon Scheduler
 *
 * Runs the pipeline once at startup, then again on the configured weekday
 * and time schedule, when a configuration file changes, and on SIGHUP.
 *
 * The loop is an explicit state machine that waits for one event at a time.
 * Events raised while a run is in progress collapse into a single pending
 * event, so a burst of triggers causes at most one follow-up run.
 */

import { formatErrorForCli, isConfigError } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import { createFileWatcher, type ConfigWatcher, type WatcherFactory } from '../lib/watcher.js'
import type { RunReport } from '../domain/report.js'
import { describeSchedule, formatRunTime, nextRunTime } from '../domain/schedule.js'
import type { ScheduleSpec } from '../types.js'

export const DEFAULT_DEBOUNCE_MS = 1000

export type DaemonState = 'idle' | 'starting' | 'running' | 'waiting' | 'reloading' | 'stopping' | 'stopped'

export type DaemonEvent =
  | { type: 'schedule' }
  | { type: 'config-change'; path: string }
  | { type: 'reload'; reason: string }
  | { type: 'stop'; reason: string }

// A pending event is only replaced by one at least as important
const EVENT_PRIORITY: Record<DaemonEvent['type'], number> = {
  schedule: 0,
  'config-change': 1,
  reload: 2,
  stop: 3
}

export type DaemonSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP'

export interface SignalSource {
  on(signal: DaemonSignal, listener: () => void): void
  off(signal: DaemonSignal, listener: () => void): void
}

export type CancelTimer = () => void

export interface Timers {
  schedule(callback: () => void, delayMs: number): CancelTimer
}

/**
 * What the daemon needs from a loaded configuration
 */
export interface DaemonConfig {
  schedule: ScheduleSpec
  /** Configuration files to watch when `schedule.watchConfig` is set */
  files: string[]
}

export interface DaemonOptions<TConfig extends DaemonConfig> {
  /** Load (or reload) configuration, applying command-line overrides */
  load(): Promise<TConfig>
  /** One pipeline pass */
  run(config: TConfig, signal: AbortSignal): Promise<RunReport>
  logger: Logger
  now?: () => Date
  timers?: Timers
  createWatcher?: WatcherFactory
  signals?: SignalSource
  debounceMs?: number
}

const nodeTimers: Timers = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs)
    return () => clearTimeout(handle)
  }
}

export const processSignals: SignalSource = {
  on(signal, listener) {
    process.on(signal, listener)
  },
  off(signal, listener) {
    process.off(signal, listener)
  }
}

function samePaths(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((path, i) => path === b[i])
}

export class Daemon<TConfig extends DaemonConfig> {
  private currentState: DaemonState = 'idle'
  private config?: TConfig
  private pending?: DaemonEvent
  private waiter?: (event: DaemonEvent) => void
  private watcher?: ConfigWatcher
  private cancelSchedule?: CancelTimer
  private cancelDebounce?: CancelTimer
  private controller?: AbortController
  private nextRun?: Date
  private readonly signalHandlers: Array<[DaemonSignal, () => void]> = []

  private readonly logger: Logger
  private readonly now: () => Date
  private readonly timers: Timers
  private readonly createWatcher: WatcherFactory
  private readonly signals: SignalSource
  private readonly debounceMs: number

  constructor(private readonly options: DaemonOptions<TConfig>) {
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
    this.timers = options.timers ?? nodeTimers
    this.createWatcher = options.createWatcher ?? createFileWatcher
    this.signals = options.signals ?? processSignals
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS
  }

  get state(): DaemonState {
    return this.currentState
  }

  /** Next scheduled run, if any */
  get nextRunAt(): Date | undefined {
    return this.nextRun
  }

  /** Files currently watched (empty when watching is off) */
  get watchedPaths(): readonly string[] {
    return this.watcher?.paths ?? []
  }

  /**
   * Start the daemon. Resolves once it has stopped.
   *
   * A configuration error while loading or during the initial run is
   * thrown and the loop never starts.
   */
  async start(): Promise<void> {
    if (this.currentState !== 'idle') {
      throw new Error(`Daemon cannot start from state '${this.currentState}'`)
    }
    this.currentState = 'starting'

    try {
      const config = await this.options.load()
      this.config = config
      this.logger.info('Daemon starting')
      this.installSignalHandlers()

      this.logger.info('Performing initial run')
      await this.executeRun(config, true)

      if (!this.stopRequested()) {
        this.logSchedule(config.schedule)
        await this.updateWatcher(config)
        this.arm()
        await this.loop()
      }
    } finally {
      await this.cleanup()
    }
  }

  /**
   * Request shutdown. A run in progress is cancelled: operations already
   * started finish, the rest are skipped.
   */
  stop(reason = 'stop requested'): void {
    if (this.currentState === 'stopping' || this.currentState === 'stopped') return
    this.controller?.abort()
    this.emit({ type: 'stop', reason })
  }

  /**
   * Re-read configuration and run, as on SIGHUP
   */
  reload(reason = 'reload requested'): void {
    this.emit({ type: 'reload', reason })
  }

  // ==========================================================================
  // Event loop
  // ==========================================================================

  private emit(event: DaemonEvent): void {
    if (this.waiter) {
      const waiter = this.waiter
      this.waiter = undefined
      waiter(event)
      return
    }
    if (!this.pending || EVENT_PRIORITY[event.type] >= EVENT_PRIORITY[this.pending.type]) {
      this.pending = event
    }
  }

  private nextEvent(): Promise<DaemonEvent> {
    const pending = this.pending
    if (pending) {
      this.pending = undefined
      return Promise.resolve(pending)
    }
    return new Promise(resolve => {
      this.waiter = resolve
    })
  }

  private stopRequested(): boolean {
    return this.pending?.type === 'stop'
  }

  private async loop(): Promise<void> {
    for (;;) {
      this.currentState = 'waiting'
      const event = await this.nextEvent()

      if (event.type === 'stop') {
        this.logger.info(`Stopping daemon (${event.reason})`)
        return
      }

      if (event.type === 'schedule') {
        this.logger.info('Running scheduled update')
      } else {
        const detail = event.type === 'config-change'
          ? `configuration file changed: ${event.path}`
          : event.reason
        this.logger.info(`Reloading configuration (${detail})`)
        const reloaded = await this.reloadConfig()
        if (this.stopRequested()) continue
        if (!reloaded) {
          this.arm()
          continue
        }
      }

      const config = this.config
      if (config) {
        await this.executeRun(config, false)
      }
      if (this.stopRequested()) continue
      this.arm()
    }
  }

  private async executeRun(config: TConfig, initial: boolean): Promise<void> {
    this.clearSchedule()
    this.currentState = 'running'
    const controller = new AbortController()
    this.controller = controller
    // a stop that arrived while loading has nothing to abort yet
    if (this.stopRequested()) controller.abort()

    try {
      const report = await this.options.run(config, controller.signal)
      switch (report.status) {
        case 'success':
          this.logger.info('Update run finished successfully')
          break
        case 'cancelled':
          this.logger.warn('Update run cancelled')
          break
        default:
          this.logger.warn(`Update run finished with status '${report.status}'`)
      }
    } catch (error) {
      if (initial && isConfigError(error)) {
        throw error
      }
      this.logger.error(`Update run failed: ${formatErrorForCli(error)}`)
    } finally {
      this.controller = undefined
    }
  }

  private async reloadConfig(): Promise<boolean> {
    this.currentState = 'reloading'
    try {
      const config = await this.options.load()
      this.config = config
      this.logSchedule(config.schedule)
      await this.updateWatcher(config)
      return true
    } catch (error) {
      this.logger.error(`Unable to reload configuration: ${formatErrorForCli(error)}`)
      this.logger.warn('Keeping the previous configuration')
      return false
    }
  }

  // ==========================================================================
  // Timers, watcher and signals
  // ==========================================================================

  private clearSchedule(): void {
    this.cancelSchedule?.()
    this.cancelSchedule = undefined
  }

  private arm(): void {
    this.clearSchedule()
    const config = this.config
    if (!config) return

    const now = this.now()
    const next = nextRunTime(config.schedule, now)
    this.nextRun = next
    if (!next) {
      this.logger.warn('No scheduled update times configured')
      return
    }

    this.cancelSchedule = this.timers.schedule(() => {
      this.cancelSchedule = undefined
      this.emit({ type: 'schedule' })
    }, next.getTime() - now.getTime())
    this.logger.info(`The next run will be at ${formatRunTime(next)}`)
  }

  private logSchedule(schedule: ScheduleSpec): void {
    for (const line of describeSchedule(schedule)) {
      this.logger.info(line)
    }
  }

  private async updateWatcher(config: TConfig): Promise<void> {
    const paths = config.schedule.watchConfig ? config.files : []
    if (this.watcher && samePaths(this.watcher.paths, paths)) return

    await this.closeWatcher()
    if (paths.length === 0) return

    this.watcher = this.createWatcher(
      paths,
      path => this.onFileChange(path),
      error => this.logger.warn(`File watcher error: ${formatErrorForCli(error)}`)
    )
    this.logger.info(`Watching configuration files: ${paths.join(', ')}`)
  }

  private onFileChange(path: string): void {
    this.logger.debug(`Configuration file event: ${path}`)
    this.cancelDebounce?.()
    this.cancelDebounce = this.timers.schedule(() => {
      this.cancelDebounce = undefined
      this.emit({ type: 'config-change', path })
    }, this.debounceMs)
  }

  private async closeWatcher(): Promise<void> {
    const watcher = this.watcher
    this.watcher = undefined
    if (!watcher) return
    try {
      await watcher.close()
    } catch (error) {
      this.logger.warn(`Unable to close file watcher: ${formatErrorForCli(error)}`)
    }
  }

  private installSignalHandlers(): void {
    const handlers: Array<[DaemonSignal, () => void]> = [
      ['SIGINT', () => this.stop('SIGINT')],
      ['SIGTERM', () => this.stop('SIGTERM')],
      ['SIGHUP', () => this.reload('SIGHUP')]
    ]
    for (const [signal, handler] of handlers) {
      this.signals.on(signal, handler)
      this.signalHandlers.push([signal, handler])
    }
  }

  private async cleanup(): Promise<void> {
    this.currentState = 'stopping'
    this.clearSchedule()
    this.cancelDebounce?.()
    this.cancelDebounce = undefined
    for (const [signal, handler] of this.signalHandlers.splice(0)) {
      this.signals.off(signal, handler)
    }
    await this.closeWatcher()
    this.nextRun = undefined
    this.currentState = 'stopped'
    this.logger.info('Daemon stopped')
  }
}
