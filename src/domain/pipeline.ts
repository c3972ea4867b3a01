/**
 * Run Stage Pipeline
 *
 * One reconciliation pass over every instance of every active plugin.
 * Stages run strictly in order and each one finishes for every instance
 * before the next begins. Within a stage, instances are walked level by
 * level in dependency order (reverse order for deletion), with up to
 * `concurrency` instances of one level in flight.
 *
 * An instance that fails a stage is excluded from the rest of the run, and
 * so is every instance that depends on it. Failed resource fetches, applies
 * and deletes are reported without excluding the instance.
 */

import { runBatch } from '../lib/batch-runner.js'
import type { ConfigDocument } from '../lib/config-loader.js'
import {
  ConnectionTestError,
  InvalidConfigError,
  SecretsError,
  StageError,
  errorMessage,
  isConfigError,
  isDeclarrError
} from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { DeclarrSettings } from '../lib/settings.js'
import type { AnyPlugin, Instance, InstanceConfig, InstanceView } from '../plugins/types.js'
import {
  formatInstanceRef,
  instanceKey,
  type InstanceConnection,
  type InstanceLink,
  type InstanceRef,
  type RunMode,
  type RunStage
} from '../types.js'
import { computeDiff, type ResourceDiff } from './attributes.js'
import { resolveDependencies, type DependencyGraph } from './graph.js'
import { buildRegistry, connectionOf, type InstanceRecord } from './registry.js'
import { deriveStatus, type InstanceReport, type ResourceError, type RunReport } from './report.js'

export interface PipelineOptions {
  /** Merged configuration document */
  document: ConfigDocument
  /** Installed plugins */
  plugins: readonly AnyPlugin[]
  settings: DeclarrSettings
  logger: Logger
  mode?: RunMode
  /** Compute and report changes without applying or deleting anything */
  dryRun?: boolean
  pluginFilter?: readonly string[]
  signal?: AbortSignal
  now?: () => Date
}

/**
 * Per-instance state, alive for one run only
 */
interface InstanceState {
  ref: InstanceRef
  plugin: AnyPlugin
  config: InstanceConfig
  connection: InstanceConnection
  links: InstanceRef[]
  logger: Logger
  secrets?: { value: unknown }
  remotes: Map<string, unknown>
  diffs: ResourceDiff[]
  excluded: boolean
  report: InstanceReport
}

type StageOperation = (state: InstanceState) => Promise<void>

const CANCELLED_REASON = 'run cancelled'

class PipelineRun {
  private readonly states = new Map<string, InstanceState>()
  private readonly signal: AbortSignal
  private graph?: DependencyGraph

  constructor(
    private readonly options: PipelineOptions,
    private readonly records: InstanceRecord[],
    private readonly plugins: AnyPlugin[]
  ) {
    this.signal = options.signal ?? new AbortController().signal

    for (const record of records) {
      this.states.set(instanceKey(record.ref), {
        ref: record.ref,
        plugin: record.plugin,
        config: record.config,
        connection: connectionOf(record.config, options.settings.request_timeout),
        links: [],
        logger: options.logger.child({ plugin: record.ref.plugin, instance: record.ref.instance }),
        remotes: new Map(),
        diffs: [],
        excluded: false,
        report: {
          ref: record.ref,
          outcome: 'ok',
          changes: [],
          deletions: [],
          errors: []
        }
      })
    }
  }

  get cancelled(): boolean {
    return this.signal.aborted
  }

  // ==========================================================================
  // State helpers
  // ==========================================================================

  private state(ref: InstanceRef): InstanceState {
    const state = this.states.get(instanceKey(ref))
    if (!state) {
      throw new Error(`Unknown instance ${formatInstanceRef(ref)}`)
    }
    return state
  }

  private statesInOrder(): InstanceState[] {
    const refs = this.graph ? this.graph.order : this.records.map(record => record.ref)
    return refs.map(ref => this.state(ref))
  }

  private toInstance(state: InstanceState): Instance {
    return {
      ref: state.ref,
      config: state.config,
      connection: state.connection,
      links: state.links,
      logger: state.logger
    }
  }

  private viewFor(plugin: string): InstanceView {
    return {
      get: (name: string) => {
        const state = this.states.get(instanceKey({ plugin, instance: name }))
        return state ? this.toInstance(state) : undefined
      },
      find: (ref: InstanceRef) => {
        const state = this.states.get(instanceKey(ref))
        return state ? this.toInstance(state) : undefined
      },
      list: (name: string) => this.statesInOrder()
        .filter(state => state.ref.plugin === name)
        .map(state => this.toInstance(state))
    }
  }

  private fail(state: InstanceState, stage: RunStage, error: unknown): void {
    const wrapped = isDeclarrError(error) ? error : new StageError(state.ref, stage, error)
    state.excluded = true
    state.report.outcome = 'failed'
    state.report.stage = stage
    state.report.reason = wrapped.message
    state.logger.error(`${stage} failed: ${wrapped.message}`)
  }

  private skip(state: InstanceState, stage: RunStage, reason: string): void {
    state.excluded = true
    state.report.outcome = 'skipped'
    state.report.stage = stage
    state.report.reason = reason
    state.logger.warn(`Skipping instance from ${stage}: ${reason}`)
  }

  private recordResourceError(
    state: InstanceState,
    resource: string,
    operation: ResourceError['operation'],
    error: unknown
  ): void {
    const message = errorMessage(error)
    state.report.errors.push({ resource, operation, message })
    state.logger.error(`Unable to ${operation} ${resource}: ${message}`)
  }

  /**
   * Exclude every instance that depends on an excluded instance
   */
  private propagateExclusions(stage: RunStage): void {
    if (!this.graph) return
    for (const ref of this.graph.order) {
      const state = this.state(ref)
      if (state.excluded) continue
      const blocked = this.graph.dependenciesOf(ref).find(dep => this.state(dep).excluded)
      if (blocked) {
        this.skip(state, stage, `depends on excluded instance ${formatInstanceRef(blocked)}`)
      }
    }
  }

  /**
   * Run an operation for every remaining instance, level by level
   */
  private async runStage(stage: RunStage, operation: StageOperation, reverse = false): Promise<void> {
    if (!this.graph) return
    this.options.logger.debug(`Stage ${stage}`)

    const levels = reverse ? [...this.graph.levels].reverse() : this.graph.levels
    for (const level of levels) {
      const active = (reverse ? [...level].reverse() : level)
        .map(ref => this.state(ref))
        .filter(state => !state.excluded)

      const result = await runBatch(active, operation, {
        concurrency: this.options.settings.concurrency,
        signal: this.signal
      })

      for (const op of result.operations) {
        if (op.skipped) {
          this.skip(op.item, stage, CANCELLED_REASON)
        } else if (op.error) {
          this.fail(op.item, stage, op.error)
        }
      }
      this.propagateExclusions(stage)
    }
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  /**
   * Run every plugin's pre-init hook. Resolves to whether any hook ran, in
   * which case the links must be resolved again from the rendered configs.
   */
  async renderPreInit(): Promise<boolean> {
    const stage: RunStage = 'RENDER_PRE_INIT'
    this.options.logger.debug(`Stage ${stage}`)
    let rendered = false

    for (const plugin of this.plugins) {
      const states = this.statesInOrder().filter(state => state.ref.plugin === plugin.name)
      if (!plugin.renderPreInit) continue

      if (this.cancelled) {
        states.forEach(state => this.skip(state, stage, CANCELLED_REASON))
        continue
      }

      rendered = true
      try {
        const configs = new Map(states.map(state => [state.ref.instance, state.config]))
        const output = await plugin.renderPreInit(configs, this.options.logger.child({ plugin: plugin.name }))
        for (const state of states) {
          state.config = output.get(state.ref.instance) ?? state.config
          state.connection = connectionOf(state.config, this.options.settings.request_timeout)
        }
      } catch (error) {
        if (isConfigError(error)) throw error
        states.forEach(state => this.fail(state, stage, error))
      }
    }
    this.propagateExclusions(stage)
    return rendered
  }

  /**
   * Collect links and order the instances. Throws on unresolved links and cycles.
   */
  resolveGraph(): DependencyGraph {
    const links: InstanceLink[] = []
    for (const state of this.statesInOrder()) {
      try {
        state.links = state.plugin.instanceLinks?.(state.config) ?? []
      } catch (error) {
        throw new InvalidConfigError(errorMessage(error), {
          location: formatInstanceRef(state.ref),
          cause: error
        })
      }
      for (const target of state.links) {
        links.push({ source: state.ref, target })
      }
    }

    this.graph = resolveDependencies(
      this.records.map(record => record.ref),
      links,
      { installedPlugins: this.options.plugins.map(plugin => plugin.name) }
    )
    this.options.logger.debug(
      `Execution order: ${this.graph.order.map(formatInstanceRef).join(', ')}`
    )
    return this.graph
  }

  async initialize(): Promise<void> {
    await this.runStage('INITIALIZE_INSTANCES', async state => {
      if (!state.plugin.initialize) return
      state.logger.debug('Initialising instance')
      await state.plugin.initialize(this.toInstance(state))
    })
  }

  async renderPostInit(): Promise<void> {
    await this.runStage('RENDER_POST_INIT', async state => {
      if (!state.plugin.renderPostInit) return
      state.logger.debug('Rendering dynamic configuration')
      state.config = await state.plugin.renderPostInit(this.toInstance(state), this.viewFor(state.ref.plugin))
      state.connection = connectionOf(state.config, this.options.settings.request_timeout)
    })
  }

  async fetchSecrets(): Promise<void> {
    await this.runStage('FETCH_SECRETS', async state => {
      const instance = this.toInstance(state)
      state.logger.debug('Fetching secrets')

      let secrets: unknown
      try {
        secrets = await state.plugin.fetchSecrets(instance)
      } catch (error) {
        throw isDeclarrError(error) ? error : new SecretsError(state.ref, errorMessage(error), error)
      }

      if (!(await state.plugin.testSecrets(instance, secrets))) {
        throw new ConnectionTestError(state.ref, state.connection.url)
      }
      state.secrets = { value: secrets }
      state.logger.info('Connection test successful')
    })
  }

  async fetchRemote(): Promise<void> {
    await this.runStage('FETCH_REMOTE', async state => {
      const instance = this.toInstance(state)
      const secrets = state.secrets?.value

      for (const resource of state.plugin.resources) {
        if (this.cancelled) return
        state.logger.debug(`Fetching remote ${resource.name}`)
        try {
          state.remotes.set(resource.name, await resource.fetchRemote(instance, secrets))
        } catch (error) {
          this.recordResourceError(state, resource.name, 'fetch', error)
        }
      }
    })
  }

  async computeDiffs(): Promise<void> {
    await this.runStage('COMPUTE_DIFF', async state => {
      for (const resource of state.plugin.resources) {
        if (!state.remotes.has(resource.name)) continue
        const remote = state.remotes.get(resource.name)
        const payload = resource.preparePayload ? resource.preparePayload(remote) : {}
        const diff = computeDiff(resource.name, resource.attributes, state.config, remote, payload, state.logger)
        state.diffs.push(diff)
      }

      const total = state.diffs.reduce((sum, diff) => sum + diff.changes.length, 0)
      if (total === 0) {
        state.logger.info('Remote configuration is up to date')
      } else {
        state.logger.info(`${total} ${total === 1 ? 'change' : 'changes'} to apply`)
      }
    })
  }

  async applyUpdates(): Promise<void> {
    const dryRun = this.options.dryRun ?? false

    await this.runStage('APPLY_UPDATES', async state => {
      const instance = this.toInstance(state)
      const secrets = state.secrets?.value

      for (const diff of state.diffs) {
        if (!diff.requiresApply) continue
        if (this.cancelled) return

        if (dryRun) {
          for (const change of diff.changes) {
            state.logger.info(`(dry run) ${change.display}`)
          }
          state.report.changes.push(...diff.changes)
          continue
        }

        const resource = state.plugin.resources.find(r => r.name === diff.resource)
        if (!resource) continue
        try {
          await resource.apply(instance, secrets, diff.payload, state.remotes.get(diff.resource))
          for (const change of diff.changes) {
            state.logger.info(change.display)
          }
          state.report.changes.push(...diff.changes)
        } catch (error) {
          this.recordResourceError(state, diff.resource, 'apply', error)
        }
      }
    })
  }

  async deleteUnmanaged(): Promise<void> {
    const dryRun = this.options.dryRun ?? false

    await this.runStage('DELETE_UNMANAGED', async state => {
      const instance = this.toInstance(state)
      const secrets = state.secrets?.value

      for (const resource of state.plugin.resources) {
        const deletion = resource.deletion
        if (!deletion || !state.remotes.has(resource.name)) continue
        if (!deletion.enabled(state.config)) continue

        const items = deletion.findUnmanaged(state.config, state.remotes.get(resource.name))
        for (const item of items) {
          if (this.cancelled) return
          const description = `${resource.name}: ${deletion.describe(item)}`

          if (dryRun) {
            state.logger.info(`(dry run) Would delete ${description}`)
            state.report.deletions.push(description)
            continue
          }

          try {
            await deletion.delete(instance, secrets, item)
            state.logger.info(`Deleted ${description}`)
            state.report.deletions.push(description)
          } catch (error) {
            this.recordResourceError(state, resource.name, 'delete', error)
          }
        }
      }
    }, true)
  }

  // ==========================================================================
  // Report
  // ==========================================================================

  finish(startedAt: Date, finishedAt: Date): RunReport {
    const instances = this.statesInOrder().map(state => {
      const report = state.report
      if (!state.excluded && report.errors.length > 0) {
        report.outcome = 'partial'
      }
      return report
    })

    return {
      status: deriveStatus(instances, this.cancelled),
      mode: this.options.mode ?? 'apply',
      dryRun: this.options.dryRun ?? false,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      instances
    }
  }
}

/**
 * Execute one reconciliation pass.
 *
 * Configuration errors (schema, unresolved links, cycles) are thrown before
 * any instance is contacted. Everything else ends up in the returned report.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunReport> {
  const now = options.now ?? (() => new Date())
  const startedAt = now()
  const mode = options.mode ?? 'apply'

  const registry = buildRegistry(options.document, options.plugins, {
    pluginFilter: options.pluginFilter
  })
  const run = new PipelineRun(options, registry.instances, registry.plugins)

  run.resolveGraph()
  if (await run.renderPreInit()) {
    run.resolveGraph()
  }

  if (mode === 'validate') {
    return run.finish(startedAt, now())
  }

  await run.initialize()
  await run.renderPostInit()
  await run.fetchSecrets()
  await run.fetchRemote()
  await run.computeDiffs()
  await run.applyUpdates()
  await run.deleteUnmanaged()

  return run.finish(startedAt, now())
}
