/**
 * Dependency Graph Resolver
 *
 * Orders instances so that every link target comes before the instance that
 * references it. Deletion walks the reverse order.
 */

import { DependencyCycleError, UnresolvedInstanceLinkError } from '../lib/errors.js'
import {
  compareInstanceRefs,
  instanceKey,
  sameInstance,
  type InstanceLink,
  type InstanceRef
} from '../types.js'

export interface DependencyGraph {
  /** Targets before dependents */
  order: InstanceRef[]
  /** Dependents before targets */
  reverseOrder: InstanceRef[]
  /**
   * Instances grouped by dependency depth. Level 0 has no dependencies;
   * every instance in level n depends only on instances in lower levels.
   */
  levels: InstanceRef[][]
  /** Direct link targets of an instance */
  dependenciesOf(ref: InstanceRef): InstanceRef[]
}

export interface ResolveOptions {
  /** Every installed plugin, active or not */
  installedPlugins: readonly string[]
}

/**
 * Check that every link target is an active instance
 */
export function validateLinks(
  instances: readonly InstanceRef[],
  links: readonly InstanceLink[],
  options: ResolveOptions
): void {
  const known = new Set(instances.map(instanceKey))
  const activePlugins = new Set(instances.map(ref => ref.plugin))

  for (const { source, target } of links) {
    if (known.has(instanceKey(target))) continue

    let reason: string
    if (!options.installedPlugins.includes(target.plugin)) {
      reason = `plugin '${target.plugin}' is not installed`
    } else if (!activePlugins.has(target.plugin)) {
      reason = `plugin '${target.plugin}' is not configured or not enabled`
    } else {
      reason = `instance '${target.instance}' is not defined for plugin '${target.plugin}'`
    }
    throw new UnresolvedInstanceLinkError(source, target, reason)
  }
}

/**
 * Validate links and produce a deterministic topological order.
 *
 * Depth-first, visiting instances and their link targets in lexicographic
 * (plugin, instance) order. A link back onto the current path is a cycle.
 */
export function resolveDependencies(
  instances: readonly InstanceRef[],
  links: readonly InstanceLink[],
  options: ResolveOptions
): DependencyGraph {
  validateLinks(instances, links, options)

  const nodes = [...instances].sort(compareInstanceRefs)
  const edges = new Map<string, InstanceRef[]>()
  for (const ref of nodes) {
    edges.set(instanceKey(ref), [])
  }
  for (const { source, target } of links) {
    const targets = edges.get(instanceKey(source))
    if (targets && !targets.some(t => sameInstance(t, target))) {
      targets.push(target)
    }
  }
  for (const targets of edges.values()) {
    targets.sort(compareInstanceRefs)
  }

  const order: InstanceRef[] = []
  const done = new Set<string>()
  const path: InstanceRef[] = []
  const onPath = new Set<string>()

  const visit = (ref: InstanceRef): void => {
    const key = instanceKey(ref)
    if (done.has(key)) return
    if (onPath.has(key)) {
      const start = path.findIndex(p => instanceKey(p) === key)
      throw new DependencyCycleError([...path.slice(start), ref])
    }

    path.push(ref)
    onPath.add(key)
    for (const target of edges.get(key) ?? []) {
      visit(target)
    }
    path.pop()
    onPath.delete(key)

    done.add(key)
    order.push(ref)
  }

  for (const ref of nodes) {
    visit(ref)
  }

  const depth = new Map<string, number>()
  for (const ref of order) {
    const targets = edges.get(instanceKey(ref)) ?? []
    const level = targets.reduce((max, t) => Math.max(max, (depth.get(instanceKey(t)) ?? 0) + 1), 0)
    depth.set(instanceKey(ref), level)
  }

  const levels: InstanceRef[][] = []
  for (const ref of order) {
    const level = depth.get(instanceKey(ref)) ?? 0
    while (levels.length <= level) levels.push([])
    levels[level].push(ref)
  }

  return {
    order,
    reverseOrder: [...order].reverse(),
    levels,
    dependenciesOf(ref: InstanceRef): InstanceRef[] {
      return [...(edges.get(instanceKey(ref)) ?? [])]
    }
  }
}
