/**
 * Installed plugins, enumerated once at startup
 */

import { createDummyPlugin } from './dummy/index.js'
import type { AnyPlugin } from './types.js'

export function loadInstalledPlugins(): AnyPlugin[] {
  return [
    createDummyPlugin()
  ]
}

export { createDummyPlugin }
export type { AnyPlugin, Plugin, Resource, Instance, InstanceConfig, InstanceView } from './types.js'
