/**
 * Configuration file watching
 */

import chokidar from 'chokidar'
import type { FSWatcher } from 'chokidar'

export interface ConfigWatcher {
  readonly paths: readonly string[]
  close(): Promise<void>
}

export type WatcherFactory = (
  paths: readonly string[],
  onChange: (path: string) => void,
  onError: (error: unknown) => void
) => ConfigWatcher

/**
 * Watch files with chokidar, reporting adds, changes and removals.
 * Watch failures (EACCES, ENOSPC) go to `onError`; the watcher stays open.
 */
export const createFileWatcher: WatcherFactory = (paths, onChange, onError) => {
  const watcher: FSWatcher = chokidar.watch([...paths], {
    ignoreInitial: true,
    persistent: true
  })

  watcher.on('all', (event, path) => {
    if (event === 'add' || event === 'change' || event === 'unlink') {
      onChange(path)
    }
  })
  watcher.on('error', onError)

  return {
    paths: [...paths],
    close: () => watcher.close()
  }
}
