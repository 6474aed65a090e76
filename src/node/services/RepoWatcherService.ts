/**
 * RepoWatcherService - notices operations made outside the client
 *
 * Every jj command that changes the repository writes a new operation head,
 * so watching the op_heads directory catches commits, rebases and snapshots
 * made from another terminal without watching the whole working tree.
 */

import { log } from '@shared/logger'
import fs, { type FSWatcher } from 'fs'
import path from 'path'
import { WATCH_DEBOUNCE_MS } from '../shared/constants'

export interface RepoWatcherOptions {
  debounceMs?: number
}

export class RepoWatcher {
  private currentWatcher: FSWatcher | null = null
  private debounceTimer: NodeJS.Timeout | null = null
  private readonly debounceMs: number

  constructor(options: RepoWatcherOptions = {}) {
    this.debounceMs = options.debounceMs ?? WATCH_DEBOUNCE_MS
  }

  get isWatching(): boolean {
    return this.currentWatcher !== null
  }

  /**
   * Starts watching the workspace at `workspaceRoot`. Returns false when the
   * operation heads directory cannot be watched.
   */
  watch(workspaceRoot: string, onChange: () => void): boolean {
    this.stop()

    const target = resolveOpHeadsDir(workspaceRoot)
    try {
      const watcher = fs.watch(target, () => this.handleChange(onChange))
      watcher.on('error', (error) => {
        log.warn('[RepoWatcher] Watch failed, external changes will not be noticed:', error)
        this.stop()
      })
      this.currentWatcher = watcher
      log.debug(`[RepoWatcher] Watching ${target}`)
      return true
    } catch (error) {
      log.warn(`[RepoWatcher] Cannot watch ${target}:`, error)
      return false
    }
  }

  stop(): void {
    if (this.currentWatcher) {
      this.currentWatcher.close()
      this.currentWatcher = null
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer)
      this.debounceTimer = null
    }
  }

  private handleChange(onChange: () => void): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer)
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null
      onChange()
    }, this.debounceMs)
  }
}

/**
 * Directory holding the operation heads. In secondary workspaces `.jj/repo`
 * is a file containing the path of the shared repository.
 */
export function resolveOpHeadsDir(workspaceRoot: string): string {
  const repoPointer = path.join(workspaceRoot, '.jj', 'repo')
  let repoDir = repoPointer
  try {
    if (fs.statSync(repoPointer).isFile()) {
      const target = fs.readFileSync(repoPointer, 'utf8').trim()
      repoDir = path.resolve(path.join(workspaceRoot, '.jj'), target)
    }
  } catch (error) {
    log.debug(`[RepoWatcher] No repository pointer at ${repoPointer}:`, error)
  }
  return path.join(repoDir, 'op_heads', 'heads')
}
