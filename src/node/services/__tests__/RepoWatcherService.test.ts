import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { RepoWatcher, resolveOpHeadsDir } from '../RepoWatcherService'

describe('resolveOpHeadsDir', () => {
  let root: string

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'treeline-watch-'))
    await fs.promises.mkdir(path.join(root, '.jj'))
  })

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true })
  })

  it('uses the repository inside the workspace', async () => {
    await fs.promises.mkdir(path.join(root, '.jj', 'repo'))

    expect(resolveOpHeadsDir(root)).toBe(path.join(root, '.jj', 'repo', 'op_heads', 'heads'))
  })

  it('follows the pointer file of a secondary workspace', async () => {
    await fs.promises.writeFile(path.join(root, '.jj', 'repo'), '../../main/.jj/repo\n')

    expect(resolveOpHeadsDir(root)).toBe(
      path.join(path.dirname(root), 'main', '.jj', 'repo', 'op_heads', 'heads')
    )
  })
})

describe('RepoWatcher', () => {
  let root: string
  let heads: string
  let watcher: RepoWatcher

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'treeline-watch-'))
    heads = path.join(root, '.jj', 'repo', 'op_heads', 'heads')
    await fs.promises.mkdir(heads, { recursive: true })
    watcher = new RepoWatcher({ debounceMs: 20 })
  })

  afterEach(async () => {
    watcher.stop()
    await fs.promises.rm(root, { recursive: true, force: true })
  })

  it('reports a new operation head', async () => {
    const onChange = vi.fn()

    expect(watcher.watch(root, onChange)).toBe(true)
    await fs.promises.writeFile(path.join(heads, 'op-2'), '')

    await vi.waitFor(() => expect(onChange).toHaveBeenCalled(), { timeout: 2000 })
  })

  it('returns false when there is nothing to watch', () => {
    expect(watcher.watch(path.join(root, 'missing'), vi.fn())).toBe(false)
    expect(watcher.isWatching).toBe(false)
  })

  it('stays quiet after stop', async () => {
    const onChange = vi.fn()
    watcher.watch(root, onChange)
    watcher.stop()

    await fs.promises.writeFile(path.join(heads, 'op-3'), '')
    await new Promise((resolve) => setTimeout(resolve, 100))

    expect(onChange).not.toHaveBeenCalled()
    expect(watcher.isWatching).toBe(false)
  })
})
