import { describe, expect, it } from 'vitest'
import { conflictedFile, createLoadedState, createRow } from '../../__tests__/test-utils'
import { update } from '../reducer'

describe('updateVcs', () => {
  describe('target resolution', () => {
    it('uses the selected row when nothing is marked', () => {
      const state = createLoadedState()
      state.selectedIndex = 1

      expect(update(state, { kind: 'abandonRevision' })).toEqual({
        kind: 'abandon',
        commitIds: ['c1']
      })
    })

    it('uses the marked rows in graph order and clears them', () => {
      const state = createLoadedState()
      state.markedCommitIds = ['c0', 'c2']

      const command = update(state, { kind: 'squashRevision' })

      expect(command).toEqual({ kind: 'squash', commitIds: ['c2', 'c0'] })
      expect(state.markedCommitIds).toEqual([])
    })

    it('prefers an explicit commit id', () => {
      const state = createLoadedState()
      state.markedCommitIds = ['c1']

      expect(update(state, { kind: 'duplicateRevision', commitId: 'c0' })).toEqual({
        kind: 'duplicate',
        commitIds: ['c0']
      })
    })

    it('emits nothing without a selection', () => {
      const state = createLoadedState([])

      expect(update(state, { kind: 'editRevision' })).toBeUndefined()
      expect(update(state, { kind: 'parallelizeRevision' })).toBeUndefined()
    })

    it('edits and creates children of the selected row', () => {
      const state = createLoadedState()

      expect(update(state, { kind: 'editRevision' })).toEqual({ kind: 'edit', commitId: 'c2' })
      expect(update(state, { kind: 'newRevision', commitId: 'c1' })).toEqual({
        kind: 'newChild',
        commitId: 'c1'
      })
    })
  })

  describe('target selection modes', () => {
    it('squashes the stored sources into the confirmed row', () => {
      const state = createLoadedState()
      state.markedCommitIds = ['c2', 'c1']

      update(state, { kind: 'enterSquashMode' })
      expect(state.mode).toBe('squash-select')
      expect(state.squashSources).toEqual(['c2', 'c1'])

      update(state, { kind: 'selectIndex', index: 2 })
      const command = update(state, { kind: 'confirmTarget' })

      expect(command).toEqual({ kind: 'squash', commitIds: ['c2', 'c1'], into: 'c0' })
      expect(state.mode).toBe('normal')
      expect(state.squashSources).toEqual([])
    })

    it('rebases the stored sources onto the confirmed row', () => {
      const state = createLoadedState()

      update(state, { kind: 'rebaseRevisionIntent' })
      expect(state.mode).toBe('rebase-select')
      expect(state.rebaseSources).toEqual(['c2'])

      update(state, { kind: 'selectNext' })
      const command = update(state, { kind: 'submitInput' })

      expect(command).toEqual({ kind: 'rebase', commitIds: ['c2'], destination: 'c1' })
      expect(state.mode).toBe('normal')
      expect(state.rebaseSources).toEqual([])
    })
  })

  describe('describe and commit', () => {
    it('prefills the description and submits it for the remembered row', () => {
      const state = createLoadedState()

      update(state, { kind: 'describeRevisionIntent' })
      expect(state.mode).toBe('input')
      expect(state.textInput).toBe('Description of c2')

      update(state, { kind: 'selectNext' })
      state.textInput = 'Better words'
      const command = update(state, { kind: 'submitInput' })

      expect(command).toEqual({ kind: 'describeRevision', commitId: 'c2', message: 'Better words' })
      expect(state.mode).toBe('normal')
      expect(state.textInput).toBe('')
    })

    it('blocks committing while the working copy has conflicts', () => {
      const state = createLoadedState([
        createRow('wc', ['c1'], {
          isWorkingCopy: true,
          changedFiles: [conflictedFile('src/a.ts')]
        }),
        createRow('c1')
      ])

      const command = update(state, { kind: 'commitWorkingCopyIntent' })

      expect(command).toBeUndefined()
      expect(state.mode).toBe('normal')
      expect(state.lastError?.message).toContain('conflicts')
      expect(state.lastError?.severity).toBe('error')
    })

    it('opens the commit message prefilled with the working copy description', () => {
      const state = createLoadedState([
        createRow('wc', ['c1'], { isWorkingCopy: true, description: 'wip' }),
        createRow('c1')
      ])

      update(state, { kind: 'commitWorkingCopyIntent' })
      expect(state.mode).toBe('commit-input')
      expect(state.textInput).toBe('wip')

      update(state, { kind: 'inputInsert', text: ': done' })
      expect(update(state, { kind: 'submitInput' })).toEqual({
        kind: 'commit',
        message: 'wip: done'
      })
      expect(state.mode).toBe('normal')
    })

    it('still offers the commit message when a filter hides the working copy', () => {
      const state = createLoadedState([createRow('trunk1', ['trunk0']), createRow('trunk0')])
      state.revsetFilter = 'trunk()'
      if (state.repo) state.repo.workingCopyId = 'wc-hidden'

      update(state, { kind: 'commitWorkingCopyIntent' })

      expect(state.mode).toBe('commit-input')
      expect(state.textInput).toBe('')
      expect(state.lastError).toBeNull()

      update(state, { kind: 'inputInsert', text: 'feat: ship it' })
      expect(update(state, { kind: 'submitInput' })).toEqual({
        kind: 'commit',
        message: 'feat: ship it'
      })
    })
  })

  describe('conflict resolution', () => {
    function conflictedState() {
      return createLoadedState([
        createRow('c2', ['c1'], {
          changedFiles: [{ path: 'ok.ts', status: 'modified' }, conflictedFile('src/a.ts')]
        }),
        createRow('c1')
      ])
    }

    it('resolves a conflicted file of the selected revision', () => {
      const state = conflictedState()

      expect(update(state, { kind: 'resolveConflict', path: 'src/a.ts' })).toEqual({
        kind: 'resolveConflict',
        commitId: 'c2',
        path: 'src/a.ts'
      })
    })

    it('ignores files that are not conflicted', () => {
      const state = conflictedState()

      expect(update(state, { kind: 'resolveConflict', path: 'ok.ts' })).toBeUndefined()
      expect(update(state, { kind: 'resolveConflict', path: 'missing.ts' })).toBeUndefined()
    })

    it('reloads the graph once the merge tool has finished', () => {
      const state = conflictedState()
      update(state, { kind: 'operationStarted', message: 'Resolving src/a.ts...' })

      const command = update(state, {
        kind: 'operationCompleted',
        result: { ok: true, message: 'Resolved src/a.ts' },
        task: 'Resolving src/a.ts...'
      })

      expect(command).toMatchObject({ kind: 'loadRepo' })
      expect(state.statusMessage).toBe('Resolved src/a.ts')
      expect(state.activeTasks).toEqual([])
    })
  })

  describe('bookmarks', () => {
    it('sets a trimmed bookmark name on the selected row', () => {
      const state = createLoadedState()

      update(state, { kind: 'setBookmarkIntent' })
      expect(state.mode).toBe('bookmark-input')
      update(state, { kind: 'inputInsert', text: '  feature  ' })

      expect(update(state, { kind: 'submitInput' })).toEqual({
        kind: 'setBookmark',
        commitId: 'c2',
        name: 'feature'
      })
    })

    it('cancels an empty bookmark name', () => {
      const state = createLoadedState()
      update(state, { kind: 'setBookmarkIntent' })

      expect(update(state, { kind: 'submitInput' })).toBeUndefined()
      expect(state.mode).toBe('normal')
    })

    it('deletes the only bookmark directly', () => {
      const state = createLoadedState([createRow('c1', [], { bookmarks: ['main'] })])

      expect(update(state, { kind: 'deleteBookmarkIntent' })).toEqual({
        kind: 'deleteBookmark',
        name: 'main'
      })
    })

    it('offers a menu when the row has several bookmarks', () => {
      const state = createLoadedState([createRow('c1', [], { bookmarks: ['main', 'dev'] })])

      expect(update(state, { kind: 'deleteBookmarkIntent' })).toBeUndefined()
      expect(state.mode).toBe('context-menu')
      expect(state.contextMenu?.items.map((item) => item.label)).toEqual([
        'Delete bookmark: main',
        'Delete bookmark: dev'
      ])

      update(state, { kind: 'selectContextMenuNext' })
      expect(update(state, { kind: 'selectContextMenuAction' })).toEqual({
        kind: 'deleteBookmark',
        name: 'dev'
      })
      expect(state.mode).toBe('normal')
    })
  })

  describe('push', () => {
    it('pushes everything when the row has no bookmark', () => {
      const state = createLoadedState()
      expect(update(state, { kind: 'pushIntent' })).toEqual({ kind: 'push' })
    })

    it('pushes the single bookmark of the row', () => {
      const state = createLoadedState([createRow('c1', [], { bookmarks: ['main'] })])
      expect(update(state, { kind: 'pushIntent' })).toEqual({ kind: 'push', bookmark: 'main' })
    })

    it('lists each bookmark and a push-all entry', () => {
      const state = createLoadedState([createRow('c1', [], { bookmarks: ['main', 'dev'] })])

      update(state, { kind: 'pushIntent' })

      expect(state.contextMenu?.items).toEqual([
        { label: 'Push bookmark: main', action: { kind: 'push', bookmark: 'main' } },
        { label: 'Push bookmark: dev', action: { kind: 'push', bookmark: 'dev' } },
        { label: 'Push All', action: { kind: 'push' } }
      ])
    })
  })

  it('maps the remaining intents to their commands', () => {
    const state = createLoadedState()

    expect(update(state, { kind: 'snapshotWorkingCopy' })).toEqual({ kind: 'snapshot' })
    expect(update(state, { kind: 'absorb' })).toEqual({ kind: 'absorb' })
    expect(update(state, { kind: 'undo' })).toEqual({ kind: 'undo' })
    expect(update(state, { kind: 'redo' })).toEqual({ kind: 'redo' })
    expect(update(state, { kind: 'fetch' })).toEqual({ kind: 'fetch' })
    expect(update(state, { kind: 'initRepo' })).toEqual({ kind: 'initRepo' })
    expect(update(state, { kind: 'revertRevision' })).toEqual({
      kind: 'revert',
      commitIds: ['c2']
    })
    expect(update(state, { kind: 'evologRevision' })).toEqual({ kind: 'evolog', commitId: 'c2' })
    expect(update(state, { kind: 'showOperationLog' })).toEqual({ kind: 'operationLog' })
  })
})
