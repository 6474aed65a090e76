import type { Action, AppState, CommitId, ContextMenuItem } from '@shared/types'
import { restingMode, selectedRow, targetCommitIds, workingCopyRow } from '../selectors'
import { clearOverlays, setStatus } from '../transitions'
import { handled, NOT_HANDLED, type UpdateResult } from './types'

export const CONFLICT_COMMIT_MESSAGE = 'Cannot commit: there are unresolved merge conflicts.'
export const CONFLICT_COMMIT_SUGGESTION = "Resolve conflicts with 'jj resolve' before committing."

export function updateVcs(state: AppState, action: Action): UpdateResult {
  switch (action.kind) {
    case 'snapshotWorkingCopy':
      return handled({ kind: 'snapshot' })

    case 'editRevision': {
      const commitId = action.commitId ?? selectedRow(state)?.commitId
      return commitId ? handled({ kind: 'edit', commitId }) : handled()
    }

    case 'newRevision': {
      const commitId = action.commitId ?? selectedRow(state)?.commitId
      return commitId ? handled({ kind: 'newChild', commitId }) : handled()
    }

    case 'abandonRevision': {
      const commitIds = takeTargets(state, action.commitId)
      return commitIds.length > 0 ? handled({ kind: 'abandon', commitIds }) : handled()
    }

    case 'squashRevision': {
      const commitIds = takeTargets(state, action.commitId)
      return commitIds.length > 0 ? handled({ kind: 'squash', commitIds }) : handled()
    }

    case 'duplicateRevision': {
      const commitIds = takeTargets(state, action.commitId)
      return commitIds.length > 0 ? handled({ kind: 'duplicate', commitIds }) : handled()
    }

    case 'parallelizeRevision': {
      const commitIds = takeTargets(state)
      return commitIds.length > 0 ? handled({ kind: 'parallelize', commitIds }) : handled()
    }

    case 'revertRevision': {
      const commitIds = takeTargets(state, action.commitId)
      return commitIds.length > 0 ? handled({ kind: 'revert', commitIds }) : handled()
    }

    case 'absorb':
      return handled({ kind: 'absorb' })

    case 'enterSquashMode': {
      const sources = takeTargets(state)
      if (sources.length === 0) return handled()
      state.squashSources = sources
      state.mode = 'squash-select'
      setStatus(state, 'Select the revision to squash into')
      return handled()
    }

    case 'rebaseRevisionIntent': {
      const sources = takeTargets(state)
      if (sources.length === 0) return handled()
      state.rebaseSources = sources
      state.mode = 'rebase-select'
      setStatus(state, 'Select the destination revision')
      return handled()
    }

    case 'confirmTarget': {
      const destination = selectedRow(state)?.commitId
      if (!destination) return handled()

      if (state.mode === 'squash-select') {
        const commitIds = state.squashSources
        state.squashSources = []
        state.mode = restingMode(state)
        return handled({ kind: 'squash', commitIds, into: destination })
      }
      if (state.mode === 'rebase-select') {
        return updateVcs(state, {
          kind: 'rebaseRevision',
          sources: state.rebaseSources,
          destination
        })
      }
      return handled()
    }

    case 'rebaseRevision':
      state.rebaseSources = []
      if (state.mode === 'rebase-select') state.mode = restingMode(state)
      if (action.sources.length === 0) return handled()
      return handled({
        kind: 'rebase',
        commitIds: action.sources,
        destination: action.destination
      })

    case 'describeRevisionIntent': {
      const row = selectedRow(state)
      if (!row) return handled()
      state.mode = 'input'
      state.textInput = row.description
      state.inputTarget = row.commitId
      return handled()
    }

    case 'describeRevision':
      leaveInput(state)
      return handled({
        kind: 'describeRevision',
        commitId: action.commitId,
        message: action.message
      })

    case 'commitWorkingCopyIntent': {
      const repo = state.repo
      if (!repo) return handled()

      // A filter can hide `@`; the conflict check then has nothing to inspect.
      const row = workingCopyRow(state)
      if (row?.changedFiles.some((file) => file.status === 'conflicted')) {
        state.lastError = {
          message: CONFLICT_COMMIT_MESSAGE,
          severity: 'error',
          suggestions: [CONFLICT_COMMIT_SUGGESTION],
          timestampMs: state.nowMs
        }
        return handled()
      }

      state.mode = 'commit-input'
      state.textInput = row?.description ?? ''
      state.inputTarget = row?.commitId ?? repo.workingCopyId
      return handled()
    }

    case 'commitWorkingCopy':
      leaveInput(state)
      return handled({ kind: 'commit', message: action.message })

    case 'setBookmarkIntent': {
      const row = selectedRow(state)
      if (!row) return handled()
      state.mode = 'bookmark-input'
      state.textInput = ''
      state.inputTarget = row.commitId
      return handled()
    }

    case 'setBookmark': {
      leaveInput(state)
      const name = action.name.trim()
      if (!name) return handled()
      return handled({ kind: 'setBookmark', commitId: action.commitId, name })
    }

    case 'deleteBookmarkIntent': {
      const row = selectedRow(state)
      if (!row) return handled()
      const [only, ...rest] = row.bookmarks
      if (only === undefined) {
        setStatus(state, 'No bookmark on the selected revision')
        return handled()
      }
      if (rest.length === 0) {
        return handled({ kind: 'deleteBookmark', name: only })
      }
      openMenu(
        state,
        row.commitId,
        row.bookmarks.map((name) => ({
          label: `Delete bookmark: ${name}`,
          action: { kind: 'deleteBookmark', name }
        }))
      )
      return handled()
    }

    case 'deleteBookmark':
      return handled({ kind: 'deleteBookmark', name: action.name })

    case 'undo':
      return handled({ kind: 'undo' })

    case 'redo':
      return handled({ kind: 'redo' })

    case 'fetch':
      return handled({ kind: 'fetch' })

    case 'pushIntent': {
      const row = selectedRow(state)
      const bookmarks = row?.bookmarks ?? []
      const [only, ...rest] = bookmarks
      if (!row || only === undefined) {
        return handled({ kind: 'push' })
      }
      if (rest.length === 0) {
        return handled({ kind: 'push', bookmark: only })
      }
      openMenu(state, row.commitId, [
        ...bookmarks.map(
          (bookmark): ContextMenuItem => ({
            label: `Push bookmark: ${bookmark}`,
            action: { kind: 'push', bookmark }
          })
        ),
        { label: 'Push All', action: { kind: 'push' } }
      ])
      return handled()
    }

    case 'push':
      return handled(
        action.bookmark === undefined
          ? { kind: 'push' }
          : { kind: 'push', bookmark: action.bookmark }
      )

    case 'initRepo':
      return handled({ kind: 'initRepo' })

    case 'resolveConflict': {
      const row = selectedRow(state)
      const file = row?.changedFiles.find((change) => change.path === action.path)
      if (!row || file?.status !== 'conflicted') return handled()
      return handled({ kind: 'resolveConflict', commitId: row.commitId, path: action.path })
    }

    case 'evologRevision': {
      const commitId = action.commitId ?? selectedRow(state)?.commitId
      return commitId ? handled({ kind: 'evolog', commitId }) : handled()
    }

    case 'showOperationLog':
      return handled({ kind: 'operationLog' })

    default:
      return NOT_HANDLED
  }
}

/**
 * Resolves the commits an intent applies to and clears the marks, which are
 * dropped as soon as the command leaves the reducer.
 */
function takeTargets(state: AppState, explicit?: CommitId): CommitId[] {
  const targets = explicit ? [explicit] : targetCommitIds(state)
  state.markedCommitIds = []
  return targets
}

function leaveInput(state: AppState): void {
  if (
    state.mode === 'input' ||
    state.mode === 'commit-input' ||
    state.mode === 'bookmark-input'
  ) {
    state.mode = restingMode(state)
  }
  state.textInput = ''
  state.inputTarget = null
}

function openMenu(state: AppState, commitId: CommitId, items: ContextMenuItem[]): void {
  clearOverlays(state)
  state.contextMenu = { commitId, x: 0, y: 0, items, selectedIndex: 0 }
  state.mode = 'context-menu'
}
