/**
 * Reducer
 *
 * Applies one action to the application state and returns at most one
 * command for the runtime. The action families (navigation, vcs, filter, ui)
 * are tried in turn; lifecycle actions and async results are handled here.
 *
 * No I/O happens here. The only way out is the returned command.
 */

import type { Action, AppState, Command, RepoStatus } from '@shared/types'
import { THEME_NAMES } from '@shared/theme'
import { isRevsetError } from '../domain/ErrorAdvisor'
import { calculateGraphLayout } from '../domain/GraphLayout'
import { LOAD_MORE_THRESHOLD, SYNC_TASK_LABEL } from '../shared/constants'
import { updateFilter } from './features/filter'
import { updateNavigation } from './features/navigation'
import type { FeatureReducer } from './features/types'
import { updateUi } from './features/ui'
import { updateVcs } from './features/vcs'
import { restingMode, selectedRow } from './selectors'
import { handleSelection, reloadCommand, setError, setStatus } from './transitions'

const FEATURES: FeatureReducer[] = [updateNavigation, updateVcs, updateFilter, updateUi]

export function update(state: AppState, action: Action): Command | undefined {
  for (const feature of FEATURES) {
    const result = feature(state, action)
    if (result.handled) return result.command
  }
  return updateCore(state, action)
}

function updateCore(state: AppState, action: Action): Command | undefined {
  switch (action.kind) {
    // ==========================================================================
    // Lifecycle
    // ==========================================================================

    case 'quit':
      state.shouldQuit = true
      return undefined

    case 'tick':
      return tick(state, action.nowMs)

    case 'loadMoreGraph': {
      const repo = state.repo
      if (!repo || state.isLoadingMore) return undefined

      const loaded = new Set(repo.graph.map((row) => row.commitId))
      const heads = [
        ...new Set(repo.graph.flatMap((row) => row.parents).filter((id) => !loaded.has(id)))
      ]
      if (heads.length === 0) {
        state.hasMore = false
        return undefined
      }
      state.isLoadingMore = true
      return { kind: 'loadRepo', limit: state.graphLimit, heads }
    }

    case 'externalChangeDetected': {
      if (!state.repo) return undefined
      if (!state.activeTasks.includes(SYNC_TASK_LABEL)) {
        state.activeTasks.push(SYNC_TASK_LABEL)
      }
      return state.revsetFilter
        ? { kind: 'loadRepoBackground', limit: state.graphLimit, revset: state.revsetFilter }
        : { kind: 'loadRepoBackground', limit: state.graphLimit }
    }

    // ==========================================================================
    // Re-entrant selections
    // ==========================================================================

    case 'commandPaletteSelect': {
      if (state.mode === 'theme-selection') {
        const theme = THEME_NAMES[state.themeSelectionIndex ?? 0]
        return theme ? update(state, { kind: 'switchTheme', theme }) : undefined
      }
      const palette = state.commandPalette
      const chosen = palette?.matches[palette.selectedIndex]
      state.commandPalette = null
      if (state.mode === 'command-palette') state.mode = restingMode(state)
      return chosen ? update(state, chosen.action) : undefined
    }

    case 'selectContextMenuAction': {
      const menu = state.contextMenu
      const item = menu?.items[menu.selectedIndex]
      state.contextMenu = null
      if (state.mode === 'context-menu') state.mode = restingMode(state)
      return item ? update(state, item.action) : undefined
    }

    case 'submitInput':
      return submitInput(state)

    // ==========================================================================
    // Async results
    // ==========================================================================

    case 'repoLoaded':
      return applyRepo(state, action.repo)

    case 'repoReloadedBackground': {
      const previous = selectedRow(state)?.commitId
      installRepo(state, action.repo)

      const index = action.repo.graph.findIndex((row) => row.commitId === previous)
      state.selectedIndex = index !== -1 ? index : action.repo.graph.length > 0 ? 0 : null
      return selectedRow(state)?.commitId === previous ? undefined : handleSelection(state)
    }

    case 'graphBatchLoaded': {
      state.isLoadingMore = false
      const repo = state.repo
      if (!repo) return undefined

      const seen = new Set(repo.graph.map((row) => row.commitId))
      const fresh = action.rows.filter((row) => {
        if (seen.has(row.commitId)) return false
        seen.add(row.commitId)
        return true
      })
      state.hasMore = fresh.length > 0
      if (fresh.length > 0) {
        repo.graph.push(...fresh)
        calculateGraphLayout(repo.graph)
      }
      return undefined
    }

    case 'diffLoaded': {
      if (!action.failed && !state.diffCache.has(action.commitId)) {
        state.diffCache.set(action.commitId, action.diff)
      }
      if (selectedRow(state)?.commitId === action.commitId) {
        state.currentDiff = action.diff
        state.isLoadingDiff = false
      }
      return undefined
    }

    case 'operationStarted':
      state.activeTasks.push(action.message)
      setStatus(state, action.message)
      state.mode = 'loading'
      return undefined

    case 'operationCompleted': {
      removeTask(state, action.task)
      if (state.mode === 'loading') state.mode = restingMode(state)

      if (action.result.ok) {
        setStatus(state, action.result.message)
        return reloadCommand(state)
      }
      setError(state, action.result.error)
      return state.repo ? reloadCommand(state) : undefined
    }

    case 'errorOccurred': {
      state.isLoadingMore = false
      if (action.message.startsWith('Background sync failed')) {
        state.activeTasks = state.activeTasks.filter((task) => task !== SYNC_TASK_LABEL)
      }
      setError(state, action.message)
      if (state.mode === 'loading') state.mode = restingMode(state)

      if (state.revsetFilter && isRevsetError(action.message)) {
        state.revsetFilter = null
        return reloadCommand(state)
      }
      return undefined
    }

    case 'openEvolog':
      removeTask(state, action.task)
      state.evolog = { lines: action.content.split('\n'), scroll: 0 }
      state.mode = 'evolog'
      return undefined

    case 'openOperationLog':
      removeTask(state, action.task)
      state.operationLog = { lines: action.content.split('\n'), scroll: 0 }
      state.mode = 'operation-log'
      return undefined

    default:
      return undefined
  }
}

function tick(state: AppState, nowMs: number): Command | undefined {
  state.frameCount++
  state.nowMs = nowMs

  if (state.statusMessage !== null) {
    state.statusTicksRemaining = Math.max(0, state.statusTicksRemaining - 1)
    if (state.statusTicksRemaining === 0) state.statusMessage = null
  }

  const length = state.repo?.graph.length ?? 0
  const index = state.selectedIndex
  if (
    index !== null &&
    index + LOAD_MORE_THRESHOLD >= length &&
    state.hasMore &&
    !state.isLoadingMore
  ) {
    return update(state, { kind: 'loadMoreGraph' })
  }
  return undefined
}

function submitInput(state: AppState): Command | undefined {
  const text = state.textInput
  const target = state.inputTarget

  switch (state.mode) {
    case 'input':
      return target
        ? update(state, { kind: 'describeRevision', commitId: target, message: text })
        : update(state, { kind: 'cancelMode' })
    case 'commit-input':
      return update(state, { kind: 'commitWorkingCopy', message: text })
    case 'bookmark-input':
      return target
        ? update(state, { kind: 'setBookmark', commitId: target, name: text })
        : update(state, { kind: 'cancelMode' })
    case 'filter-input':
      return update(state, { kind: 'applyFilter', filter: text })
    case 'command-palette':
    case 'theme-selection':
      return update(state, { kind: 'commandPaletteSelect' })
    case 'context-menu':
      return update(state, { kind: 'selectContextMenuAction' })
    case 'squash-select':
    case 'rebase-select':
      return update(state, { kind: 'confirmTarget' })
    default:
      return undefined
  }
}

/** Lays out and stores a freshly loaded repository, keeping marks that still exist. */
function installRepo(state: AppState, repo: RepoStatus): void {
  calculateGraphLayout(repo.graph)
  state.repo = repo
  state.isLoadingMore = false
  state.hasMore = !state.revsetFilter && repo.graph.length >= state.graphLimit
  state.activeTasks = state.activeTasks.filter((task) => !task.includes('Syncing'))

  const present = new Set(repo.graph.map((row) => row.commitId))
  state.markedCommitIds = state.markedCommitIds.filter((id) => present.has(id))

  if (state.mode === 'loading' || state.mode === 'no-repo') {
    state.mode = restingMode(state)
  }
}

function applyRepo(state: AppState, repo: RepoStatus): Command | undefined {
  installRepo(state, repo)

  const length = repo.graph.length
  if (length === 0) {
    state.selectedIndex = null
  } else {
    state.selectedIndex =
      state.selectedIndex === null ? 0 : Math.min(state.selectedIndex, length - 1)
  }
  return handleSelection(state)
}

/** Retires the task with this label, or the oldest foreground task. */
function removeTask(state: AppState, task: string | undefined): void {
  const index =
    task !== undefined
      ? state.activeTasks.indexOf(task)
      : state.activeTasks.findIndex((label) => label !== SYNC_TASK_LABEL)
  if (index !== -1) state.activeTasks.splice(index, 1)
}
