import type { Action, AppState } from '@shared/types'
import { diffLines, graphLength, selectedRow } from '../selectors'
import { handleSelection } from '../transitions'
import { handled, NOT_HANDLED, type UpdateResult } from './types'

export function updateNavigation(state: AppState, action: Action): UpdateResult {
  switch (action.kind) {
    case 'selectNext':
      return moveSelection(state, 1)

    case 'selectPrev':
      return moveSelection(state, -1)

    case 'selectIndex': {
      if (action.index < 0 || action.index >= graphLength(state)) return handled()
      state.selectedIndex = action.index
      return handled(handleSelection(state))
    }

    case 'selectFile': {
      const files = selectedRow(state)?.changedFiles ?? []
      if (action.index < 0 || action.index >= files.length) return handled()
      state.selectedFileIndex = action.index
      scrollToSelectedFile(state)
      return handled()
    }

    case 'selectFileByPath': {
      const files = selectedRow(state)?.changedFiles ?? []
      const index = files.findIndex((file) => file.path === action.path)
      if (index !== -1) {
        state.selectedFileIndex = index
        scrollToSelectedFile(state)
      }
      return handled()
    }

    case 'selectNextFile': {
      const count = selectedRow(state)?.changedFiles.length ?? 0
      if (count === 0) return handled()
      state.selectedFileIndex =
        state.selectedFileIndex === null ? 0 : Math.min(state.selectedFileIndex + 1, count - 1)
      scrollToSelectedFile(state)
      return handled()
    }

    case 'selectPrevFile': {
      const count = selectedRow(state)?.changedFiles.length ?? 0
      if (count === 0) return handled()
      state.selectedFileIndex =
        state.selectedFileIndex === null ? 0 : Math.max(state.selectedFileIndex - 1, 0)
      scrollToSelectedFile(state)
      return handled()
    }

    case 'scrollDiffUp':
      state.diffScroll = Math.max(0, state.diffScroll - action.amount)
      return handled()

    case 'scrollDiffDown': {
      const maxScroll = Math.max(0, diffLines(state).length - 1)
      state.diffScroll = Math.min(state.diffScroll + action.amount, maxScroll)
      return handled()
    }

    case 'nextHunk': {
      const lines = diffLines(state)
      const next = lines.findIndex((line, i) => i > state.diffScroll && line.startsWith('@@'))
      if (next !== -1) state.diffScroll = next
      return handled()
    }

    case 'prevHunk': {
      const lines = diffLines(state)
      for (let i = Math.min(state.diffScroll, lines.length) - 1; i >= 0; i--) {
        if (lines[i]?.startsWith('@@')) {
          state.diffScroll = i
          break
        }
      }
      return handled()
    }

    case 'toggleDiffs':
      state.showDiffs = !state.showDiffs
      if (!state.showDiffs && state.focusedPanel === 'diff') {
        state.focusedPanel = 'graph'
        if (state.mode === 'diff') state.mode = 'normal'
      }
      return handled()

    case 'focusDiff':
      state.showDiffs = true
      state.focusedPanel = 'diff'
      if (state.mode === 'normal') state.mode = 'diff'
      return handled()

    case 'focusGraph':
      state.focusedPanel = 'graph'
      if (state.mode === 'diff') state.mode = 'normal'
      return handled()

    case 'toggleMark': {
      const row = selectedRow(state)
      if (!row) return handled()
      state.markedCommitIds = state.markedCommitIds.includes(row.commitId)
        ? state.markedCommitIds.filter((id) => id !== row.commitId)
        : [...state.markedCommitIds, row.commitId]
      return handled()
    }

    case 'clearMarks':
      state.markedCommitIds = []
      return handled()

    default:
      return NOT_HANDLED
  }
}

function moveSelection(state: AppState, delta: number): UpdateResult {
  const length = graphLength(state)
  if (length === 0) return handled()

  const current = state.selectedIndex ?? 0
  state.selectedIndex = (((current + delta) % length) + length) % length
  return handled(handleSelection(state))
}

/** Scrolls the diff so the selected file's header is at the top. */
function scrollToSelectedFile(state: AppState): void {
  const file =
    state.selectedFileIndex === null
      ? undefined
      : selectedRow(state)?.changedFiles[state.selectedFileIndex]
  if (!file) return

  const line = diffLines(state).findIndex((text) => text.startsWith(`File: ${file.path}`))
  if (line !== -1) state.diffScroll = line
}
