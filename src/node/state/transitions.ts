/**
 * State transitions shared by several action families.
 */

import type { AppState, Command } from '@shared/types'
import { describeError } from '../domain/ErrorAdvisor'
import { STATUS_MESSAGE_TICKS } from '../shared/constants'
import { selectedRow } from './selectors'

/**
 * Refreshes the diff panel for the selected row. Reuses the cached diff when
 * there is one; otherwise asks the runtime to load it.
 */
export function handleSelection(state: AppState): Command | undefined {
  state.diffScroll = 0
  state.selectedFileIndex = null

  const row = selectedRow(state)
  if (!row) {
    state.currentDiff = null
    state.isLoadingDiff = false
    return undefined
  }

  const cached = state.diffCache.get(row.commitId)
  if (cached !== undefined) {
    state.currentDiff = cached
    state.isLoadingDiff = false
    return undefined
  }

  state.currentDiff = null
  state.isLoadingDiff = true
  return { kind: 'loadDiff', commitId: row.commitId }
}

export function reloadCommand(state: AppState): Command {
  return state.revsetFilter
    ? { kind: 'loadRepo', limit: state.graphLimit, revset: state.revsetFilter }
    : { kind: 'loadRepo', limit: state.graphLimit }
}

export function setStatus(state: AppState, message: string): void {
  state.statusMessage = message
  state.statusTicksRemaining = STATUS_MESSAGE_TICKS
}

export function setError(state: AppState, message: string): void {
  const advice = describeError(message)
  state.lastError = {
    message,
    severity: advice.severity,
    suggestions: advice.suggestions,
    timestampMs: state.nowMs
  }
}

/** Drops every modal sub-state. */
export function clearOverlays(state: AppState): void {
  state.textInput = ''
  state.inputTarget = null
  state.filterCursor = null
  state.commandPalette = null
  state.contextMenu = null
  state.evolog = null
  state.operationLog = null
  state.themeSelectionIndex = null
  state.squashSources = []
  state.rebaseSources = []
}
