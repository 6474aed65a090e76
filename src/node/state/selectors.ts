import type { AppMode, AppState, CommitId, GraphRow } from '@shared/types'

export function selectedRow(state: AppState): GraphRow | undefined {
  if (state.selectedIndex === null) return undefined
  return state.repo?.graph[state.selectedIndex]
}

export function workingCopyRow(state: AppState): GraphRow | undefined {
  const repo = state.repo
  if (!repo) return undefined
  return repo.graph.find((row) => row.commitId === repo.workingCopyId || row.isWorkingCopy)
}

export function graphLength(state: AppState): number {
  return state.repo?.graph.length ?? 0
}

/**
 * Commits a mutating intent applies to: the marked rows in graph order when
 * any are marked, otherwise the selected row.
 */
export function targetCommitIds(state: AppState): CommitId[] {
  if (state.markedCommitIds.length > 0) {
    const graph = state.repo?.graph ?? []
    const inGraph = graph
      .map((row) => row.commitId)
      .filter((id) => state.markedCommitIds.includes(id))
    const missing = state.markedCommitIds.filter((id) => !inGraph.includes(id))
    return [...inGraph, ...missing]
  }
  const row = selectedRow(state)
  return row ? [row.commitId] : []
}

/** Mode to return to once an overlay or operation finishes. */
export function restingMode(state: AppState): AppMode {
  if (!state.repo) return 'no-repo'
  return state.focusedPanel === 'diff' ? 'diff' : 'normal'
}

export function isMarked(state: AppState, commitId: CommitId): boolean {
  return state.markedCommitIds.includes(commitId)
}

export function isBusy(state: AppState): boolean {
  return state.activeTasks.length > 0
}

/** Lines of the rendered diff, or an empty list when none is shown. */
export function diffLines(state: AppState): string[] {
  return state.currentDiff === null ? [] : state.currentDiff.split('\n')
}
