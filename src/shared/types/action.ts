import type { CommitId, GraphRow, OperationResult, RepoStatus } from './repo'

/**
 * Everything that can happen to the application: user intents, timer ticks
 * and results coming back from the command executor.
 */
export type Action =
  // ==========================================================================
  // System
  // ==========================================================================
  | { kind: 'tick'; nowMs: number }
  | { kind: 'quit' }
  | { kind: 'loadMoreGraph' }
  | { kind: 'externalChangeDetected' }

  // ==========================================================================
  // Navigation
  // ==========================================================================
  | { kind: 'selectNext' }
  | { kind: 'selectPrev' }
  | { kind: 'selectIndex'; index: number }
  | { kind: 'selectFile'; index: number }
  | { kind: 'selectFileByPath'; path: string }
  | { kind: 'selectNextFile' }
  | { kind: 'selectPrevFile' }
  | { kind: 'scrollDiffUp'; amount: number }
  | { kind: 'scrollDiffDown'; amount: number }
  | { kind: 'nextHunk' }
  | { kind: 'prevHunk' }
  | { kind: 'toggleDiffs' }
  | { kind: 'focusDiff' }
  | { kind: 'focusGraph' }
  | { kind: 'toggleMark' }
  | { kind: 'clearMarks' }

  // ==========================================================================
  // Modes and overlays
  // ==========================================================================
  | { kind: 'enterCommandMode' }
  | { kind: 'cancelMode' }
  | { kind: 'dismissError' }
  | { kind: 'toggleHelp' }
  | { kind: 'enterThemeSelection' }
  | { kind: 'selectThemeNext' }
  | { kind: 'selectThemePrev' }
  | { kind: 'switchTheme'; theme: string }
  | { kind: 'commandPaletteNext' }
  | { kind: 'commandPalettePrev' }
  | { kind: 'commandPaletteSelect' }
  | { kind: 'openContextMenu'; commitId: CommitId; x: number; y: number }
  | { kind: 'selectContextMenuNext' }
  | { kind: 'selectContextMenuPrev' }
  | { kind: 'selectContextMenuAction' }
  | { kind: 'closeContextMenu' }
  | { kind: 'inputInsert'; text: string }
  | { kind: 'inputBackspace' }
  | { kind: 'submitInput' }
  | { kind: 'confirmTarget' }
  | { kind: 'closeEvolog' }
  | { kind: 'scrollEvologUp'; amount: number }
  | { kind: 'scrollEvologDown'; amount: number }
  | { kind: 'closeOperationLog' }
  | { kind: 'scrollOperationLogUp'; amount: number }
  | { kind: 'scrollOperationLogDown'; amount: number }

  // ==========================================================================
  // Revset filter
  // ==========================================================================
  | { kind: 'enterFilterMode' }
  | { kind: 'applyFilter'; filter: string }
  | { kind: 'clearFilter' }
  | { kind: 'quickFilter'; revset: string }
  | { kind: 'filterNext' }
  | { kind: 'filterPrev' }
  | { kind: 'toggleFilterSource' }

  // ==========================================================================
  // Repository intents
  // ==========================================================================
  | { kind: 'snapshotWorkingCopy' }
  | { kind: 'editRevision'; commitId?: CommitId }
  | { kind: 'newRevision'; commitId?: CommitId }
  | { kind: 'abandonRevision'; commitId?: CommitId }
  | { kind: 'squashRevision'; commitId?: CommitId }
  | { kind: 'enterSquashMode' }
  | { kind: 'duplicateRevision'; commitId?: CommitId }
  | { kind: 'parallelizeRevision' }
  | { kind: 'revertRevision'; commitId?: CommitId }
  | { kind: 'absorb' }
  | { kind: 'rebaseRevisionIntent' }
  | { kind: 'rebaseRevision'; sources: CommitId[]; destination: CommitId }
  | { kind: 'describeRevisionIntent' }
  | { kind: 'describeRevision'; commitId: CommitId; message: string }
  | { kind: 'commitWorkingCopyIntent' }
  | { kind: 'commitWorkingCopy'; message: string }
  | { kind: 'setBookmarkIntent' }
  | { kind: 'setBookmark'; commitId: CommitId; name: string }
  | { kind: 'deleteBookmarkIntent' }
  | { kind: 'deleteBookmark'; name: string }
  | { kind: 'undo' }
  | { kind: 'redo' }
  | { kind: 'fetch' }
  | { kind: 'pushIntent' }
  | { kind: 'push'; bookmark?: string }
  | { kind: 'initRepo' }
  | { kind: 'resolveConflict'; path: string }
  | { kind: 'evologRevision'; commitId?: CommitId }
  | { kind: 'showOperationLog' }

  // ==========================================================================
  // Async results
  // ==========================================================================
  | { kind: 'repoLoaded'; repo: RepoStatus }
  | { kind: 'repoReloadedBackground'; repo: RepoStatus }
  | { kind: 'graphBatchLoaded'; rows: GraphRow[] }
  | { kind: 'diffLoaded'; commitId: CommitId; diff: string; failed: boolean }
  | { kind: 'operationStarted'; message: string }
  | { kind: 'operationCompleted'; result: OperationResult; task?: string }
  | { kind: 'errorOccurred'; message: string }
  | { kind: 'openEvolog'; content: string; task?: string }
  | { kind: 'openOperationLog'; content: string; task?: string }

export type ActionKind = Action['kind']

/** Narrows the action union to a single member by its kind. */
export type ActionOf<K extends ActionKind> = Extract<Action, { kind: K }>
