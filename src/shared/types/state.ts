import type { Action } from './action'
import type { CommitId, ErrorState, RepoStatus } from './repo'

export type AppMode =
  | 'normal'
  | 'diff'
  | 'command-palette'
  | 'squash-select'
  | 'rebase-select'
  | 'bookmark-input'
  | 'commit-input'
  | 'input'
  | 'filter-input'
  | 'context-menu'
  | 'help'
  | 'theme-selection'
  | 'evolog'
  | 'operation-log'
  | 'no-repo'
  | 'loading'

export type Panel = 'graph' | 'diff'

export type FilterSource = 'recent' | 'preset'

export type CommandDefinition = {
  name: string
  description: string
  action: Action
}

export type CommandPaletteState = {
  query: string
  matches: CommandDefinition[]
  selectedIndex: number
}

export type ContextMenuItem = {
  label: string
  action: Action
}

export type ContextMenuState = {
  commitId: CommitId
  x: number
  y: number
  items: ContextMenuItem[]
  selectedIndex: number
}

export type ScrollViewState = {
  lines: string[]
  scroll: number
}

/**
 * The single mutable aggregate owned by the event loop.
 * Only the reducer writes to it.
 */
export type AppState = {
  mode: AppMode
  shouldQuit: boolean

  // Repository
  repo: RepoStatus | null
  graphLimit: number
  hasMore: boolean
  isLoadingMore: boolean

  // Selection
  selectedIndex: number | null
  markedCommitIds: CommitId[]

  // Diff panel
  showDiffs: boolean
  focusedPanel: Panel
  currentDiff: string | null
  isLoadingDiff: boolean
  diffScroll: number
  selectedFileIndex: number | null
  diffCache: Map<CommitId, string>

  // Text entry shared by every input mode
  textInput: string
  inputTarget: CommitId | null

  // Revset filter
  revsetFilter: string | null
  recentFilters: string[]
  filterSource: FilterSource
  filterCursor: number | null

  // Overlays
  commandPalette: CommandPaletteState | null
  contextMenu: ContextMenuState | null
  evolog: ScrollViewState | null
  operationLog: ScrollViewState | null
  themeSelectionIndex: number | null
  themeName: string

  // Target selection
  squashSources: CommitId[]
  rebaseSources: CommitId[]

  // Status
  statusMessage: string | null
  statusTicksRemaining: number
  lastError: ErrorState | null
  activeTasks: string[]
  frameCount: number
  nowMs: number
}
