import type { AppState, CommitId } from '@shared/types'
import { DEFAULT_THEME } from '@shared/theme'
import { DEFAULT_GRAPH_LIMIT } from '../shared/constants'

export type AppStateOptions = {
  hasRepo?: boolean
  graphLimit?: number
  recentFilters?: string[]
  themeName?: string
  diffCache?: Map<CommitId, string>
}

export function createAppState(options: AppStateOptions = {}): AppState {
  return {
    mode: options.hasRepo === false ? 'no-repo' : 'loading',
    shouldQuit: false,

    repo: null,
    graphLimit: options.graphLimit ?? DEFAULT_GRAPH_LIMIT,
    hasMore: false,
    isLoadingMore: false,

    selectedIndex: null,
    markedCommitIds: [],

    showDiffs: true,
    focusedPanel: 'graph',
    currentDiff: null,
    isLoadingDiff: false,
    diffScroll: 0,
    selectedFileIndex: null,
    diffCache: options.diffCache ?? new Map(),

    textInput: '',
    inputTarget: null,

    revsetFilter: null,
    recentFilters: options.recentFilters ? [...options.recentFilters] : [],
    filterSource: 'recent',
    filterCursor: null,

    commandPalette: null,
    contextMenu: null,
    evolog: null,
    operationLog: null,
    themeSelectionIndex: null,
    themeName: options.themeName ?? DEFAULT_THEME,

    squashSources: [],
    rebaseSources: [],

    statusMessage: null,
    statusTicksRemaining: 0,
    lastError: null,
    activeTasks: [],
    frameCount: 0,
    nowMs: 0
  }
}
