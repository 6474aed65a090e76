// ============================================================================
// Graph
// ============================================================================

/** Rows requested per graph load. */
export const DEFAULT_GRAPH_LIMIT = 100

/** Start paging in older history when the selection is this close to the end. */
export const LOAD_MORE_THRESHOLD = 20

// ============================================================================
// Diff
// ============================================================================

/** Upper bound on diff loads reading file contents at the same time. */
export const DEFAULT_DIFF_CONCURRENCY = 4

/** Files larger than this are not diffed. */
export const MAX_DIFF_SIZE = 1024 * 1024

/** Bytes inspected by the binary-content heuristic. */
export const BINARY_SAMPLE_SIZE = 1024

export const DIFF_CONTEXT_LINES = 3

// ============================================================================
// Event loop
// ============================================================================

export const DEFAULT_TICK_MS = 250

/** Ticks a transient status message stays visible (5 s at the default rate). */
export const STATUS_MESSAGE_TICKS = 20

export const WATCH_DEBOUNCE_MS = 300

// ============================================================================
// Filters
// ============================================================================

export const MAX_RECENT_FILTERS = 10

export const SYNC_TASK_LABEL = 'Syncing in background...'
