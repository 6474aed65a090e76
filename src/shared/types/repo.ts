/** Hexadecimal commit id. Only ever used as a lookup key or passed back to the backend. */
export type CommitId = string

export type FileStatus = 'added' | 'deleted' | 'modified' | 'conflicted'

export type FileChange = {
  path: string
  status: FileStatus
}

/**
 * Lane geometry for one row of the revision graph.
 * Written only by the layout engine.
 */
export type GraphRowVisual = {
  /** Lane the row's node is drawn in. */
  column: number
  /** Lane occupancy as the row is entered (before its own lane is released). */
  activeLanes: boolean[]
  /** Lane occupancy after the row's parents have been placed. */
  connectorLanes: boolean[]
  /** Lanes assigned to each parent, in parent order. */
  parentColumns: number[]
  /** Lowest lane spanned by the row's outgoing edges. */
  parentMin: number
  /** Highest lane spanned by the row's outgoing edges. */
  parentMax: number
}

export type GraphRow = {
  commitId: CommitId
  commitIdShort: string
  changeId: string
  changeIdShort: string
  description: string
  author: string
  /** Display timestamp, `YYYY-MM-DD HH:MM`. */
  timestamp: string
  timestampSecs: number
  isWorkingCopy: boolean
  isImmutable: boolean
  hasConflict: boolean
  parents: CommitId[]
  bookmarks: string[]
  changedFiles: FileChange[]
  visual: GraphRowVisual
}

export type RepoStatus = {
  repoName: string
  operationId: string
  workspaceId: string
  workingCopyId: CommitId
  /** Rows in display order: children before parents. */
  graph: GraphRow[]
}

export type OperationResult = { ok: true; message: string } | { ok: false; error: string }

export type ErrorSeverity = 'info' | 'warning' | 'error' | 'critical'

export type ErrorState = {
  message: string
  severity: ErrorSeverity
  suggestions: string[]
  timestampMs: number
}

export function createEmptyVisual(): GraphRowVisual {
  return {
    column: 0,
    activeLanes: [],
    connectorLanes: [],
    parentColumns: [],
    parentMin: 0,
    parentMax: 0
  }
}

const FILE_STATUS_LABELS: Record<FileStatus, string> = {
  added: 'Added',
  deleted: 'Deleted',
  modified: 'Modified',
  conflicted: 'Conflicted'
}

export function formatFileStatus(status: FileStatus): string {
  return FILE_STATUS_LABELS[status]
}

export function okResult(message: string): OperationResult {
  return { ok: true, message }
}

export function errResult(error: string): OperationResult {
  return { ok: false, error }
}
