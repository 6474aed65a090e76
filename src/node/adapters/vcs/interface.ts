/**
 * VCS Facade Interface
 *
 * Abstraction over the repository backend. The command executor only talks to
 * this interface, so the state machine and runtime can be exercised against
 * an in-process fake.
 *
 * Every method rejects with a `VcsError` (or `StaleCommitError` when a commit
 * id no longer resolves).
 */

import type { CommitId, GraphRow, RepoStatus } from '@shared/types'

/**
 * Bounded pool of permits for work that must not run unbounded in parallel.
 */
export interface PermitPool {
  run<T>(task: () => Promise<T>): Promise<T>
}

export interface GraphQuery {
  limit: number
  /** Revset expression; the backend default when absent. */
  revset?: string
  /** Load the ancestry of these commits instead of the whole visible graph. */
  heads?: CommitId[]
}

export interface VcsFacade {
  readonly name: string

  // ============================================================================
  // Queries
  // ============================================================================

  /** Loads repository metadata and up to `limit` graph rows. Rows carry no layout yet. */
  getOperationLog(query: GraphQuery): Promise<RepoStatus>

  /** Loads further graph rows only, without repository metadata. */
  getGraphRows(query: GraphQuery): Promise<GraphRow[]>

  /**
   * Renders the full diff text of a commit. File contents are read under
   * `permits` when one is given.
   */
  getCommitDiff(commitId: CommitId, permits?: PermitPool): Promise<string>

  evolog(commitId: CommitId): Promise<string>

  operationLog(): Promise<string>

  /** Root of the workspace, or null when the path is not inside one. */
  workspaceRoot(): Promise<string | null>

  isValid(): Promise<boolean>

  // ============================================================================
  // Mutations
  // ============================================================================

  describeRevision(commitId: CommitId, message: string): Promise<void>

  commit(message: string): Promise<void>

  /** Returns the message to show the user. */
  snapshot(): Promise<string>

  edit(commitId: CommitId): Promise<void>

  /** Squashes each commit into `into`, or into its own parent when omitted. */
  squash(commitIds: CommitId[], into?: CommitId): Promise<void>

  newChild(commitId: CommitId): Promise<void>

  abandon(commitIds: CommitId[]): Promise<void>

  revert(commitIds: CommitId[]): Promise<void>

  absorb(): Promise<void>

  duplicate(commitIds: CommitId[]): Promise<void>

  parallelize(commitIds: CommitId[]): Promise<void>

  rebase(commitIds: CommitId[], destination: CommitId): Promise<void>

  setBookmark(commitId: CommitId, name: string): Promise<void>

  deleteBookmark(name: string): Promise<void>

  undo(): Promise<void>

  redo(): Promise<void>

  fetch(): Promise<void>

  /** Pushes one bookmark, or every tracked bookmark when omitted. */
  push(bookmark?: string): Promise<void>

  initRepo(): Promise<void>

  /**
   * Runs jj's merge tool on one conflicted file of a revision. The tool owns
   * the terminal until it exits.
   */
  resolveConflict(commitId: CommitId, path: string): Promise<void>
}
