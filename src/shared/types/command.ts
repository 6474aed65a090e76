import type { CommitId } from './repo'

/**
 * Side-effect requests emitted by the reducer and run by the command executor.
 * Commands are plain data; nothing here performs I/O.
 */
export type Command =
  // Read-only loads
  | { kind: 'loadRepo'; limit: number; revset?: string; heads?: CommitId[] }
  | { kind: 'loadRepoBackground'; limit: number; revset?: string }
  | { kind: 'loadDiff'; commitId: CommitId }
  // Mutations
  | { kind: 'describeRevision'; commitId: CommitId; message: string }
  | { kind: 'commit'; message: string }
  | { kind: 'snapshot' }
  | { kind: 'edit'; commitId: CommitId }
  | { kind: 'squash'; commitIds: CommitId[]; into?: CommitId }
  | { kind: 'newChild'; commitId: CommitId }
  | { kind: 'abandon'; commitIds: CommitId[] }
  | { kind: 'revert'; commitIds: CommitId[] }
  | { kind: 'absorb' }
  | { kind: 'duplicate'; commitIds: CommitId[] }
  | { kind: 'parallelize'; commitIds: CommitId[] }
  | { kind: 'rebase'; commitIds: CommitId[]; destination: CommitId }
  | { kind: 'setBookmark'; commitId: CommitId; name: string }
  | { kind: 'deleteBookmark'; name: string }
  | { kind: 'undo' }
  | { kind: 'redo' }
  | { kind: 'fetch' }
  | { kind: 'push'; bookmark?: string }
  | { kind: 'initRepo' }
  // Hands the terminal to jj's merge tool
  | { kind: 'resolveConflict'; commitId: CommitId; path: string }
  // Reports shown in a scroll view
  | { kind: 'evolog'; commitId: CommitId }
  | { kind: 'operationLog' }

export type CommandKind = Command['kind']

export type MutationCommand = Exclude<
  Command,
  {
    kind:
      | 'loadRepo'
      | 'loadRepoBackground'
      | 'loadDiff'
      | 'evolog'
      | 'operationLog'
      | 'resolveConflict'
  }
>
