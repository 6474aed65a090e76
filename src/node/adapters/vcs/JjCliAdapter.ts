/**
 * jj CLI Adapter
 *
 * VcsFacade implementation that shells out to the `jj` binary. Queries pass
 * `--ignore-working-copy` so they never snapshot or race a concurrent
 * snapshot; mutations let jj snapshot the working copy first.
 */

import { log } from '@shared/logger'
import type { CommitId, FileChange, GraphRow, RepoStatus } from '@shared/types'
import path from 'path'
import { DEFAULT_REVSET } from '../../domain/revsets'
import { NoRepositoryError, StaleCommitError, VcsError } from '../../shared/errors'
import { renderCommitDiff, type FileContents } from './diff-format'
import type { GraphQuery, PermitPool, VcsFacade } from './interface'
import { FIELD_SEPARATOR, LOG_TEMPLATE, parseLogOutput } from './log-parser'
import {
  createExecFileRunner,
  createInteractiveRunner,
  type JjInteractiveRunner,
  type JjRunner
} from './runner'
import { findWorkspaceRoot, presentRevset, rootFileset, unionRevset } from './utils'

const GLOBAL_ARGS = ['--no-pager', '--color', 'never']

/** Entries shown in the operation log view. */
const OPERATION_LOG_LIMIT = 200

const EMPTY = new Uint8Array(0)

export interface JjCliAdapterOptions {
  repoPath: string
  /** Defaults to `jj` on PATH. */
  binary?: string
  runner?: JjRunner
  /** Runs commands that take over the terminal. */
  interactive?: JjInteractiveRunner
}

type RunMode = 'read' | 'write'

export class JjCliAdapter implements VcsFacade {
  readonly name = 'jj-cli'

  private readonly repoPath: string
  private readonly runner: JjRunner
  private readonly interactive: JjInteractiveRunner

  constructor(options: JjCliAdapterOptions) {
    const binary = options.binary ?? 'jj'
    this.repoPath = options.repoPath
    this.runner = options.runner ?? createExecFileRunner(binary)
    this.interactive = options.interactive ?? createInteractiveRunner(binary)
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async getOperationLog(query: GraphQuery): Promise<RepoStatus> {
    const root = await this.workspaceRoot()
    if (!root) throw new NoRepositoryError(this.repoPath)

    const [graph, operationId, workingCopy] = await Promise.all([
      this.getGraphRows(query),
      this.text('getOperationLog', 'read', [
        'op',
        'log',
        '-n',
        '1',
        '--no-graph',
        '-T',
        'self.id().short(12)'
      ]),
      this.text('getOperationLog', 'read', [
        'log',
        '-r',
        '@',
        '--no-graph',
        '-T',
        `commit_id ++ "\\x1f" ++ working_copies`
      ])
    ])

    const [workingCopyId = '', workspaces = ''] = workingCopy.trim().split(FIELD_SEPARATOR)
    return {
      repoName: path.basename(root),
      operationId: operationId.trim(),
      workspaceId: parseWorkspaceName(workspaces),
      workingCopyId,
      graph
    }
  }

  async getGraphRows(query: GraphQuery): Promise<GraphRow[]> {
    const revset =
      query.heads && query.heads.length > 0
        ? `::(${unionRevset(query.heads)})`
        : (query.revset ?? DEFAULT_REVSET)

    const output = await this.text('getGraphRows', 'read', [
      'log',
      '--no-graph',
      '-r',
      revset,
      '-n',
      String(query.limit),
      '-T',
      LOG_TEMPLATE
    ])
    return parseLogOutput(output)
  }

  async getCommitDiff(commitId: CommitId, permits?: PermitPool): Promise<string> {
    const row = await this.requireRow(commitId, 'getCommitDiff')
    const parent = row.parents[0]

    const readContents = async (file: FileChange): Promise<FileContents> => {
      const before =
        file.status === 'added' || !parent ? EMPTY : await this.readFile(parent, file.path)
      const after = file.status === 'deleted' ? EMPTY : await this.readFile(commitId, file.path)
      return { path: file.path, status: file.status, before, after }
    }

    const files = await Promise.all(
      row.changedFiles.map((file) =>
        permits ? permits.run(() => readContents(file)) : readContents(file)
      )
    )
    return renderCommitDiff(row, files)
  }

  async evolog(commitId: CommitId): Promise<string> {
    await this.ensurePresent([commitId], 'evolog')
    return this.text('evolog', 'read', ['evolog', '-r', commitId])
  }

  async operationLog(): Promise<string> {
    return this.text('operationLog', 'read', ['op', 'log', '-n', String(OPERATION_LOG_LIMIT)])
  }

  async workspaceRoot(): Promise<string | null> {
    return findWorkspaceRoot(this.repoPath)
  }

  async isValid(): Promise<boolean> {
    return (await this.workspaceRoot()) !== null
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  async describeRevision(commitId: CommitId, message: string): Promise<void> {
    await this.ensurePresent([commitId], 'describeRevision')
    await this.write('describeRevision', ['describe', commitId, '-m', message])
  }

  async commit(message: string): Promise<void> {
    await this.write('commit', ['commit', '-m', message])
  }

  async snapshot(): Promise<string> {
    await this.write('snapshot', ['status'])
    return 'Snapshot created.'
  }

  async edit(commitId: CommitId): Promise<void> {
    await this.ensurePresent([commitId], 'edit')
    await this.write('edit', ['edit', commitId])
  }

  async squash(commitIds: CommitId[], into?: CommitId): Promise<void> {
    await this.ensurePresent(into ? [...commitIds, into] : commitIds, 'squash')

    if (into) {
      await this.write('squash', ['squash', '--from', unionRevset(commitIds), '--into', into])
      return
    }
    // Squashing rewrites descendants, so later revisions are addressed by change id.
    const changeIds = await this.text('squash', 'read', [
      'log',
      '--no-graph',
      '-r',
      unionRevset(commitIds),
      '-T',
      'change_id ++ "\\n"'
    ])
    for (const changeId of changeIds.split('\n').filter((line) => line.length > 0)) {
      await this.write('squash', ['squash', '-r', changeId])
    }
  }

  async newChild(commitId: CommitId): Promise<void> {
    await this.ensurePresent([commitId], 'newChild')
    await this.write('newChild', ['new', commitId])
  }

  async abandon(commitIds: CommitId[]): Promise<void> {
    await this.ensurePresent(commitIds, 'abandon')
    await this.write('abandon', ['abandon', ...commitIds])
  }

  async revert(commitIds: CommitId[]): Promise<void> {
    await this.ensurePresent(commitIds, 'revert')
    await this.write('revert', ['revert', '-r', unionRevset(commitIds), '--onto', '@'])
  }

  async absorb(): Promise<void> {
    await this.write('absorb', ['absorb'])
  }

  async duplicate(commitIds: CommitId[]): Promise<void> {
    await this.ensurePresent(commitIds, 'duplicate')
    await this.write('duplicate', ['duplicate', ...commitIds])
  }

  async parallelize(commitIds: CommitId[]): Promise<void> {
    await this.ensurePresent(commitIds, 'parallelize')
    await this.write('parallelize', ['parallelize', ...commitIds])
  }

  async rebase(commitIds: CommitId[], destination: CommitId): Promise<void> {
    await this.ensurePresent([...commitIds, destination], 'rebase')
    await this.write('rebase', ['rebase', '-r', unionRevset(commitIds), '-d', destination])
  }

  async setBookmark(commitId: CommitId, name: string): Promise<void> {
    await this.ensurePresent([commitId], 'setBookmark')
    await this.write('setBookmark', ['bookmark', 'set', name, '-r', commitId, '--allow-backwards'])
  }

  async deleteBookmark(name: string): Promise<void> {
    await this.write('deleteBookmark', ['bookmark', 'delete', name])
  }

  async undo(): Promise<void> {
    await this.write('undo', ['undo'])
  }

  async redo(): Promise<void> {
    await this.write('redo', ['redo'])
  }

  async fetch(): Promise<void> {
    await this.write('fetch', ['git', 'fetch'])
  }

  async push(bookmark?: string): Promise<void> {
    await this.write('push', bookmark ? ['git', 'push', '-b', bookmark] : ['git', 'push'])
  }

  async initRepo(): Promise<void> {
    await this.write('initRepo', ['git', 'init'])
  }

  async resolveConflict(commitId: CommitId, filePath: string): Promise<void> {
    await this.ensurePresent([commitId], 'resolveConflict')
    const args = ['resolve', '-r', commitId, rootFileset(filePath)]
    log.debug(`[JjCliAdapter] jj ${args.join(' ')} (interactive)`)
    await this.interactive(['--no-pager', ...args], {
      cwd: this.repoPath,
      operation: 'resolveConflict'
    })
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  /**
   * Rejects with StaleCommitError for the first id that no longer names a
   * visible revision.
   */
  private async ensurePresent(commitIds: CommitId[], operation: string): Promise<void> {
    const output = await this.text(operation, 'read', [
      'log',
      '--no-graph',
      '-r',
      `(${presentRevset(commitIds)}) & ::visible_heads()`,
      '-T',
      'commit_id ++ "\\n"'
    ])
    const found = new Set(output.split('\n').map((line) => line.trim()))
    const missing = commitIds.find((id) => !found.has(id))
    if (missing !== undefined) {
      throw new StaleCommitError(missing, operation)
    }
  }

  private async requireRow(commitId: CommitId, operation: string): Promise<GraphRow> {
    const output = await this.text(operation, 'read', [
      'log',
      '--no-graph',
      '-r',
      `present(${commitId}) & ::visible_heads()`,
      '-T',
      LOG_TEMPLATE
    ])
    const [row] = parseLogOutput(output)
    if (!row) throw new StaleCommitError(commitId, operation)
    return row
  }

  private async readFile(revision: CommitId, filePath: string): Promise<Uint8Array> {
    return this.run('getCommitDiff', 'read', ['file', 'show', '-r', revision, rootFileset(filePath)])
  }

  private async write(operation: string, args: string[]): Promise<void> {
    await this.run(operation, 'write', args)
  }

  private async text(operation: string, mode: RunMode, args: string[]): Promise<string> {
    const stdout = await this.run(operation, mode, args)
    return stdout.toString('utf8')
  }

  private async run(operation: string, mode: RunMode, args: string[]): Promise<Buffer> {
    const fullArgs =
      mode === 'read'
        ? [...GLOBAL_ARGS, '--ignore-working-copy', ...args]
        : [...GLOBAL_ARGS, ...args]

    log.debug(`[JjCliAdapter] jj ${args.join(' ')}`)
    try {
      return await this.runner(fullArgs, { cwd: this.repoPath, operation })
    } catch (error) {
      if (error instanceof VcsError) throw error
      throw new VcsError(`jj ${args[0] ?? ''} failed`, operation, undefined, error)
    }
  }
}

/** `working_copies` renders `<name>@` per workspace; empty for a single default workspace. */
function parseWorkspaceName(field: string): string {
  const [first] = field.trim().split(/\s+/)
  return first ? first.replace(/@$/, '') : 'default'
}
