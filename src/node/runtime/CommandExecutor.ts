/**
 * Command Executor
 *
 * Runs each command on its own async unit and reports back through actions.
 * Loads answer with a dedicated result action; mutations are wrapped in an
 * `operationStarted` / `operationCompleted` pair. No unit ever rejects: every
 * failure is turned into an action carrying display text.
 */

import { log } from '@shared/logger'
import type { Action, Command, CommitId, MutationCommand } from '@shared/types'
import { errResult, okResult } from '@shared/types'
import type { GraphQuery, VcsFacade } from '../adapters/vcs/interface'
import { DEFAULT_DIFF_CONCURRENCY } from '../shared/constants'
import { formatError } from '../shared/errors'
import { Semaphore } from './Semaphore'

export type ActionSink = (action: Action) => void

/**
 * Gives the terminal to `task` for as long as it runs and takes it back
 * afterwards, whether the task settles or rejects.
 */
export type TerminalHandoff = <T>(task: () => Promise<T>) => Promise<T>

const runInPlace: TerminalHandoff = (task) => task()

export interface CommandExecutorOptions {
  facade: VcsFacade
  emit: ActionSink
  /** Shared with the state store; written here before `diffLoaded` is emitted. */
  diffCache: Map<CommitId, string>
  diffConcurrency?: number
  /** Wraps commands that run an interactive tool; runs them in place when omitted. */
  handoff?: TerminalHandoff
}

type MutationPlan = {
  started: string
  success: string
  run: () => Promise<string | void>
}

export class CommandExecutor {
  readonly permits: Semaphore

  private readonly facade: VcsFacade
  private readonly emit: ActionSink
  private readonly diffCache: Map<CommitId, string>
  private readonly handoff: TerminalHandoff
  private readonly inFlight = new Set<Promise<void>>()

  constructor(options: CommandExecutorOptions) {
    this.facade = options.facade
    this.handoff = options.handoff ?? runInPlace
    this.emit = options.emit
    this.diffCache = options.diffCache
    this.permits = new Semaphore(options.diffConcurrency ?? DEFAULT_DIFF_CONCURRENCY)
  }

  get pendingCount(): number {
    return this.inFlight.size
  }

  /** Starts the command and returns immediately. */
  execute(command: Command): void {
    log.debug(`[CommandExecutor] ${command.kind}`)

    const unit: Promise<void> = this.run(command)
      .catch((error: unknown) => {
        log.error(`[CommandExecutor] ${command.kind} failed unexpectedly:`, error)
        this.emit({ kind: 'errorOccurred', message: formatError(error) })
      })
      .finally(() => {
        this.inFlight.delete(unit)
      })
    this.inFlight.add(unit)
  }

  /** Resolves once every started unit, including ones started meanwhile, has settled. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight])
    }
  }

  private async run(command: Command): Promise<void> {
    switch (command.kind) {
      case 'loadRepo':
        return this.loadRepo(command)
      case 'loadRepoBackground':
        return this.loadRepoBackground(command)
      case 'loadDiff':
        return this.loadDiff(command.commitId)
      case 'evolog':
        return this.showReport(`Fetching evolog for ${shortId(command.commitId)}...`, 'evolog', () =>
          this.facade.evolog(command.commitId)
        )
      case 'operationLog':
        return this.showReport('Fetching operation log...', 'operationLog', () =>
          this.facade.operationLog()
        )
      case 'resolveConflict':
        return this.resolveConflict(command.commitId, command.path)
      default:
        return this.runMutation(command)
    }
  }

  // ============================================================================
  // Loads
  // ============================================================================

  private async loadRepo(command: Extract<Command, { kind: 'loadRepo' }>): Promise<void> {
    const query: GraphQuery = { limit: command.limit }
    if (command.revset) query.revset = command.revset

    try {
      if (command.heads && command.heads.length > 0) {
        query.heads = command.heads
        const rows = await this.facade.getGraphRows(query)
        this.emit({ kind: 'graphBatchLoaded', rows })
        return
      }
      const repo = await this.facade.getOperationLog(query)
      this.emit({ kind: 'repoLoaded', repo })
    } catch (error) {
      log.warn('[CommandExecutor] Failed to load repo:', formatError(error))
      this.emit({ kind: 'errorOccurred', message: `Failed to load repo: ${formatError(error)}` })
    }
  }

  private async loadRepoBackground(
    command: Extract<Command, { kind: 'loadRepoBackground' }>
  ): Promise<void> {
    const query: GraphQuery = { limit: command.limit }
    if (command.revset) query.revset = command.revset

    try {
      const repo = await this.facade.getOperationLog(query)
      this.emit({ kind: 'repoReloadedBackground', repo })
    } catch (error) {
      this.emit({ kind: 'errorOccurred', message: `Background sync failed: ${formatError(error)}` })
    }
  }

  private async loadDiff(commitId: CommitId): Promise<void> {
    try {
      const diff = await this.facade.getCommitDiff(commitId, this.permits)
      this.diffCache.set(commitId, diff)
      this.emit({ kind: 'diffLoaded', commitId, diff, failed: false })
    } catch (error) {
      this.emit({
        kind: 'diffLoaded',
        commitId,
        diff: `Error: ${formatError(error)}`,
        failed: true
      })
    }
  }

  private async showReport(
    started: string,
    report: 'evolog' | 'operationLog',
    load: () => Promise<string>
  ): Promise<void> {
    this.emit({ kind: 'operationStarted', message: started })
    try {
      const content = await load()
      this.emit(
        report === 'evolog'
          ? { kind: 'openEvolog', content, task: started }
          : { kind: 'openOperationLog', content, task: started }
      )
    } catch (error) {
      this.emit({
        kind: 'operationCompleted',
        result: errResult(`Error: ${formatError(error)}`),
        task: started
      })
    }
  }

  private async resolveConflict(commitId: CommitId, path: string): Promise<void> {
    const started = `Resolving ${path}...`
    this.emit({ kind: 'operationStarted', message: started })

    try {
      await this.handoff(() => this.facade.resolveConflict(commitId, path))
      this.emit({ kind: 'operationCompleted', result: okResult(`Resolved ${path}`), task: started })
    } catch (error) {
      log.warn(`[CommandExecutor] resolve of ${path} failed:`, formatError(error))
      this.emit({
        kind: 'operationCompleted',
        result: errResult(`Resolve failed for ${path}: ${formatError(error)}`),
        task: started
      })
    }
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  private async runMutation(command: MutationCommand): Promise<void> {
    const plan = this.planMutation(command)
    this.emit({ kind: 'operationStarted', message: plan.started })

    try {
      const message = await plan.run()
      this.emit({
        kind: 'operationCompleted',
        result: okResult(typeof message === 'string' && message ? message : plan.success),
        task: plan.started
      })
    } catch (error) {
      log.warn(`[CommandExecutor] ${command.kind} failed:`, formatError(error))
      this.emit({
        kind: 'operationCompleted',
        result: errResult(`Error: ${formatError(error)}`),
        task: plan.started
      })
    }
  }

  private planMutation(command: MutationCommand): MutationPlan {
    const vcs = this.facade
    switch (command.kind) {
      case 'describeRevision':
        return {
          started: `Describing ${shortId(command.commitId)}...`,
          success: 'Described',
          run: () => vcs.describeRevision(command.commitId, command.message)
        }
      case 'commit':
        return {
          started: 'Committing...',
          success: 'Committed',
          run: () => vcs.commit(command.message)
        }
      case 'snapshot':
        return {
          started: 'Snapshotting...',
          success: 'Snapshot created',
          run: () => vcs.snapshot()
        }
      case 'edit':
        return {
          started: `Editing ${shortId(command.commitId)}...`,
          success: 'Edit successful',
          run: () => vcs.edit(command.commitId)
        }
      case 'squash':
        return {
          started: command.into
            ? `Squashing ${subject(command.commitIds)} into ${shortId(command.into)}...`
            : `Squashing ${subject(command.commitIds)}...`,
          success: 'Squash successful',
          run: () => vcs.squash(command.commitIds, command.into)
        }
      case 'newChild':
        return {
          started: `Creating child of ${shortId(command.commitId)}...`,
          success: 'New revision created',
          run: () => vcs.newChild(command.commitId)
        }
      case 'abandon':
        return {
          started: `Abandoning ${subject(command.commitIds)}...`,
          success: 'Revision(s) abandoned',
          run: () => vcs.abandon(command.commitIds)
        }
      case 'revert':
        return {
          started: `Reverting ${subject(command.commitIds)}...`,
          success: 'Revision(s) reverted',
          run: () => vcs.revert(command.commitIds)
        }
      case 'absorb':
        return {
          started: 'Absorbing changes...',
          success: 'Absorb successful',
          run: () => vcs.absorb()
        }
      case 'duplicate':
        return {
          started: `Duplicating ${subject(command.commitIds)}...`,
          success: 'Revision(s) duplicated',
          run: () => vcs.duplicate(command.commitIds)
        }
      case 'parallelize':
        return {
          started: `Parallelizing ${subject(command.commitIds)}...`,
          success: 'Revision(s) parallelized',
          run: () => vcs.parallelize(command.commitIds)
        }
      case 'rebase':
        return {
          started: `Rebasing ${subject(command.commitIds)} onto ${shortId(command.destination)}...`,
          success: 'Rebase successful',
          run: () => vcs.rebase(command.commitIds, command.destination)
        }
      case 'setBookmark':
        return {
          started: `Setting bookmark ${command.name}...`,
          success: 'Bookmark set',
          run: () => vcs.setBookmark(command.commitId, command.name)
        }
      case 'deleteBookmark':
        return {
          started: `Deleting bookmark ${command.name}...`,
          success: 'Bookmark deleted',
          run: () => vcs.deleteBookmark(command.name)
        }
      case 'undo':
        return { started: 'Undoing...', success: 'Undo successful', run: () => vcs.undo() }
      case 'redo':
        return { started: 'Redoing...', success: 'Redo successful', run: () => vcs.redo() }
      case 'fetch':
        return { started: 'Fetching...', success: 'Fetch successful', run: () => vcs.fetch() }
      case 'push':
        return {
          started: command.bookmark ? `Pushing ${command.bookmark}...` : 'Pushing...',
          success: 'Push successful',
          run: () => vcs.push(command.bookmark)
        }
      case 'initRepo':
        return {
          started: 'Initializing repository...',
          success: 'Repository initialized',
          run: () => vcs.initRepo()
        }
    }
  }
}

function shortId(commitId: CommitId): string {
  return commitId.slice(0, 8)
}

function subject(commitIds: CommitId[]): string {
  const [only] = commitIds
  return commitIds.length === 1 && only !== undefined
    ? shortId(only)
    : `${commitIds.length} revisions`
}
