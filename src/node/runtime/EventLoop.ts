/**
 * Event Loop
 *
 * Single consumer of every action: periodic ticks, user input passed to
 * `dispatch`, and results coming back from the command executor. Each action
 * is reduced exactly once, its command (if any) handed to the executor, and
 * the subscribers notified.
 */

import { log } from '@shared/logger'
import type { Action, AppState } from '@shared/types'
import type { VcsFacade } from '../adapters/vcs/interface'
import { DEFAULT_TICK_MS } from '../shared/constants'
import { update } from '../state/reducer'
import { reloadCommand } from '../state/transitions'
import { ActionChannel } from './ActionChannel'
import { CommandExecutor, type TerminalHandoff } from './CommandExecutor'

export type StateListener = (state: AppState, action: Action) => void

export interface EventLoopOptions {
  state: AppState
  facade: VcsFacade
  tickMs?: number
  diffConcurrency?: number
  now?: () => number
  handoff?: TerminalHandoff
}

export class EventLoop {
  readonly state: AppState

  private readonly channel = new ActionChannel<Action>()
  private readonly executor: CommandExecutor
  private readonly listeners = new Set<StateListener>()
  private readonly tickMs: number
  private readonly now: () => number
  private timer: NodeJS.Timeout | null = null
  private running: Promise<void> | null = null

  constructor(options: EventLoopOptions) {
    this.state = options.state
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS
    this.now = options.now ?? Date.now
    this.executor = new CommandExecutor({
      facade: options.facade,
      emit: (action) => this.dispatch(action),
      diffCache: options.state.diffCache,
      diffConcurrency: options.diffConcurrency,
      handoff: options.handoff
    })
  }

  get isRunning(): boolean {
    return this.running !== null
  }

  dispatch(action: Action): void {
    if (!this.channel.send(action)) {
      log.debug(`[EventLoop] Dropped ${action.kind} after shutdown`)
    }
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Starts ticking, issues the initial load and consumes actions until `quit`
   * or `stop()`. The returned promise settles when the loop has ended.
   */
  start(): Promise<void> {
    if (this.running) return this.running

    this.timer = setInterval(() => {
      this.dispatch({ kind: 'tick', nowMs: this.now() })
    }, this.tickMs)

    if (this.state.mode !== 'no-repo') {
      this.executor.execute(reloadCommand(this.state))
    }

    this.running = this.consume()
    return this.running
  }

  async stop(): Promise<void> {
    this.clearTimer()
    this.channel.close()
    if (this.running) await this.running
    await this.executor.idle()
  }

  /** Waits until no command is in flight and every queued action has been reduced. */
  async settle(): Promise<void> {
    do {
      await this.executor.idle()
      await new Promise((resolve) => setImmediate(resolve))
    } while (this.executor.pendingCount > 0 || this.channel.size > 0)
  }

  private async consume(): Promise<void> {
    for await (const action of this.channel) {
      this.step(action)
      if (this.state.shouldQuit) break
    }
    this.clearTimer()
    this.channel.close()
    log.debug('[EventLoop] Stopped')
  }

  private step(action: Action): void {
    const command = update(this.state, action)
    if (command) this.executor.execute(command)

    for (const listener of this.listeners) {
      try {
        listener(this.state, action)
      } catch (error) {
        log.error(`[EventLoop] Listener failed after ${action.kind}:`, error)
      }
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }
}
