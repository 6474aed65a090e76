import type { Action } from '@shared/types'
import { afterEach, describe, expect, it } from 'vitest'
import { FakeVcsFacade } from '../../__tests__/test-utils'
import { createAppState } from '../../state/create-app-state'
import { EventLoop } from '../EventLoop'

describe('EventLoop', () => {
  let loop: EventLoop | null = null

  afterEach(async () => {
    await loop?.stop()
    loop = null
  })

  function createLoop(facade = new FakeVcsFacade(), state = createAppState(), tickMs = 60_000) {
    loop = new EventLoop({ state, facade, tickMs, now: () => 42 })
    return loop
  }

  it('loads the repository and the first diff on start', async () => {
    const facade = new FakeVcsFacade()
    const events = createLoop(facade)
    const seen: string[] = []
    events.subscribe((_state, action) => seen.push(action.kind))

    void events.start()
    await events.settle()

    expect(events.state.mode).toBe('normal')
    expect(events.state.selectedIndex).toBe(0)
    expect(events.state.currentDiff).toBe('Commit ID: c2\n')
    expect(events.state.diffCache.get('c2')).toBe('Commit ID: c2\n')
    expect(seen).toEqual(['repoLoaded', 'diffLoaded'])
  })

  it('does not load anything without a repository', async () => {
    const facade = new FakeVcsFacade()
    const events = createLoop(facade, createAppState({ hasRepo: false }))

    void events.start()
    await events.settle()

    expect(facade.calls).toEqual([])
    expect(events.state.mode).toBe('no-repo')
  })

  it('runs a dispatched mutation and reloads afterwards', async () => {
    const facade = new FakeVcsFacade()
    const events = createLoop(facade)
    void events.start()
    await events.settle()

    events.dispatch({ kind: 'snapshotWorkingCopy' })
    await events.settle()

    expect(facade.callsTo('snapshot')).toHaveLength(1)
    expect(facade.callsTo('getOperationLog')).toHaveLength(2)
    expect(events.state.mode).toBe('normal')
    expect(events.state.statusMessage).toBe('Snapshot created.')
    expect(events.state.activeTasks).toEqual([])
  })

  it('surfaces a failing load as an error without stopping', async () => {
    const facade = new FakeVcsFacade()
    facade.failures.getOperationLog = 'There is no jj repo in "."'
    const events = createLoop(facade)

    void events.start()
    await events.settle()

    expect(events.isRunning).toBe(true)
    expect(events.state.mode).toBe('no-repo')
    expect(events.state.lastError).toEqual({
      message: 'Failed to load repo: There is no jj repo in "."',
      severity: 'critical',
      suggestions: ['Ensure you are in a jj/git repository or try: jj git init'],
      timestampMs: 0
    })
  })

  it('ends the loop on quit', async () => {
    const events = createLoop()
    const done = events.start()
    await events.settle()

    events.dispatch({ kind: 'quit' })
    await done

    expect(events.state.shouldQuit).toBe(true)
  })

  it('delivers ticks with the current time', async () => {
    const events = createLoop(new FakeVcsFacade(), createAppState({ hasRepo: false }), 5)
    const ticks: Action[] = []
    events.subscribe((_state, action) => {
      if (action.kind === 'tick') ticks.push(action)
    })

    void events.start()
    await new Promise((resolve) => setTimeout(resolve, 30))

    expect(ticks.length).toBeGreaterThan(0)
    expect(ticks[0]).toEqual({ kind: 'tick', nowMs: 42 })
    expect(events.state.nowMs).toBe(42)
  })

  it('keeps running when a listener throws', async () => {
    const events = createLoop()
    events.subscribe(() => {
      throw new Error('render failed')
    })

    void events.start()
    await events.settle()

    expect(events.state.mode).toBe('normal')
  })
})
