import type { AppState } from '@shared/types'
import { useEffect, useReducer } from 'react'
import type { EventLoop } from '../../node/runtime/EventLoop'

/**
 * Re-renders the calling component after every reduced action and returns the
 * loop's state. The state object is mutated in place, so a counter drives the
 * render instead of a state copy.
 */
export function useEventLoop(loop: EventLoop): AppState {
  const [, forceRender] = useReducer((count: number) => count + 1, 0)

  useEffect(() => loop.subscribe(() => forceRender()), [loop])

  return loop.state
}
