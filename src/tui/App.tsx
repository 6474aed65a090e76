import { getTheme } from '@shared/theme'
import { Box, useApp, useInput } from 'ink'
import React, { useEffect } from 'react'
import type { EventLoop } from '../node/runtime/EventLoop'
import { DiffView } from './components/DiffView'
import { Header } from './components/Header'
import { ErrorPanel, hasModal, Modal } from './components/Modals'
import { RevisionGraph } from './components/RevisionGraph'
import { StatusBar } from './components/StatusBar'
import { Welcome } from './components/Welcome'
import { useEventLoop } from './hooks/use-event-loop'
import { useTerminalSize } from './hooks/use-terminal-size'
import { resolveKey } from './utils/keymap'

const CHROME_ROWS = 2

export function App({ loop, repoPath }: { loop: EventLoop; repoPath: string }): React.JSX.Element {
  const state = useEventLoop(loop)
  const { columns, rows } = useTerminalSize()
  const { exit } = useApp()
  const theme = getTheme(state.themeName)

  useInput((input, key) => {
    const action = resolveKey(loop.state, input, key)
    if (action) loop.dispatch(action)
  })

  useEffect(() => {
    if (state.shouldQuit) exit()
  }, [state.shouldQuit, exit])

  const error = state.lastError
  const errorRows = error ? error.suggestions.length + 4 : 0
  const bodyHeight = Math.max(3, rows - CHROME_ROWS - errorRows)
  const graphColumns = state.showDiffs ? Math.floor(columns / 2) : columns

  let body: React.JSX.Element
  if (hasModal(state.mode)) {
    body = (
      <Box height={bodyHeight} justifyContent="center" alignItems="flex-start">
        <Modal
          state={state}
          theme={theme}
          width={Math.min(columns - 2, 100)}
          height={bodyHeight}
        />
      </Box>
    )
  } else if (state.mode === 'no-repo') {
    body = (
      <Box height={bodyHeight}>
        <Welcome repoPath={repoPath} theme={theme} />
      </Box>
    )
  } else {
    body = (
      <Box height={bodyHeight}>
        <Box width={graphColumns} flexDirection="column">
          <RevisionGraph state={state} theme={theme} height={bodyHeight} columns={graphColumns} />
        </Box>
        {state.showDiffs && <DiffView state={state} theme={theme} height={bodyHeight} />}
      </Box>
    )
  }

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <Header state={state} theme={theme} />
      {body}
      {error && <ErrorPanel error={error} theme={theme} />}
      <StatusBar state={state} theme={theme} />
    </Box>
  )
}
