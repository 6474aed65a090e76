import type { ThemePalette } from '@shared/theme'
import type { AppState } from '@shared/types'
import { Box, Text } from 'ink'
import React from 'react'
import { diffLines } from '../../node/state/selectors'

function lineColor(line: string, theme: ThemePalette): string | undefined {
  if (line.startsWith('File: ')) return theme.accent
  if (line.startsWith('@@')) return theme.hunk
  if (line.startsWith('+')) return theme.added
  if (line.startsWith('-')) return theme.deleted
  if (line.startsWith('Error: ')) return theme.error
  return undefined
}

export function DiffView({
  state,
  theme,
  height
}: {
  state: AppState
  theme: ThemePalette
  height: number
}): React.JSX.Element {
  const focused = state.focusedPanel === 'diff'
  const lines = diffLines(state)
  const visible = lines.slice(state.diffScroll, state.diffScroll + Math.max(0, height - 2))

  return (
    <Box
      flexDirection="column"
      flexGrow={1}
      height={height}
      borderStyle="round"
      borderColor={focused ? theme.accent : theme.muted}
      overflow="hidden"
    >
      {state.isLoadingDiff && lines.length === 0 ? (
        <Text color={theme.muted}>Loading diff...</Text>
      ) : lines.length === 0 ? (
        <Text color={theme.muted}>No revision selected.</Text>
      ) : (
        visible.map((line, index) => (
          <Text key={state.diffScroll + index} wrap="truncate" color={lineColor(line, theme)}>
            {line || ' '}
          </Text>
        ))
      )}
    </Box>
  )
}
