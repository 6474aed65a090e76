import type { ThemePalette } from '@shared/theme'
import type { AppMode, AppState } from '@shared/types'
import { Box, Text } from 'ink'
import React from 'react'

const MODE_HINTS: Partial<Record<AppMode, string>> = {
  normal: '? help  : commands  / filter  q quit',
  diff: 'j/k files  [ ] hunks  h graph',
  'squash-select': 'Select the destination and press Enter  Esc cancels',
  'rebase-select': 'Select the new parent and press Enter  Esc cancels',
  'no-repo': 'i init repository  q quit'
}

export function StatusBar({
  state,
  theme
}: {
  state: AppState
  theme: ThemePalette
}): React.JSX.Element {
  const error = state.lastError

  return (
    <Box paddingX={1} justifyContent="space-between">
      {error ? (
        <Text color={theme.error} wrap="truncate">
          {error.message}
        </Text>
      ) : state.statusMessage ? (
        <Text color={theme.text} wrap="truncate">
          {state.statusMessage}
        </Text>
      ) : (
        <Text color={theme.muted}>{MODE_HINTS[state.mode] ?? ''}</Text>
      )}
      <Text color={theme.muted}>{state.mode.toUpperCase()}</Text>
    </Box>
  )
}
