import type { ThemePalette } from '@shared/theme'
import { Box, Text } from 'ink'
import React from 'react'

export function Welcome({
  repoPath,
  theme
}: {
  repoPath: string
  theme: ThemePalette
}): React.JSX.Element {
  return (
    <Box flexDirection="column" alignItems="center" justifyContent="center" flexGrow={1}>
      <Text bold color={theme.accent}>
        treeline
      </Text>
      <Text color={theme.text}>No jj repository found at {repoPath}</Text>
      <Box marginTop={1} flexDirection="column" alignItems="center">
        <Text color={theme.muted}>
          Press <Text color={theme.accent}>i</Text> to run jj git init here
        </Text>
        <Text color={theme.muted}>
          Press <Text color={theme.accent}>q</Text> to quit
        </Text>
      </Box>
    </Box>
  )
}
