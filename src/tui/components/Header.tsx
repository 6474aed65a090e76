import type { ThemePalette } from '@shared/theme'
import type { AppState } from '@shared/types'
import { Box, Text } from 'ink'
import React from 'react'
import { isBusy } from '../../node/state/selectors'
import { spinnerFrame } from '../utils/viewport'

export function Header({
  state,
  theme
}: {
  state: AppState
  theme: ThemePalette
}): React.JSX.Element {
  const repo = state.repo

  return (
    <Box paddingX={1} justifyContent="space-between">
      <Box gap={2}>
        <Text bold color={theme.accent}>
          treeline
        </Text>
        {repo ? (
          <>
            <Text color={theme.text}>{repo.repoName}</Text>
            <Text color={theme.muted}>op {repo.operationId}</Text>
            <Text color={theme.muted}>ws {repo.workspaceId}</Text>
          </>
        ) : (
          <Text color={theme.muted}>no repository</Text>
        )}
        {state.revsetFilter && <Text color={theme.bookmark}>revset: {state.revsetFilter}</Text>}
        {state.markedCommitIds.length > 0 && (
          <Text color={theme.accent}>{state.markedCommitIds.length} marked</Text>
        )}
      </Box>
      {isBusy(state) && (
        <Text color={theme.accent}>
          {spinnerFrame(state.frameCount)} {state.activeTasks[state.activeTasks.length - 1]}
        </Text>
      )}
    </Box>
  )
}
