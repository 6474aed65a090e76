import type { ThemePalette } from '@shared/theme'
import type { AppState, FileChange, GraphRow } from '@shared/types'
import { Box, Text } from 'ink'
import React from 'react'
import { graphWidth } from '../../node/domain/GraphLayout'
import { isMarked } from '../../node/state/selectors'
import { laneColor, nodeGlyph, renderConnectorLanes, renderNodeLanes } from '../utils/graph-glyphs'
import { truncate, windowStart } from '../utils/viewport'

const STATUS_MARKERS: Record<FileChange['status'], string> = {
  added: 'A',
  deleted: 'D',
  modified: 'M',
  conflicted: 'C'
}

function FileList({
  files,
  selectedIndex,
  focused,
  indent,
  theme
}: {
  files: FileChange[]
  selectedIndex: number | null
  focused: boolean
  indent: string
  theme: ThemePalette
}) {
  const colors: Record<FileChange['status'], string> = {
    added: theme.added,
    deleted: theme.deleted,
    modified: theme.hunk,
    conflicted: theme.conflict
  }
  return (
    <>
      {files.map((file, index) => (
        <Text key={file.path} wrap="truncate">
          <Text color={theme.muted}>{indent}</Text>
          <Text color={colors[file.status]} inverse={focused && index === selectedIndex}>
            {STATUS_MARKERS[file.status]} {file.path}
          </Text>
        </Text>
      ))}
    </>
  )
}

function RowView({
  row,
  width,
  selected,
  marked,
  state,
  theme,
  columns
}: {
  row: GraphRow
  width: number
  selected: boolean
  marked: boolean
  state: AppState
  theme: ThemePalette
  columns: number
}) {
  const lanes = renderNodeLanes(row.visual, width, nodeGlyph(row, marked))
  const connector = renderConnectorLanes(row.visual, width)
  const nodeColor = row.isWorkingCopy
    ? theme.workingCopy
    : row.hasConflict
      ? theme.conflict
      : laneColor(theme.lanes, row.visual.column)
  const subject = row.description.split('\n')[0] || '(no description set)'
  const room = Math.max(0, columns - lanes.length - 40)

  return (
    <Box flexDirection="column">
      <Text wrap="truncate" backgroundColor={selected ? theme.selection : undefined}>
        <Text color={nodeColor}>{lanes}</Text>
        <Text color={theme.accent} bold>
          {row.changeIdShort}
        </Text>{' '}
        <Text color={theme.muted}>{row.commitIdShort}</Text>{' '}
        {row.bookmarks.length > 0 && (
          <Text color={theme.bookmark}>{row.bookmarks.join(' ')} </Text>
        )}
        <Text color={row.isImmutable ? theme.immutable : theme.text}>
          {truncate(subject, room)}
        </Text>
        <Text color={theme.muted}>
          {' '}
          {row.author} {row.timestamp}
        </Text>
      </Text>
      {selected && state.showDiffs && row.changedFiles.length > 0 && (
        <FileList
          files={row.changedFiles}
          selectedIndex={state.selectedFileIndex}
          focused={state.focusedPanel === 'diff'}
          indent={connector}
          theme={theme}
        />
      )}
      <Text color={theme.muted}>{connector}</Text>
    </Box>
  )
}

export function RevisionGraph({
  state,
  theme,
  height,
  columns
}: {
  state: AppState
  theme: ThemePalette
  height: number
  columns: number
}): React.JSX.Element {
  const graph = state.repo?.graph ?? []
  if (graph.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color={theme.muted}>
          {state.mode === 'loading' ? 'Loading revisions...' : 'No revisions match.'}
        </Text>
      </Box>
    )
  }

  const capacity = Math.max(1, Math.floor(height / 2))
  const start = windowStart(graph.length, state.selectedIndex, capacity)
  const visible = graph.slice(start, start + capacity)
  const width = graphWidth(graph)

  return (
    <Box flexDirection="column" height={height} overflow="hidden">
      {visible.map((row, offset) => (
        <RowView
          key={row.commitId}
          row={row}
          width={width}
          selected={start + offset === state.selectedIndex}
          marked={isMarked(state, row.commitId)}
          state={state}
          theme={theme}
          columns={columns}
        />
      ))}
      {state.isLoadingMore && <Text color={theme.muted}>Loading more...</Text>}
    </Box>
  )
}
