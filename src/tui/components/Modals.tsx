import { THEME_NAMES, type ThemePalette } from '@shared/theme'
import type { AppMode, AppState, ErrorState, ScrollViewState } from '@shared/types'
import { Box, Text } from 'ink'
import React from 'react'
import { filterSuggestions } from '../../node/state/features/filter'
import { helpSections } from '../utils/keymap'
import { truncate } from '../utils/viewport'

type ModalProps = {
  state: AppState
  theme: ThemePalette
  width: number
  height: number
}

function Frame({
  title,
  theme,
  width,
  children
}: {
  title: string
  theme: ThemePalette
  width: number
  children: React.ReactNode
}) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={theme.accent} width={width}>
      <Text bold color={theme.accent}>
        {title}
      </Text>
      {children}
    </Box>
  )
}

// ============================================================================
// Errors
// ============================================================================

const SEVERITY_LABELS: Record<ErrorState['severity'], string> = {
  info: 'Info',
  warning: 'Warning',
  error: 'Error',
  critical: 'Critical'
}

export function ErrorPanel({
  error,
  theme
}: {
  error: ErrorState
  theme: ThemePalette
}): React.JSX.Element {
  const color = error.severity === 'info' ? theme.accent : theme.error
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={color} paddingX={1}>
      <Text color={color} bold>
        {SEVERITY_LABELS[error.severity]}: {error.message}
      </Text>
      {error.suggestions.map((suggestion) => (
        <Text key={suggestion} color={theme.muted}>
          • {suggestion}
        </Text>
      ))}
      <Text color={theme.muted}>Esc to dismiss</Text>
    </Box>
  )
}

// ============================================================================
// Command palette and context menu
// ============================================================================

function CommandPalette({ state, theme, width }: ModalProps) {
  const palette = state.commandPalette
  if (!palette) return null

  return (
    <Frame title="Commands" theme={theme} width={width}>
      <Text color={theme.text}>
        : {palette.query}
        <Text inverse> </Text>
      </Text>
      {palette.matches.length === 0 && <Text color={theme.muted}>No matching commands</Text>}
      {palette.matches.map((command, index) => {
        const selected = index === palette.selectedIndex
        return (
          <Text key={command.name} inverse={selected} wrap="truncate">
            <Text color={selected ? undefined : theme.text}>{command.name.padEnd(18)}</Text>
            <Text color={selected ? undefined : theme.muted}>{command.description}</Text>
          </Text>
        )
      })}
    </Frame>
  )
}

function ContextMenu({ state, theme }: ModalProps) {
  const menu = state.contextMenu
  if (!menu) return null

  const label = state.repo?.graph.find((row) => row.commitId === menu.commitId)?.changeIdShort
  return (
    <Frame title={`Actions for ${label ?? menu.commitId.slice(0, 8)}`} theme={theme} width={36}>
      {menu.items.map((item, index) => (
        <Text key={item.label} inverse={index === menu.selectedIndex} color={theme.text}>
          {item.label}
        </Text>
      ))}
    </Frame>
  )
}

// ============================================================================
// Text input
// ============================================================================

const INPUT_TITLES: Partial<Record<AppMode, string>> = {
  input: 'Describe revision',
  'commit-input': 'Commit working copy',
  'bookmark-input': 'Bookmark name',
  'filter-input': 'Revset filter'
}

function TextInput({ state, theme, width }: ModalProps) {
  const title = INPUT_TITLES[state.mode] ?? 'Input'
  return (
    <Frame title={title} theme={theme} width={width}>
      <Text color={theme.text}>
        {state.textInput}
        <Text inverse> </Text>
      </Text>
      {state.mode === 'filter-input' && <FilterSuggestions state={state} theme={theme} />}
      <Text color={theme.muted}>Enter to confirm, Esc to cancel</Text>
    </Frame>
  )
}

function FilterSuggestions({ state, theme }: { state: AppState; theme: ThemePalette }) {
  const suggestions = filterSuggestions(state)
  const source = state.filterSource === 'recent' ? 'Recent' : 'Presets'

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={theme.muted}>{source} (Tab to switch, ↑/↓ to pick)</Text>
      {suggestions.length === 0 && <Text color={theme.muted}>Nothing yet</Text>}
      {suggestions.map((suggestion, index) => (
        <Text
          key={suggestion}
          color={theme.bookmark}
          inverse={index === state.filterCursor}
          wrap="truncate"
        >
          {suggestion}
        </Text>
      ))}
    </Box>
  )
}

// ============================================================================
// Help and theme selection
// ============================================================================

function Help({ theme, width }: ModalProps) {
  return (
    <Frame title="Keybindings" theme={theme} width={width}>
      <Box flexWrap="wrap" columnGap={4}>
        {helpSections().map((section) => (
          <Box key={section.title} flexDirection="column" marginBottom={1}>
            <Text bold color={theme.text}>
              {section.title}
            </Text>
            {section.entries.map((entry) => (
              <Text key={entry.description}>
                <Text color={theme.accent}>{entry.keys.padEnd(10)}</Text>
                <Text color={theme.muted}>{entry.description}</Text>
              </Text>
            ))}
          </Box>
        ))}
      </Box>
    </Frame>
  )
}

function ThemeSelection({ state, theme }: ModalProps) {
  return (
    <Frame title="Theme" theme={theme} width={30}>
      {THEME_NAMES.map((name, index) => (
        <Text key={name} inverse={index === state.themeSelectionIndex} color={theme.text}>
          {name === state.themeName ? '● ' : '  '}
          {name}
        </Text>
      ))}
    </Frame>
  )
}

// ============================================================================
// Scroll views
// ============================================================================

function ScrollView({
  title,
  view,
  theme,
  width,
  height
}: {
  title: string
  view: ScrollViewState
  theme: ThemePalette
  width: number
  height: number
}) {
  const capacity = Math.max(1, height - 3)
  const visible = view.lines.slice(view.scroll, view.scroll + capacity)
  return (
    <Frame
      title={`${title} (${Math.min(view.scroll + 1, view.lines.length)}/${view.lines.length})`}
      theme={theme}
      width={width}
    >
      {visible.map((line, index) => (
        <Text key={view.scroll + index} color={theme.text}>
          {truncate(line, width - 4) || ' '}
        </Text>
      ))}
    </Frame>
  )
}

const MODAL_MODES: ReadonlySet<AppMode> = new Set<AppMode>([
  'command-palette',
  'context-menu',
  'input',
  'commit-input',
  'bookmark-input',
  'filter-input',
  'help',
  'theme-selection',
  'evolog',
  'operation-log'
])

export function hasModal(mode: AppMode): boolean {
  return MODAL_MODES.has(mode)
}

/** The overlay for the current mode, if it has one. */
export function Modal(props: ModalProps): React.JSX.Element | null {
  const { state, theme, width, height } = props

  switch (state.mode) {
    case 'command-palette':
      return <CommandPalette {...props} />
    case 'context-menu':
      return <ContextMenu {...props} />
    case 'input':
    case 'commit-input':
    case 'bookmark-input':
    case 'filter-input':
      return <TextInput {...props} />
    case 'help':
      return <Help {...props} />
    case 'theme-selection':
      return <ThemeSelection {...props} />
    case 'evolog':
      return state.evolog ? (
        <ScrollView
          title="Evolution log"
          view={state.evolog}
          theme={theme}
          width={width}
          height={height}
        />
      ) : null
    case 'operation-log':
      return state.operationLog ? (
        <ScrollView
          title="Operation log"
          view={state.operationLog}
          theme={theme}
          width={width}
          height={height}
        />
      ) : null
    default:
      return null
  }
}
