/**
 * Keymap
 *
 * Resolves a key press into an action according to the current mode. Pure:
 * the App component dispatches whatever this returns.
 */

import type { Action, AppMode, AppState, FileChange } from '@shared/types'
import type { Key } from 'ink'
import { QUICK_FILTERS } from '../../node/domain/revsets'
import { selectedRow } from '../../node/state/selectors'

export type KeyPress = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'pageUp'
  | 'pageDown'
  | 'return'
  | 'escape'
  | 'ctrl'
  | 'shift'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'meta'
>

export type HelpSection = 'Navigation' | 'Operations' | 'Filtering' | 'General'

type Binding = {
  keys: string[]
  action: Action
  description: string
  section: HelpSection
}

type BindingRow = [keys: string[], action: Action, description: string]

const PAGE = 10

function section(title: HelpSection, rows: BindingRow[]): Binding[] {
  return rows.map(([keys, action, description]) => ({ keys, action, description, section: title }))
}

const NORMAL_BINDINGS: Binding[] = [
  ...section('Navigation', [
    [['j', 'down'], { kind: 'selectNext' }, 'Select next revision'],
    [['k', 'up'], { kind: 'selectPrev' }, 'Select previous revision'],
    [['enter'], { kind: 'toggleDiffs' }, 'Toggle diff panel'],
    [['tab', 'l'], { kind: 'focusDiff' }, 'Focus diff panel'],
    [['h'], { kind: 'focusGraph' }, 'Focus revision graph'],
    [['pagedown'], { kind: 'scrollDiffDown', amount: PAGE }, 'Scroll diff down'],
    [['pageup'], { kind: 'scrollDiffUp', amount: PAGE }, 'Scroll diff up'],
    [[']'], { kind: 'nextHunk' }, 'Next hunk'],
    [['['], { kind: 'prevHunk' }, 'Previous hunk'],
    [['space'], { kind: 'toggleMark' }, 'Mark revision'],
    [['M'], { kind: 'clearMarks' }, 'Clear marks']
  ]),
  ...section('Operations', [
    [['s'], { kind: 'snapshotWorkingCopy' }, 'Snapshot working copy'],
    [['e'], { kind: 'editRevision' }, 'Edit selected revision'],
    [['n'], { kind: 'newRevision' }, 'Create new child revision'],
    [['d'], { kind: 'describeRevisionIntent' }, 'Describe revision'],
    [['w'], { kind: 'commitWorkingCopyIntent' }, 'Commit working copy'],
    [['a'], { kind: 'abandonRevision' }, 'Abandon revision'],
    [['S'], { kind: 'squashRevision' }, 'Squash into parent'],
    [['x'], { kind: 'enterSquashMode' }, 'Squash into chosen revision'],
    [['r'], { kind: 'rebaseRevisionIntent' }, 'Rebase onto chosen revision'],
    [['D'], { kind: 'duplicateRevision' }, 'Duplicate revision'],
    [['R'], { kind: 'revertRevision' }, 'Revert revision'],
    [['P'], { kind: 'parallelizeRevision' }, 'Parallelize marked revisions'],
    [['A'], { kind: 'absorb' }, 'Absorb working copy changes'],
    [['b'], { kind: 'setBookmarkIntent' }, 'Set bookmark'],
    [['B'], { kind: 'deleteBookmarkIntent' }, 'Delete bookmark'],
    [['u'], { kind: 'undo' }, 'Undo'],
    [['U'], { kind: 'redo' }, 'Redo'],
    [['f'], { kind: 'fetch' }, 'Fetch'],
    [['p'], { kind: 'pushIntent' }, 'Push'],
    [['v'], { kind: 'evologRevision' }, 'Show evolution log'],
    [['o'], { kind: 'showOperationLog' }, 'Show operation log']
  ]),
  ...section('Filtering', [
    [['/'], { kind: 'enterFilterMode' }, 'Custom revset filter'],
    [['m'], { kind: 'quickFilter', revset: QUICK_FILTERS.mine }, `Filter: ${QUICK_FILTERS.mine}`],
    [['t'], { kind: 'quickFilter', revset: QUICK_FILTERS.trunk }, `Filter: ${QUICK_FILTERS.trunk}`],
    [
      ['c'],
      { kind: 'quickFilter', revset: QUICK_FILTERS.conflicts },
      `Filter: ${QUICK_FILTERS.conflicts}`
    ],
    [['C'], { kind: 'clearFilter' }, 'Clear active filter']
  ]),
  ...section('General', [
    [[':'], { kind: 'enterCommandMode' }, 'Command palette'],
    [['T'], { kind: 'enterThemeSelection' }, 'Choose theme'],
    [['?'], { kind: 'toggleHelp' }, 'Show this help'],
    [['esc'], { kind: 'cancelMode' }, 'Close modal / Clear errors'],
    [['q'], { kind: 'quit' }, 'Quit']
  ])
]

const DIFF_BINDINGS: Binding[] = section('Navigation', [
  [['j', 'down'], { kind: 'selectNextFile' }, 'Next file'],
  [['k', 'up'], { kind: 'selectPrevFile' }, 'Previous file'],
  [['h', 'tab'], { kind: 'focusGraph' }, 'Back to graph']
])

const NO_REPO_BINDINGS: Binding[] = section('General', [
  [['i'], { kind: 'initRepo' }, 'Initialize repository'],
  [[':'], { kind: 'enterCommandMode' }, 'Command palette'],
  [['?'], { kind: 'toggleHelp' }, 'Show this help'],
  [['esc'], { kind: 'cancelMode' }, 'Clear errors'],
  [['q'], { kind: 'quit' }, 'Quit']
])

type ListActions = { next: Action; prev: Action; confirm: Action }

const THEME_LIST: ListActions = {
  next: { kind: 'selectThemeNext' },
  prev: { kind: 'selectThemePrev' },
  confirm: { kind: 'submitInput' }
}

const CONTEXT_MENU_LIST: ListActions = {
  next: { kind: 'selectContextMenuNext' },
  prev: { kind: 'selectContextMenuPrev' },
  confirm: { kind: 'selectContextMenuAction' }
}

const TARGET_LIST: ListActions = {
  next: { kind: 'selectNext' },
  prev: { kind: 'selectPrev' },
  confirm: { kind: 'confirmTarget' }
}

function lookup(bindings: Binding[], token: string): Action | null {
  return bindings.find((binding) => binding.keys.includes(token))?.action ?? null
}

/** Normalized name of a key press: `up`, `enter`, `ctrl+c`, `space`, or the typed character. */
export function keyToken(input: string, key: KeyPress): string {
  if (key.upArrow) return 'up'
  if (key.downArrow) return 'down'
  if (key.leftArrow) return 'left'
  if (key.rightArrow) return 'right'
  if (key.pageUp) return 'pageup'
  if (key.pageDown) return 'pagedown'
  if (key.return) return 'enter'
  if (key.escape) return 'esc'
  if (key.tab) return key.shift ? 'shift+tab' : 'tab'
  // Most terminals send DEL for backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete) return 'backspace'
  if (key.ctrl) return `ctrl+${input}`
  if (input === ' ') return 'space'
  return input
}

export function resolveKey(state: AppState, input: string, key: KeyPress): Action | null {
  const token = keyToken(input, key)
  if (token === 'ctrl+c') return { kind: 'quit' }
  if (token === 'esc' && state.lastError && ERROR_DISMISS_MODES.has(state.mode)) {
    return { kind: 'dismissError' }
  }

  switch (state.mode) {
    case 'input':
    case 'commit-input':
    case 'bookmark-input':
      return textEntry(token, input, key)

    case 'filter-input':
      if (token === 'down') return { kind: 'filterNext' }
      if (token === 'up') return { kind: 'filterPrev' }
      if (token === 'tab') return { kind: 'toggleFilterSource' }
      return textEntry(token, input, key)

    case 'command-palette':
      if (token === 'down' || token === 'ctrl+n') return { kind: 'commandPaletteNext' }
      if (token === 'up' || token === 'ctrl+p') return { kind: 'commandPalettePrev' }
      return textEntry(token, input, key)

    case 'theme-selection':
      if (token === 'esc') return { kind: 'cancelMode' }
      return listKey(token, THEME_LIST)

    case 'context-menu':
      if (token === 'esc' || token === 'q') return { kind: 'closeContextMenu' }
      return listKey(token, CONTEXT_MENU_LIST)

    case 'squash-select':
    case 'rebase-select':
      if (token === 'esc') return { kind: 'cancelMode' }
      return listKey(token, TARGET_LIST)

    case 'help':
      return token === 'esc' || token === 'q' || token === '?' ? { kind: 'toggleHelp' } : null

    case 'evolog':
      return scrollViewKey(token, 'evolog')

    case 'operation-log':
      return scrollViewKey(token, 'operationLog')

    case 'diff':
      return diffKey(state, token) ?? lookup(DIFF_BINDINGS, token) ?? normalKey(state, token)

    case 'no-repo':
      return lookup(NO_REPO_BINDINGS, token)

    case 'normal':
    case 'loading':
      return normalKey(state, token)
  }
}

const CONTEXT_MENU_KEY = '.'

/** Modes where the error panel is the only thing Esc could close. */
const ERROR_DISMISS_MODES: ReadonlySet<AppMode> = new Set<AppMode>([
  'normal',
  'diff',
  'loading',
  'no-repo'
])

const RESOLVE_KEYS = ['enter', 'm']
const NEXT_CONFLICT_KEY = 'c'

/** Keys that only mean something for the selected file; null lets the others apply. */
function diffKey(state: AppState, token: string): Action | null {
  const files = selectedRow(state)?.changedFiles ?? []
  const index = state.selectedFileIndex

  if (RESOLVE_KEYS.includes(token)) {
    const file = index === null ? undefined : files[index]
    return file?.status === 'conflicted' ? { kind: 'resolveConflict', path: file.path } : null
  }
  if (token === NEXT_CONFLICT_KEY) {
    const next = nextConflict(files, index)
    return next ? { kind: 'selectFileByPath', path: next.path } : null
  }
  return null
}

/** First conflicted file after `index`, wrapping around. */
function nextConflict(files: FileChange[], index: number | null): FileChange | undefined {
  const start = index === null ? 0 : index + 1
  for (let offset = 0; offset < files.length; offset++) {
    const file = files[(start + offset) % files.length]
    if (file?.status === 'conflicted') return file
  }
  return undefined
}

function normalKey(state: AppState, token: string): Action | null {
  if (token !== CONTEXT_MENU_KEY) return lookup(NORMAL_BINDINGS, token)

  const row = selectedRow(state)
  if (!row) return null
  return { kind: 'openContextMenu', commitId: row.commitId, x: 0, y: state.selectedIndex ?? 0 }
}

function textEntry(token: string, input: string, key: KeyPress): Action | null {
  switch (token) {
    case 'esc':
      return { kind: 'cancelMode' }
    case 'enter':
      return { kind: 'submitInput' }
    case 'backspace':
      return { kind: 'inputBackspace' }
  }
  if (key.ctrl || key.meta) return null

  const text = [...input].filter((char) => char >= ' ' && char !== '\x7f').join('')
  return text ? { kind: 'inputInsert', text } : null
}

function listKey(token: string, list: ListActions): Action | null {
  if (token === 'j' || token === 'down') return list.next
  if (token === 'k' || token === 'up') return list.prev
  if (token === 'enter') return list.confirm
  return null
}

function scrollViewKey(token: string, view: 'evolog' | 'operationLog'): Action | null {
  const evolog = view === 'evolog'
  switch (token) {
    case 'esc':
    case 'q':
      return evolog ? { kind: 'closeEvolog' } : { kind: 'closeOperationLog' }
    case 'j':
    case 'down':
      return evolog
        ? { kind: 'scrollEvologDown', amount: 1 }
        : { kind: 'scrollOperationLogDown', amount: 1 }
    case 'k':
    case 'up':
      return evolog
        ? { kind: 'scrollEvologUp', amount: 1 }
        : { kind: 'scrollOperationLogUp', amount: 1 }
    case 'pagedown':
      return evolog
        ? { kind: 'scrollEvologDown', amount: PAGE }
        : { kind: 'scrollOperationLogDown', amount: PAGE }
    case 'pageup':
      return evolog
        ? { kind: 'scrollEvologUp', amount: PAGE }
        : { kind: 'scrollOperationLogUp', amount: PAGE }
    default:
      return null
  }
}

// ============================================================================
// Help
// ============================================================================

const KEY_LABELS: Record<string, string> = {
  down: '↓',
  up: '↑',
  enter: 'Enter',
  tab: 'Tab',
  esc: 'Esc',
  space: 'Space',
  pagedown: 'PgDn',
  pageup: 'PgUp'
}

export type HelpEntry = { keys: string; description: string }

/** Normal-mode bindings grouped for the help screen, in display order. */
export function helpSections(): { title: HelpSection; entries: HelpEntry[] }[] {
  const order: HelpSection[] = ['Navigation', 'Operations', 'Filtering', 'General']
  return order.map((title) => {
    const entries = NORMAL_BINDINGS.filter((binding) => binding.section === title).map(
      (binding) => ({
        keys: binding.keys.map((k) => KEY_LABELS[k] ?? k).join(' / '),
        description: binding.description
      })
    )
    if (title === 'Navigation') {
      entries.push({ keys: NEXT_CONFLICT_KEY, description: 'Next conflicted file (diff panel)' })
    }
    if (title === 'Operations') {
      entries.push({ keys: CONTEXT_MENU_KEY, description: 'Actions for selected revision' })
      entries.push({
        keys: RESOLVE_KEYS.map((k) => KEY_LABELS[k] ?? k).join(' / '),
        description: 'Resolve conflicted file (diff panel)'
      })
    }
    return { title, entries }
  })
}
