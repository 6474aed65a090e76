import type { Action, AppState, CommitId, ContextMenuItem, ScrollViewState } from '@shared/types'
import { THEME_NAMES } from '@shared/theme'
import { searchCommands } from '../../domain/CommandPalette'
import { restingMode } from '../selectors'
import { clearOverlays } from '../transitions'
import { handled, NOT_HANDLED, type UpdateResult } from './types'

export function updateUi(state: AppState, action: Action): UpdateResult {
  switch (action.kind) {
    case 'enterCommandMode':
      clearOverlays(state)
      state.commandPalette = { query: '', matches: searchCommands(''), selectedIndex: 0 }
      state.mode = 'command-palette'
      return handled()

    case 'cancelMode':
      clearOverlays(state)
      state.lastError = null
      state.focusedPanel = 'graph'
      state.mode = state.repo ? 'normal' : 'no-repo'
      return handled()

    case 'dismissError':
      state.lastError = null
      return handled()

    case 'toggleHelp':
      state.mode = state.mode === 'help' ? restingMode(state) : 'help'
      return handled()

    case 'enterThemeSelection':
      clearOverlays(state)
      state.themeSelectionIndex = Math.max(0, THEME_NAMES.indexOf(state.themeName))
      state.mode = 'theme-selection'
      return handled()

    case 'selectThemeNext':
      state.themeSelectionIndex = wrap((state.themeSelectionIndex ?? 0) + 1, THEME_NAMES.length)
      return handled()

    case 'selectThemePrev':
      state.themeSelectionIndex = wrap((state.themeSelectionIndex ?? 0) - 1, THEME_NAMES.length)
      return handled()

    case 'switchTheme':
      if (THEME_NAMES.includes(action.theme)) {
        state.themeName = action.theme
      }
      state.themeSelectionIndex = null
      if (state.mode === 'theme-selection') state.mode = restingMode(state)
      return handled()

    case 'commandPaletteNext':
    case 'commandPalettePrev': {
      const palette = state.commandPalette
      if (!palette || palette.matches.length === 0) return handled()
      const delta = action.kind === 'commandPaletteNext' ? 1 : -1
      palette.selectedIndex = wrap(palette.selectedIndex + delta, palette.matches.length)
      return handled()
    }

    case 'openContextMenu':
      clearOverlays(state)
      state.contextMenu = {
        commitId: action.commitId,
        x: action.x,
        y: action.y,
        items: revisionMenuItems(action.commitId),
        selectedIndex: 0
      }
      state.mode = 'context-menu'
      return handled()

    case 'selectContextMenuNext':
    case 'selectContextMenuPrev': {
      const menu = state.contextMenu
      if (!menu || menu.items.length === 0) return handled()
      const delta = action.kind === 'selectContextMenuNext' ? 1 : -1
      menu.selectedIndex = wrap(menu.selectedIndex + delta, menu.items.length)
      return handled()
    }

    case 'closeContextMenu':
      state.contextMenu = null
      if (state.mode === 'context-menu') state.mode = restingMode(state)
      return handled()

    case 'inputInsert': {
      const palette = state.commandPalette
      if (state.mode === 'command-palette' && palette) {
        setPaletteQuery(state, palette.query + action.text)
        return handled()
      }
      state.textInput += action.text
      state.filterCursor = null
      return handled()
    }

    case 'inputBackspace': {
      const palette = state.commandPalette
      if (state.mode === 'command-palette' && palette) {
        setPaletteQuery(state, dropLastChar(palette.query))
        return handled()
      }
      state.textInput = dropLastChar(state.textInput)
      state.filterCursor = null
      return handled()
    }

    case 'closeEvolog':
      state.evolog = null
      if (state.mode === 'evolog') state.mode = restingMode(state)
      return handled()

    case 'scrollEvologUp':
      scrollView(state.evolog, -action.amount)
      return handled()

    case 'scrollEvologDown':
      scrollView(state.evolog, action.amount)
      return handled()

    case 'closeOperationLog':
      state.operationLog = null
      if (state.mode === 'operation-log') state.mode = restingMode(state)
      return handled()

    case 'scrollOperationLogUp':
      scrollView(state.operationLog, -action.amount)
      return handled()

    case 'scrollOperationLogDown':
      scrollView(state.operationLog, action.amount)
      return handled()

    default:
      return NOT_HANDLED
  }
}

export function revisionMenuItems(commitId: CommitId): ContextMenuItem[] {
  return [
    { label: 'Edit', action: { kind: 'editRevision', commitId } },
    { label: 'New Child', action: { kind: 'newRevision', commitId } },
    { label: 'Abandon', action: { kind: 'abandonRevision', commitId } },
    { label: 'Duplicate', action: { kind: 'duplicateRevision', commitId } },
    { label: 'Squash', action: { kind: 'enterSquashMode' } },
    { label: 'Evolog', action: { kind: 'evologRevision', commitId } }
  ]
}

function setPaletteQuery(state: AppState, query: string): void {
  state.commandPalette = { query, matches: searchCommands(query), selectedIndex: 0 }
}

function scrollView(view: ScrollViewState | null, delta: number): void {
  if (!view) return
  const max = Math.max(0, view.lines.length - 1)
  view.scroll = Math.min(Math.max(0, view.scroll + delta), max)
}

function dropLastChar(text: string): string {
  return Array.from(text).slice(0, -1).join('')
}

function wrap(index: number, length: number): number {
  if (length === 0) return 0
  return ((index % length) + length) % length
}
