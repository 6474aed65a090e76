import { describe, expect, it } from 'vitest'
import { createLoadedState } from '../../__tests__/test-utils'
import { createAppState } from '../create-app-state'
import { update } from '../reducer'

describe('updateUi', () => {
  describe('command palette', () => {
    it('opens with every command listed', () => {
      const state = createLoadedState()

      update(state, { kind: 'enterCommandMode' })

      expect(state.mode).toBe('command-palette')
      expect(state.commandPalette?.matches[0]?.name).toBe('Snapshot')
      expect(state.commandPalette?.selectedIndex).toBe(0)
    })

    it('narrows matches as the query is typed and resets the cursor', () => {
      const state = createLoadedState()
      update(state, { kind: 'enterCommandMode' })
      update(state, { kind: 'commandPaletteNext' })

      update(state, { kind: 'inputInsert', text: 'undo' })

      expect(state.commandPalette?.query).toBe('undo')
      expect(state.commandPalette?.matches.map((m) => m.name)).toEqual(['Undo'])
      expect(state.commandPalette?.selectedIndex).toBe(0)

      update(state, { kind: 'inputBackspace' })
      expect(state.commandPalette?.query).toBe('und')
    })

    it('wraps the cursor around the matches', () => {
      const state = createLoadedState()
      update(state, { kind: 'enterCommandMode' })
      update(state, { kind: 'inputInsert', text: 'remote' })

      update(state, { kind: 'commandPalettePrev' })
      expect(state.commandPalette?.selectedIndex).toBe(1)
      update(state, { kind: 'commandPaletteNext' })
      expect(state.commandPalette?.selectedIndex).toBe(0)
    })

    it('runs the selected command through the reducer', () => {
      const state = createLoadedState()
      update(state, { kind: 'enterCommandMode' })
      update(state, { kind: 'inputInsert', text: 'fetch' })

      const command = update(state, { kind: 'commandPaletteSelect' })

      expect(command).toEqual({ kind: 'fetch' })
      expect(state.commandPalette).toBeNull()
      expect(state.mode).toBe('normal')
    })
  })

  describe('cancel', () => {
    it('returns to normal and clears every overlay', () => {
      const state = createLoadedState()
      update(state, { kind: 'enterCommandMode' })
      state.lastError = { message: 'x', severity: 'error', suggestions: [], timestampMs: 0 }
      state.rebaseSources = ['c1']

      update(state, { kind: 'cancelMode' })

      expect(state.mode).toBe('normal')
      expect(state.commandPalette).toBeNull()
      expect(state.lastError).toBeNull()
      expect(state.rebaseSources).toEqual([])
    })

    it('dismisses the error without leaving the diff panel', () => {
      const state = createLoadedState()
      state.mode = 'diff'
      state.focusedPanel = 'diff'
      state.lastError = { message: 'x', severity: 'error', suggestions: [], timestampMs: 0 }

      update(state, { kind: 'dismissError' })

      expect(state.lastError).toBeNull()
      expect(state.mode).toBe('diff')
      expect(state.focusedPanel).toBe('diff')
    })

    it('returns to no-repo when nothing is loaded', () => {
      const state = createAppState()
      update(state, { kind: 'toggleHelp' })

      update(state, { kind: 'cancelMode' })

      expect(state.mode).toBe('no-repo')
    })
  })

  describe('themes', () => {
    it('cycles themes and applies the highlighted one', () => {
      const state = createLoadedState()

      update(state, { kind: 'enterThemeSelection' })
      expect(state.mode).toBe('theme-selection')
      expect(state.themeSelectionIndex).toBe(0)

      update(state, { kind: 'selectThemeNext' })
      update(state, { kind: 'commandPaletteSelect' })

      expect(state.themeName).toBe('light')
      expect(state.mode).toBe('normal')
    })

    it('wraps backwards to the last theme', () => {
      const state = createLoadedState()
      update(state, { kind: 'enterThemeSelection' })

      update(state, { kind: 'selectThemePrev' })

      expect(state.themeSelectionIndex).toBe(3)
    })

    it('ignores unknown theme names', () => {
      const state = createLoadedState()
      update(state, { kind: 'switchTheme', theme: 'neon' })
      expect(state.themeName).toBe('default')
    })
  })

  describe('context menu', () => {
    it('lists the revision actions for the commit', () => {
      const state = createLoadedState()

      update(state, { kind: 'openContextMenu', commitId: 'c1', x: 4, y: 2 })

      expect(state.mode).toBe('context-menu')
      expect(state.contextMenu?.items.map((item) => item.label)).toEqual([
        'Edit',
        'New Child',
        'Abandon',
        'Duplicate',
        'Squash',
        'Evolog'
      ])
    })

    it('runs the chosen entry against the menu commit', () => {
      const state = createLoadedState()
      update(state, { kind: 'openContextMenu', commitId: 'c1', x: 0, y: 0 })

      update(state, { kind: 'selectContextMenuPrev' })
      const command = update(state, { kind: 'selectContextMenuAction' })

      expect(command).toEqual({ kind: 'evolog', commitId: 'c1' })
      expect(state.contextMenu).toBeNull()
    })

    it('closes without running anything', () => {
      const state = createLoadedState()
      update(state, { kind: 'openContextMenu', commitId: 'c1', x: 0, y: 0 })

      expect(update(state, { kind: 'closeContextMenu' })).toBeUndefined()
      expect(state.mode).toBe('normal')
    })
  })

  describe('scroll views', () => {
    it('clamps evolog scrolling to its lines', () => {
      const state = createLoadedState()
      update(state, { kind: 'openEvolog', content: 'a\nb\nc' })

      update(state, { kind: 'scrollEvologDown', amount: 10 })
      expect(state.evolog?.scroll).toBe(2)
      update(state, { kind: 'scrollEvologUp', amount: 1 })
      expect(state.evolog?.scroll).toBe(1)

      update(state, { kind: 'closeEvolog' })
      expect(state.evolog).toBeNull()
      expect(state.mode).toBe('normal')
    })

    it('clamps operation log scrolling at the top', () => {
      const state = createLoadedState()
      update(state, { kind: 'openOperationLog', content: 'op 1\nop 2' })
      expect(state.mode).toBe('operation-log')

      update(state, { kind: 'scrollOperationLogUp', amount: 3 })
      expect(state.operationLog?.scroll).toBe(0)

      update(state, { kind: 'closeOperationLog' })
      expect(state.mode).toBe('normal')
    })
  })
})
