import type { Action, AppState } from '@shared/types'
import { PRESET_FILTERS } from '../../domain/revsets'
import { MAX_RECENT_FILTERS } from '../../shared/constants'
import { restingMode } from '../selectors'
import { reloadCommand } from '../transitions'
import { handled, NOT_HANDLED, type UpdateResult } from './types'

export function updateFilter(state: AppState, action: Action): UpdateResult {
  switch (action.kind) {
    case 'enterFilterMode':
      state.mode = 'filter-input'
      state.textInput = state.revsetFilter ?? ''
      state.filterCursor = null
      state.filterSource = state.recentFilters.length > 0 ? 'recent' : 'preset'
      return handled()

    case 'applyFilter': {
      const filter = action.filter.trim()
      closeFilterInput(state)

      if (!filter) {
        state.revsetFilter = null
      } else {
        state.revsetFilter = filter
        state.recentFilters = [
          filter,
          ...state.recentFilters.filter((recent) => recent !== filter)
        ].slice(0, MAX_RECENT_FILTERS)
      }
      return handled(reloadCommand(state))
    }

    case 'clearFilter':
      closeFilterInput(state)
      state.revsetFilter = null
      return handled(reloadCommand(state))

    case 'quickFilter':
      closeFilterInput(state)
      state.revsetFilter = action.revset
      return handled(reloadCommand(state))

    case 'filterNext':
      cycleFilter(state, 1)
      return handled()

    case 'filterPrev':
      cycleFilter(state, -1)
      return handled()

    case 'toggleFilterSource':
      state.filterSource = state.filterSource === 'recent' ? 'preset' : 'recent'
      state.filterCursor = null
      return handled()

    default:
      return NOT_HANDLED
  }
}

export function filterSuggestions(state: AppState): readonly string[] {
  return state.filterSource === 'recent' ? state.recentFilters : PRESET_FILTERS
}

function cycleFilter(state: AppState, delta: number): void {
  const list = filterSuggestions(state)
  if (list.length === 0) return

  const cursor =
    state.filterCursor === null
      ? delta > 0
        ? 0
        : list.length - 1
      : (((state.filterCursor + delta) % list.length) + list.length) % list.length

  state.filterCursor = cursor
  state.textInput = list[cursor] ?? ''
}

function closeFilterInput(state: AppState): void {
  if (state.mode === 'filter-input') {
    state.mode = restingMode(state)
  }
  state.textInput = ''
  state.filterCursor = null
}
