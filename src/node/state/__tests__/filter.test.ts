import { describe, expect, it } from 'vitest'
import { createLoadedState } from '../../__tests__/test-utils'
import { PRESET_FILTERS } from '../../domain/revsets'
import { update } from '../reducer'

describe('updateFilter', () => {
  it('prefills the input with the active revset', () => {
    const state = createLoadedState()
    state.revsetFilter = 'mine()'

    update(state, { kind: 'enterFilterMode' })

    expect(state.mode).toBe('filter-input')
    expect(state.textInput).toBe('mine()')
  })

  it('applies a trimmed filter and reloads with it', () => {
    const state = createLoadedState()
    update(state, { kind: 'enterFilterMode' })

    const command = update(state, { kind: 'applyFilter', filter: '  trunk()  ' })

    expect(command).toEqual({ kind: 'loadRepo', limit: 100, revset: 'trunk()' })
    expect(state.revsetFilter).toBe('trunk()')
    expect(state.recentFilters).toEqual(['trunk()'])
    expect(state.mode).toBe('normal')
  })

  it('clears the filter when the input is blank', () => {
    const state = createLoadedState()
    state.revsetFilter = 'mine()'

    const command = update(state, { kind: 'applyFilter', filter: '   ' })

    expect(command).toEqual({ kind: 'loadRepo', limit: 100 })
    expect(state.revsetFilter).toBeNull()
    expect(state.recentFilters).toEqual([])
  })

  it('keeps the ten most recent filters without duplicates', () => {
    const state = createLoadedState()

    for (let i = 0; i < 11; i++) {
      update(state, { kind: 'applyFilter', filter: `f${i}` })
    }

    expect(state.recentFilters).toHaveLength(10)
    expect(state.recentFilters[0]).toBe('f10')
    expect(state.recentFilters[9]).toBe('f1')

    update(state, { kind: 'applyFilter', filter: 'f5' })

    expect(state.recentFilters).toHaveLength(10)
    expect(state.recentFilters.slice(0, 3)).toEqual(['f5', 'f10', 'f9'])
    expect(state.recentFilters.filter((f) => f === 'f5')).toHaveLength(1)
  })

  it('applies quick filters without recording them', () => {
    const state = createLoadedState()

    expect(update(state, { kind: 'quickFilter', revset: 'conflicts()' })).toEqual({
      kind: 'loadRepo',
      limit: 100,
      revset: 'conflicts()'
    })
    expect(state.recentFilters).toEqual([])

    expect(update(state, { kind: 'clearFilter' })).toEqual({ kind: 'loadRepo', limit: 100 })
    expect(state.revsetFilter).toBeNull()
  })

  it('cycles recent filters into the input', () => {
    const state = createLoadedState(undefined, { recentFilters: ['a()', 'b()'] })
    update(state, { kind: 'enterFilterMode' })
    expect(state.filterSource).toBe('recent')

    update(state, { kind: 'filterNext' })
    expect(state.textInput).toBe('a()')
    update(state, { kind: 'filterNext' })
    expect(state.textInput).toBe('b()')
    update(state, { kind: 'filterNext' })
    expect(state.textInput).toBe('a()')
    update(state, { kind: 'filterPrev' })
    expect(state.textInput).toBe('b()')
  })

  it('falls back to presets and can switch lists', () => {
    const state = createLoadedState()
    update(state, { kind: 'enterFilterMode' })
    expect(state.filterSource).toBe('preset')

    update(state, { kind: 'filterPrev' })
    expect(state.textInput).toBe(PRESET_FILTERS[PRESET_FILTERS.length - 1])

    update(state, { kind: 'toggleFilterSource' })
    expect(state.filterSource).toBe('recent')
    update(state, { kind: 'filterNext' })
    expect(state.textInput).toBe(PRESET_FILTERS[PRESET_FILTERS.length - 1])
  })

  it('submits the typed filter from the input', () => {
    const state = createLoadedState()
    update(state, { kind: 'enterFilterMode' })
    update(state, { kind: 'inputInsert', text: 'mine(' })
    update(state, { kind: 'inputInsert', text: ')' })

    expect(update(state, { kind: 'submitInput' })).toEqual({
      kind: 'loadRepo',
      limit: 100,
      revset: 'mine()'
    })
  })
})
