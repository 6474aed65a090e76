import { describe, expect, it } from 'vitest'
import { COMMAND_DEFINITIONS, searchCommands } from '../CommandPalette'

const names = (query: string) => searchCommands(query).map((def) => def.name)

describe('searchCommands', () => {
  it('returns the whole catalogue for an empty query', () => {
    expect(searchCommands('')).toHaveLength(COMMAND_DEFINITIONS.length)
    expect(searchCommands('   ')[0]?.name).toBe('Snapshot')
  })

  it('ranks name matches before description matches', () => {
    expect(names('new')).toEqual(['New Child', 'Commit'])
  })

  it('matches descriptions when no name matches', () => {
    expect(names('remote')).toEqual(['Fetch', 'Push'])
    expect(names('parent')).toEqual(['Squash', 'Duplicate'])
  })

  it('does not list a command twice', () => {
    expect(names('bookmark')).toEqual(['Set Bookmark', 'Delete Bookmark'])
  })

  it('ignores case', () => {
    expect(names('SQUASH')).toEqual(['Squash'])
  })

  it('returns nothing for an unknown query', () => {
    expect(searchCommands('zzz')).toEqual([])
  })

  it('carries the action each command dispatches', () => {
    const [mine] = searchCommands('filter: mine')
    expect(mine?.action).toEqual({ kind: 'quickFilter', revset: 'mine()' })
  })
})
