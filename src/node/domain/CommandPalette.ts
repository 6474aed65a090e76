/**
 * Command Palette
 *
 * The fixed catalogue of named commands and the ranking used when searching it.
 */

import type { CommandDefinition } from '@shared/types'
import { QUICK_FILTERS } from './revsets'

export const COMMAND_DEFINITIONS: readonly CommandDefinition[] = [
  {
    name: 'Snapshot',
    description: 'Snapshot the working copy',
    action: { kind: 'snapshotWorkingCopy' }
  },
  {
    name: 'Describe',
    description: 'Update the revision description',
    action: { kind: 'describeRevisionIntent' }
  },
  { name: 'New Child', description: 'Create a new child revision', action: { kind: 'newRevision' } },
  { name: 'Edit', description: 'Edit the selected revision', action: { kind: 'editRevision' } },
  {
    name: 'Abandon',
    description: 'Abandon the selected revision',
    action: { kind: 'abandonRevision' }
  },
  { name: 'Squash', description: 'Squash revision into parent', action: { kind: 'squashRevision' } },
  {
    name: 'Set Bookmark',
    description: 'Set a bookmark on the selected revision',
    action: { kind: 'setBookmarkIntent' }
  },
  {
    name: 'Delete Bookmark',
    description: 'Delete a bookmark',
    action: { kind: 'deleteBookmarkIntent' }
  },
  { name: 'Undo', description: 'Undo the last operation', action: { kind: 'undo' } },
  { name: 'Redo', description: 'Redo the last operation', action: { kind: 'redo' } },
  { name: 'Fetch', description: 'Fetch from the remote', action: { kind: 'fetch' } },
  { name: 'Push', description: 'Push to the remote', action: { kind: 'pushIntent' } },
  {
    name: 'Filter: Mine',
    description: 'Show only your revisions',
    action: { kind: 'quickFilter', revset: QUICK_FILTERS.mine }
  },
  {
    name: 'Filter: Trunk',
    description: 'Show revisions in the trunk',
    action: { kind: 'quickFilter', revset: QUICK_FILTERS.trunk }
  },
  {
    name: 'Filter: Conflicts',
    description: 'Show revisions with conflicts',
    action: { kind: 'quickFilter', revset: QUICK_FILTERS.conflicts }
  },
  {
    name: 'Filter: Custom',
    description: 'Enter a custom revset filter',
    action: { kind: 'enterFilterMode' }
  },
  { name: 'Toggle Diffs', description: 'Toggle the diff panel', action: { kind: 'toggleDiffs' } },
  { name: 'Help', description: 'Show the help overlay', action: { kind: 'toggleHelp' } },
  {
    name: 'Commit',
    description: 'Describe the working copy and start a new one',
    action: { kind: 'commitWorkingCopyIntent' }
  },
  {
    name: 'Rebase',
    description: 'Move revisions onto another revision',
    action: { kind: 'rebaseRevisionIntent' }
  },
  {
    name: 'Duplicate',
    description: 'Copy revisions onto the same parents',
    action: { kind: 'duplicateRevision' }
  },
  {
    name: 'Parallelize',
    description: 'Make revisions siblings of each other',
    action: { kind: 'parallelizeRevision' }
  },
  {
    name: 'Revert',
    description: 'Apply the reverse of revisions onto the working copy',
    action: { kind: 'revertRevision' }
  },
  {
    name: 'Absorb',
    description: 'Move working copy changes into the revisions that last touched them',
    action: { kind: 'absorb' }
  },
  {
    name: 'Evolog',
    description: 'Show how the selected change evolved',
    action: { kind: 'evologRevision' }
  },
  {
    name: 'Operation Log',
    description: 'Show the repository operation history',
    action: { kind: 'showOperationLog' }
  },
  { name: 'Theme', description: 'Choose a color theme', action: { kind: 'enterThemeSelection' } },
  { name: 'Quit', description: 'Quit treeline', action: { kind: 'quit' } }
]

/**
 * Case-insensitive search. Name hits rank before description-only hits; each
 * group keeps catalogue order. An empty query returns the whole catalogue.
 */
export function searchCommands(
  query: string,
  definitions: readonly CommandDefinition[] = COMMAND_DEFINITIONS
): CommandDefinition[] {
  const needle = query.trim().toLowerCase()
  if (!needle) return [...definitions]

  const byName = definitions.filter((def) => def.name.toLowerCase().includes(needle))
  const byDescription = definitions.filter(
    (def) => !byName.includes(def) && def.description.toLowerCase().includes(needle)
  )
  return [...byName, ...byDescription]
}
