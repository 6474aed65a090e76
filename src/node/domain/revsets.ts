/** Revset the graph shows when no filter is active. */
export const DEFAULT_REVSET = '::visible_heads()'

export const QUICK_FILTERS = {
  mine: 'mine()',
  trunk: 'trunk()',
  conflicts: 'conflicts()',
  all: 'all()',
  heads: 'heads(all())',
  bookmarks: 'bookmarks()',
  immutable: 'immutable()',
  mutable: 'mutable()',
  empty: 'empty()',
  divergent: 'divergent()',
  merges: 'merges()',
  tags: 'tags()',
  remoteBookmarks: 'remote_bookmarks()',
  workingCopies: 'working_copies()'
} as const

/** Suggestions cycled through while typing a filter. */
export const PRESET_FILTERS: readonly string[] = [
  'all()',
  'mine()',
  'trunk()',
  'mutable()',
  'immutable()',
  'visible_heads()',
  'bookmarks()',
  'remote_bookmarks()',
  'tracked_remote_bookmarks()',
  'tags()',
  'conflicts()',
  'divergent()',
  'empty()',
  'merges()',
  'signed()',
  'heads(all())',
  'roots(all())',
  'ancestors(@)',
  'descendants(@)',
  'working_copies()'
]
