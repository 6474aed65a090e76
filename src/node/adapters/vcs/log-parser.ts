/**
 * `jj log` output parsing.
 *
 * The adapter asks jj for one record per revision using LOG_TEMPLATE; fields
 * are separated by FIELD_SEPARATOR and each record ends with RECORD_SEPARATOR.
 */

import type { FileChange, FileStatus, GraphRow } from '@shared/types'
import { createEmptyVisual } from '@shared/types'
import { VcsError } from '../../shared/errors'

export const FIELD_SEPARATOR = '\x1f'
export const RECORD_SEPARATOR = '\x1e'
export const FILE_SEPARATOR = '\x1d'
/** Separates a changed path from the path it was renamed or copied from. */
export const SOURCE_SEPARATOR = '\x1c'

const FIELDS = [
  'commit_id',
  'commit_id.short(8)',
  'change_id',
  'change_id.shortest(8)',
  'description',
  'author.name()',
  'author.email()',
  'author.timestamp().local().format("%Y-%m-%d %H:%M")',
  'author.timestamp().format("%s")',
  'if(current_working_copy, "1", "0")',
  'if(immutable, "1", "0")',
  'if(conflict, "1", "0")',
  'parents.map(|c| c.commit_id()).join(" ")',
  'local_bookmarks.map(|b| b.name()).join(" ")',
  'self.diff().files().map(|e| e.status() ++ ":" ++ if(e.target().conflict(), "1", "0") ++ ":" ++ e.path() ++ "\\x1c" ++ e.source().path()).join("\\x1d")'
]

export const LOG_TEMPLATE = FIELDS.join(' ++ "\\x1f" ++ ') + ' ++ "\\x1e"'

const FIELD_COUNT = FIELDS.length

export function parseLogOutput(output: string): GraphRow[] {
  const rows: GraphRow[] = []
  for (const chunk of output.split(RECORD_SEPARATOR)) {
    const record = chunk.replace(/^\n+/, '')
    if (!record) continue
    rows.push(parseRecord(record))
  }
  return rows
}

function parseRecord(record: string): GraphRow {
  const fields = record.split(FIELD_SEPARATOR)
  if (fields.length !== FIELD_COUNT) {
    throw new VcsError(
      `Unexpected jj log output: expected ${FIELD_COUNT} fields, got ${fields.length}`,
      'log'
    )
  }

  const [
    commitId = '',
    commitIdShort = '',
    changeId = '',
    changeIdShort = '',
    description = '',
    authorName = '',
    authorEmail = '',
    timestamp = '',
    timestampSecs = '',
    workingCopy = '',
    immutable = '',
    conflict = '',
    parents = '',
    bookmarks = '',
    files = ''
  ] = fields

  return {
    commitId,
    commitIdShort,
    changeId,
    changeIdShort,
    description,
    author: authorEmail ? `${authorName} <${authorEmail}>` : authorName,
    timestamp,
    timestampSecs: Number.parseInt(timestampSecs, 10) || 0,
    isWorkingCopy: workingCopy === '1',
    isImmutable: immutable === '1',
    hasConflict: conflict === '1',
    parents: splitWords(parents),
    bookmarks: splitWords(bookmarks),
    changedFiles: parseChangedFiles(files),
    visual: createEmptyVisual()
  }
}

/**
 * Entries look like `<status>:<conflicted 0|1>:<path>\x1c<source path>`.
 * A rename becomes a deletion of the source and an addition of the target,
 * so neither side is read at a path its revision does not have.
 */
export function parseChangedFiles(field: string): FileChange[] {
  if (!field) return []

  const changes: FileChange[] = []
  for (const entry of field.split(FILE_SEPARATOR)) {
    const first = entry.indexOf(':')
    const second = entry.indexOf(':', first + 1)
    if (first < 0 || second < 0) continue

    const status = entry.slice(0, first)
    const conflicted = entry.slice(first + 1, second) === '1'
    const [path = '', source = ''] = entry.slice(second + 1).split(SOURCE_SEPARATOR)
    if (!path) continue

    if (conflicted) {
      changes.push({ path, status: 'conflicted' })
    } else if (status === 'renamed') {
      if (source && source !== path) changes.push({ path: source, status: 'deleted' })
      changes.push({ path, status: 'added' })
    } else {
      changes.push({ path, status: toFileStatus(status) })
    }
  }
  return changes
}

function toFileStatus(status: string): FileStatus {
  switch (status) {
    case 'added':
    case 'copied':
      return 'added'
    case 'removed':
      return 'deleted'
    default:
      return 'modified'
  }
}

function splitWords(field: string): string[] {
  return field.split(' ').filter((word) => word.length > 0)
}
