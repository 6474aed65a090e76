/**
 * Diff text rendering.
 *
 * Produces the plain-text diff shown in the diff panel: a commit header
 * followed by one section per changed file with unified hunks.
 */

import type { FileStatus, GraphRow } from '@shared/types'
import { formatFileStatus } from '@shared/types'
import { structuredPatch } from 'diff'
import { BINARY_SAMPLE_SIZE, DIFF_CONTEXT_LINES, MAX_DIFF_SIZE } from '../../shared/constants'

export type FileContents = {
  path: string
  status: FileStatus
  before: Uint8Array
  after: Uint8Array
}

/**
 * Heuristic binary check over the first kilobyte: any NUL byte, or more than
 * 10% control characters other than whitespace.
 */
export function isBinary(content: Uint8Array): boolean {
  if (content.length === 0) return false

  const sample = content.subarray(0, BINARY_SAMPLE_SIZE)
  if (sample.includes(0)) return true

  let control = 0
  for (const byte of sample) {
    const isWhitespace = byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0c
    if ((byte < 0x20 && !isWhitespace) || byte === 0x7f) control++
  }
  return (control * 100) / sample.length > 10
}

export function renderCommitHeader(row: GraphRow): string {
  const lines = [`Commit ID: ${row.commitId}`, `Change ID: ${row.changeId}`]
  if (row.bookmarks.length > 0) {
    lines.push(`Bookmarks: ${row.bookmarks.join(', ')}`)
  }
  lines.push(`Author   : ${row.author} (${row.timestamp})`)
  lines.push('')

  const description = row.description.trimEnd()
  for (const line of (description || '(no description set)').split('\n')) {
    lines.push(`    ${line}`)
  }
  lines.push('')
  return lines.join('\n') + '\n'
}

export function renderFileDiff(file: FileContents): string {
  const lines = [`File: ${file.path}`, `Status: ${formatFileStatus(file.status)}`]

  if (isBinary(file.before) || isBinary(file.after)) {
    lines.push('(binary file)')
  } else if (file.before.length > MAX_DIFF_SIZE || file.after.length > MAX_DIFF_SIZE) {
    lines.push('(file too large to diff)')
  } else {
    lines.push(...renderHunks(decode(file.before), decode(file.after)))
  }
  return lines.join('\n') + '\n\n'
}

export function renderCommitDiff(row: GraphRow, files: FileContents[]): string {
  return renderCommitHeader(row) + files.map(renderFileDiff).join('')
}

function renderHunks(before: string, after: string): string[] {
  if (before === after) return []

  // Whole-file additions and deletions are a single hunk.
  if (!before) return wholeFileHunk('+', after)
  if (!after) return wholeFileHunk('-', before)

  const patch = structuredPatch('a', 'b', before, after, '', '', { context: DIFF_CONTEXT_LINES })
  const lines: string[] = []
  for (const hunk of patch.hunks) {
    lines.push(
      `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
      ...hunk.lines
    )
  }
  return lines
}

function wholeFileHunk(sign: '+' | '-', content: string): string[] {
  const body = splitLines(content)
  const range = `1,${body.length}`
  const header = sign === '+' ? `@@ -0,0 +${range} @@` : `@@ -${range} +0,0 @@`
  return [header, ...body.map((line) => sign + line)]
}

function splitLines(content: string): string[] {
  const lines = content.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

function decode(content: Uint8Array): string {
  return Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString('utf8')
}
