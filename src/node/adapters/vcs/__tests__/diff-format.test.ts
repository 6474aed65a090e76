import { describe, expect, it } from 'vitest'
import { createRow } from '../../../__tests__/test-utils'
import { MAX_DIFF_SIZE } from '../../../shared/constants'
import { isBinary, renderCommitDiff, renderCommitHeader, renderFileDiff } from '../diff-format'

const text = (value: string): Buffer => Buffer.from(value, 'utf8')

describe('isBinary', () => {
  it('treats empty content as text', () => {
    expect(isBinary(new Uint8Array(0))).toBe(false)
  })

  it('treats plain text with tabs and newlines as text', () => {
    expect(isBinary(text('line\tone\r\nline two\n'))).toBe(false)
  })

  it('flags any NUL byte', () => {
    expect(isBinary(text('abc\0def'))).toBe(true)
  })

  it('flags content with more than 10% control characters', () => {
    expect(isBinary(text('a\x01\x02'))).toBe(true)
  })

  it('tolerates a few control characters', () => {
    expect(isBinary(text('abcdefghijklmnopqrs\x01'))).toBe(false)
  })

  it('only samples the first kilobyte', () => {
    const content = Buffer.alloc(2048, 'a')
    content[1500] = 0
    expect(isBinary(content)).toBe(false)
  })
})

describe('renderCommitHeader', () => {
  it('lists ids, bookmarks, author and the indented description', () => {
    const row = createRow('c1', [], {
      changeId: 'zz1',
      bookmarks: ['main', 'dev'],
      description: 'Subject\n\nBody line\n'
    })

    expect(renderCommitHeader(row)).toBe(
      [
        'Commit ID: c1',
        'Change ID: zz1',
        'Bookmarks: main, dev',
        'Author   : Test User <test@example.com> (2024-01-01 12:00)',
        '',
        '    Subject',
        '    ',
        '    Body line',
        '',
        ''
      ].join('\n')
    )
  })

  it('omits bookmarks and marks a missing description', () => {
    const row = createRow('c1', [], { changeId: 'zz1', description: '' })

    expect(renderCommitHeader(row)).toBe(
      [
        'Commit ID: c1',
        'Change ID: zz1',
        'Author   : Test User <test@example.com> (2024-01-01 12:00)',
        '',
        '    (no description set)',
        '',
        ''
      ].join('\n')
    )
  })
})

describe('renderFileDiff', () => {
  it('renders unified hunks for a modified file', () => {
    const output = renderFileDiff({
      path: 'src/a.txt',
      status: 'modified',
      before: text('one\ntwo\n'),
      after: text('one\nTWO\n')
    })

    expect(output).toBe('File: src/a.txt\nStatus: Modified\n@@ -1,2 +1,2 @@\n one\n-two\n+TWO\n\n')
  })

  it('renders an added file as a single hunk', () => {
    const output = renderFileDiff({
      path: 'new.txt',
      status: 'added',
      before: new Uint8Array(0),
      after: text('hello\nworld\n')
    })

    expect(output).toBe('File: new.txt\nStatus: Added\n@@ -0,0 +1,2 @@\n+hello\n+world\n\n')
  })

  it('renders a deleted file as a single hunk', () => {
    const output = renderFileDiff({
      path: 'old.txt',
      status: 'deleted',
      before: text('a\nb\n'),
      after: new Uint8Array(0)
    })

    expect(output).toBe('File: old.txt\nStatus: Deleted\n@@ -1,2 +0,0 @@\n-a\n-b\n\n')
  })

  it('does not diff binary content', () => {
    const output = renderFileDiff({
      path: 'img.png',
      status: 'added',
      before: new Uint8Array(0),
      after: text('\x89PNG\0\0')
    })

    expect(output).toBe('File: img.png\nStatus: Added\n(binary file)\n\n')
  })

  it('does not diff oversized files', () => {
    const output = renderFileDiff({
      path: 'big.txt',
      status: 'modified',
      before: text('small\n'),
      after: Buffer.alloc(MAX_DIFF_SIZE + 1, 'a')
    })

    expect(output).toBe('File: big.txt\nStatus: Modified\n(file too large to diff)\n\n')
  })
})

describe('renderCommitDiff', () => {
  it('places file sections after the header', () => {
    const row = createRow('c1', ['c0'], { changeId: 'zz1', description: 'Fix' })
    const output = renderCommitDiff(row, [
      { path: 'a', status: 'conflicted', before: text('x\n'), after: text('x\n') }
    ])

    expect(output).toBe(
      'Commit ID: c1\n' +
        'Change ID: zz1\n' +
        'Author   : Test User <test@example.com> (2024-01-01 12:00)\n' +
        '\n' +
        '    Fix\n' +
        '\n' +
        'File: a\n' +
        'Status: Conflicted\n' +
        '\n'
    )
  })
})
