import { describe, expect, it } from 'vitest'
import { VcsError } from '../../../shared/errors'
import { cleanStderr, createInteractiveRunner } from '../runner'
import { presentRevset, rootFileset, unionRevset } from '../utils'

describe('cleanStderr', () => {
  it('keeps the first non-empty line without the Error prefix', () => {
    expect(cleanStderr('\nError: Revision `xyz` doesn\'t exist\nHint: try again\n')).toBe(
      "Revision `xyz` doesn't exist"
    )
  })

  it('returns an empty string for empty output', () => {
    expect(cleanStderr('  \n')).toBe('')
  })
})

describe('createInteractiveRunner', () => {
  const options = { cwd: process.cwd(), operation: 'resolveConflict' }

  it('resolves when the process exits cleanly', async () => {
    const run = createInteractiveRunner(process.execPath)

    await expect(run(['-e', 'process.exit(0)'], options)).resolves.toBeUndefined()
  })

  it('rejects with the exit code', async () => {
    const run = createInteractiveRunner(process.execPath)

    const error = await run(['-e', 'process.exit(3)'], options).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(VcsError)
    expect(error).toMatchObject({
      message: 'jj -e process.exit(3) exited with code 3',
      operation: 'resolveConflict'
    })
  })

  it('reports a missing executable', async () => {
    const run = createInteractiveRunner('treeline-missing-jj')

    const error = await run(['resolve'], options).catch((e: unknown) => e)

    expect(error).toMatchObject({ message: 'treeline-missing-jj executable not found' })
  })
})

describe('revset helpers', () => {
  it('joins ids into unions', () => {
    expect(unionRevset(['a', 'b'])).toBe('a | b')
    expect(presentRevset(['a', 'b'])).toBe('present(a) | present(b)')
  })

  it('quotes file paths as root-relative filesets', () => {
    expect(rootFileset('dir/file name.txt')).toBe('root-file:"dir/file name.txt"')
    expect(rootFileset('we"ird\\path')).toBe('root-file:"we\\"ird\\\\path"')
  })
})
