/**
 * Process runner for the jj CLI.
 */

import { execFile, spawn } from 'child_process'
import { promisify } from 'util'
import { VcsError } from '../../shared/errors'

const execFileAsync = promisify(execFile)

/** Largest stdout accepted from a single jj invocation. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export type JjRunOptions = {
  cwd: string
  /** Facade operation the invocation belongs to; carried by errors. */
  operation: string
}

/** Runs jj with the given arguments and resolves with its raw stdout. */
export type JjRunner = (args: string[], options: JjRunOptions) => Promise<Buffer>

export function createExecFileRunner(binary: string): JjRunner {
  return async (args, options) => {
    try {
      const { stdout } = await execFileAsync(binary, args, {
        cwd: options.cwd,
        encoding: 'buffer',
        maxBuffer: MAX_OUTPUT_BYTES,
        // Commands that would open an editor keep the text jj prepared.
        env: { ...process.env, JJ_EDITOR: 'true' }
      })
      return stdout
    } catch (error) {
      throw toVcsError(binary, options.operation, error)
    }
  }
}

/**
 * Runs jj attached to this process's terminal, for commands that start an
 * interactive tool. Resolves once jj exits with status 0.
 */
export type JjInteractiveRunner = (args: string[], options: JjRunOptions) => Promise<void>

export function createInteractiveRunner(binary: string): JjInteractiveRunner {
  return (args, options) =>
    new Promise<void>((resolve, reject) => {
      const child = spawn(binary, args, { cwd: options.cwd, stdio: 'inherit' })
      child.once('error', (error) => reject(toVcsError(binary, options.operation, error)))
      child.once('exit', (code, signal) => {
        if (code === 0) {
          resolve()
          return
        }
        const status = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`
        reject(new VcsError(`jj ${args.join(' ')} exited with ${status}`, options.operation))
      })
    })
}

function toVcsError(binary: string, operation: string, error: unknown): VcsError {
  if (hasCode(error) && error.code === 'ENOENT') {
    return new VcsError(`${binary} executable not found`, operation, undefined, error)
  }

  const stderr = readStderr(error)
  const message = cleanStderr(stderr) || (error instanceof Error ? error.message : String(error))
  return new VcsError(message, operation, stderr, error)
}

function hasCode(error: unknown): error is { code: unknown } {
  return typeof error === 'object' && error !== null && 'code' in error
}

function readStderr(error: unknown): string {
  if (typeof error !== 'object' || error === null || !('stderr' in error)) return ''
  const { stderr } = error
  if (Buffer.isBuffer(stderr)) return stderr.toString('utf8')
  return typeof stderr === 'string' ? stderr : ''
}

/** First meaningful stderr line, without jj's `Error: ` prefix. */
export function cleanStderr(stderr: string): string {
  const line = stderr
    .split('\n')
    .map((text) => text.trim())
    .find((text) => text.length > 0)
  return line ? line.replace(/^Error:\s*/, '') : ''
}
