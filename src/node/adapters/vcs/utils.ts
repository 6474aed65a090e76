import fs from 'fs'
import path from 'path'
import type { CommitId } from '@shared/types'

/**
 * Walks up from `start` to the directory holding `.jj`.
 * Returns null when no ancestor is a jj workspace.
 */
export async function findWorkspaceRoot(start: string): Promise<string | null> {
  let current = path.resolve(start)
  for (;;) {
    if (await isDirectory(path.join(current, '.jj'))) return current
    const parent = path.dirname(current)
    if (parent === current) return null
    current = parent
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(target)
    return stat.isDirectory()
  } catch {
    return false
  }
}

/** Union revset of the given ids, each wrapped in `present()`. */
export function presentRevset(commitIds: CommitId[]): string {
  return commitIds.map((id) => `present(${id})`).join(' | ')
}

/** Union revset of the given ids. */
export function unionRevset(commitIds: CommitId[]): string {
  return commitIds.join(' | ')
}

/** Fileset naming exactly one path relative to the workspace root. */
export function rootFileset(filePath: string): string {
  const escaped = filePath.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
  return `root-file:"${escaped}"`
}
