/**
 * VCS Adapter Module
 *
 * Usage:
 * ```typescript
 * import { createVcsFacade } from './adapters/vcs'
 *
 * const vcs = createVcsFacade({ repoPath: process.cwd() })
 * const repo = await vcs.getOperationLog({ limit: 100 })
 * ```
 */

export { createVcsFacade } from './factory'
export type { VcsFacadeConfig } from './factory'

export type { GraphQuery, PermitPool, VcsFacade } from './interface'

export { JjCliAdapter } from './JjCliAdapter'
export type { JjCliAdapterOptions } from './JjCliAdapter'
export { createExecFileRunner } from './runner'
export type { JjRunner, JjRunOptions } from './runner'
