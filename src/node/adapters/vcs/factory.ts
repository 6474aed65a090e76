/**
 * VCS Facade Factory
 *
 * Creates the facade for the configured repository.
 */

import { log } from '@shared/logger'
import type { VcsFacade } from './interface'
import { JjCliAdapter } from './JjCliAdapter'

export interface VcsFacadeConfig {
  repoPath: string
  /** jj executable; `jj` on PATH when omitted. */
  jjBinary?: string
}

export function createVcsFacade(config: VcsFacadeConfig): VcsFacade {
  log.debug(`[VcsFacade] Creating jj-cli facade for ${config.repoPath}`)
  return new JjCliAdapter({ repoPath: config.repoPath, binary: config.jjBinary })
}
