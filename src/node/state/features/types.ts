import type { Action, AppState, Command } from '@shared/types'

export type UpdateResult = { handled: false } | { handled: true; command?: Command }

/** A reducer for one family of actions. Mutates state in place. */
export type FeatureReducer = (state: AppState, action: Action) => UpdateResult

export const NOT_HANDLED: UpdateResult = { handled: false }

export function handled(command?: Command): UpdateResult {
  return command ? { handled: true, command } : { handled: true }
}
