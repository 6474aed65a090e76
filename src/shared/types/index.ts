export type { Action, ActionKind, ActionOf } from './action'
export type { Command, CommandKind, MutationCommand } from './command'
export * from './repo'
export type * from './state'
