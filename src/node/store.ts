import { isThemeName, type ThemeName } from '@shared/theme'
import type { Action, AppState } from '@shared/types'
import Conf from 'conf'
import { MAX_RECENT_FILTERS } from './shared/constants'

interface StoreSchema {
  recentFilters: string[]
  themeName?: string
}

export interface ConfigStoreOptions {
  /** Directory of the settings file; the per-user config directory when omitted. */
  cwd?: string
}

/**
 * User preferences that outlive a session: recently applied revset filters
 * and the selected theme.
 */
export class ConfigStore {
  private store: Conf<StoreSchema>

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'treeline',
      configName: 'config',
      cwd: options.cwd,
      defaults: {
        recentFilters: []
      }
    })
  }

  get path(): string {
    return this.store.path
  }

  getRecentFilters(): string[] {
    const stored: unknown = this.store.get('recentFilters', [])
    if (!Array.isArray(stored)) return []
    return stored
      .filter((entry): entry is string => typeof entry === 'string' && entry.length > 0)
      .slice(0, MAX_RECENT_FILTERS)
  }

  setRecentFilters(filters: string[]): void {
    this.store.set('recentFilters', filters.slice(0, MAX_RECENT_FILTERS))
  }

  getThemeName(): ThemeName | undefined {
    const stored = this.store.get('themeName')
    return stored !== undefined && isThemeName(stored) ? stored : undefined
  }

  setThemeName(name: ThemeName): void {
    this.store.set('themeName', name)
  }
}

export type PreferenceSink = Pick<ConfigStore, 'setRecentFilters' | 'setThemeName'>

/**
 * State listener that writes preference changes back to the store. Keeps the
 * reducer free of I/O.
 */
export function createPersistenceObserver(
  store: PreferenceSink,
  initial: Pick<AppState, 'recentFilters' | 'themeName'>
): (state: AppState, action: Action) => void {
  let savedFilters = [...initial.recentFilters]
  let savedTheme = initial.themeName

  return (state) => {
    if (!sameList(state.recentFilters, savedFilters)) {
      savedFilters = [...state.recentFilters]
      store.setRecentFilters(savedFilters)
    }
    if (state.themeName !== savedTheme) {
      savedTheme = state.themeName
      if (isThemeName(savedTheme)) store.setThemeName(savedTheme)
    }
  }
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index])
}
