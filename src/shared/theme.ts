/**
 * Named color themes. Colors are Ink color strings (named or hex).
 */
export type ThemePalette = {
  accent: string
  text: string
  muted: string
  selection: string
  workingCopy: string
  immutable: string
  conflict: string
  bookmark: string
  added: string
  deleted: string
  hunk: string
  error: string
  lanes: string[]
}

export const THEMES = {
  default: {
    accent: 'cyan',
    text: 'white',
    muted: 'gray',
    selection: 'blue',
    workingCopy: 'green',
    immutable: 'gray',
    conflict: 'red',
    bookmark: 'magenta',
    added: 'green',
    deleted: 'red',
    hunk: 'cyan',
    error: 'red',
    lanes: ['cyan', 'magenta', 'yellow', 'green', 'blue', 'red']
  },
  light: {
    accent: 'blue',
    text: 'black',
    muted: 'gray',
    selection: 'cyan',
    workingCopy: 'green',
    immutable: 'gray',
    conflict: 'red',
    bookmark: 'magenta',
    added: 'green',
    deleted: 'red',
    hunk: 'blue',
    error: 'red',
    lanes: ['blue', 'magenta', 'green', 'red', 'cyan']
  },
  solarized: {
    accent: '#268bd2',
    text: '#eee8d5',
    muted: '#586e75',
    selection: '#073642',
    workingCopy: '#859900',
    immutable: '#657b83',
    conflict: '#dc322f',
    bookmark: '#d33682',
    added: '#859900',
    deleted: '#dc322f',
    hunk: '#2aa198',
    error: '#dc322f',
    lanes: ['#268bd2', '#2aa198', '#b58900', '#6c71c4', '#cb4b16']
  },
  mono: {
    accent: 'white',
    text: 'white',
    muted: 'gray',
    selection: 'gray',
    workingCopy: 'white',
    immutable: 'gray',
    conflict: 'white',
    bookmark: 'white',
    added: 'white',
    deleted: 'gray',
    hunk: 'white',
    error: 'white',
    lanes: ['white', 'gray']
  }
} satisfies Record<string, ThemePalette>

export type ThemeName = keyof typeof THEMES

export const THEME_NAMES: string[] = Object.keys(THEMES)

export const DEFAULT_THEME: ThemeName = 'default'

export function isThemeName(name: string): name is ThemeName {
  return Object.prototype.hasOwnProperty.call(THEMES, name)
}

export function getTheme(name: string): ThemePalette {
  return isThemeName(name) ? THEMES[name] : THEMES[DEFAULT_THEME]
}
