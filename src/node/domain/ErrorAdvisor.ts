/**
 * Error Advisor
 *
 * Maps backend error text to a severity and a list of follow-up hints shown
 * under the error in the status area.
 */

import type { ErrorSeverity } from '@shared/types'

export type ErrorAdvice = {
  severity: ErrorSeverity
  suggestions: string[]
}

type Rule = {
  matches: (lower: string) => boolean
  severity?: ErrorSeverity
  suggestion: string
}

const RULES: Rule[] = [
  {
    matches: (m) => m.includes('dirty working copy') || m.includes('uncommitted changes'),
    suggestion: 'Try running: jj snapshot'
  },
  {
    matches: (m) => m.includes('immutable') && (m.includes('edit') || m.includes('describe')),
    suggestion: 'Try running: jj new (to create a child of the immutable revision)'
  },
  {
    matches: (m) => m.includes('conflict'),
    suggestion: 'Try running: jj resolve (to open the external merge tool)'
  },
  {
    matches: (m) => m.includes('no such bookmark'),
    suggestion: 'Check the bookmark name or try: jj bookmark list'
  },
  {
    matches: (m) =>
      m.includes('not a git repository') ||
      m.includes('no repository found') ||
      m.includes('no jj repo'),
    severity: 'critical',
    suggestion: 'Ensure you are in a jj/git repository or try: jj git init'
  },
  {
    matches: (m) =>
      m.includes('no longer valid') ||
      m.includes('rewritten') ||
      m.includes('abandoned') ||
      m.includes("doesn't exist"),
    severity: 'warning',
    suggestion: 'The graph is being reloaded; select the revision again'
  }
]

export function describeError(message: string): ErrorAdvice {
  const lower = message.toLowerCase()
  let severity: ErrorSeverity = 'error'
  const suggestions: string[] = []

  for (const rule of RULES) {
    if (!rule.matches(lower)) continue
    suggestions.push(rule.suggestion)
    if (rule.severity) severity = rule.severity
  }

  return { severity, suggestions }
}

/**
 * True when the message reads like a rejected revset expression rather than
 * a repository failure.
 */
export function isRevsetError(message: string): boolean {
  const lower = message.toLowerCase()
  return (
    lower.includes('revset') ||
    lower.includes('parse error') ||
    (lower.includes('error') && lower.includes('function')) ||
    (lower.includes('invalid') && lower.includes('expression'))
  )
}
