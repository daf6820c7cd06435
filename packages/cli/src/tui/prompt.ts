import { t } from './theme.js'

/**
 * buildPS1 — construct the colored PS1 prompt string.
 *
 * Format: [cmdtree:ada:?] ❯
 */
export function buildPS1(user: string, prefix: string): string {
  const bracket = t.blueDim
  const name    = t.blue.bold
  const who     = t.muted
  const arrow   = t.blueDim

  return (
    bracket('[') +
    name('cmdtree') +
    bracket(':') +
    who(user) +
    bracket(':') +
    t.amber(prefix) +
    bracket(']') +
    arrow(' ❯ ')
  )
}
