import type { CommandSnapshot, NodeSnapshot } from '@cmdtree/kernel'
import { stateColor, t, type EntryState } from '../theme.js'

/**
 * One printable line of the registry tree: a namespace, a placeholder, or a
 * command listed under its namespace.
 */
export interface TreeRow {
  readonly depth: number
  readonly kind: 'namespace' | 'placeholder' | 'command'
  readonly label: string
  readonly detail: string
  readonly state: EntryState
  /** Path of the namespace (for command rows, of the owning namespace). */
  readonly path: string
}

function namespaceDetail(node: NodeSnapshot, depth: number): string {
  if (node.placeholder) return 'placeholder'
  if (node.prefix !== null) return `prefix ${node.prefix}`
  return `prefix ${node.effectivePrefix} (${depth === 0 ? 'default' : 'inherited'})`
}

function commandDetail(command: CommandSnapshot): string {
  const parts = [command.triggers.join(' '), `priority ${command.priority}`]
  if (command.essential) parts.push('essential')
  if (!command.overrideable) parts.push('final')
  return parts.join('  ')
}

function nodeState(node: NodeSnapshot): EntryState {
  if (node.placeholder) return 'placeholder'
  return node.effectivelyEnabled ? 'enabled' : 'disabled'
}

/**
 * Flatten a tree snapshot into rows: each namespace, then its commands,
 * then its children.
 */
export function buildTreeRows(snapshot: NodeSnapshot): TreeRow[] {
  const rows: TreeRow[] = []
  const visit = (node: NodeSnapshot, depth: number): void => {
    rows.push({
      depth,
      kind:   node.placeholder ? 'placeholder' : 'namespace',
      label:  depth === 0 ? node.path : node.name,
      detail: namespaceDetail(node, depth),
      state:  nodeState(node),
      path:   node.path,
    })
    for (const command of node.commands) {
      rows.push({
        depth:  depth + 1,
        kind:   'command',
        label:  command.name,
        detail: commandDetail(command),
        state:  command.effectivelyEnabled ? 'enabled' : 'disabled',
        path:   node.path,
      })
    }
    for (const child of node.children) visit(child, depth + 1)
  }
  visit(snapshot, 0)
  return rows
}

const _symbols: Record<TreeRow['kind'], string> = {
  namespace:   '▸',
  placeholder: '◌',
  command:     '•',
}

export function rowSymbol(row: TreeRow): string {
  return _symbols[row.kind]
}

/** Colored lines for stdout. */
export function renderTreeRows(rows: ReadonlyArray<TreeRow>): string {
  return rows
    .map(row =>
      '  ' + '  '.repeat(row.depth) +
      stateColor(row.state)(rowSymbol(row) + ' ' + row.label) +
      '  ' + t.muted(row.detail) +
      (row.state === 'disabled' ? ' ' + t.amber('(disabled)') : ''),
    )
    .join('\n')
}
