import { findNodeAtPath } from '@cmdtree/kernel'
import type { RegistryNode } from '@cmdtree/kernel'
import type { TreeRow } from '../output/tree.js'

/**
 * Flip the enabled flag of the entity a tree row shows.
 *
 * @returns a status line for the view
 */
export function toggleRow<TContext>(root: RegistryNode<TContext>, row: TreeRow): string {
  if (row.kind === 'placeholder') return `${row.path} is a placeholder`

  if (row.kind === 'command') {
    const command = root.getCommand(row.label)
    if (command === undefined) return `command ${row.label} is gone`
    if (command.essential) return `command ${row.label} is essential`
    command.setEnabled(!command.enabled)
    return `${command.enabled ? 'enabled' : 'disabled'} command ${row.label}`
  }

  const node = findNodeAtPath(root, row.path)
  if (node === undefined || node.isPlaceholder) return `namespace ${row.path} is gone`
  if (node.essential) return `namespace ${row.path} is essential`
  node.setEnabled(!node.enabled)
  return `${node.enabled ? 'enabled' : 'disabled'} namespace ${row.path}`
}
