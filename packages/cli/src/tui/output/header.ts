import { buildTreeSnapshot, flattenSnapshot } from '@cmdtree/kernel'
import type { Runtime } from '../../runtime.js'
import { t } from '../theme.js'

/**
 * renderHeader — print the startup banner and a one-line summary of the
 * loaded tree.
 */
export function renderHeader(runtime: Runtime): void {
  const nodes    = flattenSnapshot(buildTreeSnapshot(runtime.root))
  const commands = nodes.reduce((n, node) => n + node.commands.length, 0)
  const loaded   = runtime.modules.filter(m => m.result.ok).length
  const failed   = runtime.modules.length - loaded

  process.stdout.write('\n')
  process.stdout.write('  ' + t.blue.bold('C M D T R E E') + '   ' + t.muted('hierarchical command registry') + '\n')
  process.stdout.write('\n')
  process.stdout.write('  ' + t.dim('─'.repeat(60)) + '\n')
  process.stdout.write('\n')
  process.stdout.write(
    '  ' + t.muted('prefix') + ' ' + t.amber(runtime.root.effectivePrefix()) +
    '  ' + t.dim('·') +
    '  ' + t.text(String(nodes.length)) + ' ' + t.muted('namespaces') +
    '  ' + t.dim('·') +
    '  ' + t.text(String(commands)) + ' ' + t.muted('commands') +
    '  ' + t.dim('·') +
    '  ' + t.text(String(loaded)) + ' ' + t.muted('modules') +
    (failed > 0 ? '  ' + t.red(`${failed} failed`) : '') +
    '\n',
  )
  process.stdout.write('  ' + t.dim('config: ' + (runtime.resolved.configPath ?? 'defaults')) + '\n')
}
