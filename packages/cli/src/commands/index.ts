/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/cmdtree.ts.
 */

import { program } from 'commander'
import { treeCommand } from './tree.js'
import { resolveCommand } from './resolve.js'
import { validateCommand } from './validate.js'
import { logCommand } from './log.js'
import { shellCommand } from './shell.js'

program
  .name('cmdtree')
  .description(
    'cmdtree — hierarchical command registry for chat bots.\n' +
    'Namespaces, prefixes, priorities and runtime enable/disable.',
  )
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file (overrides CMDTREE_CONFIG and ./cmdtree.config.json)')

program.addCommand(treeCommand)
program.addCommand(resolveCommand)
program.addCommand(validateCommand)
program.addCommand(logCommand)
program.addCommand(shellCommand)

export { program }
