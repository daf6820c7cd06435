/**
 * cmdtree tree — Print the registry tree
 *
 * Loads the configured modules (and the admin module) into a fresh root and
 * prints every namespace with its effective prefix, state and commands.
 */

import { Command } from 'commander';
import { buildTreeSnapshot, hashTreeSnapshot } from '@cmdtree/kernel';
import { buildTreeRows, renderTreeRows } from '../tui/output/tree.js';
import { t } from '../tui/theme.js';
import { runtimeFor } from './shared.js';

export const treeCommand = new Command('tree')
  .description('Print the registry tree with prefixes, state and commands')
  .option('--json', 'Output the tree snapshot as JSON')
  .action((options: { json?: boolean }, command: Command) => {
    const runtime = runtimeFor(command);
    if (runtime === undefined) return;

    const snapshot = buildTreeSnapshot(runtime.root);
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ hash: hashTreeSnapshot(snapshot), tree: snapshot }, null, 2));
      return;
    }

    // eslint-disable-next-line no-console
    console.log('\n' + renderTreeRows(buildTreeRows(snapshot)));
    // eslint-disable-next-line no-console
    console.log('\n  ' + t.dim('tree ' + hashTreeSnapshot(snapshot).slice(0, 12)) + '\n');
  });
