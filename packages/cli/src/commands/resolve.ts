/**
 * cmdtree resolve — Show which command handles a signature
 *
 * Exit status 1 when nothing matches, so scripts can probe signatures.
 */

import { Command } from 'commander';
import { explicitSignatures, isEffectivelyEnabled } from '@cmdtree/kernel';
import type { RegistryNode } from '@cmdtree/kernel';
import { t } from '../tui/theme.js';
import { runtimeFor } from './shared.js';

export interface Resolution {
  readonly name: string;
  readonly path: string;
  readonly priority: number;
  /** The signatures that reach the command where it is registered. */
  readonly triggers: ReadonlyArray<string>;
  readonly effectivelyEnabled: boolean;
}

export function resolveSignature<TContext>(
  root: RegistryNode<TContext>,
  signature: string,
): Resolution | undefined {
  const command = root.resolve(signature);
  if (command === undefined) return undefined;
  const owner = command.registry;
  const explicit = explicitSignatures(command);
  const prefix = owner?.effectivePrefix() ?? '';
  return {
    name: command.name,
    path: owner?.path ?? root.path,
    priority: command.priority,
    triggers: explicit.length > 0 ? explicit.sort() : Array.from(command.aliases, (alias) => prefix + alias).sort(),
    effectivelyEnabled: isEffectivelyEnabled(command),
  };
}

export const resolveCommand = new Command('resolve')
  .description('Show which command a signature resolves to')
  .argument('<signature>', 'Signature as typed in a message, e.g. "?help"')
  .option('--json', 'Output as JSON')
  .action((signature: string, options: { json?: boolean }, command: Command) => {
    const runtime = runtimeFor(command);
    if (runtime === undefined) return;

    const resolution = resolveSignature(runtime.root, signature);
    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ signature, resolution: resolution ?? null }, null, 2));
    } else if (resolution === undefined) {
      // eslint-disable-next-line no-console
      console.log(t.muted(`no command matches "${signature}"`));
    } else {
      const state = resolution.effectivelyEnabled ? t.green('enabled') : t.amber('disabled');
      // eslint-disable-next-line no-console
      console.log(
        `${t.white(resolution.name)}  ${t.muted(resolution.path)}  ${state}  ` +
          t.dim(`priority ${resolution.priority}  ${resolution.triggers.join(' ')}`),
      );
    }
    if (resolution === undefined) process.exitCode = 1;
  });
