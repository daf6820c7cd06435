/**
 * cmdtree Kernel — Gates
 *
 * Enablement and context checks are evaluated on demand, walking upward
 * from the target. Nothing is cached: a change to any ancestor is visible to
 * the very next evaluation.
 */

import type { Command } from '../types/command.js';
import { RegistryNode } from './node.js';

function isNode<TContext>(
  target: RegistryNode<TContext> | Command<TContext>,
): target is RegistryNode<TContext> {
  return target instanceof RegistryNode;
}

/**
 * True when the target and every registry above it are enabled. A
 * command's chain starts at the node that owns it; an unregistered command
 * is judged on its own flag alone.
 */
export function isEffectivelyEnabled<TContext>(
  target: RegistryNode<TContext> | Command<TContext>,
): boolean {
  if (!target.enabled) return false;
  let node: RegistryNode<TContext> | undefined = isNode(target) ? target.parent : target.registry;
  for (; node !== undefined; node = node.parent) {
    if (!node.enabled) return false;
  }
  return true;
}

/**
 * True when every context check on the target node and on each of its
 * ancestors accepts `context`. Checks run nearest-first and stop at the first
 * rejection. For a command, the chain starts at its owning node.
 */
export function passesContextChecks<TContext>(
  target: RegistryNode<TContext> | Command<TContext>,
  context: TContext,
): boolean {
  let node: RegistryNode<TContext> | undefined = isNode(target) ? target : target.registry;
  for (; node !== undefined; node = node.parent) {
    for (const check of node.contextChecks()) {
      if (!check(context)) return false;
    }
  }
  return true;
}
