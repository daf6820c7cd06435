/**
 * cmdtree First-Party Admin Module — Command Handlers
 *
 * Each handler returns the reply text for the invoking user. Refusals
 * (essential targets, unknown signatures, missing arguments) are replies,
 * not errors: the command itself ran fine.
 */

import { buildTreeSnapshot, findNodeAtPath, flattenSnapshot } from '@cmdtree/kernel';
import type { Command, NodeSnapshot, RegistryNode } from '@cmdtree/kernel';
import type { CommandHandlers } from '@cmdtree/module-loader';

/**
 * What the admin commands need from an invocation context.
 */
export interface AdminContext {
  /** Words after the signature. */
  readonly args: ReadonlyArray<string>;
  /** When explicitly false, every admin command refuses to act. */
  readonly isOperator?: boolean | undefined;
}

const NOT_OPERATOR = 'Only an operator can change the command registry.';

type Toggle = 'enable' | 'disable';

function pastTense(action: Toggle): string {
  return action === 'enable' ? 'enabled' : 'disabled';
}

function toggleCommand<TContext>(command: Command<TContext>, action: Toggle): string {
  const enable = action === 'enable';
  if (!enable && command.essential) {
    return `Command "${command.name}" is essential and cannot be disabled.`;
  }
  if (command.enabled === enable) {
    return `Command "${command.name}" is already ${pastTense(action)}.`;
  }
  command.setEnabled(enable);
  return `${enable ? 'Enabled' : 'Disabled'} command "${command.name}".`;
}

function toggleNamespace<TContext>(root: RegistryNode<TContext>, path: string, action: Toggle): string {
  const node = findNodeAtPath(root, path);
  if (node === undefined || node.isPlaceholder) {
    return `No namespace at "${path}".`;
  }
  const enable = action === 'enable';
  if (!enable && node.essential) {
    return `Namespace "${node.path}" is essential and cannot be disabled.`;
  }
  if (node.enabled === enable) {
    return `Namespace "${node.path}" is already ${pastTense(action)}.`;
  }
  node.setEnabled(enable);
  return `${enable ? 'Enabled' : 'Disabled'} namespace "${node.path}".`;
}

function toggle<TContext>(root: RegistryNode<TContext>, args: ReadonlyArray<string>, action: Toggle): string {
  const [first, second] = args;
  if (first === undefined || (first === 'namespace' && second === undefined)) {
    return `Usage: ${action} <signature> | ${action} namespace <path>`;
  }
  if (first === 'namespace' && second !== undefined) {
    return toggleNamespace(root, second, action);
  }
  const command = root.resolve(first);
  if (command === undefined) {
    return `No command matches "${first}".`;
  }
  return toggleCommand(command, action);
}

function setPrefix<TContext>(root: RegistryNode<TContext>, args: ReadonlyArray<string>): string {
  const [path, value] = args;
  if (path === undefined) return 'Usage: prefix <path> [value]';
  const node = findNodeAtPath(root, path);
  if (node === undefined || node.isPlaceholder) {
    return `No namespace at "${path}".`;
  }
  node.setPrefix(value);
  return value === undefined
    ? `Cleared prefix of "${node.path}"; it now uses "${node.effectivePrefix()}".`
    : `Set prefix of "${node.path}" to "${value}".`;
}

function describeNode(node: NodeSnapshot): string {
  const state = node.placeholder ? 'placeholder' : node.effectivelyEnabled ? 'enabled' : 'disabled';
  const count = node.commands.length;
  return `${node.path} ${node.effectivePrefix} ${state} (${count} command${count === 1 ? '' : 's'})`;
}

/**
 * Bind the admin commands to the tree they administer.
 */
export function createAdminHandlers<TContext extends AdminContext>(
  root: RegistryNode<TContext>,
): CommandHandlers<TContext> {
  const guard =
    (run: (args: ReadonlyArray<string>) => string) =>
    (context: TContext): string =>
      context.isOperator === false ? NOT_OPERATOR : run(context.args);

  return {
    disable: guard((args) => toggle(root, args, 'disable')),
    enable: guard((args) => toggle(root, args, 'enable')),
    prefix: guard((args) => setPrefix(root, args)),
    namespaces: guard(() => flattenSnapshot(buildTreeSnapshot(root)).map(describeNode).join('\n')),
  };
}
