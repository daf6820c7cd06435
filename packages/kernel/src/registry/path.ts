/**
 * cmdtree Kernel — Namespace Paths
 *
 * A path is a sequence of node names joined by PATH_SEPARATOR, written from
 * the root: `/games/trivia`. The root itself is `/`. Node names can never
 * contain the separator, so splitting is unambiguous.
 */

import type { RegistryNode } from './node.js';
import { RegistryValidationError } from '../types/errors.js';

export const PATH_SEPARATOR = '/';

/**
 * Reject names that cannot address a node.
 *
 * @throws {RegistryValidationError} for an empty name or one containing the separator
 */
export function assertNodeName(name: string): void {
  if (typeof name !== 'string' || name === '') {
    throw new RegistryValidationError('Registry name must be a non-empty string.');
  }
  if (name.includes(PATH_SEPARATOR)) {
    throw new RegistryValidationError(
      `Registry name cannot contain '${PATH_SEPARATOR}': "${name}".`,
    );
  }
}

/** `/a/b/` → `['a', 'b']`. Empty segments are dropped. */
export function splitPath(path: string): string[] {
  return path.split(PATH_SEPARATOR).filter((segment) => segment !== '');
}

/** `['a', 'b']` → `/a/b`; `[]` → `/`. */
export function joinPath(segments: ReadonlyArray<string>): string {
  return PATH_SEPARATOR + segments.join(PATH_SEPARATOR);
}

/**
 * How nodeAtPath() materializes missing segments.
 *
 * - `address`: every segment through getOrPlaceholder(); nothing functional
 *   is created, so deep paths can be referenced freely.
 * - `create`: intermediate segments through getOrPlaceholder(), the last
 *   one through getOrCreateChild().
 */
export type PathMode = 'address' | 'create';

export function nodeAtPath<TContext>(
  start: RegistryNode<TContext>,
  path: string,
  mode: PathMode,
): RegistryNode<TContext> {
  const segments = splitPath(path);
  let node = start;
  segments.forEach((segment, i) => {
    const last = i === segments.length - 1;
    node = mode === 'create' && last
      ? node.getOrCreateChild(segment)
      : node.getOrPlaceholder(segment);
  });
  return node;
}

/**
 * Walk an existing path without creating anything. Real children are
 * preferred over placeholders of the same name.
 */
export function findNodeAtPath<TContext>(
  start: RegistryNode<TContext>,
  path: string,
): RegistryNode<TContext> | undefined {
  let node: RegistryNode<TContext> | undefined = start;
  for (const segment of splitPath(path)) {
    if (node === undefined) return undefined;
    node = node.getChild(segment) ?? node.getPlaceholder(segment);
  }
  return node;
}
