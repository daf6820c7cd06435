/**
 * cmdtree Kernel — Tree Snapshot
 *
 * A plain, serializable view of a registry subtree at one point in time,
 * for display (CLI tree, Ink view, the `namespaces` command) and for cheap
 * change detection.
 *
 * Children are ordered by name (placeholders merged in), commands by name,
 * aliases alphabetically, so two trees with the same content always yield
 * the same snapshot and the same hash, whatever order they were built in.
 */

import { createHash } from 'node:crypto';
import type { Command } from '../types/command.js';
import { explicitSignatures } from '../types/command.js';
import type { RegistryNode } from '../registry/node.js';
import { compareNames } from '../registry/node.js';
import { isEffectivelyEnabled } from '../registry/gates.js';

// ---------------------------------------------------------------------------
// Snapshot shapes
// ---------------------------------------------------------------------------

export interface CommandSnapshot {
  readonly name: string;
  readonly aliases: ReadonlyArray<string>;
  /** Explicit prefix, or null when the command follows its namespace. */
  readonly prefix: string | null;
  /** What a user types: explicit signatures, or the effective prefix + each alias. */
  readonly triggers: ReadonlyArray<string>;
  readonly priority: number;
  readonly overrideable: boolean;
  readonly essential: boolean;
  readonly enabled: boolean;
  readonly effectivelyEnabled: boolean;
  readonly description: string;
}

export interface NodeSnapshot {
  readonly name: string;
  readonly path: string;
  readonly placeholder: boolean;
  /** Explicit prefix, or null when inherited. */
  readonly prefix: string | null;
  readonly effectivePrefix: string;
  readonly enabled: boolean;
  readonly effectivelyEnabled: boolean;
  readonly essential: boolean;
  readonly contextChecks: number;
  readonly commands: ReadonlyArray<CommandSnapshot>;
  readonly children: ReadonlyArray<NodeSnapshot>;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildTreeSnapshot<TContext>(node: RegistryNode<TContext>): NodeSnapshot {
  const effectivePrefix = node.effectivePrefix();
  return {
    name: node.name,
    path: node.path,
    placeholder: node.isPlaceholder,
    prefix: node.prefix ?? null,
    effectivePrefix,
    enabled: node.enabled,
    effectivelyEnabled: isEffectivelyEnabled(node),
    essential: node.essential,
    contextChecks: node.contextChecks().length,
    commands: node.registeredCommands().map((command) => snapshotCommand(command, effectivePrefix)),
    children: node.branches().map((child) => buildTreeSnapshot(child)),
  };
}

function snapshotCommand<TContext>(command: Command<TContext>, effectivePrefix: string): CommandSnapshot {
  const aliases = Array.from(command.aliases).sort(compareNames);
  return {
    name: command.name,
    aliases,
    prefix: command.prefix ?? null,
    triggers:
      command.prefix !== undefined
        ? explicitSignatures(command).sort(compareNames)
        : aliases.map((alias) => effectivePrefix + alias),
    priority: command.priority,
    overrideable: command.overrideable,
    essential: command.essential,
    enabled: command.enabled,
    effectivelyEnabled: isEffectivelyEnabled(command),
    description: command.description,
  };
}

/** Every node of a snapshot, depth-first, parents before children. */
export function flattenSnapshot(snapshot: NodeSnapshot): NodeSnapshot[] {
  return [snapshot, ...snapshot.children.flatMap(flattenSnapshot)];
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Canonical JSON: object keys sorted at every level, so equal content gives
 * an identical string regardless of property insertion order.
 */
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .sort(([a], [b]) => compareNames(a, b))
      .map(([k, v]: [string, unknown]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return '{' + pairs.join(',') + '}';
  }
  return 'null';
}

/** SHA-256 hex digest of the canonical snapshot. Equal trees hash equally. */
export function hashTreeSnapshot(snapshot: NodeSnapshot): string {
  return createHash('sha256').update(canonicalize(snapshot)).digest('hex');
}
