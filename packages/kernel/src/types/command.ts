/**
 * cmdtree Kernel — Command Types
 *
 * The kernel stores and orders command records; it does not implement them.
 * Anything conforming to `Command` can be registered: the BasicCommand class
 * in this package, a module-loader declaration, or a caller's own class.
 */

import type { RegistryNode } from '../registry/node.js';

// ---------------------------------------------------------------------------
// Shared contracts
// ---------------------------------------------------------------------------

/**
 * A predicate over the opaque invocation context. The kernel never inspects
 * the context; it only threads it through the predicate chain.
 */
export type ContextCheck<TContext> = (context: TContext) => boolean;

/**
 * Something that can be switched off at runtime, unless it is essential.
 *
 * An entity is *effectively* enabled only when it and every registry above
 * it are enabled; see isEffectivelyEnabled().
 */
export interface Disableable {
  readonly enabled: boolean;
  /** Essential entities can never be disabled. Fixed at construction. */
  readonly essential: boolean;
  /**
   * @throws {RegistryStateError} when disabling an essential entity
   */
  setEnabled(enabled: boolean): void;
}

// ---------------------------------------------------------------------------
// Command record
// ---------------------------------------------------------------------------

export interface Command<TContext = unknown> extends Disableable {
  /** Unique across the whole tree of one root. */
  readonly name: string;
  readonly aliases: ReadonlySet<string>;
  /**
   * Explicit prefix. When set, the command is matched by its full signatures
   * (prefix + alias) only; when undefined, its aliases follow the effective
   * prefix of the owning node.
   */
  readonly prefix: string | undefined;
  /** Lower numbers win ties inside one identifier bucket. */
  readonly priority: number;
  /** Whether a match found deeper in the tree may supersede this one. */
  readonly overrideable: boolean;
  /** Sub-commands are invoked through a parent command and are never registered. */
  readonly subCommand: boolean;
  readonly description: string;
  readonly usage: string;
  /** The node that currently owns this command, if any. */
  readonly registry: RegistryNode<TContext> | undefined;
  /**
   * Record the owning node. Called only by the node performing the
   * (un)registration.
   */
  setRegistry(registry: RegistryNode<TContext> | undefined): void;
  /** Run the command. The kernel only calls this through the dispatcher. */
  execute?(context: TContext): unknown;
}

/**
 * The full signatures of a command that declares an explicit prefix.
 * Commands without a prefix have none: their aliases are matched after the
 * owning node's effective prefix is stripped.
 */
export function explicitSignatures<TContext>(command: Command<TContext>): string[] {
  const prefix = command.prefix;
  if (prefix === undefined) return [];
  return Array.from(command.aliases, (alias) => prefix + alias);
}
