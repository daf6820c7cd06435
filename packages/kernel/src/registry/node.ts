/**
 * cmdtree Kernel — Registry Node
 *
 * A RegistryNode is one namespace of the command tree. It holds:
 * - its own commands (node-local) and their CommandIndex;
 * - real child namespaces and placeholders, each keyed by name;
 * - inheritable configuration: prefix, enabled flag, context checks;
 * - a non-owning back-reference to its parent, used only for upward walks
 *   (effective prefix, gates, paths, change timestamps, logging).
 *
 * Tree invariants:
 * - A node name is non-empty and never contains PATH_SEPARATOR.
 * - A node has at most one parent. Nodes are linked only through
 *   getOrCreateChild() and attachChild(); attachChild() detaches from any
 *   previous parent first and refuses to create a cycle.
 * - A command name is unique across the tree of one root, and a command is
 *   owned by at most one node. Ownership moves in one synchronous step, so it
 *   is never observable as registered twice or registered nowhere.
 * - A placeholder owns no commands and no configuration. It only anchors
 *   children while no real node exists under its name.
 *
 * Every public operation here is synchronous. Node.js runs it to completion
 * before any other callback, so each call is a critical section of its own,
 * and operations spanning several nodes (absorbing a placeholder, moving a
 * subtree, moving a command) are observed either fully applied or not at all.
 * Collections are copied before they are walked so that a callback invoked
 * during a walk (a context check, a log sink) cannot corrupt the walk.
 */

import type { Command, ContextCheck } from '../types/command.js';
import type { BulkRegistrationReport, RegistrationResult } from '../types/errors.js';
import {
  RegistrationFailure,
  RegistryStateError,
  RegistryValidationError,
} from '../types/errors.js';
import { LogLevel, RegistryEventKind } from '../types/events.js';
import type { RegistryLogger } from '../logging/registry-log.js';
import { CommandIndex } from './command-index.js';
import type { PriorityBucket } from './command-index.js';
import { PATH_SEPARATOR, assertNodeName } from './path.js';

/** Prefix used when no node on the way to the root declares one. */
export const DEFAULT_PREFIX = '?';

export interface RegistryNodeOptions {
  /** Essential nodes can never be disabled. */
  readonly essential?: boolean | undefined;
  /** Explicit prefix; undefined inherits from the parent. */
  readonly prefix?: string | undefined;
}

export interface ResolveOptions {
  /**
   * Skip disabled namespaces and disabled commands while resolving, instead
   * of leaving enablement to the caller. Off by default: plain resolution is
   * gate-agnostic.
   */
  readonly enabledOnly?: boolean | undefined;
}

/** A command found below a node, and the name of the child it came through. */
interface BranchMatch<TContext> {
  readonly command: Command<TContext>;
  readonly branch: string;
}

/** Lexicographic order by UTF-16 code units, independent of locale. */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class RegistryNode<TContext = unknown> {
  readonly name: string;

  private isEssentialFlag: boolean;
  private isEnabledFlag = true;
  private explicitPrefix: string | undefined;
  private readonly checks: ContextCheck<TContext>[] = [];
  private readonly commandTable = new Map<string, Command<TContext>>();
  private readonly index = new CommandIndex<TContext>();
  private readonly subRegistries = new Map<string, RegistryNode<TContext>>();
  private readonly placeholderTable = new Map<string, RegistryNode<TContext>>();
  private parentRegistry: RegistryNode<TContext> | undefined;
  private changedAt: number = Date.now();

  /**
   * @throws {RegistryValidationError} if the name is empty or contains the separator
   */
  constructor(name: string, options: RegistryNodeOptions = {}) {
    assertNodeName(name);
    this.name = name;
    this.isEssentialFlag = options.essential === true;
    this.explicitPrefix = options.prefix;
  }

  // -------------------------------------------------------------------------
  // Identity and position
  // -------------------------------------------------------------------------

  get isPlaceholder(): boolean {
    return false;
  }

  get isRoot(): boolean {
    return false;
  }

  get parent(): RegistryNode<TContext> | undefined {
    return this.parentRegistry;
  }

  get root(): RegistryNode<TContext> {
    let current: RegistryNode<TContext> = this;
    while (current.parentRegistry !== undefined) {
      current = current.parentRegistry;
    }
    return current;
  }

  /**
   * Path from the root, e.g. `/games/trivia`. The root's own name is not part
   * of the path; a node without a parent is at `/`.
   */
  get path(): string {
    const names: string[] = [];
    for (let node: RegistryNode<TContext> = this; node.parentRegistry !== undefined; node = node.parentRegistry) {
      names.unshift(node.name);
    }
    return PATH_SEPARATOR + names.join(PATH_SEPARATOR);
  }

  /** Orders nodes by name for display. Resolution precedence never uses it. */
  compareTo(other: RegistryNode<TContext>): number {
    return compareNames(this.name, other.name);
  }

  /** Time of the last mutation in this subtree, in epoch milliseconds. */
  get lastChanged(): number {
    return this.changedAt;
  }

  /** The logger of this node's root, if the root carries one. */
  get logger(): RegistryLogger | undefined {
    return this.root.rootLogger();
  }

  // -------------------------------------------------------------------------
  // Structure: children and placeholders
  // -------------------------------------------------------------------------

  /**
   * Idempotent get-or-create of a real child namespace. A placeholder of the
   * same name is absorbed: its children move onto the new node and the
   * placeholder is discarded.
   *
   * @throws {RegistryValidationError} for an invalid name
   */
  getOrCreateChild(name: string): RegistryNode<TContext> {
    const existing = this.subRegistries.get(name);
    if (existing !== undefined) return existing;

    const created = new RegistryNode<TContext>(name);
    this.linkChild(created);
    created.log(LogLevel.Info, RegistryEventKind.NodeCreated, `Created namespace "${created.path}".`);
    return created;
  }

  /**
   * Returns the real child if there is one, otherwise the placeholder of that
   * name, creating the placeholder if needed. Lets callers address a
   * namespace without giving it functionality.
   *
   * @throws {RegistryValidationError} for an invalid name
   */
  getOrPlaceholder(name: string): RegistryNode<TContext> {
    const real = this.subRegistries.get(name);
    if (real !== undefined) return real;
    const existing = this.placeholderTable.get(name);
    if (existing !== undefined) return existing;

    const placeholder = new PlaceholderNode<TContext>(name);
    this.placeholderTable.set(name, placeholder);
    placeholder.parentRegistry = this;
    this.touch();
    placeholder.log(LogLevel.Info, RegistryEventKind.PlaceholderCreated, `Created placeholder "${placeholder.path}".`);
    return placeholder;
  }

  /**
   * Attach an existing node as a child, detaching it from its previous parent
   * first. A placeholder of the same name is absorbed into it.
   *
   * @returns false when a different child already uses the name (nothing changes)
   * @throws {RegistryValidationError} when the link would create a cycle, when
   *   `node` is a root or a placeholder, or when the subtree brings a command
   *   name that already exists under this root
   */
  attachChild(node: RegistryNode<TContext>): boolean {
    if (node === this) {
      throw new RegistryValidationError('Attempted to attach a registry into itself.');
    }
    if (node.isRoot || node.isPlaceholder) {
      throw new RegistryValidationError(`Registry "${node.name}" cannot be attached as a child.`);
    }
    for (let ancestor: RegistryNode<TContext> | undefined = this; ancestor !== undefined; ancestor = ancestor.parentRegistry) {
      if (ancestor === node) {
        throw new RegistryValidationError(
          `Attaching "${node.name}" under "${this.path}" would create a cycle.`,
        );
      }
    }

    const existing = this.subRegistries.get(node.name);
    if (existing === node) return true;
    if (existing !== undefined) return false;

    this.assertNoCommandClash(node);
    const placeholder = this.placeholderTable.get(node.name);
    if (placeholder !== undefined) node.assertCanReceive(placeholder);

    // The old parent is cleaned only after the link: this node may be one of
    // the empty placeholders above it.
    const previous = node.parentRegistry;
    if (previous !== undefined) previous.unlinkChild(node);
    this.linkChild(node);
    node.log(LogLevel.Info, RegistryEventKind.NodeAttached, `Attached namespace "${node.path}".`);
    previous?.cleanPlaceholders();
    return true;
  }

  /**
   * Unlink a real child without leaving anything in its place. Placeholders
   * emptied by the removal are cleaned up.
   *
   * @returns false if `node` is not a child of this registry
   */
  detachChild(node: RegistryNode<TContext>): boolean {
    if (this.subRegistries.get(node.name) !== node) return false;
    this.unlinkChild(node);
    this.cleanPlaceholders();
    return true;
  }

  /**
   * Remove a real child.
   *
   * - `full = true` drops the child and its whole subtree.
   * - `full = false` drops the child's functionality only: if it had children
   *   or placeholders they stay behind under a placeholder of the same name,
   *   so recreating the namespace brings them back.
   *
   * In both cases placeholders left empty up the ancestor chain are removed.
   *
   * @returns the removed node, or undefined when there was no such child
   */
  removeChild(name: string, full = false): RegistryNode<TContext> | undefined {
    const child = this.subRegistries.get(name);
    if (child === undefined) return undefined;

    const path = child.path;
    this.subRegistries.delete(name);
    child.parentRegistry = undefined;

    if (!full && child.hasDescendants()) {
      const placeholder = new PlaceholderNode<TContext>(name);
      placeholder.transferSubRegistries(child);
      this.placeholderTable.set(name, placeholder);
      placeholder.parentRegistry = this;
      this.touch();
      this.log(LogLevel.Info, RegistryEventKind.PlaceholderLeft, `Removed namespace "${path}"; placeholder keeps its children.`);
      return child;
    }

    this.touch();
    this.log(LogLevel.Info, RegistryEventKind.NodeRemoved, `Removed namespace "${path}"${full ? ' and its subtree' : ''}.`);
    this.cleanPlaceholders();
    return child;
  }

  /**
   * Move every child and placeholder of `from` onto this node, re-parenting
   * each. Either everything moves or, on a name clash, nothing does.
   *
   * @throws {RegistryValidationError} on a name clash or when `from` is an
   *   ancestor of this node
   */
  transferSubRegistries(from: RegistryNode<TContext>): void {
    if (from === this) return;
    this.assertCanReceive(from);

    for (const child of Array.from(from.subRegistries.values())) {
      from.subRegistries.delete(child.name);
      child.parentRegistry = this;
      this.subRegistries.set(child.name, child);
    }
    for (const placeholder of Array.from(from.placeholderTable.values())) {
      from.placeholderTable.delete(placeholder.name);
      placeholder.parentRegistry = this;
      this.placeholderTable.set(placeholder.name, placeholder);
    }

    const at = Date.now();
    from.touch(at);
    this.touch(at);
    this.log(LogLevel.Debug, RegistryEventKind.SubtreeTransferred, `Transferred children of "${from.name}" onto "${this.path}".`);
  }

  hasChild(name: string): boolean {
    return this.subRegistries.has(name);
  }

  getChild(name: string): RegistryNode<TContext> | undefined {
    return this.subRegistries.get(name);
  }

  hasPlaceholder(name: string): boolean {
    return this.placeholderTable.has(name);
  }

  getPlaceholder(name: string): RegistryNode<TContext> | undefined {
    return this.placeholderTable.get(name);
  }

  /** Real children, ordered by name. */
  children(): RegistryNode<TContext>[] {
    return Array.from(this.subRegistries.values()).sort((a, b) => a.compareTo(b));
  }

  /** Placeholder children, ordered by name. */
  placeholders(): RegistryNode<TContext>[] {
    return Array.from(this.placeholderTable.values()).sort((a, b) => a.compareTo(b));
  }

  /** Real children and placeholders together, ordered by name. */
  branches(): RegistryNode<TContext>[] {
    return [...this.subRegistries.values(), ...this.placeholderTable.values()].sort((a, b) =>
      a.compareTo(b),
    );
  }

  // -------------------------------------------------------------------------
  // Configuration: prefix, enablement, context checks
  // -------------------------------------------------------------------------

  get prefix(): string | undefined {
    return this.explicitPrefix;
  }

  /** Set or clear (undefined) the explicit prefix. Visible to the next lookup. */
  setPrefix(prefix: string | undefined): void {
    this.explicitPrefix = prefix;
    this.touch();
    this.log(
      LogLevel.Debug,
      RegistryEventKind.PrefixChanged,
      prefix === undefined ? `Cleared prefix of "${this.path}".` : `Set prefix of "${this.path}" to "${prefix}".`,
    );
  }

  /**
   * The nearest explicit prefix walking toward the root, else the root's
   * default. Recomputed on every call; never cached.
   */
  effectivePrefix(): string {
    if (this.explicitPrefix !== undefined) return this.explicitPrefix;
    return this.parentRegistry !== undefined
      ? this.parentRegistry.effectivePrefix()
      : this.fallbackPrefix();
  }

  get enabled(): boolean {
    return this.isEnabledFlag;
  }

  get essential(): boolean {
    return this.isEssentialFlag;
  }

  /**
   * Make this node essential. One-way: an essential node stays essential, and
   * a disabled node is enabled, since an essential node can never be off.
   */
  markEssential(): void {
    if (this.isEssentialFlag) return;
    this.isEssentialFlag = true;
    this.isEnabledFlag = true;
    this.touch();
    this.log(LogLevel.Debug, RegistryEventKind.EnabledChanged, `Marked "${this.path}" essential.`);
  }

  /**
   * @throws {RegistryStateError} when disabling an essential node
   */
  setEnabled(enabled: boolean): void {
    if (this.essential && !enabled) {
      throw new RegistryStateError(`Registry "${this.path}" is essential and cannot be disabled.`);
    }
    this.isEnabledFlag = enabled;
    this.touch();
    this.log(LogLevel.Debug, RegistryEventKind.EnabledChanged, `${enabled ? 'Enabled' : 'Disabled'} "${this.path}".`);
  }

  addContextCheck(check: ContextCheck<TContext>): void {
    this.checks.push(check);
    this.touch();
    this.log(LogLevel.Debug, RegistryEventKind.ContextChecksChanged, `Added context check to "${this.path}".`);
  }

  /** @returns false if the check was not registered here */
  removeContextCheck(check: ContextCheck<TContext>): boolean {
    const at = this.checks.indexOf(check);
    if (at === -1) return false;
    this.checks.splice(at, 1);
    this.touch();
    this.log(LogLevel.Debug, RegistryEventKind.ContextChecksChanged, `Removed context check from "${this.path}".`);
    return true;
  }

  /** Replace all checks with `check`, or remove them all when undefined. */
  setContextCheck(check: ContextCheck<TContext> | undefined): void {
    this.checks.length = 0;
    if (check !== undefined) this.checks.push(check);
    this.touch();
    this.log(
      LogLevel.Debug,
      RegistryEventKind.ContextChecksChanged,
      check === undefined ? `Removed all context checks from "${this.path}".` : `Set context check of "${this.path}".`,
    );
  }

  /** This node's own checks, in the order they were added. */
  contextChecks(): ReadonlyArray<ContextCheck<TContext>> {
    return [...this.checks];
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /**
   * Register a command into this node.
   *
   * Fails without side effects when the command is a sub-command or when a
   * different command of the same name exists anywhere under this root.
   *
   * The same instance already owned elsewhere in this tree is not a conflict:
   * it is moved, the old owner dropping it and this node taking it in the same
   * synchronous step. This deliberately departs from rejecting every name
   * already present under the root.
   */
  registerCommand(command: Command<TContext>): RegistrationResult {
    if (command.subCommand) {
      return this.reject(command, RegistrationFailure.SubCommand, `Command "${command.name}" is a sub-command and cannot be registered directly.`);
    }
    const existing = this.root.getCommand(command.name);
    if (existing !== undefined && existing !== command) {
      return this.reject(command, RegistrationFailure.DuplicateName, `A command named "${command.name}" is already registered under this root.`);
    }
    if (existing === command && command.registry === this) {
      return { ok: true };
    }

    const previous = command.registry;
    if (previous !== undefined) previous.unregisterCommand(command);

    this.commandTable.set(command.name, command);
    this.index.add(command);
    command.setRegistry(this);
    this.touch();
    this.log(LogLevel.Info, RegistryEventKind.CommandRegistered, `Registered command "${command.name}" in "${this.path}".`, command.name);
    return { ok: true };
  }

  /**
   * Register each command independently. A failure is reported and skipped;
   * it never rolls back commands registered before it.
   */
  registerAll(commands: Iterable<Command<TContext>>): BulkRegistrationReport {
    const registered: string[] = [];
    const rejected: { name: string; reason: RegistrationFailure; message: string }[] = [];
    for (const command of commands) {
      const result = this.registerCommand(command);
      if (result.ok) {
        registered.push(command.name);
      } else {
        rejected.push({ name: command.name, reason: result.reason, message: result.message });
      }
    }
    return { registered, rejected };
  }

  /** @returns false if `command` is not the command registered here under its name */
  unregisterCommand(command: Command<TContext>): boolean {
    if (this.commandTable.get(command.name) !== command) return false;
    this.commandTable.delete(command.name);
    this.index.remove(command);
    command.setRegistry(undefined);
    this.touch();
    this.log(LogLevel.Info, RegistryEventKind.CommandUnregistered, `Unregistered command "${command.name}" from "${this.path}".`, command.name);
    return true;
  }

  /** Unregister every command of this node. Children are untouched. */
  clear(): void {
    const removed = Array.from(this.commandTable.values());
    this.commandTable.clear();
    this.index.clear();
    for (const command of removed) command.setRegistry(undefined);
    this.touch();
    this.log(LogLevel.Info, RegistryEventKind.CommandsCleared, `Cleared ${removed.length} command(s) from "${this.path}".`);
  }

  /** A command registered in this node itself. */
  getRegisteredCommand(name: string): Command<TContext> | undefined {
    return this.commandTable.get(name);
  }

  /** A command registered anywhere in this subtree, placeholders included. */
  getCommand(name: string): Command<TContext> | undefined {
    const local = this.commandTable.get(name);
    if (local !== undefined) return local;
    for (const branch of this.branches()) {
      const found = branch.getCommand(name);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  /** Commands registered in this node itself, ordered by name. */
  registeredCommands(): Command<TContext>[] {
    return Array.from(this.commandTable.values()).sort((a, b) => compareNames(a.name, b.name));
  }

  /** Every command in this subtree, ordered by name. */
  commands(): Command<TContext>[] {
    const all = [...this.commandTable.values()];
    for (const branch of this.branches()) all.push(...branch.commands());
    return all.sort((a, b) => compareNames(a.name, b.name));
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  /**
   * Find the single command that handles `signature` in this subtree.
   *
   * At each node:
   * 1. the verbatim signature is looked up among prefixed commands;
   * 2. if the signature starts with the node's effective prefix, the rest is
   *    looked up among unprefixed aliases, and that candidate replaces the
   *    first one only if its priority number is strictly lower;
   * 3. a non-overrideable match is returned at once, shadowing the subtree;
   * 4. otherwise every child and placeholder is resolved in name order, and
   *    the best child result (lowest priority number, first in name order on
   *    a tie) wins over this node's own match regardless of priority.
   *
   * Gate-agnostic unless `enabledOnly` is set.
   *
   * @returns undefined when no command in the subtree matches
   */
  resolve(signature: string, options: ResolveOptions = {}): Command<TContext> | undefined {
    const enabledOnly = options.enabledOnly === true;
    if (enabledOnly) {
      for (let node: RegistryNode<TContext> | undefined = this; node !== undefined; node = node.parentRegistry) {
        if (!node.enabled) return undefined;
      }
    }
    const found = this.resolveIn(signature, enabledOnly);
    this.log(
      LogLevel.Trace,
      RegistryEventKind.Resolved,
      `Resolved "${signature}" in "${this.path}" to ${found === undefined ? 'nothing' : `"${found.name}"`}.`,
      found?.name,
    );
    return found;
  }

  private resolveIn(signature: string, enabledOnly: boolean): Command<TContext> | undefined {
    if (enabledOnly && !this.enabled) return undefined;

    let found = this.pick(this.index.bySignature(signature), enabledOnly);
    const prefix = this.effectivePrefix();
    if (signature.startsWith(prefix)) {
      const candidate = this.pick(this.index.byAlias(signature.slice(prefix.length)), enabledOnly);
      if (candidate !== undefined && (found === undefined || candidate.priority < found.priority)) {
        found = candidate;
      }
    }

    if (found !== undefined && !found.overrideable) return found;

    let deeper = this.bestBranchMatch(this.subRegistries.values(), signature, enabledOnly, undefined);
    deeper = this.bestBranchMatch(this.placeholderTable.values(), signature, enabledOnly, deeper);
    return deeper?.command ?? found;
  }

  /**
   * Fold child results into the best so far: lowest priority number, then
   * first branch in name order. Walks the maps as they are, without sorting.
   */
  private bestBranchMatch(
    branches: Iterable<RegistryNode<TContext>>,
    signature: string,
    enabledOnly: boolean,
    best: BranchMatch<TContext> | undefined,
  ): BranchMatch<TContext> | undefined {
    for (const branch of branches) {
      const command = branch.resolveIn(signature, enabledOnly);
      if (command === undefined) continue;
      if (
        best === undefined ||
        command.priority < best.command.priority ||
        (command.priority === best.command.priority && compareNames(branch.name, best.branch) < 0)
      ) {
        best = { command, branch: branch.name };
      }
    }
    return best;
  }

  private pick(
    bucket: PriorityBucket<TContext> | undefined,
    enabledOnly: boolean,
  ): Command<TContext> | undefined {
    if (bucket === undefined) return undefined;
    return enabledOnly ? bucket.first((command) => command.enabled) : bucket.peek();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Root default prefix; overridden by RootRegistry. */
  protected fallbackPrefix(): string {
    return DEFAULT_PREFIX;
  }

  /** Logger carried by a root; overridden by RootRegistry. */
  protected rootLogger(): RegistryLogger | undefined {
    return undefined;
  }

  /** Record a mutation time on this node and every ancestor. */
  protected touch(at: number = Date.now()): void {
    for (let node: RegistryNode<TContext> | undefined = this; node !== undefined; node = node.parentRegistry) {
      node.changedAt = at;
    }
  }

  protected log(level: LogLevel, kind: RegistryEventKind, message: string, command?: string): void {
    const logger = this.logger;
    if (logger === undefined || !logger.isEnabled(level)) return;
    logger.record({
      timestamp: new Date().toISOString(),
      level,
      kind,
      path: this.path,
      message,
      command,
    });
  }

  protected reject(
    command: Command<TContext>,
    reason: RegistrationFailure,
    message: string,
  ): RegistrationResult {
    this.log(LogLevel.Warn, RegistryEventKind.CommandRejected, message, command.name);
    return { ok: false, reason, message };
  }

  private hasDescendants(): boolean {
    return this.subRegistries.size > 0 || this.placeholderTable.size > 0;
  }

  /** Link a real node as a child, absorbing a same-named placeholder. */
  private linkChild(node: RegistryNode<TContext>): void {
    const placeholder = this.placeholderTable.get(node.name);
    if (placeholder !== undefined) {
      node.transferSubRegistries(placeholder);
      this.placeholderTable.delete(node.name);
      placeholder.parentRegistry = undefined;
    }
    this.subRegistries.set(node.name, node);
    node.parentRegistry = this;
    this.touch();
    if (placeholder !== undefined) {
      node.log(LogLevel.Debug, RegistryEventKind.PlaceholderAbsorbed, `Absorbed placeholder into "${node.path}".`);
    }
  }

  /** Unlink a real child; empty placeholders are left for the caller to clean. */
  private unlinkChild(node: RegistryNode<TContext>): void {
    const path = node.path;
    this.subRegistries.delete(node.name);
    node.parentRegistry = undefined;
    this.touch();
    this.log(LogLevel.Info, RegistryEventKind.NodeDetached, `Detached namespace "${path}".`);
  }

  /** Remove this node and its ancestors while they are empty placeholders. */
  private cleanPlaceholders(): void {
    let current: RegistryNode<TContext> = this;
    while (current.isPlaceholder && !current.hasDescendants()) {
      const parent = current.parentRegistry;
      if (parent === undefined) return;
      const path = current.path;
      parent.placeholderTable.delete(current.name);
      current.parentRegistry = undefined;
      parent.touch();
      parent.log(LogLevel.Debug, RegistryEventKind.PlaceholderCleaned, `Removed empty placeholder "${path}".`);
      current = parent;
    }
  }

  /**
   * @throws {RegistryValidationError} unless the children of `from` can move onto this node
   */
  private assertCanReceive(from: RegistryNode<TContext>): void {
    for (let ancestor: RegistryNode<TContext> | undefined = this; ancestor !== undefined; ancestor = ancestor.parentRegistry) {
      if (ancestor === from) {
        throw new RegistryValidationError(`Cannot move the children of "${from.path}" into its own subtree.`);
      }
    }
    for (const name of [...from.subRegistries.keys(), ...from.placeholderTable.keys()]) {
      if (this.subRegistries.has(name) || this.placeholderTable.has(name)) {
        throw new RegistryValidationError(`"${this.path}" already has a child named "${name}".`);
      }
    }
  }

  /**
   * @throws {RegistryValidationError} if the subtree of `node` brings a command
   *   name already used by another command under this root
   */
  private assertNoCommandClash(node: RegistryNode<TContext>): void {
    const root = this.root;
    for (const command of node.commands()) {
      const existing = root.getCommand(command.name);
      if (existing !== undefined && existing !== command) {
        throw new RegistryValidationError(
          `Cannot attach "${node.name}": command "${command.name}" already exists under this root.`,
        );
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Placeholder
// ---------------------------------------------------------------------------

/**
 * A structural anchor. Owns children and placeholders only; it can never
 * hold commands, a prefix, context checks, or an enabled state of its own.
 */
export class PlaceholderNode<TContext = unknown> extends RegistryNode<TContext> {
  override get isPlaceholder(): boolean {
    return true;
  }

  override registerCommand(command: Command<TContext>): RegistrationResult {
    return this.reject(command, RegistrationFailure.Placeholder, `Placeholder "${this.path}" cannot hold commands.`);
  }

  override setPrefix(_prefix: string | undefined): void {
    throw new RegistryStateError(`Placeholder "${this.path}" has no prefix of its own.`);
  }

  override setEnabled(_enabled: boolean): void {
    throw new RegistryStateError(`Placeholder "${this.path}" has no enabled state of its own.`);
  }

  override markEssential(): void {
    throw new RegistryStateError(`Placeholder "${this.path}" cannot be essential.`);
  }

  override addContextCheck(_check: ContextCheck<TContext>): void {
    throw new RegistryStateError(`Placeholder "${this.path}" cannot hold context checks.`);
  }

  override setContextCheck(_check: ContextCheck<TContext> | undefined): void {
    throw new RegistryStateError(`Placeholder "${this.path}" cannot hold context checks.`);
  }
}
