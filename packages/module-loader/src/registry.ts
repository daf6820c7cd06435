/**
 * cmdtree Module Loader — Module Registry
 *
 * The ModuleRegistry is the authoritative record of the modules loaded into
 * one registry tree: their manifests, the namespace node each one owns, and
 * the commands each one registered.
 *
 * Registry invariants:
 * - module_id is unique per tree
 * - a module's status is the enabled flag of its namespace node, never a copy
 * - essential modules cannot be disabled
 */

import { RegistryStateError } from '@cmdtree/kernel';
import type { Command, RegistryNode } from '@cmdtree/kernel';
import type { ModuleManifest } from './manifest.js';
import { ModuleStatus } from './manifest.js';

/**
 * One loaded module: its manifest, its namespace, and the commands that were
 * accepted when it was loaded.
 */
export interface LoadedModule<TContext> {
  readonly manifest: ModuleManifest;
  readonly node: RegistryNode<TContext>;
  readonly commands: ReadonlyArray<Command<TContext>>;
}

export class ModuleRegistry<TContext = unknown> {
  private readonly entries: Map<string, LoadedModule<TContext>> = new Map();

  /**
   * Record a loaded module.
   *
   * @throws {Error} If a module with the same module_id is already registered
   */
  register(entry: LoadedModule<TContext>): void {
    const id = entry.manifest.module_id;
    if (this.entries.has(id)) {
      throw new Error(`Module already registered: ${id}. Duplicate module_id is not permitted.`);
    }
    this.entries.set(id, entry);
  }

  has(moduleId: string): boolean {
    return this.entries.has(moduleId);
  }

  get(moduleId: string): LoadedModule<TContext> | undefined {
    return this.entries.get(moduleId);
  }

  /** Loaded modules in module_id order. */
  list(): ReadonlyArray<LoadedModule<TContext>> {
    return Array.from(this.entries.values()).sort((a, b) =>
      a.manifest.module_id.localeCompare(b.manifest.module_id),
    );
  }

  /**
   * @returns the module's status, or undefined if it is not registered
   */
  getStatus(moduleId: string): ModuleStatus | undefined {
    const entry = this.entries.get(moduleId);
    if (entry === undefined) return undefined;
    return entry.node.enabled ? ModuleStatus.Enabled : ModuleStatus.Disabled;
  }

  /**
   * Enable the module's namespace node.
   *
   * @throws {Error} If the module is not registered
   */
  enable(moduleId: string): void {
    this.require(moduleId).node.setEnabled(true);
  }

  /**
   * Disable the module's namespace node. Commands stay registered; the
   * dispatcher reports them as disabled.
   *
   * @throws {Error} If the module is not registered
   * @throws {RegistryStateError} If the module is essential
   */
  disable(moduleId: string): void {
    const entry = this.require(moduleId);
    if (entry.manifest.essential === true) {
      throw new RegistryStateError(`Module ${moduleId} is essential and cannot be disabled.`);
    }
    entry.node.setEnabled(false);
  }

  /**
   * Unregister the module's commands and remove its namespace.
   *
   * Removal is non-destructive: a namespace that still has sub-namespaces is
   * left behind as a placeholder. The root and namespaces shared with another
   * loaded module stay in place.
   *
   * @returns false if the module is not registered
   */
  unload(moduleId: string): boolean {
    const entry = this.entries.get(moduleId);
    if (entry === undefined) return false;
    this.entries.delete(moduleId);

    for (const command of entry.commands) {
      command.registry?.unregisterCommand(command);
    }

    const { node } = entry;
    const shared = Array.from(this.entries.values()).some((other) => other.node === node);
    const parent = node.parent;
    if (!shared && parent !== undefined && node.registeredCommands().length === 0) {
      parent.removeChild(node.name);
    }
    return true;
  }

  private require(moduleId: string): LoadedModule<TContext> {
    const entry = this.entries.get(moduleId);
    if (entry === undefined) {
      throw new Error(`Module not registered: ${moduleId}`);
    }
    return entry;
  }
}
