/**
 * cmdtree Kernel — Registry Directory
 *
 * Maps a client identity (a guild, a chat, a tenant: any Map key) to its own
 * RootRegistry. Roots are created lazily on first lookup and share the
 * options the directory was built with.
 */

import { RegistryValidationError } from '../types/errors.js';
import { RootRegistry } from './root.js';
import type { RootRegistryOptions } from './root.js';

export class RegistryDirectory<TKey, TContext = unknown> {
  private readonly roots = new Map<TKey, RootRegistry<TContext>>();

  constructor(private readonly options: RootRegistryOptions = {}) {}

  /**
   * The root for `key`, created on first use. Repeated calls with the same
   * key return the same instance.
   *
   * @throws {RegistryValidationError} for a null or undefined key
   */
  getRegistry(key: TKey): RootRegistry<TContext> {
    if (key === null || key === undefined) {
      throw new RegistryValidationError('A registry key is required.');
    }
    let root = this.roots.get(key);
    if (root === undefined) {
      root = new RootRegistry<TContext>(this.options);
      this.roots.set(key, root);
    }
    return root;
  }

  hasRegistry(key: TKey): boolean {
    return this.roots.has(key);
  }

  /** Drop the root for `key`; the next getRegistry() starts a fresh tree. */
  removeRegistry(key: TKey): boolean {
    return this.roots.delete(key);
  }

  keys(): TKey[] {
    return Array.from(this.roots.keys());
  }

  get size(): number {
    return this.roots.size;
  }
}
