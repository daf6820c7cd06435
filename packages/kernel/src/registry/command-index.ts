/**
 * cmdtree Kernel — Command Index
 *
 * Per-node lookup tables used by the resolution engine.
 *
 * A command lands in exactly one of the two tables of its owning node:
 * - `signatures`: commands with an explicit prefix, keyed by every full
 *   signature (prefix + alias);
 * - `aliases`: commands without a prefix, keyed by bare alias.
 *
 * Each key maps to a PriorityBucket. Ordering inside a bucket is a total
 * order: ascending priority number, and among equal priorities the command
 * registered first comes first.
 */

import type { Command } from '../types/command.js';
import { explicitSignatures } from '../types/command.js';

// ---------------------------------------------------------------------------
// Priority bucket
// ---------------------------------------------------------------------------

/**
 * A sorted multiset of commands sharing one identifier.
 */
export class PriorityBucket<TContext> {
  private readonly members: Command<TContext>[] = [];

  /**
   * Insert after every member whose priority is lower or equal, so equal
   * priorities keep registration order.
   */
  add(command: Command<TContext>): void {
    let low = 0;
    let high = this.members.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const member = this.members[mid];
      if (member !== undefined && member.priority <= command.priority) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.members.splice(low, 0, command);
  }

  remove(command: Command<TContext>): boolean {
    const at = this.members.indexOf(command);
    if (at === -1) return false;
    this.members.splice(at, 1);
    return true;
  }

  /** The highest-precedence member. */
  peek(): Command<TContext> | undefined {
    return this.members[0];
  }

  /** The highest-precedence member satisfying `accept`. */
  first(accept: (command: Command<TContext>) => boolean): Command<TContext> | undefined {
    return this.members.find(accept);
  }

  get size(): number {
    return this.members.length;
  }

  values(): ReadonlyArray<Command<TContext>> {
    return [...this.members];
  }
}

// ---------------------------------------------------------------------------
// Command index
// ---------------------------------------------------------------------------

export class CommandIndex<TContext> {
  private readonly signatures = new Map<string, PriorityBucket<TContext>>();
  private readonly aliases = new Map<string, PriorityBucket<TContext>>();

  add(command: Command<TContext>): void {
    const [table, keys] = this.keysFor(command);
    for (const key of keys) {
      let bucket = table.get(key);
      if (bucket === undefined) {
        bucket = new PriorityBucket<TContext>();
        table.set(key, bucket);
      }
      bucket.add(command);
    }
  }

  remove(command: Command<TContext>): void {
    const [table, keys] = this.keysFor(command);
    for (const key of keys) {
      const bucket = table.get(key);
      if (bucket === undefined) continue;
      bucket.remove(command);
      if (bucket.size === 0) table.delete(key);
    }
  }

  /** Bucket for a full signature (commands with an explicit prefix). */
  bySignature(signature: string): PriorityBucket<TContext> | undefined {
    return this.signatures.get(signature);
  }

  /** Bucket for a bare alias (commands without a prefix). */
  byAlias(alias: string): PriorityBucket<TContext> | undefined {
    return this.aliases.get(alias);
  }

  clear(): void {
    this.signatures.clear();
    this.aliases.clear();
  }

  private keysFor(
    command: Command<TContext>,
  ): [Map<string, PriorityBucket<TContext>>, ReadonlyArray<string>] {
    return command.prefix !== undefined
      ? [this.signatures, explicitSignatures(command)]
      : [this.aliases, Array.from(command.aliases)];
  }
}
