/**
 * cmdtree Kernel — Basic Command
 *
 * A plain Command record built from a spec object. Callers that need
 * behaviour pass `run`; everything else has a default.
 */

import type { Command } from '../types/command.js';
import { RegistryStateError, RegistryValidationError } from '../types/errors.js';
import type { RegistryNode } from '../registry/node.js';

export interface CommandSpec<TContext = unknown> {
  readonly name: string;
  /**
   * Identifiers matched after the prefix. Defaults to `[name]`. An empty set
   * registers the command without any signature reaching it.
   */
  readonly aliases?: Iterable<string> | undefined;
  readonly prefix?: string | undefined;
  /** Integer; lower wins. Defaults to 0. */
  readonly priority?: number | undefined;
  readonly overrideable?: boolean | undefined;
  readonly essential?: boolean | undefined;
  readonly enabled?: boolean | undefined;
  readonly subCommand?: boolean | undefined;
  readonly description?: string | undefined;
  readonly usage?: string | undefined;
  readonly run?: ((context: TContext) => unknown) | undefined;
}

export class BasicCommand<TContext = unknown> implements Command<TContext> {
  readonly name: string;
  readonly aliases: ReadonlySet<string>;
  readonly prefix: string | undefined;
  readonly priority: number;
  readonly overrideable: boolean;
  readonly essential: boolean;
  readonly subCommand: boolean;
  readonly description: string;
  readonly usage: string;

  private isEnabledFlag: boolean;
  private owner: RegistryNode<TContext> | undefined;
  private readonly run: ((context: TContext) => unknown) | undefined;

  /**
   * @throws {RegistryValidationError} for an invalid name, an empty alias, or a
   *   non-integer priority
   */
  constructor(spec: CommandSpec<TContext>) {
    if (spec.name.trim() === '') {
      throw new RegistryValidationError('Command name must be a non-empty string.');
    }
    const aliases = new Set(spec.aliases ?? [spec.name]);
    for (const alias of aliases) {
      if (alias.length === 0) {
        throw new RegistryValidationError(`Command "${spec.name}" has an empty alias.`);
      }
    }
    const priority = spec.priority ?? 0;
    if (!Number.isInteger(priority)) {
      throw new RegistryValidationError(`Command "${spec.name}" priority must be an integer, got ${priority}.`);
    }

    this.name = spec.name;
    this.aliases = aliases;
    this.prefix = spec.prefix;
    this.priority = priority;
    this.overrideable = spec.overrideable ?? true;
    this.essential = spec.essential === true;
    this.subCommand = spec.subCommand === true;
    this.description = spec.description ?? '';
    this.usage = spec.usage ?? '';
    this.run = spec.run;
    this.isEnabledFlag = this.essential || spec.enabled !== false;
  }

  get enabled(): boolean {
    return this.isEnabledFlag;
  }

  setEnabled(enabled: boolean): void {
    if (this.essential && !enabled) {
      throw new RegistryStateError(`Command "${this.name}" is essential and cannot be disabled.`);
    }
    this.isEnabledFlag = enabled;
  }

  get registry(): RegistryNode<TContext> | undefined {
    return this.owner;
  }

  setRegistry(registry: RegistryNode<TContext> | undefined): void {
    this.owner = registry;
  }

  execute(context: TContext): unknown {
    return this.run?.(context);
  }
}
