/**
 * cmdtree Kernel — Root Registry
 *
 * The top of one command tree. A root is always essential (it can never be
 * disabled), never has a parent, supplies the default prefix for nodes that
 * declare none, and carries the RegistryLogger shared by its whole tree.
 */

import type { LogSink } from '../logging/log-sink.js';
import { RegistryLogger } from '../logging/registry-log.js';
import { LogLevel } from '../types/events.js';
import { DEFAULT_PREFIX, RegistryNode } from './node.js';

export const ROOT_NAME = 'root';

export interface RootRegistryOptions {
  /** Prefix inherited by every node without an explicit one. Defaults to `?`. */
  readonly defaultPrefix?: string | undefined;
  /** Where registry events go. Without a sink, nothing is recorded. */
  readonly logSink?: LogSink | undefined;
  readonly logLevel?: LogLevel | undefined;
}

export class RootRegistry<TContext = unknown> extends RegistryNode<TContext> {
  readonly defaultPrefix: string;
  private readonly registryLogger: RegistryLogger;

  constructor(options: RootRegistryOptions = {}) {
    super(ROOT_NAME, { essential: true });
    this.defaultPrefix = options.defaultPrefix ?? DEFAULT_PREFIX;
    this.registryLogger = new RegistryLogger(options.logSink, options.logLevel ?? LogLevel.Info);
  }

  override get isRoot(): boolean {
    return true;
  }

  protected override fallbackPrefix(): string {
    return this.defaultPrefix;
  }

  protected override rootLogger(): RegistryLogger {
    return this.registryLogger;
  }
}
