/**
 * cmdtree Kernel — Command Dispatcher
 *
 * The single path from an inbound signature to a command's execution.
 * Resolution itself is gate-agnostic; the dispatcher is the caller that
 * applies the gates:
 *
 * 1. resolve the signature at the root;
 * 2. NotFound when nothing matched;
 * 3. Disabled when the command or any registry above it is disabled;
 * 4. ContextRejected when a context check on the owner chain fails;
 * 5. otherwise execute, yielding Executed or Failed.
 *
 * Every dispatch records exactly one event, whatever the outcome, including
 * when execute() throws or rejects.
 *
 * Steps 1–4 run synchronously before the first await. Registry mutations
 * are synchronous too, so a dispatch sees the tree either entirely before or
 * entirely after any administrative change, never in between.
 */

import type { Command } from '../types/command.js';
import { LogLevel, RegistryEventKind } from '../types/events.js';
import type { RegistryNode } from '../registry/node.js';
import { isEffectivelyEnabled, passesContextChecks } from '../registry/gates.js';

export enum DispatchOutcome {
  NotFound = 'NotFound',
  Disabled = 'Disabled',
  ContextRejected = 'ContextRejected',
  Executed = 'Executed',
  Failed = 'Failed',
}

export interface DispatchResult<TContext = unknown> {
  readonly outcome: DispatchOutcome;
  readonly signature: string;
  /** The resolved command; absent only for NotFound. */
  readonly command?: Command<TContext> | undefined;
  /** Value returned by execute(), for Executed. */
  readonly result?: unknown;
  /** Error thrown by execute(), for Failed. */
  readonly error?: unknown;
}

const OUTCOME_LEVEL: Readonly<Record<DispatchOutcome, LogLevel>> = {
  [DispatchOutcome.NotFound]: LogLevel.Debug,
  [DispatchOutcome.Disabled]: LogLevel.Info,
  [DispatchOutcome.ContextRejected]: LogLevel.Info,
  [DispatchOutcome.Executed]: LogLevel.Info,
  [DispatchOutcome.Failed]: LogLevel.Error,
};

export class CommandDispatcher<TContext = unknown> {
  constructor(private readonly root: RegistryNode<TContext>) {}

  async dispatch(signature: string, context: TContext): Promise<DispatchResult<TContext>> {
    const command = this.root.resolve(signature);
    if (command === undefined) {
      return this.finish({ outcome: DispatchOutcome.NotFound, signature });
    }
    if (!isEffectivelyEnabled(command)) {
      return this.finish({ outcome: DispatchOutcome.Disabled, signature, command });
    }
    if (!passesContextChecks(command, context)) {
      return this.finish({ outcome: DispatchOutcome.ContextRejected, signature, command });
    }

    try {
      const result: unknown = await command.execute?.(context);
      return this.finish({ outcome: DispatchOutcome.Executed, signature, command, result });
    } catch (error) {
      return this.finish({ outcome: DispatchOutcome.Failed, signature, command, error });
    }
  }

  private finish(result: DispatchResult<TContext>): DispatchResult<TContext> {
    const level = OUTCOME_LEVEL[result.outcome];
    const logger = this.root.logger;
    if (logger !== undefined && logger.isEnabled(level)) {
      const owner = result.command?.registry;
      const detail = result.error instanceof Error ? `: ${result.error.message}` : '';
      logger.record({
        timestamp: new Date().toISOString(),
        level,
        kind: RegistryEventKind.Dispatched,
        path: owner !== undefined ? owner.path : this.root.path,
        message: `Dispatch of "${result.signature}" ${result.outcome}${detail}.`,
        command: result.command?.name,
        outcome: result.outcome,
      });
    }
    return result;
  }
}
