/**
 * cmdtree Kernel — Dispatcher Tests
 *
 * dispatch/outcomes: one outcome per gate, in order
 * dispatch/logging: exactly one dispatch event, also when execution fails
 * dispatch/interleaving: administrative changes between asynchronous
 *   dispatches apply to the next dispatch and never to one in flight
 */

import { describe, it, expect } from 'vitest';
import {
  BasicCommand,
  CommandDispatcher,
  DispatchOutcome,
  LogLevel,
  RegistryEventKind,
  RootRegistry,
} from '../src/index.js';
import type { LogSink, RegistryEvent } from '../src/index.js';

interface Ctx {
  readonly user: string;
}

class MemorySink implements LogSink {
  readonly events: RegistryEvent[] = [];
  append(event: RegistryEvent): void {
    this.events.push(event);
  }
  dispatches(): RegistryEvent[] {
    return this.events.filter((e) => e.kind === RegistryEventKind.Dispatched);
  }
}

const CTX: Ctx = { user: 'ada' };

describe('dispatch/outcomes', () => {
  it('NotFound when nothing matches', async () => {
    const dispatcher = new CommandDispatcher(new RootRegistry<Ctx>());
    const result = await dispatcher.dispatch('?nothing', CTX);
    expect(result).toEqual({ outcome: DispatchOutcome.NotFound, signature: '?nothing' });
  });

  it('Executed with the command result', async () => {
    const root = new RootRegistry<Ctx>();
    const ping = new BasicCommand<Ctx>({ name: 'ping', run: (ctx) => `pong ${ctx.user}` });
    root.registerCommand(ping);

    const result = await new CommandDispatcher(root).dispatch('?ping', CTX);

    expect(result.outcome).toBe(DispatchOutcome.Executed);
    expect(result.command).toBe(ping);
    expect(result.result).toBe('pong ada');
  });

  it('awaits asynchronous commands', async () => {
    const root = new RootRegistry<Ctx>();
    root.registerCommand(new BasicCommand<Ctx>({ name: 'later', run: async () => 42 }));
    const result = await new CommandDispatcher(root).dispatch('?later', CTX);
    expect(result.result).toBe(42);
  });

  it('Disabled when the command or a namespace above it is off', async () => {
    const root = new RootRegistry<Ctx>();
    const games = root.getOrCreateChild('games');
    let runs = 0;
    games.registerCommand(new BasicCommand<Ctx>({ name: 'quiz', run: () => ++runs }));
    games.setEnabled(false);

    const result = await new CommandDispatcher(root).dispatch('?quiz', CTX);

    expect(result.outcome).toBe(DispatchOutcome.Disabled);
    expect(runs).toBe(0);
  });

  it('ContextRejected when an owner-chain check fails', async () => {
    const root = new RootRegistry<Ctx>();
    root.addContextCheck((ctx) => ctx.user !== 'banned');
    root.registerCommand(new BasicCommand<Ctx>({ name: 'ping' }));
    const dispatcher = new CommandDispatcher(root);

    expect((await dispatcher.dispatch('?ping', { user: 'banned' })).outcome).toBe(
      DispatchOutcome.ContextRejected,
    );
    expect((await dispatcher.dispatch('?ping', CTX)).outcome).toBe(DispatchOutcome.Executed);
  });

  it('Failed when the command throws or rejects', async () => {
    const root = new RootRegistry<Ctx>();
    const boom = new Error('boom');
    root.registerCommand(new BasicCommand<Ctx>({ name: 'sync', run: () => { throw boom; } }));
    root.registerCommand(new BasicCommand<Ctx>({ name: 'async', run: async () => { throw boom; } }));
    const dispatcher = new CommandDispatcher(root);

    const sync = await dispatcher.dispatch('?sync', CTX);
    const rejected = await dispatcher.dispatch('?async', CTX);

    expect(sync.outcome).toBe(DispatchOutcome.Failed);
    expect(sync.error).toBe(boom);
    expect(rejected.outcome).toBe(DispatchOutcome.Failed);
    expect(rejected.error).toBe(boom);
  });
});

describe('dispatch/logging', () => {
  it('records one event per dispatch with its outcome', async () => {
    const sink = new MemorySink();
    const root = new RootRegistry<Ctx>({ logSink: sink, logLevel: LogLevel.Debug });
    root.registerCommand(new BasicCommand<Ctx>({ name: 'ping' }));
    const dispatcher = new CommandDispatcher(root);

    await dispatcher.dispatch('?ping', CTX);
    await dispatcher.dispatch('?missing', CTX);

    expect(sink.dispatches().map((e) => e.outcome)).toEqual([
      DispatchOutcome.Executed,
      DispatchOutcome.NotFound,
    ]);
    expect(sink.dispatches()[0]?.command).toBe('ping');
    expect(sink.dispatches()[0]?.message).toBe('Dispatch of "?ping" Executed.');
  });

  it('records failures at error level with the message', async () => {
    const sink = new MemorySink();
    const root = new RootRegistry<Ctx>({ logSink: sink });
    root.getOrCreateChild('games').registerCommand(
      new BasicCommand<Ctx>({ name: 'boom', run: () => { throw new Error('kaput'); } }),
    );

    await new CommandDispatcher(root).dispatch('?boom', CTX);

    const [event] = sink.dispatches();
    expect(event?.level).toBe(LogLevel.Error);
    expect(event?.path).toBe('/games');
    expect(event?.message).toBe('Dispatch of "?boom" Failed: kaput.');
  });
});

describe('dispatch/interleaving', () => {
  it('a dispatch in flight is unaffected by a later disable; the next one sees it', async () => {
    const root = new RootRegistry<Ctx>();
    const games = root.getOrCreateChild('games');
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    games.registerCommand(
      new BasicCommand<Ctx>({
        name: 'slow',
        run: async () => {
          await gate;
          return 'done';
        },
      }),
    );
    const dispatcher = new CommandDispatcher(root);

    const inFlight = dispatcher.dispatch('?slow', CTX);
    games.setEnabled(false);
    const afterDisable = await dispatcher.dispatch('?slow', CTX);
    release();

    expect(afterDisable.outcome).toBe(DispatchOutcome.Disabled);
    expect((await inFlight).outcome).toBe(DispatchOutcome.Executed);
  });

  it('a prefix change applies to the next dispatch', async () => {
    const root = new RootRegistry<Ctx>();
    root.registerCommand(new BasicCommand<Ctx>({ name: 'ping' }));
    const dispatcher = new CommandDispatcher(root);

    const before = dispatcher.dispatch('?ping', CTX);
    root.setPrefix('!');
    const after = dispatcher.dispatch('?ping', CTX);

    expect((await before).outcome).toBe(DispatchOutcome.Executed);
    expect((await after).outcome).toBe(DispatchOutcome.NotFound);
  });
});
