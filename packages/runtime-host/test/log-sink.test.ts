/**
 * cmdtree Runtime Host — FileLogSink Tests
 *
 *   LOG-1: each event becomes one registry.jsonl line with a ULID event_id
 *   LOG-2: two events get distinct event_ids
 *   LOG-3: a root wired to the sink logs its mutations, readable back
 *
 * Isolation: uses MemoryStateIO; no filesystem I/O.
 */

import { describe, it, expect } from 'vitest';
import { BasicCommand, LogLevel, RegistryEventKind, RootRegistry } from '@cmdtree/kernel';
import type { RegistryEvent } from '@cmdtree/kernel';
import { FileLogSink, REGISTRY_LOG } from '../src/logging/file-log-sink.js';
import { readRegistryLog } from '../src/logging/log-reader.js';
import { ulid } from '../src/logging/ulid.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const EVENT: RegistryEvent = {
  timestamp: '2026-03-01T12:00:00.000Z',
  level: LogLevel.Info,
  kind: RegistryEventKind.CommandRegistered,
  path: '/games',
  message: 'Registered command "trivia" in "/games".',
  command: 'trivia',
};

describe('FileLogSink', () => {
  it('LOG-1: writes one line with the event fields and a ULID', () => {
    const stateIO = new MemoryStateIO();
    new FileLogSink(stateIO).append(EVENT);

    const lines = stateIO.readLines(REGISTRY_LOG);
    expect(lines).toHaveLength(1);
    const { events } = readRegistryLog(stateIO.readLogRaw(REGISTRY_LOG));
    expect(events).toHaveLength(1);
    expect(events[0]?.event_id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(events[0]?.path).toBe('/games');
    expect(events[0]?.command).toBe('trivia');
    expect(events[0]?.outcome).toBeUndefined();
  });

  it('LOG-2: gives every line its own event_id', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO);
    sink.append(EVENT);
    sink.append(EVENT);

    const { events } = readRegistryLog(stateIO.readLogRaw(REGISTRY_LOG));
    expect(events).toHaveLength(2);
    expect(events[0]?.event_id).not.toBe(events[1]?.event_id);
  });

  it('LOG-3: records registry mutations made through a root', () => {
    const stateIO = new MemoryStateIO();
    const root = new RootRegistry({ logSink: new FileLogSink(stateIO) });
    root.getOrCreateChild('games').registerCommand(new BasicCommand({ name: 'trivia' }));

    const { events } = readRegistryLog(stateIO.readLogRaw(REGISTRY_LOG));
    expect(events.map((e) => e.kind)).toEqual([
      RegistryEventKind.NodeCreated,
      RegistryEventKind.CommandRegistered,
    ]);
  });
});

describe('ulid', () => {
  it('encodes the time in the first ten characters', () => {
    expect(ulid(0).slice(0, 10)).toBe('0000000000');
    expect(ulid(32).slice(0, 10)).toBe('0000000010');
    expect(ulid(1).slice(0, 10) < ulid(2).slice(0, 10)).toBe(true);
  });
});
