/**
 * cmdtree Runtime Host — File-backed Registry Log Sink
 *
 * Implements the kernel's LogSink by appending one JSON line per
 * RegistryEvent to `logs/registry.jsonl` through the injected StateIO.
 *
 * The kernel decides what to log and at which level; this sink only
 * serializes. Each line gets a fresh ULID `event_id`.
 */

import type { LogSink, RegistryEvent } from '@cmdtree/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const REGISTRY_LOG = 'registry.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly logfilename: string = REGISTRY_LOG,
  ) {}

  append(event: RegistryEvent): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: event.timestamp,
      level: event.level,
      kind: event.kind,
      path: event.path,
      message: event.message,
      command: event.command,
      outcome: event.outcome,
    });
    this.stateIO.appendLine(this.logfilename, line);
  }
}
