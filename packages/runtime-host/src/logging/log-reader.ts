/**
 * cmdtree Runtime Host — Registry Log Reader
 *
 * Pure function turning the raw text of `registry.jsonl` back into typed
 * events. Callers obtain the text through StateIO.readLogRaw().
 *
 * - malformed lines (bad JSON, missing or mistyped fields) are dropped and
 *   counted in `parseErrors`;
 * - a repeated `event_id` is dropped, the first occurrence wins;
 * - content not ending in '\n' has a partial trailing line (an interrupted
 *   write): that line is dropped and flagged;
 * - events keep file order.
 */

import type { RegistryEvent } from '@cmdtree/kernel';
import { RegistryEventKind, parseLogLevel } from '@cmdtree/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StoredRegistryEvent extends RegistryEvent {
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty complete lines seen. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<StoredRegistryEvent>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const EVENT_KINDS: ReadonlySet<string> = new Set(Object.values(RegistryEventKind));

function isEventKind(value: string): value is RegistryEventKind {
  return EVENT_KINDS.has(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/** Narrow one parsed JSON value to a stored event, or undefined. */
function toStoredEvent(parsed: unknown): StoredRegistryEvent | undefined {
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  const record = new Map<string, unknown>(Object.entries(parsed));
  const eventId = record.get('event_id');
  const timestamp = record.get('timestamp');
  const level = record.get('level');
  const kind = record.get('kind');
  const path = record.get('path');
  const message = record.get('message');
  const command = record.get('command');
  const outcome = record.get('outcome');

  if (
    typeof eventId !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof level !== 'string' ||
    typeof kind !== 'string' ||
    typeof path !== 'string' ||
    typeof message !== 'string' ||
    !optionalString(command) ||
    !optionalString(outcome)
  ) {
    return undefined;
  }
  const parsedLevel = parseLogLevel(level);
  if (parsedLevel === undefined || !isEventKind(kind)) return undefined;

  return { event_id: eventId, timestamp, level: parsedLevel, kind, path, message, command, outcome };
}

export function readRegistryLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (line) => line.length > 0,
  );

  const seen = new Set<string>();
  const events: StoredRegistryEvent[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }
    const event = toStoredEvent(parsed);
    if (event === undefined) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      events.push(event);
    }
  }

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
