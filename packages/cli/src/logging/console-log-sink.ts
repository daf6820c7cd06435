/**
 * Console sinks for registry events.
 *
 * ConsoleLogSink prints one colored line per event; TeeLogSink fans a single
 * event stream out to several sinks (file + console in the shell).
 */

import type { LogSink, RegistryEvent } from '@cmdtree/kernel'
import { levelColor, outcomeColor, t } from '../tui/theme.js'

/** Anything with a `write(text)` method: process.stderr, a test buffer. */
export interface TextOutput {
  write(text: string): unknown
}

export function formatEvent(event: RegistryEvent): string {
  const time  = event.timestamp.slice(11, 19)
  const level = event.level.toUpperCase().padEnd(5)
  const tail  = event.outcome !== undefined ? ' ' + outcomeColor(event.outcome)(`[${event.outcome}]`) : ''
  return (
    t.dim(time) + ' ' +
    levelColor(event.level)(level) + ' ' +
    t.blueDim(event.kind) + ' ' +
    t.text(event.message) +
    tail
  )
}

export class ConsoleLogSink implements LogSink {
  constructor(private readonly out: TextOutput = process.stderr) {}

  append(event: RegistryEvent): void {
    this.out.write(formatEvent(event) + '\n')
  }
}

export class TeeLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks
  }

  append(event: RegistryEvent): void {
    for (const sink of this.sinks) sink.append(event)
  }
}
