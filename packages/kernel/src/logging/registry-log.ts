/**
 * cmdtree Kernel — Registry Logger
 *
 * Filters registry events by level and forwards the rest to the injected
 * LogSink. When no sink is injected (embedded use, most tests), record() is
 * a no-op and isEnabled() reports false for every level, so callers can skip
 * building messages altogether.
 */

import type { LogSink } from './log-sink.js';
import type { RegistryEvent } from '../types/events.js';
import { LOG_LEVEL_ORDER, LogLevel } from '../types/events.js';

export class RegistryLogger {
  private readonly threshold: number;

  constructor(
    private readonly sink?: LogSink,
    readonly minLevel: LogLevel = LogLevel.Info,
  ) {
    this.threshold = LOG_LEVEL_ORDER.indexOf(minLevel);
  }

  /** Whether an event at `level` would reach the sink. */
  isEnabled(level: LogLevel): boolean {
    return this.sink !== undefined && LOG_LEVEL_ORDER.indexOf(level) >= this.threshold;
  }

  record(event: RegistryEvent): void {
    if (this.isEnabled(event.level)) {
      this.sink?.append(event);
    }
  }
}
