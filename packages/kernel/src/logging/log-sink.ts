/**
 * cmdtree Kernel — Log Sink Interface
 *
 * The injection point for registry event persistence.
 *
 * The kernel owns this contract and the RegistryLogger class. Concrete sinks
 * live outside the kernel (FileLogSink in runtime-host, ConsoleLogSink in the
 * CLI) and are handed to a root registry at construction time, so the kernel
 * never writes to disk or to a terminal itself.
 */

import type { RegistryEvent } from '../types/events.js';

/**
 * A sink that receives registry events.
 *
 * append() is called synchronously from inside registry mutations. It must
 * not mutate the registry tree it is observing, and it must not silently
 * discard entries: a sink that cannot persist an entry throws.
 */
export interface LogSink {
  append(event: RegistryEvent): void;
}
