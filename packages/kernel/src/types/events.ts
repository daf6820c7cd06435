/**
 * cmdtree Kernel — Registry Event Types
 *
 * Every structural mutation of a registry tree, and every dispatch, is
 * described by one RegistryEvent. Events flow to an injected LogSink; the
 * kernel itself never writes them anywhere.
 */

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Levels from most to least verbose. */
export const LOG_LEVEL_ORDER: ReadonlyArray<LogLevel> = [
  LogLevel.Trace,
  LogLevel.Debug,
  LogLevel.Info,
  LogLevel.Warn,
  LogLevel.Error,
];

/** Narrow an arbitrary string (config file, env var) to a LogLevel. */
export function parseLogLevel(raw: string): LogLevel | undefined {
  const lowered = raw.trim().toLowerCase();
  return LOG_LEVEL_ORDER.find((level) => level === lowered);
}

// ---------------------------------------------------------------------------
// Event kinds
// ---------------------------------------------------------------------------

export enum RegistryEventKind {
  NodeCreated = 'node.created',
  NodeAttached = 'node.attached',
  NodeDetached = 'node.detached',
  NodeRemoved = 'node.removed',
  SubtreeTransferred = 'node.transferred',
  PlaceholderCreated = 'placeholder.created',
  PlaceholderAbsorbed = 'placeholder.absorbed',
  PlaceholderLeft = 'placeholder.left',
  PlaceholderCleaned = 'placeholder.cleaned',
  CommandRegistered = 'command.registered',
  CommandRejected = 'command.rejected',
  CommandUnregistered = 'command.unregistered',
  CommandsCleared = 'command.cleared',
  PrefixChanged = 'config.prefix',
  EnabledChanged = 'config.enabled',
  ContextChecksChanged = 'config.context',
  Resolved = 'resolve',
  Dispatched = 'dispatch',
}

// ---------------------------------------------------------------------------
// Event entry
// ---------------------------------------------------------------------------

export interface RegistryEvent {
  /** ISO-8601 time the event was recorded. */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly kind: RegistryEventKind;
  /** Path of the node the event concerns (`/` for a root). */
  readonly path: string;
  readonly message: string;
  /** Command name, for command and dispatch events. */
  readonly command?: string | undefined;
  /** Dispatch outcome, for dispatch events. */
  readonly outcome?: string | undefined;
}
