/**
 * @cmdtree/kernel
 *
 * cmdtree kernel — the command registry tree, command index and resolution
 * engine, enablement and context gates, placeholders, the root directory,
 * the dispatcher, tree snapshots, and the log sink interface.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for snapshot hashing (pure computation, not I/O).
 *
 * Concrete log sinks, state persistence and configuration live in
 * @cmdtree/runtime-host.
 */

// Types
export type { Command, ContextCheck, Disableable } from './types/command.js';
export { explicitSignatures } from './types/command.js';

export type {
  BulkRegistrationReport,
  RegistrationResult,
  ValidationError,
  ValidationResult,
} from './types/errors.js';
export {
  RegistrationFailure,
  RegistryStateError,
  RegistryValidationError,
} from './types/errors.js';

export type { RegistryEvent } from './types/events.js';
export { LOG_LEVEL_ORDER, LogLevel, RegistryEventKind, parseLogLevel } from './types/events.js';

// Log sink interface (implementations live in runtime-host and cli)
export type { LogSink } from './logging/log-sink.js';
export { RegistryLogger } from './logging/registry-log.js';

// Registry tree
export type { RegistryNodeOptions, ResolveOptions } from './registry/node.js';
export { DEFAULT_PREFIX, PlaceholderNode, RegistryNode, compareNames } from './registry/node.js';
export type { RootRegistryOptions } from './registry/root.js';
export { ROOT_NAME, RootRegistry } from './registry/root.js';
export { RegistryDirectory } from './registry/directory.js';
export { CommandIndex, PriorityBucket } from './registry/command-index.js';
export { isEffectivelyEnabled, passesContextChecks } from './registry/gates.js';
export type { PathMode } from './registry/path.js';
export {
  PATH_SEPARATOR,
  assertNodeName,
  findNodeAtPath,
  joinPath,
  nodeAtPath,
  splitPath,
} from './registry/path.js';

// Commands and dispatch
export type { CommandSpec } from './commands/basic-command.js';
export { BasicCommand } from './commands/basic-command.js';
export type { DispatchResult } from './dispatch/dispatcher.js';
export { CommandDispatcher, DispatchOutcome } from './dispatch/dispatcher.js';

// Snapshots
export type { CommandSnapshot, NodeSnapshot } from './snapshot/builder.js';
export { buildTreeSnapshot, flattenSnapshot, hashTreeSnapshot } from './snapshot/builder.js';
