/**
 * @cmdtree/runtime-host
 *
 * cmdtree runtime host — the side-effectful half of the project: file-backed
 * log sink, state I/O, and configuration resolution. Depends on
 * @cmdtree/kernel for interfaces; no kernel code imports from this package.
 */

// Configuration
export type {
  CmdtreeConfig,
  CmdtreeConfigFile,
  ConfigSource,
  ResolveConfigOptions,
  ResolvedConfig,
} from './config.js';
export { CONFIG_FILENAME, DEFAULT_CONFIG, resolveConfig, validateConfig } from './config.js';

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Logging
export { FileLogSink, REGISTRY_LOG } from './logging/file-log-sink.js';
export type { LogReadResult, LogReadStats, StoredRegistryEvent } from './logging/log-reader.js';
export { readRegistryLog } from './logging/log-reader.js';

// ULID generator (used as event_id in log lines)
export { ulid } from './logging/ulid.js';
