/**
 * Runtime assembly shared by every CLI command and the shell.
 *
 * Resolves configuration, builds a root with the configured prefix and log
 * sink, loads the admin module and every manifest in the modules directory.
 */

import { CommandDispatcher, RootRegistry } from '@cmdtree/kernel';
import type { LogSink, ValidationResult } from '@cmdtree/kernel';
import { ModuleLoader } from '@cmdtree/module-loader';
import type { FileLoadResult, LoadResult } from '@cmdtree/module-loader';
import { loadAdminModule } from '@cmdtree/module-admin';
import type { AdminContext } from '@cmdtree/module-admin';
import { FileLogSink, FileStateIO, resolveConfig } from '@cmdtree/runtime-host';
import type { ResolveConfigOptions, ResolvedConfig, StateIO } from '@cmdtree/runtime-host';
import { TeeLogSink } from './logging/console-log-sink.js';

/** Context of a message typed into the shell. */
export interface ShellContext extends AdminContext {
  readonly user: string;
}

export interface RuntimeOptions extends ResolveConfigOptions {
  /** Where registry events are persisted. Defaults to a FileStateIO on the state dir. */
  readonly stateIO?: StateIO | undefined;
  /** Additional sink receiving every recorded event (e.g. the console). */
  readonly echo?: LogSink | undefined;
}

export interface Runtime {
  readonly resolved: ResolvedConfig;
  readonly stateIO: StateIO;
  readonly root: RootRegistry<ShellContext>;
  readonly loader: ModuleLoader<ShellContext>;
  readonly dispatcher: CommandDispatcher<ShellContext>;
  readonly admin: LoadResult;
  readonly modules: ReadonlyArray<FileLoadResult>;
}

export function buildRuntime(opts: RuntimeOptions = {}): ValidationResult<Runtime> {
  const resolution = resolveConfig(opts);
  if (!resolution.ok) return resolution;
  const resolved = resolution.value;
  const { config } = resolved;

  const stateIO = opts.stateIO ?? new FileStateIO(config.stateDir);
  const fileSink = new FileLogSink(stateIO);
  const root = new RootRegistry<ShellContext>({
    defaultPrefix: config.defaultPrefix,
    logSink: opts.echo === undefined ? fileSink : new TeeLogSink(fileSink, opts.echo),
    logLevel: config.logLevel,
  });

  const loader = new ModuleLoader<ShellContext>(root);
  const admin = loadAdminModule(loader);
  const modules = loader.loadFromDirectory(config.modulesDir);

  return {
    ok: true,
    value: {
      resolved,
      stateIO,
      root,
      loader,
      dispatcher: new CommandDispatcher(root),
      admin,
      modules,
    },
  };
}
