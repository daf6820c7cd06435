/**
 * cmdtree Module Loader — Manifest Types
 *
 * A module is a declarative bundle of commands contributed into one
 * namespace of a registry tree. The manifest says where the namespace lives,
 * how it is configured, and which commands it holds; behaviour comes from
 * handlers supplied at load time, or from a fixed `reply` text.
 */

/**
 * One command contributed by a module.
 */
export interface CommandDeclaration {
  /** Unique across the whole tree the module is loaded into. */
  readonly name: string;
  /** Identifiers matched after the prefix. Defaults to `[name]`. */
  readonly aliases?: ReadonlyArray<string> | undefined;
  /** Explicit prefix; when absent the namespace's effective prefix applies. */
  readonly prefix?: string | undefined;
  /** Integer, lower wins. Defaults to 0. */
  readonly priority?: number | undefined;
  readonly overrideable?: boolean | undefined;
  readonly essential?: boolean | undefined;
  readonly description?: string | undefined;
  readonly usage?: string | undefined;
  /** Text returned when no handler is supplied for this command. */
  readonly reply?: string | undefined;
}

export interface ModuleManifest {
  /** Stable identifier, e.g. `games.trivia`. */
  readonly module_id: string;
  readonly module_name: string;
  /** Semantic version string. */
  readonly version: string;
  readonly description: string;
  /** Namespace path under the root, e.g. `/games/trivia`; `/` is the root itself. */
  readonly path: string;
  /** Explicit prefix for the namespace. */
  readonly prefix?: string | undefined;
  /** Essential modules can never be disabled through the module registry. */
  readonly essential?: boolean | undefined;
  /** Initial state of the namespace. Defaults to true. */
  readonly enabled?: boolean | undefined;
  readonly commands: ReadonlyArray<CommandDeclaration>;
}

export enum ModuleStatus {
  Enabled = 'Enabled',
  Disabled = 'Disabled',
}

/**
 * Behaviour bound to a declared command at load time, keyed by command name.
 */
export type CommandHandler<TContext> = (context: TContext) => unknown;

export type CommandHandlers<TContext> = Readonly<Record<string, CommandHandler<TContext>>>;
