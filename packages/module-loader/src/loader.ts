/**
 * cmdtree Module Loader — Module Loader
 *
 * The ModuleLoader validates module manifests and loads them into a registry
 * tree.
 *
 * Loading is a multi-step process:
 * 1. Validate manifest structure (ModuleValidator.validateManifest)
 * 2. Refuse a module_id that is already loaded
 * 3. Refuse handlers bound to commands the manifest does not declare
 * 4. Address the namespace path (parents as placeholders, leaf created)
 * 5. Apply the namespace prefix, essential flag and initial enabled state
 * 6. Bulk-register one BasicCommand per declaration
 * 7. Record the module in the ModuleRegistry
 *
 * Step 6 tolerates partial failure: a command whose name is already taken in
 * the tree is reported as rejected and the rest of the module still loads.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { BasicCommand, nodeAtPath } from '@cmdtree/kernel';
import type { BulkRegistrationReport, Command, RegistryNode, ValidationResult } from '@cmdtree/kernel';
import type { CommandDeclaration, CommandHandlers, ModuleManifest } from './manifest.js';
import { ModuleRegistry } from './registry.js';
import { ModuleValidator } from './validator.js';

// ---------------------------------------------------------------------------
// Load Result
// ---------------------------------------------------------------------------

/**
 * The result of a module load attempt.
 * A discriminated union: either success with the loaded module_id and the
 * per-command outcome, or failure with a structured reason.
 */
export type LoadResult =
  | {
      readonly ok: true;
      readonly module_id: string;
      readonly path: string;
      readonly registered: BulkRegistrationReport['registered'];
      readonly rejected: BulkRegistrationReport['rejected'];
    }
  | { readonly ok: false; readonly reason: string; readonly details?: string | undefined };

/** One manifest file of a directory load. */
export interface FileLoadResult {
  readonly file: string;
  readonly result: LoadResult;
}

// ---------------------------------------------------------------------------
// Module Loader
// ---------------------------------------------------------------------------

export class ModuleLoader<TContext = unknown> {
  private readonly validator = new ModuleValidator();

  constructor(
    readonly root: RegistryNode<TContext>,
    readonly registry: ModuleRegistry<TContext> = new ModuleRegistry<TContext>(),
  ) {}

  /**
   * Load a module manifest through the full pipeline.
   *
   * @param manifest - Parsed manifest JSON or a typed ModuleManifest
   * @param handlers - Behaviour per declared command name; commands without
   *   a handler answer with their `reply` text
   */
  load(manifest: unknown, handlers: CommandHandlers<TContext> = {}): LoadResult {
    const validation = this.validator.validateManifest(manifest);
    if (!validation.ok) {
      return {
        ok: false,
        reason: 'Manifest validation failed',
        details: validation.errors.map((e) => e.message).join('; '),
      };
    }
    const module = validation.value;

    if (this.registry.has(module.module_id)) {
      return {
        ok: false,
        reason: `Module already loaded: ${module.module_id}`,
      };
    }

    const declared = new Set(module.commands.map((c) => c.name));
    const unbound = Object.keys(handlers).filter((name) => !declared.has(name)).sort();
    if (unbound.length > 0) {
      return {
        ok: false,
        reason: 'Handlers supplied for undeclared commands',
        details: unbound.join(', '),
      };
    }

    const commands = module.commands.map((declaration) =>
      buildCommand(declaration, handlers[declaration.name]),
    );

    const node = nodeAtPath(this.root, module.path, 'create');
    if (module.essential === true) node.markEssential();
    if (module.prefix !== undefined) node.setPrefix(module.prefix);
    if (module.enabled === false) node.setEnabled(false);
    const report = node.registerAll(commands);
    const accepted = new Set(report.registered);

    this.registry.register({
      manifest: module,
      node,
      commands: commands.filter((c) => accepted.has(c.name)),
    });

    return {
      ok: true,
      module_id: module.module_id,
      path: node.path,
      registered: report.registered,
      rejected: report.rejected,
    };
  }

  /**
   * Load every `*.json` manifest in a directory, in file name order. Each
   * file loads independently: one bad manifest does not stop the others.
   *
   * @returns one result per manifest file; empty when the directory does not exist
   */
  loadFromDirectory(dir: string, handlers: Readonly<Record<string, CommandHandlers<TContext>>> = {}): FileLoadResult[] {
    let files: string[];
    try {
      files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    return files.map((file) => {
      const parsed = parseManifestFile(join(dir, file));
      if (!parsed.ok) return { file, result: parsed };
      const id = moduleIdOf(parsed.value);
      return { file, result: this.load(parsed.value, id === undefined ? {} : handlers[id]) };
    });
  }

  /** Validate without loading. */
  validate(manifest: unknown): ValidationResult<ModuleManifest> {
    return this.validator.validateManifest(manifest);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildCommand<TContext>(
  declaration: CommandDeclaration,
  handler: ((context: TContext) => unknown) | undefined,
): Command<TContext> {
  const reply = declaration.reply;
  return new BasicCommand<TContext>({
    name: declaration.name,
    aliases: declaration.aliases,
    prefix: declaration.prefix,
    priority: declaration.priority,
    overrideable: declaration.overrideable,
    essential: declaration.essential,
    description: declaration.description,
    usage: declaration.usage,
    run: handler ?? (reply === undefined ? undefined : () => reply),
  });
}

/**
 * Read and parse one manifest file. Validation happens in load().
 */
export function parseManifestFile(
  file: string,
): { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly reason: string; readonly details: string } {
  try {
    const value: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    return { ok: true, value };
  } catch (err) {
    return {
      ok: false,
      reason: `Cannot read manifest ${file}`,
      details: err instanceof Error ? err.message : String(err),
    };
  }
}

function moduleIdOf(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('module_id' in value)) return undefined;
  return typeof value.module_id === 'string' ? value.module_id : undefined;
}
