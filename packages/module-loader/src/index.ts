/**
 * @cmdtree/module-loader
 *
 * cmdtree module loader — manifest types and validation, loading declared
 * commands into a namespace of a registry tree, and the module registry.
 */

export type {
  CommandDeclaration,
  CommandHandler,
  CommandHandlers,
  ModuleManifest,
} from './manifest.js';
export { ModuleStatus } from './manifest.js';

export type { FileLoadResult, LoadResult } from './loader.js';
export { ModuleLoader, parseManifestFile } from './loader.js';

export type { LoadedModule } from './registry.js';
export { ModuleRegistry } from './registry.js';
export { ModuleValidator } from './validator.js';
