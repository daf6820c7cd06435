/**
 * @cmdtree/module-admin
 *
 * cmdtree first-party administration module.
 *
 * Exports the module manifest (for the module loader) and the handler
 * factory that binds the commands to the tree they administer.
 */

import type { LoadResult, ModuleLoader } from '@cmdtree/module-loader';
import { ADMIN_MANIFEST } from './manifest.js';
import { createAdminHandlers } from './handlers.js';
import type { AdminContext } from './handlers.js';

export { ADMIN_MANIFEST, ADMIN_MODULE_ID } from './manifest.js';
export type { AdminContext } from './handlers.js';
export { createAdminHandlers } from './handlers.js';

/** Load the admin module into the tree `loader` populates. */
export function loadAdminModule<TContext extends AdminContext>(loader: ModuleLoader<TContext>): LoadResult {
  return loader.load(ADMIN_MANIFEST, createAdminHandlers(loader.root));
}
