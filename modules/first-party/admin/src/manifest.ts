/**
 * cmdtree First-Party Admin Module — Manifest
 *
 * Administrative commands registered at the root. They are essential, so no
 * one can switch them off, and non-overrideable with the lowest priority
 * number, so no module loaded below the root can shadow them.
 */

import type { ModuleManifest } from '@cmdtree/module-loader';

export const ADMIN_MODULE_ID = 'cmdtree.admin';

const ADMIN_PRIORITY = Number.MIN_SAFE_INTEGER;

export const ADMIN_MANIFEST: ModuleManifest = {
  module_id: ADMIN_MODULE_ID,
  module_name: 'Administration',
  version: '0.1.0',
  description: 'Enable, disable and configure commands and namespaces at runtime.',
  path: '/',
  essential: true,
  commands: [
    {
      name: 'disable',
      description: 'Disables a command, or a namespace with "namespace <path>". Essential targets cannot be disabled.',
      usage: 'disable <signature> | disable namespace <path>',
      essential: true,
      overrideable: false,
      priority: ADMIN_PRIORITY,
    },
    {
      name: 'enable',
      description: 'Enables a command, or a namespace with "namespace <path>".',
      usage: 'enable <signature> | enable namespace <path>',
      essential: true,
      overrideable: false,
      priority: ADMIN_PRIORITY,
    },
    {
      name: 'prefix',
      description: 'Sets the prefix of a namespace, or clears it when no value is given.',
      usage: 'prefix <path> [value]',
      essential: true,
      overrideable: false,
      priority: ADMIN_PRIORITY,
    },
    {
      name: 'namespaces',
      description: 'Lists every namespace with its effective prefix and state.',
      usage: 'namespaces',
      essential: true,
      overrideable: false,
      priority: ADMIN_PRIORITY,
    },
  ],
};
