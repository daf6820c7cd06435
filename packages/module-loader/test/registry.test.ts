/**
 * cmdtree Module Loader — Module Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { RegistryStateError, RootRegistry } from '@cmdtree/kernel';
import { ModuleLoader } from '../src/loader.js';
import { ModuleStatus } from '../src/manifest.js';
import type { ModuleManifest } from '../src/manifest.js';

function manifest(overrides: Partial<ModuleManifest> = {}): ModuleManifest {
  return {
    module_id: 'games',
    module_name: 'Games',
    version: '1.0.0',
    description: 'Games.',
    path: '/games',
    commands: [{ name: 'dice' }],
    ...overrides,
  };
}

describe('ModuleRegistry', () => {
  it('lists loaded modules by id', () => {
    const loader = new ModuleLoader(new RootRegistry());
    loader.load(manifest({ module_id: 'zeta', path: '/z', commands: [] }));
    loader.load(manifest({ module_id: 'alpha', path: '/a', commands: [] }));
    expect(loader.registry.list().map((m) => m.manifest.module_id)).toEqual(['alpha', 'zeta']);
  });

  it('derives status from the namespace node', () => {
    const root = new RootRegistry();
    const loader = new ModuleLoader(root);
    loader.load(manifest());

    expect(loader.registry.getStatus('games')).toBe(ModuleStatus.Enabled);
    loader.registry.disable('games');
    expect(root.getChild('games')?.enabled).toBe(false);
    expect(loader.registry.getStatus('games')).toBe(ModuleStatus.Disabled);

    root.getChild('games')?.setEnabled(true);
    expect(loader.registry.getStatus('games')).toBe(ModuleStatus.Enabled);
    expect(loader.registry.getStatus('missing')).toBeUndefined();
  });

  it('refuses to disable an essential module', () => {
    const loader = new ModuleLoader(new RootRegistry());
    loader.load(manifest({ essential: true }));
    expect(() => loader.registry.disable('games')).toThrow(RegistryStateError);
    expect(loader.registry.getStatus('games')).toBe(ModuleStatus.Enabled);
  });

  it('throws for unknown modules', () => {
    const loader = new ModuleLoader(new RootRegistry());
    expect(() => loader.registry.enable('missing')).toThrow('Module not registered: missing');
  });
});

describe('unload', () => {
  it('unregisters commands and removes the namespace', () => {
    const root = new RootRegistry();
    const loader = new ModuleLoader(root);
    loader.load(manifest());

    expect(loader.registry.unload('games')).toBe(true);
    expect(root.getCommand('dice')).toBeUndefined();
    expect(root.hasChild('games')).toBe(false);
    expect(loader.registry.has('games')).toBe(false);
    expect(loader.registry.unload('games')).toBe(false);
  });

  it('leaves a placeholder when sub-namespaces remain', () => {
    const root = new RootRegistry();
    const loader = new ModuleLoader(root);
    loader.load(manifest());
    loader.load(manifest({ module_id: 'games.cards', path: '/games/cards', commands: [{ name: 'deal' }] }));

    loader.registry.unload('games');

    expect(root.hasChild('games')).toBe(false);
    expect(root.getPlaceholder('games')?.getChild('cards')?.getRegisteredCommand('deal')).toBeDefined();
    expect(root.resolve('?deal')?.name).toBe('deal');
  });

  it('keeps a namespace shared with another module', () => {
    const root = new RootRegistry();
    const loader = new ModuleLoader(root);
    loader.load(manifest());
    loader.load(manifest({ module_id: 'games.extra', commands: [{ name: 'coin' }] }));

    loader.registry.unload('games');

    expect(root.getChild('games')?.registeredCommands().map((c) => c.name)).toEqual(['coin']);
  });

  it('never removes the root', () => {
    const root = new RootRegistry();
    const loader = new ModuleLoader(root);
    loader.load(manifest({ path: '/' }));
    loader.registry.unload('games');
    expect(root.getRegisteredCommand('dice')).toBeUndefined();
  });
});
