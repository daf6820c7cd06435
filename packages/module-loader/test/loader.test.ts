/**
 * cmdtree Module Loader — Module Loader Tests
 *
 * load/namespace: the manifest path is addressed, configured and populated
 * load/conflicts: duplicate ids fail, duplicate command names are partial
 * load/directory: every manifest in a directory loads independently
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { CommandDispatcher, DispatchOutcome, RootRegistry } from '@cmdtree/kernel';
import { ModuleLoader } from '../src/loader.js';
import type { ModuleManifest } from '../src/manifest.js';

const FIXTURES = fileURLToPath(new URL('./fixtures/modules', import.meta.url));

interface Ctx {
  readonly user: string;
}

function manifest(overrides: Partial<ModuleManifest> = {}): ModuleManifest {
  return {
    module_id: 'games.trivia',
    module_name: 'Trivia',
    version: '1.0.0',
    description: 'Trivia rounds.',
    path: '/games/trivia',
    commands: [{ name: 'trivia', reply: 'Round started.' }],
    ...overrides,
  };
}

describe('load/namespace', () => {
  it('creates the leaf namespace with placeholder parents', () => {
    const root = new RootRegistry<Ctx>();
    const result = new ModuleLoader(root).load(manifest());

    expect(result).toEqual({
      ok: true,
      module_id: 'games.trivia',
      path: '/games/trivia',
      registered: ['trivia'],
      rejected: [],
    });
    expect(root.hasPlaceholder('games')).toBe(true);
    expect(root.getPlaceholder('games')?.getChild('trivia')?.getRegisteredCommand('trivia')).toBeDefined();
  });

  it('applies the namespace prefix and initial state', () => {
    const root = new RootRegistry<Ctx>();
    new ModuleLoader(root).load(manifest({ path: '/games', prefix: '!', enabled: false }));

    const games = root.getChild('games');
    expect(games?.prefix).toBe('!');
    expect(games?.enabled).toBe(false);
    expect(root.resolve('!trivia')?.name).toBe('trivia');
    expect(root.resolve('?trivia')).toBeUndefined();
  });

  it('binds handlers by command name and falls back to reply text', async () => {
    const root = new RootRegistry<Ctx>();
    new ModuleLoader(root).load(
      manifest({ commands: [{ name: 'trivia', reply: 'Round started.' }, { name: 'hello' }] }),
      { hello: (ctx) => `hello ${ctx.user}` },
    );
    const dispatcher = new CommandDispatcher(root);

    expect((await dispatcher.dispatch('?trivia', { user: 'ada' })).result).toBe('Round started.');
    expect((await dispatcher.dispatch('?hello', { user: 'ada' })).result).toBe('hello ada');
  });

  it('loads a module into the root namespace', () => {
    const root = new RootRegistry<Ctx>();
    const result = new ModuleLoader(root).load(manifest({ path: '/' }));
    expect(result.ok && result.path).toBe('/');
    expect(root.getRegisteredCommand('trivia')).toBeDefined();
  });
});

describe('load/conflicts', () => {
  it('reports validation errors without touching the tree', () => {
    const root = new RootRegistry<Ctx>();
    const result = new ModuleLoader(root).load({ module_id: 'x' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.reason).toBe('Manifest validation failed');
    expect(result.details).toContain('Missing required field "module_name".');
    expect(root.branches()).toEqual([]);
  });

  it('refuses a module id that is already loaded', () => {
    const loader = new ModuleLoader(new RootRegistry<Ctx>());
    loader.load(manifest());
    expect(loader.load(manifest({ path: '/other' }))).toEqual({
      ok: false,
      reason: 'Module already loaded: games.trivia',
    });
  });

  it('refuses handlers for undeclared commands', () => {
    const root = new RootRegistry<Ctx>();
    const result = new ModuleLoader(root).load(manifest(), { zeta: () => 1, alpha: () => 2 });
    expect(result).toEqual({
      ok: false,
      reason: 'Handlers supplied for undeclared commands',
      details: 'alpha, zeta',
    });
    expect(root.branches()).toEqual([]);
  });

  it('keeps loading when a command name is already taken in the tree', () => {
    const loader = new ModuleLoader(new RootRegistry<Ctx>());
    loader.load(manifest());
    const result = loader.load(
      manifest({
        module_id: 'games.quiz',
        path: '/games/quiz',
        commands: [{ name: 'trivia' }, { name: 'quiz' }],
      }),
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.registered).toEqual(['quiz']);
    expect(result.rejected.map((r) => r.name)).toEqual(['trivia']);
    expect(loader.registry.get('games.quiz')?.commands.map((c) => c.name)).toEqual(['quiz']);
  });
});

describe('load/directory', () => {
  it('loads each json manifest in file name order', () => {
    const root = new RootRegistry<Ctx>();
    const results = new ModuleLoader(root).loadFromDirectory(FIXTURES);

    expect(results.map((r) => [r.file, r.result.ok])).toEqual([
      ['broken.json', false],
      ['games.json', true],
      ['invalid.json', false],
    ]);
    expect(results[2]?.result).toEqual({
      ok: false,
      reason: 'Manifest validation failed',
      details: '"version" has an invalid format: "one".',
    });
    expect(root.resolve('!t')?.name).toBe('trivia');
  });

  it('passes handlers keyed by module id', async () => {
    const root = new RootRegistry<Ctx>();
    new ModuleLoader(root).loadFromDirectory(FIXTURES, {
      'games.trivia': { score: (ctx) => `${ctx.user}: 3` },
    });
    const result = await new CommandDispatcher(root).dispatch('!score', { user: 'ada' });
    expect(result.outcome).toBe(DispatchOutcome.Executed);
    expect(result.result).toBe('ada: 3');
  });

  it('returns nothing for a missing directory', () => {
    const loader = new ModuleLoader(new RootRegistry<Ctx>());
    expect(loader.loadFromDirectory(`${FIXTURES}/does-not-exist`)).toEqual([]);
  });
});
