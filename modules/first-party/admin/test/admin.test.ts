/**
 * cmdtree First-Party Admin Module — Command Tests
 *
 * Each test drives the commands the way a chat message would: through the
 * dispatcher, with the words after the signature as arguments.
 */

import { describe, it, expect } from 'vitest';
import { CommandDispatcher, DispatchOutcome, RootRegistry } from '@cmdtree/kernel';
import { ModuleLoader, ModuleStatus } from '@cmdtree/module-loader';
import { ADMIN_MODULE_ID, loadAdminModule } from '../src/index.js';
import type { AdminContext } from '../src/index.js';

interface Harness {
  readonly root: RootRegistry<AdminContext>;
  readonly loader: ModuleLoader<AdminContext>;
  say(line: string, isOperator?: boolean): Promise<unknown>;
}

function setup(): Harness {
  const root = new RootRegistry<AdminContext>();
  const loader = new ModuleLoader(root);
  loadAdminModule(loader);
  loader.load({
    module_id: 'games',
    module_name: 'Games',
    version: '1.0.0',
    description: 'Games.',
    path: '/games',
    commands: [{ name: 'trivia', reply: 'Round started.' }],
  });
  const dispatcher = new CommandDispatcher(root);
  return {
    root,
    loader,
    async say(line, isOperator) {
      const [signature = '', ...args] = line.split(' ');
      return (await dispatcher.dispatch(signature, { args, isOperator })).result;
    },
  };
}

describe('admin/load', () => {
  it('registers every command at the root as essential and non-overrideable', () => {
    const { root, loader } = setup();
    expect(root.registeredCommands().map((c) => [c.name, c.essential, c.overrideable])).toEqual([
      ['disable', true, false],
      ['enable', true, false],
      ['namespaces', true, false],
      ['prefix', true, false],
    ]);
    expect(() => loader.registry.disable(ADMIN_MODULE_ID)).toThrow('is essential');
  });

  it('cannot be shadowed from below', async () => {
    const { loader, say } = setup();
    loader.load({
      module_id: 'shadow',
      module_name: 'Shadow',
      version: '1.0.0',
      description: 'Tries to take over disable.',
      path: '/games/shadow',
      commands: [{ name: 'shadow', aliases: ['disable'], priority: -100, reply: 'gotcha' }],
    });
    expect(await say('?disable ?trivia')).toBe('Disabled command "trivia".');
  });
});

describe('admin/disable and enable', () => {
  it('toggles a command and reports its state', async () => {
    const { root, say } = setup();
    expect(await say('?disable ?trivia')).toBe('Disabled command "trivia".');
    expect(await say('?disable ?trivia')).toBe('Command "trivia" is already disabled.');
    expect(root.getCommand('trivia')?.enabled).toBe(false);

    expect(await say('?enable ?trivia')).toBe('Enabled command "trivia".');
    expect(await say('?enable ?trivia')).toBe('Command "trivia" is already enabled.');
  });

  it('refuses essential commands and unknown signatures', async () => {
    const { say } = setup();
    expect(await say('?disable ?disable')).toBe('Command "disable" is essential and cannot be disabled.');
    expect(await say('?disable ?nope')).toBe('No command matches "?nope".');
  });

  it('toggles namespaces', async () => {
    const { root, say } = setup();
    expect(await say('?disable namespace /games')).toBe('Disabled namespace "/games".');
    expect(await new CommandDispatcher(root).dispatch('?trivia', { args: [] })).toMatchObject({
      outcome: DispatchOutcome.Disabled,
    });
    expect(await say('?disable namespace /games')).toBe('Namespace "/games" is already disabled.');
    expect(await say('?enable namespace /games')).toBe('Enabled namespace "/games".');
  });

  it('refuses the root and missing namespaces', async () => {
    const { say } = setup();
    expect(await say('?disable namespace /')).toBe('Namespace "/" is essential and cannot be disabled.');
    expect(await say('?disable namespace /missing')).toBe('No namespace at "/missing".');
  });

  it('refuses the namespace of an essential module', async () => {
    const { loader, say } = setup();
    loader.load({
      module_id: 'core',
      module_name: 'Core',
      version: '1.0.0',
      description: 'Core.',
      path: '/core',
      essential: true,
      commands: [{ name: 'status', reply: 'ok' }],
    });

    expect(await say('?disable namespace /core')).toBe('Namespace "/core" is essential and cannot be disabled.');
    expect(loader.registry.getStatus('core')).toBe(ModuleStatus.Enabled);
    expect(await say('?status')).toBe('ok');
  });

  it('prints usage without a target', async () => {
    const { say } = setup();
    expect(await say('?disable')).toBe('Usage: disable <signature> | disable namespace <path>');
    expect(await say('?enable namespace')).toBe('Usage: enable <signature> | enable namespace <path>');
  });
});

describe('admin/prefix', () => {
  it('sets and clears a namespace prefix', async () => {
    const { root, say } = setup();
    expect(await say('?prefix /games !')).toBe('Set prefix of "/games" to "!".');
    expect(root.resolve('!trivia')?.name).toBe('trivia');
    expect(root.resolve('?trivia')).toBeUndefined();

    expect(await say('?prefix /games')).toBe('Cleared prefix of "/games"; it now uses "?".');
    expect(root.resolve('?trivia')?.name).toBe('trivia');
  });

  it('reports a missing namespace', async () => {
    const { say } = setup();
    expect(await say('?prefix /nowhere !')).toBe('No namespace at "/nowhere".');
  });
});

describe('admin/namespaces', () => {
  it('lists the tree with prefixes and state', async () => {
    const { say } = setup();
    await say('?disable namespace /games');
    expect(await say('?namespaces')).toBe(['/ ? enabled (4 commands)', '/games ? disabled (1 command)'].join('\n'));
  });
});

describe('admin/operator', () => {
  it('refuses callers that are not operators', async () => {
    const { root, say } = setup();
    expect(await say('?disable ?trivia', false)).toBe('Only an operator can change the command registry.');
    expect(root.getCommand('trivia')?.enabled).toBe(true);
  });
});
