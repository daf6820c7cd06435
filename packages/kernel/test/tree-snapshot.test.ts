/**
 * cmdtree Kernel — Tree Snapshot Tests
 *
 * snapshot/shape: nodes, placeholders and commands with effective state
 * snapshot/hash: equal content hashes equally, whatever the build order
 */

import { describe, it, expect } from 'vitest';
import {
  BasicCommand,
  RootRegistry,
  buildTreeSnapshot,
  flattenSnapshot,
  hashTreeSnapshot,
  nodeAtPath,
} from '../src/index.js';

describe('snapshot/shape', () => {
  it('describes nodes with inherited state', () => {
    const root = new RootRegistry();
    const games = root.getOrCreateChild('games');
    games.setPrefix('!');
    games.registerCommand(new BasicCommand({ name: 'trivia', aliases: ['trivia', 't'] }));
    nodeAtPath(root, '/later/inner', 'create');
    games.setEnabled(false);

    const snapshot = buildTreeSnapshot(root);

    expect(snapshot.path).toBe('/');
    expect(snapshot.children.map((c) => [c.name, c.placeholder])).toEqual([
      ['games', false],
      ['later', true],
    ]);
    const [gamesSnap] = snapshot.children;
    expect(gamesSnap?.prefix).toBe('!');
    expect(gamesSnap?.effectivelyEnabled).toBe(false);
    expect(gamesSnap?.commands).toEqual([
      {
        name: 'trivia',
        aliases: ['t', 'trivia'],
        prefix: null,
        triggers: ['!t', '!trivia'],
        priority: 0,
        overrideable: true,
        essential: false,
        enabled: true,
        effectivelyEnabled: false,
        description: '',
      },
    ]);
  });

  it('lists explicit signatures as triggers', () => {
    const root = new RootRegistry();
    root.registerCommand(new BasicCommand({ name: 'roll', prefix: '/', aliases: ['roll'] }));
    expect(buildTreeSnapshot(root).commands[0]?.triggers).toEqual(['/roll']);
  });

  it('flattens parents before children', () => {
    const root = new RootRegistry();
    nodeAtPath(root, '/a/b', 'create');
    root.getOrCreateChild('c');
    expect(flattenSnapshot(buildTreeSnapshot(root)).map((n) => n.path)).toEqual([
      '/',
      '/a',
      '/a/b',
      '/c',
    ]);
  });
});

describe('snapshot/hash', () => {
  it('is independent of build order', () => {
    const first = new RootRegistry();
    first.getOrCreateChild('a').registerCommand(new BasicCommand({ name: 'x' }));
    first.getOrCreateChild('b');

    const second = new RootRegistry();
    second.getOrCreateChild('b');
    second.getOrCreateChild('a').registerCommand(new BasicCommand({ name: 'x' }));

    expect(hashTreeSnapshot(buildTreeSnapshot(first))).toBe(
      hashTreeSnapshot(buildTreeSnapshot(second)),
    );
  });

  it('changes when configuration changes', () => {
    const root = new RootRegistry();
    const games = root.getOrCreateChild('games');
    const before = hashTreeSnapshot(buildTreeSnapshot(root));
    games.setPrefix('!');
    const after = hashTreeSnapshot(buildTreeSnapshot(root));
    expect(after).not.toBe(before);
    expect(after).toMatch(/^[0-9a-f]{64}$/);
  });
});
