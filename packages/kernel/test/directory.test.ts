/**
 * cmdtree Kernel — Registry Directory Tests
 */

import { describe, it, expect } from 'vitest';
import { BasicCommand, RegistryDirectory, RegistryValidationError } from '../src/index.js';

describe('directory', () => {
  it('creates one root per key, lazily', () => {
    const directory = new RegistryDirectory<string>();
    expect(directory.hasRegistry('guild-1')).toBe(false);

    const first = directory.getRegistry('guild-1');
    expect(directory.getRegistry('guild-1')).toBe(first);
    expect(directory.getRegistry('guild-2')).not.toBe(first);
    expect(directory.keys()).toEqual(['guild-1', 'guild-2']);
    expect(directory.size).toBe(2);
  });

  it('keeps trees independent', () => {
    const directory = new RegistryDirectory<number>();
    directory.getRegistry(1).registerCommand(new BasicCommand({ name: 'ping' }));
    expect(directory.getRegistry(2).resolve('?ping')).toBeUndefined();
  });

  it('passes its options to every new root', () => {
    const directory = new RegistryDirectory<string>({ defaultPrefix: '!' });
    expect(directory.getRegistry('a').effectivePrefix()).toBe('!');
  });

  it('a removed key starts over with a fresh root', () => {
    const directory = new RegistryDirectory<string>();
    const first = directory.getRegistry('a');
    expect(directory.removeRegistry('a')).toBe(true);
    expect(directory.removeRegistry('a')).toBe(false);
    expect(directory.getRegistry('a')).not.toBe(first);
  });

  it('rejects a missing key', () => {
    const directory = new RegistryDirectory<string | null | undefined>();
    expect(() => directory.getRegistry(null)).toThrow(RegistryValidationError);
    expect(() => directory.getRegistry(undefined)).toThrow(RegistryValidationError);
    expect(directory.size).toBe(0);
  });
});
