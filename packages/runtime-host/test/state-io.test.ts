/**
 * cmdtree Runtime Host — StateIO Contract Tests
 *
 * Both implementations must agree on the shape of a log:
 *
 *   SIO-1: an unwritten log reads as ''
 *   SIO-2: appended lines read back as 'a\nb\n'
 *   SIO-3: FileStateIO and MemoryStateIO produce identical content
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

function tempStateDir(): string {
  return mkdtempSync(join(tmpdir(), 'cmdtree-sio-'));
}

describe('SIO-1: unwritten logs read as empty', () => {
  it('MemoryStateIO', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('other.jsonl', 'x');
    expect(stateIO.readLogRaw('registry.jsonl')).toBe('');
    expect(stateIO.readLines('registry.jsonl')).toEqual([]);
  });

  it('FileStateIO without a logs directory', () => {
    expect(new FileStateIO(tempStateDir()).readLogRaw('registry.jsonl')).toBe('');
  });

  it('FileStateIO with an empty logs directory', () => {
    const dir = tempStateDir();
    mkdirSync(join(dir, 'logs'));
    expect(new FileStateIO(dir).readLogRaw('registry.jsonl')).toBe('');
  });
});

describe('SIO-2: appended lines read back with terminal newlines', () => {
  it('MemoryStateIO', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('registry.jsonl', '{"a":1}');
    stateIO.appendLine('registry.jsonl', '{"b":2}');
    expect(stateIO.readLogRaw('registry.jsonl')).toBe('{"a":1}\n{"b":2}\n');
  });

  it('FileStateIO writes under logs/', () => {
    const dir = tempStateDir();
    const stateIO = new FileStateIO(dir);
    stateIO.appendLine('registry.jsonl', '{"a":1}');
    expect(readFileSync(join(dir, 'logs', 'registry.jsonl'), 'utf-8')).toBe('{"a":1}\n');
  });
});

describe('SIO-3: implementations agree', () => {
  it('produce identical raw content for the same appends', () => {
    const fileIO = new FileStateIO(tempStateDir());
    const memIO = new MemoryStateIO();
    for (const line of ['{"x":1}', '{"y":2}', '{"z":3}']) {
      fileIO.appendLine('registry.jsonl', line);
      memIO.appendLine('registry.jsonl', line);
    }
    expect(fileIO.readLogRaw('registry.jsonl')).toBe(memIO.readLogRaw('registry.jsonl'));
  });
});
