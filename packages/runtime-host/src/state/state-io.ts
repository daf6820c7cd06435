/**
 * cmdtree Runtime Host — StateIO
 *
 * The injectable I/O boundary of the runtime host: everything the host
 * writes to disk (today, the registry event log) goes through a StateIO.
 *
 *   - FileStateIO: durable files under a state directory
 *   - MemoryStateIO: in-memory, for tests and embedded use
 *
 * The registry tree itself is never persisted; only its event log is.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Append one line to a log file, creating the `logs/` directory on demand.
   * A newline is added after `line`.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw content of a log file, or '' when it does not exist yet.
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Appends to `<stateDir>/logs/<logfilename>`.
 *
 * Synchronous on purpose: a log sink is called from inside a registry
 * mutation, and the line must be written before the mutation returns.
 * ENOENT on read is the empty log; every other I/O error propagates.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly stateDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.stateDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.stateDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

export class MemoryStateIO implements StateIO {
  private readonly logs = new Map<string, string[]>();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended so far. Not part of StateIO; for tests. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return [...(this.logs.get(logfilename) ?? [])];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    // Same shape as a file written by FileStateIO: 'a\nb\n'.
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
