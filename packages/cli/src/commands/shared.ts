/**
 * Helpers shared by the commander subcommands.
 */

import type { Command } from 'commander';
import type { ValidationError } from '@cmdtree/kernel';
import type { FileLoadResult } from '@cmdtree/module-loader';
import { buildRuntime } from '../runtime.js';
import type { Runtime, RuntimeOptions } from '../runtime.js';
import { t } from '../tui/theme.js';

export type GlobalOptions = {
  config?: string;
};

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function printErrors(title: string, errors: ReadonlyArray<ValidationError>): void {
  process.stderr.write(t.red(title) + '\n');
  for (const error of errors) {
    const where = error.context !== undefined ? t.muted(` (${error.context})`) : '';
    process.stderr.write('  ' + error.message + where + '\n');
  }
}

/** One line per manifest that failed to load or had commands rejected. */
export function moduleWarnings(results: ReadonlyArray<FileLoadResult>): string[] {
  const lines: string[] = [];
  for (const { file, result } of results) {
    if (!result.ok) {
      lines.push(`${file}: ${result.reason}${result.details !== undefined ? `: ${result.details}` : ''}`);
      continue;
    }
    for (const rejected of result.rejected) {
      lines.push(`${file}: command "${rejected.name}" rejected: ${rejected.message}`);
    }
  }
  return lines;
}

/**
 * Build the runtime for a subcommand, reporting configuration errors and
 * module warnings on stderr. Sets a failing exit code when the
 * configuration is invalid.
 */
export function runtimeFor(command: Command, extra: Omit<RuntimeOptions, 'configPath'> = {}): Runtime | undefined {
  const result = buildRuntime({ ...extra, configPath: globalOptions(command).config });
  if (!result.ok) {
    printErrors('invalid configuration', result.errors);
    process.exitCode = 2;
    return undefined;
  }
  for (const line of moduleWarnings(result.value.modules)) {
    process.stderr.write(t.amber('warning: ') + line + '\n');
  }
  return result.value;
}
