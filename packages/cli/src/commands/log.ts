/**
 * cmdtree log — Query the registry event log
 *
 * Reads `logs/registry.jsonl` from the configured state directory. Lines
 * that do not parse are counted, never fatal.
 */

import { Command } from 'commander';
import { LOG_LEVEL_ORDER, parseLogLevel } from '@cmdtree/kernel';
import type { LogLevel } from '@cmdtree/kernel';
import { FileStateIO, REGISTRY_LOG, readRegistryLog, resolveConfig } from '@cmdtree/runtime-host';
import type { StoredRegistryEvent } from '@cmdtree/runtime-host';
import { formatEvent } from '../logging/console-log-sink.js';
import { globalOptions, printErrors } from './shared.js';

export interface EventFilter {
  readonly minLevel?: LogLevel | undefined;
  readonly kind?: string | undefined;
  readonly path?: string | undefined;
  /** Keep only the newest `limit` events. */
  readonly limit?: number | undefined;
}

export function selectEvents(
  events: ReadonlyArray<StoredRegistryEvent>,
  filter: EventFilter,
): StoredRegistryEvent[] {
  const threshold = filter.minLevel === undefined ? 0 : LOG_LEVEL_ORDER.indexOf(filter.minLevel);
  const selected = events.filter(
    (e) =>
      LOG_LEVEL_ORDER.indexOf(e.level) >= threshold &&
      (filter.kind === undefined || e.kind === filter.kind) &&
      (filter.path === undefined || e.path === filter.path || e.path.startsWith(filter.path + '/')),
  );
  return filter.limit === undefined ? selected : selected.slice(Math.max(0, selected.length - filter.limit));
}

export const logCommand = new Command('log')
  .description('Query the registry event log')
  .option('--level <level>', 'Minimum level (trace|debug|info|warn|error)')
  .option('--kind <kind>', 'Filter by event kind, e.g. dispatch')
  .option('--path <path>', 'Filter by namespace path (includes sub-namespaces)')
  .option('--limit <n>', 'Maximum number of entries to return', '100')
  .option('--json', 'Output as JSON')
  .action(
    (
      options: { level?: string; kind?: string; path?: string; limit: string; json?: boolean },
      command: Command,
    ) => {
      const resolution = resolveConfig({ configPath: globalOptions(command).config });
      if (!resolution.ok) {
        printErrors('invalid configuration', resolution.errors);
        process.exitCode = 2;
        return;
      }

      const minLevel = options.level === undefined ? undefined : parseLogLevel(options.level);
      const limit = Number.parseInt(options.limit, 10);
      if ((options.level !== undefined && minLevel === undefined) || !Number.isInteger(limit) || limit < 0) {
        process.stderr.write('invalid --level or --limit\n');
        process.exitCode = 2;
        return;
      }

      const stateIO = new FileStateIO(resolution.value.config.stateDir);
      const { events, stats } = readRegistryLog(stateIO.readLogRaw(REGISTRY_LOG));
      const selected = selectEvents(events, { minLevel, kind: options.kind, path: options.path, limit });

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ events: selected, stats }, null, 2));
        return;
      }
      for (const event of selected) {
        // eslint-disable-next-line no-console
        console.log(formatEvent(event));
      }
      if (stats.parseErrors > 0) {
        process.stderr.write(`${stats.parseErrors} line(s) could not be parsed\n`);
      }
    },
  );
