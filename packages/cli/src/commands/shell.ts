/**
 * cmdtree shell — Interactive message loop
 *
 * Each line is treated as an inbound chat message and dispatched through the
 * registry. Registry events are echoed to stderr as they are recorded.
 */

import { Command } from 'commander';
import { userInfo } from 'node:os';
import { ConsoleLogSink } from '../logging/console-log-sink.js';
import { launchShell } from '../tui/shell.js';
import { runtimeFor } from './shared.js';

export const shellCommand = new Command('shell')
  .description('Start an interactive shell that dispatches each line as a message')
  .option('--user <name>', 'User name placed in the message context')
  .option('--quiet', 'Do not echo registry events')
  .action(async (options: { user?: string; quiet?: boolean }, command: Command) => {
    const runtime = runtimeFor(command, {
      echo: options.quiet === true ? undefined : new ConsoleLogSink(process.stderr),
    });
    if (runtime === undefined) return;
    await launchShell(runtime, { user: options.user ?? userInfo().username });
  });
