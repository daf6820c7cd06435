#!/usr/bin/env node
/**
 * bin/cmdtree.ts — TTY-aware entry point for the `cmdtree` CLI command.
 *
 * With no arguments in a TTY and CMDTREE_NO_TUI unset: starts the shell.
 * Otherwise: delegates to Commander (non-interactive / scripting mode).
 *
 * cmdtree (in TTY)              → interactive shell
 * CMDTREE_NO_TUI=1 cmdtree      → Commander help
 */

import { program } from '../commands/index.js'

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['CMDTREE_NO_TUI'] === undefined && process.argv.length <= 2

await program.parseAsync(isInteractive ? [...process.argv, 'shell'] : process.argv)
