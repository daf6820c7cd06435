/**
 * shell.ts — cmdtree interactive readline shell.
 *
 * Every line typed at the prompt is an inbound chat message: the first word
 * is the signature, the rest are arguments, and the message goes through
 * the dispatcher exactly as a bot would route it. A few words starting with
 * `/` or spelled `help`/`exit` are the shell's own.
 *
 * Architecture: three strictly separated layers.
 *
 * LAYER 1 — READLINE (keystroke hot path)
 *   Node.js readline: prompt, line editing, history, submit, Ctrl+C.
 *
 * LAYER 2 — STDOUT OUTPUT (replies, tree, registry events)
 *   Direct process.stdout.write() with chalk coloring. Append-only.
 *
 * LAYER 3 — INK FULL-SCREEN VIEW (/tree-view)
 *   Ink mounts only for the tree view. readline is paused meanwhile.
 */

import * as readline from 'node:readline'
import React from 'react'
import { render } from 'ink'
import { buildTreeSnapshot } from '@cmdtree/kernel'
import type { Runtime, ShellContext } from '../runtime.js'
import { renderDispatch } from './output/dispatch.js'
import { renderHeader } from './output/header.js'
import { renderHelp } from './output/help.js'
import { buildTreeRows, renderTreeRows } from './output/tree.js'
import { parseMessage } from './input.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'

function mountTreeView(runtime: Runtime, rl: readline.Interface, showPrompt: () => void): void {
  rl.pause()

  // Ink calls stdin.unref() during cleanup; hold the event loop open until
  // readline owns stdin again.
  const keepAlive = setInterval(() => { /* keep event loop alive */ }, 60_000)

  const restore = (): void => {
    process.stdin.ref()
    clearInterval(keepAlive)
    if (process.stdin.isTTY) process.stdin.setRawMode(true)
    rl.resume()
    showPrompt()
  }

  import('./tree-view/TreeView.js')
    .then(mod => {
      const TreeView = mod.TreeView<ShellContext>
      const { waitUntilExit } = render(
        React.createElement(TreeView, {
          root:   runtime.root,
          onExit: () => { /* Ink handles its own teardown */ },
        }),
      )
      waitUntilExit().then(restore, restore)
    })
    .catch((err: unknown) => {
      process.stdout.write('\n  ' + t.red('tree view error: ' + String(err)) + '\n')
      restore()
    })
}

export interface ShellOptions {
  /** Name put in the context of every dispatched message. */
  readonly user: string
}

/**
 * launchShell — run the interactive loop until `exit` or Ctrl+C.
 */
export function launchShell(runtime: Runtime, options: ShellOptions): Promise<void> {
  renderHeader(runtime)

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    process.stdin.isTTY === true,
    historySize: 50,
  })

  // The prefix can change through `prefix /`; rebuild the prompt each time.
  const ps1 = (): string => buildPS1(options.user, runtime.root.effectivePrefix())
  const showPrompt = (): void => {
    rl.setPrompt(ps1())
    process.stdout.write('\n' + ps1())
  }

  showPrompt()

  rl.on('line', (line: string) => {
    const input = line.trim()

    if (input === '') {
      showPrompt()
      return
    }
    if (input === 'exit' || input === 'quit') {
      rl.close()
      return
    }
    if (input === 'help') {
      renderHelp(runtime.root.effectivePrefix())
      showPrompt()
      return
    }
    if (input === '/tree') {
      process.stdout.write('\n' + renderTreeRows(buildTreeRows(buildTreeSnapshot(runtime.root))) + '\n')
      showPrompt()
      return
    }
    if (input === '/tree-view' || input === '/tv') {
      // showPrompt is called by the restore path once Ink exits.
      mountTreeView(runtime, rl, showPrompt)
      return
    }

    const message = parseMessage(input)
    if (message === undefined) {
      showPrompt()
      return
    }
    runtime.dispatcher
      .dispatch(message.signature, { args: message.args, user: options.user, isOperator: true })
      .then(result => {
        process.stdout.write(renderDispatch(result))
        showPrompt()
      })
      .catch((err: unknown) => {
        process.stdout.write('\n  ' + t.red(String(err)) + '\n')
        showPrompt()
      })
  })

  rl.on('SIGINT', () => rl.close())

  return new Promise(resolve => {
    rl.on('close', () => {
      process.stdout.write('\n')
      resolve()
    })
  })
}
