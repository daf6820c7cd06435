import React, { useMemo, useState } from 'react'
import { Box, Text, useApp, useInput, useStdout } from 'ink'
import chalk from 'chalk'
import { buildTreeSnapshot, hashTreeSnapshot } from '@cmdtree/kernel'
import type { RegistryNode } from '@cmdtree/kernel'
import { buildTreeRows, rowSymbol } from '../output/tree.js'
import { stateHex } from '../theme.js'
import { Panel } from './Panel.js'
import { toggleRow } from './toggle.js'

export interface TreeViewProps<TContext> {
  root: RegistryNode<TContext>
  onExit: () => void
}

/**
 * TreeView — full-screen Ink view of the registry tree for /tree-view.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   ↑ / ↓       → move selection
 *   space       → enable / disable the selected namespace or command
 *   r           → rebuild from the live tree
 */
export function TreeView<TContext>({ root, onExit }: TreeViewProps<TContext>): React.ReactElement {
  const { exit: inkExit } = useApp()
  const { stdout } = useStdout()
  const [selected, setSelected] = useState(0)
  const [revision, setRevision] = useState(0)
  const [status, setStatus] = useState('')

  const snapshot = useMemo(() => buildTreeSnapshot(root), [root, revision])
  const rows     = useMemo(() => buildTreeRows(snapshot), [snapshot])
  const current  = rows[Math.min(selected, rows.length - 1)]

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      onExit()
      inkExit()
      return
    }
    if (key.upArrow) {
      setSelected(i => Math.max(0, i - 1))
      return
    }
    if (key.downArrow) {
      setSelected(i => Math.min(rows.length - 1, i + 1))
      return
    }
    if (input === ' ' && current !== undefined) {
      setStatus(toggleRow(root, current))
      setRevision(r => r + 1)
      return
    }
    if (input === 'r') {
      setStatus('')
      setRevision(r => r + 1)
    }
  })

  const cols    = stdout.columns ?? 80
  const slLeft  = ` ◈ cmdtree · ${hashTreeSnapshot(snapshot).slice(0, 12)} · ${status}`
  const slRight = 'q quit · space toggle · r refresh '
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex('#0277BD').white(slLeft + slFill + slRight)

  return (
    <Box flexDirection="column">
      <Panel label="Registry" meta={`${rows.length} entries`}>
        {rows.map((row, i) => (
          <Box key={`${row.kind}:${row.path}:${row.label}`} gap={1}>
            <Text color={i === selected ? '#4FC3F7' : '#242424'}>{i === selected ? '❯' : ' '}</Text>
            <Text color={stateHex[row.state]}>
              {'  '.repeat(row.depth) + rowSymbol(row) + ' ' + row.label}
            </Text>
            <Text color="#666666">{row.detail}</Text>
          </Box>
        ))}
      </Panel>
      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
