import { describe, it, expect } from 'vitest'
import { BasicCommand, RootRegistry, buildTreeSnapshot, nodeAtPath } from '@cmdtree/kernel'
import { buildTreeRows } from '../src/tui/output/tree.js'
import { toggleRow } from '../src/tui/tree-view/toggle.js'

function sampleTree(): RootRegistry {
  const root = new RootRegistry()
  root.registerCommand(new BasicCommand({ name: 'help', essential: true, overrideable: false }))
  const games = root.getOrCreateChild('games')
  games.setPrefix('!')
  games.registerCommand(new BasicCommand({ name: 'trivia', aliases: ['trivia', 't'] }))
  nodeAtPath(root, '/later/inner', 'create')
  games.setEnabled(false)
  return root
}

describe('buildTreeRows', () => {
  it('lists each namespace, then its commands, then its children', () => {
    const rows = buildTreeRows(buildTreeSnapshot(sampleTree()))
    expect(rows).toEqual([
      { depth: 0, kind: 'namespace',   label: '/',      detail: 'prefix ? (default)',             state: 'enabled',     path: '/' },
      { depth: 1, kind: 'command',     label: 'help',   detail: '?help  priority 0  essential  final', state: 'enabled', path: '/' },
      { depth: 1, kind: 'namespace',   label: 'games',  detail: 'prefix !',                       state: 'disabled',    path: '/games' },
      { depth: 2, kind: 'command',     label: 'trivia', detail: '!t !trivia  priority 0',         state: 'disabled',    path: '/games' },
      { depth: 1, kind: 'placeholder', label: 'later',  detail: 'placeholder',                    state: 'placeholder', path: '/later' },
      { depth: 2, kind: 'namespace',   label: 'inner',  detail: 'prefix ? (inherited)',           state: 'enabled',     path: '/later/inner' },
    ])
  })
})

describe('toggleRow', () => {
  it('flips namespaces and commands and refuses the rest', () => {
    const root = sampleTree()
    const rows = buildTreeRows(buildTreeSnapshot(root))
    const row = (label: string) => {
      const found = rows.find(r => r.label === label)
      if (found === undefined) throw new Error(`no row ${label}`)
      return found
    }

    expect(toggleRow(root, row('trivia'))).toBe('disabled command trivia')
    expect(root.getCommand('trivia')?.enabled).toBe(false)
    expect(toggleRow(root, row('games'))).toBe('enabled namespace /games')
    expect(toggleRow(root, row('/'))).toBe('namespace / is essential')
    expect(toggleRow(root, row('help'))).toBe('command help is essential')
    expect(toggleRow(root, row('later'))).toBe('/later is a placeholder')
  })
})
