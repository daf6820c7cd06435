import { t } from '../theme.js'

/**
 * renderHelp — print the shell's own commands. Everything else typed at the
 * prompt is dispatched as a chat message.
 */
export function renderHelp(prefix: string): void {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 30 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('messages')
  out += cmd(`${prefix}<command> [args...]`,        'dispatch a message through the registry')
  out += cmd(`${prefix}disable <signature>`,        'disable a command')
  out += cmd(`${prefix}disable namespace <path>`,   'disable a namespace')
  out += cmd(`${prefix}prefix <path> [value]`,      'set or clear a namespace prefix')
  out += cmd(`${prefix}namespaces`,                 'list namespaces')

  out += section('navigation')
  out += cmd('/tree',                              'print the registry tree')
  out += cmd('/tree-view  /tv',                    'open the full-screen tree (Ink view)')

  out += section('system')
  out += cmd('help',                               'show this help')
  out += cmd('exit  Ctrl+C',                       'exit')

  process.stdout.write(out)
}
