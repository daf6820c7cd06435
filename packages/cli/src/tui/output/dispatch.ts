import { DispatchOutcome } from '@cmdtree/kernel'
import type { DispatchResult } from '@cmdtree/kernel'
import { outcomeColor } from '../theme.js'

/**
 * The reply line for one dispatched message, uncolored.
 */
export function describeDispatch<TContext>(result: DispatchResult<TContext>): string {
  const name = result.command?.name ?? result.signature
  switch (result.outcome) {
    case DispatchOutcome.NotFound:
      return `no command matches "${result.signature}"`
    case DispatchOutcome.Disabled:
      return `command "${name}" is disabled`
    case DispatchOutcome.ContextRejected:
      return `command "${name}" is not available here`
    case DispatchOutcome.Failed:
      return `command "${name}" failed: ${result.error instanceof Error ? result.error.message : String(result.error)}`
    case DispatchOutcome.Executed:
      if (result.result === undefined || result.result === null) return `${name}: done`
      return typeof result.result === 'string' ? result.result : JSON.stringify(result.result)
  }
}

export function renderDispatch<TContext>(result: DispatchResult<TContext>): string {
  return '\n  ' + outcomeColor(result.outcome)(describeDispatch(result)) + '\n'
}
