import chalk, { type ChalkInstance } from 'chalk'
import { DispatchOutcome, LogLevel } from '@cmdtree/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _levelColors: Record<LogLevel, ChalkInstance> = {
  [LogLevel.Trace]: t.dim,
  [LogLevel.Debug]: t.muted,
  [LogLevel.Info]:  t.text,
  [LogLevel.Warn]:  t.amber,
  [LogLevel.Error]: t.red,
}

export const levelColor = (level: LogLevel): ChalkInstance => _levelColors[level]

const _outcomeColors: Record<string, ChalkInstance> = {
  [DispatchOutcome.Executed]:        t.green,
  [DispatchOutcome.Failed]:          t.red,
  [DispatchOutcome.Disabled]:        t.amber,
  [DispatchOutcome.ContextRejected]: t.amber,
  [DispatchOutcome.NotFound]:        t.muted,
}

export const outcomeColor = (outcome: string): ChalkInstance =>
  _outcomeColors[outcome] ?? t.muted

export type EntryState = 'enabled' | 'disabled' | 'placeholder'

const _stateColors: Record<EntryState, ChalkInstance> = {
  enabled:     t.white,
  disabled:    t.dim,
  placeholder: t.muted,
}

export const stateColor = (state: EntryState): ChalkInstance => _stateColors[state]

/** Hex values for Ink <Text color>, which takes colors, not chalk instances. */
export const stateHex: Record<EntryState, string> = {
  enabled:     '#F2F2EC',
  disabled:    '#444444',
  placeholder: '#666666',
}
