import chalk, { type ChalkInstance } from 'chalk'
import type { InvocationOutcome } from '@fleetwire/kernel'

export const t = {
  blue:  chalk.hex('#4FC3F7'),
  muted: chalk.hex('#666666'),
  amber: chalk.hex('#D4880A'),
  green: chalk.hex('#81C784'),
  red:   chalk.hex('#CF6679'),
} as const

const _outcomeColors: Record<InvocationOutcome, ChalkInstance> = {
  ok:      t.green,
  changed: t.amber,
  failed:  t.red,
}

export const outcomeColor = (outcome: InvocationOutcome): ChalkInstance =>
  _outcomeColors[outcome]
