import type { SendOutcome } from '../index'

export type RunSummary = Readonly<{
  total: number
  succeeded: number
  failed: number
  /** True when an abort signal stopped the run before the input was exhausted. */
  cancelled: boolean
}>

export function createRunSummary(): RunSummary {
  return Object.freeze({ total: 0, succeeded: 0, failed: 0, cancelled: false })
}

export function applyOutcome(summary: RunSummary, outcome: SendOutcome): RunSummary {
  return Object.freeze({
    ...summary,
    total: summary.total + 1,
    succeeded: summary.succeeded + (outcome.ok ? 1 : 0),
    failed: summary.failed + (outcome.ok ? 0 : 1),
  })
}

export function markCancelled(summary: RunSummary): RunSummary {
  return Object.freeze({ ...summary, cancelled: true })
}
