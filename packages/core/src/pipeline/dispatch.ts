import { setTimeout as delay } from 'node:timers/promises'
import type {
  DeliveryResult,
  Mailer,
  OutgoingMessage,
  RecipientRecord,
  SendOutcome,
  TemplateRenderer,
  VariableMapping,
} from '../index'
import type { SendConfig } from '../config/schema'
import { TemplateError } from '../errors'
import type { Logger } from '../logging/logger'
import { placeholderRenderer } from '../template/render'
import { buildTemplateVariables } from '../template/variables'
import { applyOutcome, createRunSummary, markCancelled, type RunSummary } from './summary'

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export const sleep: SleepFn = async (ms, signal) => {
  if (ms <= 0) return
  await delay(ms, undefined, { signal })
}

export type DispatchOptions = {
  config: SendConfig
  mailer: Mailer
  logger: Logger
  /** Column holding the recipient address. */
  emailKey?: string
  variables?: VariableMapping
  renderer?: TemplateRenderer
  sleep?: SleepFn
  random?: () => number
  signal?: AbortSignal
  onOutcome?: (record: RecipientRecord, outcome: SendOutcome, index: number) => void
}

export const DEFAULT_EMAIL_KEY = 'email'

function fieldOf(record: RecipientRecord, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined
}

function describeFailure(result: Exclude<DeliveryResult, { ok: true }>): string {
  return result.reason === 'http' ? `Status: ${result.status}, Response: ${result.body}` : result.error
}

/**
 * Sends one templated email per record, strictly in input order.
 *
 * Each recipient is rendered first; a missing address or placeholder fails that
 * recipient without any delivery call. Delivery is attempted at most
 * `config.maxRetries` times with `config.retryDelay` between attempts, and
 * `config.delayBetweenEmails` separates consecutive recipients.
 */
export async function dispatch(
  records: Iterable<RecipientRecord> | AsyncIterable<RecipientRecord>,
  options: DispatchOptions
): Promise<RunSummary> {
  const { config, mailer, logger, signal } = options
  const emailKey = options.emailKey ?? DEFAULT_EMAIL_KEY
  const mapping = options.variables ?? {}
  const renderer = options.renderer ?? placeholderRenderer
  const sleepFn = options.sleep ?? sleep
  const pacingMs = Math.round(config.delayBetweenEmails * 1000)
  const backoffMs = Math.round(config.retryDelay * 1000)

  // false when the run was aborted before or during the wait
  const pause = async (ms: number): Promise<boolean> => {
    if (signal?.aborted) return false
    try {
      await sleepFn(ms, signal)
    } catch (err) {
      if (signal?.aborted) return false
      throw err
    }
    return !signal?.aborted
  }

  const attempt = async (message: OutgoingMessage): Promise<DeliveryResult> => {
    try {
      return await mailer.deliver(message)
    } catch (err) {
      return { ok: false, reason: 'network', error: err instanceof Error ? err.message : String(err) }
    }
  }

  const cancelled = (attempts: number): SendOutcome => ({ ok: false, reason: 'cancelled', attempts, detail: 'Run cancelled' })

  const send = async (to: string, html: string): Promise<SendOutcome> => {
    const message: OutgoingMessage = { from: config.senderEmail, to, subject: config.subject, html }
    let remaining = config.maxRetries
    let attempts = 0
    for (;;) {
      if (signal?.aborted) return cancelled(attempts)
      attempts++
      logger.debug(`Sending email to ${to}`, { event: 'send.attempt', recipient: to, attempt: attempts })
      const result = await attempt(message)
      if (result.ok) {
        logger.info(`Email sent successfully to ${to}`, {
          event: 'send.succeeded',
          recipient: to,
          attempt: attempts,
          providerId: result.providerId,
        })
        return { ok: true, attempts }
      }

      remaining--
      const detail = describeFailure(result)
      const context = { recipient: to, attempt: attempts, remaining, reason: result.reason, detail }
      if (remaining <= 0) {
        logger.error(`Maximum retries reached for ${to}`, undefined, { event: 'send.exhausted', ...context })
        return { ok: false, reason: result.reason, attempts, detail }
      }
      logger.warn(`Retrying email to ${to}... ${remaining} attempts left`, { event: 'send.retry', ...context })
      if (!(await pause(backoffMs))) return cancelled(attempts)
    }
  }

  const handle = async (record: RecipientRecord, index: number): Promise<SendOutcome> => {
    const to = fieldOf(record, emailKey)?.trim()
    if (!to) {
      const detail = `Missing recipient address in column "${emailKey}"`
      logger.error(detail, undefined, { event: 'record.invalid', row: index + 1 })
      return { ok: false, reason: 'record', attempts: 0, detail }
    }

    let html: string
    try {
      const vars = buildTemplateVariables(record, mapping, {
        registrationLink: config.registrationLink,
        random: options.random,
      })
      html = renderer.render(config.template, vars)
    } catch (err) {
      if (!(err instanceof TemplateError)) throw err
      logger.error(`Failed to render email to ${to}`, err, {
        event: 'render.failed',
        recipient: to,
        placeholder: err.placeholder,
      })
      return { ok: false, reason: 'template', attempts: 0, detail: err.message }
    }

    return send(to, html)
  }

  let summary = createRunSummary()
  let index = 0
  logger.info('Dispatch started', { event: 'run.started', maxRetries: config.maxRetries })

  for await (const record of records) {
    if (index > 0 && !(await pause(pacingMs))) {
      summary = markCancelled(summary)
      break
    }
    if (signal?.aborted) {
      summary = markCancelled(summary)
      break
    }

    const outcome = await handle(record, index)
    summary = applyOutcome(summary, outcome)
    options.onOutcome?.(record, outcome, index)
    index++
    if (!outcome.ok && outcome.reason === 'cancelled') {
      summary = markCancelled(summary)
      break
    }
  }

  if (summary.cancelled) {
    logger.warn('Dispatch cancelled', { event: 'run.cancelled', ...summary })
  } else {
    logger.info('Dispatch completed', { event: 'run.completed', ...summary })
  }
  return summary
}
