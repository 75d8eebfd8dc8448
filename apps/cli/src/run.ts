import {
  BulkmailError,
  dispatch,
  Logger,
  type Mailer,
  type OutgoingMessage,
  type RunSummary,
  type SendConfig,
  type SleepFn,
} from '@bulkmail/core'
import { FakeMailer } from '@bulkmail/mailer-fake'
import { MailgunMailer } from '@bulkmail/mailer-mailgun'
import { parseCliArgs, USAGE } from './args'
import { loadConfig, scaffoldConfig, type Env } from './config'
import { loadRecipients } from './recipients'

export const DEFAULT_LOG_FILE = 'bulkmail.log'

export type CliDeps = {
  env?: Env
  logger?: Logger
  createMailer?: (config: SendConfig) => Mailer
  sleep?: SleepFn
  signal?: AbortSignal
  stdout?: (line: string) => void
  stderr?: (line: string) => void
}

export function createMailgunMailer(config: SendConfig): Mailer {
  return new MailgunMailer({ domain: config.domain, apiKey: config.apiKey, apiHost: config.apiHost })
}

// LOG_FILE unset -> default file; LOG_FILE= (empty) -> console only
export function logFileFrom(env: Env): string | undefined {
  const value = env.LOG_FILE
  if (value === undefined) return DEFAULT_LOG_FILE
  return value.trim() || undefined
}

export function formatPreview(message: OutgoingMessage, index: number): string[] {
  return [`--- Preview ${index + 1} ---`, `From: ${message.from}`, `To: ${message.to}`, `Subject: ${message.subject}`, '', message.html, '']
}

export function formatSummary(summary: RunSummary, dryRun: boolean): string[] {
  const heading = summary.cancelled
    ? 'Email sending cancelled!'
    : dryRun
      ? 'Dry run completed!'
      : 'Email sending completed!'
  return ['', heading, `Total: ${summary.total}`, `Successful: ${summary.succeeded}`, `Failed: ${summary.failed}`]
}

/** Runs one CLI invocation and resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env
  const out = deps.stdout ?? ((line: string) => console.log(line))
  const err = deps.stderr ?? ((line: string) => console.error(line))
  let ownedLogger: Logger | null = null

  try {
    const command = parseCliArgs(argv)
    if (command.kind === 'help') {
      out(USAGE)
      return 0
    }
    if (command.kind === 'create-config') {
      await scaffoldConfig(command.configFile, { force: command.force })
      out(`Default configuration file '${command.configFile}' created. Please update it with your settings.`)
      return 0
    }

    const loaded = await loadConfig(command.configFile, env)
    const records = await loadRecipients(command.csvFile)

    const preview = command.dryRun ? new FakeMailer() : null
    // previews skip pacing and backoff; nothing leaves the process
    const config: SendConfig = preview ? Object.freeze({ ...loaded, delayBetweenEmails: 0, retryDelay: 0 }) : loaded
    const mailer = preview ?? (deps.createMailer ?? createMailgunMailer)(config)
    const logger = deps.logger ?? (ownedLogger = new Logger({ file: logFileFrom(env) }))

    out(preview ? 'Dry run mode - no emails will be sent' : `Sending emails from ${command.csvFile}...`)
    const summary = await dispatch(records, {
      config,
      mailer,
      logger,
      emailKey: command.emailColumn,
      variables: command.variables,
      sleep: deps.sleep,
      signal: deps.signal,
    })

    if (preview) preview.sent.forEach((message, i) => formatPreview(message, i).forEach(out))
    formatSummary(summary, preview !== null).forEach(out)
    return 0
  } catch (e) {
    if (!(e instanceof BulkmailError)) throw e
    err(`Error: ${e.message}`)
    return e.code === 'usage' ? 2 : 1
  } finally {
    if (ownedLogger) await ownedLogger.close()
  }
}
