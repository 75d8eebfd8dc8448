import { DEFAULT_API_HOST, type DeliveryResult, type Mailer, type OutgoingMessage } from '@bulkmail/core'

export const DEFAULT_TIMEOUT_MS = 30_000
const MAX_BODY_CHARS = 500

type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export type MailgunMailerOptions = {
  domain: string
  apiKey: string
  apiHost?: string
  timeoutMs?: number
  fetch?: FetchFn
}

type MailgunSendResponse = { id?: string; message?: string }

export class MailgunMailer implements Mailer {
  private readonly endpoint: string
  private readonly authorization: string
  private readonly timeoutMs: number
  private readonly fetchFn: FetchFn

  constructor(args: MailgunMailerOptions) {
    const host = args.apiHost ?? DEFAULT_API_HOST
    this.endpoint = `https://${host}/v3/${encodeURIComponent(args.domain)}/messages`
    this.authorization = 'Basic ' + Buffer.from(`api:${args.apiKey}`).toString('base64')
    this.timeoutMs = args.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchFn = args.fetch ?? fetch
  }

  get url(): string {
    return this.endpoint
  }

  async deliver(message: OutgoingMessage): Promise<DeliveryResult> {
    const form = new URLSearchParams()
    form.set('from', message.from)
    form.set('to', message.to)
    form.set('subject', message.subject)
    form.set('html', message.html)

    let resp: Response
    try {
      resp = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          authorization: this.authorization,
          'content-type': 'application/x-www-form-urlencoded',
        },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      return { ok: false, reason: 'network', error: err instanceof Error ? err.message : String(err) }
    }

    let text: string
    try {
      text = await resp.text()
    } catch (err) {
      return { ok: false, reason: 'network', error: err instanceof Error ? err.message : String(err) }
    }

    if (resp.status !== 200) {
      return { ok: false, reason: 'http', status: resp.status, body: text.slice(0, MAX_BODY_CHARS) }
    }
    return { ok: true, providerId: parseMessageId(text) }
  }
}

function parseMessageId(text: string): string | undefined {
  try {
    const json: MailgunSendResponse = JSON.parse(text)
    return typeof json.id === 'string' ? json.id : undefined
  } catch {
    // 200 with a non-JSON body still counts as accepted
    return undefined
  }
}
