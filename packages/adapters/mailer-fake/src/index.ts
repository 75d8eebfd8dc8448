import type { DeliveryResult, Mailer, OutgoingMessage } from '@bulkmail/core'

export class FakeMailer implements Mailer {
  readonly sent: OutgoingMessage[] = []
  private readonly script: DeliveryResult[] = []
  private fallback: DeliveryResult | null = null

  /** Results returned by the next calls, in order, before falling back to the default. */
  enqueue(...results: DeliveryResult[]): this {
    this.script.push(...results)
    return this
  }

  /** Every unscripted call returns `result`. */
  failWith(result: Exclude<DeliveryResult, { ok: true }>): this {
    this.fallback = result
    return this
  }

  get calls(): number {
    return this.sent.length
  }

  async deliver(message: OutgoingMessage): Promise<DeliveryResult> {
    this.sent.push({ ...message })
    const next = this.script.shift() ?? this.fallback
    if (next) return next
    const providerId = `fake_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`
    return { ok: true, providerId }
  }
}
