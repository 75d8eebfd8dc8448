import { describe, it, expect } from 'vitest'
import { FakeMailer } from './index'

const message = { from: 'team@example.com', to: 'a@example.com', subject: 'Hi', html: '<p>hi</p>' }

describe('FakeMailer', () => {
  it('returns success with a fake providerId by default', async () => {
    const m = new FakeMailer()
    const r = await m.deliver(message)
    expect(r.ok).toBe(true)
    expect(r.ok && r.providerId).toMatch(/^fake_/)
    expect(m.sent).toEqual([message])
  })

  it('replays scripted results before the default', async () => {
    const m = new FakeMailer().enqueue({ ok: false, reason: 'http', status: 500, body: 'boom' })
    expect(await m.deliver(message)).toEqual({ ok: false, reason: 'http', status: 500, body: 'boom' })
    expect((await m.deliver(message)).ok).toBe(true)
    expect(m.calls).toBe(2)
  })

  it('keeps failing once failWith is set', async () => {
    const m = new FakeMailer().failWith({ ok: false, reason: 'network', error: 'ECONNRESET' })
    for (let i = 0; i < 3; i++) {
      expect(await m.deliver(message)).toEqual({ ok: false, reason: 'network', error: 'ECONNRESET' })
    }
  })
})
