import { describe, it, expect } from 'vitest'
import { CallStats } from '../scripts/monitoring/call-stats.js'

describe('CallStats', () => {
  it('starts empty', () => {
    expect(new CallStats('root@jump').snapshot()).toEqual({
      endpoint: 'root@jump',
      successCount: 0,
      errorCount: 0,
      lastLatencyMs: 0,
      lastError: null,
      lastErrorAt: null,
    })
  })

  it('records latency on every call and the error only on failure', () => {
    const stats = new CallStats('root@jump')
    stats.record(null, 120)
    stats.record(new Error('dial jump host: refused'), 40)
    stats.record(null, 95)

    const snap = stats.snapshot()
    expect(snap.successCount).toBe(2)
    expect(snap.errorCount).toBe(1)
    expect(snap.lastLatencyMs).toBe(95)
    expect(snap.lastError).toBe('dial jump host: refused')
    expect(snap.lastErrorAt).not.toBeNull()
  })

  it('track passes results and errors through', async () => {
    const stats = new CallStats('master@edge')
    await expect(stats.track(async () => 'ok')).resolves.toBe('ok')
    await expect(stats.track(async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')

    const snap = stats.snapshot()
    expect(snap.successCount).toBe(1)
    expect(snap.errorCount).toBe(1)
    expect(snap.lastError).toBe('boom')
  })
})
