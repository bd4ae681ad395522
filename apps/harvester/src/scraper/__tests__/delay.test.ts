import { describe, it, expect, vi, afterEach } from 'vitest'
import { JitteredDelay, RecordingDelay, sampleDelayMs } from '../fetch/delay.js'

describe('sampleDelayMs', () => {
  it('maps the random source onto the closed range', () => {
    const range = { minMs: 1000, maxMs: 4000 }
    expect(sampleDelayMs(range, () => 0)).toBe(1000)
    expect(sampleDelayMs(range, () => 0.5)).toBe(2500)
    expect(sampleDelayMs(range, () => 1)).toBe(4000)
  })

  it('falls back to minMs for an inverted range', () => {
    expect(sampleDelayMs({ minMs: 300, maxMs: 100 }, () => 0.9)).toBe(300)
  })
})

describe('JitteredDelay', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('sleeps for the sampled duration', async () => {
    vi.useFakeTimers()
    const delay = new JitteredDelay(() => 0.5)
    let done = false
    const waiting = delay.wait({ minMs: 100, maxMs: 200 }).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(149)
    expect(done).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    await waiting
    expect(done).toBe(true)
  })
})

describe('RecordingDelay', () => {
  it('records ranges without sleeping', async () => {
    const delay = new RecordingDelay()
    await delay.wait({ minMs: 1000, maxMs: 3000 })
    expect(delay.requested).toEqual([{ minMs: 1000, maxMs: 3000 }])
  })
})
