/**
 * Politeness delays.
 *
 * A single process crawls one host sequentially, so the policy is a jittered
 * sleep rather than a shared token bucket. Everything that sleeps goes through
 * a DelayStrategy so tests can swap in `noDelay`.
 */

import type { DelayRange, DelayStrategy } from '../types.js'

export type RandomSource = () => number

/**
 * Sample a delay uniformly from the closed range, in whole milliseconds.
 */
export function sampleDelayMs(range: DelayRange, random: RandomSource = Math.random): number {
  const span = Math.max(0, range.maxMs - range.minMs)
  return Math.round(range.minMs + span * random())
}

export class JitteredDelay implements DelayStrategy {
  private readonly random: RandomSource

  constructor(random: RandomSource = Math.random) {
    this.random = random
  }

  async wait(range: DelayRange): Promise<void> {
    const ms = sampleDelayMs(range, this.random)
    if (ms > 0) {
      await this.sleep(ms)
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
  }
}

export const noDelay: DelayStrategy = {
  wait: async () => {},
}

/**
 * Records requested ranges without sleeping.
 */
export class RecordingDelay implements DelayStrategy {
  readonly requested: DelayRange[] = []

  async wait(range: DelayRange): Promise<void> {
    this.requested.push(range)
  }
}
