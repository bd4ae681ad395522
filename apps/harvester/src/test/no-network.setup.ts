import { beforeEach, vi } from 'vitest'

// Any real outbound request from a test is a bug. Reinstalled before every
// test so a test that stubs fetch itself cannot leak the real one.
const blockedFetch: typeof fetch = async input => {
  throw new Error(`Network access is blocked in tests: ${String(input)}`)
}

beforeEach(() => {
  vi.stubGlobal('fetch', blockedFetch)
})
