/**
 * HTTP Fetcher
 *
 * Bounded-retry GET over native fetch with the politeness policy baked in:
 * - fixed browser-like header set, merged with per-call headers
 * - per-attempt timeout (covers headers and body)
 * - transport errors, timeouts and non-2xx statuses retry up to maxAttempts,
 *   sleeping a jittered delay between attempts
 * - exhaustion returns a failed FetchResult; nothing is thrown
 *
 * The fetcher knows nothing about the documents it downloads.
 */

import type { ILogger } from '@studfee/logger'
import { loggers } from '../../config/logger.js'
import type { FetchConfig } from '../../config/settings.js'
import type { DelayStrategy, Fetcher, FetchOptions, FetchResult } from '../types.js'
import { JitteredDelay } from './delay.js'

export interface HttpFetcherOptions {
  config: FetchConfig

  /** Sleeps between retry attempts (default: JitteredDelay) */
  delay?: DelayStrategy

  logger?: ILogger
}

type AttemptResult = Omit<FetchResult, 'attempts' | 'durationMs'>

export class HttpFetcher implements Fetcher {
  private readonly config: FetchConfig
  private readonly delay: DelayStrategy
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions) {
    this.config = options.config
    this.delay = options.delay ?? new JitteredDelay()
    this.log = options.logger ?? loggers.fetch
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const headers: Record<string, string> = {
      ...this.config.headers,
      ...(options.headers ?? {}),
    }
    const maxAttempts = this.config.maxAttempts

    let last: AttemptResult = { status: 'error', error: 'No attempt made' }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.log.debug('GET', { url, attempt })
      last = await this.attempt(url, headers, options)

      if (!this.isRetryable(last)) {
        return { ...last, attempts: attempt, durationMs: Date.now() - startTime }
      }

      this.log.debug('Fetch attempt failed', {
        url,
        attempt,
        status: last.status,
        statusCode: last.statusCode,
        error: last.error,
      })

      if (attempt < maxAttempts) {
        await this.delay.wait(this.config.retryDelay)
      }
    }

    this.log.warn('Fetch failed after retries', {
      url,
      attempts: maxAttempts,
      status: last.status,
      statusCode: last.statusCode,
    })

    return { ...last, attempts: maxAttempts, durationMs: Date.now() - startTime }
  }

  private isRetryable(result: AttemptResult): boolean {
    return result.status === 'error' || result.status === 'timeout'
  }

  /**
   * Single attempt. Transport failures become `error` results.
   */
  private async attempt(
    url: string,
    headers: Record<string, string>,
    options: FetchOptions
  ): Promise<AttemptResult> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? this.config.maxSizeBytes
    const redirect = options.redirect ?? 'follow'
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect,
      })

      if (redirect === 'manual' && response.status >= 300 && response.status < 400) {
        await response.body?.cancel()
        return {
          status: 'redirect',
          statusCode: response.status,
          location: response.headers.get('location') ?? undefined,
        }
      }

      if (!response.ok) {
        await response.body?.cancel()
        return {
          status: 'error',
          statusCode: response.status,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        return {
          status: 'too_large',
          statusCode: response.status,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          error: 'Response exceeded size limit',
        }
      }

      return { status: 'ok', statusCode: response.status, body }
    } catch (error) {
      if (controller.signal.aborted) {
        return { status: 'timeout', error: `Request timed out after ${timeoutMs}ms` }
      }
      return {
        status: 'error',
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read response body with size limit. Returns null once the limit is passed.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
