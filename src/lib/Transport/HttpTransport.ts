/**
 * HTTP transport
 * The single GET capability the site-info client needs, with a fetch-backed default
 */

import { Context, Effect, Layer } from 'effect';
import { SiteInfoConfig } from '../Config/SiteInfoConfig.service.js';
import { TransportError } from '../errors.js';

export interface HttpResponse {
  readonly status: number;
  readonly body: Uint8Array;
}

export interface HttpTransportService {
  /**
   * GET a URL. Any status is a successful response here; deciding which
   * statuses are acceptable is up to the caller.
   */
  readonly get: (url: string) => Effect.Effect<HttpResponse, TransportError>;
}

export class HttpTransport extends Context.Tag('HttpTransport')<
  HttpTransport,
  HttpTransportService
>() {}

/**
 * Create a transport over the global `fetch`, using the configured
 * timeout, user agent and extra headers.
 */
export const makeFetchTransport = Effect.gen(function* () {
  const config = yield* SiteInfoConfig;
  const timeoutMs = yield* config.getRequestTimeout();
  const userAgent = yield* config.getUserAgent();
  const headers = yield* config.getHeaders();

  const get = (url: string): Effect.Effect<HttpResponse, TransportError> =>
    Effect.tryPromise({
      try: async () => {
        // Effect's timeout would not cancel the underlying request
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
        try {
          const response = await fetch(url, {
            signal: controller.signal,
            headers: { 'User-Agent': userAgent, ...headers },
          });
          const body = new Uint8Array(await response.arrayBuffer());
          return { status: response.status, body };
        } finally {
          clearTimeout(timeoutId);
        }
      },
      catch: (error) =>
        error instanceof Error && error.name === 'AbortError'
          ? TransportError.timeout(url, timeoutMs)
          : TransportError.fromCause(url, error),
    });

  return { get } satisfies HttpTransportService;
});

export const HttpTransportLive = Layer.effect(HttpTransport, makeFetchTransport);
