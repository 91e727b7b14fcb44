/**
 * Device transport
 * Retrying HTTP GET shared by the capture loop and the keep-alive task
 */

import { pipeline, Readable, Transform } from 'node:stream';
import * as logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { Mutex } from '../../utils/mutex';
import {
  Transport,
  TransportFailure,
  TransportOptions,
  TransportResult,
  TransportStreamResult,
} from '../../interfaces/transport';

export const DEFAULT_RETRIES = 3;
export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export interface TransportDeps {
  fetchFn?: typeof fetch;
  clock?: Clock;
  mutex?: Mutex;
}

type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; status: number };

export type JsonResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

export function parseJson(text: string): JsonResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: logger.errorMessage(error) };
  }
}

export function createTransport(
  options: TransportOptions,
  deps: TransportDeps = {},
): Transport {
  const retries = Math.max(1, Math.floor(options.retries ?? DEFAULT_RETRIES));
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const fetchFn = deps.fetchFn ?? fetch;
  const clock = deps.clock ?? systemClock;
  const mutex = deps.mutex ?? new Mutex();
  const log = logger.createScopedLogger(
    'HTTP',
    options.verbosity ?? logger.Verbosity.Normal,
  );

  const resolve = (url: string): string =>
    new URL(url, options.baseUrl).toString();

  // The timeout covers connect, headers and whatever `consume` reads.
  const attemptOnce = async <T>(
    target: string,
    consume: (response: Response, controller: AbortController) => Promise<T>,
  ): Promise<AttemptOutcome<T>> => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      const response = await fetchFn(target, { signal: controller.signal });
      if (response.status !== 200) {
        await response.body?.cancel();
        return { ok: false, status: response.status };
      }
      return { ok: true, value: await consume(response, controller) };
    } finally {
      clearTimeout(timer);
    }
  };

  const request = async <T>(
    url: string,
    consume: (response: Response, controller: AbortController) => Promise<T>,
  ): Promise<{ ok: true; value: T } | TransportFailure> => {
    const target = resolve(url);
    let lastError = 'no attempt made';
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= retries; attempt++) {
      log.verbose(`GET ${target} (attempt ${attempt}/${retries})`);

      try {
        const outcome = await mutex.runExclusive(() =>
          attemptOnce(target, consume),
        );
        if (outcome.ok) {
          return outcome;
        }
        lastStatus = outcome.status;
        lastError = `HTTP ${outcome.status}`;
        log.verbose(`Status: ${outcome.status} - attempt ${attempt}`);
      } catch (error) {
        lastError = logger.errorMessage(error);
        log.verbose(`Attempt ${attempt} failed: ${lastError}`);
      }

      if (attempt < retries) {
        await clock.sleep(retryDelayMs);
      }
    }

    const failure: TransportFailure = {
      ok: false,
      error: lastError,
      attempts: retries,
    };
    if (lastStatus !== undefined) {
      failure.status = lastStatus;
    }
    return failure;
  };

  const get = async (url: string): Promise<TransportResult> => {
    const result = await request(url, (response) => response.text());
    return result.ok ? { ok: true, status: 200, body: result.value } : result;
  };

  const getStream = async (url: string): Promise<TransportStreamResult> => {
    const result = await request(url, async (response, controller) => {
      if (!response.body) {
        throw new Error('Response has no body');
      }
      return withIdleTimeout(
        Readable.fromWeb(response.body),
        timeoutMs,
        (error) => controller.abort(error),
      );
    });
    return result.ok
      ? { ok: true, status: 200, stream: result.value }
      : result;
  };

  return { get, getStream, resolve };
}

/**
 * Pass `source` through, failing the returned stream when no chunk arrives
 * for `idleMs`. A body still streaming after the request phase is bounded
 * by this instead of the per-attempt timeout.
 */
export function withIdleTimeout(
  source: Readable,
  idleMs: number,
  onIdle?: (error: Error) => void,
): Readable {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const disarm = (): void => {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
  };

  const watched = new Transform({
    transform(chunk, _encoding, callback) {
      arm();
      callback(null, chunk);
    },
    flush(callback) {
      disarm();
      callback();
    },
  });

  const arm = (): void => {
    disarm();
    timer = setTimeout(() => {
      const error = new Error(`No data received for ${idleMs}ms`);
      onIdle?.(error);
      watched.destroy(error);
    }, idleMs);
  };

  watched.once('close', disarm);
  // Errors reach the consumer through `watched`; pipeline destroys both ends.
  pipeline(source, watched, disarm);
  arm();
  return watched;
}

export function describeFailure(failure: TransportFailure): string {
  return failure.status !== undefined
    ? `HTTP ${failure.status} after ${failure.attempts} attempt(s)`
    : `${failure.error} after ${failure.attempts} attempt(s)`;
}
