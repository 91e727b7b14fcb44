/**
 * Shared test helpers
 *
 * Fakes return the same shape as the real factories, so they plug into
 * the `deps` parameters without type casting.
 */

import { Readable } from 'node:stream';
import { vi, type Mock } from 'vitest';
import type { Clock } from '../../src/utils/clock';
import type {
  Transport,
  TransportResult,
  TransportStreamResult,
} from '../../src/interfaces/transport';
import type {
  CronConstructor,
  KeepAliveCronOptions,
} from '../../src/core/keep-alive/keep-alive';

export const okBody = (body: string): TransportResult => ({
  ok: true,
  status: 200,
  body,
});

export const failed = (
  status?: number,
  error: string = status ? `HTTP ${status}` : 'connect ECONNREFUSED',
): TransportResult & { ok: false } =>
  status === undefined
    ? { ok: false, error, attempts: 3 }
    : { ok: false, error, attempts: 3, status };

export const okStream = (content: string): TransportStreamResult => ({
  ok: true,
  status: 200,
  stream: Readable.from([Buffer.from(content)]),
});

/**
 * `/gopro/media/list` body with a single folder
 */
export function listingBody(folder: string, names: string[]): string {
  return JSON.stringify({
    id: '1',
    media: [{ d: folder, fs: names.map((n) => ({ n, cre: '1', s: '100' })) }],
  });
}

export interface FakeClock extends Clock {
  advance: (ms: number) => void;
  sleeps: number[];
}

/**
 * Clock whose `sleep` advances time immediately. `onSleep` runs after each
 * advance, which lets a test stop a loop at a chosen moment.
 */
export function createFakeClock(
  start = 0,
  onSleep?: (now: number) => void,
): FakeClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
      onSleep?.(current);
    },
    advance: (ms: number) => {
      current += ms;
    },
    sleeps,
  };
}

export type RouteHandler = (url: string, call: number) => TransportResult;

export interface MockTransport extends Transport {
  calls: string[];
  get: Mock<(url: string) => Promise<TransportResult>>;
  getStream: Mock<(url: string) => Promise<TransportStreamResult>>;
}

/**
 * Transport answering from per-path handlers. The path is matched without
 * its query string; unknown paths fail with 404. `call` counts requests to
 * the same path, starting at 1.
 */
export function createMockTransport(
  routes: Record<string, RouteHandler> = {},
  streams: (url: string) => TransportStreamResult = () => okStream('jpeg'),
): MockTransport {
  const calls: string[] = [];
  const counts = new Map<string, number>();

  const get = vi.fn(async (url: string): Promise<TransportResult> => {
    calls.push(url);
    const routePath = url.split('?')[0];
    const count = (counts.get(routePath) ?? 0) + 1;
    counts.set(routePath, count);
    const handler = routes[routePath];
    return handler ? handler(url, count) : failed(404);
  });

  const getStream = vi.fn(
    async (url: string): Promise<TransportStreamResult> => {
      calls.push(url);
      return streams(url);
    },
  );

  return {
    calls,
    get,
    getStream,
    resolve: (url: string) => new URL(url, 'http://10.5.5.9:8080').toString(),
  };
}

/**
 * Stand-in for croner's Cron that never fires by itself
 */
export class FakeCron {
  static instances: FakeCron[] = [];

  pattern: string;
  options: KeepAliveCronOptions;
  callback: () => Promise<void>;
  stopped = false;

  constructor(
    pattern: string,
    options: KeepAliveCronOptions,
    callback: () => Promise<void>,
  ) {
    this.pattern = pattern;
    this.options = options;
    this.callback = callback;
    FakeCron.instances.push(this);
  }

  stop() {
    this.stopped = true;
  }

  nextRun() {
    return this.stopped ? null : new Date('2026-01-01T00:00:03Z');
  }

  isRunning() {
    return !this.stopped;
  }
}

export const fakeCronConstructor: CronConstructor = FakeCron;

/**
 * Silence stdout for the duration of a test
 */
export function muteStdout() {
  return vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
}
