/**
 * Device transport interfaces
 */

import type { Readable } from 'node:stream';

export interface TransportFailure {
  ok: false;
  error: string;
  attempts: number;
  /** Last HTTP status received, when any attempt got a response */
  status?: number;
}

export type TransportResult =
  | { ok: true; status: number; body: string }
  | TransportFailure;

export type TransportStreamResult =
  | { ok: true; status: number; stream: Readable }
  | TransportFailure;

export interface TransportOptions {
  baseUrl: string;
  retries?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  verbosity?: number;
}

export interface Transport {
  get: (url: string) => Promise<TransportResult>;
  getStream: (url: string) => Promise<TransportStreamResult>;
  resolve: (url: string) => string;
}
