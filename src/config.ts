import path from 'node:path';
import { Verbosity } from './interfaces/logger';
import { CaptureConfig } from './interfaces/config';
import { DetectionMode } from './interfaces/media';
import { DEFAULT_PRESET_ID } from './core/setup/camera-setup';
import { DEFAULT_KEEP_ALIVE_SECONDS } from './core/keep-alive/keep-alive';
import { DEFAULT_WAIT_BUDGET_MS } from './core/capture/capture-cycle';
import {
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from './core/transport/transport';

export type { CaptureConfig };

export const DEFAULT_PORT = 8080;
export const DEFAULT_MEDIA_PORT = 8080;
export const DEFAULT_OUTPUT_DIR = 'photos';

const DETECTION_MODES: readonly DetectionMode[] = [
  'auto',
  'listing',
  'last-captured',
];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Raw CLI values, as `parseArgs` hands them over */
export interface CaptureArgs {
  ip?: string;
  port?: string;
  'media-port'?: string;
  preset?: string;
  model?: string;
  detection?: string;
  interval?: string;
  'keep-alive'?: string;
  wait?: string;
  output?: string;
  'keep-on-device'?: boolean;
  retries?: string;
  timeout?: string;
  quiet?: boolean;
  verbose?: boolean;
}

function parseNumber(
  name: string,
  raw: string | undefined,
  fallback: number,
  { min, integer = false }: { min: number; integer?: boolean },
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`--${name} must be a number, got "${raw}"`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ConfigError(`--${name} must be a whole number, got "${raw}"`);
  }
  if (value < min) {
    throw new ConfigError(`--${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

function parsePort(name: string, raw: string | undefined, fallback: number) {
  const port = parseNumber(name, raw, fallback, { min: 1, integer: true });
  if (port > 65535) {
    throw new ConfigError(`--${name} must be at most 65535, got ${port}`);
  }
  return port;
}

function parseDetection(raw: string | undefined): DetectionMode {
  if (raw === undefined) {
    return 'auto';
  }
  const mode = DETECTION_MODES.find((candidate) => candidate === raw);
  if (!mode) {
    throw new ConfigError(
      `--detection must be one of ${DETECTION_MODES.join(', ')}, got "${raw}"`,
    );
  }
  return mode;
}

export function resolveVerbosity(args: {
  quiet?: boolean;
  verbose?: boolean;
}): Verbosity {
  return args.quiet
    ? Verbosity.Quiet
    : args.verbose
      ? Verbosity.Verbose
      : Verbosity.Normal;
}

/**
 * Validate CLI values and fill in defaults. The result is frozen.
 */
export function buildCaptureConfig(
  args: CaptureArgs,
  cwd: string = process.cwd(),
): Readonly<CaptureConfig> {
  const ip = args.ip?.trim();
  if (!ip) {
    throw new ConfigError('--ip is required');
  }

  const keepAliveSeconds = parseNumber(
    'keep-alive',
    args['keep-alive'],
    DEFAULT_KEEP_ALIVE_SECONDS,
    { min: 1, integer: true },
  );

  const config: CaptureConfig = {
    ip,
    port: parsePort('port', args.port, DEFAULT_PORT),
    mediaPort: parsePort('media-port', args['media-port'], DEFAULT_MEDIA_PORT),
    preset: args.preset?.trim() || DEFAULT_PRESET_ID,
    model: args.model?.trim() || undefined,
    detection: parseDetection(args.detection),
    photoIntervalMs:
      parseNumber('interval', args.interval, 0, { min: 0 }) * 1000,
    keepAliveSeconds,
    waitBudgetMs:
      parseNumber('wait', args.wait, DEFAULT_WAIT_BUDGET_MS / 1000, {
        min: 0.1,
      }) * 1000,
    outputDir: path.resolve(cwd, args.output?.trim() || DEFAULT_OUTPUT_DIR),
    deleteAfterDownload: !args['keep-on-device'],
    retries: parseNumber('retries', args.retries, DEFAULT_RETRIES, {
      min: 1,
      integer: true,
    }),
    requestTimeoutMs:
      parseNumber('timeout', args.timeout, DEFAULT_TIMEOUT_MS / 1000, {
        min: 0.1,
      }) * 1000,
    retryDelayMs: DEFAULT_RETRY_DELAY_MS,
    verbosity: resolveVerbosity(args),
  };

  return Object.freeze(config);
}

export function controlBaseUrl(config: Pick<CaptureConfig, 'ip' | 'port'>) {
  return `http://${config.ip}:${config.port}`;
}

export function mediaBaseUrl(
  config: Pick<CaptureConfig, 'ip' | 'mediaPort'>,
) {
  return `http://${config.ip}:${config.mediaPort}`;
}
