import { Cron } from 'croner';
import * as logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { Transport } from '../../interfaces/transport';
import { describeFailure } from '../transport/transport';
import { RunState } from '../runner/run-state';
import { RunStats } from '../capture/run-stats';

export const KEEP_ALIVE_PATH = '/gopro/camera/keep_alive';
export const DEFAULT_KEEP_ALIVE_SECONDS = 3;

interface CronJob {
  stop: () => void;
  nextRun: () => Date | null;
  isRunning: () => boolean;
}

export interface KeepAliveCronOptions {
  name: string;
  interval: number;
  protect: boolean;
}

export type CronConstructor = new (
  pattern: string,
  options: KeepAliveCronOptions,
  callback: () => Promise<void>,
) => CronJob;

export interface KeepAliveOptions {
  intervalSeconds?: number;
  verbosity: number;
}

export interface KeepAliveDeps {
  transport: Transport;
  runState: RunState;
  stats?: RunStats;
  clock?: Clock;
  cronConstructor?: CronConstructor;
}

/**
 * Periodic keep-alive for the camera's control session.
 *
 * The job ticks every second and croner's `interval` spaces the sends;
 * `protect` keeps a slow ping from overlapping the next one.
 */
export function createKeepAlive(options: KeepAliveOptions, deps: KeepAliveDeps) {
  const { transport, runState, stats } = deps;
  const clock = deps.clock ?? systemClock;
  const CronImpl =
    deps.cronConstructor ?? (Cron as unknown as CronConstructor);
  const intervalSeconds = options.intervalSeconds ?? DEFAULT_KEEP_ALIVE_SECONDS;
  const log = logger.createScopedLogger('Keep-Alive', options.verbosity);

  let job: CronJob | null = null;
  let inFlight: Promise<void> | null = null;
  let lastSentAt: number | null = null;

  const ping = async (): Promise<boolean> => {
    try {
      const response = await transport.get(KEEP_ALIVE_PATH);
      if (response.ok) {
        lastSentAt = clock.now();
        stats?.record('keepAlives');
        log.verbose('Sent successfully.');
        return true;
      }
      stats?.record('keepAliveFailures');
      log.warning(`Error: ${describeFailure(response)}`);
      return false;
    } catch (error) {
      stats?.record('keepAliveFailures');
      log.error(`Failed: ${logger.errorMessage(error)}`);
      return false;
    }
  };

  const stopJob = (): void => {
    if (job) {
      job.stop();
      job = null;
    }
  };

  const tick = async (): Promise<void> => {
    if (!runState.running) {
      stopJob();
      return;
    }

    const current = ping().then(() => undefined);
    inFlight = current;
    try {
      await current;
    } finally {
      if (inFlight === current) {
        inFlight = null;
      }
    }
  };

  /**
   * Schedule the job. Its first run lands on the next whole second, so the
   * caller never waits on the camera here.
   */
  const start = (): void => {
    if (job || !runState.running) {
      return;
    }

    job = new CronImpl(
      '* * * * * *',
      { name: 'keep-alive', interval: intervalSeconds, protect: true },
      tick,
    );
    log.verbose(`Sending every ${intervalSeconds}s`);
  };

  /**
   * Stop scheduling and wait for a ping that is already on the wire.
   */
  const stop = async (): Promise<void> => {
    stopJob();
    if (inFlight) {
      await inFlight;
    }
  };

  return {
    start,
    stop,
    tick,
    isScheduled: () => job !== null,
    getLastSentAt: () => lastSentAt,
  };
}

export type KeepAlive = ReturnType<typeof createKeepAlive>;
