/**
 * Capture Cycle
 * Trigger the shutter, wait for the new photo to show up, transfer it
 */

import * as logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { Transport } from '../../interfaces/transport';
import {
  DetectionStrategy,
  MediaIndex,
  TransferResult,
} from '../../interfaces/media';
import { describeFailure } from '../transport/transport';
import { diffIndex, fetchMediaIndex, selectLatest } from '../media/media-index';
import { Transfer } from '../transfer/transfer';
import { RunState } from '../runner/run-state';
import { RunStats } from './run-stats';

export const SHUTTER_START_PATH = '/gopro/camera/shutter/start';

export const DEFAULT_WAIT_BUDGET_MS = 7000;
export const INITIAL_BACKOFF_MS = 100;
export const MAX_BACKOFF_MS = 1000;
/** Pause between cycles when the next capture is already due */
export const IDLE_TICK_MS = 20;
/** Longest single sleep while waiting out the photo interval */
export const MAX_IDLE_SLEEP_MS = 1000;

export type CaptureState =
  | 'Idle'
  | 'Triggering'
  | 'WaitingForMedia'
  | 'Transferring'
  | 'Stopped';

export interface CaptureCycleOptions {
  photoIntervalMs: number;
  waitBudgetMs?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  verbosity: number;
}

export interface CaptureCycleDeps {
  transport: Transport;
  strategy: DetectionStrategy;
  transfer: Pick<Transfer, 'transfer'>;
  runState: RunState;
  clock?: Clock;
  stats?: RunStats;
  onStateChange?: (state: CaptureState) => void;
}

export type WaitOutcome =
  | { kind: 'grown'; index: MediaIndex }
  | { kind: 'timeout'; elapsedMs: number }
  | { kind: 'stopped' };

export function createCaptureCycle(
  options: CaptureCycleOptions,
  deps: CaptureCycleDeps,
) {
  const { transport, strategy, transfer, runState, stats } = deps;
  const clock = deps.clock ?? systemClock;
  const waitBudgetMs = options.waitBudgetMs ?? DEFAULT_WAIT_BUDGET_MS;
  const initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  const maxBackoffMs = Math.max(
    initialBackoffMs,
    options.maxBackoffMs ?? MAX_BACKOFF_MS,
  );
  const log = logger.createScopedLogger('Photo', options.verbosity);

  let state: CaptureState = 'Idle';
  let snapshot: MediaIndex | null = null;
  let lastTriggerAt: number | null = null;
  const seen = new Set<string>();

  const setState = (next: CaptureState): void => {
    if (state === next) {
      return;
    }
    state = next;
    deps.onStateChange?.(next);
  };

  /**
   * The comparison baseline always comes from a full listing. An unknown
   * listing leaves it unset and the cycle does not trigger.
   */
  const ensureBaseline = async (): Promise<MediaIndex | null> => {
    if (snapshot) {
      return snapshot;
    }

    const result = await fetchMediaIndex(transport, options.verbosity);
    if (result.kind === 'unknown') {
      log.warning(`Media list unavailable (${result.reason}), not capturing yet`);
      return null;
    }

    snapshot = result.index;
    log.info(`${snapshot.size} file(s) already on the camera`);
    return snapshot;
  };

  const trigger = async (): Promise<boolean> => {
    setState('Triggering');
    lastTriggerAt = clock.now();

    const response = await transport.get(SHUTTER_START_PATH);
    if (response.ok) {
      stats?.record('triggers');
      log.info('Capture triggered.');
      return true;
    }

    stats?.record('triggerFailures');
    log.warning(`Capture failed: ${describeFailure(response)}`);
    return false;
  };

  /**
   * Poll the detection strategy with a doubling, capped backoff until the
   * index grows or the wait budget runs out.
   */
  const waitForMedia = async (previous: MediaIndex): Promise<WaitOutcome> => {
    setState('WaitingForMedia');
    const startedAt = clock.now();
    let backoffMs = initialBackoffMs;

    while (clock.now() - startedAt < waitBudgetMs) {
      if (!runState.running) {
        return { kind: 'stopped' };
      }

      const observation = await strategy.observe(previous, seen);
      if (observation.kind === 'grown') {
        return { kind: 'grown', index: observation.index };
      }
      if (observation.kind === 'unknown') {
        log.verbose(`Media state unknown: ${observation.reason}`);
      }

      await clock.sleep(backoffMs);
      backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
    }

    return { kind: 'timeout', elapsedMs: clock.now() - startedAt };
  };

  /**
   * One Idle → Triggering → WaitingForMedia → Transferring pass.
   */
  const runIteration = async (): Promise<void> => {
    setState('Idle');

    const previous = await ensureBaseline();
    if (!previous || !runState.running) {
      return;
    }

    // A failed trigger still polls: the camera may have fired anyway.
    const triggered = await trigger();
    if (!runState.running) {
      return;
    }

    const outcome = await waitForMedia(previous);
    if (outcome.kind === 'stopped') {
      return;
    }

    if (outcome.kind === 'timeout') {
      stats?.record('timeouts');
      log.warning(
        `No new media after ${outcome.elapsedMs.toFixed(0)}ms` +
          (triggered ? '' : ' (trigger had failed)'),
      );
      setState('Idle');
      return;
    }

    const added = diffIndex(previous, outcome.index);
    const latest = selectLatest(added);
    if (!latest) {
      log.info('No new image detected.');
      snapshot = outcome.index;
      setState('Idle');
      return;
    }

    stats?.record('detections');
    log.info(`New image detected: ${latest}`);
    if (added.length > 1) {
      log.verbose(`${added.length - 1} other new file(s) left on the camera`);
    }
    added.forEach((key) => seen.add(key));

    if (!runState.running) {
      snapshot = outcome.index;
      return;
    }

    setState('Transferring');
    const result = await transfer.transfer(latest);
    snapshot = await nextSnapshot(outcome.index, latest, result);
    setState('Idle');
  };

  /**
   * The baseline for the next capture. A delete that reported failure may
   * still have removed the file, so the device is listed again rather than
   * assuming it is still there.
   */
  const nextSnapshot = async (
    index: MediaIndex,
    key: string,
    result: TransferResult,
  ): Promise<MediaIndex> => {
    const next = new Set(index);
    if (result.deleted) {
      next.delete(key);
      return next;
    }
    if (!result.deleteAttempted || !runState.running) {
      return next;
    }

    const fresh = await fetchMediaIndex(transport, options.verbosity);
    if (fresh.kind === 'unknown') {
      log.verbose(`Keeping the previous snapshot: ${fresh.reason}`);
      return next;
    }
    return fresh.index;
  };

  const msUntilDue = (): number => {
    if (lastTriggerAt === null) {
      return 0;
    }
    return Math.max(
      0,
      options.photoIntervalMs - (clock.now() - lastTriggerAt),
    );
  };

  /**
   * Loop until the run state stops. Errors inside an iteration are logged
   * and counted; they never end the loop.
   */
  const run = async (): Promise<void> => {
    log.verbose(
      `Capture loop started (detection: ${strategy.name}, interval: ${options.photoIntervalMs}ms)`,
    );

    while (runState.running) {
      const waitMs = msUntilDue();
      if (waitMs > 0) {
        await clock.sleep(Math.min(waitMs, MAX_IDLE_SLEEP_MS));
        continue;
      }

      try {
        await runIteration();
      } catch (error) {
        stats?.record('cycleErrors');
        log.error(`Error: ${logger.errorMessage(error)}`);
      }

      await clock.sleep(IDLE_TICK_MS);
    }

    setState('Stopped');
    log.verbose('Capture loop stopped');
  };

  return {
    run,
    runIteration,
    waitForMedia,
    getState: () => state,
    getSnapshot: (): MediaIndex | null => snapshot,
  };
}

export type CaptureCycle = ReturnType<typeof createCaptureCycle>;
