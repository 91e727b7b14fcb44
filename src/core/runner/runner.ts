import * as logger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { Mutex } from '../../utils/mutex';
import { CaptureConfig } from '../../interfaces/config';
import { Transport } from '../../interfaces/transport';
import { controlBaseUrl, mediaBaseUrl } from '../../config';
import { createTransport } from '../transport/transport';
import { createDetectionStrategy } from '../media/detection-strategy';
import { createTransfer } from '../transfer/transfer';
import { createCaptureCycle, CaptureState } from '../capture/capture-cycle';
import { createRunStats, RunStats } from '../capture/run-stats';
import { createKeepAlive, CronConstructor } from '../keep-alive/keep-alive';
import { runCameraSetup, SetupReport } from '../setup/camera-setup';
import { RunState } from './run-state';

type SignalName = 'SIGINT' | 'SIGTERM';

export interface RunnerOptions {
  fetchFn?: typeof fetch;
  clock?: Clock;
  cronConstructor?: CronConstructor;
  runSetup?: typeof runCameraSetup;
  registerSignalHandler?: (
    signal: SignalName,
    handler: () => void,
  ) => () => void;
  exitFn?: (code: number) => void;
  onCaptureStateChange?: (state: CaptureState) => void;
}

export interface RunResult {
  setup: SetupReport;
  stats: ReturnType<RunStats['snapshot']>;
}

/**
 * Wires transport, capture cycle and keep-alive for one camera and owns
 * their shared run state.
 */
export function createRunner(
  config: Readonly<CaptureConfig>,
  options: RunnerOptions = {},
) {
  const verbosity = config.verbosity;
  const clock = options.clock ?? systemClock;
  const setup = options.runSetup ?? runCameraSetup;
  const registerSignalHandler =
    options.registerSignalHandler ??
    ((signal: SignalName, handler: () => void) => {
      process.on(signal, handler);
      return () => {
        process.off(signal, handler);
      };
    });
  const exitFn = options.exitFn ?? ((code: number) => process.exit(code));
  const log = logger.createScopedLogger('Shutdown', verbosity);

  const runState = new RunState();
  const stats = createRunStats();
  const transport: Transport = createTransport(
    {
      baseUrl: controlBaseUrl(config),
      retries: config.retries,
      timeoutMs: config.requestTimeoutMs,
      retryDelayMs: config.retryDelayMs,
      verbosity,
    },
    { fetchFn: options.fetchFn, clock, mutex: new Mutex() },
  );

  const strategy = createDetectionStrategy(
    config.detection,
    config.model,
    transport,
    verbosity,
  );
  const transfer = createTransfer(
    {
      mediaBaseUrl: mediaBaseUrl(config),
      outputDir: config.outputDir,
      deleteAfterDownload: config.deleteAfterDownload,
      verbosity,
    },
    { transport, stats },
  );
  const captureCycle = createCaptureCycle(
    {
      photoIntervalMs: config.photoIntervalMs,
      waitBudgetMs: config.waitBudgetMs,
      verbosity,
    },
    {
      transport,
      strategy,
      transfer,
      runState,
      clock,
      stats,
      onStateChange: options.onCaptureStateChange,
    },
  );
  const keepAlive = createKeepAlive(
    { intervalSeconds: config.keepAliveSeconds, verbosity },
    {
      transport,
      runState,
      stats,
      clock,
      cronConstructor: options.cronConstructor,
    },
  );

  /**
   * Flip the run state. The units notice at their next loop boundary.
   */
  const stop = (): boolean => runState.stop();

  /**
   * Run until stopped: setup, then both units side by side.
   */
  const run = async (): Promise<RunResult> => {
    logger.info(
      `Camera: ${controlBaseUrl(config)} (media ${mediaBaseUrl(config)})`,
      verbosity,
    );
    logger.info(`Saving photos to ${config.outputDir}`, verbosity);
    if (!config.deleteAfterDownload) {
      logger.info('Photos stay on the camera after download', verbosity);
    }

    const setupReport = await setup(transport, {
      preset: config.preset,
      verbosity,
    });
    logger.info(`Detecting new media via ${strategy.name}`, verbosity);

    keepAlive.start();
    const capture = captureCycle.run();

    await runState.stopped();
    log.info('Stopping capture and keep-alive...');

    await Promise.all([keepAlive.stop(), capture]);
    log.success('All tasks stopped.');
    stats.displaySummary();

    return { setup: setupReport, stats: stats.snapshot() };
  };

  /**
   * CLI entry: run until SIGINT/SIGTERM, then exit.
   */
  const start = async (): Promise<RunResult> => {
    const unregister = [
      registerSignalHandler('SIGINT', stop),
      registerSignalHandler('SIGTERM', stop),
    ];

    try {
      const result = await run();
      exitFn(0);
      return result;
    } finally {
      unregister.forEach((off) => off());
    }
  };

  return {
    run,
    start,
    stop,
    isRunning: () => runState.running,
    getCaptureState: captureCycle.getState,
  };
}

export type Runner = ReturnType<typeof createRunner>;
