import { describe, it, expect, beforeEach } from 'vitest';
import { createKeepAlive, KEEP_ALIVE_PATH } from './keep-alive';
import { RunState } from '../runner/run-state';
import { RunStats } from '../capture/run-stats';
import {
  createFakeClock,
  createMockTransport,
  failed,
  FakeCron,
  fakeCronConstructor,
  muteStdout,
  okBody,
  RouteHandler,
} from '../../../test-config/mocks/test-helpers';

function buildKeepAlive(handler: RouteHandler = () => okBody('{}')) {
  const transport = createMockTransport({ [KEEP_ALIVE_PATH]: handler });
  const runState = new RunState();
  const stats = new RunStats();
  const clock = createFakeClock(1000);
  const keepAlive = createKeepAlive(
    { intervalSeconds: 3, verbosity: 0 },
    {
      transport,
      runState,
      stats,
      clock,
      cronConstructor: fakeCronConstructor,
    },
  );
  return { keepAlive, transport, runState, stats, clock };
}

describe('createKeepAlive', () => {
  beforeEach(() => {
    FakeCron.instances = [];
    muteStdout();
  });

  it('should schedule a protected job without pinging on start', () => {
    const { keepAlive, transport } = buildKeepAlive();

    keepAlive.start();

    expect(FakeCron.instances).toHaveLength(1);
    expect(FakeCron.instances[0].pattern).toBe('* * * * * *');
    expect(FakeCron.instances[0].options).toEqual({
      name: 'keep-alive',
      interval: 3,
      protect: true,
    });
    expect(transport.calls).toEqual([]);
    expect(keepAlive.getLastSentAt()).toBeNull();
  });

  it('should ping on every scheduled tick', async () => {
    const { keepAlive, transport, stats } = buildKeepAlive();
    keepAlive.start();

    await FakeCron.instances[0].callback();
    await FakeCron.instances[0].callback();

    expect(transport.calls).toEqual([KEEP_ALIVE_PATH, KEEP_ALIVE_PATH]);
    expect(stats.get('keepAlives')).toBe(2);
    expect(keepAlive.getLastSentAt()).toBe(1000);
  });

  it('should log and count failures without stopping', async () => {
    const { keepAlive, stats } = buildKeepAlive(() => failed(500));
    keepAlive.start();

    await FakeCron.instances[0].callback();
    await FakeCron.instances[0].callback();

    expect(stats.get('keepAliveFailures')).toBe(2);
    expect(keepAlive.isScheduled()).toBe(true);
    expect(keepAlive.getLastSentAt()).toBeNull();
  });

  it('should stop itself on the first tick after the run stops', async () => {
    const { keepAlive, transport, runState } = buildKeepAlive();
    keepAlive.start();
    await FakeCron.instances[0].callback();

    runState.stop();
    await FakeCron.instances[0].callback();

    expect(transport.calls).toHaveLength(1);
    expect(FakeCron.instances[0].stopped).toBe(true);
    expect(keepAlive.isScheduled()).toBe(false);
  });

  it('should not start once the run has stopped', async () => {
    const { keepAlive, transport, runState } = buildKeepAlive();
    runState.stop();

    keepAlive.start();

    expect(FakeCron.instances).toHaveLength(0);
    expect(transport.calls).toHaveLength(0);
  });

  it('should wait for an in-flight ping when stopped', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const transport = createMockTransport();
    transport.get.mockImplementation(async () => {
      await gate;
      return okBody('{}');
    });
    const stats = new RunStats();
    const keepAlive = createKeepAlive(
      { intervalSeconds: 3, verbosity: 0 },
      {
        transport,
        runState: new RunState(),
        stats,
        clock: createFakeClock(),
        cronConstructor: fakeCronConstructor,
      },
    );

    keepAlive.start();
    const ticked = FakeCron.instances[0].callback();
    const stopped = keepAlive.stop();
    release();
    await Promise.all([ticked, stopped]);

    expect(stats.get('keepAlives')).toBe(1);
    expect(FakeCron.instances[0].stopped).toBe(true);
  });
});
