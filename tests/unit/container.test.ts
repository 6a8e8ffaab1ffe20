import { describe, it, expect } from 'vitest';
import { createClientContainer, openSession } from '../../src/di/container.js';
import { DI } from '../../src/di/tokens.js';
import { createClientConfig } from '../../src/config/client-config.js';
import { PinoLoggerFactory } from '../../src/core/logging/index.js';
import { NodeIntervalTimer } from '../../src/infra/local/interval-timer/index.js';
import { CallbackId } from '../../src/protocol/constants.js';
import { RemotePipe } from '../../src/objects/remote-pipe.js';
import { InMemoryObjectServer, ManualIntervalTimer } from '../fakes/index.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { createTestContainer } from '../helpers/test-container.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('createClientContainer', () => {
  it('should read the session settings from the environment', async () => {
    const server = new InMemoryObjectServer();
    const timers: ManualIntervalTimer[] = [];
    const container = expectOk(
      createClientContainer({
        transport: server,
        env: { OBJLINK_KEEP_ALIVE_INTERVAL_MS: '2000' },
        loggerFactory: new FakeLoggerFactory(),
        timerFactory: () => {
          const timer = new ManualIntervalTimer();
          timers.push(timer);
          return timer;
        },
      }),
      'creating container'
    );

    expectOk(await openSession(container).create(), 'creating session');

    expect(server.callsOf('createSession')[0]?.args).toEqual([7]);
    expect(timers.map((timer) => timer.intervalMs)).toEqual([2000]);
  });

  it('should refuse an invalid environment', () => {
    const error = expectErr(
      createClientContainer({
        transport: new InMemoryObjectServer(),
        env: { OBJLINK_KEEP_ALIVE_INTERVAL_MS: '50' },
        loggerFactory: new FakeLoggerFactory(),
      }),
      'creating container'
    );

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toHaveLength(1);
  });

  it('should fall back to the node timer and the pino logger factory', () => {
    const container = expectOk(
      createClientContainer({
        transport: new InMemoryObjectServer(),
        config: expectOk(createClientConfig({ lifetimeS: 35, keepAliveIntervalMs: 10_000 }), 'building config'),
      }),
      'creating container'
    );

    expect(container.resolve(DI.Ports.Timer)).toBeInstanceOf(NodeIntervalTimer);
    expect(container.resolve(DI.Logging.Factory)).toBeInstanceOf(PinoLoggerFactory);
  });

  it('should give every session its own timer on one shared connection', async () => {
    const { container, server, timers } = createTestContainer();

    const first = openSession(container);
    const second = openSession(container);
    expectOk(await first.create(), 'creating first session');
    expectOk(await second.create(), 'creating second session');

    expect(first.connection).toBe(second.connection);
    expect([first.sessionId, second.sessionId]).toEqual([1, 2]);
    expect(timers).toHaveLength(2);
    expect(timers.every((timer) => timer.running)).toBe(true);

    timers[1]?.tick();
    await second.settle();
    expect(server.keepAlives).toEqual([2]);
  });

  it('should keep separate containers apart', () => {
    const one = createTestContainer();
    const other = createTestContainer();

    expect(openSession(one.container).connection).not.toBe(openSession(other.container).connection);
    expect(openSession(one.container).connection).toBe(openSession(one.container).connection);
  });

  it('should drop every listener on the connection when one session expires', async () => {
    const { container, timers } = createTestContainer();
    const first = openSession(container);
    const second = openSession(container);
    expectOk(await first.create(), 'creating first session');
    expectOk(await second.create(), 'creating second session');
    const pipe = expectOk(await new RemotePipe(second).create(0, 256), 'creating pipe');
    expect(second.connection.listenerCount(CallbackId.ASYNC_FILE_WRITE)).toBe(1);

    await first.expire();

    expect(second.connection.listenerCount(CallbackId.ASYNC_FILE_WRITE)).toBe(0);
    expect(pipe.isAttached).toBe(true);
    expect(second.isAlive).toBe(true);
    expect(timers.map((timer) => timer.running)).toEqual([false, true]);
  });
});
