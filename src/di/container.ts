import 'reflect-metadata';
import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe';
import { err, ok, type Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { ObjectTransportPort } from '../ports/object-transport.port.js';
import type { IntervalTimerPort } from '../ports/interval-timer.port.js';
import { NodeIntervalTimer } from '../infra/local/interval-timer/index.js';
import { createBootstrapLogger, PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import { loadClientConfig, type ValidatedConfig } from '../config/client-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import { formatObjectApiError } from '../errors/formatter.js';
import { ObjectConnection } from '../connection/object-connection.js';
import { ObjectSession } from '../session/object-session.js';

export interface ClientContainerOptions {
  readonly transport: ObjectTransportPort;
  /** Skips env parsing when given. */
  readonly config?: ValidatedConfig;
  /** Read when `config` is absent. Defaults to `process.env`. */
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Called once per session. */
  readonly timerFactory?: () => IntervalTimerPort;
  readonly loggerFactory?: ILoggerFactory;
}

/**
 * Composition root: one child container per transport.
 *
 * The connection (and with it the callback table) is cached per container;
 * every `openSession` call gets its own session and keep-alive timer on top.
 */
export function createClientContainer(
  options: ClientContainerOptions
): Result<DependencyContainer, ConfigInvalidError> {
  let config = options.config;
  if (config === undefined) {
    const loaded = loadClientConfig({ env: options.env ?? process.env });
    if (loaded.isErr()) {
      createBootstrapLogger('container').error(
        { issues: loaded.error.issues.length },
        formatObjectApiError(loaded.error)
      );
      return err(loaded.error);
    }
    config = loaded.value;
  }

  const child = container.createChildContainer();
  const timerFactory = options.timerFactory ?? (() => new NodeIntervalTimer());

  child.register<ObjectTransportPort>(DI.Ports.Transport, { useValue: options.transport });
  child.register<IntervalTimerPort>(DI.Ports.Timer, { useFactory: () => timerFactory() });
  child.register<ValidatedConfig>(DI.Config.Client, { useValue: config });
  child.register<ILoggerFactory>(DI.Logging.Factory, {
    useValue: options.loggerFactory ?? container.resolve(PinoLoggerFactory),
  });
  child.register<ObjectConnection>(DI.Connection.Object, {
    useFactory: instanceCachingFactory((c) => c.resolve(ObjectConnection)),
  });

  return ok(child);
}

/** A fresh, not yet created session on the container's connection. */
export function openSession(clientContainer: DependencyContainer): ObjectSession {
  return clientContainer.resolve(ObjectSession);
}
