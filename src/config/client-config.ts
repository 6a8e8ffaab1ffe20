/**
 * Client configuration: parse, don't validate.
 *
 * - Zod parses the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedClientConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type KeepAliveIntervalMs = Brand<number, 'KeepAliveIntervalMs'>;
export type SessionLifetimeS = Brand<number, 'SessionLifetimeS'>;

export interface ClientConfig {
  readonly session: {
    /** Server-side lifetime requested at create and on every keep-alive. */
    readonly lifetimeS: SessionLifetimeS;
    readonly keepAliveIntervalMs: KeepAliveIntervalMs;
  };
}

export type ValidatedConfig = ValidatedClientConfig<ClientConfig>;

export interface LoadClientConfigOptions {
  readonly env: Readonly<Record<string, string | undefined>>;
}

/** Keep-alive must fire at least this many times per server lifetime. */
export const KEEP_ALIVE_MARGIN = 3.5;

export const DEFAULT_KEEP_ALIVE_INTERVAL_MS = 10_000;

// =============================================================================
// Schema
// =============================================================================

const optionalInt = (name: string, min: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(z.number().int(`${name} must be an integer`).min(min, `${name} must be >= ${min}`).optional());

const EnvSchema = z
  .object({
    OBJLINK_KEEP_ALIVE_INTERVAL_MS: optionalInt('OBJLINK_KEEP_ALIVE_INTERVAL_MS', 100).transform(
      (v) => v ?? DEFAULT_KEEP_ALIVE_INTERVAL_MS
    ),
    OBJLINK_SESSION_LIFETIME_S: optionalInt('OBJLINK_SESSION_LIFETIME_S', 1),
  })
  .transform((env) => ({
    keepAliveIntervalMs: env.OBJLINK_KEEP_ALIVE_INTERVAL_MS,
    lifetimeS: env.OBJLINK_SESSION_LIFETIME_S ?? defaultLifetimeS(env.OBJLINK_KEEP_ALIVE_INTERVAL_MS),
  }))
  .superRefine(keepAliveMargin('OBJLINK_SESSION_LIFETIME_S'));

const SessionSchema = z
  .object({
    lifetimeS: z.number().int('lifetimeS must be an integer').min(1, 'lifetimeS must be >= 1'),
    keepAliveIntervalMs: z
      .number()
      .int('keepAliveIntervalMs must be an integer')
      .min(100, 'keepAliveIntervalMs must be >= 100'),
  })
  .superRefine(keepAliveMargin('lifetimeS'));

function keepAliveMargin(path: string) {
  return (value: { lifetimeS: number; keepAliveIntervalMs: number }, ctx: z.RefinementCtx): void => {
    if (value.lifetimeS * 1000 < value.keepAliveIntervalMs * KEEP_ALIVE_MARGIN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [path],
        message: `Session lifetime must be at least ${KEEP_ALIVE_MARGIN}x the keep-alive interval`,
      });
    }
  };
}

// =============================================================================
// Public API
// =============================================================================

export type LoadClientConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadClientConfig(options: LoadClientConfigOptions): LoadClientConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(
    brandConfig({
      session: {
        lifetimeS: brandLifetime(parsed.data.lifetimeS),
        keepAliveIntervalMs: brandInterval(parsed.data.keepAliveIntervalMs),
      },
    })
  );
}

/**
 * Builds a config from explicit values, with the same bounds and keep-alive
 * margin as {@link loadClientConfig}.
 */
export function createClientConfig(session: {
  lifetimeS: number;
  keepAliveIntervalMs: number;
}): LoadClientConfigResult {
  const parsed = SessionSchema.safeParse(session);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(
    brandConfig({
      session: {
        lifetimeS: brandLifetime(parsed.data.lifetimeS),
        keepAliveIntervalMs: brandInterval(parsed.data.keepAliveIntervalMs),
      },
    })
  );
}

export const DEFAULT_CLIENT_CONFIG: ValidatedConfig = brandConfig({
  session: {
    lifetimeS: brandLifetime(defaultLifetimeS(DEFAULT_KEEP_ALIVE_INTERVAL_MS)),
    keepAliveIntervalMs: brandInterval(DEFAULT_KEEP_ALIVE_INTERVAL_MS),
  },
});

// =============================================================================
// Internal
// =============================================================================

function defaultLifetimeS(intervalMs: number): number {
  return Math.ceil((intervalMs / 1000) * KEEP_ALIVE_MARGIN);
}

function brandConfig(value: ClientConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function brandLifetime(value: number): SessionLifetimeS {
  return value as SessionLifetimeS;
}

function brandInterval(value: number): KeepAliveIntervalMs {
  return value as KeepAliveIntervalMs;
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
