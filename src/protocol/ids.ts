import type { Brand } from '../runtime/brand.js';

// Server-issued identifiers. Opaque integers; never do arithmetic on them.
export type ObjectId = Brand<number, 'objlink.ObjectId'>;
export type SessionId = Brand<number, 'objlink.SessionId'>;

// Registry-issued, unique for the lifetime of one CallbackRegistry.
export type CallbackCookie = Brand<number, 'objlink.CallbackCookie'>;

export function asObjectId(value: number): ObjectId {
  return value as ObjectId;
}

export function asSessionId(value: number): SessionId {
  return value as SessionId;
}

export function asCallbackCookie(value: number): CallbackCookie {
  return value as CallbackCookie;
}

/**
 * Placeholder id the protocol uses for "no object" in optional slots
 * (e.g. a stdio redirection that is not backed by a file name).
 */
export const NO_OBJECT_ID: ObjectId = asObjectId(0);
