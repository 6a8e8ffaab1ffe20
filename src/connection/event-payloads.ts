import { z } from 'zod';
import { asObjectId } from '../protocol/ids.js';

/**
 * Shapes of the push-event payloads, in transport argument order.
 * Anything else is logged and dropped by the receiving handle.
 */

const objectId = z.number().int().nonnegative().transform(asObjectId);
const errorCode = z.number().int().nonnegative();
const byteCount = z.number().int().nonnegative();

export const AsyncFileWritePayload = z.tuple([objectId, errorCode, byteCount]);

export const AsyncFileReadPayload = z.tuple([objectId, errorCode, z.instanceof(Uint8Array), byteCount]);

export const ProcessStateChangedPayload = z.tuple([
  objectId,
  z.number().int().nonnegative(),
  z.number().nonnegative(),
  z.number().int(),
]);

/** Scheduler-state-changed and process-spawned carry only the program id. */
export const ProgramEventPayload = z.tuple([objectId]);

export type AsyncFileWriteEvent = z.output<typeof AsyncFileWritePayload>;
export type AsyncFileReadEvent = z.output<typeof AsyncFileReadPayload>;
export type ProcessStateChangedEvent = z.output<typeof ProcessStateChangedPayload>;
export type ProgramEvent = z.output<typeof ProgramEventPayload>;
