import { z } from 'zod';
import { apiErrorSchema } from '../error/apiError.js';
import { incomingRecordSchema } from './record.js';

/**
 * Schema of the response envelope.
 *
 * A `failed` envelope must carry an `error`; `records` is always present after parsing.
 * Returned records are decoded leniently, see {@link incomingRecordSchema}.
 */
export function createResponseSchema() {
  const shared = {
    records: z.array(incomingRecordSchema).nullish().transform((records) => records ?? []),
    attributes: z.record(z.string(), z.unknown()).nullish(),
  };

  return z.discriminatedUnion('status', [
    z.object({ status: z.literal('success'), error: apiErrorSchema.nullish(), ...shared }),
    z.object({ status: z.literal('failed'), error: apiErrorSchema, ...shared }),
  ]);
}

export type ResponseSchema = ReturnType<typeof createResponseSchema>;

/** A validated response envelope. */
export type DmartResponse = z.output<ResponseSchema>;

/** Body of a rejected call: only the `error` field is relied upon. */
export const rejectionSchema = z.object({ error: apiErrorSchema });
