import { z } from 'zod';

/**
 * Error payload as the backend sends it in the `error` field of an envelope.
 */
export const apiErrorSchema = z.object({
  type: z.string(),
  code: z.number().int(),
  message: z.string(),
  info: z.array(z.record(z.string(), z.unknown())).nullish(),
});

/** Error payload carried by every {@link DmartError}. */
export type ApiError = z.output<typeof apiErrorSchema>;
