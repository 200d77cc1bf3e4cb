import { z } from 'zod';
import { ResourceType } from './enums.js';
import { createIdentifierSchemas, defaultIdentifierLocale, type IdentifierLocale, normalizeSubpath } from './identifiers.js';

/**
 * Schema of one entity as sent to or returned by the backend.
 *
 * `shortname` and `subpath` are checked against the locale's patterns;
 * the subpath is then normalized once, by this schema's transform.
 */
export function createRecordSchema(locale: IdentifierLocale = defaultIdentifierLocale) {
  const identifiers = createIdentifierSchemas(locale);

  return z
    .object({
      resource_type: z.nativeEnum(ResourceType),
      uuid: z.string().uuid().nullish(),
      shortname: identifiers.shortname,
      subpath: identifiers.subpath,
      attributes: z.record(z.string(), z.unknown()).default({}),
      attachments: z.record(z.nativeEnum(ResourceType), z.array(z.unknown())).nullish(),
      retrieve_lock_status: z.boolean().optional(),
    })
    .transform((record) => ({ ...record, subpath: normalizeSubpath(record.subpath) }));
}

export type RecordSchema = ReturnType<typeof createRecordSchema>;

/** A validated record, subpath normalized. */
export type DmartRecord = z.output<RecordSchema>;

/** A record before validation, as callers build it. */
export type DmartRecordInput = z.input<RecordSchema>;

/**
 * Schema of records the backend returns.
 *
 * Only the addressing fields are required and unknown fields are kept; identifiers and
 * resource types are taken as the backend sends them. The subpath is normalized once.
 */
export const incomingRecordSchema = z
  .object({
    resource_type: z.string(),
    uuid: z.string().nullish(),
    shortname: z.string(),
    subpath: z.string(),
    attributes: z.record(z.string(), z.unknown()).nullish().transform((attributes) => attributes ?? {}),
    attachments: z.record(z.string(), z.array(z.unknown())).nullish(),
  })
  .passthrough()
  .transform((record) => ({ ...record, subpath: normalizeSubpath(record.subpath) }));

/** A record as returned by the backend, subpath normalized. */
export type IncomingRecord = z.output<typeof incomingRecordSchema>;
