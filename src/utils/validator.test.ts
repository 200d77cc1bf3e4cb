import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

function schemaOf(validate: StandardSchemaV1.Props<unknown, string>['validate']): StandardSchemaV1<unknown, string> {
  return { '~standard': { version: 1, vendor: 'test', validate } };
}

describe('validator', () => {
  it('correct schema validates to correct', async () => {
    const data = { foo: 'bar' };
    const schema = z.object({ foo: z.string() });
    const [err, parsed] = await validator(data, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns the transformed output', async () => {
    const schema = z.string().transform((value) => value.length);
    const [err, parsed] = await validator('four', schema);

    expect(err).toBeNull();
    expect(parsed).toBe(4);
  });

  it('returns issues for invalid input', async () => {
    const schema = z.object({ foo: z.string() });
    const [err, parsed] = await validator({ foo: 1 }, schema, 'record');

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['foo']);
    expect(err?.message.startsWith('error validating record; issues: foo: ')).toBe(true);
  });

  it('returns error when async validation throws', async () => {
    const schema = schemaOf(async () => {
      throw new Error('oops');
    });

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating async data');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when sync validation throws', async () => {
    const schema = schemaOf(() => {
      throw new Error('oops');
    });

    const [err, value] = await validator({}, schema, 'response envelope');

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating response envelope on validation start');
  });

  it('accepts async schemas', async () => {
    const schema = schemaOf(async (input) => ({ value: String(input) }));

    const [err, value] = await validator(12, schema);

    expect(err).toBeNull();
    expect(value).toBe('12');
  });
});
