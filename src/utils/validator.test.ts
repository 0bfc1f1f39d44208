import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

function schemaOf(validate: StandardSchemaV1.Props<unknown, string>['validate']): StandardSchemaV1<unknown, string> {
  return { '~standard': { version: 1, vendor: 'test', validate } };
}

describe('validator', () => {
  it('returns the parsed output', async () => {
    const schema = z.object({ name: z.string() });
    const [err, parsed] = await validator({ name: 'Item' }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ name: 'Item' });
  });

  it('returns the transformed output', async () => {
    const schema = z.object({ names: z.array(z.string()) }).transform(({ names }) => names.length);
    const [err, parsed] = await validator({ names: ['7.0', 'latest'] }, schema);

    expect(err).toBeNull();
    expect(parsed).toBe(2);
  });

  it('returns a ValidationError carrying the issues', async () => {
    const schema = z.object({ limit: z.number().int().positive() });
    const [err, parsed] = await validator({ limit: 0 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.issues.map((issue) => issue.path)).toEqual([['limit']]);
  });

  it('returns an error when sync validation throws', async () => {
    const cause = new Error('oops');
    const [err, value] = await validator(
      {},
      schemaOf(() => {
        throw cause;
      }),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
    expect(err?.cause).toBe(cause);
  });

  it('returns an error when async validation rejects', async () => {
    const [err, value] = await validator(
      {},
      schemaOf(() => Promise.reject(new Error('oops'))),
    );

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating async data');
  });

  it('resolves async validation results', async () => {
    const [err, value] = await validator(
      'Item',
      schemaOf((input) => Promise.resolve({ value: String(input) })),
    );

    expect(err).toBeNull();
    expect(value).toBe('Item');
  });
});
