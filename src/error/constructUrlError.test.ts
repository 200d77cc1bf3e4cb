import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

const partial = '/managed/entry/content/blog/{subpath}/hello';

describe('ConstructURLError', () => {
  it('keeps the partially filled path', () => {
    const err = new ConstructURLError(`error constructing URL, path contains {} ${partial}`, partial);

    expect(err.url).toBe(partial);
    expect(err.name).toBe('ConstructURLError');
  });

  it('is recognized by its guard', () => {
    expect(isConstructURLError(new ConstructURLError('error', partial))).toBe(true);
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });

  it('is found behind other errors', () => {
    const err = new ConstructURLError('error', partial);

    expect(getConstructURLError(new Error('outer', { cause: err }))).toBe(err);
    expect(getConstructURLError(new Error('outer', { cause: new Error('inner') }))).toBeNull();
  });
});
