import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { constructUrl, encodePathValue } from './constructUrl.js';

describe('encodePathValue', () => {
  it('keeps slashes between segments', () => {
    expect(encodePathValue('posts/2024')).toBe('posts/2024');
  });

  it('encodes each segment', () => {
    expect(encodePathValue('a b/c?d')).toBe('a%20b/c%3Fd');
  });

  it('encodes non-latin identifiers', () => {
    expect(encodePathValue('مقال')).toBe(encodeURIComponent('مقال'));
  });
});

describe('constructUrl', () => {
  it('fills every placeholder and strips the leading slash', () => {
    const [err, url] = constructUrl('/managed/entry/{resource_type}/{space_name}/{subpath}/{shortname}', {
      resource_type: 'content',
      space_name: 'blog',
      subpath: 'posts/2024',
      shortname: 'hello',
    });

    expect(err).toBeNull();
    expect(url).toBe('managed/entry/content/blog/posts/2024/hello');
  });

  it('keeps literal suffixes after a placeholder', () => {
    const [, url] = constructUrl('/managed/payload/content/{space_name}/{subpath}/{shortname}.json', {
      space_name: 'blog',
      subpath: 'posts',
      shortname: 'hello',
    });

    expect(url).toBe('managed/payload/content/blog/posts/hello.json');
  });

  it('appends search parameters and skips nullish ones', () => {
    const [, url] = constructUrl(
      '/user/profile',
      {},
      { retrieve_json_payload: true, retrieve_attachments: false, skipped: undefined, other: null },
    );

    expect(url).toBe('user/profile?retrieve_json_payload=true&retrieve_attachments=false');
  });

  it('leaves no question mark without search parameters', () => {
    const [, url] = constructUrl('/user/profile', {}, {});

    expect(url).toBe('user/profile');
  });

  it('returns an error when placeholders stay unfilled', () => {
    const template: string = '/managed/{space_name}/{shortname}';
    const [err, url] = constructUrl(template, { space_name: 'blog' });

    expect(url).toBeNull();
    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.url).toBe('/managed/blog/{shortname}');
    expect(err?.message).toBe('error constructing URL, path contains {} /managed/blog/{shortname}');
  });

  it('encodes braces inside values', () => {
    const [err, url] = constructUrl('/managed/{space_name}', { space_name: '{x}' });

    expect(err).toBeNull();
    expect(url).toBe('managed/%7Bx%7D');
  });
});
