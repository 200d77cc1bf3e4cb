import { z } from 'zod';

/**
 * Extra characters allowed in identifiers besides `a-zA-Z`, `0-9` and `_`.
 * Both fields are regular-expression character-class fragments, e.g. `'ء-ي'`.
 */
export interface IdentifierLocale {
  letters: string;
  digits: string;
}

/** Arabic letters and Arabic-Indic digits, the backend's default alphabet. */
export const defaultIdentifierLocale: IdentifierLocale = {
  letters: 'ء-ي',
  digits: '٠-٩',
};

/** Compiled identifier patterns for one locale. */
export interface IdentifierPatterns {
  shortname: RegExp;
  subpath: RegExp;
}

/**
 * Builds the shortname (1-64 characters) and subpath (1-128 characters, `/` allowed) patterns.
 */
export function buildIdentifierPatterns(locale: IdentifierLocale = defaultIdentifierLocale): IdentifierPatterns {
  const word = `a-zA-Z${locale.letters}0-9${locale.digits}_`;
  return {
    shortname: new RegExp(`^[${word}]{1,64}$`),
    subpath: new RegExp(`^[${word}/]{1,128}$`),
  };
}

/**
 * Strips leading and trailing `/` from a subpath. The root path `/` is kept as is.
 */
export function normalizeSubpath(subpath: string): string {
  if (subpath === '/') {
    return subpath;
  }

  return subpath.replace(/^\/+|\/+$/g, '');
}

/**
 * Schemas for the identifiers that address one entry.
 */
export function createIdentifierSchemas(locale: IdentifierLocale = defaultIdentifierLocale) {
  const patterns = buildIdentifierPatterns(locale);
  const shortname = z.string().regex(patterns.shortname, { message: 'invalid shortname' });
  const subpath = z.string().regex(patterns.subpath, { message: 'invalid subpath' });

  return {
    shortname,
    subpath,
    locator: z
      .object({ subpath, shortname })
      .transform((locator) => ({ ...locator, subpath: normalizeSubpath(locator.subpath) })),
  };
}
