import { createHash } from 'node:crypto';

import { z } from 'zod';

import { InvalidPageToken } from './errors';
import { type FilterModel, filterToJson } from './filter';
import type { SortMode, SortValue } from './query-plan';
import { decodeBase64UrlJson, encodeBase64UrlJson, stableStringifyJson } from './serialization/json';

const TOKEN_VERSION = 1;

export type PageCursor = {
  mode: SortMode;
  key: readonly SortValue[];
};

const isoTimestamp = z.iso.datetime({ offset: false, precision: 3 });

const recordId = z.guid();

const cursorKeySchemas = {
  relevance: z.tuple([z.number().nonnegative(), isoTimestamp, recordId]),
  catalog: z.tuple([z.number().int(), z.number().positive(), recordId]),
} as const;

const tokenSchema = z.strictObject({
  v: z.literal(TOKEN_VERSION),
  m: z.enum(['relevance', 'catalog']),
  k: z.array(z.union([z.string(), z.number()])),
  f: z.string().regex(/^[0-9a-f]{16}$/),
});

/** Short fingerprint binding a token to the filter that produced it. */
export function filterDigest(filter: FilterModel): string {
  return createHash('sha256')
    .update(stableStringifyJson(filterToJson(filter)))
    .digest('hex')
    .slice(0, 16);
}

export function encodePageToken(cursor: PageCursor, digest: string): string {
  return encodeBase64UrlJson({
    v: TOKEN_VERSION,
    m: cursor.mode,
    k: [...cursor.key],
    f: digest,
  });
}

/**
 * Reads a token issued by `encodePageToken` for the same filter. A token minted for another
 * filter, or one whose bytes were edited, is `InvalidPageToken`.
 */
export function decodePageToken(
  token: string,
  expected: { mode: SortMode; digest: string },
): PageCursor {
  const parsed = tokenSchema.safeParse(decodeBase64UrlJson(token));
  if (!parsed.success) {
    throw new InvalidPageToken();
  }
  const { m: mode, k: key, f: digest } = parsed.data;
  if (digest !== expected.digest || mode !== expected.mode) {
    throw new InvalidPageToken(
      'Page token was issued for a different search; restart from the first page',
    );
  }
  const keyCheck =
    mode === 'relevance'
      ? cursorKeySchemas.relevance.safeParse(key)
      : cursorKeySchemas.catalog.safeParse(key);
  if (!keyCheck.success) {
    throw new InvalidPageToken();
  }
  return { mode, key: keyCheck.data };
}
