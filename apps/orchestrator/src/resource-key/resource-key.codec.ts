import { Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';

/** Identifier families the pipeline knows how to key */
export type ResourceKind = 'youtube' | 'url' | 'content';

/** Query parameters that never contribute to a URL's identity */
const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
  '_ga',
  '_gid',
]);

const DEFAULT_PORTS: ReadonlySet<string> = new Set(['80', '443']);

/** Bytes of the SHA-256 digest kept in a url key (16 base64url chars) */
const URL_DIGEST_BYTES = 12;

export class InvalidResourceIdentifierError extends Error {
  constructor(
    readonly kind: ResourceKind,
    readonly identifier: string,
    reason: string,
  ) {
    super(`Invalid ${kind} identifier "${identifier}": ${reason}`);
    this.name = 'InvalidResourceIdentifierError';
  }
}

/**
 * Canonical form of a web URL.
 *
 * - scheme and host lowercased, http upgraded to https
 * - ports 80/443, credentials and fragment dropped
 * - trailing slashes removed except on the root path
 * - tracking parameters removed, the rest sorted by name
 *   (values of a repeated name keep their order)
 *
 * Applying it twice yields the same string.
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new InvalidResourceIdentifierError('url', raw, 'not a valid URL');
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidResourceIdentifierError(
      'url',
      raw,
      `unsupported scheme ${url.protocol.replace(/:$/, '')}`,
    );
  }

  if (DEFAULT_PORTS.has(url.port)) {
    url.port = '';
  }
  url.protocol = 'https:';
  url.username = '';
  url.password = '';
  url.hash = '';

  if (url.pathname !== '/' && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }

  const params = [...url.searchParams.entries()]
    .filter(([name]) => !TRACKING_PARAMS.has(name))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  url.search = new URLSearchParams(params).toString();

  return url.toString();
}

/**
 * ResourceKeyCodec: maps an external identifier to the deduplication key
 * shared by every job for the same underlying resource.
 *
 *   youtube  → yt:<video id>
 *   url      → url:<base64url(sha256(normalizeUrl(url))[0..12])>
 *   content  → cid:<content id>
 *
 * Pure and deterministic: the same input yields the same key in every process.
 */
@Injectable()
export class ResourceKeyCodec {
  derive(kind: ResourceKind, identifier: string): string {
    const trimmed = identifier.trim();
    if (trimmed.length === 0) {
      throw new InvalidResourceIdentifierError(kind, identifier, 'empty');
    }

    switch (kind) {
      case 'youtube':
        return `yt:${trimmed}`;
      case 'url':
        return `url:${this.hashUrl(normalizeUrl(trimmed))}`;
      case 'content':
        return `cid:${trimmed}`;
    }
  }

  private hashUrl(normalized: string): string {
    return createHash('sha256')
      .update(normalized, 'utf8')
      .digest()
      .subarray(0, URL_DIGEST_BYTES)
      .toString('base64url');
  }
}
