import {
  InvalidResourceIdentifierError,
  ResourceKeyCodec,
  normalizeUrl,
} from './resource-key.codec';

describe('normalizeUrl', () => {
  it('lowercases scheme and host and upgrades http', () => {
    expect(normalizeUrl('HTTP://Example.COM/Path')).toBe(
      'https://example.com/Path',
    );
  });

  it('drops the fragment', () => {
    expect(normalizeUrl('https://example.com/page#section')).toBe(
      'https://example.com/page',
    );
  });

  it('drops default ports', () => {
    expect(normalizeUrl('https://example.com:443/path')).toBe(
      'https://example.com/path',
    );
    expect(normalizeUrl('http://example.com:80/path')).toBe(
      'https://example.com/path',
    );
  });

  it('keeps non-default ports', () => {
    expect(normalizeUrl('https://example.com:8443/path')).toBe(
      'https://example.com:8443/path',
    );
  });

  it('strips trailing slashes except on the root path', () => {
    expect(normalizeUrl('https://example.com/page/')).toBe(
      'https://example.com/page',
    );
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com/');
  });

  it('removes tracking parameters and sorts the rest', () => {
    expect(
      normalizeUrl(
        'https://example.com/watch?v=abc&utm_source=feed&fbclid=x&a=1&_ga=2',
      ),
    ).toBe('https://example.com/watch?a=1&v=abc');
  });

  it('keeps the value order of a repeated parameter', () => {
    expect(normalizeUrl('https://example.com/p?tag=z&b=1&tag=a')).toBe(
      'https://example.com/p?b=1&tag=z&tag=a',
    );
  });

  it('is idempotent', () => {
    const once = normalizeUrl(
      'HTTP://Example.COM:443/page/?b=2&a=1&utm_campaign=x#top',
    );
    expect(once).toBe('https://example.com/page?a=1&b=2');
    expect(normalizeUrl(once)).toBe(once);
  });

  it('rejects unparseable and non-web URLs', () => {
    expect(() => normalizeUrl('not a url')).toThrow(
      InvalidResourceIdentifierError,
    );
    expect(() => normalizeUrl('ftp://example.com/file')).toThrow(
      'unsupported scheme ftp',
    );
  });
});

describe('ResourceKeyCodec', () => {
  const codec = new ResourceKeyCodec();

  it('keys youtube videos by id', () => {
    expect(codec.derive('youtube', 'dQw4w9WgXcQ')).toBe('yt:dQw4w9WgXcQ');
  });

  it('keys content by id', () => {
    expect(codec.derive('content', 'abc123')).toBe('cid:abc123');
  });

  it('keys urls by a 16 character base64url digest', () => {
    expect(codec.derive('url', 'https://example.com/article')).toMatch(
      /^url:[A-Za-z0-9_-]{16}$/,
    );
  });

  it('gives equivalent urls the same key', () => {
    const canonical = codec.derive('url', 'https://example.com/article?a=1');
    expect(
      codec.derive(
        'url',
        'http://EXAMPLE.com:80/article/?utm_source=mail&a=1#comments',
      ),
    ).toBe(canonical);
  });

  it('gives different urls different keys', () => {
    expect(codec.derive('url', 'https://example.com/article1')).not.toBe(
      codec.derive('url', 'https://example.com/article2'),
    );
  });

  it('is deterministic across instances', () => {
    expect(new ResourceKeyCodec().derive('url', 'https://example.com/x')).toBe(
      codec.derive('url', 'https://example.com/x'),
    );
  });

  it('rejects empty identifiers for every kind', () => {
    for (const kind of ['youtube', 'url', 'content'] as const) {
      expect(() => codec.derive(kind, '   ')).toThrow(
        InvalidResourceIdentifierError,
      );
    }
  });
});
