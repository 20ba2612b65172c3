/**
 * Content codings this package knows about, in their textual form.
 *
 * @see https://www.iana.org/assignments/http-parameters/http-parameters.xhtml
 */
export const knownEncodings = [
  'identity',
  'gzip',
  'deflate',
  'br',
  'zstd',
] as const;
export type KnownEncoding = (typeof knownEncodings)[number];

export type UnknownEncoding = {
  readonly type: 'unknown';
  readonly token: string;
};

export type Encoding = KnownEncoding | UnknownEncoding;

// RFC 7230 section 3.2.6.
const tokenRegExp = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export function isKnownEncoding(encoding: Encoding): encoding is KnownEncoding {
  return typeof encoding === 'string';
}

function isKnownEncodingName(name: string): name is KnownEncoding {
  return knownEncodings.some((known) => known === name);
}

/**
 * Parses a coding name. Names are matched exactly after trimming; anything
 * else is returned as an unknown encoding carrying the trimmed token.
 */
export function parseEncoding(token: string): Encoding {
  let name = token.trim();
  if (isKnownEncodingName(name)) return name;
  return { type: 'unknown', token: name };
}

export function isValidEncodingToken(token: string) {
  return tokenRegExp.test(token);
}

export function encodingToString(encoding: Encoding): string {
  return isKnownEncoding(encoding) ? encoding : encoding.token;
}

/**
 * Compares encodings by their textual form, so an unknown encoding whose token
 * spells a known coding equals that coding.
 */
export function encodingEquals(a: Encoding, b: Encoding) {
  return encodingToString(a) === encodingToString(b);
}

export function includesEncoding(
  encodings: readonly Encoding[],
  encoding: Encoding,
) {
  return encodings.some((e) => encodingEquals(e, encoding));
}
