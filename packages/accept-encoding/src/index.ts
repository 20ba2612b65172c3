export { AcceptEncoding } from './accept-encoding.js';
export type { ReadonlyEncodingProposal } from './accept-encoding.js';
export { parseAcceptEncodingHeader } from './accept-headers.js';
export type { AcceptEncodingDirectives } from './accept-headers.js';
export { ContentEncoding } from './content-encoding.js';
export {
  encodingEquals,
  encodingToString,
  includesEncoding,
  isKnownEncoding,
  isValidEncodingToken,
  knownEncodings,
  parseEncoding,
} from './encoding.js';
export type { Encoding, KnownEncoding, UnknownEncoding } from './encoding.js';
export { EncodingProposal, Weight } from './encoding-proposal.js';
export { HttpError } from './errors.js';
export type { HttpErrorCode, HttpErrorOptions } from './errors.js';
export { ACCEPT_ENCODING, CONTENT_ENCODING, Headers } from './headers.js';
export type { HeaderRecord } from './headers.js';
export { sortByWeight } from './sort-by-weight.js';
export type { Weighted } from './sort-by-weight.js';
