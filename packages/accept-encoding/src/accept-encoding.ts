import loglevel from 'loglevel';
import { parseAcceptEncodingHeader } from './accept-headers.js';
import { ContentEncoding } from './content-encoding.js';
import {
  encodingToString,
  includesEncoding,
  type Encoding,
} from './encoding.js';
import { EncodingProposal } from './encoding-proposal.js';
import { HttpError } from './errors.js';
import { ACCEPT_ENCODING, type Headers } from './headers.js';
import { sortByWeight } from './sort-by-weight.js';

const log = loglevel.getLogger('accept-encoding');

export type ReadonlyEncodingProposal = Readonly<
  Pick<EncodingProposal, 'encoding' | 'weight' | 'equals' | 'toString'>
>;

/**
 * Client header advertising the content codings it accepts.
 *
 * @see https://tools.ietf.org/html/rfc7231#section-5.3.4
 *
 * @example
 * let accept = new AcceptEncoding();
 * accept.push(new EncodingProposal('br', 0.8));
 * accept.push(new EncodingProposal('gzip', 0.4));
 * accept.push('identity');
 * accept.negotiate(['br', 'gzip']).value(); // 'br'
 */
export class AcceptEncoding implements Iterable<ReadonlyEncodingProposal> {
  #entries: EncodingProposal[] = [];
  #wildcard = false;

  /**
   * Reads the Accept-Encoding header. Returns undefined if the header is not
   * set at all, and a (possibly empty) AcceptEncoding otherwise.
   *
   * @throws {HttpError} If a directive has a malformed weight.
   */
  static fromHeaders(headers: Headers): AcceptEncoding | undefined {
    let values = headers.get(ACCEPT_ENCODING);
    if (values == null) return undefined;
    return AcceptEncoding.parse(values);
  }

  /**
   * Parses one or more raw Accept-Encoding values.
   *
   * @throws {HttpError} If a directive has a malformed weight.
   */
  static parse(value: string | readonly string[]): AcceptEncoding {
    let { entries, wildcard } = parseAcceptEncodingHeader(
      typeof value === 'string' ? [value] : value,
    );
    let accept = new AcceptEncoding();
    accept.#entries = entries;
    accept.#wildcard = wildcard;
    return accept;
  }

  /**
   * Appends a directive. Proposals are copied: later changes to the given
   * instance do not affect this header.
   */
  push(proposal: EncodingProposal | Encoding) {
    this.#entries.push(
      proposal instanceof EncodingProposal
        ? new EncodingProposal(proposal.encoding, proposal.weight)
        : new EncodingProposal(proposal),
    );
  }

  /**
   * Whether the client sent a `*` directive.
   */
  wildcard() {
    return this.#wildcard;
  }

  setWildcard(wildcard: boolean) {
    this.#wildcard = wildcard;
  }

  get size() {
    return this.#entries.length;
  }

  /**
   * Sorts the directives by weight. Directives with a higher `q` come first.
   * If two directives have the same weight, the one declared later comes
   * first.
   */
  sort() {
    sortByWeight(this.#entries);
  }

  /**
   * Picks the encoding to use for the response. The client's preference
   * order decides between available encodings it lists. If none of them is
   * available but the client sent a wildcard, the first available encoding
   * is used.
   *
   * This sorts the directives.
   *
   * @param available - Encodings the server can produce, by preference.
   * @throws {HttpError} With status 406 if no encoding is acceptable.
   */
  negotiate(available: readonly Encoding[]): ContentEncoding {
    this.sort();

    let match = this.#entries.find((entry) =>
      includesEncoding(available, entry.encoding),
    );
    if (match != null) {
      log.debug(`Negotiated encoding ${match.toString()}`);
      return new ContentEncoding(match.encoding);
    }

    let fallback = available[0];
    if (this.#wildcard && fallback != null) {
      log.debug(
        `Negotiated encoding ${encodingToString(fallback)} from wildcard`,
      );
      return new ContentEncoding(fallback);
    }

    throw new HttpError(
      'No suitable Content-Encoding found',
      'NOT_ACCEPTABLE',
      { status: 406 },
    );
  }

  /**
   * Sets the Accept-Encoding header, replacing any previous value.
   */
  apply(headers: Headers) {
    headers.insert(ACCEPT_ENCODING, this.value());
  }

  name() {
    return ACCEPT_ENCODING;
  }

  /**
   * Renders the directives in their current order, followed by the wildcard
   * if it is set.
   */
  value() {
    let directives = this.#entries.map((entry) => entry.toString());
    if (this.#wildcard) directives.push('*');
    return directives.join(', ');
  }

  toString() {
    return this.value();
  }

  *iter(): IterableIterator<ReadonlyEncodingProposal> {
    yield* this.#entries;
  }

  /**
   * Iterates over the proposals themselves. Their weight can be updated.
   */
  *iterMut(): IterableIterator<EncodingProposal> {
    yield* this.#entries;
  }

  [Symbol.iterator]() {
    return this.iter();
  }
}
