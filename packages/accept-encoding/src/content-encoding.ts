import {
  encodingEquals,
  encodingToString,
  parseEncoding,
  type Encoding,
} from './encoding.js';
import { CONTENT_ENCODING, type Headers } from './headers.js';

/**
 * The coding applied to a response body, as announced by `Content-Encoding`.
 */
export class ContentEncoding {
  readonly encoding: Encoding;

  constructor(encoding: Encoding) {
    this.encoding = encoding;
  }

  /**
   * Reads the `Content-Encoding` header. When several codings were applied,
   * the last one (the outermost) is returned.
   */
  static fromHeaders(headers: Headers): ContentEncoding | undefined {
    let values = headers.get(CONTENT_ENCODING);
    if (values == null) return undefined;
    let codings = values
      .flatMap((value) => value.split(','))
      .map((coding) => coding.trim())
      .filter((coding) => coding !== '');
    let last = codings.at(-1);
    return last == null ? undefined : new ContentEncoding(parseEncoding(last));
  }

  apply(headers: Headers) {
    headers.insert(CONTENT_ENCODING, this.value());
  }

  name() {
    return CONTENT_ENCODING;
  }

  value() {
    return encodingToString(this.encoding);
  }

  equals(other: ContentEncoding | Encoding) {
    return encodingEquals(
      this.encoding,
      other instanceof ContentEncoding ? other.encoding : other,
    );
  }

  toString() {
    return this.value();
  }
}
