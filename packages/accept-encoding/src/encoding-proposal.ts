import { z } from 'zod';
import {
  encodingEquals,
  encodingToString,
  isKnownEncoding,
  isValidEncodingToken,
  parseEncoding,
  type Encoding,
} from './encoding.js';
import { HttpError } from './errors.js';

export const Weight = z.number().min(0).max(1);
export type Weight = z.output<typeof Weight>;

// RFC 7231 qvalue: at most three decimals, so parsed weights are rendered
// back unchanged.
const weightParameterRegExp =
  /^\s*q\s*=\s*(0(?:\.[0-9]{0,3})?|1(?:\.0{0,3})?)\s*$/;

/**
 * A single client preference: an encoding with an optional `q` weight.
 *
 * An absent weight is kept as such (it does not serialize as `q=1`), but it
 * ranks like a weight of 1 when proposals are sorted.
 */
export class EncodingProposal {
  #encoding: Encoding;
  #weight: Weight | undefined;

  constructor(encoding: Encoding, weight?: number | undefined) {
    if (!isKnownEncoding(encoding) && !isValidEncodingToken(encoding.token)) {
      throw new HttpError(
        `Invalid content coding "${encoding.token}"`,
        'INVALID_ENCODING',
        { status: 400 },
      );
    }
    // An unknown arm spelling a known coding becomes that coding.
    this.#encoding = parseEncoding(encodingToString(encoding));
    this.#weight = validateWeight(weight);
  }

  /**
   * Parses a single `coding` or `coding;q=value` directive.
   *
   * Returns `undefined` if the coding is not a known one. Throws if the
   * coding is known but its weight is not a valid qvalue.
   */
  static parse(directive: string): EncodingProposal | undefined {
    let [coding = '', weightParameter] = directive.split(';');
    let encoding = parseEncoding(coding);
    if (!isKnownEncoding(encoding)) return undefined;
    return new EncodingProposal(
      encoding,
      weightParameter == null ? undefined : parseWeight(weightParameter),
    );
  }

  get encoding(): Encoding {
    return this.#encoding;
  }

  get weight(): Weight | undefined {
    return this.#weight;
  }

  set weight(weight: number | undefined) {
    this.#weight = validateWeight(weight);
  }

  equals(other: EncodingProposal | Encoding) {
    if (other instanceof EncodingProposal) {
      return (
        encodingEquals(this.#encoding, other.encoding) &&
        this.#weight === other.weight
      );
    }
    return encodingEquals(this.#encoding, other);
  }

  toString() {
    let coding = encodingToString(this.#encoding);
    if (this.#weight == null) return coding;
    return `${coding};q=${formatWeight(this.#weight)}`;
  }
}

function validateWeight(weight: number | undefined): Weight | undefined {
  return weight === undefined ? undefined : checkWeight(weight);
}

function checkWeight(weight: number): Weight {
  let result = Weight.safeParse(weight);
  if (!result.success) {
    throw new HttpError(
      `Invalid weight ${weight}: weights must be between 0 and 1`,
      'INVALID_WEIGHT',
      { status: 400, cause: result.error },
    );
  }
  return result.data;
}

function parseWeight(weightParameter: string): Weight {
  let value = weightParameter.match(weightParameterRegExp)?.[1];
  if (value == null) {
    throw new HttpError(
      `Invalid weight parameter "${weightParameter.trim()}"`,
      'INVALID_WEIGHT',
      { status: 400 },
    );
  }
  return checkWeight(Number(value));
}

// qvalues have at most three decimals.
function formatWeight(weight: Weight) {
  return String(Number(weight.toFixed(3)));
}
