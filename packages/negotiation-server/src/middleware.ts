import {
  ACCEPT_ENCODING,
  AcceptEncoding,
  ContentEncoding,
  Headers,
  HttpError,
  includesEncoding,
  type Encoding,
} from '@encoding-negotiation/accept-encoding';
import type express from 'express';
import loglevel from 'loglevel';
import { STATUS_CODES } from 'node:http';

const log = loglevel.getLogger('negotiation-server');

export type ErrorDocument = {
  errors: Array<{ status: string; code: string; detail: string }>;
};

type NegotiateEncodingOptions = {
  available: readonly Encoding[];
};

/**
 * Resolves the content coding of a response from request headers.
 *
 * A request without Accept-Encoding accepts any coding: identity is used if
 * it is available, the first available encoding otherwise.
 *
 * @throws {HttpError} If the header is malformed (400) or if no available
 * encoding is acceptable (406).
 */
export function resolveContentEncoding(
  headers: Headers,
  available: readonly Encoding[],
): ContentEncoding {
  let accept = AcceptEncoding.fromHeaders(headers);
  if (accept != null) return accept.negotiate(available);
  if (includesEncoding(available, 'identity')) {
    return new ContentEncoding('identity');
  }
  let [first] = available;
  if (first == null) {
    throw new HttpError('No encoding available', 'NOT_ACCEPTABLE', {
      status: 406,
    });
  }
  return new ContentEncoding(first);
}

/**
 * Negotiates the content coding of the response. The result is stored in
 * `res.locals.contentEncoding` (see {@link getContentEncoding}); compressing
 * the body and setting Content-Encoding is left to the route.
 */
export function negotiateEncoding({
  available,
}: NegotiateEncodingOptions): express.RequestHandler {
  if (available.length === 0) {
    throw new Error('At least one encoding must be available');
  }
  return (req, res, next) => {
    res.vary(ACCEPT_ENCODING);
    let contentEncoding: ContentEncoding;
    try {
      contentEncoding = resolveContentEncoding(
        Headers.from(req.headers),
        available,
      );
    } catch (error) {
      if (!(error instanceof HttpError)) {
        next(error);
        return;
      }
      let status = error.status ?? 400;
      log.debug(`Encoding negotiation failed (${status}): ${error.message}`);
      res.status(status).json({
        errors: [
          {
            status: STATUS_CODES[status] ?? 'Error',
            code: error.code,
            detail: error.message,
          },
        ],
      } satisfies ErrorDocument);
      return;
    }
    res.locals.contentEncoding = contentEncoding;
    next();
  };
}

export function getContentEncoding(
  res: express.Response,
): ContentEncoding | undefined {
  let contentEncoding: unknown = res.locals.contentEncoding;
  return contentEncoding instanceof ContentEncoding
    ? contentEncoding
    : undefined;
}
