import loglevel from 'loglevel';
import { EncodingProposal } from './encoding-proposal.js';

const WILDCARD = '*';

const log = loglevel.getLogger('accept-encoding');

export type AcceptEncodingDirectives = {
  entries: EncodingProposal[];
  wildcard: boolean;
};

/**
 * Parses every occurrence of an Accept-Encoding header as if they had been
 * joined with commas.
 *
 * Directives with an unknown coding are dropped. A malformed weight on a
 * known coding throws, and nothing is returned for the whole header.
 */
export function parseAcceptEncodingHeader(
  values: Iterable<string>,
): AcceptEncodingDirectives {
  let entries: EncodingProposal[] = [];
  let wildcard = false;
  for (let value of values) {
    for (let part of value.split(',')) {
      let directive = part.trim();
      if (directive === '') continue;
      if (directive === WILDCARD) {
        wildcard = true;
        continue;
      }
      let proposal = EncodingProposal.parse(directive);
      if (proposal == null) {
        log.debug(`Skipping unknown Accept-Encoding directive "${directive}"`);
        continue;
      }
      entries.push(proposal);
    }
  }
  return { entries, wildcard };
}
