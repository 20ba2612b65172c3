import { describe, expect, it } from 'vitest';
import { AcceptEncoding } from '../src/accept-encoding.js';
import { EncodingProposal } from '../src/encoding-proposal.js';
import { HttpError } from '../src/errors.js';
import { Headers } from '../src/headers.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('AcceptEncoding', () => {
  it('can be applied to headers and read back', () => {
    let accept = new AcceptEncoding();
    accept.push('gzip');
    let headers = new Headers();
    accept.apply(headers);
    expect(headers.get('accept-encoding')).toEqual(['gzip']);

    let parsed = AcceptEncoding.fromHeaders(headers);
    expect(parsed).toBeInstanceOf(AcceptEncoding);
    expect(parsed?.iter().next().value?.encoding).toBe('gzip');
  });

  it('keeps the wildcard when applied and read back', () => {
    let accept = new AcceptEncoding();
    accept.setWildcard(true);
    let headers = new Headers();
    accept.apply(headers);
    expect(headers.get('Accept-Encoding')).toEqual(['*']);
    expect(AcceptEncoding.fromHeaders(headers)?.wildcard()).toBe(true);
  });

  it('renders entries followed by the wildcard', () => {
    let accept = new AcceptEncoding();
    accept.push('gzip');
    accept.push(new EncodingProposal('br', 0.8));
    accept.setWildcard(true);
    expect(accept.value()).toBe('gzip, br;q=0.8, *');
    expect(accept.toString()).toBe('gzip, br;q=0.8, *');
    expect(accept.name()).toBe('Accept-Encoding');
  });

  it('renders an empty string when it has no entries and no wildcard', () => {
    expect(new AcceptEncoding().value()).toBe('');
  });

  it('iterates over its entries in insertion order', () => {
    let accept = new AcceptEncoding();
    accept.push('gzip');
    accept.push('br');
    expect([...accept].map((entry) => entry.encoding)).toEqual(['gzip', 'br']);
    expect(accept.size).toBe(2);
  });

  it('returns undefined from fromHeaders if the header is absent', () => {
    let headers = Headers.from({ 'content-type': 'text/plain' });
    expect(AcceptEncoding.fromHeaders(headers)).toBeUndefined();
  });

  it('returns an empty instance if the header is set but empty', () => {
    let accept = AcceptEncoding.fromHeaders(
      Headers.from({ 'accept-encoding': '' }),
    );
    expect(accept).toBeInstanceOf(AcceptEncoding);
    expect(accept?.size).toBe(0);
    expect(accept?.wildcard()).toBe(false);
  });

  it('combines repeated header occurrences', () => {
    let headers = new Headers()
      .append('Accept-Encoding', 'gzip;q=0.5')
      .append('accept-encoding', 'br, *');
    let accept = AcceptEncoding.fromHeaders(headers);
    expect(accept?.value()).toBe('gzip;q=0.5, br, *');
  });

  it('propagates weight errors from fromHeaders', () => {
    let headers = Headers.from({ 'accept-encoding': 'br, gzip;q=abc' });
    let error = catchError(() => AcceptEncoding.fromHeaders(headers));
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ code: 'INVALID_WEIGHT', status: 400 });
  });

  it('yields the same entries when serialized and parsed again', () => {
    let accept = AcceptEncoding.parse('gzip;q=0.4 ,identity,  br;q=0.8, *');
    let reparsed = AcceptEncoding.parse(accept.value());
    expect(reparsed.value()).toBe('gzip;q=0.4, identity, br;q=0.8, *');
    expect([...reparsed].map(String)).toEqual([...accept].map(String));
    expect(reparsed.wildcard()).toBe(accept.wildcard());
  });

  it('keeps three-decimal weights across a round trip', () => {
    let accept = AcceptEncoding.parse('br;q=1, gzip;q=0.999');
    expect(accept.value()).toBe('br;q=1, gzip;q=0.999');
    let reparsed = AcceptEncoding.parse(accept.value());
    expect(reparsed.negotiate(['gzip', 'br']).encoding).toBe('br');
    expect(reparsed.value()).toBe('br;q=1, gzip;q=0.999');
  });

  it('refuses weights with more than three decimals', () => {
    let error = catchError(() => AcceptEncoding.parse('br;q=1, gzip;q=0.9999'));
    expect(error).toMatchObject({
      code: 'INVALID_WEIGHT',
      message: 'Invalid weight parameter "q=0.9999"',
    });
  });

  describe('sort', () => {
    it('orders entries by weight, treating missing weights as 1', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('gzip', 0.4));
      accept.push(new EncodingProposal('identity'));
      accept.push(new EncodingProposal('br', 0.8));
      accept.sort();
      expect([...accept].map((entry) => entry.encoding)).toEqual([
        'identity',
        'br',
        'gzip',
      ]);
    });

    it('puts the entry declared later first when weights are equal', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('gzip', 0.5));
      accept.push(new EncodingProposal('br', 0.5));
      accept.push(new EncodingProposal('deflate', 0.2));
      accept.sort();
      expect(accept.value()).toBe('br;q=0.5, gzip;q=0.5, deflate;q=0.2');
    });

    it('considers a missing weight equal to an explicit weight of 1', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('identity'));
      accept.push(new EncodingProposal('gzip', 1));
      accept.sort();
      expect(accept.value()).toBe('gzip;q=1, identity');
    });
  });

  describe('negotiate', () => {
    it('picks the available encoding the client prefers', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('gzip', 0.4));
      accept.push(new EncodingProposal('identity'));
      accept.push(new EncodingProposal('br', 0.8));
      let encoding = accept.negotiate(['br', 'gzip']);
      expect(encoding.encoding).toBe('br');
      expect(encoding.value()).toBe('br');
    });

    it("follows the client's order rather than the server's", () => {
      let accept = AcceptEncoding.parse('br;q=0.5, gzip');
      expect(accept.negotiate(['br', 'gzip']).encoding).toBe('gzip');
    });

    it('picks the available proposal with the greatest weight', () => {
      let accept = AcceptEncoding.parse(
        'deflate;q=0.1, gzip;q=0.9, br;q=0.3',
      );
      expect(accept.negotiate(['gzip', 'deflate', 'br']).encoding).toBe(
        'gzip',
      );
    });

    it('sorts the entries', () => {
      let accept = AcceptEncoding.parse('gzip;q=0.4, br;q=0.8');
      accept.negotiate(['gzip']);
      expect(accept.value()).toBe('br;q=0.8, gzip;q=0.4');
    });

    it('fails with 406 if there is no entry and no wildcard', () => {
      let error = catchError(() => new AcceptEncoding().negotiate(['gzip']));
      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({
        code: 'NOT_ACCEPTABLE',
        status: 406,
        message: 'No suitable Content-Encoding found',
      });
    });

    it('fails with 406 if no entry is available', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('br', 0.8));
      let error = catchError(() => accept.negotiate(['gzip']));
      expect(error).toMatchObject({ code: 'NOT_ACCEPTABLE', status: 406 });
    });

    it('falls back to the first available encoding with a wildcard', () => {
      let accept = new AcceptEncoding();
      accept.push(new EncodingProposal('br', 0.8));
      accept.setWildcard(true);
      expect(accept.negotiate(['gzip', 'deflate']).encoding).toBe('gzip');
    });

    it('fails with 406 with a wildcard but nothing available', () => {
      let accept = AcceptEncoding.parse('*');
      let error = catchError(() => accept.negotiate([]));
      expect(error).toMatchObject({ code: 'NOT_ACCEPTABLE', status: 406 });
    });

    it('matches unknown encodings by token', () => {
      let accept = new AcceptEncoding();
      accept.push({ type: 'unknown', token: 'x-custom' });
      let encoding = accept.negotiate([
        'gzip',
        { type: 'unknown', token: 'x-custom' },
      ]);
      expect(encoding.value()).toBe('x-custom');
    });

    it('matches an unknown encoding spelling a known coding', () => {
      let accept = new AcceptEncoding();
      accept.push({ type: 'unknown', token: 'gzip' });
      expect(accept.value()).toBe('gzip');
      expect(accept.negotiate(['gzip']).encoding).toBe('gzip');
    });
  });

  describe('iterMut', () => {
    it('lets weights be updated in place', () => {
      let accept = AcceptEncoding.parse('br, gzip;q=0.2');
      for (let entry of accept.iterMut()) {
        if (entry.equals('gzip')) entry.weight = 0.9;
        else entry.weight = 0.5;
      }
      expect(accept.value()).toBe('br;q=0.5, gzip;q=0.9');
      accept.sort();
      expect(accept.value()).toBe('gzip;q=0.9, br;q=0.5');
    });

    it('refuses weights out of range', () => {
      let accept = AcceptEncoding.parse('br');
      let [entry] = [...accept.iterMut()];
      expect(() => {
        if (entry != null) entry.weight = 1.2;
      }).toThrow('Invalid weight 1.2: weights must be between 0 and 1');
      expect(accept.value()).toBe('br');
    });
  });

  it('copies pushed proposals', () => {
    let accept = new AcceptEncoding();
    let proposal = new EncodingProposal('br', 0.5);
    accept.push(proposal);
    proposal.weight = 0.1;
    expect(accept.value()).toBe('br;q=0.5');
  });

  it('refuses to push unknown encodings that are not valid tokens', () => {
    let accept = new AcceptEncoding();
    let error = catchError(() =>
      accept.push({ type: 'unknown', token: 'not a token' }),
    );
    expect(error).toMatchObject({ code: 'INVALID_ENCODING', status: 400 });
    expect(accept.size).toBe(0);
  });
});
