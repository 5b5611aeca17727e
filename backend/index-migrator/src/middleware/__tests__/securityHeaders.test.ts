import { describe, it, expect, jest } from '@jest/globals';
import { HeaderTarget, securityHeaders } from '../securityHeaders';

class FakeHeaders implements HeaderTarget {
  readonly headers = new Map<string, string>([['X-Powered-By', 'Express']]);

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  removeHeader(name: string): void {
    this.headers.delete(name);
  }
}

describe('securityHeaders', () => {
  it('sets the default headers and removes X-Powered-By', () => {
    const res = new FakeHeaders();
    const next = jest.fn();

    securityHeaders()({}, res, next);

    expect(Object.fromEntries(res.headers)).toEqual({
      'X-Frame-Options': 'DENY',
      'X-Content-Type-Options': 'nosniff',
      'Cache-Control': 'no-store',
      'Referrer-Policy': 'no-referrer',
    });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('skips disabled headers', () => {
    const res = new FakeHeaders();

    securityHeaders({ xFrameOptions: false, cacheControl: false, noSniff: false })({}, res, jest.fn());

    expect(Object.fromEntries(res.headers)).toEqual({ 'Referrer-Policy': 'no-referrer' });
  });

  it('uses custom values', () => {
    const res = new FakeHeaders();

    securityHeaders({ xFrameOptions: 'SAMEORIGIN', cacheControl: 'max-age=0' })({}, res, jest.fn());

    expect(res.headers.get('X-Frame-Options')).toBe('SAMEORIGIN');
    expect(res.headers.get('Cache-Control')).toBe('max-age=0');
  });
});
