// Unit tests for the Host header checks
import { hostName, isAllowedHost } from '../../../src/api/middlewares/security.middleware';

describe('hostName', () => {
  it.each([
    ['api.example.com', 'api.example.com'],
    ['API.Example.com:8080', 'api.example.com'],
    ['[::1]:3333', '[::1]'],
    ['bad host:port', '']
  ])('reads %p as %p', (host, expected) => {
    expect(hostName(host)).toBe(expected);
  });
});

describe('isAllowedHost', () => {
  it('accepts anything when no hosts are configured', () => {
    expect(isAllowedHost('whatever.test', [])).toBe(true);
  });

  it('matches exact names, dotted suffixes and the wildcard', () => {
    const allowed = ['api.example.com', '.example.org'];

    expect(isAllowedHost('api.example.com:443', allowed)).toBe(true);
    expect(isAllowedHost('example.org', allowed)).toBe(true);
    expect(isAllowedHost('a.b.example.org', allowed)).toBe(true);
    expect(isAllowedHost('example.com', allowed)).toBe(false);
    expect(isAllowedHost('badexample.org', allowed)).toBe(false);
    expect(isAllowedHost('', allowed)).toBe(false);
    expect(isAllowedHost('anything.test', ['*'])).toBe(true);
  });
});
