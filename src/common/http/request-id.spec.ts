import { findRequestId, getRequestId } from './request-id';

describe('findRequestId', () => {
  it('reads the x-request-id header', () => {
    expect(findRequestId({ headers: { 'x-request-id': 'req-1' } })).toBe(
      'req-1',
    );
  });

  it('takes the first of repeated headers', () => {
    expect(
      findRequestId({ headers: { 'x-request-id': ['req-1', 'req-2'] } }),
    ).toBe('req-1');
  });

  it('returns null when the header is missing or blank', () => {
    expect(findRequestId({ headers: {} })).toBeNull();
    expect(findRequestId({ headers: { 'x-request-id': '  ' } })).toBeNull();
  });
});

describe('getRequestId', () => {
  it('prefers the caller-supplied id', () => {
    expect(getRequestId({ headers: { 'x-request-id': 'req-1' } })).toBe(
      'req-1',
    );
  });

  it('generates a UUID when none was supplied', () => {
    expect(getRequestId({ headers: {} })).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });
});
