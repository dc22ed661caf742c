import { createRequest, createResponse } from '../../__tests__/helpers/expressHarness';
import { requireHttps } from '../httpsOnly';

describe('requireHttps', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  it('lets everything through outside production', () => {
    const next = jest.fn();

    requireHttps(createRequest({ headers: { 'x-forwarded-proto': 'http' } }), createResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('accepts forwarded https requests in production', () => {
    process.env.NODE_ENV = 'production';
    const next = jest.fn();

    requireHttps(createRequest({ headers: { 'x-forwarded-proto': 'https, http' } }), createResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects plain http in production', () => {
    process.env.NODE_ENV = 'production';
    const res = createResponse();
    const next = jest.fn();

    requireHttps(createRequest({ secure: false, headers: { 'x-forwarded-proto': 'http' } }), res, next);

    expect(res.statusCode).toBe(403);
    expect(res.body.code).toBe('https_required');
    expect(next).not.toHaveBeenCalled();
  });
});
