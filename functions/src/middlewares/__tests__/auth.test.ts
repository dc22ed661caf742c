import * as admin from 'firebase-admin';
import { createRequest, createResponse } from '../../__tests__/helpers/expressHarness';
import { setUser } from '../../utils/sentry';
import { requireAuth } from '../auth';

jest.mock('../../utils/sentry', () => ({
  setUser: jest.fn(),
}));

describe('requireAuth', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('attaches the decoded token and continues', async () => {
    const verifyIdToken = jest.fn().mockResolvedValue({ uid: 'user-42' });
    (admin.auth as jest.Mock).mockReturnValueOnce({ verifyIdToken });
    const req = createRequest({ user: undefined, headers: { authorization: 'Bearer test-token' } });
    const res = createResponse();
    const next = jest.fn();

    await requireAuth(req, res, next);

    expect(verifyIdToken).toHaveBeenCalledWith('test-token');
    expect(req.user).toEqual({ uid: 'user-42' });
    expect(setUser).toHaveBeenCalledWith('user-42');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('rejects a request without a bearer token', async () => {
    const req = createRequest({ headers: { authorization: 'Basic abc' } });
    const res = createResponse();
    const next = jest.fn();

    await requireAuth(req, res, next);

    expect(res.statusCode).toBe(401);
    expect(res.body).toEqual({
      code: 'unauthorized',
      message: 'Missing or invalid authorization header',
    });
    expect(next).not.toHaveBeenCalled();
  });

  it('rejects a token that fails verification', async () => {
    (admin.auth as jest.Mock).mockReturnValueOnce({
      verifyIdToken: jest.fn().mockRejectedValue(new Error('expired')),
    });
    const req = createRequest({ headers: { authorization: 'Bearer stale-token' } });
    const res = createResponse();
    const next = jest.fn();

    await requireAuth(req, res, next);

    expect(res.statusCode).toBe(401);
    expect(res.body.message).toBe('Invalid or expired token');
    expect(next).not.toHaveBeenCalled();
  });
});
