import jwt from 'jsonwebtoken';
import { SessionTokenError, SessionTokens } from '../../src/auth/session-tokens';

const SECRET = 'test-secret-value-1234';

describe('SessionTokens', () => {
  const tokens = new SessionTokens(SECRET, 3600);

  test('issued tokens verify back to their claims', () => {
    const issued = tokens.issue('acct_1');
    const claims = tokens.verify(issued.token);
    expect(claims.accountId).toBe('acct_1');
    expect(claims.tokenId).toBe(issued.tokenId);
    expect(claims.expiresAt.getTime()).toBe(issued.expiresAt.getTime());
  });

  test('every token gets its own id', () => {
    expect(tokens.issue('acct_1').tokenId).not.toBe(tokens.issue('acct_1').tokenId);
  });

  test('rejects tokens signed with another secret', () => {
    const other = new SessionTokens('another-test-secret-5678', 3600).issue('acct_1');
    expect(() => tokens.verify(other.token)).toThrow(new SessionTokenError('Invalid session token'));
  });

  test('rejects expired tokens', () => {
    const expired = jwt.sign({ exp: Math.floor(Date.now() / 1000) - 10 }, SECRET, {
      algorithm: 'HS256',
      subject: 'acct_1',
      jwtid: 'tok_1',
    });
    expect(() => tokens.verify(expired)).toThrow('Session expired');
  });

  test('rejects tokens without subject or id', () => {
    const bare = jwt.sign({}, SECRET, { algorithm: 'HS256', expiresIn: 60 });
    expect(() => tokens.verify(bare)).toThrow('Invalid session token');
  });

  test('rejects garbage', () => {
    expect(() => tokens.verify('not-a-token')).toThrow(SessionTokenError);
  });
});
