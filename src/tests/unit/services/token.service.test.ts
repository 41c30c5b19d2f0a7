import jwt from 'jsonwebtoken';
import { TokenService } from '@/services/token.service';

const config = {
  secret: 'test-secret',
  algorithm: 'HS256' as const,
  accessTokenTtlSeconds: 15 * 60,
  refreshTokenTtlSeconds: 7 * 24 * 60 * 60,
};

describe('TokenService', () => {
  let tokens: TokenService;

  beforeEach(() => {
    tokens = new TokenService(config);
  });

  it('should issue access tokens that verify as access tokens', () => {
    const claims = tokens.verifyToken(tokens.issueAccessToken('alice@example.com'), 'access');

    expect(claims).toEqual(expect.objectContaining({ sub: 'alice@example.com', type: 'access' }));
    expect(claims && claims.exp - claims.iat).toBe(15 * 60);
  });

  it('should give refresh tokens a seven day lifetime', () => {
    const claims = tokens.verifyToken(tokens.issueRefreshToken('alice@example.com'), 'refresh');

    expect(claims && claims.exp - claims.iat).toBe(7 * 24 * 60 * 60);
  });

  it('should not accept a refresh token where an access token is expected', () => {
    expect(tokens.verifyToken(tokens.issueRefreshToken('alice@example.com'), 'access')).toBeNull();
    expect(tokens.verifyToken(tokens.issueAccessToken('alice@example.com'), 'refresh')).toBeNull();
  });

  it('should issue distinct tokens for the same subject', () => {
    const first = tokens.issueRefreshToken('alice@example.com');
    const second = tokens.issueRefreshToken('alice@example.com');

    expect(first).not.toBe(second);
  });

  it('should reject tokens signed with another secret', () => {
    const other = new TokenService({ ...config, secret: 'other-secret' });

    expect(tokens.verifyToken(other.issueAccessToken('alice@example.com'), 'access')).toBeNull();
  });

  it('should reject expired tokens', () => {
    const expired = jwt.sign(
      { type: 'access', jti: 'jti-1', exp: Math.floor(Date.now() / 1000) - 60 },
      config.secret,
      { subject: 'alice@example.com' }
    );

    expect(tokens.verifyToken(expired, 'access')).toBeNull();
  });

  it('should reject tokens without the expected claims', () => {
    const noType = jwt.sign({ jti: 'jti-1' }, config.secret, { subject: 'alice@example.com', expiresIn: 60 });

    expect(tokens.verifyToken(noType, 'access')).toBeNull();
    expect(tokens.verifyToken('not.a.token', 'access')).toBeNull();
  });
});
