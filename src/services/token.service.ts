import { randomUUID } from 'node:crypto';
import jwt, { Algorithm } from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '@/config/env';
import { TokenClaims, TokenType } from '@/models';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('TokenService');

export interface TokenConfig {
  secret: string;
  algorithm: Algorithm;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

export function tokenConfigFromEnv(): TokenConfig {
  return {
    secret: env.JWT_SECRET_KEY,
    algorithm: env.JWT_ALGORITHM,
    accessTokenTtlSeconds: env.ACCESS_TOKEN_EXPIRES_IN_SECONDS,
    refreshTokenTtlSeconds: env.REFRESH_TOKEN_EXPIRES_IN_SECONDS,
  };
}

const tokenClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(['access', 'refresh']),
  iat: z.number(),
  exp: z.number(),
  jti: z.string().min(1),
});

/**
 * Token Service
 * Issues and verifies the signed access / refresh JWTs
 *
 * Every token carries a random jti, so two tokens issued for the same
 * user within the same second still differ.
 */
export class TokenService {
  constructor(private readonly config: TokenConfig = tokenConfigFromEnv()) {}

  issueAccessToken(subject: string): string {
    return this.issue(subject, 'access', this.config.accessTokenTtlSeconds);
  }

  issueRefreshToken(subject: string): string {
    return this.issue(subject, 'refresh', this.config.refreshTokenTtlSeconds);
  }

  /**
   * @returns verified claims, or null when the signature, expiry, shape or type is wrong
   */
  verifyToken(token: string, expectedType: TokenType): TokenClaims | null {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.secret, { algorithms: [this.config.algorithm] });
    } catch (error) {
      logger.debug({ error, expectedType }, 'Token verification failed');
      return null;
    }

    const parsed = tokenClaimsSchema.safeParse(payload);
    if (!parsed.success || parsed.data.type !== expectedType) {
      logger.debug({ expectedType }, 'Token has unexpected claims');
      return null;
    }

    return parsed.data;
  }

  private issue(subject: string, type: TokenType, ttlSeconds: number): string {
    return jwt.sign({ type }, this.config.secret, {
      subject,
      jwtid: randomUUID(),
      algorithm: this.config.algorithm,
      expiresIn: ttlSeconds,
    });
  }
}
