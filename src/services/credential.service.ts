import argon2 from 'argon2';
import jwt, { Algorithm } from 'jsonwebtoken';
import { env } from '@/config/env';
import { TTL_CONFIG } from '@/config/businessRules';
import { InvalidConfirmationTokenError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('CredentialService');

export interface CredentialConfig {
  emailTokenSecret: string;
  emailTokenAlgorithm: Algorithm;
  emailTokenTtlSeconds: number;
}

export function credentialConfigFromEnv(): CredentialConfig {
  return {
    emailTokenSecret: env.EMAIL_TOKEN_SECRET_KEY,
    emailTokenAlgorithm: env.EMAIL_TOKEN_ALGORITHM,
    emailTokenTtlSeconds: TTL_CONFIG.EMAIL_TOKEN_TTL_SECONDS,
  };
}

/**
 * Credential Service
 * Password hashing and email confirmation tokens
 */
export class CredentialService {
  constructor(private readonly config: CredentialConfig = credentialConfigFromEnv()) {}

  /**
   * argon2id with a random salt; the salt and parameters are encoded in the hash
   */
  async hashPassword(plain: string): Promise<string> {
    return argon2.hash(plain);
  }

  /**
   * Never throws: a malformed hash is a failed verification
   */
  async verifyPassword(plain: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, plain);
    } catch (error) {
      logger.warn({ error }, 'Password hash could not be verified');
      return false;
    }
  }

  issueConfirmationToken(email: string): string {
    return jwt.sign({}, this.config.emailTokenSecret, {
      subject: email,
      algorithm: this.config.emailTokenAlgorithm,
      expiresIn: this.config.emailTokenTtlSeconds,
    });
  }

  /**
   * @returns the email the token was issued for
   * @throws InvalidConfirmationTokenError on bad signature, expiry or missing subject
   */
  resolveConfirmationToken(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.config.emailTokenSecret, {
        algorithms: [this.config.emailTokenAlgorithm],
      });
    } catch (error) {
      logger.warn({ error }, 'Email confirmation token rejected');
      throw new InvalidConfirmationTokenError();
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      throw new InvalidConfirmationTokenError();
    }

    return payload.sub;
  }
}
