import { env } from '@/config/env';
import { AVATAR_LIMITS } from '@/config/businessRules';
import { isUniqueViolation } from '@/config/database';
import { IUserRepository } from '@/repositories/interfaces';
import { IMailer } from '@/interfaces/IMailer';
import { IAvatarStorage } from '@/interfaces/IAvatarStorage';
import { TokenPair, User, UserDto, toUserDto } from '@/models';
import {
  BadRequestError,
  ConflictError,
  EmailNotConfirmedError,
  InvalidCredentialsError,
  InvalidOrExpiredTokenError,
  InvalidPasswordError,
  NotFoundError,
  UnauthorizedError,
} from '@/errors';
import { gravatarUrl } from '@/utils/gravatar';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { CredentialService } from './credential.service';
import { TokenService } from './token.service';
import { UserCacheService } from './userCache.service';

const logger = createLogger('AuthService');

export interface Credentials {
  email: string;
  password: string;
}

export interface UserWithDetail {
  user: UserDto;
  detail: string;
}

export interface AvatarFile {
  content: Buffer;
  mimeType: string;
}

/**
 * Auth Service
 * Signup, sessions (login / refresh rotation), access checks and account management
 *
 * One refresh token is stored per user: logging in again invalidates the
 * previous session's refresh token.
 */
export class AuthService {
  constructor(
    private readonly userRepo: IUserRepository,
    private readonly userCache: UserCacheService,
    private readonly credentials: CredentialService,
    private readonly tokens: TokenService,
    private readonly mailer: IMailer,
    private readonly avatarStorage: IAvatarStorage,
    private readonly publicBaseUrl: string = env.PUBLIC_BASE_URL
  ) {}

  async signup(input: Credentials): Promise<UserWithDetail> {
    const existing = await this.userRepo.findUserByEmail(input.email);
    if (existing) {
      throw new ConflictError(`User with the email ${input.email} already exists`);
    }

    const passwordHash = await this.credentials.hashPassword(input.password);

    let avatar: string | null = null;
    try {
      avatar = gravatarUrl(input.email);
    } catch (error) {
      logger.warn({ error, email: input.email }, 'Gravatar URL could not be built');
    }

    let user: User;
    try {
      user = await this.userRepo.createUser({ email: input.email, passwordHash, avatar });
    } catch (error) {
      // Lost a race with a concurrent signup for the same email
      if (isUniqueViolation(error)) {
        throw new ConflictError(`User with the email ${input.email} already exists`);
      }
      throw error;
    }

    logger.info({ userId: user.id }, 'User created');

    void this.sendConfirmationEmail(user.email).catch((error: unknown) => {
      logger.error({ error, userId: user.id }, 'Confirmation email could not be sent');
    });

    return {
      user: toUserDto(user),
      detail: 'User successfully created. Check your email for confirmation.',
    };
  }

  async authenticate(input: Credentials): Promise<TokenPair> {
    const user = await this.userCache.getUserByEmail(input.email);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const passwordMatches = await this.credentials.verifyPassword(input.password, user.password);
    if (!passwordMatches) {
      logger.warn({ userId: user.id }, 'Login rejected: wrong password');
      throw new InvalidPasswordError();
    }

    if (!user.confirmed) {
      throw new EmailNotConfirmedError();
    }

    const pair = this.issuePair(user.email);
    await this.userRepo.updateRefreshToken(user.id, pair.refresh_token);

    logger.info({ userId: user.id }, 'Session issued');
    return pair;
  }

  /**
   * Exchange a refresh token for a new pair
   * The stored token is read from the database, never the cache, and replaced
   * only if it is still the presented one.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    const claims = this.tokens.verifyToken(refreshToken, 'refresh');
    if (!claims) {
      throw new InvalidOrExpiredTokenError();
    }

    const user = await this.userRepo.findUserByEmail(claims.sub);
    if (!user || user.refreshToken !== refreshToken) {
      logger.warn({ subject: claims.sub }, 'Refresh rejected: token is not the active one');
      throw new InvalidOrExpiredTokenError();
    }

    const pair = this.issuePair(user.email);
    const rotated = await this.userRepo.rotateRefreshToken(user.id, refreshToken, pair.refresh_token);
    if (!rotated) {
      logger.warn({ userId: user.id }, 'Refresh rejected: token rotated concurrently');
      throw new InvalidOrExpiredTokenError();
    }

    return pair;
  }

  /**
   * Resolve the caller of a protected route from an access token
   */
  async requireAccess(accessToken: string): Promise<User> {
    const claims = this.tokens.verifyToken(accessToken, 'access');
    if (!claims) {
      throw new UnauthorizedError();
    }

    const user = await this.userCache.getUserByEmail(claims.sub);
    if (!user) {
      throw new UnauthorizedError();
    }

    return user;
  }

  async confirmEmail(token: string): Promise<{ message: string }> {
    const email = this.credentials.resolveConfirmationToken(token);

    const user = await this.userCache.getUserByEmail(email);
    if (!user) {
      throw new BadRequestError('Verification error');
    }

    if (user.confirmed) {
      return { message: 'Your email is already confirmed' };
    }

    const confirmed = await this.userRepo.confirmEmail(email);
    if (!confirmed) {
      throw new BadRequestError('Verification error');
    }
    await this.userCache.refresh(confirmed);

    logger.info({ userId: confirmed.id }, 'Email confirmed');
    return { message: 'Email confirmed' };
  }

  /**
   * Accounts can only be removed by their owner; any other email is reported as missing
   */
  async removeUser(caller: User, email: string): Promise<UserWithDetail> {
    if (caller.email !== email) {
      throw new NotFoundError('User not found');
    }

    const removed = await this.userRepo.removeUserByEmail(email);
    if (!removed) {
      throw new NotFoundError('User not found');
    }
    await this.userCache.evict(email);

    logger.info({ userId: removed.id }, 'User removed');
    return { user: toUserDto(removed), detail: 'User successfully removed' };
  }

  async updateAvatar(caller: User, file: AvatarFile): Promise<UserDto> {
    const avatarUrl = await this.avatarStorage.upload({
      publicId: `${AVATAR_LIMITS.PUBLIC_ID_PREFIX}/${caller.email}`,
      content: file.content,
      mimeType: file.mimeType,
    });

    const updated = await this.userRepo.updateAvatar(caller.email, avatarUrl);
    if (!updated) {
      throw new NotFoundError('User not found');
    }

    return toUserDto(updated);
  }

  private issuePair(subject: string): TokenPair {
    return {
      access_token: this.tokens.issueAccessToken(subject),
      refresh_token: this.tokens.issueRefreshToken(subject),
      token_type: 'bearer',
    };
  }

  private async sendConfirmationEmail(email: string): Promise<void> {
    const token = this.credentials.issueConfirmationToken(email);
    const confirmationUrl = new URL(`api/auth/confirmed_email/${token}`, this.publicBaseUrl).toString();

    await this.mailer.sendConfirmationEmail({
      to: email,
      username: email.split('@')[0] ?? email,
      confirmationUrl,
    });
  }
}
