import { AuthService } from '@/services/auth.service';
import { CredentialService } from '@/services/credential.service';
import { TokenService } from '@/services/token.service';
import { UserCacheService } from '@/services/userCache.service';
import { MemoryCacheStore } from '@/adapters/cache/MemoryCacheStore';
import { IUserRepository } from '@/repositories/interfaces';
import { IMailer } from '@/interfaces/IMailer';
import { IAvatarStorage } from '@/interfaces/IAvatarStorage';
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
import { buildUser, createMockUserRepository, pgError } from '@/tests/utils/mockRepositories';

describe('AuthService', () => {
  let passwordHash: string;
  let mockUserRepo: jest.Mocked<IUserRepository>;
  let cache: MemoryCacheStore;
  let credentials: CredentialService;
  let tokens: TokenService;
  let mailer: jest.Mocked<IMailer>;
  let avatarStorage: jest.Mocked<IAvatarStorage>;
  let authService: AuthService;

  beforeAll(async () => {
    passwordHash = await new CredentialService().hashPassword('secret1');
  });

  beforeEach(() => {
    mockUserRepo = createMockUserRepository();
    cache = new MemoryCacheStore();
    credentials = new CredentialService();
    tokens = new TokenService();
    mailer = { sendConfirmationEmail: jest.fn().mockResolvedValue(undefined) };
    avatarStorage = { upload: jest.fn() };

    authService = new AuthService(
      mockUserRepo,
      new UserCacheService(cache, mockUserRepo),
      credentials,
      tokens,
      mailer,
      avatarStorage,
      'http://localhost:8000/'
    );
  });

  describe('signup', () => {
    it('should reject an email that is already registered', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

      await expect(authService.signup({ email: 'alice@example.com', password: 'secret1' })).rejects.toThrow(
        'User with the email alice@example.com already exists'
      );
      expect(mockUserRepo.createUser).not.toHaveBeenCalled();
    });

    it('should store a hashed password and a gravatar avatar', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);
      mockUserRepo.createUser.mockResolvedValue(buildUser({ confirmed: false }));

      const result = await authService.signup({ email: 'alice@example.com', password: 'secret1' });

      const input = mockUserRepo.createUser.mock.calls[0]?.[0];
      expect(input?.email).toBe('alice@example.com');
      expect(input?.passwordHash).not.toBe('secret1');
      await expect(credentials.verifyPassword('secret1', input?.passwordHash ?? '')).resolves.toBe(true);
      expect(input?.avatar).toMatch(/^https:\/\/www\.gravatar\.com\/avatar\/[0-9a-f]{32}$/);
      expect(result.detail).toBe('User successfully created. Check your email for confirmation.');
      expect(result.user).toEqual({
        id: 1,
        email: 'alice@example.com',
        avatar: null,
        confirmed: false,
        createdAt: new Date('2024-01-15T10:30:00.000Z'),
      });
    });

    it('should email a confirmation link that resolves to the new user', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);
      mockUserRepo.createUser.mockResolvedValue(buildUser({ confirmed: false }));

      await authService.signup({ email: 'alice@example.com', password: 'secret1' });

      expect(mailer.sendConfirmationEmail).toHaveBeenCalledTimes(1);
      const message = mailer.sendConfirmationEmail.mock.calls[0]?.[0];
      expect(message?.to).toBe('alice@example.com');
      expect(message?.username).toBe('alice');
      expect(message?.confirmationUrl).toMatch(/^http:\/\/localhost:8000\/api\/auth\/confirmed_email\//);

      const token = message?.confirmationUrl.split('/').pop() ?? '';
      expect(credentials.resolveConfirmationToken(token)).toBe('alice@example.com');
    });

    it('should not fail when the confirmation email cannot be sent', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);
      mockUserRepo.createUser.mockResolvedValue(buildUser({ confirmed: false }));
      mailer.sendConfirmationEmail.mockRejectedValue(new Error('SMTP down'));

      await expect(authService.signup({ email: 'alice@example.com', password: 'secret1' })).resolves.toHaveProperty(
        'user.email',
        'alice@example.com'
      );
    });

    it('should report a concurrent signup for the same email as a conflict', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);
      mockUserRepo.createUser.mockRejectedValue(pgError('23505', 'duplicate key'));

      await expect(authService.signup({ email: 'alice@example.com', password: 'secret1' })).rejects.toThrow(
        ConflictError
      );
    });
  });

  describe('authenticate', () => {
    it('should reject an unknown email', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);

      await expect(authService.authenticate({ email: 'ghost@example.com', password: 'secret1' })).rejects.toThrow(
        InvalidCredentialsError
      );
    });

    it('should reject a wrong password on every attempt', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ password: passwordHash }));

      for (let attempt = 0; attempt < 3; attempt++) {
        await expect(authService.authenticate({ email: 'alice@example.com', password: 'wrong1' })).rejects.toThrow(
          InvalidPasswordError
        );
      }
      expect(mockUserRepo.updateRefreshToken).not.toHaveBeenCalled();
    });

    it('should reject an unconfirmed user with the right password', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ password: passwordHash, confirmed: false }));

      await expect(authService.authenticate({ email: 'alice@example.com', password: 'secret1' })).rejects.toThrow(
        EmailNotConfirmedError
      );
    });

    it('should issue a bearer token pair and store the refresh token', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ password: passwordHash }));

      const pair = await authService.authenticate({ email: 'alice@example.com', password: 'secret1' });

      expect(pair.token_type).toBe('bearer');
      expect(tokens.verifyToken(pair.access_token, 'access')?.sub).toBe('alice@example.com');
      expect(tokens.verifyToken(pair.refresh_token, 'refresh')?.sub).toBe('alice@example.com');
      expect(mockUserRepo.updateRefreshToken).toHaveBeenCalledWith(1, pair.refresh_token);
    });
  });

  describe('refresh', () => {
    it('should rotate the stored refresh token', async () => {
      const presented = tokens.issueRefreshToken('alice@example.com');
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ refreshToken: presented }));
      mockUserRepo.rotateRefreshToken.mockResolvedValue(true);

      const pair = await authService.refresh(presented);

      expect(pair.refresh_token).not.toBe(presented);
      expect(mockUserRepo.rotateRefreshToken).toHaveBeenCalledWith(1, presented, pair.refresh_token);
    });

    it('should read the stored token from the repository, not the cache', async () => {
      const presented = tokens.issueRefreshToken('alice@example.com');
      await cache.set(
        'user:alice@example.com',
        JSON.stringify({ v: 1, user: { ...buildUser({ refreshToken: presented }), createdAt: '2024-01-15T10:30:00.000Z' } }),
        900
      );
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ refreshToken: 'rotated-elsewhere' }));

      await expect(authService.refresh(presented)).rejects.toThrow(InvalidOrExpiredTokenError);
      expect(mockUserRepo.findUserByEmail).toHaveBeenCalledWith('alice@example.com');
    });

    it('should reject a token that is no longer the stored one', async () => {
      const presented = tokens.issueRefreshToken('alice@example.com');
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ refreshToken: tokens.issueRefreshToken('alice@example.com') }));

      await expect(authService.refresh(presented)).rejects.toThrow('Invalid or expired refresh token');
      expect(mockUserRepo.rotateRefreshToken).not.toHaveBeenCalled();
    });

    it('should reject when a concurrent refresh rotated the token first', async () => {
      const presented = tokens.issueRefreshToken('alice@example.com');
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ refreshToken: presented }));
      mockUserRepo.rotateRefreshToken.mockResolvedValue(false);

      await expect(authService.refresh(presented)).rejects.toThrow(InvalidOrExpiredTokenError);
    });

    it('should reject an access token presented as refresh token', async () => {
      await expect(authService.refresh(tokens.issueAccessToken('alice@example.com'))).rejects.toThrow(
        InvalidOrExpiredTokenError
      );
      expect(mockUserRepo.findUserByEmail).not.toHaveBeenCalled();
    });
  });

  describe('requireAccess', () => {
    it('should resolve the user of a valid access token', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

      const user = await authService.requireAccess(tokens.issueAccessToken('alice@example.com'));

      expect(user.id).toBe(1);
    });

    it('should reject a refresh token', async () => {
      await expect(authService.requireAccess(tokens.issueRefreshToken('alice@example.com'))).rejects.toThrow(
        'Invalid user authorization credentials or token is expired'
      );
    });

    it('should reject a token whose user no longer exists', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);

      await expect(authService.requireAccess(tokens.issueAccessToken('alice@example.com'))).rejects.toThrow(
        UnauthorizedError
      );
    });
  });

  describe('confirmEmail', () => {
    it('should reject a token for an unknown user', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(null);
      const token = credentials.issueConfirmationToken('ghost@example.com');

      await expect(authService.confirmEmail(token)).rejects.toThrow(BadRequestError);
    });

    it('should report an already confirmed email', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ confirmed: true }));
      const token = credentials.issueConfirmationToken('alice@example.com');

      await expect(authService.confirmEmail(token)).resolves.toEqual({ message: 'Your email is already confirmed' });
      expect(mockUserRepo.confirmEmail).not.toHaveBeenCalled();
    });

    it('should confirm and re-write the cached user', async () => {
      mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ confirmed: false }));
      mockUserRepo.confirmEmail.mockResolvedValue(buildUser({ confirmed: true }));
      const token = credentials.issueConfirmationToken('alice@example.com');

      await expect(authService.confirmEmail(token)).resolves.toEqual({ message: 'Email confirmed' });

      expect(JSON.parse((await cache.get('user:alice@example.com')) ?? '')).toMatchObject({
        v: 1,
        user: { email: 'alice@example.com', confirmed: true },
      });
    });
  });

  describe('removeUser', () => {
    it('should not let a user remove another account', async () => {
      await expect(authService.removeUser(buildUser(), 'bob@example.com')).rejects.toThrow(NotFoundError);
      expect(mockUserRepo.removeUserByEmail).not.toHaveBeenCalled();
    });

    it('should remove the caller and evict the cache entry', async () => {
      await cache.set('user:alice@example.com', 'cached', 900);
      mockUserRepo.removeUserByEmail.mockResolvedValue(buildUser());

      const result = await authService.removeUser(buildUser(), 'alice@example.com');

      expect(result.detail).toBe('User successfully removed');
      expect(result.user.email).toBe('alice@example.com');
      expect(await cache.get('user:alice@example.com')).toBeNull();
    });
  });

  describe('updateAvatar', () => {
    it('should upload under the ContactsApp/<email> public id and store the URL', async () => {
      avatarStorage.upload.mockResolvedValue('https://images.test/avatar.png');
      mockUserRepo.updateAvatar.mockResolvedValue(buildUser({ avatar: 'https://images.test/avatar.png' }));

      const user = await authService.updateAvatar(buildUser(), {
        content: Buffer.from('image-bytes'),
        mimeType: 'image/png',
      });

      expect(avatarStorage.upload).toHaveBeenCalledWith({
        publicId: 'ContactsApp/alice@example.com',
        content: Buffer.from('image-bytes'),
        mimeType: 'image/png',
      });
      expect(mockUserRepo.updateAvatar).toHaveBeenCalledWith('alice@example.com', 'https://images.test/avatar.png');
      expect(user.avatar).toBe('https://images.test/avatar.png');
    });
  });
});
