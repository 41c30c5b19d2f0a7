import { UserCacheService } from '@/services/userCache.service';
import { MemoryCacheStore } from '@/adapters/cache/MemoryCacheStore';
import { IUserRepository } from '@/repositories/interfaces';
import { buildUser, createMockUserRepository } from '@/tests/utils/mockRepositories';

describe('UserCacheService', () => {
  let now: number;
  let cache: MemoryCacheStore;
  let mockUserRepo: jest.Mocked<IUserRepository>;
  let userCache: UserCacheService;

  beforeEach(() => {
    now = 0;
    cache = new MemoryCacheStore(() => now);
    mockUserRepo = createMockUserRepository();
    userCache = new UserCacheService(cache, mockUserRepo);
  });

  it('should load a missing user from the repository and cache it', async () => {
    const user = buildUser();
    mockUserRepo.findUserByEmail.mockResolvedValue(user);

    const first = await userCache.getUserByEmail('alice@example.com');
    const second = await userCache.getUserByEmail('alice@example.com');

    expect(first).toEqual(user);
    expect(second).toEqual(user);
    expect(second?.createdAt).toBeInstanceOf(Date);
    expect(mockUserRepo.findUserByEmail).toHaveBeenCalledTimes(1);
  });

  it('should store a versioned envelope under user:<email>', async () => {
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

    await userCache.getUserByEmail('alice@example.com');

    const raw = await cache.get('user:alice@example.com');
    expect(raw).not.toBeNull();
    expect(JSON.parse(raw ?? '')).toEqual({
      v: 1,
      user: {
        id: 1,
        email: 'alice@example.com',
        password: 'not-a-real-hash',
        confirmed: true,
        avatar: null,
        refreshToken: null,
        createdAt: '2024-01-15T10:30:00.000Z',
      },
    });
  });

  it('should return null and cache nothing for an unknown email', async () => {
    mockUserRepo.findUserByEmail.mockResolvedValue(null);

    await expect(userCache.getUserByEmail('ghost@example.com')).resolves.toBeNull();
    expect(await cache.get('user:ghost@example.com')).toBeNull();
  });

  it('should reload after the 900 second TTL', async () => {
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

    await userCache.getUserByEmail('alice@example.com');
    now += 899_000;
    await userCache.getUserByEmail('alice@example.com');
    expect(mockUserRepo.findUserByEmail).toHaveBeenCalledTimes(1);

    now += 1_000;
    await userCache.getUserByEmail('alice@example.com');
    expect(mockUserRepo.findUserByEmail).toHaveBeenCalledTimes(2);
  });

  it('should treat an entry in an unknown format as a miss and overwrite it', async () => {
    await cache.set('user:alice@example.com', JSON.stringify({ v: 0, email: 'alice@example.com' }), 900);
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

    const user = await userCache.getUserByEmail('alice@example.com');

    expect(user?.id).toBe(1);
    expect(mockUserRepo.findUserByEmail).toHaveBeenCalledTimes(1);
    expect(JSON.parse((await cache.get('user:alice@example.com')) ?? '')).toHaveProperty('v', 1);
  });

  it('should treat unparseable JSON as a miss', async () => {
    await cache.set('user:alice@example.com', 'not json', 900);
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());

    await expect(userCache.getUserByEmail('alice@example.com')).resolves.toEqual(buildUser());
  });

  it('should serve stale data until refreshed', async () => {
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser({ confirmed: false }));
    await userCache.getUserByEmail('alice@example.com');

    await userCache.refresh(buildUser({ confirmed: true }));

    const user = await userCache.getUserByEmail('alice@example.com');
    expect(user?.confirmed).toBe(true);
    expect(mockUserRepo.findUserByEmail).toHaveBeenCalledTimes(1);
  });

  it('should go back to the repository after eviction', async () => {
    mockUserRepo.findUserByEmail.mockResolvedValue(buildUser());
    await userCache.getUserByEmail('alice@example.com');

    await userCache.evict('alice@example.com');
    mockUserRepo.findUserByEmail.mockResolvedValue(null);

    await expect(userCache.getUserByEmail('alice@example.com')).resolves.toBeNull();
  });

  it('should propagate cache store failures', async () => {
    jest.spyOn(cache, 'get').mockRejectedValue(new Error('cache unavailable'));

    await expect(userCache.getUserByEmail('alice@example.com')).rejects.toThrow('cache unavailable');
    expect(mockUserRepo.findUserByEmail).not.toHaveBeenCalled();
  });
});
